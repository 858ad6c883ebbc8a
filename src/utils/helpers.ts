const EMPTY_VALUES = new Set(['', '-', 'none', 'null']);
const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Coerces an observation to a number with one fractional digit.
 * `-`, `none` or an empty string stand for a missing observation.
 */
export function parseTemperature(value: string): number | null {
  const normalized = value.trim().toLowerCase();
  if (EMPTY_VALUES.has(normalized)) {
    return null;
  }

  const decimal = normalized.replace(',', '.');
  if (!DECIMAL_PATTERN.test(decimal)) {
    throw new Error(`Invalid temperature "${value}"`);
  }
  return roundTemperature(parseFloat(decimal));
}

export function roundTemperature(num: number): number {
  return Math.round(num * 10) / 10;
}

export function formatTemperature(value: number | null, missing: string = ''): string {
  return value === null ? missing : value.toFixed(1);
}
