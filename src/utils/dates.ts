import { format, isMatch, isValid, parse, startOfDay, subDays } from 'date-fns';

export const ISO_DATE_FORMAT = 'yyyy-MM-dd';
export const DISPLAY_DATE_FORMAT = 'EEE dd MMM yyyy';

const RELATIVE_PATTERN = /^(\d+)d$/;
const LITERAL_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function toIsoDate(date: Date): string {
  return format(date, ISO_DATE_FORMAT);
}

export function todayIsoDate(now: Date = new Date()): string {
  return toIsoDate(startOfDay(now));
}

/**
 * Resolves a date argument to YYYY-MM-DD.
 *
 * `<N>d` means N days before today, a YYYY-MM-DD literal is taken as is,
 * and no value means today.
 */
export function resolveDate(value: string | undefined, now: Date = new Date()): string {
  if (value === undefined) {
    return todayIsoDate(now);
  }

  const trimmed = value.trim();

  const relative = RELATIVE_PATTERN.exec(trimmed);
  if (relative) {
    const date = subDays(startOfDay(now), parseInt(relative[1], 10));
    if (isValid(date)) {
      return toIsoDate(date);
    }
  } else if (LITERAL_PATTERN.test(trimmed) && isMatch(trimmed, ISO_DATE_FORMAT)) {
    return trimmed;
  }

  throw new Error(`Invalid date "${value}": use YYYY-MM-DD or <N>d for N days ago`);
}

export function parseIsoDate(isoDate: string): Date {
  return parse(isoDate, ISO_DATE_FORMAT, new Date());
}

export function formatDisplayDate(isoDate: string): string {
  return format(parseIsoDate(isoDate), DISPLAY_DATE_FORMAT);
}
