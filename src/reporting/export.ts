import * as fs from 'fs';
import { TemperatureRecord } from '../storage/database';
import { formatDisplayDate } from '../utils/dates';
import { formatTemperature } from '../utils/helpers';

export const EXPORT_HEADER = 'Date;Morning temperature;Evening temperature';

export function formatRecordLine(record: TemperatureRecord): string {
  return (
    `Date: ${formatDisplayDate(record.dateTaken)} ; ` +
    `Morning: ${formatTemperature(record.morning, '-')} ; ` +
    `Evening: ${formatTemperature(record.evening, '-')}`
  );
}

export function formatExportLine(record: TemperatureRecord): string {
  return [
    formatDisplayDate(record.dateTaken),
    formatTemperature(record.morning),
    formatTemperature(record.evening),
  ].join(';');
}

export function buildExport(records: TemperatureRecord[]): string {
  const lines = [EXPORT_HEADER, ...records.map(formatExportLine)];
  return lines.join('\n') + '\n';
}

export function writeExport(filePath: string, records: TemperatureRecord[]): void {
  fs.writeFileSync(filePath, buildExport(records), 'utf-8');
}
