import { CommandContext } from './context';
import { SortColumn, SortDirection, TemperatureRecord, withDatabase } from '../storage/database';
import { formatRecordLine, writeExport } from '../reporting/export';

export interface ListOptions {
  sort?: SortColumn;
  direction?: SortDirection;
  // write a semicolon-delimited file instead of printing
  exportPath?: string;
}

export function listRecords(ctx: CommandContext, options: ListOptions = {}): TemperatureRecord[] {
  const { config, logger, print } = ctx;
  const sort = options.sort ?? 'date';
  const direction = options.direction ?? 'desc';

  const records = withDatabase(config.database.path, (database) => database.list(sort, direction));
  logger.debug('list', `Fetched ${records.length} records`, { sort, direction });

  if (options.exportPath !== undefined) {
    writeExport(options.exportPath, records);
    logger.info('list', 'Exported records', { path: options.exportPath, count: records.length });
    print(`Exported ${records.length} records to ${options.exportPath}`);
    return records;
  }

  if (records.length === 0) {
    print('No records found');
  }
  for (const record of records) {
    print(formatRecordLine(record));
  }

  return records;
}
