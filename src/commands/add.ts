import { CommandContext } from './context';
import { withDatabase } from '../storage/database';
import { isDuplicateDateError } from '../storage/errors';
import { resolveDate } from '../utils/dates';
import { roundTemperature } from '../utils/helpers';

export interface AddOptions {
  morning: number | null;
  evening: number | null;
  // YYYY-MM-DD, <N>d or undefined for today
  date?: string;
  now?: Date;
}

export interface AddResult {
  dateTaken: string;
  inserted: boolean;
  changes: number;
}

export function addRecord(ctx: CommandContext, options: AddOptions): AddResult {
  const { config, logger, print } = ctx;

  if (options.morning === null && options.evening === null) {
    throw new Error('At least one of the morning or evening temperature is required');
  }

  const record = {
    dateTaken: resolveDate(options.date, options.now),
    morning: options.morning === null ? null : roundTemperature(options.morning),
    evening: options.evening === null ? null : roundTemperature(options.evening),
  };

  return withDatabase(config.database.path, (database): AddResult => {
    let changes: number;
    try {
      changes = database.insert(record);
    } catch (error) {
      if (!isDuplicateDateError(error)) {
        throw error;
      }
      logger.warn('add', 'Duplicate date rejected', { dateTaken: record.dateTaken });
      print(`A record for ${record.dateTaken} already exists`);
      return { dateTaken: record.dateTaken, inserted: false, changes: 0 };
    }

    logger.info('add', 'Inserted record', record);
    print(`Inserted record for ${record.dateTaken} (${changes} row affected)`);
    return { dateTaken: record.dateTaken, inserted: true, changes };
  });
}
