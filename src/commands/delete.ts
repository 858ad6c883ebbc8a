import { CommandContext } from './context';
import { withDatabase } from '../storage/database';
import { resolveDate } from '../utils/dates';

export interface DeleteOptions {
  date?: string;
  now?: Date;
}

export interface DeleteResult {
  dateTaken: string;
  changes: number;
}

export function deleteRecord(ctx: CommandContext, options: DeleteOptions = {}): DeleteResult {
  const { config, logger, print } = ctx;
  const dateTaken = resolveDate(options.date, options.now);

  const changes = withDatabase(config.database.path, (database) => database.deleteByDate(dateTaken));

  if (changes === 0) {
    logger.info('delete', 'No record to delete', { dateTaken });
    print(`No record found for ${dateTaken}`);
  } else {
    logger.info('delete', 'Deleted record', { dateTaken, changes });
    print(`Deleted record for ${dateTaken} (${changes} row affected)`);
  }

  return { dateTaken, changes };
}
