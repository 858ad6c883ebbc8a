import { CommandContext } from './context';
import { TABLE_NAME, withDatabase } from '../storage/database';
import { isTableExistsError } from '../storage/errors';

export type InitiateResult = 'created' | 'exists';

export function initiate(ctx: CommandContext): InitiateResult {
  const { config, logger, print } = ctx;

  return withDatabase(config.database.path, (database): InitiateResult => {
    try {
      database.createTable();
    } catch (error) {
      if (!isTableExistsError(error)) {
        throw error;
      }
      logger.warn('initiate', `Table ${TABLE_NAME} already exists`, { path: config.database.path });
      print(`Table "${TABLE_NAME}" already exists`);
      return 'exists';
    }

    logger.info('initiate', `Created table ${TABLE_NAME}`, { path: config.database.path });
    print(`Table "${TABLE_NAME}" created`);
    return 'created';
  });
}
