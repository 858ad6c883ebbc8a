import Database from 'better-sqlite3';

export function isTableExistsError(error: unknown): boolean {
  return error instanceof Database.SqliteError && /already exists/i.test(error.message);
}

export function isDuplicateDateError(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    (error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY' || error.code === 'SQLITE_CONSTRAINT_UNIQUE')
  );
}
