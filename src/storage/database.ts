import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';

export const TABLE_NAME = 'temperature';

export interface TemperatureRecord {
  dateTaken: string;
  morning: number | null;
  evening: number | null;
}

export type SortColumn = 'date' | 'morning' | 'evening';
export type SortDirection = 'asc' | 'desc';

export const SORT_COLUMNS: readonly SortColumn[] = ['date', 'morning', 'evening'];

interface TemperatureRow {
  date_taken: string;
  morning: number | null;
  evening: number | null;
}

// ORDER BY cannot take a bound parameter, so columns only ever come from here
const COLUMN_NAMES: Record<SortColumn, string> = {
  date: 'date_taken',
  morning: 'morning',
  evening: 'evening',
};

/**
 * One connection to the temperature store. Every command opens its own,
 * runs a single statement inside a transaction and closes it again.
 */
export class TemperatureDatabase {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dbDir = path.dirname(dbPath);
      if (!fs.existsSync(dbDir)) {
        fs.mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
  }

  /**
   * Fails with SQLite's "table temperature already exists" when run twice;
   * the transaction is rolled back and the schema left as it was.
   */
  createTable(): void {
    this.inTransaction(() => {
      this.db.exec(`
        CREATE TABLE ${TABLE_NAME} (
          date_taken DATE PRIMARY KEY,
          morning NUMERIC(3,1),
          evening NUMERIC(3,1)
        )
      `);
    });
  }

  insert(record: TemperatureRecord): number {
    const stmt = this.db.prepare<[string, number | null, number | null]>(`
      INSERT INTO ${TABLE_NAME} (date_taken, morning, evening)
      VALUES (?, ?, ?)
    `);

    return this.inTransaction(
      () => stmt.run(record.dateTaken, record.morning, record.evening).changes
    );
  }

  deleteByDate(dateTaken: string): number {
    const stmt = this.db.prepare<[string]>(`DELETE FROM ${TABLE_NAME} WHERE date_taken = ?`);
    return this.inTransaction(() => stmt.run(dateTaken).changes);
  }

  list(sort: SortColumn = 'date', direction: SortDirection = 'desc'): TemperatureRecord[] {
    const column = COLUMN_NAMES[sort];
    const order = direction === 'asc' ? 'ASC' : 'DESC';

    const stmt = this.db.prepare<[], TemperatureRow>(`
      SELECT date_taken, morning, evening FROM ${TABLE_NAME}
      ORDER BY ${column} ${order}, date_taken ${order}
    `);

    return stmt.all().map(toRecord);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  // better-sqlite3 commits when fn returns and rolls back when it throws
  private inTransaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }
}

function toRecord(row: TemperatureRow): TemperatureRecord {
  return {
    dateTaken: row.date_taken,
    morning: row.morning,
    evening: row.evening,
  };
}

/**
 * Runs fn against a fresh connection and always closes it afterwards.
 */
export function withDatabase<T>(dbPath: string, fn: (database: TemperatureDatabase) => T): T {
  const database = new TemperatureDatabase(dbPath);
  try {
    return fn(database);
  } finally {
    database.close();
  }
}
