import fs from 'node:fs';
import path from 'node:path';
import knex, { type Knex } from 'knex';

export type DatabaseOptions =
  | { client: 'pg'; connectionString: string; poolMax?: number }
  | { client: 'better-sqlite3'; filename: string };

export interface Database {
  knex: Knex;
  client: DatabaseOptions['client'];
  /** Whether `SELECT ... FOR UPDATE` is available. SQLite serializes writers instead. */
  rowLocks: boolean;
}

export function createDatabase(options: DatabaseOptions): Database {
  if (options.client === 'pg') {
    return {
      knex: knex({
        client: 'pg',
        connection: options.connectionString,
        pool: { min: 0, max: options.poolMax ?? 10 }
      }),
      client: 'pg',
      rowLocks: true
    };
  }

  if (options.filename !== ':memory:') {
    fs.mkdirSync(path.dirname(options.filename), { recursive: true });
  }
  return {
    knex: knex({
      client: 'better-sqlite3',
      connection: { filename: options.filename },
      useNullAsDefault: true,
      // a single connection keeps an in-memory database alive and serializes transactions
      pool: { min: 1, max: 1 }
    }),
    client: 'better-sqlite3',
    rowLocks: false
  };
}

export async function closeDatabase(database: Database): Promise<void> {
  await database.knex.destroy();
}

const UNIQUE_VIOLATION_CODES = new Set(['23505', 'SQLITE_CONSTRAINT_UNIQUE']);

export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    UNIQUE_VIOLATION_CODES.has(error.code)
  );
}

/** Insert results are `{ id }` rows where RETURNING is supported and bare row ids otherwise. */
export function insertedId(rows: ReadonlyArray<{ id: number } | number>): number {
  const first = rows[0];
  if (first === undefined) {
    throw new Error('insert returned no id');
  }
  return typeof first === 'number' ? first : Number(first.id);
}
