import { Knex } from 'knex';

/**
 * Common surface of the Postgres and SQLite adapters. Repositories depend on
 * this, never on a concrete driver.
 */
export interface DatabaseAdapter {
  /**
   * Get the underlying Knex instance for this adapter
   */
  getKnex(): Knex;

  /**
   * Check connectivity; table creation is handled by migrations
   */
  initialize(): Promise<void>;

  close(): Promise<void>;

  transaction<T>(callback: (trx: Knex.Transaction) => Promise<T>): Promise<T>;
}

/**
 * Postgres (23505) and SQLite report unique violations differently
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  if (error.code === '23505') {
    return true;
  }
  return error.code === 'SQLITE_CONSTRAINT' && error.message.includes('UNIQUE');
}
