import knex, { Knex } from 'knex';
import fs from 'fs';
import path from 'path';
import { DatabaseAdapter } from './DatabaseAdapter.js';
import { logger } from '../../utils/logger.js';

/**
 * SQLite adapter for local development and in-process tests.
 * Row locks are no-ops here; the single pooled connection serializes transactions.
 */
export class SqliteAdapter implements DatabaseAdapter {
  private knex: Knex;

  constructor(private readonly dbPath: string = './data/photohunt.db') {
    if (this.dbPath !== ':memory:') {
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.knex = knex({
      client: 'sqlite3',
      connection: {
        filename: this.dbPath,
      },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
      },
    });
  }

  getKnex(): Knex {
    return this.knex;
  }

  async initialize(): Promise<void> {
    await this.knex.raw('PRAGMA foreign_keys = ON');
    logger.debug(`SQLite database initialized at: ${this.dbPath}`);
  }

  async close(): Promise<void> {
    await this.knex.destroy();
  }

  async transaction<T>(callback: (trx: Knex.Transaction) => Promise<T>): Promise<T> {
    return await this.knex.transaction(callback);
  }
}
