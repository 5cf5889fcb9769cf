import knex, { Knex } from 'knex';
import { DatabaseAdapter } from './DatabaseAdapter.js';
import { logger } from '../../utils/logger.js';

export class PostgresAdapter implements DatabaseAdapter {
  private knex: Knex;

  constructor(
    private readonly connectionString: string,
    production: boolean
  ) {
    this.knex = knex({
      client: 'pg',
      connection: {
        connectionString: this.connectionString,
        // prod: enable SSL but allow self-signed certificates for cloud dbs
        ssl: production ? { rejectUnauthorized: false } : false,
      },
      pool: {
        min: 2,
        max: 10,
      },
    });
  }

  getKnex(): Knex {
    return this.knex;
  }

  async initialize(): Promise<void> {
    // Test the connection
    try {
      await this.knex.raw('SELECT 1');
      logger.debug('PostgreSQL connection established');
    } catch (error) {
      logger.error({ err: error }, 'Failed to connect to PostgreSQL');
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.knex.destroy();
  }

  async transaction<T>(callback: (trx: Knex.Transaction) => Promise<T>): Promise<T> {
    return await this.knex.transaction(callback);
  }
}
