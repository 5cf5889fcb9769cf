import { DatabaseAdapter } from './adapters/DatabaseAdapter.js';
import { PostgresAdapter } from './adapters/PostgresAdapter.js';
import { SqliteAdapter } from './adapters/SqliteAdapter.js';
import { logger } from '../utils/logger.js';

export interface DatabaseConfig {
  // postgres://... or sqlite:<path>
  connectionString: string;
  production: boolean;
}

export class DatabaseConnection {
  private adapter: DatabaseAdapter;

  constructor(config: DatabaseConfig) {
    if (config.connectionString.startsWith('sqlite:')) {
      this.adapter = new SqliteAdapter(config.connectionString.slice('sqlite:'.length));
    } else {
      this.adapter = new PostgresAdapter(config.connectionString, config.production);
    }
  }

  /**
   * Initialize the database connection
   */
  async initialize(): Promise<void> {
    await this.adapter.initialize();
    logger.debug('Database initialized successfully');
  }

  getAdapter(): DatabaseAdapter {
    return this.adapter;
  }

  async close(): Promise<void> {
    logger.debug('Closing database connection...');
    await this.adapter.close();
  }
}
