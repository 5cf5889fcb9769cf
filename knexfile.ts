// Knexfile is used for migrations only

import type { Knex } from 'knex';
import dotenv from 'dotenv';

// app config not available when migrations are run by cli
dotenv.config();

// Validate required DATABASE_URL
if (!process.env.DATABASE_URL) {
  console.error('\nDATABASE_URL environment variable is required for database operations.');
  console.error('Please configure your .env file with DATABASE_URL.\n');
  process.exit(1);
}

const databaseUrl = process.env.DATABASE_URL;
const isProduction = process.env.NODE_ENV === 'production';

const migrations: Knex.MigratorConfig = {
  directory: './migrations',
  extension: 'ts',
};

const config: Knex.Config = databaseUrl.startsWith('sqlite:')
  ? {
      client: 'sqlite3',
      connection: { filename: databaseUrl.slice('sqlite:'.length) },
      useNullAsDefault: true,
      migrations,
    }
  : {
      client: 'pg',
      connection: {
        connectionString: databaseUrl,
        // prod: enable SSL but allow self-signed certificates for cloud dbs
        ssl: isProduction ? { rejectUnauthorized: false } : false,
      },
      migrations,
    };

// Knex CLI expects separate configs per environment
export default {
  development: config,
  production: config,
};
