import type { Knex } from 'knex';
import path from 'path';
import appConfig, { type Environment } from './src/config';
import { migrationSource } from './src/db/migrations';

const migrations: Knex.MigratorConfig = {
  migrationSource,
  tableName: 'knex_migrations'
};

const config: Record<Environment, Knex.Config> = {
  development: {
    client: 'sqlite3',
    connection: {
      filename: path.resolve(__dirname, 'src/db/products.sqlite3')
    },
    useNullAsDefault: true,
    migrations
  },

  test: {
    client: 'sqlite3',
    connection: {
      filename: ':memory:'
    },
    useNullAsDefault: true,
    migrations
  },

  production: {
    client: 'pg',
    connection: appConfig.DATABASE_URI,
    pool: { min: 2, max: 10 },
    migrations
  }
};

export default config;
