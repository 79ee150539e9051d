import type { Knex } from 'knex';
import * as createProductsTable from './20261018093000_create_products_table';

interface NamedMigration {
  name: string;
  migration: Knex.Migration;
}

// Migrations are listed here instead of read from disk so they load the same
// way from the TypeScript sources and from the compiled output.
const migrations: NamedMigration[] = [
  { name: '20261018093000_create_products_table', migration: createProductsTable },
];

export const migrationSource: Knex.MigrationSource<NamedMigration> = {
  getMigrations: async () => migrations,
  getMigrationName: (migration) => migration.name,
  getMigration: async (migration) => migration.migration,
};
