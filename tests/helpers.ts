import type { Knex } from 'knex';
import { createDb, initDb } from '../src/db/knex';

// A migrated in-memory sqlite store, private to the calling test file.
export const createTestDb = async (): Promise<Knex> => {
  const db = createDb('test');
  await initDb(db);
  return db;
};

export const clearProducts = async (db: Knex): Promise<void> => {
  await db('products').del();
};
