import knex, { type Knex } from 'knex';
import config, { type Environment } from '../config';
import knexConfig from '../../knexfile';
import logger from '../utils/logger';

// Opens a connection pool for the given environment. The caller owns it and must destroy() it.
export const createDb = (environment: Environment = config.NODE_ENV): Knex => {
  logger.info('Database', `Connecting to the ${environment} database`);
  return knex(knexConfig[environment]);
};

// Brings the schema up to date
export const initDb = async (db: Knex): Promise<void> => {
  const [batch, applied]: [number, string[]] = await db.migrate.latest();
  logger.info('Database', `Migrations batch ${batch} applied ${applied.length} file(s)`);
};
