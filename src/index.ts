import config from './config';
import { createDb, initDb } from './db/knex';
import { ProductService } from './services/productService';
import { createApp } from './app';
import logger from './utils/logger';

const db = createDb();
const app = createApp(new ProductService(db));

const start = async () => {
  await initDb(db);

  const server = app.listen(config.PORT, () => {
    logger.info('Server', `Server is running at http://localhost:${config.PORT}`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info('Server', `${signal} received, shutting down`);
    server.close(() => {
      db.destroy()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Database', 'Failed to close the connection pool', error);
          process.exit(1);
        });
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

start().catch((error: unknown) => {
  logger.error('Server', 'Failed to start', error);
  process.exit(1);
});
