import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { ProductService } from './services/productService';
import { createProductRoutes } from './api/v1/routes/productRoutes';
import { PRODUCTS_PATH } from './api/v1/controllers/productController';
import { methodNotAllowed, routeNotFound } from './middleware/requestMiddleware';
import { errorHandler } from './middleware/errorHandler';

export const createApp = (productService: ProductService): Express => {
  const app: Express = express();

  app.use(cors()); // Enable Cross-Origin Resource Sharing
  app.use(helmet()); // Set common security headers
  app.use(express.json()); // Parse incoming JSON requests

  // API Routes
  app.use(PRODUCTS_PATH, createProductRoutes(productService));

  app.route('/').get((req: Request, res: Response) => {
    res.send('Product Catalog API is running!');
  }).all(methodNotAllowed);

  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({ status: 'OK' });
  });

  app.use(routeNotFound);
  app.use(errorHandler);

  return app;
};

export default createApp;
