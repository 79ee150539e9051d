import type { Request, Response, NextFunction } from 'express';
import type { ProductService } from '../../../services/productService';
import { deserializeProduct, serializeProduct } from '../../../models/product';
import { type Product, parseCategory } from '../../../types';
import { toBoolean } from '../../../utils/coerce';
import { DataValidationError } from '../../../utils/errors';

export const PRODUCTS_PATH = '/api/v1/products';

// Largest value of the integer id column
export const MAX_ID = 2147483647;

// Route ids are positive integers within the id column; anything else cannot name a record.
export const parseId = (value: string): number | undefined => {
  if (!/^\d+$/.test(value)) return undefined;
  const id = Number(value);
  return Number.isSafeInteger(id) && id > 0 && id <= MAX_ID ? id : undefined;
};

const queryValue = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

const notFound = (res: Response, id: string) =>
  res.status(404).json({
    success: false,
    message: `Product with id '${id}' was not found.`
  });

// Applies at most one filter, checked in the order name, category, available, price.
const listWithFilter = (service: ProductService, query: Request['query']): Promise<Product[]> => {
  const name = queryValue(query.name);
  const category = queryValue(query.category);
  const available = queryValue(query.available);
  const price = queryValue(query.price);

  if (name !== undefined) return service.findByName(name);
  if (category !== undefined) {
    const parsed = parseCategory(category);
    if (!parsed) throw new DataValidationError(`Invalid attribute: ${category}`);
    return service.findByCategory(parsed);
  }
  if (available !== undefined) {
    const parsed = toBoolean(available);
    if (parsed === undefined) throw new DataValidationError(`Invalid data: available "${available}" is not a boolean`);
    return service.findByAvailability(parsed);
  }
  if (price !== undefined) return service.findByPrice(price);
  return service.all();
};

export const createProductController = (service: ProductService) => ({
  // GET /products
  getAllProducts: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const products = await listWithFilter(service, req.query);
      res.status(200).json({
        success: true,
        data: products.map(serializeProduct)
      });
    } catch (error) {
      next(error);
    }
  },

  // GET /products/:id
  getProductById: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseId(req.params.id);
      const product = id === undefined ? undefined : await service.find(id);
      if (!product) {
        return notFound(res, req.params.id);
      }
      res.status(200).json({
        success: true,
        data: serializeProduct(product)
      });
    } catch (error) {
      next(error);
    }
  },

  // POST /products
  createNewProduct: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const product = await service.create(deserializeProduct(req.body));
      res
        .status(201)
        .location(`${PRODUCTS_PATH}/${product.id}`)
        .json({
          success: true,
          data: serializeProduct(product)
        });
    } catch (error) {
      next(error);
    }
  },

  // PUT /products/:id
  updateExistingProduct: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseId(req.params.id);
      const existing = id === undefined ? undefined : await service.find(id);
      if (!existing) {
        return notFound(res, req.params.id);
      }
      const updatedProduct = await service.update(deserializeProduct(req.body, existing));
      if (!updatedProduct) {
        return notFound(res, req.params.id);
      }
      res.status(200).json({
        success: true,
        data: serializeProduct(updatedProduct)
      });
    } catch (error) {
      next(error);
    }
  },

  // DELETE /products/:id, answered with 204 whether or not the record existed
  deleteExistingProduct: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseId(req.params.id);
      const product = id === undefined ? undefined : await service.find(id);
      if (product) {
        await service.delete(product);
      }
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  }
});

export type ProductController = ReturnType<typeof createProductController>;
