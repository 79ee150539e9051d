import Decimal from 'decimal.js';
import { DEFAULT_CATEGORY, type NewProduct, type Product, type ProductPayload, type ProductRow } from '../types';
import { DataValidationError } from '../utils/errors';
import { validateProduct } from './productSchema';
import { priceLimitProblem } from './price';

// Builds an unsaved product, filling in the store defaults.
export const buildProduct = (
  fields: Pick<NewProduct, 'name' | 'description' | 'price'> & Partial<NewProduct>
): Product => ({
  id: null,
  available: true,
  category: DEFAULT_CATEGORY,
  ...fields,
});

// Price is written with toFixed() so it never switches to exponent notation.
export const serializeProduct = (product: Product): ProductPayload => ({
  id: product.id,
  name: product.name,
  description: product.description,
  price: product.price.toFixed(),
  available: product.available,
  category: product.category,
});

/**
 * Turns a decoded payload into a Product. The id is never read from the
 * payload: it comes from `base` (the stored record being updated) or stays null.
 *
 * @throws DataValidationError naming the first offending field
 */
export const deserializeProduct = (data: unknown, base?: Product): Product => {
  const fields = validateProduct(data);
  return { id: base?.id ?? null, ...fields };
};

// Helper function to convert a database row into a Product
export const fromRow = (row: ProductRow): Product => ({
  id: row.id,
  name: row.name,
  description: row.description,
  price: new Decimal(row.price),
  available: Boolean(row.available),
  category: row.category,
});

/**
 * Converts a Product into database columns, leaving the id to the store.
 *
 * @throws DataValidationError when the price does not fit the column exactly
 */
export const toRow = (product: Product): Omit<ProductRow, 'id'> => {
  const problem = priceLimitProblem(product.price);
  if (problem) {
    throw new DataValidationError(`Invalid data: price ${problem}`);
  }
  return {
    name: product.name,
    description: product.description,
    price: product.price.toFixed(),
    available: product.available,
    category: product.category,
  };
};
