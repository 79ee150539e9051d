import type { Knex } from 'knex';
import type Decimal from 'decimal.js';
import { type Category, DEFAULT_CATEGORY, type Product, type ProductRow } from '../types';
import { fromRow, toRow } from '../models/product';
import { fitsPriceColumn } from '../models/price';
import { toDecimal, unquote } from '../utils/coerce';
import { DataValidationError } from '../utils/errors';
import logger from '../utils/logger';

const TABLE = 'products';
const CONTEXT = 'ProductService';

/**
 * Reads and writes Product records through the knex connection it is given.
 * Every method is a single statement against the store; nothing is cached.
 */
export class ProductService {
  constructor(private readonly db: Knex) {}

  private get products() {
    return this.db<ProductRow>(TABLE);
  }

  // Inserts the product as a new record. Any id it carries is ignored.
  async create(product: Product): Promise<Product> {
    logger.info(CONTEXT, `Creating ${product.name}`);
    const [row] = await this.products.insert(toRow(product)).returning('*');
    return fromRow(row);
  }

  // Returns undefined when no record has the product's id.
  async update(product: Product): Promise<Product | undefined> {
    logger.info(CONTEXT, `Saving ${product.name}`);
    if (!product.id) {
      throw new DataValidationError('Update called with empty ID field');
    }
    const [row] = await this.products.where({ id: product.id }).update(toRow(product)).returning('*');
    return row ? fromRow(row) : undefined;
  }

  // Resolves to the number of removed records; 0 when it was already gone.
  async delete(product: Product): Promise<number> {
    logger.info(CONTEXT, `Deleting ${product.name}`);
    if (!product.id) return 0;
    const deleted = await this.products.where({ id: product.id }).del();
    return deleted;
  }

  async all(): Promise<Product[]> {
    logger.info(CONTEXT, 'Processing all Products');
    const rows = await this.products.select('*');
    return rows.map(fromRow);
  }

  async find(id: number): Promise<Product | undefined> {
    logger.info(CONTEXT, `Processing lookup for id ${id} ...`);
    const row = await this.products.where({ id }).first();
    return row ? fromRow(row) : undefined;
  }

  async findByName(name: string): Promise<Product[]> {
    logger.info(CONTEXT, `Processing name query for ${name} ...`);
    const rows = await this.products.where({ name });
    return rows.map(fromRow);
  }

  // Accepts a Decimal or its string form, optionally wrapped in quotes and whitespace.
  // A price the column cannot hold exactly matches nothing.
  async findByPrice(price: Decimal | string): Promise<Product[]> {
    logger.info(CONTEXT, `Processing price query for ${price.toString()} ...`);
    const value = typeof price === 'string' ? toDecimal(unquote(price)) : price;
    if (!value) {
      throw new DataValidationError(`Invalid data: price "${price.toString()}" is not a decimal number`);
    }
    if (!fitsPriceColumn(value)) return [];
    const rows = await this.products.where('price', value.toFixed());
    return rows.map(fromRow);
  }

  async findByAvailability(available = true): Promise<Product[]> {
    logger.info(CONTEXT, `Processing available query for ${available} ...`);
    const rows = await this.products.where({ available });
    return rows.map(fromRow);
  }

  async findByCategory(category: Category = DEFAULT_CATEGORY): Promise<Product[]> {
    logger.info(CONTEXT, `Processing category query for ${category} ...`);
    const rows = await this.products.where({ category });
    return rows.map(fromRow);
  }
}

export default ProductService;
