import Decimal from 'decimal.js';

// Limits of the products.price column, decimal(14, 2) in the create_products_table migration.
export const PRICE_PRECISION = 14;
export const PRICE_SCALE = 2;

const PRICE_BOUND = new Decimal(10).pow(PRICE_PRECISION - PRICE_SCALE);

// Returns why the store cannot hold the price exactly, or undefined when it can.
export const priceLimitProblem = (price: Decimal): string | undefined => {
  if (price.decimalPlaces() > PRICE_SCALE) {
    return `"${price.toFixed()}" has more than ${PRICE_SCALE} decimal places`;
  }
  if (price.abs().gte(PRICE_BOUND)) {
    return `"${price.toFixed()}" has more than ${PRICE_PRECISION - PRICE_SCALE} integer digits`;
  }
  return undefined;
};

export const fitsPriceColumn = (price: Decimal): boolean => priceLimitProblem(price) === undefined;
