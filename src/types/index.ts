import type Decimal from 'decimal.js';

export const CATEGORIES = ['UNKNOWN', 'CLOTHS', 'FOOD', 'HOUSEWARES', 'AUTOMOTIVE', 'TOOLS'] as const;

export type Category = (typeof CATEGORIES)[number];

export const DEFAULT_CATEGORY: Category = 'UNKNOWN';

export const isCategory = (value: unknown): value is Category =>
  CATEGORIES.some((category) => category === value);

// Numeric code of each category, fixed for the life of the catalog.
export const categoryCode = (category: Category): number => {
  switch (category) {
    case 'UNKNOWN':
      return 0;
    case 'CLOTHS':
      return 1;
    case 'FOOD':
      return 2;
    case 'HOUSEWARES':
      return 3;
    case 'AUTOMOTIVE':
      return 4;
    case 'TOOLS':
      return 5;
    default: {
      const unreachable: never = category;
      throw new Error(`Unhandled category: ${String(unreachable)}`);
    }
  }
};

export const categoryFromCode = (code: number): Category | undefined =>
  CATEGORIES.find((category) => categoryCode(category) === code);

export interface Product {
  id: number | null;          // null until the store assigns one
  name: string;
  description: string;
  price: Decimal;
  available: boolean;
  category: Category;
}

export type NewProduct = Omit<Product, 'id'>;

// Wire representation exchanged with HTTP clients
export interface ProductPayload {
  id: number | null;
  name: string;
  description: string;
  price: string;
  available: boolean;
  category: Category;
}

// Database format
export interface ProductRow {
  id: number;
  name: string;
  description: string;
  price: string | number;     // pg returns numeric as string, sqlite as number
  available: boolean | number;
  category: Category;
}

// Accepts a category name or its numeric code, as sent in a query string.
export const parseCategory = (value: string): Category | undefined => {
  const text = value.trim();
  if (isCategory(text)) return text;
  return /^\d+$/.test(text) ? categoryFromCode(Number(text)) : undefined;
};
