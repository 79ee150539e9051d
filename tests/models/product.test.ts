import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { buildProduct, deserializeProduct, serializeProduct } from '../../src/models/product';
import { categoryCode, categoryFromCode, parseCategory, CATEGORIES } from '../../src/types';
import { DataValidationError } from '../../src/utils/errors';
import { productFactory } from '../factories';

const validPayload = () => ({
  name: 'Fedora',
  description: 'A red hat',
  price: '12.50',
  available: true,
  category: 'CLOTHS',
});

describe('Category', () => {
  it('assigns the fixed numeric codes', () => {
    expect(CATEGORIES.map(categoryCode)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(categoryFromCode(2)).toBe('FOOD');
    expect(categoryFromCode(6)).toBeUndefined();
  });

  it('parses names and codes from query strings', () => {
    expect(parseCategory('TOOLS')).toBe('TOOLS');
    expect(parseCategory(' 4 ')).toBe('AUTOMOTIVE');
    expect(parseCategory('tools')).toBeUndefined();
    expect(parseCategory('BOGUS')).toBeUndefined();
  });
});

describe('buildProduct', () => {
  it('fills in the store defaults', () => {
    const product = buildProduct({ name: 'Fedora', description: 'A red hat', price: new Decimal('12.50') });
    expect(product.id).toBeNull();
    expect(product.available).toBe(true);
    expect(product.category).toBe('UNKNOWN');
  });
});

describe('serializeProduct', () => {
  it('emits price as a decimal string and category by name', () => {
    const product = buildProduct({
      name: 'Fedora',
      description: 'A red hat',
      price: new Decimal('19.99'),
      available: false,
      category: 'FOOD',
    });
    expect(serializeProduct({ ...product, id: 7 })).toEqual({
      id: 7,
      name: 'Fedora',
      description: 'A red hat',
      price: '19.99',
      available: false,
      category: 'FOOD',
    });
  });

  it('never writes prices in exponent notation', () => {
    const product = productFactory({ price: new Decimal('0.0000001') });
    expect(serializeProduct(product).price).toBe('0.0000001');
  });
});

describe('deserializeProduct', () => {
  it('builds a product without touching the id', () => {
    const product = deserializeProduct({ ...validPayload(), id: 42 });
    expect(product.id).toBeNull();
    expect(product.name).toBe('Fedora');
    expect(product.price.equals(new Decimal('12.5'))).toBe(true);
    expect(product.available).toBe(true);
    expect(product.category).toBe('CLOTHS');
  });

  it('keeps the id of the base product', () => {
    const base = productFactory({ id: 5 });
    expect(deserializeProduct(validPayload(), base).id).toBe(5);
  });

  it('round-trips every field except the id', () => {
    const original = productFactory({ id: 3 });
    const copy = deserializeProduct(serializeProduct(original));
    expect(copy.id).toBeNull();
    expect(copy.name).toBe(original.name);
    expect(copy.description).toBe(original.description);
    expect(copy.price.equals(original.price)).toBe(true);
    expect(copy.available).toBe(original.available);
    expect(copy.category).toBe(original.category);
  });

  it('keeps decimal prices exact', () => {
    const product = deserializeProduct({ ...validPayload(), price: 19.99 });
    expect(product.price.toFixed()).toBe('19.99');
    expect(deserializeProduct({ ...validPayload(), price: '0.10' }).price.plus('0.20').toFixed()).toBe('0.3');
  });

  it('reports a missing name', () => {
    const { name: _name, ...payload } = validPayload();
    expect(() => deserializeProduct(payload)).toThrow(new DataValidationError('Missing field: name'));
  });

  it('reports a missing availability', () => {
    const { available: _available, ...payload } = validPayload();
    expect(() => deserializeProduct(payload)).toThrow('Missing field: available');
  });

  it('reports only the first problem', () => {
    expect(() => deserializeProduct({ name: 'Fedora' })).toThrow('Missing field: description');
  });

  it('rejects an unknown category', () => {
    expect(() => deserializeProduct({ ...validPayload(), category: 'BOGUS' })).toThrow(
      'Invalid attribute: BOGUS'
    );
  });

  it('rejects a malformed price', () => {
    expect(() => deserializeProduct({ ...validPayload(), price: 'twelve' })).toThrow(
      'Invalid data: price "twelve" is not a decimal number'
    );
  });

  it.each(['0x10', '0b101', '0o17'])('rejects the non-decimal price literal %s', (price) => {
    expect(() => deserializeProduct({ ...validPayload(), price })).toThrow(
      `Invalid data: price "${price}" is not a decimal number`
    );
  });

  it('rejects a price with more than 2 decimal places', () => {
    expect(() => deserializeProduct({ ...validPayload(), price: '19.999' })).toThrow(
      'Invalid data: price "19.999" has more than 2 decimal places'
    );
  });

  it('rejects a price with more than 12 integer digits', () => {
    expect(() => deserializeProduct({ ...validPayload(), price: 1e12 })).toThrow(
      'Invalid data: price "1000000000000" has more than 12 integer digits'
    );
  });

  it('accepts a price at the column limit', () => {
    expect(deserializeProduct({ ...validPayload(), price: '-999999999999.99' }).price.toFixed()).toBe(
      '-999999999999.99'
    );
  });

  it('rejects an availability that is not a boolean', () => {
    expect(() => deserializeProduct({ ...validPayload(), available: 'maybe' })).toThrow(
      'Invalid data: available "maybe" is not a boolean'
    );
  });

  it('coerces boolean words', () => {
    expect(deserializeProduct({ ...validPayload(), available: 'False' }).available).toBe(false);
    expect(deserializeProduct({ ...validPayload(), available: 1 }).available).toBe(true);
  });

  it('rejects a name longer than 100 characters', () => {
    expect(() => deserializeProduct({ ...validPayload(), name: 'x'.repeat(101) })).toThrow(
      'Invalid data: name must be at most 100 characters'
    );
  });

  it('rejects a payload that is not an object', () => {
    expect(() => deserializeProduct('not a product')).toThrow(DataValidationError);
  });
});
