import Decimal from 'decimal.js';

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

// Returns undefined when the value has no boolean reading.
export const toBoolean = (value: unknown): boolean | undefined => {
  if (typeof value === 'boolean') return value;
  if (value === 1 || value === 0) return value === 1;
  if (typeof value === 'string') {
    const word = value.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
  }
  return undefined;
};

// Parses numbers and plain base-10 numeric strings into an exact decimal.
// NaN, infinities and hex, octal or binary literals are rejected.
export const toDecimal = (value: unknown): Decimal | undefined => {
  if (typeof value !== 'number' && typeof value !== 'string') return undefined;
  const text = typeof value === 'string' ? value.trim() : value;
  if (typeof text === 'string' && !DECIMAL_PATTERN.test(text)) return undefined;
  try {
    const decimal = new Decimal(text);
    return decimal.isFinite() ? decimal : undefined;
  } catch (error) {
    if (error instanceof Error && error.message.startsWith('[DecimalError]')) return undefined;
    throw error;
  }
};

// Strips surrounding whitespace and double quotes, as in `"19.99"` passed through a query string.
export const unquote = (value: string): string => value.replace(/^[\s"]+|[\s"]+$/g, '');
