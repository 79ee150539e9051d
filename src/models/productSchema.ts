import { z } from 'zod';
import { CATEGORIES } from '../types';
import { toBoolean, toDecimal } from '../utils/coerce';
import { DataValidationError } from '../utils/errors';
import { priceLimitProblem } from './price';

export const productSchema = z.object({
  name: z.string().max(100, { message: 'must be at most 100 characters' }),
  description: z.string().max(250, { message: 'must be at most 250 characters' }),
  price: z.union([z.string(), z.number()]).transform((value, ctx) => {
    const price = toDecimal(value);
    if (!price) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a decimal number` });
      return z.NEVER;
    }
    const problem = priceLimitProblem(price);
    if (problem) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
      return z.NEVER;
    }
    return price;
  }),
  available: z.unknown().transform((value, ctx) => {
    const available = toBoolean(value);
    if (available === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${JSON.stringify(value)} is not a boolean` });
      return z.NEVER;
    }
    return available;
  }),
  category: z.enum(CATEGORIES),
});

export type ProductInput = z.infer<typeof productSchema>;

const isMissing = (data: unknown, field: string | number | undefined): boolean =>
  typeof data === 'object' && data !== null && field !== undefined && !(field in data);

const describeIssue = (issue: z.ZodIssue, data: unknown): string => {
  const field = issue.path.join('.');
  if (isMissing(data, issue.path[0])) {
    return `Missing field: ${field}`;
  }
  if (issue.code === z.ZodIssueCode.invalid_enum_value) {
    return `Invalid attribute: ${String(issue.received)}`;
  }
  return field ? `Invalid data: ${field} ${issue.message}` : `Invalid data: ${issue.message}`;
};

/**
 * Validates a decoded request body. Only the first problem is reported,
 * in the order the fields are declared above.
 */
export const validateProduct = (data: unknown): ProductInput => {
  const result = productSchema.safeParse(data);
  if (!result.success) {
    throw new DataValidationError(describeIssue(result.error.issues[0], data));
  }
  return result.data;
};
