import { z } from 'zod';
import { parseOrThrow } from '../validation.js';

/**
 * Transaction entity - one movement of stock between this shop and a counterparty
 * Never mutated after creation; removed by hard delete only
 */
export const TRANSACTION_TYPES = ['lend', 'borrow'] as const;
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export interface Transaction {
  id: string;
  date: string; // YYYY-MM-DD, calendar date without time of day
  shop: string;
  productName: string;
  quantity: number;
  unitPrice: number; // whole currency units
  total: number; // always quantity * unitPrice
  transactionType: TransactionType;
  period: string; // YYYY-MM, first seven characters of date
  createdAt: string; // ISO 8601 timestamp
}

export interface TransactionFilter {
  period?: string | null;
  shop?: string | null;
  type?: TransactionType | null;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
export const PERIOD_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

export function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const [, year, month, day] = match.map(Number);
  // setUTCFullYear keeps years 0-99 as written
  const parsed = new Date(0);
  parsed.setUTCFullYear(year, month - 1, day);
  return (
    parsed.getUTCFullYear() === year &&
    parsed.getUTCMonth() === month - 1 &&
    parsed.getUTCDate() === day
  );
}

/**
 * Field rules only; transactionInputSchema adds the cross-field total check
 */
export const transactionFieldsSchema = z.object({
  date: z
    .string({ required_error: 'date is required' })
    .refine(isCalendarDate, { message: 'date must be a calendar date in YYYY-MM-DD format' }),
  shop: z.string({ required_error: 'shop is required' }).trim().min(1, 'shop must not be empty'),
  productName: z
    .string({ required_error: 'productName is required' })
    .trim()
    .min(1, 'productName must not be empty'),
  quantity: z
    .number({ required_error: 'quantity is required' })
    .int('quantity must be an integer')
    .min(1, 'quantity must be at least 1')
    .max(Number.MAX_SAFE_INTEGER, 'quantity is too large'),
  unitPrice: z
    .number({ required_error: 'unitPrice is required' })
    .int('unitPrice must be an integer')
    .min(0, 'unitPrice must not be negative')
    .max(Number.MAX_SAFE_INTEGER, 'unitPrice is too large'),
  transactionType: z.enum(TRANSACTION_TYPES, {
    errorMap: () => ({ message: "transactionType must be 'lend' or 'borrow'" }),
  }),
});

export const transactionInputSchema = transactionFieldsSchema.superRefine((input, ctx) => {
  if (!Number.isSafeInteger(input.quantity * input.unitPrice)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['unitPrice'],
      message: 'quantity * unitPrice exceeds the largest safe integer',
    });
  }
});

export type TransactionInput = z.infer<typeof transactionInputSchema>;

export const transactionFilterSchema = z.object({
  period: z
    .string()
    .regex(PERIOD_PATTERN, 'period must be in YYYY-MM format')
    .nullish(),
  shop: z.string().trim().min(1).nullish(),
  type: z.enum(TRANSACTION_TYPES).nullish(),
});

export function periodOf(date: string): string {
  return date.slice(0, 7);
}

/**
 * YYYY-MM of the given instant in the process's local time zone
 */
export function currentPeriod(now: Date): string {
  const year = String(now.getFullYear()).padStart(4, '0');
  const month = String(now.getMonth() + 1).padStart(2, '0');
  return `${year}-${month}`;
}

/**
 * Factory function - validates input and derives total and period
 * Throws ValidationError listing every invalid field
 */
export function createTransaction(params: { id: string; input: unknown; createdAt?: Date }): Transaction {
  const input = parseOrThrow(transactionInputSchema, params.input, 'Invalid transaction');

  return {
    id: params.id,
    date: input.date,
    shop: input.shop,
    productName: input.productName,
    quantity: input.quantity,
    unitPrice: input.unitPrice,
    total: input.quantity * input.unitPrice,
    transactionType: input.transactionType,
    period: periodOf(input.date),
    createdAt: (params.createdAt ?? new Date()).toISOString(),
  };
}
