import { z } from 'zod';
import { parseOrThrow } from '../validation.js';

/**
 * Product entity - catalog row keyed by SKU
 * supplyPrice seeds the unit price of new ledger entries
 */
export interface Product {
  productName: string;
  sku: string;
  supplyPrice: number;
  createdAt: string;
  updatedAt: string;
}

export const productInputSchema = z.object({
  productName: z.string({ required_error: 'productName is required' }).trim(),
  sku: z.string({ required_error: 'sku is required' }).trim().min(1, 'sku must not be empty'),
  supplyPrice: z
    .number({ required_error: 'supplyPrice is required' })
    .int('supplyPrice must be an integer')
    .min(0, 'supplyPrice must not be negative')
    .max(Number.MAX_SAFE_INTEGER, 'supplyPrice is too large'),
});

export type ProductInput = z.infer<typeof productInputSchema>;

export function validateProductInput(input: unknown): ProductInput {
  return parseOrThrow(productInputSchema, input, 'Invalid product');
}
