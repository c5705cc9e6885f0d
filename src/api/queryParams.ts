import { z } from 'zod';
import type { Request } from 'express';
import { transactionFilterSchema, type TransactionFilter } from '../domain/entities/Transaction.js';
import { parseOrThrow } from '../domain/validation.js';

function firstString(value: unknown): string | undefined {
  const candidate = Array.isArray(value) ? value[0] : value;
  return typeof candidate === 'string' && candidate.length > 0 ? candidate : undefined;
}

/**
 * ?period=YYYY-MM&shop=...&type=lend|borrow
 */
export function readTransactionFilter(req: Request): TransactionFilter {
  return parseOrThrow(
    transactionFilterSchema,
    {
      period: firstString(req.query.period),
      shop: firstString(req.query.shop),
      type: firstString(req.query.type),
    },
    'Invalid transaction filter'
  );
}

const limitSchema = z.coerce.number().int().min(1, 'limit must be at least 1').max(1000);

export function readLimit(req: Request): number | undefined {
  const raw = firstString(req.query.limit);
  if (raw === undefined) return undefined;
  return parseOrThrow(z.object({ limit: limitSchema }), { limit: raw }, 'Invalid limit').limit;
}

export function readPeriod(req: Request): string | undefined {
  return firstString(req.query.period);
}
