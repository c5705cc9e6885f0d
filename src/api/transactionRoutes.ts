import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { Transaction } from '../domain/entities/Transaction.js';
import { formatAmount, signedAmount } from '../domain/balances.js';
import type { TransactionLedger } from '../services/TransactionLedger.js';
import { readLimit, readTransactionFilter } from './queryParams.js';

function mapTransactionToResponse(transaction: Transaction, currencySymbol: string) {
  const signed = signedAmount(transaction);
  return {
    ...transaction,
    signedAmount: signed,
    amountDisplay: formatAmount(signed, currencySymbol),
  };
}

/**
 * Ledger route handler
 * HTTP layer delegates to TransactionLedger
 */
export function createTransactionRouter(deps: {
  ledger: TransactionLedger;
  currencySymbol: string;
}): Router {
  const { ledger, currencySymbol } = deps;
  const router = Router();

  /**
   * GET /api/transactions?period=&shop=&type=&limit=
   */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const transactions = ledger.query(readTransactionFilter(req), readLimit(req));
      res.json({
        transactions: transactions.map((t) => mapTransactionToResponse(t, currencySymbol)),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/transactions/recent?period= - newest entries for dashboard views
   */
  router.get('/recent', (req: Request, res: Response, next: NextFunction) => {
    try {
      const limit = readLimit(req);
      const filter = readTransactionFilter(req);
      const transactions = limit === undefined ? ledger.recent(filter) : ledger.recent(filter, limit);
      res.json({
        transactions: transactions.map((t) => mapTransactionToResponse(t, currencySymbol)),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/transactions - unitPrice may be omitted to use the catalog supply price
   */
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const transaction = ledger.record(req.body);
      res.status(201).json(mapTransactionToResponse(transaction, currencySymbol));
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/transactions/:id - idempotent
   */
  router.delete('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      ledger.delete(req.params.id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
