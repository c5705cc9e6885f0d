import { Router } from 'express';
import { TRANSACTION_TYPES } from '../domain/entities/Transaction.js';

/**
 * Static settings the entry forms need
 */
export function createConfigRouter(deps: {
  shopNames: readonly string[];
  currencySymbol: string;
  recentLimit: number;
}): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      shops: deps.shopNames,
      transactionTypes: TRANSACTION_TYPES,
      currencySymbol: deps.currencySymbol,
      recentLimit: deps.recentLimit,
    });
  });

  router.get('/shops', (_req, res) => {
    res.json({ shops: deps.shopNames });
  });

  return router;
}
