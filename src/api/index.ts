import { Router } from 'express';
import { createTransactionRouter } from './transactionRoutes.js';
import { createProductRouter } from './productRoutes.js';
import { createBalanceRouter } from './balanceRoutes.js';
import { createConfigRouter } from './configRoutes.js';
import type { TransactionLedger } from '../services/TransactionLedger.js';
import type { ProductCatalog } from '../services/ProductCatalog.js';
import type { CsvProductImporter } from '../services/CsvProductImporter.js';
import type { BalanceService } from '../services/BalanceService.js';
import type { Env } from '../infra/env.js';

export interface ApiDeps {
  ledger: TransactionLedger;
  catalog: ProductCatalog;
  importer: CsvProductImporter;
  balanceService: BalanceService;
}

type ApiSettings = Pick<
  Env,
  'SHOP_NAMES' | 'CURRENCY_SYMBOL' | 'RECENT_TRANSACTIONS_LIMIT' | 'MAX_UPLOAD_BYTES'
>;

/**
 * Main API router - composes all route handlers
 * Dependencies injected from the composition root
 */
export function createApiRouter(deps: ApiDeps, settings: ApiSettings): Router {
  const router = Router();

  router.use(
    '/transactions',
    createTransactionRouter({ ledger: deps.ledger, currencySymbol: settings.CURRENCY_SYMBOL })
  );
  router.use(
    '/products',
    createProductRouter({
      catalog: deps.catalog,
      importer: deps.importer,
      currencySymbol: settings.CURRENCY_SYMBOL,
      maxUploadBytes: settings.MAX_UPLOAD_BYTES,
    })
  );
  router.use('/balances', createBalanceRouter({ balanceService: deps.balanceService }));
  router.use(
    '/config',
    createConfigRouter({
      shopNames: settings.SHOP_NAMES,
      currencySymbol: settings.CURRENCY_SYMBOL,
      recentLimit: settings.RECENT_TRANSACTIONS_LIMIT,
    })
  );

  return router;
}
