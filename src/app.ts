import express from 'express';
import cors from 'cors';
import type { Request, Response, NextFunction } from 'express';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { TransactionRepository } from './infra/repositories/TransactionRepository.js';
import { ProductRepository } from './infra/repositories/ProductRepository.js';
import { TransactionLedger } from './services/TransactionLedger.js';
import { ProductCatalog } from './services/ProductCatalog.js';
import { CsvProductImporter } from './services/CsvProductImporter.js';
import { BalanceService } from './services/BalanceService.js';
import { createApiRouter, type ApiDeps } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { logger } from './infra/logger.js';
import type { Env } from './infra/env.js';

export type AppSettings = Pick<
  Env,
  'NODE_ENV' | 'SHOP_NAMES' | 'CURRENCY_SYMBOL' | 'RECENT_TRANSACTIONS_LIMIT' | 'MAX_UPLOAD_BYTES'
>;

/**
 * Wire repositories and services around one open database handle
 */
export function createServices(db: DatabaseAdapter, settings: Pick<Env, 'RECENT_TRANSACTIONS_LIMIT'>): ApiDeps {
  const transactionRepo = new TransactionRepository(db);
  const productRepo = new ProductRepository(db);

  const catalog = new ProductCatalog(productRepo);
  const ledger = new TransactionLedger(transactionRepo, productRepo, {
    recentLimit: settings.RECENT_TRANSACTIONS_LIMIT,
  });

  return {
    ledger,
    catalog,
    importer: new CsvProductImporter(catalog),
    balanceService: new BalanceService(ledger),
  };
}

export function createApp(db: DatabaseAdapter, settings: AppSettings): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    if (!db.isOpen()) {
      res.status(503).json({ status: 'unavailable' });
      return;
    }
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api', createApiRouter(createServices(db, settings), settings));

  app.use(notFoundHandler);
  app.use(createErrorHandler(settings));

  return app;
}
