import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { BalanceService } from '../services/BalanceService.js';
import { currentPeriod } from '../domain/entities/Transaction.js';
import { readPeriod, readTransactionFilter } from './queryParams.js';

export function createBalanceRouter(deps: {
  balanceService: BalanceService;
  clock?: () => Date;
}): Router {
  const { balanceService } = deps;
  const clock = deps.clock ?? (() => new Date());
  const router = Router();

  /**
   * GET /api/balances?period=&shop=&type= - net balance, per-shop ranking and gross totals
   */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(balanceService.computeBalances(readTransactionFilter(req)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/balances/statistics?period= - defaults to the current month
   */
  router.get('/statistics', (req: Request, res: Response, next: NextFunction) => {
    try {
      const period = readPeriod(req) ?? currentPeriod(clock());
      res.json(balanceService.statistics(period));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
