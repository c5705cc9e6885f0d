import type { TransactionFilter } from '../domain/entities/Transaction.js';
import {
  balanceStatus,
  netBalance,
  periodSummary,
  rankedShopBalances,
  shopStatistics,
  typeTotals,
  type BalanceStatus,
  type PeriodSummary,
  type ShopBalance,
  type ShopStatistics,
} from '../domain/balances.js';
import type { TransactionLedger } from './TransactionLedger.js';

export interface BalanceReport {
  netBalance: number;
  status: BalanceStatus;
  perShop: ShopBalance[];
  lendTotal: number;
  borrowTotal: number;
  transactionCount: number;
}

export interface StatisticsReport {
  period: string;
  summary: PeriodSummary;
  allTimeShops: ShopStatistics[];
}

/**
 * Derives balances from the raw ledger on every call; nothing is cached
 */
export class BalanceService {
  constructor(private ledger: TransactionLedger) {}

  computeBalances(filter: TransactionFilter = {}): BalanceReport {
    const transactions = this.ledger.query(filter);
    const net = netBalance(transactions);

    return {
      netBalance: net,
      status: balanceStatus(net),
      perShop: rankedShopBalances(transactions),
      ...typeTotals(transactions),
      transactionCount: transactions.length,
    };
  }

  /**
   * Monthly figures for one period, plus per-shop totals across all periods
   */
  statistics(period: string): StatisticsReport {
    return {
      period,
      summary: periodSummary(this.ledger.query({ period })),
      allTimeShops: shopStatistics(this.ledger.query()),
    };
  }
}
