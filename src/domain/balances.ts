import type { Transaction } from './entities/Transaction.js';

/**
 * Balance derivations over ledger rows.
 * All functions are pure: they read only their arguments and can be re-run on the raw ledger at any time.
 * Sign convention: lending out is a receivable (+), borrowing is a payable (-).
 */

type BalanceSource = Pick<Transaction, 'shop' | 'total' | 'transactionType'>;

export type BalanceStatus = 'receivable' | 'payable' | 'settled';

export interface ShopBalance {
  shop: string;
  balance: number;
}

export interface TypeTotals {
  lendTotal: number;
  borrowTotal: number;
}

export interface ShopStatistics extends TypeTotals {
  shop: string;
  netBalance: number;
  transactionCount: number;
}

export interface PeriodSummary extends TypeTotals {
  netBalance: number;
  lendCount: number;
  borrowCount: number;
  transactionCount: number;
  status: BalanceStatus;
}

export function signedAmount(transaction: BalanceSource): number {
  return transaction.transactionType === 'lend' ? transaction.total : -transaction.total;
}

export function netBalance(transactions: readonly BalanceSource[]): number {
  return transactions.reduce((sum, transaction) => sum + signedAmount(transaction), 0);
}

export function perShopBalances(transactions: readonly BalanceSource[]): Record<string, number> {
  const balances: Record<string, number> = {};
  for (const transaction of transactions) {
    balances[transaction.shop] = (balances[transaction.shop] ?? 0) + signedAmount(transaction);
  }
  return balances;
}

/**
 * Gross volume per type (unsigned), distinct from the net balance
 */
export function typeTotals(transactions: readonly BalanceSource[]): TypeTotals {
  let lendTotal = 0;
  let borrowTotal = 0;
  for (const transaction of transactions) {
    if (transaction.transactionType === 'lend') {
      lendTotal += transaction.total;
    } else {
      borrowTotal += transaction.total;
    }
  }
  return { lendTotal, borrowTotal };
}

function compareShopNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Largest exposure first, whether receivable or payable; ties by shop name
 */
export function rankedShopBalances(transactions: readonly BalanceSource[]): ShopBalance[] {
  return Object.entries(perShopBalances(transactions))
    .map(([shop, balance]) => ({ shop, balance }))
    .sort(
      (a, b) => Math.abs(b.balance) - Math.abs(a.balance) || compareShopNames(a.shop, b.shop)
    );
}

export function balanceStatus(amount: number): BalanceStatus {
  if (amount > 0) return 'receivable';
  if (amount < 0) return 'payable';
  return 'settled';
}

export function shopStatistics(transactions: readonly BalanceSource[]): ShopStatistics[] {
  const byShop = new Map<string, ShopStatistics>();

  for (const transaction of transactions) {
    let stats = byShop.get(transaction.shop);
    if (!stats) {
      stats = { shop: transaction.shop, lendTotal: 0, borrowTotal: 0, netBalance: 0, transactionCount: 0 };
      byShop.set(transaction.shop, stats);
    }

    if (transaction.transactionType === 'lend') {
      stats.lendTotal += transaction.total;
    } else {
      stats.borrowTotal += transaction.total;
    }
    stats.netBalance += signedAmount(transaction);
    stats.transactionCount += 1;
  }

  return [...byShop.values()].sort((a, b) => compareShopNames(a.shop, b.shop));
}

export function periodSummary(transactions: readonly BalanceSource[]): PeriodSummary {
  const totals = typeTotals(transactions);
  const lendCount = transactions.filter((t) => t.transactionType === 'lend').length;
  const net = totals.lendTotal - totals.borrowTotal;

  return {
    ...totals,
    netBalance: net,
    lendCount,
    borrowCount: transactions.length - lendCount,
    transactionCount: transactions.length,
    status: balanceStatus(net),
  };
}

const amountFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/**
 * Display form used by list views: symbol plus thousands separators, e.g. -₩3,000
 */
export function formatAmount(amount: number, currencySymbol = '₩'): string {
  const sign = amount < 0 ? '-' : '';
  return `${sign}${currencySymbol}${amountFormat.format(Math.abs(amount))}`;
}
