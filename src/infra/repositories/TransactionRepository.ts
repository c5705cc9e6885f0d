import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type {
  Transaction,
  TransactionFilter,
  TransactionType,
} from '../../domain/entities/Transaction.js';
import type { TransactionStore } from '../../domain/repositories.js';
import { logger } from '../logger.js';

type TransactionRow = {
  seq: number;
  id: string;
  date: string;
  shop: string;
  product_name: string;
  quantity: number;
  unit_price: number;
  total: number;
  transaction_type: TransactionType;
  period: string;
  created_at: string;
};

/**
 * Repository for ledger rows
 * Rows are only ever inserted or hard-deleted, never updated
 */
export class TransactionRepository implements TransactionStore {
  constructor(private db: DatabaseAdapter) {}

  insertTransaction(transaction: Transaction): void {
    const sql = `
      INSERT INTO transactions (
        id, date, shop, product_name, quantity, unit_price, total, transaction_type, period, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;

    this.db.execute(sql, [
      transaction.id,
      transaction.date,
      transaction.shop,
      transaction.productName,
      transaction.quantity,
      transaction.unitPrice,
      transaction.total,
      transaction.transactionType,
      transaction.period,
      transaction.createdAt,
    ]);

    logger.debug('Transaction inserted', { id: transaction.id, period: transaction.period });
  }

  deleteTransactionById(id: string): number {
    const removed = this.db.execute('DELETE FROM transactions WHERE id = ?', [id]);
    logger.debug('Transaction delete', { id, removed });
    return removed;
  }

  /**
   * Filters combine with AND; null or missing fields match everything
   */
  queryTransactions(filter: TransactionFilter, limit?: number): Transaction[] {
    const clauses: string[] = [];
    const params: unknown[] = [];

    if (filter.period) {
      clauses.push('period = ?');
      params.push(filter.period);
    }
    if (filter.shop) {
      clauses.push('shop = ?');
      params.push(filter.shop);
    }
    if (filter.type) {
      clauses.push('transaction_type = ?');
      params.push(filter.type);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    let sql = `SELECT * FROM transactions ${where} ORDER BY date DESC, seq DESC`;
    if (limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(limit);
    }

    const rows = this.db.query<TransactionRow>(sql, params);
    return rows.map((row) => this.mapRowToTransaction(row));
  }

  private mapRowToTransaction(row: TransactionRow): Transaction {
    return {
      id: row.id,
      date: row.date,
      shop: row.shop,
      productName: row.product_name,
      quantity: row.quantity,
      unitPrice: row.unit_price,
      total: row.total,
      transactionType: row.transaction_type,
      period: row.period,
      createdAt: row.created_at,
    };
  }
}
