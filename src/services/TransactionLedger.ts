import { randomUUID } from 'node:crypto';
import {
  createTransaction,
  transactionFilterSchema,
  transactionFieldsSchema,
  type Transaction,
  type TransactionFilter,
} from '../domain/entities/Transaction.js';
import { ValidationError } from '../domain/errors.js';
import { parseOrThrow } from '../domain/validation.js';
import type { ProductStore, TransactionStore } from '../domain/repositories.js';
import { logger } from '../infra/logger.js';

const recordInputSchema = transactionFieldsSchema.extend({
  unitPrice: transactionFieldsSchema.shape.unitPrice.nullish(),
});

/**
 * Ledger of lend/borrow movements
 * Entries are validated and derived (total, period) here; storage only persists them
 */
export class TransactionLedger {
  constructor(
    private transactions: TransactionStore,
    private products: ProductStore,
    private options: { recentLimit: number } = { recentLimit: 10 }
  ) {}

  /**
   * Validate and persist a fully specified entry
   * Throws ValidationError before anything is written
   */
  insert(input: unknown): Transaction {
    const transaction = createTransaction({ id: randomUUID(), input });
    this.transactions.insertTransaction(transaction);

    logger.info('Transaction recorded', {
      id: transaction.id,
      shop: transaction.shop,
      type: transaction.transactionType,
      total: transaction.total,
    });
    return transaction;
  }

  /**
   * Like insert, but a missing unitPrice is seeded from the catalog product of the same name
   */
  record(input: unknown): Transaction {
    const parsed = parseOrThrow(recordInputSchema, input, 'Invalid transaction');
    if (parsed.unitPrice !== null && parsed.unitPrice !== undefined) {
      return this.insert(parsed);
    }

    const product = this.products.findProductByName(parsed.productName);
    if (!product) {
      throw new ValidationError('Invalid transaction', [
        {
          field: 'unitPrice',
          message: `unitPrice is required when '${parsed.productName}' is not in the catalog`,
        },
      ]);
    }

    return this.insert({ ...parsed, unitPrice: product.supplyPrice });
  }

  /**
   * Hard delete; an unknown id is a no-op
   */
  delete(id: string): boolean {
    const removed = this.transactions.deleteTransactionById(id) > 0;
    if (removed) {
      logger.info('Transaction deleted', { id });
    }
    return removed;
  }

  /**
   * Most recent first: date descending, then insertion order descending
   */
  query(filter: TransactionFilter = {}, limit?: number): Transaction[] {
    const parsed = parseOrThrow(transactionFilterSchema, filter, 'Invalid transaction filter');
    return this.transactions.queryTransactions(parsed, limit);
  }

  recent(filter: TransactionFilter = {}, limit = this.options.recentLimit): Transaction[] {
    return this.query(filter, limit);
  }
}
