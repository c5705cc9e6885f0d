import type { Transaction, TransactionFilter } from './entities/Transaction.js';
import type { Product, ProductInput } from './entities/Product.js';

/**
 * Storage ports consumed by the services.
 * Infra repositories implement them against SQLite; services never import infra directly.
 */
export interface TransactionStore {
  insertTransaction(transaction: Transaction): void;
  /** Returns the number of rows removed (0 when the id is unknown) */
  deleteTransactionById(id: string): number;
  /** Ordered by date descending, then insertion order descending */
  queryTransactions(filter: TransactionFilter, limit?: number): Transaction[];
}

export interface ProductStore {
  /** Single atomic insert-or-replace keyed on sku */
  upsertProduct(product: ProductInput, now: Date): Product;
  listProducts(): Product[];
  findProductByName(productName: string): Product | null;
  clearProducts(): number;
}
