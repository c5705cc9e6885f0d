import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { Product, ProductInput } from '../../domain/entities/Product.js';
import type { ProductStore } from '../../domain/repositories.js';
import { DatabaseError } from '../../domain/errors.js';
import { logger } from '../logger.js';

type ProductRow = {
  id: number;
  product_name: string;
  sku: string;
  supply_price: number;
  created_at: string;
  updated_at: string;
};

export class ProductRepository implements ProductStore {
  constructor(private db: DatabaseAdapter) {}

  /**
   * Insert-or-replace in one statement: no window where neither the old nor the new row exists
   */
  upsertProduct(product: ProductInput, now: Date): Product {
    const timestamp = now.toISOString();
    const row = this.db.queryOne<ProductRow>(
      `
      INSERT INTO products (product_name, sku, supply_price, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(sku) DO UPDATE SET
        product_name = excluded.product_name,
        supply_price = excluded.supply_price,
        updated_at = excluded.updated_at
      RETURNING *
      `,
      [product.productName, product.sku, product.supplyPrice, timestamp, timestamp]
    );

    if (!row) {
      throw new DatabaseError('Product upsert returned no row', { sku: product.sku });
    }

    logger.debug('Product upserted', { sku: row.sku });
    return this.mapRowToProduct(row);
  }

  listProducts(): Product[] {
    const rows = this.db.query<ProductRow>(
      'SELECT * FROM products ORDER BY product_name ASC, sku ASC'
    );
    return rows.map((row) => this.mapRowToProduct(row));
  }

  findProductByName(productName: string): Product | null {
    const row = this.db.queryOne<ProductRow>(
      'SELECT * FROM products WHERE product_name = ? ORDER BY sku ASC LIMIT 1',
      [productName]
    );
    return row ? this.mapRowToProduct(row) : null;
  }

  clearProducts(): number {
    const removed = this.db.execute('DELETE FROM products');
    logger.info('Product catalog cleared', { removed });
    return removed;
  }

  private mapRowToProduct(row: ProductRow): Product {
    return {
      productName: row.product_name,
      sku: row.sku,
      supplyPrice: row.supply_price,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
