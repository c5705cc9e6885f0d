import { validateProductInput, type Product } from '../domain/entities/Product.js';
import { ValidationError, type FieldIssue } from '../domain/errors.js';
import type { ProductStore } from '../domain/repositories.js';
import { logger } from '../infra/logger.js';

/**
 * Product catalog keyed by SKU
 */
export class ProductCatalog {
  constructor(
    private products: ProductStore,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Insert-or-replace by sku; an existing sku gets its name and supply price overwritten
   */
  upsert(input: unknown): Product {
    const product = validateProductInput(input);
    return this.products.upsertProduct(product, this.clock());
  }

  /**
   * Entry from the manual product form, which also requires a name and a positive price
   */
  upsertManual(input: unknown): Product {
    const product = validateProductInput(input);
    const issues: FieldIssue[] = [];
    if (product.productName.length === 0) {
      issues.push({ field: 'productName', message: 'productName must not be empty' });
    }
    if (product.supplyPrice <= 0) {
      issues.push({ field: 'supplyPrice', message: 'supplyPrice must be greater than 0' });
    }
    if (issues.length > 0) {
      throw new ValidationError('Invalid product', issues);
    }

    const saved = this.products.upsertProduct(product, this.clock());
    logger.info('Product saved', { sku: saved.sku });
    return saved;
  }

  list(): Product[] {
    return this.products.listProducts();
  }

  findByName(productName: string): Product | null {
    return this.products.findProductByName(productName.trim());
  }

  /**
   * Unconditional; callers own any confirmation step
   */
  clear(): number {
    return this.products.clearProducts();
  }
}
