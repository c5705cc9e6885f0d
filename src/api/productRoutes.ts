import express, { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import type { Product } from '../domain/entities/Product.js';
import { ImportHeaderError, ValidationError } from '../domain/errors.js';
import { formatAmount } from '../domain/balances.js';
import type { ProductCatalog } from '../services/ProductCatalog.js';
import type { CsvProductImporter } from '../services/CsvProductImporter.js';

function mapProductToResponse(product: Product, currencySymbol: string) {
  return {
    productName: product.productName,
    sku: product.sku,
    supplyPrice: product.supplyPrice,
    supplyPriceDisplay: formatAmount(product.supplyPrice, currencySymbol),
    createdAt: product.createdAt,
    updatedAt: product.updatedAt,
  };
}

/**
 * Catalog route handler
 */
export function createProductRouter(deps: {
  catalog: ProductCatalog;
  importer: CsvProductImporter;
  currencySymbol: string;
  maxUploadBytes: number;
}): Router {
  const { catalog, importer, currencySymbol, maxUploadBytes } = deps;
  const router = Router();

  // CSV arrives either as a multipart "file" field or as a raw text/csv body
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: maxUploadBytes } });
  const csvText = express.text({ type: ['text/csv', 'text/plain'], limit: maxUploadBytes });

  /**
   * GET /api/products - sorted by product name
   */
  router.get('/', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const products = catalog.list();
      res.json({
        products: products.map((p) => mapProductToResponse(p, currencySymbol)),
        count: products.length,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/products/lookup?name= - supply price used to prefill a new ledger entry
   */
  router.get('/lookup', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name } = req.query;
      if (typeof name !== 'string' || name.trim().length === 0) {
        throw new ValidationError('name query parameter is required', [
          { field: 'name', message: 'name must not be empty' },
        ]);
      }

      const product = catalog.findByName(name);
      if (!product) {
        res.status(404).json({ error: 'NOT_FOUND', message: `No product named ${name.trim()}` });
        return;
      }
      res.json(mapProductToResponse(product, currencySymbol));
    } catch (error) {
      next(error);
    }
  });

  /**
   * PUT /api/products - manual insert-or-replace by sku
   */
  router.put('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const product = catalog.upsertManual(req.body);
      res.json(mapProductToResponse(product, currencySymbol));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/products/import - CSV with product name, SKU and supply price columns
   */
  router.post('/import', upload.single('file'), csvText, (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: unknown = req.body;
      const raw = req.file?.buffer ?? (typeof body === 'string' && body.length > 0 ? body : undefined);
      if (raw === undefined) {
        throw new ValidationError('No CSV uploaded', [
          { field: 'file', message: 'send a multipart "file" field or a text/csv body' },
        ]);
      }

      const result = importer.importProducts(raw);
      if (!result.ok) {
        throw new ImportHeaderError(result.error);
      }

      res.json({
        successCount: result.successCount,
        errorCount: result.errorCount,
        skipped: result.skipped,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/products - clears the whole catalog; the client asks for confirmation first
   */
  router.delete('/', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const deleted = catalog.clear();
      res.json({ deleted });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
