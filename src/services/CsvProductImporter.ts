import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ImportHeaderError } from '../domain/errors.js';
import type { ProductInput } from '../domain/entities/Product.js';
import type { ProductCatalog } from './ProductCatalog.js';
import { logger } from '../infra/logger.js';

export type ProductColumn = 'productName' | 'sku' | 'supplyPrice';

/**
 * Header tokens per target column, matched case-insensitively as substrings.
 * Order matters: a header is classified by the first target whose tokens it contains.
 */
export const COLUMN_TOKENS: ReadonlyArray<readonly [ProductColumn, readonly string[]]> = [
  ['productName', ['상품명', 'product', 'name']],
  ['sku', ['sku', 'code', '코드']],
  ['supplyPrice', ['공급가', '가격', 'price', 'supply']],
];

export interface ColumnRef {
  index: number;
  header: string;
}

export type ColumnMapping = Record<ProductColumn, ColumnRef>;

/**
 * Loosely typed row as read from the file, before catalog validation
 */
export interface CsvProductRow {
  rowNumber: number;
  productName?: string;
  sku?: string;
  priceText?: string;
}

export type SkipReason = 'missingField' | 'invalidPrice' | 'nonPositivePrice' | 'upsertFailed';

export type RowOutcome =
  | { ok: true; product: ProductInput }
  | { ok: false; reason: Exclude<SkipReason, 'upsertFailed'> };

export interface CsvImportSummary {
  ok: true;
  successCount: number;
  errorCount: number;
  skipped: Record<SkipReason, number>;
}

export interface CsvImportFailure {
  ok: false;
  error: string;
}

export type CsvImportResult = CsvImportSummary | CsvImportFailure;

const recordsSchema = z.array(z.array(z.string()));
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Resolve the name, sku and price columns from a header row.
 * Headers are scanned once left to right; the first header classified to a target wins it.
 * Throws ImportHeaderError naming every column that could not be found.
 */
export function detectColumns(headers: readonly string[]): ColumnMapping {
  const found: Partial<ColumnMapping> = {};

  headers.forEach((header, index) => {
    const lower = header.toLowerCase();
    const match = COLUMN_TOKENS.find(([, tokens]) => tokens.some((token) => lower.includes(token)));
    if (match && !found[match[0]]) {
      found[match[0]] = { index, header };
    }
  });

  const { productName, sku, supplyPrice } = found;
  if (!productName || !sku || !supplyPrice) {
    const missing = COLUMN_TOKENS.map(([column]) => column).filter((column) => !found[column]);
    throw new ImportHeaderError(
      `Required columns not found (product name, SKU, supply price): missing ${missing.join(', ')}`,
      { headers, missing }
    );
  }

  return { productName, sku, supplyPrice };
}

/**
 * Strip thousands separators and the currency unit, then truncate to an integer.
 * Returns null when the remaining text is not a number or truncates past a safe integer.
 */
export function parseSupplyPrice(text: string): number | null {
  const cleaned = text.replace(/,/g, '').replace(/원/g, '').replace(/₩/g, '').trim();
  if (!NUMBER_PATTERN.test(cleaned)) {
    return null;
  }
  const value = Math.trunc(Number(cleaned));
  return Number.isSafeInteger(value) ? value : null;
}

export function readRow(cells: readonly string[], columns: ColumnMapping, rowNumber: number): CsvProductRow {
  const cell = (ref: ColumnRef): string | undefined => {
    const value = cells[ref.index]?.trim();
    return value ? value : undefined;
  };

  return {
    rowNumber,
    productName: cell(columns.productName),
    sku: cell(columns.sku),
    priceText: cell(columns.supplyPrice),
  };
}

/**
 * Accept a row only with a name, a sku and a price above zero
 */
export function toProductInput(row: CsvProductRow): RowOutcome {
  if (!row.productName || !row.sku || !row.priceText) {
    return { ok: false, reason: 'missingField' };
  }

  const supplyPrice = parseSupplyPrice(row.priceText);
  if (supplyPrice === null) {
    return { ok: false, reason: 'invalidPrice' };
  }
  if (supplyPrice <= 0) {
    return { ok: false, reason: 'nonPositivePrice' };
  }

  return { ok: true, product: { productName: row.productName, sku: row.sku, supplyPrice } };
}

function readRecords(raw: string | Uint8Array): string[][] {
  const text = typeof raw === 'string' ? raw : Buffer.from(raw).toString('utf-8');

  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (parseError) {
    const message = parseError instanceof Error ? parseError.message : String(parseError);
    throw new ImportHeaderError(`CSV parsing error: ${message}`);
  }

  const parsed = recordsSchema.safeParse(records);
  if (!parsed.success) {
    throw new ImportHeaderError('CSV input could not be read as rows of text');
  }
  return parsed.data;
}

/**
 * Imports catalog rows from CSV with unknown column names.
 * Header problems fail the whole import; bad rows are counted and skipped.
 */
export class CsvProductImporter {
  constructor(private catalog: ProductCatalog) {}

  importProducts(raw: string | Uint8Array): CsvImportResult {
    let records: string[][];
    let columns: ColumnMapping;
    try {
      records = readRecords(raw);
      const [headers] = records;
      if (!headers) {
        throw new ImportHeaderError('CSV input has no header row');
      }
      columns = detectColumns(headers.map((header) => header.trim()));
    } catch (error) {
      if (error instanceof ImportHeaderError) {
        logger.warn('CSV import rejected', { message: error.message });
        return { ok: false, error: error.message };
      }
      throw error;
    }

    const skipped: Record<SkipReason, number> = {
      missingField: 0,
      invalidPrice: 0,
      nonPositivePrice: 0,
      upsertFailed: 0,
    };
    let successCount = 0;

    records.slice(1).forEach((cells, offset) => {
      // header is line 1
      const row = readRow(cells, columns, offset + 2);
      const outcome = toProductInput(row);
      if (!outcome.ok) {
        skipped[outcome.reason] += 1;
        logger.debug('CSV row skipped', { rowNumber: row.rowNumber, reason: outcome.reason });
        return;
      }

      try {
        this.catalog.upsert(outcome.product);
        successCount += 1;
      } catch (error) {
        skipped.upsertFailed += 1;
        logger.warn('CSV row upsert failed', {
          rowNumber: row.rowNumber,
          sku: outcome.product.sku,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });

    const errorCount =
      skipped.missingField + skipped.invalidPrice + skipped.nonPositivePrice + skipped.upsertFailed;

    logger.info('CSV import finished', { successCount, errorCount, columns });
    return { ok: true, successCount, errorCount, skipped };
  }
}
