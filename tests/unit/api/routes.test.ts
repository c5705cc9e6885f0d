import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Server } from 'node:http';
import { z } from 'zod';
import { createApp } from '../../../src/app.js';
import { loadEnv } from '../../../src/infra/env.js';
import type { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import { openTestDatabase } from '../../helpers/database.js';

const settings = loadEnv({ NODE_ENV: 'test', SHOP_NAMES: 'Wonderjoy,Cosbla' });

describe('API routes', () => {
  let db: DatabaseAdapter;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    db = openTestDatabase();
    const app = createApp(db, settings);
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    db.close();
  });

  function send(method: string, path: string, body?: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it('should answer the health check', async () => {
    const res = await send('GET', '/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  it('should expose the configured shops', async () => {
    const res = await send('GET', '/api/config/shops');

    expect(await res.json()).toEqual({ shops: ['Wonderjoy', 'Cosbla'] });
  });

  it('should record, list and delete a transaction', async () => {
    const created = await send('POST', '/api/transactions', {
      date: '2026-01-10',
      shop: 'Cosbla',
      productName: 'Mug',
      quantity: 3,
      unitPrice: 1000,
      transactionType: 'borrow',
    });
    expect(created.status).toBe(201);
    const transaction: unknown = await created.json();
    expect(transaction).toMatchObject({
      total: 3000,
      period: '2026-01',
      signedAmount: -3000,
      amountDisplay: '-₩3,000',
    });

    const { id } = z.object({ id: z.string() }).parse(transaction);

    const listed = await send('GET', '/api/transactions?period=2026-01&type=borrow');
    expect(await listed.json()).toMatchObject({ transactions: [{ id }] });

    const removed = await send('DELETE', `/api/transactions/${id}`);
    expect(removed.status).toBe(204);
    const removedAgain = await send('DELETE', `/api/transactions/${id}`);
    expect(removedAgain.status).toBe(204);
  });

  it('should return field-level validation errors', async () => {
    const res = await send('POST', '/api/transactions', {
      date: '2026-01-10',
      shop: 'Cosbla',
      productName: 'Mug',
      quantity: 0,
      unitPrice: 1000,
      transactionType: 'lend',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'VALIDATION_ERROR',
      message: 'Invalid transaction',
      details: { issues: [{ field: 'quantity', message: 'quantity must be at least 1' }] },
    });
  });

  it('should reject a malformed period filter', async () => {
    const res = await send('GET', '/api/transactions?period=January');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'VALIDATION_ERROR' });
  });

  it('should upsert products and import CSV text', async () => {
    const saved = await send('PUT', '/api/products', { productName: 'Widget', sku: 'SKU1', supplyPrice: 100 });
    expect(saved.status).toBe(200);

    const imported = await fetch(`${baseUrl}/api/products/import`, {
      method: 'POST',
      headers: { 'Content-Type': 'text/csv' },
      body: 'Product Name,SKU,Supply Price\nWidgetV2,SKU1,"1,500원"\n,M2,500\n',
    });
    expect(await imported.json()).toEqual({
      successCount: 1,
      errorCount: 1,
      skipped: { missingField: 1, invalidPrice: 0, nonPositivePrice: 0, upsertFailed: 0 },
    });

    const listed = await send('GET', '/api/products');
    expect(await listed.json()).toMatchObject({
      count: 1,
      products: [
        { productName: 'WidgetV2', sku: 'SKU1', supplyPrice: 1500, supplyPriceDisplay: '₩1,500' },
      ],
    });
  });

  it('should accept a multipart CSV upload', async () => {
    const form = new FormData();
    form.append('file', new Blob(['name,sku,price\nCup,C1,900\n'], { type: 'text/csv' }), 'products.csv');

    const res = await fetch(`${baseUrl}/api/products/import`, { method: 'POST', body: form });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ successCount: 1, errorCount: 0 });
  });

  it('should reject a CSV without the required columns', async () => {
    const res = await fetch(`${baseUrl}/api/products/import`, {
      method: 'POST',
      headers: { 'Content-Type': 'text/csv' },
      body: 'Foo,Bar\n1,2\n',
    });

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ error: 'IMPORT_HEADER_ERROR' });
  });

  it('should seed the unit price from the catalog', async () => {
    await send('PUT', '/api/products', { productName: 'Mug', sku: 'M1', supplyPrice: 800 });

    const res = await send('POST', '/api/transactions', {
      date: '2026-01-11',
      shop: 'Wonderjoy',
      productName: 'Mug',
      quantity: 2,
      transactionType: 'lend',
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({ unitPrice: 800, total: 1600 });
  });

  it('should clear the catalog', async () => {
    await send('PUT', '/api/products', { productName: 'Mug', sku: 'M1', supplyPrice: 800 });

    const res = await send('DELETE', '/api/products');

    expect(await res.json()).toEqual({ deleted: 1 });
  });

  it('should compute balances', async () => {
    await send('POST', '/api/transactions', {
      date: '2026-01-10', shop: 'Cosbla', productName: 'Mug', quantity: 3, unitPrice: 1000, transactionType: 'lend',
    });
    await send('POST', '/api/transactions', {
      date: '2026-01-12', shop: 'Wonderjoy', productName: 'Cup', quantity: 1, unitPrice: 500, transactionType: 'borrow',
    });

    const res = await send('GET', '/api/balances?period=2026-01');

    expect(await res.json()).toEqual({
      netBalance: 2500,
      status: 'receivable',
      perShop: [
        { shop: 'Cosbla', balance: 3000 },
        { shop: 'Wonderjoy', balance: -500 },
      ],
      lendTotal: 3000,
      borrowTotal: 500,
      transactionCount: 2,
    });
  });

  it('should answer 404 for unknown routes', async () => {
    const res = await send('GET', '/api/unknown');

    expect(res.status).toBe(404);
  });
});
