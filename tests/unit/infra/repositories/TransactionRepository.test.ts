import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { DatabaseAdapter } from '../../../../src/infra/DatabaseAdapter.js';
import { TransactionRepository } from '../../../../src/infra/repositories/TransactionRepository.js';
import { DatabaseError } from '../../../../src/domain/errors.js';
import { openTestDatabase } from '../../../helpers/database.js';
import { makeTransaction } from '../../../helpers/fixtures.js';

describe('TransactionRepository', () => {
  let db: DatabaseAdapter;
  let repo: TransactionRepository;

  beforeEach(() => {
    db = openTestDatabase();
    repo = new TransactionRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should round-trip every field', () => {
    const transaction = makeTransaction({
      id: 'tx-a',
      date: '2026-02-03',
      shop: 'Yeojin',
      productName: 'Scarf',
      quantity: 2,
      unitPrice: 4500,
      transactionType: 'borrow',
      createdAt: '2026-02-03T08:30:00.000Z',
    });

    repo.insertTransaction(transaction);

    expect(repo.queryTransactions({})).toEqual([transaction]);
  });

  it('should order by date descending, then most recently inserted first', () => {
    repo.insertTransaction(makeTransaction({ id: 'early', date: '2026-01-02', transactionType: 'lend' }));
    repo.insertTransaction(makeTransaction({ id: 'same-day-1', date: '2026-01-10', transactionType: 'lend' }));
    repo.insertTransaction(makeTransaction({ id: 'late', date: '2026-01-28', transactionType: 'borrow' }));
    repo.insertTransaction(makeTransaction({ id: 'same-day-2', date: '2026-01-10', transactionType: 'borrow' }));

    expect(repo.queryTransactions({}).map((t) => t.id)).toEqual([
      'late',
      'same-day-2',
      'same-day-1',
      'early',
    ]);
  });

  it('should combine filters with AND', () => {
    repo.insertTransaction(makeTransaction({ id: 'a', date: '2026-01-05', shop: 'Only', transactionType: 'lend' }));
    repo.insertTransaction(makeTransaction({ id: 'b', date: '2026-01-06', shop: 'Only', transactionType: 'borrow' }));
    repo.insertTransaction(makeTransaction({ id: 'c', date: '2026-02-01', shop: 'Only', transactionType: 'lend' }));
    repo.insertTransaction(makeTransaction({ id: 'd', date: '2026-01-07', shop: 'Soyeon', transactionType: 'lend' }));

    expect(repo.queryTransactions({ period: '2026-01', shop: 'Only', type: 'lend' }).map((t) => t.id)).toEqual(['a']);
    expect(repo.queryTransactions({ period: '2026-01' }).map((t) => t.id)).toEqual(['d', 'b', 'a']);
    expect(repo.queryTransactions({ shop: 'Only', type: null }).map((t) => t.id)).toEqual(['c', 'b', 'a']);
  });

  it('should apply a limit after ordering', () => {
    repo.insertTransaction(makeTransaction({ id: 'old', date: '2026-01-01', transactionType: 'lend' }));
    repo.insertTransaction(makeTransaction({ id: 'new', date: '2026-03-01', transactionType: 'lend' }));

    expect(repo.queryTransactions({}, 1).map((t) => t.id)).toEqual(['new']);
  });

  it('should report how many rows a delete removed', () => {
    repo.insertTransaction(makeTransaction({ id: 'gone', transactionType: 'lend' }));

    expect(repo.deleteTransactionById('gone')).toBe(1);
    expect(repo.deleteTransactionById('gone')).toBe(0);
    expect(repo.queryTransactions({})).toEqual([]);
  });

  it('should refuse a row whose total disagrees with quantity and price', () => {
    const broken = { ...makeTransaction({ id: 'bad', transactionType: 'lend', quantity: 2, unitPrice: 100 }), total: 150 };

    expect(() => repo.insertTransaction(broken)).toThrow(DatabaseError);
  });
});
