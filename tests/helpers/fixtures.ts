import type { Transaction, TransactionType } from '../../src/domain/entities/Transaction.js';

let counter = 0;

export function makeTransaction(overrides: Partial<Transaction> & { transactionType: TransactionType }): Transaction {
  counter += 1;
  const quantity = overrides.quantity ?? 1;
  const unitPrice = overrides.unitPrice ?? 1000;
  const date = overrides.date ?? '2026-01-15';
  return {
    id: `tx-${counter}`,
    date,
    shop: 'Wonderjoy',
    productName: 'Mug',
    quantity,
    unitPrice,
    total: quantity * unitPrice,
    period: date.slice(0, 7),
    createdAt: '2026-01-15T09:00:00.000Z',
    ...overrides,
  };
}
