import Decimal from 'decimal.js';

export enum TransactionSide {
  BUY = 'BUY',
  SELL = 'SELL',
}

// One executed trade. Never mutated or deleted once stored.
export interface LedgerTransaction {
  id: string;                 // internal UUID
  accountId: string;
  externalId?: string;        // caller's idempotency key, unique per account
  symbol: string;
  side: TransactionSide;
  quantity: Decimal;
  price: Decimal;
  commission: Decimal;
  transactionDate: string;    // YYYY-MM-DD
  lotId?: string;             // lot opened by a BUY
  notes?: string;
  createdAt: Date;
  updatedAt: Date;
}
