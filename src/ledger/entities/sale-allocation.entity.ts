import Decimal from 'decimal.js';

// Quantity a SELL consumed from one lot. Immutable once created.
export interface SaleAllocation {
  id: string;
  saleTransactionId: string;
  lotId: string;
  accountId: string;
  symbol: string;
  quantitySold: Decimal;
  costBasis: Decimal;             // copied from the lot at sale time
  salePrice: Decimal;
  commissionAllocated: Decimal;   // pro-rata share of the SELL commission
  realizedPnl: Decimal;           // (salePrice - costBasis) × quantitySold - commissionAllocated
  saleDate: string;
}
