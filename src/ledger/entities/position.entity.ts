import Decimal from 'decimal.js';

// Materialized view over the lots of one (account, symbol).
// Retained when quantity drops to zero: it anchors historical realized P&L.
export interface Position {
  id: string;
  accountId: string;
  symbol: string;
  quantity: Decimal;            // Σ remaining over open lots
  avgCost: Decimal;             // totalCost / quantity
  totalCost: Decimal;           // Σ remaining × costBasis
  firstBuyDate: string;
  lastTransactionDate: string;
  isActive: boolean;
  openLotCount: number;
  closedLotCount: number;
}
