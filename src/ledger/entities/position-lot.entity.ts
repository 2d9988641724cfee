import Decimal from 'decimal.js';

// Slice of ownership opened by exactly one BUY.
// remainingQuantity only decreases; closed lots are kept for audit.
export interface PositionLot {
  id: string;
  sequence: number;             // insertion order, FIFO tie-breaker
  accountId: string;
  symbol: string;
  transactionId: string;        // originating BUY
  originalQuantity: Decimal;
  remainingQuantity: Decimal;
  costBasis: Decimal;           // (price × quantity + commission) / quantity
  purchaseDate: string;
  isClosed: boolean;            // remainingQuantity == 0
}
