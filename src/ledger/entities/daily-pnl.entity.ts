import Decimal from 'decimal.js';

// Valuation of one position on one date. Unique per (account, symbol, valuationDate).
export interface DailyPnlSnapshot {
  id: string;
  accountId: string;
  symbol: string;
  valuationDate: string;
  quantity: Decimal;
  avgCost: Decimal;
  marketPrice: Decimal;
  marketValue: Decimal;
  unrealizedPnl: Decimal;
  unrealizedPnlPct: Decimal;
  realizedPnl: Decimal;         // cumulative up to valuationDate
  realizedPnlPct: Decimal;
  totalCost: Decimal;
  priceDate: string;            // when the market price was observed
  isStalePrice: boolean;        // priceDate != valuationDate
  createdAt: Date;
  updatedAt: Date;
}
