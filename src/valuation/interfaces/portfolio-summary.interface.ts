import Decimal from 'decimal.js';

// One held symbol valued on the summary date. Market figures are absent
// when the feed has no close on or before that date.
export interface PositionValuation {
  symbol: string;
  quantity: Decimal;
  avgCost: Decimal;
  totalCost: Decimal;
  marketPrice?: Decimal;
  marketValue?: Decimal;
  unrealizedPnl?: Decimal;
  unrealizedPnlPct?: Decimal;
  priceDate?: string;
  isStalePrice: boolean;
  realizedPnl: Decimal;         // cumulative to the summary date
  firstBuyDate: string;
  lastTransactionDate: string;
}

// Account-wide totals as of one date
export interface PortfolioSummary {
  accountId: string;
  asOfDate: string;
  totalPositions: number;
  totalCost: Decimal;           // every held position, priced or not
  totalMarketValue: Decimal;    // priced positions only
  totalUnrealizedPnl: Decimal;  // priced positions only
  totalUnrealizedPnlPct: Decimal;
  totalRealizedPnl: Decimal;    // every symbol ever traded, held or not
  unpricedSymbols: string[];
  positions: PositionValuation[];
}
