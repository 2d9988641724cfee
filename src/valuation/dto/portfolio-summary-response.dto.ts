import Decimal from 'decimal.js';
import { PortfolioSummary, PositionValuation } from '../interfaces/portfolio-summary.interface';
import { toNumber } from '../../common/utils/decimal.util';

// Held symbol on the summary date; market fields are null when unpriced
export class PositionValuationDto {
  symbol!: string;
  quantity!: number;
  avgCost!: number;
  totalCost!: number;
  marketPrice!: number | null;
  marketValue!: number | null;
  unrealizedPnl!: number | null;
  unrealizedPnlPct!: number | null;
  priceDate!: string | null;
  isStalePrice!: boolean;
  realizedPnl!: number;
  firstBuyDate!: string;
  lastTransactionDate!: string;
}

// Account-wide valuation
export class PortfolioSummaryResponseDto {
  accountId!: string;
  asOfDate!: string;
  totalPositions!: number;
  totalCost!: number;
  totalMarketValue!: number;
  totalUnrealizedPnl!: number;
  totalUnrealizedPnlPct!: number;
  totalRealizedPnl!: number;
  unpricedSymbols!: string[];
  positions!: PositionValuationDto[];
}

const toNullableNumber = (value?: Decimal): number | null => (value === undefined ? null : toNumber(value));

function toPositionValuationResponse(position: PositionValuation): PositionValuationDto {
  return {
    symbol: position.symbol,
    quantity: toNumber(position.quantity),
    avgCost: toNumber(position.avgCost),
    totalCost: toNumber(position.totalCost),
    marketPrice: toNullableNumber(position.marketPrice),
    marketValue: toNullableNumber(position.marketValue),
    unrealizedPnl: toNullableNumber(position.unrealizedPnl),
    unrealizedPnlPct: toNullableNumber(position.unrealizedPnlPct),
    priceDate: position.priceDate ?? null,
    isStalePrice: position.isStalePrice,
    realizedPnl: toNumber(position.realizedPnl),
    firstBuyDate: position.firstBuyDate,
    lastTransactionDate: position.lastTransactionDate,
  };
}

export function toPortfolioSummaryResponse(summary: PortfolioSummary): PortfolioSummaryResponseDto {
  return {
    accountId: summary.accountId,
    asOfDate: summary.asOfDate,
    totalPositions: summary.totalPositions,
    totalCost: toNumber(summary.totalCost),
    totalMarketValue: toNumber(summary.totalMarketValue),
    totalUnrealizedPnl: toNumber(summary.totalUnrealizedPnl),
    totalUnrealizedPnlPct: toNumber(summary.totalUnrealizedPnlPct),
    totalRealizedPnl: toNumber(summary.totalRealizedPnl),
    unpricedSymbols: summary.unpricedSymbols,
    positions: summary.positions.map(toPositionValuationResponse),
  };
}
