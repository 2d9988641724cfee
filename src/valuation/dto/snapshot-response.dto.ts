import { DailyPnlSnapshot } from '../../ledger/entities/daily-pnl.entity';
import { toNumber } from '../../common/utils/decimal.util';

// Daily P&L row as served over HTTP
export class SnapshotResponseDto {
  accountId!: string;
  symbol!: string;
  valuationDate!: string;
  quantity!: number;
  avgCost!: number;
  marketPrice!: number;
  marketValue!: number;
  totalCost!: number;
  unrealizedPnl!: number;
  unrealizedPnlPct!: number;    // percent of totalCost
  realizedPnl!: number;         // cumulative to valuationDate
  realizedPnlPct!: number;
  priceDate!: string;
  isStalePrice!: boolean;
  updatedAt!: string;
}

export function toSnapshotResponse(snapshot: DailyPnlSnapshot): SnapshotResponseDto {
  return {
    accountId: snapshot.accountId,
    symbol: snapshot.symbol,
    valuationDate: snapshot.valuationDate,
    quantity: toNumber(snapshot.quantity),
    avgCost: toNumber(snapshot.avgCost),
    marketPrice: toNumber(snapshot.marketPrice),
    marketValue: toNumber(snapshot.marketValue),
    totalCost: toNumber(snapshot.totalCost),
    unrealizedPnl: toNumber(snapshot.unrealizedPnl),
    unrealizedPnlPct: toNumber(snapshot.unrealizedPnlPct),
    realizedPnl: toNumber(snapshot.realizedPnl),
    realizedPnlPct: toNumber(snapshot.realizedPnlPct),
    priceDate: snapshot.priceDate,
    isStalePrice: snapshot.isStalePrice,
    updatedAt: snapshot.updatedAt.toISOString(),
  };
}
