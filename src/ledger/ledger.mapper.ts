import { LedgerTransaction } from './entities/transaction.entity';
import { PositionLot } from './entities/position-lot.entity';
import { SaleAllocation } from './entities/sale-allocation.entity';
import { Position } from './entities/position.entity';
import {
  AllocationResponseDto,
  LotResponseDto,
  PositionResponseDto,
  TransactionResponseDto,
} from './dto/ledger-response.dto';
import { toNumber } from '../common/utils/decimal.util';

export function toTransactionResponse(tx: LedgerTransaction): TransactionResponseDto {
  return {
    id: tx.id,
    accountId: tx.accountId,
    externalId: tx.externalId,
    symbol: tx.symbol,
    side: tx.side,
    quantity: toNumber(tx.quantity),
    price: toNumber(tx.price),
    commission: toNumber(tx.commission),
    transactionDate: tx.transactionDate,
    lotId: tx.lotId,
    notes: tx.notes,
    createdAt: tx.createdAt.toISOString(),
  };
}

export function toLotResponse(lot: PositionLot): LotResponseDto {
  return {
    id: lot.id,
    symbol: lot.symbol,
    transactionId: lot.transactionId,
    originalQuantity: toNumber(lot.originalQuantity),
    remainingQuantity: toNumber(lot.remainingQuantity),
    costBasis: toNumber(lot.costBasis),
    purchaseDate: lot.purchaseDate,
    isClosed: lot.isClosed,
  };
}

export function toAllocationResponse(allocation: SaleAllocation): AllocationResponseDto {
  return {
    id: allocation.id,
    saleTransactionId: allocation.saleTransactionId,
    lotId: allocation.lotId,
    symbol: allocation.symbol,
    quantitySold: toNumber(allocation.quantitySold),
    costBasis: toNumber(allocation.costBasis),
    salePrice: toNumber(allocation.salePrice),
    commissionAllocated: toNumber(allocation.commissionAllocated),
    realizedPnl: toNumber(allocation.realizedPnl),
    saleDate: allocation.saleDate,
  };
}

export function toPositionResponse(position: Position): PositionResponseDto {
  return {
    accountId: position.accountId,
    symbol: position.symbol,
    quantity: toNumber(position.quantity),
    avgCost: toNumber(position.avgCost),
    totalCost: toNumber(position.totalCost),
    firstBuyDate: position.firstBuyDate,
    lastTransactionDate: position.lastTransactionDate,
    isActive: position.isActive,
    openLotCount: position.openLotCount,
    closedLotCount: position.closedLotCount,
  };
}
