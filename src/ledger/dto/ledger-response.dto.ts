// Wire shapes: Decimals become numbers rounded to 8 places.

export class TransactionResponseDto {
  id!: string;
  accountId!: string;
  externalId?: string;
  symbol!: string;
  side!: string;
  quantity!: number;
  price!: number;
  commission!: number;
  transactionDate!: string;
  lotId?: string;               // set on BUY
  notes?: string;
  createdAt!: string;
}

export class LotResponseDto {
  id!: string;
  symbol!: string;
  transactionId!: string;
  originalQuantity!: number;
  remainingQuantity!: number;
  costBasis!: number;           // per unit, commission included
  purchaseDate!: string;
  isClosed!: boolean;
}

export class AllocationResponseDto {
  id!: string;
  saleTransactionId!: string;
  lotId!: string;
  symbol!: string;
  quantitySold!: number;
  costBasis!: number;
  salePrice!: number;
  commissionAllocated!: number;
  realizedPnl!: number;
  saleDate!: string;
}

export class PositionResponseDto {
  accountId!: string;
  symbol!: string;
  quantity!: number;
  avgCost!: number;
  totalCost!: number;
  firstBuyDate!: string;
  lastTransactionDate!: string;
  isActive!: boolean;
  openLotCount!: number;
  closedLotCount!: number;
}

// Response after submitting a transaction
export class RecordTransactionResponseDto {
  status!: 'applied' | 'already_applied';
  message!: string;
  transaction!: TransactionResponseDto;
  position!: PositionResponseDto;
  lotsTouched!: LotResponseDto[];
  allocations!: AllocationResponseDto[];
  realizedPnl!: number;         // sum over allocations
}
