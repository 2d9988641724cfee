import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { LedgerStorageService } from './ledger-storage.service';
import { LedgerTransaction, TransactionSide } from './entities/transaction.entity';
import { PositionLot } from './entities/position-lot.entity';
import { SaleAllocation } from './entities/sale-allocation.entity';
import { LOT_MATCHING_STRATEGY, LotMatchingStrategy, LotSlice } from './lot-matching.strategy';
import { ZERO } from '../common/utils/decimal.util';

export interface AllocationOutcome {
  lotsTouched: PositionLot[];
  allocations: SaleAllocation[];
}

// Lot state machine per (account, symbol). Lots move OPEN -> CLOSED only.
// Must run inside a storage transaction so a failed SELL leaves no trace.
@Injectable()
export class LotAllocationService {
  private readonly logger = new Logger(LotAllocationService.name);

  constructor(
    private readonly storage: LedgerStorageService,
    @Inject(LOT_MATCHING_STRATEGY) private readonly matcher: LotMatchingStrategy,
  ) {}

  apply(transaction: LedgerTransaction): AllocationOutcome {
    if (transaction.side === TransactionSide.BUY) {
      return { lotsTouched: [this.openLot(transaction)], allocations: [] };
    }
    return this.allocateSale(transaction);
  }

  // BUY: one new lot, commission folded into the per-unit cost basis.
  private openLot(transaction: LedgerTransaction): PositionLot {
    const costBasis = transaction.price
      .times(transaction.quantity)
      .plus(transaction.commission)
      .dividedBy(transaction.quantity);

    const lot = this.storage.createLot({
      id: uuidv4(),
      sequence: this.storage.nextLotSequence(),
      accountId: transaction.accountId,
      symbol: transaction.symbol,
      transactionId: transaction.id,
      originalQuantity: transaction.quantity,
      remainingQuantity: transaction.quantity,
      costBasis,
      purchaseDate: transaction.transactionDate,
      isClosed: false,
    });
    this.storage.linkTransactionToLot(transaction.id, lot.id);

    this.logger.debug(
      `Opened lot ${lot.id} for ${lot.accountId}/${lot.symbol}: ${lot.originalQuantity.toString()} @ ${costBasis.toString()}`,
    );
    return lot;
  }

  // SELL: consume lots in matcher order; all-or-nothing.
  private allocateSale(transaction: LedgerTransaction): AllocationOutcome {
    const lots = this.storage.getLots(transaction.accountId, transaction.symbol);
    const slices = this.matcher.match(transaction.symbol, lots, transaction.quantity);
    const commissions = this.splitCommission(transaction, slices);

    const lotsTouched: PositionLot[] = [];
    const allocations: SaleAllocation[] = [];

    slices.forEach((slice, index) => {
      const commissionAllocated = commissions[index];
      const realizedPnl = transaction.price
        .minus(slice.lot.costBasis)
        .times(slice.quantity)
        .minus(commissionAllocated);

      allocations.push(
        this.storage.saveAllocation({
          id: uuidv4(),
          saleTransactionId: transaction.id,
          lotId: slice.lot.id,
          accountId: transaction.accountId,
          symbol: transaction.symbol,
          quantitySold: slice.quantity,
          costBasis: slice.lot.costBasis,
          salePrice: transaction.price,
          commissionAllocated,
          realizedPnl,
          saleDate: transaction.transactionDate,
        }),
      );

      const remainingQuantity = slice.lot.remainingQuantity.minus(slice.quantity);
      lotsTouched.push(
        this.storage.updateLot({
          ...slice.lot,
          remainingQuantity,
          isClosed: remainingQuantity.isZero(),
        }),
      );

      this.logger.debug(
        `Sale ${transaction.id} took ${slice.quantity.toString()} from lot ${slice.lot.id}, realized ${realizedPnl.toString()}`,
      );
    });

    return { lotsTouched, allocations };
  }

  // Pro-rata by quantity; the last slice absorbs the rounding remainder.
  private splitCommission(transaction: LedgerTransaction, slices: LotSlice[]): Decimal[] {
    let allocated = ZERO;
    return slices.map((slice, index) => {
      if (index === slices.length - 1) {
        return transaction.commission.minus(allocated);
      }
      const share = transaction.commission.times(slice.quantity).dividedBy(transaction.quantity);
      allocated = allocated.plus(share);
      return share;
    });
  }
}
