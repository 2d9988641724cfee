import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { LedgerStorageService } from './ledger-storage.service';
import { fifoOrder } from './lot-matching.strategy';
import { PositionFigures, aggregatePosition } from './position-aggregator';
import { LedgerTransaction, TransactionSide } from './entities/transaction.entity';
import { Position } from './entities/position.entity';
import { PositionLot } from './entities/position-lot.entity';
import { SaleAllocation } from './entities/sale-allocation.entity';
import { isWithin } from '../common/utils/date.util';
import { ZERO, sum } from '../common/utils/decimal.util';

export interface TransactionFilter {
  symbol?: string;
  startDate?: string;
  endDate?: string;
}

export interface AllocationFilter {
  symbol?: string;
  saleTransactionId?: string;
}

export type ConsistencyIssueType =
  | 'lot_transaction_mismatch'
  | 'allocation_quantity_mismatch'
  | 'lot_out_of_bounds'
  | 'position_quantity_mismatch';

export interface ConsistencyIssue {
  type: ConsistencyIssueType;
  symbol: string;
  description: string;
}

export interface ConsistencyReport {
  accountId: string;
  symbolsChecked: number;
  issues: ConsistencyIssue[];
  isConsistent: boolean;
}

// Read-only access to the ledger (queries kept apart from mutations).
@Injectable()
export class LedgerQueryService {
  constructor(private readonly storage: LedgerStorageService) {}

  getPosition(accountId: string, symbol: string): Position | undefined {
    return this.storage.getPosition(accountId, symbol);
  }

  /** Positions sorted by symbol; inactive ones included unless `activeOnly` */
  getPositions(accountId: string, activeOnly = false): Position[] {
    return this.storage
      .getPositions(accountId)
      .filter((pos) => !activeOnly || pos.isActive)
      .sort((a, b) => a.symbol.localeCompare(b.symbol));
  }

  /** Trade history ordered by transaction date, then arrival order */
  getTransactions(accountId: string, filter: TransactionFilter = {}): LedgerTransaction[] {
    return this.storage
      .getTransactions(accountId, filter.symbol)
      .filter((tx) => isWithin(tx.transactionDate, filter.startDate, filter.endDate))
      .map((tx, arrival) => ({ tx, arrival }))
      .sort((a, b) =>
        a.tx.transactionDate === b.tx.transactionDate
          ? a.arrival - b.arrival
          : a.tx.transactionDate < b.tx.transactionDate ? -1 : 1,
      )
      .map(({ tx }) => tx);
  }

  /** Lots in FIFO order */
  getLots(accountId: string, symbol: string, openOnly = false): PositionLot[] {
    return this.storage
      .getLots(accountId, symbol)
      .filter((lot) => !openOnly || !lot.isClosed)
      .sort(fifoOrder);
  }

  getSaleAllocations(accountId: string, filter: AllocationFilter = {}): SaleAllocation[] {
    const allocations =
      filter.saleTransactionId === undefined
        ? this.storage.getAllocations(accountId, filter.symbol)
        : this.storage.getAllocationsForSale(filter.saleTransactionId);

    return allocations.filter(
      (allocation) =>
        allocation.accountId === accountId &&
        (filter.symbol === undefined || allocation.symbol === filter.symbol),
    );
  }

  /**
   * The position as it stood at the end of `asOfDate`: lots bought on or
   * before the date, each reduced only by sales dated on or before it.
   */
  getPositionAsOf(accountId: string, symbol: string, asOfDate: string): PositionFigures {
    const soldByLot = new Map<string, Decimal>();
    for (const allocation of this.storage.getAllocations(accountId, symbol)) {
      if (allocation.saleDate <= asOfDate) {
        const sold = soldByLot.get(allocation.lotId) ?? ZERO;
        soldByLot.set(allocation.lotId, sold.plus(allocation.quantitySold));
      }
    }

    const lots = this.storage
      .getLots(accountId, symbol)
      .filter((lot) => lot.purchaseDate <= asOfDate)
      .map((lot): PositionLot => {
        const remainingQuantity = Decimal.max(lot.originalQuantity.minus(soldByLot.get(lot.id) ?? ZERO), ZERO);
        return { ...lot, remainingQuantity, isClosed: remainingQuantity.isZero() };
      });
    const transactions = this.storage
      .getTransactions(accountId, symbol)
      .filter((tx) => tx.transactionDate <= asOfDate);

    return aggregatePosition(accountId, symbol, lots, transactions);
  }

  /** Cumulative realized P&L from sales dated on or before `upToDate` */
  getRealizedPnl(accountId: string, symbol: string, upToDate?: string): Decimal {
    return sum(
      this.storage
        .getAllocations(accountId, symbol)
        .filter((allocation) => isWithin(allocation.saleDate, undefined, upToDate))
        .map((allocation) => allocation.realizedPnl),
    );
  }

  /**
   * Cross-checks lots, allocations and positions against the transactions
   * that produced them.
   */
  checkConsistency(accountId: string, symbol?: string): ConsistencyReport {
    const symbols =
      symbol !== undefined
        ? [symbol]
        : Array.from(new Set(this.storage.getTransactions(accountId).map((tx) => tx.symbol))).sort();

    const issues = symbols.flatMap((sym) => this.checkSymbol(accountId, sym));

    return {
      accountId,
      symbolsChecked: symbols.length,
      issues,
      isConsistent: issues.length === 0,
    };
  }

  private checkSymbol(accountId: string, symbol: string): ConsistencyIssue[] {
    const issues: ConsistencyIssue[] = [];
    const transactions = this.storage.getTransactions(accountId, symbol);
    const lots = this.storage.getLots(accountId, symbol);

    const buys = transactions.filter((tx) => tx.side === TransactionSide.BUY);
    if (buys.length !== lots.length) {
      issues.push({
        type: 'lot_transaction_mismatch',
        symbol,
        description: `${buys.length} buy transactions but ${lots.length} lots`,
      });
    }

    for (const sale of transactions.filter((tx) => tx.side === TransactionSide.SELL)) {
      const allocated = sum(this.storage.getAllocationsForSale(sale.id).map((a) => a.quantitySold));
      if (!allocated.equals(sale.quantity)) {
        issues.push({
          type: 'allocation_quantity_mismatch',
          symbol,
          description: `sale ${sale.id} sold ${sale.quantity.toString()} but allocated ${allocated.toString()}`,
        });
      }
    }

    for (const lot of lots) {
      const inBounds =
        !lot.remainingQuantity.isNegative() && lot.remainingQuantity.lessThanOrEqualTo(lot.originalQuantity);
      if (!inBounds || lot.isClosed !== lot.remainingQuantity.isZero()) {
        issues.push({
          type: 'lot_out_of_bounds',
          symbol,
          description: `lot ${lot.id} has remaining ${lot.remainingQuantity.toString()} of ${lot.originalQuantity.toString()} (closed: ${lot.isClosed})`,
        });
      }
    }

    const openQuantity = sum(lots.filter((lot) => !lot.isClosed).map((lot) => lot.remainingQuantity));
    const position = this.storage.getPosition(accountId, symbol);
    const positionQuantity = position ? position.quantity : new Decimal(0);
    if (!openQuantity.equals(positionQuantity)) {
      issues.push({
        type: 'position_quantity_mismatch',
        symbol,
        description: `open lots hold ${openQuantity.toString()} but position shows ${positionQuantity.toString()}`,
      });
    }

    return issues;
  }
}
