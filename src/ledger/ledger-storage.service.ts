import { Injectable } from '@nestjs/common';
import { LedgerTransaction } from './entities/transaction.entity';
import { PositionLot } from './entities/position-lot.entity';
import { SaleAllocation } from './entities/sale-allocation.entity';
import { Position } from './entities/position.entity';
import { DailyPnlSnapshot } from './entities/daily-pnl.entity';
import { RecordReceipt } from './interfaces/record-receipt.interface';
import { StorageError } from '../common/errors/ledger.errors';

export const positionKey = (accountId: string, symbol: string): string => JSON.stringify([accountId, symbol]);

const dedupKey = (accountId: string, externalId: string): string => JSON.stringify([accountId, externalId]);

const snapshotKey = (symbol: string, valuationDate: string): string => JSON.stringify([symbol, valuationDate]);

type Undo = () => void;

// In-memory ledger store. Records live in id-keyed maps, indexed by account
// and by (account, symbol); relations are stored ids. Uniqueness and lot
// CHECK constraints raise StorageError.
@Injectable()
export class LedgerStorageService {
  private transactionById = new Map<string, LedgerTransaction>();
  private transactionIdsByAccount = new Map<string, string[]>();
  private transactionIdsByPosition = new Map<string, string[]>();
  private externalIdIndex = new Map<string, string>();            // [account, externalId] -> transaction id
  private lots = new Map<string, PositionLot>();
  private lotIdsByPosition = new Map<string, string[]>();         // insertion order
  private allocationsByAccount = new Map<string, SaleAllocation[]>();
  private allocationsBySale = new Map<string, SaleAllocation[]>();
  private positionsByAccount = new Map<string, Map<string, Position>>();
  private receipts = new Map<string, RecordReceipt>();
  private snapshotsByAccount = new Map<string, Map<string, DailyPnlSnapshot>>();
  private lotSequence = 0;

  // Set while a unit of work runs; each write registers how to revert itself.
  private undoLog: Undo[] | undefined;

  /**
   * Runs `work` as one atomic unit: if it throws, every write made inside
   * is reverted and the error is rethrown unchanged.
   */
  runInTransaction<T>(work: () => T): T {
    if (this.undoLog) {
      throw new StorageError('Nested ledger transactions are not supported');
    }

    const undoLog: Undo[] = [];
    this.undoLog = undoLog;
    try {
      return work();
    } catch (error) {
      this.undoLog = undefined;
      undoLog.reverse().forEach((undo) => undo());
      throw error;
    } finally {
      this.undoLog = undefined;
    }
  }

  saveTransaction(transaction: LedgerTransaction): LedgerTransaction {
    if (this.transactionById.has(transaction.id)) {
      throw new StorageError(`Transaction ${transaction.id} already exists`);
    }

    if (transaction.externalId !== undefined) {
      const key = dedupKey(transaction.accountId, transaction.externalId);
      if (this.externalIdIndex.has(key)) {
        throw new StorageError(
          `Unique constraint violated: (${transaction.accountId}, ${transaction.externalId})`,
        );
      }
      this.setEntry(this.externalIdIndex, key, transaction.id);
    }

    this.setEntry(this.transactionById, transaction.id, transaction);
    this.appendTo(this.transactionIdsByAccount, transaction.accountId, transaction.id);
    this.appendTo(
      this.transactionIdsByPosition,
      positionKey(transaction.accountId, transaction.symbol),
      transaction.id,
    );
    return transaction;
  }

  /** Links a BUY to the lot it opened. */
  linkTransactionToLot(transactionId: string, lotId: string): LedgerTransaction {
    const existing = this.transactionById.get(transactionId);
    if (!existing) {
      throw new StorageError(`Transaction ${transactionId} not found`);
    }
    const linked: LedgerTransaction = { ...existing, lotId, updatedAt: new Date() };
    this.setEntry(this.transactionById, transactionId, linked);
    return linked;
  }

  findTransaction(id: string): LedgerTransaction | undefined {
    return this.transactionById.get(id);
  }

  /** Dedup index lookup for the ingestion gate */
  findTransactionByExternalId(accountId: string, externalId: string): LedgerTransaction | undefined {
    const id = this.externalIdIndex.get(dedupKey(accountId, externalId));
    return id === undefined ? undefined : this.transactionById.get(id);
  }

  /** Transactions of an account (or one of its symbols) in arrival order */
  getTransactions(accountId: string, symbol?: string): LedgerTransaction[] {
    const ids =
      symbol === undefined
        ? this.transactionIdsByAccount.get(accountId)
        : this.transactionIdsByPosition.get(positionKey(accountId, symbol));
    return this.resolve(ids ?? [], this.transactionById);
  }

  getTransactionCount(): number {
    return this.transactionById.size;
  }

  nextLotSequence(): number {
    this.lotSequence += 1;
    this.onRollback(() => {
      this.lotSequence -= 1;
    });
    return this.lotSequence;
  }

  createLot(lot: PositionLot): PositionLot {
    if (this.lots.has(lot.id)) {
      throw new StorageError(`Lot ${lot.id} already exists`);
    }
    this.assertLotBounds(lot);

    this.setEntry(this.lots, lot.id, lot);
    this.appendTo(this.lotIdsByPosition, positionKey(lot.accountId, lot.symbol), lot.id);
    return lot;
  }

  /** Replaces a lot's remaining quantity; it may only go down. */
  updateLot(updated: PositionLot): PositionLot {
    const current = this.lots.get(updated.id);
    if (!current) {
      throw new StorageError(`Lot ${updated.id} not found`);
    }
    if (updated.remainingQuantity.greaterThan(current.remainingQuantity)) {
      throw new StorageError(`Lot ${updated.id} remaining quantity cannot increase`);
    }
    if (current.isClosed && !updated.isClosed) {
      throw new StorageError(`Lot ${updated.id} cannot be reopened`);
    }
    this.assertLotBounds(updated);

    this.setEntry(this.lots, updated.id, updated);
    return updated;
  }

  findLot(id: string): PositionLot | undefined {
    return this.lots.get(id);
  }

  /** All lots of a position, open and closed, in insertion order */
  getLots(accountId: string, symbol: string): PositionLot[] {
    return this.resolve(this.lotIdsByPosition.get(positionKey(accountId, symbol)) ?? [], this.lots);
  }

  saveAllocation(allocation: SaleAllocation): SaleAllocation {
    if (!this.lots.has(allocation.lotId)) {
      throw new StorageError(`Allocation references unknown lot ${allocation.lotId}`);
    }
    if (!this.transactionById.has(allocation.saleTransactionId)) {
      throw new StorageError(`Allocation references unknown transaction ${allocation.saleTransactionId}`);
    }

    this.appendTo(this.allocationsByAccount, allocation.accountId, allocation);
    this.appendTo(this.allocationsBySale, allocation.saleTransactionId, allocation);
    return allocation;
  }

  getAllocationsForSale(saleTransactionId: string): SaleAllocation[] {
    return [...(this.allocationsBySale.get(saleTransactionId) ?? [])];
  }

  getAllocations(accountId: string, symbol?: string): SaleAllocation[] {
    return (this.allocationsByAccount.get(accountId) ?? []).filter(
      (allocation) => symbol === undefined || allocation.symbol === symbol,
    );
  }

  getPosition(accountId: string, symbol: string): Position | undefined {
    return this.positionsByAccount.get(accountId)?.get(symbol);
  }

  /** Upsert on (accountId, symbol) */
  savePosition(position: Position): Position {
    this.setEntry(this.accountMap(this.positionsByAccount, position.accountId), position.symbol, position);
    return position;
  }

  getPositions(accountId: string): Position[] {
    return Array.from(this.positionsByAccount.get(accountId)?.values() ?? []);
  }

  saveReceipt(receipt: RecordReceipt): void {
    this.setEntry(this.receipts, receipt.transaction.id, receipt);
  }

  getReceipt(transactionId: string): RecordReceipt | undefined {
    return this.receipts.get(transactionId);
  }

  findSnapshot(accountId: string, symbol: string, valuationDate: string): DailyPnlSnapshot | undefined {
    return this.snapshotsByAccount.get(accountId)?.get(snapshotKey(symbol, valuationDate));
  }

  /** Upsert on (accountId, symbol, valuationDate) */
  saveSnapshot(snapshot: DailyPnlSnapshot): DailyPnlSnapshot {
    this.setEntry(
      this.accountMap(this.snapshotsByAccount, snapshot.accountId),
      snapshotKey(snapshot.symbol, snapshot.valuationDate),
      snapshot,
    );
    return snapshot;
  }

  getSnapshots(accountId: string, symbol?: string): DailyPnlSnapshot[] {
    return Array.from(this.snapshotsByAccount.get(accountId)?.values() ?? []).filter(
      (snapshot) => symbol === undefined || snapshot.symbol === symbol,
    );
  }

  /** Wipes every record - test harness only */
  clearAllData(): void {
    this.transactionById.clear();
    this.transactionIdsByAccount.clear();
    this.transactionIdsByPosition.clear();
    this.externalIdIndex.clear();
    this.lots.clear();
    this.lotIdsByPosition.clear();
    this.allocationsByAccount.clear();
    this.allocationsBySale.clear();
    this.positionsByAccount.clear();
    this.receipts.clear();
    this.snapshotsByAccount.clear();
    this.lotSequence = 0;
    this.undoLog = undefined;
  }

  private onRollback(undo: Undo): void {
    this.undoLog?.push(undo);
  }

  private setEntry<K, V>(map: Map<K, V>, key: K, value: V): void {
    const previous = map.get(key);
    map.set(key, value);
    this.onRollback(() => {
      if (previous === undefined) {
        map.delete(key);
      } else {
        map.set(key, previous);
      }
    });
  }

  private appendTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
    const list = map.get(key);
    if (!list) {
      this.setEntry(map, key, [value]);
      return;
    }
    list.push(value);
    this.onRollback(() => {
      list.pop();
    });
  }

  private accountMap<V>(map: Map<string, Map<string, V>>, accountId: string): Map<string, V> {
    const existing = map.get(accountId);
    if (existing) {
      return existing;
    }
    const created = new Map<string, V>();
    this.setEntry(map, accountId, created);
    return created;
  }

  private resolve<V>(ids: string[], records: Map<string, V>): V[] {
    return ids.flatMap((id) => {
      const record = records.get(id);
      return record === undefined ? [] : [record];
    });
  }

  private assertLotBounds(lot: PositionLot): void {
    if (lot.remainingQuantity.isNegative() || lot.remainingQuantity.greaterThan(lot.originalQuantity)) {
      throw new StorageError(`Lot ${lot.id} remaining quantity out of bounds`);
    }
    if (lot.isClosed !== lot.remainingQuantity.isZero()) {
      throw new StorageError(`Lot ${lot.id} closed flag disagrees with remaining quantity`);
    }
  }
}
