import { Inject, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { v4 as uuidv4 } from 'uuid';
import { LedgerStorageService } from './ledger-storage.service';
import { LotAllocationService } from './lot-allocation.service';
import { aggregatePosition } from './position-aggregator';
import { RecordTransactionDto } from './dto/record-transaction.dto';
import { LedgerTransaction } from './entities/transaction.entity';
import { Position } from './entities/position.entity';
import { IngestionResult, RecordReceipt } from './interfaces/record-receipt.interface';
import { LEDGER_CONFIG, LedgerConfig } from '../common/config/ledger.config';
import {
  DuplicateTransactionError,
  StorageError,
  ValidationError,
  isRejection,
} from '../common/errors/ledger.errors';
import { FieldViolation } from '../common/interfaces/http-exception.interface';
import { toDecimal, ZERO } from '../common/utils/decimal.util';

// Untrusted input: every field is checked before use.
export type RecordTransactionInput = { [K in keyof RecordTransactionDto]?: unknown };

export type RecordedTransaction = Extract<IngestionResult, { status: 'applied' | 'already_applied' }>;

// Ingestion gate: validates, deduplicates on externalId, then runs lot
// allocation and position refresh as one atomic unit.
@Injectable()
export class TransactionIngestionService {
  private readonly logger = new Logger(TransactionIngestionService.name);

  constructor(
    private readonly storage: LedgerStorageService,
    private readonly lotAllocation: LotAllocationService,
    @Inject(LEDGER_CONFIG) private readonly config: LedgerConfig,
  ) {}

  /**
   * Typed-result variant of recordTransaction: rejections come back as
   * `{ status: 'rejected' }`. StorageError and anything unexpected still throw.
   */
  ingest(input: RecordTransactionInput): IngestionResult {
    try {
      return this.recordTransaction(input);
    } catch (error) {
      if (isRejection(error)) {
        this.logger.warn(`Rejected transaction for ${String(input.accountId)}: ${error.message}`);
        return { status: 'rejected', reason: error.message, error };
      }
      throw error;
    }
  }

  /**
   * Records a trade and updates lots and position.
   * Replaying a known externalId returns the first receipt unchanged.
   *
   * @throws ValidationError, InsufficientLotsError, DuplicateTransactionError, StorageError
   */
  recordTransaction(input: RecordTransactionInput): RecordedTransaction {
    const dto = this.validate(input);

    if (dto.externalId !== undefined) {
      const existing = this.storage.findTransactionByExternalId(dto.accountId, dto.externalId);
      if (existing) {
        return { status: 'already_applied', receipt: this.replay(existing, dto) };
      }
    }

    const receipt = this.storage.runInTransaction(() => this.apply(dto));

    this.logger.log(
      `Recorded ${receipt.transaction.side} ${receipt.transaction.quantity.toString()} ${receipt.transaction.symbol} ` +
        `@ ${receipt.transaction.price.toString()} for ${receipt.transaction.accountId} ` +
        `(${receipt.allocations.length} allocations)`,
    );
    return { status: 'applied', receipt };
  }

  validate(input: RecordTransactionInput): RecordTransactionDto {
    const dto = plainToInstance(RecordTransactionDto, input);
    const violations: FieldViolation[] = validateSync(dto).map((error) => ({
      property: error.property,
      constraints: error.constraints ?? {},
    }));

    if (violations.length === 0) {
      violations.push(...this.checkLimits(dto));
    }
    if (violations.length > 0) {
      throw new ValidationError(violations);
    }
    return dto;
  }

  private checkLimits(dto: RecordTransactionDto): FieldViolation[] {
    const violations: FieldViolation[] = [];
    const limit = (property: string, message: string) =>
      violations.push({ property, constraints: { limit: message } });

    if (dto.accountId.length > this.config.maxAccountIdLength) {
      limit('accountId', `accountId must be at most ${this.config.maxAccountIdLength} characters`);
    }
    if (dto.symbol.length > this.config.maxSymbolLength) {
      limit('symbol', `symbol must be at most ${this.config.maxSymbolLength} characters`);
    }
    if (dto.quantity > this.config.maxQuantityPerTransaction) {
      limit('quantity', `quantity must not exceed ${this.config.maxQuantityPerTransaction}`);
    }
    if (dto.price > this.config.maxPricePerUnit) {
      limit('price', `price must not exceed ${this.config.maxPricePerUnit}`);
    }

    const maxCommission = toDecimal(dto.quantity).times(dto.price).times(this.config.maxCommissionRate);
    if (dto.commission !== undefined && maxCommission.lessThan(dto.commission)) {
      const ratePct = toDecimal(this.config.maxCommissionRate).times(100).toString();
      limit('commission', `commission must not exceed ${ratePct}% of quantity × price`);
    }
    return violations;
  }

  private replay(existing: LedgerTransaction, dto: RecordTransactionDto): RecordReceipt {
    const conflicts: string[] = [];
    if (existing.symbol !== dto.symbol) conflicts.push('symbol');
    if (existing.side !== dto.side) conflicts.push('side');
    if (!existing.quantity.equals(dto.quantity)) conflicts.push('quantity');
    if (!existing.price.equals(dto.price)) conflicts.push('price');
    if (!existing.commission.equals(dto.commission ?? 0)) conflicts.push('commission');
    if (existing.transactionDate !== dto.transactionDate) conflicts.push('transactionDate');

    if (conflicts.length > 0) {
      throw new DuplicateTransactionError(dto.accountId, existing.externalId ?? '', conflicts);
    }

    const receipt = this.storage.getReceipt(existing.id);
    if (!receipt) {
      throw new StorageError(`Receipt missing for transaction ${existing.id}`);
    }
    this.logger.log(`Replay of ${existing.externalId ?? existing.id} for ${existing.accountId} ignored`);
    return receipt;
  }

  private apply(dto: RecordTransactionDto): RecordReceipt {
    const now = new Date();
    const saved = this.storage.saveTransaction({
      id: uuidv4(),
      accountId: dto.accountId,
      externalId: dto.externalId,
      symbol: dto.symbol,
      side: dto.side,
      quantity: toDecimal(dto.quantity),
      price: toDecimal(dto.price),
      commission: dto.commission === undefined ? ZERO : toDecimal(dto.commission),
      transactionDate: dto.transactionDate,
      notes: dto.notes,
      createdAt: now,
      updatedAt: now,
    });

    const { lotsTouched, allocations } = this.lotAllocation.apply(saved);
    const position = this.refreshPosition(dto.accountId, dto.symbol);

    const receipt: RecordReceipt = {
      transaction: this.storage.findTransaction(saved.id) ?? saved,
      position,
      lotsTouched,
      allocations,
    };
    this.storage.saveReceipt(receipt);
    return receipt;
  }

  private refreshPosition(accountId: string, symbol: string): Position {
    const existing = this.storage.getPosition(accountId, symbol);
    const figures = aggregatePosition(
      accountId,
      symbol,
      this.storage.getLots(accountId, symbol),
      this.storage.getTransactions(accountId, symbol),
    );
    return this.storage.savePosition({ id: existing?.id ?? uuidv4(), ...figures });
  }
}
