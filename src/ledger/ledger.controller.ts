import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { TransactionIngestionService } from './transaction-ingestion.service';
import { ConsistencyReport, LedgerQueryService } from './ledger-query.service';
import { RecordTransactionDto } from './dto/record-transaction.dto';
import {
  AllocationResponseDto,
  LotResponseDto,
  PositionResponseDto,
  RecordTransactionResponseDto,
  TransactionResponseDto,
} from './dto/ledger-response.dto';
import {
  toAllocationResponse,
  toLotResponse,
  toPositionResponse,
  toTransactionResponse,
} from './ledger.mapper';
import { PositionNotFoundError } from '../common/errors/ledger.errors';
import { sum, toNumber } from '../common/utils/decimal.util';

const isTrue = (flag?: string): boolean => flag === 'true' || flag === '1';
const upper = (symbol?: string): string | undefined => symbol?.trim().toUpperCase() || undefined;

@Controller('ledger')
export class LedgerController {
  constructor(
    private readonly ingestionService: TransactionIngestionService,
    private readonly queryService: LedgerQueryService,
  ) {}

  /**
   * Records a trade through the ingestion gate.
   * A replayed externalId returns 201 with the first receipt and
   * status `already_applied`.
   *
   * POST /ledger/transactions
   */
  @Post('transactions')
  @HttpCode(HttpStatus.CREATED)
  recordTransaction(@Body() dto: RecordTransactionDto): RecordTransactionResponseDto {
    const result = this.ingestionService.ingest(dto);
    if (result.status === 'rejected') {
      throw result.error;
    }

    const { transaction, position, lotsTouched, allocations } = result.receipt;
    return {
      status: result.status,
      message:
        result.status === 'applied'
          ? 'Transaction recorded successfully'
          : 'Transaction already recorded (idempotent)',
      transaction: toTransactionResponse(transaction),
      position: toPositionResponse(position),
      lotsTouched: lotsTouched.map(toLotResponse),
      allocations: allocations.map(toAllocationResponse),
      realizedPnl: toNumber(sum(allocations.map((allocation) => allocation.realizedPnl))),
    };
  }

  /**
   * GET /ledger/accounts/:accountId/positions?activeOnly=true
   */
  @Get('accounts/:accountId/positions')
  getPositions(
    @Param('accountId') accountId: string,
    @Query('activeOnly') activeOnly?: string,
  ): PositionResponseDto[] {
    return this.queryService.getPositions(accountId, isTrue(activeOnly)).map(toPositionResponse);
  }

  /**
   * GET /ledger/accounts/:accountId/positions/:symbol
   * 404 when the account never traded the symbol.
   */
  @Get('accounts/:accountId/positions/:symbol')
  getPosition(
    @Param('accountId') accountId: string,
    @Param('symbol') symbol: string,
  ): PositionResponseDto {
    const normalized = symbol.trim().toUpperCase();
    const position = this.queryService.getPosition(accountId, normalized);
    if (!position) {
      throw new PositionNotFoundError(accountId, normalized);
    }
    return toPositionResponse(position);
  }

  /**
   * GET /ledger/accounts/:accountId/transactions?symbol=AAPL&startDate=2023-01-01&endDate=2023-12-31
   */
  @Get('accounts/:accountId/transactions')
  getTransactions(
    @Param('accountId') accountId: string,
    @Query('symbol') symbol?: string,
    @Query('startDate') startDate?: string,
    @Query('endDate') endDate?: string,
  ): TransactionResponseDto[] {
    return this.queryService
      .getTransactions(accountId, { symbol: upper(symbol), startDate, endDate })
      .map(toTransactionResponse);
  }

  /**
   * Lots in FIFO order.
   *
   * GET /ledger/accounts/:accountId/lots/:symbol?openOnly=true
   */
  @Get('accounts/:accountId/lots/:symbol')
  getLots(
    @Param('accountId') accountId: string,
    @Param('symbol') symbol: string,
    @Query('openOnly') openOnly?: string,
  ): LotResponseDto[] {
    return this.queryService
      .getLots(accountId, symbol.trim().toUpperCase(), isTrue(openOnly))
      .map(toLotResponse);
  }

  /**
   * GET /ledger/accounts/:accountId/allocations?symbol=AAPL&saleTransactionId=...
   */
  @Get('accounts/:accountId/allocations')
  getAllocations(
    @Param('accountId') accountId: string,
    @Query('symbol') symbol?: string,
    @Query('saleTransactionId') saleTransactionId?: string,
  ): AllocationResponseDto[] {
    return this.queryService
      .getSaleAllocations(accountId, { symbol: upper(symbol), saleTransactionId })
      .map(toAllocationResponse);
  }

  /**
   * GET /ledger/accounts/:accountId/consistency?symbol=AAPL
   */
  @Get('accounts/:accountId/consistency')
  checkConsistency(
    @Param('accountId') accountId: string,
    @Query('symbol') symbol?: string,
  ): ConsistencyReport {
    return this.queryService.checkConsistency(accountId, upper(symbol));
  }
}
