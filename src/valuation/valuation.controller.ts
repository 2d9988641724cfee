import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { ValuationService } from './valuation.service';
import { SnapshotFromFeedDto, SnapshotRangeDto, SnapshotValuationDto } from './dto/snapshot-valuation.dto';
import { SnapshotResponseDto, toSnapshotResponse } from './dto/snapshot-response.dto';
import { PortfolioSummaryResponseDto, toPortfolioSummaryResponse } from './dto/portfolio-summary-response.dto';

@Controller('valuation')
export class ValuationController {
  constructor(private readonly valuationService: ValuationService) {}

  /**
   * Upserts a snapshot at an explicit price.
   *
   * POST /valuation/snapshots
   */
  @Post('snapshots')
  @HttpCode(HttpStatus.OK)
  snapshot(@Body() dto: SnapshotValuationDto): SnapshotResponseDto {
    const snapshot = this.valuationService.snapshotValuation(dto.accountId, dto.symbol, dto.valuationDate, {
      price: dto.price,
      priceDate: dto.priceDate,
    });
    return toSnapshotResponse(snapshot);
  }

  /**
   * POST /valuation/snapshots/from-feed
   */
  @Post('snapshots/from-feed')
  @HttpCode(HttpStatus.OK)
  snapshotFromFeed(@Body() dto: SnapshotFromFeedDto): SnapshotResponseDto {
    return toSnapshotResponse(
      this.valuationService.snapshotFromFeed(dto.accountId, dto.symbol, dto.valuationDate),
    );
  }

  /**
   * POST /valuation/snapshots/range
   */
  @Post('snapshots/range')
  @HttpCode(HttpStatus.OK)
  snapshotRange(@Body() dto: SnapshotRangeDto): SnapshotResponseDto[] {
    return this.valuationService
      .snapshotRange(dto.accountId, dto.symbol, dto.startDate, dto.endDate)
      .map(toSnapshotResponse);
  }

  /**
   * GET /valuation/accounts/:accountId/snapshots?symbol=AAPL&startDate=...&endDate=...
   */
  @Get('accounts/:accountId/snapshots')
  getSnapshots(
    @Param('accountId') accountId: string,
    @Query('symbol') symbol?: string,
    @Query('startDate') startDate?: string,
    @Query('endDate') endDate?: string,
  ): SnapshotResponseDto[] {
    return this.valuationService
      .getSnapshots(accountId, { symbol: symbol?.trim().toUpperCase() || undefined, startDate, endDate })
      .map(toSnapshotResponse);
  }

  /**
   * Every held symbol valued through the price feed, with account totals.
   *
   * GET /valuation/accounts/:accountId/summary?date=2023-01-31
   */
  @Get('accounts/:accountId/summary')
  getPortfolioSummary(
    @Param('accountId') accountId: string,
    @Query('date') date: string,
  ): PortfolioSummaryResponseDto {
    return toPortfolioSummaryResponse(this.valuationService.getPortfolioSummary(accountId, date));
  }
}
