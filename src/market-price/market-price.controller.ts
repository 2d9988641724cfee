import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { MarketPriceService } from './market-price.service';
import { BulkRecordClosesDto, RecordCloseDto } from './dto/record-close.dto';
import { PriceQuoteResponseDto } from './dto/price-quote-response.dto';
import { PriceNotFoundError } from '../common/errors/ledger.errors';

@Controller('market-prices')
export class MarketPriceController {
  constructor(private readonly marketPriceService: MarketPriceService) {}

  /**
   * Symbols with recorded closes.
   *
   * GET /market-prices
   */
  @Get()
  getSymbols(): { symbols: string[] } {
    return { symbols: this.marketPriceService.getAvailableSymbols() };
  }

  /**
   * POST /market-prices/closes
   */
  @Post('closes')
  @HttpCode(HttpStatus.OK)
  recordClose(@Body() dto: RecordCloseDto) {
    this.marketPriceService.recordClose(dto.symbol, dto.date, dto.price);
    return {
      message: `Close recorded for ${dto.symbol}`,
      symbol: dto.symbol,
      date: dto.date,
      price: dto.price,
    };
  }

  /**
   * POST /market-prices/closes/bulk
   */
  @Post('closes/bulk')
  @HttpCode(HttpStatus.OK)
  recordCloses(@Body() dto: BulkRecordClosesDto) {
    const prices = Object.fromEntries(
      Object.entries(dto.prices).map(([symbol, price]) => [symbol.trim().toUpperCase(), price]),
    );
    this.marketPriceService.recordCloses(dto.date, prices);
    return {
      message: 'Closes recorded',
      date: dto.date,
      updatedSymbols: Object.keys(prices),
    };
  }

  /**
   * Close on or before the date (latest known when no date is given).
   *
   * GET /market-prices/AAPL?date=2023-01-03
   */
  @Get(':symbol')
  getPrice(@Param('symbol') symbol: string, @Query('date') date?: string): PriceQuoteResponseDto {
    const normalized = symbol.trim().toUpperCase();
    const quote = date
      ? this.marketPriceService.priceFor(normalized, date)
      : this.marketPriceService.getLatestClose(normalized);

    if (!quote) {
      throw new PriceNotFoundError(normalized, date ?? 'today');
    }
    const requestedDate = date ?? quote.observedDate;
    return {
      symbol: normalized,
      requestedDate,
      price: quote.price,
      observedDate: quote.observedDate,
      isStale: quote.observedDate !== requestedDate,
    };
  }
}
