import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { LedgerStorageService } from '../ledger/ledger-storage.service';
import { LedgerQueryService } from '../ledger/ledger-query.service';
import { PositionFigures } from '../ledger/position-aggregator';
import { DailyPnlSnapshot } from '../ledger/entities/daily-pnl.entity';
import { PRICE_FEED, PriceFeed } from '../market-price/price-feed.interface';
import { LEDGER_CONFIG, LedgerConfig } from '../common/config/ledger.config';
import { PositionNotFoundError, PriceNotFoundError, ValidationError } from '../common/errors/ledger.errors';
import { PortfolioSummary, PositionValuation } from './interfaces/portfolio-summary.interface';
import { DecimalLike, ZERO, percentOf, sum, toDecimal } from '../common/utils/decimal.util';
import { eachDay, isCalendarDate, isWithin } from '../common/utils/date.util';

export interface ValuationQuote {
  price: DecimalLike;
  priceDate?: string;     // defaults to the valuation date
}

export interface SnapshotFilter {
  symbol?: string;
  startDate?: string;
  endDate?: string;
}

/**
 * Valuation snapshotter. Reads committed positions and realized P&L and
 * upserts one DailyPnlSnapshot per (account, symbol, valuationDate).
 * A price observed before the valuation date is flagged stale, never refused.
 */
@Injectable()
export class ValuationService {
  private readonly logger = new Logger(ValuationService.name);

  constructor(
    private readonly storage: LedgerStorageService,
    private readonly ledgerQuery: LedgerQueryService,
    @Inject(PRICE_FEED) private readonly priceFeed: PriceFeed,
    @Inject(LEDGER_CONFIG) private readonly config: LedgerConfig,
  ) {}

  /**
   * @throws ValidationError for a bad date or non-positive price
   * @throws PositionNotFoundError if the account never traded the symbol
   */
  snapshotValuation(
    accountId: string,
    symbol: string,
    valuationDate: string,
    quote: ValuationQuote,
  ): DailyPnlSnapshot {
    const priceDate = quote.priceDate ?? valuationDate;
    this.assertDate('valuationDate', valuationDate);
    this.assertDate('priceDate', priceDate);
    if (priceDate > valuationDate) {
      throw ValidationError.forField('priceDate', 'notAfter', 'priceDate must not be after valuationDate');
    }

    const marketPrice = toDecimal(quote.price);
    if (!marketPrice.isFinite() || marketPrice.lessThanOrEqualTo(0)) {
      throw ValidationError.forField('price', 'isPositive', 'price must be a positive number');
    }

    if (!this.ledgerQuery.getPosition(accountId, symbol)) {
      throw new PositionNotFoundError(accountId, symbol);
    }

    const { quantity, avgCost, totalCost } = this.ledgerQuery.getPositionAsOf(accountId, symbol, valuationDate);
    const marketValue = quantity.times(marketPrice);
    const unrealizedPnl = marketValue.minus(totalCost);
    const realizedPnl = this.ledgerQuery.getRealizedPnl(accountId, symbol, valuationDate);
    const isStalePrice = priceDate !== valuationDate;

    if (isStalePrice) {
      this.logger.warn(`Stale price for ${symbol} on ${valuationDate}: observed ${priceDate}`);
    }

    const existing = this.storage.findSnapshot(accountId, symbol, valuationDate);
    const now = new Date();
    const snapshot = this.storage.saveSnapshot({
      id: existing?.id ?? uuidv4(),
      accountId,
      symbol,
      valuationDate,
      quantity,
      avgCost,
      marketPrice,
      marketValue,
      unrealizedPnl,
      unrealizedPnlPct: percentOf(unrealizedPnl, totalCost),
      realizedPnl,
      realizedPnlPct: percentOf(realizedPnl, totalCost),
      totalCost,
      priceDate,
      isStalePrice,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    });

    this.logger.log(
      `${existing ? 'Updated' : 'Created'} snapshot ${accountId}/${symbol}/${valuationDate}: ` +
        `unrealized ${unrealizedPnl.toFixed(2)}, realized ${realizedPnl.toFixed(2)}`,
    );
    return snapshot;
  }

  /**
   * Values a position at whatever the price feed reports for the date.
   * @throws PriceNotFoundError when the feed has no close on or before it
   */
  snapshotFromFeed(accountId: string, symbol: string, valuationDate: string): DailyPnlSnapshot {
    this.assertDate('valuationDate', valuationDate);
    const quote = this.priceFeed.priceFor(symbol, valuationDate);
    if (!quote) {
      throw new PriceNotFoundError(symbol, valuationDate);
    }
    return this.snapshotValuation(accountId, symbol, valuationDate, {
      price: quote.price,
      priceDate: quote.observedDate,
    });
  }

  /**
   * One feed-priced snapshot per calendar day. Days with nothing held and
   * days the feed cannot price yet are skipped.
   */
  snapshotRange(accountId: string, symbol: string, startDate: string, endDate: string): DailyPnlSnapshot[] {
    this.assertDate('startDate', startDate);
    this.assertDate('endDate', endDate);
    if (startDate > endDate) {
      throw ValidationError.forField('startDate', 'notAfter', 'startDate must not be after endDate');
    }

    const days = eachDay(startDate, endDate);
    if (days.length > this.config.maxValuationRangeDays) {
      throw ValidationError.forField(
        'endDate',
        'maxRange',
        `range must not exceed ${this.config.maxValuationRangeDays} days`,
      );
    }
    if (!this.ledgerQuery.getPosition(accountId, symbol)) {
      throw new PositionNotFoundError(accountId, symbol);
    }

    const snapshots: DailyPnlSnapshot[] = [];
    for (const day of days) {
      if (this.ledgerQuery.getPositionAsOf(accountId, symbol, day).quantity.isZero()) {
        this.logger.debug(`Nothing held in ${symbol} on ${day}, skipped`);
      } else if (this.priceFeed.priceFor(symbol, day)) {
        snapshots.push(this.snapshotFromFeed(accountId, symbol, day));
      } else {
        this.logger.debug(`No price for ${symbol} on or before ${day}, skipped`);
      }
    }
    return snapshots;
  }

  /**
   * Values every symbol held at the end of `asOfDate` through the price
   * feed and totals them. Realized P&L also counts symbols since sold out.
   */
  getPortfolioSummary(accountId: string, asOfDate: string): PortfolioSummary {
    this.assertDate('asOfDate', asOfDate);

    const positions: PositionValuation[] = [];
    let totalRealizedPnl = ZERO;

    for (const { symbol } of this.ledgerQuery.getPositions(accountId)) {
      const realizedPnl = this.ledgerQuery.getRealizedPnl(accountId, symbol, asOfDate);
      totalRealizedPnl = totalRealizedPnl.plus(realizedPnl);

      const figures = this.ledgerQuery.getPositionAsOf(accountId, symbol, asOfDate);
      if (figures.quantity.isZero()) {
        continue;
      }
      positions.push(this.valuePosition(figures, realizedPnl, asOfDate));
    }

    const priced = positions.filter((position) => position.unrealizedPnl !== undefined);
    const totalCost = sum(positions.map((position) => position.totalCost));
    const pricedCost = sum(priced.map((position) => position.totalCost));
    const totalMarketValue = sum(priced.map((position) => position.marketValue ?? ZERO));
    const totalUnrealizedPnl = totalMarketValue.minus(pricedCost);
    const unpricedSymbols = positions
      .filter((position) => position.unrealizedPnl === undefined)
      .map((position) => position.symbol);

    if (unpricedSymbols.length > 0) {
      this.logger.warn(`No price on or before ${asOfDate} for ${unpricedSymbols.join(', ')}`);
    }

    return {
      accountId,
      asOfDate,
      totalPositions: positions.length,
      totalCost,
      totalMarketValue,
      totalUnrealizedPnl,
      totalUnrealizedPnlPct: percentOf(totalUnrealizedPnl, pricedCost),
      totalRealizedPnl,
      unpricedSymbols,
      positions,
    };
  }

  /** Stored snapshots ordered by symbol, then valuation date */
  getSnapshots(accountId: string, filter: SnapshotFilter = {}): DailyPnlSnapshot[] {
    return this.storage
      .getSnapshots(accountId, filter.symbol)
      .filter((snapshot) => isWithin(snapshot.valuationDate, filter.startDate, filter.endDate))
      .sort((a, b) =>
        a.symbol === b.symbol
          ? a.valuationDate.localeCompare(b.valuationDate)
          : a.symbol.localeCompare(b.symbol),
      );
  }

  private valuePosition(figures: PositionFigures, realizedPnl: Decimal, asOfDate: string): PositionValuation {
    const base = {
      symbol: figures.symbol,
      quantity: figures.quantity,
      avgCost: figures.avgCost,
      totalCost: figures.totalCost,
      realizedPnl,
      firstBuyDate: figures.firstBuyDate,
      lastTransactionDate: figures.lastTransactionDate,
    };

    const quote = this.priceFeed.priceFor(figures.symbol, asOfDate);
    if (!quote) {
      return { ...base, isStalePrice: false };
    }

    const marketPrice = toDecimal(quote.price);
    const marketValue = figures.quantity.times(marketPrice);
    const unrealizedPnl = marketValue.minus(figures.totalCost);
    return {
      ...base,
      marketPrice,
      marketValue,
      unrealizedPnl,
      unrealizedPnlPct: percentOf(unrealizedPnl, figures.totalCost),
      priceDate: quote.observedDate,
      isStalePrice: quote.observedDate !== asOfDate,
    };
  }

  private assertDate(property: string, value: string): void {
    if (!isCalendarDate(value)) {
      throw ValidationError.forField(property, 'isCalendarDate', `${property} must be a valid YYYY-MM-DD date`);
    }
  }
}
