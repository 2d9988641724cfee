import { Injectable } from '@nestjs/common';
import { PriceFeed, PriceQuote } from './price-feed.interface';
import { ValidationError } from '../common/errors/ledger.errors';
import { isCalendarDate } from '../common/utils/date.util';

/**
 * In-process price feed backed by recorded daily closes.
 * A lookup returns the latest close on or before the requested date,
 * so gaps (weekends, holidays) backfill from the last known close.
 */
@Injectable()
export class MarketPriceService implements PriceFeed {
  private closes: Map<string, Map<string, number>> = new Map();

  /**
   * Records one close, replacing any earlier value for that day.
   * @throws ValidationError if price <= 0 or the date is not YYYY-MM-DD
   */
  recordClose(symbol: string, date: string, price: number): void {
    this.assertValid(symbol, date, price);
    this.store(symbol, date, price);
  }

  /**
   * Records closes for several symbols on one day. Nothing is stored
   * unless every price is valid.
   */
  recordCloses(date: string, prices: Record<string, number>): void {
    const entries = Object.entries(prices);
    entries.forEach(([symbol, price]) => this.assertValid(symbol, date, price));
    entries.forEach(([symbol, price]) => this.store(symbol, date, price));
  }

  priceFor(symbol: string, date: string): PriceQuote | undefined {
    const history = this.closes.get(symbol);
    if (!history) {
      return undefined;
    }

    let best: PriceQuote | undefined;
    for (const [observedDate, price] of history) {
      if (observedDate <= date && (!best || observedDate > best.observedDate)) {
        best = { price, observedDate };
      }
    }
    return best;
  }

  /** Most recent close regardless of date */
  getLatestClose(symbol: string): PriceQuote | undefined {
    return this.priceFor(symbol, '9999-12-31');
  }

  /** Symbols with at least one recorded close, sorted */
  getAvailableSymbols(): string[] {
    return Array.from(this.closes.keys()).sort();
  }

  /** Forgets every close - test harness only */
  clearAllPrices(): void {
    this.closes.clear();
  }

  private store(symbol: string, date: string, price: number): void {
    let history = this.closes.get(symbol);
    if (!history) {
      history = new Map();
      this.closes.set(symbol, history);
    }
    history.set(date, price);
  }

  private assertValid(symbol: string, date: string, price: number): void {
    if (!Number.isFinite(price) || price <= 0) {
      throw ValidationError.forField('price', 'isPositive', `Price must be positive, got ${price} for ${symbol}`);
    }
    if (!isCalendarDate(date)) {
      throw ValidationError.forField('date', 'isCalendarDate', `Date must be YYYY-MM-DD, got ${date}`);
    }
  }
}
