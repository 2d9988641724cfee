export const PRICE_FEED = Symbol('PRICE_FEED');

export interface PriceQuote {
  price: number;
  observedDate: string;   // may be earlier than the date asked for
}

// Price-feed collaborator: close price by symbol and date, or undefined.
export interface PriceFeed {
  priceFor(symbol: string, date: string): PriceQuote | undefined;
}
