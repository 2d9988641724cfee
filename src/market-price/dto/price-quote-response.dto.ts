export class PriceQuoteResponseDto {
  symbol!: string;
  requestedDate!: string;
  price!: number;
  observedDate!: string;
  isStale!: boolean;       // observedDate earlier than requestedDate
}
