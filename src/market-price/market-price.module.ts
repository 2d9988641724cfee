import { Module } from '@nestjs/common';
import { MarketPriceService } from './market-price.service';
import { MarketPriceController } from './market-price.controller';
import { PRICE_FEED } from './price-feed.interface';

@Module({
  controllers: [MarketPriceController],
  providers: [
    MarketPriceService,
    { provide: PRICE_FEED, useExisting: MarketPriceService }, // external feeds bind here
  ],
  exports: [MarketPriceService, PRICE_FEED],
})
export class MarketPriceModule {}
