import { Module } from '@nestjs/common';
import { ValuationController } from './valuation.controller';
import { ValuationService } from './valuation.service';
import { LedgerModule } from '../ledger/ledger.module';
import { MarketPriceModule } from '../market-price/market-price.module';

@Module({
  imports: [LedgerModule, MarketPriceModule], // committed positions + price feed
  controllers: [ValuationController],
  providers: [ValuationService],
})
export class ValuationModule {}
