import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { AppController } from './app.controller';
import { LedgerConfigModule } from './common/config/ledger-config.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { LedgerModule } from './ledger/ledger.module';
import { MarketPriceModule } from './market-price/market-price.module';
import { ValuationModule } from './valuation/valuation.module';

@Module({
  imports: [LedgerConfigModule, LedgerModule, MarketPriceModule, ValuationModule],
  controllers: [AppController],
  providers: [{ provide: APP_FILTER, useClass: HttpExceptionFilter }],
})
export class AppModule {}
