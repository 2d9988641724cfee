import { Global, Module } from '@nestjs/common';
import { LEDGER_CONFIG, loadLedgerConfig } from './ledger.config';

@Global()
@Module({
  providers: [
    {
      provide: LEDGER_CONFIG,
      useFactory: () => loadLedgerConfig(),
    },
  ],
  exports: [LEDGER_CONFIG],
})
export class LedgerConfigModule {}
