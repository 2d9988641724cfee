import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { LEDGER_CONFIG, LedgerConfig } from './common/config/ledger.config';
import { createLedgerValidationPipe } from './common/pipes/ledger-validation.pipe';

dotenv.config();

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  app.useGlobalPipes(createLedgerValidationPipe());
  app.enableShutdownHooks();

  const config = app.get<LedgerConfig>(LEDGER_CONFIG);
  await app.listen(config.port);
  Logger.log(`Lot ledger listening on port ${config.port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.message : String(error), undefined, 'Bootstrap');
  process.exit(1);
});
