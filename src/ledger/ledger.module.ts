import { Module } from '@nestjs/common';
import { LedgerController } from './ledger.controller';
import { LedgerStorageService } from './ledger-storage.service';
import { LedgerQueryService } from './ledger-query.service';
import { LotAllocationService } from './lot-allocation.service';
import { TransactionIngestionService } from './transaction-ingestion.service';
import { FifoLotMatchingStrategy, LOT_MATCHING_STRATEGY } from './lot-matching.strategy';

@Module({
  controllers: [LedgerController],
  providers: [
    LedgerStorageService,
    { provide: LOT_MATCHING_STRATEGY, useClass: FifoLotMatchingStrategy }, // swap for other lot methods
    LotAllocationService,
    TransactionIngestionService, // Mutations: validate, dedupe, allocate
    LedgerQueryService,          // Queries: positions, lots, allocations, consistency
  ],
  exports: [LedgerStorageService, LedgerQueryService, TransactionIngestionService],
})
export class LedgerModule {}
