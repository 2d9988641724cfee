import { LedgerTransaction } from '../entities/transaction.entity';
import { Position } from '../entities/position.entity';
import { PositionLot } from '../entities/position-lot.entity';
import { SaleAllocation } from '../entities/sale-allocation.entity';
import { RejectionError } from '../../common/errors/ledger.errors';

// Outcome of recordTransaction; stored so replays return it unchanged.
export interface RecordReceipt {
  transaction: LedgerTransaction;
  position: Position;
  lotsTouched: PositionLot[];       // state right after this transaction
  allocations: SaleAllocation[];    // empty for a BUY
}

export type IngestionResult =
  | { status: 'applied'; receipt: RecordReceipt }
  | { status: 'already_applied'; receipt: RecordReceipt }
  | { status: 'rejected'; reason: string; error: RejectionError };
