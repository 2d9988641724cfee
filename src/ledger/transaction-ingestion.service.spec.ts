import { Test, TestingModule } from '@nestjs/testing';
import { TransactionIngestionService, RecordTransactionInput } from './transaction-ingestion.service';
import { LedgerStorageService } from './ledger-storage.service';
import { LotAllocationService } from './lot-allocation.service';
import { FifoLotMatchingStrategy, LOT_MATCHING_STRATEGY } from './lot-matching.strategy';
import { TransactionSide } from './entities/transaction.entity';
import { DEFAULT_LEDGER_CONFIG, LEDGER_CONFIG } from '../common/config/ledger.config';
import {
  DuplicateTransactionError,
  InsufficientLotsError,
  ValidationError,
} from '../common/errors/ledger.errors';

describe('TransactionIngestionService', () => {
  let service: TransactionIngestionService;
  let storage: LedgerStorageService;
  let externalIdCounter = 1;

  const createTestTransaction = (overrides: RecordTransactionInput = {}): RecordTransactionInput => {
    return {
      accountId: 'acct-1',
      externalId: `ext-${externalIdCounter++}`,
      symbol: 'AAPL',
      side: TransactionSide.BUY,
      quantity: 10,
      price: 100,
      transactionDate: '2023-01-01',
      ...overrides,
    };
  };

  const seedTwoLots = () => {
    service.recordTransaction(createTestTransaction({ quantity: 10, price: 100, transactionDate: '2023-01-01' }));
    service.recordTransaction(createTestTransaction({ quantity: 10, price: 110, transactionDate: '2023-01-02' }));
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LedgerStorageService,
        { provide: LOT_MATCHING_STRATEGY, useClass: FifoLotMatchingStrategy },
        { provide: LEDGER_CONFIG, useValue: DEFAULT_LEDGER_CONFIG },
        LotAllocationService,
        TransactionIngestionService,
      ],
    }).compile();

    service = module.get<TransactionIngestionService>(TransactionIngestionService);
    storage = module.get<LedgerStorageService>(LedgerStorageService);
    externalIdCounter = 1;
  });

  afterEach(() => {
    storage.clearAllData();
  });

  describe('BUY', () => {
    it('should open one lot and link it to the transaction', () => {
      const result = service.recordTransaction(createTestTransaction());

      expect(result.status).toBe('applied');
      const { transaction, lotsTouched, allocations, position } = result.receipt;
      expect(lotsTouched).toHaveLength(1);
      expect(allocations).toHaveLength(0);
      expect(transaction.lotId).toBe(lotsTouched[0].id);
      expect(lotsTouched[0].transactionId).toBe(transaction.id);
      expect(lotsTouched[0].remainingQuantity.toNumber()).toBe(10);
      expect(lotsTouched[0].isClosed).toBe(false);
      expect(position.quantity.toNumber()).toBe(10);
      expect(position.avgCost.toNumber()).toBe(100);
      expect(position.totalCost.toNumber()).toBe(1000);
      expect(position.isActive).toBe(true);
    });

    it('should fold the commission into the cost basis', () => {
      const result = service.recordTransaction(createTestTransaction({ commission: 5 }));

      expect(result.receipt.lotsTouched[0].costBasis.toNumber()).toBe(100.5);
      expect(result.receipt.position.totalCost.toNumber()).toBe(1005);
    });

    it('should normalize symbol and side to upper case', () => {
      const result = service.recordTransaction(createTestTransaction({ symbol: ' aapl ', side: 'buy' }));

      expect(result.receipt.transaction.symbol).toBe('AAPL');
      expect(result.receipt.transaction.side).toBe(TransactionSide.BUY);
    });

    it('should accept a transaction without externalId', () => {
      service.recordTransaction(createTestTransaction({ externalId: undefined }));
      service.recordTransaction(createTestTransaction({ externalId: undefined }));

      expect(storage.getTransactionCount()).toBe(2);
    });
  });

  describe('SELL', () => {
    it('should consume lots oldest first', () => {
      seedTwoLots();

      const result = service.recordTransaction(
        createTestTransaction({ side: TransactionSide.SELL, quantity: 15, price: 120, transactionDate: '2023-01-03' }),
      );

      const { allocations, lotsTouched, position } = result.receipt;
      expect(allocations.map((a) => a.quantitySold.toNumber())).toEqual([10, 5]);
      expect(allocations.map((a) => a.costBasis.toNumber())).toEqual([100, 110]);
      expect(allocations.map((a) => a.realizedPnl.toNumber())).toEqual([200, 50]);
      expect(lotsTouched.map((lot) => lot.remainingQuantity.toNumber())).toEqual([0, 5]);
      expect(lotsTouched.map((lot) => lot.isClosed)).toEqual([true, false]);
      expect(position.quantity.toNumber()).toBe(5);
      expect(position.avgCost.toNumber()).toBe(110);
      expect(position.totalCost.toNumber()).toBe(550);
      expect(position.openLotCount).toBe(1);
      expect(position.closedLotCount).toBe(1);
    });

    it('should split the sale commission pro-rata across lots', () => {
      seedTwoLots();

      const result = service.recordTransaction(
        createTestTransaction({
          side: TransactionSide.SELL,
          quantity: 15,
          price: 120,
          commission: 3,
          transactionDate: '2023-01-03',
        }),
      );

      const { allocations } = result.receipt;
      expect(allocations.map((a) => a.commissionAllocated.toNumber())).toEqual([2, 1]);
      expect(allocations.map((a) => a.realizedPnl.toNumber())).toEqual([198, 49]);
    });

    it('should order by purchase date, not arrival', () => {
      service.recordTransaction(createTestTransaction({ price: 110, transactionDate: '2023-01-02' }));
      service.recordTransaction(createTestTransaction({ price: 100, transactionDate: '2023-01-01' }));

      const result = service.recordTransaction(
        createTestTransaction({ side: TransactionSide.SELL, quantity: 10, price: 120, transactionDate: '2023-01-03' }),
      );

      expect(result.receipt.allocations).toHaveLength(1);
      expect(result.receipt.allocations[0].costBasis.toNumber()).toBe(100);
      expect(result.receipt.allocations[0].realizedPnl.toNumber()).toBe(200);
    });

    it('should break same-day ties by arrival order', () => {
      service.recordTransaction(createTestTransaction({ quantity: 5, price: 100 }));
      service.recordTransaction(createTestTransaction({ quantity: 5, price: 200 }));

      const result = service.recordTransaction(
        createTestTransaction({ side: TransactionSide.SELL, quantity: 5, price: 150 }),
      );

      expect(result.receipt.allocations[0].costBasis.toNumber()).toBe(100);
      expect(result.receipt.allocations[0].realizedPnl.toNumber()).toBe(250);
    });

    it('should reject an oversell and leave the ledger untouched', () => {
      seedTwoLots();

      expect(() =>
        service.recordTransaction(
          createTestTransaction({ side: TransactionSide.SELL, quantity: 25, price: 120, transactionDate: '2023-01-03' }),
        ),
      ).toThrow('Insufficient open lots for AAPL. Available: 20, Requested: 25');

      expect(storage.getTransactionCount()).toBe(2);
      expect(storage.getAllocations('acct-1')).toHaveLength(0);
      expect(storage.getLots('acct-1', 'AAPL').map((lot) => lot.remainingQuantity.toNumber())).toEqual([10, 10]);
      expect(storage.getPosition('acct-1', 'AAPL')?.quantity.toNumber()).toBe(20);
    });

    it('should reject a sale with no lots at all', () => {
      expect(() =>
        service.recordTransaction(createTestTransaction({ side: TransactionSide.SELL, quantity: 1 })),
      ).toThrow(InsufficientLotsError);
      expect(storage.getTransactionCount()).toBe(0);
    });

    it('should keep a fully closed position with zero quantity', () => {
      service.recordTransaction(createTestTransaction({ transactionDate: '2023-01-01' }));
      const result = service.recordTransaction(
        createTestTransaction({ side: TransactionSide.SELL, quantity: 10, price: 90, transactionDate: '2023-02-01' }),
      );

      const { position } = result.receipt;
      expect(position.quantity.toNumber()).toBe(0);
      expect(position.avgCost.toNumber()).toBe(0);
      expect(position.isActive).toBe(false);
      expect(position.firstBuyDate).toBe('2023-01-01');
      expect(position.lastTransactionDate).toBe('2023-02-01');
      expect(result.receipt.allocations[0].realizedPnl.toNumber()).toBe(-100);
    });
  });

  describe('idempotency', () => {
    it('should return the first receipt when an externalId is replayed', () => {
      const input = createTestTransaction({ externalId: 'broker-42' });
      const first = service.recordTransaction(input);
      const replay = service.recordTransaction({ ...input, notes: 'resent' });

      expect(replay.status).toBe('already_applied');
      expect(replay.receipt.transaction.id).toBe(first.receipt.transaction.id);
      expect(storage.getTransactionCount()).toBe(1);
      expect(storage.getLots('acct-1', 'AAPL')).toHaveLength(1);
    });

    it('should replay a sale without allocating again', () => {
      seedTwoLots();
      const sale = createTestTransaction({
        externalId: 'sale-1',
        side: TransactionSide.SELL,
        quantity: 15,
        price: 120,
        transactionDate: '2023-01-03',
      });

      service.recordTransaction(sale);
      const replay = service.recordTransaction(sale);

      expect(replay.status).toBe('already_applied');
      expect(replay.receipt.allocations).toHaveLength(2);
      expect(storage.getAllocations('acct-1')).toHaveLength(2);
      expect(storage.getPosition('acct-1', 'AAPL')?.quantity.toNumber()).toBe(5);
    });

    it('should reject a replay whose payload differs', () => {
      service.recordTransaction(createTestTransaction({ externalId: 'broker-42', quantity: 10 }));

      let caught: unknown;
      try {
        service.recordTransaction(createTestTransaction({ externalId: 'broker-42', quantity: 11 }));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(DuplicateTransactionError);
      if (caught instanceof DuplicateTransactionError) {
        expect(caught.conflictingFields).toEqual(['quantity']);
        expect(caught.getStatus()).toBe(409);
      }
      expect(storage.getTransactionCount()).toBe(1);
    });

    it('should scope externalId per account', () => {
      service.recordTransaction(createTestTransaction({ externalId: 'shared' }));
      const other = service.recordTransaction(createTestTransaction({ externalId: 'shared', accountId: 'acct-2' }));

      expect(other.status).toBe('applied');
      expect(storage.getTransactionCount()).toBe(2);
    });
  });

  describe('validation', () => {
    const invalidInputs: Array<[string, RecordTransactionInput, string]> = [
      ['zero quantity', { quantity: 0 }, 'quantity'],
      ['negative price', { price: -1 }, 'price'],
      ['negative commission', { commission: -0.5 }, 'commission'],
      ['unknown side', { side: 'HOLD' }, 'side'],
      ['missing account', { accountId: undefined }, 'accountId'],
      ['empty symbol', { symbol: '   ' }, 'symbol'],
      ['non-numeric quantity', { quantity: '10' }, 'quantity'],
      ['badly formatted date', { transactionDate: '01/02/2023' }, 'transactionDate'],
    ];

    it.each(invalidInputs)('should reject %s', (_label, overrides, property) => {
      let caught: unknown;
      try {
        service.recordTransaction(createTestTransaction(overrides));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      if (caught instanceof ValidationError) {
        expect(caught.violations.map((v) => v.property)).toContain(property);
      }
      expect(storage.getTransactionCount()).toBe(0);
    });

    it('should enforce configured limits', () => {
      let caught: unknown;
      try {
        service.recordTransaction(createTestTransaction({ quantity: 20_000_000 }));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      if (caught instanceof ValidationError) {
        expect(caught.violations).toEqual([
          { property: 'quantity', constraints: { limit: 'quantity must not exceed 10000000' } },
        ]);
      }
    });
  });

  describe('commission limit', () => {
    it('should reject a commission above the configured share of the trade value', () => {
      let caught: unknown;
      try {
        service.recordTransaction(createTestTransaction({ quantity: 10, price: 100, commission: 100.01 }));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      if (caught instanceof ValidationError) {
        expect(caught.violations).toEqual([
          { property: 'commission', constraints: { limit: 'commission must not exceed 10% of quantity × price' } },
        ]);
      }
      expect(storage.getTransactionCount()).toBe(0);
    });

    it('should accept a commission exactly at the limit', () => {
      const result = service.recordTransaction(createTestTransaction({ quantity: 10, price: 100, commission: 100 }));

      expect(result.receipt.lotsTouched[0].costBasis.toNumber()).toBe(110);
    });

    it('should apply to sales as well', () => {
      service.recordTransaction(createTestTransaction());

      expect(() =>
        service.recordTransaction(
          createTestTransaction({ side: TransactionSide.SELL, quantity: 1, price: 100, commission: 11 }),
        ),
      ).toThrow('commission must not exceed 10% of quantity × price');
    });
  });

  describe('ingest', () => {
    it('should return a rejected result instead of throwing', () => {
      seedTwoLots();

      const result = service.ingest(
        createTestTransaction({ side: TransactionSide.SELL, quantity: 25, price: 120 }),
      );

      expect(result.status).toBe('rejected');
      if (result.status === 'rejected') {
        expect(result.error).toBeInstanceOf(InsufficientLotsError);
        expect(result.reason).toBe('Insufficient open lots for AAPL. Available: 20, Requested: 25');
      }
    });

    it('should pass applied results through', () => {
      expect(service.ingest(createTestTransaction()).status).toBe('applied');
    });
  });
});
