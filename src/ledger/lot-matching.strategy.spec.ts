import Decimal from 'decimal.js';
import { FifoLotMatchingStrategy, fifoOrder } from './lot-matching.strategy';
import { PositionLot } from './entities/position-lot.entity';
import { InsufficientLotsError } from '../common/errors/ledger.errors';

describe('FifoLotMatchingStrategy', () => {
  const strategy = new FifoLotMatchingStrategy();
  let sequence = 0;

  const createTestLot = (overrides: Partial<PositionLot> = {}): PositionLot => {
    sequence += 1;
    return {
      id: `lot-${sequence}`,
      sequence,
      accountId: 'acct-1',
      symbol: 'AAPL',
      transactionId: `tx-${sequence}`,
      originalQuantity: new Decimal(10),
      remainingQuantity: new Decimal(10),
      costBasis: new Decimal(100),
      purchaseDate: '2023-01-01',
      isClosed: false,
      ...overrides,
    };
  };

  beforeEach(() => {
    sequence = 0;
  });

  it('should report FIFO as its method', () => {
    expect(strategy.method).toBe('FIFO');
  });

  it('should take whole lots before touching the next one', () => {
    const older = createTestLot({ purchaseDate: '2023-01-01' });
    const newer = createTestLot({ purchaseDate: '2023-01-02' });

    const slices = strategy.match('AAPL', [newer, older], new Decimal(15));

    expect(slices.map((slice) => slice.lot.id)).toEqual([older.id, newer.id]);
    expect(slices.map((slice) => slice.quantity.toNumber())).toEqual([10, 5]);
  });

  it('should stop once the quantity is covered', () => {
    const lots = [createTestLot(), createTestLot(), createTestLot()];

    const slices = strategy.match('AAPL', lots, new Decimal(10));

    expect(slices).toHaveLength(1);
    expect(slices[0].lot.id).toBe('lot-1');
  });

  it('should skip closed and exhausted lots', () => {
    const closed = createTestLot({ remainingQuantity: new Decimal(0), isClosed: true });
    const open = createTestLot({ remainingQuantity: new Decimal(4) });

    const slices = strategy.match('AAPL', [closed, open], new Decimal(4));

    expect(slices.map((slice) => slice.lot.id)).toEqual([open.id]);
  });

  it('should handle fractional quantities exactly', () => {
    const lot = createTestLot({ originalQuantity: new Decimal('0.3'), remainingQuantity: new Decimal('0.3') });

    const slices = strategy.match('AAPL', [lot], new Decimal('0.1').plus('0.2'));

    expect(slices[0].quantity.toString()).toBe('0.3');
  });

  it('should throw when open lots cannot cover the sale', () => {
    const lots = [createTestLot({ remainingQuantity: new Decimal(3) })];

    expect(() => strategy.match('AAPL', lots, new Decimal(5))).toThrow(InsufficientLotsError);
    expect(() => strategy.match('AAPL', lots, new Decimal(5))).toThrow(
      'Insufficient open lots for AAPL. Available: 3, Requested: 5',
    );
  });

  it('should not mutate the lots it is given', () => {
    const lot = createTestLot();

    strategy.match('AAPL', [lot], new Decimal(6));

    expect(lot.remainingQuantity.toNumber()).toBe(10);
    expect(lot.isClosed).toBe(false);
  });

  describe('fifoOrder', () => {
    it('should order by purchase date, then sequence', () => {
      const a = createTestLot({ purchaseDate: '2023-03-01' });
      const b = createTestLot({ purchaseDate: '2023-01-01' });
      const c = createTestLot({ purchaseDate: '2023-01-01' });

      expect([a, c, b].sort(fifoOrder).map((lot) => lot.id)).toEqual([b.id, c.id, a.id]);
    });
  });
});
