import Decimal from 'decimal.js';
import { aggregatePosition } from './position-aggregator';
import { PositionLot } from './entities/position-lot.entity';
import { LedgerTransaction, TransactionSide } from './entities/transaction.entity';

describe('aggregatePosition', () => {
  const lot = (
    id: string,
    purchaseDate: string,
    remaining: number,
    costBasis: number,
    original = 10,
  ): PositionLot => ({
    id,
    sequence: 0,
    accountId: 'acct-1',
    symbol: 'AAPL',
    transactionId: `tx-${id}`,
    originalQuantity: new Decimal(original),
    remainingQuantity: new Decimal(remaining),
    costBasis: new Decimal(costBasis),
    purchaseDate,
    isClosed: remaining === 0,
  });

  const transaction = (id: string, side: TransactionSide, transactionDate: string): LedgerTransaction => ({
    id,
    accountId: 'acct-1',
    symbol: 'AAPL',
    side,
    quantity: new Decimal(1),
    price: new Decimal(1),
    commission: new Decimal(0),
    transactionDate,
    createdAt: new Date(0),
    updatedAt: new Date(0),
  });

  it('should sum open lots and weight the average cost', () => {
    const figures = aggregatePosition(
      'acct-1',
      'AAPL',
      [lot('a', '2023-01-01', 10, 100), lot('b', '2023-01-02', 5, 110)],
      [transaction('1', TransactionSide.BUY, '2023-01-01'), transaction('2', TransactionSide.BUY, '2023-01-02')],
    );

    expect(figures.quantity.toNumber()).toBe(15);
    expect(figures.totalCost.toNumber()).toBe(1550);
    expect(figures.avgCost.toFixed(4)).toBe('103.3333');
    expect(figures.isActive).toBe(true);
    expect(figures.openLotCount).toBe(2);
    expect(figures.closedLotCount).toBe(0);
  });

  it('should ignore closed lots in the totals but count them', () => {
    const figures = aggregatePosition(
      'acct-1',
      'AAPL',
      [lot('a', '2023-01-01', 0, 100), lot('b', '2023-01-02', 5, 110)],
      [],
    );

    expect(figures.quantity.toNumber()).toBe(5);
    expect(figures.avgCost.toNumber()).toBe(110);
    expect(figures.openLotCount).toBe(1);
    expect(figures.closedLotCount).toBe(1);
  });

  it('should give zeros for a fully closed position', () => {
    const figures = aggregatePosition('acct-1', 'AAPL', [lot('a', '2023-01-01', 0, 100)], []);

    expect(figures.quantity.toNumber()).toBe(0);
    expect(figures.avgCost.toNumber()).toBe(0);
    expect(figures.totalCost.toNumber()).toBe(0);
    expect(figures.isActive).toBe(false);
  });

  it('should take the earliest lot and latest transaction dates', () => {
    const figures = aggregatePosition(
      'acct-1',
      'AAPL',
      [lot('a', '2023-02-01', 10, 100), lot('b', '2023-01-15', 0, 90)],
      [
        transaction('1', TransactionSide.BUY, '2023-02-01'),
        transaction('2', TransactionSide.SELL, '2023-03-10'),
        transaction('3', TransactionSide.BUY, '2023-01-15'),
      ],
    );

    expect(figures.firstBuyDate).toBe('2023-01-15');
    expect(figures.lastTransactionDate).toBe('2023-03-10');
  });

  it('should be pure', () => {
    const lots = [lot('a', '2023-01-01', 7, 101)];
    const first = aggregatePosition('acct-1', 'AAPL', lots, []);
    const second = aggregatePosition('acct-1', 'AAPL', lots, []);

    expect(second.quantity.equals(first.quantity)).toBe(true);
    expect(second.totalCost.equals(first.totalCost)).toBe(true);
    expect(lots[0].remainingQuantity.toNumber()).toBe(7);
  });
});
