import { PositionLot } from './entities/position-lot.entity';
import { LedgerTransaction } from './entities/transaction.entity';
import { Position } from './entities/position.entity';
import { safeDivide, sum } from '../common/utils/decimal.util';
import { maxDate, minDate } from '../common/utils/date.util';

export type PositionFigures = Omit<Position, 'id'>;

/**
 * Derives a position from its lots. Pure: the same lots and transactions
 * always give the same figures, whether called after one mutation or many.
 *
 * `firstBuyDate` looks at every lot, closed ones included;
 * `lastTransactionDate` at every transaction for the pair.
 */
export function aggregatePosition(
  accountId: string,
  symbol: string,
  lots: PositionLot[],
  transactions: LedgerTransaction[],
): PositionFigures {
  const openLots = lots.filter((lot) => !lot.isClosed);

  const quantity = sum(openLots.map((lot) => lot.remainingQuantity));
  const totalCost = sum(openLots.map((lot) => lot.remainingQuantity.times(lot.costBasis)));

  const firstBuyDate = lots.map((lot) => lot.purchaseDate).reduce(minDate, lots[0]?.purchaseDate ?? '');
  const lastTransactionDate = transactions
    .map((tx) => tx.transactionDate)
    .reduce(maxDate, transactions[0]?.transactionDate ?? '');

  return {
    accountId,
    symbol,
    quantity,
    avgCost: safeDivide(totalCost, quantity),
    totalCost,
    firstBuyDate,
    lastTransactionDate,
    isActive: quantity.greaterThan(0),
    openLotCount: openLots.length,
    closedLotCount: lots.length - openLots.length,
  };
}
