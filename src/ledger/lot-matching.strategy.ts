import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { PositionLot } from './entities/position-lot.entity';
import { InsufficientLotsError } from '../common/errors/ledger.errors';
import { ZERO, sum } from '../common/utils/decimal.util';

export const LOT_MATCHING_STRATEGY = Symbol('LOT_MATCHING_STRATEGY');

export interface LotSlice {
  lot: PositionLot;
  quantity: Decimal;
}

/**
 * Decides which lots a sale consumes and how much from each.
 * Implementations must not mutate the lots they are given.
 */
export interface LotMatchingStrategy {
  readonly method: string;

  /**
   * @throws InsufficientLotsError when the open lots cannot cover `quantity`
   */
  match(symbol: string, lots: PositionLot[], quantity: Decimal): LotSlice[];
}

// Oldest purchase date first; same-day lots in insertion order.
export const fifoOrder = (a: PositionLot, b: PositionLot): number => {
  if (a.purchaseDate !== b.purchaseDate) {
    return a.purchaseDate < b.purchaseDate ? -1 : 1;
  }
  return a.sequence - b.sequence;
};

@Injectable()
export class FifoLotMatchingStrategy implements LotMatchingStrategy {
  readonly method = 'FIFO';

  match(symbol: string, lots: PositionLot[], quantity: Decimal): LotSlice[] {
    const openLots = lots
      .filter((lot) => !lot.isClosed && lot.remainingQuantity.greaterThan(0))
      .sort(fifoOrder);

    const available = sum(openLots.map((lot) => lot.remainingQuantity));
    if (available.lessThan(quantity)) {
      throw new InsufficientLotsError(symbol, quantity, available);
    }

    const slices: LotSlice[] = [];
    let stillToSell = quantity;

    for (const lot of openLots) {
      if (stillToSell.lessThanOrEqualTo(ZERO)) {
        break;
      }
      const taken = Decimal.min(lot.remainingQuantity, stillToSell);
      slices.push({ lot, quantity: taken });
      stillToSell = stillToSell.minus(taken);
    }

    return slices;
  }
}
