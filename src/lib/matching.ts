/**
 * Matching Engine
 *
 * Resolves a newly submitted limit order against the opposite side of the
 * book under price-time priority, then rests whatever is left.
 *
 * Executions always happen at the maker's resting price, so a taker that
 * crosses deeper than the best level gets the better price.
 */

import { Decimal } from "decimal.js";
import {
  ZERO,
  oppositeSide,
  type Side,
  type TakerOrder,
  type TradeRecord,
} from "./book-common";
import { InvariantViolationError } from "./errors";
import { OrderLedger } from "./orderLedger";
import { PriceLadder } from "./priceLadder";

/**
 * The explicit Order Book context: ledger, ladder and the arrival sequence
 * counter travel together and are passed to every operation.
 */
export interface BookState {
  ledger: OrderLedger;
  ladder: PriceLadder;
  /** Next arrival sequence number; never reset, not even by a flush */
  nextSequence: number;
}

export function createBookState(): BookState {
  return {
    ledger: new OrderLedger(),
    ladder: new PriceLadder(),
    nextSequence: 1,
  };
}

export interface MatchResult {
  trades: TradeRecord[];
  filledQty: Decimal;
  restingQty: Decimal;
}

/**
 * Whether a taker at `takerPrice` may trade with a level at `levelPrice`.
 */
export function crosses(takerSide: Side, takerPrice: Decimal, levelPrice: Decimal): boolean {
  return takerSide === "BUY" ? levelPrice.lte(takerPrice) : levelPrice.gte(takerPrice);
}

export function matchIncoming(book: BookState, taker: TakerOrder): MatchResult {
  const { ledger, ladder } = book;
  const opposite = ladder.side(oppositeSide(taker.side));
  const trades: TradeRecord[] = [];
  let remainingQty = taker.qty;

  while (remainingQty.gt(0)) {
    const level = opposite.peekBest();
    if (!level || !crosses(taker.side, taker.price, level.price)) break;

    const oldest = level.orderIds.values().next();
    if (oldest.done) {
      throw new InvariantViolationError(`Empty level ${level.price.toFixed()} left on ${opposite.side}`);
    }
    const makerId = oldest.value;
    const maker = ledger.find(makerId);
    if (!maker) {
      throw new InvariantViolationError(`Order ${makerId} rests on the ladder but is missing from the ledger`);
    }
    if (maker.side !== opposite.side || !maker.price.eq(level.price)) {
      throw new InvariantViolationError(`Order ${makerId} recorded at ${maker.side} ${maker.price.toFixed()} but rests at ${opposite.side} ${level.price.toFixed()}`);
    }

    const tradeQty = Decimal.min(remainingQty, maker.remainingQty);
    trades.push({
      type: "TRADE",
      takerOrderId: taker.orderId,
      makerOrderId: makerId,
      price: maker.price,
      qty: tradeQty,
    });

    remainingQty = remainingQty.minus(tradeQty);
    const { removed } = ledger.decrement(makerId, tradeQty);
    if (removed) {
      const popped = opposite.popFront(level.price);
      if (popped !== makerId) {
        throw new InvariantViolationError(`Popped ${popped} while filling ${makerId}`);
      }
    }
  }

  if (remainingQty.gt(0)) {
    ledger.insert({
      orderId: taker.orderId,
      side: taker.side,
      price: taker.price,
      originalQty: taker.qty,
      remainingQty,
      sequence: taker.sequence,
    });
    ladder.rest(taker.side, taker.price, taker.orderId);
  } else {
    ledger.retire(taker.orderId);
  }

  return {
    trades,
    filledQty: taker.qty.minus(remainingQty),
    restingQty: remainingQty.gt(0) ? remainingQty : ZERO,
  };
}
