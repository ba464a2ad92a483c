/**
 * CLOB (Central Limit Order Book) Engine - Command Processor
 *
 * Consumes a strictly ordered stream of commands and returns, for each one,
 * the outcome records it produced:
 * - NEW: zero or more TRADE records in execution order, then one ACK
 * - CANCEL: CANCELLED, or REJECTED(UNKNOWN_ORDER)
 * - FLUSH: FLUSHED
 * Invalid commands produce a single REJECTED record and leave the book untouched.
 *
 * All state lives in the BookState passed in; the engine itself only holds
 * options and the optional audit journal. One BookState per instrument.
 */

import { Decimal } from "decimal.js";
import {
  SIDES,
  ZERO,
  fitsPrecision,
  toDecimal,
  type BookCommand,
  type CancelOrderCommand,
  type FlushBookCommand,
  type NewOrderCommand,
  type OutcomeRecord,
  type RejectReason,
  type RejectedRecord,
  type Side,
  type TopOfBookRecord,
} from "./book-common";
import type { BookLogger } from "./bookLogger";
import { InvariantViolationError } from "./errors";
import { createBookState, matchIncoming, type BookState } from "./matching";

export interface CLOBEngineOptions {
  /** Emit TOP_OF_BOOK after any command that changes a side's best level */
  emitTopOfBook?: boolean;
  /** Audit journal; nothing is journaled when omitted */
  logger?: BookLogger;
}

/** Aggregates at the best level can outgrow the per-order precision */
const AggregateDecimal = Decimal.clone({ precision: 1000 });

interface TopOfBook {
  price: Decimal | null;
  totalQty: Decimal;
}

// ============================================================================
// Command builders
// ============================================================================

export function newOrder(
  orderId: string,
  side: Side,
  price: number | string | Decimal,
  qty: number | string | Decimal
): NewOrderCommand {
  return { type: "NEW", orderId, side, price: toDecimal(price), qty: toDecimal(qty) };
}

export function cancelOrder(orderId: string): CancelOrderCommand {
  return { type: "CANCEL", orderId };
}

export function flushBook(): FlushBookCommand {
  return { type: "FLUSH" };
}

// ============================================================================
// CLOB Engine
// ============================================================================

export class CLOBEngine {
  private readonly emitTopOfBook: boolean;
  private readonly logger?: BookLogger;

  constructor(options: CLOBEngineOptions = {}) {
    this.emitTopOfBook = options.emitTopOfBook ?? false;
    this.logger = options.logger;
  }

  initBook(): BookState {
    return createBookState();
  }

  process(book: BookState, command: BookCommand): OutcomeRecord[] {
    const before = this.emitTopOfBook ? this._snapshotTops(book) : undefined;

    let records: OutcomeRecord[];
    switch (command.type) {
      case "NEW":
        records = this._submit(book, command);
        break;
      case "CANCEL":
        records = this._cancel(book, command);
        break;
      case "FLUSH":
        records = this._flush(book);
        break;
      default:
        return assertNever(command);
    }

    if (before) {
      records.push(...this._topOfBookChanges(book, before));
    }
    return records;
  }

  processAll(book: BookState, commands: Iterable<BookCommand>): OutcomeRecord[] {
    const records: OutcomeRecord[] = [];
    for (const command of commands) {
      records.push(...this.process(book, command));
    }
    return records;
  }

  getLogger(): BookLogger | undefined {
    return this.logger;
  }

  // -------------------------------------------------------------------------
  // Command handlers
  // -------------------------------------------------------------------------

  private _submit(book: BookState, command: NewOrderCommand): OutcomeRecord[] {
    const { orderId, side, price, qty } = command;

    if (orderId.trim().length === 0) {
      return [this._reject(null, "INVALID_IDENTIFIER")];
    }
    if (!qty.isFinite() || !qty.isInteger() || qty.lte(0) || !fitsPrecision(qty)) {
      return [this._reject(orderId, "INVALID_QUANTITY")];
    }
    if (!price.isFinite() || price.lte(0) || !fitsPrecision(price)) {
      return [this._reject(orderId, "INVALID_PRICE")];
    }
    if (book.ledger.isKnown(orderId)) {
      return [this._reject(orderId, "DUPLICATE_IDENTIFIER")];
    }

    const sequence = book.nextSequence++;
    const result = matchIncoming(book, { orderId, side, price, qty, sequence });

    for (const trade of result.trades) {
      this.logger?.logTrade(trade);
    }
    this.logger?.logOrderAccepted({ orderId, side, price, qty, sequence }, result.filledQty, result.restingQty);

    return [
      ...result.trades,
      { type: "ACK", orderId, filledQty: result.filledQty, restingQty: result.restingQty },
    ];
  }

  private _cancel(book: BookState, command: CancelOrderCommand): OutcomeRecord[] {
    const { orderId } = command;

    if (orderId.trim().length === 0) {
      return [this._reject(null, "INVALID_IDENTIFIER")];
    }

    const order = book.ledger.find(orderId);
    if (!order) {
      return [this._reject(orderId, "UNKNOWN_ORDER")];
    }

    book.ledger.remove(orderId);
    book.ladder.remove(order.side, order.price, orderId);

    this.logger?.logOrderCancelled(orderId, order.remainingQty);
    return [{ type: "CANCELLED", orderId, remainingQty: order.remainingQty }];
  }

  private _flush(book: BookState): OutcomeRecord[] {
    if (this.logger) {
      const bestBid = book.ladder.peekBest("BUY");
      const bestAsk = book.ladder.peekBest("SELL");
      this.logger.logBookFlushed({
        ordersCleared: book.ledger.size,
        bidOrders: book.ladder.bids.orderCount,
        askOrders: book.ladder.asks.orderCount,
        spread: bestBid && bestAsk ? { bid: bestBid.price, ask: bestAsk.price } : null,
      });
    }

    book.ledger.clear();
    book.ladder.clear();

    return [{ type: "FLUSHED" }];
  }

  private _reject(orderId: string | null, reason: RejectReason): RejectedRecord {
    this.logger?.logOrderRejected(orderId, reason);
    return { type: "REJECTED", orderId, reason };
  }

  // -------------------------------------------------------------------------
  // Top of book
  // -------------------------------------------------------------------------

  private _topOfBook(book: BookState, side: Side): TopOfBook {
    const level = book.ladder.peekBest(side);
    if (!level) {
      return { price: null, totalQty: ZERO };
    }

    let totalQty: Decimal = new AggregateDecimal(0);
    for (const orderId of level.orderIds) {
      const order = book.ledger.find(orderId);
      if (!order) {
        throw new InvariantViolationError(`Order ${orderId} rests on the ladder but is missing from the ledger`);
      }
      totalQty = totalQty.plus(order.remainingQty);
    }
    return { price: level.price, totalQty };
  }

  private _snapshotTops(book: BookState): Map<Side, TopOfBook> {
    const tops = new Map<Side, TopOfBook>();
    for (const side of SIDES) {
      tops.set(side, this._topOfBook(book, side));
    }
    return tops;
  }

  private _topOfBookChanges(book: BookState, before: Map<Side, TopOfBook>): TopOfBookRecord[] {
    const changes: TopOfBookRecord[] = [];
    for (const side of SIDES) {
      const previous = before.get(side);
      const current = this._topOfBook(book, side);
      if (previous && sameTop(previous, current)) continue;
      changes.push({ type: "TOP_OF_BOOK", side, price: current.price, totalQty: current.totalQty });
    }
    return changes;
  }
}

function sameTop(a: TopOfBook, b: TopOfBook): boolean {
  const samePrice = a.price === null || b.price === null ? a.price === b.price : a.price.eq(b.price);
  return samePrice && a.totalQty.eq(b.totalQty);
}

function assertNever(command: never): never {
  throw new InvariantViolationError(`Unhandled command ${JSON.stringify(command)}`);
}

export type { BookState } from "./matching";
export { createBookState } from "./matching";
