/**
 * Order Book Common Types
 *
 * Shared vocabulary for the ledger, the price ladder, the matching engine
 * and the command processor: sides, resting orders, inbound commands and
 * the outcome records emitted for every command.
 */

import { Decimal } from "decimal.js";

/** Significant digits every price and quantity must fit in exactly */
export const MAX_SIGNIFICANT_DIGITS = 28;

Decimal.set({
  precision: MAX_SIGNIFICANT_DIGITS,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -28,
  toExpPos: 28,
});

// ============================================================================
// Sides
// ============================================================================

export type Side = "BUY" | "SELL";

export const SIDES: readonly Side[] = ["BUY", "SELL"];

export function oppositeSide(side: Side): Side {
  return side === "BUY" ? "SELL" : "BUY";
}

// ============================================================================
// Orders
// ============================================================================

/**
 * A live order owned by the ledger. Price levels only ever reference it
 * by `orderId`.
 */
export interface RestingOrder {
  /** Caller-supplied identifier, unique for the lifetime of the book */
  orderId: string;
  side: Side;
  /** Limit price */
  price: Decimal;
  /** Quantity submitted with the New command */
  originalQty: Decimal;
  /** Quantity still open; 0 < remainingQty <= originalQty while live */
  remainingQty: Decimal;
  /** Arrival sequence number, the time-priority tie-break */
  sequence: number;
}

/**
 * An incoming order handed to the matching engine after validation.
 */
export interface TakerOrder {
  orderId: string;
  side: Side;
  price: Decimal;
  qty: Decimal;
  sequence: number;
}

// ============================================================================
// Commands
// ============================================================================

export interface NewOrderCommand {
  type: "NEW";
  orderId: string;
  side: Side;
  price: Decimal;
  qty: Decimal;
}

export interface CancelOrderCommand {
  type: "CANCEL";
  orderId: string;
}

export interface FlushBookCommand {
  type: "FLUSH";
}

export type BookCommand = NewOrderCommand | CancelOrderCommand | FlushBookCommand;

// ============================================================================
// Outcome Records
// ============================================================================

export type RejectReason =
  | "INVALID_QUANTITY"
  | "INVALID_PRICE"
  | "INVALID_IDENTIFIER"
  | "DUPLICATE_IDENTIFIER"
  | "UNKNOWN_ORDER";

export interface AckRecord {
  type: "ACK";
  orderId: string;
  /** Quantity executed on entry */
  filledQty: Decimal;
  /** Quantity left resting on the book, 0 when fully filled */
  restingQty: Decimal;
}

export interface TradeRecord {
  type: "TRADE";
  takerOrderId: string;
  makerOrderId: string;
  /** Always the maker's resting price */
  price: Decimal;
  qty: Decimal;
}

export interface CancelledRecord {
  type: "CANCELLED";
  orderId: string;
  /** Open quantity withdrawn from the book by the cancel */
  remainingQty: Decimal;
}

export interface FlushedRecord {
  type: "FLUSHED";
}

export interface RejectedRecord {
  type: "REJECTED";
  /** null only when the command carried no usable identifier */
  orderId: string | null;
  reason: RejectReason;
}

export interface TopOfBookRecord {
  type: "TOP_OF_BOOK";
  side: Side;
  /** null when the side is empty */
  price: Decimal | null;
  /** Aggregate open quantity at the best price */
  totalQty: Decimal;
}

export type OutcomeRecord =
  | AckRecord
  | TradeRecord
  | CancelledRecord
  | FlushedRecord
  | RejectedRecord
  | TopOfBookRecord;

// ============================================================================
// Helpers
// ============================================================================

export const ZERO = new Decimal(0);

/**
 * Normalized map key for a price, so that 100, 100.0 and 1e2 share a level.
 */
export function priceKey(price: Decimal): string {
  return price.toFixed();
}

/**
 * True when `value` is held exactly at the configured precision. Differences
 * between such integers never round, so fills stay conserved.
 */
export function fitsPrecision(value: Decimal): boolean {
  return value.sd(true) <= MAX_SIGNIFICANT_DIGITS;
}

export function toDecimal(value: number | string | Decimal): Decimal {
  return value instanceof Decimal ? value : new Decimal(value);
}
