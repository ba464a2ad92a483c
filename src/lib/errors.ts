/**
 * Error classes for the order book and its line adapter
 */

import type { Side } from "./book-common";

export type OrderBookErrorCode =
  | "DUPLICATE_IDENTIFIER"
  | "UNKNOWN_ORDER"
  | "EMPTY_SIDE"
  | "INVARIANT_VIOLATION"
  | "MALFORMED_COMMAND"
  | "CONFIG_INVALID";

/**
 * Base class; `code` lets callers branch without instanceof chains.
 */
export class OrderBookError extends Error {
  constructor(
    public readonly code: OrderBookErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "OrderBookError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class DuplicateIdentifierError extends OrderBookError {
  constructor(public readonly orderId: string) {
    super("DUPLICATE_IDENTIFIER", `Order ${orderId} already exists or was used since the last flush`);
    this.name = "DuplicateIdentifierError";
  }
}

export class UnknownOrderError extends OrderBookError {
  constructor(public readonly orderId: string) {
    super("UNKNOWN_ORDER", `Order ${orderId} not found`);
    this.name = "UnknownOrderError";
  }
}

export class EmptySideError extends OrderBookError {
  constructor(public readonly side: Side) {
    super("EMPTY_SIDE", `No resting orders on the ${side} side`);
    this.name = "EmptySideError";
  }
}

/**
 * Ledger and ladder disagree, or a fill exceeds what is open. This is a bug,
 * never a user input problem; the processor does not catch it.
 */
export class InvariantViolationError extends OrderBookError {
  constructor(message: string) {
    super("INVARIANT_VIOLATION", message);
    this.name = "InvariantViolationError";
  }
}

export class MalformedCommandError extends OrderBookError {
  constructor(
    message: string,
    public readonly lineNumber: number,
    public readonly line: string,
  ) {
    super("MALFORMED_COMMAND", `line ${lineNumber}: ${message}`);
    this.name = "MalformedCommandError";
  }
}

export class ConfigError extends OrderBookError {
  constructor(
    message: string,
    public readonly fieldErrors: Record<string, string[] | undefined> = {},
  ) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}
