/**
 * Line-oriented text format for commands and outcome records.
 *
 * Input, one command per line, comma separated, whitespace around fields ignored:
 *   N, <orderId>, <B|S|BUY|SELL>, <price>, <qty>
 *   C, <orderId>
 *   F
 * Blank lines and lines starting with '#' are skipped.
 *
 * Output, one record per line:
 *   A, <orderId>, <filled>, <resting>
 *   T, <taker>, <maker>, <price>, <qty>
 *   X, <orderId>, <remaining>
 *   F
 *   R, <orderId|->, <REASON>
 *   B, <B|S>, <price|->, <qty>
 *
 * Only syntax is checked here. Sign, range and integrality are the core's
 * business and come back as REJECTED records.
 */

import { Decimal } from "decimal.js";
import type { BookCommand, OutcomeRecord, Side } from "./book-common";
import { MalformedCommandError } from "./errors";

export type ParsedLine =
  | { kind: "command"; command: BookCommand }
  | { kind: "skip" };

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

// ============================================================================
// Parsing
// ============================================================================

export function parseCommandLine(line: string, lineNumber = 1): ParsedLine {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith("#")) {
    return { kind: "skip" };
  }

  const fields = trimmed.split(",").map(field => field.trim());
  const fail = (message: string): never => {
    throw new MalformedCommandError(message, lineNumber, line);
  };

  switch (fields[0].toUpperCase()) {
    case "N": {
      if (fields.length !== 5) {
        fail(`new order takes 4 fields, got ${fields.length - 1}`);
      }
      const [, orderId, sideField, priceField, qtyField] = fields;
      return {
        kind: "command",
        command: {
          type: "NEW",
          orderId,
          side: parseSide(sideField, fail),
          price: parseNumber(priceField, "price", fail),
          qty: parseNumber(qtyField, "quantity", fail),
        },
      };
    }
    case "C": {
      if (fields.length !== 2) {
        fail(`cancel takes 1 field, got ${fields.length - 1}`);
      }
      return { kind: "command", command: { type: "CANCEL", orderId: fields[1] } };
    }
    case "F": {
      if (fields.length !== 1) {
        fail(`flush takes no fields, got ${fields.length - 1}`);
      }
      return { kind: "command", command: { type: "FLUSH" } };
    }
    default:
      return fail(`unknown command type "${fields[0]}"`);
  }
}

function parseSide(field: string, fail: (message: string) => never): Side {
  switch (field.toUpperCase()) {
    case "B":
    case "BUY":
      return "BUY";
    case "S":
    case "SELL":
      return "SELL";
    default:
      return fail(`unknown side "${field}"`);
  }
}

function parseNumber(field: string, name: string, fail: (message: string) => never): Decimal {
  if (!NUMERIC.test(field)) {
    return fail(`${name} "${field}" is not a number`);
  }
  return new Decimal(field);
}

// ============================================================================
// Formatting
// ============================================================================

export function formatRecord(record: OutcomeRecord): string {
  switch (record.type) {
    case "ACK":
      return `A, ${record.orderId}, ${record.filledQty.toFixed()}, ${record.restingQty.toFixed()}`;
    case "TRADE":
      return `T, ${record.takerOrderId}, ${record.makerOrderId}, ${record.price.toFixed()}, ${record.qty.toFixed()}`;
    case "CANCELLED":
      return `X, ${record.orderId}, ${record.remainingQty.toFixed()}`;
    case "FLUSHED":
      return "F";
    case "REJECTED":
      return `R, ${record.orderId ?? "-"}, ${record.reason}`;
    case "TOP_OF_BOOK":
      return `B, ${record.side === "BUY" ? "B" : "S"}, ${record.price ? record.price.toFixed() : "-"}, ${record.totalQty.toFixed()}`;
  }
}
