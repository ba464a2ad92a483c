/**
 * In-memory audit journal for the order book.
 *
 * Records what the processor did, command by command, with wall-clock
 * timestamps. Purely observational: the outcome records are the contract,
 * the journal is for humans and post-run inspection.
 */

import type { Decimal } from "decimal.js";
import type { RejectReason, RestingOrder, Side, TradeRecord } from "./book-common";

export type BookLogEntry =
  | {
      type: "ORDER_ACCEPTED";
      data: {
        orderId: string;
        side: Side;
        price: Decimal;
        qty: Decimal;
        sequence: number;
        filledQty: Decimal;
        restingQty: Decimal;
        timestamp: string;
      };
    }
  | { type: "ORDER_REJECTED"; data: { orderId: string | null; reason: RejectReason; timestamp: string } }
  | { type: "ORDER_CANCELLED"; data: { orderId: string; remainingQty: Decimal; timestamp: string } }
  | { type: "TRADE"; data: TradeRecord & { timestamp: string } }
  | { type: "BOOK_FLUSHED"; data: BookFlushSummary & { timestamp: string } };

export interface BookFlushSummary {
  ordersCleared: number;
  bidOrders: number;
  askOrders: number;
  /** Best bid and best ask just before the flush; null when either side was empty */
  spread: { bid: Decimal; ask: Decimal } | null;
}

export class BookLogger {
  private logs: BookLogEntry[] = [];

  logOrderAccepted(
    order: Pick<RestingOrder, "orderId" | "side" | "price" | "sequence"> & { qty: Decimal },
    filledQty: Decimal,
    restingQty: Decimal
  ): void {
    const timestamp = new Date().toISOString();
    this.logs.push({
      type: "ORDER_ACCEPTED",
      data: {
        orderId: order.orderId,
        side: order.side,
        price: order.price,
        qty: order.qty,
        sequence: order.sequence,
        filledQty,
        restingQty,
        timestamp,
      },
    });
  }

  logOrderRejected(orderId: string | null, reason: RejectReason): void {
    const timestamp = new Date().toISOString();
    this.logs.push({ type: "ORDER_REJECTED", data: { orderId, reason, timestamp } });
  }

  logOrderCancelled(orderId: string, remainingQty: Decimal): void {
    const timestamp = new Date().toISOString();
    this.logs.push({ type: "ORDER_CANCELLED", data: { orderId, remainingQty, timestamp } });
  }

  logTrade(trade: TradeRecord): void {
    const timestamp = new Date().toISOString();
    this.logs.push({ type: "TRADE", data: { ...trade, timestamp } });
  }

  logBookFlushed(summary: BookFlushSummary): void {
    const timestamp = new Date().toISOString();
    this.logs.push({ type: "BOOK_FLUSHED", data: { ...summary, timestamp } });
  }

  getLogs(): readonly BookLogEntry[] {
    return this.logs;
  }

  exportJson(): string {
    return JSON.stringify(this.logs, null, 2);
  }

  clear(): void {
    this.logs = [];
  }
}
