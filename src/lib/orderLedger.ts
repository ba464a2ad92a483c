/**
 * Order Ledger
 *
 * Owns every live order by identifier and is the single source of truth for
 * order attributes and remaining quantity. Price levels hold identifiers
 * only; whatever they reference must be found here.
 *
 * Identifiers released by a fill or a cancel stay reserved until the next
 * `clear()` (Flush), so they cannot be reused for a different order.
 */

import type { Decimal } from "decimal.js";
import type { RestingOrder } from "./book-common";
import { DuplicateIdentifierError, InvariantViolationError, UnknownOrderError } from "./errors";

export interface DecrementResult {
  order: RestingOrder;
  /** True when remaining reached 0 and the order left the ledger */
  removed: boolean;
}

export class OrderLedger {
  private readonly orders = new Map<string, RestingOrder>();
  private readonly released = new Set<string>();

  get size(): number {
    return this.orders.size;
  }

  /** Live order present */
  has(orderId: string): boolean {
    return this.orders.has(orderId);
  }

  /** Live, or released since the last flush */
  isKnown(orderId: string): boolean {
    return this.orders.has(orderId) || this.released.has(orderId);
  }

  insert(order: RestingOrder): void {
    if (this.isKnown(order.orderId)) {
      throw new DuplicateIdentifierError(order.orderId);
    }
    if (order.remainingQty.lte(0) || order.remainingQty.gt(order.originalQty)) {
      throw new InvariantViolationError(
        `Order ${order.orderId} inserted with remaining ${order.remainingQty.toFixed()} of ${order.originalQty.toFixed()}`
      );
    }
    this.orders.set(order.orderId, order);
  }

  get(orderId: string): RestingOrder {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new UnknownOrderError(orderId);
    }
    return order;
  }

  find(orderId: string): RestingOrder | undefined {
    return this.orders.get(orderId);
  }

  remove(orderId: string): RestingOrder {
    const order = this.get(orderId);
    this.orders.delete(orderId);
    this.released.add(orderId);
    return order;
  }

  /**
   * Reserve an identifier that never rested (a taker filled in full on entry).
   */
  retire(orderId: string): void {
    if (this.isKnown(orderId)) {
      throw new DuplicateIdentifierError(orderId);
    }
    this.released.add(orderId);
  }

  decrement(orderId: string, qty: Decimal): DecrementResult {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new InvariantViolationError(`Decrement of unknown order ${orderId}`);
    }
    if (qty.lte(0)) {
      throw new InvariantViolationError(`Decrement of ${orderId} by non-positive ${qty.toFixed()}`);
    }
    if (qty.gt(order.remainingQty)) {
      throw new InvariantViolationError(
        `Decrement of ${orderId} by ${qty.toFixed()} exceeds remaining ${order.remainingQty.toFixed()}`
      );
    }

    const remainingQty = order.remainingQty.minus(qty);
    if (!remainingQty.plus(qty).eq(order.remainingQty)) {
      throw new InvariantViolationError(
        `Decrement of ${orderId} by ${qty.toFixed()} from ${order.remainingQty.toFixed()} lost precision`
      );
    }
    order.remainingQty = remainingQty;
    if (order.remainingQty.isZero()) {
      this.orders.delete(orderId);
      this.released.add(orderId);
      return { order, removed: true };
    }
    return { order, removed: false };
  }

  values(): IterableIterator<RestingOrder> {
    return this.orders.values();
  }

  clear(): void {
    this.orders.clear();
    this.released.clear();
  }
}
