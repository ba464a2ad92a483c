/**
 * Price Level Ladder
 *
 * Two ordered collections of price levels. Each side keeps:
 * - a Map from normalized price to level, for direct access
 * - a best-first array of prices, searched by bisection
 *
 * Within a level, order identifiers sit in a Set. A Set iterates in
 * insertion order, so the first element is always the oldest arrival and
 * removal by identifier needs no scan.
 *
 * Sorting:
 * - Bids: descending by price (highest first)
 * - Asks: ascending by price (lowest first)
 */

import type { Decimal } from "decimal.js";
import { priceKey, type Side } from "./book-common";
import { EmptySideError, InvariantViolationError } from "./errors";

export interface PriceLevel {
  readonly price: Decimal;
  /** FIFO of resting order identifiers, oldest first */
  readonly orderIds: Set<string>;
}

// ============================================================================
// One side of the book
// ============================================================================

export class SideLadder {
  private readonly levelsByPrice = new Map<string, PriceLevel>();
  /** Best first */
  private readonly prices: Decimal[] = [];

  constructor(readonly side: Side) {}

  get levelCount(): number {
    return this.prices.length;
  }

  get orderCount(): number {
    let count = 0;
    for (const level of this.levelsByPrice.values()) {
      count += level.orderIds.size;
    }
    return count;
  }

  isEmpty(): boolean {
    return this.prices.length === 0;
  }

  rest(price: Decimal, orderId: string): PriceLevel {
    const key = priceKey(price);
    let level = this.levelsByPrice.get(key);
    if (!level) {
      level = { price, orderIds: new Set() };
      this.levelsByPrice.set(key, level);
      this.prices.splice(this.insertionIndex(price), 0, price);
    }
    if (level.orderIds.has(orderId)) {
      throw new InvariantViolationError(`Order ${orderId} already rests at ${key} on ${this.side}`);
    }
    level.orderIds.add(orderId);
    return level;
  }

  peekBest(): PriceLevel | undefined {
    if (this.prices.length === 0) return undefined;
    return this.levelsByPrice.get(priceKey(this.prices[0]));
  }

  best(): PriceLevel {
    const level = this.peekBest();
    if (!level) {
      throw new EmptySideError(this.side);
    }
    return level;
  }

  getLevel(price: Decimal): PriceLevel | undefined {
    return this.levelsByPrice.get(priceKey(price));
  }

  /**
   * Remove and return the oldest identifier at `price`, dropping the level
   * once it is empty.
   */
  popFront(price: Decimal): string {
    const level = this.requireLevel(price);
    const first = level.orderIds.values().next();
    if (first.done) {
      throw new InvariantViolationError(`Empty level ${priceKey(price)} on ${this.side}`);
    }
    level.orderIds.delete(first.value);
    this.dropIfEmpty(level);
    return first.value;
  }

  remove(price: Decimal, orderId: string): void {
    const level = this.requireLevel(price);
    if (!level.orderIds.delete(orderId)) {
      throw new InvariantViolationError(`Order ${orderId} not resting at ${priceKey(price)} on ${this.side}`);
    }
    this.dropIfEmpty(level);
  }

  /** Levels in priority order, best first */
  *levels(): IterableIterator<PriceLevel> {
    for (const price of this.prices) {
      const level = this.levelsByPrice.get(priceKey(price));
      if (level) yield level;
    }
  }

  clear(): void {
    this.levelsByPrice.clear();
    this.prices.length = 0;
  }

  // -------------------------------------------------------------------------
  // Private Helpers
  // -------------------------------------------------------------------------

  /** Negative when `a` has priority over `b` */
  private compare(a: Decimal, b: Decimal): number {
    return this.side === "BUY" ? b.comparedTo(a) : a.comparedTo(b);
  }

  private insertionIndex(price: Decimal): number {
    let low = 0;
    let high = this.prices.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.compare(this.prices[mid], price) < 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }

  private requireLevel(price: Decimal): PriceLevel {
    const level = this.levelsByPrice.get(priceKey(price));
    if (!level) {
      throw new InvariantViolationError(`No level at ${priceKey(price)} on ${this.side}`);
    }
    return level;
  }

  private dropIfEmpty(level: PriceLevel): void {
    if (level.orderIds.size > 0) return;

    this.levelsByPrice.delete(priceKey(level.price));
    const index = this.insertionIndex(level.price);
    if (index >= this.prices.length || !this.prices[index].eq(level.price)) {
      throw new InvariantViolationError(`Level ${priceKey(level.price)} missing from ${this.side} price index`);
    }
    this.prices.splice(index, 1);
  }
}

// ============================================================================
// Both sides
// ============================================================================

export class PriceLadder {
  readonly bids = new SideLadder("BUY");
  readonly asks = new SideLadder("SELL");

  side(side: Side): SideLadder {
    return side === "BUY" ? this.bids : this.asks;
  }

  rest(side: Side, price: Decimal, orderId: string): PriceLevel {
    return this.side(side).rest(price, orderId);
  }

  best(side: Side): PriceLevel {
    return this.side(side).best();
  }

  peekBest(side: Side): PriceLevel | undefined {
    return this.side(side).peekBest();
  }

  popFront(side: Side, price: Decimal): string {
    return this.side(side).popFront(price);
  }

  remove(side: Side, price: Decimal, orderId: string): void {
    this.side(side).remove(price, orderId);
  }

  clear(): void {
    this.bids.clear();
    this.asks.clear();
  }
}
