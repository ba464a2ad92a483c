/**
 * Tests for the order ledger: ownership of live orders and identifier reuse
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Decimal } from "decimal.js";
import type { RestingOrder, Side } from "../src/lib/book-common";
import {
  DuplicateIdentifierError,
  InvariantViolationError,
  UnknownOrderError,
} from "../src/lib/errors";
import { OrderLedger } from "../src/lib/orderLedger";

function restingOrder(orderId: string, side: Side, price: number, qty: number, sequence = 1): RestingOrder {
  return {
    orderId,
    side,
    price: new Decimal(price),
    originalQty: new Decimal(qty),
    remainingQty: new Decimal(qty),
    sequence,
  };
}

describe("OrderLedger: insert and lookup", () => {
  let ledger: OrderLedger;

  beforeEach(() => {
    ledger = new OrderLedger();
  });

  it("should store and return an inserted order", () => {
    ledger.insert(restingOrder("a", "BUY", 100, 10));

    expect(ledger.size).toBe(1);
    expect(ledger.has("a")).toBe(true);
    expect(ledger.get("a").remainingQty.toFixed()).toBe("10");
    expect(ledger.find("a")?.side).toBe("BUY");
  });

  it("should reject a duplicate live identifier", () => {
    ledger.insert(restingOrder("a", "BUY", 100, 10));
    expect(() => ledger.insert(restingOrder("a", "SELL", 101, 1))).toThrow(DuplicateIdentifierError);
    expect(ledger.get("a").side).toBe("BUY");
  });

  it("should refuse an order with nothing remaining", () => {
    const order = restingOrder("a", "BUY", 100, 10);
    order.remainingQty = new Decimal(0);
    expect(() => ledger.insert(order)).toThrow(InvariantViolationError);
    expect(ledger.size).toBe(0);
  });

  it("should refuse an order with more remaining than original", () => {
    const order = restingOrder("a", "BUY", 100, 10);
    order.remainingQty = new Decimal(11);
    expect(() => ledger.insert(order)).toThrow(InvariantViolationError);
  });

  it("should throw UnknownOrderError from get and undefined from find", () => {
    expect(() => ledger.get("missing")).toThrow(UnknownOrderError);
    expect(ledger.find("missing")).toBeUndefined();
  });
});

describe("OrderLedger: removal and released identifiers", () => {
  let ledger: OrderLedger;

  beforeEach(() => {
    ledger = new OrderLedger();
    ledger.insert(restingOrder("a", "SELL", 50, 5));
  });

  it("should remove a live order and keep its identifier reserved", () => {
    const removed = ledger.remove("a");

    expect(removed.orderId).toBe("a");
    expect(ledger.has("a")).toBe(false);
    expect(ledger.isKnown("a")).toBe(true);
    expect(() => ledger.insert(restingOrder("a", "SELL", 50, 5))).toThrow(DuplicateIdentifierError);
  });

  it("should throw when removing an unknown order", () => {
    expect(() => ledger.remove("b")).toThrow(UnknownOrderError);
  });

  it("should retire an identifier that never rested", () => {
    ledger.retire("t");
    expect(ledger.has("t")).toBe(false);
    expect(ledger.isKnown("t")).toBe(true);
    expect(() => ledger.retire("t")).toThrow(DuplicateIdentifierError);
    expect(() => ledger.retire("a")).toThrow(DuplicateIdentifierError);
  });

  it("should forget released identifiers on clear", () => {
    ledger.remove("a");
    ledger.retire("t");
    ledger.clear();

    expect(ledger.size).toBe(0);
    expect(ledger.isKnown("a")).toBe(false);
    expect(ledger.isKnown("t")).toBe(false);
    ledger.insert(restingOrder("a", "BUY", 1, 1));
    expect(ledger.has("a")).toBe(true);
  });
});

describe("OrderLedger: decrement", () => {
  let ledger: OrderLedger;

  beforeEach(() => {
    ledger = new OrderLedger();
    ledger.insert(restingOrder("m", "SELL", 100, 10));
  });

  it("should reduce remaining quantity and keep the order live", () => {
    const result = ledger.decrement("m", new Decimal(4));

    expect(result.removed).toBe(false);
    expect(result.order.remainingQty.toFixed()).toBe("6");
    expect(ledger.get("m").originalQty.toFixed()).toBe("10");
  });

  it("should remove the order when remaining reaches zero", () => {
    ledger.decrement("m", new Decimal(4));
    const result = ledger.decrement("m", new Decimal(6));

    expect(result.removed).toBe(true);
    expect(result.order.remainingQty.toFixed()).toBe("0");
    expect(ledger.has("m")).toBe(false);
    expect(ledger.isKnown("m")).toBe(true);
  });

  it("should fail fast on a decrement exceeding remaining", () => {
    expect(() => ledger.decrement("m", new Decimal(11))).toThrow(InvariantViolationError);
    expect(ledger.get("m").remainingQty.toFixed()).toBe("10");
  });

  it("should fail fast on a non-positive decrement", () => {
    expect(() => ledger.decrement("m", new Decimal(0))).toThrow(InvariantViolationError);
    expect(() => ledger.decrement("m", new Decimal(-1))).toThrow(InvariantViolationError);
  });

  it("should fail fast when a decrement would round the remaining quantity", () => {
    const wide = restingOrder("w", "BUY", 100, 1);
    wide.originalQty = new Decimal("100000000000000000000000000001");
    wide.remainingQty = new Decimal("100000000000000000000000000001");
    ledger.insert(wide);

    expect(() => ledger.decrement("w", new Decimal(2))).toThrow(InvariantViolationError);
    expect(ledger.get("w").remainingQty.toFixed()).toBe("100000000000000000000000000001");
  });

  it("should fail fast on decrementing an unknown order", () => {
    expect(() => ledger.decrement("x", new Decimal(1))).toThrow(InvariantViolationError);
  });
});
