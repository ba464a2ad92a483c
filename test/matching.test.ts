/**
 * Tests for the matching loop in isolation from command validation
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Decimal } from "decimal.js";
import type { Side, TakerOrder } from "../src/lib/book-common";
import { InvariantViolationError } from "../src/lib/errors";
import { createBookState, crosses, matchIncoming, type BookState } from "../src/lib/matching";

const d = (value: number | string) => new Decimal(value);

function submit(book: BookState, orderId: string, side: Side, price: number, qty: number) {
  const taker: TakerOrder = {
    orderId,
    side,
    price: d(price),
    qty: d(qty),
    sequence: book.nextSequence++,
  };
  return matchIncoming(book, taker);
}

function trades(result: ReturnType<typeof matchIncoming>): string[] {
  return result.trades.map(t => `${t.takerOrderId}<-${t.makerOrderId} ${t.qty.toFixed()}@${t.price.toFixed()}`);
}

describe("Matching: crosses", () => {
  it("should let a buy cross asks at or below its limit", () => {
    expect(crosses("BUY", d(100), d(99))).toBe(true);
    expect(crosses("BUY", d(100), d(100))).toBe(true);
    expect(crosses("BUY", d(100), d(101))).toBe(false);
  });

  it("should let a sell cross bids at or above its limit", () => {
    expect(crosses("SELL", d(100), d(101))).toBe(true);
    expect(crosses("SELL", d(100), d(100))).toBe(true);
    expect(crosses("SELL", d(100), d(99))).toBe(false);
  });
});

describe("Matching: matchIncoming", () => {
  let book: BookState;

  beforeEach(() => {
    book = createBookState();
  });

  it("should rest a non-crossing order in full", () => {
    const result = submit(book, "1", "BUY", 100, 10);

    expect(result.trades).toHaveLength(0);
    expect(result.filledQty.toFixed()).toBe("0");
    expect(result.restingQty.toFixed()).toBe("10");
    expect(book.ledger.get("1").remainingQty.toFixed()).toBe("10");
    expect([...book.ladder.best("BUY").orderIds]).toEqual(["1"]);
  });

  it("should execute at the maker's price", () => {
    submit(book, "1", "BUY", 100, 6);
    const result = submit(book, "2", "SELL", 95, 6);

    expect(trades(result)).toEqual(["2<-1 6@100"]);
    expect(result.restingQty.toFixed()).toBe("0");
    expect(book.ladder.bids.isEmpty()).toBe(true);
    expect(book.ladder.asks.isEmpty()).toBe(true);
  });

  it("should walk levels best first and FIFO within a level", () => {
    submit(book, "a1", "SELL", 101, 3);
    submit(book, "a2", "SELL", 100, 2);
    submit(book, "a3", "SELL", 100, 4);
    const result = submit(book, "t", "BUY", 101, 8);

    expect(trades(result)).toEqual(["t<-a2 2@100", "t<-a3 4@100", "t<-a1 2@101"]);
    expect(result.filledQty.toFixed()).toBe("8");
    expect(book.ledger.get("a1").remainingQty.toFixed()).toBe("1");
    expect(book.ladder.asks.levelCount).toBe(1);
  });

  it("should rest the remainder at the taker's own limit", () => {
    submit(book, "a", "SELL", 100, 3);
    const result = submit(book, "t", "BUY", 102, 5);

    expect(result.filledQty.toFixed()).toBe("3");
    expect(result.restingQty.toFixed()).toBe("2");
    const resting = book.ledger.get("t");
    expect(resting.price.toFixed()).toBe("102");
    expect(resting.originalQty.toFixed()).toBe("5");
    expect(resting.remainingQty.toFixed()).toBe("2");
    expect(book.ladder.best("BUY").price.toFixed()).toBe("102");
  });

  it("should stop at the taker's limit", () => {
    submit(book, "a", "SELL", 100, 1);
    submit(book, "b", "SELL", 103, 1);
    const result = submit(book, "t", "BUY", 101, 5);

    expect(trades(result)).toEqual(["t<-a 1@100"]);
    expect(book.ladder.best("SELL").price.toFixed()).toBe("103");
    expect(book.ladder.best("BUY").price.toFixed()).toBe("101");
  });

  it("should retire the identifier of a taker filled on entry", () => {
    submit(book, "a", "SELL", 100, 5);
    submit(book, "t", "BUY", 100, 5);

    expect(book.ledger.has("t")).toBe(false);
    expect(book.ledger.isKnown("t")).toBe(true);
    expect(book.ledger.isKnown("a")).toBe(true);
  });

  it("should match any two opposite orders that cross", () => {
    submit(book, "x", "BUY", 100, 1);
    const result = submit(book, "y", "SELL", 100, 1);
    expect(trades(result)).toEqual(["y<-x 1@100"]);
  });

  it("should fail fast when a resting identifier is missing from the ledger", () => {
    book.ladder.rest("SELL", d(100), "ghost");
    expect(() => submit(book, "t", "BUY", 100, 1)).toThrow(InvariantViolationError);
  });
});
