/**
 * Demo run for the limit order book
 *
 * Builds a small book, crosses it, cancels and flushes, printing the
 * outcome records of every command and the audit journal at the end.
 */

import type { BookCommand } from "../src/lib/book-common";
import { BookLogger } from "../src/lib/bookLogger";
import { CLOBEngine, cancelOrder, flushBook, newOrder } from "../src/lib/clob";
import { formatRecord } from "../src/lib/line-codec";

const logger = new BookLogger();
const engine = new CLOBEngine({ logger, emitTopOfBook: true });
const book = engine.initBook();

console.log("=== Limit Order Book Demo ===\n");

function describe(command: BookCommand): string {
  switch (command.type) {
    case "NEW":
      return `NEW ${command.orderId} ${command.side} ${command.qty.toFixed()} @ ${command.price.toFixed()}`;
    case "CANCEL":
      return `CANCEL ${command.orderId}`;
    case "FLUSH":
      return "FLUSH";
  }
}

function run(command: BookCommand): void {
  console.log(`> ${describe(command)}`);
  for (const record of engine.process(book, command)) {
    console.log(`    ${formatRecord(record)}`);
  }
}

function displayBook(): void {
  console.log("\n--- Resting Orders ---");
  for (const side of [book.ladder.asks, book.ladder.bids]) {
    console.log(`${side.side}: ${side.levelCount} level(s), ${side.orderCount} order(s)`);
    for (const level of side.levels()) {
      const orders = [...level.orderIds].map(id => {
        const order = book.ledger.get(id);
        return `${id}:${order.remainingQty.toFixed()}`;
      });
      console.log(`  ${level.price.toFixed()}  ${orders.join(" ")}`);
    }
  }
  console.log("");
}

// Resting bid, partially hit by a seller at the same price
console.log("--- Partial fill ---\n");
run(newOrder("1", "BUY", 100, 10));
run(newOrder("2", "SELL", 100, 4));
displayBook();

// Seller below the bid trades at the bid (price improvement for the taker)
console.log("--- Price improvement ---\n");
run(newOrder("3", "SELL", 99, 6));
displayBook();

// FIFO across a level, then a sweep through two levels
console.log("--- FIFO and sweep ---\n");
run(newOrder("10", "SELL", 101, 5));
run(newOrder("11", "SELL", 101, 5));
run(newOrder("12", "SELL", 102, 5));
run(newOrder("13", "BUY", 102, 12));
displayBook();

// Cancel, cancel again, flush
console.log("--- Cancel and flush ---\n");
run(newOrder("4", "BUY", 50, 1));
run(cancelOrder("4"));
run(cancelOrder("4"));
run(flushBook());
run(flushBook());
displayBook();

console.log("--- Journal ---\n");
console.log(`${logger.getLogs().length} journal entries`);
console.log(logger.exportJson());
