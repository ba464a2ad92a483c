/**
 * Stream runner: the I/O adapter around the engine.
 *
 * Reads commands line by line, hands each one to the engine in arrival order
 * and writes the resulting records before reading on. Records are written in
 * exactly the order the engine produced them.
 */

import { once } from "node:events";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { BookState, CLOBEngine } from "./clob";
import { MalformedCommandError } from "./errors";
import { formatRecord, parseCommandLine, type ParsedLine } from "./line-codec";
import type { Logger } from "./logger";

export type MalformedPolicy = "skip" | "fail";

export interface RunOptions {
  input: Readable;
  output: Writable;
  engine: CLOBEngine;
  /** Book to drive; a fresh one from the engine when omitted */
  book?: BookState;
  logger: Logger;
  onMalformed?: MalformedPolicy;
}

export interface RunSummary {
  linesRead: number;
  commandsProcessed: number;
  recordsWritten: number;
  malformedLines: number;
}

export async function runCommandStream(options: RunOptions): Promise<RunSummary> {
  const { input } = options;
  const consume = consumeLines(options);

  // readline does not reliably surface input errors to the async iterator
  const inputFailed = new Promise<never>((_, reject) => {
    input.once("error", reject);
    const detach = (): void => {
      input.off("error", reject);
    };
    void consume.then(detach, detach);
  });

  return Promise.race([consume, inputFailed]);
}

async function consumeLines(options: RunOptions): Promise<RunSummary> {
  const { input, output, engine, logger } = options;
  const onMalformed = options.onMalformed ?? "skip";
  const book = options.book ?? engine.initBook();
  const summary: RunSummary = { linesRead: 0, commandsProcessed: 0, recordsWritten: 0, malformedLines: 0 };

  const lines = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      summary.linesRead++;

      let parsed: ParsedLine;
      try {
        parsed = parseCommandLine(line, summary.linesRead);
      } catch (error) {
        if (!(error instanceof MalformedCommandError) || onMalformed === "fail") {
          throw error;
        }
        summary.malformedLines++;
        logger.warn("Skipping malformed command", { line: error.lineNumber, text: error.line, reason: error.message });
        continue;
      }
      if (parsed.kind === "skip") continue;

      const records = engine.process(book, parsed.command);
      summary.commandsProcessed++;
      logger.debug("Processed command", { line: summary.linesRead, command: parsed.command.type, records: records.length });

      if (records.length > 0) {
        await writeChunk(output, records.map(record => `${formatRecord(record)}\n`).join(""));
        summary.recordsWritten += records.length;
      }
    }
  } finally {
    lines.close();
  }

  logger.info("Command stream finished", { ...summary });
  return summary;
}

async function writeChunk(output: Writable, chunk: string): Promise<void> {
  if (!output.write(chunk)) {
    await once(output, "drain");
  }
}
