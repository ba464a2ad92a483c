/**
 * Order book command-line runner
 *
 * Reads commands from a file or stdin, writes outcome records to stdout,
 * diagnostics to stderr.
 *
 *   npm start -- --input orders.txt --top-of-book
 *   cat orders.txt | npm start
 */

import { createReadStream } from "node:fs";
import { writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import dotenv from "dotenv";
import { BookLogger } from "../src/lib/bookLogger";
import { CLOBEngine } from "../src/lib/clob";
import { loadConfig } from "../src/lib/config";
import { ConfigError, OrderBookError } from "../src/lib/errors";
import { createLogger } from "../src/lib/logger";
import { runCommandStream } from "../src/lib/stream-runner";

dotenv.config();

const USAGE = `Usage: orderbook [options]

Options:
  -i, --input <file>     read commands from <file> instead of stdin
  -j, --journal <file>   write the audit journal as JSON to <file> when done
      --top-of-book      emit a B record whenever a side's best level changes
      --strict           treat a malformed line as fatal instead of skipping it
  -h, --help             show this help

Input lines:   N, <id>, <B|S>, <price>, <qty>  |  C, <id>  |  F
Output lines:  A, T, X, F, R and B records, one per line
`;

async function main(): Promise<number> {
  let args;
  try {
    args = parseArgs({
      options: {
        input: { type: "string", short: "i" },
        journal: { type: "string", short: "j" },
        "top-of-book": { type: "boolean" },
        strict: { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
      allowPositionals: false,
    });
  } catch (error) {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
    return 2;
  }

  if (args.values.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  let config;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      process.stderr.write(`${error.message}\n${JSON.stringify(error.fieldErrors)}\n`);
      return 2;
    }
    throw error;
  }

  const logger = createLogger({ level: config.logLevel });
  const journal = args.values.journal ? new BookLogger() : undefined;
  const engine = new CLOBEngine({
    emitTopOfBook: args.values["top-of-book"] ?? config.emitTopOfBook,
    logger: journal,
  });

  const inputPath = args.values.input;
  const input = inputPath ? createReadStream(inputPath, { encoding: "utf8" }) : process.stdin;
  process.stdout.on("error", error => {
    logger.error("Output stream failed", { error: error.message });
    process.exit(1);
  });

  try {
    const summary = await runCommandStream({
      input,
      output: process.stdout,
      engine,
      logger,
      onMalformed: args.values.strict ? "fail" : config.onMalformed,
    });
    logger.info("Run complete", { source: inputPath ?? "stdin", ...summary });
    return 0;
  } catch (error) {
    logger.error("Run aborted", {
      source: inputPath ?? "stdin",
      code: error instanceof OrderBookError ? error.code : undefined,
      error: error instanceof Error ? error.message : String(error),
    });
    return 1;
  } finally {
    if (journal && args.values.journal) {
      await writeFile(args.values.journal, journal.exportJson(), "utf8");
    }
  }
}

main().then(
  code => {
    process.exitCode = code;
  },
  error => {
    process.stderr.write(`Fatal: ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  }
);
