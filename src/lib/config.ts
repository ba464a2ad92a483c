/**
 * Runtime configuration, read from the environment and validated with zod.
 */

import { z } from "zod";
import { ConfigError } from "./errors";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform(value => value === "true" || value === "1");

const configSchema = z.object({
  env: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("warn"),
  emitTopOfBook: booleanFlag.default("false"),
  onMalformed: z.enum(["skip", "fail"]).default("skip"),
});

export type AppConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    env: env.NODE_ENV,
    logLevel: env.ORDERBOOK_LOG_LEVEL?.toLowerCase(),
    emitTopOfBook: env.ORDERBOOK_TOP_OF_BOOK?.toLowerCase(),
    onMalformed: env.ORDERBOOK_ON_MALFORMED?.toLowerCase(),
  };

  const parsed = configSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    throw new ConfigError(
      `Invalid configuration: ${Object.keys(fieldErrors).join(", ")}`,
      fieldErrors
    );
  }
  return parsed.data;
}
