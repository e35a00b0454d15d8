#!/usr/bin/env node
import { loadEnv } from "./env";
import { createLogger } from "./logger";
import type { Logger } from "./logger";
import { resolvePaths, runStatementBatch } from "./app";

// Replaced once LOG_LEVEL is known; a config failure is still logged at the default level.
let log: Logger = createLogger("info");

const start = async () => {
  const config = loadEnv();
  log = createLogger(config.LOG_LEVEL);
  const paths = resolvePaths(process.argv.slice(2), config);
  await runStatementBatch(paths, log);
};

start().catch((err: unknown) => {
  log.fatal({ err }, "statement run failed");
  process.exit(1);
});
