import pino from "pino";
import type { Logger } from "pino";
import type { Env } from "./env";

export type { Logger };

export const createLogger = (level: Env["LOG_LEVEL"]): Logger =>
  pino({ level, base: { app: "ledger-statements" } });
