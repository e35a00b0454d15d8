import { z } from "zod";
import dotenv from "dotenv";

export const logLevels = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const schema = z.object({
  LOG_LEVEL: z.enum(logLevels).default("info"),
  LEDGER_PATH: z.string().min(1).default("accounts.txt"),
  TRANSACTIONS_PATH: z.string().min(1).default("transactions.txt"),
  STATEMENT_PATH: z.string().min(1).default("statements.txt"),
});

export type Env = z.infer<typeof schema>;

export const parseEnv = (source: NodeJS.ProcessEnv): Env => schema.parse(source);

// Reads .env (when present) into process.env before validating.
export const loadEnv = (): Env => {
  dotenv.config();
  return parseEnv(process.env);
};
