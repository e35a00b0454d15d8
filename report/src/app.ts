import { z } from "zod";
import type { Env } from "./env";
import type { Logger } from "./logger";
import { findUnmatchedAccountNumbers, loadAccounts } from "./domain/ledger";
import type { Account } from "./domain/ledger";
import { reconcileAccounts } from "./domain/reconcile";
import { renderReport } from "./domain/statement";
import { groupByAccount, parseTransactions } from "./domain/transaction";
import type { Transaction } from "./domain/transaction";
import { readInputFile, writeOutputFile } from "./io/files";

export * from "./domain/amount";
export * from "./domain/ledger";
export * from "./domain/reconcile";
export * from "./domain/statement";
export * from "./domain/transaction";
export { StatementIoError } from "./io/errors";

export type BatchPaths = {
  ledgerPath: string;
  transactionsPath: string;
  statementPath: string;
};

export type ReportDiagnostics = {
  droppedLedgerLines: number[];
  skippedBlankLines: number;
  unmatchedAccountNumbers: number[];
};

export type BuiltReport = {
  report: string;
  accounts: Map<number, Account>;
  groups: Map<number, Transaction[]>;
  transactionCount: number;
  diagnostics: ReportDiagnostics;
};

const argsSchema = z.array(z.string().min(1)).max(3);

// Positional [ledger] [transactions] [output] override the configured paths.
export const resolvePaths = (argv: readonly string[], config: Env): BatchPaths => {
  const [ledgerPath, transactionsPath, statementPath] = argsSchema.parse(argv);
  return {
    ledgerPath: ledgerPath ?? config.LEDGER_PATH,
    transactionsPath: transactionsPath ?? config.TRANSACTIONS_PATH,
    statementPath: statementPath ?? config.STATEMENT_PATH,
  };
};

export const buildReport = (ledgerText: string, transactionText: string): BuiltReport => {
  const ledger = loadAccounts(ledgerText);
  const log = parseTransactions(transactionText);
  const groups = groupByAccount(log.transactions);
  const accounts = reconcileAccounts(ledger.accounts, groups);
  return {
    report: renderReport(accounts, groups),
    accounts,
    groups,
    transactionCount: log.transactions.length,
    diagnostics: {
      droppedLedgerLines: ledger.droppedLines,
      skippedBlankLines: log.skippedBlankLines,
      unmatchedAccountNumbers: findUnmatchedAccountNumbers(groups, ledger.accounts),
    },
  };
};

export const runStatementBatch = async (paths: BatchPaths, log: Logger): Promise<BuiltReport> => {
  const [ledgerText, transactionText] = await Promise.all([
    readInputFile(paths.ledgerPath),
    readInputFile(paths.transactionsPath),
  ]);
  const built = buildReport(ledgerText, transactionText);
  const { diagnostics } = built;

  log.info({ path: paths.ledgerPath, accounts: built.accounts.size, dropped: diagnostics.droppedLedgerLines.length }, "ledger loaded");
  if (diagnostics.droppedLedgerLines.length > 0) {
    log.debug({ lines: diagnostics.droppedLedgerLines }, "ledger lines dropped");
  }
  log.info(
    { path: paths.transactionsPath, transactions: built.transactionCount, blankLines: diagnostics.skippedBlankLines },
    "transaction log loaded"
  );
  if (diagnostics.unmatchedAccountNumbers.length > 0) {
    // JSON has no NaN, log unparsable numbers as strings
    log.warn({ accountNumbers: diagnostics.unmatchedAccountNumbers.map(String) }, "transactions without ledger account");
  }

  await writeOutputFile(paths.statementPath, built.report);
  log.info({ path: paths.statementPath, accounts: built.accounts.size }, "statement written");
  return built;
};
