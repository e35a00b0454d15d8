export type Account = {
  accountNumber: number;
  customerInfo: string;
  readonly startingBalance: number;
  balance: number;
};

export type LedgerParseResult = {
  accounts: Map<number, Account>;
  // zero-based line indices that did not match the ledger pattern
  droppedLines: number[];
};

// <accountNumber> "<customer name>" <balance with fraction digits>
const LEDGER_LINE = /^\s*(\d+)\s+"([^"]*)"\s+(\d+\.\d+)\s*$/;

export const parseAccountLine = (line: string): Account | undefined => {
  const m = LEDGER_LINE.exec(line);
  if (!m) return undefined;
  const balance = Number(m[3]);
  return {
    accountNumber: Number.parseInt(m[1], 10),
    customerInfo: m[2],
    startingBalance: balance,
    balance,
  };
};

export const loadAccounts = (ledgerText: string): LedgerParseResult => {
  const accounts = new Map<number, Account>();
  const droppedLines: number[] = [];
  ledgerText.split(/\r?\n/).forEach((line, index) => {
    if (!line.trim()) return;
    const account = parseAccountLine(line);
    if (account) accounts.set(account.accountNumber, account);
    else droppedLines.push(index);
  });
  return { accounts, droppedLines };
};

export const findUnmatchedAccountNumbers = (
  groups: ReadonlyMap<number, unknown>,
  accounts: ReadonlyMap<number, Account>
): number[] => Array.from(groups.keys()).filter((n) => !accounts.has(n));
