import { formatAmount, fromCents, toCents } from "./amount";
import type { Account } from "./ledger";
import { summarizeTransactions } from "./reconcile";
import type { Transaction } from "./transaction";

export const SEPARATOR = "-".repeat(40);

export type StatementSummary = {
  totalPurchases: number;
  totalPayments: number;
  finalBalance: number;
};

export const summarizeStatement = (account: Account, transactions: readonly Transaction[]): StatementSummary => {
  const { totalPurchases, totalPayments } = summarizeTransactions(transactions);
  return {
    totalPurchases,
    totalPayments,
    finalBalance: fromCents(toCents(account.startingBalance) + toCents(totalPayments) - toCents(totalPurchases)),
  };
};

export const renderTransactionLine = (t: Transaction): string => {
  const parts = [
    `#${t.sequenceNumber + 1}`,
    t.timestamp,
    t.type === "purchase" ? t.merchant : "",
    t.paymentMethod,
    t.cardOrCheckNumber,
    formatAmount(t.amount),
  ];
  return `  ${parts.filter((p) => p !== "").join("  ")}`;
};

export const renderStatement = (account: Account, transactions: readonly Transaction[]): string => {
  const ordered = [...transactions].sort((a, b) => a.sequenceNumber - b.sequenceNumber);
  const summary = summarizeStatement(account, ordered);
  return [
    `Account ${account.accountNumber}: ${account.customerInfo}`,
    `Starting balance: ${formatAmount(account.startingBalance)}`,
    ...ordered.map(renderTransactionLine),
    `Total purchases: ${formatAmount(summary.totalPurchases)}`,
    `Total payments: ${formatAmount(summary.totalPayments)}`,
    `Final balance: ${formatAmount(summary.finalBalance)}`,
    SEPARATOR,
  ].join("\n");
};

export const renderReport = (
  accounts: ReadonlyMap<number, Account>,
  groups: ReadonlyMap<number, readonly Transaction[]>
): string => {
  const blocks = Array.from(accounts.values()).map((a) => renderStatement(a, groups.get(a.accountNumber) ?? []));
  return blocks.length ? `${blocks.join("\n")}\n` : "";
};
