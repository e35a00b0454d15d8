import { fromCents, toCents } from "./amount";
import type { Account } from "./ledger";
import type { Transaction } from "./transaction";

export type TransactionTotals = {
  totalPurchases: number;
  totalPayments: number;
};

const applyTransaction = (balanceCents: number, t: Transaction): number => {
  switch (t.type) {
    case "payment":
      return balanceCents + toCents(t.amount);
    case "purchase":
      return balanceCents - toCents(t.amount);
    default:
      return balanceCents;
  }
};

/**
 * Folds the account's transactions over its starting balance. Returns a new
 * account; neither the input account nor the groups are touched.
 */
export const reconcileAccount = (
  account: Account,
  groups: ReadonlyMap<number, readonly Transaction[]>
): Account => {
  const transactions = groups.get(account.accountNumber) ?? [];
  const balanceCents = transactions.reduce(applyTransaction, toCents(account.startingBalance));
  return { ...account, balance: fromCents(balanceCents) };
};

export const reconcileAccounts = (
  accounts: ReadonlyMap<number, Account>,
  groups: ReadonlyMap<number, readonly Transaction[]>
): Map<number, Account> => {
  const out = new Map<number, Account>();
  for (const [n, account] of accounts) out.set(n, reconcileAccount(account, groups));
  return out;
};

export const summarizeTransactions = (transactions: readonly Transaction[]): TransactionTotals => {
  let purchaseCents = 0;
  let paymentCents = 0;
  for (const t of transactions) {
    if (t.type === "purchase") purchaseCents += toCents(t.amount);
    else if (t.type === "payment") paymentCents += toCents(t.amount);
  }
  return { totalPurchases: fromCents(purchaseCents), totalPayments: fromCents(paymentCents) };
};
