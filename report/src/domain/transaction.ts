import { parseAmount } from "./amount";

export type TransactionType = "payment" | "purchase" | "unknown";

export type PaymentMethod = "Cash" | "Credit" | "Check" | "Unknown" | "Purchase";

export type Transaction = {
  type: TransactionType;
  sequenceNumber: number;
  // NaN when the log line carries no parsable account number
  accountNumber: number;
  timestamp: string;
  merchant: string;
  paymentMethod: PaymentMethod;
  cardOrCheckNumber: string;
  amount: number;
};

export type PaymentMethodInfo = {
  method: PaymentMethod;
  reference: string;
  // informational only, the stored amount comes from selectAmountField
  amount: string;
};

export type TransactionLogParseResult = {
  transactions: Transaction[];
  skippedBlankLines: number;
};

const PURCHASE_INFO: PaymentMethodInfo = { method: "Purchase", reference: "", amount: "" };

const toTransactionType = (raw: string | undefined): TransactionType => {
  const tag = (raw ?? "").trim().toLowerCase();
  if (tag === "payment" || tag === "purchase") return tag;
  return "unknown";
};

const toAccountNumber = (raw: string | undefined): number => {
  const m = /^\s*(-?\d+)/.exec(raw ?? "");
  return m ? Number.parseInt(m[1], 10) : Number.NaN;
};

const stripQuotes = (s: string): string => s.replace(/"/g, "");

export const parsePaymentMethod = (fields: readonly string[]): PaymentMethodInfo => {
  const name = (fields[3] ?? "").trim().toLowerCase();
  switch (name) {
    case "cash":
      return { method: "Cash", reference: "", amount: "" };
    case "credit":
    case "check":
      return {
        method: name === "credit" ? "Credit" : "Check",
        reference: fields[4] ?? "",
        amount: fields[5] ?? "0",
      };
    default:
      return { method: "Unknown", reference: "", amount: "0" };
  }
};

// Payments with a card/check number carry six fields, purchases five.
export const selectAmountField = (fields: readonly string[]): string => {
  if (fields.length >= 6) return fields[5];
  if (fields.length >= 5) return fields[4];
  return "";
};

export const parseTransaction = (line: string, sequenceNumber: number): Transaction => {
  const fields = line.split("\t");
  const type = toTransactionType(fields[0]);
  const payment = type === "payment" ? parsePaymentMethod(fields) : PURCHASE_INFO;
  return {
    type,
    sequenceNumber,
    accountNumber: toAccountNumber(fields[1]),
    timestamp: fields[2] ?? "",
    merchant: fields.length > 3 ? stripQuotes(fields[3]) : "",
    paymentMethod: payment.method,
    cardOrCheckNumber: payment.reference,
    amount: parseAmount(selectAmountField(fields)),
  };
};

export const parseTransactions = (text: string): TransactionLogParseResult => {
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  const transactions: Transaction[] = [];
  let skippedBlankLines = 0;
  lines.forEach((line, index) => {
    if (!line.trim()) {
      skippedBlankLines += 1;
      return;
    }
    transactions.push(parseTransaction(line, index));
  });
  return { transactions, skippedBlankLines };
};

export const groupByAccount = (transactions: readonly Transaction[]): Map<number, Transaction[]> => {
  const groups = new Map<number, Transaction[]>();
  for (const t of transactions) {
    const group = groups.get(t.accountNumber);
    if (group) group.push(t);
    else groups.set(t.accountNumber, [t]);
  }
  return groups;
};
