import { describe, expect, it } from "vitest";
import { findUnmatchedAccountNumbers, loadAccounts, parseAccountLine } from "./ledger";

describe("parseAccountLine", () => {
  it("parses number, quoted name and balance", () => {
    expect(parseAccountLine('100 "Jane Doe" 250.00')).toEqual({
      accountNumber: 100,
      customerInfo: "Jane Doe",
      startingBalance: 250,
      balance: 250,
    });
  });

  it("rejects lines that do not match", () => {
    expect(parseAccountLine("bad-line")).toBeUndefined();
    expect(parseAccountLine('300 "Int Only" 100')).toBeUndefined();
    expect(parseAccountLine("300 Unquoted 100.00")).toBeUndefined();
  });
});

describe("loadAccounts", () => {
  it("keeps matching lines and reports dropped ones", () => {
    const { accounts, droppedLines } = loadAccounts('100 "Jane Doe" 250.00\nbad-line\n\n200 "Bob" 100.0\n');
    expect(Array.from(accounts.keys())).toEqual([100, 200]);
    expect(accounts.get(200)?.customerInfo).toBe("Bob");
    expect(droppedLines).toEqual([1]);
  });

  it("starts every account with balance equal to its starting balance", () => {
    const { accounts } = loadAccounts('1 "A" 0.50\n2 "B" 99.99\n3 "C" 1000.0');
    for (const account of accounts.values()) {
      expect(account.balance).toBe(account.startingBalance);
    }
  });
});

describe("findUnmatchedAccountNumbers", () => {
  it("lists grouped account numbers missing from the ledger", () => {
    const { accounts } = loadAccounts('100 "Jane Doe" 250.00');
    const groups = new Map<number, unknown>([
      [100, []],
      [999, []],
    ]);
    expect(findUnmatchedAccountNumbers(groups, accounts)).toEqual([999]);
  });
});
