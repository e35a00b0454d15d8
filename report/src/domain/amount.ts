const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

// Malformed tokens become 0 instead of failing the batch.
export const parseAmount = (token: string | undefined): number => {
  const raw = (token ?? "").trim();
  if (!AMOUNT_PATTERN.test(raw)) return 0;
  const n = Number(raw);
  return Number.isFinite(n) ? n : 0;
};

/**
 * Renders an amount the way the statement prints it: whole numbers get
 * `.00`, everything else keeps its natural decimal form (`3.1` stays `3.1`).
 */
export const formatAmount = (amount: number): string => {
  const text = Number.isInteger(amount) ? amount.toFixed(1) : String(amount);
  return text.endsWith(".0") ? `${text.slice(0, -2)}.00` : text;
};

// Balances are summed in whole cents so every path to a total lands on the same value.
export const toCents = (amount: number): number => Math.round(amount * 100);

export const fromCents = (cents: number): number => cents / 100;
