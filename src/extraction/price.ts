import type { Price } from "../types.js";
import type { PricePattern } from "./rules.js";

/**
 * Parse a price out of free text
 *
 * Patterns are tried in order; the first match wins. The captured amount
 * loses its thousands separators and gets "." as decimal point.
 *
 * @example
 * parsePrice("$1,299.00", patterns); // { amount: "1299.00", currency: "USD" }
 */
export function parsePrice(text: string, patterns: readonly PricePattern[]): Price | null {
  const input = text.trim();
  if (!input) {
    return null;
  }

  for (const pattern of patterns) {
    const match = pattern.regex.exec(input);
    const captured = match?.[1];
    if (!captured) {
      continue;
    }

    return {
      amount: normalizeAmount(captured, pattern.decimalSeparator),
      currency: pattern.currency,
    };
  }

  return null;
}

function normalizeAmount(raw: string, decimalSeparator: "." | ","): string {
  if (decimalSeparator === ",") {
    return raw.replace(/\./g, "").replace(",", ".");
  }
  return raw.replace(/,/g, "");
}
