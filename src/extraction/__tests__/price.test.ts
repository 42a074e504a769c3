import { describe, it, expect } from "vitest";
import { parsePrice } from "../price.js";
import { loadRuleSet } from "../rules.js";

const { pricePatterns } = loadRuleSet();

describe("parsePrice", () => {
  it.each([
    ["$1,299.99", "1299.99", "USD"],
    ["$ 12", "12", "USD"],
    ["Now 1,299.99 USD", "1299.99", "USD"],
    ["£45", "45", "GBP"],
    ["€1.299,50", "1299.50", "EUR"],
    ["19,99 €", "19.99", "EUR"],
    ["€12.50", "12.50", "EUR"],
    ["12.50 €", "12.50", "EUR"],
    ["€1,299.50", "1299.50", "EUR"],
    ["1.299,50 €", "1299.50", "EUR"],
  ])("should read %s", (text, amount, currency) => {
    expect(parsePrice(text, pricePatterns)).toEqual({ amount, currency });
  });

  it("should accept a bare amount without a currency", () => {
    expect(parsePrice("  1,234.50 ", pricePatterns)).toEqual({ amount: "1234.50", currency: null });
  });

  it("should return null for text without a price", () => {
    expect(parsePrice("Call for price", pricePatterns)).toBeNull();
    expect(parsePrice("   ", pricePatterns)).toBeNull();
  });

  it("should take the first price in longer text", () => {
    expect(parsePrice("Was $120.00, now $99.50", pricePatterns)).toEqual({ amount: "120.00", currency: "USD" });
  });
});
