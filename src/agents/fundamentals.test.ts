import { describe, expect, it } from "vitest";
import type { FinancialMetrics } from "../providers/types";
import { fundamentalsSignal } from "./fundamentals";

const strong: FinancialMetrics = {
  return_on_equity: 0.2,
  net_margin: 0.25,
  operating_margin: 0.18,
  revenue_growth: 0.12,
  earnings_growth: 0.15,
  book_value_growth: 0.11,
  current_ratio: 2,
  debt_to_equity: 0.3,
  free_cash_flow_per_share: 5,
  earnings_per_share: 4,
  pe_ratio: 18,
  price_to_book: 2.5,
  price_to_sales: 3,
};

describe("fundamentalsSignal", () => {
  it("is bullish with full confidence when every check passes", () => {
    const signal = fundamentalsSignal(strong);

    expect(signal.direction).toBe("bullish");
    expect(signal.confidence).toBe(1);
    expect(signal.rationale.profitability_signal).toBe("bullish: ROE: 20.00%, Net Margin: 25.00%, Op Margin: 18.00%");
    expect(signal.rationale.financial_health_signal).toBe("bullish: Current Ratio: 2.00, D/E: 0.30");
    expect(signal.rationale.price_ratios_signal).toBe("bullish: P/E: 18.00, P/B: 2.50, P/S: 3.00");
  });

  it("treats missing metrics as failed checks", () => {
    const signal = fundamentalsSignal({});

    expect(signal.direction).toBe("bearish");
    expect(signal.confidence).toBe(1);
    expect(signal.rationale.growth_signal).toBe(
      "bearish: Revenue Growth: N/A, Earnings Growth: N/A, Book Value Growth: N/A"
    );
  });

  it("weighs sub-signals by count", () => {
    const signal = fundamentalsSignal({
      ...strong,
      // growth: none pass
      revenue_growth: 0.01,
      earnings_growth: 0.02,
      book_value_growth: 0.03,
      // price ratios: one passes
      pe_ratio: 40,
      price_to_book: 2,
      price_to_sales: 8,
    });

    expect(signal.rationale.growth_signal.startsWith("bearish")).toBe(true);
    expect(signal.rationale.price_ratios_signal.startsWith("neutral")).toBe(true);
    expect(signal.direction).toBe("bullish");
    expect(signal.confidence).toBe(0.5);
  });

  it("is neutral when bullish and bearish sub-signals tie", () => {
    const signal = fundamentalsSignal({
      ...strong,
      revenue_growth: 0,
      earnings_growth: 0,
      book_value_growth: 0,
      current_ratio: 1,
      debt_to_equity: 2,
      free_cash_flow_per_share: 1,
    });

    expect(signal.direction).toBe("neutral");
    expect(signal.confidence).toBe(0.5);
  });

  it("does not count zero-valued health ratios", () => {
    const signal = fundamentalsSignal({ ...strong, debt_to_equity: 0, free_cash_flow_per_share: 0 });
    expect(signal.rationale.financial_health_signal).toBe("neutral: Current Ratio: 2.00, D/E: N/A");
  });
});
