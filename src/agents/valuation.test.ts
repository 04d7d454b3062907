import { describe, expect, it } from "vitest";
import { isDeskError } from "../lib/errors";
import type { FinancialLineItem } from "../providers/types";
import {
  calculateIntrinsicValue,
  calculateOwnerEarningsValue,
  calculateWorkingCapitalChange,
  classifyValuationGap,
  valuationSignal,
} from "./valuation";

function lineItem(overrides: Partial<FinancialLineItem> = {}): FinancialLineItem {
  return {
    net_income: 100,
    depreciation_and_amortization: 0,
    capital_expenditure: 0,
    working_capital: 0,
    free_cash_flow: 100,
    ...overrides,
  };
}

describe("calculateWorkingCapitalChange", () => {
  it("subtracts the previous period and treats missing values as zero", () => {
    expect(calculateWorkingCapitalChange({ working_capital: 150 }, { working_capital: 100 })).toBe(50);
    expect(calculateWorkingCapitalChange({}, { working_capital: 40 })).toBe(-40);
  });
});

describe("calculateIntrinsicValue", () => {
  it("reduces to a perpetuity without growth", () => {
    expect(calculateIntrinsicValue({ freeCashFlow: 100, growthRate: 0, discountRate: 0.1, numYears: 1 })).toBeCloseTo(
      1000,
      6
    );
  });

  it("is zero for missing or non-positive free cash flow", () => {
    expect(calculateIntrinsicValue({ freeCashFlow: null })).toBe(0);
    expect(calculateIntrinsicValue({ freeCashFlow: -5 })).toBe(0);
  });
});

describe("calculateOwnerEarningsValue", () => {
  it("discounts owner earnings with a terminal value and a margin of safety", () => {
    const value = calculateOwnerEarningsValue({
      netIncome: 100,
      depreciation: 0,
      capex: 0,
      workingCapitalChange: 0,
      growthRate: 0,
      requiredReturn: 0.1,
      marginOfSafety: 0.5,
      numYears: 1,
    });
    // (100/1.1 + (100/1.1)/0.1/1.1) * 0.5
    expect(value).toBeCloseTo(458.6777, 3);
  });

  it("is zero when owner earnings are not positive or inputs are missing", () => {
    expect(
      calculateOwnerEarningsValue({ netIncome: 50, depreciation: 10, capex: 80, workingCapitalChange: 0 })
    ).toBe(0);
    expect(
      calculateOwnerEarningsValue({ netIncome: undefined, depreciation: 10, capex: 0, workingCapitalChange: 0 })
    ).toBe(0);
  });
});

describe("classifyValuationGap", () => {
  it("uses a +10% / -20% band", () => {
    expect(classifyValuationGap(0.11)).toBe("bullish");
    expect(classifyValuationGap(0.1)).toBe("neutral");
    expect(classifyValuationGap(-0.2)).toBe("neutral");
    expect(classifyValuationGap(-0.21)).toBe("bearish");
  });
});

describe("valuationSignal", () => {
  it("is bullish with full confidence when intrinsic value dwarfs the market cap", () => {
    const signal = valuationSignal({ metrics: { earnings_growth: 0.05 }, lineItems: [lineItem(), lineItem()], marketCap: 1 });
    expect(signal.direction).toBe("bullish");
    expect(signal.confidence).toBe(1);
  });

  it("is bearish when both methods value the business at zero", () => {
    const items = [lineItem({ net_income: 0, free_cash_flow: 0 }), lineItem()];
    const signal = valuationSignal({ metrics: {}, lineItems: items, marketCap: 1000 });

    expect(signal.direction).toBe("bearish");
    expect(signal.confidence).toBe(1);
    expect(signal.rationale).toEqual({
      dcf_analysis: "bearish: intrinsic value $0.00, market cap $1000.00, gap -100.0%",
      owner_earnings_analysis: "bearish: owner earnings value $0.00, market cap $1000.00, gap -100.0%",
      valuation_gap: "-100.0%",
    });
  });

  it("requires a positive market cap and two statement periods", () => {
    expect(() => valuationSignal({ metrics: {}, lineItems: [lineItem(), lineItem()], marketCap: 0 })).toThrow(
      "positive market cap"
    );
    try {
      valuationSignal({ metrics: {}, lineItems: [lineItem()], marketCap: 1000 });
      expect.unreachable();
    } catch (error) {
      expect(isDeskError(error, "MISSING_PRECONDITION")).toBe(true);
    }
  });
});
