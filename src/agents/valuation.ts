import { createError, ErrorCode } from "../lib/errors";
import { clamp, formatPct } from "../lib/utils";
import type { FinancialLineItem, FinancialMetrics } from "../providers/types";
import type { Signal, SignalDirection } from "./types";

export interface ValuationInput {
  metrics: FinancialMetrics;
  /** `[current, previous]` statement periods. */
  lineItems: FinancialLineItem[];
  marketCap: number;
}

export interface OwnerEarningsParams {
  netIncome: number | null | undefined;
  depreciation: number | null | undefined;
  capex: number | null | undefined;
  workingCapitalChange: number;
  growthRate?: number;
  requiredReturn?: number;
  marginOfSafety?: number;
  numYears?: number;
}

export interface DiscountedCashFlowParams {
  freeCashFlow: number | null | undefined;
  growthRate?: number;
  discountRate?: number;
  numYears?: number;
}

const MAX_GROWTH = 0.25;
const TERMINAL_GROWTH_SHARE = 0.4;
const TERMINAL_GROWTH_CAP = 0.03;
const BULLISH_GAP = 0.1;
const BEARISH_GAP = -0.2;

function isFiniteNumber(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function terminalGrowthFor(growthRate: number): number {
  return Math.min(growthRate * TERMINAL_GROWTH_SHARE, TERMINAL_GROWTH_CAP);
}

export function calculateWorkingCapitalChange(current: FinancialLineItem, previous: FinancialLineItem): number {
  return (current.working_capital ?? 0) - (previous.working_capital ?? 0);
}

/**
 * Owner earnings (net income + D&A - capex - working-capital change) grown on a
 * tapering curve, discounted at the required return, plus a terminal value,
 * less the margin of safety. Returns 0 when owner earnings are not positive.
 */
export function calculateOwnerEarningsValue(params: OwnerEarningsParams): number {
  const { netIncome, depreciation, capex, workingCapitalChange } = params;
  const requiredReturn = params.requiredReturn ?? 0.15;
  const marginOfSafety = params.marginOfSafety ?? 0.25;
  const numYears = params.numYears ?? 5;

  if (
    !isFiniteNumber(netIncome) ||
    !isFiniteNumber(depreciation) ||
    !isFiniteNumber(capex) ||
    !Number.isFinite(workingCapitalChange)
  ) {
    return 0;
  }

  const ownerEarnings = netIncome + depreciation - capex - workingCapitalChange;
  if (ownerEarnings <= 0) return 0;

  const growthRate = clamp(params.growthRate ?? 0.05, 0, MAX_GROWTH);
  const presentValues: number[] = [];
  for (let year = 1; year <= numYears; year++) {
    const yearGrowth = growthRate * (1 - year / (2 * numYears));
    const futureValue = ownerEarnings * (1 + yearGrowth) ** year;
    presentValues.push(futureValue / (1 + requiredReturn) ** year);
  }

  const terminalGrowth = terminalGrowthFor(growthRate);
  const lastValue = presentValues[presentValues.length - 1] ?? 0;
  const terminalValue = (lastValue * (1 + terminalGrowth)) / (requiredReturn - terminalGrowth);
  const terminalDiscounted = terminalValue / (1 + requiredReturn) ** numYears;

  const intrinsic = presentValues.reduce((sum, value) => sum + value, 0) + terminalDiscounted;
  return Math.max(intrinsic * (1 - marginOfSafety), 0);
}

export function calculateIntrinsicValue(params: DiscountedCashFlowParams): number {
  const { freeCashFlow } = params;
  const discountRate = params.discountRate ?? 0.1;
  const numYears = params.numYears ?? 5;

  if (!isFiniteNumber(freeCashFlow) || freeCashFlow <= 0) return 0;

  const growthRate = clamp(params.growthRate ?? 0.05, 0, MAX_GROWTH);
  const terminalGrowth = terminalGrowthFor(growthRate);

  let total = 0;
  for (let year = 1; year <= numYears; year++) {
    total += (freeCashFlow * (1 + growthRate) ** year) / (1 + discountRate) ** year;
  }

  const terminalYearCashFlow = freeCashFlow * (1 + growthRate) ** numYears;
  const terminalValue = (terminalYearCashFlow * (1 + terminalGrowth)) / (discountRate - terminalGrowth);
  total += terminalValue / (1 + discountRate) ** numYears;

  return Math.max(total, 0);
}

export function classifyValuationGap(gap: number): SignalDirection {
  if (gap > BULLISH_GAP) return "bullish";
  if (gap < BEARISH_GAP) return "bearish";
  return "neutral";
}

function formatMoney(value: number): string {
  return `$${value.toFixed(2)}`;
}

export function valuationSignal(input: ValuationInput): Signal {
  const { metrics, lineItems, marketCap } = input;
  if (!Number.isFinite(marketCap) || marketCap <= 0) {
    throw createError(ErrorCode.MISSING_PRECONDITION, "Valuation requires a positive market cap", { marketCap });
  }

  const [current, previous] = lineItems;
  if (!current || !previous) {
    throw createError(ErrorCode.MISSING_PRECONDITION, "Valuation requires current and previous line items", {
      periods: lineItems.length,
    });
  }

  const growthRate = metrics.earnings_growth ?? 0;
  const ownerEarningsValue = calculateOwnerEarningsValue({
    netIncome: current.net_income,
    depreciation: current.depreciation_and_amortization,
    capex: current.capital_expenditure,
    workingCapitalChange: calculateWorkingCapitalChange(current, previous),
    growthRate,
  });
  const dcfValue = calculateIntrinsicValue({ freeCashFlow: current.free_cash_flow, growthRate });

  const dcfGap = (dcfValue - marketCap) / marketCap;
  const ownerEarningsGap = (ownerEarningsValue - marketCap) / marketCap;
  const valuationGap = (dcfGap + ownerEarningsGap) / 2;

  return {
    direction: classifyValuationGap(valuationGap),
    confidence: Math.min(Math.abs(valuationGap), 1),
    rationale: {
      dcf_analysis: `${classifyValuationGap(dcfGap)}: intrinsic value ${formatMoney(dcfValue)}, market cap ${formatMoney(marketCap)}, gap ${formatPct(dcfGap, 1)}`,
      owner_earnings_analysis: `${classifyValuationGap(ownerEarningsGap)}: owner earnings value ${formatMoney(ownerEarningsValue)}, market cap ${formatMoney(marketCap)}, gap ${formatPct(ownerEarningsGap, 1)}`,
      valuation_gap: formatPct(valuationGap, 1),
    },
  };
}
