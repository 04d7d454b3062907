import { formatPct } from "../lib/utils";
import type { FinancialMetrics } from "../providers/types";
import type { Signal, SignalDirection } from "./types";

type Metric = number | null | undefined;

interface SubSignal {
  name: string;
  direction: SignalDirection;
  details: string;
}

function present(value: Metric): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/** Nonzero and finite; zero counts as missing for the health checks. */
function nonzero(value: Metric): value is number {
  return present(value) && value !== 0;
}

function countAbove(pairs: Array<[Metric, number]>): number {
  return pairs.filter(([value, threshold]) => present(value) && value > threshold).length;
}

function countBelow(pairs: Array<[Metric, number]>): number {
  return pairs.filter(([value, threshold]) => present(value) && value < threshold).length;
}

/** 2+ of 3 checks passing is bullish, none is bearish. */
function scoreToDirection(score: number): SignalDirection {
  if (score >= 2) return "bullish";
  if (score === 0) return "bearish";
  return "neutral";
}

function pct(label: string, value: Metric): string {
  return present(value) ? `${label}: ${formatPct(value)}` : `${label}: N/A`;
}

function ratio(label: string, value: Metric): string {
  return nonzero(value) ? `${label}: ${value.toFixed(2)}` : `${label}: N/A`;
}

function profitability(metrics: FinancialMetrics): SubSignal {
  const score = countAbove([
    [metrics.return_on_equity, 0.15],
    [metrics.net_margin, 0.2],
    [metrics.operating_margin, 0.15],
  ]);
  return {
    name: "profitability_signal",
    direction: scoreToDirection(score),
    details: [
      pct("ROE", metrics.return_on_equity),
      pct("Net Margin", metrics.net_margin),
      pct("Op Margin", metrics.operating_margin),
    ].join(", "),
  };
}

function growth(metrics: FinancialMetrics): SubSignal {
  const score = countAbove([
    [metrics.revenue_growth, 0.1],
    [metrics.earnings_growth, 0.1],
    [metrics.book_value_growth, 0.1],
  ]);
  return {
    name: "growth_signal",
    direction: scoreToDirection(score),
    details: [
      pct("Revenue Growth", metrics.revenue_growth),
      pct("Earnings Growth", metrics.earnings_growth),
      pct("Book Value Growth", metrics.book_value_growth),
    ].join(", "),
  };
}

function financialHealth(metrics: FinancialMetrics): SubSignal {
  const { current_ratio, debt_to_equity, free_cash_flow_per_share, earnings_per_share } = metrics;
  let score = 0;
  if (nonzero(current_ratio) && current_ratio > 1.5) score += 1;
  if (nonzero(debt_to_equity) && debt_to_equity < 0.5) score += 1;
  if (
    nonzero(free_cash_flow_per_share) &&
    nonzero(earnings_per_share) &&
    free_cash_flow_per_share > earnings_per_share * 0.8
  ) {
    score += 1;
  }
  return {
    name: "financial_health_signal",
    direction: scoreToDirection(score),
    details: [ratio("Current Ratio", current_ratio), ratio("D/E", debt_to_equity)].join(", "),
  };
}

function priceRatios(metrics: FinancialMetrics): SubSignal {
  const score = countBelow([
    [metrics.pe_ratio, 25],
    [metrics.price_to_book, 3],
    [metrics.price_to_sales, 5],
  ]);
  return {
    name: "price_ratios_signal",
    direction: scoreToDirection(score),
    details: [
      ratio("P/E", metrics.pe_ratio),
      ratio("P/B", metrics.price_to_book),
      ratio("P/S", metrics.price_to_sales),
    ].join(", "),
  };
}

export function fundamentalsSignal(metrics: FinancialMetrics): Signal {
  const subSignals = [profitability(metrics), growth(metrics), financialHealth(metrics), priceRatios(metrics)];
  const bullish = subSignals.filter((s) => s.direction === "bullish").length;
  const bearish = subSignals.filter((s) => s.direction === "bearish").length;

  let direction: SignalDirection = "neutral";
  if (bullish > bearish) direction = "bullish";
  else if (bearish > bullish) direction = "bearish";

  const rationale: Record<string, string> = {};
  for (const sub of subSignals) {
    rationale[sub.name] = `${sub.direction}: ${sub.details}`;
  }

  return {
    direction,
    confidence: Math.max(bullish, bearish) / subSignals.length,
    rationale,
  };
}
