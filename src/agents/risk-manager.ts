import { createError, ErrorCode } from "../lib/errors";
import { createLogger, type Logger } from "../lib/logger";
import {
  annualizedVolatility,
  dailyReturns,
  maxDrawdown,
  quantile,
  volatilityPercentile,
} from "../lib/risk-metrics";
import { formatPct } from "../lib/utils";
import type { DeskConfig } from "../policy/config";
import type {
  DebateResult,
  Portfolio,
  RiskAssessment,
  RiskMetrics,
  StressResult,
  StressScenario,
  TradingAction,
} from "./types";

export const STRESS_SCENARIOS: Record<StressScenario, number> = {
  market_crash: -0.2,
  moderate_decline: -0.1,
  slight_decline: -0.05,
};

const MAX_RISK_SCORE = 10;

export interface RiskInput {
  closes: number[];
  debate: DebateResult;
  portfolio: Portfolio;
}

export function validatePortfolio(portfolio: Portfolio): void {
  const { cash, shares } = portfolio;
  if (!Number.isFinite(cash) || cash < 0 || !Number.isFinite(shares) || shares < 0) {
    throw createError(ErrorCode.INVALID_INPUT, "Portfolio cash and shares must be non-negative numbers", {
      cash,
      shares,
    });
  }
}

export function validateCloses(closes: number[], minObservations: number): void {
  if (closes.length < minObservations) {
    throw createError(
      ErrorCode.MISSING_PRECONDITION,
      `Risk assessment requires at least ${minObservations} closing prices`,
      { observations: closes.length }
    );
  }
  const badIndex = closes.findIndex((close) => !Number.isFinite(close) || close <= 0);
  if (badIndex !== -1) {
    throw createError(ErrorCode.INVALID_INPUT, "Closing prices must be positive numbers", {
      index: badIndex,
      value: closes[badIndex],
    });
  }
}

export function computeRiskMetrics(closes: number[], settings: DeskConfig["risk"]): RiskMetrics {
  const returns = dailyReturns(closes);
  return {
    volatility: annualizedVolatility(returns, settings.tradingDaysPerYear),
    volatilityPercentile: volatilityPercentile(returns, settings.volatilityWindow, settings.tradingDaysPerYear),
    var95: quantile(returns, 0.05),
    maxDrawdown: maxDrawdown(closes, settings.drawdownWindow),
  };
}

export function scoreMarketRisk(metrics: RiskMetrics): number {
  let score = 0;

  if (metrics.volatilityPercentile > 1.5) score += 2;
  else if (metrics.volatilityPercentile > 1.0) score += 1;

  // var95 is a (usually negative) daily return
  if (metrics.var95 < -0.03) score += 2;
  else if (metrics.var95 < -0.02) score += 1;

  if (metrics.maxDrawdown < -0.2) score += 2;
  else if (metrics.maxDrawdown < -0.1) score += 1;

  return score;
}

/** Close debates and low-conviction outcomes add risk. */
export function scoreDebateUncertainty(debate: DebateResult): number {
  let score = 0;
  if (Math.abs(debate.bullConfidence - debate.bearConfidence) < 0.1) score += 1;
  if (debate.confidence < 0.3) score += 1;
  return score;
}

export function positionCeiling(portfolioValue: number, score: number, basePositionPct: number): number {
  const base = Math.max(portfolioValue, 0) * basePositionPct;
  if (score >= 4) return base * 0.5;
  if (score >= 2) return base * 0.75;
  return base;
}

export function tradingActionFor(riskScore: number, debate: DebateResult): TradingAction {
  if (riskScore >= 9) return "hold";
  if (riskScore >= 7) return "reduce";
  if (debate.signal === "bullish" && debate.confidence > 0.5) return "buy";
  if (debate.signal === "bearish" && debate.confidence > 0.5) return "sell";
  return "hold";
}

export function stressTest(positionValue: number, cash: number): Record<StressScenario, StressResult> {
  const total = cash + positionValue;
  const run = (decline: number): StressResult => {
    const potentialLoss = positionValue * decline;
    return {
      decline,
      potentialLoss,
      portfolioImpact: total !== 0 ? potentialLoss / total : Number.NaN,
    };
  };
  return {
    market_crash: run(STRESS_SCENARIOS.market_crash),
    moderate_decline: run(STRESS_SCENARIOS.moderate_decline),
    slight_decline: run(STRESS_SCENARIOS.slight_decline),
  };
}

export function assessRisk(
  input: RiskInput,
  settings: DeskConfig["risk"],
  logger: Logger = createLogger("risk_manager")
): RiskAssessment {
  const { closes, debate, portfolio } = input;
  validatePortfolio(portfolio);
  validateCloses(closes, settings.minObservations);

  const metrics = computeRiskMetrics(closes, settings);
  const marketRiskScore = scoreMarketRisk(metrics);
  const riskScore = Math.min(Math.round(marketRiskScore + scoreDebateUncertainty(debate)), MAX_RISK_SCORE);

  const lastPrice = closes[closes.length - 1] ?? 0;
  const positionValue = portfolio.shares * lastPrice;
  const portfolioValue = portfolio.cash + positionValue;
  const sizingScore = settings.positionSizingScore === "total" ? riskScore : marketRiskScore;
  const maxPositionValue = positionCeiling(portfolioValue, sizingScore, settings.basePositionPct);
  const tradingAction = tradingActionFor(riskScore, debate);

  const assessment: RiskAssessment = {
    riskScore,
    marketRiskScore,
    maxPositionValue,
    tradingAction,
    lastPrice,
    metrics,
    stressResults: stressTest(positionValue, portfolio.cash),
    debateAnalysis: {
      bullConfidence: debate.bullConfidence,
      bearConfidence: debate.bearConfidence,
      debateConfidence: debate.confidence,
      debateSignal: debate.signal,
    },
    reasoning:
      `Risk Score ${riskScore}/10: Market Risk=${marketRiskScore}, ` +
      `Volatility=${formatPct(metrics.volatility)}, VaR=${formatPct(metrics.var95)}, ` +
      `Max Drawdown=${formatPct(metrics.maxDrawdown)}, Debate Signal=${debate.signal}`,
  };

  logger.info("Risk assessed", {
    riskScore,
    marketRiskScore,
    maxPositionValue,
    tradingAction,
  });
  return assessment;
}
