export type SignalDirection = "bullish" | "bearish" | "neutral";
export type ThesisStance = Exclude<SignalDirection, "neutral">;
export type TradingAction = "buy" | "sell" | "hold" | "reduce";
export type DecisionAction = Exclude<TradingAction, "reduce">;

export interface Signal {
  direction: SignalDirection;
  /** In [0, 1]. */
  confidence: number;
  rationale: Record<string, string>;
}

export const SIGNAL_SOURCES = ["technical", "fundamentals", "sentiment", "valuation"] as const;
export type SignalSource = (typeof SIGNAL_SOURCES)[number];

export type AnalystSignals = Record<SignalSource, Signal>;

export interface Thesis {
  stance: ThesisStance;
  confidence: number;
  points: string[];
  /** One score per signal source, in `SIGNAL_SOURCES` order. */
  scores: number[];
}

export type LlmOpinionStatus = "ok" | "failed" | "parse_failed" | "unavailable";

export interface DebateResult {
  signal: SignalDirection;
  confidence: number;
  bullConfidence: number;
  bearConfidence: number;
  confidenceDiff: number;
  llmScore: number;
  mixedConfidenceDiff: number;
  llmStatus: LlmOpinionStatus;
  llmAnalysis: string | null;
  llmReasoning: string | null;
  /** Set when `llmStatus` is not "ok". */
  llmFailure: string | null;
  debateSummary: string[];
  reasoning: string;
}

export interface Portfolio {
  cash: number;
  shares: number;
}

export interface RiskMetrics {
  volatility: number;
  volatilityPercentile: number;
  var95: number;
  maxDrawdown: number;
}

export interface StressResult {
  decline: number;
  potentialLoss: number;
  /** NaN when the portfolio is worth nothing. */
  portfolioImpact: number;
}

export type StressScenario = "market_crash" | "moderate_decline" | "slight_decline";

export interface RiskAssessment {
  riskScore: number;
  marketRiskScore: number;
  maxPositionValue: number;
  tradingAction: TradingAction;
  lastPrice: number;
  metrics: RiskMetrics;
  stressResults: Record<StressScenario, StressResult>;
  debateAnalysis: {
    bullConfidence: number;
    bearConfidence: number;
    debateConfidence: number;
    debateSignal: SignalDirection;
  };
  reasoning: string;
}

export interface SignalBreakdownEntry {
  source: SignalSource;
  direction: SignalDirection;
  confidence: number;
  weight: number;
}

export interface Decision {
  ticker: string;
  asOf: string;
  action: DecisionAction;
  quantity: number;
  confidence: number;
  perSignalBreakdown: SignalBreakdownEntry[];
  risk: {
    riskScore: number;
    tradingAction: TradingAction;
    maxPositionValue: number;
    maxShares: number;
    lotSize: number;
    lastPrice: number;
  };
  /** The quantity the model asked for before local constraints. */
  requestedQuantity: number;
  constraintsApplied: string[];
  source: "model" | "fallback";
  fallbackCause?: string;
  reasoning: string;
}
