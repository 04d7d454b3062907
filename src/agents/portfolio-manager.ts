import { createError, ErrorCode } from "../lib/errors";
import { parseJsonObject, readNumber, readString } from "../lib/json-extract";
import { createLogger, type Logger } from "../lib/logger";
import { clamp } from "../lib/utils";
import type { DeskConfig, SignalWeights } from "../policy/config";
import type { CompletionClient } from "../providers/llm/completion-client";
import type { ChatMessage } from "../providers/types";
import type {
  AnalystSignals,
  Decision,
  DecisionAction,
  Portfolio,
  RiskAssessment,
  SignalBreakdownEntry,
  SignalSource,
} from "./types";

export interface DecisionInput {
  ticker: string;
  asOf: string;
  signals: AnalystSignals;
  risk: RiskAssessment;
  portfolio: Portfolio;
}

export interface DecisionDeps {
  client: CompletionClient;
  config: Pick<DeskConfig, "lotSize" | "decision">;
  logger?: Logger;
}

export interface ShareLimits {
  /** Shares the position ceiling allows, in whole lots. */
  byPosition: number;
  /** Shares the cash balance pays for, in whole lots. */
  byCash: number;
  maxBuyShares: number;
}

export interface ModelOrder {
  action: DecisionAction;
  quantity: number;
  confidence: number;
  reasoning: string;
}

export type OrderParseOutcome = { ok: true; order: ModelOrder } | { ok: false; reason: string };

const DECISION_ACTIONS: readonly DecisionAction[] = ["buy", "sell", "hold"];

/** Descending weight; the prompt and breakdown list sources in this order. */
const WEIGHTED_SOURCES: readonly SignalSource[] = ["valuation", "fundamentals", "technical", "sentiment"];

const SOURCE_LABELS: Record<SignalSource, string> = {
  valuation: "Valuation Analysis",
  fundamentals: "Fundamental Analysis",
  technical: "Technical Analysis",
  sentiment: "Sentiment Analysis",
};

export function quantizeDown(quantity: number, lotSize: number): number {
  if (!Number.isFinite(quantity) || quantity <= 0) return 0;
  return Math.floor(quantity / lotSize) * lotSize;
}

export function computeShareLimits(risk: RiskAssessment, portfolio: Portfolio, lotSize: number): ShareLimits {
  const price = risk.lastPrice;
  const byPosition = quantizeDown(risk.maxPositionValue / price, lotSize);
  const byCash = quantizeDown(portfolio.cash / price, lotSize);
  return { byPosition, byCash, maxBuyShares: Math.min(byPosition, byCash) };
}

export function buildSignalBreakdown(signals: AnalystSignals, weights: SignalWeights): SignalBreakdownEntry[] {
  return WEIGHTED_SOURCES.map((source) => ({
    source,
    direction: signals[source].direction,
    confidence: signals[source].confidence,
    weight: weights[source],
  }));
}

function isDecisionAction(value: string): value is DecisionAction {
  return DECISION_ACTIONS.some((action) => action === value);
}

export function parseOrderReply(content: string): OrderParseOutcome {
  const parsed = parseJsonObject(content);
  if (!parsed.ok) return { ok: false, reason: parsed.reason };

  const rawAction = readString(parsed.value.action)?.toLowerCase() ?? "";
  if (!isDecisionAction(rawAction)) {
    return { ok: false, reason: `invalid action: ${String(parsed.value.action)}` };
  }

  const quantity = readNumber(parsed.value.quantity);
  if (quantity === null) return { ok: false, reason: "quantity missing or not numeric" };

  const confidence = readNumber(parsed.value.confidence);
  if (confidence === null) return { ok: false, reason: "confidence missing or not numeric" };

  return {
    ok: true,
    order: {
      action: rawAction,
      quantity,
      confidence: clamp(confidence, 0, 1),
      reasoning: readString(parsed.value.reasoning) ?? "No reasoning provided",
    },
  };
}

/**
 * Bring a model order inside the hard limits: whole lots only, buys within the
 * position and cash ceilings, sells within the shares held.
 */
export function applyConstraints(
  order: ModelOrder,
  limits: ShareLimits,
  portfolio: Portfolio,
  options: { lotSize: number; promoteSubLotBuys: boolean }
): { quantity: number; constraintsApplied: string[] } {
  const { lotSize } = options;
  const constraintsApplied: string[] = [];

  if (order.action === "hold") {
    if (order.quantity !== 0) constraintsApplied.push("hold carries no quantity");
    return { quantity: 0, constraintsApplied };
  }

  if (order.action === "buy") {
    let quantity = quantizeDown(order.quantity, lotSize);
    if (quantity !== order.quantity) {
      constraintsApplied.push(`quantized to lot size ${lotSize}`);
    }
    if (order.quantity > 0 && quantity === 0 && options.promoteSubLotBuys) {
      quantity = lotSize;
      constraintsApplied.push("sub-lot buy promoted to one lot");
    }
    if (quantity > limits.maxBuyShares) {
      quantity = limits.maxBuyShares;
      const bound = limits.byCash < limits.byPosition ? "cash" : "position ceiling";
      constraintsApplied.push(`clipped to ${limits.maxBuyShares} shares by ${bound}`);
    }
    return { quantity, constraintsApplied };
  }

  let quantity = clamp(order.quantity, 0, portfolio.shares);
  if (quantity !== order.quantity) {
    constraintsApplied.push(`clipped to ${quantity} shares held`);
  }
  const quantized = quantizeDown(quantity, lotSize);
  if (quantized !== quantity) {
    constraintsApplied.push(`quantized to lot size ${lotSize}`);
    quantity = quantized;
  }
  return { quantity, constraintsApplied };
}

export function buildDecisionMessages(
  input: DecisionInput,
  limits: ShareLimits,
  options: { lotSize: number; weights: SignalWeights }
): ChatMessage[] {
  const { ticker, signals, risk, portfolio } = input;
  const weightLines = WEIGHTED_SOURCES.map(
    (source, i) => `${i + 1}. ${SOURCE_LABELS[source]} (${Math.round(options.weights[source] * 100)}% weight)`
  ).join("\n");

  const system = `You are a portfolio manager making final trading decisions.
Follow the risk manager's trading action and never exceed its position limit.

Weigh the analyst signals for direction and timing:
${weightLines}

Trading rules:
- Only buy with available cash; only sell shares that are held
- Quantities are whole multiples of the lot size

Reply with JSON only:
{
  "action": "buy" | "sell" | "hold",
  "quantity": <non-negative integer>,
  "confidence": <0.0-1.0>,
  "reasoning": "how the signals were weighted"
}`;

  const signalLines = WEIGHTED_SOURCES.map(
    (source) => `${SOURCE_LABELS[source]}: ${JSON.stringify(signals[source])}`
  ).join("\n");

  const user = `Make the trading decision for ${ticker}.

${signalLines}
Risk Management: ${JSON.stringify({
    trading_action: risk.tradingAction,
    risk_score: risk.riskScore,
    max_position_value: Number(risk.maxPositionValue.toFixed(2)),
    reasoning: risk.reasoning,
  })}

Portfolio:
Cash: ${portfolio.cash.toFixed(2)}
Current Position: ${portfolio.shares} shares
Last Price: ${risk.lastPrice.toFixed(2)}
Lot Size: ${options.lotSize}
Max Buy Quantity: ${limits.maxBuyShares}`;

  return [
    { role: "system", content: system },
    { role: "user", content: user },
  ];
}

export async function decide(input: DecisionInput, deps: DecisionDeps): Promise<Decision> {
  const logger = deps.logger ?? createLogger("portfolio_manager");
  const { lotSize, decision: settings } = deps.config;
  const { risk, portfolio } = input;

  if (!Number.isFinite(risk.lastPrice) || risk.lastPrice <= 0) {
    throw createError(ErrorCode.INVALID_INPUT, "Decision requires a positive last price", {
      lastPrice: risk.lastPrice,
    });
  }

  const limits = computeShareLimits(risk, portfolio, lotSize);
  const base = {
    ticker: input.ticker,
    asOf: input.asOf,
    perSignalBreakdown: buildSignalBreakdown(input.signals, settings.weights),
    risk: {
      riskScore: risk.riskScore,
      tradingAction: risk.tradingAction,
      maxPositionValue: risk.maxPositionValue,
      maxShares: limits.maxBuyShares,
      lotSize,
      lastPrice: risk.lastPrice,
    },
  };

  const fallback = (cause: string): Decision => {
    logger.warn("Decision falls back to hold", { ticker: input.ticker, cause });
    return {
      ...base,
      action: "hold",
      quantity: 0,
      confidence: settings.fallbackConfidence,
      requestedQuantity: 0,
      constraintsApplied: [],
      source: "fallback",
      fallbackCause: cause,
      reasoning: `Holding by default: ${cause}`,
    };
  };

  const outcome = await deps.client.complete({
    context: "portfolio_manager",
    messages: buildDecisionMessages(input, limits, { lotSize, weights: settings.weights }),
  });
  if (outcome.status === "unavailable") return fallback(outcome.reason);
  if (outcome.status === "failed") return fallback(`completion failed: ${outcome.error}`);

  const parsed = parseOrderReply(outcome.content);
  if (!parsed.ok) return fallback(`unusable reply: ${parsed.reason}`);

  const { order } = parsed;
  const { quantity, constraintsApplied } = applyConstraints(order, limits, portfolio, {
    lotSize,
    promoteSubLotBuys: settings.promoteSubLotBuys,
  });

  const decision: Decision = {
    ...base,
    action: order.action,
    quantity,
    confidence: order.confidence,
    requestedQuantity: order.quantity,
    constraintsApplied,
    source: "model",
    reasoning: order.reasoning,
  };

  logger.info("Decision made", {
    ticker: input.ticker,
    action: decision.action,
    quantity: decision.quantity,
    requestedQuantity: decision.requestedQuantity,
    confidence: decision.confidence,
    constraints: constraintsApplied.length,
  });
  return decision;
}
