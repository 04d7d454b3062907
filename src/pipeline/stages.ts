import { runDebate } from "../agents/debate-room";
import { fundamentalsSignal } from "../agents/fundamentals";
import { decide } from "../agents/portfolio-manager";
import { buildThesis } from "../agents/researchers";
import { assessRisk } from "../agents/risk-manager";
import { sentimentSignal } from "../agents/sentiment";
import { technicalSignal } from "../agents/technical";
import { SIGNAL_SOURCES, type AnalystSignals } from "../agents/types";
import { valuationSignal } from "../agents/valuation";
import type { AgentType } from "../lib/agents/protocol";
import { createError, ErrorCode } from "../lib/errors";
import type { Logger } from "../lib/logger";
import type { DeskConfig } from "../policy/config";
import type { CompletionClient } from "../providers/llm/completion-client";
import type { MarketDataProvider } from "../providers/types";
import { hasAllSignals, type RunContext, type StageResult } from "./run-context";

export interface StageDeps {
  client: CompletionClient;
  config: DeskConfig;
  logger: Logger;
  market: MarketDataProvider;
}

export interface StageOutput {
  result: StageResult;
  /** Set when the stage fell back to a local default. */
  note?: string;
}

export type StageHandler = (context: RunContext, deps: StageDeps) => Promise<StageOutput>;

export const SIGNAL_STAGES = [
  "technical_analyst",
  "fundamentals_analyst",
  "sentiment_analyst",
  "valuation_analyst",
] as const satisfies readonly AgentType[];

export const DECISION_STAGES = [
  "researcher_bull",
  "researcher_bear",
  "debate_room",
  "risk_manager",
  "portfolio_manager",
] as const satisfies readonly AgentType[];

const NEWS_LIMIT = 50;

function requireStage<T>(value: T | undefined, name: string, stage: AgentType): T {
  if (value === undefined) {
    throw createError(ErrorCode.MISSING_PRECONDITION, `${stage} requires the ${name} result`);
  }
  return value;
}

function requireSignals(context: RunContext, stage: AgentType): AnalystSignals {
  if (!hasAllSignals(context.signals)) {
    const missing = SIGNAL_SOURCES.filter((source) => !context.signals[source]);
    throw createError(ErrorCode.MISSING_PRECONDITION, `${stage} requires all four analyst signals`, { missing });
  }
  return context.signals;
}

export const STAGES: Record<AgentType, StageHandler> = {
  technical_analyst: async (context) => ({
    result: { signal: { source: "technical", value: technicalSignal([...context.bars]) } },
  }),

  fundamentals_analyst: async (context, { market }) => {
    const metrics = await market.getFinancialMetrics(context.ticker);
    if (!metrics) {
      throw createError(ErrorCode.MISSING_PRECONDITION, `No financial metrics for ${context.ticker}`);
    }
    return { result: { signal: { source: "fundamentals", value: fundamentalsSignal(metrics) } } };
  },

  sentiment_analyst: async (context, { market }) => {
    const articles = await market.getNews(context.ticker, { limit: NEWS_LIMIT, end: context.asOf });
    return {
      result: { signal: { source: "sentiment", value: sentimentSignal({ articles, asOf: context.asOf }) } },
      note: articles.length === 0 ? "no news articles; sentiment scored as 0" : undefined,
    };
  },

  valuation_analyst: async (context, { market }) => {
    const [metrics, lineItems, snapshot] = await Promise.all([
      market.getFinancialMetrics(context.ticker),
      market.getFinancialLineItems(context.ticker),
      market.getMarketSnapshot(context.ticker),
    ]);
    const value = valuationSignal({
      metrics: metrics ?? {},
      lineItems,
      marketCap: snapshot?.market_cap ?? 0,
    });
    return { result: { signal: { source: "valuation", value } } };
  },

  researcher_bull: async (context, { config }) => ({
    result: {
      bullThesis: buildThesis("bullish", requireSignals(context, "researcher_bull"), config.thesis.fallbackConfidence),
    },
  }),

  researcher_bear: async (context, { config }) => ({
    result: {
      bearThesis: buildThesis("bearish", requireSignals(context, "researcher_bear"), config.thesis.fallbackConfidence),
    },
  }),

  debate_room: async (context, { client, config, logger }) => {
    const debate = await runDebate(
      {
        ticker: context.ticker,
        bull: requireStage(context.bullThesis, "bull thesis", "debate_room"),
        bear: requireStage(context.bearThesis, "bear thesis", "debate_room"),
      },
      { client, config, logger: logger.child("debate_room") }
    );
    return {
      result: { debate },
      note: debate.llmStatus === "ok" ? undefined : `model opinion ${debate.llmStatus}: ${debate.llmFailure ?? ""}`,
    };
  },

  risk_manager: async (context, { config, logger }) => ({
    result: {
      risk: assessRisk(
        {
          closes: context.bars.map((bar) => bar.c),
          debate: requireStage(context.debate, "debate", "risk_manager"),
          portfolio: context.portfolio,
        },
        config.risk,
        logger.child("risk_manager")
      ),
    },
  }),

  portfolio_manager: async (context, { client, config, logger }) => {
    const decision = await decide(
      {
        ticker: context.ticker,
        asOf: context.asOf,
        signals: requireSignals(context, "portfolio_manager"),
        risk: requireStage(context.risk, "risk", "portfolio_manager"),
        portfolio: context.portfolio,
      },
      { client, config, logger: logger.child("portfolio_manager") }
    );
    return {
      result: { decision },
      note: decision.source === "fallback" ? decision.fallbackCause : undefined,
    };
  },
};
