import type { Env } from "../env";
import { normalizeLogLevel, type LogLevel } from "../lib/logger";
import { clamp, parseBoolean, parseNumber } from "../lib/utils";

export type PositionSizingScore = "market" | "total";

export interface SignalWeights {
  valuation: number;
  fundamentals: number;
  technical: number;
  sentiment: number;
}

export interface RetryPolicy {
  /** Per-attempt timeout for one completion call. */
  timeoutMs: number;
  maxRetries: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
}

export interface DeskConfig {
  logLevel: LogLevel;
  lotSize: number;
  thesis: {
    fallbackConfidence: number;
  };
  debate: {
    /** Share of the external opinion in the mixed confidence difference. */
    llmWeight: number;
    neutralBand: number;
  };
  risk: {
    basePositionPct: number;
    tradingDaysPerYear: number;
    volatilityWindow: number;
    drawdownWindow: number;
    minObservations: number;
    positionSizingScore: PositionSizingScore;
  };
  decision: {
    promoteSubLotBuys: boolean;
    fallbackConfidence: number;
    weights: SignalWeights;
  };
  llm: RetryPolicy & {
    temperature: number;
    maxTokens: number;
  };
}

export type DeskConfigOverrides = Partial<{
  [K in keyof DeskConfig]: DeskConfig[K] extends object ? Partial<DeskConfig[K]> : DeskConfig[K];
}>;

export const DEFAULT_SIGNAL_WEIGHTS: SignalWeights = {
  valuation: 0.35,
  fundamentals: 0.3,
  technical: 0.25,
  sentiment: 0.1,
};

function normalizeSizingScore(value: string | undefined): PositionSizingScore {
  return value?.trim().toLowerCase() === "total" ? "total" : "market";
}

function positiveInt(value: number, fallback: number): number {
  return Number.isFinite(value) && value >= 1 ? Math.floor(value) : fallback;
}

export function getDefaultDeskConfig(env: Env = {}): DeskConfig {
  return {
    logLevel: normalizeLogLevel(env.DESK_LOG_LEVEL),
    lotSize: positiveInt(parseNumber(env.DESK_LOT_SIZE, 100), 100),
    thesis: {
      fallbackConfidence: 0.3,
    },
    debate: {
      llmWeight: clamp(parseNumber(env.DESK_DEBATE_LLM_WEIGHT, 0.3), 0, 1),
      neutralBand: 0.1,
    },
    risk: {
      basePositionPct: clamp(parseNumber(env.DESK_BASE_POSITION_PCT, 0.25), 0, 1),
      tradingDaysPerYear: 252,
      volatilityWindow: 120,
      drawdownWindow: 60,
      minObservations: 60,
      positionSizingScore: normalizeSizingScore(env.DESK_POSITION_SIZING_SCORE),
    },
    decision: {
      promoteSubLotBuys: parseBoolean(env.DESK_PROMOTE_SUB_LOT_BUYS, true),
      fallbackConfidence: 0.7,
      weights: { ...DEFAULT_SIGNAL_WEIGHTS },
    },
    llm: {
      timeoutMs: Math.max(1, parseNumber(env.DESK_LLM_TIMEOUT_MS, 30_000)),
      maxRetries: Math.max(0, Math.floor(parseNumber(env.DESK_LLM_MAX_RETRIES, 3))),
      initialBackoffMs: Math.max(0, parseNumber(env.DESK_LLM_INITIAL_BACKOFF_MS, 1_000)),
      maxBackoffMs: Math.max(0, parseNumber(env.DESK_LLM_MAX_BACKOFF_MS, 8_000)),
      temperature: 0.2,
      maxTokens: 1024,
    },
  };
}

export function mergeDeskConfigWithDefaults(overrides: DeskConfigOverrides | undefined, env: Env = {}): DeskConfig {
  const defaults = getDefaultDeskConfig(env);
  if (!overrides) return defaults;

  return {
    logLevel: overrides.logLevel ?? defaults.logLevel,
    lotSize: positiveInt(overrides.lotSize ?? defaults.lotSize, defaults.lotSize),
    thesis: { ...defaults.thesis, ...(overrides.thesis ?? {}) },
    debate: { ...defaults.debate, ...(overrides.debate ?? {}) },
    risk: { ...defaults.risk, ...(overrides.risk ?? {}) },
    decision: {
      ...defaults.decision,
      ...(overrides.decision ?? {}),
      weights: { ...defaults.decision.weights, ...(overrides.decision?.weights ?? {}) },
    },
    llm: { ...defaults.llm, ...(overrides.llm ?? {}) },
  };
}
