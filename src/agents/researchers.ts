import { createError, ErrorCode } from "../lib/errors";
import { formatPct } from "../lib/utils";
import {
  SIGNAL_SOURCES,
  type AnalystSignals,
  type SignalDirection,
  type SignalSource,
  type Thesis,
  type ThesisStance,
} from "./types";

export const DEFAULT_THESIS_FALLBACK_CONFIDENCE = 0.3;

interface PointTemplates {
  supporting: (confidence: string) => string;
  hedging: string;
}

const THESIS_POINTS: Record<ThesisStance, Record<SignalSource, PointTemplates>> = {
  bullish: {
    technical: {
      supporting: (c) => `Technical indicators show bullish momentum with ${c} confidence`,
      hedging: "Technical indicators may be conservative, presenting buying opportunities",
    },
    fundamentals: {
      supporting: (c) => `Strong fundamentals with ${c} confidence`,
      hedging: "Company fundamentals show potential for improvement",
    },
    sentiment: {
      supporting: (c) => `Positive market sentiment with ${c} confidence`,
      hedging: "Market sentiment may be overly pessimistic, creating value opportunities",
    },
    valuation: {
      supporting: (c) => `Stock appears undervalued with ${c} confidence`,
      hedging: "Current valuation may not fully reflect growth potential",
    },
  },
  bearish: {
    technical: {
      supporting: (c) => `Technical indicators show bearish momentum with ${c} confidence`,
      hedging: "Technical rally may be temporary, suggesting potential reversal",
    },
    fundamentals: {
      supporting: (c) => `Concerning fundamentals with ${c} confidence`,
      hedging: "Current fundamental strength may not be sustainable",
    },
    sentiment: {
      supporting: (c) => `Negative market sentiment with ${c} confidence`,
      hedging: "Market sentiment may be overly optimistic, indicating potential risks",
    },
    valuation: {
      supporting: (c) => `Stock appears overvalued with ${c} confidence`,
      hedging: "Current valuation may not fully reflect downside risks",
    },
  },
};

const SIGNAL_DIRECTIONS: readonly SignalDirection[] = ["bullish", "bearish", "neutral"];

/**
 * Rejects a present signal whose direction is not a known one or whose
 * confidence is not a finite number in [0, 1]. Absent signals are left to
 * the stages that need them.
 */
export function validateSignals(signals: Partial<AnalystSignals>): void {
  for (const source of SIGNAL_SOURCES) {
    const signal = signals[source];
    if (!signal) continue;
    if (!SIGNAL_DIRECTIONS.includes(signal.direction)) {
      throw createError(ErrorCode.INVALID_INPUT, `Unknown ${source} signal direction`, { direction: signal.direction });
    }
    const { confidence } = signal;
    if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
      throw createError(ErrorCode.INVALID_INPUT, `${source} signal confidence must be within [0, 1]`, { confidence });
    }
  }
}

/**
 * Build one side of the debate. Signals that agree with the stance contribute
 * their own confidence; the rest contribute a hedging point at the fallback
 * confidence. The thesis confidence is the plain mean of the four scores.
 */
export function buildThesis(
  stance: ThesisStance,
  signals: Partial<AnalystSignals>,
  fallbackConfidence: number = DEFAULT_THESIS_FALLBACK_CONFIDENCE
): Thesis {
  validateSignals(signals);
  const points: string[] = [];
  const scores: number[] = [];

  for (const source of SIGNAL_SOURCES) {
    const signal = signals[source];
    if (!signal) {
      throw createError(ErrorCode.MISSING_PRECONDITION, `Missing ${source} signal for ${stance} thesis`);
    }

    const templates = THESIS_POINTS[stance][source];
    if (signal.direction === stance) {
      points.push(templates.supporting(formatPct(signal.confidence, 0)));
      scores.push(signal.confidence);
    } else {
      points.push(templates.hedging);
      scores.push(fallbackConfidence);
    }
  }

  return {
    stance,
    confidence: scores.reduce((sum, score) => sum + score, 0) / scores.length,
    points,
    scores,
  };
}
