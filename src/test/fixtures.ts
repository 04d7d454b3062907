import { vi } from "vitest";
import type { AnalystSignals, DebateResult, Signal, SignalDirection, Thesis } from "../agents/types";
import type { CompletionClient, CompletionOutcome } from "../providers/llm/completion-client";
import type { Bar } from "../providers/types";

export function makeSignal(direction: SignalDirection, confidence: number): Signal {
  return { direction, confidence, rationale: { note: `${direction} ${confidence}` } };
}

export function makeSignals(overrides: Partial<AnalystSignals> = {}): AnalystSignals {
  return {
    technical: makeSignal("neutral", 0.5),
    fundamentals: makeSignal("neutral", 0.5),
    sentiment: makeSignal("neutral", 0.5),
    valuation: makeSignal("neutral", 0.5),
    ...overrides,
  };
}

export function makeThesis(stance: Thesis["stance"], confidence: number): Thesis {
  return { stance, confidence, points: [`${stance} point`], scores: [confidence, confidence, confidence, confidence] };
}

export function makeDebate(overrides: Partial<DebateResult> = {}): DebateResult {
  return {
    signal: "neutral",
    confidence: 0.5,
    bullConfidence: 0.5,
    bearConfidence: 0.2,
    confidenceDiff: 0.3,
    llmScore: 0,
    mixedConfidenceDiff: 0.21,
    llmStatus: "ok",
    llmAnalysis: null,
    llmReasoning: null,
    llmFailure: null,
    debateSummary: [],
    reasoning: "test",
    ...overrides,
  };
}

/** Weekday-agnostic daily bars from 2024-01-01, one per close. */
export function makeBars(closes: number[], spread = 0.005): Bar[] {
  const start = Date.UTC(2024, 0, 1);
  return closes.map((c, i) => ({
    t: new Date(start + i * 24 * 60 * 60 * 1000).toISOString().slice(0, 10),
    o: c,
    h: c * (1 + spread),
    l: c * (1 - spread),
    c,
    v: 1_000,
  }));
}

export function geometricCloses(count: number, start: number, dailyGrowth: number): number[] {
  return Array.from({ length: count }, (_, i) => start * (1 + dailyGrowth) ** i);
}

export function flatCloses(count: number, price = 100): number[] {
  return Array.from({ length: count }, () => price);
}

/** Completion client that answers every request with the queued outcomes, repeating the last one. */
export function stubClient(...outcomes: CompletionOutcome[]) {
  const queue = [...outcomes];
  const complete = vi.fn(async (): Promise<CompletionOutcome> => {
    const next = queue.length > 1 ? queue.shift() : queue[0];
    return next ?? { status: "unavailable", reason: "no stub outcome", attempts: 0 };
  });
  const client: CompletionClient = { complete };
  return { client, complete };
}

export function okOutcome(content: string): CompletionOutcome {
  return { status: "ok", content, attempts: 1 };
}
