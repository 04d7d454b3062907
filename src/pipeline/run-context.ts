import type {
  AnalystSignals,
  DebateResult,
  Decision,
  Portfolio,
  RiskAssessment,
  Signal,
  SignalSource,
  Thesis,
} from "../agents/types";
import { createMessageId, type AgentType, type StageRecord } from "../lib/agents/protocol";
import type { Bar, DateRange } from "../providers/types";

/**
 * Accumulated state of one run. Stages never mutate it; each returns a new
 * frozen context with its own result and trail record added.
 */
export interface RunContext {
  readonly runId: string;
  readonly ticker: string;
  readonly asOf: string;
  readonly range: DateRange;
  readonly portfolio: Readonly<Portfolio>;
  readonly bars: readonly Bar[];
  readonly signals: Readonly<Partial<AnalystSignals>>;
  readonly bullThesis?: Thesis;
  readonly bearThesis?: Thesis;
  readonly debate?: DebateResult;
  readonly risk?: RiskAssessment;
  readonly decision?: Decision;
  readonly trail: readonly StageRecord[];
}

export type StageResult = Partial<
  Pick<RunContext, "bullThesis" | "bearThesis" | "debate" | "risk" | "decision">
> & {
  signal?: { source: SignalSource; value: Signal };
};

export interface StageTiming {
  stage: AgentType;
  startedAt: number;
  durationMs: number;
  note?: string;
}

export function createRunContext(params: {
  ticker: string;
  range: DateRange;
  portfolio: Portfolio;
  bars: Bar[];
  signals?: Partial<AnalystSignals>;
}): RunContext {
  return Object.freeze({
    runId: createMessageId("run"),
    ticker: params.ticker,
    asOf: params.range.end,
    range: Object.freeze({ ...params.range }),
    portfolio: Object.freeze({ ...params.portfolio }),
    bars: Object.freeze([...params.bars]),
    signals: Object.freeze({ ...(params.signals ?? {}) }),
    trail: Object.freeze([]),
  });
}

export function withStage(context: RunContext, result: StageResult, timing: StageTiming): RunContext {
  const { signal, ...rest } = result;
  const record: StageRecord = {
    id: createMessageId("stage"),
    runId: context.runId,
    stage: timing.stage,
    status: timing.note ? "degraded" : "completed",
    payload: signal ? signal.value : Object.values(rest)[0],
    startedAt: timing.startedAt,
    durationMs: timing.durationMs,
    ...(timing.note ? { note: timing.note } : {}),
  };

  return Object.freeze({
    ...context,
    ...rest,
    signals: signal ? Object.freeze({ ...context.signals, [signal.source]: signal.value }) : context.signals,
    trail: Object.freeze([...context.trail, Object.freeze(record)]),
  });
}

export function hasAllSignals(signals: Partial<AnalystSignals>): signals is AnalystSignals {
  return !!(signals.technical && signals.fundamentals && signals.sentiment && signals.valuation);
}
