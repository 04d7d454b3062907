export type AgentType =
  | "technical_analyst"
  | "fundamentals_analyst"
  | "sentiment_analyst"
  | "valuation_analyst"
  | "researcher_bull"
  | "researcher_bear"
  | "debate_room"
  | "risk_manager"
  | "portfolio_manager";

export type StageStatus = "completed" | "degraded";

export interface StageRecord<T = unknown> {
  id: string;
  runId: string;
  stage: AgentType;
  status: StageStatus;
  payload: T;
  startedAt: number;
  durationMs: number;
  /** Why the stage ran on a local default, when it did. */
  note?: string;
}

export function createMessageId(prefix = "msg"): string {
  return `${prefix}:${Date.now()}:${Math.random().toString(16).slice(2, 10)}`;
}
