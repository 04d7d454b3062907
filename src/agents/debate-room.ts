import { parseJsonObject, readNumber, readString } from "../lib/json-extract";
import { createLogger, type Logger } from "../lib/logger";
import { clamp } from "../lib/utils";
import type { DeskConfig } from "../policy/config";
import type { ChatMessage } from "../providers/types";
import type { CompletionClient, CompletionOutcome } from "../providers/llm/completion-client";
import type { DebateResult, LlmOpinionStatus, SignalDirection, Thesis } from "./types";

export interface DebateInput {
  ticker: string;
  bull: Thesis;
  bear: Thesis;
}

export interface DebateDeps {
  client: CompletionClient;
  config: Pick<DeskConfig, "debate">;
  logger?: Logger;
}

export interface ModelOpinion {
  status: LlmOpinionStatus;
  score: number;
  analysis: string | null;
  reasoning: string | null;
  failure: string | null;
}

const SYSTEM_PROMPT =
  "You are a professional financial analyst. Weigh both sides of the debate and reply in English with valid JSON only.";

export function buildDebateMessages(input: DebateInput): ChatMessage[] {
  const sides = [input.bull, input.bear]
    .map(
      (thesis) =>
        `${thesis.stance.toUpperCase()} VIEW (confidence ${thesis.confidence.toFixed(2)}):\n${thesis.points
          .map((point) => `- ${point}`)
          .join("\n")}`
    )
    .join("\n\n");

  const prompt = `Review these research perspectives on ${input.ticker} and give an independent assessment.

${sides}

Return JSON:
{
  "analysis": "which arguments are strongest and why",
  "score": -1.0 to 1.0 (-1 strongly bearish, 0 neutral, 1 strongly bullish),
  "reasoning": "brief reason for the score"
}`;

  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: prompt },
  ];
}

export function parseDebateReply(content: string): ModelOpinion {
  const parsed = parseJsonObject(content);
  if (!parsed.ok) {
    return { status: "parse_failed", score: 0, analysis: null, reasoning: null, failure: parsed.reason };
  }

  const score = readNumber(parsed.value.score);
  if (score === null) {
    return {
      status: "parse_failed",
      score: 0,
      analysis: readString(parsed.value.analysis),
      reasoning: readString(parsed.value.reasoning),
      failure: "score missing or not numeric",
    };
  }

  return {
    status: "ok",
    score: clamp(score, -1, 1),
    analysis: readString(parsed.value.analysis),
    reasoning: readString(parsed.value.reasoning),
    failure: null,
  };
}

export function buildDebateSummary(bull: Thesis, bear: Thesis): string[] {
  return [
    "Bullish Arguments:",
    ...bull.points.map((point) => `+ ${point}`),
    "Bearish Arguments:",
    ...bear.points.map((point) => `- ${point}`),
  ];
}

/**
 * Blend the confidence gap between the two theses with the model score and
 * pick a side. Inside the neutral band the stronger confidence is reported.
 */
export function resolveDebate(
  bull: Thesis,
  bear: Thesis,
  opinion: ModelOpinion,
  settings: DeskConfig["debate"]
): DebateResult {
  const bullConfidence = bull.confidence;
  const bearConfidence = bear.confidence;
  const confidenceDiff = bullConfidence - bearConfidence;
  const mixedConfidenceDiff = (1 - settings.llmWeight) * confidenceDiff + settings.llmWeight * opinion.score;

  let signal: SignalDirection;
  let confidence: number;
  let reasoning: string;
  if (Math.abs(mixedConfidenceDiff) < settings.neutralBand) {
    signal = "neutral";
    confidence = Math.max(bullConfidence, bearConfidence);
    reasoning = "Balanced debate with strong arguments on both sides";
  } else if (mixedConfidenceDiff > 0) {
    signal = "bullish";
    confidence = bullConfidence;
    reasoning = "Bullish arguments more convincing";
  } else {
    signal = "bearish";
    confidence = bearConfidence;
    reasoning = "Bearish arguments more convincing";
  }

  return {
    signal,
    confidence,
    bullConfidence,
    bearConfidence,
    confidenceDiff,
    llmScore: opinion.score,
    mixedConfidenceDiff,
    llmStatus: opinion.status,
    llmAnalysis: opinion.analysis,
    llmReasoning: opinion.reasoning,
    llmFailure: opinion.failure,
    debateSummary: buildDebateSummary(bull, bear),
    reasoning,
  };
}

function opinionFromOutcome(outcome: CompletionOutcome): ModelOpinion {
  switch (outcome.status) {
    case "ok":
      return parseDebateReply(outcome.content);
    case "failed":
      return { status: "failed", score: 0, analysis: null, reasoning: null, failure: outcome.error };
    case "unavailable":
      return { status: "unavailable", score: 0, analysis: null, reasoning: null, failure: outcome.reason };
  }
}

export async function runDebate(input: DebateInput, deps: DebateDeps): Promise<DebateResult> {
  const logger = deps.logger ?? createLogger("debate_room");
  const outcome = await deps.client.complete({
    context: "debate_room",
    messages: buildDebateMessages(input),
  });

  const opinion = opinionFromOutcome(outcome);
  if (opinion.status === "parse_failed") {
    logger.warn("Debate reply unusable; model score set to 0", { ticker: input.ticker, reason: opinion.failure });
  }

  const result = resolveDebate(input.bull, input.bear, opinion, deps.config.debate);
  logger.info("Debate resolved", {
    ticker: input.ticker,
    signal: result.signal,
    confidence: result.confidence,
    confidenceDiff: result.confidenceDiff,
    llmScore: result.llmScore,
    mixedConfidenceDiff: result.mixedConfidenceDiff,
    llmStatus: result.llmStatus,
  });
  return result;
}
