import { describe, expect, it } from "vitest";
import { silentLogger } from "../lib/logger";
import { getDefaultDeskConfig } from "../policy/config";
import { makeThesis, okOutcome, stubClient } from "../test/fixtures";
import { buildDebateMessages, buildDebateSummary, parseDebateReply, resolveDebate, runDebate } from "./debate-room";

const settings = { llmWeight: 0.3, neutralBand: 0.1 };
const config = getDefaultDeskConfig();

function opinion(score: number) {
  return { status: "ok" as const, score, analysis: null, reasoning: null, failure: null };
}

describe("parseDebateReply", () => {
  it("reads score, analysis and reasoning", () => {
    expect(parseDebateReply('{"analysis": "bulls stronger", "score": 0.4, "reasoning": "valuation"}')).toEqual({
      status: "ok",
      score: 0.4,
      analysis: "bulls stronger",
      reasoning: "valuation",
      failure: null,
    });
  });

  it("clamps the score to [-1, 1]", () => {
    expect(parseDebateReply('{"score": 3}').score).toBe(1);
    expect(parseDebateReply('{"score": "-2"}').score).toBe(-1);
  });

  it("treats a missing score as a parse failure with score 0", () => {
    expect(parseDebateReply('{"analysis": "unsure"}')).toEqual({
      status: "parse_failed",
      score: 0,
      analysis: "unsure",
      reasoning: null,
      failure: "score missing or not numeric",
    });
  });

  it("treats non-JSON as a parse failure", () => {
    const result = parseDebateReply("I think the bulls win.");
    expect(result.status).toBe("parse_failed");
    expect(result.failure).toBe("no JSON object found");
  });
});

describe("resolveDebate", () => {
  it("blends the confidence gap with the model score", () => {
    const result = resolveDebate(makeThesis("bullish", 0.8), makeThesis("bearish", 0.2), opinion(0), settings);

    expect(result.confidenceDiff).toBeCloseTo(0.6, 10);
    expect(result.mixedConfidenceDiff).toBeCloseTo(0.42, 10);
    expect(result.signal).toBe("bullish");
    expect(result.confidence).toBe(0.8);
    expect(result.reasoning).toBe("Bullish arguments more convincing");
  });

  it("lets a bearish model score flip a narrow bullish lead", () => {
    const result = resolveDebate(makeThesis("bullish", 0.5), makeThesis("bearish", 0.4), opinion(-1), settings);

    // 0.7 * 0.1 + 0.3 * -1
    expect(result.mixedConfidenceDiff).toBeCloseTo(-0.23, 10);
    expect(result.signal).toBe("bearish");
    expect(result.confidence).toBe(0.4);
  });

  it("is neutral inside the band and reports the larger confidence", () => {
    const result = resolveDebate(makeThesis("bullish", 0.45), makeThesis("bearish", 0.45), opinion(0.2), settings);

    // 0.3 * 0.2 = 0.06 < 0.1
    expect(result.signal).toBe("neutral");
    expect(result.confidence).toBe(0.45);
    expect(result.reasoning).toBe("Balanced debate with strong arguments on both sides");
  });

  it("ignores the model when its weight is zero", () => {
    const result = resolveDebate(makeThesis("bullish", 0.5), makeThesis("bearish", 0.3), opinion(-1), {
      llmWeight: 0,
      neutralBand: 0.1,
    });
    expect(result.mixedConfidenceDiff).toBeCloseTo(0.2, 10);
    expect(result.signal).toBe("bullish");
  });
});

describe("buildDebateSummary", () => {
  it("lists bullish then bearish points", () => {
    expect(buildDebateSummary(makeThesis("bullish", 0.5), makeThesis("bearish", 0.5))).toEqual([
      "Bullish Arguments:",
      "+ bullish point",
      "Bearish Arguments:",
      "- bearish point",
    ]);
  });
});

describe("buildDebateMessages", () => {
  it("puts both sides in the user prompt", () => {
    const [system, user] = buildDebateMessages({
      ticker: "ACME",
      bull: makeThesis("bullish", 0.6),
      bear: makeThesis("bearish", 0.3),
    });
    expect(system.role).toBe("system");
    expect(user.content).toContain("BULLISH VIEW (confidence 0.60):\n- bullish point");
    expect(user.content).toContain("BEARISH VIEW (confidence 0.30):\n- bearish point");
  });
});

describe("runDebate", () => {
  const input = { ticker: "ACME", bull: makeThesis("bullish", 0.8), bear: makeThesis("bearish", 0.2) };

  it("uses the model score from the completion service", async () => {
    const { client, complete } = stubClient(okOutcome('{"score": -0.5, "analysis": "a", "reasoning": "r"}'));

    const result = await runDebate(input, { client, config, logger: silentLogger });

    expect(complete).toHaveBeenCalledTimes(1);
    expect(result.llmStatus).toBe("ok");
    expect(result.llmScore).toBe(-0.5);
    // 0.7 * 0.6 + 0.3 * -0.5
    expect(result.mixedConfidenceDiff).toBeCloseTo(0.27, 10);
    expect(result.signal).toBe("bullish");
  });

  it("falls back to a zero score when the service fails", async () => {
    const { client } = stubClient({ status: "failed", error: "Error: down", code: null, attempts: 4 });

    const result = await runDebate(input, { client, config, logger: silentLogger });

    expect(result.llmStatus).toBe("failed");
    expect(result.llmFailure).toBe("Error: down");
    expect(result.llmScore).toBe(0);
    expect(result.mixedConfidenceDiff).toBeCloseTo(0.42, 10);
  });

  it("falls back to a zero score when no service is configured", async () => {
    const { client } = stubClient({ status: "unavailable", reason: "completion provider not configured", attempts: 0 });

    const result = await runDebate(input, { client, config, logger: silentLogger });

    expect(result.llmStatus).toBe("unavailable");
    expect(result.signal).toBe("bullish");
  });
});
