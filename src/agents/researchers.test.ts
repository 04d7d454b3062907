import { describe, expect, it } from "vitest";
import { makeSignal, makeSignals } from "../test/fixtures";
import { buildThesis, validateSignals } from "./researchers";
import type { Signal } from "./types";

describe("buildThesis", () => {
  it("scores agreeing signals at their confidence and the rest at the fallback", () => {
    const signals = makeSignals({
      technical: makeSignal("bullish", 0.8),
      valuation: makeSignal("bullish", 0.6),
      sentiment: makeSignal("bearish", 0.9),
    });

    const thesis = buildThesis("bullish", signals);

    expect(thesis.scores).toEqual([0.8, 0.3, 0.3, 0.6]);
    expect(thesis.confidence).toBeCloseTo(0.5, 10);
    expect(thesis.points).toEqual([
      "Technical indicators show bullish momentum with 80% confidence",
      "Company fundamentals show potential for improvement",
      "Market sentiment may be overly pessimistic, creating value opportunities",
      "Stock appears undervalued with 60% confidence",
    ]);
  });

  it("builds the bearish side from the same signals", () => {
    const signals = makeSignals({ sentiment: makeSignal("bearish", 0.9) });

    const thesis = buildThesis("bearish", signals);

    expect(thesis.stance).toBe("bearish");
    expect(thesis.scores).toEqual([0.3, 0.3, 0.9, 0.3]);
    expect(thesis.confidence).toBeCloseTo(0.45, 10);
    expect(thesis.points[2]).toBe("Negative market sentiment with 90% confidence");
    expect(thesis.points[0]).toBe("Technical rally may be temporary, suggesting potential reversal");
  });

  it("uses the configured fallback confidence", () => {
    expect(buildThesis("bullish", makeSignals(), 0.1).confidence).toBeCloseTo(0.1, 10);
  });

  it("requires all four signals", () => {
    const { valuation: _omitted, ...partial } = makeSignals();
    expect(() => buildThesis("bullish", partial)).toThrow("Missing valuation signal for bullish thesis");
  });
});

describe("validateSignals", () => {
  it("accepts complete and partial signal sets", () => {
    expect(() => validateSignals(makeSignals())).not.toThrow();
    expect(() => validateSignals({ technical: makeSignal("bearish", 0) })).not.toThrow();
  });

  it.each([
    ["NaN", Number.NaN],
    ["above one", 5],
    ["negative", -0.1],
  ])("rejects a %s confidence", (_label, confidence) => {
    const signals = makeSignals({ valuation: makeSignal("bullish", confidence) });
    expect(() => validateSignals(signals)).toThrow(
      expect.objectContaining({
        code: "INVALID_INPUT",
        message: "valuation signal confidence must be within [0, 1]",
      })
    );
  });

  it("rejects a direction outside the known set", () => {
    const shouted: Signal = JSON.parse('{"direction": "BULLISH", "confidence": 0.8, "rationale": {}}');
    expect(() => buildThesis("bullish", makeSignals({ technical: shouted }))).toThrow("Unknown technical signal direction");
  });
});
