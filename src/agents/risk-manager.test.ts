import { describe, expect, it } from "vitest";
import { isDeskError } from "../lib/errors";
import { silentLogger } from "../lib/logger";
import { getDefaultDeskConfig } from "../policy/config";
import { flatCloses, geometricCloses, makeDebate } from "../test/fixtures";
import {
  assessRisk,
  positionCeiling,
  scoreDebateUncertainty,
  scoreMarketRisk,
  stressTest,
  tradingActionFor,
} from "./risk-manager";

const settings = getDefaultDeskConfig().risk;

/** 40 flat closes at 100 followed by 30 sessions of -5%. */
function crashCloses(): number[] {
  return [...flatCloses(39, 100), ...geometricCloses(31, 100, -0.05)];
}

describe("scoreMarketRisk", () => {
  it("adds two points per severe reading and one per elevated reading", () => {
    expect(scoreMarketRisk({ volatility: 0.2, volatilityPercentile: 1.6, var95: -0.04, maxDrawdown: -0.25 })).toBe(6);
    expect(scoreMarketRisk({ volatility: 0.2, volatilityPercentile: 1.2, var95: -0.025, maxDrawdown: -0.15 })).toBe(3);
    expect(scoreMarketRisk({ volatility: 0.2, volatilityPercentile: 1.0, var95: -0.02, maxDrawdown: -0.1 })).toBe(0);
  });
});

describe("scoreDebateUncertainty", () => {
  it("penalizes a close debate and a weak conclusion", () => {
    expect(scoreDebateUncertainty(makeDebate({ bullConfidence: 0.5, bearConfidence: 0.45, confidence: 0.2 }))).toBe(2);
    expect(scoreDebateUncertainty(makeDebate({ bullConfidence: 0.5, bearConfidence: 0.2, confidence: 0.5 }))).toBe(0);
  });
});

describe("positionCeiling", () => {
  it("scales the base allocation down as risk rises", () => {
    expect(positionCeiling(10_000, 1, 0.25)).toBe(2500);
    expect(positionCeiling(10_000, 2, 0.25)).toBe(1875);
    expect(positionCeiling(10_000, 4, 0.25)).toBe(1250);
  });
});

describe("tradingActionFor", () => {
  const bullish = makeDebate({ signal: "bullish", confidence: 0.6 });

  it("holds or reduces at high risk regardless of the debate", () => {
    expect(tradingActionFor(9, bullish)).toBe("hold");
    expect(tradingActionFor(7, bullish)).toBe("reduce");
  });

  it("follows a confident debate", () => {
    expect(tradingActionFor(3, bullish)).toBe("buy");
    expect(tradingActionFor(3, makeDebate({ signal: "bearish", confidence: 0.6 }))).toBe("sell");
    expect(tradingActionFor(3, makeDebate({ signal: "bullish", confidence: 0.5 }))).toBe("hold");
  });
});

describe("stressTest", () => {
  it("applies each decline to the position", () => {
    const results = stressTest(5000, 5000);
    expect(results.market_crash).toEqual({ decline: -0.2, potentialLoss: -1000, portfolioImpact: -0.1 });
    expect(results.moderate_decline.potentialLoss).toBe(-500);
    expect(results.slight_decline.potentialLoss).toBe(-250);
  });

  it("reports an undefined impact for an empty portfolio", () => {
    expect(stressTest(0, 0).market_crash.portfolioImpact).toBeNaN();
  });
});

describe("assessRisk", () => {
  it("gives full sizing on a quiet series", () => {
    const risk = assessRisk(
      { closes: flatCloses(80), debate: makeDebate(), portfolio: { cash: 10_000, shares: 0 } },
      settings,
      silentLogger
    );

    expect(risk.marketRiskScore).toBe(0);
    expect(risk.riskScore).toBe(0);
    expect(risk.maxPositionValue).toBe(2500);
    expect(risk.tradingAction).toBe("hold");
    expect(risk.lastPrice).toBe(100);
    expect(risk.reasoning).toBe(
      "Risk Score 0/10: Market Risk=0, Volatility=0.00%, VaR=0.00%, Max Drawdown=0.00%, Debate Signal=neutral"
    );
  });

  it("halves the ceiling after a crash", () => {
    const risk = assessRisk(
      { closes: crashCloses(), debate: makeDebate(), portfolio: { cash: 10_000, shares: 0 } },
      settings,
      silentLogger
    );

    // VaR and drawdown are both severe; too few returns for a volatility percentile
    expect(risk.metrics.volatilityPercentile).toBe(0);
    expect(risk.metrics.var95).toBeCloseTo(-0.05, 10);
    expect(risk.marketRiskScore).toBe(4);
    expect(risk.maxPositionValue).toBe(1250);
  });

  it("reports no volatility percentile on a steady two-price cycle", () => {
    const closes = Array.from({ length: 200 }, (_, i) => (i % 2 === 0 ? 100 : 101));
    const risk = assessRisk(
      { closes, debate: makeDebate(), portfolio: { cash: 10_000, shares: 0 } },
      settings,
      silentLogger
    );

    expect(risk.metrics.volatilityPercentile).toBe(0);
  });

  it("sizes on the market score unless configured to use the total", () => {
    const debate = makeDebate({ bullConfidence: 0.5, bearConfidence: 0.45, confidence: 0.2 });
    const input = { closes: flatCloses(80), debate, portfolio: { cash: 8_000, shares: 20 } };

    const market = assessRisk(input, settings, silentLogger);
    const total = assessRisk(input, { ...settings, positionSizingScore: "total" }, silentLogger);

    expect(market.riskScore).toBe(2);
    expect(market.maxPositionValue).toBe(2500);
    expect(total.maxPositionValue).toBe(1875);
  });

  it("values held shares at the last close", () => {
    const risk = assessRisk(
      { closes: flatCloses(80, 50), debate: makeDebate(), portfolio: { cash: 0, shares: 100 } },
      settings,
      silentLogger
    );
    expect(risk.maxPositionValue).toBe(1250);
    expect(risk.stressResults.market_crash.portfolioImpact).toBeCloseTo(-0.2, 10);
  });

  it("rejects too short a history as a missing precondition", () => {
    try {
      assessRisk(
        { closes: flatCloses(59), debate: makeDebate(), portfolio: { cash: 1000, shares: 0 } },
        settings,
        silentLogger
      );
      expect.unreachable();
    } catch (error) {
      expect(isDeskError(error, "MISSING_PRECONDITION")).toBe(true);
    }
  });

  it("rejects bad prices and a negative portfolio as invalid input", () => {
    const closes = flatCloses(80);
    closes[10] = 0;
    expect(() =>
      assessRisk({ closes, debate: makeDebate(), portfolio: { cash: 1000, shares: 0 } }, settings, silentLogger)
    ).toThrow("Closing prices must be positive numbers");
    expect(() =>
      assessRisk(
        { closes: flatCloses(80), debate: makeDebate(), portfolio: { cash: -1, shares: 0 } },
        settings,
        silentLogger
      )
    ).toThrow("Portfolio cash and shares must be non-negative numbers");
  });
});
