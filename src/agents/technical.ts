import { ADX, BollingerBands, EMA, RSI, SMA } from "technicalindicators";
import { createError, ErrorCode } from "../lib/errors";
import { clamp, formatPct } from "../lib/utils";
import type { Bar } from "../providers/types";
import type { Signal, SignalDirection } from "./types";

export const MIN_TECHNICAL_BARS = 60;

const STRATEGY_WEIGHTS = {
  trend: 0.4,
  meanReversion: 0.3,
  momentum: 0.3,
} as const;

const STRATEGIES = ["trend", "meanReversion", "momentum"] as const;

const DIRECTION_THRESHOLD = 0.15;

export interface StrategyReading {
  direction: SignalDirection;
  confidence: number;
  details: string;
}

function last(values: number[], fallback: number): number {
  const value = values[values.length - 1];
  return value !== undefined && Number.isFinite(value) ? value : fallback;
}

function directionValue(direction: SignalDirection): number {
  if (direction === "bullish") return 1;
  if (direction === "bearish") return -1;
  return 0;
}

function periodReturn(closes: number[], days: number): number {
  if (closes.length <= days) return 0;
  const end = closes[closes.length - 1] ?? 0;
  const start = closes[closes.length - 1 - days] ?? 0;
  return start > 0 ? end / start - 1 : 0;
}

/** EMA 8/21/55 alignment, scaled by ADX strength. */
export function trendReading(bars: Bar[]): StrategyReading {
  const closes = bars.map((b) => b.c);
  const lastClose = last(closes, 0);
  const ema8 = last(EMA.calculate({ values: closes, period: 8 }), lastClose);
  const ema21 = last(EMA.calculate({ values: closes, period: 21 }), lastClose);
  const ema55 = last(EMA.calculate({ values: closes, period: 55 }), lastClose);

  const adxValues = ADX.calculate({
    high: bars.map((b) => b.h),
    low: bars.map((b) => b.l),
    close: closes,
    period: 14,
  });
  const adx = last(
    adxValues.map((v) => v.adx),
    0
  );
  const strength = clamp(adx / 100, 0, 1);

  let direction: SignalDirection = "neutral";
  if (ema8 > ema21 && ema21 > ema55) direction = "bullish";
  else if (ema8 < ema21 && ema21 < ema55) direction = "bearish";

  return {
    direction,
    confidence: direction === "neutral" ? 0.5 : strength,
    details: `EMA8 ${ema8.toFixed(2)}, EMA21 ${ema21.toFixed(2)}, EMA55 ${ema55.toFixed(2)}, ADX ${adx.toFixed(1)}`,
  };
}

/** 50-day z-score confirmed by Bollinger %B, with RSI 14 extremes. */
export function meanReversionReading(bars: Bar[]): StrategyReading {
  const closes = bars.map((b) => b.c);
  const lastClose = last(closes, 0);
  const window = closes.slice(-50);
  const mean = last(SMA.calculate({ values: closes, period: 50 }), lastClose);
  const variance = window.reduce((sum, c) => sum + (c - mean) ** 2, 0) / Math.max(window.length, 1);
  const std = Math.sqrt(variance);
  const zScore = std > 0 ? (lastClose - mean) / std : 0;

  const bands = BollingerBands.calculate({ values: closes, period: 20, stdDev: 2 });
  const percentB = last(
    bands.map((b) => b.pb),
    0.5
  );
  const rsi = last(RSI.calculate({ values: closes, period: 14 }), 50);

  let direction: SignalDirection = "neutral";
  if ((zScore < -2 && percentB < 0.2) || rsi < 30) direction = "bullish";
  else if ((zScore > 2 && percentB > 0.8) || rsi > 70) direction = "bearish";

  return {
    direction,
    confidence: direction === "neutral" ? 0.5 : Math.min(Math.abs(zScore) / 4, 1),
    details: `z-score ${zScore.toFixed(2)}, %B ${percentB.toFixed(2)}, RSI ${rsi.toFixed(1)}`,
  };
}

/** Weighted 1/3/6-month price returns. */
export function momentumReading(bars: Bar[]): StrategyReading {
  const closes = bars.map((b) => b.c);
  const oneMonth = periodReturn(closes, 21);
  const threeMonth = periodReturn(closes, 63);
  const sixMonth = periodReturn(closes, 126);
  const score = 0.4 * oneMonth + 0.3 * threeMonth + 0.3 * sixMonth;

  let direction: SignalDirection = "neutral";
  if (score > 0.05) direction = "bullish";
  else if (score < -0.05) direction = "bearish";

  return {
    direction,
    confidence: direction === "neutral" ? 0.5 : Math.min(Math.abs(score) * 5, 1),
    details: `1M ${formatPct(oneMonth)}, 3M ${formatPct(threeMonth)}, 6M ${formatPct(sixMonth)}`,
  };
}

export function technicalSignal(bars: Bar[]): Signal {
  if (bars.length < MIN_TECHNICAL_BARS) {
    throw createError(
      ErrorCode.MISSING_PRECONDITION,
      `Technical analysis requires at least ${MIN_TECHNICAL_BARS} bars`,
      { bars: bars.length }
    );
  }

  const readings = {
    trend: trendReading(bars),
    meanReversion: meanReversionReading(bars),
    momentum: momentumReading(bars),
  };

  let score = 0;
  for (const key of STRATEGIES) {
    const reading = readings[key];
    score += STRATEGY_WEIGHTS[key] * directionValue(reading.direction) * reading.confidence;
  }

  let direction: SignalDirection = "neutral";
  if (score > DIRECTION_THRESHOLD) direction = "bullish";
  else if (score < -DIRECTION_THRESHOLD) direction = "bearish";

  return {
    direction,
    confidence: direction === "neutral" ? 1 - Math.min(Math.abs(score), 1) : Math.min(Math.abs(score), 1),
    rationale: {
      trend_following: `${readings.trend.direction}: ${readings.trend.details}`,
      mean_reversion: `${readings.meanReversion.direction}: ${readings.meanReversion.details}`,
      momentum: `${readings.momentum.direction}: ${readings.momentum.details}`,
      combined_score: score.toFixed(3),
    },
  };
}
