/**
 * Price-series statistics for the risk stage. Standard deviations are sample
 * (n - 1) deviations; quantiles interpolate linearly between order statistics.
 */

export function mean(values: number[]): number {
  if (values.length === 0) return Number.NaN;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function sampleStd(values: number[]): number {
  if (values.length < 2) return Number.NaN;
  const avg = mean(values);
  const squared = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

/** Simple returns `close[i] / close[i - 1] - 1`; one shorter than the input. */
export function dailyReturns(closes: number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const previous = closes[i - 1];
    const current = closes[i];
    if (previous === undefined || current === undefined) continue;
    returns.push(current / previous - 1);
  }
  return returns;
}

/** Sample std over every complete trailing window. */
export function rollingStd(values: number[], window: number): number[] {
  const result: number[] = [];
  for (let end = window; end <= values.length; end++) {
    result.push(sampleStd(values.slice(end - window, end)));
  }
  return result;
}

export function quantile(values: number[], q: number): number {
  if (values.length === 0) return Number.NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowerValue = sorted[lower] ?? Number.NaN;
  const upperValue = sorted[upper] ?? Number.NaN;
  return lowerValue + (upperValue - lowerValue) * (position - lower);
}

export function annualizedVolatility(returns: number[], tradingDaysPerYear: number): number {
  return sampleStd(returns) * Math.sqrt(tradingDaysPerYear);
}

const FLAT_TOLERANCE = 1e-9;

/**
 * Z-score of the current annualized volatility against the distribution of
 * rolling annualized volatilities. 0 when fewer than two rolling values exist
 * or they do not vary.
 */
export function volatilityPercentile(
  returns: number[],
  window: number,
  tradingDaysPerYear: number
): number {
  const scale = Math.sqrt(tradingDaysPerYear);
  const rolling = rollingStd(returns, window)
    .map((value) => value * scale)
    .filter((value) => Number.isFinite(value));
  if (rolling.length < 2) return 0;

  // Equal windows can still leave rounding noise in the deviation.
  const center = mean(rolling);
  const range = Math.max(...rolling) - Math.min(...rolling);
  if (range <= FLAT_TOLERANCE * Math.abs(center)) return 0;

  const spread = sampleStd(rolling);
  if (!Number.isFinite(spread) || spread === 0) return 0;

  const current = annualizedVolatility(returns, tradingDaysPerYear);
  return (current - center) / spread;
}

/**
 * Deepest drop of the close below its trailing `window`-bar high. Leading
 * bars without a full window are skipped; 0 when no window completes.
 */
export function maxDrawdown(closes: number[], window: number): number {
  let worst = Number.POSITIVE_INFINITY;
  for (let end = window; end <= closes.length; end++) {
    const slice = closes.slice(end - window, end);
    const peak = Math.max(...slice);
    const close = closes[end - 1];
    if (close === undefined || peak <= 0) continue;
    worst = Math.min(worst, close / peak - 1);
  }
  return Number.isFinite(worst) ? worst : 0;
}
