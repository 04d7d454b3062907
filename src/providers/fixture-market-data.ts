import { readFile } from "node:fs/promises";
import { createError, ErrorCode } from "../lib/errors";
import type {
  Bar,
  DateRange,
  FinancialLineItem,
  FinancialMetrics,
  MarketDataProvider,
  MarketSnapshot,
  NewsArticle,
} from "./types";

export interface TickerFixture {
  bars: Bar[];
  metrics?: FinancialMetrics | null;
  lineItems?: FinancialLineItem[];
  snapshot?: MarketSnapshot | null;
  news?: NewsArticle[];
}

export type FixtureDataset = Record<string, TickerFixture>;

const METRIC_KEYS = [
  "return_on_equity",
  "net_margin",
  "operating_margin",
  "revenue_growth",
  "earnings_growth",
  "book_value_growth",
  "current_ratio",
  "debt_to_equity",
  "free_cash_flow_per_share",
  "earnings_per_share",
  "pe_ratio",
  "price_to_book",
  "price_to_sales",
] as const;

const LINE_ITEM_KEYS = [
  "net_income",
  "depreciation_and_amortization",
  "capital_expenditure",
  "working_capital",
  "free_cash_flow",
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function normalizeBars(value: unknown, ticker: string): Bar[] {
  if (!Array.isArray(value)) {
    throw createError(ErrorCode.INVALID_INPUT, `Fixture ${ticker}: bars must be an array`);
  }
  return value.map((raw, index) => {
    if (!isRecord(raw) || typeof raw.t !== "string") {
      throw createError(ErrorCode.INVALID_INPUT, `Fixture ${ticker}: bar ${index} has no date`);
    }
    const close = raw.c;
    if (typeof close !== "number") {
      throw createError(ErrorCode.INVALID_INPUT, `Fixture ${ticker}: bar ${index} has no close`);
    }
    return {
      t: raw.t,
      o: optionalNumber(raw.o) ?? close,
      h: optionalNumber(raw.h) ?? close,
      l: optionalNumber(raw.l) ?? close,
      c: close,
      v: optionalNumber(raw.v) ?? 0,
    };
  });
}

function normalizeMetrics(value: unknown): FinancialMetrics | null {
  if (!isRecord(value)) return null;
  const metrics: FinancialMetrics = {};
  for (const key of METRIC_KEYS) {
    metrics[key] = optionalNumber(value[key]);
  }
  return metrics;
}

function normalizeLineItems(value: unknown): FinancialLineItem[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map((raw) => {
    const item: FinancialLineItem = {};
    if (typeof raw.period === "string") item.period = raw.period;
    for (const key of LINE_ITEM_KEYS) {
      item[key] = optionalNumber(raw[key]);
    }
    return item;
  });
}

function normalizeSnapshot(value: unknown): MarketSnapshot | null {
  if (!isRecord(value) || typeof value.market_cap !== "number") return null;
  return {
    market_cap: value.market_cap,
    sector: typeof value.sector === "string" ? value.sector : undefined,
    industry: typeof value.industry === "string" ? value.industry : undefined,
  };
}

function normalizeNews(value: unknown): NewsArticle[] {
  if (!Array.isArray(value)) return [];
  const articles: NewsArticle[] = [];
  for (const raw of value) {
    if (!isRecord(raw)) continue;
    if (typeof raw.title !== "string" || typeof raw.published_at !== "string") continue;
    if (typeof raw.sentiment !== "number") continue;
    articles.push({
      title: raw.title,
      published_at: raw.published_at,
      source: typeof raw.source === "string" ? raw.source : undefined,
      sentiment: raw.sentiment,
    });
  }
  return articles;
}

/** Validate a decoded dataset file: `{ "<TICKER>": { bars, metrics, lineItems, snapshot, news } }`. */
export function parseFixtureDataset(value: unknown): FixtureDataset {
  if (!isRecord(value)) {
    throw createError(ErrorCode.INVALID_INPUT, "Fixture dataset must be an object keyed by ticker");
  }
  const dataset: FixtureDataset = {};
  for (const [ticker, raw] of Object.entries(value)) {
    if (!isRecord(raw)) {
      throw createError(ErrorCode.INVALID_INPUT, `Fixture ${ticker} must be an object`);
    }
    dataset[ticker] = {
      bars: normalizeBars(raw.bars, ticker),
      metrics: normalizeMetrics(raw.metrics),
      lineItems: normalizeLineItems(raw.lineItems),
      snapshot: normalizeSnapshot(raw.snapshot),
      news: normalizeNews(raw.news),
    };
  }
  return dataset;
}

export async function loadFixtureDataset(path: string): Promise<FixtureDataset> {
  const text = await readFile(path, "utf8");
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    throw createError(ErrorCode.INVALID_INPUT, `Fixture dataset ${path} is not valid JSON`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return parseFixtureDataset(decoded);
}

/**
 * In-memory market feed. Tickers are case-insensitive; bars are served in
 * date order and filtered to the requested range.
 */
export class FixtureMarketDataProvider implements MarketDataProvider {
  private readonly byTicker: Map<string, TickerFixture>;

  constructor(dataset: FixtureDataset) {
    this.byTicker = new Map(
      Object.entries(dataset).map(([ticker, fixture]) => [
        ticker.toUpperCase(),
        { ...fixture, bars: [...fixture.bars].sort((a, b) => Date.parse(a.t) - Date.parse(b.t)) },
      ])
    );
  }

  static async fromFile(path: string): Promise<FixtureMarketDataProvider> {
    return new FixtureMarketDataProvider(await loadFixtureDataset(path));
  }

  tickers(): string[] {
    return [...this.byTicker.keys()];
  }

  async getPriceHistory(ticker: string, range: DateRange): Promise<Bar[]> {
    const bars = this.get(ticker)?.bars ?? [];
    const startMs = Date.parse(range.start);
    const endMs = Date.parse(range.end);
    return bars.filter((bar) => {
      const t = Date.parse(bar.t);
      return t >= startMs && t <= endMs;
    });
  }

  async getFinancialMetrics(ticker: string): Promise<FinancialMetrics | null> {
    return this.get(ticker)?.metrics ?? null;
  }

  async getFinancialLineItems(ticker: string): Promise<FinancialLineItem[]> {
    return this.get(ticker)?.lineItems ?? [];
  }

  async getMarketSnapshot(ticker: string): Promise<MarketSnapshot | null> {
    return this.get(ticker)?.snapshot ?? null;
  }

  async getNews(ticker: string, params?: { limit?: number; end?: string }): Promise<NewsArticle[]> {
    const endMs = params?.end ? Date.parse(params.end) : Number.POSITIVE_INFINITY;
    const articles = (this.get(ticker)?.news ?? [])
      .filter((article) => Date.parse(article.published_at) <= endMs)
      .sort((a, b) => Date.parse(b.published_at) - Date.parse(a.published_at));
    return params?.limit && params.limit > 0 ? articles.slice(0, params.limit) : articles;
  }

  private get(ticker: string): TickerFixture | undefined {
    return this.byTicker.get(ticker.toUpperCase());
  }
}
