export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionParams {
  messages: ChatMessage[];
  model?: string;
  temperature?: number;
  max_tokens?: number;
  /** Aborted by the caller when its per-attempt timeout fires. */
  abortSignal?: AbortSignal;
}

export interface CompletionResult {
  content: string;
  usage: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
  provider?: string;
  model?: string;
}

export interface LLMProvider {
  complete(params: CompletionParams): Promise<CompletionResult>;
}

export interface Bar {
  /** ISO date of the session. */
  t: string;
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
}

export interface DateRange {
  start: string;
  end: string;
}

/**
 * Ratios and growth rates as decimals (0.15 = 15%). Any field may be absent
 * when the upstream feed does not carry it.
 */
export interface FinancialMetrics {
  return_on_equity?: number | null;
  net_margin?: number | null;
  operating_margin?: number | null;
  revenue_growth?: number | null;
  earnings_growth?: number | null;
  book_value_growth?: number | null;
  current_ratio?: number | null;
  debt_to_equity?: number | null;
  free_cash_flow_per_share?: number | null;
  earnings_per_share?: number | null;
  pe_ratio?: number | null;
  price_to_book?: number | null;
  price_to_sales?: number | null;
}

export interface FinancialLineItem {
  period?: string;
  net_income?: number | null;
  depreciation_and_amortization?: number | null;
  capital_expenditure?: number | null;
  working_capital?: number | null;
  free_cash_flow?: number | null;
}

export interface MarketSnapshot {
  market_cap: number;
  sector?: string;
  industry?: string;
}

export interface NewsArticle {
  title: string;
  published_at: string;
  source?: string;
  /** Pre-scored sentiment in [-1, 1]. */
  sentiment: number;
}

/**
 * Upstream data feed. Implementations return empty structures (`[]`, `null`)
 * when data is unavailable instead of throwing.
 */
export interface MarketDataProvider {
  getPriceHistory(ticker: string, range: DateRange): Promise<Bar[]>;
  getFinancialMetrics(ticker: string): Promise<FinancialMetrics | null>;
  /** Most recent period first: `[current, previous, ...]`. */
  getFinancialLineItems(ticker: string): Promise<FinancialLineItem[]>;
  getMarketSnapshot(ticker: string): Promise<MarketSnapshot | null>;
  getNews(ticker: string, params?: { limit?: number; end?: string }): Promise<NewsArticle[]>;
}
