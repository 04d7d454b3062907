import { createError, ErrorCode } from "../lib/errors";
import { clamp } from "../lib/utils";
import type { NewsArticle } from "../providers/types";
import type { Signal } from "./types";

const WINDOW_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface SentimentInput {
  articles: NewsArticle[];
  /** Window end; articles published in the seven days before it count. */
  asOf: string;
}

export function recentArticles(articles: NewsArticle[], asOf: string): NewsArticle[] {
  const end = Date.parse(asOf);
  if (Number.isNaN(end)) {
    throw createError(ErrorCode.INVALID_INPUT, `Invalid sentiment window end: ${asOf}`);
  }
  const cutoff = end - WINDOW_DAYS * DAY_MS;
  return articles.filter((article) => {
    const published = Date.parse(article.published_at);
    return !Number.isNaN(published) && published > cutoff && published <= end;
  });
}

export function averageSentiment(articles: NewsArticle[]): number {
  const scores = articles.map((a) => a.sentiment).filter((s) => Number.isFinite(s));
  if (scores.length === 0) return 0;
  return clamp(scores.reduce((sum, s) => sum + s, 0) / scores.length, -1, 1);
}

export function sentimentSignal(input: SentimentInput): Signal {
  const recent = recentArticles(input.articles, input.asOf);
  const score = averageSentiment(recent);
  const rationale = {
    news: `Based on ${recent.length} recent news articles, sentiment score: ${score.toFixed(2)}`,
  };

  if (score >= 0.5) {
    return { direction: "bullish", confidence: Math.abs(score), rationale };
  }
  if (score <= -0.5) {
    return { direction: "bearish", confidence: Math.abs(score), rationale };
  }
  return { direction: "neutral", confidence: 1 - Math.abs(score), rationale };
}
