import { createError, ErrorCode, getErrorCode } from "../../lib/errors";
import { createLogger, type Logger } from "../../lib/logger";
import { truncate } from "../../lib/utils";
import type { RetryPolicy } from "../../policy/config";
import type { ChatMessage, LLMProvider } from "../types";
import { RetryExhaustedError, RetryWithBackoff } from "./retry";

export type CompletionOutcome =
  | { status: "ok"; content: string; attempts: number; model?: string }
  | { status: "failed"; error: string; code: string | null; attempts: number }
  | { status: "unavailable"; reason: string; attempts: 0 };

export interface CompletionRequest {
  /** Label for logs, e.g. "debate_room". */
  context: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
}

/**
 * Never throws: service failures come back as a tagged outcome so the calling
 * stage can fall back to its local default.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<CompletionOutcome>;
}

export interface CompletionClientOptions {
  policy: RetryPolicy & { temperature?: number; maxTokens?: number };
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

async function withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => {
      reject(createError(ErrorCode.TIMEOUT, `Operation timeout after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

class ResilientCompletionClient implements CompletionClient {
  private readonly logger: Logger;

  constructor(
    private readonly provider: LLMProvider | null,
    private readonly options: CompletionClientOptions
  ) {
    this.logger = options.logger ?? createLogger("completion");
  }

  async complete(request: CompletionRequest): Promise<CompletionOutcome> {
    if (!this.provider) {
      this.logger.warn("Completion provider not configured; using local default", { context: request.context });
      return { status: "unavailable", reason: "completion provider not configured", attempts: 0 };
    }

    const provider = this.provider;
    const { policy } = this.options;
    const retry = new RetryWithBackoff({
      maxRetries: policy.maxRetries,
      baseDelayMs: policy.initialBackoffMs,
      maxDelayMs: policy.maxBackoffMs,
      sleep: this.options.sleep,
      onRetry: ({ attempt, delayMs, error }) => {
        this.logger.warn("Completion attempt failed; retrying", {
          context: request.context,
          attempt,
          delayMs,
          error: truncate(String(error), 300),
        });
      },
    });

    try {
      const { value, attempts } = await retry.execute(() =>
        withTimeout(
          (abortSignal) =>
            provider.complete({
              messages: request.messages,
              temperature: request.temperature ?? policy.temperature,
              max_tokens: request.maxTokens ?? policy.maxTokens,
              abortSignal,
            }),
          policy.timeoutMs
        )
      );
      return { status: "ok", content: value.content, attempts, model: value.model };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      const attempts = error instanceof RetryExhaustedError ? error.attempts : 1;
      this.logger.warn("Completion failed; stage will use its local default", {
        context: request.context,
        attempts,
        error: truncate(String(cause), 300),
      });
      return { status: "failed", error: String(cause), code: getErrorCode(cause), attempts };
    }
  }
}

export function createCompletionClient(
  provider: LLMProvider | null,
  options: CompletionClientOptions
): CompletionClient {
  return new ResilientCompletionClient(provider, options);
}
