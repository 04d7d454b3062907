import { ErrorCode, getErrorCode } from "../../lib/errors";
import { sleep } from "../../lib/utils";

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Adds up to `baseDelayMs / 4` of random delay when set. */
  jitter?: boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

const NON_RETRYABLE_CODES: ReadonlySet<string> = new Set([
  ErrorCode.INVALID_INPUT,
  ErrorCode.MISSING_PRECONDITION,
  ErrorCode.UNAUTHORIZED,
]);

function shouldRetry(error: unknown): boolean {
  const code = getErrorCode(error);
  return code === null || !NON_RETRYABLE_CODES.has(code);
}

export function getBackoffDelayMs(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
}

/**
 * Capped exponential backoff: attempt `n` (0-based) waits
 * `min(base * 2^n, max)` before the next try.
 */
export class RetryWithBackoff {
  private readonly wait: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly options: RetryOptions) {
    this.wait = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  private getDelayMs(attempt: number): number {
    const exponential = getBackoffDelayMs(attempt, this.options.baseDelayMs, this.options.maxDelayMs);
    if (!this.options.jitter) return exponential;
    return exponential + Math.floor(this.random() * Math.max(1, this.options.baseDelayMs / 4));
  }

  async execute<T>(fn: (attempt: number) => Promise<T>): Promise<{ value: T; attempts: number }> {
    const maxRetries = Math.max(0, this.options.maxRetries);
    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const value = await fn(attempt);
        return { value, attempts: attempt + 1 };
      } catch (error) {
        lastError = error;
        if (attempt >= maxRetries || !shouldRetry(error)) {
          throw new RetryExhaustedError(error, attempt + 1);
        }

        const delayMs = this.getDelayMs(attempt);
        this.options.onRetry?.({ attempt: attempt + 1, delayMs, error });
        await this.wait(delayMs);
      }
    }

    throw new RetryExhaustedError(lastError, maxRetries + 1);
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly lastError: unknown,
    public readonly attempts: number
  ) {
    super(lastError instanceof Error ? lastError.message : String(lastError));
    this.name = "RetryExhaustedError";
  }
}
