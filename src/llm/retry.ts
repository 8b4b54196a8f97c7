/**
 * Retry with exponential backoff for provider calls
 * @module src/llm/retry
 */

import { LLMError, LLMErrorSubType } from "../errors/index.js";

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BASE_DELAY_MS = 1000;
const DEFAULT_MAX_DELAY_MS = 30000;

/**
 * Invoked before each retry
 * @param attempt - Retry number (1-based)
 */
export type RetryCallback = (
  attempt: number,
  error: Error,
  delayMs: number
) => void;

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  readonly maxRetries?: number;
  /** Delay before the first retry (default: 1000) */
  readonly baseDelayMs?: number;
  /** Delay cap (default: 30000) */
  readonly maxDelayMs?: number;
  readonly onRetry?: RetryCallback;
}

/**
 * Execute a function with exponential backoff retry
 *
 * @throws Last error if all retries are exhausted or the error is not retryable
 *
 * @remarks
 * delay = min(baseDelay * 2^attempt, maxDelay)
 *
 * @example
 * ```typescript
 * const vectors = await retryWithBackoff(
 *   () => provider.embedBatch(texts),
 *   { maxRetries: 2, baseDelayMs: 500 }
 * );
 * ```
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = DEFAULT_MAX_RETRIES,
    baseDelayMs = DEFAULT_BASE_DELAY_MS,
    maxDelayMs = DEFAULT_MAX_DELAY_MS,
    onRetry,
  } = options;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === maxRetries || !isRetryableError(error)) {
        throw lastError;
      }

      const delay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
      onRetry?.(attempt + 1, lastError, delay);

      await sleep(delay);
    }
  }

  throw lastError ?? new Error("Retry exhausted without error");
}

/**
 * Whether a failed call is worth repeating
 *
 * @remarks
 * LLMError decides by subtype: rate limits and timeouts retry, bad keys and
 * malformed responses do not. Other errors are matched on their message
 * for 429/5xx statuses and network failures.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof LLMError) {
    switch (error.subType) {
      case LLMErrorSubType.RATE_LIMIT:
      case LLMErrorSubType.TIMEOUT:
        return true;
      case LLMErrorSubType.INVALID_KEY:
      case LLMErrorSubType.API_ERROR:
        return false;
      case LLMErrorSubType.EMBEDDING_FAILED:
      case LLMErrorSubType.COMPLETION_FAILED:
        return hasRetryableStatus(error.context);
    }
  }

  if (!(error instanceof Error)) {
    return false;
  }

  const message = error.message.toLowerCase();

  if (/\b(429|500|502|503|504)\b/.test(message)) {
    return true;
  }

  const transientPatterns = [
    "rate limit",
    "too many requests",
    "timeout",
    "timed out",
    "etimedout",
    "econnreset",
    "econnrefused",
    "socket hang up",
    "fetch failed",
    "overloaded",
    "service unavailable",
  ];
  return transientPatterns.some((pattern) => message.includes(pattern));
}

function hasRetryableStatus(context: Record<string, unknown> | undefined): boolean {
  const status = context?.["status"];
  return typeof status === "number" && (status === 429 || status >= 500);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
