/**
 * Timeout wrapper for collaborator calls
 * @module src/llm/timeout
 */

import { LLMError, LLMErrorSubType } from "../errors/index.js";

export interface TimeoutOptions {
  /** Timeout duration in milliseconds */
  readonly timeoutMs: number;
  /** Operation description for the error message */
  readonly context?: string;
  /** Provider name recorded on the LLMError */
  readonly provider?: string;
}

/**
 * Race a promise against a timer
 *
 * @throws LLMError with TIMEOUT subtype if the timer fires first
 *
 * @example
 * ```typescript
 * const result = await withTimeout(provider.complete(prompt), {
 *   timeoutMs: 15000,
 *   context: "Categorization",
 *   provider: provider.name,
 * });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeoutMs, context = "Operation", provider = "unknown" } = options;

  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new Error(
      `Invalid timeout value: ${timeoutMs}. Must be a positive finite number.`
    );
  }

  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(
        new LLMError(
          `${context} timed out after ${timeoutMs}ms`,
          LLMErrorSubType.TIMEOUT,
          provider
        )
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
  }
}
