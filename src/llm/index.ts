/**
 * LLM provider factory
 * @module src/llm/index
 */

export * from "./types.js";
export {
  BaseCompletionProvider,
  BaseFullProvider,
  BaseProviderConfigSchema,
  parseJsonResponse,
  handleRateLimitResponse,
  throwResponseError,
} from "./base.js";
export type { BaseProviderConfig } from "./base.js";
export { OpenAIProvider } from "./openai.js";
export type { OpenAIProviderOptions } from "./openai.js";
export { AnthropicProvider, DEFAULT_ANTHROPIC_MODEL } from "./anthropic.js";
export { HashingEmbeddingProvider, tokenize } from "./local.js";
export { retryWithBackoff, isRetryableError } from "./retry.js";
export type { RetryOptions, RetryCallback } from "./retry.js";
export { withTimeout } from "./timeout.js";
export type { TimeoutOptions } from "./timeout.js";

import type {
  LLMCompletionProvider,
  LLMEmbeddingProvider,
  ProviderFactoryConfig,
} from "./types.js";
import { ProviderFactoryConfigSchema } from "./types.js";
import { OpenAIProvider } from "./openai.js";
import { AnthropicProvider } from "./anthropic.js";
import { HashingEmbeddingProvider } from "./local.js";
import { logger } from "../utils.js";

export interface ProviderSet {
  readonly embedding: LLMEmbeddingProvider;
  /** null when no completion-capable key is configured */
  readonly completion: LLMCompletionProvider | null;
}

/**
 * Pick embedding and completion providers from the configured keys
 *
 * - Embeddings: OpenAI when its key is set, otherwise the local hashing provider
 * - Completions: Anthropic first, then OpenAI, otherwise none
 *
 * @example
 * ```typescript
 * const { embedding, completion } = createProviders({ openaiApiKey: "sk-..." });
 * ```
 */
export function createProviders(config: ProviderFactoryConfig): ProviderSet {
  const parsed = ProviderFactoryConfigSchema.parse(config);

  const openai = parsed.openaiApiKey
    ? new OpenAIProvider(parsed.openaiApiKey)
    : null;

  let completion: LLMCompletionProvider | null = null;
  if (parsed.anthropicApiKey) {
    completion = new AnthropicProvider(parsed.anthropicApiKey);
  } else if (openai) {
    completion = openai;
  }

  const embedding: LLMEmbeddingProvider = openai ?? new HashingEmbeddingProvider();

  logger.debug(
    `[LLM] Providers: embedding=${embedding.name}, completion=${completion?.name ?? "none"}`
  );

  return { embedding, completion };
}
