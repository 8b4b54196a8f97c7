import { z } from "zod";

// =============================================================================
// Provider Types
// =============================================================================

export const LLMProviderTypeSchema = z.enum(["openai", "anthropic", "local"]);
export type LLMProviderType = z.infer<typeof LLMProviderTypeSchema>;

// =============================================================================
// Model Configuration
// =============================================================================

export const ModelConfigSchema = z.object({
  model: z.string().min(1),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().positive().default(4096),
  /** System prompt sent alongside the user message */
  system: z.string().optional(),
});
export type ModelConfig = z.infer<typeof ModelConfigSchema>;

// =============================================================================
// Result Types
// =============================================================================

/** Result of embedding operation */
export interface EmbeddingResult {
  readonly values: readonly number[];
  readonly tokenCount: number;
  readonly model: string;
}

export const FinishReasonSchema = z.enum([
  "stop",
  "length",
  "content_filter",
  "tool_use",
  "error",
  "unknown",
]);
export type FinishReason = z.infer<typeof FinishReasonSchema>;

/** Result of completion operation */
export interface CompletionResult {
  readonly text: string;
  readonly tokenCount: number;
  readonly model: string;
  readonly finishReason: FinishReason;
}

// =============================================================================
// Provider Interfaces
// =============================================================================

/**
 * Completion-capable provider
 * @remarks Used by the LLM categorizer and grounded question answering
 */
export interface LLMCompletionProvider {
  readonly name: LLMProviderType;

  /**
   * Generate text completion
   * @param prompt - Input prompt
   * @param config - Optional model configuration overrides
   */
  complete(
    prompt: string,
    config?: Partial<ModelConfig>
  ): Promise<CompletionResult>;
}

/**
 * Provider with embedding capabilities
 * @remarks Backs the chunk embedding index
 */
export interface LLMEmbeddingProvider {
  readonly name: LLMProviderType;

  embed(text: string): Promise<EmbeddingResult>;

  /**
   * Generate embeddings for multiple texts
   * @returns One result per input, in input order
   */
  embedBatch(texts: readonly string[]): Promise<readonly EmbeddingResult[]>;
}

// =============================================================================
// Factory Configuration
// =============================================================================

/**
 * Keys the provider factory selects from. Every key is optional: without an
 * OpenAI key embeddings come from the local hashing provider, and without
 * any key there is no completion provider.
 */
export const ProviderFactoryConfigSchema = z.object({
  openaiApiKey: z.string().min(1).optional(),
  anthropicApiKey: z.string().min(1).optional(),
});
export type ProviderFactoryConfig = z.infer<typeof ProviderFactoryConfigSchema>;
