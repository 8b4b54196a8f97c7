/**
 * In-process stand-ins for the embedding and completion providers
 */

import { vi } from "vitest";
import { tokenize } from "../llm/local.js";
import type {
  CompletionResult,
  EmbeddingResult,
  LLMCompletionProvider,
  LLMEmbeddingProvider,
} from "../llm/types.js";

/**
 * Bag-of-words embeddings over a fixed vocabulary.
 *
 * One dimension per vocabulary word plus a final "no known words" dimension,
 * so texts without vocabulary words are orthogonal to every text with them.
 */
export class VocabularyEmbeddingProvider implements LLMEmbeddingProvider {
  readonly name = "local" as const;

  constructor(private readonly vocabulary: readonly string[]) {}

  async embed(text: string): Promise<EmbeddingResult> {
    return this.vectorize(text);
  }

  async embedBatch(texts: readonly string[]): Promise<readonly EmbeddingResult[]> {
    return texts.map((text) => this.vectorize(text));
  }

  private vectorize(text: string): EmbeddingResult {
    const tokens = tokenize(text);
    const values = this.vocabulary.map(
      (word) => tokens.filter((token) => token === word).length
    );
    const known = values.some((value) => value > 0);
    return { values: [...values, known ? 0 : 1], tokenCount: tokens.length, model: "vocabulary" };
  }
}

/** Completion provider whose `complete` resolves to `text` */
export function createCompletionProvider(text = "answer"): LLMCompletionProvider & {
  complete: ReturnType<typeof vi.fn>;
} {
  const result: CompletionResult = {
    text,
    tokenCount: 12,
    model: "fake-model",
    finishReason: "stop",
  };
  return {
    name: "anthropic",
    complete: vi.fn().mockResolvedValue(result),
  };
}
