import { createHash } from "crypto";
import type { EmbeddingResult, LLMEmbeddingProvider } from "./types.js";

const DEFAULT_DIMENSION = 256;

/**
 * Offline embedding provider using signed feature hashing over word tokens.
 *
 * Each lower-cased alphanumeric token is hashed into one of `dimension`
 * buckets with a +1/-1 sign taken from the same digest. Used when no hosted
 * embedding model is configured.
 */
export class HashingEmbeddingProvider implements LLMEmbeddingProvider {
  readonly name = "local" as const;
  readonly dimension: number;

  constructor(dimension = DEFAULT_DIMENSION) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Invalid embedding dimension: ${dimension}`);
    }
    this.dimension = dimension;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.vectorize(text);
  }

  async embedBatch(
    texts: readonly string[]
  ): Promise<readonly EmbeddingResult[]> {
    return texts.map((text) => this.vectorize(text));
  }

  private vectorize(text: string): EmbeddingResult {
    const values = new Array<number>(this.dimension).fill(0);
    const tokens = tokenize(text);

    for (const token of tokens) {
      const digest = createHash("sha256").update(token).digest();
      const bucket = digest.readUInt32BE(0) % this.dimension;
      const sign = (digest[4] ?? 0) & 1 ? -1 : 1;
      values[bucket] = (values[bucket] ?? 0) + sign;
    }

    return {
      values,
      tokenCount: tokens.length,
      model: `hashing-${this.dimension}`,
    };
  }
}

/** Lower-cased alphanumeric word tokens */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9_]+/g) ?? [];
}
