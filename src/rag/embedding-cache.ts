/**
 * LRU cache for query embeddings
 *
 * Keys are the provider name plus the SHA-256 of the text, so switching
 * providers never serves a vector of the wrong model. Concurrent requests
 * for the same key share one provider call.
 */
import { createHash } from "crypto";
import type { LLMEmbeddingProvider } from "../llm/types.js";

export interface EmbeddingCacheStats {
  readonly size: number;
  readonly hits: number;
  readonly misses: number;
  readonly hitRate: number;
}

export class EmbeddingCache {
  private readonly cache = new Map<string, readonly number[]>();
  private readonly pending = new Map<string, Promise<readonly number[]>>();
  private readonly maxSize: number;
  private hits = 0;
  private misses = 0;

  constructor(maxSize = 1000) {
    this.maxSize = Math.max(1, maxSize);
  }

  private key(text: string, provider: LLMEmbeddingProvider): string {
    return `${provider.name}:${createHash("sha256").update(text).digest("hex")}`;
  }

  /**
   * Cached vector for `text`, embedding it on a miss
   * @throws Whatever the provider throws; failures are not cached
   */
  async getOrEmbed(
    text: string,
    provider: LLMEmbeddingProvider
  ): Promise<readonly number[]> {
    const key = this.key(text, provider);

    const cached = this.cache.get(key);
    if (cached) {
      // Refresh recency
      this.cache.delete(key);
      this.cache.set(key, cached);
      this.hits++;
      return cached;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      this.hits++;
      return inFlight;
    }

    this.misses++;
    const promise = provider.embed(text).then((result) => result.values);
    this.pending.set(key, promise);

    try {
      const vector = await promise;

      if (this.cache.size >= this.maxSize) {
        const oldest = this.cache.keys().next();
        if (!oldest.done) this.cache.delete(oldest.value);
      }

      this.cache.set(key, vector);
      return vector;
    } finally {
      this.pending.delete(key);
    }
  }

  clear(): void {
    this.cache.clear();
    this.pending.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): EmbeddingCacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  get size(): number {
    return this.cache.size;
  }
}
