import type { EmbeddingResult, LLMEmbeddingProvider } from "../llm/types.js";
import { retryWithBackoff, type RetryOptions } from "../llm/retry.js";
import { Collaborator, CollaboratorUnavailableError, toError } from "../errors/index.js";
import { EmbeddingCache } from "./embedding-cache.js";
import {
  ChunkVectorStore,
  type EmbeddingRecord,
  type EmbeddingRecordMetadata,
  type VectorFilter,
} from "./store.js";
import { logger } from "../utils.js";

export interface EmbeddingHit {
  readonly id: string;
  readonly text: string;
  readonly metadata: EmbeddingRecordMetadata;
  /** 1 - cosine distance */
  readonly similarity: number;
}

export interface EmbeddingIndexStats {
  readonly totalRecords: number;
  readonly dimension: number;
}

/**
 * Vector index over chunk embeddings
 */
export interface EmbeddingIndex {
  /**
   * Embed texts in input order
   * @throws CollaboratorUnavailableError (EMBEDDING) when the model fails
   */
  embed(texts: readonly string[]): Promise<number[][]>;
  upsert(records: readonly EmbeddingRecord[]): void;
  /**
   * Nearest records to `text` with similarity at least `minSimilarity`
   * @throws CollaboratorUnavailableError (EMBEDDING) when the query cannot be embedded
   */
  query(
    text: string,
    k: number,
    minSimilarity: number,
    filter?: VectorFilter
  ): Promise<readonly EmbeddingHit[]>;
  deleteByDocument(docId: number): number;
  listByDocument(docId: number): readonly EmbeddingRecord[];
  stats(): EmbeddingIndexStats;
}

export interface VectorEmbeddingIndexOptions {
  /** Texts per provider call (default 32) */
  readonly batchSize?: number;
  /** Query embedding LRU capacity (default 1000) */
  readonly cacheSize?: number;
  readonly retry?: RetryOptions;
}

/**
 * EmbeddingIndex backed by an embedding provider and an in-memory ChunkVectorStore
 */
export class VectorEmbeddingIndex implements EmbeddingIndex {
  private readonly batchSize: number;
  private readonly cache: EmbeddingCache;
  private readonly retry: RetryOptions;

  constructor(
    private readonly provider: LLMEmbeddingProvider,
    private readonly store: ChunkVectorStore = new ChunkVectorStore(),
    options: VectorEmbeddingIndexOptions = {}
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? 32);
    this.cache = new EmbeddingCache(options.cacheSize ?? 1000);
    this.retry = {
      maxRetries: 2,
      onRetry: (attempt, error, delayMs) =>
        logger.warn(
          `[Embeddings] Retry ${attempt} in ${delayMs}ms after: ${error.message}`
        ),
      ...options.retry,
    };
  }

  get vectorStore(): ChunkVectorStore {
    return this.store;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);

      let results: readonly EmbeddingResult[];
      try {
        results = await retryWithBackoff(
          () => this.provider.embedBatch(batch),
          this.retry
        );
      } catch (error) {
        throw new CollaboratorUnavailableError(
          `Embedding failed for batch starting at ${start}: ${toError(error).message}`,
          Collaborator.EMBEDDING,
          { provider: this.provider.name, batchStart: start, batchSize: batch.length },
          toError(error)
        );
      }

      if (results.length !== batch.length) {
        throw new CollaboratorUnavailableError(
          `Embedding provider returned ${results.length} vectors for ${batch.length} texts`,
          Collaborator.EMBEDDING,
          { provider: this.provider.name }
        );
      }

      for (const result of results) {
        vectors.push([...result.values]);
      }
    }

    return vectors;
  }

  upsert(records: readonly EmbeddingRecord[]): void {
    this.store.upsert(records);
  }

  async query(
    text: string,
    k: number,
    minSimilarity: number,
    filter: VectorFilter = {}
  ): Promise<readonly EmbeddingHit[]> {
    let vector: readonly number[];
    try {
      vector = await this.cache.getOrEmbed(text, this.provider);
    } catch (error) {
      throw new CollaboratorUnavailableError(
        `Query embedding failed: ${toError(error).message}`,
        Collaborator.EMBEDDING,
        { provider: this.provider.name },
        toError(error)
      );
    }

    return this.store
      .query(vector, k, filter)
      .map((hit) => ({
        id: hit.record.id,
        text: hit.record.text,
        metadata: hit.record.metadata,
        // Rounding can push an exact match a hair above 1
        similarity: Math.min(1, 1 - hit.distance),
      }))
      .filter((hit) => hit.similarity >= minSimilarity);
  }

  deleteByDocument(docId: number): number {
    return this.store.deleteByDocument(docId);
  }

  listByDocument(docId: number): readonly EmbeddingRecord[] {
    return this.store.listByDocument(docId);
  }

  stats(): EmbeddingIndexStats {
    return {
      totalRecords: this.store.size(),
      dimension: this.store.getEmbeddingDimension(),
    };
  }
}
