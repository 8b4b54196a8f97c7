import { readFile, writeFile, mkdir, access } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import { ChunkIntentSchema, SNAPSHOT_VERSION } from "./types.js";
import {
  KnowledgeBaseError,
  KnowledgeBaseErrorSubType,
} from "../errors/index.js";
import { logger } from "../utils.js";

/** Threshold for detecting zero/near-zero vectors during normalization */
const ZERO_VECTOR_THRESHOLD = 1e-10;

export const EmbeddingRecordMetadataSchema = z.object({
  doc_id: z.number().int().positive(),
  language: z.string(),
  intent: ChunkIntentSchema,
  chunk_index: z.number().int().nonnegative(),
  path: z.string(),
});
export type EmbeddingRecordMetadata = z.infer<typeof EmbeddingRecordMetadataSchema>;

const EmbeddingRecordSchema = z.object({
  id: z.string().min(1),
  vector: z.array(z.number()),
  text: z.string(),
  metadata: EmbeddingRecordMetadataSchema,
});
export type EmbeddingRecord = z.infer<typeof EmbeddingRecordSchema>;

const SerializedVectorStoreSchema = z.object({
  version: z.string(),
  dimension: z.number().int().nonnegative(),
  records: z.array(EmbeddingRecordSchema),
});
type SerializedVectorStore = z.infer<typeof SerializedVectorStoreSchema>;

/** Equality filters over record metadata; omitted keys match anything */
export interface VectorFilter {
  readonly docId?: number;
  readonly language?: string;
  readonly intent?: string;
}

export interface VectorHit {
  readonly record: EmbeddingRecord;
  /** Cosine distance in [0, 2]; 0 means identical direction */
  readonly distance: number;
}

/** Record id for the chunk at `ordinal` of document `docId` */
export function embeddingRecordId(docId: number, ordinal: number): string {
  return `doc_${docId}_chunk_${ordinal}`;
}

/**
 * In-memory vector store for chunk embeddings
 * Brute-force cosine over normalized vectors, filtered by record metadata.
 */
export class ChunkVectorStore {
  private records: EmbeddingRecord[] = [];
  private idIndex: Map<string, number> = new Map();
  private documentIndex: Map<number, Set<string>> = new Map();
  private embeddingDimension = 0;

  /**
   * Insert or replace records by id
   * @throws Error on an empty vector or a dimension mismatch (nothing is written)
   */
  upsert(records: readonly EmbeddingRecord[]): void {
    if (records.length === 0) return;

    // Validate every vector before touching state
    let expectedDimension = this.embeddingDimension;
    for (const record of records) {
      if (record.vector.length === 0) {
        throw new Error(`Embedding for ${record.id} is empty`);
      }
      if (expectedDimension === 0) {
        expectedDimension = record.vector.length;
      }
      if (record.vector.length !== expectedDimension) {
        throw new Error(
          `Embedding dimension mismatch for ${record.id}: expected ${expectedDimension}, got ${record.vector.length}`
        );
      }
    }

    this.embeddingDimension = expectedDimension;

    for (const record of records) {
      const stored: EmbeddingRecord = {
        ...record,
        vector: this.normalizeVector(record.vector),
      };

      const existing = this.idIndex.get(record.id);
      if (existing !== undefined) {
        const previous = this.records[existing];
        if (previous) {
          this.unlinkDocument(previous);
        }
        this.records[existing] = stored;
      } else {
        this.idIndex.set(record.id, this.records.length);
        this.records.push(stored);
      }
      this.linkDocument(stored);
    }
  }

  /**
   * Nearest records by cosine distance
   * @returns Up to topK hits, closest first; ties keep insertion order
   */
  query(
    vector: readonly number[],
    topK: number,
    filter: VectorFilter = {}
  ): readonly VectorHit[] {
    if (this.records.length === 0 || topK <= 0) {
      return [];
    }

    if (vector.length !== this.embeddingDimension) {
      throw new Error(
        `Query embedding dimension mismatch: expected ${this.embeddingDimension}, got ${vector.length}. Re-index with the current embedding model.`
      );
    }

    const normalizedQuery = this.normalizeVector(vector);
    const scored: VectorHit[] = [];

    for (const record of this.records) {
      if (!this.matches(record, filter)) continue;
      const similarity = this.dotProduct(normalizedQuery, record.vector);
      scored.push({ record, distance: 1 - similarity });
    }

    scored.sort((a, b) => a.distance - b.distance);
    return scored.slice(0, topK);
  }

  get(id: string): EmbeddingRecord | undefined {
    const index = this.idIndex.get(id);
    return index === undefined ? undefined : this.records[index];
  }

  /** Records of one document ordered by chunk_index */
  listByDocument(docId: number): readonly EmbeddingRecord[] {
    const ids = this.documentIndex.get(docId);
    if (!ids) return [];

    const found: EmbeddingRecord[] = [];
    for (const id of ids) {
      const record = this.get(id);
      if (record) found.push(record);
    }
    return found.sort((a, b) => a.metadata.chunk_index - b.metadata.chunk_index);
  }

  /**
   * Remove every record of a document
   * @returns Number of records removed
   */
  deleteByDocument(docId: number): number {
    const ids = this.documentIndex.get(docId);
    if (!ids || ids.size === 0) return 0;
    return this.remove([...ids]);
  }

  remove(ids: readonly string[]): number {
    const idsToRemove = new Set(ids.filter((id) => this.idIndex.has(id)));
    if (idsToRemove.size === 0) return 0;

    for (const id of idsToRemove) {
      const record = this.get(id);
      if (record) this.unlinkDocument(record);
    }

    this.records = this.records.filter((record) => !idsToRemove.has(record.id));
    this.rebuildIdIndex();

    // An emptied store accepts a new dimension
    if (this.records.length === 0) {
      this.embeddingDimension = 0;
    }

    return idsToRemove.size;
  }

  size(): number {
    return this.records.length;
  }

  getEmbeddingDimension(): number {
    return this.embeddingDimension;
  }

  clear(): void {
    this.records = [];
    this.idIndex.clear();
    this.documentIndex.clear();
    this.embeddingDimension = 0;
  }

  async save(path: string): Promise<void> {
    const serialized: SerializedVectorStore = {
      version: SNAPSHOT_VERSION,
      dimension: this.embeddingDimension,
      records: this.records,
    };

    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(serialized), "utf-8");
    logger.debug(`[VectorStore] Saved ${this.records.length} records to ${path}`);
  }

  /**
   * Replace the store contents with a snapshot
   * @throws KnowledgeBaseError (INDEX_CORRUPTED) on bad JSON, shape or version
   */
  async load(path: string): Promise<void> {
    const content = await readFile(path, "utf-8");

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new KnowledgeBaseError(
        `Vector snapshot is not valid JSON: ${path}`,
        KnowledgeBaseErrorSubType.INDEX_CORRUPTED,
        { path },
        error instanceof Error ? error : undefined
      );
    }

    const parsed = SerializedVectorStoreSchema.safeParse(json);
    if (!parsed.success) {
      throw new KnowledgeBaseError(
        `Invalid vector snapshot format: ${path}`,
        KnowledgeBaseErrorSubType.INDEX_CORRUPTED,
        { path, issues: parsed.error.issues.length }
      );
    }

    if (parsed.data.version !== SNAPSHOT_VERSION) {
      throw new KnowledgeBaseError(
        `Vector snapshot version ${parsed.data.version} is not supported (expected ${SNAPSHOT_VERSION})`,
        KnowledgeBaseErrorSubType.INDEX_CORRUPTED,
        { path, version: parsed.data.version }
      );
    }

    const mismatched = parsed.data.records.find(
      (record) => record.vector.length !== parsed.data.dimension
    );
    if (mismatched) {
      throw new KnowledgeBaseError(
        `Vector snapshot record ${mismatched.id} does not match dimension ${parsed.data.dimension}`,
        KnowledgeBaseErrorSubType.INDEX_CORRUPTED,
        { path }
      );
    }

    this.clear();
    this.records = parsed.data.records;
    this.embeddingDimension = parsed.data.dimension;
    this.rebuildIdIndex();
    for (const record of this.records) {
      this.linkDocument(record);
    }
  }

  static async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  private matches(record: EmbeddingRecord, filter: VectorFilter): boolean {
    if (filter.docId !== undefined && record.metadata.doc_id !== filter.docId) {
      return false;
    }
    if (filter.language !== undefined && record.metadata.language !== filter.language) {
      return false;
    }
    if (filter.intent !== undefined && record.metadata.intent !== filter.intent) {
      return false;
    }
    return true;
  }

  private linkDocument(record: EmbeddingRecord): void {
    const docId = record.metadata.doc_id;
    let ids = this.documentIndex.get(docId);
    if (!ids) {
      ids = new Set();
      this.documentIndex.set(docId, ids);
    }
    ids.add(record.id);
  }

  private unlinkDocument(record: EmbeddingRecord): void {
    const ids = this.documentIndex.get(record.metadata.doc_id);
    if (!ids) return;
    ids.delete(record.id);
    if (ids.size === 0) {
      this.documentIndex.delete(record.metadata.doc_id);
    }
  }

  private rebuildIdIndex(): void {
    this.idIndex.clear();
    for (let i = 0; i < this.records.length; i++) {
      const record = this.records[i];
      if (record) {
        this.idIndex.set(record.id, i);
      }
    }
  }

  /**
   * Normalize vector to unit length
   * @returns Zero vector of the same dimension when the input has no magnitude
   */
  private normalizeVector(vec: readonly number[]): number[] {
    let sumSquares = 0;
    for (const val of vec) {
      sumSquares += val * val;
    }

    const magnitude = Math.sqrt(sumSquares);

    if (magnitude < ZERO_VECTOR_THRESHOLD) {
      logger.warn("[VectorStore] Attempted to normalize zero/near-zero vector");
      return vec.map(() => 0);
    }

    return vec.map((val) => val / magnitude);
  }

  private dotProduct(a: readonly number[], b: readonly number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
      sum += (a[i] ?? 0) * (b[i] ?? 0);
    }
    return sum;
  }
}
