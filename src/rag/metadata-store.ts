import { readFile, writeFile, mkdir } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import {
  ChunkSchema,
  DocumentSchema,
  SNAPSHOT_VERSION,
  type Chunk,
  type Document,
  type DocumentFilters,
  type DocumentPage,
  type DocumentDetail,
  type DocumentPatch,
  type NewChunk,
  type NewDocument,
  type Page,
} from "./types.js";
import {
  ConsistencyViolationError,
  KnowledgeBaseError,
  KnowledgeBaseErrorSubType,
} from "../errors/index.js";
import { logger } from "../utils.js";

export interface MetadataStats {
  readonly totalDocuments: number;
  readonly totalChunks: number;
  readonly categories: Record<string, number>;
  readonly languages: Record<string, number>;
  readonly tags: Record<string, number>;
}

/**
 * Relational-style store for documents and their chunks.
 * All operations are synchronous; `transaction` gives all-or-nothing commits.
 */
export interface MetadataStore {
  insertDocument(document: NewDocument): Document;
  getDocument(id: number): Document | null;
  getDocumentByPath(path: string): Document | null;
  /** @returns The updated row, or null when no document has this id */
  updateDocument(id: number, patch: DocumentPatch): Document | null;
  /** Removes the document and cascades to its chunks */
  deleteDocument(id: number): boolean;
  insertChunk(chunk: NewChunk): Chunk;
  /** Chunks of one document in ordinal order */
  listChunksByDocument(documentId: number): readonly Chunk[];
  deleteChunksByDocument(documentId: number): number;
  /** Filtered page of documents, most recently updated first */
  listDocuments(filters: DocumentFilters, page: Page): DocumentPage;
  stats(): MetadataStats;
  /**
   * Run `fn` atomically: if it throws, every change made inside is undone
   * and the error is rethrown. Nested calls join the outer transaction.
   */
  transaction<T>(fn: () => T): T;
}

/** A document row with its chunks attached */
export function toDocumentDetail(store: MetadataStore, document: Document): DocumentDetail {
  return { ...document, chunks: store.listChunksByDocument(document.id) };
}

const SerializedMetadataSchema = z.object({
  version: z.string(),
  nextDocumentId: z.number().int().positive(),
  nextChunkId: z.number().int().positive(),
  documents: z.array(DocumentSchema),
  chunks: z.array(ChunkSchema),
});
type SerializedMetadata = z.infer<typeof SerializedMetadataSchema>;

interface StoreState {
  documents: Map<number, Document>;
  pathIndex: Map<string, number>;
  chunks: Map<number, Chunk[]>;
  nextDocumentId: number;
  nextChunkId: number;
}

export interface InMemoryMetadataStoreOptions {
  /** Clock used for createdAt/updatedAt */
  readonly now?: () => Date;
}

/**
 * In-process MetadataStore with JSON snapshot persistence
 */
export class InMemoryMetadataStore implements MetadataStore {
  private state: StoreState = emptyState();
  private inTransaction = false;
  private readonly now: () => Date;

  constructor(options: InMemoryMetadataStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  insertDocument(document: NewDocument): Document {
    if (this.state.pathIndex.has(document.path)) {
      throw new ConsistencyViolationError(
        `A document is already stored at ${document.path}`,
        document.path
      );
    }

    const timestamp = this.now().toISOString();
    const row: Document = {
      ...document,
      id: this.state.nextDocumentId++,
      tags: [...new Set(document.tags)],
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    this.state.documents.set(row.id, row);
    this.state.pathIndex.set(row.path, row.id);
    return row;
  }

  getDocument(id: number): Document | null {
    return this.state.documents.get(id) ?? null;
  }

  getDocumentByPath(path: string): Document | null {
    const id = this.state.pathIndex.get(path);
    return id === undefined ? null : this.getDocument(id);
  }

  updateDocument(id: number, patch: DocumentPatch): Document | null {
    const existing = this.state.documents.get(id);
    if (!existing) return null;

    const updated: Document = {
      ...existing,
      ...(patch.title !== undefined && { title: patch.title }),
      ...(patch.summary !== undefined && { summary: patch.summary }),
      ...(patch.category !== undefined && { category: patch.category }),
      ...(patch.tags !== undefined && { tags: [...new Set(patch.tags)] }),
      updatedAt: this.now().toISOString(),
    };

    this.state.documents.set(id, updated);
    return updated;
  }

  deleteDocument(id: number): boolean {
    const existing = this.state.documents.get(id);
    if (!existing) return false;

    this.state.documents.delete(id);
    this.state.pathIndex.delete(existing.path);
    this.state.chunks.delete(id);
    return true;
  }

  insertChunk(chunk: NewChunk): Chunk {
    if (!this.state.documents.has(chunk.documentId)) {
      throw new ConsistencyViolationError(
        `Chunk references missing document ${chunk.documentId}`,
        String(chunk.documentId)
      );
    }

    const row: Chunk = { ...chunk, id: this.state.nextChunkId++ };
    const owned = this.state.chunks.get(chunk.documentId);
    if (owned) {
      owned.push(row);
      owned.sort((a, b) => a.ordinal - b.ordinal);
    } else {
      this.state.chunks.set(chunk.documentId, [row]);
    }
    return row;
  }

  listChunksByDocument(documentId: number): readonly Chunk[] {
    return [...(this.state.chunks.get(documentId) ?? [])];
  }

  deleteChunksByDocument(documentId: number): number {
    const owned = this.state.chunks.get(documentId);
    this.state.chunks.delete(documentId);
    return owned?.length ?? 0;
  }

  listDocuments(filters: DocumentFilters, page: Page): DocumentPage {
    const pageNumber = Math.max(1, Math.floor(page.page));
    const pageSize = Math.max(1, Math.floor(page.pageSize));

    const matching = [...this.state.documents.values()]
      .filter(
        (doc) =>
          (filters.contentType === undefined || doc.contentType === filters.contentType) &&
          (filters.language === undefined || doc.language === filters.language) &&
          (filters.category === undefined || doc.category === filters.category)
      )
      .sort((a, b) =>
        a.updatedAt === b.updatedAt
          ? b.id - a.id
          : a.updatedAt < b.updatedAt
            ? 1
            : -1
      );

    const offset = (pageNumber - 1) * pageSize;
    return {
      items: matching.slice(offset, offset + pageSize),
      total: matching.length,
      page: pageNumber,
      pageSize,
      pages: Math.ceil(matching.length / pageSize),
    };
  }

  stats(): MetadataStats {
    const categories: Record<string, number> = {};
    const languages: Record<string, number> = {};
    const tags: Record<string, number> = {};
    let totalChunks = 0;

    for (const doc of this.state.documents.values()) {
      categories[doc.category] = (categories[doc.category] ?? 0) + 1;
      if (doc.language !== null) {
        languages[doc.language] = (languages[doc.language] ?? 0) + 1;
      }
      for (const tag of doc.tags) {
        tags[tag] = (tags[tag] ?? 0) + 1;
      }
      totalChunks += this.state.chunks.get(doc.id)?.length ?? 0;
    }

    return {
      totalDocuments: this.state.documents.size,
      totalChunks,
      categories,
      languages,
      tags,
    };
  }

  transaction<T>(fn: () => T): T {
    if (this.inTransaction) {
      return fn();
    }

    const snapshot = cloneState(this.state);
    this.inTransaction = true;
    try {
      return fn();
    } catch (error) {
      this.state = snapshot;
      logger.debug("[MetadataStore] Transaction rolled back");
      throw error;
    } finally {
      this.inTransaction = false;
    }
  }

  async save(path: string): Promise<void> {
    const serialized: SerializedMetadata = {
      version: SNAPSHOT_VERSION,
      nextDocumentId: this.state.nextDocumentId,
      nextChunkId: this.state.nextChunkId,
      documents: [...this.state.documents.values()],
      chunks: [...this.state.chunks.values()].flat(),
    };

    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(serialized, null, 2), "utf-8");
  }

  /**
   * Replace the store contents with a snapshot
   * @throws KnowledgeBaseError (INDEX_CORRUPTED) on bad JSON, shape, version or dangling chunks
   */
  async load(path: string): Promise<void> {
    const content = await readFile(path, "utf-8");

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new KnowledgeBaseError(
        `Metadata snapshot is not valid JSON: ${path}`,
        KnowledgeBaseErrorSubType.INDEX_CORRUPTED,
        { path },
        error instanceof Error ? error : undefined
      );
    }

    const parsed = SerializedMetadataSchema.safeParse(json);
    if (!parsed.success) {
      throw new KnowledgeBaseError(
        `Invalid metadata snapshot format: ${path}`,
        KnowledgeBaseErrorSubType.INDEX_CORRUPTED,
        { path, issues: parsed.error.issues.length }
      );
    }

    const data = parsed.data;
    if (data.version !== SNAPSHOT_VERSION) {
      throw new KnowledgeBaseError(
        `Metadata snapshot version ${data.version} is not supported (expected ${SNAPSHOT_VERSION})`,
        KnowledgeBaseErrorSubType.INDEX_CORRUPTED,
        { path, version: data.version }
      );
    }

    const next = emptyState();
    next.nextDocumentId = data.nextDocumentId;
    next.nextChunkId = data.nextChunkId;

    for (const doc of data.documents) {
      next.documents.set(doc.id, doc);
      next.pathIndex.set(doc.path, doc.id);
    }

    for (const chunk of data.chunks) {
      if (!next.documents.has(chunk.documentId)) {
        throw new KnowledgeBaseError(
          `Metadata snapshot chunk ${chunk.id} references missing document ${chunk.documentId}`,
          KnowledgeBaseErrorSubType.INDEX_CORRUPTED,
          { path }
        );
      }
      const owned = next.chunks.get(chunk.documentId) ?? [];
      owned.push(chunk);
      next.chunks.set(chunk.documentId, owned);
    }

    for (const owned of next.chunks.values()) {
      owned.sort((a, b) => a.ordinal - b.ordinal);
    }

    this.state = next;
  }
}

function emptyState(): StoreState {
  return {
    documents: new Map(),
    pathIndex: new Map(),
    chunks: new Map(),
    nextDocumentId: 1,
    nextChunkId: 1,
  };
}

/** Rows are replaced, never mutated in place, so copying the containers is enough */
function cloneState(state: StoreState): StoreState {
  return {
    documents: new Map(state.documents),
    pathIndex: new Map(state.pathIndex),
    chunks: new Map(
      [...state.chunks].map(([id, rows]): [number, Chunk[]] => [id, [...rows]])
    ),
    nextDocumentId: state.nextDocumentId,
    nextChunkId: state.nextChunkId,
  };
}
