import { z } from "zod";

// Persisted/queryable vocabulary: literal values must not change
export const ContentTypeSchema = z.enum(["code", "markdown", "plain"]);
export type ContentType = z.infer<typeof ContentTypeSchema>;

export const ChunkIntentSchema = z.enum([
  // Code chunks
  "function",
  "class",
  "test",
  "config",
  "type",
  "endpoint",
  "query",
  "utility",
  // Markdown and plain chunks
  "section",
  "text",
]);
export type ChunkIntent = z.infer<typeof ChunkIntentSchema>;

// ============================================================================
// Stored rows
// ============================================================================

export const DocumentSchema = z.object({
  id: z.number().int().positive(),
  path: z.string().min(1),
  contentHash: z.string(),
  title: z.string(),
  contentType: ContentTypeSchema,
  language: z.string().nullable(),
  summary: z.string(),
  tags: z.array(z.string()).readonly(),
  category: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
});
export type Document = z.infer<typeof DocumentSchema>;

export const ChunkSchema = z.object({
  id: z.number().int().positive(),
  documentId: z.number().int().positive(),
  /** 0-based position within the owning document */
  ordinal: z.number().int().nonnegative(),
  text: z.string(),
  startLine: z.number().int().positive(),
  endLine: z.number().int().positive(),
  language: z.string(),
  intent: ChunkIntentSchema,
});
export type Chunk = z.infer<typeof ChunkSchema>;

/** Document with its chunks attached, in ordinal order */
export interface DocumentDetail extends Document {
  readonly chunks: readonly Chunk[];
}

/** Chunker output before it is owned by a document */
export interface ChunkDraft {
  readonly text: string;
  readonly startLine: number;
  readonly endLine: number;
  readonly language: string;
  readonly intent: ChunkIntent;
}

/** Fields supplied when creating a document row */
export type NewDocument = Omit<Document, "id" | "createdAt" | "updatedAt">;

/** Fields supplied when creating a chunk row */
export type NewChunk = Omit<Chunk, "id">;

/** Metadata-only update; never touches contentHash */
export interface DocumentPatch {
  readonly title?: string | undefined;
  readonly summary?: string | undefined;
  readonly tags?: readonly string[] | undefined;
  readonly category?: string | undefined;
}

// ============================================================================
// Ingestion
// ============================================================================

/** Caller-supplied values that win over inferred ones */
export interface IngestOverrides {
  readonly title?: string | undefined;
  readonly contentType?: ContentType | undefined;
  readonly language?: string | undefined;
}

export interface ClassificationResult {
  readonly contentType: ContentType;
  readonly language: string;
}

export interface Categorization {
  readonly category: string;
  readonly tags: readonly string[];
  readonly summary: string;
  readonly language: string | null;
}

export interface DirectoryIngestOptions {
  readonly recursive?: boolean | undefined;
  /** Extensions with or without a leading dot; defaults to every supported one */
  readonly extensions?: readonly string[] | undefined;
}

export interface BatchIngestFailure {
  readonly file: string;
  readonly error: string;
}

export interface BatchIngestReport {
  readonly indexedCount: number;
  readonly totalCount: number;
  readonly errors: readonly BatchIngestFailure[];
}

/**
 * Chunking configuration
 *
 * Constraints:
 * - maxSize counts characters of the joined chunk text
 * - overlap counts retained trailing lines
 */
export const ChunkingOptionsSchema = z.object({
  maxSize: z.number().int().positive().default(1000),
  overlap: z.number().int().nonnegative().default(3),
});
export type ChunkingOptions = z.infer<typeof ChunkingOptionsSchema>;

// ============================================================================
// Retrieval
// ============================================================================

export const SearchRequestSchema = z.object({
  query: z
    .string()
    .refine((value) => value.trim().length > 0, { message: "Query must not be blank" }),
  limit: z.number().int().min(1).max(100).optional(),
  minSimilarity: z.number().min(0).max(1).optional(),
  contentType: ContentTypeSchema.optional(),
  language: z.string().min(1).optional(),
  category: z.string().min(1).optional(),
  tags: z.array(z.string().min(1)).optional(),
});
export type SearchRequest = z.input<typeof SearchRequestSchema>;

export interface SearchResult {
  readonly document: DocumentDetail;
  /** Text of the matched chunk, or the summary excerpt for keyword hits */
  readonly snippet: string;
  /** In [0, 1]; keyword matches use 1.0 */
  readonly similarity: number;
  readonly highlights: readonly string[];
}

/** Filters the metadata store understands when listing documents */
export interface DocumentFilters {
  readonly contentType?: ContentType | undefined;
  readonly language?: string | undefined;
  readonly category?: string | undefined;
}

export interface Page {
  readonly page: number;
  readonly pageSize: number;
}

export interface DocumentPage {
  readonly items: readonly Document[];
  readonly total: number;
  readonly page: number;
  readonly pageSize: number;
  readonly pages: number;
}

// ============================================================================
// Question answering and stats
// ============================================================================

export interface AskResult {
  readonly answer: string;
  readonly sources: readonly SearchResult[];
  readonly tokenCount: number;
}

export interface ExplainResult {
  readonly explanation: string;
  readonly tokenCount: number;
}

export interface KnowledgeBaseStats {
  readonly totalDocuments: number;
  readonly totalChunks: number;
  readonly categories: Readonly<Record<string, number>>;
  readonly languages: Readonly<Record<string, number>>;
  readonly tags: Readonly<Record<string, number>>;
  readonly embeddings: {
    readonly totalRecords: number;
    readonly dimension: number;
  };
}

/** Snapshot format version for persisted index files */
export const SNAPSHOT_VERSION = "1.0.0";
