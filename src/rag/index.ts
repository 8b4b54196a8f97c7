/**
 * Knowledge base module
 *
 * Document ingestion and hybrid retrieval:
 * - Extension-based classification and structure-aware chunking
 * - Content-addressed re-ingest
 * - Chunk embeddings with semantic search and keyword fallback
 * - Grounded answers with source attribution
 */

// Types
export type {
  ContentType,
  ChunkIntent,
  Document,
  Chunk,
  DocumentDetail,
  ChunkDraft,
  DocumentPatch,
  IngestOverrides,
  ClassificationResult,
  Categorization,
  DirectoryIngestOptions,
  BatchIngestFailure,
  BatchIngestReport,
  ChunkingOptions,
  SearchRequest,
  SearchResult,
  DocumentFilters,
  Page,
  DocumentPage,
  AskResult,
  ExplainResult,
  KnowledgeBaseStats,
} from "./types.js";
export {
  ContentTypeSchema,
  ChunkIntentSchema,
  DocumentSchema,
  ChunkSchema,
  ChunkingOptionsSchema,
  SearchRequestSchema,
} from "./types.js";

// Classification and chunking
export { ExtensionClassifier, SUPPORTED_EXTENSIONS } from "./classifier.js";
export type { Classifier } from "./classifier.js";
export { KeywordIntentTagger } from "./intent.js";
export type { IntentTagger } from "./intent.js";
export { chunkContent } from "./chunker.js";
export { fingerprint } from "./fingerprint.js";

// Collaborators
export { InMemoryMetadataStore, toDocumentDetail } from "./metadata-store.js";
export type { MetadataStore, MetadataStats } from "./metadata-store.js";
export { ChunkVectorStore, embeddingRecordId } from "./store.js";
export type { EmbeddingRecord, VectorFilter, VectorHit } from "./store.js";
export { VectorEmbeddingIndex } from "./embeddings.js";
export type { EmbeddingIndex, EmbeddingHit } from "./embeddings.js";
export { EmbeddingCache } from "./embedding-cache.js";
export { RuleBasedCategorizer, LLMCategorizer, loadCategorizerRules } from "./categorizer.js";
export type { Categorizer } from "./categorizer.js";

// Operations
export { Indexer, deriveTitle } from "./indexer.js";
export { Retriever, extractHighlights } from "./retriever.js";
export {
  KnowledgeBase,
  PathQueue,
  buildAskContext,
  createKnowledgeBase,
  settingsFromConfig,
} from "./pipeline.js";
export type { KnowledgeBaseSettings, KnowledgeBaseComponents } from "./pipeline.js";
