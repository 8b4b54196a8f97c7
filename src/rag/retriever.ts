import type { EmbeddingHit, EmbeddingIndex } from "./embeddings.js";
import { toDocumentDetail, type MetadataStore } from "./metadata-store.js";
import type { SearchRequest, SearchResult } from "./types.js";
import { toError } from "../errors/index.js";
import { unwrap, validateSearchRequest } from "../validation.js";
import { logger } from "../utils.js";

/** Highlight sentences returned per result */
const MAX_HIGHLIGHTS = 3;
/** Longer highlight sentences are cut to this many characters plus "..." */
const MAX_HIGHLIGHT_LENGTH = 200;
/** Keyword-match snippets are the summary cut to this length */
const KEYWORD_SNIPPET_LENGTH = 200;

export interface RetrieverOptions {
  readonly defaultLimit: number;
  readonly minSimilarity: number;
  /** Documents scanned by the keyword fallback */
  readonly keywordPageSize: number;
}

interface SearchFilters {
  readonly contentType?: SearchRequest["contentType"];
  readonly language?: string | undefined;
  readonly category?: string | undefined;
  readonly tags?: readonly string[] | undefined;
}

/**
 * Two-stage search: semantic over chunk embeddings, then a keyword scan of
 * document metadata when the semantic stage finds nothing.
 */
export class Retriever {
  constructor(
    private readonly store: MetadataStore,
    private readonly embeddings: EmbeddingIndex,
    private readonly options: RetrieverOptions
  ) {}

  /**
   * @throws ValidationError on a blank query or out-of-range limit/similarity
   */
  async search(request: SearchRequest): Promise<SearchResult[]> {
    const valid = unwrap(validateSearchRequest(request));
    const limit = valid.limit ?? this.options.defaultLimit;
    const minSimilarity = valid.minSimilarity ?? this.options.minSimilarity;

    let results = await this.semanticSearch(valid.query, limit, minSimilarity, valid);

    if (results.length === 0) {
      logger.debug(`[Retriever] No semantic hits for "${valid.query}", using keyword fallback`);
      results = this.keywordSearch(valid.query, limit, valid);
    }

    return results.filter((result) => matchesPostFilters(result, valid));
  }

  /**
   * Keyword stage alone, with the same validation and post-filters as search
   *
   * @throws ValidationError on a blank query or out-of-range limit
   */
  searchByKeyword(request: SearchRequest): SearchResult[] {
    const valid = unwrap(validateSearchRequest(request));
    const limit = valid.limit ?? this.options.defaultLimit;
    return this.keywordSearch(valid.query, limit, valid).filter((result) =>
      matchesPostFilters(result, valid)
    );
  }

  /**
   * Nearest chunks, at most one per document, in hit order.
   * Embedding failures are logged and give no results.
   */
  async semanticSearch(
    query: string,
    limit: number,
    minSimilarity: number,
    filters: SearchFilters = {}
  ): Promise<SearchResult[]> {
    let hits: readonly EmbeddingHit[];
    try {
      hits = await this.embeddings.query(
        query,
        limit * 2,
        minSimilarity,
        filters.language !== undefined ? { language: filters.language } : {}
      );
    } catch (error) {
      logger.warn(`[Retriever] Semantic search unavailable: ${toError(error).message}`);
      return [];
    }

    const seen = new Set<number>();
    const results: SearchResult[] = [];

    for (const hit of hits) {
      if (results.length >= limit) break;

      const documentId = hit.metadata.doc_id;
      if (seen.has(documentId)) continue;

      const document = this.store.getDocument(documentId);
      if (!document) {
        logger.debug(`[Retriever] Skipping hit ${hit.id}: document ${documentId} is gone`);
        continue;
      }
      if (filters.category !== undefined && document.category !== filters.category) {
        continue;
      }

      seen.add(documentId);
      results.push({
        document: toDocumentDetail(this.store, document),
        snippet: hit.text,
        similarity: hit.similarity,
        highlights: extractHighlights(hit.text, query),
      });
    }

    return results;
  }

  /**
   * Substring match of the query against path, title and summary of the
   * most recently updated page of documents
   */
  keywordSearch(query: string, limit: number, filters: SearchFilters = {}): SearchResult[] {
    const page = this.store.listDocuments(
      {
        contentType: filters.contentType,
        language: filters.language,
        category: filters.category,
      },
      { page: 1, pageSize: this.options.keywordPageSize }
    );

    const needle = query.toLowerCase();
    const results: SearchResult[] = [];

    for (const document of page.items) {
      if (results.length >= limit) break;

      const haystack = `${document.path} ${document.title} ${document.summary}`.toLowerCase();
      if (!haystack.includes(needle)) continue;

      results.push({
        document: toDocumentDetail(this.store, document),
        snippet: document.summary.slice(0, KEYWORD_SNIPPET_LENGTH),
        similarity: 1.0,
        highlights: [query],
      });
    }

    return results;
  }
}

function matchesPostFilters(result: SearchResult, filters: SearchFilters): boolean {
  if (filters.contentType !== undefined && result.document.contentType !== filters.contentType) {
    return false;
  }
  // An empty tag list means no tag filter
  if (filters.tags !== undefined && filters.tags.length > 0) {
    const wanted = new Set(filters.tags);
    if (!result.document.tags.some((tag) => wanted.has(tag))) {
      return false;
    }
  }
  return true;
}

/**
 * Sentences of `text` containing any whitespace-separated query term
 *
 * @example
 * ```typescript
 * extractHighlights("Parse the file. Then exit!", "parse");
 * // ["Parse the file"]
 * ```
 */
export function extractHighlights(text: string, query: string): string[] {
  const terms = query.toLowerCase().split(/\s+/).filter((term) => term.length > 0);
  if (terms.length === 0) return [];

  return text
    .split(/[.!?\n]/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0)
    .filter((sentence) => {
      const lower = sentence.toLowerCase();
      return terms.some((term) => lower.includes(term));
    })
    .slice(0, MAX_HIGHLIGHTS)
    .map((sentence) =>
      sentence.length > MAX_HIGHLIGHT_LENGTH
        ? `${sentence.slice(0, MAX_HIGHLIGHT_LENGTH)}...`
        : sentence
    );
}
