import { readFile } from "fs/promises";
import { join } from "path";
import type { LLMCompletionProvider, LLMEmbeddingProvider } from "../llm/types.js";
import { createProviders, type ProviderSet } from "../llm/index.js";
import { LLMCategorizer, RuleBasedCategorizer, type Categorizer } from "./categorizer.js";
import { ExtensionClassifier, type Classifier } from "./classifier.js";
import { VectorEmbeddingIndex } from "./embeddings.js";
import { Indexer } from "./indexer.js";
import type { IntentTagger } from "./intent.js";
import { InMemoryMetadataStore, toDocumentDetail } from "./metadata-store.js";
import { Retriever } from "./retriever.js";
import { ChunkVectorStore } from "./store.js";
import type {
  AskResult,
  BatchIngestReport,
  ChunkingOptions,
  DirectoryIngestOptions,
  DocumentDetail,
  DocumentFilters,
  DocumentPage,
  DocumentPatch,
  ExplainResult,
  IngestOverrides,
  KnowledgeBaseStats,
  Page,
  SearchRequest,
  SearchResult,
} from "./types.js";
import {
  Collaborator,
  CollaboratorUnavailableError,
  FileOperation,
  FileSystemError,
  KnowledgeBaseError,
  KnowledgeBaseErrorSubType,
  NotFoundError,
  toError,
} from "../errors/index.js";
import { unwrap, validateDocumentId, validateExplainInput } from "../validation.js";
import { getConfigValue, logger } from "../utils.js";

async function readSource(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    throw new FileSystemError(
      `Cannot read ${filePath}`,
      FileOperation.READ,
      filePath,
      undefined,
      toError(error)
    );
  }
}

/** Snapshot file names inside the data directory */
export const METADATA_FILENAME = "metadata.json";
export const VECTORS_FILENAME = "vectors.json";

const ASK_SYSTEM_PROMPT = `You are a developer knowledge base assistant.
Your role is to help developers find and understand information from their codebase and documentation.

When answering questions:
1. Use the provided context from the knowledge base
2. Cite specific files and code snippets when possible
3. If you're unsure about something, say so
4. Keep your answers focused and practical`;

const EXPLAIN_SYSTEM_PROMPT = `You explain source code to developers.
Describe what the code does, its main parts and their roles,
and any notable patterns or techniques it relies on. Be clear and brief.`;

// =============================================================================
// Settings
// =============================================================================

export interface KnowledgeBaseSettings {
  readonly chunking: ChunkingOptions;
  readonly maxDirectoryDepth: number;
  readonly embeddingBatchSize: number;
  readonly queryCacheSize: number;
  readonly defaultSearchLimit: number;
  readonly minSimilarity: number;
  readonly keywordPageSize: number;
  readonly categorizerTimeoutMs: number;
  readonly categorizerMaxContent: number;
  readonly askMaxContextChars: number;
}

/** Settings read from the validated environment configuration */
export function settingsFromConfig(): KnowledgeBaseSettings {
  return {
    chunking: {
      maxSize: getConfigValue("MAX_CHUNK_SIZE"),
      overlap: getConfigValue("CHUNK_OVERLAP"),
    },
    maxDirectoryDepth: getConfigValue("RAG_MAX_DIRECTORY_DEPTH"),
    embeddingBatchSize: getConfigValue("RAG_EMBEDDING_BATCH_SIZE"),
    queryCacheSize: getConfigValue("QUERY_EMBEDDING_CACHE_SIZE"),
    defaultSearchLimit: getConfigValue("DEFAULT_SEARCH_LIMIT"),
    minSimilarity: getConfigValue("MIN_SIMILARITY_THRESHOLD"),
    keywordPageSize: getConfigValue("KEYWORD_FALLBACK_PAGE_SIZE"),
    categorizerTimeoutMs: getConfigValue("CATEGORIZER_TIMEOUT_MS"),
    categorizerMaxContent: getConfigValue("CATEGORIZER_MAX_CONTENT"),
    askMaxContextChars: getConfigValue("ASK_MAX_CONTEXT_CHARS"),
  };
}

// =============================================================================
// Per-path serialization
// =============================================================================

/**
 * Runs tasks sharing a key one after another; different keys run concurrently
 */
export class PathQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  get pending(): number {
    return this.tails.size;
  }
}

// =============================================================================
// Facade
// =============================================================================

export interface KnowledgeBaseComponents {
  readonly store: InMemoryMetadataStore;
  readonly vectors: ChunkVectorStore;
  readonly embeddingProvider: LLMEmbeddingProvider;
  readonly completionProvider: LLMCompletionProvider | null;
  readonly categorizer: Categorizer;
  readonly classifier?: Classifier;
  readonly tagger?: IntentTagger;
}

/**
 * Developer knowledge base: ingestion, hybrid search and grounded answers
 * over one metadata store and one vector store.
 */
export class KnowledgeBase {
  private readonly store: InMemoryMetadataStore;
  private readonly vectors: ChunkVectorStore;
  private readonly embeddings: VectorEmbeddingIndex;
  private readonly completion: LLMCompletionProvider | null;
  private readonly classifier: Classifier;
  private readonly indexer: Indexer;
  private readonly retriever: Retriever;
  private readonly queue = new PathQueue();

  constructor(
    components: KnowledgeBaseComponents,
    private readonly settings: KnowledgeBaseSettings
  ) {
    this.store = components.store;
    this.vectors = components.vectors;
    this.completion = components.completionProvider;
    this.classifier = components.classifier ?? new ExtensionClassifier();
    this.embeddings = new VectorEmbeddingIndex(components.embeddingProvider, this.vectors, {
      batchSize: settings.embeddingBatchSize,
      cacheSize: settings.queryCacheSize,
    });

    this.indexer = new Indexer(
      {
        store: this.store,
        embeddings: this.embeddings,
        categorizer: components.categorizer,
        classifier: this.classifier,
        ...(components.tagger && { tagger: components.tagger }),
      },
      {
        chunking: settings.chunking,
        maxDirectoryDepth: settings.maxDirectoryDepth,
        serialize: (key, task) => this.queue.run(key, task),
      }
    );

    this.retriever = new Retriever(this.store, this.embeddings, {
      defaultLimit: settings.defaultSearchLimit,
      minSimilarity: settings.minSimilarity,
      keywordPageSize: settings.keywordPageSize,
    });
  }

  ingest(path: string, content: string, overrides?: IngestOverrides): Promise<DocumentDetail> {
    return this.indexer.ingest(path, content, overrides);
  }

  /**
   * Read a file from disk and ingest it under its path
   * @throws FileSystemError when the file cannot be read
   */
  async ingestFile(filePath: string, overrides?: IngestOverrides): Promise<DocumentDetail> {
    return this.ingest(filePath, await readSource(filePath), overrides);
  }

  ingestDirectory(root: string, options?: DirectoryIngestOptions): Promise<BatchIngestReport> {
    return this.indexer.ingestDirectory(root, options);
  }

  search(request: SearchRequest): Promise<SearchResult[]> {
    return this.retriever.search(request);
  }

  /**
   * Keyword stage only: substring match on path, title and summary
   */
  keywordSearch(request: SearchRequest): SearchResult[] {
    return this.retriever.searchByKeyword(request);
  }

  /**
   * @throws NotFoundError when no document has this id
   */
  getDocument(id: number): DocumentDetail {
    const documentId = unwrap(validateDocumentId(id));
    const document = this.store.getDocument(documentId);
    if (!document) {
      throw new NotFoundError("document", documentId);
    }
    return toDocumentDetail(this.store, document);
  }

  listDocuments(filters: DocumentFilters = {}, page: Page = { page: 1, pageSize: 20 }): DocumentPage {
    return this.store.listDocuments(filters, page);
  }

  updateDocument(id: number, patch: DocumentPatch): DocumentDetail {
    return this.indexer.updateDocument(unwrap(validateDocumentId(id)), patch);
  }

  /** @returns false when no document has this id */
  deleteDocument(id: number): boolean {
    return this.indexer.deleteDocument(unwrap(validateDocumentId(id)));
  }

  stats(): KnowledgeBaseStats {
    return {
      ...this.store.stats(),
      embeddings: this.embeddings.stats(),
    };
  }

  /**
   * Answer a question from the top search results
   *
   * @throws CollaboratorUnavailableError (COMPLETION) without a completion provider or when it fails
   */
  async ask(question: string, contextLimit = 5): Promise<AskResult> {
    if (!this.completion) {
      throw new CollaboratorUnavailableError(
        "No completion provider configured",
        Collaborator.COMPLETION
      );
    }

    const sources = await this.search({ query: question, limit: contextLimit });
    const context = buildAskContext(sources, this.settings.askMaxContextChars);
    const prompt = `Context from knowledge base:
${context}

---

Question: ${question}`;

    try {
      const result = await this.completion.complete(prompt, {
        system: ASK_SYSTEM_PROMPT,
        maxTokens: 2000,
        temperature: 0.3,
      });
      return { answer: result.text.trim(), sources, tokenCount: result.tokenCount };
    } catch (error) {
      throw new CollaboratorUnavailableError(
        `Completion failed: ${toError(error).message}`,
        Collaborator.COMPLETION,
        { provider: this.completion.name },
        toError(error)
      );
    }
  }

  /**
   * Explain a code snippet with the completion provider; needs no index
   *
   * @throws ValidationError on blank code
   * @throws CollaboratorUnavailableError (COMPLETION) without a completion provider or when it fails
   */
  async explain(code: string, language?: string): Promise<ExplainResult> {
    const input = unwrap(validateExplainInput({ code, language }));

    if (!this.completion) {
      throw new CollaboratorUnavailableError(
        "No completion provider configured",
        Collaborator.COMPLETION
      );
    }

    const lang = input.language ?? "plain";
    const prompt = `Explain this code (in ${lang}):

\`\`\`${lang}
${input.code}
\`\`\``;

    try {
      const result = await this.completion.complete(prompt, {
        system: EXPLAIN_SYSTEM_PROMPT,
        maxTokens: 1500,
      });
      return { explanation: result.text.trim(), tokenCount: result.tokenCount };
    } catch (error) {
      throw new CollaboratorUnavailableError(
        `Completion failed: ${toError(error).message}`,
        Collaborator.COMPLETION,
        { provider: this.completion.name },
        toError(error)
      );
    }
  }

  /**
   * Explain a file, taking its language from the extension unless given
   * @throws FileSystemError when the file cannot be read
   */
  async explainFile(filePath: string, language?: string): Promise<ExplainResult> {
    const code = await readSource(filePath);
    return this.explain(code, language ?? this.classifier.classify(filePath, code).language);
  }

  async save(directory: string): Promise<void> {
    await this.store.save(join(directory, METADATA_FILENAME));
    await this.vectors.save(join(directory, VECTORS_FILENAME));
    logger.info(`[KnowledgeBase] Saved index to ${directory}`);
  }

  /**
   * Load both snapshots from `directory`
   *
   * @returns false when the directory holds no snapshot yet
   * @throws KnowledgeBaseError (INDEX_CORRUPTED) when only one snapshot exists,
   *   either fails validation, or vectors reference unknown documents
   */
  async load(directory: string): Promise<boolean> {
    const metadataPath = join(directory, METADATA_FILENAME);
    const vectorsPath = join(directory, VECTORS_FILENAME);
    const [hasMetadata, hasVectors] = await Promise.all([
      ChunkVectorStore.exists(metadataPath),
      ChunkVectorStore.exists(vectorsPath),
    ]);

    if (!hasMetadata && !hasVectors) {
      return false;
    }
    if (hasMetadata !== hasVectors) {
      throw new KnowledgeBaseError(
        `Incomplete index in ${directory}: ${hasMetadata ? VECTORS_FILENAME : METADATA_FILENAME} is missing`,
        KnowledgeBaseErrorSubType.INDEX_CORRUPTED,
        { directory }
      );
    }

    await this.store.load(metadataPath);
    await this.vectors.load(vectorsPath);

    const { totalDocuments } = this.store.stats();
    for (const document of this.store.listDocuments({}, { page: 1, pageSize: Math.max(1, totalDocuments) }).items) {
      const records = this.vectors.listByDocument(document.id).length;
      const chunks = this.store.listChunksByDocument(document.id).length;
      if (records !== chunks) {
        throw new KnowledgeBaseError(
          `Document ${document.id} has ${chunks} chunks but ${records} embedding records`,
          KnowledgeBaseErrorSubType.INDEX_CORRUPTED,
          { directory, documentId: document.id }
        );
      }
    }

    logger.info(
      `[KnowledgeBase] Loaded ${totalDocuments} documents and ${this.vectors.size()} embeddings from ${directory}`
    );
    return true;
  }
}

/**
 * Context block for grounded answers: one header block per source, stopping
 * before the block that would exceed `maxChars`
 */
export function buildAskContext(sources: readonly SearchResult[], maxChars: number): string {
  const parts: string[] = [];
  let totalChars = 0;

  for (const source of sources) {
    const { document } = source;
    const part = `---
File: ${document.path}
Title: ${document.title || "Untitled"}
Category: ${document.category || "N/A"}
---

${source.snippet}
`;

    if (totalChars + part.length > maxChars) break;

    parts.push(part);
    totalChars += part.length;
  }

  return parts.join("\n\n");
}

// =============================================================================
// Startup
// =============================================================================

export interface CreateKnowledgeBaseOptions {
  /** Providers to use instead of the ones chosen from API keys */
  readonly providers?: ProviderSet;
  readonly settings?: KnowledgeBaseSettings;
}

/**
 * Wire a KnowledgeBase from configuration.
 * The LLM categorizer is used when a completion provider exists, otherwise rules.
 */
export function createKnowledgeBase(options: CreateKnowledgeBaseOptions = {}): KnowledgeBase {
  const settings = options.settings ?? settingsFromConfig();
  const providers =
    options.providers ??
    createProviders({
      ...(getConfigValue("OPENAI_API_KEY") && { openaiApiKey: getConfigValue("OPENAI_API_KEY") }),
      ...(getConfigValue("ANTHROPIC_API_KEY") && {
        anthropicApiKey: getConfigValue("ANTHROPIC_API_KEY"),
      }),
    });

  const rules = new RuleBasedCategorizer();
  const categorizer: Categorizer = providers.completion
    ? new LLMCategorizer(providers.completion, rules, {
        timeoutMs: settings.categorizerTimeoutMs,
        maxContent: settings.categorizerMaxContent,
      })
    : rules;

  logger.debug(
    `[KnowledgeBase] Categorizer: ${providers.completion ? `llm (${providers.completion.name})` : "rules"}`
  );

  return new KnowledgeBase(
    {
      store: new InMemoryMetadataStore(),
      vectors: new ChunkVectorStore(),
      embeddingProvider: providers.embedding,
      completionProvider: providers.completion,
      categorizer,
    },
    settings
  );
}
