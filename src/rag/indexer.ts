import { readFile, stat } from "fs/promises";
import { basename, extname } from "path";
import type { Categorizer } from "./categorizer.js";
import { chunkContent } from "./chunker.js";
import { ExtensionClassifier, SUPPORTED_EXTENSIONS, type Classifier } from "./classifier.js";
import type { EmbeddingIndex } from "./embeddings.js";
import { fingerprint } from "./fingerprint.js";
import { findFiles, normalizeExtensions } from "./files.js";
import type { IntentTagger } from "./intent.js";
import { toDocumentDetail, type MetadataStore } from "./metadata-store.js";
import { embeddingRecordId, type EmbeddingRecord } from "./store.js";
import type {
  BatchIngestFailure,
  BatchIngestReport,
  ChunkingOptions,
  DirectoryIngestOptions,
  DocumentDetail,
  DocumentPatch,
  IngestOverrides,
} from "./types.js";
import {
  ConsistencyViolationError,
  NotFoundError,
  ValidationError,
  toError,
} from "../errors/index.js";
import {
  unwrap,
  validateDirectoryOptions,
  validateDocumentPatch,
  validateIngestInput,
  validateIngestOverrides,
} from "../validation.js";
import { formatDuration, logger } from "../utils.js";

/** Runs `task` for `key`; the facade passes a per-path queue here */
export type TaskSerializer = <T>(key: string, task: () => Promise<T>) => Promise<T>;

export interface IndexerDependencies {
  readonly store: MetadataStore;
  readonly embeddings: EmbeddingIndex;
  readonly categorizer: Categorizer;
  /** Defaults to extension-based classification */
  readonly classifier?: Classifier;
  readonly tagger?: IntentTagger;
}

export interface IndexerOptions {
  readonly chunking: ChunkingOptions;
  readonly maxDirectoryDepth: number;
  readonly serialize?: TaskSerializer;
}

const runDirectly: TaskSerializer = (_key, task) => task();

/**
 * Turns raw documents into stored documents, chunks and embeddings.
 *
 * Ingest is staged then committed: everything that can fail remotely
 * (categorize, embed) runs before the first write, and the writes run in one
 * metadata-store transaction with the embedding records restored on failure.
 */
export class Indexer {
  private readonly store: MetadataStore;
  private readonly embeddings: EmbeddingIndex;
  private readonly categorizer: Categorizer;
  private readonly classifier: Classifier;
  private readonly tagger: IntentTagger | undefined;
  private readonly serialize: TaskSerializer;

  constructor(
    dependencies: IndexerDependencies,
    private readonly options: IndexerOptions
  ) {
    this.store = dependencies.store;
    this.embeddings = dependencies.embeddings;
    this.categorizer = dependencies.categorizer;
    this.classifier = dependencies.classifier ?? new ExtensionClassifier();
    this.tagger = dependencies.tagger;
    this.serialize = options.serialize ?? runDirectly;
  }

  /**
   * Index one document, replacing any previous version at the same path
   *
   * @returns The stored document; unchanged content returns the existing row untouched
   * @throws ValidationError on a blank path, NUL in the path or blank content
   * @throws CollaboratorUnavailableError when embeddings cannot be computed (nothing is written)
   * @throws ConsistencyViolationError when the committed chunk count is wrong (rolled back)
   */
  async ingest(
    path: string,
    content: string,
    overrides: IngestOverrides = {}
  ): Promise<DocumentDetail> {
    const input = unwrap(validateIngestInput({ path, content }));
    const validOverrides = unwrap(validateIngestOverrides(overrides));
    return this.serialize(input.path, () =>
      this.ingestValidated(input.path, input.content, validOverrides)
    );
  }

  private async ingestValidated(
    path: string,
    content: string,
    overrides: IngestOverrides
  ): Promise<DocumentDetail> {
    const startTime = Date.now();
    const contentHash = fingerprint(content);
    const existing = this.store.getDocumentByPath(path);

    if (existing && existing.contentHash === contentHash) {
      logger.debug(`[Indexer] Unchanged, skipping: ${path}`);
      return toDocumentDetail(this.store, existing);
    }

    // Stage: nothing below writes until the transaction
    const classification = this.classifier.classify(path, content, overrides);
    const title = overrides.title ?? deriveTitle(path, content);
    const categorization = await this.categorizer.categorize(content);
    // An explicit language wins; otherwise the categorizer may refine "plain"
    const language =
      overrides.language ??
      (classification.language !== "plain"
        ? classification.language
        : categorization.language ?? classification.language);

    const drafts = chunkContent(
      content,
      classification.contentType,
      language,
      this.options.chunking,
      this.tagger
    );
    const vectors = await this.embeddings.embed(drafts.map((draft) => draft.text));

    if (vectors.length !== drafts.length) {
      throw new ConsistencyViolationError(
        `Embedded ${vectors.length} of ${drafts.length} chunks`,
        path
      );
    }

    // Commit
    const priorRecords = existing ? this.embeddings.listByDocument(existing.id) : [];
    const staged: { documentId: number | null } = { documentId: null };

    try {
      const detail = this.store.transaction(() => {
        if (existing) {
          this.embeddings.deleteByDocument(existing.id);
          this.store.deleteChunksByDocument(existing.id);
          this.store.deleteDocument(existing.id);
        }

        const document = this.store.insertDocument({
          path,
          contentHash,
          title,
          contentType: classification.contentType,
          language,
          summary: categorization.summary,
          tags: categorization.tags,
          category: categorization.category,
        });
        staged.documentId = document.id;

        const records: EmbeddingRecord[] = drafts.map((draft, ordinal) => {
          const chunk = this.store.insertChunk({ ...draft, documentId: document.id, ordinal });
          const vector = vectors[ordinal];
          if (!vector) {
            throw new ConsistencyViolationError(`Missing embedding for chunk ${ordinal}`, path);
          }
          return {
            id: embeddingRecordId(document.id, ordinal),
            vector,
            text: chunk.text,
            metadata: {
              doc_id: document.id,
              language: chunk.language,
              intent: chunk.intent,
              chunk_index: ordinal,
              path,
            },
          };
        });
        this.embeddings.upsert(records);

        const stored = toDocumentDetail(this.store, document);
        if (stored.chunks.length !== drafts.length) {
          throw new ConsistencyViolationError(
            `Stored ${stored.chunks.length} chunks, expected ${drafts.length}`,
            path,
            { documentId: document.id }
          );
        }
        return stored;
      });

      logger.info(
        `[Indexer] ${existing ? "Re-indexed" : "Indexed"} ${path}: ${detail.chunks.length} chunks in ${formatDuration(Date.now() - startTime)}`
      );
      return detail;
    } catch (error) {
      if (staged.documentId !== null) {
        this.embeddings.deleteByDocument(staged.documentId);
      }
      if (priorRecords.length > 0) {
        this.embeddings.upsert(priorRecords);
      }
      logger.error(`[Indexer] Commit failed for ${path}, rolled back: ${toError(error).message}`);
      throw error;
    }
  }

  /**
   * Index every matching file under `root`; per-file failures are collected
   *
   * @throws ValidationError when `root` is missing or not a directory
   */
  async ingestDirectory(
    root: string,
    options: DirectoryIngestOptions = {}
  ): Promise<BatchIngestReport> {
    const { recursive = true, extensions = SUPPORTED_EXTENSIONS } = unwrap(
      validateDirectoryOptions(options)
    );

    const isDirectory = await stat(root).then(
      (stats) => stats.isDirectory(),
      () => false
    );
    if (!isDirectory) {
      throw new ValidationError(
        `Not a directory: ${root}`,
        "root",
        `📁 Directory not found: ${root}`
      );
    }

    const files = await findFiles(root, {
      recursive,
      extensions: normalizeExtensions(extensions),
      maxDepth: this.options.maxDirectoryDepth,
    });

    let indexedCount = 0;
    const errors: BatchIngestFailure[] = [];

    for (const file of files) {
      try {
        const content = await readFile(file, "utf-8");
        if (content.trim().length === 0) {
          logger.debug(`[Indexer] Skipping blank file: ${file}`);
          continue;
        }
        await this.ingest(file, content);
        indexedCount++;
      } catch (error) {
        const message = toError(error).message;
        logger.warn(`[Indexer] Failed to index ${file}: ${message}`);
        errors.push({ file, error: message });
      }
    }

    logger.info(
      `[Indexer] Directory ${root}: ${indexedCount}/${files.length} indexed, ${errors.length} failed`
    );
    return { indexedCount, totalCount: files.length, errors };
  }

  /**
   * Remove a document, its chunks and its embedding records
   * @returns false when no document has this id
   */
  deleteDocument(id: number): boolean {
    const document = this.store.getDocument(id);
    if (!document) {
      return false;
    }

    const priorRecords = this.embeddings.listByDocument(id);
    this.embeddings.deleteByDocument(id);

    try {
      this.store.transaction(() => {
        this.store.deleteChunksByDocument(id);
        this.store.deleteDocument(id);
      });
    } catch (error) {
      this.embeddings.upsert(priorRecords);
      throw error;
    }

    logger.info(`[Indexer] Deleted document ${id} (${document.path})`);
    return true;
  }

  /**
   * Change title, summary, tags or category without re-chunking
   * @throws ValidationError on an empty patch
   * @throws NotFoundError when no document has this id
   */
  updateDocument(id: number, patch: DocumentPatch): DocumentDetail {
    const validPatch = unwrap(validateDocumentPatch(patch));
    const updated = this.store.updateDocument(id, validPatch);
    if (!updated) {
      throw new NotFoundError("document", id);
    }
    return toDocumentDetail(this.store, updated);
  }
}

/**
 * Title from the first `# ` heading of a .md file, else the title-cased file stem.
 * Keyed on the extension, so fence-heavy .md files classified as code keep their heading.
 */
export function deriveTitle(path: string, content: string): string {
  if (extname(path).toLowerCase() === ".md") {
    const heading = content.match(/^#\s+(.+)$/m);
    const text = heading?.[1]?.trim();
    if (text) return text;
  }

  const stem = basename(path, extname(path));
  const title = stem
    .replace(/[_-]/g, " ")
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");

  return title || basename(path);
}
