export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly category: ErrorCategory;
  abstract readonly severity: ErrorSeverity;
  abstract readonly userMessage: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** Malformed path, empty content, unsupported filter value */
export class ValidationError extends AppError {
  readonly code = "VALIDATION_ERROR";
  readonly category = ErrorCategory.USER;
  readonly severity = ErrorSeverity.LOW;

  constructor(
    message: string,
    public readonly field: string,
    public readonly userMessage: string,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }
}

/** Operation addressed a document or chunk id that does not exist */
export class NotFoundError extends AppError {
  readonly code = "NOT_FOUND";
  readonly category = ErrorCategory.USER;
  readonly severity = ErrorSeverity.LOW;
  readonly userMessage: string;

  constructor(
    public readonly resource: "document" | "chunk",
    public readonly resourceId: number | string,
    context?: Record<string, unknown>
  ) {
    super(`${resource} ${resourceId} not found`, context);
    this.userMessage = `🔎 ${resource === "document" ? "Document" : "Chunk"} ${resourceId} not found.`;
  }
}

/**
 * Categorizer, embedding or completion collaborator unreachable or unconfigured.
 * The categorizer path degrades to rules; the embedding path propagates this.
 */
export class CollaboratorUnavailableError extends AppError {
  readonly code = "COLLABORATOR_UNAVAILABLE";
  readonly category = ErrorCategory.EXTERNAL;
  readonly severity: ErrorSeverity;
  readonly userMessage: string;

  constructor(
    message: string,
    public readonly collaborator: Collaborator,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, context, originalError);

    switch (collaborator) {
      case Collaborator.EMBEDDING:
        this.severity = ErrorSeverity.HIGH;
        this.userMessage =
          "🧠 Embedding service is unavailable. Documents cannot be indexed right now.";
        break;
      case Collaborator.COMPLETION:
        this.severity = ErrorSeverity.MEDIUM;
        this.userMessage =
          "🤖 No language model is configured. Set ANTHROPIC_API_KEY or OPENAI_API_KEY.";
        break;
      case Collaborator.CATEGORIZER:
        this.severity = ErrorSeverity.LOW;
        this.userMessage =
          "🏷️ Automatic categorization is unavailable, rule-based tags were used.";
        break;
    }
  }
}

/** A directory ingest finished with per-file failures */
export class PartialBatchFailureError extends AppError {
  readonly code = "PARTIAL_BATCH_FAILURE";
  readonly category = ErrorCategory.USER;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly userMessage: string;

  constructor(
    public readonly failures: readonly { readonly file: string; readonly error: string }[],
    public readonly indexedCount: number,
    context?: Record<string, unknown>
  ) {
    super(
      `${failures.length} file(s) failed to index (${indexedCount} indexed)`,
      context
    );
    this.userMessage = `⚠️ ${failures.length} file(s) could not be indexed.`;
  }
}

/** Document and chunk rows disagree after a commit. Never retryable. */
export class ConsistencyViolationError extends AppError {
  readonly code = "CONSISTENCY_VIOLATION";
  readonly category = ErrorCategory.SYSTEM;
  readonly severity = ErrorSeverity.CRITICAL;
  readonly userMessage = "🔧 Internal index inconsistency. Contact administrator.";

  constructor(
    message: string,
    public readonly documentPath: string,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }
}

/** System and configuration errors */
export class SystemError extends AppError {
  readonly code = "SYSTEM_ERROR";
  readonly category = ErrorCategory.SYSTEM;
  readonly severity = ErrorSeverity.HIGH;
  readonly userMessage = "🔧 System error. Contact administrator.";

  constructor(
    message: string,
    public readonly subType: SystemErrorSubType,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, context, originalError);
  }
}

/** File system operation errors */
export class FileSystemError extends AppError {
  readonly code = "FS_ERROR";
  readonly category = ErrorCategory.SYSTEM;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly userMessage = "📁 File system error. Please try again later.";

  constructor(
    message: string,
    public readonly operation: FileOperation,
    public readonly path?: string,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, context, originalError);
  }
}

/** LLM provider errors (OpenAI, Anthropic) */
export class LLMError extends AppError {
  readonly code = "LLM_ERROR";
  readonly category = ErrorCategory.EXTERNAL;
  readonly severity: ErrorSeverity;
  readonly userMessage: string;

  constructor(
    message: string,
    public readonly subType: LLMErrorSubType,
    public readonly provider: string,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, context, originalError);

    switch (subType) {
      case LLMErrorSubType.RATE_LIMIT:
        this.severity = ErrorSeverity.MEDIUM;
        this.userMessage = `⏳ ${provider} rate limit exceeded. Please try again later.`;
        break;
      case LLMErrorSubType.INVALID_KEY:
        this.severity = ErrorSeverity.HIGH;
        this.userMessage = `🔑 Invalid ${provider} API key. Check configuration.`;
        break;
      case LLMErrorSubType.TIMEOUT:
        this.severity = ErrorSeverity.MEDIUM;
        this.userMessage = `⏰ ${provider} request timed out.`;
        break;
      case LLMErrorSubType.EMBEDDING_FAILED:
        this.severity = ErrorSeverity.MEDIUM;
        this.userMessage = `🧠 ${provider} embedding generation failed.`;
        break;
      case LLMErrorSubType.COMPLETION_FAILED:
        this.severity = ErrorSeverity.MEDIUM;
        this.userMessage = `🤖 ${provider} completion failed.`;
        break;
      case LLMErrorSubType.API_ERROR:
        this.severity = ErrorSeverity.MEDIUM;
        this.userMessage = `⚠️ ${provider} error. Please try again later.`;
        break;
    }
  }
}

/** Persisted index errors */
export class KnowledgeBaseError extends AppError {
  readonly code = "KB_ERROR";
  readonly category = ErrorCategory.SYSTEM;
  readonly severity: ErrorSeverity;
  readonly userMessage: string;

  constructor(
    message: string,
    public readonly subType: KnowledgeBaseErrorSubType,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, context, originalError);

    switch (subType) {
      case KnowledgeBaseErrorSubType.INDEX_NOT_FOUND:
        this.severity = ErrorSeverity.MEDIUM;
        this.userMessage = "📚 Knowledge base index not found. Index some files first.";
        break;
      case KnowledgeBaseErrorSubType.INDEX_CORRUPTED:
        this.severity = ErrorSeverity.HIGH;
        this.userMessage = "📚 Knowledge base index corrupted. Re-index the sources.";
        break;
    }
  }
}

export enum ErrorCategory {
  USER = "user", // User input errors
  SYSTEM = "system", // System/infrastructure errors
  EXTERNAL = "external", // External service errors
}

export enum ErrorSeverity {
  LOW = "low", // User can continue, minor issue
  MEDIUM = "medium", // Feature unavailable, retry possible
  HIGH = "high", // Service unavailable, admin needed
  CRITICAL = "critical", // Invariant broken, immediate attention
}

export enum Collaborator {
  CATEGORIZER = "categorizer",
  EMBEDDING = "embedding",
  COMPLETION = "completion",
}

export enum SystemErrorSubType {
  CONFIG = "config",
  STARTUP = "startup",
}

export enum FileOperation {
  READ = "read",
  WRITE = "write",
  ACCESS = "access",
}

export enum LLMErrorSubType {
  RATE_LIMIT = "rate_limit",
  INVALID_KEY = "invalid_key",
  TIMEOUT = "timeout",
  EMBEDDING_FAILED = "embedding_failed",
  COMPLETION_FAILED = "completion_failed",
  API_ERROR = "api_error",
}

export enum KnowledgeBaseErrorSubType {
  INDEX_NOT_FOUND = "index_not_found",
  INDEX_CORRUPTED = "index_corrupted",
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/** Normalize anything thrown into an Error, keeping Error instances as-is */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export interface SimpleErrorHandler {
  handle(error: unknown): { userMessage: string; shouldRetry: boolean };
}

export class DefaultErrorHandler implements SimpleErrorHandler {
  handle(error: unknown): { userMessage: string; shouldRetry: boolean } {
    if (isAppError(error)) {
      return {
        userMessage: error.userMessage,
        shouldRetry:
          error.severity === ErrorSeverity.LOW ||
          error.severity === ErrorSeverity.MEDIUM,
      };
    }

    if (error instanceof Error) {
      return {
        userMessage: "⚠️ An error occurred. Please try again.",
        shouldRetry: true,
      };
    }

    return {
      userMessage: "❌ Unknown error. Contact administrator.",
      shouldRetry: false,
    };
  }
}

export function createDefaultErrorHandler(): SimpleErrorHandler {
  return new DefaultErrorHandler();
}
