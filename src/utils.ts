/**
 * Shared utilities: levelled logger and environment configuration
 */
import "dotenv/config";
import { z } from "zod";
import { SystemError, SystemErrorSubType } from "./errors/index.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL = (() => {
  const level = process.env.LOG_LEVEL?.toUpperCase() || "INFO";
  const isProduction = process.env.NODE_ENV === "production";

  if (isProduction && (level === "DEBUG" || level === "INFO")) {
    return LogLevel.WARN;
  }

  switch (level) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
})();

export const logger = {
  debug: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.DEBUG) {
      console.log(`🔍 ${message}`, ...args);
    }
  },

  info: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.INFO) {
      console.log(`ℹ️ ${message}`, ...args);
    }
  },

  warn: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.WARN) {
      console.warn(`⚠️ ${message}`, ...args);
    }
  },

  error: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.ERROR) {
      console.error(`❌ ${message}`, ...args);
    }
  },
};

// =============================================================================
// Configuration
// =============================================================================

/** Blank env values count as unset so defaults apply */
const optionalKey = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

/**
 * Environment configuration schema
 * @remarks CHUNK_OVERLAP counts lines, not characters
 */
export const AppConfigSchema = z.object({
  OPENAI_API_KEY: optionalKey,
  ANTHROPIC_API_KEY: optionalKey,
  DATA_DIR: z.string().min(1).default("./data"),

  MAX_CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(3),

  DEFAULT_SEARCH_LIMIT: z.coerce.number().int().min(1).max(100).default(10),
  MIN_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
  KEYWORD_FALLBACK_PAGE_SIZE: z.coerce.number().int().positive().default(100),

  RAG_EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(32),
  RAG_MAX_DIRECTORY_DEPTH: z.coerce.number().int().nonnegative().default(10),
  QUERY_EMBEDDING_CACHE_SIZE: z.coerce.number().int().positive().default(1000),

  CATEGORIZER_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  CATEGORIZER_MAX_CONTENT: z.coerce.number().int().positive().default(2000),
  ASK_MAX_CONTEXT_CHARS: z.coerce.number().int().positive().default(8000),
});
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ConfigKey = keyof AppConfig;

let cachedConfig: AppConfig | null = null;

/**
 * Load and validate configuration from environment variables
 * @param env - Environment source (defaults to process.env)
 * @throws SystemError with CONFIG subtype listing every invalid key
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = AppConfigSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new SystemError(
      `Invalid configuration: ${problems}`,
      SystemErrorSubType.CONFIG,
      { issues: result.error.issues.length }
    );
  }

  return result.data;
}

/**
 * Read a single configuration value (validated once, then cached)
 * @param key - Configuration key
 */
export function getConfigValue<K extends ConfigKey>(key: K): AppConfig[K] {
  if (cachedConfig === null) {
    cachedConfig = loadConfig();
  }
  return cachedConfig[key];
}

/** Drop the cached configuration so the next read re-validates the environment */
export function resetConfigCache(): void {
  cachedConfig = null;
}

/**
 * Creates brief summary from content
 */
export function createSummary(content: string, maxLength = 200): string {
  if (content.length <= maxLength) {
    return content;
  }

  const truncated = content.substring(0, maxLength);
  const lastSpaceIndex = truncated.lastIndexOf(" ");

  if (lastSpaceIndex === -1) {
    return truncated + "...";
  }

  return truncated.substring(0, lastSpaceIndex) + "...";
}

/**
 * Formats duration in milliseconds to readable format
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);

  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  return remainingSeconds > 0 ? `${minutes}m ${remainingSeconds}s` : `${minutes}m`;
}
