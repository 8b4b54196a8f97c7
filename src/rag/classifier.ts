import { extname } from "path";
import type { ClassificationResult, ContentType, IngestOverrides } from "./types.js";

/** Lower-cased extension (with dot) to language */
const EXTENSION_LANGUAGES: Readonly<Record<string, string>> = {
  ".py": "python",
  ".js": "javascript",
  ".jsx": "javascript",
  ".ts": "typescript",
  ".tsx": "typescript",
  ".json": "json",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".toml": "toml",
  ".sql": "sql",
  ".sh": "shell",
  ".bash": "shell",
  ".go": "go",
  ".rs": "rust",
  ".java": "java",
  ".c": "c",
  ".h": "c",
  ".cpp": "cpp",
  ".html": "html",
  ".css": "css",
  ".scss": "scss",
  ".md": "markdown",
  ".txt": "plain",
};

const CODE_EXTENSIONS: ReadonlySet<string> = new Set([
  ".py", ".js", ".ts", ".jsx", ".tsx", ".go", ".rs", ".java", ".sql",
  ".sh", ".bash", ".json", ".yaml", ".yml", ".toml", ".c", ".cpp", ".h",
]);

/** Every extension the classifier knows; the default directory-ingest filter */
export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(EXTENSION_LANGUAGES);

/** Markdown with more than this many fenced blocks is treated as code */
const FENCED_BLOCK_LIMIT = 2;
const FENCED_BLOCK_PATTERN = /```[\s\S]*?```/g;

/**
 * Infers content type and language for a document
 */
export interface Classifier {
  classify(
    path: string,
    content: string,
    overrides?: IngestOverrides
  ): ClassificationResult;
}

/**
 * Extension-table classifier. Pure: same inputs give the same result.
 *
 * @example
 * ```typescript
 * new ExtensionClassifier().classify("src/app.py", "def main(): ...");
 * // { contentType: "code", language: "python" }
 * ```
 */
export class ExtensionClassifier implements Classifier {
  classify(
    path: string,
    content: string,
    overrides: IngestOverrides = {}
  ): ClassificationResult {
    const extension = extname(path).toLowerCase();
    const language = overrides.language ?? EXTENSION_LANGUAGES[extension] ?? "plain";
    const contentType = overrides.contentType ?? this.detectContentType(extension, content);

    return { contentType, language };
  }

  private detectContentType(extension: string, content: string): ContentType {
    if (extension === ".md") {
      const fencedBlocks = content.match(FENCED_BLOCK_PATTERN)?.length ?? 0;
      return fencedBlocks > FENCED_BLOCK_LIMIT ? "code" : "markdown";
    }

    return CODE_EXTENSIONS.has(extension) ? "code" : "plain";
  }
}
