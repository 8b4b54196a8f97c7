import { readdir, stat } from "fs/promises";
import { extname, join } from "path";
import { logger } from "../utils.js";

const SKIPPED_DIRECTORIES: ReadonlySet<string> = new Set(["node_modules"]);

export interface FindFilesOptions {
  readonly recursive: boolean;
  /** Lower-cased extensions with a leading dot */
  readonly extensions: ReadonlySet<string>;
  readonly maxDepth: number;
}

/**
 * Normalize user-supplied extensions: lower-case, leading dot, no blanks
 */
export function normalizeExtensions(extensions: readonly string[]): Set<string> {
  return new Set(
    extensions
      .map((ext) => ext.trim().toLowerCase())
      .filter((ext) => ext.length > 0)
      .map((ext) => (ext.startsWith(".") ? ext : `.${ext}`))
  );
}

/**
 * Collect files under `root` whose extension is in the filter.
 * Hidden entries and node_modules are skipped; results are sorted per directory.
 */
export async function findFiles(
  root: string,
  options: FindFilesOptions
): Promise<readonly string[]> {
  const files: string[] = [];

  async function traverse(currentPath: string, depth: number): Promise<void> {
    if (depth > options.maxDepth) {
      logger.warn(
        `[Indexer] Max directory depth (${options.maxDepth}) reached at ${currentPath}`
      );
      return;
    }

    let entries: string[];
    try {
      entries = (await readdir(currentPath)).sort();
    } catch (error) {
      logger.warn(`[Indexer] Cannot read directory ${currentPath}:`, error);
      return;
    }

    for (const entry of entries) {
      if (entry.startsWith(".")) continue;

      const fullPath = join(currentPath, entry);

      let stats;
      try {
        stats = await stat(fullPath);
      } catch (error) {
        logger.warn(`[Indexer] Cannot stat ${fullPath}:`, error);
        continue;
      }

      if (stats.isDirectory()) {
        if (options.recursive && !SKIPPED_DIRECTORIES.has(entry)) {
          await traverse(fullPath, depth + 1);
        }
      } else if (stats.isFile() && options.extensions.has(extname(entry).toLowerCase())) {
        files.push(fullPath);
      }
    }
  }

  await traverse(root, 0);
  return files;
}
