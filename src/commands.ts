/**
 * Command handlers for the knowledge base CLI
 */

import { parseArgs } from "util";
import type { KnowledgeBase } from "./rag/pipeline.js";
import {
  ContentTypeSchema,
  type ContentType,
  type DocumentDetail,
  type SearchResult,
} from "./rag/types.js";
import { PartialBatchFailureError, ValidationError } from "./errors/index.js";
import { createSummary, formatDuration } from "./utils.js";

export interface CommandResult {
  readonly output: string;
  /** True when the command changed the index and it should be saved */
  readonly mutated: boolean;
}

export const USAGE = `📖 Usage: devkb <command> [options]

Commands:
  ingest <file> [--title T] [--type code|markdown|plain] [--language L]
  index <dir> [--no-recursive] [--ext .md,.ts]
  search <query> [--limit N] [--type T] [--language L] [--category C] [--tag T] [--keyword]
  show <id>
  list [--page N] [--category C]
  delete <id>
  stats
  ask <question> [--limit N]
  explain <file> [--language L]`;

const SNIPPET_LENGTH = 160;

/**
 * Run one CLI command against the knowledge base
 * @throws ValidationError on unknown commands or missing arguments
 */
export async function runCommand(
  kb: KnowledgeBase,
  argv: readonly string[]
): Promise<CommandResult> {
  const [command, ...rest] = argv;

  switch (command) {
    case "ingest":
      return ingestCommand(kb, rest);
    case "index":
      return indexCommand(kb, rest);
    case "search":
      return searchCommand(kb, rest);
    case "show":
      return { output: formatDocument(kb.getDocument(parseId(rest))), mutated: false };
    case "list":
      return listCommand(kb, rest);
    case "delete":
      return deleteCommand(kb, rest);
    case "stats":
      return { output: statsCommand(kb), mutated: false };
    case "ask":
      return askCommand(kb, rest);
    case "explain":
      return explainCommand(kb, rest);
    case undefined:
    case "help":
    case "--help":
      return { output: USAGE, mutated: false };
    default:
      throw new ValidationError(
        `Unknown command: ${command}`,
        "command",
        `❌ Unknown command: ${command}\n\n${USAGE}`
      );
  }
}

function requirePositional(positionals: readonly string[], name: string): string {
  const value = positionals.join(" ").trim();
  if (value.length === 0) {
    throw new ValidationError(`Missing ${name}`, name, `❌ Missing ${name}\n\n${USAGE}`);
  }
  return value;
}

function parseId(args: readonly string[]): number {
  return Number(requirePositional(args, "id"));
}

function parseLimit(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function parseContentType(value: string | undefined): ContentType | undefined {
  if (value === undefined) return undefined;
  const parsed = ContentTypeSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid type: ${value}`,
      "contentType",
      `❌ Type must be one of: ${ContentTypeSchema.options.join(", ")}`
    );
  }
  return parsed.data;
}

async function ingestCommand(kb: KnowledgeBase, args: readonly string[]): Promise<CommandResult> {
  const { values, positionals } = parseArgs({
    args: [...args],
    allowPositionals: true,
    options: {
      title: { type: "string" },
      type: { type: "string" },
      language: { type: "string" },
    },
  });
  const file = requirePositional(positionals, "file");

  const document = await kb.ingestFile(file, {
    title: values.title,
    contentType: parseContentType(values.type),
    language: values.language,
  });

  return {
    output: `✅ Indexed ${document.path} (#${document.id})\n${formatDocumentLine(document)}`,
    mutated: true,
  };
}

async function indexCommand(kb: KnowledgeBase, args: readonly string[]): Promise<CommandResult> {
  const { values, positionals } = parseArgs({
    args: [...args],
    allowPositionals: true,
    options: {
      "no-recursive": { type: "boolean", default: false },
      ext: { type: "string" },
    },
  });
  const root = requirePositional(positionals, "directory");

  const startTime = Date.now();
  const report = await kb.ingestDirectory(root, {
    recursive: !values["no-recursive"],
    extensions: values.ext?.split(","),
  });
  if (report.indexedCount === 0 && report.errors.length > 0) {
    throw new PartialBatchFailureError(report.errors, 0, { root });
  }

  const lines = [
    `✅ Indexed ${report.indexedCount}/${report.totalCount} files from ${root}`,
    `⏱️ Time: ${formatDuration(Date.now() - startTime)}`,
  ];
  for (const failure of report.errors) {
    lines.push(`⚠️ ${failure.file}: ${failure.error}`);
  }

  return { output: lines.join("\n"), mutated: report.indexedCount > 0 };
}

async function searchCommand(kb: KnowledgeBase, args: readonly string[]): Promise<CommandResult> {
  const { values, positionals } = parseArgs({
    args: [...args],
    allowPositionals: true,
    options: {
      limit: { type: "string" },
      type: { type: "string" },
      language: { type: "string" },
      category: { type: "string" },
      tag: { type: "string", multiple: true },
      keyword: { type: "boolean", default: false },
    },
  });
  const query = requirePositional(positionals, "query");
  const request = {
    query,
    limit: parseLimit(values.limit),
    contentType: parseContentType(values.type),
    language: values.language,
    category: values.category,
    tags: values.tag,
  };
  const results = values.keyword ? kb.keywordSearch(request) : await kb.search(request);

  return { output: formatSearchResults(query, results), mutated: false };
}

function listCommand(kb: KnowledgeBase, args: readonly string[]): CommandResult {
  const { values } = parseArgs({
    args: [...args],
    options: {
      page: { type: "string", default: "1" },
      category: { type: "string" },
    },
  });

  const page = kb.listDocuments(
    { category: values.category },
    { page: Number(values.page), pageSize: 20 }
  );
  if (page.total === 0) {
    return { output: "📭 No documents indexed", mutated: false };
  }

  const lines = [`📚 Documents (page ${page.page}/${page.pages}, ${page.total} total)`];
  for (const document of page.items) {
    lines.push(`#${document.id} ${document.path} · ${document.title}`);
  }
  return { output: lines.join("\n"), mutated: false };
}

function deleteCommand(kb: KnowledgeBase, args: readonly string[]): CommandResult {
  const id = parseId(args);
  const deleted = kb.deleteDocument(id);
  return deleted
    ? { output: `🗑️ Deleted document #${id}`, mutated: true }
    : { output: `❓ Document #${id} not found`, mutated: false };
}

function statsCommand(kb: KnowledgeBase): string {
  const stats = kb.stats();
  const lines = [
    `📊 ${stats.totalDocuments} documents, ${stats.totalChunks} chunks`,
    `🧮 ${stats.embeddings.totalRecords} embeddings (dimension ${stats.embeddings.dimension})`,
  ];
  const categories = Object.entries(stats.categories)
    .sort(([, a], [, b]) => b - a)
    .map(([name, count]) => `${name}: ${count}`);
  if (categories.length > 0) {
    lines.push(`🏷️ ${categories.join(", ")}`);
  }
  return lines.join("\n");
}

async function askCommand(kb: KnowledgeBase, args: readonly string[]): Promise<CommandResult> {
  const { values, positionals } = parseArgs({
    args: [...args],
    allowPositionals: true,
    options: { limit: { type: "string" } },
  });
  const question = requirePositional(positionals, "question");

  const result = await kb.ask(question, parseLimit(values.limit));
  const lines = [result.answer];
  if (result.sources.length > 0) {
    lines.push("", "📎 Sources:");
    for (const source of result.sources) {
      lines.push(`- ${source.document.path} (#${source.document.id})`);
    }
  }
  return { output: lines.join("\n"), mutated: false };
}

async function explainCommand(kb: KnowledgeBase, args: readonly string[]): Promise<CommandResult> {
  const { values, positionals } = parseArgs({
    args: [...args],
    allowPositionals: true,
    options: { language: { type: "string" } },
  });
  const file = requirePositional(positionals, "file");

  const result = await kb.explainFile(file, values.language);
  return { output: `💡 ${file}\n\n${result.explanation}`, mutated: false };
}

function formatDocumentLine(document: DocumentDetail): string {
  return `📄 ${document.title} · ${document.category} · ${document.language ?? "unknown"} · ${document.chunks.length} chunks`;
}

export function formatDocument(document: DocumentDetail): string {
  const lines = [`#${document.id} ${document.path}`, formatDocumentLine(document)];
  if (document.tags.length > 0) {
    lines.push(`🏷️ ${document.tags.join(", ")}`);
  }
  if (document.summary) {
    lines.push(`📝 ${document.summary}`);
  }
  return lines.join("\n");
}

export function formatSearchResults(query: string, results: readonly SearchResult[]): string {
  if (results.length === 0) {
    return `🔍 No results for "${query}"`;
  }

  return results
    .map((result, index) => {
      const snippet = createSummary(result.snippet.replace(/\s+/g, " ").trim(), SNIPPET_LENGTH);
      return `${index + 1}. [${result.similarity.toFixed(2)}] ${result.document.path} (#${result.document.id})\n   ${snippet}`;
    })
    .join("\n");
}
