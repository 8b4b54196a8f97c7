import {
  ChunkingOptionsSchema,
  type ChunkDraft,
  type ChunkIntent,
  type ChunkingOptions,
  type ContentType,
} from "./types.js";
import { KeywordIntentTagger, type IntentTagger } from "./intent.js";
import { ValidationError } from "../errors/index.js";

/** A source line with its 1-based line number */
interface Line {
  readonly text: string;
  readonly lineNo: number;
}

/** Definition starts, matched against the line with leading whitespace removed */
const DEFINITION_PATTERNS: Readonly<Record<string, RegExp>> = {
  python: /^(def |class |async def )/,
  javascript: /^(function |const |let |class |async |export )/,
  typescript: /^(function |const |let |class |async |export )/,
  go: /^(func |type |package )/,
  rust: /^(fn |struct |enum |impl |pub |trait )/,
};

const MARKDOWN_HEADING = /^#{1,6}\s+\S/;
const FENCE = /^\s*```/;

const defaultTagger = new KeywordIntentTagger();

/**
 * Split content into ordered, bounded chunks according to its content type
 *
 * - code: one chunk per top-level definition, oversized ones re-split by lines
 * - markdown: one run of chunks per heading section
 * - plain: greedy line accumulation
 *
 * Plain and markdown chunks after the first in a run start with exactly the
 * last `overlap` lines of the previous chunk. Code chunks never exceed
 * `maxSize`; their re-split drops seed lines that would break it.
 *
 * @throws ValidationError when the chunking options are out of range
 */
export function chunkContent(
  content: string,
  contentType: ContentType,
  language: string,
  options: Partial<ChunkingOptions> = {},
  tagger: IntentTagger = defaultTagger
): ChunkDraft[] {
  const parsed = ChunkingOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid chunking options: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
      "chunking",
      "❌ Invalid chunk size or overlap."
    );
  }

  const lines = splitLines(content);
  if (lines.length === 0) {
    return [];
  }

  switch (contentType) {
    case "code":
      return chunkCode(lines, language, parsed.data, tagger);
    case "markdown":
      return chunkMarkdown(lines, parsed.data);
    case "plain":
      return chunkPlain(lines, parsed.data);
  }
}

/**
 * Split on LF or CRLF. A terminal newline does not produce an extra empty line.
 */
export function splitLines(content: string): Line[] {
  if (content.length === 0) {
    return [];
  }

  const raw = content.split(/\r?\n/);
  if (raw.length > 1 && raw[raw.length - 1] === "") {
    raw.pop();
  }

  return raw.map((text, index) => ({ text, lineNo: index + 1 }));
}

// =============================================================================
// Content-type strategies
// =============================================================================

function chunkPlain(
  lines: readonly Line[],
  options: ChunkingOptions,
  enforceBound = false
): ChunkDraft[] {
  return accumulate(lines, options, enforceBound)
    .filter((group) => !enforceBound || !isBlank(group))
    .map((group) => toDraft(group, "plain", "text"));
}

function chunkMarkdown(lines: readonly Line[], options: ChunkingOptions): ChunkDraft[] {
  const sections: Line[][] = [];
  let current: Line[] = [];
  let inFence = false;

  for (const line of lines) {
    if (FENCE.test(line.text)) {
      inFence = !inFence;
    } else if (!inFence && MARKDOWN_HEADING.test(line.text) && current.length > 0) {
      sections.push(current);
      current = [];
    }
    current.push(line);
  }
  if (current.length > 0) {
    sections.push(current);
  }

  // Each section accumulates on its own, so no overlap crosses a heading
  return sections
    .flatMap((section) => accumulate(section, options))
    .filter((group) => !isBlank(group))
    .map((group) => toDraft(group, "markdown", "section"));
}

function chunkCode(
  lines: readonly Line[],
  language: string,
  options: ChunkingOptions,
  tagger: IntentTagger
): ChunkDraft[] {
  const pattern = DEFINITION_PATTERNS[language];
  if (!pattern) {
    return chunkPlain(lines, options, true);
  }

  const blocks: Line[][] = [];
  let current: Line[] = [];
  for (const line of lines) {
    if (pattern.test(line.text.trimStart()) && current.length > 0) {
      blocks.push(current);
      current = [];
    }
    current.push(line);
  }
  if (current.length > 0) {
    blocks.push(current);
  }

  const drafts: ChunkDraft[] = [];
  for (const block of blocks) {
    const trimmed = trimTrailingBlank(block);
    if (trimmed.length === 0) continue;

    const draft = toDraft(trimmed, language, "utility");
    const intent = tagger.tag(draft.text, language);

    if (draft.text.length <= options.maxSize) {
      drafts.push({ ...draft, intent });
      continue;
    }

    // Oversized definition: re-split by lines, keeping the definition's span
    for (const group of accumulate(trimmed, options, true)) {
      if (isBlank(group)) continue;
      drafts.push({
        ...toDraft(group, language, intent),
        startLine: draft.startLine,
        endLine: draft.endLine,
      });
    }
  }

  return drafts;
}

// =============================================================================
// Line accumulation
// =============================================================================

/**
 * Greedy accumulation under `maxSize` with line-count overlap seeding.
 * With `enforceBound` the seed shrinks until the incoming line fits, so no
 * group exceeds `maxSize`; without it the seed is kept whole.
 */
function accumulate(
  lines: readonly Line[],
  options: ChunkingOptions,
  enforceBound = false
): Line[][] {
  const { maxSize, overlap } = options;
  const groups: Line[][] = [];
  let current: Line[] = [];
  let size = 0;

  for (const line of explodeLongLines(lines, maxSize)) {
    if (current.length > 0 && size + 1 + line.text.length > maxSize) {
      groups.push(current);

      let seed = overlap > 0 ? current.slice(-overlap) : [];
      while (
        enforceBound &&
        seed.length > 0 &&
        joinedSize(seed) + 1 + line.text.length > maxSize
      ) {
        seed = seed.slice(1);
      }
      current = seed;
      size = joinedSize(seed);
    }

    size = current.length > 0 ? size + 1 + line.text.length : line.text.length;
    current.push(line);
  }

  if (current.length > 0) {
    groups.push(current);
  }
  return groups;
}

/** Lines longer than maxSize become maxSize-sized pieces sharing the line number */
function explodeLongLines(lines: readonly Line[], maxSize: number): Line[] {
  const result: Line[] = [];
  for (const line of lines) {
    if (line.text.length <= maxSize) {
      result.push(line);
      continue;
    }
    for (let offset = 0; offset < line.text.length; offset += maxSize) {
      result.push({ text: line.text.slice(offset, offset + maxSize), lineNo: line.lineNo });
    }
  }
  return result;
}

function joinedSize(lines: readonly Line[]): number {
  if (lines.length === 0) return 0;
  return lines.reduce((total, line) => total + line.text.length, 0) + lines.length - 1;
}

function isBlank(lines: readonly Line[]): boolean {
  return lines.every((line) => line.text.trim().length === 0);
}

function trimTrailingBlank(lines: readonly Line[]): Line[] {
  let end = lines.length;
  while (end > 0 && (lines[end - 1]?.text.trim().length ?? 0) === 0) {
    end--;
  }
  return lines.slice(0, end);
}

function toDraft(lines: readonly Line[], language: string, intent: ChunkIntent): ChunkDraft {
  return {
    text: lines.map((line) => line.text).join("\n"),
    startLine: lines[0]?.lineNo ?? 1,
    endLine: lines[lines.length - 1]?.lineNo ?? 1,
    language,
    intent,
  };
}
