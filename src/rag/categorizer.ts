import { readFileSync } from "fs";
import { z } from "zod";
import type { Categorization } from "./types.js";
import type { LLMCompletionProvider } from "../llm/types.js";
import { withTimeout } from "../llm/timeout.js";
import { toError } from "../errors/index.js";
import { logger } from "../utils.js";

/**
 * Produces category, tags, summary and a language guess for raw content
 */
export interface Categorizer {
  categorize(content: string): Promise<Categorization>;
}

// =============================================================================
// Rule data
// =============================================================================

const CategorizerRulesFileSchema = z.object({
  categories: z.array(z.string().min(1)).min(1),
  categoryKeywords: z.array(
    z.object({ category: z.string().min(1), keywords: z.array(z.string().min(1)) })
  ),
  languagePatterns: z.array(
    z.object({ language: z.string().min(1), patterns: z.array(z.string().min(1)) })
  ),
  minimumPatternMatches: z.number().int().positive(),
});

export interface CategorizerRules {
  readonly categories: readonly string[];
  readonly categoryKeywords: readonly { readonly category: string; readonly keywords: readonly string[] }[];
  readonly languagePatterns: readonly { readonly language: string; readonly patterns: readonly RegExp[] }[];
  readonly minimumPatternMatches: number;
}

const RULES_FILE = new URL("../../resources/categorizer-rules.json", import.meta.url);

let cachedRules: CategorizerRules | null = null;

/**
 * Read and compile the bundled rule file (cached after the first call)
 */
export function loadCategorizerRules(): CategorizerRules {
  if (cachedRules) return cachedRules;

  const raw: unknown = JSON.parse(readFileSync(RULES_FILE, "utf-8"));
  const parsed = CategorizerRulesFileSchema.parse(raw);

  cachedRules = {
    categories: parsed.categories,
    categoryKeywords: parsed.categoryKeywords,
    languagePatterns: parsed.languagePatterns.map(({ language, patterns }) => ({
      language,
      patterns: patterns.map((pattern) => new RegExp(pattern, "i")),
    })),
    minimumPatternMatches: parsed.minimumPatternMatches,
  };
  return cachedRules;
}

const SUMMARY_MAX_LENGTH = 100;
const COMMENT_PREFIXES = ["#", "//", "<!--"];

// =============================================================================
// Rule-based categorizer
// =============================================================================

/**
 * Keyword categorizer used offline and as the LLM fallback
 *
 * - category: first keyword group found in the lower-cased content
 * - language: first language with enough pattern hits
 * - summary: first non-comment line, cut to 100 characters
 */
export class RuleBasedCategorizer implements Categorizer {
  constructor(private readonly rules: CategorizerRules = loadCategorizerRules()) {}

  get categories(): readonly string[] {
    return this.rules.categories;
  }

  async categorize(content: string): Promise<Categorization> {
    return this.categorizeSync(content);
  }

  categorizeSync(content: string): Categorization {
    const lower = content.toLowerCase();
    const language = this.detectLanguage(content);

    const match = this.rules.categoryKeywords.find(({ keywords }) =>
      keywords.some((keyword) => lower.includes(keyword))
    );
    const category = match?.category ?? "other";

    const tags: string[] = [];
    if (language) tags.push(language);
    if (category !== "other") tags.push(category);

    return { category, tags, summary: this.summarize(content), language };
  }

  detectLanguage(content: string): string | null {
    const found = this.rules.languagePatterns.find(
      ({ patterns }) =>
        patterns.filter((pattern) => pattern.test(content)).length >=
        this.rules.minimumPatternMatches
    );
    return found?.language ?? null;
  }

  private summarize(content: string): string {
    for (const rawLine of content.split("\n")) {
      const line = rawLine.trim();
      if (line && !COMMENT_PREFIXES.some((prefix) => line.startsWith(prefix))) {
        return line.slice(0, SUMMARY_MAX_LENGTH);
      }
    }
    return "";
  }
}

// =============================================================================
// LLM categorizer
// =============================================================================

const LLMCategorizationSchema = z.object({
  category: z.string().default("other"),
  tags: z.array(z.string()).default([]),
  summary: z.string().default(""),
  language: z.string().nullable().optional(),
});

export interface LLMCategorizerOptions {
  /** Abandon the model call after this long (default 15000) */
  readonly timeoutMs?: number;
  /** Characters of content included in the prompt (default 2000) */
  readonly maxContent?: number;
}

const SYSTEM_PROMPT = "You are a code documentation analyzer. Return only valid JSON.";

/**
 * Completion-model categorizer. Any failure (timeout, provider error,
 * unparseable reply) degrades to the rule-based result.
 */
export class LLMCategorizer implements Categorizer {
  private readonly timeoutMs: number;
  private readonly maxContent: number;

  constructor(
    private readonly provider: LLMCompletionProvider,
    private readonly fallback: RuleBasedCategorizer = new RuleBasedCategorizer(),
    options: LLMCategorizerOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.maxContent = options.maxContent ?? 2000;
  }

  async categorize(content: string): Promise<Categorization> {
    try {
      const result = await withTimeout(
        this.provider.complete(this.buildPrompt(content), {
          maxTokens: 500,
          temperature: 0,
          system: SYSTEM_PROMPT,
        }),
        { timeoutMs: this.timeoutMs, context: "Categorization", provider: this.provider.name }
      );
      return this.parseReply(result.text);
    } catch (error) {
      logger.warn(
        `[Categorizer] LLM categorization failed, using rules: ${toError(error).message}`
      );
      return this.fallback.categorize(content);
    }
  }

  buildPrompt(content: string): string {
    const truncated = content.slice(0, this.maxContent);
    return `Analyze the following code or documentation content and provide:
1. A category (one of: ${this.fallback.categories.join(", ")})
2. Relevant tags (array of strings)
3. A brief summary (1-2 sentences)

Content:
\`\`\`
${truncated}
\`\`\`

Provide your response in JSON format:
{
    "category": "category_name",
    "tags": ["tag1", "tag2", "tag3"],
    "summary": "Brief summary of the content",
    "language": "programming_language_if_code"
}`;
  }

  /**
   * @throws Error when the reply holds no JSON object of the expected shape
   */
  private parseReply(text: string): Categorization {
    const match = text.match(/\{[\s\S]*\}/);
    if (!match) {
      throw new Error("Categorizer reply contained no JSON object");
    }

    const parsed = LLMCategorizationSchema.parse(JSON.parse(match[0]));
    const category = this.fallback.categories.includes(parsed.category)
      ? parsed.category
      : "other";

    return {
      category,
      tags: [...new Set(parsed.tags.map((tag) => tag.trim()).filter(Boolean))],
      summary: parsed.summary,
      language: parsed.language ?? null,
    };
  }
}
