/**
 * Unit tests for the rule-based and LLM categorizers
 */

import { describe, it, expect, vi } from "vitest";
import {
  LLMCategorizer,
  RuleBasedCategorizer,
  loadCategorizerRules,
} from "../../rag/categorizer.js";
import { createCompletionProvider } from "../fakes.js";

const PYTHON_SOURCE = 'import os\n\ndef greet(name):\n    return f"hi {name}"\n';

describe("loadCategorizerRules", () => {
  it("should load the bundled rule file once", () => {
    const rules = loadCategorizerRules();

    expect(rules.categories).toContain("documentation");
    expect(rules.categories).toContain("other");
    expect(rules.minimumPatternMatches).toBe(2);
    expect(loadCategorizerRules()).toBe(rules);
  });
});

describe("RuleBasedCategorizer", () => {
  const categorizer = new RuleBasedCategorizer();

  it("should categorize python source", async () => {
    await expect(categorizer.categorize(PYTHON_SOURCE)).resolves.toEqual({
      category: "utilities",
      tags: ["python", "utilities"],
      summary: "import os",
      language: "python",
    });
  });

  it("should categorize prose by keyword and skip heading lines in the summary", () => {
    expect(
      categorizer.categorizeSync("# Setup Guide\n\nRead the guide before you start.")
    ).toEqual({
      category: "documentation",
      tags: ["documentation"],
      summary: "Read the guide before you start.",
      language: null,
    });
  });

  it("should use the first matching keyword group", () => {
    expect(categorizer.categorizeSync("test the api").category).toBe("testing");
  });

  it("should fall back to other with no tags", () => {
    expect(categorizer.categorizeSync("hello world")).toEqual({
      category: "other",
      tags: [],
      summary: "hello world",
      language: null,
    });
  });

  it("should cut the summary to 100 characters", () => {
    expect(categorizer.categorizeSync("x".repeat(150)).summary).toBe("x".repeat(100));
  });

  it("should need two pattern hits to name a language", () => {
    expect(categorizer.detectLanguage("def only_one")).toBeNull();
    expect(categorizer.detectLanguage("SELECT id FROM users")).toBe("sql");
  });
});

describe("LLMCategorizer", () => {
  it("should use the model's JSON reply", async () => {
    const provider = createCompletionProvider(
      'Here you go:\n```json\n{"category": "api", "tags": ["rest", " rest ", "http"], "summary": "Routes.", "language": "python"}\n```'
    );
    const categorizer = new LLMCategorizer(provider);

    await expect(categorizer.categorize(PYTHON_SOURCE)).resolves.toEqual({
      category: "api",
      tags: ["rest", "http"],
      summary: "Routes.",
      language: "python",
    });
    expect(provider.complete).toHaveBeenCalledWith(expect.stringContaining(PYTHON_SOURCE), {
      maxTokens: 500,
      temperature: 0,
      system: "You are a code documentation analyzer. Return only valid JSON.",
    });
  });

  it("should map unknown categories to other", async () => {
    const provider = createCompletionProvider('{"category": "widgets"}');

    await expect(new LLMCategorizer(provider).categorize("content")).resolves.toEqual({
      category: "other",
      tags: [],
      summary: "",
      language: null,
    });
  });

  it("should fall back to rules when the reply has no JSON", async () => {
    const provider = createCompletionProvider("I cannot help with that.");
    const categorizer = new LLMCategorizer(provider);

    const result = await categorizer.categorize(PYTHON_SOURCE);

    expect(result.category).toBe("utilities");
    expect(console.warn).toHaveBeenCalledWith(
      "⚠️ [Categorizer] LLM categorization failed, using rules: Categorizer reply contained no JSON object"
    );
  });

  it("should fall back to rules when the provider fails", async () => {
    const provider = createCompletionProvider();
    provider.complete.mockRejectedValueOnce(new Error("503 Service Unavailable"));

    const result = await new LLMCategorizer(provider).categorize("hello world");

    expect(result).toEqual({ category: "other", tags: [], summary: "hello world", language: null });
  });

  it("should fall back to rules when the provider is too slow", async () => {
    const provider = createCompletionProvider();
    provider.complete.mockReturnValueOnce(new Promise(() => undefined));
    const categorizer = new LLMCategorizer(provider, new RuleBasedCategorizer(), { timeoutMs: 10 });

    const result = await categorizer.categorize(PYTHON_SOURCE);

    expect(result.language).toBe("python");
    expect(console.warn).toHaveBeenCalledWith(
      "⚠️ [Categorizer] LLM categorization failed, using rules: Categorization timed out after 10ms"
    );
  });

  it("should truncate content and list the categories in the prompt", () => {
    const categorizer = new LLMCategorizer(createCompletionProvider(), new RuleBasedCategorizer(), {
      maxContent: 5,
    });

    const prompt = categorizer.buildPrompt("abcdefghij");

    expect(prompt).toContain("```\nabcde\n```");
    expect(prompt).not.toContain("abcdef");
    expect(prompt).toContain("1. A category (one of: documentation, configuration, api,");
  });

  it("should not call the model more than once per document", async () => {
    const provider = createCompletionProvider('{"category": "api"}');
    const spy = vi.spyOn(provider, "complete");

    await new LLMCategorizer(provider).categorize("content");

    expect(spy).toHaveBeenCalledTimes(1);
  });
});
