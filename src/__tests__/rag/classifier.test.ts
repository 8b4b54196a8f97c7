import { describe, it, expect } from "vitest";
import { ExtensionClassifier, SUPPORTED_EXTENSIONS } from "../../rag/classifier.js";

describe("ExtensionClassifier", () => {
  const classifier = new ExtensionClassifier();

  it.each([
    ["src/app.py", "code", "python"],
    ["web/App.TSX", "code", "typescript"],
    ["config/app.yml", "code", "yaml"],
    ["public/index.html", "plain", "html"],
    ["notes.txt", "plain", "plain"],
    ["Makefile", "plain", "plain"],
  ])("should classify %s as %s/%s", (path, contentType, language) => {
    expect(classifier.classify(path, "content")).toEqual({ contentType, language });
  });

  it("should treat markdown with a few fenced blocks as markdown", () => {
    const content = "# Doc\n```\na\n```\n```\nb\n```";

    expect(classifier.classify("README.md", content)).toEqual({
      contentType: "markdown",
      language: "markdown",
    });
  });

  it("should treat markdown with more than two fenced blocks as code", () => {
    const content = "```\na\n```\n```\nb\n```\n```\nc\n```";

    expect(classifier.classify("snippets.md", content)).toEqual({
      contentType: "code",
      language: "markdown",
    });
  });

  it("should prefer caller overrides", () => {
    expect(
      classifier.classify("script.py", "print(1)", { contentType: "plain", language: "ruby" })
    ).toEqual({ contentType: "plain", language: "ruby" });
  });

  it("should be pure", () => {
    const first = classifier.classify("a.go", "package main");
    const second = classifier.classify("a.go", "package main");

    expect(first).toEqual(second);
  });

  it("should list supported extensions with a leading dot", () => {
    expect(SUPPORTED_EXTENSIONS).toContain(".py");
    expect(SUPPORTED_EXTENSIONS).toContain(".md");
    expect(SUPPORTED_EXTENSIONS.every((ext) => ext.startsWith("."))).toBe(true);
  });
});
