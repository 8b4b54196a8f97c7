import { describe, it, expect } from "vitest";
import { KeywordIntentTagger } from "../../rag/intent.js";

describe("KeywordIntentTagger", () => {
  const tagger = new KeywordIntentTagger();

  it.each([
    ["def test_login():", "test"],
    ["class TestUser:", "test"],
    ["DATABASE_SETTINGS = {}", "config"],
    ["class User:", "class"],
    ["function add(a, b) {", "function"],
    ["interface Props {", "type"],
    ["@app.route('/users')", "endpoint"],
    ["SELECT * FROM users", "query"],
    ["x = 1", "utility"],
  ])("should tag %j as %s", (text, intent) => {
    expect(tagger.tag(text, "python")).toBe(intent);
  });

  it("should ignore the language", () => {
    expect(tagger.tag("def run():", "rust")).toBe(tagger.tag("def run():", "python"));
  });
});
