import { describe, it, expect } from "vitest";
import {
  AnthropicProvider,
  HashingEmbeddingProvider,
  OpenAIProvider,
  createProviders,
} from "../../llm/index.js";

describe("createProviders", () => {
  it("should use local embeddings and no completion without keys", () => {
    const { embedding, completion } = createProviders({});

    expect(embedding).toBeInstanceOf(HashingEmbeddingProvider);
    expect(completion).toBeNull();
  });

  it("should use OpenAI for both roles when only its key is set", () => {
    const { embedding, completion } = createProviders({ openaiApiKey: "test-key" });

    expect(embedding).toBeInstanceOf(OpenAIProvider);
    expect(completion).toBe(embedding);
  });

  it("should complete with Anthropic and embed locally when only its key is set", () => {
    const { embedding, completion } = createProviders({ anthropicApiKey: "test-key" });

    expect(embedding.name).toBe("local");
    expect(completion).toBeInstanceOf(AnthropicProvider);
  });

  it("should prefer Anthropic for completions when both keys are set", () => {
    const { embedding, completion } = createProviders({
      openaiApiKey: "test-key",
      anthropicApiKey: "test-key",
    });

    expect(embedding.name).toBe("openai");
    expect(completion?.name).toBe("anthropic");
  });

  it("should reject an empty key", () => {
    expect(() => createProviders({ openaiApiKey: "" })).toThrow();
  });
});
