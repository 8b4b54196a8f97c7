import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { OpenAIProvider } from "../../llm/openai.js";
import { LLMError, LLMErrorSubType } from "../../errors/index.js";

// =============================================================================
// Mock Helpers
// =============================================================================

interface MockFetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  headers: Map<string, string>;
  text: () => Promise<string>;
}

function createMockResponse(
  body: unknown,
  options: {
    ok?: boolean;
    status?: number;
    statusText?: string;
    headers?: Map<string, string>;
  } = {}
): MockFetchResponse {
  const { ok = true, status = 200, statusText = "OK", headers = new Map() } = options;
  return {
    ok,
    status,
    statusText,
    headers,
    text: () => Promise.resolve(typeof body === "string" ? body : JSON.stringify(body)),
  };
}

function createEmbeddingResponse(
  embeddings: Array<{ embedding: number[]; index: number }>,
  totalTokens = 10
): unknown {
  return {
    data: embeddings,
    usage: { total_tokens: totalTokens },
    model: "text-embedding-3-small",
  };
}

function createChatResponse(content: string | null, finishReason = "stop"): unknown {
  return {
    choices: [{ message: { content }, finish_reason: finishReason }],
    usage: { total_tokens: 42 },
    model: "gpt-4o-mini",
  };
}

function requestBody(mockFetch: ReturnType<typeof vi.fn>, call = 0): unknown {
  const init: unknown = mockFetch.mock.calls[call]?.[1];
  if (typeof init !== "object" || init === null || !("body" in init)) {
    throw new Error("fetch was not called with a body");
  }
  return JSON.parse(String(init.body));
}

// =============================================================================
// Tests
// =============================================================================

describe("OpenAIProvider", () => {
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockFetch = vi.fn();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("constructor", () => {
    it("should reject a blank API key", () => {
      expect(() => new OpenAIProvider("  ")).toThrow(LLMError);
    });

    it("should expose its name", () => {
      expect(new OpenAIProvider("test-key").name).toBe("openai");
    });
  });

  describe("embedBatch", () => {
    it("should return results in input order using the index field", async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse(
          createEmbeddingResponse(
            [
              { embedding: [0, 1], index: 1 },
              { embedding: [1, 0], index: 0 },
            ],
            9
          )
        )
      );

      const provider = new OpenAIProvider("test-key");
      const results = await provider.embedBatch(["first", "second"]);

      expect(results.map((r) => r.values)).toEqual([
        [1, 0],
        [0, 1],
      ]);
      expect(results[0]?.tokenCount).toBe(5);
      expect(results[0]?.model).toBe("text-embedding-3-small");
    });

    it("should send the model and inputs", async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse(createEmbeddingResponse([{ embedding: [1], index: 0 }]))
      );

      const provider = new OpenAIProvider("test-key", { embeddingModel: "custom-embed" });
      await provider.embedBatch(["hello"]);

      expect(mockFetch.mock.calls[0]?.[0]).toBe("https://api.openai.com/v1/embeddings");
      expect(requestBody(mockFetch)).toEqual({ model: "custom-embed", input: ["hello"] });
    });

    it("should skip the request for an empty batch", async () => {
      const provider = new OpenAIProvider("test-key");

      await expect(provider.embedBatch([])).resolves.toEqual([]);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it("should fail when the count does not match the inputs", async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse(createEmbeddingResponse([{ embedding: [1], index: 0 }]))
      );

      const provider = new OpenAIProvider("test-key");

      await expect(provider.embedBatch(["a", "b"])).rejects.toMatchObject({
        subType: LLMErrorSubType.EMBEDDING_FAILED,
      });
    });

    it("should map 401 to INVALID_KEY", async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse(
          { error: { message: "Incorrect API key", type: "invalid_request_error" } },
          { ok: false, status: 401, statusText: "Unauthorized" }
        )
      );

      const provider = new OpenAIProvider("test-key");

      await expect(provider.embed("text")).rejects.toMatchObject({
        subType: LLMErrorSubType.INVALID_KEY,
        message: "openai API error: Incorrect API key (invalid_request_error)",
      });
    });

    it("should map 429 to RATE_LIMIT with retry-after", async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse(
          {},
          { ok: false, status: 429, statusText: "Too Many Requests", headers: new Map([["retry-after", "7"]]) }
        )
      );

      const provider = new OpenAIProvider("test-key");

      await expect(provider.embed("text")).rejects.toMatchObject({
        subType: LLMErrorSubType.RATE_LIMIT,
        context: { retryAfterSeconds: 7 },
      });
    });

    it("should keep the status for server errors", async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse("upstream down", { ok: false, status: 503, statusText: "Service Unavailable" })
      );

      const provider = new OpenAIProvider("test-key");

      await expect(provider.embed("text")).rejects.toMatchObject({
        subType: LLMErrorSubType.EMBEDDING_FAILED,
        message: "openai API error: 503 Service Unavailable",
        context: { status: 503 },
      });
    });

    it("should reject malformed JSON bodies", async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse("not json"));

      const provider = new OpenAIProvider("test-key");

      await expect(provider.embed("text")).rejects.toMatchObject({
        subType: LLMErrorSubType.API_ERROR,
      });
    });
  });

  describe("complete", () => {
    it("should send the system prompt before the user prompt", async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse(createChatResponse("answer")));

      const provider = new OpenAIProvider("test-key");
      const result = await provider.complete("question", {
        system: "be brief",
        temperature: 0,
        maxTokens: 100,
      });

      expect(result).toEqual({
        text: "answer",
        tokenCount: 42,
        model: "gpt-4o-mini",
        finishReason: "stop",
      });
      expect(requestBody(mockFetch)).toEqual({
        model: "gpt-4o-mini",
        messages: [
          { role: "system", content: "be brief" },
          { role: "user", content: "question" },
        ],
        temperature: 0,
        max_tokens: 100,
      });
    });

    it("should use defaults and treat null content as empty", async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse(createChatResponse(null, "length")));

      const provider = new OpenAIProvider("test-key");
      const result = await provider.complete("question");

      expect(result.text).toBe("");
      expect(result.finishReason).toBe("length");
      expect(requestBody(mockFetch)).toMatchObject({ temperature: 0.7, max_tokens: 4096 });
    });

    it("should fail on an empty choices array", async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse({ choices: [], usage: { total_tokens: 0 }, model: "gpt-4o-mini" })
      );

      const provider = new OpenAIProvider("test-key");

      await expect(provider.complete("question")).rejects.toThrow(
        "OpenAI returned empty choices array"
      );
    });
  });
});
