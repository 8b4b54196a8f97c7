import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { AnthropicProvider, DEFAULT_ANTHROPIC_MODEL } from "../../llm/anthropic.js";
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

function createMessageResponse(
  content: Array<{ type: string; text?: string }>,
  stopReason: string | null = "end_turn"
): unknown {
  return {
    content,
    model: DEFAULT_ANTHROPIC_MODEL,
    stop_reason: stopReason,
    usage: { input_tokens: 10, output_tokens: 5 },
  };
}

function requestInit(mockFetch: ReturnType<typeof vi.fn>): { headers: unknown; body: unknown } {
  const init: unknown = mockFetch.mock.calls[0]?.[1];
  if (typeof init !== "object" || init === null || !("body" in init) || !("headers" in init)) {
    throw new Error("fetch was not called with headers and a body");
  }
  return { headers: init.headers, body: JSON.parse(String(init.body)) };
}

// =============================================================================
// Tests
// =============================================================================

describe("AnthropicProvider", () => {
  let mockFetch: ReturnType<typeof vi.fn>;
  let provider: AnthropicProvider;

  beforeEach(() => {
    mockFetch = vi.fn();
    vi.stubGlobal("fetch", mockFetch);
    provider = new AnthropicProvider("test-key");
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  it("should reject a blank API key", () => {
    expect(() => new AnthropicProvider("  ")).toThrow(LLMError);
  });

  describe("complete", () => {
    it("should post a message and join the text blocks", async () => {
      mockFetch.mockResolvedValue(
        createMockResponse(
          createMessageResponse([
            { type: "text", text: "Hello " },
            { type: "tool_use" },
            { type: "text", text: "world" },
          ])
        )
      );

      const result = await provider.complete("Say hi");

      expect(result).toEqual({
        text: "Hello world",
        tokenCount: 15,
        model: DEFAULT_ANTHROPIC_MODEL,
        finishReason: "stop",
      });
      expect(mockFetch.mock.calls[0]?.[0]).toBe("https://api.anthropic.com/v1/messages");
      expect(requestInit(mockFetch)).toEqual({
        headers: {
          "x-api-key": "test-key",
          "anthropic-version": "2023-06-01",
          "Content-Type": "application/json",
        },
        body: {
          model: DEFAULT_ANTHROPIC_MODEL,
          max_tokens: 4096,
          temperature: 0.7,
          messages: [{ role: "user", content: "Say hi" }],
        },
      });
    });

    it("should pass the system prompt and model settings", async () => {
      mockFetch.mockResolvedValue(createMockResponse(createMessageResponse([])));

      await provider.complete("Q", { system: "Be brief", maxTokens: 50, temperature: 0 });

      expect(requestInit(mockFetch).body).toEqual({
        model: DEFAULT_ANTHROPIC_MODEL,
        max_tokens: 50,
        temperature: 0,
        system: "Be brief",
        messages: [{ role: "user", content: "Q" }],
      });
    });

    it.each([
      ["max_tokens", "length"],
      ["stop_sequence", "stop"],
      ["tool_use", "tool_use"],
      [null, "unknown"],
    ])("should map stop reason %s to %s", async (stopReason, finishReason) => {
      mockFetch.mockResolvedValue(
        createMockResponse(createMessageResponse([{ type: "text", text: "x" }], stopReason))
      );

      await expect(provider.complete("x")).resolves.toMatchObject({ finishReason });
    });

    it("should raise RATE_LIMIT with the retry-after value on 429", async () => {
      mockFetch.mockResolvedValue(
        createMockResponse("", {
          ok: false,
          status: 429,
          statusText: "Too Many Requests",
          headers: new Map([["retry-after", "30"]]),
        })
      );

      const error: unknown = await provider.complete("x").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LLMError);
      expect(error).toMatchObject({
        subType: LLMErrorSubType.RATE_LIMIT,
        message: "Rate limit exceeded. Retry after 30 seconds",
      });
    });

    it("should raise INVALID_KEY with the API's message on 401", async () => {
      mockFetch.mockResolvedValue(
        createMockResponse(
          { error: { message: "invalid x-api-key", type: "authentication_error" } },
          { ok: false, status: 401, statusText: "Unauthorized" }
        )
      );

      await expect(provider.complete("x")).rejects.toMatchObject({
        subType: LLMErrorSubType.INVALID_KEY,
        message: "anthropic API error: invalid x-api-key (authentication_error)",
      });
    });

    it("should keep the status line for a non-JSON error body", async () => {
      mockFetch.mockResolvedValue(
        createMockResponse("<html>oops</html>", {
          ok: false,
          status: 500,
          statusText: "Internal Server Error",
        })
      );

      await expect(provider.complete("x")).rejects.toMatchObject({
        subType: LLMErrorSubType.COMPLETION_FAILED,
        message: "anthropic API error: 500 Internal Server Error",
        context: { status: 500 },
      });
    });

    it("should raise API_ERROR for an unexpected body", async () => {
      mockFetch.mockResolvedValue(createMockResponse({ content: "nope" }));

      await expect(provider.complete("x")).rejects.toMatchObject({
        subType: LLMErrorSubType.API_ERROR,
      });
    });

    it("should raise TIMEOUT when the request is aborted by the timer", async () => {
      vi.useFakeTimers();
      provider = new AnthropicProvider("test-key", DEFAULT_ANTHROPIC_MODEL, 1000);
      mockFetch.mockImplementation(
        (_url: string, init: RequestInit) =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          })
      );

      const caught = provider.complete("x").catch((e: unknown) => e);
      await vi.advanceTimersByTimeAsync(1000);

      await expect(caught).resolves.toMatchObject({
        subType: LLMErrorSubType.TIMEOUT,
        message: "anthropic request timed out after 1000ms",
      });
    });
  });
});
