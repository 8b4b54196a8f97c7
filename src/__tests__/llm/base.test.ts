import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  handleRateLimitResponse,
  parseJsonResponse,
  throwResponseError,
} from "../../llm/base.js";
import { LLMError, LLMErrorSubType } from "../../errors/index.js";

const PayloadSchema = z.object({ name: z.string(), value: z.number() });

// =============================================================================
// parseJsonResponse
// =============================================================================

describe("parseJsonResponse", () => {
  it("should parse and validate a body", () => {
    expect(parseJsonResponse('{"name": "test", "value": 42}', PayloadSchema, "openai")).toEqual({
      name: "test",
      value: 42,
    });
  });

  it("should raise API_ERROR for invalid JSON with the start of the body", () => {
    const text = `{${"x".repeat(300)}`;

    let caught: unknown;
    try {
      parseJsonResponse(text, PayloadSchema, "openai");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(LLMError);
    expect(caught).toMatchObject({
      subType: LLMErrorSubType.API_ERROR,
      provider: "openai",
      message: `openai returned invalid JSON: ${text.slice(0, 200)}`,
    });
  });

  it("should raise API_ERROR when the shape is wrong", () => {
    expect(() => parseJsonResponse('{"name": 1}', PayloadSchema, "anthropic")).toThrow(
      /^anthropic returned unexpected response shape: /
    );
  });
});

// =============================================================================
// handleRateLimitResponse
// =============================================================================

describe("handleRateLimitResponse", () => {
  it("should pass non-429 responses through", () => {
    expect(() => handleRateLimitResponse(new Response("", { status: 500 }), "openai")).not.toThrow();
  });

  it("should read the retry-after header", () => {
    const response = new Response("", { status: 429, headers: { "retry-after": "12" } });

    expect(() => handleRateLimitResponse(response, "openai")).toThrow(
      "Rate limit exceeded. Retry after 12 seconds"
    );
  });

  it.each([
    ["missing", {}],
    ["not a number", { "retry-after": "soon" }],
  ])("should report an unknown delay when the header is %s", (_label, headers) => {
    const response = new Response("", { status: 429, headers });

    let caught: unknown;
    try {
      handleRateLimitResponse(response, "anthropic");
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({
      subType: LLMErrorSubType.RATE_LIMIT,
      message: "Rate limit exceeded. Retry after unknown seconds",
      context: { retryAfterSeconds: null },
    });
  });
});

// =============================================================================
// throwResponseError
// =============================================================================

describe("throwResponseError", () => {
  it("should use the API error message when the body has one", async () => {
    const response = new Response(JSON.stringify({ error: { message: "model not found" } }), {
      status: 404,
      statusText: "Not Found",
    });

    await expect(
      throwResponseError(response, "openai", LLMErrorSubType.EMBEDDING_FAILED)
    ).rejects.toMatchObject({
      subType: LLMErrorSubType.EMBEDDING_FAILED,
      message: "openai API error: model not found",
      context: { status: 404 },
    });
  });

  it("should map 403 to INVALID_KEY", async () => {
    const response = new Response("forbidden", { status: 403, statusText: "Forbidden" });

    await expect(
      throwResponseError(response, "openai", LLMErrorSubType.COMPLETION_FAILED)
    ).rejects.toMatchObject({
      subType: LLMErrorSubType.INVALID_KEY,
      message: "openai API error: 403 Forbidden",
    });
  });
});
