import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { withTimeout } from "../../llm/timeout.js";
import { LLMError, LLMErrorSubType } from "../../errors/index.js";

describe("withTimeout", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should resolve with the promise's value when it settles first", async () => {
    await expect(withTimeout(Promise.resolve(42), { timeoutMs: 100 })).resolves.toBe(42);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("should pass through the promise's rejection", async () => {
    await expect(
      withTimeout(Promise.reject(new Error("boom")), { timeoutMs: 100 })
    ).rejects.toThrow("boom");
  });

  it("should reject with a TIMEOUT LLMError when the timer fires first", async () => {
    const pending = withTimeout(new Promise<never>(() => undefined), {
      timeoutMs: 500,
      context: "Categorization",
      provider: "anthropic",
    });
    const caught = pending.catch((e: unknown) => e);

    await vi.advanceTimersByTimeAsync(500);
    const error = await caught;

    expect(error).toBeInstanceOf(LLMError);
    expect(error).toMatchObject({
      message: "Categorization timed out after 500ms",
      subType: LLMErrorSubType.TIMEOUT,
      provider: "anthropic",
    });
  });

  it("should default the context and provider", async () => {
    const caught = withTimeout(new Promise<never>(() => undefined), { timeoutMs: 10 }).catch(
      (e: unknown) => e
    );

    await vi.advanceTimersByTimeAsync(10);

    await expect(caught).resolves.toMatchObject({
      message: "Operation timed out after 10ms",
      provider: "unknown",
    });
  });

  it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])(
    "should reject the timeout value %s",
    async (timeoutMs) => {
      await expect(withTimeout(Promise.resolve(1), { timeoutMs })).rejects.toThrow(
        `Invalid timeout value: ${timeoutMs}. Must be a positive finite number.`
      );
    }
  );
});
