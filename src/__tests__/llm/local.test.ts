import { describe, it, expect } from "vitest";
import { HashingEmbeddingProvider, tokenize } from "../../llm/local.js";

describe("tokenize", () => {
  it("should lower-case and keep word characters", () => {
    expect(tokenize("Hello, World_1! x-y")).toEqual(["hello", "world_1", "x", "y"]);
  });

  it("should return nothing for text without words", () => {
    expect(tokenize(" -- ")).toEqual([]);
  });
});

describe("HashingEmbeddingProvider", () => {
  it("should produce vectors of the configured dimension", async () => {
    const provider = new HashingEmbeddingProvider(64);

    const result = await provider.embed("parse the config file");

    expect(result.values).toHaveLength(64);
    expect(result.tokenCount).toBe(4);
    expect(result.model).toBe("hashing-64");
  });

  it("should put a single token into one signed bucket", async () => {
    const { values } = await new HashingEmbeddingProvider().embed("alpha");

    expect(values).toHaveLength(256);
    expect(values.filter((v) => v !== 0)).toHaveLength(1);
    expect(values.reduce((sum, v) => sum + Math.abs(v), 0)).toBe(1);
  });

  it("should be deterministic and additive over repeated tokens", async () => {
    const provider = new HashingEmbeddingProvider();

    const once = await provider.embed("alpha");
    const twice = await provider.embed("Alpha ALPHA");

    expect(twice.values).toEqual(once.values.map((v) => v * 2));
  });

  it("should embed batches in order", async () => {
    const provider = new HashingEmbeddingProvider(32);

    const batch = await provider.embedBatch(["one", "two"]);

    expect(batch.map((r) => r.values)).toEqual([
      (await provider.embed("one")).values,
      (await provider.embed("two")).values,
    ]);
  });

  it("should give a zero vector for text without tokens", async () => {
    const { values, tokenCount } = await new HashingEmbeddingProvider(8).embed("!!!");

    expect(values).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
    expect(tokenCount).toBe(0);
  });

  it.each([0, -1, 1.5])("should reject the dimension %s", (dimension) => {
    expect(() => new HashingEmbeddingProvider(dimension)).toThrow(
      `Invalid embedding dimension: ${dimension}`
    );
  });
});
