import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { main } from "../index.js";

describe("main", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), "devkb-main-"));
    vi.stubEnv("DATA_DIR", dataDir);
    vi.stubEnv("OPENAI_API_KEY", "");
    vi.stubEnv("ANTHROPIC_API_KEY", "");
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dataDir, { recursive: true, force: true });
  });

  it("should report no results when searching an empty data directory", async () => {
    const code = await main(["search", "login"]);

    expect(code).toBe(0);
    expect(console.log).toHaveBeenCalledWith('🔍 No results for "login"');
    expect(console.error).not.toHaveBeenCalled();
  });

  it("should report no results for a keyword search of an empty data directory", async () => {
    const code = await main(["search", "login", "--keyword"]);

    expect(code).toBe(0);
    expect(console.log).toHaveBeenCalledWith('🔍 No results for "login"');
  });

  it("should refuse to show a document without an index", async () => {
    const code = await main(["show", "1"]);

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      "📚 Knowledge base index not found. Index some files first."
    );
  });
});
