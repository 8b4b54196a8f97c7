import { describe, it, expect } from "vitest";
import { fingerprint } from "../../rag/fingerprint.js";

describe("fingerprint", () => {
  it("should return the lowercase hex SHA-256", () => {
    expect(fingerprint("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
    );
    expect(fingerprint("")).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
    );
  });

  it("should change with any byte of content", () => {
    expect(fingerprint("hello")).not.toBe(fingerprint("hello "));
  });
});
