import { describe, it, expect } from "vitest";
import { sha256String } from "../src/shared/hash.js";

describe("SHA-256 Hashing", () => {
  it("sha256String produces consistent 64-char hex for same input", () => {
    const h1 = sha256String("hello world");
    const h2 = sha256String("hello world");
    expect(h1).toBe(h2);
    expect(h1).toMatch(/^[a-f0-9]{64}$/);
  });

  it("sha256String produces known hash for known input", () => {
    // SHA-256 of empty string
    expect(sha256String("")).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
    expect(sha256String("test")).toBe("9f86d081884c7d659a2feaa0c55ad015a3bf4f1b2b0b822cd15d6c15b0f00a08");
  });
});
