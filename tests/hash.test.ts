import { describe, it, expect } from "vitest";
import {
  sha256String,
  contentHash,
  canonicalJsonStringify,
  merkleRoot,
} from "../src/shared/hash.js";

describe("SHA-256 Hashing", () => {
  it("sha256String hashes UTF-8 strings", () => {
    expect(sha256String("test")).toBe("9f86d081884c7d659a2feaa0c55ad015a3bf4f1b2b0b822cd15d6c15b0f00a08");
  });
});

describe("Canonical JSON", () => {
  it("sorts keys at all nesting levels", () => {
    const obj = { z: { b: 2, a: 1 }, a: [{ y: 1, x: 2 }] };
    expect(canonicalJsonStringify(obj)).toBe('{"a":[{"x":2,"y":1}],"z":{"a":1,"b":2}}');
  });

  it("preserves arrays in order", () => {
    expect(canonicalJsonStringify({ arr: [3, 1, 2] })).toBe('{"arr":[3,1,2]}');
  });
});

describe("Content Hash", () => {
  it("is independent of key order", () => {
    expect(contentHash({ a: 1, b: 2 })).toBe(contentHash({ b: 2, a: 1 }));
  });

  it("differs for different values", () => {
    expect(contentHash({ x: 1 })).not.toBe(contentHash({ x: 2 }));
  });
});

describe("Merkle Root", () => {
  it("returns hash of empty string for empty array", () => {
    expect(merkleRoot([])).toBe(sha256String(""));
  });

  it("returns the single hash for array of one", () => {
    const hash = sha256String("only");
    expect(merkleRoot([hash])).toBe(hash);
  });

  it("combines two hashes into a root", () => {
    const h1 = sha256String("a");
    const h2 = sha256String("b");
    expect(merkleRoot([h1, h2])).toBe(sha256String(h1 + h2));
  });

  it("handles odd number of hashes by duplicating last", () => {
    const [h1, h2, h3] = ["a", "b", "c"].map(sha256String);
    const left = sha256String(h1 + h2);
    const right = sha256String(h3 + h3);
    expect(merkleRoot([h1, h2, h3])).toBe(sha256String(left + right));
  });
});
