/**
 * Unit tests for canonical JSON serialization
 */

import { describe, it, expect } from "vitest";
import { canonicalJson } from "../../src/record/canonical-json.js";

describe("canonicalJson", () => {
  it("sorts keys at every depth and omits whitespace", () => {
    const json = canonicalJson({ b: 1, a: [true, null, "x"], c: { z: 1, y: 2 } });

    expect(json).toBe('{"a":[true,null,"x"],"b":1,"c":{"y":2,"z":1}}');
  });

  it("escapes non-ASCII characters", () => {
    expect(canonicalJson({ msg: "café" })).toBe('{"msg":"caf\\u00e9"}');
  });

  it("escapes astral characters as surrogate pairs", () => {
    expect(canonicalJson({ e: "😀" })).toBe('{"e":"\\ud83d\\ude00"}');
  });

  it("escapes non-ASCII keys", () => {
    expect(canonicalJson({ "ü": 1 })).toBe('{"\\u00fc":1}');
  });

  it("keeps JSON escapes for control characters", () => {
    expect(canonicalJson({ t: "a\tb" })).toBe('{"t":"a\\tb"}');
  });
});
