import { describe, it, expect } from "vitest";
import { extractCitationIds, orderByEvidence, validateCitations } from "./citations.js";

const KNOWN = new Set(["ev-aaaaaaaaaa", "ev-bbbbbbbbbb"]);
const isMember = (id: string): boolean => KNOWN.has(id);

describe("extractCitationIds", () => {
  it("collects ids from single and grouped markers in order of first appearance", () => {
    const text = "Login lives in auth [ev-bbbbbbbbbb]. See also [ev-aaaaaaaaaa, ev-bbbbbbbbbb].";
    expect(extractCitationIds(text)).toEqual(["ev-bbbbbbbbbb", "ev-aaaaaaaaaa"]);
  });

  it("ignores brackets that hold no evidence id", () => {
    expect(extractCitationIds("array[0] and [link](url)")).toEqual([]);
  });
});

describe("validateCitations", () => {
  it("keeps text whose citations are all known", () => {
    const text = "Handled in login.py [ev-aaaaaaaaaa].";
    expect(validateCitations(text, isMember)).toEqual({ text, valid: ["ev-aaaaaaaaaa"], rejected: [] });
  });

  it("drops markers that cite only unknown ids", () => {
    const result = validateCitations("Handled in login.py [ev-cccccccccc].", isMember);
    expect(result).toEqual({ text: "Handled in login.py.", valid: [], rejected: ["ev-cccccccccc"] });
  });

  it("narrows grouped markers to their known ids", () => {
    const result = validateCitations("See [ev-aaaaaaaaaa, ev-zz, ev-bbbbbbbbbb].", isMember);
    expect(result.text).toBe("See [ev-aaaaaaaaaa, ev-bbbbbbbbbb].");
    expect(result.rejected).toEqual(["ev-zz"]);
  });

  it("never leaves an unknown id behind in generated text", () => {
    // Park-Miller generator so the run is repeatable.
    let seed = 42;
    const next = (n: number): number => {
      seed = (seed * 16807) % 2147483647;
      return seed % n;
    };
    const ids = ["ev-aaaaaaaaaa", "ev-bbbbbbbbbb", "ev-cccccccccc", "ev-0123456789", "ev-x"];
    const words = ["login", "token", "handler", "\n", "see"];

    for (let round = 0; round < 200; round++) {
      const parts: string[] = [];
      for (let i = 0; i < 8; i++) {
        if (next(3) === 0) {
          const group = Array.from({ length: 1 + next(3) }, () => ids[next(ids.length)] ?? "ev-x");
          parts.push(`[${group.join(", ")}]`);
        } else {
          parts.push(words[next(words.length)] ?? "see");
        }
      }
      const { text, valid } = validateCitations(parts.join(" "), isMember);
      const remaining = extractCitationIds(text);
      expect(remaining.every(isMember)).toBe(true);
      expect(new Set(remaining)).toEqual(new Set(valid));
    }
  });
});

describe("orderByEvidence", () => {
  it("orders cited ids by evidence insertion order and drops the rest", () => {
    expect(orderByEvidence(["ev-3", "ev-1"], ["ev-1", "ev-2", "ev-3"])).toEqual(["ev-1", "ev-3"]);
  });
});
