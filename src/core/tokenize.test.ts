import { describe, it, expect } from "vitest";
import { normalizeQuestion, splitWords, stem, termFrequencies, tokenize, uniqueTokens } from "./tokenize.js";

describe("splitWords", () => {
  it("splits camelCase, acronyms and snake_case", () => {
    expect(splitWords("parseHTTPRequest")).toEqual(["parse", "http", "request"]);
    expect(splitWords("login_handler.py")).toEqual(["login", "handler", "py"]);
  });
});

describe("stem", () => {
  it("removes the longest matching suffix", () => {
    expect(stem("ratings")).toBe("rat");
    expect(stem("handler")).toBe("handl");
    expect(stem("uses")).toBe("use");
  });

  it("keeps at least three characters", () => {
    expect(stem("bes")).toBe("bes");
  });
});

describe("tokenize", () => {
  it("drops stopwords, single characters and bare numbers", () => {
    expect(tokenize("How does the login handler work?")).toEqual(["login", "handl", "work"]);
    expect(tokenize("v2 404 x")).toEqual(["v2"]);
  });

  it("keeps duplicates while uniqueTokens removes them", () => {
    expect(tokenize("token Token")).toEqual(["token", "token"]);
    expect(uniqueTokens("token Token")).toEqual(["token"]);
  });

  it("counts term frequencies", () => {
    expect([...termFrequencies("refresh token token")]).toEqual([
      ["refresh", 1],
      ["token", 2],
    ]);
  });
});

describe("normalizeQuestion", () => {
  it("collapses whitespace and lowercases", () => {
    expect(normalizeQuestion("  Where IS\n login? ")).toBe("where is login?");
  });
});
