import { describe, it, expect } from "vitest";
import { buildCorpus } from "./__test__/corpus.js";
import { buildLexicalIndex, inverseDocumentFrequency, segmentNames, snapshotLexicalIndex } from "./lexical-index.js";

const FILES = {
  "README.md": "# Demo\nA login demo.\n",
  "src/auth/login_handler.py": "def login(user):\n    return token_for(user)\n",
  "src/util.py": "def token_for(user):\n    return 'abc'\n",
  "docs/guide.md": "Log in with the login command.\n",
};

describe("buildLexicalIndex", () => {
  it("is identical when built twice from the same snapshot in any order", () => {
    const index = buildCorpus(FILES, { tags: { "src/util.py": "Token helpers" } });
    const files = [...index.files.values()];
    const chunks = [...index.chunks.values()];
    const first = buildLexicalIndex(files, chunks);
    const second = buildLexicalIndex([...files].reverse(), [...chunks].reverse());
    expect(snapshotLexicalIndex(second)).toEqual(snapshotLexicalIndex(first));
  });

  it("orders postings by path and records term frequency", () => {
    const index = buildCorpus(FILES);
    const postings = index.lexical.postings.get("login") ?? [];
    expect(postings.map((p) => [p.path, p.tf])).toEqual([
      ["README.md", 1],
      ["docs/guide.md", 1],
      ["src/auth/login_handler.py", 1],
    ]);
    expect(index.lexical.documentCount).toBe(4);
  });

  it("indexes path and tag tokens per file", () => {
    const index = buildCorpus(FILES, { tags: { "src/util.py": "Token helpers" } });
    expect([...(index.lexical.pathTokens.get("src/util.py") ?? [])]).toEqual(["src", "util", "py"]);
    expect([...(index.lexical.tagTokens.get("src/util.py") ?? [])]).toEqual(["token", "help"]);
    expect(index.lexical.tagTokens.has("README.md")).toBe(false);
  });

  it("skips binary files", () => {
    const index = buildCorpus({ "a.py": "x = 1\n" }, { binary: ["logo.png"] });
    expect(index.lexical.pathTokens.has("logo.png")).toBe(false);
  });
});

describe("segmentNames", () => {
  it("includes whole segment names and their word parts", () => {
    expect([...segmentNames("src/auth/login_handler.py")].sort()).toEqual(["auth", "handl", "login", "login_handl", "src"]);
  });
});

describe("inverseDocumentFrequency", () => {
  it("weighs rare tokens higher and treats unseen tokens as seen once", () => {
    const index = buildCorpus(FILES);
    expect(inverseDocumentFrequency(index.lexical, "login")).toBeCloseTo(Math.log(1 + 4 / 3));
    expect(inverseDocumentFrequency(index.lexical, "zzz")).toBeCloseTo(Math.log(5));
  });
});
