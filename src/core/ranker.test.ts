import { describe, it, expect } from "vitest";
import { buildCorpus } from "./__test__/corpus.js";
import { InvalidFiltersError, rank } from "./ranker.js";

const SHOP = {
  "auth/login.py": [
    "def login(username, password):",
    "    user = find_user(username)",
    "    return check_password(user, password)",
  ].join("\n"),
  "auth/session.py": ["def create_session(user):", "    return Session(user)"].join("\n"),
  "README.md": ["# Shop", "An online shop."].join("\n"),
  "web/views.py": ["def home(request):", "    return render('home')"].join("\n"),
};

describe("rank", () => {
  it("puts the file named after the feature first", () => {
    const results = rank("Where is user login handled?", {}, buildCorpus(SHOP));
    expect(results.map((r) => r.id)).toEqual(["auth/login.py#L1-L3", "auth/session.py#L1-L2"]);
    // user: (1 + ln 3) ln 3, login: ln 5, path token 0.5 ln 5, segment +2
    const expected = (1 + Math.log(3)) * Math.log(3) + Math.log(5) * 1.5 + 2;
    expect(results[0]?.score).toBeCloseTo(expected, 10);
  });

  it("admits top-level docs on orientation questions without lexical overlap", () => {
    const results = rank("What does this repo do?", {}, buildCorpus(SHOP));
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ kind: "chunk", id: "README.md#L1-L2", score: 3 });
  });

  it("adds file summaries whose tag overlaps the query", () => {
    const corpus = buildCorpus(SHOP, { tags: { "web/views.py": "Renders the login page" } });
    const results = rank("login", {}, corpus);
    expect(results.map((r) => [r.kind, r.id])).toEqual([
      ["chunk", "auth/login.py#L1-L3"],
      ["file_summary", "web/views.py#summary"],
    ]);
    expect(results[1]?.score).toBeCloseTo(1 + Math.log(5), 10);
    expect(results[1]?.startLine).toBe(0);
  });

  it("breaks score ties by depth, then path", () => {
    const corpus = buildCorpus({ "b/x.py": "widget = 1", "a/x.py": "widget = 1", "x.py": "widget = 1" });
    expect(rank("widget", {}, corpus).map((r) => r.path)).toEqual(["x.py", "a/x.py", "b/x.py"]);
  });

  it("returns the same order on repeated runs", () => {
    const corpus = buildCorpus(SHOP);
    const first = rank("user session login", {}, corpus).map((r) => r.id);
    expect(rank("user session login", {}, corpus).map((r) => r.id)).toEqual(first);
  });

  it("blends an optional semantic scorer", () => {
    const results = rank("login", {}, buildCorpus(SHOP), {
      semantic: { weight: 2, score: (_query, chunk) => (chunk.path === "web/views.py" ? 1 : 0) },
    });
    expect(results.map((r) => r.id)).toEqual(["auth/login.py#L1-L3", "web/views.py#L1-L2"]);
    expect(results[1]?.score).toBe(2);
  });

  describe("filters", () => {
    it("applies codeOnly, docsOnly, language and pathGlob", () => {
      const corpus = buildCorpus(SHOP);
      expect(rank("shop", { codeOnly: true }, corpus)).toEqual([]);
      expect(rank("shop", { docsOnly: true }, corpus).map((r) => r.path)).toEqual(["README.md"]);
      expect(rank("user", { language: "Python", pathGlob: "session.py" }, corpus).map((r) => r.path)).toEqual([
        "auth/session.py",
      ]);
      expect(rank("user", { pathGlob: "web/**" }, corpus)).toEqual([]);
    });

    it("lets filters.topK override the default", () => {
      const corpus = buildCorpus(SHOP);
      expect(rank("user", { topK: 1 }, corpus, { topK: 5 })).toHaveLength(1);
    });

    it("rejects contradictory or invalid filters", () => {
      const corpus = buildCorpus(SHOP);
      expect(() => rank("user", { docsOnly: true, codeOnly: true }, corpus)).toThrow(InvalidFiltersError);
      expect(() => rank("user", { topK: 0 }, corpus)).toThrow(InvalidFiltersError);
    });
  });
});
