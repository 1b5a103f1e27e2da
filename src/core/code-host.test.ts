import { describe, it, expect } from "vitest";
import { applyCodeHostQuery, codeHostCacheKey, matchesCodeHostQuery } from "./code-host.js";
import type { CodeHostQuery, PullRequest } from "./types.js";

function pr(number: number, state: PullRequest["state"], updatedAt: string, extra: Partial<PullRequest> = {}): PullRequest {
  return {
    number,
    title: `PR ${number}`,
    body: "",
    labels: [],
    state,
    createdAt: "2024-01-01T00:00:00Z",
    updatedAt,
    url: `https://example.test/pull/${number}`,
    ...extra,
  };
}

const ALL: CodeHostQuery = { query: null, state: "all", labels: [], limit: 10 };

describe("matchesCodeHostQuery", () => {
  it("treats merged pull requests as closed", () => {
    const merged = pr(1, "merged", "2024-02-01T00:00:00Z");
    expect(matchesCodeHostQuery(merged, { ...ALL, state: "closed" })).toBe(true);
    expect(matchesCodeHostQuery(merged, { ...ALL, state: "open" })).toBe(false);
  });

  it("requires every label and matches text case-insensitively", () => {
    const record = pr(2, "open", "2024-02-01T00:00:00Z", { title: "Fix Login redirect", labels: ["Bug", "auth"] });
    expect(matchesCodeHostQuery(record, { ...ALL, labels: ["bug"], query: "login" })).toBe(true);
    expect(matchesCodeHostQuery(record, { ...ALL, labels: ["bug", "ui"] })).toBe(false);
    expect(matchesCodeHostQuery(record, { ...ALL, query: "logout" })).toBe(false);
  });
});

describe("applyCodeHostQuery", () => {
  it("orders by last update, then number, and applies the limit", () => {
    const records = [
      pr(1, "open", "2024-01-05T00:00:00Z"),
      pr(2, "open", "2024-03-01T00:00:00Z"),
      pr(3, "open", "2024-01-05T00:00:00Z"),
      pr(4, "closed", "2024-04-01T00:00:00Z"),
    ];
    expect(applyCodeHostQuery(records, { ...ALL, state: "open" }).map((r) => r.number)).toEqual([2, 3, 1]);
    expect(applyCodeHostQuery(records, { ...ALL, limit: 2 }).map((r) => r.number)).toEqual([4, 2]);
  });
});

describe("codeHostCacheKey", () => {
  it("ignores label order, case and the limit", () => {
    const a = codeHostCacheKey("get_issue", { query: "Login  Bug", state: "open", labels: ["Bug", "auth"], limit: 5 });
    const b = codeHostCacheKey("get_issue", { query: "login bug", state: "open", labels: ["auth", "bug"], limit: 20 });
    expect(a).toBe(b);
    expect(a).toBe(JSON.stringify(["get_issue", "login bug", "open", ["auth", "bug"]]));
  });

  it("separates tools and states", () => {
    const query: CodeHostQuery = { query: null, state: "open", labels: [], limit: 10 };
    expect(codeHostCacheKey("get_issue", query)).not.toBe(codeHostCacheKey("get_pull_requests", query));
    expect(codeHostCacheKey("get_issue", query)).not.toBe(codeHostCacheKey("get_issue", { ...query, state: "all" }));
  });
});
