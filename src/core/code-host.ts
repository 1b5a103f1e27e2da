import { normalizeQuestion } from "./tokenize.js";
import type { CodeHostQuery, Issue, PullRequest, ToolName } from "./types.js";

type HostRecord = Issue | PullRequest;

function matchesState(record: HostRecord, state: CodeHostQuery["state"]): boolean {
  switch (state) {
    case "all":
      return true;
    case "open":
      return record.state === "open";
    // Merged pull requests are closed as well.
    case "closed":
      return record.state === "closed" || record.state === "merged";
    case "merged":
      return record.state === "merged";
  }
}

/** Case-insensitive substring match on title and body, every label required. */
export function matchesCodeHostQuery(record: HostRecord, query: CodeHostQuery): boolean {
  if (!matchesState(record, query.state)) return false;
  const labels = new Set(record.labels.map((l) => l.toLowerCase()));
  if (!query.labels.every((l) => labels.has(l.toLowerCase()))) return false;
  if (query.query) {
    const needle = query.query.toLowerCase();
    return record.title.toLowerCase().includes(needle) || record.body.toLowerCase().includes(needle);
  }
  return true;
}

/** Filters, orders by most recently updated (then number, descending) and caps at the limit. */
export function applyCodeHostQuery<T extends HostRecord>(records: readonly T[], query: CodeHostQuery): T[] {
  return records
    .filter((record) => matchesCodeHostQuery(record, query))
    .sort((a, b) => (a.updatedAt === b.updatedAt ? b.number - a.number : a.updatedAt < b.updatedAt ? 1 : -1))
    .slice(0, query.limit);
}

/**
 * Cache key for code-host lookups. The limit is not part of the key: a cached
 * result fetched with a larger limit serves smaller ones.
 */
export function codeHostCacheKey(tool: Extract<ToolName, "get_issue" | "get_pull_requests">, query: CodeHostQuery): string {
  const labels = [...new Set(query.labels.map((l) => l.trim().toLowerCase()))].sort();
  const text = query.query ? normalizeQuestion(query.query) : "";
  return JSON.stringify([tool, text, query.state, labels]);
}
