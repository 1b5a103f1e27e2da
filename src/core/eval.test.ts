import { describe, expect, it } from "vitest";
import {
  citedFirst,
  computeEvalSummary,
  EvalTaskFileError,
  formatEvalReport,
  ndcgAtK,
  parseEvalTasks,
  precisionAtK,
  rankedKeys,
  recallAtK,
  scoreTask,
  type EvalTask,
} from "./eval.js";
import type { EvidenceItem, EvidenceSource } from "./types.js";

function item(id: string, source: EvidenceSource): EvidenceItem {
  return {
    id,
    kind: source.kind,
    source,
    displayText: "",
    provenance: { toolCallId: "r1:tc1", tool: "search_repo", rank: 1 },
    score: 1,
    epoch: 1,
    requestId: "r1",
  };
}

const LOGIN_1 = item("ev-1", { kind: "chunk", path: "auth/login.py", startLine: 1, endLine: 3, chunkId: null });
const LOGIN_2 = item("ev-2", { kind: "chunk", path: "auth/login.py", startLine: 4, endLine: 9, chunkId: null });
const README = item("ev-3", { kind: "file_summary", path: "README.md" });
const ISSUE = item("ev-4", { kind: "issue", number: 12 });
const PULL = item("ev-5", { kind: "pull_request", number: 9 });

describe("parseEvalTasks", () => {
  it("reads one task per line and numbers tasks without an id", () => {
    const raw = [
      '{"id": "login", "question": "Where is login?", "relevant": ["auth/login.py"], "mode": "locate"}',
      "",
      '{"question": "What to fix?", "relevant": ["issue #1"], "grades": {"issue #1": 2}, "scope": "include-pr"}',
    ].join("\n");

    expect(parseEvalTasks(raw)).toEqual([
      { id: "login", question: "Where is login?", relevant: ["auth/login.py"], grades: {}, mode: "locate", scope: undefined },
      { id: "task_2", question: "What to fix?", relevant: ["issue #1"], grades: { "issue #1": 2 }, mode: undefined, scope: "include-pr" },
    ]);
  });

  it("names the line of a broken task", () => {
    const good = '{"question": "Where?", "relevant": []}';
    expect(() => parseEvalTasks(`${good}\n{oops`)).toThrow(new EvalTaskFileError(2, "not valid JSON"));
    expect(() => parseEvalTasks('{"relevant": []}')).toThrow(/^Task file line 1: question: /);
    expect(() => parseEvalTasks('{"question": "Where?", "relevant": [], "mode": "poem"}')).toThrow(/^Task file line 1: mode: /);
  });
});

describe("rankedKeys / citedFirst", () => {
  it("keys evidence by path or record and keeps the first occurrence", () => {
    expect(rankedKeys([LOGIN_1, README, LOGIN_2, ISSUE, PULL])).toEqual([
      "auth/login.py",
      "README.md",
      "issue #12",
      "pull request #9",
    ]);
  });

  it("puts cited evidence first in citation order", () => {
    const ordered = citedFirst(["ev-5", "ev-unknown", "ev-3"], [LOGIN_1, README, ISSUE, PULL]);
    expect(ordered.map((e) => e.id)).toEqual(["ev-5", "ev-3", "ev-1", "ev-4"]);
  });
});

describe("retrieval metrics", () => {
  const relevant = new Set(["a", "b"]);

  it("computes precision and recall over the top k", () => {
    expect(precisionAtK(["a", "x", "b"], relevant, 2)).toBe(0.5);
    expect(recallAtK(["a", "x", "b"], relevant, 2)).toBe(0.5);
    expect(precisionAtK(["a", "x", "b"], relevant, 3)).toBeCloseTo(2 / 3, 10);
    expect(recallAtK(["a", "x", "b"], relevant, 3)).toBe(1);
  });

  it("scores empty rankings and empty relevance as zero", () => {
    expect(precisionAtK([], relevant, 5)).toBe(0);
    expect(recallAtK(["a"], new Set(), 5)).toBe(0);
    expect(ndcgAtK(["a"], {}, 5)).toBe(0);
  });

  it("discounts relevant keys found lower in the ranking", () => {
    expect(ndcgAtK(["a", "b"], { a: 1, b: 1 }, 2)).toBe(1);
    expect(ndcgAtK(["a", "x", "b"], { a: 1, b: 1 }, 3)).toBeCloseTo(1.5 / (1 + 1 / Math.log2(3)), 10);
  });

  it("uses graded relevance with exponential gain", () => {
    const grades = { a: 2, b: 1 };
    const actual = 1 + 3 / Math.log2(3);
    const ideal = 3 + 1 / Math.log2(3);
    expect(ndcgAtK(["b", "a"], grades, 2)).toBeCloseTo(actual / ideal, 10);
  });
});

describe("scoreTask / computeEvalSummary / formatEvalReport", () => {
  const task: EvalTask = { id: "login", question: "Where is login?", relevant: ["auth/login.py"], grades: {} };

  it("scores one task at every k and averages across tasks", () => {
    const hit = scoreTask(task, ["auth/login.py", "README.md"], [1, 2], { status: "answered", error: null });
    const miss = scoreTask({ ...task, id: "miss" }, [], [1, 2], { status: "failed", error: "classification_failed" });

    expect(hit.scores).toEqual([
      { k: 1, precision: 1, recall: 1, ndcg: 1 },
      { k: 2, precision: 0.5, recall: 1, ndcg: 1 },
    ]);
    expect(computeEvalSummary([hit, miss], [1, 2])).toEqual({
      totalTasks: 2,
      answeredTasks: 1,
      failedTasks: 1,
      meanScores: [
        { k: 1, precision: 0.5, recall: 0.5, ndcg: 0.5 },
        { k: 2, precision: 0.25, recall: 0.5, ndcg: 0.5 },
      ],
    });
  });

  it("formats the summary and lists failed tasks", () => {
    const hit = scoreTask(task, ["auth/login.py", "README.md"], [2], { status: "answered", error: null });
    const miss = scoreTask({ ...task, id: "miss" }, [], [2], { status: "failed", error: "Could not classify the request" });
    const results = [hit, miss];

    expect(formatEvalReport({ results, summary: computeEvalSummary(results, [2]) })).toBe(
      [
        "Evaluation results:",
        "  Tasks: 2",
        "  Answered: 1",
        "  Failed: 1",
        "  @2: precision 0.250  recall 0.500  nDCG 0.500",
        "",
        "Failed tasks:",
        "  - miss: Could not classify the request",
      ].join("\n"),
    );
  });

  it("leaves out the answered count for search-only runs", () => {
    const results = [scoreTask(task, ["auth/login.py"], [1], { status: null, error: null })];
    expect(formatEvalReport({ results, summary: computeEvalSummary(results, [1]) })).toBe(
      ["Evaluation results:", "  Tasks: 1", "  Failed: 0", "  @1: precision 1.000  recall 1.000  nDCG 1.000"].join("\n"),
    );
  });
});
