import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { EvidenceItem, ToolCallRecord } from "../core/types.js";
import type { AskResult } from "./orchestrator.js";
import { CommandTelemetry, summarizeRequest, telemetryPathFromEnv } from "./telemetry.js";

function toolCall(id: string, success: boolean): ToolCallRecord {
  return {
    id,
    name: "get_issue",
    params: { tool: "get_issue", query: null, state: "open", labels: [], limit: 10 },
    result: success ? { kind: "evidence", ids: [] } : null,
    timestamp: "2024-01-01T00:00:00.000Z",
    success,
    error: success ? null : { reason: "fetch_failed", message: "HTTP 503" },
  };
}

const PR_EVIDENCE: EvidenceItem = {
  id: "ev-0123456789",
  kind: "pull_request",
  source: { kind: "pull_request", number: 9 },
  displayText: "Pull request #9 (open): Fix login",
  provenance: { toolCallId: "req-7:tc2", tool: "get_pull_requests", rank: 1 },
  score: 0,
  epoch: 1,
  requestId: "req-7",
};

const RESULT: AskResult = {
  requestId: "req-7",
  trace: ["Idle", "Classifying", "Planning", "Executing", "Evaluating", "Planning", "Executing", "Evaluating", "Synthesizing", "Done"],
  plan: [],
  toolCalls: [toolCall("req-7:tc1", false), toolCall("req-7:tc2", true), toolCall("req-7:tc3", true)],
  evidence: [PR_EVIDENCE],
  envelope: {
    status: "answered",
    intent: "prioritization",
    answer: "Review #9 first [ev-0123456789].",
    citations: [{ id: "ev-0123456789", kind: "pull_request", label: "pull request #9" }],
    partialEvidence: [],
    patch: null,
    nextActions: [],
    notes: ["get_issue failed (fetch_failed): HTTP 503"],
    error: null,
  },
};

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "repo-cite-telemetry-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

async function readEvents(filePath: string): Promise<unknown[]> {
  const raw = await fs.readFile(filePath, "utf-8");
  return raw
    .trim()
    .split("\n")
    .map((line): unknown => JSON.parse(line));
}

describe("summarizeRequest", () => {
  it("counts calls, evidence, citations and refinement rounds", () => {
    expect(summarizeRequest(RESULT)).toEqual({
      requestId: "req-7",
      intent: "prioritization",
      status: "answered",
      errorCode: null,
      toolCalls: 3,
      failedToolCalls: 1,
      evidenceCount: 1,
      citationCount: 1,
      refinements: 1,
    });
  });

  it("reports the error code of a failed request that never planned", () => {
    const failed: AskResult = {
      ...RESULT,
      trace: ["Idle", "Classifying", "Failed"],
      toolCalls: [],
      evidence: [],
      envelope: {
        ...RESULT.envelope,
        status: "failed",
        intent: null,
        citations: [],
        error: { code: "classification_failed", message: "Could not classify the request", retryable: true },
      },
    };
    expect(summarizeRequest(failed)).toMatchObject({ status: "failed", errorCode: "classification_failed", refinements: 0 });
  });
});

describe("telemetryPathFromEnv", () => {
  it("is off when the variable is unset or blank", () => {
    expect(telemetryPathFromEnv({})).toBeNull();
    expect(telemetryPathFromEnv({ REPO_CITE_TELEMETRY_PATH: "  " })).toBeNull();
  });

  it("resolves the configured path", () => {
    expect(telemetryPathFromEnv({ REPO_CITE_TELEMETRY_PATH: "/tmp/events.jsonl" })).toBe("/tmp/events.jsonl");
  });
});

describe("CommandTelemetry", () => {
  it("writes nothing without a file path", async () => {
    const telemetry = new CommandTelemetry("ask", null);
    telemetry.recordRetry();
    telemetry.recordRequest(RESULT);
    telemetry.finish("ok");

    expect(telemetry.enabled).toBe(false);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("appends one event per command with its retries and requests", async () => {
    const filePath = path.join(dir, "nested", "telemetry.jsonl");
    let clock = 1_000;
    const telemetry = new CommandTelemetry("ask", filePath, () => clock);
    telemetry.recordRetry();
    telemetry.recordRetry();
    telemetry.recordRequest(RESULT);
    clock = 1_250;
    telemetry.finish("ok");
    new CommandTelemetry("index", filePath, () => clock).finish("ok");

    const [first, second] = await readEvents(filePath);
    expect(first).toEqual({
      command: "ask",
      status: "ok",
      retryCount: 2,
      durationMs: 250,
      startedAt: "1970-01-01T00:00:01.000Z",
      finishedAt: "1970-01-01T00:00:01.250Z",
      requests: [summarizeRequest(RESULT)],
    });
    expect(second).toMatchObject({ command: "index", retryCount: 0, requests: [] });
  });

  it("records the error class once and ignores a second finish", async () => {
    const filePath = path.join(dir, "telemetry.jsonl");
    const telemetry = new CommandTelemetry("search", filePath);
    telemetry.finish("error", "IngestionError");
    telemetry.finish("error", "ShouldNotBeWritten");

    const events = await readEvents(filePath);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ status: "error", errorClass: "IngestionError" });
  });

  it("keeps going when the file cannot be written", async () => {
    const blocked = path.join(dir, "file.txt");
    await fs.writeFile(blocked, "not a directory");
    const telemetry = new CommandTelemetry("ask", path.join(blocked, "telemetry.jsonl"));
    expect(() => telemetry.finish("ok")).not.toThrow();
  });
});
