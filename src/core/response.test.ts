import { describe, it, expect } from "vitest";
import { ClassificationError, OracleTimeoutError } from "./errors.js";
import {
  answeredEnvelope,
  extractNextActions,
  extractPatch,
  failedEnvelope,
  formatEnvelope,
  insufficientEnvelope,
} from "./response.js";

describe("extractPatch", () => {
  it("takes a fenced diff block out of the answer", () => {
    const text = "Change this:\n```diff\n--- a/x\n+++ b/x\n@@\n-a\n+b\n```\nDone.";
    expect(extractPatch(text)).toEqual({ patch: "--- a/x\n+++ b/x\n@@\n-a\n+b", rest: "Change this:\n\nDone." });
  });

  it("falls back to raw diff headers", () => {
    expect(extractPatch("Intro\n--- a/x\n+++ b/x")).toEqual({ patch: "--- a/x\n+++ b/x", rest: "Intro" });
    expect(extractPatch("No diff here").patch).toBeNull();
  });
});

describe("extractNextActions", () => {
  it("splits a next steps list from the body", () => {
    const text = "Login is in auth.py [ev-1].\n\nNext Steps:\n- Add tests\n- Refactor\n";
    expect(extractNextActions(text)).toEqual({ actions: ["Add tests", "Refactor"], rest: "Login is in auth.py [ev-1]." });
  });
});

describe("envelopes", () => {
  it("extracts a patch only for patch requests", () => {
    const text = "Use this:\n```diff\n-a\n+b\n```";
    const patched = answeredEnvelope({ intent: "patch", mode: undefined, text, citations: [], notes: [] });
    expect(patched.patch).toBe("-a\n+b");
    const plain = answeredEnvelope({ intent: "location", mode: "locate", text, citations: [], notes: [] });
    expect(plain.patch).toBeNull();
  });

  it("states the limitation for insufficient answers", () => {
    const envelope = insufficientEnvelope("location", "where is x", [], []);
    expect(envelope.answer).toBe(
      'Not enough evidence was found in the repository to give a location answer to "where is x". No claims are made beyond the evidence listed.',
    );
    expect(envelope.citations).toEqual([]);
  });

  it("carries the error code and retry flag of failures", () => {
    const cause = new OracleTimeoutError("Classification", 100);
    const envelope = failedEnvelope(null, new ClassificationError(cause), [], []);
    expect(envelope.error).toEqual({
      code: "classification_failed",
      message: "Could not classify the request: Classification timed out after 100ms",
      retryable: true,
    });
  });
});

describe("formatEnvelope", () => {
  it("lists citations, next actions and notes", () => {
    const envelope = answeredEnvelope({
      intent: "suggestion",
      mode: "suggest",
      text: "Add caching [ev-1].\nNext Actions:\n1. Cache tokens",
      citations: [{ id: "ev-1", kind: "chunk", label: "auth.py:1-4" }],
      notes: ["get_issue failed (fetch_failed): HTTP 503"],
    });
    expect(formatEnvelope(envelope)).toBe(
      [
        "Add caching [ev-1].",
        "",
        "Next Actions:",
        "  - Cache tokens",
        "",
        "Citations:",
        "  [ev-1] auth.py:1-4",
        "",
        "Notes:",
        "  - get_issue failed (fetch_failed): HTTP 503",
      ].join("\n"),
    );
  });

  it("shows partial evidence for insufficient answers", () => {
    const envelope = insufficientEnvelope(null, "q", [{ id: "ev-2", kind: "issue", label: "issue #4" }], []);
    expect(formatEnvelope(envelope).split("\n").slice(-2)).toEqual(["Partial evidence:", "  [ev-2] issue #4"]);
  });
});
