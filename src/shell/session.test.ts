import { describe, expect, it } from "vitest";
import { parseConfig } from "../core/config.js";
import { SessionClosedError } from "../core/errors.js";
import type { ReasoningEnginePort } from "../ports/reasoning-engine.js";
import { InMemoryFileSystem, makeFakeEngine } from "./__test__/fakes.js";
import { Session } from "./session.js";

const FILES = {
  "auth/login.py": "def login(username, password):\n    return check_password(username, password)\n",
  "README.md": "# Shop\nAn online shop.\n",
};

function makeSession(engine: ReasoningEnginePort | null = makeFakeEngine()) {
  let next = 0;
  return Session.create({
    config: parseConfig({ indexing: { tags: false }, agent: { history_size: 2 } }),
    engine,
    fs: new InMemoryFileSystem("/repo", FILES),
    sleep: async () => {},
    log: () => {},
    newRequestId: () => `req-${++next}`,
  });
}

const citeFirst = makeFakeEngine({
  synthesize: async (input) => `In auth/login.py [${input.evidence[0]?.id ?? ""}].`,
});

describe("Session", () => {
  it("answers questions queued behind ingestion", async () => {
    const session = makeSession(citeFirst);

    const ingestion = session.ingest("/repo");
    const answer = session.ask("Where is login handled?");

    expect((await ingestion).index.repository.epoch).toBe(1);
    const result = await answer;
    expect(result.envelope.status).toBe("answered");
    expect(result.envelope.citations.map((c) => c.label)).toEqual(["auth/login.py:1-2"]);
    expect(session.currentEpoch).toBe(1);
    expect(session.recentQueries).toEqual(["Where is login handled?"]);
  });

  it("fails questions asked before ingestion", async () => {
    const session = makeSession();
    const result = await session.ask("Where is login handled?");
    expect(session.ingested).toBe(false);
    expect(result.envelope.error?.code).toBe("tool_gateway_exhausted");
    expect(result.envelope.notes).toEqual(["search_repo failed (not_ingested): No repository has been ingested"]);
  });

  it("starts a new epoch on every ingestion", async () => {
    const session = makeSession();
    await session.ingest("/repo");
    const second = await session.ingest("/repo");
    expect(second.index.repository.epoch).toBe(2);
    expect(session.currentEpoch).toBe(2);
  });

  it("runs a single tool as its own request", async () => {
    const session = makeSession();
    await session.ingest("/repo");

    const { call, evidence } = await session.runTool({ tool: "open_file", path: "README.md", startLine: 1, endLine: 2 });

    expect(call.record).toMatchObject({ id: "req-1:tc1", success: true });
    expect(evidence).toHaveLength(1);
    expect(evidence[0]).toMatchObject({ requestId: "req-1", displayText: "# Shop\nAn online shop.", epoch: 1 });
  });

  it("keeps a bounded history and forgets it on reset", async () => {
    const session = makeSession(citeFirst);
    await session.ingest("/repo");
    for (const question of ["Where is login?", "Where is the password check?", "What is the readme?"]) {
      await session.ask(question);
    }
    expect(session.recentQueries).toEqual(["Where is the password check?", "What is the readme?"]);

    session.reset();
    expect(session.recentQueries).toEqual([]);
  });

  it("fails classification without a reasoning engine", async () => {
    const session = makeSession(null);
    await session.ingest("/repo");
    const result = await session.ask("Where is login?");
    expect(result.envelope.error).toEqual({
      code: "classification_failed",
      message:
        "Could not classify the request: classify failed: No reasoning engine is configured; add a provider section to the config and set OPENROUTER_API_KEY",
      retryable: true,
    });
  });

  it("cancels pending work and refuses new calls once destroyed", async () => {
    const session = makeSession(
      makeFakeEngine({
        classify: (_input, signal) =>
          new Promise<string>((_, reject) => {
            signal?.addEventListener("abort", () => reject(new Error("aborted")));
          }),
      }),
    );
    await session.ingest("/repo");

    const pending = session.ask("Where is login?");
    session.destroy();

    expect((await pending).envelope.error?.code).toBe("cancelled");
    expect(() => session.ask("again")).toThrow(SessionClosedError);
    expect(() => session.ingest("/repo")).toThrow(SessionClosedError);
  });

  it("cancels a question through its own signal", async () => {
    const session = makeSession();
    await session.ingest("/repo");
    const controller = new AbortController();
    controller.abort();
    const result = await session.ask("Where is login?", { signal: controller.signal });
    expect(result.envelope.status).toBe("failed");
    expect(result.envelope.error?.code).toBe("cancelled");
  });
});
