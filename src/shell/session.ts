import { randomUUID } from "node:crypto";
import { RequestCancelledError, SessionClosedError } from "../core/errors.js";
import { EvidenceStore } from "../core/evidence.js";
import type { SemanticScorer } from "../core/ranker.js";
import { appendHistory } from "../core/session.js";
import type { AnswerMode, Config, EvidenceItem, Scope, ToolRequest } from "../core/types.js";
import type { CodeHostPort } from "../ports/code-host.js";
import type { FileSystemPort } from "../ports/filesystem.js";
import type { ReasoningEnginePort } from "../ports/reasoning-engine.js";
import { ingestRepository, type IngestionResult } from "./indexer.js";
import { Orchestrator, type AskResult } from "./orchestrator.js";
import { ToolGateway, type ExecutedCall } from "./tool-gateway.js";

export interface SessionOptions {
  config: Config;
  /** Without an engine, ingestion skips tags and questions fail classification. */
  engine: ReasoningEnginePort | null;
  codeHost?: CodeHostPort | null;
  fs?: FileSystemPort;
  semantic?: SemanticScorer;
  log?: (msg: string) => void;
  onRetry?: () => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  newRequestId?: () => string;
}

const NO_PROVIDER = "No reasoning engine is configured; add a provider section to the config and set OPENROUTER_API_KEY";

const missingEngine: ReasoningEnginePort = {
  classify: () => Promise.reject(new Error(NO_PROVIDER)),
  synthesize: () => Promise.reject(new Error(NO_PROVIDER)),
  describe: () => Promise.reject(new Error(NO_PROVIDER)),
};

export interface IngestCallOptions {
  /** Abort requests that are running or queued instead of waiting for them. */
  cancelInFlight?: boolean;
  signal?: AbortSignal;
}

export interface AskCallOptions {
  mode?: AnswerMode;
  scope?: Scope;
  signal?: AbortSignal;
}

export interface ToolRun {
  call: ExecutedCall;
  evidence: EvidenceItem[];
}

/**
 * One user's conversation with one repository. Ingestion, questions and
 * direct tool calls run one at a time, in the order they were submitted.
 */
export class Session {
  readonly id: string;
  private readonly store = new EvidenceStore(null);
  private readonly gateway: ToolGateway;
  private readonly orchestrator: Orchestrator;
  private readonly newRequestId: () => string;
  private chain: Promise<unknown> = Promise.resolve();
  private readonly pending = new Set<AbortController>();
  private history: string[] = [];
  private epoch = 0;
  private closed = false;

  private constructor(private readonly options: SessionOptions) {
    this.id = randomUUID();
    const { config, now } = options;
    this.newRequestId = options.newRequestId ?? randomUUID;
    this.gateway = new ToolGateway(this.store, options.codeHost ?? null, {
      cacheTtlMs: config.codeHost?.cacheTtlMs ?? 0,
      topK: config.retrieval.topK,
      timeoutMs: config.agent.toolTimeoutMs,
      semantic: options.semantic,
      nowMs: now ? () => now().getTime() : undefined,
    });
    this.orchestrator = new Orchestrator({
      store: this.store,
      gateway: this.gateway,
      engine: options.engine ?? missingEngine,
      agent: config.agent,
      retrieval: config.retrieval,
      windowLines: config.indexing.windowLines,
      log: options.log,
      onRetry: options.onRetry,
      sleep: options.sleep,
      newRequestId: this.newRequestId,
    });
  }

  static create(options: SessionOptions): Session {
    return new Session(options);
  }

  get currentEpoch(): number {
    return this.epoch;
  }

  get recentQueries(): readonly string[] {
    return this.history;
  }

  get ingested(): boolean {
    return this.store.repositoryIndex !== null;
  }

  /** Indexes `root` as a new epoch; evidence of earlier epochs becomes stale. */
  ingest(root: string, callOptions: IngestCallOptions = {}): Promise<IngestionResult> {
    this.assertOpen();
    if (callOptions.cancelInFlight) {
      for (const controller of this.pending) controller.abort();
    }
    return this.enqueue(async () => {
      this.assertOpen();
      const { config, engine, fs, log, now } = this.options;
      const result = await ingestRepository(
        root,
        {
          ...config.indexing,
          epoch: this.epoch + 1,
          tagTimeoutMs: config.agent.oracleTimeoutMs,
          signal: callOptions.signal,
        },
        { fs, engine, log, now },
      );
      this.epoch = result.index.repository.epoch;
      this.store.advance(result.index);
      return result;
    });
  }

  ask(query: string, callOptions: AskCallOptions = {}): Promise<AskResult> {
    this.assertOpen();
    const controller = this.track(callOptions.signal);
    return this.enqueue(async () => {
      try {
        const result = await this.orchestrator.run({
          query,
          mode: callOptions.mode,
          scope: callOptions.scope,
          history: this.history,
          signal: controller.signal,
        });
        if (query.trim()) {
          this.history = appendHistory(this.history, query, this.options.config.agent.historySize);
        }
        return result;
      } finally {
        this.pending.delete(controller);
      }
    });
  }

  /** Runs one gateway operation outside the orchestrator, as its own request. */
  runTool(request: ToolRequest, signal?: AbortSignal): Promise<ToolRun> {
    this.assertOpen();
    return this.enqueue(async () => {
      if (signal?.aborted) throw new RequestCancelledError(request.tool);
      const requestId = this.newRequestId();
      const call = await this.gateway.execute(request, { requestId, toolCallId: `${requestId}:tc1`, signal });
      const ids = call.outcome.ok ? call.outcome.evidenceIds : [];
      const evidence = ids.flatMap((id) => {
        const item = this.store.get(id);
        return item ? [item] : [];
      });
      return { call, evidence };
    });
  }

  /** Forgets the conversation history and cached code-host lookups. */
  reset(): void {
    this.assertOpen();
    this.history = [];
    this.gateway.clearCache();
  }

  destroy(): void {
    if (this.closed) return;
    this.closed = true;
    for (const controller of this.pending) controller.abort();
    this.pending.clear();
    this.gateway.clearCache();
  }

  private assertOpen(): void {
    if (this.closed) throw new SessionClosedError(this.id);
  }

  private track(signal: AbortSignal | undefined): AbortController {
    const controller = new AbortController();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener("abort", () => controller.abort(), { once: true });
    this.pending.add(controller);
    return controller;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const result = this.chain.then(task);
    this.chain = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
