import { codeHostCacheKey } from "../core/code-host.js";
import { errorMessage, FetchError, ToolGatewayError, type GatewayFailureReason } from "../core/errors.js";
import type { EvidenceStore } from "../core/evidence.js";
import { InvalidFiltersError, rank, type RankedCandidate, type SemanticScorer } from "../core/ranker.js";
import type {
  CodeHostQuery,
  EvidenceDraft,
  Issue,
  PullRequest,
  SearchFilters,
  ToolCallRecord,
  ToolCallResult,
  ToolName,
  ToolRequest,
} from "../core/types.js";
import type { CodeHostPort } from "../ports/code-host.js";
import { InMemoryFetchCache } from "./fetch-cache.js";
import { withTimeout } from "./oracle.js";

export type GatewayResult<T> =
  | { ok: true; value: T; evidenceIds: string[] }
  | { ok: false; error: ToolGatewayError };

export interface GatewayContext {
  requestId: string;
  toolCallId: string;
  signal?: AbortSignal;
  /** Relevance carried over to an opened span, e.g. from the search hit it came from. */
  score?: number;
}

export interface SearchHit {
  evidenceId: string;
  kind: RankedCandidate["kind"];
  path: string;
  startLine: number;
  endLine: number;
  score: number;
  preview: string;
}

export interface OpenedSpan {
  evidenceId: string;
  path: string;
  startLine: number;
  endLine: number;
  text: string;
}

export interface ExecutedCall {
  record: ToolCallRecord;
  outcome: GatewayResult<unknown>;
  /** Ranked hits of a successful search; empty for every other tool. */
  hits: SearchHit[];
}

export interface ToolGatewayOptions {
  cacheTtlMs: number;
  topK: number;
  /** Per-fetch bound for code-host calls; the fetch is aborted when it runs out. */
  timeoutMs: number;
  semantic?: SemanticScorer;
  nowMs?: () => number;
}

const PREVIEW_LINES = 8;
const MAX_CODE_HOST_LIMIT = 100;
const BODY_PREVIEW_CHARS = 1500;

function fail<T>(reason: GatewayFailureReason, message: string): GatewayResult<T> {
  return { ok: false, error: new ToolGatewayError(reason, message) };
}

function preview(text: string): string {
  const lines = text.split("\n");
  return lines.length > PREVIEW_LINES ? `${lines.slice(0, PREVIEW_LINES).join("\n")}\n...` : text;
}

function describeRecord(kind: "Issue" | "Pull request", record: Issue | PullRequest): string {
  const labels = record.labels.length > 0 ? ` [${record.labels.join(", ")}]` : "";
  const body = record.body.length > BODY_PREVIEW_CHARS ? `${record.body.slice(0, BODY_PREVIEW_CHARS)}...` : record.body;
  const header = `${kind} #${record.number} (${record.state})${labels}: ${record.title}`;
  const touched = "touchedPaths" in record && record.touchedPaths?.length ? `\nTouches: ${record.touchedPaths.join(", ")}` : "";
  return `${header}${touched}\n${body}`.trimEnd();
}

/**
 * The four retrieval operations. Failures come back as values; evidence for
 * every success is registered in the store under the caller's request id.
 */
export class ToolGateway {
  private readonly issueCache: InMemoryFetchCache<Issue>;
  private readonly pullCache: InMemoryFetchCache<PullRequest>;

  constructor(
    private readonly store: EvidenceStore,
    private readonly codeHost: CodeHostPort | null,
    private readonly options: ToolGatewayOptions,
  ) {
    this.issueCache = new InMemoryFetchCache(options.cacheTtlMs, options.nowMs);
    this.pullCache = new InMemoryFetchCache(options.cacheTtlMs, options.nowMs);
  }

  clearCache(): void {
    this.issueCache.clear();
    this.pullCache.clear();
  }

  async searchRepo(query: string, filters: SearchFilters, ctx: GatewayContext): Promise<GatewayResult<SearchHit[]>> {
    const index = this.store.repositoryIndex;
    if (!index) return fail("not_ingested", "No repository has been ingested");
    if (query.trim().length === 0) return fail("bad_arguments", "search_repo needs a non-empty query");

    let candidates: RankedCandidate[];
    try {
      candidates = rank(query, filters, index, { topK: this.options.topK, semantic: this.options.semantic });
    } catch (err) {
      if (err instanceof InvalidFiltersError) return fail("bad_arguments", err.message);
      throw err;
    }

    const hits = candidates.map((candidate, i): SearchHit => {
      const provenance = { toolCallId: ctx.toolCallId, tool: "search_repo" as const, rank: i + 1 };
      let draft: EvidenceDraft;
      let hit: Omit<SearchHit, "evidenceId">;
      if (candidate.kind === "chunk") {
        const { chunk } = candidate;
        hit = { kind: "chunk", path: chunk.path, startLine: chunk.startLine, endLine: chunk.endLine, score: candidate.score, preview: preview(chunk.text) };
        draft = {
          source: { kind: "chunk", path: chunk.path, startLine: chunk.startLine, endLine: chunk.endLine, chunkId: chunk.id },
          displayText: chunk.text,
          provenance,
          score: candidate.score,
        };
      } else {
        const summary = `${candidate.path}: ${candidate.file.tag ?? ""}`;
        hit = { kind: "file_summary", path: candidate.path, startLine: 1, endLine: candidate.file.lineCount, score: candidate.score, preview: summary };
        draft = { source: { kind: "file_summary", path: candidate.path }, displayText: summary, provenance, score: candidate.score };
      }
      return { ...hit, evidenceId: this.store.put(draft, ctx.requestId) };
    });

    return { ok: true, value: hits, evidenceIds: hits.map((hit) => hit.evidenceId) };
  }

  async openFile(filePath: string, startLine: number, endLine: number, ctx: GatewayContext): Promise<GatewayResult<OpenedSpan>> {
    const index = this.store.repositoryIndex;
    if (!index) return fail("not_ingested", "No repository has been ingested");
    if (!Number.isInteger(startLine) || !Number.isInteger(endLine) || startLine < 1 || endLine < startLine) {
      return fail("bad_arguments", `Invalid line range ${startLine}-${endLine}`);
    }
    const file = index.files.get(filePath);
    if (!file) return fail("not_found", `No such file in the repository: ${filePath}`);
    if (file.binary) return fail("binary_file", `${filePath} is not a text file`);
    if (endLine > file.lineCount) {
      return fail("out_of_range", `${filePath} has ${file.lineCount} lines; requested ${startLine}-${endLine}`);
    }
    const text = index.readLines(filePath, startLine, endLine);
    if (text === null) return fail("out_of_range", `Cannot read ${filePath}:${startLine}-${endLine}`);

    const chunk = index.chunksOf(filePath).find((c) => c.startLine === startLine && c.endLine === endLine);
    const evidenceId = this.store.put(
      {
        source: { kind: "chunk", path: filePath, startLine, endLine, chunkId: chunk?.id ?? null },
        displayText: text,
        provenance: { toolCallId: ctx.toolCallId, tool: "open_file", rank: 1 },
        score: ctx.score ?? 0,
      },
      ctx.requestId,
    );
    return { ok: true, value: { evidenceId, path: filePath, startLine, endLine, text }, evidenceIds: [evidenceId] };
  }

  async getIssues(query: CodeHostQuery, ctx: GatewayContext): Promise<GatewayResult<Issue[]>> {
    const result = await this.fetchCached("get_issue", query, ctx, this.issueCache, (host, q, signal) =>
      host.fetchIssues(q, signal),
    );
    if (!result.ok) return result;
    const evidenceIds = result.value.map((issue, i) => {
      this.store.registerIssue(issue);
      return this.store.put(
        {
          source: { kind: "issue", number: issue.number },
          displayText: describeRecord("Issue", issue),
          provenance: { toolCallId: ctx.toolCallId, tool: "get_issue", rank: i + 1 },
          score: 0,
        },
        ctx.requestId,
      );
    });
    return { ok: true, value: result.value, evidenceIds };
  }

  async getPullRequests(query: CodeHostQuery, ctx: GatewayContext): Promise<GatewayResult<PullRequest[]>> {
    const result = await this.fetchCached("get_pull_requests", query, ctx, this.pullCache, (host, q, signal) =>
      host.fetchPullRequests(q, signal),
    );
    if (!result.ok) return result;
    const evidenceIds = result.value.map((pr, i) => {
      this.store.registerPullRequest(pr);
      return this.store.put(
        {
          source: { kind: "pull_request", number: pr.number },
          displayText: describeRecord("Pull request", pr),
          provenance: { toolCallId: ctx.toolCallId, tool: "get_pull_requests", rank: i + 1 },
          score: 0,
        },
        ctx.requestId,
      );
    });
    return { ok: true, value: result.value, evidenceIds };
  }

  /** Runs any request and describes it as a ToolCallRecord. */
  async execute(request: ToolRequest, ctx: GatewayContext): Promise<ExecutedCall> {
    let outcome: GatewayResult<unknown>;
    let result: ToolCallResult | null = null;
    let hits: SearchHit[] = [];
    switch (request.tool) {
      case "search_repo": {
        const r = await this.searchRepo(request.query, request.filters, ctx);
        outcome = r;
        if (r.ok) {
          result = { kind: "evidence", ids: r.evidenceIds };
          hits = r.value;
        }
        break;
      }
      case "open_file": {
        const r = await this.openFile(request.path, request.startLine, request.endLine, ctx);
        outcome = r;
        if (r.ok) result = { kind: "text", text: r.value.text, evidenceId: r.value.evidenceId };
        break;
      }
      case "get_issue":
      case "get_pull_requests": {
        const query: CodeHostQuery = { query: request.query, state: request.state, labels: request.labels, limit: request.limit };
        const r = request.tool === "get_issue" ? await this.getIssues(query, ctx) : await this.getPullRequests(query, ctx);
        outcome = r;
        if (r.ok) result = { kind: "evidence", ids: r.evidenceIds };
        break;
      }
    }
    const record: ToolCallRecord = {
      id: ctx.toolCallId,
      name: request.tool,
      params: request,
      result,
      timestamp: new Date(this.options.nowMs?.() ?? Date.now()).toISOString(),
      success: outcome.ok,
      error: outcome.ok ? null : { reason: outcome.error.reason, message: outcome.error.message },
    };
    return { record, outcome, hits };
  }

  private async fetchCached<T>(
    tool: Extract<ToolName, "get_issue" | "get_pull_requests">,
    query: CodeHostQuery,
    ctx: GatewayContext,
    cache: InMemoryFetchCache<T>,
    fetchRecords: (host: CodeHostPort, query: CodeHostQuery, signal?: AbortSignal) => Promise<T[]>,
  ): Promise<GatewayResult<T[]>> {
    const host = this.codeHost;
    if (!host) return fail("unavailable", "No code host is configured");
    if (!Number.isInteger(query.limit) || query.limit < 1 || query.limit > MAX_CODE_HOST_LIMIT) {
      return fail("bad_arguments", `limit must be between 1 and ${MAX_CODE_HOST_LIMIT}, got ${query.limit}`);
    }
    const key = codeHostCacheKey(tool, query);
    const cached = cache.get(key, query.limit);
    if (cached) return { ok: true, value: cached, evidenceIds: [] };

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    ctx.signal?.addEventListener("abort", forwardAbort, { once: true });
    let records: T[];
    try {
      records = await withTimeout(
        tool,
        this.options.timeoutMs,
        () => fetchRecords(host, query, controller.signal),
        (_, ms) => new FetchError(`timed out after ${ms}ms`),
      );
    } catch (err) {
      controller.abort();
      return fail("fetch_failed", `${tool} via ${host.name} failed: ${errorMessage(err)}`);
    } finally {
      ctx.signal?.removeEventListener("abort", forwardAbort);
    }
    cache.set(key, records, query.limit);
    return { ok: true, value: records.slice(0, query.limit), evidenceIds: [] };
  }
}
