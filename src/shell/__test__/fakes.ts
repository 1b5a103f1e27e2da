import * as path from "node:path";
import { minimatch } from "minimatch";
import { vi, type Mock } from "vitest";
import { applyCodeHostQuery } from "../../core/code-host.js";
import { FetchError } from "../../core/errors.js";
import type { CodeHostQuery, Issue, PullRequest } from "../../core/types.js";
import type { CodeHostPort } from "../../ports/code-host.js";
import type { FileSystemPort, GlobOptions, StatResult } from "../../ports/filesystem.js";
import type { ReasoningEnginePort } from "../../ports/reasoning-engine.js";

type EngineMethod<K extends keyof ReasoningEnginePort> = Required<ReasoningEnginePort>[K];

export interface FakeEngine extends ReasoningEnginePort {
  classify: Mock<EngineMethod<"classify">>;
  synthesize: Mock<EngineMethod<"synthesize">>;
  describe: Mock<EngineMethod<"describe">>;
  proposeSteps: Mock<EngineMethod<"proposeSteps">>;
}

/** Engine whose every method is a vi.fn with a harmless default reply. */
export function makeFakeEngine(overrides: Partial<ReasoningEnginePort> = {}): FakeEngine {
  return {
    classify: vi.fn<EngineMethod<"classify">>(overrides.classify ?? (async () => '{"intent": "location"}')),
    synthesize: vi.fn<EngineMethod<"synthesize">>(overrides.synthesize ?? (async () => "No answer.")),
    describe: vi.fn<EngineMethod<"describe">>(overrides.describe ?? (async () => "[]")),
    proposeSteps: vi.fn<EngineMethod<"proposeSteps">>(overrides.proposeSteps ?? (async () => "[]")),
  };
}

type HostTool = "issues" | "pulls";

/**
 * Code host serving fixed records. `failWith` makes fetches throw, limited
 * to one tool by `failOn`; fetches of the `hangOn` tool settle only by
 * rejecting once their signal aborts.
 */
export class StaticCodeHost implements CodeHostPort {
  readonly name = "static";
  failWith: string | null = null;
  failOn: HostTool | null = null;
  hangOn: HostTool | null = null;
  readonly calls: Array<{ tool: HostTool; query: CodeHostQuery; signal?: AbortSignal }> = [];

  constructor(
    private readonly issues: Issue[] = [],
    private readonly pullRequests: PullRequest[] = [],
  ) {}

  private async serve<T extends Issue | PullRequest>(tool: HostTool, records: T[], query: CodeHostQuery, signal?: AbortSignal): Promise<T[]> {
    this.calls.push({ tool, query, signal });
    if (this.hangOn === tool) {
      return new Promise<T[]>((_, reject) => {
        signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });
    }
    if (this.failWith && (this.failOn === null || this.failOn === tool)) throw new FetchError(this.failWith, 503);
    return applyCodeHostQuery(records, query);
  }

  fetchIssues(query: CodeHostQuery, signal?: AbortSignal): Promise<Issue[]> {
    return this.serve("issues", this.issues, query, signal);
  }

  fetchPullRequests(query: CodeHostQuery, signal?: AbortSignal): Promise<PullRequest[]> {
    return this.serve("pulls", this.pullRequests, query, signal);
  }
}

export function makeIssue(number: number, title: string, extra: Partial<Issue> = {}): Issue {
  return {
    number,
    title,
    body: "",
    labels: [],
    state: "open",
    createdAt: "2024-01-01T00:00:00Z",
    updatedAt: "2024-01-01T00:00:00Z",
    url: `https://example.test/issues/${number}`,
    ...extra,
  };
}

export function makePullRequest(number: number, title: string, extra: Partial<PullRequest> = {}): PullRequest {
  return {
    number,
    title,
    body: "",
    labels: [],
    state: "open",
    createdAt: "2024-01-01T00:00:00Z",
    updatedAt: "2024-01-01T00:00:00Z",
    url: `https://example.test/pull/${number}`,
    ...extra,
  };
}

const encoder = new TextEncoder();

/**
 * In-memory filesystem keyed by absolute path. Directories exist implicitly
 * as prefixes of file paths; `unreadable` paths fail on read.
 */
export class InMemoryFileSystem implements FileSystemPort {
  private readonly files = new Map<string, Uint8Array>();
  readonly unreadable = new Set<string>();

  constructor(root: string, files: Record<string, string | Uint8Array>) {
    for (const [rel, content] of Object.entries(files)) {
      this.files.set(path.posix.join(root, rel), typeof content === "string" ? encoder.encode(content) : content);
    }
  }

  private isDirectory(p: string): boolean {
    const prefix = p.endsWith("/") ? p : `${p}/`;
    return [...this.files.keys()].some((file) => file.startsWith(prefix));
  }

  private bytes(p: string): Uint8Array {
    if (this.unreadable.has(p)) throw new Error(`EACCES: permission denied, open '${p}'`);
    const content = this.files.get(p);
    if (!content) throw new Error(`ENOENT: no such file or directory, open '${p}'`);
    return content;
  }

  async readFile(p: string): Promise<string> {
    return new TextDecoder().decode(this.bytes(p));
  }

  async readBytes(p: string): Promise<Uint8Array> {
    return this.bytes(p);
  }

  async stat(p: string): Promise<StatResult> {
    const content = this.files.get(p);
    if (content) return { size: content.byteLength, mtimeMs: 0, isDirectory: () => false };
    if (this.isDirectory(p)) return { size: 0, mtimeMs: 0, isDirectory: () => true };
    throw new Error(`ENOENT: no such file or directory, stat '${p}'`);
  }

  async access(p: string): Promise<void> {
    if (!this.files.has(p) && !this.isDirectory(p)) throw new Error(`ENOENT: no such file or directory, access '${p}'`);
  }

  async glob(patterns: string[], options: GlobOptions): Promise<string[]> {
    const prefix = options.cwd.endsWith("/") ? options.cwd : `${options.cwd}/`;
    const matchOptions = { dot: options.dot ?? false };
    return [...this.files.keys()]
      .filter((file) => file.startsWith(prefix))
      .map((file) => file.slice(prefix.length))
      .filter((rel) => patterns.some((pattern) => minimatch(rel, pattern, matchOptions)))
      .filter((rel) => !(options.ignore ?? []).some((pattern) => minimatch(rel, pattern, matchOptions)));
  }
}
