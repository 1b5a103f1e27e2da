import { createHash } from "node:crypto";
import { CitationStaleError } from "./errors.js";
import type { RepositoryIndex } from "./repository-index.js";
import type {
  Chunk,
  EvidenceDraft,
  EvidenceItem,
  EvidenceSource,
  Issue,
  PullRequest,
  RepoFile,
} from "./types.js";

export type ResolvedSource =
  | { kind: "chunk"; file: RepoFile; startLine: number; endLine: number; text: string; chunk: Chunk | null }
  | { kind: "issue"; issue: Issue }
  | { kind: "pull_request"; pullRequest: PullRequest }
  | { kind: "file_summary"; file: RepoFile };

export function sourceKey(source: EvidenceSource): string {
  switch (source.kind) {
    case "chunk":
      return `chunk:${source.path}:${source.startLine}-${source.endLine}`;
    case "issue":
      return `issue:${source.number}`;
    case "pull_request":
      return `pull_request:${source.number}`;
    case "file_summary":
      return `file_summary:${source.path}`;
  }
}

export function evidenceId(epoch: number, requestId: string, source: EvidenceSource): string {
  const digest = createHash("sha256").update(`${epoch}|${requestId}|${sourceKey(source)}`).digest("hex");
  return `ev-${digest.slice(0, 10)}`;
}

/** Human-readable locator for citation listings: `src/auth.ts:10-24`, `issue #12`. */
export function citationLabel(item: EvidenceItem): string {
  const source = item.source;
  switch (source.kind) {
    case "chunk":
      return `${source.path}:${source.startLine}-${source.endLine}`;
    case "issue":
      return `issue #${source.number}`;
    case "pull_request":
      return `pull request #${source.number}`;
    case "file_summary":
      return `${source.path} (summary)`;
  }
}

/**
 * Append-only catalog of evidence for one repository epoch.
 *
 * Issues and pull requests are not owned by the repository snapshot, so the
 * gateway registers the fetched objects here to keep them resolvable for as
 * long as the epoch lives.
 */
export class EvidenceStore {
  private items = new Map<string, EvidenceItem>();
  private issues = new Map<number, Issue>();
  private pullRequests = new Map<number, PullRequest>();
  /** Ids of the epoch just replaced, so late citations to them read as stale rather than unknown. */
  private retired = new Map<string, number>();
  private currentEpoch: number;

  constructor(private index: RepositoryIndex | null) {
    this.currentEpoch = index?.repository.epoch ?? 0;
  }

  get epoch(): number {
    return this.currentEpoch;
  }

  get repositoryIndex(): RepositoryIndex | null {
    return this.index;
  }

  /**
   * Starts a new epoch. Everything stored for the previous one is dropped;
   * only that epoch's ids are remembered as retired.
   */
  advance(index: RepositoryIndex): void {
    this.retired = new Map([...this.items.values()].map((item) => [item.id, item.epoch]));
    this.index = index;
    this.currentEpoch = index.repository.epoch;
    this.items = new Map();
    this.issues = new Map();
    this.pullRequests = new Map();
  }

  registerIssue(issue: Issue): void {
    this.issues.set(issue.number, issue);
  }

  registerPullRequest(pullRequest: PullRequest): void {
    this.pullRequests.set(pullRequest.number, pullRequest);
  }

  /** Idempotent per (request, source): the first draft's provenance wins. */
  put(draft: EvidenceDraft, requestId: string): string {
    const id = evidenceId(this.currentEpoch, requestId, draft.source);
    if (this.items.has(id)) return id;
    const item: EvidenceItem = Object.freeze({
      ...draft,
      source: Object.freeze({ ...draft.source }),
      provenance: Object.freeze({ ...draft.provenance }),
      id,
      kind: draft.source.kind,
      epoch: this.currentEpoch,
      requestId,
    });
    this.items.set(id, item);
    return id;
  }

  get(id: string): EvidenceItem | undefined {
    return this.items.get(id);
  }

  has(id: string): boolean {
    return this.items.has(id);
  }

  list(): EvidenceItem[] {
    return [...this.items.values()];
  }

  resolveSource(id: string): ResolvedSource | null {
    const retiredEpoch = this.retired.get(id);
    if (retiredEpoch !== undefined) {
      throw new CitationStaleError(id, retiredEpoch, this.currentEpoch);
    }
    const item = this.items.get(id);
    if (!item) return null;
    if (item.epoch !== this.currentEpoch) {
      throw new CitationStaleError(id, item.epoch, this.currentEpoch);
    }
    return this.resolve(item.source);
  }

  private resolve(source: EvidenceSource): ResolvedSource | null {
    switch (source.kind) {
      case "chunk": {
        const file = this.index?.files.get(source.path);
        const text = this.index?.readLines(source.path, source.startLine, source.endLine);
        if (!file || text === undefined || text === null) return null;
        const chunk = source.chunkId ? (this.index?.chunks.get(source.chunkId) ?? null) : null;
        return { kind: "chunk", file, startLine: source.startLine, endLine: source.endLine, text, chunk };
      }
      case "file_summary": {
        const file = this.index?.files.get(source.path);
        return file ? { kind: "file_summary", file } : null;
      }
      case "issue": {
        const issue = this.issues.get(source.number);
        return issue ? { kind: "issue", issue } : null;
      }
      case "pull_request": {
        const pullRequest = this.pullRequests.get(source.number);
        return pullRequest ? { kind: "pull_request", pullRequest } : null;
      }
    }
  }
}

/** Per-request evidence, in the order it was gathered. */
export class EvidenceSet {
  private readonly members = new Map<string, EvidenceItem>();
  private readonly sources = new Set<string>();

  constructor(
    private readonly store: EvidenceStore,
    readonly requestId: string,
    readonly epoch: number = store.epoch,
  ) {}

  /** Adds a stored item; returns false when it (or its source) is already present. */
  add(id: string): boolean {
    const item = this.store.get(id);
    if (!item) throw new Error(`Unknown evidence id: ${id}`);
    if (item.epoch !== this.epoch) {
      throw new CitationStaleError(id, item.epoch, this.epoch);
    }
    const key = sourceKey(item.source);
    if (this.members.has(id) || this.sources.has(key)) return false;
    this.members.set(id, item);
    this.sources.add(key);
    return true;
  }

  has(id: string): boolean {
    return this.members.has(id);
  }

  get(id: string): EvidenceItem | undefined {
    return this.members.get(id);
  }

  get size(): number {
    return this.members.size;
  }

  items(): EvidenceItem[] {
    return [...this.members.values()];
  }

  ids(): string[] {
    return [...this.members.keys()];
  }

  /** Fails with CitationStaleError when the store has moved to another epoch. */
  resolve(id: string): ResolvedSource | null {
    if (this.store.epoch !== this.epoch) {
      throw new CitationStaleError(id, this.epoch, this.store.epoch);
    }
    if (!this.members.has(id)) return null;
    return this.store.resolveSource(id);
  }

  isStale(): boolean {
    return this.store.epoch !== this.epoch;
  }
}
