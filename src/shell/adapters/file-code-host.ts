import { z } from "zod/v4";
import { applyCodeHostQuery } from "../../core/code-host.js";
import { errorMessage, FetchError } from "../../core/errors.js";
import type { CodeHostQuery, Issue, PullRequest } from "../../core/types.js";
import type { CodeHostPort } from "../../ports/code-host.js";
import type { FileSystemPort } from "../../ports/filesystem.js";
import { nodeFileSystem } from "./node-filesystem.js";

const recordFields = {
  number: z.number().int(),
  title: z.string(),
  body: z.string().default(""),
  labels: z.array(z.string()).default([]),
  created_at: z.string(),
  updated_at: z.string(),
  url: z.string().default(""),
};

const exportSchema = z.object({
  issues: z.array(z.object({ ...recordFields, state: z.enum(["open", "closed"]) })).default([]),
  pull_requests: z
    .array(
      z.object({
        ...recordFields,
        state: z.enum(["open", "closed", "merged"]),
        touched_paths: z.array(z.string()).optional(),
      }),
    )
    .default([]),
});

interface Snapshot {
  issues: Issue[];
  pullRequests: PullRequest[];
}

/**
 * Offline code host backed by a JSON export:
 * `{ "issues": [...], "pull_requests": [...] }` with GitHub-style snake_case fields.
 */
export class FileCodeHost implements CodeHostPort {
  readonly name: string;
  private snapshot: Promise<Snapshot> | null = null;

  constructor(
    private readonly filePath: string,
    private readonly fs: FileSystemPort = nodeFileSystem,
  ) {
    this.name = `file:${filePath}`;
  }

  private async read(): Promise<Snapshot> {
    let raw: unknown;
    try {
      raw = JSON.parse(await this.fs.readFile(this.filePath));
    } catch (err) {
      throw new FetchError(`Cannot read ${this.filePath}: ${errorMessage(err)}`);
    }
    const parsed = exportSchema.safeParse(raw);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first ? `${first.path.join(".")}: ${first.message}` : "invalid shape";
      throw new FetchError(`Invalid code host export ${this.filePath} (${where})`);
    }
    return {
      issues: parsed.data.issues.map((raw) => ({
        number: raw.number,
        title: raw.title,
        body: raw.body,
        labels: raw.labels,
        state: raw.state,
        createdAt: raw.created_at,
        updatedAt: raw.updated_at,
        url: raw.url,
      })),
      pullRequests: parsed.data.pull_requests.map((raw) => ({
        number: raw.number,
        title: raw.title,
        body: raw.body,
        labels: raw.labels,
        state: raw.state,
        createdAt: raw.created_at,
        updatedAt: raw.updated_at,
        url: raw.url,
        touchedPaths: raw.touched_paths,
      })),
    };
  }

  private load(): Promise<Snapshot> {
    if (!this.snapshot) {
      this.snapshot = this.read();
      // A failed read is retried on the next call.
      this.snapshot.catch(() => {
        this.snapshot = null;
      });
    }
    return this.snapshot;
  }

  async fetchIssues(query: CodeHostQuery): Promise<Issue[]> {
    return applyCodeHostQuery((await this.load()).issues, query);
  }

  async fetchPullRequests(query: CodeHostQuery): Promise<PullRequest[]> {
    return applyCodeHostQuery((await this.load()).pullRequests, query);
  }
}
