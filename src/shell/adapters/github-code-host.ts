import pLimit from "p-limit";
import { z } from "zod/v4";
import { applyCodeHostQuery } from "../../core/code-host.js";
import { errorMessage, FetchError } from "../../core/errors.js";
import type { CodeHostQuery, Issue, PullRequest } from "../../core/types.js";
import type { CodeHostPort } from "../../ports/code-host.js";

const labelSchema = z.union([z.string(), z.object({ name: z.string() })]);

const issueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullable().optional(),
  labels: z.array(labelSchema).default([]),
  state: z.enum(["open", "closed"]),
  created_at: z.string(),
  updated_at: z.string(),
  html_url: z.string(),
  pull_request: z.unknown().optional(),
});

const pullSchema = issueSchema.extend({
  merged_at: z.string().nullable().optional(),
});

const pullFileSchema = z.object({ filename: z.string() });

const PER_PAGE = 100;
const FILE_LOOKUP_CONCURRENCY = 4;

function labelNames(labels: z.infer<typeof labelSchema>[]): string[] {
  return labels.map((label) => (typeof label === "string" ? label : label.name));
}

function remoteState(state: CodeHostQuery["state"]): "open" | "closed" | "all" {
  return state === "merged" ? "closed" : state;
}

export interface GitHubCodeHostOptions {
  owner: string;
  repo: string;
  token?: string;
  apiUrl?: string;
}

/**
 * GitHub REST adapter. Fetches one page of up to 100 records per call and
 * applies the text query and label filter on the client. Pull requests that
 * survive the filter get their changed file paths from a second lookup.
 */
export class GitHubCodeHost implements CodeHostPort {
  readonly name: string;
  private readonly baseUrl: string;

  constructor(private readonly options: GitHubCodeHostOptions) {
    this.name = `github:${options.owner}/${options.repo}`;
    this.baseUrl = (options.apiUrl ?? "https://api.github.com").replace(/\/$/, "");
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      "User-Agent": "repo-cite",
    };
    if (this.options.token) {
      headers["Authorization"] = `Bearer ${this.options.token}`;
    }
    return headers;
  }

  private async getJson(pathname: string, params: Record<string, string>, signal?: AbortSignal): Promise<unknown> {
    const query = new URLSearchParams(params).toString();
    const url = `${this.baseUrl}/repos/${encodeURIComponent(this.options.owner)}/${encodeURIComponent(this.options.repo)}/${pathname}?${query}`;
    let res: Response;
    try {
      res = await fetch(url, { method: "GET", headers: this.headers(), signal });
    } catch (err) {
      throw new FetchError(`Request to ${this.name} failed: ${errorMessage(err)}`);
    }
    if (!res.ok) {
      throw new FetchError(`HTTP ${res.status} from ${this.name} ${pathname}`, res.status);
    }
    return res.json();
  }

  async fetchIssues(query: CodeHostQuery, signal?: AbortSignal): Promise<Issue[]> {
    const params: Record<string, string> = { state: remoteState(query.state), per_page: String(PER_PAGE) };
    if (query.labels.length > 0) params["labels"] = query.labels.join(",");
    const parsed = z.array(issueSchema).safeParse(await this.getJson("issues", params, signal));
    if (!parsed.success) {
      throw new FetchError(`Unexpected issue payload from ${this.name}`);
    }
    const issues = parsed.data
      .filter((raw) => raw.pull_request === undefined)
      .map((raw): Issue => ({
        number: raw.number,
        title: raw.title,
        body: raw.body ?? "",
        labels: labelNames(raw.labels),
        state: raw.state,
        createdAt: raw.created_at,
        updatedAt: raw.updated_at,
        url: raw.html_url,
      }));
    return applyCodeHostQuery(issues, query);
  }

  async fetchPullRequests(query: CodeHostQuery, signal?: AbortSignal): Promise<PullRequest[]> {
    const params = { state: remoteState(query.state), per_page: String(PER_PAGE) };
    const parsed = z.array(pullSchema).safeParse(await this.getJson("pulls", params, signal));
    if (!parsed.success) {
      throw new FetchError(`Unexpected pull request payload from ${this.name}`);
    }
    const pulls = parsed.data.map((raw): PullRequest => ({
      number: raw.number,
      title: raw.title,
      body: raw.body ?? "",
      labels: labelNames(raw.labels),
      state: raw.state === "closed" && raw.merged_at ? "merged" : raw.state,
      createdAt: raw.created_at,
      updatedAt: raw.updated_at,
      url: raw.html_url,
    }));
    const limit = pLimit(FILE_LOOKUP_CONCURRENCY);
    return Promise.all(
      applyCodeHostQuery(pulls, query).map((pr) =>
        limit(async (): Promise<PullRequest> => ({ ...pr, touchedPaths: await this.touchedPaths(pr.number, signal) })),
      ),
    );
  }

  private async touchedPaths(number: number, signal?: AbortSignal): Promise<string[]> {
    const payload = await this.getJson(`pulls/${number}/files`, { per_page: String(PER_PAGE) }, signal);
    const parsed = z.array(pullFileSchema).safeParse(payload);
    if (!parsed.success) {
      throw new FetchError(`Unexpected file list for pull request #${number} from ${this.name}`);
    }
    return parsed.data.map((file) => file.filename);
  }
}
