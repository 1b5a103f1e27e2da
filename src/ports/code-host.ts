import type { CodeHostQuery, Issue, PullRequest } from "../core/types.js";

/**
 * Remote issue and pull request lookups. Implementations throw `FetchError`
 * on transport or HTTP failures; an empty result is not an error.
 */
export interface CodeHostPort {
  readonly name: string;
  fetchIssues(query: CodeHostQuery, signal?: AbortSignal): Promise<Issue[]>;
  fetchPullRequests(query: CodeHostQuery, signal?: AbortSignal): Promise<PullRequest[]>;
}
