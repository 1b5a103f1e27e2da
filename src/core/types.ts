/** Coarse classification of a repository file, used by search filters. */
export type FileCategory = "code" | "docs" | "config" | "data";

/** Immutable snapshot metadata for one ingestion epoch. */
export interface Repository {
  id: string;
  rootPath: string;
  epoch: number;
  indexedAt: string;
  fileCount: number;
  chunkCount: number;
}

export interface RepoFile {
  /** POSIX path relative to the repository root. Unique within a Repository. */
  path: string;
  language: string;
  category: FileCategory;
  sizeBytes: number;
  mtimeMs: number;
  lineCount: number;
  /** Metadata-only files (binary or oversized) carry no chunks and are not indexed. */
  binary: boolean;
  chunkIds: string[];
  tag: string | null;
}

export interface Chunk {
  id: string;
  path: string;
  /** 1-indexed, inclusive. */
  startLine: number;
  endLine: number;
  text: string;
  boundary: "structural" | "window";
  tag: string | null;
}

/** A directory in the per-epoch file tree. */
export interface DirectoryNode {
  /** "" for the repository root. */
  path: string;
  name: string;
  depth: number;
  directories: DirectoryNode[];
  files: string[];
  tag: string | null;
}

export type IssueState = "open" | "closed";
export type PullRequestState = "open" | "closed" | "merged";

export interface Issue {
  number: number;
  title: string;
  body: string;
  labels: string[];
  state: IssueState;
  createdAt: string;
  updatedAt: string;
  url: string;
}

export interface PullRequest {
  number: number;
  title: string;
  body: string;
  labels: string[];
  state: PullRequestState;
  createdAt: string;
  updatedAt: string;
  url: string;
  touchedPaths?: string[];
}

// --- Tool calls ---

export const TOOL_NAMES = ["search_repo", "open_file", "get_issue", "get_pull_requests"] as const;
export type ToolName = (typeof TOOL_NAMES)[number];

export interface SearchFilters {
  pathGlob?: string;
  language?: string;
  docsOnly?: boolean;
  codeOnly?: boolean;
  topK?: number;
}

export type StateFilter = "open" | "closed" | "merged" | "all";

export interface CodeHostQuery {
  query: string | null;
  state: StateFilter;
  labels: string[];
  limit: number;
}

export type ToolRequest =
  | { tool: "search_repo"; query: string; filters: SearchFilters }
  | { tool: "open_file"; path: string; startLine: number; endLine: number }
  | ({ tool: "get_issue" } & CodeHostQuery)
  | ({ tool: "get_pull_requests" } & CodeHostQuery);

export type ToolCallResult =
  | { kind: "evidence"; ids: string[] }
  | { kind: "text"; text: string; evidenceId: string };

export interface ToolCallRecord {
  id: string;
  name: ToolName;
  params: ToolRequest;
  result: ToolCallResult | null;
  timestamp: string;
  success: boolean;
  error: { reason: string; message: string } | null;
}

// --- Evidence ---

export const EVIDENCE_KINDS = ["chunk", "issue", "pull_request", "file_summary"] as const;
export type EvidenceKind = (typeof EVIDENCE_KINDS)[number];

export interface Provenance {
  toolCallId: string;
  tool: ToolName;
  /** 1-based position in the producing tool call's result list. */
  rank: number;
}

export type EvidenceSource =
  | { kind: "chunk"; path: string; startLine: number; endLine: number; chunkId: string | null }
  | { kind: "issue"; number: number }
  | { kind: "pull_request"; number: number }
  | { kind: "file_summary"; path: string };

/** What a tool hands to the store; the store assigns id, epoch and request. */
export interface EvidenceDraft {
  source: EvidenceSource;
  displayText: string;
  provenance: Provenance;
  score: number;
}

export type EvidenceItem = Readonly<
  EvidenceDraft & {
    id: string;
    kind: EvidenceKind;
    epoch: number;
    requestId: string;
  }
>;

// --- Orchestration ---

export const INTENTS = ["location", "overview", "prioritization", "suggestion", "patch"] as const;
export type Intent = (typeof INTENTS)[number];

/** Caller-side hint about the kind of answer wanted. */
export const ANSWER_MODES = ["explain", "locate", "suggest", "patch"] as const;
export type AnswerMode = (typeof ANSWER_MODES)[number];

export const SCOPES = ["files-only", "include-pr"] as const;
export type Scope = (typeof SCOPES)[number];

export type PlanStep =
  | { kind: "call"; id: string; intent: Intent; request: ToolRequest }
  | { kind: "open_top_hits"; id: string; intent: Intent; after: string; count: number };

export type Plan = PlanStep[];

export interface Citation {
  id: string;
  kind: EvidenceKind;
  label: string;
}

export type ResponseStatus = "answered" | "insufficient" | "failed";

export interface ResponseError {
  code: string;
  message: string;
  retryable: boolean;
}

export interface ResponseEnvelope {
  status: ResponseStatus;
  intent: Intent | null;
  answer: string;
  citations: Citation[];
  /** Evidence gathered before an insufficient or failed outcome. */
  partialEvidence: Citation[];
  patch: string | null;
  nextActions: string[];
  notes: string[];
  error: ResponseError | null;
}

// --- Reasoning engine inputs ---

export interface ClassificationInput {
  query: string;
  mode?: AnswerMode;
  /** Most recent earlier queries of the session, oldest first. */
  history: string[];
}

export interface SynthesisEvidence {
  id: string;
  kind: EvidenceKind;
  label: string;
  text: string;
}

export interface SynthesisInput {
  query: string;
  intent: Intent;
  mode?: AnswerMode;
  scope: Scope;
  evidence: SynthesisEvidence[];
  /** Failed tool calls the answer should acknowledge. */
  notes: string[];
}

export interface StepProposalInput {
  query: string;
  intent: Intent;
  scope: Scope;
  plan: Plan;
  maxExtraSteps: number;
}

export type TagSubject =
  | { kind: "file"; path: string; language: string; excerpt: string }
  | { kind: "directory"; path: string; children: { name: string; tag: string | null }[] };

// --- Configuration ---

export interface ProviderConfig {
  type: "openrouter";
  model: string;
  /** Model used for tags and step proposals; defaults to `model`. */
  fastModel: string;
  baseUrl: string;
}

export type CodeHostConfig =
  | { type: "github"; owner: string; repo: string; apiUrl: string; cacheTtlMs: number }
  | { type: "file"; path: string; cacheTtlMs: number };

export interface IndexingConfig {
  windowLines: number;
  maxFileSizeKb: number;
  ignoreDirs: string[];
  tags: boolean;
  tagBatchSize: number;
  tagConcurrency: number;
}

export interface RetrievalConfig {
  topK: number;
  relevanceFloor: number;
}

export interface AgentConfig {
  maxExtraSteps: number;
  maxRefinements: number;
  toolConcurrency: number;
  /** Upper bound on one code-host fetch. */
  toolTimeoutMs: number;
  oracleTimeoutMs: number;
  oracleRetries: number;
  retryBaseMs: number;
  issueLimit: number;
  historySize: number;
}

export interface Config {
  provider: ProviderConfig | null;
  codeHost: CodeHostConfig | null;
  indexing: IndexingConfig;
  retrieval: RetrievalConfig;
  agent: AgentConfig;
}
