import { z } from "zod/v4";
import { DEFAULT_WINDOW_LINES } from "./chunker.js";
import { DEFAULT_IGNORE_DIRS } from "./filter.js";
import { DEFAULT_ISSUE_LIMIT, DEFAULT_MAX_EXTRA_STEPS, DEFAULT_MAX_REFINEMENTS, HARD_TOOL_CALL_CAP } from "./planner.js";
import { DEFAULT_TOP_K } from "./ranker.js";
import { DEFAULT_RELEVANCE_FLOOR } from "./sufficiency.js";
import type { CodeHostConfig, Config, ProviderConfig } from "./types.js";

export const BUILT_IN_DEFAULTS = {
  model: "anthropic/claude-3.5-haiku",
  openRouterUrl: "https://openrouter.ai/api/v1",
  githubApiUrl: "https://api.github.com",
  cacheTtlMs: 300_000,
  windowLines: DEFAULT_WINDOW_LINES,
  maxFileSizeKb: 256,
  tagBatchSize: 8,
  tagConcurrency: 2,
  topK: DEFAULT_TOP_K,
  relevanceFloor: DEFAULT_RELEVANCE_FLOOR,
  maxExtraSteps: DEFAULT_MAX_EXTRA_STEPS,
  maxRefinements: DEFAULT_MAX_REFINEMENTS,
  toolConcurrency: 4,
  toolTimeoutMs: 15_000,
  oracleTimeoutMs: 30_000,
  oracleRetries: 1,
  retryBaseMs: 500,
  issueLimit: DEFAULT_ISSUE_LIMIT,
  historySize: 10,
};

const positiveInt = z.number().int().positive();

const rawConfigSchema = z.object({
  provider: z
    .object({
      type: z.literal("openrouter"),
      model: z.string().min(1).optional(),
      fast_model: z.string().min(1).optional(),
      base_url: z.string().optional(),
    })
    .optional(),
  code_host: z
    .discriminatedUnion("type", [
      z.object({
        type: z.literal("github"),
        owner: z.string().min(1),
        repo: z.string().min(1),
        api_url: z.string().optional(),
        cache_ttl_ms: z.number().int().nonnegative().optional(),
      }),
      z.object({
        type: z.literal("file"),
        path: z.string().min(1),
        cache_ttl_ms: z.number().int().nonnegative().optional(),
      }),
    ])
    .optional(),
  indexing: z
    .object({
      window_lines: positiveInt.optional(),
      max_file_size_kb: positiveInt.optional(),
      ignore_dirs: z.array(z.string()).optional(),
      tags: z.boolean().optional(),
      tag_batch_size: positiveInt.optional(),
      tag_concurrency: positiveInt.optional(),
    })
    .optional(),
  retrieval: z
    .object({
      top_k: positiveInt.optional(),
      relevance_floor: z.number().nonnegative().optional(),
    })
    .optional(),
  agent: z
    .object({
      max_extra_steps: z.number().int().nonnegative().optional(),
      max_refinements: z.number().int().nonnegative().optional(),
      tool_concurrency: positiveInt.optional(),
      tool_timeout_ms: positiveInt.optional(),
      oracle_timeout_ms: positiveInt.optional(),
      oracle_retries: z.number().int().nonnegative().optional(),
      retry_base_ms: z.number().int().nonnegative().optional(),
      issue_limit: positiveInt.optional(),
      history_size: positiveInt.optional(),
    })
    .optional(),
});

type RawConfig = z.infer<typeof rawConfigSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Config validation failed:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

function zodIssuesToStrings(err: z.core.$ZodError): string[] {
  return err.issues.map((issue) => {
    const path = issue.path.join(".");
    return `${path}: ${issue.message}`;
  });
}

function validateSemantics(parsed: RawConfig): string[] {
  const issues: string[] = [];

  for (const dir of parsed.indexing?.ignore_dirs ?? []) {
    if (dir.includes("/") || dir.includes("\\")) {
      issues.push(`indexing.ignore_dirs: "${dir}" should be a directory name, not a path`);
    }
  }

  const windowLines = parsed.indexing?.window_lines;
  if (windowLines !== undefined && windowLines < 5) {
    issues.push(`indexing.window_lines: must be at least 5, got ${windowLines}`);
  }

  const extra = parsed.agent?.max_extra_steps;
  if (extra !== undefined && extra > HARD_TOOL_CALL_CAP) {
    issues.push(`agent.max_extra_steps: cannot exceed the tool call cap of ${HARD_TOOL_CALL_CAP}, got ${extra}`);
  }

  if (parsed.code_host?.type === "github") {
    for (const key of ["owner", "repo"] as const) {
      if (parsed.code_host[key].includes("/")) {
        issues.push(`code_host.${key}: "${parsed.code_host[key]}" must not contain "/"`);
      }
    }
  }

  return issues;
}

function toProvider(raw: RawConfig["provider"]): ProviderConfig | null {
  if (!raw) return null;
  const model = raw.model ?? BUILT_IN_DEFAULTS.model;
  return {
    type: "openrouter",
    model,
    fastModel: raw.fast_model ?? model,
    baseUrl: raw.base_url ?? BUILT_IN_DEFAULTS.openRouterUrl,
  };
}

function toCodeHost(raw: RawConfig["code_host"]): CodeHostConfig | null {
  if (!raw) return null;
  const cacheTtlMs = raw.cache_ttl_ms ?? BUILT_IN_DEFAULTS.cacheTtlMs;
  if (raw.type === "github") {
    return { type: "github", owner: raw.owner, repo: raw.repo, apiUrl: raw.api_url ?? BUILT_IN_DEFAULTS.githubApiUrl, cacheTtlMs };
  }
  return { type: "file", path: raw.path, cacheTtlMs };
}

/** Validates a raw (YAML-decoded) config. `undefined` and `null` mean "all defaults". */
export function parseConfig(raw: unknown): Config {
  let parsed: RawConfig;
  try {
    parsed = rawConfigSchema.parse(raw ?? {});
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ConfigError(zodIssuesToStrings(error));
    }
    throw error;
  }

  const semanticIssues = validateSemantics(parsed);
  if (semanticIssues.length > 0) {
    throw new ConfigError(semanticIssues);
  }

  const indexing = parsed.indexing ?? {};
  const retrieval = parsed.retrieval ?? {};
  const agent = parsed.agent ?? {};

  return {
    provider: toProvider(parsed.provider),
    codeHost: toCodeHost(parsed.code_host),
    indexing: {
      windowLines: indexing.window_lines ?? BUILT_IN_DEFAULTS.windowLines,
      maxFileSizeKb: indexing.max_file_size_kb ?? BUILT_IN_DEFAULTS.maxFileSizeKb,
      ignoreDirs: [...new Set([...DEFAULT_IGNORE_DIRS, ...(indexing.ignore_dirs ?? [])])],
      tags: indexing.tags ?? true,
      tagBatchSize: indexing.tag_batch_size ?? BUILT_IN_DEFAULTS.tagBatchSize,
      tagConcurrency: indexing.tag_concurrency ?? BUILT_IN_DEFAULTS.tagConcurrency,
    },
    retrieval: {
      topK: retrieval.top_k ?? BUILT_IN_DEFAULTS.topK,
      relevanceFloor: retrieval.relevance_floor ?? BUILT_IN_DEFAULTS.relevanceFloor,
    },
    agent: {
      maxExtraSteps: agent.max_extra_steps ?? BUILT_IN_DEFAULTS.maxExtraSteps,
      maxRefinements: agent.max_refinements ?? BUILT_IN_DEFAULTS.maxRefinements,
      toolConcurrency: agent.tool_concurrency ?? BUILT_IN_DEFAULTS.toolConcurrency,
      toolTimeoutMs: agent.tool_timeout_ms ?? BUILT_IN_DEFAULTS.toolTimeoutMs,
      oracleTimeoutMs: agent.oracle_timeout_ms ?? BUILT_IN_DEFAULTS.oracleTimeoutMs,
      oracleRetries: agent.oracle_retries ?? BUILT_IN_DEFAULTS.oracleRetries,
      retryBaseMs: agent.retry_base_ms ?? BUILT_IN_DEFAULTS.retryBaseMs,
      issueLimit: agent.issue_limit ?? BUILT_IN_DEFAULTS.issueLimit,
      historySize: agent.history_size ?? BUILT_IN_DEFAULTS.historySize,
    },
  };
}
