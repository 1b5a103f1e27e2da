import { z } from "zod/v4";
import type { CodeHostQuery, Intent, Plan, PlanStep, Scope, SearchFilters, ToolRequest } from "./types.js";

/** Upper bound on tool calls per request, counting every opened hit. */
export const HARD_TOOL_CALL_CAP = 6;
export const DEFAULT_MAX_EXTRA_STEPS = 2;
export const DEFAULT_MAX_REFINEMENTS = 2;
export const DEFAULT_ISSUE_LIMIT = 10;

export interface PlanOptions {
  scope: Scope;
  issueLimit: number;
}

/** Sequential step ids (`s1`, `s2`, …) shared by every round of one request. */
export function stepIdFactory(start = 1): () => string {
  let next = start;
  return () => `s${next++}`;
}

function codeHostQuery(query: string | null, state: CodeHostQuery["state"], limit: number): CodeHostQuery {
  return { query, state, labels: [], limit };
}

function call(nextId: () => string, intent: Intent, request: ToolRequest): PlanStep {
  return { kind: "call", id: nextId(), intent, request };
}

function searchWithHits(
  nextId: () => string,
  intent: Intent,
  query: string,
  filters: SearchFilters,
  count: number,
): Plan {
  const search = call(nextId, intent, { tool: "search_repo", query, filters });
  return [search, { kind: "open_top_hits", id: nextId(), intent, after: search.id, count }];
}

export function isCodeHostRequest(request: ToolRequest): boolean {
  return request.tool === "get_issue" || request.tool === "get_pull_requests";
}

/** Drops steps the scope does not allow. */
export function applyScope(plan: Plan, scope: Scope): Plan {
  if (scope === "include-pr") return plan;
  return plan.filter((step) => step.kind !== "call" || !isCodeHostRequest(step.request));
}

/** Tool calls a plan would spend if every step ran in full. */
export function plannedCallCount(plan: Plan): number {
  return plan.reduce((sum, step) => sum + (step.kind === "call" ? 1 : step.count), 0);
}

/**
 * The deterministic starting plan for an intent. Under `files-only` a plan
 * left with no steps falls back to a plain repository search.
 */
export function templatePlan(intent: Intent, query: string, options: PlanOptions, nextId: () => string): Plan {
  const { scope, issueLimit } = options;
  let plan: Plan;
  switch (intent) {
    case "location":
      plan = searchWithHits(nextId, intent, query, { codeOnly: true }, 2);
      break;
    case "overview":
      plan = searchWithHits(nextId, intent, query, {}, 2);
      break;
    case "prioritization":
      plan = scope === "files-only"
        ? []
        : [
            call(nextId, intent, { tool: "get_issue", ...codeHostQuery(null, "open", issueLimit) }),
            call(nextId, intent, { tool: "get_pull_requests", ...codeHostQuery(null, "open", issueLimit) }),
          ];
      break;
    case "suggestion":
      plan = [
        call(nextId, intent, { tool: "search_repo", query, filters: {} }),
        ...(scope === "files-only"
          ? []
          : [
              call(nextId, intent, { tool: "get_issue", ...codeHostQuery(null, "open", issueLimit) }),
              call(nextId, intent, { tool: "get_pull_requests", ...codeHostQuery(null, "open", issueLimit) }),
            ]),
      ];
      break;
    case "patch":
      plan = searchWithHits(nextId, intent, query, { codeOnly: true }, 1);
      break;
  }
  plan = applyScope(plan, scope);
  if (plan.length === 0) {
    plan = [call(nextId, intent, { tool: "search_repo", query, filters: {} })];
  }
  return plan;
}

export interface RefinementContext {
  intent: Intent;
  query: string;
  options: PlanOptions;
  /** 1-based refinement round. */
  round: number;
  /** Id of the most recent search step, if any round ran one. */
  lastSearchStepId: string | null;
}

/**
 * Steps for a refinement round. The first round drops search filters (or
 * widens issue and pull request states to `all`); later rounds open more
 * hits of the last search.
 */
export function refinePlan(context: RefinementContext, nextId: () => string): Plan {
  const { intent, query, options, round, lastSearchStepId } = context;
  if (round === 1) {
    if (intent === "prioritization" && options.scope === "include-pr") {
      return [
        call(nextId, intent, { tool: "get_issue", ...codeHostQuery(null, "all", options.issueLimit) }),
        call(nextId, intent, { tool: "get_pull_requests", ...codeHostQuery(null, "all", options.issueLimit) }),
      ];
    }
    return searchWithHits(nextId, intent, query, {}, 1);
  }
  if (lastSearchStepId === null) {
    return [call(nextId, intent, { tool: "search_repo", query, filters: {} })];
  }
  return [{ kind: "open_top_hits", id: nextId(), intent, after: lastSearchStepId, count: 2 }];
}

const stateSchema = z.enum(["open", "closed", "merged", "all"]);

const codeHostFields = {
  query: z.string().nullable().optional(),
  state: stateSchema.optional(),
  labels: z.array(z.string()).optional(),
  limit: z.number().int().min(1).max(100).optional(),
};

const proposedStepSchema = z.discriminatedUnion("tool", [
  z.object({
    tool: z.literal("search_repo"),
    query: z.string().min(1),
    path_glob: z.string().optional(),
    language: z.string().optional(),
    docs_only: z.boolean().optional(),
    code_only: z.boolean().optional(),
  }),
  z.object({
    tool: z.literal("open_file"),
    path: z.string().min(1),
    start_line: z.number().int().min(1),
    end_line: z.number().int().min(1),
  }),
  z.object({ tool: z.literal("get_issue"), ...codeHostFields }),
  z.object({ tool: z.literal("get_pull_requests"), ...codeHostFields }),
]);

type ProposedStep = z.infer<typeof proposedStepSchema>;

function toRequest(step: ProposedStep, issueLimit: number): ToolRequest {
  switch (step.tool) {
    case "search_repo": {
      const filters: SearchFilters = {};
      if (step.path_glob) filters.pathGlob = step.path_glob;
      if (step.language) filters.language = step.language;
      if (step.docs_only) filters.docsOnly = true;
      else if (step.code_only) filters.codeOnly = true;
      return { tool: "search_repo", query: step.query, filters };
    }
    case "open_file":
      return { tool: "open_file", path: step.path, startLine: step.start_line, endLine: step.end_line };
    case "get_issue":
    case "get_pull_requests":
      return {
        tool: step.tool,
        query: step.query ?? null,
        state: step.state ?? "open",
        labels: step.labels ?? [],
        limit: step.limit ?? issueLimit,
      };
  }
}

function extractJsonArray(reply: string): unknown {
  const start = reply.indexOf("[");
  const end = reply.lastIndexOf("]");
  if (start === -1 || end <= start) return undefined;
  try {
    return JSON.parse(reply.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

/**
 * Reads extra steps proposed by the reasoning engine: a JSON array of
 * `{ "tool": …, … }` objects. Entries that do not validate are dropped.
 */
export function parseProposedSteps(reply: string, issueLimit = DEFAULT_ISSUE_LIMIT): ToolRequest[] {
  const raw = extractJsonArray(reply);
  if (!Array.isArray(raw)) return [];
  const requests: ToolRequest[] = [];
  for (const entry of raw) {
    const parsed = proposedStepSchema.safeParse(entry);
    if (parsed.success) requests.push(toRequest(parsed.data, issueLimit));
  }
  return requests;
}

export interface ExtraStepLimits {
  scope: Scope;
  maxExtraSteps: number;
}

/**
 * Appends proposed requests to a plan, honouring the scope, the extra-step
 * allowance and the hard tool-call cap.
 */
export function appendExtraSteps(
  plan: Plan,
  intent: Intent,
  requests: ToolRequest[],
  limits: ExtraStepLimits,
  nextId: () => string,
): Plan {
  const allowed = requests.filter((request) => limits.scope === "include-pr" || !isCodeHostRequest(request));
  const room = Math.max(0, Math.min(limits.maxExtraSteps, HARD_TOOL_CALL_CAP - plannedCallCount(plan)));
  return [...plan, ...allowed.slice(0, room).map((request) => call(nextId, intent, request))];
}
