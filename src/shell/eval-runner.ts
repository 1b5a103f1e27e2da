import * as fs from "node:fs/promises";
import {
  citedFirst,
  computeEvalSummary,
  parseEvalTasks,
  rankedKeys,
  scoreTask,
  type EvalRun,
  type EvalTask,
  type EvalTaskResult,
} from "../core/eval.js";
import type { AnswerMode, Scope } from "../core/types.js";
import type { AskResult } from "./orchestrator.js";
import type { Session } from "./session.js";

/** `ask` runs the full orchestrator; `search` ranks with search_repo alone and needs no engine. */
export type EvalRunKind = "ask" | "search";

export interface EvalRunOptions {
  kind: EvalRunKind;
  kValues: number[];
  maxTasks?: number;
  /** Used for tasks that do not name their own. */
  mode?: AnswerMode;
  scope?: Scope;
  onAsk?: (result: AskResult) => void;
  onTask?: (result: EvalTaskResult, index: number, total: number) => void;
}

function clampMaxTasks(maxTasks: number | undefined, taskCount: number): number {
  if (maxTasks === undefined) return taskCount;
  if (maxTasks < 0) return taskCount;
  return Math.min(maxTasks, taskCount);
}

async function runTask(session: Session, task: EvalTask, options: EvalRunOptions): Promise<EvalTaskResult> {
  if (options.kind === "search") {
    const topK = Math.max(...options.kValues);
    const { call, evidence } = await session.runTool({ tool: "search_repo", query: task.question, filters: { topK } });
    const error = call.outcome.ok ? null : `${call.outcome.error.reason}: ${call.outcome.error.message}`;
    return scoreTask(task, rankedKeys(evidence), options.kValues, { status: null, error });
  }

  const result = await session.ask(task.question, { mode: task.mode ?? options.mode, scope: task.scope ?? options.scope });
  options.onAsk?.(result);
  const { envelope } = result;
  const ranked = rankedKeys(citedFirst(envelope.citations.map((c) => c.id), result.evidence));
  return scoreTask(task, ranked, options.kValues, { status: envelope.status, error: envelope.error?.message ?? null });
}

/** Runs tasks one after another against an ingested session. History is cleared before each task. */
export async function runEvalTasks(session: Session, tasks: EvalTask[], options: EvalRunOptions): Promise<EvalRun> {
  const selected = tasks.slice(0, clampMaxTasks(options.maxTasks, tasks.length));
  const results: EvalTaskResult[] = [];
  for (const [i, task] of selected.entries()) {
    session.reset();
    const result = await runTask(session, task, options);
    results.push(result);
    options.onTask?.(result, i + 1, selected.length);
  }
  return { results, summary: computeEvalSummary(results, options.kValues) };
}

export async function runEvalFromFile(session: Session, filePath: string, options: EvalRunOptions): Promise<EvalRun> {
  const raw = await fs.readFile(filePath, "utf-8");
  return runEvalTasks(session, parseEvalTasks(raw), options);
}
