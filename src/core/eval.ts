import { z } from "zod/v4";
import { ANSWER_MODES, SCOPES, type AnswerMode, type EvidenceItem, type ResponseStatus, type Scope } from "./types.js";

/**
 * One labelled question. `relevant` lists the evidence keys a good answer
 * draws on: repository paths, `issue #N` or `pull request #N`.
 */
export interface EvalTask {
  id: string;
  question: string;
  relevant: string[];
  /** Graded relevance for nDCG; defaults to 1 for every relevant key. */
  grades: Record<string, number>;
  mode?: AnswerMode;
  scope?: Scope;
}

export interface ScoresAtK {
  k: number;
  precision: number;
  recall: number;
  ndcg: number;
}

export interface EvalTaskResult {
  taskId: string;
  question: string;
  /** Null when the task ran as a plain search. */
  status: ResponseStatus | null;
  error: string | null;
  ranked: string[];
  scores: ScoresAtK[];
}

export interface EvalSummary {
  totalTasks: number;
  answeredTasks: number;
  failedTasks: number;
  meanScores: ScoresAtK[];
}

export interface EvalRun {
  results: EvalTaskResult[];
  summary: EvalSummary;
}

const taskSchema = z.object({
  id: z.string().min(1).optional(),
  question: z.string().trim().min(1),
  relevant: z.array(z.string().min(1)),
  grades: z.record(z.string(), z.number().nonnegative()).optional(),
  mode: z.enum(ANSWER_MODES).optional(),
  scope: z.enum(SCOPES).optional(),
});

export class EvalTaskFileError extends Error {
  constructor(
    public readonly line: number,
    details: string,
  ) {
    super(`Task file line ${line}: ${details}`);
    this.name = "EvalTaskFileError";
  }
}

/** Parses a JSONL task file. Blank lines are skipped; tasks without an id get `task_<n>`. */
export function parseEvalTasks(raw: string): EvalTask[] {
  const tasks: EvalTask[] = [];
  raw.split(/\r?\n/).forEach((line, i) => {
    if (line.trim() === "") return;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      throw new EvalTaskFileError(i + 1, "not valid JSON");
    }
    const parsed = taskSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      throw new EvalTaskFileError(i + 1, `${where}${issue?.message ?? "invalid task"}`);
    }
    const task = parsed.data;
    tasks.push({
      id: task.id ?? `task_${tasks.length + 1}`,
      question: task.question,
      relevant: task.relevant,
      grades: task.grades ?? {},
      mode: task.mode,
      scope: task.scope,
    });
  });
  return tasks;
}

/** The key an evidence item is judged by. */
export function relevanceKey(item: EvidenceItem): string {
  const source = item.source;
  switch (source.kind) {
    case "chunk":
    case "file_summary":
      return source.path;
    case "issue":
      return `issue #${source.number}`;
    case "pull_request":
      return `pull request #${source.number}`;
  }
}

/** Relevance keys in rank order, first occurrence wins. */
export function rankedKeys(items: readonly EvidenceItem[]): string[] {
  return [...new Set(items.map(relevanceKey))];
}

/** Cited evidence in citation order, then everything else in the order it was gathered. */
export function citedFirst(citationIds: readonly string[], evidence: readonly EvidenceItem[]): EvidenceItem[] {
  const byId = new Map(evidence.map((item) => [item.id, item]));
  const cited = citationIds.flatMap((id) => {
    const item = byId.get(id);
    return item ? [item] : [];
  });
  const citedIds = new Set(cited.map((item) => item.id));
  return [...cited, ...evidence.filter((item) => !citedIds.has(item.id))];
}

export function precisionAtK(ranked: readonly string[], relevant: ReadonlySet<string>, k: number): number {
  const top = ranked.slice(0, k);
  if (top.length === 0) return 0;
  return top.filter((key) => relevant.has(key)).length / top.length;
}

export function recallAtK(ranked: readonly string[], relevant: ReadonlySet<string>, k: number): number {
  if (relevant.size === 0) return 0;
  return ranked.slice(0, k).filter((key) => relevant.has(key)).length / relevant.size;
}

function dcgAtK(ranked: readonly string[], grades: Readonly<Record<string, number>>, k: number): number {
  return ranked.slice(0, k).reduce((sum, key, i) => sum + (2 ** (grades[key] ?? 0) - 1) / Math.log2(i + 2), 0);
}

/** Exponential-gain nDCG; 0 when nothing is graded above zero. */
export function ndcgAtK(ranked: readonly string[], grades: Readonly<Record<string, number>>, k: number): number {
  const ideal = Object.keys(grades).sort((a, b) => (grades[b] ?? 0) - (grades[a] ?? 0));
  const idealDcg = dcgAtK(ideal, grades, k);
  if (idealDcg === 0) return 0;
  return dcgAtK(ranked, grades, k) / idealDcg;
}

function gradesFor(task: EvalTask): Record<string, number> {
  if (Object.keys(task.grades).length > 0) return task.grades;
  return Object.fromEntries(task.relevant.map((key) => [key, 1]));
}

export function scoreTask(
  task: EvalTask,
  ranked: string[],
  kValues: readonly number[],
  outcome: { status: ResponseStatus | null; error: string | null },
): EvalTaskResult {
  const relevant = new Set(task.relevant);
  const grades = gradesFor(task);
  return {
    taskId: task.id,
    question: task.question,
    status: outcome.status,
    error: outcome.error,
    ranked,
    scores: kValues.map((k) => ({
      k,
      precision: precisionAtK(ranked, relevant, k),
      recall: recallAtK(ranked, relevant, k),
      ndcg: ndcgAtK(ranked, grades, k),
    })),
  };
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function computeEvalSummary(results: EvalTaskResult[], kValues: readonly number[]): EvalSummary {
  const scoresAt = (k: number) => results.flatMap((result) => result.scores.filter((s) => s.k === k));
  return {
    totalTasks: results.length,
    answeredTasks: results.filter((result) => result.status === "answered").length,
    failedTasks: results.filter((result) => result.error !== null).length,
    meanScores: kValues.map((k) => {
      const at = scoresAt(k);
      return {
        k,
        precision: mean(at.map((s) => s.precision)),
        recall: mean(at.map((s) => s.recall)),
        ndcg: mean(at.map((s) => s.ndcg)),
      };
    }),
  };
}

export function formatEvalReport(run: EvalRun): string {
  const { summary } = run;
  const lines = ["Evaluation results:", `  Tasks: ${summary.totalTasks}`];
  if (run.results.some((result) => result.status !== null)) {
    lines.push(`  Answered: ${summary.answeredTasks}`);
  }
  lines.push(`  Failed: ${summary.failedTasks}`);
  for (const s of summary.meanScores) {
    lines.push(`  @${s.k}: precision ${s.precision.toFixed(3)}  recall ${s.recall.toFixed(3)}  nDCG ${s.ndcg.toFixed(3)}`);
  }

  const failed = run.results.filter((result) => result.error !== null);
  if (failed.length > 0) {
    lines.push("");
    lines.push("Failed tasks:");
    for (const result of failed) {
      lines.push(`  - ${result.taskId}: ${result.error ?? ""}`);
    }
  }
  return lines.join("\n");
}
