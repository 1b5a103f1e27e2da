import { randomUUID } from "node:crypto";
import pLimit from "p-limit";
import { orderByEvidence, validateCitations } from "../core/citations.js";
import {
  CitationStaleError,
  ClassificationError,
  errorMessage,
  InvalidRequestError,
  RepoCiteError,
  RequestCancelledError,
  ToolGatewayExhaustedError,
} from "../core/errors.js";
import { citationLabel, EvidenceSet, type EvidenceStore } from "../core/evidence.js";
import { parseIntentReply } from "../core/intent.js";
import {
  appendExtraSteps,
  HARD_TOOL_CALL_CAP,
  parseProposedSteps,
  refinePlan,
  stepIdFactory,
  templatePlan,
  type PlanOptions,
} from "../core/planner.js";
import { answeredEnvelope, failedEnvelope, insufficientEnvelope, toCitation } from "../core/response.js";
import { StateTrace, type OrchestratorState } from "../core/state-machine.js";
import { isSufficient, relevantEvidence, type SufficiencyInput } from "../core/sufficiency.js";
import type {
  AgentConfig,
  AnswerMode,
  EvidenceItem,
  Intent,
  Plan,
  PlanStep,
  ResponseEnvelope,
  RetrievalConfig,
  Scope,
  ToolCallRecord,
} from "../core/types.js";
import type { ReasoningEnginePort } from "../ports/reasoning-engine.js";
import { callOracle, type OracleCallOptions } from "./oracle.js";
import type { ExecutedCall, SearchHit, ToolGateway } from "./tool-gateway.js";

/** Lines of surrounding context added when a search hit is opened. */
export const OPEN_CONTEXT_LINES = 5;

export interface AskRequest {
  query: string;
  mode?: AnswerMode;
  scope?: Scope;
  /** Earlier queries of the session, oldest first. */
  history?: string[];
  signal?: AbortSignal;
}

export interface AskResult {
  envelope: ResponseEnvelope;
  requestId: string;
  trace: readonly OrchestratorState[];
  plan: Plan;
  toolCalls: ToolCallRecord[];
  evidence: EvidenceItem[];
}

export interface OrchestratorDeps {
  store: EvidenceStore;
  gateway: ToolGateway;
  engine: ReasoningEnginePort;
  agent: AgentConfig;
  retrieval: RetrievalConfig;
  windowLines: number;
  log?: (msg: string) => void;
  onRetry?: () => void;
  sleep?: (ms: number) => Promise<void>;
  newRequestId?: () => string;
}

type StepOutcome = { step: PlanStep; calls: ExecutedCall[] };

/** State of one request from classification to its terminal outcome. */
class RequestRun {
  readonly trace = new StateTrace();
  readonly requestId: string;
  readonly set: EvidenceSet;
  readonly notes: string[] = [];
  readonly toolCalls: ToolCallRecord[] = [];
  readonly plan: PlanStep[] = [];
  intent: Intent | null = null;
  private readonly stepResults = new Map<string, StepOutcome>();
  private readonly opened = new Set<string>();
  private callsUsed = 0;
  private nextCall = 1;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly request: AskRequest,
  ) {
    this.requestId = (deps.newRequestId ?? randomUUID)();
    this.set = new EvidenceSet(deps.store, this.requestId);
  }

  get scope(): Scope {
    return this.request.scope ?? "include-pr";
  }

  get remainingCalls(): number {
    return HARD_TOOL_CALL_CAP - this.callsUsed;
  }

  oracleOptions(): OracleCallOptions {
    return {
      timeoutMs: this.deps.agent.oracleTimeoutMs,
      retries: this.deps.agent.oracleRetries,
      retryBaseMs: this.deps.agent.retryBaseMs,
      signal: this.request.signal,
      sleep: this.deps.sleep,
      onRetry: (attempt, error) => {
        this.deps.log?.(`Retrying after ${error.code} (attempt ${attempt + 1})`);
        this.deps.onRetry?.();
      },
    };
  }

  checkCancelled(): void {
    if (this.request.signal?.aborted) throw new RequestCancelledError(this.trace.state);
  }

  to(state: OrchestratorState): void {
    this.checkCancelled();
    this.trace.to(state);
  }

  private toolCallId(): string {
    return `${this.requestId}:tc${this.nextCall++}`;
  }

  private async call(step: PlanStep & { kind: "call" }): Promise<ExecutedCall> {
    return this.deps.gateway.execute(step.request, {
      requestId: this.requestId,
      toolCallId: this.toolCallId(),
      signal: this.request.signal,
    });
  }

  private openRange(hit: SearchHit): { startLine: number; endLine: number } | null {
    const file = this.deps.store.repositoryIndex?.files.get(hit.path);
    if (!file || file.lineCount === 0) return null;
    if (hit.kind === "file_summary") {
      return { startLine: 1, endLine: Math.min(file.lineCount, this.deps.windowLines) };
    }
    return {
      startLine: Math.max(1, hit.startLine - OPEN_CONTEXT_LINES),
      endLine: Math.min(file.lineCount, hit.endLine + OPEN_CONTEXT_LINES),
    };
  }

  /** Picks up to `count` hits of a finished search that no earlier step opened. */
  private pickHits(hits: SearchHit[], count: number): Array<{ hit: SearchHit; startLine: number; endLine: number }> {
    const picked: Array<{ hit: SearchHit; startLine: number; endLine: number }> = [];
    for (const hit of hits) {
      if (picked.length >= count) break;
      const key = `${hit.kind}:${hit.path}:${hit.startLine}`;
      if (this.opened.has(key)) continue;
      const range = this.openRange(hit);
      if (!range) continue;
      this.opened.add(key);
      picked.push({ hit, ...range });
    }
    return picked;
  }

  /**
   * Runs one round of steps. Budget is reserved in plan order before anything
   * starts; steps that do not fit are dropped with a note. Independent calls
   * share a p-limit pool; an `open_top_hits` step waits for its search outside
   * the pool. Results are merged into the evidence set in plan order once the
   * whole round has finished, and discarded if the request was cancelled.
   */
  async executeRound(steps: Plan): Promise<void> {
    const limit = pLimit(Math.max(1, this.deps.agent.toolConcurrency));
    let budget = this.remainingCalls;
    const admitted: Array<{ step: PlanStep; calls: number }> = [];
    for (const step of steps) {
      const wanted = step.kind === "call" ? 1 : step.count;
      const granted = Math.min(wanted, budget);
      if (granted === 0) {
        this.notes.push(`Skipped step ${step.id}: tool call budget of ${HARD_TOOL_CALL_CAP} reached`);
        continue;
      }
      budget -= granted;
      admitted.push({ step, calls: granted });
    }
    this.plan.push(...admitted.map(({ step }) => step));

    const running = new Map<string, Promise<StepOutcome>>();
    for (const { step, calls } of admitted) {
      if (step.kind === "call") {
        running.set(step.id, limit(() => this.call(step)).then((call) => ({ step, calls: [call] })));
        continue;
      }
      const predecessor = running.get(step.after);
      running.set(
        step.id,
        (async (): Promise<StepOutcome> => {
          const source = predecessor ? await predecessor : this.stepResults.get(step.after);
          const hits = source?.calls[0]?.hits ?? [];
          const targets = this.pickHits(hits, calls);
          const opened = await Promise.all(
            targets.map((target) =>
              limit(() =>
                this.deps.gateway.execute(
                  { tool: "open_file", path: target.hit.path, startLine: target.startLine, endLine: target.endLine },
                  { requestId: this.requestId, toolCallId: this.toolCallId(), signal: this.request.signal, score: target.hit.score },
                ),
              ),
            ),
          );
          return { step, calls: opened };
        })(),
      );
    }

    const outcomes = await Promise.all(admitted.map(({ step }) => running.get(step.id) ?? Promise.resolve({ step, calls: [] })));
    this.checkCancelled();

    for (const outcome of outcomes) {
      this.stepResults.set(outcome.step.id, outcome);
      for (const call of outcome.calls) {
        this.callsUsed++;
        this.toolCalls.push(call.record);
        if (call.outcome.ok) {
          for (const id of call.outcome.evidenceIds) this.set.add(id);
        } else {
          this.notes.push(`${call.record.name} failed (${call.outcome.error.reason}): ${call.outcome.error.message}`);
        }
      }
    }
  }

  /** Id of the most recent search step that ran. */
  lastSearchStepId(): string | null {
    for (let i = this.plan.length - 1; i >= 0; i--) {
      const step = this.plan[i];
      if (step?.kind === "call" && step.request.tool === "search_repo" && this.stepResults.has(step.id)) return step.id;
    }
    return null;
  }

  allCallsFailed(): boolean {
    return this.toolCalls.length > 0 && this.toolCalls.every((record) => !record.success);
  }

  sufficiencyInput(intent: Intent): SufficiencyInput {
    const index = this.deps.store.repositoryIndex;
    return {
      intent,
      items: this.set.items(),
      floor: this.deps.retrieval.relevanceFloor,
      categoryOf: (path) => index?.files.get(path)?.category ?? null,
    };
  }
}

/** Drives one request through the planner-executor state machine. */
export class Orchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async run(request: AskRequest): Promise<AskResult> {
    const run = new RequestRun(this.deps, request);
    let envelope: ResponseEnvelope;
    try {
      envelope = await this.drive(run, request);
    } catch (err) {
      if (!(err instanceof RepoCiteError)) throw err;
      // Cancelled requests report nothing they gathered.
      const partial = err instanceof RequestCancelledError ? [] : run.set.items().map(toCitation);
      run.trace.to("Failed");
      envelope = failedEnvelope(run.intent, err, partial, run.notes);
    }
    return {
      envelope,
      requestId: run.requestId,
      trace: run.trace.path,
      plan: run.plan,
      toolCalls: run.toolCalls,
      evidence: run.set.items(),
    };
  }

  private async classify(run: RequestRun, request: AskRequest): Promise<Intent> {
    try {
      return await callOracle(
        "classify",
        (signal) => this.deps.engine.classify({ query: request.query, mode: request.mode, history: request.history ?? [] }, signal),
        parseIntentReply,
        run.oracleOptions(),
      );
    } catch (err) {
      if (err instanceof RequestCancelledError || !(err instanceof RepoCiteError)) throw err;
      throw new ClassificationError(err);
    }
  }

  private async initialPlan(run: RequestRun, intent: Intent, request: AskRequest, nextId: () => string): Promise<Plan> {
    const options: PlanOptions = { scope: run.scope, issueLimit: this.deps.agent.issueLimit };
    const plan = templatePlan(intent, request.query, options, nextId);
    const { engine, agent } = this.deps;
    if (!engine.proposeSteps || agent.maxExtraSteps === 0) return plan;
    const propose = engine.proposeSteps.bind(engine);
    try {
      const extra = await callOracle(
        "propose steps",
        (signal) => propose({ query: request.query, intent, scope: run.scope, plan, maxExtraSteps: agent.maxExtraSteps }, signal),
        (reply) => parseProposedSteps(reply, agent.issueLimit),
        { ...run.oracleOptions(), retries: 0 },
      );
      return appendExtraSteps(plan, intent, extra, { scope: run.scope, maxExtraSteps: agent.maxExtraSteps }, nextId);
    } catch (err) {
      if (err instanceof RequestCancelledError || !(err instanceof RepoCiteError)) throw err;
      this.deps.log?.(`Step proposal skipped: ${errorMessage(err)}`);
      return plan;
    }
  }

  private async drive(run: RequestRun, request: AskRequest): Promise<ResponseEnvelope> {
    if (request.query.trim().length === 0) {
      throw new InvalidRequestError("The question is empty");
    }

    run.to("Classifying");
    const intent = await this.classify(run, request);
    run.intent = intent;

    run.to("Planning");
    const nextId = stepIdFactory();
    let steps = await this.initialPlan(run, intent, request, nextId);
    let refinements = 0;

    for (;;) {
      run.to("Executing");
      await run.executeRound(steps);

      run.to("Evaluating");
      if (run.allCallsFailed()) {
        throw new ToolGatewayExhaustedError(run.toolCalls.map((r) => `${r.name}: ${r.error?.message ?? "failed"}`));
      }
      if (isSufficient(run.sufficiencyInput(intent))) break;

      if (refinements >= this.deps.agent.maxRefinements || run.remainingCalls <= 0) {
        run.to("Insufficient");
        return insufficientEnvelope(intent, request.query, run.set.items().map(toCitation), run.notes);
      }
      refinements++;
      run.to("Planning");
      steps = refinePlan(
        {
          intent,
          query: request.query,
          options: { scope: run.scope, issueLimit: this.deps.agent.issueLimit },
          round: refinements,
          lastSearchStepId: run.lastSearchStepId(),
        },
        nextId,
      );
    }

    run.to("Synthesizing");
    return this.synthesize(run, request, intent);
  }

  private async synthesize(run: RequestRun, request: AskRequest, intent: Intent): Promise<ResponseEnvelope> {
    const items = run.set.items();
    const reply = await callOracle(
      "synthesize",
      (signal) =>
        this.deps.engine.synthesize(
          {
            query: request.query,
            intent,
            mode: request.mode,
            scope: run.scope,
            evidence: items.map((item) => ({ id: item.id, kind: item.kind, label: citationLabel(item), text: item.displayText })),
            notes: run.notes,
          },
          signal,
        ),
      (text) => (text.trim().length > 0 ? text : null),
      run.oracleOptions(),
    );
    run.checkCancelled();

    if (run.set.isStale()) {
      const first = items[0];
      throw new CitationStaleError(first?.id ?? "(none)", run.set.epoch, this.deps.store.epoch);
    }

    const check = validateCitations(reply, (id) => run.set.has(id) && run.set.resolve(id) !== null);
    if (check.rejected.length > 0) {
      run.notes.push(`Removed citations to unknown evidence: ${check.rejected.join(", ")}`);
    }
    if (check.valid.length === 0) {
      run.notes.push("The answer cited none of the gathered evidence");
      run.to("Insufficient");
      const partial = relevantEvidence(run.sufficiencyInput(intent));
      return insufficientEnvelope(intent, request.query, (partial.length > 0 ? partial : items).map(toCitation), run.notes);
    }

    const citations = orderByEvidence(check.valid, run.set.ids()).flatMap((id) => {
      const item = run.set.get(id);
      return item ? [toCitation(item)] : [];
    });
    run.to("Done");
    return answeredEnvelope({ intent, mode: request.mode, text: check.text, citations, notes: run.notes });
  }
}
