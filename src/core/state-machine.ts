export const ORCHESTRATOR_STATES = [
  "Idle",
  "Classifying",
  "Planning",
  "Executing",
  "Evaluating",
  "Synthesizing",
  "Done",
  "Insufficient",
  "Failed",
] as const;
export type OrchestratorState = (typeof ORCHESTRATOR_STATES)[number];

export const TERMINAL_STATES: ReadonlySet<OrchestratorState> = new Set(["Done", "Insufficient", "Failed"]);

const FORWARD: Record<OrchestratorState, readonly OrchestratorState[]> = {
  Idle: ["Classifying"],
  Classifying: ["Planning"],
  Planning: ["Executing"],
  Executing: ["Evaluating"],
  Evaluating: ["Planning", "Synthesizing"],
  Synthesizing: ["Done"],
  Done: [],
  Insufficient: [],
  Failed: [],
};

export function canTransition(from: OrchestratorState, to: OrchestratorState): boolean {
  if (TERMINAL_STATES.has(from)) return false;
  if (to === "Insufficient" || to === "Failed") return true;
  return FORWARD[from].includes(to);
}

export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: OrchestratorState,
    public readonly to: OrchestratorState,
  ) {
    super(`Invalid orchestrator transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export function transition(from: OrchestratorState, to: OrchestratorState): OrchestratorState {
  if (!canTransition(from, to)) throw new InvalidTransitionError(from, to);
  return to;
}

/** Records the path a request took; used for tests and `--verbose` output. */
export class StateTrace {
  private current: OrchestratorState = "Idle";
  private readonly history: OrchestratorState[] = ["Idle"];

  get state(): OrchestratorState {
    return this.current;
  }

  get path(): readonly OrchestratorState[] {
    return this.history;
  }

  get terminal(): boolean {
    return TERMINAL_STATES.has(this.current);
  }

  to(next: OrchestratorState): void {
    this.current = transition(this.current, next);
    this.history.push(next);
  }
}
