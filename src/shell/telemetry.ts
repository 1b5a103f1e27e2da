import * as fs from "node:fs";
import * as path from "node:path";
import type { Intent, ResponseStatus } from "../core/types.js";
import type { AskResult } from "./orchestrator.js";

export type CommandTelemetryStatus = "ok" | "error";

/** What one answered (or unanswered) question cost. */
export interface RequestTelemetry {
  requestId: string;
  intent: Intent | null;
  status: ResponseStatus;
  errorCode: string | null;
  toolCalls: number;
  failedToolCalls: number;
  evidenceCount: number;
  citationCount: number;
  refinements: number;
}

export interface CommandTelemetryEvent {
  command: string;
  status: CommandTelemetryStatus;
  retryCount: number;
  durationMs: number;
  startedAt: string;
  finishedAt: string;
  errorClass?: string;
  requests: RequestTelemetry[];
}

/** REPO_CITE_TELEMETRY_PATH, resolved; null turns telemetry off. */
export function telemetryPathFromEnv(env: NodeJS.ProcessEnv = process.env): string | null {
  const configured = env.REPO_CITE_TELEMETRY_PATH?.trim();
  return configured ? path.resolve(configured) : null;
}

export function summarizeRequest(result: AskResult): RequestTelemetry {
  const { envelope } = result;
  const planningRounds = result.trace.filter((state) => state === "Planning").length;
  return {
    requestId: result.requestId,
    intent: envelope.intent,
    status: envelope.status,
    errorCode: envelope.error?.code ?? null,
    toolCalls: result.toolCalls.length,
    failedToolCalls: result.toolCalls.filter((call) => !call.success).length,
    evidenceCount: result.evidence.length,
    citationCount: envelope.citations.length,
    refinements: Math.max(0, planningRounds - 1),
  };
}

/**
 * Timing and per-request counters for one CLI command, appended as a single
 * JSONL event when the command finishes. Without a file path every method is
 * a no-op.
 */
export class CommandTelemetry {
  private readonly startedAtMs: number;
  private readonly requests: RequestTelemetry[] = [];
  private retryCount = 0;
  private finished = false;

  constructor(
    readonly command: string,
    private readonly filePath: string | null,
    private readonly now: () => number = Date.now,
  ) {
    this.startedAtMs = now();
  }

  get enabled(): boolean {
    return this.filePath !== null;
  }

  recordRetry(): void {
    this.retryCount++;
  }

  recordRequest(result: AskResult): void {
    if (!this.enabled) return;
    this.requests.push(summarizeRequest(result));
  }

  /** Writes the event; later calls are ignored. */
  finish(status: CommandTelemetryStatus, errorClass?: string): void {
    if (this.finished) return;
    this.finished = true;
    const filePath = this.filePath;
    if (!filePath) return;

    const finishedAtMs = this.now();
    const event: CommandTelemetryEvent = {
      command: this.command,
      status,
      retryCount: this.retryCount,
      durationMs: Math.max(0, finishedAtMs - this.startedAtMs),
      startedAt: new Date(this.startedAtMs).toISOString(),
      finishedAt: new Date(finishedAtMs).toISOString(),
      requests: this.requests,
    };
    if (errorClass) {
      event.errorClass = errorClass;
    }

    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.appendFileSync(filePath, `${JSON.stringify(event)}\n`, "utf-8");
    } catch {
      // Telemetry must never break command execution.
    }
  }
}
