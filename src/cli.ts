#!/usr/bin/env node
import "dotenv/config";
import { Command, Option } from "commander";
import { realpathSync } from "node:fs";
import * as readline from "node:readline/promises";
import { fileURLToPath } from "node:url";
import { ConfigError } from "./core/config.js";
import { formatEvalReport } from "./core/eval.js";
import { citationLabel } from "./core/evidence.js";
import { formatEnvelope } from "./core/response.js";
import { renderTree } from "./core/tree.js";
import { ANSWER_MODES, SCOPES, type AnswerMode, type Config, type Scope, type SearchFilters } from "./core/types.js";
import { loadConfigOrDefaults, readSecrets, type Secrets } from "./shell/config-loader.js";
import { runEvalFromFile } from "./shell/eval-runner.js";
import type { IngestionResult } from "./shell/indexer.js";
import { createSession } from "./shell/runtime.js";
import type { Session, SessionOptions } from "./shell/session.js";
import { CommandTelemetry, telemetryPathFromEnv } from "./shell/telemetry.js";

type OutputFormat = "text" | "json";

interface CommonOpts {
  config?: string;
  output: OutputFormat;
  tags: boolean;
}

interface IndexOpts extends CommonOpts {
  tree?: string | boolean;
}

interface SearchOpts extends CommonOpts {
  glob?: string;
  language?: string;
  docsOnly?: boolean;
  codeOnly?: boolean;
  topK?: string;
}

interface AskOpts extends CommonOpts {
  mode?: AnswerMode;
  scope: Scope;
  chat?: boolean;
  verbose?: boolean;
}

interface EvalOpts extends CommonOpts {
  k: string;
  search?: boolean;
  maxTasks?: string;
  mode?: AnswerMode;
  scope: Scope;
}

export interface CliDeps {
  loadConfig: (configPath: string | undefined) => Promise<Config>;
  secrets: () => Secrets;
  makeSession: (config: Config, secrets: Secrets, extra: Omit<SessionOptions, "config" | "engine" | "codeHost">) => Session;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  input: NodeJS.ReadableStream;
  /** Where command telemetry goes; null turns it off. */
  telemetryPath: () => string | null;
}

const defaultDeps: CliDeps = {
  loadConfig: (configPath) => loadConfigOrDefaults(configPath),
  secrets: () => readSecrets(),
  makeSession: createSession,
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  input: process.stdin,
  telemetryPath: () => telemetryPathFromEnv(),
};

// --- Helpers ---

function parsePositiveInt(raw: string | undefined, label: string): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`${label} must be a positive integer, got "${raw}"`);
  return n;
}

function describeError(err: unknown): string {
  if (err instanceof ConfigError) return err.message;
  return `Error: ${err instanceof Error ? err.message : String(err)}`;
}

function summarizeIngestion(result: IngestionResult): string[] {
  const { repository } = result.index;
  const { report } = result;
  const lines = [`Indexed ${repository.fileCount} files (${repository.chunkCount} chunks) from ${repository.rootPath}`];
  if (report.metadataOnly > 0) lines.push(`  ${report.metadataOnly} binary or oversized file(s) recorded without content`);
  if (report.taggedFiles > 0 || report.tagFailures > 0) {
    lines.push(`  Tagged ${report.taggedFiles} file(s) and ${report.taggedDirectories} director(ies); ${report.tagFailures} tag(s) missing`);
  }
  for (const skipped of report.skipped) lines.push(`  Skipped ${skipped.path}: ${skipped.reason}`);
  return lines;
}

function parseKValues(raw: string): number[] {
  const values = raw.split(",").map((part) => {
    const n = Number(part.trim());
    if (!Number.isInteger(n) || n <= 0) throw new Error(`--k must list positive integers, got "${raw}"`);
    return n;
  });
  return [...new Set(values)].sort((a, b) => a - b);
}

async function openSession(deps: CliDeps, opts: CommonOpts, telemetry: CommandTelemetry): Promise<Session> {
  const loaded = await deps.loadConfig(opts.config);
  const config: Config = { ...loaded, indexing: { ...loaded.indexing, tags: loaded.indexing.tags && opts.tags } };
  return deps.makeSession(config, deps.secrets(), { log: deps.stderr, onRetry: () => telemetry.recordRetry() });
}

async function runCommand(name: string, deps: CliDeps, fn: (telemetry: CommandTelemetry) => Promise<void>): Promise<void> {
  const telemetry = new CommandTelemetry(name, deps.telemetryPath());
  try {
    await fn(telemetry);
    telemetry.finish(process.exitCode ? "error" : "ok");
  } catch (err) {
    telemetry.finish("error", err instanceof Error ? err.name : "Error");
    deps.stderr(describeError(err));
    process.exitCode = 1;
  }
}

function withCommonOptions(command: Command): Command {
  return command
    .option("--config <path>", "Config file path (default: ./repo-cite.yaml when present)")
    .addOption(new Option("--output <format>", "Output format").choices(["text", "json"]).default("text"))
    .option("--no-tags", "Skip generating file and directory descriptions");
}

async function askOnce(session: Session, question: string, opts: AskOpts, deps: CliDeps, telemetry: CommandTelemetry): Promise<void> {
  const result = await session.ask(question, { mode: opts.mode, scope: opts.scope });
  telemetry.recordRequest(result);
  if (opts.verbose) {
    deps.stderr(`[${result.requestId}] ${result.trace.join(" -> ")}`);
    for (const call of result.toolCalls) {
      deps.stderr(`  ${call.id} ${call.name} ${call.success ? "ok" : `failed: ${call.error?.message ?? ""}`}`);
    }
  }
  deps.stdout(opts.output === "json" ? JSON.stringify(result.envelope, null, 2) : formatEnvelope(result.envelope));
  if (result.envelope.status === "failed") process.exitCode = 1;
}

const CHAT_HELP = 'Chat mode. "/reset" clears the history, "/mode <mode>" and "/scope <scope>" switch settings, "exit" leaves.';

/** Handles a chat slash command; returns false for lines that are questions. */
function chatCommand(line: string, session: Session, opts: AskOpts, deps: CliDeps): boolean {
  const [command, ...rest] = line.split(/\s+/);
  const value = rest.join(" ");
  switch (command) {
    case "/reset":
      session.reset();
      deps.stdout("History cleared.");
      return true;
    case "/mode": {
      if (value === "auto") {
        opts.mode = undefined;
      } else {
        const mode = ANSWER_MODES.find((m) => m === value);
        if (!mode) {
          deps.stdout(`Unknown mode "${value}". Choose one of: auto, ${ANSWER_MODES.join(", ")}`);
          return true;
        }
        opts.mode = mode;
      }
      deps.stdout(`Mode: ${opts.mode ?? "auto"}`);
      return true;
    }
    case "/scope": {
      const scope = SCOPES.find((s) => s === value);
      if (!scope) {
        deps.stdout(`Unknown scope "${value}". Choose one of: ${SCOPES.join(", ")}`);
        return true;
      }
      opts.scope = scope;
      deps.stdout(`Scope: ${scope}`);
      return true;
    }
    default:
      return false;
  }
}

// --- Program ---

export function createProgram(overrides: Partial<CliDeps> = {}): Command {
  const deps: CliDeps = { ...defaultDeps, ...overrides };
  const program = new Command();
  program.name("repo-cite").description("Evidence-grounded answers about a local repository").version("0.1.0");

  withCommonOptions(
    program
      .command("index <repo>")
      .description("Index a repository and report what was included")
      .option("--tree [depth]", "Print the directory outline with descriptions"),
  ).action((repo: string, opts: IndexOpts) =>
    runCommand("index", deps, async (telemetry) => {
      const session = await openSession(deps, opts, telemetry);
      try {
        const result = await session.ingest(repo);
        if (opts.output === "json") {
          deps.stdout(JSON.stringify({ repository: result.index.repository, report: result.report }, null, 2));
          return;
        }
        deps.stdout(summarizeIngestion(result).join("\n"));
        if (opts.tree) {
          const depth = typeof opts.tree === "string" ? parsePositiveInt(opts.tree, "--tree") : undefined;
          deps.stdout(renderTree(result.index.tree, depth ?? 2).join("\n"));
        }
      } finally {
        session.destroy();
      }
    }),
  );

  withCommonOptions(
    program
      .command("search <repo> <query>")
      .description("Rank repository chunks for a query without asking the model")
      .option("--glob <pattern>", "Only paths matching this glob")
      .option("--language <name>", "Only files of this language")
      .option("--docs-only", "Only documentation files")
      .option("--code-only", "Only source files")
      .option("--top-k <n>", "Number of results"),
  ).action((repo: string, query: string, opts: SearchOpts) =>
    runCommand("search", deps, async (telemetry) => {
      const filters: SearchFilters = {
        pathGlob: opts.glob,
        language: opts.language,
        docsOnly: opts.docsOnly,
        codeOnly: opts.codeOnly,
        topK: parsePositiveInt(opts.topK, "--top-k"),
      };
      const session = await openSession(deps, opts, telemetry);
      try {
        await session.ingest(repo);
        const { call, evidence } = await session.runTool({ tool: "search_repo", query, filters });
        if (!call.outcome.ok) {
          deps.stderr(`Error (${call.outcome.error.reason}): ${call.outcome.error.message}`);
          process.exitCode = 1;
          return;
        }
        if (opts.output === "json") {
          deps.stdout(JSON.stringify(call.hits, null, 2));
          return;
        }
        if (evidence.length === 0) {
          deps.stdout("No matches.");
          return;
        }
        deps.stdout(evidence.map((item, i) => `${i + 1}. ${citationLabel(item)}  score ${item.score.toFixed(2)}  [${item.id}]`).join("\n"));
      } finally {
        session.destroy();
      }
    }),
  );

  withCommonOptions(
    program
      .command("ask <repo> [question]")
      .description("Answer a question with citations to repository evidence")
      .addOption(new Option("--mode <mode>", "Kind of answer wanted").choices(ANSWER_MODES))
      .addOption(new Option("--scope <scope>", "Evidence scope").choices(SCOPES).default("include-pr"))
      .option("--chat", "Keep asking follow-up questions in one session")
      .option("--verbose", "Print the state trace and tool calls to stderr"),
  ).action((repo: string, question: string | undefined, opts: AskOpts) =>
    runCommand("ask", deps, async (telemetry) => {
      if (!question && !opts.chat) {
        deps.stderr("Usage: repo-cite ask <repo> <question>");
        deps.stderr("       repo-cite ask <repo> --chat");
        process.exitCode = 1;
        return;
      }
      const session = await openSession(deps, opts, telemetry);
      try {
        const ingestion = await session.ingest(repo);
        if (ingestion.report.partial) deps.stderr(summarizeIngestion(ingestion).join("\n"));
        if (question) await askOnce(session, question, opts, deps, telemetry);
        if (!opts.chat) return;

        deps.stdout(CHAT_HELP);
        const rl = readline.createInterface({ input: deps.input, terminal: false });
        try {
          for await (const line of rl) {
            const trimmed = line.trim();
            if (trimmed === "exit" || trimmed === "quit") break;
            if (!trimmed) continue;
            if (chatCommand(trimmed, session, opts, deps)) continue;
            await askOnce(session, trimmed, opts, deps, telemetry);
          }
        } finally {
          rl.close();
        }
      } finally {
        session.destroy();
      }
    }),
  );

  withCommonOptions(
    program
      .command("eval <repo> <tasks>")
      .description("Score retrieval against a JSONL file of labelled questions")
      .option("--k <list>", "Comma-separated cutoffs for precision, recall and nDCG", "1,5,10")
      .option("--search", "Rank with search_repo alone instead of asking the model")
      .option("--max-tasks <n>", "Run only the first n tasks")
      .addOption(new Option("--mode <mode>", "Answer mode for tasks that name none").choices(ANSWER_MODES))
      .addOption(new Option("--scope <scope>", "Evidence scope for tasks that name none").choices(SCOPES).default("include-pr")),
  ).action((repo: string, tasksPath: string, opts: EvalOpts) =>
    runCommand("eval", deps, async (telemetry) => {
      const kValues = parseKValues(opts.k);
      const maxTasks = parsePositiveInt(opts.maxTasks, "--max-tasks");
      const session = await openSession(deps, opts, telemetry);
      try {
        await session.ingest(repo);
        const run = await runEvalFromFile(session, tasksPath, {
          kind: opts.search ? "search" : "ask",
          kValues,
          maxTasks,
          mode: opts.mode,
          scope: opts.scope,
          onAsk: (result) => telemetry.recordRequest(result),
          onTask: (result, index, total) =>
            deps.stderr(`[${index}/${total}] ${result.taskId} -> ${result.error ? `error: ${result.error}` : (result.status ?? "ranked")}`),
        });
        deps.stdout(opts.output === "json" ? JSON.stringify(run, null, 2) : formatEvalReport(run));
      } finally {
        session.destroy();
      }
    }),
  );

  return program;
}

// The bin entry is usually a symlink to this file.
const entry = process.argv[1];
if (entry && realpathSync(entry) === fileURLToPath(import.meta.url)) {
  createProgram()
    .parseAsync()
    .catch((err: unknown) => {
      console.error(describeError(err));
      process.exit(1);
    });
}
