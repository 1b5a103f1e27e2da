#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod/v4";
import { errorMessage } from "./core/errors.js";
import { citationLabel } from "./core/evidence.js";
import { DEFAULT_ISSUE_LIMIT } from "./core/planner.js";
import { ANSWER_MODES, SCOPES, type EvidenceItem, type ToolRequest } from "./core/types.js";
import { loadConfigOrDefaults, readSecrets } from "./shell/config-loader.js";
import { createSession } from "./shell/runtime.js";
import type { Session } from "./shell/session.js";

type ToolResult = { content: Array<{ type: "text"; text: string }>; isError?: boolean };

async function handleTool(fn: () => Promise<string>): Promise<ToolResult> {
  try {
    const text = await fn();
    return { content: [{ type: "text", text }] };
  } catch (err) {
    return { content: [{ type: "text", text: errorMessage(err) }], isError: true };
  }
}

function renderEvidence(items: EvidenceItem[]): string {
  if (items.length === 0) return "No results.";
  return items.map((item) => `[${item.id}] ${citationLabel(item)}\n${item.displayText}`).join("\n\n");
}

/** Runs a gateway request; failures become tool errors carrying the failure reason. */
async function runGatewayTool(session: Session, request: ToolRequest): Promise<ToolResult> {
  try {
    const { call, evidence } = await session.runTool(request);
    if (!call.outcome.ok) {
      return { content: [{ type: "text", text: `${call.outcome.error.reason}: ${call.outcome.error.message}` }], isError: true };
    }
    return { content: [{ type: "text", text: renderEvidence(evidence) }] };
  } catch (err) {
    return { content: [{ type: "text", text: errorMessage(err) }], isError: true };
  }
}

const codeHostArgs = {
  query: z.string().optional().describe("Substring matched against title and body"),
  state: z.enum(["open", "closed", "merged", "all"]).optional().describe("State filter (default open)"),
  labels: z.array(z.string()).optional().describe("Labels that must all be present"),
  limit: z.number().int().min(1).max(100).optional().describe("Maximum number of results"),
};

export function registerTools(server: McpServer, session: Session, issueLimit = DEFAULT_ISSUE_LIMIT): void {
  server.tool(
    "search_repo",
    "Rank repository chunks and file summaries for a query",
    {
      query: z.string().describe("Search terms"),
      path_glob: z.string().optional().describe("Only paths matching this glob"),
      language: z.string().optional().describe("Only files of this language"),
      docs_only: z.boolean().optional(),
      code_only: z.boolean().optional(),
      top_k: z.number().int().positive().optional(),
    },
    ({ query, path_glob, language, docs_only, code_only, top_k }) =>
      runGatewayTool(session, {
        tool: "search_repo",
        query,
        filters: { pathGlob: path_glob, language, docsOnly: docs_only, codeOnly: code_only, topK: top_k },
      }),
  );

  server.tool(
    "open_file",
    "Read an exact inclusive line range of a repository file",
    {
      path: z.string().describe("Repository-relative path"),
      start_line: z.number().int().describe("First line, 1-based"),
      end_line: z.number().int().describe("Last line, inclusive"),
    },
    ({ path: filePath, start_line, end_line }) =>
      runGatewayTool(session, { tool: "open_file", path: filePath, startLine: start_line, endLine: end_line }),
  );

  server.tool("get_issue", "Look up issues on the configured code host", codeHostArgs, ({ query, state, labels, limit }) =>
    runGatewayTool(session, {
      tool: "get_issue",
      query: query ?? null,
      state: state ?? "open",
      labels: labels ?? [],
      limit: limit ?? issueLimit,
    }),
  );

  server.tool(
    "get_pull_requests",
    "Look up pull requests on the configured code host",
    codeHostArgs,
    ({ query, state, labels, limit }) =>
      runGatewayTool(session, {
        tool: "get_pull_requests",
        query: query ?? null,
        state: state ?? "open",
        labels: labels ?? [],
        limit: limit ?? issueLimit,
      }),
  );

  server.tool(
    "ask",
    "Answer a question about the repository with citations to gathered evidence",
    {
      question: z.string().describe("The question"),
      mode: z.enum(ANSWER_MODES).optional().describe("Kind of answer wanted"),
      scope: z.enum(SCOPES).optional().describe("files-only leaves issues and pull requests out"),
    },
    ({ question, mode, scope }) =>
      handleTool(async () => {
        const result = await session.ask(question, { mode, scope });
        return JSON.stringify(result.envelope, null, 2);
      }),
  );
}

async function main(): Promise<void> {
  const root = path.resolve(process.argv[2] ?? process.cwd());
  const config = await loadConfigOrDefaults(process.env["REPO_CITE_CONFIG"]);
  const session = createSession(config, readSecrets(), { log: (msg) => process.stderr.write(`${msg}\n`) });
  const { index } = await session.ingest(root);
  process.stderr.write(`repo-cite: indexed ${index.repository.fileCount} files from ${root}\n`);

  const server = new McpServer({ name: "repo-cite", version: "0.1.0" });
  registerTools(server, session, config.agent.issueLimit);
  await server.connect(new StdioServerTransport());
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err) => {
    process.stderr.write(`repo-cite MCP server error: ${errorMessage(err)}\n`);
    process.exit(1);
  });
}
