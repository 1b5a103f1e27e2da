import { citationLabel } from "./evidence.js";
import type { RepoCiteError } from "./errors.js";
import type { AnswerMode, Citation, EvidenceItem, Intent, ResponseEnvelope } from "./types.js";

export function toCitation(item: EvidenceItem): Citation {
  return { id: item.id, kind: item.kind, label: citationLabel(item) };
}

/** Splits a unified diff out of an answer: a fenced `diff` block, else raw `---`/`+++` lines onward. */
export function extractPatch(text: string): { patch: string | null; rest: string } {
  const fenced = /```diff\n([\s\S]*?)```/.exec(text);
  if (fenced) {
    const rest = text.slice(0, fenced.index) + text.slice(fenced.index + fenced[0].length);
    return { patch: (fenced[1] ?? "").trim(), rest: rest.trim() };
  }
  const lines = text.split("\n");
  const start = lines.findIndex((line) => line.startsWith("--- ") || line.startsWith("+++ "));
  if (start === -1) return { patch: null, rest: text };
  return { patch: lines.slice(start).join("\n"), rest: lines.slice(0, start).join("\n") };
}

const NEXT_ACTIONS_HEADING =
  /(?:Next Actions?|Next Steps?|Suggested Steps?|Recommendations?)[ \t]*:?[ \t]*\*{0,2}[ \t]*\n((?:[ \t]*[-*\d•].*(?:\n|$))+)/i;

/** Pulls a "Next Actions" (or "Next Steps") list out of an answer. */
export function extractNextActions(text: string): { actions: string[]; rest: string } {
  const match = NEXT_ACTIONS_HEADING.exec(text);
  if (!match) return { actions: [], rest: text };
  const actions = (match[1] ?? "")
    .split("\n")
    .map((line) => line.replace(/^[ \t]*[-*\d•.)]+[ \t]*/, "").trim())
    .filter((line) => line.length > 0);
  const rest = text.slice(0, match.index) + text.slice(match.index + match[0].length);
  return { actions, rest: rest.trim() };
}

export function limitationStatement(intent: Intent | null, query: string): string {
  const subject = intent ? `a ${intent} answer to "${query}"` : `an answer to "${query}"`;
  return `Not enough evidence was found in the repository to give ${subject}. No claims are made beyond the evidence listed.`;
}

export interface AnsweredParts {
  intent: Intent;
  mode: AnswerMode | undefined;
  text: string;
  citations: Citation[];
  notes: string[];
}

export function answeredEnvelope(parts: AnsweredParts): ResponseEnvelope {
  let body = parts.text;
  let patch: string | null = null;
  if (parts.mode === "patch" || parts.intent === "patch") {
    const extracted = extractPatch(body);
    patch = extracted.patch;
    body = extracted.rest;
  }
  const { actions, rest } = extractNextActions(body);
  return {
    status: "answered",
    intent: parts.intent,
    answer: rest.trim(),
    citations: parts.citations,
    partialEvidence: [],
    patch,
    nextActions: actions,
    notes: parts.notes,
    error: null,
  };
}

export function insufficientEnvelope(
  intent: Intent | null,
  query: string,
  partialEvidence: Citation[],
  notes: string[],
): ResponseEnvelope {
  return {
    status: "insufficient",
    intent,
    answer: limitationStatement(intent, query),
    citations: [],
    partialEvidence,
    patch: null,
    nextActions: [],
    notes,
    error: null,
  };
}

export function failedEnvelope(
  intent: Intent | null,
  error: Pick<RepoCiteError, "code" | "message" | "retryable">,
  partialEvidence: Citation[],
  notes: string[],
): ResponseEnvelope {
  return {
    status: "failed",
    intent,
    answer: "",
    citations: [],
    partialEvidence,
    patch: null,
    nextActions: [],
    notes,
    error: { code: error.code, message: error.message, retryable: error.retryable },
  };
}

/** Plain-text rendering used by the CLI. */
export function formatEnvelope(envelope: ResponseEnvelope): string {
  const lines: string[] = [];
  if (envelope.status === "failed" && envelope.error) {
    lines.push(`Error (${envelope.error.code}): ${envelope.error.message}`);
  } else {
    lines.push(envelope.answer);
  }
  if (envelope.patch) {
    lines.push("", "```diff", envelope.patch, "```");
  }
  if (envelope.nextActions.length > 0) {
    lines.push("", "Next Actions:", ...envelope.nextActions.map((action) => `  - ${action}`));
  }
  const listed = envelope.citations.length > 0 ? envelope.citations : envelope.partialEvidence;
  if (listed.length > 0) {
    lines.push("", envelope.citations.length > 0 ? "Citations:" : "Partial evidence:");
    lines.push(...listed.map((c) => `  [${c.id}] ${c.label}`));
  }
  if (envelope.notes.length > 0) {
    lines.push("", "Notes:", ...envelope.notes.map((note) => `  - ${note}`));
  }
  return lines.join("\n");
}
