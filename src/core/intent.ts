import { z } from "zod/v4";
import { normalizeQuestion } from "./tokenize.js";
import type { AnswerMode, Intent } from "./types.js";

const ORIENTATION_PATTERNS = [
  /\bwhat (does|is) (this|the) (repo|repository|project|codebase|code|library|package|app)\b/,
  /\bwhat does (this|it) do\b/,
  /\boverview\b/,
  /\bexplain\b/,
  /\bpurpose of\b/,
  /\bhigh[- ]level\b/,
  /\barchitecture\b/,
  /\bgetting started\b/,
  /\bhow is (this|the) (repo|repository|project|codebase) (structured|organized|organised|laid out)\b/,
];

/** Questions about the repository as a whole, which favour README and top-level docs. */
export function isOrientationQuery(query: string): boolean {
  const normalized = normalizeQuestion(query);
  return ORIENTATION_PATTERNS.some((pattern) => pattern.test(normalized));
}

const INTENT_ALIASES: Record<string, Intent> = {
  location: "location",
  locate: "location",
  "feature-finding": "location",
  feature_finding: "location",
  overview: "overview",
  explain: "overview",
  prioritization: "prioritization",
  prioritisation: "prioritization",
  prioritize: "prioritization",
  suggestion: "suggestion",
  suggest: "suggestion",
  "next-steps": "suggestion",
  patch: "patch",
  "patch-request": "patch",
};

const intentReplySchema = z.object({
  intent: z.string(),
});

function lookupIntent(raw: string): Intent | null {
  const key = raw.trim().toLowerCase().replace(/[.`"'\s]+$/g, "").replace(/^[`"'\s]+/g, "");
  return INTENT_ALIASES[key] ?? null;
}

function extractJsonObject(reply: string): unknown {
  const start = reply.indexOf("{");
  const end = reply.lastIndexOf("}");
  if (start === -1 || end <= start) return undefined;
  try {
    return JSON.parse(reply.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

/**
 * Reads a classification reply: either a JSON object with an `intent` field
 * (possibly inside a code fence) or a bare intent word. Returns null when the
 * reply names no known intent.
 */
export function parseIntentReply(reply: string): Intent | null {
  const parsed = intentReplySchema.safeParse(extractJsonObject(reply));
  if (parsed.success) {
    return lookupIntent(parsed.data.intent);
  }
  return lookupIntent(reply);
}

/** The intent a caller-selected answer mode implies, used as a hint to the classifier. */
export function intentHintForMode(mode: AnswerMode | undefined): Intent | null {
  switch (mode) {
    case "locate":
      return "location";
    case "explain":
      return "overview";
    case "suggest":
      return "suggestion";
    case "patch":
      return "patch";
    case undefined:
      return null;
  }
}
