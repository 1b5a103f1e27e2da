import { intentHintForMode } from "./intent.js";
import type {
  AnswerMode,
  ClassificationInput,
  PlanStep,
  StepProposalInput,
  SynthesisInput,
  TagSubject,
} from "./types.js";

export const MODE_INSTRUCTIONS: Record<AnswerMode, string> = {
  explain: "Provide a thorough explanation. Reference specific file paths and line numbers.",
  locate:
    "Identify exactly which files and line ranges implement the requested functionality. List locations first, brief explanation second.",
  suggest: [
    "Suggest concrete next development steps.",
    "For each suggestion include an impact label (high/medium/low) and an effort label (high/medium/low).",
    "End your response with a 'Next Actions' list.",
  ].join(" "),
  patch: "Propose a code change that addresses the request. Output the change as a unified diff in a ```diff block after your explanation.",
};

/** Evidence excerpts longer than this are cut before they reach the engine. */
export const MAX_EXCERPT_CHARS = 4000;

export function classificationPrompt(input: ClassificationInput): string {
  const lines = [
    "Classify the request about a source repository into exactly one intent:",
    "- location: where something is implemented or defined",
    "- overview: what the repository or a part of it does",
    "- prioritization: which issues or pull requests matter most",
    "- suggestion: what to work on next",
    "- patch: a concrete code change",
    'Reply with JSON only: {"intent": "<one of the above>"}',
  ];
  const hint = intentHintForMode(input.mode);
  if (input.mode && hint) {
    lines.push(`The caller asked for answer mode "${input.mode}", which usually means "${hint}".`);
  }
  if (input.history.length > 0) {
    lines.push("Earlier questions in this session:", ...input.history.map((q) => `- ${q}`));
  }
  lines.push("", `Request: ${input.query}`);
  return lines.join("\n");
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}\n[... truncated]` : text;
}

export function synthesisSystemPrompt(input: Pick<SynthesisInput, "mode" | "scope">): string {
  const lines = [
    "You answer questions about one source repository using only the evidence provided.",
    "Every sentence that states a fact about the repository must end with a citation marker such as [ev-0123456789], using only the evidence ids listed.",
    "Do not invent ids. If the evidence does not support a claim, leave the claim out.",
  ];
  if (input.scope === "files-only") {
    lines.push("Only repository files are in scope. Do not discuss issues or pull requests.");
  }
  if (input.mode) lines.push(MODE_INSTRUCTIONS[input.mode]);
  return lines.join("\n");
}

export function synthesisUserPrompt(input: SynthesisInput): string {
  const blocks = input.evidence.map(
    (ev) => `<evidence id="${ev.id}" kind="${ev.kind}" source="${ev.label}">\n${truncate(ev.text, MAX_EXCERPT_CHARS)}\n</evidence>`,
  );
  const lines = [`Intent: ${input.intent}`, "", ...blocks];
  if (input.notes.length > 0) {
    lines.push("", "Some lookups failed; mention this where it limits the answer:", ...input.notes.map((n) => `- ${n}`));
  }
  lines.push("", `Question: ${input.query}`);
  return lines.join("\n");
}

function describeStep(step: PlanStep): string {
  if (step.kind === "open_top_hits") return `open the top ${step.count} hits of ${step.after}`;
  return `${step.request.tool} ${JSON.stringify(step.request)}`;
}

export function stepProposalPrompt(input: StepProposalInput): string {
  const tools = ["search_repo", "open_file"];
  if (input.scope === "include-pr") tools.push("get_issue", "get_pull_requests");
  return [
    `A planner will answer a ${input.intent} question about a repository with these steps:`,
    ...input.plan.map((step) => `- ${step.id}: ${describeStep(step)}`),
    `You may add at most ${input.maxExtraSteps} extra steps using the tools ${tools.join(", ")}.`,
    'Reply with a JSON array only, for example [{"tool": "search_repo", "query": "session token"}].',
    'Fields: search_repo {query, path_glob?, language?, docs_only?, code_only?}; open_file {path, start_line, end_line};',
    "get_issue and get_pull_requests {query?, state?, labels?, limit?}. Reply [] when no extra step helps.",
    "",
    `Question: ${input.query}`,
  ].join("\n");
}

function describeSubject(subject: TagSubject, index: number): string {
  if (subject.kind === "file") {
    return `${index + 1}. file ${subject.path} (${subject.language})\n${truncate(subject.excerpt, 1200)}`;
  }
  const children = subject.children.map((c) => `   - ${c.name}: ${c.tag ?? "(no description)"}`);
  return `${index + 1}. directory ${subject.path || "."}\n${children.join("\n")}`;
}

export function tagPrompt(subjects: TagSubject[]): string {
  return [
    "Write a short description (at most 12 words) of each numbered item of a source repository.",
    `Reply with a JSON array of exactly ${subjects.length} strings, in the same order.`,
    "",
    ...subjects.map(describeSubject),
  ].join("\n");
}

/** Tags from a batched description reply; entries that are missing or blank are null. */
export function parseTagReply(reply: string, count: number): (string | null)[] {
  const start = reply.indexOf("[");
  const end = reply.lastIndexOf("]");
  let parsed: unknown = undefined;
  if (start !== -1 && end > start) {
    try {
      parsed = JSON.parse(reply.slice(start, end + 1));
    } catch {
      parsed = undefined;
    }
  }
  const entries: unknown[] = Array.isArray(parsed) ? parsed : [];
  return Array.from({ length: count }, (_, i) => {
    const entry = entries[i];
    if (typeof entry !== "string") return null;
    const tag = entry.trim().replace(/\s+/g, " ");
    return tag.length > 0 ? tag.slice(0, 160) : null;
  });
}
