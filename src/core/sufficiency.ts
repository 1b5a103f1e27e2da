import type { EvidenceItem, FileCategory, Intent } from "./types.js";

export const DEFAULT_RELEVANCE_FLOOR = 1.0;

export interface SufficiencyInput {
  intent: Intent;
  items: readonly EvidenceItem[];
  floor: number;
  /** Category of a repository path, or null when the path is not in the index. */
  categoryOf(path: string): FileCategory | null;
}

function isRelevantChunk(item: EvidenceItem, input: SufficiencyInput, codeOnly: boolean): boolean {
  if (item.source.kind !== "chunk" || item.score < input.floor) return false;
  return !codeOnly || input.categoryOf(item.source.path) === "code";
}

function isRelevantSummary(item: EvidenceItem, floor: number): boolean {
  return item.source.kind === "file_summary" && item.score >= floor;
}

function isCodeHostItem(item: EvidenceItem): boolean {
  return item.source.kind === "issue" || item.source.kind === "pull_request";
}

/** Evidence that satisfies the intent's requirement. Empty means not enough to answer. */
export function relevantEvidence(input: SufficiencyInput): EvidenceItem[] {
  const { intent, items, floor } = input;
  switch (intent) {
    case "location":
    case "patch":
      return items.filter((item) => isRelevantChunk(item, input, true));
    case "overview":
      return items.filter((item) => isRelevantChunk(item, input, false) || isRelevantSummary(item, floor));
    case "prioritization":
      return items.filter(isCodeHostItem);
    case "suggestion":
      return items.filter(
        (item) => isCodeHostItem(item) || isRelevantChunk(item, input, false) || isRelevantSummary(item, floor),
      );
  }
}

export function isSufficient(input: SufficiencyInput): boolean {
  return relevantEvidence(input).length > 0;
}
