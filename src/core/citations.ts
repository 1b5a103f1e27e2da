/**
 * Citation markers look like `[ev-1a2b3c4d5e]`. A bracket may group several
 * ids separated by commas. Anything shaped like an evidence id is checked,
 * including ids of the wrong length, so that no unchecked marker survives.
 */
const MARKER_BODY = String.raw`\[\s*(ev-[A-Za-z0-9_-]+(?:\s*,\s*ev-[A-Za-z0-9_-]+)*)\s*\]`;

function splitIds(group: string): string[] {
  return group.split(",").map((id) => id.trim());
}

/** Cited ids in order of first appearance. */
export function extractCitationIds(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(new RegExp(MARKER_BODY, "g"))) {
    for (const id of splitIds(match[1] ?? "")) seen.add(id);
  }
  return [...seen];
}

export interface CitationCheck {
  /** Text with every marker that cites an unknown id removed or narrowed. */
  text: string;
  valid: string[];
  rejected: string[];
}

/**
 * Removes citations that are not members of the evidence set. A bracket with
 * some valid ids keeps only those; a bracket with none is dropped together
 * with the whitespace in front of it.
 */
export function validateCitations(text: string, isMember: (id: string) => boolean): CitationCheck {
  const valid = new Set<string>();
  const rejected = new Set<string>();
  const repaired = text.replace(new RegExp(`[ \\t]*${MARKER_BODY}`, "g"), (marker, group: string) => {
    const ids = splitIds(group);
    const kept = ids.filter((id) => isMember(id));
    for (const id of ids) (kept.includes(id) ? valid : rejected).add(id);
    if (kept.length === ids.length) return marker;
    if (kept.length === 0) return "";
    const leading = marker.slice(0, marker.indexOf("["));
    return `${leading}[${kept.join(", ")}]`;
  });
  return { text: repaired, valid: [...valid], rejected: [...rejected] };
}

/** Orders cited ids by the evidence set's insertion order. */
export function orderByEvidence(cited: Iterable<string>, evidenceOrder: readonly string[]): string[] {
  const citedSet = new Set(cited);
  return evidenceOrder.filter((id) => citedSet.has(id));
}
