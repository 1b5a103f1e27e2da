const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "can", "do", "does", "for",
  "from", "how", "i", "if", "in", "is", "it", "me", "my", "of", "on", "or",
  "our", "should", "that", "the", "this", "to", "we", "what", "when", "where",
  "which", "who", "why", "with", "you",
]);

// Longest suffix first; a suffix is only removed when at least 3 characters remain.
const SUFFIXES = ["ations", "ation", "ating", "ated", "ates", "ate", "ings", "ing", "ers", "er", "ed", "es", "s"];
const MIN_STEM_LENGTH = 3;

export function normalizeQuestion(question: string): string {
  return question.trim().replace(/\s+/g, " ").toLowerCase();
}

export function stem(word: string): string {
  for (const suffix of SUFFIXES) {
    if (word.endsWith(suffix) && word.length - suffix.length >= MIN_STEM_LENGTH) {
      return word.slice(0, -suffix.length);
    }
  }
  return word;
}

/** Splits identifiers and prose into lowercase words: `parseHTTPRequest` → parse, http, request. */
export function splitWords(text: string): string[] {
  const spaced = text
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .toLowerCase();
  return spaced.split(/[^a-z0-9]+/).filter(Boolean);
}

/** Normalized index terms, in order of appearance, duplicates kept. */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const word of splitWords(text)) {
    if (word.length < 2 || STOPWORDS.has(word)) continue;
    if (/^\d+$/.test(word)) continue;
    tokens.push(stem(word));
  }
  return tokens;
}

export function uniqueTokens(text: string): string[] {
  return [...new Set(tokenize(text))];
}

/** Term frequencies for one document. */
export function termFrequencies(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokenize(text)) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}
