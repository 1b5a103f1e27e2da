import { splitWords, stem, termFrequencies, uniqueTokens } from "./tokenize.js";
import type { Chunk, RepoFile } from "./types.js";

export interface Posting {
  chunkId: string;
  path: string;
  tf: number;
}

export interface LexicalIndex {
  /** token → postings ordered by (path, chunk start line). */
  postings: Map<string, Posting[]>;
  /** Number of indexed chunks; the idf denominator. */
  documentCount: number;
  /** path → stemmed tokens of every path segment. */
  pathTokens: Map<string, Set<string>>;
  /** path → stemmed segment names (directory names and the basename without extension). */
  pathSegments: Map<string, Set<string>>;
  /** path → tokens of the file's generated tag. */
  tagTokens: Map<string, Set<string>>;
}

function compareChunks(a: Chunk, b: Chunk): number {
  if (a.path !== b.path) return a.path < b.path ? -1 : 1;
  return a.startLine - b.startLine;
}

/** Stemmed names of each path segment: `src/auth/login_handler.py` → src, auth, login_handler. */
export function segmentNames(filePath: string): Set<string> {
  const segments = filePath.split("/");
  const names = new Set<string>();
  segments.forEach((segment, idx) => {
    const isLast = idx === segments.length - 1;
    const dotIdx = segment.lastIndexOf(".");
    const name = isLast && dotIdx > 0 ? segment.slice(0, dotIdx) : segment;
    const lowered = name.toLowerCase();
    if (lowered) names.add(stem(lowered));
    // Compound names also match on their parts: login_handler → login, handler.
    const words = splitWords(name);
    if (words.length > 1) {
      for (const word of words) names.add(stem(word));
    }
  });
  return names;
}

export function buildLexicalIndex(files: Iterable<RepoFile>, chunks: Iterable<Chunk>): LexicalIndex {
  const postings = new Map<string, Posting[]>();
  const sorted = [...chunks].sort(compareChunks);

  for (const chunk of sorted) {
    for (const [token, tf] of termFrequencies(chunk.text)) {
      const list = postings.get(token) ?? [];
      list.push({ chunkId: chunk.id, path: chunk.path, tf });
      postings.set(token, list);
    }
  }

  const pathTokens = new Map<string, Set<string>>();
  const pathSegments = new Map<string, Set<string>>();
  const tagTokens = new Map<string, Set<string>>();
  const sortedFiles = [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  for (const file of sortedFiles) {
    if (file.binary) continue;
    pathTokens.set(file.path, new Set(uniqueTokens(file.path)));
    pathSegments.set(file.path, segmentNames(file.path));
    if (file.tag) tagTokens.set(file.path, new Set(uniqueTokens(file.tag)));
  }

  return { postings, documentCount: sorted.length, pathTokens, pathSegments, tagTokens };
}

export function inverseDocumentFrequency(index: LexicalIndex, token: string): number {
  // Tokens seen only in paths or tags weigh as much as a token in a single chunk.
  const df = Math.max(1, index.postings.get(token)?.length ?? 0);
  return Math.log(1 + index.documentCount / df);
}

/** Plain, sorted representation used to compare two index builds. */
export function snapshotLexicalIndex(index: LexicalIndex): {
  documentCount: number;
  postings: Array<[string, Posting[]]>;
  paths: Array<[string, string[], string[], string[]]>;
} {
  const postings = [...index.postings.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const paths = [...index.pathTokens.keys()].sort().map((path): [string, string[], string[], string[]] => [
    path,
    [...(index.pathTokens.get(path) ?? [])].sort(),
    [...(index.pathSegments.get(path) ?? [])].sort(),
    [...(index.tagTokens.get(path) ?? [])].sort(),
  ]);
  return { documentCount: index.documentCount, postings, paths };
}
