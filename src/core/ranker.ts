import { minimatch } from "minimatch";
import { isOrientationQuery } from "./intent.js";
import { isTopLevelDoc, pathDepth } from "./language.js";
import { inverseDocumentFrequency, type LexicalIndex } from "./lexical-index.js";
import { uniqueTokens } from "./tokenize.js";
import type { Chunk, RepoFile, SearchFilters } from "./types.js";

export const DEFAULT_TOP_K = 10;

export const RANKING_WEIGHTS = {
  /** Per query token found among the file's path tokens. Multiplied by idf. */
  pathToken: 0.5,
  /** A query token equals a directory name or the file's basename. */
  pathSegment: 2,
  /** README and top-level docs on orientation questions. */
  orientationDoc: 3,
  /** Added to a file summary whose tag shares a token with the query. */
  tagMatch: 1,
} as const;

export interface RankCorpus {
  lexical: LexicalIndex;
  files: ReadonlyMap<string, RepoFile>;
  chunks: ReadonlyMap<string, Chunk>;
}

/** Optional extra scorer (e.g. embeddings), blended as `lexical + weight * semantic`. */
export interface SemanticScorer {
  weight: number;
  score(query: string, chunk: Chunk): number;
}

export interface RankOptions {
  topK?: number;
  /** Overrides orientation detection from the query text. */
  orientation?: boolean;
  semantic?: SemanticScorer;
}

export type RankedCandidate =
  | { kind: "chunk"; id: string; path: string; startLine: number; score: number; chunk: Chunk; file: RepoFile }
  | { kind: "file_summary"; id: string; path: string; startLine: 0; score: number; file: RepoFile };

export class InvalidFiltersError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidFiltersError";
  }
}

export function validateFilters(filters: SearchFilters): void {
  if (filters.docsOnly && filters.codeOnly) {
    throw new InvalidFiltersError("docsOnly and codeOnly cannot both be set");
  }
  if (filters.topK !== undefined && (!Number.isInteger(filters.topK) || filters.topK < 1)) {
    throw new InvalidFiltersError(`topK must be a positive integer, got ${filters.topK}`);
  }
}

export function matchesFilters(file: RepoFile, filters: SearchFilters): boolean {
  if (file.binary) return false;
  if (filters.docsOnly && file.category !== "docs") return false;
  if (filters.codeOnly && file.category !== "code") return false;
  if (filters.language && file.language !== filters.language.toLowerCase()) return false;
  if (filters.pathGlob && !minimatch(file.path, filters.pathGlob, { dot: true, matchBase: !filters.pathGlob.includes("/") })) {
    return false;
  }
  return true;
}

function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Total order over candidates: score, then shallower paths, then path,
 * then start line (file summaries first), then id.
 */
export function compareCandidates(a: RankedCandidate, b: RankedCandidate): number {
  if (a.score !== b.score) return b.score - a.score;
  const depth = pathDepth(a.path) - pathDepth(b.path);
  if (depth !== 0) return depth;
  const byPath = comparePaths(a.path, b.path);
  if (byPath !== 0) return byPath;
  if (a.startLine !== b.startLine) return a.startLine - b.startLine;
  return comparePaths(a.id, b.id);
}

function firstChunk(corpus: RankCorpus, file: RepoFile): Chunk | undefined {
  const id = file.chunkIds[0];
  return id === undefined ? undefined : corpus.chunks.get(id);
}

/**
 * Deterministic lexical ranking of chunks and file summaries for a query.
 *
 * Base score is a TF-IDF style sum over chunk text and path tokens. Boosts
 * are applied in a fixed order: path-segment match, orientation docs, tag
 * match for file summaries. Depth only breaks ties.
 */
export function rank(
  query: string,
  filters: SearchFilters,
  corpus: RankCorpus,
  options: RankOptions = {},
): RankedCandidate[] {
  validateFilters(filters);
  const topK = filters.topK ?? options.topK ?? DEFAULT_TOP_K;
  const queryTokens = uniqueTokens(query);
  const querySet = new Set(queryTokens);
  const orientation = options.orientation ?? isOrientationQuery(query);
  const index = corpus.lexical;

  const eligible = new Map<string, RepoFile>();
  for (const [path, file] of corpus.files) {
    if (matchesFilters(file, filters)) eligible.set(path, file);
  }

  const chunkScores = new Map<string, number>();

  // Chunk text.
  for (const token of queryTokens) {
    const idf = inverseDocumentFrequency(index, token);
    for (const posting of index.postings.get(token) ?? []) {
      if (!eligible.has(posting.path)) continue;
      const tfWeight = 1 + Math.log(posting.tf);
      chunkScores.set(posting.chunkId, (chunkScores.get(posting.chunkId) ?? 0) + tfWeight * idf);
    }
  }

  const filesWithHits = new Set<string>();
  for (const chunkId of chunkScores.keys()) {
    const chunk = corpus.chunks.get(chunkId);
    if (chunk) filesWithHits.add(chunk.path);
  }

  // File paths, then the boosts that depend on them.
  for (const [path, file] of eligible) {
    const pathTokens = index.pathTokens.get(path) ?? new Set<string>();
    const matchedPathTokens = queryTokens.filter((token) => pathTokens.has(token));
    let fileBonus = matchedPathTokens.reduce(
      (sum, token) => sum + RANKING_WEIGHTS.pathToken * inverseDocumentFrequency(index, token),
      0,
    );

    const segments = index.pathSegments.get(path) ?? new Set<string>();
    if (queryTokens.some((token) => segments.has(token))) {
      fileBonus += RANKING_WEIGHTS.pathSegment;
    }

    if (orientation && isTopLevelDoc(path, file.category)) {
      fileBonus += RANKING_WEIGHTS.orientationDoc;
    }

    if (fileBonus === 0) continue;

    if (filesWithHits.has(path)) {
      for (const chunkId of file.chunkIds) {
        const score = chunkScores.get(chunkId);
        if (score !== undefined) chunkScores.set(chunkId, score + fileBonus);
      }
    } else {
      const chunk = firstChunk(corpus, file);
      if (chunk) chunkScores.set(chunk.id, fileBonus);
    }
  }

  if (options.semantic) {
    const { weight, score } = options.semantic;
    for (const file of eligible.values()) {
      for (const chunkId of file.chunkIds) {
        const chunk = corpus.chunks.get(chunkId);
        if (!chunk) continue;
        const semantic = score(query, chunk);
        if (semantic !== 0) chunkScores.set(chunkId, (chunkScores.get(chunkId) ?? 0) + weight * semantic);
      }
    }
  }

  const candidates: RankedCandidate[] = [];
  for (const [chunkId, score] of chunkScores) {
    const chunk = corpus.chunks.get(chunkId);
    const file = chunk ? eligible.get(chunk.path) : undefined;
    if (!chunk || !file || score <= 0) continue;
    candidates.push({ kind: "chunk", id: chunk.id, path: chunk.path, startLine: chunk.startLine, score, chunk, file });
  }

  for (const [path, file] of eligible) {
    const tagTokens = index.tagTokens.get(path);
    if (!tagTokens || !file.tag) continue;
    const matched = [...querySet].filter((token) => tagTokens.has(token));
    if (matched.length === 0) continue;
    const score = matched.reduce<number>((sum, token) => sum + inverseDocumentFrequency(index, token), RANKING_WEIGHTS.tagMatch);
    candidates.push({ kind: "file_summary", id: `${path}#summary`, path, startLine: 0, score, file });
  }

  return candidates.sort(compareCandidates).slice(0, topK);
}
