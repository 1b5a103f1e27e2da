import { chunkId, chunkLines, splitLines, splitLinesKeepingEnds } from "../chunker.js";
import { categorize, detectLanguage } from "../language.js";
import { buildLexicalIndex } from "../lexical-index.js";
import { RepositoryIndex } from "../repository-index.js";
import { buildTree } from "../tree.js";
import type { Chunk, RepoFile } from "../types.js";

export interface CorpusOptions {
  epoch?: number;
  windowLines?: number;
  /** File tags by path. */
  tags?: Record<string, string>;
  /** Paths recorded as binary, without content. */
  binary?: string[];
}

/** Builds a RepositoryIndex straight from file contents, without touching the filesystem. */
export function buildCorpus(files: Record<string, string>, options: CorpusOptions = {}): RepositoryIndex {
  const fileMap = new Map<string, RepoFile>();
  const chunks = new Map<string, Chunk>();
  const lines = new Map<string, string[]>();

  for (const path of Object.keys(files).sort()) {
    const language = detectLanguage(path);
    const fileLines = splitLines(files[path] ?? "");
    const file: RepoFile = {
      path,
      language,
      category: categorize(path, language),
      sizeBytes: (files[path] ?? "").length,
      mtimeMs: 0,
      lineCount: fileLines.length,
      binary: false,
      chunkIds: [],
      tag: options.tags?.[path] ?? null,
    };
    lines.set(path, splitLinesKeepingEnds(files[path] ?? ""));
    for (const span of chunkLines(fileLines, { language, windowLines: options.windowLines ?? 40 })) {
      const id = chunkId(path, span.startLine, span.endLine);
      chunks.set(id, { id, path, ...span, tag: null });
      file.chunkIds.push(id);
    }
    fileMap.set(path, file);
  }

  for (const path of options.binary ?? []) {
    const language = detectLanguage(path);
    fileMap.set(path, {
      path,
      language,
      category: categorize(path, language),
      sizeBytes: 1024,
      mtimeMs: 0,
      lineCount: 0,
      binary: true,
      chunkIds: [],
      tag: null,
    });
  }

  const epoch = options.epoch ?? 1;
  return new RepositoryIndex(
    {
      id: "test-repo",
      rootPath: "/repo",
      epoch,
      indexedAt: "2024-01-01T00:00:00.000Z",
      fileCount: fileMap.size,
      chunkCount: chunks.size,
    },
    fileMap,
    chunks,
    buildLexicalIndex(fileMap.values(), chunks.values()),
    buildTree(fileMap.keys()),
    lines,
  );
}
