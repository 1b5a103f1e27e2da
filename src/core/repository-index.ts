import { joinLines } from "./chunker.js";
import type { LexicalIndex } from "./lexical-index.js";
import type { Chunk, DirectoryNode, RepoFile, Repository } from "./types.js";

/**
 * Everything ingestion produced for one epoch. Built once and never patched:
 * re-ingestion builds a new index and the session swaps it in wholesale.
 */
export class RepositoryIndex {
  constructor(
    readonly repository: Repository,
    readonly files: ReadonlyMap<string, RepoFile>,
    readonly chunks: ReadonlyMap<string, Chunk>,
    readonly lexical: LexicalIndex,
    readonly tree: DirectoryNode,
    /** Per file, lines with their original terminators. */
    private readonly lines: ReadonlyMap<string, readonly string[]>,
  ) {}

  /**
   * Exact inclusive line range of a text file, byte for byte (CRLF stays CRLF)
   * apart from the last line's terminator. Null when the file or range is invalid.
   */
  readLines(path: string, startLine: number, endLine: number): string | null {
    const lines = this.lines.get(path);
    if (!lines) return null;
    if (!Number.isInteger(startLine) || !Number.isInteger(endLine)) return null;
    if (startLine < 1 || endLine < startLine || endLine > lines.length) return null;
    return joinLines(lines.slice(startLine - 1, endLine));
  }

  chunksOf(path: string): Chunk[] {
    const file = this.files.get(path);
    if (!file) return [];
    return file.chunkIds.flatMap((id) => {
      const chunk = this.chunks.get(id);
      return chunk ? [chunk] : [];
    });
  }

}
