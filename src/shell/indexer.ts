import { createHash } from "node:crypto";
import * as path from "node:path";
import pLimit from "p-limit";
import { chunkId, chunkLines, joinLines, splitLines, splitLinesKeepingEnds } from "../core/chunker.js";
import { errorMessage, IngestionError, RequestCancelledError } from "../core/errors.js";
import { categorize, detectLanguage } from "../core/language.js";
import { buildLexicalIndex } from "../core/lexical-index.js";
import { parseTagReply } from "../core/prompts.js";
import { RepositoryIndex } from "../core/repository-index.js";
import { buildTree, directoriesBottomUp } from "../core/tree.js";
import type { Chunk, DirectoryNode, IndexingConfig, RepoFile, Repository, TagSubject } from "../core/types.js";
import type { FileSystemPort } from "../ports/filesystem.js";
import type { ReasoningEnginePort } from "../ports/reasoning-engine.js";
import { nodeFileSystem } from "./adapters/node-filesystem.js";
import { collectFiles, type SkippedFile } from "./file-collector.js";
import { callOracle } from "./oracle.js";

export interface IngestOptions extends IndexingConfig {
  epoch: number;
  /** Per-batch bound on tag calls. */
  tagTimeoutMs: number;
  signal?: AbortSignal;
}

export interface IngestDeps {
  fs?: FileSystemPort;
  engine?: ReasoningEnginePort | null;
  log?: (msg: string) => void;
  now?: () => Date;
}

/** Outcome details of an ingestion. `partial` marks skipped files or missing tags. */
export interface IngestionReport {
  skipped: SkippedFile[];
  metadataOnly: number;
  tagFailures: number;
  taggedFiles: number;
  taggedDirectories: number;
  partial: boolean;
}

export interface IngestionResult {
  index: RepositoryIndex;
  report: IngestionReport;
}

const EXCERPT_LINES = 30;

function chunkBatches<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) batches.push(items.slice(i, i + size));
  return batches;
}

export function repositoryId(rootPath: string): string {
  return createHash("sha256").update(rootPath).digest("hex").slice(0, 12);
}

class Tagger {
  failures = 0;
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(
    private readonly engine: ReasoningEnginePort,
    private readonly options: IngestOptions,
    private readonly log: (msg: string) => void,
  ) {
    this.limit = pLimit(Math.max(1, options.tagConcurrency));
  }

  /** Tags for each subject, batched; a failed batch yields nulls. */
  async describe(subjects: TagSubject[]): Promise<(string | null)[]> {
    const batches = chunkBatches(subjects, Math.max(1, this.options.tagBatchSize));
    const results = await Promise.all(batches.map((batch) => this.limit(() => this.describeBatch(batch))));
    return results.flat();
  }

  private async describeBatch(batch: TagSubject[]): Promise<(string | null)[]> {
    try {
      const tags = await callOracle(
        "describe",
        (signal) => this.engine.describe(batch, signal),
        (reply) => parseTagReply(reply, batch.length),
        { timeoutMs: this.options.tagTimeoutMs, retries: 0, retryBaseMs: 0, signal: this.options.signal },
      );
      this.failures += tags.filter((tag) => tag === null).length;
      return tags;
    } catch (err) {
      if (err instanceof RequestCancelledError) throw err;
      this.log(`Tagging ${batch.length} item(s) failed: ${errorMessage(err)}`);
      this.failures += batch.length;
      return batch.map(() => null);
    }
  }
}

async function tagTree(
  tagger: Tagger,
  tree: DirectoryNode,
  files: Map<string, RepoFile>,
  lines: Map<string, string[]>,
): Promise<{ files: number; directories: number }> {
  const textFiles = [...files.values()].filter((file) => !file.binary);
  const fileTags = await tagger.describe(
    textFiles.map((file) => ({
      kind: "file",
      path: file.path,
      language: file.language,
      excerpt: joinLines((lines.get(file.path) ?? []).slice(0, EXCERPT_LINES)),
    })),
  );
  textFiles.forEach((file, i) => {
    file.tag = fileTags[i] ?? null;
  });

  let taggedDirectories = 0;
  for (const level of directoriesBottomUp(tree)) {
    const subjects: TagSubject[] = level.map((dir) => ({
      kind: "directory",
      path: dir.path,
      children: [
        ...dir.directories.map((child) => ({ name: `${child.name}/`, tag: child.tag })),
        ...dir.files.map((filePath) => ({ name: path.posix.basename(filePath), tag: files.get(filePath)?.tag ?? null })),
      ],
    }));
    const dirTags = await tagger.describe(subjects);
    level.forEach((dir, i) => {
      dir.tag = dirTags[i] ?? null;
      if (dir.tag) taggedDirectories++;
    });
  }

  return { files: fileTags.filter((tag) => tag !== null).length, directories: taggedDirectories };
}

/**
 * Builds a fresh RepositoryIndex for `root`. Unreadable files are skipped and
 * tag failures leave tags null; neither fails the ingestion.
 */
export async function ingestRepository(
  root: string,
  options: IngestOptions,
  deps: IngestDeps = {},
): Promise<IngestionResult> {
  const fs = deps.fs ?? nodeFileSystem;
  const log = deps.log ?? console.warn;
  const rootPath = path.resolve(root);

  try {
    const stat = await fs.stat(rootPath);
    if (!stat.isDirectory()) throw new Error("not a directory");
    await fs.access(rootPath);
  } catch (err) {
    throw new IngestionError(rootPath, errorMessage(err));
  }

  const collected = await collectFiles(rootPath, options, fs, log);
  if (options.signal?.aborted) throw new RequestCancelledError("ingestion");

  const files = new Map<string, RepoFile>();
  const chunks = new Map<string, Chunk>();
  const lines = new Map<string, string[]>();
  let metadataOnly = 0;

  for (const entry of collected.files) {
    const language = detectLanguage(entry.path);
    const file: RepoFile = {
      path: entry.path,
      language,
      category: categorize(entry.path, language),
      sizeBytes: entry.sizeBytes,
      mtimeMs: entry.mtimeMs,
      lineCount: 0,
      binary: entry.kind === "metadata",
      chunkIds: [],
      tag: null,
    };
    if (entry.kind === "metadata") {
      metadataOnly++;
    } else {
      const fileLines = splitLines(entry.content);
      file.lineCount = fileLines.length;
      lines.set(entry.path, splitLinesKeepingEnds(entry.content));
      for (const span of chunkLines(fileLines, { language, windowLines: options.windowLines })) {
        const id = chunkId(entry.path, span.startLine, span.endLine);
        chunks.set(id, { id, path: entry.path, ...span, tag: null });
        file.chunkIds.push(id);
      }
    }
    files.set(entry.path, file);
  }

  const tree = buildTree(files.keys());
  let tagFailures = 0;
  let tagged = { files: 0, directories: 0 };
  if (deps.engine && options.tags && files.size > 0) {
    const tagger = new Tagger(deps.engine, options, log);
    tagged = await tagTree(tagger, tree, files, lines);
    tagFailures = tagger.failures;
  }
  if (options.signal?.aborted) throw new RequestCancelledError("ingestion");

  const repository: Repository = {
    id: repositoryId(rootPath),
    rootPath,
    epoch: options.epoch,
    indexedAt: (deps.now?.() ?? new Date()).toISOString(),
    fileCount: files.size,
    chunkCount: chunks.size,
  };

  const lexical = buildLexicalIndex(files.values(), chunks.values());
  const index = new RepositoryIndex(repository, files, chunks, lexical, tree, lines);

  return {
    index,
    report: {
      skipped: collected.skipped,
      metadataOnly,
      tagFailures,
      taggedFiles: tagged.files,
      taggedDirectories: tagged.directories,
      partial: collected.skipped.length > 0 || tagFailures > 0,
    },
  };
}
