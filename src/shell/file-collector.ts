import * as path from "node:path";
import { errorMessage } from "../core/errors.js";
import { classifyPath, looksBinary, type FilterOptions } from "../core/filter.js";
import type { FileSystemPort } from "../ports/filesystem.js";
import { nodeFileSystem } from "./adapters/node-filesystem.js";

export type CollectedFile =
  | { path: string; sizeBytes: number; mtimeMs: number; kind: "text"; content: string }
  | { path: string; sizeBytes: number; mtimeMs: number; kind: "metadata"; reason: "binary" | "oversized" };

export interface SkippedFile {
  path: string;
  reason: string;
}

export interface CollectResult {
  files: CollectedFile[];
  skipped: SkippedFile[];
}

const decoder = new TextDecoder("utf-8");

/**
 * Enumerates the repository under `root` in path order. Ignored directories
 * are pruned by the glob; unreadable files are reported as skipped and never
 * abort the walk.
 */
export async function collectFiles(
  root: string,
  options: FilterOptions,
  fs: FileSystemPort = nodeFileSystem,
  log: (msg: string) => void = console.warn,
): Promise<CollectResult> {
  const entries = await fs.glob(["**/*"], {
    cwd: root,
    ignore: options.ignoreDirs.map((dir) => `**/${dir}/**`),
    absolute: false,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
  });
  entries.sort();

  const files: CollectedFile[] = [];
  const skipped: SkippedFile[] = [];

  for (const relPath of entries) {
    const absPath = path.join(root, relPath);
    try {
      const stat = await fs.stat(absPath);
      const disposition = classifyPath(relPath, stat.size / 1024, options);
      if (disposition === "skip") continue;

      const base = { path: relPath, sizeBytes: stat.size, mtimeMs: stat.mtimeMs };
      if (disposition === "metadata") {
        const reason = stat.size / 1024 > options.maxFileSizeKb ? "oversized" : "binary";
        files.push({ ...base, kind: "metadata", reason });
        continue;
      }

      const bytes = await fs.readBytes(absPath);
      if (looksBinary(bytes)) {
        files.push({ ...base, kind: "metadata", reason: "binary" });
      } else {
        files.push({ ...base, kind: "text", content: decoder.decode(bytes) });
      }
    } catch (err) {
      log(`Skipping ${relPath}: ${errorMessage(err)}`);
      skipped.push({ path: relPath, reason: errorMessage(err) });
    }
  }

  return { files, skipped };
}
