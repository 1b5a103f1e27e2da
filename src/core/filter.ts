export const DEFAULT_IGNORE_DIRS = [
  ".git",
  ".hg",
  ".svn",
  "node_modules",
  ".venv",
  "venv",
  "__pycache__",
  "build",
  "dist",
  "out",
  "target",
  ".next",
  "coverage",
  ".pytest_cache",
  ".mypy_cache",
];

export const BINARY_EXTENSIONS = [
  ".png",
  ".jpg",
  ".jpeg",
  ".gif",
  ".svg",
  ".ico",
  ".webp",
  ".pdf",
  ".zip",
  ".tar",
  ".gz",
  ".tgz",
  ".7z",
  ".exe",
  ".dll",
  ".so",
  ".dylib",
  ".wasm",
  ".lock",
  ".pyc",
  ".pyo",
  ".class",
  ".jar",
  ".woff",
  ".woff2",
  ".ttf",
  ".mp3",
  ".mp4",
];

export interface FilterOptions {
  ignoreDirs: string[];
  maxFileSizeKb: number;
}

/**
 * - `skip`: excluded from the repository entirely (VCS metadata, build output, hidden files)
 * - `metadata`: recorded as a file without chunks (binary or oversized)
 * - `text`: chunked and indexed
 */
export type FileDisposition = "skip" | "metadata" | "text";

const BINARY_SNIFF_BYTES = 8000;

export function classifyPath(
  filePath: string,
  fileSizeKb: number,
  options: FilterOptions,
): FileDisposition {
  const segments = filePath.split("/");
  for (const segment of segments.slice(0, -1)) {
    if (options.ignoreDirs.includes(segment)) return "skip";
  }

  const name = segments[segments.length - 1] ?? "";
  if (!name || name.startsWith(".")) return "skip";

  const dotIdx = name.lastIndexOf(".");
  const ext = dotIdx === -1 ? "" : name.slice(dotIdx).toLowerCase();
  if (BINARY_EXTENSIONS.includes(ext)) return "metadata";

  if (fileSizeKb > options.maxFileSizeKb) return "metadata";

  return "text";
}

/** A NUL byte in the first 8000 bytes marks the content as binary. */
export function looksBinary(bytes: Uint8Array): boolean {
  const end = Math.min(bytes.length, BINARY_SNIFF_BYTES);
  for (let i = 0; i < end; i++) {
    if (bytes[i] === 0) return true;
  }
  return false;
}
