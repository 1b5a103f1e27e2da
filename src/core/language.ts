import type { FileCategory } from "./types.js";

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  ".ts": "typescript",
  ".tsx": "typescript",
  ".mts": "typescript",
  ".cts": "typescript",
  ".js": "javascript",
  ".jsx": "javascript",
  ".mjs": "javascript",
  ".cjs": "javascript",
  ".py": "python",
  ".go": "go",
  ".rs": "rust",
  ".java": "java",
  ".kt": "kotlin",
  ".cs": "csharp",
  ".rb": "ruby",
  ".php": "php",
  ".c": "c",
  ".h": "c",
  ".cpp": "cpp",
  ".cc": "cpp",
  ".hpp": "cpp",
  ".swift": "swift",
  ".sh": "shell",
  ".sql": "sql",
  ".md": "markdown",
  ".mdx": "markdown",
  ".rst": "restructuredtext",
  ".txt": "text",
  ".json": "json",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".toml": "toml",
  ".ini": "ini",
  ".html": "html",
  ".css": "css",
  ".scss": "css",
};

const DOC_LANGUAGES = new Set(["markdown", "restructuredtext", "text"]);
const CONFIG_LANGUAGES = new Set(["json", "yaml", "toml", "ini"]);
const DOC_BASENAMES = /^(readme|changelog|contributing|license|authors|notice)(\.|$)/i;

function extensionOf(filePath: string): string {
  const base = filePath.slice(filePath.lastIndexOf("/") + 1);
  const dotIdx = base.lastIndexOf(".");
  return dotIdx <= 0 ? "" : base.slice(dotIdx).toLowerCase();
}

export function basename(filePath: string): string {
  return filePath.slice(filePath.lastIndexOf("/") + 1);
}

export function detectLanguage(filePath: string): string {
  return LANGUAGE_BY_EXTENSION[extensionOf(filePath)] ?? "unknown";
}

export function categorize(filePath: string, language: string): FileCategory {
  if (DOC_LANGUAGES.has(language) || DOC_BASENAMES.test(basename(filePath))) return "docs";
  if (filePath.split("/").slice(0, -1).some((segment) => segment === "docs" || segment === "doc")) {
    return "docs";
  }
  if (CONFIG_LANGUAGES.has(language)) return "config";
  if (language === "unknown") return "data";
  return "code";
}

/** Number of directory levels above the file; 0 for files at the repository root. */
export function pathDepth(filePath: string): number {
  return filePath.split("/").length - 1;
}

/** README or other documentation at the repository root. */
export function isTopLevelDoc(filePath: string, category: FileCategory): boolean {
  return pathDepth(filePath) === 0 && category === "docs";
}
