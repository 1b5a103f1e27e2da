export const DEFAULT_WINDOW_LINES = 40;

export interface ChunkSpan {
  startLine: number;
  endLine: number;
  text: string;
  boundary: "structural" | "window";
}

export interface ChunkOptions {
  language: string;
  windowLines?: number;
}

/** A pluggable boundary detector: returns 0-based indices of lines that open a structural unit. */
export type BoundaryDetector = (lines: string[]) => number[];

const JS_UNIT =
  /^(export\s+)?(default\s+)?(declare\s+)?(abstract\s+)?(async\s+)?(function\*?|class|interface|enum|namespace)\s/;
const JS_CONST_FN = /^(export\s+)?(const|let)\s+[\w$]+\s*(:[^=]+)?=\s*(async\s+)?(\([^)]*\)|[\w$]+)\s*(:[^=]+)?=>/;
const JS_TYPE = /^(export\s+)?type\s+\w+/;

const UNIT_PATTERNS: Record<string, RegExp[]> = {
  typescript: [JS_UNIT, JS_CONST_FN, JS_TYPE],
  javascript: [JS_UNIT, JS_CONST_FN],
  python: [/^(async\s+)?def\s+\w+/, /^class\s+\w+/],
  go: [/^func\s/, /^type\s+\w+\s+(struct|interface)\b/],
  rust: [/^(pub(\([\w:]+\))?\s+)?(async\s+)?(fn|struct|enum|impl|trait|mod)\b/],
  java: [/^(public|protected|private|abstract|final|static|\s)*(class|interface|enum|record)\s+\w+/, /^ {4}(public|protected|private)\s[^=;]*\(/],
  kotlin: [/^(public|private|internal|data|sealed|open|abstract|\s)*(class|interface|object|fun)\s/],
  csharp: [/^\s{0,4}(public|internal|private|protected|static|sealed|abstract|partial|\s)*(class|interface|struct|enum|record)\s+\w+/],
  ruby: [/^\s{0,2}(def|class|module)\s/],
  php: [/^\s{0,4}((public|private|protected|static|abstract|final)\s+)*(function|class|interface|trait)\s/],
  c: [/^[A-Za-z_][\w\s*]*\s\**\w+\s*\([^;]*$/, /^(typedef\s+)?struct\s+\w+/],
  cpp: [/^[A-Za-z_][\w\s*:<>,]*\s\**[\w:~]+\s*\([^;]*$/, /^(class|struct|namespace)\s+\w+/],
  markdown: [/^#{1,6}\s/],
};

// Lines that belong to the unit below them (decorators, doc comments, attributes).
const LEADING_ATTACHMENT = /^(@[\w.]+|\/\*\*|\s*\*|\/\/\/|#\[|\s*#(?!#)|"""|'''|\/\/)/;

function detectWithPatterns(patterns: RegExp[]): BoundaryDetector {
  return (lines) => {
    const starts: number[] = [];
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      if (patterns.some((pattern) => pattern.test(line))) {
        starts.push(i);
      }
    }
    return starts;
  };
}

export function boundaryDetectorFor(language: string): BoundaryDetector | null {
  const patterns = UNIT_PATTERNS[language];
  return patterns ? detectWithPatterns(patterns) : null;
}

/** Moves each boundary up over the decorator/comment lines directly above it. */
function attachLeadingLines(lines: string[], starts: number[], language: string): number[] {
  if (language === "markdown") return starts;
  const adjusted: number[] = [];
  let floor = 0;
  for (const start of starts) {
    let begin = start;
    while (begin - 1 >= floor && LEADING_ATTACHMENT.test(lines[begin - 1] ?? "")) {
      begin--;
    }
    adjusted.push(begin);
    floor = start + 1;
  }
  return adjusted;
}

export function splitLines(content: string): string[] {
  if (content === "") return [];
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/** Lines with their terminators kept, so `joinLines` over any range gives the original bytes. */
export function splitLinesKeepingEnds(content: string): string[] {
  return content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/** Joins lines from `splitLinesKeepingEnds`, minus the terminator of the last one. */
export function joinLines(lines: readonly string[]): string {
  return lines.join("").replace(/\r?\n$/, "");
}

function windowSpans(lines: string[], from: number, to: number, windowLines: number): ChunkSpan[] {
  const spans: ChunkSpan[] = [];
  for (let start = from; start <= to; start += windowLines) {
    const end = Math.min(start + windowLines - 1, to);
    spans.push({
      startLine: start,
      endLine: end,
      text: lines.slice(start - 1, end).join("\n"),
      boundary: "window",
    });
  }
  return spans;
}

function isBlank(lines: string[], from: number, to: number): boolean {
  for (let line = from; line <= to; line++) {
    if ((lines[line - 1] ?? "").trim() !== "") return false;
  }
  return true;
}

/**
 * Splits a file into ordered, non-overlapping spans that cover every line.
 *
 * Structural units are found with the language's boundary patterns. A unit
 * longer than two windows is cut into windows; blank-only segments are folded
 * into their neighbour. Files without recognizable structure fall back to
 * fixed windows.
 */
export function chunkLines(lines: string[], options: ChunkOptions): ChunkSpan[] {
  const windowLines = Math.max(1, options.windowLines ?? DEFAULT_WINDOW_LINES);
  const lineCount = lines.length;
  if (lineCount === 0) return [];

  const detector = boundaryDetectorFor(options.language);
  const rawStarts = detector ? detector(lines) : [];
  const starts = [...new Set(attachLeadingLines(lines, rawStarts, options.language))]
    .map((i) => i + 1)
    .filter((line) => line > 1);

  if (rawStarts.length === 0) {
    return windowSpans(lines, 1, lineCount, windowLines);
  }

  const segments: Array<[number, number]> = [];
  let cursor = 1;
  for (const start of starts) {
    segments.push([cursor, start - 1]);
    cursor = start;
  }
  segments.push([cursor, lineCount]);

  const merged: Array<[number, number]> = [];
  for (const [from, to] of segments) {
    const previous = merged[merged.length - 1];
    if (previous && isBlank(lines, previous[0], previous[1])) {
      previous[1] = to;
    } else if (previous && isBlank(lines, from, to)) {
      previous[1] = to;
    } else {
      merged.push([from, to]);
    }
  }

  const spans: ChunkSpan[] = [];
  for (const [from, to] of merged) {
    if (to - from + 1 > windowLines * 2) {
      spans.push(...windowSpans(lines, from, to, windowLines));
    } else {
      spans.push({
        startLine: from,
        endLine: to,
        text: lines.slice(from - 1, to).join("\n"),
        boundary: "structural",
      });
    }
  }
  return spans;
}

export function chunkContent(content: string, options: ChunkOptions): ChunkSpan[] {
  return chunkLines(splitLines(content), options);
}

export function chunkId(filePath: string, startLine: number, endLine: number): string {
  return `${filePath}#L${startLine}-L${endLine}`;
}
