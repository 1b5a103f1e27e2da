import { describe, it, expect, vi } from "vitest";
import * as fs from "node:fs/promises";
import path from "node:path";
import * as os from "node:os";
import type { FilterOptions } from "../core/filter.js";
import { InMemoryFileSystem } from "./__test__/fakes.js";
import { collectFiles } from "./file-collector.js";

async function withTempRepo(
  files: Record<string, string>,
  fn: (repoPath: string) => Promise<void>,
) {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "repo-test-"));
  for (const [filePath, content] of Object.entries(files)) {
    const full = path.join(dir, filePath);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content, "utf8");
  }
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true });
  }
}

const OPTIONS: FilterOptions = { ignoreDirs: ["node_modules", ".git"], maxFileSizeKb: 1 };

describe("collectFiles", () => {
  it("walks the repository in path order and classifies each file", async () => {
    await withTempRepo(
      {
        "src/index.ts": "export const x = 1;\n",
        "node_modules/pkg/index.js": "module.exports = {};",
        ".env": "TOKEN=test-secret",
        "logo.png": "PNG",
        "blob.dat": "\u0000abc",
        "big.txt": "x".repeat(2048),
      },
      async (repoPath) => {
        const { files, skipped } = await collectFiles(repoPath, OPTIONS);
        expect(files.map((f) => [f.path, f.kind === "text" ? "text" : f.reason])).toEqual([
          ["big.txt", "oversized"],
          ["blob.dat", "binary"],
          ["logo.png", "binary"],
          ["src/index.ts", "text"],
        ]);
        const source = files[3];
        expect(source?.kind === "text" && source.content).toBe("export const x = 1;\n");
        expect(skipped).toEqual([]);
      },
    );
  });

  it("reports unreadable files as skipped and keeps going", async () => {
    const memory = new InMemoryFileSystem("/repo", { "a.py": "print(1)\n", "b.py": "print(2)\n" });
    memory.unreadable.add("/repo/a.py");
    const log = vi.fn();

    const { files, skipped } = await collectFiles("/repo", OPTIONS, memory, log);

    expect(files.map((f) => f.path)).toEqual(["b.py"]);
    expect(skipped).toEqual([{ path: "a.py", reason: "EACCES: permission denied, open '/repo/a.py'" }]);
    expect(log).toHaveBeenCalledWith("Skipping a.py: EACCES: permission denied, open '/repo/a.py'");
  });
});
