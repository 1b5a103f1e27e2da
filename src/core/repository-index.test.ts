import { describe, expect, it } from "vitest";
import { buildCorpus } from "./__test__/corpus.js";

describe("RepositoryIndex.readLines", () => {
  const index = buildCorpus({
    "win.txt": "one\r\ntwo\r\nthree\r\n",
    "unix.py": "def a():\n    return 1\n",
  });

  it("keeps CRLF terminators inside the range", () => {
    expect(index.readLines("win.txt", 1, 2)).toBe("one\r\ntwo");
    expect(index.readLines("win.txt", 3, 3)).toBe("three");
  });

  it("returns LF files unchanged", () => {
    expect(index.readLines("unix.py", 1, 2)).toBe("def a():\n    return 1");
  });

  it("rejects unknown files and ranges outside the file", () => {
    expect(index.readLines("missing.txt", 1, 1)).toBeNull();
    expect(index.readLines("win.txt", 0, 1)).toBeNull();
    expect(index.readLines("win.txt", 2, 4)).toBeNull();
    expect(index.readLines("win.txt", 2, 1)).toBeNull();
  });
});
