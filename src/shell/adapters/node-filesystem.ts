import * as fs from "node:fs/promises";
import fg from "fast-glob";
import type { FileSystemPort, GlobOptions, StatResult } from "../../ports/filesystem.js";

export const nodeFileSystem: FileSystemPort = {
  readFile: (path) => fs.readFile(path, { encoding: "utf8" }),
  readBytes: async (path) => new Uint8Array(await fs.readFile(path)),
  stat: async (path): Promise<StatResult> => {
    const s = await fs.stat(path);
    return { size: s.size, mtimeMs: s.mtimeMs, isDirectory: () => s.isDirectory() };
  },
  access: (path) => fs.access(path, fs.constants.R_OK),
  glob: (patterns, options: GlobOptions) => fg(patterns, options),
};
