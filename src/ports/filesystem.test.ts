import { describe, it, expect } from "vitest";
import type { FileSystemPort } from "./filesystem.js";

describe("FileSystemPort", () => {
  it("interface is structurally satisfied by an object with all methods", () => {
    const mock: FileSystemPort = {
      readFile: async () => "",
      readBytes: async () => new Uint8Array(),
      stat: async () => ({ size: 0, mtimeMs: 0, isDirectory: () => false }),
      access: async () => {},
      glob: async () => [],
    };

    expect(mock.readFile).toBeDefined();
    expect(mock.readBytes).toBeDefined();
    expect(mock.stat).toBeDefined();
    expect(mock.access).toBeDefined();
    expect(mock.glob).toBeDefined();
  });
});
