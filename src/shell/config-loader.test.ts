import { describe, it, expect } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { ConfigError } from "../core/config.js";
import { DEFAULT_CONFIG_FILE, loadConfig, loadConfigOrDefaults, readSecrets } from "./config-loader.js";

async function withTempDir(fn: (dir: string) => Promise<void>) {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "repo-cite-config-"));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true });
  }
}

const validYaml = `
provider:
  type: openrouter
  model: openai/gpt-4.1
code_host:
  type: file
  path: exports/issues.json
retrieval:
  top_k: 5
`;

describe("loadConfig", () => {
  it("loads a YAML file and resolves the code host file next to it", async () => {
    await withTempDir(async (dir) => {
      const filePath = path.join(dir, "config.yaml");
      await fs.writeFile(filePath, validYaml, "utf-8");
      const config = await loadConfig(filePath);
      expect(config.provider?.model).toBe("openai/gpt-4.1");
      expect(config.retrieval.topK).toBe(5);
      expect(config.codeHost).toEqual({ type: "file", path: path.join(dir, "exports/issues.json"), cacheTtlMs: 300_000 });
    });
  });

  it("throws on a missing file", async () => {
    await expect(loadConfig("/tmp/repo-cite-nonexistent-config.yaml")).rejects.toThrow();
  });

  it("throws on invalid YAML", async () => {
    await withTempDir(async (dir) => {
      const filePath = path.join(dir, "config.yaml");
      await fs.writeFile(filePath, "{{invalid yaml", "utf-8");
      await expect(loadConfig(filePath)).rejects.toThrow();
    });
  });

  it("throws ConfigError on a schema violation", async () => {
    await withTempDir(async (dir) => {
      const filePath = path.join(dir, "config.yaml");
      await fs.writeFile(filePath, "retrieval:\n  top_k: 0\n", "utf-8");
      await expect(loadConfig(filePath)).rejects.toBeInstanceOf(ConfigError);
    });
  });
});

describe("loadConfigOrDefaults", () => {
  it("falls back to built-in defaults without a config file", async () => {
    await withTempDir(async (dir) => {
      const config = await loadConfigOrDefaults(undefined, dir);
      expect(config.provider).toBeNull();
      expect(config.codeHost).toBeNull();
      expect(config.retrieval.topK).toBe(10);
    });
  });

  it("picks up the default file from the working directory", async () => {
    await withTempDir(async (dir) => {
      await fs.writeFile(path.join(dir, DEFAULT_CONFIG_FILE), "agent:\n  max_refinements: 1\n", "utf-8");
      const config = await loadConfigOrDefaults(undefined, dir);
      expect(config.agent.maxRefinements).toBe(1);
    });
  });
});

describe("readSecrets", () => {
  it("reads trimmed secrets and treats blanks as missing", () => {
    expect(readSecrets({ OPENROUTER_API_KEY: " test-secret ", GITHUB_TOKEN: "  " })).toEqual({
      openRouterApiKey: "test-secret",
      githubToken: null,
    });
  });
});
