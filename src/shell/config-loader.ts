import * as os from "node:os";
import * as path from "node:path";
import yaml from "js-yaml";
import { parseConfig } from "../core/config.js";
import type { Config } from "../core/types.js";
import type { FileSystemPort } from "../ports/filesystem.js";
import { nodeFileSystem } from "./adapters/node-filesystem.js";

/** Config file looked up in the working directory when none is given. */
export const DEFAULT_CONFIG_FILE = "repo-cite.yaml";

function resolvePath(p: string, baseDir: string): string {
  if (p.startsWith("~/")) return path.resolve(os.homedir(), p.slice(2));
  return path.resolve(baseDir, p);
}

export async function loadConfig(filePath: string, fs: FileSystemPort = nodeFileSystem): Promise<Config> {
  const content = await fs.readFile(filePath);
  const config = parseConfig(yaml.load(content));

  // Relative paths in the file are relative to the file itself.
  if (config.codeHost?.type === "file") {
    config.codeHost.path = resolvePath(config.codeHost.path, path.dirname(path.resolve(filePath)));
  }
  return config;
}

/**
 * Loads `explicitPath` if given; otherwise the default file in `cwd` when it
 * exists, or built-in defaults when it does not.
 */
export async function loadConfigOrDefaults(
  explicitPath: string | undefined,
  cwd: string = process.cwd(),
  fs: FileSystemPort = nodeFileSystem,
): Promise<Config> {
  if (explicitPath) return loadConfig(explicitPath, fs);
  const candidate = path.join(cwd, DEFAULT_CONFIG_FILE);
  try {
    await fs.access(candidate);
  } catch {
    return parseConfig(undefined);
  }
  return loadConfig(candidate, fs);
}

export interface Secrets {
  openRouterApiKey: string | null;
  githubToken: string | null;
}

export function readSecrets(env: NodeJS.ProcessEnv = process.env): Secrets {
  const pick = (value: string | undefined): string | null => (value && value.trim() ? value.trim() : null);
  return { openRouterApiKey: pick(env.OPENROUTER_API_KEY), githubToken: pick(env.GITHUB_TOKEN) };
}
