import type { Config } from "../core/types.js";
import type { CodeHostPort } from "../ports/code-host.js";
import type { FileSystemPort } from "../ports/filesystem.js";
import type { ReasoningEnginePort } from "../ports/reasoning-engine.js";
import { FileCodeHost } from "./adapters/file-code-host.js";
import { GitHubCodeHost } from "./adapters/github-code-host.js";
import { nodeFileSystem } from "./adapters/node-filesystem.js";
import type { Secrets } from "./config-loader.js";
import { OpenRouterEngine } from "./openrouter-engine.js";
import { Session, type SessionOptions } from "./session.js";

/** Null when no provider is configured or its API key is missing. */
export function createEngine(config: Config, secrets: Secrets): ReasoningEnginePort | null {
  if (!config.provider || !secrets.openRouterApiKey) return null;
  return new OpenRouterEngine(config.provider, secrets.openRouterApiKey);
}

export function createCodeHost(config: Config, secrets: Secrets, fs: FileSystemPort = nodeFileSystem): CodeHostPort | null {
  const host = config.codeHost;
  if (!host) return null;
  if (host.type === "file") return new FileCodeHost(host.path, fs);
  return new GitHubCodeHost({
    owner: host.owner,
    repo: host.repo,
    apiUrl: host.apiUrl,
    token: secrets.githubToken ?? undefined,
  });
}

export function createSession(
  config: Config,
  secrets: Secrets,
  extra: Omit<SessionOptions, "config" | "engine" | "codeHost"> = {},
): Session {
  return Session.create({
    ...extra,
    config,
    engine: createEngine(config, secrets),
    codeHost: createCodeHost(config, secrets, extra.fs),
  });
}
