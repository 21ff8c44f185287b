import { readFileSync } from "node:fs";
import { basename, extname } from "node:path";

export const PROVIDERS = ["claude", "openai", "gemini", "mock"] as const;
export type Provider = (typeof PROVIDERS)[number];

export const PROVIDER_DEFAULTS: Record<Provider, string> = {
  claude: "claude-sonnet-4-5",
  openai: "gpt-4o",
  gemini: "gemini-2.5-flash",
  mock: "mock",
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface RunnerConfig {
  provider: Provider;
  model: string;
  /** Credential for the selected provider; absent for mock and keyless OpenAI-compatible endpoints. */
  apiKey?: string;
  baseURL?: string;
  gamePath: string;
  gameId: string;
  agentId: string;
  maxSteps: number;
  seed: number;
  maxTokens: number;
  logDir: string;
  verbose: boolean;
  walkthrough?: string[];
  dfrotzBin: string;
  /** 0 disables the per-call timeout. */
  callTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

function isProvider(value: string): value is Provider {
  return PROVIDERS.some(p => p === value);
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readFlag(env: Env, name: string): boolean {
  const raw = env[name]?.trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

/** One action per line; blank lines and "#" comments are skipped. */
export function parseWalkthrough(text: string): string[] {
  return text
    .split("\n")
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith("#"));
}

function readWalkthrough(path: string): string[] {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read GRUE_WALKTHROUGH_PATH "${path}": ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseWalkthrough(text);
}

function resolveCredentials(provider: Provider, env: Env): Pick<RunnerConfig, "apiKey" | "baseURL"> {
  switch (provider) {
    case "claude": {
      const apiKey = env.ANTHROPIC_API_KEY;
      if (!apiKey) {
        throw new ConfigError(
          "ANTHROPIC_API_KEY environment variable is required for the claude provider.\n" +
          "Set it with: export ANTHROPIC_API_KEY=<your key>",
        );
      }
      return { apiKey };
    }
    case "openai": {
      const apiKey = env.OPENAI_API_KEY;
      const baseURL = env.OPENAI_BASE_URL;
      if (!apiKey && !baseURL) {
        throw new ConfigError(
          "OPENAI_API_KEY or OPENAI_BASE_URL environment variable is required for the openai provider.\n" +
          "For local endpoints (Ollama, vLLM): export OPENAI_BASE_URL=http://localhost:11434/v1",
        );
      }
      return { apiKey, baseURL };
    }
    case "gemini": {
      const apiKey = env.GOOGLE_API_KEY;
      if (!apiKey) {
        throw new ConfigError("GOOGLE_API_KEY environment variable is required for the gemini provider.");
      }
      return { apiKey };
    }
    case "mock":
      return {};
  }
}

/**
 * Build the run configuration from environment variables. Every problem is
 * reported as a ConfigError before anything is started.
 */
export function loadConfig(env: Env = process.env): RunnerConfig {
  const providerName = env.GRUE_PROVIDER?.trim().toLowerCase() || (env.ANTHROPIC_API_KEY ? "claude" : "mock");
  if (!isProvider(providerName)) {
    throw new ConfigError(`Unknown provider: "${providerName}". Valid options: ${PROVIDERS.join(", ")}`);
  }
  const provider = providerName;

  const gamePath = env.GRUE_GAME_PATH?.trim();
  if (!gamePath) {
    throw new ConfigError("GRUE_GAME_PATH is required: point it at a Z-machine story file (e.g. zork1.z5)");
  }

  const walkthroughPath = env.GRUE_WALKTHROUGH_PATH?.trim();

  return {
    provider,
    model: env.GRUE_MODEL?.trim() || PROVIDER_DEFAULTS[provider],
    ...resolveCredentials(provider, env),
    gamePath,
    gameId: env.GRUE_GAME_ID?.trim() || basename(gamePath, extname(gamePath)),
    agentId: env.GRUE_AGENT_ID?.trim() || "grue-agent",
    maxSteps: readInt(env, "GRUE_MAX_STEPS", 100, 1),
    seed: readInt(env, "GRUE_SEED", 42, 0),
    maxTokens: readInt(env, "GRUE_MAX_TOKENS", 300, 1),
    logDir: env.GRUE_LOG_DIR?.trim() || "logs",
    verbose: readFlag(env, "GRUE_VERBOSE"),
    walkthrough: walkthroughPath ? readWalkthrough(walkthroughPath) : undefined,
    dfrotzBin: env.GRUE_DFROTZ_BIN?.trim() || "dfrotz",
    callTimeoutMs: readInt(env, "GRUE_CALL_TIMEOUT_MS", 0, 0),
  };
}
