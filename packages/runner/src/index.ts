export { loadConfig, parseWalkthrough, ConfigError, PROVIDERS, PROVIDER_DEFAULTS } from "./config.js";
export type { RunnerConfig, Provider } from "./config.js";
export { createModelCall, createMockCallFn, withRetry, isTransientError } from "./llm-adapters.js";
export type { RetryOptions } from "./llm-adapters.js";
export { runGame, withCallTimeout, formatSummary } from "./run-game.js";
export type { RunGameDeps } from "./run-game.js";
