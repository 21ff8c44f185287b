export { TurnOrchestrator } from "./orchestrator.js";
export type { OrchestratorConfig, RunResult, RunUsage, HistoryEntry, TurnPhase } from "./orchestrator.js";
export { SessionState } from "./session-state.js";
export { ProgressMonitor } from "./progress-monitor.js";
export type { ProgressMonitorConfig } from "./progress-monitor.js";
export { ConsoleLogger, silentLogger } from "./logger.js";
export type { ConsoleLoggerOptions, LogLevel } from "./logger.js";
