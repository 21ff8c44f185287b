import type { AgentLogger, GameSession, ModelCallFn } from "@grue/schemas";
import { withTimeout } from "@grue/schemas";
import { ConsoleLogger, TurnOrchestrator } from "@grue/kernel";
import type { RunResult } from "@grue/kernel";
import { RunRecorder } from "@grue/recorder";
import { EmulatorSession, FrotzEmulator, suggestActions } from "@grue/tools";
import type { GameEmulator } from "@grue/tools";
import type { RunnerConfig } from "./config.js";
import { createModelCall } from "./llm-adapters.js";

export interface RunGameDeps {
  emulator?: GameEmulator;
  callModel?: ModelCallFn;
  logger?: AgentLogger;
}

/** Bound both collaborators by the same per-call timeout. */
export function withCallTimeout(
  session: GameSession,
  callModel: ModelCallFn,
  ms: number,
): { session: GameSession; callModel: ModelCallFn } {
  if (ms <= 0) return { session, callModel };
  return {
    session: {
      listOperations: () => withTimeout(session.listOperations(), ms, "listOperations"),
      callOperation: (name, args) => withTimeout(session.callOperation(name, args), ms, name),
    },
    callModel: (system, user, options) => withTimeout(callModel(system, user, options), ms, "Model call"),
  };
}

/**
 * Start the game, play one run and always shut the interpreter down, whether
 * the run finished or threw.
 */
export async function runGame(config: RunnerConfig, deps: RunGameDeps = {}): Promise<RunResult> {
  const logger = deps.logger ?? new ConsoleLogger("grue", { verbose: config.verbose });
  const emulator = deps.emulator ?? new FrotzEmulator(config.gamePath, { bin: config.dfrotzBin, seed: config.seed });
  const gameSession = new EmulatorSession(emulator, { gameId: config.gameId, validActions: suggestActions });

  logger.info(`Starting ${config.gameId}`, { provider: config.provider, model: config.model, maxSteps: config.maxSteps });
  await gameSession.start();
  try {
    const { session, callModel } = withCallTimeout(
      gameSession,
      deps.callModel ?? createModelCall(config),
      config.callTimeoutMs,
    );
    const orchestrator = new TurnOrchestrator({
      session,
      callModel,
      recorder: new RunRecorder({ logDir: config.logDir }),
      gameId: config.gameId,
      agentId: config.agentId,
      maxSteps: config.maxSteps,
      seed: config.seed,
      maxTokens: config.maxTokens,
      walkthrough: config.walkthrough,
      logger,
      verbose: config.verbose,
      onVerbose: config.verbose ? (label, text) => logger.debug(`${label}\n${text}`) : undefined,
    });
    return await orchestrator.run();
  } finally {
    await gameSession.close();
  }
}

export function formatSummary(result: RunResult): string {
  return [
    `Final score: ${result.finalScore}/${result.maxScore}`,
    `Moves: ${result.moves}`,
    `Locations visited: ${result.locationsVisited.length}`,
    `Game completed: ${result.gameCompleted ? "yes" : "no"}`,
    `Model calls: ${result.usage.calls} (${result.usage.input_tokens} in / ${result.usage.output_tokens} out tokens)`,
    `Run log: ${result.artifactPath}`,
  ].join("\n");
}
