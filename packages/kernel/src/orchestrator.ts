import type {
  AgentLogger,
  GameSession,
  ModelCallFn,
  OperationArguments,
  SessionOperation,
  TurnRecord,
} from "@grue/schemas";
import { PLAY_ACTION, isSessionOperation } from "@grue/schemas";
import {
  SYSTEM_PROMPT,
  buildPrompt,
  extractResultText,
  isTerminal,
  matchesFailure,
  normalizeAction,
  parseInventory,
  parseResponse,
  parseValidActions,
} from "@grue/planner";
import type { RunRecorder } from "@grue/recorder";
import { SessionState } from "./session-state.js";
import { silentLogger } from "./logger.js";

export type TurnPhase = "awaiting_decision" | "dispatching" | "observed" | "terminated";

const VALID_TRANSITIONS: Record<TurnPhase, TurnPhase[]> = {
  awaiting_decision: ["dispatching", "terminated"],
  dispatching: ["observed"],
  observed: ["awaiting_decision", "terminated"],
  terminated: [],
};

const OBSERVATION_EXCERPT = 500;
const HISTORY_EXCERPT = 100;
const SUMMARY_EXCERPT = 200;

export interface OrchestratorConfig {
  session: GameSession;
  callModel: ModelCallFn;
  recorder: RunRecorder;
  gameId: string;
  agentId: string;
  maxSteps: number;
  /** Turn N calls the model with seed + N. */
  seed: number;
  maxTokens?: number;
  walkthrough?: readonly string[];
  /** Reported as the run's maximum score. Default: 350 */
  maxScore?: number;
  /** Supply to inspect state from outside; a fresh one is created otherwise. */
  state?: SessionState;
  logger?: AgentLogger;
  /** Loop warnings and failure repeats go to logger.warn only when set. */
  verbose?: boolean;
  onVerbose?: (label: string, text: string) => void;
}

/** [rationale, call, observation excerpt] per turn. */
export type HistoryEntry = [string, string, string];

export interface RunUsage {
  calls: number;
  input_tokens: number;
  output_tokens: number;
}

export interface RunResult {
  runId: string;
  finalScore: number;
  maxScore: number;
  moves: number;
  locationsVisited: string[];
  gameCompleted: boolean;
  history: HistoryEntry[];
  artifactPath: string;
  usage: RunUsage;
}

interface DispatchOutcome {
  text: string;
  failed: boolean;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Drives one run: ask the model, repair its answer, dispatch to the session,
 * fold the observation into the run's state and record the turn.
 */
export class TurnOrchestrator {
  private config: OrchestratorConfig;
  private state: SessionState;
  private logger: AgentLogger;
  private verbose: boolean;
  private onVerbose?: (label: string, text: string) => void;
  private maxTokens: number;

  private phase: TurnPhase = "awaiting_decision";
  private accepted: SessionOperation[] = [];
  private history: HistoryEntry[] = [];
  private usage: RunUsage = { calls: 0, input_tokens: 0, output_tokens: 0 };
  private started = false;
  /** Loop signal from the previous turn's progress update; acted on before the next play_action. */
  private loopSignalled = false;

  constructor(config: OrchestratorConfig) {
    this.config = config;
    this.state = config.state ?? new SessionState();
    this.logger = config.logger ?? silentLogger;
    this.verbose = config.verbose ?? false;
    this.onVerbose = config.onVerbose;
    this.maxTokens = config.maxTokens ?? 300;
  }

  get currentPhase(): TurnPhase {
    return this.phase;
  }

  get sessionState(): SessionState {
    return this.state;
  }

  async run(): Promise<RunResult> {
    if (this.started) throw new Error("A TurnOrchestrator runs once; create a new one per run");
    this.started = true;

    const { recorder, gameId, agentId, seed, maxSteps } = this.config;
    const runId = await recorder.start({ game_id: gameId, agent_id: agentId, seed, max_steps: maxSteps });
    this.logger.info(`Run ${runId} started`, { game: gameId, agent: agentId, maxSteps });

    let failure: unknown;
    try {
      await this.begin();
      for (let step = 1; step <= maxSteps && this.phase !== "terminated"; step++) {
        await this.turn(step);
      }
      if (this.phase !== "terminated") this.transition("terminated");
    } catch (err) {
      failure = err;
      this.logger.error(`Run ${runId} aborted: ${errorMessage(err)}`);
    }

    const state = this.state;
    const gameCompleted = isTerminal(state.observation);
    const artifactPath = await recorder.finish({
      final_score: state.score,
      final_moves: state.moves,
      locations_visited: state.monitor.locationsVisited,
      game_completed: gameCompleted,
      map_state: state.tracker.toMapState(),
      ...(failure !== undefined ? { error: errorMessage(failure) } : {}),
    });
    if (failure !== undefined) throw failure;

    this.logger.info(`Run ${runId} finished`, { score: state.score, moves: state.moves, artifactPath });
    return {
      runId,
      finalScore: state.score,
      maxScore: this.config.maxScore ?? 350,
      moves: state.moves,
      locationsVisited: state.monitor.locationsVisited,
      gameCompleted,
      history: this.history,
      artifactPath,
      usage: { ...this.usage },
    };
  }

  // ─── Run start ─────────────────────────────────────────────────────────

  private async begin(): Promise<void> {
    const state = this.state;
    const offered = await this.config.session.listOperations();
    this.accepted = offered.filter(isSessionOperation);
    if (!this.accepted.includes(PLAY_ACTION)) {
      this.logger.warn("Session does not list play_action; dispatching it anyway");
    }

    if (this.accepted.includes("inventory")) {
      const { text } = await this.dispatch("inventory", {});
      state.inventory = parseInventory(text);
      this.onVerbose?.("[Inventory]", text);
    }
    if (this.accepted.includes("get_valid_actions")) {
      await this.refreshValidActions();
    }

    const { text } = await this.dispatch(PLAY_ACTION, { action: "look" });
    state.observe(text);
    state.location = state.tracker.observe(state.location, "look", text);
    state.monitor.registerLocation(state.location);
    this.onVerbose?.("[Start]", text);
  }

  // ─── One turn ──────────────────────────────────────────────────────────

  private async turn(step: number): Promise<void> {
    const state = this.state;
    const { monitor, tracker, failures } = state;

    await this.refreshContext();

    const prompt = buildPrompt({
      score: state.score,
      locationsExplored: tracker.locationCount(),
      step,
      walkthrough: this.config.walkthrough ?? [],
      recentTurns: monitor.recentTurns,
      recentActions: monitor.recentActions,
      failures: failures.entries(),
      validActions: state.validActions,
      currentMap: state.currentMap,
      stepsSinceProgress: monitor.stepsSinceProgress,
      untriedDirections: tracker.untriedDirections(state.location),
      observation: state.observation,
    });

    const { text: raw, usage } = await this.config.callModel(SYSTEM_PROMPT, prompt, {
      seed: this.config.seed + step,
      maxTokens: this.maxTokens,
    });
    this.usage.calls++;
    if (usage) {
      this.usage.input_tokens += usage.input_tokens;
      this.usage.output_tokens += usage.output_tokens;
    }

    const decision = parseResponse(raw, this.accepted);
    this.onVerbose?.(`[Step ${step}] Thought`, decision.rationale);

    const call = normalizeAction(decision.operation, decision.arguments, {
      acceptedOperations: this.accepted,
      failures,
      validActions: state.validActions,
      directions: tracker,
      currentLocation: state.location,
    });
    for (const note of call.notes) this.logger.debug(note);

    let action: string | undefined;
    if (call.operation === PLAY_ACTION) {
      action = typeof call.arguments.action === "string" ? call.arguments.action : "look";
      if (this.loopSignalled) {
        const escape = monitor.chooseEscape(state.validActions, failures, tracker, state.location);
        if (this.verbose) this.logger.warn(`Loop detected on "${action}"; trying "${escape}"`);
        action = escape;
        call.arguments = { ...call.arguments, action };
      }
      monitor.recordAction(action);
      state.actionsTaken++;
    }
    this.onVerbose?.(`[Step ${step}] Call`, `${call.operation}(${JSON.stringify(call.arguments)})`);

    this.transition("dispatching");
    const outcome = await this.dispatch(call.operation, call.arguments);
    this.transition("observed");
    this.onVerbose?.(`[Step ${step}] Result`, outcome.text.slice(0, SUMMARY_EXCERPT));

    const oldLocation = state.location;
    const oldScore = state.score;
    const obs = state.observe(outcome.text);
    this.absorbQueryResult(call.operation, outcome);

    if (action !== undefined && !outcome.failed) {
      state.location = tracker.observe(oldLocation, action, outcome.text);
    }
    const signal = monitor.update(oldLocation, state.location, oldScore, state.score);
    this.loopSignalled = signal.looping;
    if (signal.newLocation) this.onVerbose?.("[New location]", state.location);

    if (action !== undefined && matchesFailure(outcome.text)) {
      const count = failures.recordFailure(action);
      if (this.verbose && count >= 2) this.logger.warn(`"${action}" has failed ${count} times`);
    }

    monitor.recordTurn({
      step,
      action: action ?? call.operation,
      location: state.location,
      score: state.score,
      scoreDelta: state.score - oldScore,
      result: outcome.text.slice(0, SUMMARY_EXCERPT),
    });
    await this.config.recorder.append(this.turnRecord(step, decision.rationale, call.operation, call.arguments));
    this.history.push([
      decision.rationale,
      `${call.operation}(${JSON.stringify(call.arguments)})`,
      outcome.text.slice(0, HISTORY_EXCERPT),
    ]);

    this.logger.debug(`Step ${step}`, {
      location: state.location,
      score: state.score,
      stepsSinceProgress: signal.stepsSinceProgress,
    });

    if (obs.terminal) {
      this.logger.info(`Game ended at step ${step}`);
      this.transition("terminated");
    } else if (step >= this.config.maxSteps) {
      this.transition("terminated");
    } else {
      this.transition("awaiting_decision");
    }
  }

  private turnRecord(
    index: number,
    rationale: string,
    operation: SessionOperation,
    args: OperationArguments,
  ): TurnRecord {
    const state = this.state;
    return {
      index,
      rationale,
      operation,
      arguments: args,
      observation_excerpt: state.observation.slice(0, OBSERVATION_EXCERPT),
      location: state.location,
      score: state.score,
      moves: state.moves,
      inventory: [...state.inventory],
      valid_actions: [...state.validActions],
      timestamp: new Date().toISOString(),
    };
  }

  // ─── Context refresh ───────────────────────────────────────────────────

  private async refreshContext(): Promise<void> {
    const { monitor, tracker } = this.state;
    monitor.beginTurn();

    if (monitor.mapRefreshDue()) {
      if (this.accepted.includes("get_map")) {
        const { text } = await this.dispatch("get_map", {});
        this.state.currentMap = text;
      } else {
        this.state.currentMap = tracker.render(this.state.location);
      }
      monitor.markMapRefreshed();
      this.onVerbose?.("[Map]", this.state.currentMap);
    }

    if (monitor.validActionsRefreshDue()) {
      if (this.accepted.includes("get_valid_actions")) {
        await this.refreshValidActions();
      }
      monitor.markValidActionsRefreshed();
    }
  }

  private async refreshValidActions(): Promise<void> {
    const { text } = await this.dispatch("get_valid_actions", {});
    const parsed = parseValidActions(text);
    if (parsed) {
      this.state.validActions = parsed;
      this.onVerbose?.("[Valid actions]", parsed.join(", "));
    }
  }

  private absorbQueryResult(operation: SessionOperation, outcome: DispatchOutcome): void {
    if (outcome.failed) return;
    if (operation === "inventory") {
      this.state.inventory = parseInventory(outcome.text);
    } else if (operation === "get_valid_actions") {
      const parsed = parseValidActions(outcome.text);
      if (parsed) this.state.validActions = parsed;
    } else if (operation === "get_map") {
      this.state.currentMap = outcome.text;
    }
  }

  // ─── Session boundary ──────────────────────────────────────────────────

  /** Session errors become "Error: ..." observations; they never end the run. */
  private async dispatch(operation: SessionOperation, args: OperationArguments): Promise<DispatchOutcome> {
    try {
      const result = await this.config.session.callOperation(operation, args);
      return { text: extractResultText(result), failed: false };
    } catch (err) {
      const text = `Error: ${errorMessage(err)}`;
      this.logger.debug(`${operation} failed`, { error: text });
      return { text, failed: true };
    }
  }

  private transition(next: TurnPhase): void {
    const allowed = VALID_TRANSITIONS[this.phase];
    if (!allowed.includes(next)) {
      throw new Error(`Invalid turn transition: ${this.phase} → ${next}`);
    }
    this.phase = next;
  }
}
