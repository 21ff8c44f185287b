/**
 * Grue Core Types
 *
 * Canonical data models shared by the planner, kernel, recorder and session
 * adapters. Anything that crosses a package boundary is declared here.
 */

// ─── Session operations ─────────────────────────────────────────────

export const SESSION_OPERATIONS = [
  "play_action",
  "memory",
  "get_map",
  "inventory",
  "get_valid_actions",
] as const;

export type SessionOperation = (typeof SESSION_OPERATIONS)[number];

export const PLAY_ACTION: SessionOperation = "play_action";

export function isSessionOperation(name: string): name is SessionOperation {
  return (SESSION_OPERATIONS as readonly string[]).includes(name);
}

export type OperationArguments = Record<string, unknown>;

/**
 * The game session the agent plays through. Results are opaque: the kernel
 * only ever reads them through `extractResultText`.
 */
export interface GameSession {
  listOperations(): Promise<string[]>;
  callOperation(name: SessionOperation, args: OperationArguments): Promise<unknown>;
}

// ─── Decisions ──────────────────────────────────────────────────────

export interface Decision {
  rationale: string;
  /** Raw operation name as the model wrote it; resolved by the normalizer. */
  operation: string;
  arguments: OperationArguments;
}

export interface NormalizedCall {
  operation: SessionOperation;
  arguments: OperationArguments;
  /** Human-readable notes about repairs applied on the way. */
  notes: string[];
}

// ─── Observations ───────────────────────────────────────────────────

export interface SessionObservation {
  readonly text: string;
  readonly locationHint: string;
  readonly score: number;
  readonly moves: number;
  readonly terminal: boolean;
}

// ─── Exploration ────────────────────────────────────────────────────

/** location → sorted edge descriptors ("north -> Forest") */
export type MapState = Record<string, string[]>;

/**
 * The slice of the exploration tracker the normalizer and the stuck detector
 * need: per-location untried directions.
 */
export interface UntriedDirections {
  nextUntriedDirection(location: string, exclude?: ReadonlySet<string>): string | undefined;
  markDirectionTried(location: string, direction: string): boolean;
}

/** Read-only view of the action → failure count table. */
export interface FailureTable {
  count(action: string): number;
  has(action: string): boolean;
}

// ─── Progress ───────────────────────────────────────────────────────

export interface TurnSummary {
  step: number;
  action: string;
  location: string;
  score: number;
  scoreDelta: number;
  result: string;
}

export interface ProgressSignal {
  progressed: boolean;
  newLocation: boolean;
  stepsSinceProgress: number;
  looping: boolean;
}

// ─── Model ──────────────────────────────────────────────────────────

export interface UsageMetrics {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
  model?: string;
}

export interface ModelCallOptions {
  /** Varied per turn; a fixed run seed keeps the sequence reproducible. */
  seed: number;
  maxTokens: number;
}

export interface ModelCallResult {
  text: string;
  usage?: UsageMetrics;
}

export type ModelCallFn = (
  systemPrompt: string,
  userPrompt: string,
  options: ModelCallOptions,
) => Promise<ModelCallResult>;

// ─── Run record ─────────────────────────────────────────────────────

export interface TurnRecord {
  index: number;
  rationale: string;
  operation: SessionOperation;
  arguments: OperationArguments;
  observation_excerpt: string;
  location: string;
  score: number;
  moves: number;
  inventory: string[];
  valid_actions: string[];
  timestamp: string;
}

export interface RunMetadata {
  game_id: string;
  agent_id: string;
  seed: number;
  max_steps: number;
}

export interface RunFinalMetadata {
  final_score: number;
  final_moves: number;
  locations_visited: string[];
  game_completed: boolean;
  map_state: MapState;
  error?: string;
}

export interface RunRecord extends RunMetadata {
  run_id: string;
  started_at: string;
  ended_at: string | null;
  final_score: number;
  final_moves: number;
  locations_visited: string[];
  game_completed: boolean;
  map_state: MapState;
  error?: string;
  turns: TurnRecord[];
}

// ─── Logging ────────────────────────────────────────────────────────

export interface AgentLogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}
