export {
  CARDINAL_DIRECTIONS,
  TERMINAL_PHRASES,
  FAILURE_PHRASES,
  canonicalDirection,
  isMovementAction,
  extractLocation,
  extractScore,
  extractMoves,
  isTerminal,
  matchesFailure,
  parseValidActions,
  parseInventory,
  extractResultText,
  toObservation,
} from "./observation.js";
export type { Direction } from "./observation.js";
export {
  parseResponse,
  parseArguments,
  stripDecoration,
  RATIONALE_LABEL,
  OPERATION_LABEL,
  ARGUMENTS_LABEL,
  DEFAULT_RATIONALE,
  FALLBACK_ACTION,
} from "./response-parser.js";
export { normalizeAction, resolveOperation, canonicalizeAction, FAILURE_LIMIT } from "./action-normalizer.js";
export type { NormalizerContext } from "./action-normalizer.js";
export { ExplorationTracker } from "./exploration-tracker.js";
export { ActionOutcomeStats } from "./action-outcomes.js";
export {
  SYSTEM_PROMPT,
  buildPrompt,
  formatTurnSummary,
  isRepeating,
  countMapLocations,
} from "./prompt-builder.js";
export type { PromptContext } from "./prompt-builder.js";
