/**
 * Maps whatever the model proposed onto something the session will accept.
 * Actions that keep failing are swapped for a different action before dispatch.
 */

import type {
  FailureTable,
  NormalizedCall,
  OperationArguments,
  SessionOperation,
  UntriedDirections,
} from "@grue/schemas";
import { PLAY_ACTION, isSessionOperation } from "@grue/schemas";
import { CARDINAL_DIRECTIONS, canonicalDirection } from "./observation.js";
import { FALLBACK_ACTION, stripDecoration } from "./response-parser.js";

/** An action that failed this many times is replaced before dispatch. */
export const FAILURE_LIMIT = 3;

const OPERATION_SYNONYMS: Record<string, SessionOperation> = {
  action: "play_action",
  do: "play_action",
  command: "play_action",
  play: "play_action",
  mem: "memory",
  state: "memory",
  status: "memory",
  memory: "memory",
  map: "get_map",
  location: "get_map",
  inv: "inventory",
  items: "inventory",
  valid: "get_valid_actions",
  actions: "get_valid_actions",
  valid_actions: "get_valid_actions",
};

/** Verbs the interpreter rejects, mapped to the closest verb it knows. */
const VERB_SYNONYMS: Record<string, string> = {
  check: "examine",
  inspect: "examine",
  investigate: "examine",
  use: "examine",
  search: "look",
  grab: "take",
  pick: "take",
};

export interface NormalizerContext {
  acceptedOperations: readonly string[];
  failures: FailureTable;
  validActions: readonly string[];
  directions: UntriedDirections;
  currentLocation: string;
}

export function resolveOperation(name: string, acceptedOperations: readonly string[]): SessionOperation {
  const accepted = acceptedOperations.filter(isSessionOperation);
  const lowered = name.trim().toLowerCase();
  if (isSessionOperation(lowered) && accepted.includes(lowered)) return lowered;

  const synonym = OPERATION_SYNONYMS[lowered];
  if (synonym && accepted.includes(synonym)) return synonym;
  if (accepted.includes(PLAY_ACTION) || accepted.length === 0) return PLAY_ACTION;
  return accepted[0] ?? PLAY_ACTION;
}

/**
 * Lower-case, drop formatting markers and wrapping quotes, collapse
 * whitespace, then swap a rejected leading verb. Only the first word is ever
 * replaced.
 */
export function canonicalizeAction(action: string): string {
  const words = stripDecoration(action)
    .toLowerCase()
    .trim()
    .replace(/^["'`]+|["'`]+$/g, "")
    .replace(/[.!?]+$/, "")
    .split(/\s+/)
    .filter(w => w.length > 0);
  const first = words[0];
  if (first !== undefined) {
    const replacement = VERB_SYNONYMS[first];
    if (replacement) words[0] = replacement;
  }
  return words.length > 0 ? words.join(" ") : FALLBACK_ACTION;
}

function substituteFailedAction(action: string, ctx: NormalizerContext): string {
  const fresh = ctx.validActions.find(candidate => !ctx.failures.has(candidate));
  if (fresh !== undefined) return fresh;
  const failedDirections = new Set<string>(CARDINAL_DIRECTIONS.filter(d => ctx.failures.has(d)));
  return ctx.directions.nextUntriedDirection(ctx.currentLocation, failedDirections) ?? action;
}

export function normalizeAction(
  operation: string,
  args: OperationArguments,
  ctx: NormalizerContext,
): NormalizedCall {
  const notes: string[] = [];
  const resolved = resolveOperation(operation, ctx.acceptedOperations);
  if (resolved !== operation) {
    notes.push(`operation "${operation}" resolved to ${resolved}`);
  }
  if (resolved !== PLAY_ACTION) {
    return { operation: resolved, arguments: args, notes };
  }

  const proposed = typeof args.action === "string" ? args.action : FALLBACK_ACTION;
  let action = canonicalizeAction(proposed);
  if (action !== proposed) {
    notes.push(`action "${proposed}" normalized to "${action}"`);
  }

  const failures = ctx.failures.count(action);
  if (failures >= FAILURE_LIMIT) {
    const substitute = substituteFailedAction(action, ctx);
    if (substitute !== action) {
      notes.push(`"${action}" failed ${failures} times; trying "${substitute}"`);
      action = substitute;
    }
  }

  if (canonicalDirection(action)) {
    ctx.directions.markDirectionTried(ctx.currentLocation, action);
  }

  return { operation: PLAY_ACTION, arguments: { ...args, action }, notes };
}
