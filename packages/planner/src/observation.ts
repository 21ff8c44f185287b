/**
 * Observation extraction: everything the agent knows about the game it reads
 * out of opaque session text. Session results carry no structured fields the
 * core relies on; location, score, moves and the terminal flag all come from
 * here.
 */

import type { SessionObservation } from "@grue/schemas";

// ─── Lexicons ─────────────────────────────────────────────────────────────────

export const CARDINAL_DIRECTIONS = ["north", "south", "east", "west", "up", "down"] as const;

export type Direction = (typeof CARDINAL_DIRECTIONS)[number];

const DIRECTION_ALIASES: Record<string, Direction> = {
  north: "north", n: "north",
  south: "south", s: "south",
  east: "east", e: "east",
  west: "west", w: "west",
  up: "up", u: "up",
  down: "down", d: "down",
};

const MOVEMENT_ACTIONS = new Set<string>([
  "north", "south", "east", "west", "up", "down", "enter", "exit",
  "n", "s", "e", "w", "u", "d",
]);

export const TERMINAL_PHRASES = [
  "game over",
  "you have died",
  "you are dead",
  "*** you have died ***",
] as const;

export const FAILURE_PHRASES = [
  "can't",
  "cannot",
  "don't",
  "not",
  "fail",
  "impossible",
  "doesn't work",
  "not allowed",
  "not know which way",
  "get in big trouble",
  "look dark",
] as const;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Phrases must start a word ("not" fires on "nothing" but never on "another").
const FAILURE_PATTERN = new RegExp(
  `(?:^|[^a-z'])(?:${FAILURE_PHRASES.map(escapeRegExp).join("|")})`,
  "i",
);

const SCORE_PATTERNS = [
  /Score:\s*(\d+)/i,
  /score[:\s]+(\d+)/i,
  /\[Score:\s*(\d+)/i,
];

const MOVES_PATTERN = /Moves:\s*(\d+)/i;

const UNKNOWN_LOCATION = "Unknown";

// ─── Directions ───────────────────────────────────────────────────────────────

export function canonicalDirection(action: string): Direction | undefined {
  return DIRECTION_ALIASES[action.trim().toLowerCase()];
}

export function isMovementAction(action: string): boolean {
  return MOVEMENT_ACTIONS.has(action.trim().toLowerCase());
}

// ─── Text extraction ──────────────────────────────────────────────────────────

/** First non-empty line that is not a bracketed status/annotation line. */
export function extractLocation(text: string): string {
  if (!text) return UNKNOWN_LOCATION;
  for (const raw of text.trim().split("\n")) {
    const line = raw.trim();
    if (line && !line.startsWith("[")) return line;
  }
  return UNKNOWN_LOCATION;
}

/** Highest score any known pattern reports, or undefined if none matches. */
export function extractScore(text: string): number | undefined {
  let best: number | undefined;
  for (const pattern of SCORE_PATTERNS) {
    const match = pattern.exec(text);
    if (match?.[1] === undefined) continue;
    const value = parseInt(match[1], 10);
    best = best === undefined ? value : Math.max(best, value);
  }
  return best;
}

export function extractMoves(text: string): number | undefined {
  const match = MOVES_PATTERN.exec(text);
  return match?.[1] === undefined ? undefined : parseInt(match[1], 10);
}

export function isTerminal(text: string): boolean {
  const lower = text.toLowerCase();
  return TERMINAL_PHRASES.some(phrase => lower.includes(phrase));
}

export function matchesFailure(text: string): boolean {
  return FAILURE_PATTERN.test(text);
}

/**
 * Parse a "Valid actions: a, b, c" reply. Returns undefined when the reply
 * does not carry the marker (e.g. an error text or an unsupported game).
 */
export function parseValidActions(text: string): string[] | undefined {
  const marker = "Valid actions:";
  const idx = text.indexOf(marker);
  if (idx === -1) return undefined;
  return text
    .slice(idx + marker.length)
    .split(",")
    .map(a => a.trim())
    .filter(a => a.length > 0);
}

/**
 * Parse an inventory reply. Handles both the flat "Inventory: a, b" form and
 * the interpreter's "You are carrying:\n  A lamp\n  A sword" listing.
 */
export function parseInventory(text: string): string[] {
  const lower = text.toLowerCase();
  if (lower.includes("empty-handed") || lower.includes("nothing")) return [];
  const colon = text.indexOf(":");
  if (colon === -1) return [];
  return text
    .slice(colon + 1)
    .split(/[,\n]/)
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

// ─── Opaque results ───────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function textOf(item: unknown): string | undefined {
  return isRecord(item) && typeof item.text === "string" ? item.text : undefined;
}

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "";
  if (typeof value === "object" && value !== null) {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

/**
 * The single adaptation point for session results. Fallback chain:
 *   1. a result carrying typed content (`{ content: [{ text }] }`)
 *   2. a bare list of typed items (`[{ text }]`)
 *   3. the value itself, stringified
 */
export function extractResultText(result: unknown): string {
  if (typeof result === "string") return result;
  if (isRecord(result) && Array.isArray(result.content) && result.content.length > 0) {
    const text = textOf(result.content[0]);
    if (text !== undefined) return text;
  }
  if (Array.isArray(result) && result.length > 0) {
    return textOf(result[0]) ?? stringify(result[0]);
  }
  return stringify(result);
}

// ─── Observation ──────────────────────────────────────────────────────────────

/**
 * Build an immutable observation. Score never goes down: the reported score is
 * the max of the previous score and anything the text reports. Moves fall back
 * to the caller's own count when the text carries none.
 */
export function toObservation(
  text: string,
  previous: { score: number; moves: number },
): SessionObservation {
  const reported = extractScore(text);
  return Object.freeze({
    text,
    locationHint: extractLocation(text),
    score: reported === undefined ? previous.score : Math.max(previous.score, reported),
    moves: extractMoves(text) ?? previous.moves,
    terminal: isTerminal(text),
  });
}
