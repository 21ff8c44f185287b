/**
 * Turns raw model text into a Decision. The model is asked for three labeled
 * lines (THOUGHT / TOOL / ARGS); anything it gets wrong degrades to defaults.
 * This function never throws.
 */

import type { Decision, OperationArguments } from "@grue/schemas";
import { PLAY_ACTION } from "@grue/schemas";

export const RATIONALE_LABEL = "THOUGHT:";
export const OPERATION_LABEL = "TOOL:";
export const ARGUMENTS_LABEL = "ARGS:";

export const DEFAULT_RATIONALE = "No reasoning provided";
export const FALLBACK_ACTION = "look";

const ACTION_PATTERN = /"action"\s*:\s*"([^"]+)"/;

function isPlainObject(value: unknown): value is OperationArguments {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): OperationArguments | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isPlainObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export function stripDecoration(text: string): string {
  return text.replace(/\*\*/g, "").replace(/[*`]/g, "");
}

/**
 * Arguments, in order of preference: strict JSON; JSON written with single
 * quotes; a lone `"action": "..."` pair; the safe no-op.
 */
export function parseArguments(text: string): OperationArguments {
  const trimmed = text.trim();
  const strict = tryParseObject(trimmed);
  if (strict) return strict;

  const requoted = tryParseObject(trimmed.replace(/'/g, '"'));
  if (requoted) return requoted;

  const match = ACTION_PATTERN.exec(trimmed) ?? ACTION_PATTERN.exec(trimmed.replace(/'/g, '"'));
  if (match?.[1] !== undefined) return { action: match[1] };

  return { action: FALLBACK_ACTION };
}

function parseOperation(text: string, acceptedOperations: readonly string[]): string {
  const cleaned = stripDecoration(text).trim().toLowerCase();
  const token = cleaned.split(/\s+/)[0] ?? "";
  if (!token) return PLAY_ACTION;
  if (acceptedOperations.includes(token)) return token;
  // "use the get_map tool": an accepted name written inside a sentence
  const embedded = acceptedOperations.find(op => new RegExp(`\\b${op}\\b`).test(cleaned));
  return embedded ?? token;
}

/** Value after `label` on the first line carrying it, if any. */
function labeledValue(lines: readonly string[], label: string): string | undefined {
  for (const line of lines) {
    if (line.toUpperCase().startsWith(label)) {
      return line.slice(label.length).trim();
    }
  }
  return undefined;
}

export function parseResponse(raw: string, acceptedOperations: readonly string[]): Decision {
  const lines = raw
    .split("\n")
    .map(l => stripLeadingMarkers(l.trim()));

  const rationale = labeledValue(lines, RATIONALE_LABEL);
  const operation = labeledValue(lines, OPERATION_LABEL);
  const args = labeledValue(lines, ARGUMENTS_LABEL);

  return {
    rationale: rationale || DEFAULT_RATIONALE,
    operation: operation === undefined ? PLAY_ACTION : parseOperation(operation, acceptedOperations),
    arguments: args === undefined ? { action: FALLBACK_ACTION } : parseArguments(args),
  };
}

// "**TOOL:** play_action" and "- ARGS: {...}" both still count as labeled lines.
function stripLeadingMarkers(line: string): string {
  return line.replace(/^[-*>`\s]+/, "").replace(/^([A-Za-z]+:)\*+/, "$1");
}
