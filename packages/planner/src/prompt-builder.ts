import type { TurnSummary } from "@grue/schemas";
import { ARGUMENTS_LABEL, OPERATION_LABEL, RATIONALE_LABEL } from "./response-parser.js";

export const SYSTEM_PROMPT = `You are playing a classic text adventure. Explore, collect treasures and raise your score.

OPERATIONS YOU CAN CALL:
1. play_action - send one command to the game (north, take lamp, open mailbox, ...)
2. memory - current location, score, moves and recent history
3. get_map - locations explored so far and the exits between them
4. inventory - what you are carrying
5. get_valid_actions - commands the game accepts right here (call it whenever you are unsure)

GAME COMMANDS FOR play_action:
- Movement: north, south, east, west, up, down, enter, exit (or n, s, e, w, u, d)
- Objects: take <item>, drop <item>, open <thing>, close <thing>, examine <thing>, read <thing>
- Light: turn on lamp, turn off lamp
- Interaction: push <thing>, pull <thing>, move <thing>, climb <thing>
- Combat: attack <enemy> with <weapon>
- Other: look, inventory, wait

The game does NOT understand: check, inspect, search, grab, use, help

Reply with exactly three lines and no markdown:
${RATIONALE_LABEL} <one short sentence of reasoning>
${OPERATION_LABEL} <operation name>
${ARGUMENTS_LABEL} <JSON object of arguments>

Example:
${RATIONALE_LABEL} The mailbox may hold something useful.
${OPERATION_LABEL} play_action
${ARGUMENTS_LABEL} {"action": "open mailbox"}

Example:
${RATIONALE_LABEL} I should see how far I have come.
${OPERATION_LABEL} memory
${ARGUMENTS_LABEL} {}

Play systematically: prefer commands from get_valid_actions, pick up light sources and weapons,
examine what the room describes, and leave through exits you have not tried yet.
Never repeat a command that just failed.`;

export interface PromptContext {
  score: number;
  locationsExplored: number;
  /** 1-based number of the turn being planned. */
  step: number;
  walkthrough: readonly string[];
  recentTurns: readonly TurnSummary[];
  recentActions: readonly string[];
  failures: ReadonlyArray<readonly [string, number]>;
  validActions: readonly string[];
  /** Last rendered map, or "" before the first refresh. */
  currentMap: string;
  stepsSinceProgress: number;
  untriedDirections: readonly string[];
  observation: string;
}

const RECENT_TURNS_SHOWN = 3;
const RESULT_PREVIEW = 80;
const VALID_ACTIONS_SHOWN = 15;
const UNTRIED_SHOWN = 3;
const WALKTHROUGH_LOOKAHEAD = 3;

function preview(text: string): string {
  return text.length > RESULT_PREVIEW ? `${text.slice(0, RESULT_PREVIEW)}...` : text;
}

export function formatTurnSummary(turn: TurnSummary): string {
  const gain = turn.scoreDelta > 0 ? ` (+${turn.scoreDelta}pts)` : "";
  return `  > ${turn.action} @ ${turn.location}${gain} -> ${preview(turn.result)}`;
}

export function isRepeating(actions: readonly string[]): boolean {
  const last = actions.slice(-3);
  return last.length === 3 && last.every(a => a === last[0]);
}

export function countMapLocations(map: string): number {
  return map.split("\n").filter(line => line.trim().startsWith("*")).length;
}

export function buildPrompt(ctx: PromptContext): string {
  const parts: string[] = [
    `Current Score: ${ctx.score}`,
    `Locations explored: ${ctx.locationsExplored}`,
  ];

  const hintIndex = ctx.step - 1;
  if (hintIndex >= 0 && hintIndex < ctx.walkthrough.length) {
    const upcoming = ctx.walkthrough.slice(hintIndex, hintIndex + WALKTHROUGH_LOOKAHEAD);
    parts.push(`\n[HINT - Optimal next steps: ${upcoming.join(", ")}]`);
  }

  if (ctx.recentTurns.length > 0) {
    parts.push("\nRecent actions:");
    for (const turn of ctx.recentTurns.slice(-RECENT_TURNS_SHOWN)) {
      parts.push(formatTurnSummary(turn));
    }
    if (isRepeating(ctx.recentActions)) {
      const last = ctx.recentActions[ctx.recentActions.length - 1];
      parts.push(`\n[WARNING: You've been doing '${last}' repeatedly. TRY SOMETHING DIFFERENT!]`);
    }
  }

  const avoid = ctx.failures
    .filter(([, count]) => count >= 2)
    .map(([action, count]) => `'${action}' (${count}x)`);
  if (avoid.length > 0) {
    parts.push(`\n[AVOID: These actions have failed: ${avoid.join(", ")}]`);
  }

  if (ctx.validActions.length > 0) {
    parts.push(`\n[VALID ACTIONS: ${ctx.validActions.slice(0, VALID_ACTIONS_SHOWN).join(", ")}]`);
  }

  if (ctx.stepsSinceProgress > 3 && ctx.currentMap) {
    const count = countMapLocations(ctx.currentMap);
    parts.push(`\n[MAP: ${count} locations explored. Consider calling get_map tool for full details.]`);
  }

  if (ctx.stepsSinceProgress > 2 && ctx.untriedDirections.length > 0) {
    parts.push(`\n[HINT: Try unexplored directions: ${ctx.untriedDirections.slice(0, UNTRIED_SHOWN).join(", ")}]`);
  }

  parts.push(`\nCurrent situation:\n${ctx.observation}`);
  parts.push("\nWhat do you do next?");
  return parts.join("\n");
}
