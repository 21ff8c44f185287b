import type { GameSession, OperationArguments, SessionOperation } from "@grue/schemas";
import { ExplorationTracker, extractLocation } from "@grue/planner";
import type { FrotzResult, GameEmulator } from "./frotz-emulator.js";
import type { ValidActionsProvider } from "./action-candidates.js";

export interface TextContent {
  type: "text";
  text: string;
}

/** What every operation returns: one block of text. */
export interface OperationResult {
  content: TextContent[];
}

export interface EmulatorSessionOptions {
  gameId: string;
  /** Actions kept for the memory summary. Default: 50 */
  historyLimit?: number;
  /** Enables get_valid_actions; the interpreter has no such query of its own. */
  validActions?: ValidActionsProvider;
  maxValidActions?: number;
}

const MEMORY_RECENT = 5;
const MEMORY_PREVIEW = 60;

/** Appended to play_action output once the story has ended. */
export const GAME_OVER = "GAME OVER";

// Z-machine stories end by asking "... RESTART, RESTORE, or QUIT"
const END_OF_GAME = /\brestart\b[\s\S]*\brestore\b[\s\S]*\bquit\b/i;

export function isEndOfGame(text: string): boolean {
  return END_OF_GAME.test(text);
}

function textResult(text: string): OperationResult {
  return { content: [{ type: "text", text }] };
}

/**
 * The game session the agent plays through, backed by an interpreter. It
 * keeps its own map and short history so it can answer memory/map queries
 * without touching the game.
 */
export class EmulatorSession implements GameSession {
  private emulator: GameEmulator;
  private gameId: string;
  private historyLimit: number;
  private validActions?: ValidActionsProvider;
  private maxValidActions: number;

  private history: Array<[string, string]> = [];
  private tracker = new ExplorationTracker();
  private location = "Unknown";
  private observation = "";
  private carried: string[] = [];
  private score = 0;
  private moves = 0;
  private started = false;

  constructor(emulator: GameEmulator, options: EmulatorSessionOptions) {
    this.emulator = emulator;
    this.gameId = options.gameId;
    this.historyLimit = options.historyLimit ?? 50;
    this.validActions = options.validActions;
    this.maxValidActions = options.maxValidActions ?? 20;
  }

  get currentLocation(): string {
    return this.location;
  }

  /** Launch the interpreter and read the opening screen. */
  async start(): Promise<string> {
    if (this.started) throw new Error(`Session for ${this.gameId} already started`);
    const opening = await this.emulator.launch();
    this.started = true;
    this.observation = this.absorb(opening);
    this.location = extractLocation(this.observation);
    this.tracker.visit(this.location);
    return this.observation;
  }

  async close(): Promise<void> {
    await this.emulator.close();
  }

  async listOperations(): Promise<string[]> {
    const operations: SessionOperation[] = ["play_action", "memory", "get_map", "inventory"];
    if (this.validActions) operations.push("get_valid_actions");
    return operations;
  }

  async callOperation(name: SessionOperation, args: OperationArguments): Promise<unknown> {
    if (!this.started) throw new Error("Session not started; call start() first");
    switch (name) {
      case "play_action": {
        const action = args.action;
        if (typeof action !== "string" || action.trim() === "") {
          throw new Error("play_action needs a non-empty string 'action'");
        }
        return textResult(await this.playAction(action.trim()));
      }
      case "memory":
        return textResult(this.memory());
      case "get_map":
        return textResult(this.tracker.render(this.location));
      case "inventory":
        return textResult(await this.inventory());
      case "get_valid_actions":
        return textResult(await this.listValidActions());
    }
  }

  // ─── Operations ────────────────────────────────────────────────────────

  private async playAction(action: string): Promise<string> {
    const previousScore = this.score;
    const result = await this.emulator.send(action);
    const text = this.absorb(result);

    this.observation = text;
    this.history.push([action, text]);
    if (this.history.length > this.historyLimit) this.history.shift();
    this.location = this.tracker.observe(this.location, action, text);

    const gained = this.score - previousScore;
    const lines = [text];
    if (gained > 0) lines.push(`+${gained} points! (Total: ${this.score})`);
    lines.push(`[Score: ${this.score} | Moves: ${this.moves}]`);
    if (isEndOfGame(text)) lines.push(GAME_OVER);
    return lines.join("\n\n");
  }

  private memory(): string {
    const recent = this.history.slice(-MEMORY_RECENT);
    const recentText = recent.length > 0
      ? recent.map(([a, r]) => `  > ${a} -> ${r.slice(0, MEMORY_PREVIEW)}...`).join("\n")
      : "  (none yet)";
    return [
      "Current State:",
      `- Location: ${this.location}`,
      `- Score: ${this.score} points`,
      `- Moves: ${this.moves}`,
      `- Game: ${this.gameId}`,
      "",
      "Recent Actions:",
      recentText,
      "",
      "Current Observation:",
      this.observation,
    ].join("\n");
  }

  private async inventory(): Promise<string> {
    const result = await this.emulator.send("inventory");
    this.absorb(result);
    // "You are carrying:" header and "The sack contains:" sub-headers are not items
    const items = /empty[- ]handed/i.test(result.body)
      ? []
      : result.body.split("\n").filter(line => !line.trim().endsWith(":"));
    this.carried = items;
    return items.length > 0 ? `Inventory: ${items.join(", ")}` : "Inventory: You are empty-handed.";
  }

  private async listValidActions(): Promise<string> {
    if (!this.validActions) throw new Error("get_valid_actions is not available for this game");
    const actions = await this.validActions({
      location: this.location,
      observation: this.observation,
      inventory: this.carried,
    });
    return `Valid actions: ${actions.slice(0, this.maxValidActions).join(", ")}`;
  }

  // ─── Output handling ───────────────────────────────────────────────────

  /**
   * Fold status-line numbers into the session and return the text the agent
   * sees. The room name from the status line is put first when the body does
   * not already open with it, so the first line always names the room.
   */
  private absorb(result: FrotzResult): string {
    if (result.score !== undefined) this.score = Math.max(0, result.score);
    if (result.moves !== undefined) this.moves = result.moves;
    const firstLine = result.body.split("\n")[0] ?? "";
    if (!result.roomHeader || firstLine === result.roomHeader) return result.body;
    return `${result.roomHeader}\n${result.body}`;
  }
}
