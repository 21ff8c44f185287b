import { ActionOutcomeStats, ExplorationTracker, toObservation } from "@grue/planner";
import type { SessionObservation } from "@grue/schemas";
import { ProgressMonitor } from "./progress-monitor.js";
import type { ProgressMonitorConfig } from "./progress-monitor.js";

/**
 * Everything one run knows about its game. Each run constructs its own
 * instance; nothing here is shared between runs.
 */
export class SessionState {
  score = 0;
  moves = 0;
  /** play_action dispatches so far; the move count when the game reports none. */
  actionsTaken = 0;
  location = "Unknown";
  inventory: string[] = [];
  validActions: string[] = [];
  currentMap = "";
  observation = "";

  readonly failures = new ActionOutcomeStats();
  readonly tracker = new ExplorationTracker();
  readonly monitor: ProgressMonitor;

  constructor(monitorConfig?: ProgressMonitorConfig) {
    this.monitor = new ProgressMonitor(monitorConfig);
  }

  /** Fold a result text into score and moves. Score only rises. */
  observe(text: string): SessionObservation {
    const obs = toObservation(text, {
      score: this.score,
      moves: Math.max(this.moves, this.actionsTaken),
    });
    this.observation = text;
    this.score = obs.score;
    this.moves = obs.moves;
    return obs;
  }
}
