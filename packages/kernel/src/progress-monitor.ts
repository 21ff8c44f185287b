import type { FailureTable, ProgressSignal, TurnSummary, UntriedDirections } from "@grue/schemas";

export interface ProgressMonitorConfig {
  /** Refresh the map at least this often (turns). */
  mapRefreshInterval?: number;
  /** Refresh valid actions at least this often (turns). */
  validActionsRefreshInterval?: number;
  /** Also refresh the map once steps-since-progress exceeds this. */
  mapStallThreshold?: number;
  /** Also refresh valid actions once steps-since-progress exceeds this. */
  validActionsStallThreshold?: number;
  /** Identical trailing actions that count as a loop. */
  loopLength?: number;
  maxRecentActions?: number;
  maxRecentTurns?: number;
}

const SAFE_ACTION = "look";

/**
 * Tracks whether the agent is still getting anywhere: steps since the last
 * new location or score gain, the trailing actions it dispatched, and when the
 * map and valid-actions snapshots are due for a refresh.
 */
export class ProgressMonitor {
  private mapRefreshInterval: number;
  private validActionsRefreshInterval: number;
  private mapStallThreshold: number;
  private validActionsStallThreshold: number;
  private loopLength: number;
  private maxRecentActions: number;
  private maxRecentTurns: number;

  private _stepsSinceProgress = 0;
  private _stepsSinceMapRefresh = 0;
  private _stepsSinceValidActionsRefresh = 0;
  private validActionsDue = false;
  private actions: string[] = [];
  private turns: TurnSummary[] = [];
  private visited = new Set<string>();

  constructor(config?: ProgressMonitorConfig) {
    this.mapRefreshInterval = config?.mapRefreshInterval ?? 5;
    this.validActionsRefreshInterval = config?.validActionsRefreshInterval ?? 4;
    this.mapStallThreshold = config?.mapStallThreshold ?? 3;
    this.validActionsStallThreshold = config?.validActionsStallThreshold ?? 2;
    this.loopLength = config?.loopLength ?? 3;
    this.maxRecentActions = config?.maxRecentActions ?? 5;
    this.maxRecentTurns = config?.maxRecentTurns ?? 10;
  }

  get stepsSinceProgress(): number {
    return this._stepsSinceProgress;
  }

  get stepsSinceMapRefresh(): number {
    return this._stepsSinceMapRefresh;
  }

  get stepsSinceValidActionsRefresh(): number {
    return this._stepsSinceValidActionsRefresh;
  }

  get recentActions(): readonly string[] {
    return this.actions;
  }

  get recentTurns(): readonly TurnSummary[] {
    return this.turns;
  }

  get locationsVisited(): string[] {
    return [...this.visited];
  }

  /** Mark the starting location as seen without counting it as progress. */
  registerLocation(location: string): void {
    this.visited.add(location);
  }

  update(oldLocation: string, newLocation: string, oldScore: number, newScore: number): ProgressSignal {
    const progressed = newLocation !== oldLocation || newScore > oldScore;
    const firstVisit = !this.visited.has(newLocation);
    if (firstVisit) {
      this.visited.add(newLocation);
      this.validActionsDue = true;
    }
    this._stepsSinceProgress = progressed ? 0 : this._stepsSinceProgress + 1;
    return {
      progressed,
      newLocation: firstVisit,
      stepsSinceProgress: this._stepsSinceProgress,
      looping: this.isLooping(),
    };
  }

  // ─── Actions and loops ─────────────────────────────────────────────────

  recordAction(action: string): void {
    this.actions.push(action);
    if (this.actions.length > this.maxRecentActions) this.actions.shift();
  }

  isLooping(): boolean {
    if (this.actions.length < this.loopLength) return false;
    const tail = this.actions.slice(-this.loopLength);
    return tail.every(a => a === tail[0]);
  }

  /**
   * Replacement for a looping action: the first valid action that is neither
   * recent nor known to fail, then an untried direction, then "look".
   */
  chooseEscape(
    validActions: readonly string[],
    failures: FailureTable,
    directions: UntriedDirections,
    location: string,
  ): string {
    const recent = new Set(this.actions);
    const fresh = validActions.find(a => !recent.has(a) && !failures.has(a));
    if (fresh !== undefined) return fresh;
    const direction = directions.nextUntriedDirection(location, recent);
    if (direction !== undefined) {
      directions.markDirectionTried(location, direction);
      return direction;
    }
    return SAFE_ACTION;
  }

  // ─── Turn summaries ────────────────────────────────────────────────────

  recordTurn(summary: TurnSummary): void {
    this.turns.push(summary);
    if (this.turns.length > this.maxRecentTurns) this.turns.shift();
  }

  // ─── Refresh cadence ───────────────────────────────────────────────────

  /** Advance both refresh counters; call once at the start of every turn. */
  beginTurn(): void {
    this._stepsSinceMapRefresh++;
    this._stepsSinceValidActionsRefresh++;
  }

  mapRefreshDue(): boolean {
    return (
      this._stepsSinceMapRefresh >= this.mapRefreshInterval ||
      this._stepsSinceProgress > this.mapStallThreshold
    );
  }

  validActionsRefreshDue(): boolean {
    return (
      this.validActionsDue ||
      this._stepsSinceValidActionsRefresh >= this.validActionsRefreshInterval ||
      this._stepsSinceProgress > this.validActionsStallThreshold
    );
  }

  markMapRefreshed(): void {
    this._stepsSinceMapRefresh = 0;
  }

  markValidActionsRefreshed(): void {
    this._stepsSinceValidActionsRefresh = 0;
    this.validActionsDue = false;
  }
}
