import type { FailureTable } from "@grue/schemas";

/**
 * Failure counts per normalized action text. Counts only ever go up; nothing
 * in a run resets them.
 */
export class ActionOutcomeStats implements FailureTable {
  private failures = new Map<string, number>();

  recordFailure(action: string): number {
    const next = (this.failures.get(action) ?? 0) + 1;
    this.failures.set(action, next);
    return next;
  }

  count(action: string): number {
    return this.failures.get(action) ?? 0;
  }

  has(action: string): boolean {
    return this.failures.has(action);
  }

  /** Actions that failed at least `minCount` times, in first-failure order. */
  entries(minCount = 1): Array<[string, number]> {
    return [...this.failures.entries()].filter(([, n]) => n >= minCount);
  }

  toJSON(): Record<string, number> {
    return Object.fromEntries(this.failures);
  }
}
