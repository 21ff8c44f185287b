import { setTimeout as delay } from "node:timers/promises";

/**
 * Bounded latency for the two suspending collaborators (session round-trip
 * and model call). The core never applies this itself; callers wrap their
 * collaborators and a timeout then surfaces like any other call failure.
 */
export class TimeoutError extends Error {
  readonly label: string;
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

/** `ms <= 0` returns the promise itself. */
export function withTimeout<T>(promise: Promise<T>, ms: number, label = "Call"): Promise<T> {
  if (ms <= 0) return promise;
  const timer = new AbortController();
  const expiry = delay(ms, undefined, { signal: timer.signal, ref: false }).then((): never => {
    throw new TimeoutError(label, ms);
  });
  // The race handles expiry's AbortError once the wrapped promise settles first
  return Promise.race([promise, expiry]).finally(() => timer.abort());
}
