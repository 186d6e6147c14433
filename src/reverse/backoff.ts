export const INITIAL_BACKOFF_MS = 1000;
export const MAX_BACKOFF_MS = 60000;

/** Exponential reconnect delay: 1s, 2s, 4s and so on, capped. */
export class Backoff {
  private failures = 0;

  constructor(
    readonly initialMs = INITIAL_BACKOFF_MS,
    readonly maxMs = MAX_BACKOFF_MS
  ) {}

  // Number of delays handed out since the last reset.
  get attempt(): number {
    return this.failures;
  }

  next(): number {
    const delay = Math.min(this.initialMs * 2 ** this.failures, this.maxMs);
    this.failures += 1;
    return delay;
  }

  reset(): void {
    this.failures = 0;
  }
}
