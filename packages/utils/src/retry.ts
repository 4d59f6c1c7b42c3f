/**
 * Retry policy with an injectable clock, so backoff never needs real
 * sleeps under test.
 */

export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface RetryPolicyConfig {
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Linear backoff step: the wait after attempt n is n * delayMs */
  delayMs: number;
  /** Fixed wait between connection attempts */
  intervalMs: number;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly delayMs: number;
  readonly intervalMs: number;
  private readonly clock: Clock;

  constructor(config: RetryPolicyConfig, clock: Clock = systemClock) {
    this.maxAttempts = Math.max(1, config.maxAttempts);
    this.delayMs = Math.max(0, config.delayMs);
    this.intervalMs = Math.max(0, config.intervalMs);
    this.clock = clock;
  }

  canRetry(attemptsMade: number): boolean {
    return attemptsMade < this.maxAttempts;
  }

  delayFor(attempt: number): number {
    return attempt * this.delayMs;
  }

  /** Back off after the given (1-based) failed attempt. */
  async wait(attempt: number): Promise<void> {
    const ms = this.delayFor(attempt);
    if (ms > 0) await this.clock.sleep(ms);
  }

  async waitInterval(): Promise<void> {
    if (this.intervalMs > 0) await this.clock.sleep(this.intervalMs);
  }
}
