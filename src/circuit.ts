/**
 * Per-database circuit breaker.
 *
 * closed -> open after `failureThreshold` failures inside `failureWindowMs`;
 * open -> half-open once `openDurationMs` has elapsed;
 * half-open -> closed after `recoveryThreshold` successes, or back to open on
 * the first failure.
 */

export type CircuitState = "closed" | "open" | "half-open";

export interface CircuitOptions {
  failureThreshold: number;
  failureWindowMs: number;
  openDurationMs: number;
  recoveryThreshold: number;
}

export class CircuitBreaker {
  private state: CircuitState = "closed";
  private failures: number[] = [];
  private openedAt: number | null = null;
  private halfOpenSuccesses = 0;

  constructor(
    private readonly name: string,
    private readonly options: CircuitOptions,
    private readonly now: () => number = Date.now
  ) {}

  canExecute(): boolean {
    this.cleanOldFailures();

    switch (this.state) {
      case "closed":
      case "half-open":
        return true;

      case "open":
        if (this.openedAt !== null && this.now() - this.openedAt >= this.options.openDurationMs) {
          this.transition("half-open", "testing");
          this.halfOpenSuccesses = 0;
          return true;
        }
        return false;
    }
  }

  recordSuccess(): void {
    if (this.state !== "half-open") return;
    this.halfOpenSuccesses++;
    if (this.halfOpenSuccesses >= this.options.recoveryThreshold) {
      this.failures = [];
      this.openedAt = null;
      this.transition("closed", "recovered");
    }
  }

  recordFailure(): void {
    this.failures.push(this.now());
    this.cleanOldFailures();

    if (this.state === "half-open") {
      this.openedAt = this.now();
      this.transition("open", "test failed");
      return;
    }

    if (this.state === "closed" && this.failures.length >= this.options.failureThreshold) {
      this.openedAt = this.now();
      this.transition("open", `${this.failures.length} failures`);
    }
  }

  getState(): CircuitState {
    this.cleanOldFailures();
    return this.state;
  }

  getTimeUntilHalfOpen(): number | null {
    if (this.state !== "open" || this.openedAt === null) return null;
    return Math.max(0, this.options.openDurationMs - (this.now() - this.openedAt));
  }

  getRecentFailures(): number {
    this.cleanOldFailures();
    return this.failures.length;
  }

  private transition(next: CircuitState, reason: string): void {
    console.error(`[circuit] ${this.name}: ${this.state} -> ${next} (${reason})`);
    this.state = next;
  }

  private cleanOldFailures(): void {
    const cutoff = this.now() - this.options.failureWindowMs;
    this.failures = this.failures.filter((t) => t > cutoff);
  }
}
