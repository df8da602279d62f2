import { logger } from "../../observability/src/logger.js";

export type CircuitState = "closed" | "open" | "half-open";

export class CircuitOpenError extends Error {
  constructor(breakerName: string) {
    super(`Circuit breaker "${breakerName}" is open — request rejected`);
    this.name = "CircuitOpenError";
  }
}

export interface CircuitBreakerOptions {
  /** Identifier for logging */
  name: string;
  /** Consecutive failures before opening the circuit (default: 5) */
  failureThreshold?: number;
  /** Time in ms the circuit stays open before probing (default: 30000) */
  resetTimeoutMs?: number;
  /**
   * Decides whether a thrown error counts against the circuit. Errors caused
   * by the caller's input (e.g. a malformed date the warehouse rejects) should
   * return false. Defaults to counting every error.
   */
  isFailure?: (error: unknown) => boolean;
  /** Clock override for tests */
  now?: () => number;
}

/**
 * Circuit breaker for warehouse calls.
 *
 * - Closed: requests pass through; consecutive failures are tracked.
 * - Open: requests fail immediately with CircuitOpenError.
 * - Half-Open: one probe request is allowed; success → closed, failure → open.
 */
export class CircuitBreaker {
  readonly name: string;
  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly isFailure: (error: unknown) => boolean;
  private readonly now: () => number;

  private state: CircuitState = "closed";
  private consecutiveFailures = 0;
  private lastFailureTime = 0;

  constructor(opts: CircuitBreakerOptions) {
    this.name = opts.name;
    this.failureThreshold = opts.failureThreshold ?? 5;
    this.resetTimeoutMs = opts.resetTimeoutMs ?? 30_000;
    this.isFailure = opts.isFailure ?? (() => true);
    this.now = opts.now ?? Date.now;
  }

  getState(): CircuitState {
    if (this.state === "open" && this.now() - this.lastFailureTime >= this.resetTimeoutMs) {
      this.transitionTo("half-open");
    }
    return this.state;
  }

  /** Manually reset to closed state */
  reset(): void {
    this.consecutiveFailures = 0;
    this.transitionTo("closed");
  }

  /**
   * Execute a function through the circuit breaker.
   * Throws CircuitOpenError if the circuit is open.
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.getState() === "open") {
      throw new CircuitOpenError(this.name);
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      if (this.isFailure(error)) {
        this.onFailure();
      } else {
        // the warehouse answered, so it is reachable
        this.onSuccess();
      }
      throw error;
    }
  }

  private onSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.state === "half-open") {
      this.transitionTo("closed");
    }
  }

  private onFailure(): void {
    this.consecutiveFailures++;
    this.lastFailureTime = this.now();

    if (this.state === "half-open" || this.consecutiveFailures >= this.failureThreshold) {
      this.transitionTo("open");
    }
  }

  private transitionTo(newState: CircuitState): void {
    if (this.state === newState) return;
    const prevState = this.state;
    this.state = newState;
    logger.warn(`Circuit breaker "${this.name}": ${prevState} → ${newState}`, {
      failures: this.consecutiveFailures,
      threshold: this.failureThreshold,
    });
  }
}
