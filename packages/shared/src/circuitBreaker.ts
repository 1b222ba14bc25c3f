import { AppError, TimeoutError } from "./errors.js";
import type { Logger } from "./logger.js";
import { withTimeout } from "./withTimeout.js";

export type CircuitBreakerState = "closed" | "open" | "half-open";

export interface CircuitBreakerConfig {
  name: string;
  /** Consecutive failures that open the circuit. Default: 5 */
  failureThreshold?: number;
  /** How long the circuit stays open, in ms. Default: 30000 */
  resetTimeout?: number;
  /** Per-call deadline, in ms. Default: 10000 */
  requestTimeout?: number;
  /** Half-open successes that close the circuit. Default: 2 */
  successThreshold?: number;
  logger?: Logger;
  /** Epoch milliseconds. Default: `Date.now()` */
  clock?: () => number;
}

export interface CircuitBreakerMetrics {
  state: CircuitBreakerState;
  consecutiveFailures: number;
  totalRequests: number;
  totalFailures: number;
  totalTimeouts: number;
  totalRejections: number;
  lastFailureTime: number | null;
}

export class CircuitBreakerError extends AppError {
  constructor(circuitName: string) {
    super(`Circuit breaker '${circuitName}' is open`, {
      code: "CIRCUIT_BREAKER_OPEN",
      statusCode: 503,
      context: { circuitName },
    });
  }
}

type Phase =
  | { state: "closed" }
  | { state: "open"; retryAt: number }
  | { state: "half-open"; successes: number };

const DEFAULTS = {
  failureThreshold: 5,
  resetTimeout: 30_000,
  requestTimeout: 10_000,
  successThreshold: 2,
};

type Limits = typeof DEFAULTS;

/**
 * Guards one outbound dependency. While closed, calls run and consecutive
 * failures are counted; at the threshold the circuit opens and calls fail
 * fast with {@link CircuitBreakerError}. After `resetTimeout` it lets trial
 * calls through: enough successes close it, any failure opens it again.
 */
export class CircuitBreaker {
  private readonly limits: Limits;
  private readonly now: () => number;
  private phase: Phase = { state: "closed" };
  private failureStreak = 0;
  private lastFailureAt: number | null = null;
  private readonly totals = {
    requests: 0,
    failures: 0,
    timeouts: 0,
    rejections: 0,
  };

  constructor(private readonly config: CircuitBreakerConfig) {
    this.limits = {
      failureThreshold: config.failureThreshold ?? DEFAULTS.failureThreshold,
      resetTimeout: config.resetTimeout ?? DEFAULTS.resetTimeout,
      requestTimeout: config.requestTimeout ?? DEFAULTS.requestTimeout,
      successThreshold: config.successThreshold ?? DEFAULTS.successThreshold,
    };
    this.now = config.clock ?? (() => Date.now());
  }

  /**
   * @throws {CircuitBreakerError} While the circuit is open
   * @throws {TimeoutError} When the call outlives `requestTimeout`
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.totals.requests++;
    if (this.getState() === "open") {
      this.totals.rejections++;
      throw new CircuitBreakerError(this.config.name);
    }

    let result: T;
    try {
      result = await withTimeout(
        fn(),
        this.limits.requestTimeout,
        this.config.name,
      );
    } catch (error) {
      this.recordFailure(error);
      throw error instanceof Error ? error : new Error(String(error));
    }
    this.recordSuccess();
    return result;
  }

  getState(): CircuitBreakerState {
    const { phase } = this;
    if (phase.state === "open" && this.now() >= phase.retryAt) {
      this.enter({ state: "half-open", successes: 0 });
    }
    return this.phase.state;
  }

  getMetrics(): CircuitBreakerMetrics {
    return {
      state: this.getState(),
      consecutiveFailures: this.failureStreak,
      totalRequests: this.totals.requests,
      totalFailures: this.totals.failures,
      totalTimeouts: this.totals.timeouts,
      totalRejections: this.totals.rejections,
      lastFailureTime: this.lastFailureAt,
    };
  }

  reset(): void {
    this.failureStreak = 0;
    this.lastFailureAt = null;
    this.enter({ state: "closed" });
  }

  private recordSuccess(): void {
    this.failureStreak = 0;
    const { phase } = this;
    if (phase.state !== "half-open") return;

    const successes = phase.successes + 1;
    this.enter(
      successes >= this.limits.successThreshold
        ? { state: "closed" }
        : { state: "half-open", successes },
    );
  }

  private recordFailure(error: unknown): void {
    const at = this.now();
    this.totals.failures++;
    if (error instanceof TimeoutError) this.totals.timeouts++;
    this.failureStreak++;
    this.lastFailureAt = at;

    if (
      this.phase.state === "half-open" ||
      this.failureStreak >= this.limits.failureThreshold
    ) {
      this.enter({ state: "open", retryAt: at + this.limits.resetTimeout });
    }
  }

  private enter(next: Phase): void {
    const from = this.phase.state;
    this.phase = next;
    if (from === next.state) return;

    this.config.logger?.info(
      `Circuit breaker '${this.config.name}' state change`,
      {
        circuit: this.config.name,
        from,
        to: next.state,
        consecutiveFailures: this.failureStreak,
      },
    );
  }
}
