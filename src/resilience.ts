/**
 * Resilience utilities: retry with exponential backoff and circuit breaker.
 *
 * withRetry: retries transient errors with exponential backoff, stops when aborted.
 * CircuitBreaker: opens after N consecutive failures; one per agent task type.
 */

import { toErrorString } from "./errors.js";
import { logger } from "./logger.js";

// ── Retry ────────────────────────────────────────────────────────────────────

/** PG error codes that indicate a transient connection issue (safe to retry). */
const PG_RETRYABLE_CODES = new Set([
  "57P01", // admin_shutdown
  "57P03", // cannot_connect_now
  "08006", // connection_failure
  "08001", // sqlclient_unable_to_establish_sqlconnection
  "08004", // sqlserver_rejected_establishment_of_sqlconnection
  "08003", // connection_does_not_exist
  "40001", // serialization_failure
]);

export interface RetryOptions {
  maxRetries?: number;
  backoffMs?: number;
  maxBackoffMs?: number;
  /** Return true if the error is retryable. Defaults to isPgRetryable. */
  retryableCheck?: (err: unknown) => boolean;
  /** Called before each backoff sleep with the 1-based retry number. */
  onRetry?: (err: unknown, retry: number, delayMs: number) => void;
  /** Aborting stops further attempts; the last error is rethrown. */
  signal?: AbortSignal;
}

export function backoffDelay(attempt: number, backoffMs: number, maxBackoffMs: number): number {
  return Math.min(backoffMs * Math.pow(2, attempt), maxBackoffMs);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}

/**
 * Execute `fn` with retries on retryable errors.
 * Default: 3 retries, 200ms initial backoff (doubles each time), 5s cap.
 * `fn` receives the 0-based attempt number.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxRetries = opts.maxRetries ?? 3;
  const backoffMs = opts.backoffMs ?? 200;
  const maxBackoffMs = opts.maxBackoffMs ?? 5000;
  const isRetryable = opts.retryableCheck ?? isPgRetryable;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (e) {
      if (attempt >= maxRetries || !isRetryable(e) || opts.signal?.aborted) throw e;
      const delay = backoffDelay(attempt, backoffMs, maxBackoffMs);
      opts.onRetry?.(e, attempt + 1, delay);
      await sleep(delay, opts.signal);
      if (opts.signal?.aborted) throw e;
    }
  }
}

function errorField(e: unknown, field: "code" | "message"): string | undefined {
  if (typeof e !== "object" || e === null || !(field in e)) return undefined;
  const value: unknown = Reflect.get(e, field);
  return typeof value === "string" ? value : undefined;
}

/** Returns true for PG connection / serialization errors and common network errors. */
export function isPgRetryable(e: unknown): boolean {
  const code = errorField(e, "code");
  if (code !== undefined && PG_RETRYABLE_CODES.has(code)) return true;
  const msg = errorField(e, "message");
  if (msg !== undefined) {
    if (msg.includes("ECONNRESET")) return true;
    if (msg.includes("ECONNREFUSED")) return true;
    if (msg.includes("connection terminated")) return true;
    if (msg.includes("Connection terminated unexpectedly")) return true;
  }
  return false;
}

// ── Circuit Breaker ──────────────────────────────────────────────────────────

export class CircuitOpenError extends Error {
  constructor(
    readonly breaker: string,
    readonly openUntil: number,
  ) {
    super(`Circuit breaker '${breaker}' is open (cooldown until ${new Date(openUntil).toISOString()})`);
    this.name = "CircuitOpenError";
  }
}

/**
 * Circuit breaker: opens after `threshold` consecutive failures.
 * While open, calls fail fast with CircuitOpenError.
 * After `cooldownMs`, the circuit half-opens (allows one attempt).
 *
 * States: CLOSED (normal) → OPEN (fail fast) → HALF_OPEN (probe) → CLOSED
 */
export class CircuitBreaker {
  private failures = 0;
  private openUntil = 0;

  constructor(
    private readonly name: string,
    private readonly threshold: number = 5,
    private readonly cooldownMs: number = 30_000,
    /** Errors for which this returns false do not count as failures (e.g. bad model output). */
    private readonly countsAsFailure: (err: unknown) => boolean = () => true,
  ) {}

  async call<T>(fn: () => Promise<T>): Promise<T> {
    const now = Date.now();
    if (this.failures >= this.threshold && now < this.openUntil) {
      throw new CircuitOpenError(this.name, this.openUntil);
    }
    // Half-open: reset failures on cooldown expiry to allow one probe
    if (now >= this.openUntil && this.failures >= this.threshold) {
      this.failures = 0;
    }
    try {
      const result = await fn();
      this.failures = 0;
      return result;
    } catch (e) {
      if (!this.countsAsFailure(e)) throw e;
      this.failures++;
      if (this.failures >= this.threshold) {
        this.openUntil = Date.now() + this.cooldownMs;
        logger.warn("circuit breaker opened", {
          breaker: this.name,
          failures: this.failures,
          cooldownMs: this.cooldownMs,
          error: toErrorString(e),
        });
      }
      throw e;
    }
  }

  get state(): "closed" | "open" | "half_open" {
    if (this.failures < this.threshold) return "closed";
    if (Date.now() < this.openUntil) return "open";
    return "half_open";
  }

  reset(): void {
    this.failures = 0;
    this.openUntil = 0;
  }
}
