import { setTimeout as delay } from "node:timers/promises";

const DEFAULT_REQUESTS_PER_SECOND = 2;

/** `null` disables limiting (a non-positive value). */
export const resolveRequestsPerSecond = (raw: string | number | undefined): number | null => {
  if (raw === undefined || (typeof raw === "string" && raw.trim().length === 0)) {
    return DEFAULT_REQUESTS_PER_SECOND;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    return DEFAULT_REQUESTS_PER_SECOND;
  }
  if (parsed <= 0) {
    return null;
  }
  return parsed;
};

export type RateLimiterOptions = {
  requestsPerSecond: number;
  /** Requests that may go out back to back; defaults to the per-second rate. */
  burst?: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

/**
 * Token bucket shared by every oracle call a process makes. Callers are
 * granted slots in the order they asked for them.
 */
export class TokenBucketRateLimiter {
  readonly requestsPerSecond: number;
  private readonly capacity: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private available: number;
  private updatedAt: number;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    if (!Number.isFinite(options.requestsPerSecond) || options.requestsPerSecond <= 0) {
      throw new Error("requestsPerSecond must be positive");
    }
    this.requestsPerSecond = options.requestsPerSecond;
    this.capacity = Math.max(1, Math.floor(options.burst ?? options.requestsPerSecond));
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms, signal) => delay(ms, undefined, signal ? { signal } : undefined));
    this.available = this.capacity;
    this.updatedAt = this.now();
  }

  /** Resolves once a slot is granted; rejects if `signal` aborts first. */
  take(signal?: AbortSignal): Promise<void> {
    const granted = this.tail.then(() => this.acquire(signal));
    // An aborted waiter rejects to its own caller and must not stall the queue.
    this.tail = granted.catch(() => undefined);
    return granted;
  }

  /** Milliseconds until the next slot frees up; 0 when one is free now. */
  waitTimeMs(): number {
    this.refill();
    if (this.available >= 1) {
      return 0;
    }
    return Math.ceil(((1 - this.available) * 1000) / this.requestsPerSecond);
  }

  private async acquire(signal?: AbortSignal): Promise<void> {
    for (;;) {
      signal?.throwIfAborted();
      const waitMs = this.waitTimeMs();
      if (waitMs === 0) {
        this.available -= 1;
        return;
      }
      await this.sleep(waitMs, signal);
    }
  }

  private refill(): void {
    const now = this.now();
    const elapsedMs = now - this.updatedAt;
    if (elapsedMs <= 0) {
      return;
    }
    this.updatedAt = now;
    this.available = Math.min(this.capacity, this.available + (elapsedMs * this.requestsPerSecond) / 1000);
  }
}

export const createRateLimiter = (requestsPerSecond: number | null): TokenBucketRateLimiter | null =>
  requestsPerSecond === null ? null : new TokenBucketRateLimiter({ requestsPerSecond });
