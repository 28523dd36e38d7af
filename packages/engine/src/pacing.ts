/**
 * Request pacing policies.
 *
 * The scanner awaits `wait()` between discovery pages and after every detail
 * fetch. The default is a fixed 100 ms delay; a token bucket allows short
 * bursts while holding the same average rate.
 */

export interface PacingPolicy {
  readonly name: string;
  wait(): Promise<void>;
}

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const DEFAULT_REQUEST_DELAY_MS = 100;

// ---------------------------------------------------------------------------
// Fixed interval
// ---------------------------------------------------------------------------

export class FixedIntervalPacer implements PacingPolicy {
  readonly name = "fixed";

  constructor(
    readonly intervalMs: number = DEFAULT_REQUEST_DELAY_MS,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  async wait(): Promise<void> {
    if (this.intervalMs <= 0) return;
    await this.sleep(this.intervalMs);
  }
}

// ---------------------------------------------------------------------------
// Token bucket
// ---------------------------------------------------------------------------

export interface TokenBucketOptions {
  /** Max requests allowed back-to-back. */
  capacity: number;
  /** Tokens restored per second. */
  refillPerSecond: number;
  clock?: Clock;
  sleep?: Sleep;
}

export class TokenBucketPacer implements PacingPolicy {
  readonly name = "token-bucket";
  private readonly capacity: number;
  private readonly refillPerMs: number;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private tokens: number;
  private lastRefill: number;

  constructor(options: TokenBucketOptions) {
    if (options.capacity < 1) throw new RangeError("capacity must be at least 1");
    if (options.refillPerSecond <= 0) throw new RangeError("refillPerSecond must be positive");

    this.capacity = options.capacity;
    this.refillPerMs = options.refillPerSecond / 1000;
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.tokens = options.capacity;
    this.lastRefill = this.clock();
  }

  /** Tokens currently available (after refill). */
  available(): number {
    this.refill();
    return this.tokens;
  }

  async wait(): Promise<void> {
    this.refill();
    if (this.tokens < 1) {
      const deficitMs = Math.ceil((1 - this.tokens) / this.refillPerMs);
      await this.sleep(deficitMs);
      this.refill();
    }
    this.tokens = Math.max(0, this.tokens - 1);
  }

  private refill(): void {
    const now = this.clock();
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillPerMs);
      this.lastRefill = now;
    }
  }
}

// ---------------------------------------------------------------------------
// No delay
// ---------------------------------------------------------------------------

export const immediatePacer: PacingPolicy = {
  name: "immediate",
  async wait() {},
};
