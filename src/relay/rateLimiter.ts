import { Mutex } from "../core/mutex.js";
import { systemClock, type Clock } from "../core/utils.js";

export interface RateLimiterOptions {
  capacity: number;
  /** Tokens added per second. */
  fillRate: number;
  pollIntervalMs: number;
}

/**
 * Token bucket pacing outbound copies. Refill only advances `lastRefill` once a
 * whole token has accrued, so many short refills cannot drift the bucket.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly lock = new Mutex();

  constructor(
    private readonly options: RateLimiterOptions,
    private readonly clock: Clock = systemClock
  ) {
    if (options.capacity < 1) {
      throw new Error(`RateLimiter capacity must be >= 1, got ${options.capacity}`);
    }
    if (options.fillRate <= 0) {
      throw new Error(`RateLimiter fillRate must be > 0, got ${options.fillRate}`);
    }
    this.tokens = options.capacity;
    this.lastRefill = clock.now();
  }

  /** Blocks up to `timeoutMs` for a token. Always tries at least once. */
  async acquire(timeoutMs: number): Promise<boolean> {
    const deadline = this.clock.now() + timeoutMs;
    for (;;) {
      const taken = await this.lock.runExclusive(() => {
        this.refill();
        if (this.tokens > 0) {
          this.tokens -= 1;
          return true;
        }
        return false;
      });
      if (taken) {
        return true;
      }
      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        return false;
      }
      await this.clock.sleep(Math.min(this.options.pollIntervalMs, remaining));
    }
  }

  /** Current token count after a refill. */
  async available(): Promise<number> {
    return await this.lock.runExclusive(() => {
      this.refill();
      return this.tokens;
    });
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsedSec = (now - this.lastRefill) / 1000;
    if (elapsedSec <= 0) {
      return;
    }
    const add = elapsedSec * this.options.fillRate;
    if (add >= 1) {
      this.tokens = Math.min(this.options.capacity, this.tokens + Math.floor(add));
      this.lastRefill = now;
    }
  }
}
