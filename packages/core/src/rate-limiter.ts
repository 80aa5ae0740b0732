import { Mutex, sleep } from "./async.js";
import type { Logger } from "./logger.js";

export interface TokenBucketOptions {
  /** Permits granted per `perSeconds`; also the bucket capacity. */
  rateLimit: number;
  perSeconds: number;
  name?: string;
  logger?: Logger;
  now?: () => number;
}

/**
 * Token bucket with continuous refill. `acquire()` suspends until a permit is
 * available; concurrent acquirers are serialized around refill-and-decrement,
 * and the lock is not held while a waiter sleeps.
 */
export class TokenBucket {
  public readonly capacity: number;
  public readonly refillRatePerSecond: number;
  private readonly name: string;
  private readonly logger: Logger | undefined;
  private readonly now: () => number;
  private readonly mutex = new Mutex();
  private tokens: number;
  private lastRefill: number;

  public constructor(options: TokenBucketOptions) {
    if (!(options.rateLimit > 0) || !(options.perSeconds > 0)) {
      throw new Error("TokenBucket requires rateLimit > 0 and perSeconds > 0");
    }
    this.capacity = options.rateLimit;
    this.refillRatePerSecond = options.rateLimit / options.perSeconds;
    this.name = options.name ?? "default";
    this.logger = options.logger;
    this.now = options.now ?? (() => Date.now());
    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  public async acquire(): Promise<void> {
    await this.mutex.acquire();
    try {
      this.refill();
      while (this.tokens < 1) {
        const waitMs = Math.ceil(((1 - this.tokens) / this.refillRatePerSecond) * 1000);
        this.logger?.debug("RATE_LIMIT_WAIT", "RATE LIMIT REACHED, WAITING", {
          limiter: this.name,
          waitMs,
        });
        this.mutex.release();
        try {
          await sleep(waitMs);
        } finally {
          await this.mutex.acquire();
        }
        this.refill();
      }
      this.tokens -= 1;
    } finally {
      this.mutex.release();
    }
  }

  /** Current balance after refill; for status output and tests. */
  public availableTokens(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = this.now();
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillRatePerSecond);
    this.lastRefill = now;
  }
}
