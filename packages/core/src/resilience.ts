import type { Logger } from "./logger.js";
import { TokenBucket } from "./rate-limiter.js";
import { retryWithBackoff, type RetryPolicy } from "./retry.js";

export interface ResilientCallerOptions {
  name: string;
  rateLimit: number;
  perSeconds: number;
  retry: RetryPolicy;
  logger?: Logger;
}

/**
 * Rate limiting and retry composed around one external surface. Every
 * attempt, including retries, spends a permit.
 */
export class ResilientCaller {
  public readonly name: string;
  public readonly bucket: TokenBucket;
  private readonly policy: RetryPolicy;
  private readonly logger: Logger | undefined;

  public constructor(options: ResilientCallerOptions) {
    this.name = options.name;
    this.policy = options.retry;
    this.logger = options.logger;
    this.bucket = new TokenBucket({
      rateLimit: options.rateLimit,
      perSeconds: options.perSeconds,
      name: options.name,
      ...(options.logger ? { logger: options.logger } : {}),
    });
  }

  public call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return retryWithBackoff(
      async () => {
        await this.bucket.acquire();
        return fn();
      },
      this.policy,
      {
        name: `${this.name}.${label}`,
        ...(this.logger ? { logger: this.logger } : {}),
      },
    );
  }
}
