import { sleep } from "./async.js";
import { classifyError, errorMessage, type ErrorClassification } from "./errors.js";
import type { Logger } from "./logger.js";

export interface RetryPolicy {
  maxAttempts: number;
  /** Constant pause between attempts after a transient failure. */
  baseDelayMs: number;
  classify?: (error: unknown) => ErrorClassification;
}

export interface RetryOptions {
  name?: string;
  logger?: Logger;
}

/**
 * Runs `fn` until it succeeds or the policy gives up.
 *
 * - transient: wait `baseDelayMs`, retry while attempts remain
 * - throttle: wait exactly the server-requested duration; does not count as an attempt
 * - fatal / validation: rethrown immediately
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new Error("maxAttempts must be a positive integer");
  }
  const classify = policy.classify ?? classifyError;
  const name = options.name ?? "call";
  let failures = 0;
  let invocation = 0;

  for (;;) {
    invocation += 1;
    try {
      return await fn(invocation);
    } catch (error) {
      const classification = classify(error);

      if (classification.kind === "throttle") {
        const waitMs = classification.retryAfterMs ?? policy.baseDelayMs;
        options.logger?.warn("THROTTLED", "REMOTE THROTTLE, WAITING BEFORE RETRY", {
          call: name,
          waitMs,
          error: errorMessage(error),
        });
        await sleep(waitMs);
        continue;
      }

      if (classification.kind !== "transient") {
        options.logger?.debug("RETRY_SKIPPED", "NON-RETRYABLE FAILURE", {
          call: name,
          kind: classification.kind,
          error: errorMessage(error),
        });
        throw error;
      }

      failures += 1;
      if (failures >= policy.maxAttempts) {
        options.logger?.error("RETRY_EXHAUSTED", "MAX RETRIES REACHED", {
          call: name,
          attempts: failures,
          error: errorMessage(error),
        });
        throw error;
      }

      options.logger?.warn("RETRY", "ATTEMPT FAILED, RETRYING", {
        call: name,
        attempt: failures,
        maxAttempts: policy.maxAttempts,
        error: errorMessage(error),
      });
      await sleep(policy.baseDelayMs);
    }
  }
}
