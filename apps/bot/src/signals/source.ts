import type { CandidateAsset } from "@tradeloop/core";

/**
 * Anything that can report tradable assets. The poller calls `initialize`
 * once, `extractCandidates` on every pass and `teardown` when it stops.
 */
export interface SignalSource {
  readonly name: string;
  initialize(): Promise<void>;
  teardown(): Promise<void>;
  extractCandidates(): Promise<CandidateAsset[]>;
}
