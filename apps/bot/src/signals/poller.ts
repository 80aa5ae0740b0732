import { errorMessage, sleep, type CandidateAsset, type Logger, type ResilientCaller } from "@tradeloop/core";
import type { Notifier } from "../notifier.js";
import type { SignalSource } from "./source.js";

export interface SignalPollerOptions {
  source: SignalSource;
  caller: ResilientCaller;
  intervalSeconds: number;
  /** Returns false once the receiving side no longer accepts candidates. */
  publish: (candidate: CandidateAsset) => boolean;
  logger: Logger;
  /** Told about every newly detected candidate, whether or not it gets bought. */
  notifier?: Notifier;
}

/**
 * Polls one source and publishes symbols it did not report on the previous
 * pass. The known set is replaced every pass, so a symbol that drops out and
 * comes back is announced again.
 */
export class SignalPoller {
  private readonly source: SignalSource;
  private readonly caller: ResilientCaller;
  private readonly intervalMs: number;
  private readonly publish: (candidate: CandidateAsset) => boolean;
  private readonly logger: Logger;
  private readonly notifier: Notifier | undefined;

  private known = new Set<string>();
  private controller: AbortController | null = null;
  private task: Promise<void> | null = null;
  private passes = 0;

  public constructor(options: SignalPollerOptions) {
    this.source = options.source;
    this.caller = options.caller;
    this.intervalMs = options.intervalSeconds * 1000;
    this.publish = options.publish;
    this.logger = options.logger;
    this.notifier = options.notifier;
  }

  public get name(): string {
    return this.source.name;
  }

  public isRunning(): boolean {
    return this.controller !== null && !this.controller.signal.aborted;
  }

  public start(): Promise<void> {
    if (this.task) {
      return this.task;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.task = this.run(controller.signal);
    return this.task;
  }

  public async stop(): Promise<void> {
    if (!this.controller) {
      return;
    }
    this.controller.abort();
    await this.task;
    this.controller = null;
    this.task = null;
  }

  /** One pass: extract, diff against the previous pass, publish what is new. */
  public async poll(): Promise<CandidateAsset[]> {
    const candidates = await this.caller.call(`${this.source.name}.extract`, () => this.source.extractCandidates());
    const fresh = this.detectNew(candidates);
    this.passes += 1;

    for (const candidate of fresh) {
      this.logger.info("SIGNAL_NEW", "NEW CANDIDATE DETECTED", {
        source: this.source.name,
        symbol: candidate.symbol,
        address: candidate.address,
      });
      this.announce(candidate);
      if (!this.publish(candidate)) {
        this.logger.debug("SIGNAL_DROPPED", "CANDIDATE NOT ACCEPTED BY ENGINE", { symbol: candidate.symbol });
      }
    }
    this.logger.debug("SIGNAL_PASS", "SIGNAL SOURCE CHECKED", {
      source: this.source.name,
      pass: this.passes,
      reported: candidates.length,
      fresh: fresh.length,
    });
    return fresh;
  }

  private announce(candidate: CandidateAsset): void {
    if (!this.notifier) {
      return;
    }
    this.notifier
      .notify({
        kind: "CANDIDATE_DETECTED",
        symbol: candidate.symbol,
        message: `New candidate ${candidate.symbol} from ${candidate.source}`,
        data: {
          address: candidate.address,
          source: candidate.source,
          ...(candidate.price !== undefined ? { price: candidate.price } : {}),
        },
      })
      .catch((error: unknown) => {
        this.logger.warn("NOTIFY_FAIL", "WARNING ALERT DELIVERY FAILED", {
          kind: "CANDIDATE_DETECTED",
          error: errorMessage(error),
        });
      });
  }

  private detectNew(candidates: CandidateAsset[]): CandidateAsset[] {
    const current = new Set<string>();
    const fresh: CandidateAsset[] = [];
    for (const candidate of candidates) {
      if (current.has(candidate.symbol)) {
        continue;
      }
      current.add(candidate.symbol);
      if (!this.known.has(candidate.symbol)) {
        fresh.push(candidate);
      }
    }
    this.known = current;
    return fresh;
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      await this.source.initialize();
    } catch (error) {
      this.logger.error("SIGNAL_INIT_FAIL", "ERROR INITIALIZING SIGNAL SOURCE", {
        source: this.source.name,
        error: errorMessage(error),
      });
      await this.teardown();
      return;
    }

    this.logger.ok("SIGNAL_START", "SIGNAL POLLER STARTED", { source: this.source.name, intervalMs: this.intervalMs });
    try {
      while (!signal.aborted) {
        const started = Date.now();
        try {
          await this.poll();
        } catch (error) {
          this.logger.error("SIGNAL_POLL_FAIL", "ERROR CHECKING SIGNAL SOURCE", {
            source: this.source.name,
            error: errorMessage(error),
          });
        }
        if (signal.aborted) {
          break;
        }
        await sleep(Math.max(0, this.intervalMs - (Date.now() - started)), signal);
      }
    } finally {
      await this.teardown();
      this.logger.ok("SIGNAL_STOPPED", "SIGNAL POLLER STOPPED", { source: this.source.name });
    }
  }

  private async teardown(): Promise<void> {
    try {
      await this.source.teardown();
    } catch (error) {
      this.logger.warn("SIGNAL_TEARDOWN_FAIL", "WARNING SIGNAL SOURCE TEARDOWN FAILED", {
        source: this.source.name,
        error: errorMessage(error),
      });
    }
  }
}
