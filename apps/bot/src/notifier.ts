import {
  HttpError,
  TransientError,
  errorMessage,
  parseRetryAfter,
  type FetchLike,
  type Logger,
  type ResilientCaller,
} from "@tradeloop/core";
import type { Store } from "@tradeloop/store";

export type AlertKind =
  | "CANDIDATE_DETECTED"
  | "POSITION_OPENED"
  | "POSITION_REDUCED"
  | "POSITION_COMPLETED"
  | "EXIT_FAILED"
  | "BUY_FAILED";

export interface Alert {
  kind: AlertKind;
  message: string;
  symbol?: string;
  data?: Record<string, unknown>;
}

export interface Notifier {
  notify(alert: Alert): Promise<void>;
}

export type AlertJournal = Pick<Store, "recordAlert">;

export class JournalNotifier implements Notifier {
  private readonly journal: AlertJournal;
  private readonly logger: Logger;

  public constructor(journal: AlertJournal, logger: Logger) {
    this.journal = journal;
    this.logger = logger;
  }

  public async notify(alert: Alert): Promise<void> {
    this.journal.recordAlert({
      kind: alert.kind,
      message: alert.message,
      ...(alert.symbol ? { symbol: alert.symbol } : {}),
      ...(alert.data ? { data: alert.data } : {}),
    });
    this.logger.info("ALERT", alert.message, { kind: alert.kind, symbol: alert.symbol ?? null });
  }
}

export interface WebhookNotifierOptions {
  url: string;
  caller: ResilientCaller;
  timeoutMs?: number;
  fetch?: FetchLike;
}

/**
 * POSTs each alert as JSON. Rate limiting and retries come from the caller,
 * so a 429 with `Retry-After` is waited out rather than dropped.
 */
export class WebhookNotifier implements Notifier {
  private readonly url: string;
  private readonly caller: ResilientCaller;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  public constructor(options: WebhookNotifierOptions) {
    this.url = options.url;
    this.caller = options.caller;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  public async notify(alert: Alert): Promise<void> {
    const body = JSON.stringify({
      kind: alert.kind,
      symbol: alert.symbol ?? null,
      text: alert.message,
      data: alert.data ?? {},
      ts: new Date().toISOString(),
    });
    await this.caller.call("webhook", () => this.post(body));
  }

  private async post(body: string): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new TransientError(`Webhook request failed: ${errorMessage(error)}`);
    }
    if (!response.ok) {
      const text = await response.text();
      throw new HttpError("Webhook", response.status, text, parseRetryAfter(response.headers.get("retry-after")));
    }
  }
}

/** Delivers to every notifier; a failing one is logged and skipped. */
export class FanoutNotifier implements Notifier {
  private readonly notifiers: Notifier[];
  private readonly logger: Logger;

  public constructor(notifiers: Notifier[], logger: Logger) {
    this.notifiers = notifiers;
    this.logger = logger;
  }

  public async notify(alert: Alert): Promise<void> {
    const results = await Promise.allSettled(this.notifiers.map((notifier) => notifier.notify(alert)));
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.warn("NOTIFY_FAIL", "WARNING ALERT DELIVERY FAILED", {
          kind: alert.kind,
          notifier: this.notifiers[index]?.constructor.name ?? "unknown",
          error: errorMessage(result.reason),
        });
      }
    });
  }
}
