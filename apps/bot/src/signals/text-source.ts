import type { CandidateAsset, Logger } from "@tradeloop/core";
import type { SignalSource } from "./source.js";

const TICKER_PATTERN = /\$([A-Za-z][A-Za-z0-9]{1,9})\b/g;
const ADDRESS_PATTERN = /\b[1-9A-HJ-NP-Za-km-z]{32,44}\b/g;

/**
 * Finds `$TICKER` mentions and base58 mint addresses in free text.
 *
 * Tickers are paired with the first address in the same text; a ticker with
 * no address is dropped since the address is what gets traded. Addresses
 * mentioned without any ticker are reported under the address itself.
 */
export function extractMentions(text: string, source: string): CandidateAsset[] {
  const addresses = [...new Set(Array.from(text.matchAll(ADDRESS_PATTERN), (match) => match[0]))];
  const tickers = [...new Set(Array.from(text.matchAll(TICKER_PATTERN), (match) => (match[1] ?? "").toUpperCase()))].filter(
    (ticker) => ticker.length > 0,
  );
  const context = { message: text.slice(0, 500) };

  const address = addresses[0];
  if (address === undefined) {
    return [];
  }
  if (tickers.length === 0) {
    return addresses.map((mint) => ({ symbol: mint, address: mint, source, context }));
  }
  return tickers.map((symbol) => ({ symbol, address, source, context }));
}

export interface TextMentionSourceOptions {
  name?: string;
  /** Oldest messages are dropped past this many. */
  maxInbox?: number;
  logger?: Logger;
}

/**
 * Inbox fed by any chat or webhook integration via `push`. Each pass drains
 * the inbox and reports every mention found since the previous pass.
 */
export class TextMentionSource implements SignalSource {
  public readonly name: string;
  private readonly maxInbox: number;
  private readonly logger: Logger | undefined;
  private inbox: string[] = [];
  private open = false;

  public constructor(options: TextMentionSourceOptions = {}) {
    this.name = options.name ?? "mentions";
    this.maxInbox = options.maxInbox ?? 500;
    this.logger = options.logger;
  }

  public async initialize(): Promise<void> {
    this.open = true;
  }

  public async teardown(): Promise<void> {
    this.open = false;
    this.inbox = [];
  }

  public push(text: string): boolean {
    if (!this.open || text.trim() === "") {
      return false;
    }
    this.inbox.push(text);
    if (this.inbox.length > this.maxInbox) {
      const dropped = this.inbox.splice(0, this.inbox.length - this.maxInbox);
      this.logger?.warn("MENTION_INBOX_FULL", "WARNING MENTION INBOX FULL, DROPPING OLDEST", { dropped: dropped.length });
    }
    return true;
  }

  public async extractCandidates(): Promise<CandidateAsset[]> {
    const messages = this.inbox.splice(0);
    return messages.flatMap((message) => extractMentions(message, this.name));
  }
}
