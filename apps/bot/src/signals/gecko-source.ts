import {
  HttpError,
  TransientError,
  errorMessage,
  parseRetryAfter,
  type CandidateAsset,
  type FetchLike,
  type Logger,
} from "@tradeloop/core";
import { WSOL_MINT } from "@tradeloop/solana";
import type { SignalSource } from "./source.js";

const USDC_MINT = "EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v";
const USDT_MINT = "Es9vMFrzaCERzD8u6rK53iBLmks5n5G9N8mP8oJwWuj";
const USDH_MINT = "USDH1SM1s8B8m8AN4x9Q8A56hAew5s9wVnDXnq4fV6D";

const EXCLUDED_MINTS = new Set<string>([WSOL_MINT, USDC_MINT, USDT_MINT, USDH_MINT]);

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function toNumber(value: unknown): number {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

/** Pool relationship ids look like `solana_<mint>`. */
function mintFromId(value: unknown): string {
  const id = text(value);
  const idx = id.indexOf("_");
  return idx === -1 ? id : id.slice(idx + 1);
}

function relatedMint(relationships: unknown, key: string): string {
  return mintFromId(field(field(field(relationships, key), "data"), "id"));
}

/** `"FOO / SOL"` → `["FOO", "SOL"]`; pool names may carry a fee suffix. */
function pairSymbols(name: string): [string, string] {
  const [base = "", quote = ""] = name.split("/").map((part) => part.trim().split(/\s+/)[0] ?? "");
  return [base, quote];
}

export interface GeckoPoolCandidate extends CandidateAsset {
  createdAt: string;
}

/** Maps one `new_pools` entry to the asset worth trading in it, if any. */
export function candidateFromPool(pool: unknown, source: string): GeckoPoolCandidate | null {
  const attributes = field(pool, "attributes");
  const relationships = field(pool, "relationships");
  const baseMint = relatedMint(relationships, "base_token");
  const quoteMint = relatedMint(relationships, "quote_token");

  const tradeIsQuote = EXCLUDED_MINTS.has(baseMint);
  const address = tradeIsQuote ? quoteMint : baseMint;
  if (!address || EXCLUDED_MINTS.has(address)) {
    return null;
  }

  const [baseSymbol, quoteSymbol] = pairSymbols(text(field(attributes, "name")));
  const symbol = (tradeIsQuote ? quoteSymbol : baseSymbol).toUpperCase() || address;
  const price = toNumber(
    field(attributes, tradeIsQuote ? "quote_token_price_native_currency" : "base_token_price_native_currency"),
  );
  const createdAt = text(field(attributes, "pool_created_at")) || new Date().toISOString();

  return {
    symbol,
    address,
    source,
    ...(price > 0 ? { price } : {}),
    createdAt,
    context: {
      poolId: text(field(pool, "id")),
      dexId: text(field(field(field(relationships, "dex"), "data"), "id")) || "unknown",
      createdAt,
      reserveUsd: toNumber(field(attributes, "reserve_in_usd")),
    },
  };
}

export interface GeckoTerminalSourceOptions {
  baseUrl: string;
  timeoutMs?: number;
  network?: string;
  logger?: Logger;
  fetch?: FetchLike;
}

/** Newly created pools on the public GeckoTerminal API, newest first. */
export class GeckoTerminalSource implements SignalSource {
  public readonly name = "gecko";
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly network: string;
  private readonly logger: Logger | undefined;
  private readonly fetchImpl: FetchLike;

  public constructor(options: GeckoTerminalSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.network = options.network ?? "solana";
    this.logger = options.logger;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  public async initialize(): Promise<void> {
    this.logger?.info("GECKO_READY", "NEW POOL SOURCE READY", { baseUrl: this.baseUrl, network: this.network });
  }

  public async teardown(): Promise<void> {}

  public async extractCandidates(): Promise<CandidateAsset[]> {
    const payload = await this.fetchNewPools();
    const pools = field(payload, "data");
    const data = Array.isArray(pools) ? pools : [];

    const candidates: GeckoPoolCandidate[] = [];
    for (const pool of data) {
      const candidate = candidateFromPool(pool, this.name);
      if (candidate) {
        candidates.push(candidate);
      }
    }
    candidates.sort((a, b) => b.createdAt.localeCompare(a.createdAt));

    this.logger?.debug("SCANNER_FETCH", "FETCHED NEW POOL CANDIDATES", {
      fetched: data.length,
      candidates: candidates.length,
    });
    return candidates;
  }

  private async fetchNewPools(): Promise<unknown> {
    const url = `${this.baseUrl}/networks/${this.network}/new_pools?page=1`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new TransientError(`GeckoTerminal request failed: ${errorMessage(error)}`);
    }
    if (!response.ok) {
      const body = await response.text();
      throw new HttpError("GeckoTerminal new_pools", response.status, body, parseRetryAfter(response.headers.get("retry-after")));
    }
    try {
      return await response.json();
    } catch (error) {
      throw new TransientError(`GeckoTerminal returned invalid JSON: ${errorMessage(error)}`);
    }
  }
}
