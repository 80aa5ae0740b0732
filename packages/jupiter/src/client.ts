import { HttpError, TransientError, parseRetryAfter, type FetchLike, type Logger } from "@tradeloop/core";

export type { FetchLike };

export interface JupiterQuoteRequest {
  inputMint: string;
  outputMint: string;
  amount: string;
  slippageBps: number;
}

export interface JupiterQuoteResponse {
  inputMint: string;
  outputMint: string;
  inAmount: string;
  outAmount: string;
  otherAmountThreshold: string;
  swapMode: string;
  slippageBps: number;
  priceImpactPct: string;
  routePlan: Array<{
    percent: number;
    bps?: number | null;
    swapInfo: {
      ammKey: string;
      label: string;
      inputMint: string;
      outputMint: string;
      inAmount: string;
      outAmount: string;
    };
  }>;
  contextSlot?: number;
  timeTaken?: number;
}

export interface JupiterSwapRequest {
  userPublicKey: string;
  quoteResponse: JupiterQuoteResponse;
  priorityFeeLamports: number;
}

export interface JupiterSwapResponse {
  swapTransaction: string;
  lastValidBlockHeight: number;
  prioritizationFeeLamports?: number;
  computeUnitLimit?: number;
  simulationError?: unknown;
}

export interface JupiterClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  logger?: Logger;
  fetch?: FetchLike;
}

function isQuoteResponse(value: unknown): value is JupiterQuoteResponse {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  if (!("inAmount" in value) || !("outAmount" in value) || !("routePlan" in value)) {
    return false;
  }
  return typeof value.inAmount === "string" && typeof value.outAmount === "string" && Array.isArray(value.routePlan);
}

function isSwapResponse(value: unknown): value is JupiterSwapResponse {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  if (!("swapTransaction" in value) || !("lastValidBlockHeight" in value)) {
    return false;
  }
  return typeof value.swapTransaction === "string" && typeof value.lastValidBlockHeight === "number";
}

/**
 * Thin HTTP client of the quote/swap API. Every failure is thrown as a typed
 * error for the resilience layer to classify; nothing is retried here.
 */
export class JupiterClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger | undefined;
  private readonly fetchImpl: FetchLike;

  public constructor(options: JupiterClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.logger = options.logger;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  public async getQuote(request: JupiterQuoteRequest): Promise<JupiterQuoteResponse> {
    const url = new URL(`${this.baseUrl}/quote`);
    url.searchParams.set("inputMint", request.inputMint);
    url.searchParams.set("outputMint", request.outputMint);
    url.searchParams.set("amount", request.amount);
    url.searchParams.set("slippageBps", String(request.slippageBps));
    url.searchParams.set("swapMode", "ExactIn");

    this.logger?.debug("QUOTE_REQUEST", "REQUESTING QUOTE", {
      inputMint: request.inputMint,
      outputMint: request.outputMint,
      amount: request.amount,
    });
    const payload = await this.send("quote", url, { headers: { Accept: "application/json" } });
    if (!isQuoteResponse(payload)) {
      throw new TransientError("Jupiter quote response missing amounts");
    }
    return payload;
  }

  public async getSwapTransaction(request: JupiterSwapRequest): Promise<JupiterSwapResponse> {
    const body: Record<string, unknown> = {
      userPublicKey: request.userPublicKey,
      quoteResponse: request.quoteResponse,
      wrapAndUnwrapSol: true,
      dynamicComputeUnitLimit: true,
    };
    if (request.priorityFeeLamports > 0) {
      body.prioritizationFeeLamports = request.priorityFeeLamports;
    }

    const payload = await this.send("swap", `${this.baseUrl}/swap`, {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
    });
    if (!isSwapResponse(payload)) {
      throw new TransientError("Jupiter swap response missing transaction");
    }
    return payload;
  }

  public parseRouteSummary(quote: JupiterQuoteResponse): string[] {
    const labels = quote.routePlan.map((part) => part.swapInfo.label).filter(Boolean);
    const unique: string[] = [];
    for (const label of labels) {
      if (!unique.includes(label)) {
        unique.push(label);
      }
    }
    return unique;
  }

  private async send(operation: string, url: string | URL, init: RequestInit): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientError(`Jupiter ${operation} request failed: ${message}`, { operation });
    }

    if (!response.ok) {
      const body = await response.text();
      throw new HttpError(`Jupiter ${operation}`, response.status, body, parseRetryAfter(response.headers.get("retry-after")));
    }

    try {
      return await response.json();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientError(`Jupiter ${operation} returned invalid JSON: ${message}`, { operation });
    }
  }
}
