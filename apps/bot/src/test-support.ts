import { HttpError, Logger, ResilientCaller, type LogEntry } from "@tradeloop/core";
import type { JupiterQuoteRequest, JupiterQuoteResponse, JupiterSwapResponse } from "@tradeloop/jupiter";
import { WSOL_MINT } from "@tradeloop/solana";
import { vi } from "vitest";
import { ExecutionClient, type QuoteService } from "./execution.js";
import { PaperWallet } from "./paper-wallet.js";
import { TradingSettings, type TradingSettingsValues } from "./settings.js";

export function createTestLogger(): { logger: Logger; entries: LogEntry[]; codes: () => string[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({
    component: "TEST",
    level: "DEBUG",
    console: false,
    sink: {
      write: (entry) => {
        entries.push(entry);
      },
    },
  });
  return { logger, entries, codes: () => entries.map((entry) => entry.code) };
}

export function createTestCaller(logger?: Logger, maxAttempts = 3): ResilientCaller {
  return new ResilientCaller({
    name: "test",
    rateLimit: 1_000,
    perSeconds: 1,
    retry: { maxAttempts, baseDelayMs: 0 },
    ...(logger ? { logger } : {}),
  });
}

export function quoteResponse(inputMint: string, outputMint: string, inAmount: string, outAmount: string): JupiterQuoteResponse {
  return {
    inputMint,
    outputMint,
    inAmount,
    outAmount,
    otherAmountThreshold: outAmount,
    swapMode: "ExactIn",
    slippageBps: 50,
    priceImpactPct: "0",
    routePlan: [
      {
        percent: 100,
        swapInfo: { ammKey: "amm-test", label: "TestAmm", inputMint, outputMint, inAmount, outAmount },
      },
    ],
  };
}

/**
 * In-process stand-in for the swap service. Prices are integer lamports per
 * whole token so every quote is exact.
 */
export class FakeMarket implements QuoteService {
  public readonly getQuote = vi.fn<QuoteService["getQuote"]>(async (request) => this.quote(request));
  public readonly getSwapTransaction = vi.fn<QuoteService["getSwapTransaction"]>(
    async (): Promise<JupiterSwapResponse> => ({ swapTransaction: "dGVzdA==", lastValidBlockHeight: 100 }),
  );
  public readonly parseRouteSummary = vi.fn<QuoteService["parseRouteSummary"]>(() => ["TestAmm"]);

  private readonly prices = new Map<string, bigint>();
  private readonly decimals = new Map<string, number>();
  private readonly halted = new Set<string>();

  public list(mint: string, lamportsPerToken: bigint, decimals = 9): void {
    this.prices.set(mint, lamportsPerToken);
    this.decimals.set(mint, decimals);
  }

  public setPrice(mint: string, lamportsPerToken: bigint): void {
    this.prices.set(mint, lamportsPerToken);
  }

  /** Quotes touching a halted mint are rejected as invalid requests. */
  public halt(mint: string): void {
    this.halted.add(mint);
  }

  public resume(mint: string): void {
    this.halted.delete(mint);
  }

  public decimalsOf(mint: string): number | null {
    return this.decimals.get(mint) ?? null;
  }

  private quote(request: JupiterQuoteRequest): JupiterQuoteResponse {
    if (this.halted.has(request.inputMint) || this.halted.has(request.outputMint)) {
      throw new HttpError("Jupiter quote", 400, "trading halted");
    }
    const amount = BigInt(request.amount);
    if (request.inputMint === WSOL_MINT) {
      const price = this.priceOf(request.outputMint);
      const scale = 10n ** BigInt(this.decimals.get(request.outputMint) ?? 9);
      return quoteResponse(request.inputMint, request.outputMint, request.amount, ((amount * scale) / price).toString());
    }
    const price = this.priceOf(request.inputMint);
    const scale = 10n ** BigInt(this.decimals.get(request.inputMint) ?? 9);
    return quoteResponse(request.inputMint, request.outputMint, request.amount, ((amount * price) / scale).toString());
  }

  private priceOf(mint: string): bigint {
    const price = this.prices.get(mint);
    if (price === undefined) {
      throw new Error(`no market for ${mint}`);
    }
    return price;
  }
}

export function createSettings(overrides: Partial<TradingSettingsValues> = {}): TradingSettings {
  return new TradingSettings({
    buyAmount: 0.1,
    defaultTargetMultiplier: 2,
    defaultSellFraction: 50,
    autoTradeEnabled: true,
    slippageBps: 50,
    ...overrides,
  });
}

export function createTrading(logger: Logger): { market: FakeMarket; wallet: PaperWallet; execution: ExecutionClient } {
  const market = new FakeMarket();
  const wallet = new PaperWallet({
    publicKey: "PaperWallet1111111111111111111111111111111",
    startingBalanceSol: 10,
    lookupDecimals: async (mint) => market.decimalsOf(mint),
  });
  const execution = new ExecutionClient({
    quotes: market,
    wallet,
    submitter: wallet,
    caller: createTestCaller(logger),
    defaultDecimals: 9,
    slippageBps: 50,
    logger,
  });
  return { market, wallet, execution };
}
