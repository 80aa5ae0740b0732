import {
  describeError,
  errorMessage,
  fromRawAmount,
  parseRawAmount,
  toRawAmount,
  type Logger,
  type ResilientCaller,
  type SubmitOutcome,
  type TransactionSubmitter,
  type WalletPort,
} from "@tradeloop/core";
import type { JupiterClient, JupiterQuoteResponse } from "@tradeloop/jupiter";
import { SOL_DECIMALS, WSOL_MINT } from "@tradeloop/solana";

/** Stands in for the base currency wherever an asset address is expected. */
export const BASE_ASSET = "SOL";

export type QuoteService = Pick<JupiterClient, "getQuote" | "getSwapTransaction" | "parseRouteSummary">;

export interface Quote {
  inputMint: string;
  outputMint: string;
  inAmountRaw: string;
  outAmountRaw: string;
  slippageBps: number;
  routeSummary: string[];
  raw: JupiterQuoteResponse;
}

export interface SwapPayload {
  quote: Quote;
  transaction: string;
  lastValidBlockHeight: number;
}

export interface ExecutionClientOptions {
  quotes: QuoteService;
  wallet: WalletPort;
  submitter: TransactionSubmitter;
  caller: ResilientCaller;
  defaultDecimals: number;
  slippageBps: number;
  priorityFeeLamports?: number;
  logger: Logger;
}

/**
 * Quote, swap-build, price and submit against the swap service. Every call
 * goes through the shared {@link ResilientCaller}; anything it cannot
 * recover is logged and reported as unavailable instead of thrown.
 */
export class ExecutionClient {
  private readonly quotes: QuoteService;
  private readonly wallet: WalletPort;
  private readonly submitter: TransactionSubmitter;
  private readonly caller: ResilientCaller;
  private readonly defaultDecimals: number;
  private readonly slippageBps: number;
  private readonly priorityFeeLamports: number;
  private readonly logger: Logger;
  private readonly decimalsCache = new Map<string, number>();

  public constructor(options: ExecutionClientOptions) {
    this.quotes = options.quotes;
    this.wallet = options.wallet;
    this.submitter = options.submitter;
    this.caller = options.caller;
    this.defaultDecimals = options.defaultDecimals;
    this.slippageBps = options.slippageBps;
    this.priorityFeeLamports = options.priorityFeeLamports ?? 0;
    this.logger = options.logger;
  }

  public static resolveMint(asset: string): string {
    return asset === BASE_ASSET ? WSOL_MINT : asset;
  }

  /**
   * Decimal precision of an asset. Falls back to the configured default when
   * the wallet cannot tell; the fallback is not cached so a later lookup can
   * still succeed.
   */
  public async resolveDecimals(asset: string): Promise<number> {
    const mint = ExecutionClient.resolveMint(asset);
    if (mint === WSOL_MINT) {
      return SOL_DECIMALS;
    }
    const cached = this.decimalsCache.get(mint);
    if (cached !== undefined) {
      return cached;
    }

    let decimals: number | null = null;
    try {
      decimals = await this.wallet.getMintDecimals(mint);
    } catch (error) {
      this.logger.debug("DECIMALS_LOOKUP_FAIL", "MINT DECIMALS LOOKUP FAILED", { mint, error: errorMessage(error) });
    }
    if (decimals === null) {
      this.logger.warn("DECIMALS_FALLBACK", "WARNING USING DEFAULT TOKEN DECIMALS", {
        mint,
        decimals: this.defaultDecimals,
      });
      return this.defaultDecimals;
    }
    this.decimalsCache.set(mint, decimals);
    return decimals;
  }

  /**
   * `amount` is in human units of the input asset. Pass `inputDecimals` when
   * the scale is already fixed, as it is for an open position.
   */
  public async getQuote(
    inputAsset: string,
    outputAsset: string,
    amount: number,
    slippageBps: number,
    inputDecimals?: number,
  ): Promise<Quote | null> {
    const inputMint = ExecutionClient.resolveMint(inputAsset);
    const outputMint = ExecutionClient.resolveMint(outputAsset);
    const decimals = inputDecimals ?? (await this.resolveDecimals(inputMint));
    const amountRaw = toRawAmount(amount, decimals);
    if (amountRaw === 0n) {
      this.logger.warn("QUOTE_UNAVAILABLE", "WARNING QUOTE AMOUNT ROUNDS TO ZERO", {
        inputMint,
        outputMint,
        amount,
        decimals,
      });
      return null;
    }
    return this.requestQuote(inputMint, outputMint, amountRaw.toString(), slippageBps);
  }

  /** Same as {@link getQuote} with the amount already in smallest units. */
  public async getQuoteRaw(inputAsset: string, outputAsset: string, amountRaw: bigint, slippageBps: number): Promise<Quote | null> {
    const inputMint = ExecutionClient.resolveMint(inputAsset);
    const outputMint = ExecutionClient.resolveMint(outputAsset);
    if (amountRaw <= 0n) {
      this.logger.warn("QUOTE_UNAVAILABLE", "WARNING QUOTE AMOUNT IS ZERO", { inputMint, outputMint });
      return null;
    }
    return this.requestQuote(inputMint, outputMint, amountRaw.toString(), slippageBps);
  }

  public async getSwapTransaction(quote: Quote, walletPublicKey: string): Promise<SwapPayload | null> {
    try {
      const response = await this.caller.call("swap", () =>
        this.quotes.getSwapTransaction({
          userPublicKey: walletPublicKey,
          quoteResponse: quote.raw,
          priorityFeeLamports: this.priorityFeeLamports,
        }),
      );
      return {
        quote,
        transaction: response.swapTransaction,
        lastValidBlockHeight: response.lastValidBlockHeight,
      };
    } catch (error) {
      this.logger.warn("SWAP_UNAVAILABLE", "WARNING SWAP TRANSACTION UNAVAILABLE", {
        inputMint: quote.inputMint,
        outputMint: quote.outputMint,
        reason: describeError(error),
        error: errorMessage(error),
      });
      return null;
    }
  }

  /**
   * Price of one whole token in SOL, read off a quote for exactly one unit.
   * Spends quote budget like any other quote. An open position passes its
   * own `decimals` so it is always priced on the scale it was opened on.
   */
  public async getPrice(address: string, decimals?: number): Promise<number | null> {
    const scale = decimals ?? (await this.resolveDecimals(address));
    const oneUnit = (10n ** BigInt(scale)).toString();
    const quote = await this.requestQuote(address, WSOL_MINT, oneUnit, this.slippageBps);
    if (!quote) {
      return null;
    }
    const inUnits = fromRawAmount(parseRawAmount(quote.inAmountRaw), scale);
    const outSol = fromRawAmount(parseRawAmount(quote.outAmountRaw), SOL_DECIMALS);
    if (inUnits <= 0 || outSol <= 0) {
      this.logger.warn("PRICE_UNAVAILABLE", "WARNING QUOTE PRODUCED NO PRICE", {
        address,
        inAmountRaw: quote.inAmountRaw,
        outAmountRaw: quote.outAmountRaw,
      });
      return null;
    }
    return outSol / inUnits;
  }

  public async submitTransaction(payload: SwapPayload): Promise<SubmitOutcome> {
    try {
      const outcome = await this.caller.call("submit", () =>
        this.submitter.submit({
          payload: payload.transaction,
          lastValidBlockHeight: payload.lastValidBlockHeight,
          inputMint: payload.quote.inputMint,
          outputMint: payload.quote.outputMint,
          inAmountRaw: payload.quote.inAmountRaw,
          expectedOutRaw: payload.quote.outAmountRaw,
        }),
      );
      if (!outcome.ok) {
        this.logger.error("SUBMIT_FAIL", "ERROR TRANSACTION NOT EXECUTED", {
          inputMint: payload.quote.inputMint,
          outputMint: payload.quote.outputMint,
          error: outcome.error,
        });
      }
      return outcome;
    } catch (error) {
      this.logger.error("SUBMIT_FAIL", "ERROR TRANSACTION NOT EXECUTED", {
        inputMint: payload.quote.inputMint,
        outputMint: payload.quote.outputMint,
        error: errorMessage(error),
      });
      return { ok: false, error: describeError(error) };
    }
  }

  private async requestQuote(inputMint: string, outputMint: string, amountRaw: string, slippageBps: number): Promise<Quote | null> {
    try {
      const response = await this.caller.call("quote", () =>
        this.quotes.getQuote({ inputMint, outputMint, amount: amountRaw, slippageBps }),
      );
      if (parseRawAmount(response.outAmount) <= 0n) {
        this.logger.warn("QUOTE_UNAVAILABLE", "WARNING QUOTE RETURNED NO OUTPUT", { inputMint, outputMint, amountRaw });
        return null;
      }
      return {
        inputMint,
        outputMint,
        inAmountRaw: response.inAmount,
        outAmountRaw: response.outAmount,
        slippageBps,
        routeSummary: this.quotes.parseRouteSummary(response),
        raw: response,
      };
    } catch (error) {
      this.logger.warn("QUOTE_UNAVAILABLE", "WARNING QUOTE UNAVAILABLE", {
        inputMint,
        outputMint,
        amountRaw,
        reason: describeError(error),
        error: errorMessage(error),
      });
      return null;
    }
  }
}
