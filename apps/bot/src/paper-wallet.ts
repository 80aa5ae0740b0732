import type {
  AssetBalance,
  Logger,
  SubmitOutcome,
  SubmitRequest,
  TransactionSubmitter,
  WalletPort,
} from "@tradeloop/core";
import { SOL_DECIMALS, WSOL_MINT } from "@tradeloop/solana";

export interface PaperWalletOptions {
  publicKey: string;
  startingBalanceSol: number;
  /** Where mint decimals come from; usually a read-only RPC lookup. */
  lookupDecimals?: (mint: string) => Promise<number | null>;
  logger?: Logger;
}

/**
 * Simulated ledger for paper mode. Swaps fill at exactly the quoted amounts
 * and never touch the network.
 */
export class PaperWallet implements WalletPort, TransactionSubmitter {
  private readonly publicKey: string;
  private readonly lookupDecimals: ((mint: string) => Promise<number | null>) | undefined;
  private readonly logger: Logger | undefined;
  private readonly holdings = new Map<string, bigint>();
  private readonly decimals = new Map<string, number>();
  private lamports: bigint;
  private fills = 0;

  public constructor(options: PaperWalletOptions) {
    this.publicKey = options.publicKey;
    this.lookupDecimals = options.lookupDecimals;
    this.logger = options.logger;
    this.lamports = BigInt(Math.floor(options.startingBalanceSol * 10 ** SOL_DECIMALS));
  }

  public getPublicKey(): string {
    return this.publicKey;
  }

  public async getBaseBalance(): Promise<number> {
    return Number(this.lamports) / 10 ** SOL_DECIMALS;
  }

  public async getAssetHolding(mint: string): Promise<AssetBalance> {
    if (mint === WSOL_MINT) {
      return { amountRaw: this.lamports.toString(), decimals: SOL_DECIMALS };
    }
    return {
      amountRaw: (this.holdings.get(mint) ?? 0n).toString(),
      decimals: this.decimals.get(mint) ?? 0,
    };
  }

  public async getMintDecimals(mint: string): Promise<number | null> {
    if (mint === WSOL_MINT) {
      return SOL_DECIMALS;
    }
    const known = this.decimals.get(mint);
    if (known !== undefined) {
      return known;
    }
    if (!this.lookupDecimals) {
      return null;
    }
    const looked = await this.lookupDecimals(mint);
    if (looked !== null) {
      this.decimals.set(mint, looked);
    }
    return looked;
  }

  public async submit(request: SubmitRequest): Promise<SubmitOutcome> {
    const inAmount = BigInt(request.inAmountRaw);
    const outAmount = BigInt(request.expectedOutRaw);
    if (inAmount <= 0n || outAmount <= 0n) {
      return { ok: false, error: "Paper fill requires positive amounts" };
    }

    const available = this.balanceOf(request.inputMint);
    if (available < inAmount) {
      return {
        ok: false,
        error: `Insufficient paper balance for ${request.inputMint}: have ${available}, need ${inAmount}`,
      };
    }

    this.adjust(request.inputMint, -inAmount);
    this.adjust(request.outputMint, outAmount);
    this.fills += 1;
    const signature = `paper-${this.fills}`;

    this.logger?.ok("WOULD_TRADE", "PAPER MODE FILLED SWAP", {
      signature,
      inputMint: request.inputMint,
      outputMint: request.outputMint,
      inAmountRaw: request.inAmountRaw,
      outAmountRaw: request.expectedOutRaw,
    });
    return {
      ok: true,
      signature,
      inAmountRaw: inAmount.toString(),
      outAmountRaw: outAmount.toString(),
    };
  }

  private balanceOf(mint: string): bigint {
    return mint === WSOL_MINT ? this.lamports : this.holdings.get(mint) ?? 0n;
  }

  private adjust(mint: string, delta: bigint): void {
    if (mint === WSOL_MINT) {
      this.lamports += delta;
      return;
    }
    const next = (this.holdings.get(mint) ?? 0n) + delta;
    if (next === 0n) {
      this.holdings.delete(mint);
    } else {
      this.holdings.set(mint, next);
    }
  }
}
