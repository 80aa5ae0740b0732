import { Connection, Keypair, VersionedTransaction } from "@solana/web3.js";
import {
  ExecutionError,
  errorMessage,
  type AssetBalance,
  type Logger,
  type SubmitOutcome,
  type SubmitRequest,
  type TransactionSubmitter,
  type WalletPort,
} from "@tradeloop/core";
import {
  confirmSignature,
  getAssetBalance,
  getMintDecimals,
  getSolBalance,
  simulateVersionedTransaction,
} from "./rpc.js";

export interface SolanaWalletOptions {
  connection: Connection;
  keypair: Keypair;
  logger?: Logger;
}

/**
 * Live key custody. Submission deserializes the service-built transaction,
 * simulates it, signs, sends and confirms, then reports what actually moved
 * from the balance deltas rather than from the quote.
 */
export class SolanaWallet implements WalletPort, TransactionSubmitter {
  private readonly connection: Connection;
  private readonly keypair: Keypair;
  private readonly logger: Logger | undefined;

  public constructor(options: SolanaWalletOptions) {
    this.connection = options.connection;
    this.keypair = options.keypair;
    this.logger = options.logger;
  }

  public getPublicKey(): string {
    return this.keypair.publicKey.toBase58();
  }

  public getBaseBalance(): Promise<number> {
    return getSolBalance(this.connection, this.keypair.publicKey);
  }

  public getAssetHolding(mint: string): Promise<AssetBalance> {
    return getAssetBalance(this.connection, this.keypair.publicKey, mint);
  }

  public async getMintDecimals(mint: string): Promise<number | null> {
    try {
      return await getMintDecimals(this.connection, mint);
    } catch (error) {
      this.logger?.warn("MINT_DECIMALS_FAIL", "WARNING COULD NOT READ MINT DECIMALS", {
        mint,
        error: errorMessage(error),
      });
      return null;
    }
  }

  public async submit(request: SubmitRequest): Promise<SubmitOutcome> {
    try {
      return await this.execute(request);
    } catch (error) {
      const message = errorMessage(error);
      this.logger?.error("TX_FAIL", "ERROR SWAP SUBMISSION FAILED", {
        inputMint: request.inputMint,
        outputMint: request.outputMint,
        error: message,
      });
      return { ok: false, error: message };
    }
  }

  private async execute(request: SubmitRequest): Promise<SubmitOutcome> {
    const versionedTx = VersionedTransaction.deserialize(Buffer.from(request.payload, "base64"));
    const simulation = await simulateVersionedTransaction(this.connection, versionedTx);
    if (!simulation.ok) {
      throw new ExecutionError(`Simulation failed: ${simulation.error ?? "unknown error"}`, {
        logs: simulation.logs.slice(0, 12),
      });
    }

    const owner = this.keypair.publicKey;
    const inputBefore = await getAssetBalance(this.connection, owner, request.inputMint);
    const outputBefore = await getAssetBalance(this.connection, owner, request.outputMint);

    versionedTx.sign([this.keypair]);
    const sendStarted = Date.now();
    const signature = await this.connection.sendRawTransaction(versionedTx.serialize(), {
      skipPreflight: true,
      maxRetries: 2,
    });
    this.logger?.info("TX_SENT", "EXECUTE TX SENT", { signature });

    const confirmed = await confirmSignature(
      this.connection,
      signature,
      versionedTx.message.recentBlockhash,
      request.lastValidBlockHeight,
    );
    if (!confirmed.ok) {
      throw new ExecutionError(`Confirmation failed: ${confirmed.error ?? "unknown error"}`, { signature });
    }

    const inputAfter = await getAssetBalance(this.connection, owner, request.inputMint);
    const outputAfter = await getAssetBalance(this.connection, owner, request.outputMint);
    const inputDelta = BigInt(inputBefore.amountRaw) - BigInt(inputAfter.amountRaw);
    const outputDelta = BigInt(outputAfter.amountRaw) - BigInt(outputBefore.amountRaw);
    if (inputDelta <= 0n || outputDelta <= 0n) {
      throw new ExecutionError("Balance delta verification failed", {
        signature,
        inputDeltaRaw: inputDelta.toString(),
        outputDeltaRaw: outputDelta.toString(),
      });
    }

    this.logger?.ok("CONFIRMED", "CONFIRMED SWAP EXECUTION", {
      signature,
      confirmationMs: Date.now() - sendStarted,
      inputDeltaRaw: inputDelta.toString(),
      outputDeltaRaw: outputDelta.toString(),
    });

    return {
      ok: true,
      signature,
      inAmountRaw: inputDelta.toString(),
      outAmountRaw: outputDelta.toString(),
    };
  }
}
