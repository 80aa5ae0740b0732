import fs from "node:fs";
import {
  Connection,
  Keypair,
  PublicKey,
  VersionedTransaction,
  type Commitment,
  type ParsedAccountData,
} from "@solana/web3.js";
import { fromRawAmount, parseRawAmount, toRawAmount, type AssetBalance } from "@tradeloop/core";

export const WSOL_MINT = "So11111111111111111111111111111111111111112";
export const SOL_DECIMALS = 9;

export function createRpcConnection(rpcUrl: string, commitment: Commitment = "confirmed"): Connection {
  return new Connection(rpcUrl, { commitment });
}

export function loadKeypairFromFile(path: string): Keypair {
  const payload = fs.readFileSync(path, "utf8");
  const raw: unknown = JSON.parse(payload);
  if (!Array.isArray(raw) || !raw.every((value) => typeof value === "number")) {
    throw new Error(`Keypair file ${path} must contain a JSON array of numbers`);
  }
  return Keypair.fromSecretKey(Uint8Array.from(raw));
}

export async function checkRpcHealth(connection: Connection): Promise<{ ok: boolean; slot?: number; error?: string }> {
  try {
    const blockhash = await connection.getLatestBlockhash("processed");
    return { ok: true, slot: blockhash.lastValidBlockHeight };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export async function getSolBalance(connection: Connection, owner: PublicKey): Promise<number> {
  const lamports = await connection.getBalance(owner, "confirmed");
  return lamports / 10 ** SOL_DECIMALS;
}

function readTokenAmount(data: ParsedAccountData): { amount: string; decimals: number } | null {
  const info: unknown = data.parsed?.info;
  if (typeof info !== "object" || info === null || !("tokenAmount" in info)) {
    return null;
  }
  const tokenAmount: unknown = info.tokenAmount;
  if (typeof tokenAmount !== "object" || tokenAmount === null || !("amount" in tokenAmount) || !("decimals" in tokenAmount)) {
    return null;
  }
  const { amount, decimals } = tokenAmount;
  if (typeof amount !== "string" || typeof decimals !== "number") {
    return null;
  }
  return { amount, decimals };
}

export async function getAssetBalance(connection: Connection, owner: PublicKey, mint: string): Promise<AssetBalance> {
  if (mint === WSOL_MINT) {
    const lamports = await connection.getBalance(owner, "confirmed");
    return { amountRaw: String(lamports), decimals: SOL_DECIMALS };
  }

  const mintPk = new PublicKey(mint);
  const accounts = await connection.getParsedTokenAccountsByOwner(owner, { mint: mintPk }, "confirmed");
  let total = 0n;
  let decimals = 0;
  for (const item of accounts.value) {
    const tokenAmount = readTokenAmount(item.account.data);
    if (!tokenAmount) {
      continue;
    }
    total += BigInt(tokenAmount.amount);
    decimals = tokenAmount.decimals;
  }
  return { amountRaw: total.toString(), decimals };
}

export async function getMintDecimals(connection: Connection, mint: string): Promise<number> {
  if (mint === WSOL_MINT) {
    return SOL_DECIMALS;
  }
  const mintPk = new PublicKey(mint);
  const parsed = await connection.getParsedAccountInfo(mintPk, "confirmed");
  const data = parsed.value?.data;
  if (!data || !("parsed" in data)) {
    throw new Error(`Mint account not parsed for ${mint}`);
  }
  const info: unknown = data.parsed?.info;
  const decimals = typeof info === "object" && info !== null && "decimals" in info ? info.decimals : undefined;
  if (typeof decimals !== "number") {
    throw new Error(`Mint decimals missing for ${mint}`);
  }
  return decimals;
}

export async function simulateVersionedTransaction(
  connection: Connection,
  transaction: VersionedTransaction,
): Promise<{ ok: boolean; logs: string[]; error?: string }> {
  const result = await connection.simulateTransaction(transaction, {
    replaceRecentBlockhash: true,
    sigVerify: false,
    commitment: "processed",
  });

  const logs = result.value.logs ?? [];
  if (result.value.err) {
    return {
      ok: false,
      logs,
      error: JSON.stringify(result.value.err),
    };
  }
  return { ok: true, logs };
}

export async function confirmSignature(
  connection: Connection,
  signature: string,
  blockhash: string,
  lastValidBlockHeight: number,
): Promise<{ ok: boolean; error?: string }> {
  const confirmation = await connection.confirmTransaction(
    {
      signature,
      blockhash,
      lastValidBlockHeight,
    },
    "confirmed",
  );
  if (confirmation.value.err) {
    return { ok: false, error: JSON.stringify(confirmation.value.err) };
  }
  return { ok: true };
}

export function atomicToUi(amountRaw: string, decimals: number): number {
  return fromRawAmount(parseRawAmount(amountRaw), decimals);
}

/** Floors to whole smallest units. */
export function uiToAtomic(amountUi: number, decimals: number): string {
  return toRawAmount(amountUi, decimals).toString();
}
