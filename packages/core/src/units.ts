/**
 * Conversions between human amounts and on-chain smallest units. Raw amounts
 * are u64 on chain, so they stay bigint; only display values are numbers.
 */

const RAW_AMOUNT = /^\d+$/;

/** Floors to whole smallest units; non-positive or non-finite input gives 0n. */
export function toRawAmount(amount: number, decimals: number): bigint {
  if (!Number.isFinite(amount) || amount <= 0) {
    return 0n;
  }
  const scaled = amount * 10 ** decimals;
  // 0.29 * 100 = 28.999999999999996 must still give 29
  const rounded = Math.round(scaled);
  const whole = Math.abs(scaled - rounded) <= 4 * Number.EPSILON * scaled ? rounded : Math.floor(scaled);
  return BigInt(whole);
}

export function fromRawAmount(raw: bigint, decimals: number): number {
  const scale = 10n ** BigInt(decimals);
  return Number(raw / scale) + Number(raw % scale) / Number(scale);
}

/** Unsigned integer strings only; anything else reads as 0n. */
export function parseRawAmount(value: string): bigint {
  return RAW_AMOUNT.test(value) ? BigInt(value) : 0n;
}
