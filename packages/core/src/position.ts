import type { PositionSnapshot, PositionStatus } from "./types.js";
import { fromRawAmount, toRawAmount } from "./units.js";

export interface PositionInit {
  symbol: string;
  address: string;
  source: string;
  decimals: number;
  /** Filled amount in smallest units of the asset. */
  amountRaw: bigint;
  entryPrice: number;
  targetMultiplier: number;
  sellFraction: number;
  openedAt?: Date;
}

/**
 * One held asset. Exit parameters are fixed at construction; later changes
 * to the trading settings never reach an open position.
 *
 * After a partial exit the cost basis is re-based to the current price, so
 * the next target is measured against the post-exit valuation rather than
 * the original entry.
 *
 * Holdings are counted in smallest units; the human amounts are derived from
 * them, so a full exit leaves exactly zero behind.
 */
export class Position {
  public readonly symbol: string;
  public readonly address: string;
  public readonly source: string;
  public readonly decimals: number;
  public readonly purchasedRaw: bigint;
  public readonly entryPrice: number;
  public readonly targetMultiplier: number;
  public readonly sellFraction: number;
  public readonly openedAt: Date;

  private held: bigint;
  private sold = 0n;
  private price: number;
  private basis: number;
  private value: number;
  private profit = 0;
  private state: PositionStatus = "active";
  private updatedAt: Date;

  public constructor(init: PositionInit) {
    if (init.amountRaw <= 0n) {
      throw new RangeError(`position amount must be > 0 (got ${init.amountRaw})`);
    }
    if (!(init.entryPrice > 0)) {
      throw new RangeError(`entry price must be > 0 (got ${init.entryPrice})`);
    }
    if (!(init.targetMultiplier > 1)) {
      throw new RangeError(`target multiplier must be > 1 (got ${init.targetMultiplier})`);
    }
    if (!(init.sellFraction > 0 && init.sellFraction <= 100)) {
      throw new RangeError(`sell fraction must be in (0, 100] (got ${init.sellFraction})`);
    }

    this.symbol = init.symbol;
    this.address = init.address;
    this.source = init.source;
    this.decimals = init.decimals;
    this.purchasedRaw = init.amountRaw;
    this.entryPrice = init.entryPrice;
    this.targetMultiplier = init.targetMultiplier;
    this.sellFraction = init.sellFraction;
    this.openedAt = init.openedAt ?? new Date();

    this.held = init.amountRaw;
    this.price = init.entryPrice;
    this.basis = this.heldAmount * init.entryPrice;
    this.value = this.basis;
    this.updatedAt = this.openedAt;
  }

  public get purchasedAmount(): number {
    return fromRawAmount(this.purchasedRaw, this.decimals);
  }

  public get heldAmount(): number {
    return fromRawAmount(this.held, this.decimals);
  }

  public get heldRaw(): bigint {
    return this.held;
  }

  public get soldTotal(): number {
    return fromRawAmount(this.sold, this.decimals);
  }

  public get soldRaw(): bigint {
    return this.sold;
  }

  public get currentPrice(): number {
    return this.price;
  }

  public get entryValue(): number {
    return this.basis;
  }

  public get currentValue(): number {
    return this.value;
  }

  public get profitPercent(): number {
    return this.profit;
  }

  public get status(): PositionStatus {
    return this.state;
  }

  public get lastUpdatedAt(): Date {
    return this.updatedAt;
  }

  public isCompleted(): boolean {
    return this.state === "completed";
  }

  /** Ignored for non-positive or non-finite prices, and once completed. */
  public updatePrice(newPrice: number, at: Date = new Date()): void {
    if (this.state === "completed" || !Number.isFinite(newPrice) || newPrice <= 0) {
      return;
    }
    this.price = newPrice;
    this.value = this.heldAmount * newPrice;
    this.profit = this.computeProfit();
    this.updatedAt = at;
  }

  public isTargetReached(): boolean {
    return this.profit >= (this.targetMultiplier - 1) * 100;
  }

  public exitAmount(): number {
    return fromRawAmount(this.exitAmountRaw(), this.decimals);
  }

  /** Floored to whole smallest units; the fraction is applied at 0.01% resolution. */
  public exitAmountRaw(): bigint {
    if (this.sellFraction >= 100) {
      return this.held;
    }
    return (this.held * BigInt(Math.round(this.sellFraction * 100))) / 10_000n;
  }

  /** `soldAmount` is in human units and floored to smallest units. */
  public applyPartialExit(soldAmount: number, at: Date = new Date()): void {
    this.applyPartialExitRaw(toRawAmount(soldAmount, this.decimals), at);
  }

  /**
   * Records a confirmed sale. Amounts above the holding are clamped; the
   * position completes when nothing remains.
   */
  public applyPartialExitRaw(soldRaw: bigint, at: Date = new Date()): void {
    if (this.state === "completed" || soldRaw <= 0n) {
      return;
    }
    const applied = soldRaw < this.held ? soldRaw : this.held;
    this.held -= applied;
    this.sold += applied;
    if (this.held === 0n) {
      this.state = "completed";
    }
    const held = this.heldAmount;
    this.basis = this.price * held;
    this.value = this.price * held;
    this.profit = this.computeProfit();
    this.updatedAt = at;
  }

  public toSnapshot(): PositionSnapshot {
    return Object.freeze({
      symbol: this.symbol,
      address: this.address,
      source: this.source,
      decimals: this.decimals,
      purchasedAmount: this.purchasedAmount,
      heldAmount: this.heldAmount,
      heldAmountRaw: this.held.toString(),
      soldTotal: this.soldTotal,
      entryPrice: this.entryPrice,
      currentPrice: this.price,
      entryValue: this.basis,
      currentValue: this.value,
      profitPercent: this.profit,
      targetMultiplier: this.targetMultiplier,
      sellFraction: this.sellFraction,
      status: this.state,
      openedAt: this.openedAt.toISOString(),
      lastUpdatedAt: this.updatedAt.toISOString(),
    });
  }

  private computeProfit(): number {
    if (this.basis <= 0) {
      return 0;
    }
    return (this.value / this.basis - 1) * 100;
  }
}
