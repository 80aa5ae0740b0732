import type { BotConfig } from "@tradeloop/core";

export interface TradingSettingsValues {
  buyAmount: number;
  defaultTargetMultiplier: number;
  defaultSellFraction: number;
  autoTradeEnabled: boolean;
  slippageBps: number;
}

export type SettingResult = { ok: true } | { ok: false; reason: string };

function checkBuyAmount(value: number): string | null {
  return Number.isFinite(value) && value > 0 ? null : "Buy amount must be a number greater than 0";
}

function checkTargetMultiplier(value: number): string | null {
  return Number.isFinite(value) && value > 1 ? null : "Target multiplier must be a number greater than 1";
}

function checkSellFraction(value: number): string | null {
  return Number.isFinite(value) && value > 0 && value <= 100
    ? null
    : "Sell percentage must be greater than 0 and at most 100";
}

function checkSlippage(value: number): string | null {
  return Number.isInteger(value) && value > 0 && value <= 10_000 ? null : "Slippage must be an integer between 1 and 10000 bps";
}

/**
 * Mutable trading defaults shared by the engine and the control surface.
 * Open positions never read from here after entry; they keep the
 * {@link TradingSettings.snapshot} taken when they were opened.
 */
export class TradingSettings {
  private values: TradingSettingsValues;

  public constructor(initial: TradingSettingsValues) {
    const problem =
      checkBuyAmount(initial.buyAmount) ??
      checkTargetMultiplier(initial.defaultTargetMultiplier) ??
      checkSellFraction(initial.defaultSellFraction) ??
      checkSlippage(initial.slippageBps);
    if (problem) {
      throw new RangeError(problem);
    }
    this.values = { ...initial };
  }

  public static fromConfig(config: BotConfig): TradingSettings {
    return new TradingSettings({
      buyAmount: config.BUY_AMOUNT_SOL,
      defaultTargetMultiplier: config.TARGET_MULTIPLIER,
      defaultSellFraction: config.SELL_PERCENTAGE,
      autoTradeEnabled: config.AUTO_TRADE_ENABLED,
      slippageBps: config.SLIPPAGE_BPS,
    });
  }

  public get buyAmount(): number {
    return this.values.buyAmount;
  }

  public get defaultTargetMultiplier(): number {
    return this.values.defaultTargetMultiplier;
  }

  public get defaultSellFraction(): number {
    return this.values.defaultSellFraction;
  }

  public get autoTradeEnabled(): boolean {
    return this.values.autoTradeEnabled;
  }

  public get slippageBps(): number {
    return this.values.slippageBps;
  }

  public setBuyAmount(value: number): SettingResult {
    return this.apply(checkBuyAmount(value), { buyAmount: value });
  }

  public setTargetMultiplier(value: number): SettingResult {
    return this.apply(checkTargetMultiplier(value), { defaultTargetMultiplier: value });
  }

  public setSellFraction(value: number): SettingResult {
    return this.apply(checkSellFraction(value), { defaultSellFraction: value });
  }

  public setSlippageBps(value: number): SettingResult {
    return this.apply(checkSlippage(value), { slippageBps: value });
  }

  public setAutoTradeEnabled(enabled: boolean): SettingResult {
    return this.apply(null, { autoTradeEnabled: enabled });
  }

  public snapshot(): Readonly<TradingSettingsValues> {
    return Object.freeze({ ...this.values });
  }

  private apply(problem: string | null, patch: Partial<TradingSettingsValues>): SettingResult {
    if (problem) {
      return { ok: false, reason: problem };
    }
    this.values = { ...this.values, ...patch };
    return { ok: true };
  }
}
