import {
  errorMessage,
  maskPubkey,
  type Logger,
  type Mode,
  type PositionSnapshot,
  type WalletPort,
} from "@tradeloop/core";
import type { Store } from "@tradeloop/store";
import type { BuyResult, TradeEngine } from "./engine.js";
import type { SettingResult, TradingSettings, TradingSettingsValues } from "./settings.js";

export type SettingsJournal = Pick<Store, "snapshotSettings">;

export interface ControlStatus {
  mode: Mode;
  autoTradeEnabled: boolean;
  running: boolean;
  openPositions: number;
  wallet: string;
  /** Null when the wallet could not be read. */
  baseBalance: number | null;
}

export interface ControlSurfaceOptions {
  engine: TradeEngine;
  settings: TradingSettings;
  wallet: WalletPort;
  mode: Mode;
  logger: Logger;
  journal?: SettingsJournal;
}

/**
 * Operator-facing view of the engine: read-only snapshots, validated
 * settings changes and manual buys. Never hands out a live position.
 */
export class ControlSurface {
  private readonly engine: TradeEngine;
  private readonly settings: TradingSettings;
  private readonly wallet: WalletPort;
  private readonly mode: Mode;
  private readonly logger: Logger;
  private readonly journal: SettingsJournal | undefined;

  public constructor(options: ControlSurfaceOptions) {
    this.engine = options.engine;
    this.settings = options.settings;
    this.wallet = options.wallet;
    this.mode = options.mode;
    this.logger = options.logger;
    this.journal = options.journal;
  }

  public getSnapshot(): PositionSnapshot[] {
    return this.engine.getSnapshot();
  }

  public getSettings(): Readonly<TradingSettingsValues> {
    return this.settings.snapshot();
  }

  public setBuyAmount(value: number): SettingResult {
    return this.record("buyAmount", value, this.settings.setBuyAmount(value));
  }

  public setTargetMultiplier(value: number): SettingResult {
    return this.record("defaultTargetMultiplier", value, this.settings.setTargetMultiplier(value));
  }

  public setSellFraction(value: number): SettingResult {
    return this.record("defaultSellFraction", value, this.settings.setSellFraction(value));
  }

  public setSlippageBps(value: number): SettingResult {
    return this.record("slippageBps", value, this.settings.setSlippageBps(value));
  }

  public setAutoTradeEnabled(enabled: boolean): SettingResult {
    return this.record("autoTradeEnabled", enabled, this.settings.setAutoTradeEnabled(enabled));
  }

  public async triggerBuy(symbol: string, address: string): Promise<boolean> {
    const result = await this.triggerBuyDetailed(symbol, address);
    return result.ok;
  }

  /** Manual buys obey the auto-trade switch like any signal. */
  public async triggerBuyDetailed(symbol: string, address: string): Promise<BuyResult> {
    this.logger.info("MANUAL_BUY", "MANUAL BUY REQUESTED", { symbol, address });
    const result = await this.engine.buy({ symbol, address, source: "manual" });
    if (!result.ok) {
      this.logger.warn("MANUAL_BUY_REJECTED", "WARNING MANUAL BUY REJECTED", { symbol, reason: result.reason });
    }
    return result;
  }

  public async getStatus(): Promise<ControlStatus> {
    let baseBalance: number | null = null;
    try {
      baseBalance = await this.wallet.getBaseBalance();
    } catch (error) {
      this.logger.warn("STATUS_BALANCE_FAIL", "WARNING FAILED TO READ WALLET BALANCE", { error: errorMessage(error) });
    }
    return {
      mode: this.mode,
      autoTradeEnabled: this.settings.autoTradeEnabled,
      running: this.engine.isRunning(),
      openPositions: this.engine.openPositionCount(),
      wallet: maskPubkey(this.wallet.getPublicKey()),
      baseBalance,
    };
  }

  private record(name: keyof TradingSettingsValues, value: number | boolean, result: SettingResult): SettingResult {
    if (!result.ok) {
      this.logger.warn("SETTING_REJECTED", "WARNING SETTING CHANGE REJECTED", { name, value, reason: result.reason });
      return result;
    }
    this.logger.ok("SETTING_CHANGED", "CONFIRMED SETTING CHANGED", { name, value });
    try {
      this.journal?.snapshotSettings(this.mode, { ...this.settings.snapshot() });
    } catch (error) {
      this.logger.error("JOURNAL_FAIL", "ERROR RECORDING SETTINGS SNAPSHOT", { error: errorMessage(error) });
    }
    return result;
  }
}
