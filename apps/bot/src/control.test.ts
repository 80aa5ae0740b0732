import { Store } from "@tradeloop/store";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ControlSurface } from "./control.js";
import { TradeEngine } from "./engine.js";
import type { PaperWallet } from "./paper-wallet.js";
import type { TradingSettings } from "./settings.js";
import { createSettings, createTestLogger, createTrading } from "./test-support.js";

describe("ControlSurface", () => {
  let store: Store;
  let settings: TradingSettings;
  let wallet: PaperWallet;
  let control: ControlSurface;

  beforeEach(() => {
    store = new Store(":memory:");
    store.initialize();
    const { logger } = createTestLogger();
    const trading = createTrading(logger);
    trading.market.list("addrFOO", 2_000_000n);
    wallet = trading.wallet;
    settings = createSettings({ autoTradeEnabled: false });
    const engine = new TradeEngine({
      execution: trading.execution,
      wallet,
      settings,
      mode: "paper",
      intervalSeconds: 30,
      logger,
      journal: store,
    });
    control = new ControlSurface({ engine, settings, wallet, mode: "paper", logger, journal: store });
  });

  afterEach(() => {
    store.close();
  });

  it("applies a valid setting and records the new settings", () => {
    expect(control.setBuyAmount(0.25)).toEqual({ ok: true });

    expect(control.getSettings().buyAmount).toBe(0.25);
    expect(store.getLatestConfigSnapshot()).toMatchObject({
      mode: "paper",
      source: "control",
      config: { buyAmount: 0.25, defaultTargetMultiplier: 2 },
    });
  });

  it("rejects an invalid setting with a reason and keeps the old value", () => {
    expect(control.setTargetMultiplier(1)).toEqual({
      ok: false,
      reason: "Target multiplier must be a number greater than 1",
    });
    expect(control.setSellFraction(150)).toEqual({
      ok: false,
      reason: "Sell percentage must be greater than 0 and at most 100",
    });

    expect(control.getSettings()).toMatchObject({ defaultTargetMultiplier: 2, defaultSellFraction: 50 });
    expect(store.getLatestConfigSnapshot()).toBeNull();
  });

  it("refuses a manual buy while auto-trading is off", async () => {
    expect(await control.triggerBuy("FOO", "addrFOO")).toBe(false);

    expect(await control.triggerBuyDetailed("FOO", "addrFOO")).toEqual({
      ok: false,
      reason: "auto_trade_disabled",
      message: "Auto-trading is disabled",
    });
    expect(control.getSnapshot()).toEqual([]);
  });

  it("buys manually once auto-trading is on", async () => {
    control.setAutoTradeEnabled(true);

    expect(await control.triggerBuy("FOO", "addrFOO")).toBe(true);

    expect(control.getSnapshot()).toHaveLength(1);
    expect(control.getSnapshot()[0]).toMatchObject({ symbol: "FOO", source: "manual", heldAmount: 50 });
  });

  it("explains why a manual buy was refused", async () => {
    control.setAutoTradeEnabled(true);
    await control.triggerBuy("FOO", "addrFOO");

    const again = await control.triggerBuyDetailed("FOO", "addrFOO");

    expect(again).toEqual({ ok: false, reason: "already_trading", message: "Already trading FOO" });
  });

  it("reports the engine and wallet state", async () => {
    control.setAutoTradeEnabled(true);
    await control.triggerBuy("FOO", "addrFOO");

    const status = await control.getStatus();

    expect(status).toMatchObject({ mode: "paper", autoTradeEnabled: true, running: false, openPositions: 1, wallet: "Pape...1111" });
    expect(status.baseBalance).toBeCloseTo(9.9, 9);
  });

  it("reports no balance when the wallet cannot be read", async () => {
    vi.spyOn(wallet, "getBaseBalance").mockRejectedValue(new Error("rpc down"));

    expect((await control.getStatus()).baseBalance).toBeNull();
  });
});
