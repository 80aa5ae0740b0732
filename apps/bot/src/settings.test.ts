import { describe, expect, it } from "vitest";
import { TradingSettings } from "./settings.js";

function createSettings(): TradingSettings {
  return new TradingSettings({
    buyAmount: 0.1,
    defaultTargetMultiplier: 2,
    defaultSellFraction: 50,
    autoTradeEnabled: true,
    slippageBps: 50,
  });
}

describe("TradingSettings", () => {
  it("accepts values inside the bounds", () => {
    const settings = createSettings();

    expect(settings.setBuyAmount(0.5)).toEqual({ ok: true });
    expect(settings.setTargetMultiplier(3)).toEqual({ ok: true });
    expect(settings.setSellFraction(100)).toEqual({ ok: true });
    expect(settings.setAutoTradeEnabled(false)).toEqual({ ok: true });
    expect(settings.snapshot()).toEqual({
      buyAmount: 0.5,
      defaultTargetMultiplier: 3,
      defaultSellFraction: 100,
      autoTradeEnabled: false,
      slippageBps: 50,
    });
  });

  it.each([
    ["buy amount", (settings: TradingSettings) => settings.setBuyAmount(0)],
    ["buy amount", (settings: TradingSettings) => settings.setBuyAmount(Number.NaN)],
    ["multiplier", (settings: TradingSettings) => settings.setTargetMultiplier(1)],
    ["sell fraction", (settings: TradingSettings) => settings.setSellFraction(0)],
    ["sell fraction", (settings: TradingSettings) => settings.setSellFraction(100.5)],
    ["slippage", (settings: TradingSettings) => settings.setSlippageBps(2.5)],
  ])("rejects an out-of-range %s without mutating", (_label, mutate) => {
    const settings = createSettings();
    const before = settings.snapshot();

    const result = mutate(settings);

    expect(result.ok).toBe(false);
    expect(settings.snapshot()).toEqual(before);
  });

  it("explains why a value was rejected", () => {
    expect(createSettings().setTargetMultiplier(0.5)).toEqual({
      ok: false,
      reason: "Target multiplier must be a number greater than 1",
    });
  });

  it("hands out frozen snapshots that later changes do not touch", () => {
    const settings = createSettings();
    const snapshot = settings.snapshot();

    settings.setBuyAmount(2);

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot.buyAmount).toBe(0.1);
  });

  it("refuses invalid initial values", () => {
    expect(
      () =>
        new TradingSettings({
          buyAmount: 0.1,
          defaultTargetMultiplier: 2,
          defaultSellFraction: 0,
          autoTradeEnabled: false,
          slippageBps: 50,
        }),
    ).toThrow("Sell percentage must be greater than 0 and at most 100");
  });
});
