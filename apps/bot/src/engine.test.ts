import { ValidationError } from "@tradeloop/core";
import { WSOL_MINT } from "@tradeloop/solana";
import { Store } from "@tradeloop/store";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { TradeEngine } from "./engine.js";
import { ExecutionClient } from "./execution.js";
import type { Notifier } from "./notifier.js";
import { PaperWallet } from "./paper-wallet.js";
import type { TradingSettings } from "./settings.js";
import { createSettings, createTestCaller, createTestLogger, createTrading, type FakeMarket } from "./test-support.js";

const FOO = { symbol: "FOO", address: "addrFOO", source: "test" };
const BAR = { symbol: "BAR", address: "addrBAR", source: "test" };

describe("TradeEngine", () => {
  let store: Store;
  let market: FakeMarket;
  let settings: TradingSettings;
  let notifier: { notify: Mock<Notifier["notify"]> };
  let engine: TradeEngine;
  let wallet: PaperWallet;
  let log: ReturnType<typeof createTestLogger>;

  beforeEach(() => {
    store = new Store(":memory:");
    store.initialize();
    log = createTestLogger();
    const trading = createTrading(log.logger);
    market = trading.market;
    wallet = trading.wallet;
    market.list("addrFOO", 2_000_000n);
    market.list("addrBAR", 2_000_000n);
    settings = createSettings();
    notifier = { notify: vi.fn<Notifier["notify"]>(async () => undefined) };
    engine = new TradeEngine({
      execution: trading.execution,
      wallet: trading.wallet,
      settings,
      mode: "paper",
      intervalSeconds: 30,
      logger: log.logger,
      journal: store,
      notifier,
    });
  });

  afterEach(async () => {
    await engine.stop();
    store.close();
  });

  describe("buy", () => {
    it("opens a position sized from the confirmed fill", async () => {
      const result = await engine.buy(FOO);

      expect(market.getQuote).toHaveBeenCalledWith({
        inputMint: WSOL_MINT,
        outputMint: "addrFOO",
        amount: "100000000",
        slippageBps: 50,
      });
      expect(result.ok).toBe(true);
      const snapshot = engine.getPosition("FOO");
      expect(snapshot?.heldAmount).toBe(50);
      expect(snapshot?.entryPrice).toBeCloseTo(0.1 / 50, 15);
      expect(snapshot?.profitPercent).toBe(0);
      expect(snapshot?.status).toBe("active");
      expect(store.getRecentTrades()[0]).toMatchObject({
        side: "BUY",
        status: "PAPER_FILLED",
        inAmount: "100000000",
        outAmount: "50000000000",
      });
      expect(notifier.notify).toHaveBeenCalledWith(expect.objectContaining({ kind: "POSITION_OPENED", symbol: "FOO" }));
    });

    it("refuses while auto-trading is disabled, manual or not", async () => {
      settings.setAutoTradeEnabled(false);

      const refused = await engine.buy(FOO);
      const manual = await engine.buy({ ...FOO, source: "manual" });

      expect(refused).toEqual({ ok: false, reason: "auto_trade_disabled", message: "Auto-trading is disabled" });
      expect(manual).toEqual(refused);
      expect(market.getQuote).not.toHaveBeenCalled();
      expect(engine.getSnapshot()).toEqual([]);
    });

    it("treats a second signal for an open symbol as already trading", async () => {
      await engine.buy(FOO);
      const before = engine.getPosition("FOO");
      market.getQuote.mockClear();

      const again = await engine.buy(FOO);

      expect(again).toEqual({ ok: false, reason: "already_trading", message: "Already trading FOO" });
      expect(market.getQuote).not.toHaveBeenCalled();
      expect(engine.getSnapshot()).toHaveLength(1);
      expect(engine.getPosition("FOO")).toEqual(before);
    });

    it("lets only one of two concurrent buys of a symbol through", async () => {
      const results = await Promise.all([engine.buy(FOO), engine.buy(FOO)]);

      expect(results.map((result) => result.ok).sort()).toEqual([false, true]);
      expect(engine.getSnapshot()).toHaveLength(1);
    });

    it("creates nothing when no quote is available", async () => {
      market.halt("addrFOO");

      const result = await engine.buy(FOO);

      expect(result).toEqual({ ok: false, reason: "quote_unavailable", message: "No quote is available for FOO" });
      expect(engine.getSnapshot()).toEqual([]);
      expect(store.getRecentTrades()[0]).toMatchObject({ side: "BUY", status: "FAILED", reason: "quote_unavailable" });
    });

    it("creates nothing when the swap transaction cannot be built", async () => {
      market.getSwapTransaction.mockRejectedValueOnce(new ValidationError("bad quote"));

      const result = await engine.buy(FOO);

      expect(result.ok).toBe(false);
      expect(result.ok ? undefined : result.reason).toBe("swap_unavailable");
      expect(engine.getSnapshot()).toEqual([]);
    });

    it("snapshots exit parameters at entry", async () => {
      await engine.buy(FOO);
      settings.setTargetMultiplier(5);
      settings.setSellFraction(10);
      await engine.buy(BAR);

      expect(engine.getPosition("FOO")).toMatchObject({ targetMultiplier: 2, sellFraction: 50 });
      expect(engine.getPosition("BAR")).toMatchObject({ targetMultiplier: 5, sellFraction: 10 });
    });

    it("hands out copies rather than live positions", async () => {
      await engine.buy(FOO);
      const first = engine.getSnapshot();
      market.setPrice("addrFOO", 3_000_000n);
      await engine.runCycle();

      expect(first[0]?.currentPrice).toBeCloseTo(0.002, 15);
      expect(Object.isFrozen(first[0])).toBe(true);
    });
  });

  describe("runCycle", () => {
    it("sells the configured fraction once the target multiple is reached", async () => {
      await engine.buy(FOO);
      market.setPrice("addrFOO", 4_000_000n);

      const report = await engine.runCycle();

      expect(report).toEqual({ evaluated: 1, priced: 1, exits: 1, failedExits: 0, evicted: [] });
      const snapshot = engine.getPosition("FOO");
      expect(snapshot?.heldAmount).toBe(25);
      expect(snapshot?.soldTotal).toBe(25);
      expect(snapshot?.status).toBe("active");
      expect(snapshot?.profitPercent).toBeCloseTo(0, 9);
      expect(market.getQuote).toHaveBeenLastCalledWith({
        inputMint: "addrFOO",
        outputMint: WSOL_MINT,
        amount: "25000000000",
        slippageBps: 50,
      });
      expect(store.getRecentTrades()[0]).toMatchObject({ side: "SELL", status: "PAPER_FILLED", outAmount: "100000000" });
    });

    it("leaves the position untouched below the target", async () => {
      await engine.buy(FOO);
      market.setPrice("addrFOO", 3_000_000n);

      const report = await engine.runCycle();

      expect(report.exits).toBe(0);
      expect(engine.getPosition("FOO")).toMatchObject({ heldAmount: 50, profitPercent: expect.closeTo(50, 9) });
    });

    it("keeps the full holding when the exit fails and retries next cycle", async () => {
      await engine.buy(FOO);
      market.setPrice("addrFOO", 4_000_000n);
      market.getSwapTransaction.mockRejectedValueOnce(new ValidationError("route gone"));

      const failed = await engine.runCycle();

      expect(failed.failedExits).toBe(1);
      expect(engine.getPosition("FOO")?.heldAmount).toBe(50);
      expect(store.getRecentTrades()[0]).toMatchObject({ side: "SELL", status: "FAILED", reason: "swap_unavailable" });
      expect(notifier.notify).toHaveBeenCalledWith(expect.objectContaining({ kind: "EXIT_FAILED", symbol: "FOO" }));

      const retried = await engine.runCycle();

      expect(retried.exits).toBe(1);
      expect(engine.getPosition("FOO")?.heldAmount).toBe(25);
    });

    it("evicts a position once it is fully sold", async () => {
      settings.setSellFraction(100);
      await engine.buy(FOO);
      market.setPrice("addrFOO", 5_000_000n);

      const report = await engine.runCycle();

      expect(report.evicted).toEqual(["FOO"]);
      expect(engine.getSnapshot()).toEqual([]);
      expect(notifier.notify).toHaveBeenCalledWith(expect.objectContaining({ kind: "POSITION_COMPLETED", symbol: "FOO" }));
    });

    it("sells every smallest unit of a holding beyond 2^53", async () => {
      settings.setSellFraction(100);
      market.list("addrBIG", 3n);
      await engine.buy({ symbol: "BIG", address: "addrBIG", source: "test" });
      expect(engine.getPosition("BIG")?.heldAmountRaw).toBe("33333333333333333");
      market.setPrice("addrBIG", 9n);

      const report = await engine.runCycle();

      expect(report.evicted).toEqual(["BIG"]);
      expect(market.getQuote).toHaveBeenLastCalledWith({
        inputMint: "addrBIG",
        outputMint: WSOL_MINT,
        amount: "33333333333333333",
        slippageBps: 50,
      });
      expect((await wallet.getAssetHolding("addrBIG")).amountRaw).toBe("0");
    });

    it("values and sells a position on the scale it was opened with", async () => {
      market.list("addrBAZ", 2_000_000n, 6);
      const lookup = vi.fn<(mint: string) => Promise<number | null>>(async (mint) => market.decimalsOf(mint));
      lookup.mockResolvedValueOnce(null);
      const bazWallet = new PaperWallet({ publicKey: "paper", startingBalanceSol: 10, lookupDecimals: lookup });
      const execution = new ExecutionClient({
        quotes: market,
        wallet: bazWallet,
        submitter: bazWallet,
        caller: createTestCaller(log.logger),
        defaultDecimals: 9,
        slippageBps: 50,
        logger: log.logger,
      });
      const scaled = new TradeEngine({
        execution,
        wallet: bazWallet,
        settings,
        mode: "paper",
        intervalSeconds: 30,
        logger: log.logger,
      });

      await scaled.buy({ symbol: "BAZ", address: "addrBAZ", source: "test" });
      expect(log.codes()).toContain("DECIMALS_FALLBACK");
      expect(scaled.getPosition("BAZ")).toMatchObject({ decimals: 9, heldAmountRaw: "50000000" });
      expect(await execution.resolveDecimals("addrBAZ")).toBe(6);

      const steady = await scaled.runCycle();
      expect(steady.exits).toBe(0);
      expect(scaled.getPosition("BAZ")?.profitPercent).toBe(0);

      market.setPrice("addrBAZ", 4_000_000n);
      const doubled = await scaled.runCycle();

      expect(doubled.exits).toBe(1);
      expect(market.getQuote).toHaveBeenLastCalledWith({
        inputMint: "addrBAZ",
        outputMint: WSOL_MINT,
        amount: "25000000",
        slippageBps: 50,
      });
      expect(scaled.getPosition("BAZ")?.heldAmountRaw).toBe("25000000");
    });

    it("skips a position without a price and keeps monitoring the others", async () => {
      await engine.buy(FOO);
      await engine.buy(BAR);
      market.halt("addrFOO");
      market.setPrice("addrBAR", 4_000_000n);

      const report = await engine.runCycle();

      expect(report).toMatchObject({ evaluated: 2, priced: 1, exits: 1 });
      expect(engine.getPosition("FOO")?.heldAmount).toBe(50);
      expect(engine.getPosition("BAR")?.heldAmount).toBe(25);
      expect(log.codes()).toContain("PRICE_UNAVAILABLE");
    });

    it("records engine state after each sweep", async () => {
      await engine.buy(FOO);
      await engine.runCycle();

      expect(store.getRuntimeState("engine")?.value).toMatchObject({ mode: "paper", cycles: 1, openPositions: 1 });
    });
  });

  describe("lifecycle", () => {
    it("stops promptly while sleeping between cycles", async () => {
      const running = engine.start();
      expect(engine.isRunning()).toBe(true);

      await engine.stop();
      await running;

      expect(engine.isRunning()).toBe(false);
      expect(store.getRuntimeState("engine")?.value).toMatchObject({ cycles: 1 });
    });

    it("buys candidates delivered through the intake", async () => {
      const running = engine.start();

      expect(engine.onCandidateAsset(FOO)).toBe(true);
      await vi.waitFor(() => {
        expect(engine.getPosition("FOO")).toBeDefined();
      });

      await engine.stop();
      await running;
      expect(engine.onCandidateAsset(BAR)).toBe(false);
    });

    it("ignores intake candidates while auto-trading is off", async () => {
      settings.setAutoTradeEnabled(false);
      const running = engine.start();

      engine.onCandidateAsset(FOO);
      await vi.waitFor(() => {
        expect(log.codes()).toContain("SIGNAL_IGNORED");
      });

      await engine.stop();
      await running;
      expect(engine.getSnapshot()).toEqual([]);
    });

    it("keeps trading when alert delivery fails", async () => {
      notifier.notify.mockRejectedValue(new Error("webhook down"));

      const result = await engine.buy(FOO);

      expect(result.ok).toBe(true);
      await vi.waitFor(() => {
        expect(log.codes()).toContain("NOTIFY_FAIL");
      });
    });
  });
});
