import { parseConfig } from "@tradeloop/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Store, redactConfig } from "./db.js";

describe("Store", () => {
  let store: Store;

  beforeEach(() => {
    store = new Store(":memory:");
    store.initialize();
  });

  afterEach(() => {
    store.close();
  });

  it("returns recent logs oldest first and pages after an id", () => {
    const first = store.insertLog({ ts: "2026-01-01T00:00:00.000Z", level: "INFO", component: "ENGINE", code: "A", message: "first" });
    store.insertLog({
      ts: "2026-01-01T00:00:01.000Z",
      level: "WARN",
      component: "ENGINE",
      code: "B",
      message: "second",
      data: { symbol: "FOO" },
    });

    expect(store.getRecentLogs(10).map((log) => log.code)).toEqual(["A", "B"]);
    const after = store.getLogsAfter(first);
    expect(after).toHaveLength(1);
    expect(after[0]?.data).toEqual({ symbol: "FOO" });
  });

  it("records trades and lists them newest first", () => {
    store.recordTrade({
      side: "BUY",
      mode: "paper",
      symbol: "FOO",
      inputMint: "So11111111111111111111111111111111111111112",
      outputMint: "addrFOO",
      inAmount: "100000000",
      outAmount: "50000000000",
      status: "PAPER_FILLED",
    });
    store.recordTrade({
      side: "SELL",
      mode: "paper",
      symbol: "FOO",
      inputMint: "addrFOO",
      outputMint: "So11111111111111111111111111111111111111112",
      inAmount: "25000000000",
      status: "FAILED",
      error: "swap_unavailable",
      reason: "target_reached",
      meta: { attempt: 1 },
    });

    const trades = store.getRecentTrades();
    expect(trades.map((trade) => trade.side)).toEqual(["SELL", "BUY"]);
    expect(trades[0]).toMatchObject({ status: "FAILED", outAmount: null, reason: "target_reached", meta: { attempt: 1 } });
  });

  it("summarizes filled trades in base units", () => {
    store.recordTrade({
      side: "BUY",
      mode: "paper",
      symbol: "FOO",
      inputMint: "SOL",
      outputMint: "addrFOO",
      inAmount: "100000000",
      outAmount: "50000000000",
      status: "PAPER_FILLED",
    });
    store.recordTrade({
      side: "SELL",
      mode: "paper",
      symbol: "FOO",
      inputMint: "addrFOO",
      outputMint: "SOL",
      inAmount: "25000000000",
      outAmount: "120000000",
      status: "PAPER_FILLED",
    });
    store.recordTrade({
      side: "SELL",
      mode: "paper",
      symbol: "FOO",
      inputMint: "addrFOO",
      outputMint: "SOL",
      inAmount: "25000000000",
      status: "FAILED",
    });

    expect(store.getTradeSummary()).toEqual({
      buys: 1,
      sells: 1,
      failed: 1,
      baseSpentRaw: "100000000",
      baseReceivedRaw: "120000000",
    });
  });

  it("stores alerts", () => {
    store.recordAlert({ kind: "POSITION_OPENED", symbol: "FOO", message: "Opened FOO", data: { heldAmount: 50 } });
    store.recordAlert({ kind: "EXIT_FAILED", message: "Exit failed" });

    const alerts = store.getRecentAlerts();
    expect(alerts[0]).toMatchObject({ kind: "EXIT_FAILED", symbol: null, data: {} });
    expect(alerts[1]).toMatchObject({ kind: "POSITION_OPENED", symbol: "FOO", data: { heldAmount: 50 } });
  });

  it("upserts runtime state", () => {
    expect(store.getRuntimeState("engine")).toBeNull();
    store.setRuntimeState("engine", { activePositions: 1 });
    store.setRuntimeState("engine", { activePositions: 2 });

    expect(store.getRuntimeState("engine")?.value).toEqual({ activePositions: 2 });
  });

  it("redacts secrets in config snapshots", () => {
    const config = parseConfig(
      { RPC_URL: "http://localhost:8899", CONTROL_API_TOKEN: "test-secret", DB_PATH: ":memory:" },
      "/tmp",
    );
    store.snapshotConfig(config);
    store.snapshotSettings("paper", { buyAmount: 0.5 });

    expect(redactConfig(config).CONTROL_API_TOKEN).toBe("***");
    expect(redactConfig(config).NOTIFY_WEBHOOK_URL).toBeUndefined();
    const latest = store.getLatestConfigSnapshot();
    expect(latest).toMatchObject({ mode: "paper", source: "control", config: { buyAmount: 0.5 } });
  });
});
