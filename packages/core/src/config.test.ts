import path from "node:path";
import { describe, expect, it } from "vitest";
import { maskPubkey, parseConfig, resolveModeScopedDbPath } from "./config.js";

const baseDir = path.resolve("/srv/tradeloop");

describe("parseConfig", () => {
  it("applies defaults for everything but the RPC URL", () => {
    const config = parseConfig({ RPC_URL: "http://127.0.0.1:8899" }, baseDir);

    expect(config.MODE).toBe("paper");
    expect(config.AUTO_TRADE_ENABLED).toBe(false);
    expect(config.BUY_AMOUNT_SOL).toBe(0.1);
    expect(config.TARGET_MULTIPLIER).toBe(2);
    expect(config.SELL_PERCENTAGE).toBe(80);
    expect(config.DEFAULT_TOKEN_DECIMALS).toBe(9);
    expect(config.MONITOR_INTERVAL_SECONDS).toBe(30);
    expect(config.SIGNAL_SOURCES).toEqual(["gecko"]);
    expect(config.NOTIFY_WEBHOOK_URL).toBeUndefined();
    expect(config.PAPER_BALANCE_SOL).toBe(10);
    expect(config.DB_PATH).toBe(path.join(baseDir, "data", "tradeloop.paper.db"));
  });

  it("parses numbers, booleans and lists from strings", () => {
    const config = parseConfig(
      {
        RPC_URL: "http://127.0.0.1:8899",
        AUTO_TRADE_ENABLED: "TRUE",
        BUY_AMOUNT_SOL: "0.25",
        SELL_PERCENTAGE: "100",
        SIGNAL_SOURCES: "gecko, mentions",
        DB_PATH: ":memory:",
      },
      baseDir,
    );

    expect(config.AUTO_TRADE_ENABLED).toBe(true);
    expect(config.BUY_AMOUNT_SOL).toBe(0.25);
    expect(config.SELL_PERCENTAGE).toBe(100);
    expect(config.SIGNAL_SOURCES).toEqual(["gecko", "mentions"]);
    expect(config.DB_PATH).toBe(":memory:");
  });

  it("rejects out-of-range trading parameters", () => {
    expect(() => parseConfig({ RPC_URL: "x", TARGET_MULTIPLIER: "1" }, baseDir)).toThrow("TARGET_MULTIPLIER must be > 1");
    expect(() => parseConfig({ RPC_URL: "x", SELL_PERCENTAGE: "120" }, baseDir)).toThrow("SELL_PERCENTAGE");
    expect(() => parseConfig({ RPC_URL: "x", BUY_AMOUNT_SOL: "-1" }, baseDir)).toThrow("BUY_AMOUNT_SOL must be > 0");
  });

  it("requires a keypair in live mode", () => {
    expect(() => parseConfig({ RPC_URL: "x", MODE: "live" }, baseDir)).toThrow("MODE=live requires WALLET_KEYPAIR_PATH");
  });
});

describe("resolveModeScopedDbPath", () => {
  it("templates {mode} or appends the mode suffix", () => {
    expect(resolveModeScopedDbPath("./data/{mode}.db", "live", true)).toBe("./data/live.db");
    expect(resolveModeScopedDbPath("data/bot.db", "live", true)).toBe(path.join("data", "bot.live.db"));
    expect(resolveModeScopedDbPath("data/bot.db", "live", false)).toBe("data/bot.db");
  });
});

describe("maskPubkey", () => {
  it("keeps the first and last four characters", () => {
    expect(maskPubkey("So11111111111111111111111111111111111111112")).toBe("So11...1112");
    expect(maskPubkey("short")).toBe("N/A");
  });
});
