import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import type { BotConfig, Mode } from "./types.js";

const num = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") {
        return defaultValue;
      }
      const parsed = Number(value);
      return Number.isFinite(parsed) ? parsed : Number.NaN;
    });

const intNum = (defaultValue: number) =>
  num(defaultValue).refine((value) => Number.isInteger(value), {
    message: "Expected integer",
  });

const bool = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") {
        return defaultValue;
      }
      return value.trim().toLowerCase() === "true";
    });

const list = (defaultValue: string[]) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") {
        return defaultValue;
      }
      return value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
    });

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value.trim()));

export const envSchema = z.object({
  RPC_URL: z.string().min(1, "RPC_URL is required"),
  MODE: z.enum(["paper", "live"]).default("paper"),
  WALLET_KEYPAIR_PATH: optionalText,
  PAPER_WALLET_PUBKEY: optionalText,
  PAPER_BALANCE_SOL: num(10).refine((v) => v >= 0, "PAPER_BALANCE_SOL must be >= 0"),
  AUTO_TRADE_ENABLED: bool(false),
  BUY_AMOUNT_SOL: num(0.1).refine((v) => v > 0, "BUY_AMOUNT_SOL must be > 0"),
  TARGET_MULTIPLIER: num(2).refine((v) => v > 1, "TARGET_MULTIPLIER must be > 1"),
  SELL_PERCENTAGE: num(80).refine((v) => v > 0 && v <= 100, "SELL_PERCENTAGE must be > 0 and <= 100"),
  SLIPPAGE_BPS: intNum(50).refine((v) => v > 0 && v <= 10_000, "SLIPPAGE_BPS must be 1..10000"),
  DEFAULT_TOKEN_DECIMALS: intNum(9).refine((v) => v >= 0 && v <= 18, "DEFAULT_TOKEN_DECIMALS must be 0..18"),
  MONITOR_INTERVAL_SECONDS: num(30).refine((v) => v > 0, "MONITOR_INTERVAL_SECONDS must be > 0"),
  SIGNAL_POLL_SECONDS: num(60).refine((v) => v > 0, "SIGNAL_POLL_SECONDS must be > 0"),
  SIGNAL_SOURCES: list(["gecko"]),
  QUOTE_RATE_LIMIT: intNum(60).refine((v) => v > 0, "QUOTE_RATE_LIMIT must be > 0"),
  QUOTE_RATE_PER_SECONDS: num(60).refine((v) => v > 0, "QUOTE_RATE_PER_SECONDS must be > 0"),
  NOTIFY_RATE_LIMIT: intNum(20).refine((v) => v > 0, "NOTIFY_RATE_LIMIT must be > 0"),
  NOTIFY_RATE_PER_SECONDS: num(60).refine((v) => v > 0, "NOTIFY_RATE_PER_SECONDS must be > 0"),
  RETRY_MAX_ATTEMPTS: intNum(3).refine((v) => v > 0, "RETRY_MAX_ATTEMPTS must be > 0"),
  RETRY_DELAY_MS: intNum(1000).refine((v) => v >= 0, "RETRY_DELAY_MS must be >= 0"),
  REQUEST_TIMEOUT_MS: intNum(15_000).refine((v) => v > 0, "REQUEST_TIMEOUT_MS must be > 0"),
  PRIORITY_FEE_LAMPORTS: intNum(0).refine((v) => v >= 0, "PRIORITY_FEE_LAMPORTS must be >= 0"),
  JUPITER_BASE_URL: z.string().default("https://lite-api.jup.ag/swap/v1"),
  GECKO_TERMINAL_BASE_URL: z.string().default("https://api.geckoterminal.com/api/v2"),
  NOTIFY_WEBHOOK_URL: optionalText,
  CONTROL_API_TOKEN: optionalText,
  WEB_PORT: intNum(8787).refine((v) => v > 0, "WEB_PORT must be > 0"),
  MODE_SCOPED_DB: bool(true),
  DB_PATH: z.string().default("./data/tradeloop.db"),
  LOG_LEVEL: z.enum(["DEBUG", "INFO", "OK", "WARN", "ERROR"]).default("INFO"),
});

let cachedConfig: BotConfig | null = null;

export function appBaseDir(): string {
  return process.env.APP_ROOT ?? process.env.INIT_CWD ?? process.cwd();
}

export function loadDotenv(baseDir: string): void {
  const envCandidates = [path.resolve(baseDir, ".env"), path.resolve(process.cwd(), ".env")];
  for (const envPath of envCandidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
      break;
    }
  }
}

function withModeDbSuffix(inputPath: string, mode: Mode): string {
  const parsed = path.parse(inputPath);
  const ext = parsed.ext || ".db";
  const suffix = `.${mode}`;
  if (parsed.name.endsWith(suffix)) {
    return path.join(parsed.dir, `${parsed.name}${ext}`);
  }
  return path.join(parsed.dir, `${parsed.name}${suffix}${ext}`);
}

export function resolveModeScopedDbPath(rawDbPath: string, mode: Mode, modeScoped: boolean): string {
  if (rawDbPath === ":memory:") {
    return rawDbPath;
  }
  const templated = rawDbPath.includes("{mode}") ? rawDbPath.replaceAll("{mode}", mode) : rawDbPath;
  if (!modeScoped || rawDbPath.includes("{mode}")) {
    return templated;
  }
  return withModeDbSuffix(templated, mode);
}

/**
 * Parses an environment map into a validated config. Pure; `loadConfig`
 * adds dotenv loading and caching on top.
 */
export function parseConfig(env: Record<string, string | undefined>, baseDir: string): BotConfig {
  const parsed = envSchema.parse(env);
  if (parsed.MODE === "live" && !parsed.WALLET_KEYPAIR_PATH) {
    throw new Error("MODE=live requires WALLET_KEYPAIR_PATH");
  }

  const dbPath = resolveModeScopedDbPath(parsed.DB_PATH, parsed.MODE, parsed.MODE_SCOPED_DB);
  return {
    ...parsed,
    DB_PATH: dbPath === ":memory:" ? dbPath : path.resolve(baseDir, dbPath),
    WALLET_KEYPAIR_PATH: parsed.WALLET_KEYPAIR_PATH ? path.resolve(baseDir, parsed.WALLET_KEYPAIR_PATH) : undefined,
    PAPER_WALLET_PUBKEY: parsed.PAPER_WALLET_PUBKEY,
    NOTIFY_WEBHOOK_URL: parsed.NOTIFY_WEBHOOK_URL,
    CONTROL_API_TOKEN: parsed.CONTROL_API_TOKEN,
  };
}

export function loadConfig(): BotConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const baseDir = appBaseDir();
  loadDotenv(baseDir);
  cachedConfig = parseConfig(process.env, baseDir);
  return cachedConfig;
}

export function maskPubkey(pubkey: string | undefined): string {
  if (!pubkey || pubkey.length < 10) {
    return "N/A";
  }
  return `${pubkey.slice(0, 4)}...${pubkey.slice(-4)}`;
}
