export type Mode = "paper" | "live";

export type LogLevel = "DEBUG" | "INFO" | "OK" | "WARN" | "ERROR";

export interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  code: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface BotConfig {
  RPC_URL: string;
  MODE: Mode;
  WALLET_KEYPAIR_PATH: string | undefined;
  PAPER_WALLET_PUBKEY: string | undefined;
  PAPER_BALANCE_SOL: number;
  AUTO_TRADE_ENABLED: boolean;
  BUY_AMOUNT_SOL: number;
  TARGET_MULTIPLIER: number;
  SELL_PERCENTAGE: number;
  SLIPPAGE_BPS: number;
  DEFAULT_TOKEN_DECIMALS: number;
  MONITOR_INTERVAL_SECONDS: number;
  SIGNAL_POLL_SECONDS: number;
  SIGNAL_SOURCES: string[];
  QUOTE_RATE_LIMIT: number;
  QUOTE_RATE_PER_SECONDS: number;
  NOTIFY_RATE_LIMIT: number;
  NOTIFY_RATE_PER_SECONDS: number;
  RETRY_MAX_ATTEMPTS: number;
  RETRY_DELAY_MS: number;
  REQUEST_TIMEOUT_MS: number;
  PRIORITY_FEE_LAMPORTS: number;
  JUPITER_BASE_URL: string;
  GECKO_TERMINAL_BASE_URL: string;
  NOTIFY_WEBHOOK_URL: string | undefined;
  CONTROL_API_TOKEN: string | undefined;
  WEB_PORT: number;
  MODE_SCOPED_DB: boolean;
  DB_PATH: string;
  LOG_LEVEL: LogLevel;
}

export type PositionStatus = "active" | "completed";

export interface PositionSnapshot {
  symbol: string;
  address: string;
  source: string;
  decimals: number;
  purchasedAmount: number;
  heldAmount: number;
  /** Exact holding in smallest units, as a decimal string. */
  heldAmountRaw: string;
  soldTotal: number;
  entryPrice: number;
  currentPrice: number;
  entryValue: number;
  currentValue: number;
  profitPercent: number;
  targetMultiplier: number;
  sellFraction: number;
  status: PositionStatus;
  openedAt: string;
  lastUpdatedAt: string;
}

/**
 * A tradable asset reported by a signal source. `address` is authoritative;
 * `symbol` is what positions are keyed on.
 */
export interface CandidateAsset {
  symbol: string;
  address: string;
  source: string;
  price?: number;
  context?: Record<string, unknown>;
}

export type TradeSide = "BUY" | "SELL";

export interface AssetBalance {
  amountRaw: string;
  decimals: number;
}

export interface SubmitSuccess {
  ok: true;
  inAmountRaw: string;
  outAmountRaw: string;
  signature?: string;
}

export interface SubmitFailure {
  ok: false;
  error: string;
}

export type SubmitOutcome = SubmitSuccess | SubmitFailure;

/**
 * What the engine needs from key custody. Live and paper implementations
 * exist; neither is specified beyond this surface.
 */
export interface WalletPort {
  getPublicKey(): string;
  getBaseBalance(): Promise<number>;
  getAssetHolding(mint: string): Promise<AssetBalance>;
  getMintDecimals(mint: string): Promise<number | null>;
}

export interface SubmitRequest {
  /** Base64 serialized transaction as returned by the swap service. */
  payload: string;
  lastValidBlockHeight: number;
  inputMint: string;
  outputMint: string;
  inAmountRaw: string;
  expectedOutRaw: string;
}

export interface TransactionSubmitter {
  submit(request: SubmitRequest): Promise<SubmitOutcome>;
}

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;
