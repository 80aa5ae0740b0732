import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { BotConfig, LogEntry, Mode, TradeSide } from "@tradeloop/core";

export interface JsonPayload {
  [key: string]: unknown;
}

export type TradeStatus = "CONFIRMED" | "PAPER_FILLED" | "FAILED";

export interface TradeInsert {
  side: TradeSide;
  mode: Mode;
  symbol: string;
  inputMint: string;
  outputMint: string;
  inAmount: string;
  outAmount?: string;
  expectedOut?: string;
  status: TradeStatus;
  signature?: string;
  error?: string;
  reason?: string;
  meta?: JsonPayload;
}

export interface TradeRecord {
  id: number;
  ts: string;
  side: TradeSide;
  mode: Mode;
  symbol: string;
  inputMint: string;
  outputMint: string;
  inAmount: string;
  outAmount: string | null;
  expectedOut: string | null;
  status: TradeStatus;
  signature: string | null;
  error: string | null;
  reason: string | null;
  meta: JsonPayload;
}

export interface AlertInsert {
  kind: string;
  symbol?: string;
  message: string;
  data?: JsonPayload;
}

export interface AlertRecord {
  id: number;
  ts: string;
  kind: string;
  symbol: string | null;
  message: string;
  data: JsonPayload;
}

export interface LogRecord {
  id: number;
  ts: string;
  level: string;
  component: string;
  code: string;
  message: string;
  data: JsonPayload;
}

export interface ConfigSnapshotRecord {
  id: number;
  ts: string;
  mode: Mode;
  source: string;
  config: JsonPayload;
}

export interface TradeSummary {
  buys: number;
  sells: number;
  failed: number;
  /** Base currency spent by filled buys, smallest units. */
  baseSpentRaw: string;
  /** Base currency received by filled sells, smallest units. */
  baseReceivedRaw: string;
}

interface LogRow {
  id: number;
  ts: string;
  level: string;
  component: string;
  code: string;
  message: string;
  data_json: string | null;
}

interface TradeRow {
  id: number;
  ts: string;
  side: TradeSide;
  mode: Mode;
  symbol: string;
  input_mint: string;
  output_mint: string;
  in_amount: string;
  out_amount: string | null;
  expected_out: string | null;
  status: TradeStatus;
  signature: string | null;
  error: string | null;
  reason: string | null;
  meta_json: string | null;
}

interface AlertRow {
  id: number;
  ts: string;
  kind: string;
  symbol: string | null;
  message: string;
  data_json: string | null;
}

interface ConfigSnapshotRow {
  id: number;
  ts: string;
  mode: Mode;
  source: string;
  config_json: string;
}

const REDACTED_CONFIG_KEYS: ReadonlyArray<keyof BotConfig> = ["CONTROL_API_TOKEN", "NOTIFY_WEBHOOK_URL"];

function isPayload(value: unknown): value is JsonPayload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(text: string | null): JsonPayload {
  if (!text) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return isPayload(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function toLogRecord(row: LogRow): LogRecord {
  return {
    id: row.id,
    ts: row.ts,
    level: row.level,
    component: row.component,
    code: row.code,
    message: row.message,
    data: parseJson(row.data_json),
  };
}

function toTradeRecord(row: TradeRow): TradeRecord {
  return {
    id: row.id,
    ts: row.ts,
    side: row.side,
    mode: row.mode,
    symbol: row.symbol,
    inputMint: row.input_mint,
    outputMint: row.output_mint,
    inAmount: row.in_amount,
    outAmount: row.out_amount,
    expectedOut: row.expected_out,
    status: row.status,
    signature: row.signature,
    error: row.error,
    reason: row.reason,
    meta: parseJson(row.meta_json),
  };
}

export function redactConfig(config: BotConfig): JsonPayload {
  const copy: JsonPayload = { ...config };
  for (const key of REDACTED_CONFIG_KEYS) {
    if (copy[key] !== undefined) {
      copy[key] = "***";
    }
  }
  return copy;
}

/**
 * Append-mostly SQLite journal. Open positions are deliberately absent: the
 * engine owns them in memory and the journal only records what happened.
 */
export class Store {
  private readonly dbPath: string;
  private readonly db: Database.Database;

  public constructor(dbPath: string) {
    this.dbPath = dbPath;
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
  }

  public initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS trades (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts TEXT NOT NULL,
        side TEXT NOT NULL,
        mode TEXT NOT NULL,
        symbol TEXT NOT NULL,
        input_mint TEXT NOT NULL,
        output_mint TEXT NOT NULL,
        in_amount TEXT NOT NULL,
        out_amount TEXT,
        expected_out TEXT,
        status TEXT NOT NULL,
        signature TEXT,
        error TEXT,
        reason TEXT,
        meta_json TEXT
      );

      CREATE TABLE IF NOT EXISTS alerts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts TEXT NOT NULL,
        kind TEXT NOT NULL,
        symbol TEXT,
        message TEXT NOT NULL,
        data_json TEXT
      );

      CREATE TABLE IF NOT EXISTS config_snapshots (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts TEXT NOT NULL,
        mode TEXT NOT NULL,
        source TEXT NOT NULL,
        config_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts TEXT NOT NULL,
        level TEXT NOT NULL,
        component TEXT NOT NULL,
        code TEXT NOT NULL,
        message TEXT NOT NULL,
        data_json TEXT
      );

      CREATE TABLE IF NOT EXISTS runtime_state (
        key TEXT PRIMARY KEY,
        value_json TEXT NOT NULL,
        updated_ts TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_trades_ts ON trades(ts);
      CREATE INDEX IF NOT EXISTS idx_trades_symbol ON trades(symbol);
      CREATE INDEX IF NOT EXISTS idx_alerts_ts ON alerts(ts);
      CREATE INDEX IF NOT EXISTS idx_logs_ts ON logs(ts);
    `);
  }

  public snapshotConfig(config: BotConfig): void {
    this.insertConfigSnapshot(config.MODE, "boot", redactConfig(config));
  }

  /** Records a runtime settings change made through the control surface. */
  public snapshotSettings(mode: Mode, settings: JsonPayload, source = "control"): void {
    this.insertConfigSnapshot(mode, source, settings);
  }

  public getLatestConfigSnapshot(): ConfigSnapshotRecord | null {
    const row = this.db
      .prepare<[], ConfigSnapshotRow>(
        `SELECT id, ts, mode, source, config_json
         FROM config_snapshots
         ORDER BY id DESC
         LIMIT 1`,
      )
      .get();
    if (!row) {
      return null;
    }
    return {
      id: row.id,
      ts: row.ts,
      mode: row.mode,
      source: row.source,
      config: parseJson(row.config_json),
    };
  }

  public insertLog(entry: LogEntry): number {
    const result = this.db
      .prepare(
        `INSERT INTO logs (ts, level, component, code, message, data_json)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(entry.ts, entry.level, entry.component, entry.code, entry.message, entry.data ? JSON.stringify(entry.data) : null);
    return Number(result.lastInsertRowid);
  }

  public getLogsAfter(afterId: number, limit = 200): LogRecord[] {
    const rows = this.db
      .prepare<[number, number], LogRow>(
        `SELECT id, ts, level, component, code, message, data_json
         FROM logs
         WHERE id > ?
         ORDER BY id ASC
         LIMIT ?`,
      )
      .all(afterId, limit);
    return rows.map(toLogRecord);
  }

  public getRecentLogs(limit = 200): LogRecord[] {
    const rows = this.db
      .prepare<[number], LogRow>(
        `SELECT id, ts, level, component, code, message, data_json
         FROM logs
         ORDER BY id DESC
         LIMIT ?`,
      )
      .all(limit);
    return rows.reverse().map(toLogRecord);
  }

  public setRuntimeState(key: string, value: JsonPayload): void {
    const now = new Date().toISOString();
    this.db
      .prepare(
        `INSERT INTO runtime_state (key, value_json, updated_ts)
         VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value_json=excluded.value_json, updated_ts=excluded.updated_ts`,
      )
      .run(key, JSON.stringify(value), now);
  }

  public getRuntimeState(key: string): { key: string; value: JsonPayload; updatedTs: string } | null {
    const row = this.db
      .prepare<[string], { key: string; value_json: string; updated_ts: string }>(
        `SELECT key, value_json, updated_ts
         FROM runtime_state
         WHERE key = ?`,
      )
      .get(key);
    if (!row) {
      return null;
    }
    return {
      key: row.key,
      value: parseJson(row.value_json),
      updatedTs: row.updated_ts,
    };
  }

  public recordTrade(input: TradeInsert): number {
    const result = this.db
      .prepare(
        `INSERT INTO trades (
          ts, side, mode, symbol, input_mint, output_mint, in_amount, out_amount, expected_out, status, signature, error, reason, meta_json
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        new Date().toISOString(),
        input.side,
        input.mode,
        input.symbol,
        input.inputMint,
        input.outputMint,
        input.inAmount,
        input.outAmount ?? null,
        input.expectedOut ?? null,
        input.status,
        input.signature ?? null,
        input.error ?? null,
        input.reason ?? null,
        input.meta ? JSON.stringify(input.meta) : null,
      );
    return Number(result.lastInsertRowid);
  }

  public getRecentTrades(limit = 50): TradeRecord[] {
    const rows = this.db
      .prepare<[number], TradeRow>(
        `SELECT id, ts, side, mode, symbol, input_mint, output_mint, in_amount, out_amount, expected_out,
                status, signature, error, reason, meta_json
         FROM trades
         ORDER BY id DESC
         LIMIT ?`,
      )
      .all(limit);
    return rows.map(toTradeRecord);
  }

  public getTradeSummary(): TradeSummary {
    const rows = this.db
      .prepare<[], { side: TradeSide; status: TradeStatus; in_amount: string; out_amount: string | null }>(
        `SELECT side, status, in_amount, out_amount FROM trades`,
      )
      .all();

    const summary = { buys: 0, sells: 0, failed: 0, baseSpent: 0n, baseReceived: 0n };
    for (const row of rows) {
      if (row.status === "FAILED") {
        summary.failed += 1;
        continue;
      }
      if (row.side === "BUY") {
        summary.buys += 1;
        summary.baseSpent += BigInt(row.in_amount);
      } else {
        summary.sells += 1;
        summary.baseReceived += BigInt(row.out_amount ?? "0");
      }
    }
    return {
      buys: summary.buys,
      sells: summary.sells,
      failed: summary.failed,
      baseSpentRaw: summary.baseSpent.toString(),
      baseReceivedRaw: summary.baseReceived.toString(),
    };
  }

  public recordAlert(input: AlertInsert): number {
    const result = this.db
      .prepare(
        `INSERT INTO alerts (ts, kind, symbol, message, data_json)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(new Date().toISOString(), input.kind, input.symbol ?? null, input.message, input.data ? JSON.stringify(input.data) : null);
    return Number(result.lastInsertRowid);
  }

  public getRecentAlerts(limit = 50): AlertRecord[] {
    const rows = this.db
      .prepare<[number], AlertRow>(
        `SELECT id, ts, kind, symbol, message, data_json
         FROM alerts
         ORDER BY id DESC
         LIMIT ?`,
      )
      .all(limit);
    return rows.map((row) => ({
      id: row.id,
      ts: row.ts,
      kind: row.kind,
      symbol: row.symbol,
      message: row.message,
      data: parseJson(row.data_json),
    }));
  }

  public getDbPath(): string {
    return this.dbPath;
  }

  public close(): void {
    this.db.close();
  }

  private insertConfigSnapshot(mode: Mode, source: string, config: JsonPayload): void {
    this.db
      .prepare(
        `INSERT INTO config_snapshots (ts, mode, source, config_json)
         VALUES (?, ?, ?, ?)`,
      )
      .run(new Date().toISOString(), mode, source, JSON.stringify(config));
  }
}
