import { timingSafeEqual } from "node:crypto";
import type { Server } from "node:http";
import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { errorMessage, type Logger } from "@tradeloop/core";
import type { Store } from "@tradeloop/store";
import { z } from "zod";
import type { ControlSurface } from "./control.js";
import type { SettingResult } from "./settings.js";
import type { TextMentionSource } from "./signals/text-source.js";

export type ControlStore = Pick<
  Store,
  "getRecentTrades" | "getTradeSummary" | "getRecentAlerts" | "getRecentLogs" | "getLogsAfter" | "getRuntimeState"
>;

export interface ControlApiOptions {
  control: ControlSurface;
  store: ControlStore;
  logger: Logger;
  /** When set, every route except the ping needs `Authorization: Bearer <token>`. */
  token?: string;
  mentions?: TextMentionSource;
  logStreamIntervalMs?: number;
}

const numberBody = z.object({ value: z.number({ invalid_type_error: "value must be a number" }) });
const enabledBody = z.object({ enabled: z.boolean({ invalid_type_error: "enabled must be a boolean" }) });
const buyBody = z.object({
  symbol: z.string().trim().min(1, "symbol is required"),
  address: z.string().trim().min(1, "address is required"),
});
const mentionBody = z.object({ text: z.string().min(1, "text is required") });

function clampLimit(raw: unknown, fallback: number, min: number, max: number): number {
  const parsed = Number(raw ?? fallback);
  return Number.isFinite(parsed) ? Math.max(min, Math.min(max, Math.floor(parsed))) : fallback;
}

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? "invalid request body";
}

function tokenMatches(header: string | undefined, token: string): boolean {
  const expected = Buffer.from(`Bearer ${token}`);
  const given = Buffer.from(header ?? "");
  return given.length === expected.length && timingSafeEqual(given, expected);
}

function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function sendSetting(res: Response, result: SettingResult, settings: unknown): void {
  if (!result.ok) {
    res.status(400).json({ ok: false, error: result.reason });
    return;
  }
  res.json({ ok: true, settings });
}

/** JSON control API over the control surface, plus a live log stream. */
export function createControlApp(options: ControlApiOptions): express.Express {
  const { control, store, logger, token, mentions } = options;
  const streamIntervalMs = options.logStreamIntervalMs ?? 2000;
  const app = express();
  app.use(express.json());

  app.get("/api/ping", (_req, res) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  if (token) {
    app.use((req, res, next) => {
      if (tokenMatches(req.get("authorization"), token)) {
        next();
        return;
      }
      logger.warn("HTTP_UNAUTHORIZED", "WARNING UNAUTHORIZED CONTROL REQUEST", { path: req.path });
      res.status(401).json({ ok: false, error: "Not authorized" });
    });
  }

  app.get(
    "/api/status",
    asyncRoute(async (_req, res) => {
      const status = await control.getStatus();
      res.json({
        ...status,
        engine: store.getRuntimeState("engine")?.value ?? {},
        updatedTs: new Date().toISOString(),
      });
    }),
  );

  app.get("/api/positions", (_req, res) => {
    res.json({ positions: control.getSnapshot() });
  });

  app.get("/api/settings", (_req, res) => {
    res.json({ settings: control.getSettings() });
  });

  const numberSetting = (path: string, apply: (value: number) => SettingResult): void => {
    app.post(path, (req, res) => {
      const parsed = numberBody.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ ok: false, error: firstIssue(parsed.error) });
        return;
      }
      sendSetting(res, apply(parsed.data.value), control.getSettings());
    });
  };
  numberSetting("/api/settings/buy-amount", (value) => control.setBuyAmount(value));
  numberSetting("/api/settings/target-multiplier", (value) => control.setTargetMultiplier(value));
  numberSetting("/api/settings/sell-fraction", (value) => control.setSellFraction(value));
  numberSetting("/api/settings/slippage", (value) => control.setSlippageBps(value));

  app.post("/api/settings/auto-trade", (req, res) => {
    const parsed = enabledBody.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ ok: false, error: firstIssue(parsed.error) });
      return;
    }
    sendSetting(res, control.setAutoTradeEnabled(parsed.data.enabled), control.getSettings());
  });

  app.post(
    "/api/buy",
    asyncRoute(async (req, res) => {
      const parsed = buyBody.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ ok: false, error: firstIssue(parsed.error) });
        return;
      }
      const result = await control.triggerBuyDetailed(parsed.data.symbol, parsed.data.address);
      if (!result.ok) {
        res.status(400).json({ ok: false, reason: result.reason, error: result.message });
        return;
      }
      res.json({ ok: true, position: result.snapshot });
    }),
  );

  if (mentions) {
    app.post("/api/signals/mentions", (req, res) => {
      const parsed = mentionBody.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ ok: false, error: firstIssue(parsed.error) });
        return;
      }
      const accepted = mentions.push(parsed.data.text);
      res.status(accepted ? 202 : 503).json({ ok: accepted });
    });
  }

  app.get("/api/trades", (req, res) => {
    const limit = clampLimit(req.query.limit, 50, 1, 500);
    res.json({ trades: store.getRecentTrades(limit), summary: store.getTradeSummary() });
  });

  app.get("/api/alerts", (req, res) => {
    const limit = clampLimit(req.query.limit, 50, 1, 500);
    res.json({ alerts: store.getRecentAlerts(limit) });
  });

  app.get("/api/logs", (req, res) => {
    const limit = clampLimit(req.query.limit, 250, 10, 1000);
    res.json({ logs: store.getRecentLogs(limit) });
  });

  app.get("/events/logs", (req, res) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    let lastId = clampLimit(req.query.lastId, 0, 0, Number.MAX_SAFE_INTEGER);
    const pushLogs = (): void => {
      for (const log of store.getLogsAfter(lastId, 200)) {
        lastId = log.id;
        res.write("event: log\n");
        res.write(`data: ${JSON.stringify(log)}\n\n`);
      }
    };

    pushLogs();
    const timer = setInterval(pushLogs, streamIntervalMs);
    req.on("close", () => {
      clearInterval(timer);
    });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error("HTTP_ERROR", "ERROR HANDLING CONTROL REQUEST", { path: req.path, error: errorMessage(error) });
    res.status(500).json({ ok: false, error: "Internal error" });
  });

  return app;
}

export function listen(app: express.Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once("listening", () => {
      resolve(server);
    });
    server.once("error", reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
    server.closeAllConnections();
  });
}
