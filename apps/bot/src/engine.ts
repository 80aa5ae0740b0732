import {
  Channel,
  Position,
  describeError,
  errorMessage,
  fromRawAmount,
  parseRawAmount,
  sleep,
  toRawAmount,
  type CandidateAsset,
  type Logger,
  type Mode,
  type PositionSnapshot,
  type SubmitSuccess,
  type WalletPort,
} from "@tradeloop/core";
import { SOL_DECIMALS, WSOL_MINT } from "@tradeloop/solana";
import type { Store, TradeInsert } from "@tradeloop/store";
import { BASE_ASSET, type ExecutionClient, type Quote } from "./execution.js";
import type { Alert, Notifier } from "./notifier.js";
import type { TradingSettings } from "./settings.js";

export type BuyFailureReason =
  | "auto_trade_disabled"
  | "already_trading"
  | "invalid_candidate"
  | "invalid_amount"
  | "quote_unavailable"
  | "swap_unavailable"
  | "execution_failed"
  | "no_holdings";

export type BuyResult =
  | { ok: true; snapshot: PositionSnapshot }
  | { ok: false; reason: BuyFailureReason; message: string };

export type ExitFailureReason = "quote_unavailable" | "swap_unavailable" | "execution_failed";

export interface CycleReport {
  evaluated: number;
  priced: number;
  exits: number;
  failedExits: number;
  evicted: string[];
}

export type TradeJournal = Pick<Store, "recordTrade" | "setRuntimeState">;

export interface TradeEngineOptions {
  execution: ExecutionClient;
  wallet: WalletPort;
  settings: TradingSettings;
  mode: Mode;
  intervalSeconds: number;
  logger: Logger;
  journal?: TradeJournal;
  notifier?: Notifier;
}

type ExitOutcome = { ok: true; sold: number } | { ok: false; reason: ExitFailureReason };

/**
 * Owns every open position. `runCycle` re-prices and exits them, `buy`
 * opens them, and nothing outside this class sees more than a snapshot.
 */
export class TradeEngine {
  private readonly execution: ExecutionClient;
  private readonly wallet: WalletPort;
  private readonly settings: TradingSettings;
  private readonly mode: Mode;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly journal: TradeJournal | undefined;
  private readonly notifier: Notifier | undefined;

  private readonly positions = new Map<string, Position>();
  private readonly buying = new Set<string>();
  private intake = new Channel<CandidateAsset>();
  private controller: AbortController | null = null;
  private loopTask: Promise<void> | null = null;
  private intakeTask: Promise<void> | null = null;
  private cycles = 0;

  public constructor(options: TradeEngineOptions) {
    this.execution = options.execution;
    this.wallet = options.wallet;
    this.settings = options.settings;
    this.mode = options.mode;
    this.intervalMs = options.intervalSeconds * 1000;
    this.logger = options.logger;
    this.journal = options.journal;
    this.notifier = options.notifier;
  }

  public isRunning(): boolean {
    return this.controller !== null && !this.controller.signal.aborted;
  }

  public getSnapshot(): PositionSnapshot[] {
    return [...this.positions.values()].map((position) => position.toSnapshot());
  }

  public getPosition(symbol: string): PositionSnapshot | undefined {
    return this.positions.get(symbol)?.toSnapshot();
  }

  public openPositionCount(): number {
    return this.positions.size;
  }

  /**
   * Signal intake. Never blocks the producer; the candidate is bought later by
   * the intake consumer if auto-trading is on at that point.
   */
  public onCandidateAsset(candidate: CandidateAsset): boolean {
    const accepted = this.intake.send(candidate);
    if (!accepted) {
      this.logger.debug("INTAKE_CLOSED", "CANDIDATE DROPPED, ENGINE NOT RUNNING", { symbol: candidate.symbol });
    }
    return accepted;
  }

  /** Resolves once `stop()` has been observed and the current cycle finished. */
  public start(): Promise<void> {
    if (this.loopTask) {
      return this.loopTask;
    }
    const controller = new AbortController();
    this.controller = controller;
    if (this.intake.isClosed()) {
      this.intake = new Channel<CandidateAsset>();
    }

    this.logger.ok("ENGINE_START", "TRADE ENGINE STARTED", {
      mode: this.mode,
      intervalMs: this.intervalMs,
      autoTrade: this.settings.autoTradeEnabled,
    });
    this.intakeTask = this.consumeIntake(this.intake, controller.signal);
    this.loopTask = this.loop(controller.signal);
    return this.loopTask;
  }

  public async stop(): Promise<void> {
    if (!this.controller) {
      return;
    }
    this.logger.warn("STOP", "STOP SIGNAL RECEIVED", {});
    this.controller.abort();
    this.intake.close();
    await Promise.all([this.loopTask, this.intakeTask]);
    this.controller = null;
    this.loopTask = null;
    this.intakeTask = null;
    this.logger.ok("ENGINE_STOPPED", "TRADE ENGINE STOPPED", { openPositions: this.positions.size });
  }

  public async runCycle(): Promise<CycleReport> {
    this.cycles += 1;
    const active = [...this.positions.values()].filter((position) => !position.isCompleted());
    const report: CycleReport = { evaluated: 0, priced: 0, exits: 0, failedExits: 0, evicted: [] };

    for (const position of active) {
      report.evaluated += 1;
      try {
        await this.evaluate(position, report);
      } catch (error) {
        this.logger.error("POSITION_CYCLE_FAIL", "ERROR EVALUATING POSITION", {
          symbol: position.symbol,
          error: errorMessage(error),
        });
      }
    }

    for (const [symbol, position] of this.positions) {
      if (position.isCompleted()) {
        this.positions.delete(symbol);
        report.evicted.push(symbol);
        this.logger.info("POSITION_EVICTED", "COMPLETED POSITION REMOVED", { symbol });
      }
    }

    this.journal?.setRuntimeState("engine", {
      mode: this.mode,
      cycles: this.cycles,
      lastCycleTs: new Date().toISOString(),
      openPositions: this.positions.size,
      exits: report.exits,
      failedExits: report.failedExits,
    });
    return report;
  }

  /** Every caller, signal or manual, is refused while auto-trading is off. */
  public async buy(candidate: CandidateAsset): Promise<BuyResult> {
    const symbol = candidate.symbol.trim();
    const address = candidate.address.trim();
    if (!symbol || !address) {
      return { ok: false, reason: "invalid_candidate", message: "A symbol and an address are required" };
    }
    if (!this.settings.autoTradeEnabled) {
      return { ok: false, reason: "auto_trade_disabled", message: "Auto-trading is disabled" };
    }
    if (this.positions.has(symbol) || this.buying.has(symbol)) {
      this.logger.info("BUY_DUPLICATE", "ALREADY TRADING SYMBOL", { symbol });
      return { ok: false, reason: "already_trading", message: `Already trading ${symbol}` };
    }

    this.buying.add(symbol);
    try {
      return await this.openPosition({ ...candidate, symbol, address });
    } catch (error) {
      this.logger.error("ENTRY_FAIL", "ERROR FAILED TO OPEN POSITION", { symbol, error: errorMessage(error) });
      return { ok: false, reason: "execution_failed", message: `Buy of ${symbol} failed: ${describeError(error)}` };
    } finally {
      this.buying.delete(symbol);
    }
  }

  private async loop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const started = Date.now();
      try {
        const report = await this.runCycle();
        this.logger.debug("CYCLE_DONE", "MONITOR CYCLE COMPLETE", { ...report, elapsedMs: Date.now() - started });
      } catch (error) {
        this.logger.error("LOOP_ERROR", "ERROR IN MONITOR LOOP", { error: errorMessage(error) });
      }
      if (signal.aborted) {
        break;
      }
      await sleep(Math.max(0, this.intervalMs - (Date.now() - started)), signal);
    }
  }

  private async consumeIntake(channel: Channel<CandidateAsset>, signal: AbortSignal): Promise<void> {
    for (;;) {
      const candidate = await channel.receive();
      if (candidate === undefined || signal.aborted) {
        return;
      }
      if (!this.settings.autoTradeEnabled) {
        this.logger.debug("SIGNAL_IGNORED", "AUTO-TRADE DISABLED, SIGNAL IGNORED", {
          symbol: candidate.symbol,
          source: candidate.source,
        });
        continue;
      }
      const result = await this.buy(candidate);
      if (!result.ok && result.reason !== "already_trading") {
        this.logger.warn("SIGNAL_BUY_SKIPPED", "SIGNAL DID NOT OPEN A POSITION", {
          symbol: candidate.symbol,
          source: candidate.source,
          reason: result.reason,
        });
      }
    }
  }

  private async openPosition(candidate: CandidateAsset): Promise<BuyResult> {
    const { symbol, address } = candidate;
    const params = this.settings.snapshot();
    if (toRawAmount(params.buyAmount, SOL_DECIMALS) === 0n) {
      return { ok: false, reason: "invalid_amount", message: "The buy amount is too small to trade" };
    }

    const quote = await this.execution.getQuote(BASE_ASSET, address, params.buyAmount, params.slippageBps);
    if (!quote) {
      return this.failBuy(candidate, "quote_unavailable", `No quote is available for ${symbol}`, params.buyAmount);
    }
    this.logger.info("GET_QUOTE", "GET QUOTE", {
      side: "BUY",
      symbol,
      inAmountRaw: quote.inAmountRaw,
      expectedOutRaw: quote.outAmountRaw,
      routeSummary: quote.routeSummary,
    });

    const swap = await this.execution.getSwapTransaction(quote, this.wallet.getPublicKey());
    if (!swap) {
      return this.failBuy(candidate, "swap_unavailable", `No swap transaction is available for ${symbol}`, params.buyAmount, quote);
    }

    const outcome = await this.execution.submitTransaction(swap);
    if (!outcome.ok) {
      return this.failBuy(candidate, "execution_failed", `The buy of ${symbol} was not executed`, params.buyAmount, quote, outcome.error);
    }

    const decimals = await this.execution.resolveDecimals(address);
    const holding = await this.wallet.getAssetHolding(address);
    const amountRaw = parseRawAmount(outcome.outAmountRaw);
    const spentRaw = parseRawAmount(outcome.inAmountRaw);
    if (parseRawAmount(holding.amountRaw) <= 0n || amountRaw <= 0n || spentRaw <= 0n) {
      return this.failBuy(
        candidate,
        "no_holdings",
        `The buy of ${symbol} left no holdings in the wallet`,
        params.buyAmount,
        quote,
        `holding=${holding.amountRaw} out=${outcome.outAmountRaw}`,
      );
    }

    const position = new Position({
      symbol,
      address,
      source: candidate.source,
      decimals,
      amountRaw,
      entryPrice: fromRawAmount(spentRaw, SOL_DECIMALS) / fromRawAmount(amountRaw, decimals),
      targetMultiplier: params.defaultTargetMultiplier,
      sellFraction: params.defaultSellFraction,
    });
    this.positions.set(symbol, position);
    const snapshot = position.toSnapshot();

    this.recordTrade(this.filledTrade("BUY", symbol, WSOL_MINT, address, outcome, quote, "entry"));
    this.logger.ok("ENTRY_OPENED", "CONFIRMED POSITION OPENED", {
      symbol,
      address,
      heldAmount: snapshot.heldAmount,
      entryPrice: snapshot.entryPrice,
      targetMultiplier: snapshot.targetMultiplier,
      sellFraction: snapshot.sellFraction,
      signature: outcome.signature ?? null,
    });
    this.dispatch({
      kind: "POSITION_OPENED",
      symbol,
      message: `Opened ${symbol}: ${snapshot.heldAmount} at ${snapshot.entryPrice} SOL`,
      data: { address, heldAmount: snapshot.heldAmount, entryPrice: snapshot.entryPrice, source: candidate.source },
    });
    return { ok: true, snapshot };
  }

  private failBuy(
    candidate: CandidateAsset,
    reason: BuyFailureReason,
    message: string,
    buyAmount: number,
    quote?: Quote,
    detail?: string,
  ): BuyResult {
    this.logger.error("ENTRY_FAIL", "ERROR FAILED TO OPEN POSITION", {
      symbol: candidate.symbol,
      reason,
      ...(detail ? { error: detail } : {}),
    });
    this.recordTrade({
      side: "BUY",
      mode: this.mode,
      symbol: candidate.symbol,
      inputMint: WSOL_MINT,
      outputMint: candidate.address,
      inAmount: quote?.inAmountRaw ?? toRawAmount(buyAmount, SOL_DECIMALS).toString(),
      ...(quote ? { expectedOut: quote.outAmountRaw } : {}),
      status: "FAILED",
      error: detail ?? reason,
      reason,
    });
    this.dispatch({ kind: "BUY_FAILED", symbol: candidate.symbol, message, data: { reason } });
    return { ok: false, reason, message };
  }

  private async evaluate(position: Position, report: CycleReport): Promise<void> {
    const price = await this.execution.getPrice(position.address, position.decimals);
    if (price === null) {
      this.logger.warn("PRICE_UNAVAILABLE", "WARNING PRICE UNAVAILABLE, SKIPPING UNTIL NEXT CYCLE", {
        symbol: position.symbol,
      });
      return;
    }
    report.priced += 1;
    position.updatePrice(price);
    if (!position.isTargetReached()) {
      return;
    }

    this.logger.info("EXIT_SIGNAL", "EXIT SIGNAL TRIGGERED", {
      symbol: position.symbol,
      profitPercent: position.profitPercent,
      targetMultiplier: position.targetMultiplier,
      exitAmount: position.exitAmount(),
    });
    const outcome = await this.exit(position);
    if (!outcome.ok) {
      report.failedExits += 1;
      this.dispatch({
        kind: "EXIT_FAILED",
        symbol: position.symbol,
        message: `Exit of ${position.symbol} failed (${outcome.reason}); will retry next cycle`,
        data: { reason: outcome.reason, heldAmount: position.heldAmount },
      });
      return;
    }

    report.exits += 1;
    const snapshot = position.toSnapshot();
    if (position.isCompleted()) {
      this.logger.ok("POSITION_CLOSED", "CONFIRMED POSITION CLOSED", { symbol: position.symbol, sold: outcome.sold });
      this.dispatch({
        kind: "POSITION_COMPLETED",
        symbol: position.symbol,
        message: `Closed ${position.symbol} after selling ${snapshot.soldTotal}`,
        data: { soldTotal: snapshot.soldTotal },
      });
    } else {
      this.logger.ok("POSITION_REDUCED", "CONFIRMED POSITION REDUCED", {
        symbol: position.symbol,
        sold: outcome.sold,
        remaining: snapshot.heldAmount,
      });
      this.dispatch({
        kind: "POSITION_REDUCED",
        symbol: position.symbol,
        message: `Sold ${outcome.sold} ${position.symbol} at ${snapshot.currentPrice} SOL, ${snapshot.heldAmount} left`,
        data: { sold: outcome.sold, heldAmount: snapshot.heldAmount, price: snapshot.currentPrice },
      });
    }
  }

  /**
   * quote, swap, submit. The holding only changes after a confirmed fill and
   * only by what the fill reports as spent, counted in smallest units.
   */
  private async exit(position: Position): Promise<ExitOutcome> {
    let amountRaw = position.exitAmountRaw();
    if (amountRaw === 0n) {
      // dust: a fractional exit below one smallest unit would never fill
      amountRaw = position.heldRaw;
    }
    const slippageBps = this.settings.slippageBps;

    const quote = await this.execution.getQuoteRaw(position.address, BASE_ASSET, amountRaw, slippageBps);
    if (!quote) {
      return this.failExit(position, "quote_unavailable", amountRaw.toString());
    }
    const swap = await this.execution.getSwapTransaction(quote, this.wallet.getPublicKey());
    if (!swap) {
      return this.failExit(position, "swap_unavailable", quote.inAmountRaw, quote);
    }
    const outcome = await this.execution.submitTransaction(swap);
    if (!outcome.ok) {
      return this.failExit(position, "execution_failed", quote.inAmountRaw, quote, outcome.error);
    }

    const reported = parseRawAmount(outcome.inAmountRaw);
    const soldRaw = reported < position.heldRaw ? reported : position.heldRaw;
    if (soldRaw <= 0n) {
      return this.failExit(position, "execution_failed", quote.inAmountRaw, quote, "fill reported nothing sold");
    }
    position.applyPartialExitRaw(soldRaw);
    this.recordTrade(this.filledTrade("SELL", position.symbol, position.address, WSOL_MINT, outcome, quote, "target_reached"));
    return { ok: true, sold: fromRawAmount(soldRaw, position.decimals) };
  }

  private failExit(position: Position, reason: ExitFailureReason, inAmount: string, quote?: Quote, detail?: string): ExitOutcome {
    this.logger.error("EXIT_FAIL", "ERROR FAILED TO EXECUTE EXIT", {
      symbol: position.symbol,
      reason,
      heldAmount: position.heldAmount,
      ...(detail ? { error: detail } : {}),
    });
    this.recordTrade({
      side: "SELL",
      mode: this.mode,
      symbol: position.symbol,
      inputMint: position.address,
      outputMint: WSOL_MINT,
      inAmount,
      ...(quote ? { expectedOut: quote.outAmountRaw } : {}),
      status: "FAILED",
      error: detail ?? reason,
      reason,
    });
    return { ok: false, reason };
  }

  private filledTrade(
    side: "BUY" | "SELL",
    symbol: string,
    inputMint: string,
    outputMint: string,
    outcome: SubmitSuccess,
    quote: Quote,
    reason: string,
  ): TradeInsert {
    return {
      side,
      mode: this.mode,
      symbol,
      inputMint,
      outputMint,
      inAmount: outcome.inAmountRaw,
      outAmount: outcome.outAmountRaw,
      expectedOut: quote.outAmountRaw,
      status: this.mode === "paper" ? "PAPER_FILLED" : "CONFIRMED",
      ...(outcome.signature ? { signature: outcome.signature } : {}),
      reason,
      meta: { routeSummary: quote.routeSummary, slippageBps: quote.slippageBps },
    };
  }

  private recordTrade(trade: TradeInsert): void {
    if (!this.journal) {
      return;
    }
    try {
      this.journal.recordTrade(trade);
    } catch (error) {
      this.logger.error("JOURNAL_FAIL", "ERROR RECORDING TRADE", { symbol: trade.symbol, error: errorMessage(error) });
    }
  }

  private dispatch(alert: Alert): void {
    if (!this.notifier) {
      return;
    }
    this.notifier.notify(alert).catch((error: unknown) => {
      this.logger.warn("NOTIFY_FAIL", "WARNING ALERT DELIVERY FAILED", { kind: alert.kind, error: errorMessage(error) });
    });
  }
}
