import type { Server } from "node:http";
import { Keypair, type Connection } from "@solana/web3.js";
import {
  Logger,
  ResilientCaller,
  errorMessage,
  maskPubkey,
  type BotConfig,
  type RetryPolicy,
  type TransactionSubmitter,
  type WalletPort,
} from "@tradeloop/core";
import { JupiterClient } from "@tradeloop/jupiter";
import {
  SolanaWallet,
  checkRpcHealth,
  createRpcConnection,
  getMintDecimals,
  loadKeypairFromFile,
} from "@tradeloop/solana";
import { Store } from "@tradeloop/store";
import { ControlSurface } from "./control.js";
import { TradeEngine } from "./engine.js";
import { ExecutionClient } from "./execution.js";
import { closeServer, createControlApp, listen } from "./http.js";
import { FanoutNotifier, JournalNotifier, WebhookNotifier, type Notifier } from "./notifier.js";
import { PaperWallet } from "./paper-wallet.js";
import { TradingSettings } from "./settings.js";
import { GeckoTerminalSource } from "./signals/gecko-source.js";
import { SignalPoller } from "./signals/poller.js";
import type { SignalSource } from "./signals/source.js";
import { TextMentionSource } from "./signals/text-source.js";

// public listing APIs allow roughly 30 calls a minute
const SIGNAL_RATE_LIMIT = 30;
const SIGNAL_RATE_PER_SECONDS = 60;

interface Custody {
  wallet: WalletPort;
  submitter: TransactionSubmitter;
}

/**
 * The whole process: journal, custody, execution, engine, signal pollers and
 * the control API, wired from one validated config.
 */
export class TradeLoopApp {
  public readonly logger: Logger;
  public readonly store: Store;
  public readonly engine: TradeEngine;
  public readonly control: ControlSurface;
  public readonly pollers: SignalPoller[] = [];
  public readonly mentions: TextMentionSource | undefined;

  private readonly config: BotConfig;
  private readonly wallet: WalletPort;
  private readonly connection: Connection;
  private server: Server | null = null;
  private stopping: Promise<void> | null = null;

  public constructor(config: BotConfig) {
    this.config = config;
    this.store = new Store(config.DB_PATH);
    this.store.initialize();
    this.store.snapshotConfig(config);

    this.logger = new Logger({
      component: "BOT",
      level: config.LOG_LEVEL,
      sink: {
        write: (entry) => {
          this.store.insertLog(entry);
        },
      },
    });

    const retry: RetryPolicy = {
      maxAttempts: config.RETRY_MAX_ATTEMPTS,
      baseDelayMs: config.RETRY_DELAY_MS,
    };
    const connection = createRpcConnection(config.RPC_URL);
    this.connection = connection;
    const custody = this.createCustody(connection);
    this.wallet = custody.wallet;

    const execution = new ExecutionClient({
      quotes: new JupiterClient({
        baseUrl: config.JUPITER_BASE_URL,
        timeoutMs: config.REQUEST_TIMEOUT_MS,
        logger: this.logger.child("JUPITER"),
      }),
      wallet: custody.wallet,
      submitter: custody.submitter,
      caller: new ResilientCaller({
        name: "quotes",
        rateLimit: config.QUOTE_RATE_LIMIT,
        perSeconds: config.QUOTE_RATE_PER_SECONDS,
        retry,
        logger: this.logger.child("QUOTES"),
      }),
      defaultDecimals: config.DEFAULT_TOKEN_DECIMALS,
      slippageBps: config.SLIPPAGE_BPS,
      priorityFeeLamports: config.PRIORITY_FEE_LAMPORTS,
      logger: this.logger.child("EXECUTION"),
    });

    const notifiers: Notifier[] = [new JournalNotifier(this.store, this.logger.child("ALERTS"))];
    if (config.NOTIFY_WEBHOOK_URL) {
      notifiers.push(
        new WebhookNotifier({
          url: config.NOTIFY_WEBHOOK_URL,
          timeoutMs: config.REQUEST_TIMEOUT_MS,
          caller: new ResilientCaller({
            name: "webhook",
            rateLimit: config.NOTIFY_RATE_LIMIT,
            perSeconds: config.NOTIFY_RATE_PER_SECONDS,
            retry,
            logger: this.logger.child("NOTIFY"),
          }),
        }),
      );
    }

    const notifier = new FanoutNotifier(notifiers, this.logger.child("ALERTS"));
    const settings = TradingSettings.fromConfig(config);
    this.engine = new TradeEngine({
      execution,
      wallet: custody.wallet,
      settings,
      mode: config.MODE,
      intervalSeconds: config.MONITOR_INTERVAL_SECONDS,
      logger: this.logger.child("ENGINE"),
      journal: this.store,
      notifier,
    });
    this.control = new ControlSurface({
      engine: this.engine,
      settings,
      wallet: custody.wallet,
      mode: config.MODE,
      logger: this.logger.child("CONTROL"),
      journal: this.store,
    });

    let mentions: TextMentionSource | undefined;
    for (const name of config.SIGNAL_SOURCES) {
      let source: SignalSource;
      if (name === "gecko") {
        source = new GeckoTerminalSource({
          baseUrl: config.GECKO_TERMINAL_BASE_URL,
          timeoutMs: config.REQUEST_TIMEOUT_MS,
          logger: this.logger.child("GECKO"),
        });
      } else if (name === "mentions") {
        mentions = new TextMentionSource({ logger: this.logger.child("MENTIONS") });
        source = mentions;
      } else {
        this.logger.warn("SIGNAL_SOURCE_UNKNOWN", "WARNING UNKNOWN SIGNAL SOURCE IGNORED", { name });
        continue;
      }
      this.pollers.push(
        new SignalPoller({
          source,
          caller: new ResilientCaller({
            name: `signals.${name}`,
            rateLimit: SIGNAL_RATE_LIMIT,
            perSeconds: SIGNAL_RATE_PER_SECONDS,
            retry,
            logger: this.logger.child("SIGNALS"),
          }),
          intervalSeconds: config.SIGNAL_POLL_SECONDS,
          publish: (candidate) => this.engine.onCandidateAsset(candidate),
          logger: this.logger.child("SIGNALS"),
          notifier,
        }),
      );
    }
    this.mentions = mentions;
  }

  /** Resolves once the engine and every poller have stopped. */
  public async start(): Promise<void> {
    this.logger.ok("BOOT", "===== TRADELOOP START =====", {
      mode: this.config.MODE,
      monitorSeconds: this.config.MONITOR_INTERVAL_SECONDS,
      signalSources: this.pollers.map((poller) => poller.name),
      dbPath: this.store.getDbPath(),
      wallet: maskPubkey(this.wallet.getPublicKey()),
    });
    const rpc = await checkRpcHealth(this.connection);
    if (rpc.ok) {
      this.logger.ok("RPC_OK", "RPC REACHABLE", { slot: rpc.slot ?? null });
    } else {
      this.logger.warn("RPC_UNREACHABLE", "WARNING RPC UNREACHABLE, QUOTES AND DECIMALS MAY FAIL", { error: rpc.error ?? null });
    }

    this.server = await listen(
      createControlApp({
        control: this.control,
        store: this.store,
        logger: this.logger.child("WEB"),
        ...(this.config.CONTROL_API_TOKEN ? { token: this.config.CONTROL_API_TOKEN } : {}),
        ...(this.mentions ? { mentions: this.mentions } : {}),
      }),
      this.config.WEB_PORT,
    );
    this.logger.ok("WEB_BOOT", "CONTROL API ONLINE", {
      url: `http://localhost:${this.config.WEB_PORT}`,
      authenticated: this.config.CONTROL_API_TOKEN !== undefined,
    });

    await Promise.all([this.engine.start(), ...this.pollers.map((poller) => poller.start())]);
  }

  /** Idempotent: pollers first, then the engine, then the server and journal. */
  public stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    await Promise.all(this.pollers.map((poller) => poller.stop()));
    await this.engine.stop();
    if (this.server) {
      try {
        await closeServer(this.server);
      } catch (error) {
        this.logger.warn("WEB_CLOSE_FAIL", "WARNING CONTROL API DID NOT CLOSE CLEANLY", { error: errorMessage(error) });
      }
      this.server = null;
    }
    this.logger.ok("SHUTDOWN", "CONFIRMED SHUTDOWN COMPLETE", {});
    this.store.close();
  }

  private createCustody(connection: Connection): Custody {
    const logger = this.logger.child("WALLET");
    if (this.config.MODE === "live") {
      if (!this.config.WALLET_KEYPAIR_PATH) {
        throw new Error("MODE=live requires WALLET_KEYPAIR_PATH");
      }
      const wallet = new SolanaWallet({
        connection,
        keypair: loadKeypairFromFile(this.config.WALLET_KEYPAIR_PATH),
        logger,
      });
      return { wallet, submitter: wallet };
    }

    const publicKey =
      this.config.PAPER_WALLET_PUBKEY ??
      (this.config.WALLET_KEYPAIR_PATH
        ? loadKeypairFromFile(this.config.WALLET_KEYPAIR_PATH).publicKey.toBase58()
        : Keypair.generate().publicKey.toBase58());
    const wallet = new PaperWallet({
      publicKey,
      startingBalanceSol: this.config.PAPER_BALANCE_SOL,
      lookupDecimals: async (mint) => {
        try {
          return await getMintDecimals(connection, mint);
        } catch (error) {
          logger.debug("MINT_DECIMALS_FAIL", "MINT DECIMALS LOOKUP FAILED", { mint, error: errorMessage(error) });
          return null;
        }
      },
      logger,
    });
    return { wallet, submitter: wallet };
  }
}
