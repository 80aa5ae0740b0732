import type { LogEntry, LogLevel } from "./types.js";

const levelRank: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  OK: 25,
  WARN: 30,
  ERROR: 40,
};

export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
}

export interface LoggerOptions {
  component: string;
  level: LogLevel;
  sink?: LogSink;
  console?: boolean;
}

export class Logger {
  private readonly component: string;
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink | undefined;
  private readonly toConsole: boolean;

  public constructor(options: LoggerOptions) {
    this.component = options.component;
    this.minLevel = options.level;
    this.sink = options.sink;
    this.toConsole = options.console ?? true;
  }

  /** Same level and sink, different component tag. */
  public child(component: string): Logger {
    return new Logger({
      component,
      level: this.minLevel,
      console: this.toConsole,
      ...(this.sink ? { sink: this.sink } : {}),
    });
  }

  public debug(code: string, message: string, data?: Record<string, unknown>): void {
    this.log("DEBUG", code, message, data);
  }

  public info(code: string, message: string, data?: Record<string, unknown>): void {
    this.log("INFO", code, message, data);
  }

  public ok(code: string, message: string, data?: Record<string, unknown>): void {
    this.log("OK", code, message, data);
  }

  public warn(code: string, message: string, data?: Record<string, unknown>): void {
    this.log("WARN", code, message, data);
  }

  public error(code: string, message: string, data?: Record<string, unknown>): void {
    this.log("ERROR", code, message, data);
  }

  private log(level: LogLevel, code: string, message: string, data?: Record<string, unknown>): void {
    if (levelRank[level] < levelRank[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      component: this.component,
      code,
      message,
    };
    if (data) {
      entry.data = data;
    }

    if (this.toConsole) {
      const rendered = `[${entry.ts}] [${level}] [${this.component}] ${code} ${message}${
        data ? ` ${JSON.stringify(data)}` : ""
      }`;
      if (level === "ERROR") {
        // eslint-disable-next-line no-console
        console.error(rendered);
      } else {
        // eslint-disable-next-line no-console
        console.log(rendered);
      }
    }

    if (this.sink) {
      this.writeToSink(this.sink, entry);
    }
  }

  private writeToSink(sink: LogSink, entry: LogEntry): void {
    try {
      const pending = sink.write(entry);
      if (pending) {
        pending.catch((error: unknown) => {
          // eslint-disable-next-line no-console
          console.error(`[LOGGER] sink write failed: ${error instanceof Error ? error.message : String(error)}`);
        });
      }
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error(`[LOGGER] sink write failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
