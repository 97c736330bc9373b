import fs from "node:fs/promises";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * JSON-lines logger. Console output goes to stderr so it never mixes with
 * the results printed on stdout; the log file, when set, receives every
 * entry regardless of the console level.
 */
export class Logger {
  private logFile: string | null = null;
  private minLevel: LogLevel;
  private console: boolean;
  private pending: Promise<void> = Promise.resolve();
  private writeError: Error | null = null;

  constructor(options?: {
    logFile?: string;
    minLevel?: LogLevel;
    console?: boolean;
  }) {
    this.logFile = options?.logFile ?? null;
    this.minLevel = options?.minLevel ?? "info";
    this.console = options?.console ?? false;
  }

  static createCliLogger(options: { verbose?: boolean; logFile?: string } = {}): Logger {
    return new Logger({
      minLevel: options.verbose ? "debug" : "warn",
      console: true,
      logFile: options.logFile,
    });
  }

  static silent(): Logger {
    return new Logger({ minLevel: "error", console: false });
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  private formatEntry(entry: LogEntry): string {
    return JSON.stringify(entry);
  }

  private write(entry: LogEntry): void {
    const line = this.formatEntry(entry);

    if (this.console && this.shouldLog(entry.level)) {
      console.error(line);
    }

    const logFile = this.logFile;
    if (logFile) {
      // Appends are chained so entries land in call order.
      this.pending = this.pending
        .then(() => fs.appendFile(logFile, line + "\n"))
        .catch((err: unknown) => {
          this.writeError ??= err instanceof Error ? err : new Error(String(err));
        });
    }
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    this.write({
      timestamp: new Date().toISOString(),
      level,
      message,
      data,
    });
  }

  /** Waits for queued file writes; rethrows the first write failure. */
  async flush(): Promise<void> {
    await this.pending;
    if (this.writeError) {
      const err = this.writeError;
      this.writeError = null;
      throw err;
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }
}
