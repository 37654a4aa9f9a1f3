import fs from "node:fs/promises";
import path from "node:path";
import { getLogDir } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
  stack?: string;
}

interface LoggerOptions {
  debug?: boolean;
  logToFile?: boolean;
  logDir?: string;
  /** Keep console output off; entries still reach the log file */
  quiet?: boolean;
}

class Logger {
  private debugMode: boolean;
  private logToFile: boolean;
  private logDir: string;
  private quiet: boolean;
  private logQueue: LogEntry[] = [];
  private flushInterval: NodeJS.Timeout | null = null;
  private initialized: boolean = false;

  constructor(options: LoggerOptions = {}) {
    this.debugMode = options.debug ?? (process.env.SYNCPAIR_DEBUG === "true");
    this.logToFile = options.logToFile ?? false;
    this.logDir = options.logDir ?? getLogDir();
    this.quiet = options.quiet ?? false;
  }

  async init(): Promise<void> {
    if (this.initialized) return;

    if (this.logToFile) {
      await fs.mkdir(this.logDir, { recursive: true });
      this.flushInterval = setInterval(() => {
        void this.flush();
      }, 5000);
      this.flushInterval.unref();
    }
    this.initialized = true;
  }

  private createEntry(level: LogLevel, message: string, data?: unknown): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (data !== undefined) {
      entry.data = data;
    }

    if (data instanceof Error) {
      entry.stack = data.stack;
    }

    return entry;
  }

  private formatConsoleOutput(entry: LogEntry): string {
    const levelColors: Record<LogLevel, string> = {
      debug: "\x1b[36m", // cyan
      info: "\x1b[32m",  // green
      warn: "\x1b[33m",  // yellow
      error: "\x1b[31m", // red
    };
    const reset = "\x1b[0m";
    const levelStr = `[${entry.level.toUpperCase()}]`.padEnd(7);
    let output = `${levelColors[entry.level]}${levelStr}${reset} ${entry.message}`;

    if (entry.data !== undefined && !(entry.data instanceof Error)) {
      output += ` ${JSON.stringify(entry.data)}`;
    }

    if (entry.stack) {
      output += `\n${entry.stack}`;
    }

    return output;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (level === "debug" && !this.debugMode) {
      return;
    }

    const entry = this.createEntry(level, message, data);

    if (!this.quiet) {
      if (level === "error") {
        console.error(this.formatConsoleOutput(entry));
      } else if (level === "warn") {
        console.warn(this.formatConsoleOutput(entry));
      } else {
        console.log(this.formatConsoleOutput(entry));
      }
    }

    if (this.logToFile) {
      this.logQueue.push(entry);
    }
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: Error | unknown): void {
    this.log("error", message, error);
  }

  private getLogFilePath(): string {
    const date = new Date().toISOString().split("T")[0];
    return path.join(this.logDir, `syncpair-${date}.log`);
  }

  async flush(): Promise<void> {
    if (!this.logToFile || this.logQueue.length === 0) {
      return;
    }

    const entries = [...this.logQueue];
    this.logQueue = [];

    try {
      const lines = entries.map((entry) => JSON.stringify(entry)).join("\n") + "\n";
      await fs.appendFile(this.getLogFilePath(), lines, "utf-8");
    } catch (err) {
      console.error("Failed to write to log file:", err);
    }
  }

  async close(): Promise<void> {
    if (this.flushInterval) {
      clearInterval(this.flushInterval);
      this.flushInterval = null;
    }
    await this.flush();
  }

  configure(options: Pick<LoggerOptions, "debug" | "logToFile" | "quiet">): void {
    if (options.debug !== undefined) this.debugMode = options.debug;
    if (options.logToFile !== undefined) this.logToFile = options.logToFile;
    if (options.quiet !== undefined) this.quiet = options.quiet;
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger();
  }
  return loggerInstance;
}

export { Logger };
