import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
  stack?: string;
}

export interface LoggerOptions {
  debug?: boolean;
  color?: boolean;
  logToFile?: boolean;
  logDir?: string;
}

/**
 * Diagnostic logger.
 * Writes to stderr so report output on stdout stays machine-readable.
 */
class Logger {
  private debugMode: boolean;
  private color: boolean;
  private logToFile: boolean;
  private logDir: string;
  private logQueue: LogEntry[] = [];
  private flushInterval: NodeJS.Timeout | null = null;
  private initialized: boolean = false;

  constructor(options: LoggerOptions = {}) {
    this.debugMode = options.debug ?? process.env.VAULT_GRAPH_DEBUG === "true";
    this.color = options.color ?? true;
    this.logToFile = options.logToFile ?? process.env.VAULT_GRAPH_LOG_FILE === "true";
    this.logDir =
      options.logDir ??
      path.join(process.env.VAULT_GRAPH_CONFIG_DIR || path.join(os.homedir(), ".vault-graph"), "logs");
  }

  async init(): Promise<void> {
    if (this.initialized) return;

    if (this.logToFile) {
      await fs.mkdir(this.logDir, { recursive: true });
      this.flushInterval = setInterval(() => {
        this.flush().catch((err: unknown) => {
          console.error("Failed to flush log queue:", err);
        });
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
      info: "\x1b[32m", // green
      warn: "\x1b[33m", // yellow
      error: "\x1b[31m", // red
    };
    const reset = "\x1b[0m";
    const levelStr = `[${entry.level.toUpperCase()}]`.padEnd(7);
    let output = this.color
      ? `${levelColors[entry.level]}${levelStr}${reset} ${entry.message}`
      : `${levelStr} ${entry.message}`;

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

    if (level === "warn") {
      console.warn(this.formatConsoleOutput(entry));
    } else {
      console.error(this.formatConsoleOutput(entry));
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

  error(message: string, error?: unknown): void {
    this.log("error", message, error);
  }

  private getLogFilePath(): string {
    const date = new Date().toISOString().split("T")[0];
    return path.join(this.logDir, `vault-graph-${date}.log`);
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

  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
  }

  isDebugMode(): boolean {
    return this.debugMode;
  }

  setColor(enabled: boolean): void {
    this.color = enabled;
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

export function createLogger(options?: LoggerOptions): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(options);
  }
  return loggerInstance;
}

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger();
  }
  return loggerInstance;
}

// Error tracking utilities
export interface ErrorContext {
  component?: string;
  action?: string;
  metadata?: Record<string, unknown>;
}

export function trackError(error: Error, context?: ErrorContext): void {
  const logger = getLogger();
  const message = context?.component ? `[${context.component}] ${error.message}` : error.message;

  logger.error(message, {
    error: {
      name: error.name,
      message: error.message,
      stack: error.stack,
    },
    context,
  });
}

export { Logger };
export default getLogger;
