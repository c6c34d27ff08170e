export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
};

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(x: unknown): x is LogLevel {
  return x === "debug" || x === "info" || x === "warn" || x === "error";
}

/** Level-filtered console output, `[prefix] message` plus an optional context object. */
export class ConsoleLogger implements Logger {
  private readonly minLevel: number;

  constructor(
    private readonly prefix: string,
    level: LogLevel = "warn"
  ) {
    this.minLevel = LOG_LEVEL_ORDER[level];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.minLevel > LOG_LEVEL_ORDER.debug) return;
    if (context) console.debug(`[${this.prefix}] ${message}`, context);
    else console.debug(`[${this.prefix}] ${message}`);
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.minLevel > LOG_LEVEL_ORDER.info) return;
    if (context) console.info(`[${this.prefix}] ${message}`, context);
    else console.info(`[${this.prefix}] ${message}`);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.minLevel > LOG_LEVEL_ORDER.warn) return;
    if (context) console.warn(`[${this.prefix}] ${message}`, context);
    else console.warn(`[${this.prefix}] ${message}`);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (error && context) console.error(`[${this.prefix}] ${message}`, error, context);
    else if (error) console.error(`[${this.prefix}] ${message}`, error);
    else console.error(`[${this.prefix}] ${message}`);
  }
}
