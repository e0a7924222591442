/**
 * Structured logging for the compiler.
 *
 * Parsers take an injectable Logger; the default discards everything so that
 * library consumers opt in to output.
 */

// ---------------------------------------------------------------------------
// TYPES
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context attached to a log entry. Values must be JSON-serializable.
 */
export interface LogContext {
  /** Component emitting the entry (e.g. "sql", "closure") */
  component?: string;
  /** Repr of the node being compiled */
  node?: string;
  durationMs?: number;
  [key: string]: LogContextValue | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum level to emit (default: "debug") */
  minLevel?: LogLevel;
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  format?: "json" | "pretty";
}

/** Logger capturing its entries for assertions. */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

// ---------------------------------------------------------------------------
// LEVELS
// ---------------------------------------------------------------------------

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLevelAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
}

// ---------------------------------------------------------------------------
// FACTORIES
// ---------------------------------------------------------------------------

export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? "debug";
  const output = config.output ?? (() => {});

  const log = (
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error
  ): void => {
    if (!isLevelAtLeast(level, minLevel)) return;
    const entry: LogEntry = { level, message, timestamp: Date.now() };
    if (context !== undefined) entry.context = context;
    if (error !== undefined) entry.error = error;
    output(entry);
  };

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, error, context) => log("error", message, context, error),
  };
}

/**
 * Render a log entry as a single line of either JSON or human-readable text.
 */
export function formatLogEntry(
  entry: LogEntry,
  format: "json" | "pretty"
): string {
  if (format === "json") {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: { name: entry.error.name, message: entry.error.message },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  let line = `[${time}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.context) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += `\n  ${entry.error.name}: ${entry.error.message}`;
  }
  return line;
}

export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? "json";
  return createLogger({
    ...config,
    output: (entry) => {
      const line = formatLogEntry(entry, format);
      if (entry.level === "error") {
        console.error(line);
      } else {
        console.log(line);
      }
    },
  });
}

export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const inner = createLogger({
    minLevel: config.minLevel,
    output: (entry) => {
      logs.push(entry);
      config.output?.(entry);
    },
  });
  return {
    ...inner,
    getLogs: () => [...logs],
    getLogsByLevel: (level) => logs.filter((entry) => entry.level === level),
    clear: () => {
      logs.length = 0;
    },
  };
}

/**
 * Derive a logger that merges fixed context into every entry.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const merge = (extra?: LogContext): LogContext => ({ ...context, ...extra });
  return {
    debug: (message, extra) => logger.debug(message, merge(extra)),
    info: (message, extra) => logger.info(message, merge(extra)),
    warn: (message, extra) => logger.warn(message, merge(extra)),
    error: (message, error, extra) => logger.error(message, error, merge(extra)),
  };
}
