/**
 * Logging for the registry client.
 * @module observability/logging
 */

/**
 * Log levels.
 */
export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
  Silent = 'silent',
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
  [LogLevel.Silent]: 4,
};

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface.
 */
export interface Logger {
  /** Logs a debug message. */
  debug(message: string, context?: Record<string, unknown>): void;
  /** Logs an info message. */
  info(message: string, context?: Record<string, unknown>): void;
  /** Logs a warning message. */
  warn(message: string, context?: Record<string, unknown>): void;
  /** Logs an error message. */
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  /** Creates a child logger with additional context. */
  child(context: Record<string, unknown>): Logger;
}

/**
 * Receives formatted lines. Defaults to the console.
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Log configuration.
 */
export interface LogConfig {
  /** Minimum log level. */
  level: LogLevel;
  /** Whether to include timestamps. */
  timestamps: boolean;
  /** Whether to output JSON lines. */
  json: boolean;
  /** Additional context for all logs. */
  context?: Record<string, unknown>;
  /** Output target. */
  sink?: LogSink;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: LogLevel.Warn,
  timestamps: true,
  json: false,
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case LogLevel.Debug:
      console.debug(line);
      break;
    case LogLevel.Info:
      console.info(line);
      break;
    case LogLevel.Warn:
      console.warn(line);
      break;
    case LogLevel.Error:
    case LogLevel.Silent:
      console.error(line);
      break;
  }
};

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;
  private readonly baseContext: Record<string, unknown>;

  constructor(config: Partial<LogConfig> = {}, baseContext: Record<string, unknown> = {}) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
    this.baseContext = { ...this.config.context, ...baseContext };
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context, error);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.config, { ...this.baseContext, ...context });
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: { ...this.baseContext, ...context },
      error,
    };

    const line = this.config.json ? this.formatJson(entry) : this.formatText(entry);
    (this.config.sink ?? consoleSink)(level, line);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.level];
  }

  private formatJson(entry: LogEntry): string {
    const output = {
      level: entry.level,
      message: entry.message,
      ...(this.config.timestamps && { timestamp: entry.timestamp.toISOString() }),
      ...entry.context,
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
        },
      }),
    };
    return JSON.stringify(output);
  }

  private formatText(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`- ${entry.error.toString()}`);
    }

    return parts.join(' ');
  }
}

/**
 * No-op logger that discards all messages.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(_context: Record<string, unknown>): Logger {
    return this;
  }
}

/**
 * Parses a level name such as `"debug"` or `"WARN"`.
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  for (const level of Object.values(LogLevel)) {
    if (level === normalized) {
      return level;
    }
  }
  return undefined;
}

/**
 * Creates a console logger.
 */
export function createLogger(config: Partial<LogConfig> = {}): Logger {
  return new ConsoleLogger(config);
}

/**
 * Creates a no-op logger.
 */
export function createNoopLogger(): Logger {
  return new NoopLogger();
}
