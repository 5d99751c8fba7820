/**
 * Log levels. 'silent' disables output entirely.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * A structured log entry, as handed to a {@link LogSink}
 */
export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  prefix: string;
  message: string;
  context: Record<string, unknown>;
}

/**
 * Destination for formatted entries. Defaults to the console.
 */
export type LogSink = (entry: LogEntry, line: string) => void;

/**
 * Logger options
 */
export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  context?: Record<string, unknown>;
  sink?: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const consoleSink: LogSink = (entry, line) => {
  switch (entry.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

/**
 * Parse a level name (e.g. from LOG_LEVEL). Unknown values yield undefined.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Create a simple logger.
 * Writes one line per entry to the sink; level filtering happens before formatting.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const prefix = options.prefix ?? 'nfe-ledger';
  const baseContext = options.context ?? {};
  const sink = options.sink ?? consoleSink;

  const write = (level: LogEntry['level'], message: string, context?: Record<string, unknown>): void => {
    if (LOG_LEVELS[level] < minLevel) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      prefix,
      message,
      context: { ...baseContext, ...context },
    };
    const contextStr = Object.keys(entry.context).length > 0
      ? ` ${JSON.stringify(entry.context)}`
      : '';

    sink(entry, `[${entry.timestamp}] [${level.toUpperCase()}] [${prefix}] ${message}${contextStr}`);
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),

    child(context: Record<string, unknown>): Logger {
      return createLogger({ ...options, context: { ...baseContext, ...context } });
    },
  };
}

/**
 * Logger that discards everything
 */
export const noopLogger: Logger = createLogger({ level: 'silent' });
