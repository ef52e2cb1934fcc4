/**
 * Structured Logging Utility
 *
 * Module-scoped loggers with levels, optional JSON output and a pluggable
 * output handler. The level is read from LOG_LEVEL or EEG_LOG_LEVEL when the
 * module loads.
 *
 * @module utils/logger
 */

/**
 * Available log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

/**
 * Log entry structure
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevelName;
  /** Module the logger was created for, `parent:child` for child loggers */
  module: string;
  message: string;
  context?: LogContext;
  error?: Error;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  minLevel: LogLevel;

  /** Emit each entry as one JSON line */
  jsonOutput?: boolean;

  includeTimestamp?: boolean;

  /** Custom output handler (default: console) */
  outputHandler?: (entry: LogEntry) => void;
}

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.SILENT]: 'silent',
};

const LEVEL_ALIASES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  warning: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
  none: LogLevel.SILENT,
};

let globalConfig: LoggerConfig = {
  minLevel: LogLevel.INFO,
  jsonOutput: false,
  includeTimestamp: true,
};

/**
 * Parse a level name; unknown names fall back to INFO
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return LogLevel.INFO;
  return LEVEL_ALIASES[level.trim().toLowerCase()] ?? LogLevel.INFO;
}

export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Set the level from LOG_LEVEL or EEG_LOG_LEVEL
 */
export function configureFromEnvironment(env: Record<string, string | undefined> = process.env): void {
  const envLevel = env.LOG_LEVEL || env.EEG_LOG_LEVEL;
  if (envLevel) {
    globalConfig.minLevel = parseLogLevel(envLevel);
  }
}

export function setLogLevel(level: LogLevel | LogLevelName): void {
  globalConfig.minLevel = typeof level === 'string' ? parseLogLevel(level) : level;
}

export function getLogLevel(): LogLevel {
  return globalConfig.minLevel;
}

function formatLogEntry(entry: LogEntry, includeTimestamp: boolean): string {
  const parts: string[] = [];

  if (includeTimestamp) {
    parts.push(`[${entry.timestamp}]`);
  }
  parts.push(`[${entry.level.toUpperCase()}]`, `[${entry.module}]`, entry.message);

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }

  return parts.join(' ');
}

function consoleOutput(entry: LogEntry, config: LoggerConfig): void {
  const output = config.jsonOutput
    ? JSON.stringify({ ...entry, error: entry.error?.message })
    : formatLogEntry(entry, config.includeTimestamp ?? true);

  switch (entry.level) {
    case 'error':
      console.error(output);
      if (entry.error && !config.jsonOutput) {
        console.error(entry.error);
      }
      break;
    case 'warn':
      console.warn(output);
      break;
    case 'debug':
      console.debug(output);
      break;
    default:
      console.log(output);
  }
}

/**
 * Module-specific logger.
 *
 * Overrides passed to the constructor are fixed; everything else follows the
 * global configuration at the time of each call, so `setLogLevel` also
 * affects loggers created at import time.
 */
export class Logger {
  constructor(
    private readonly module: string,
    private readonly overrides: Partial<LoggerConfig> = {},
    private readonly fixedContext: LogContext = {}
  ) {}

  private get config(): LoggerConfig {
    return { ...globalConfig, ...this.overrides };
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    const config = this.config;
    if (level < config.minLevel) return;

    const merged = { ...this.fixedContext, ...context };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      module: this.module,
      message,
      context: Object.keys(merged).length > 0 ? merged : undefined,
      error,
    };

    if (config.outputHandler) {
      config.outputHandler(entry);
    } else {
      consoleOutput(entry, config);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Logger for a sub-module, e.g. `preprocess:filter`
   */
  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`, this.overrides, this.fixedContext);
  }

  /**
   * Logger that adds `context` to every entry
   */
  withContext(context: LogContext): Logger {
    return new Logger(this.module, this.overrides, { ...this.fixedContext, ...context });
  }
}

export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger(module, config);
}

/**
 * Logger that never outputs (for tests)
 */
export function createSilentLogger(module: string): Logger {
  return new Logger(module, { minLevel: LogLevel.SILENT });
}

configureFromEnvironment();
