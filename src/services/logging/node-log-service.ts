/**
 * NodeLogService - logging implementation using electron-log's Node.js entry.
 *
 * Features:
 * - Named logger scopes for component identification
 * - Context serialization as key=value pairs
 * - Environment variable configuration for level, console output and filtering
 * - Optional session-based log files: `<datetime>-<uuid>.log`
 */

import log from "electron-log/node";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types";
import { LogLevel as LogLevelValues } from "./types";

type LogScope = ReturnType<typeof log.scope>;

const LOG_FORMAT = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";

/**
 * Environment variables read by NodeLogService.
 */
export const LOG_ENV = {
  level: "RELEASE_FETCH_LOGLEVEL",
  printLogs: "RELEASE_FETCH_PRINT_LOGS",
  logger: "RELEASE_FETCH_LOGGER",
  logDir: "RELEASE_FETCH_LOG_DIR",
} as const;

export interface NodeLogServiceOptions {
  /** Level to use. Overrides RELEASE_FETCH_LOGLEVEL and `defaultLevel`. */
  readonly level?: LogLevel;
  /** Level used when RELEASE_FETCH_LOGLEVEL is unset or invalid. Defaults to "warn". */
  readonly defaultLevel?: LogLevel;
  /** Directory for session log files. Overrides RELEASE_FETCH_LOG_DIR. */
  readonly logDir?: string;
  /** Always print to the console, regardless of RELEASE_FETCH_PRINT_LOGS. */
  readonly console?: boolean;
  /** Environment to read from. Defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Format context object as key=value pairs for log message.
 */
function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => (value === null ? `${key}=null` : `${key}=${String(value)}`))
    .join(" ");
}

function withContext(message: string, context: LogContext | undefined): string {
  const contextStr = formatContext(context);
  return contextStr ? `${message} ${contextStr}` : message;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LogLevelValues, value);
}

/**
 * Parse and validate the log level environment variable.
 *
 * @returns Valid log level or undefined if unset or invalid
 */
export function parseLogLevel(envValue: string | undefined): LogLevel | undefined {
  if (!envValue) return undefined;
  const normalized = envValue.toLowerCase().trim();
  return isLogLevel(normalized) ? normalized : undefined;
}

/**
 * Parse the comma-separated logger filter.
 *
 * @returns Set of allowed names, or undefined when every logger is allowed
 */
export function parseLoggerFilter(envValue: string | undefined): Set<string> | undefined {
  if (!envValue) return undefined;
  const names = envValue
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  if (names.length === 0) return undefined;
  return new Set(names);
}

/**
 * Session-based log filename: YYYY-MM-DDTHH-MM-SS-<uuid>.log
 */
function generateSessionFilename(): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-").slice(0, 19);
  const uuid = randomUUID().slice(0, 8);
  return `${timestamp}-${uuid}.log`;
}

/**
 * Logger implementation wrapping an electron-log scope.
 * Loggers excluded by the filter drop every message.
 */
class ScopedLogger implements Logger {
  constructor(
    private readonly scope: LogScope,
    private readonly enabled: boolean
  ) {}

  silly(message: string, context?: LogContext): void {
    if (this.enabled) this.scope.silly(withContext(message, context));
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled) this.scope.debug(withContext(message, context));
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled) this.scope.info(withContext(message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled) this.scope.warn(withContext(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (!this.enabled) return;
    if (error) {
      this.scope.error(withContext(message, context), error);
    } else {
      this.scope.error(withContext(message, context));
    }
  }
}

/**
 * Logging service backed by electron-log.
 *
 * Configuration:
 * - Level: `level` option, else RELEASE_FETCH_LOGLEVEL, else `defaultLevel` ("warn")
 * - Console output: `console` option or RELEASE_FETCH_PRINT_LOGS (any non-empty value)
 * - File output: `logDir` option or RELEASE_FETCH_LOG_DIR; disabled when neither is set
 * - Filtering: RELEASE_FETCH_LOGGER (comma-separated logger names)
 *
 * @example
 * ```typescript
 * const logging = new NodeLogService({ console: true });
 * const logger = logging.createLogger("download");
 * logger.info("Downloaded", { name: "tool-linux-amd64.tar.gz", bytes: 1024 });
 * // [2025-01-02 10:30:00.123] [info] [download] Downloaded name=tool-linux-amd64.tar.gz bytes=1024
 * ```
 */
export class NodeLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly logLevel: LogLevel;
  private readonly allowedLoggers: Set<string> | undefined;

  constructor(options: NodeLogServiceOptions = {}) {
    const env = options.env ?? process.env;

    this.logLevel =
      options.level ?? parseLogLevel(env[LOG_ENV.level]) ?? options.defaultLevel ?? "warn";
    this.allowedLoggers = parseLoggerFilter(env[LOG_ENV.logger]);

    const enableConsole = options.console ?? !!env[LOG_ENV.printLogs];
    log.transports.console.level = enableConsole ? this.logLevel : false;
    log.transports.console.format = LOG_FORMAT;

    const logDir = options.logDir ?? env[LOG_ENV.logDir];
    if (logDir) {
      const filename = generateSessionFilename();
      log.transports.file.resolvePathFn = (): string => join(logDir, filename);
      log.transports.file.level = this.logLevel;
      log.transports.file.format = LOG_FORMAT;
    } else {
      log.transports.file.level = false;
    }
  }

  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const enabled = this.allowedLoggers === undefined || this.allowedLoggers.has(name);
    const logger = new ScopedLogger(log.scope(`[${name}]`), enabled);
    this.loggers.set(name, logger);
    return logger;
  }

  dispose(): void {
    this.loggers.clear();
  }
}
