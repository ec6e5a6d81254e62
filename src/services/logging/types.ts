/**
 * Logging types and interfaces.
 *
 * Services never talk to electron-log directly; they receive a Logger through
 * their constructor so tests can swap in a mock or behavioral logger.
 */

/**
 * Log levels in order of verbosity (most verbose to least).
 */
export const LogLevel = {
  silly: "silly",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Valid logger names (scopes).
 */
export type LoggerName =
  | "catalog" // GitHubReleaseCatalog, release resolution
  | "download" // BufferedTransfer, DownloadOrchestrator
  | "archive" // DefaultArchiveExtractor
  | "fs" // DefaultFileSystemLayer, file placement, version tracking
  | "network" // DefaultNetworkLayer
  | "config" // configuration resolution
  | "client"; // ReleaseDownloader

/**
 * Context data for log entries.
 * Primitives only, so every entry can be rendered as key=value pairs.
 */
export type LogContext = Record<string, string | number | boolean | null>;

/**
 * Logger interface for dependency injection.
 *
 * @example
 * ```typescript
 * class MyService {
 *   constructor(private readonly logger: Logger) {}
 *
 *   async run(): Promise<void> {
 *     this.logger.debug("Starting", { tag: "v1.2.0" });
 *   }
 * }
 * ```
 */
export interface Logger {
  /** Per-chunk or per-entry detail. */
  silly(message: string, context?: LogContext): void;

  debug(message: string, context?: LogContext): void;

  /** Significant operations (downloads started and finished, files placed). */
  info(message: string, context?: LogContext): void;

  /** Recoverable issues; the operation continues. */
  warn(message: string, context?: LogContext): void;

  /**
   * @param error - Optional Error object for stack trace inclusion
   */
  error(message: string, context?: LogContext, error?: Error): void;
}

/**
 * Creates named loggers.
 */
export interface LoggingService {
  /**
   * Create a logger with the specified name (scope).
   * The name appears in log output to identify the source.
   */
  createLogger(name: LoggerName): Logger;

  /**
   * Drop cached loggers.
   */
  dispose(): void;
}

/**
 * Log a message at a level chosen at runtime.
 */
export function logAtLevel(
  logger: Logger,
  level: LogLevel,
  message: string,
  context?: LogContext
): void {
  logger[level](message, context);
}
