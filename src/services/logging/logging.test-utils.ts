/**
 * Logger doubles for tests: spy-based mocks, a silent logger and a
 * behavioral logger that records messages.
 */

import { vi, type Mock } from "vitest";
import type { Logger, LoggerName, LoggingService, LogContext } from "./types";

/**
 * Mock logger with vitest spy methods.
 * All method calls are recorded for assertion.
 */
export interface MockLogger extends Logger {
  silly: Mock<(message: string, context?: LogContext) => void>;
  debug: Mock<(message: string, context?: LogContext) => void>;
  info: Mock<(message: string, context?: LogContext) => void>;
  warn: Mock<(message: string, context?: LogContext) => void>;
  error: Mock<(message: string, context?: LogContext, error?: Error) => void>;
}

/**
 * Mock logging service with vitest spy methods.
 * Tracks all loggers created via `getCreatedLoggers()`.
 */
export interface MockLoggingService extends LoggingService {
  createLogger: Mock<(name: LoggerName) => Logger>;
  dispose: Mock<() => void>;

  /**
   * Get all logger names that were requested via createLogger().
   */
  getCreatedLoggerNames(): LoggerName[];

  /**
   * Get the mock logger instance for a specific name.
   * Returns undefined if that logger was never created.
   */
  getLogger(name: LoggerName): MockLogger | undefined;
}

/**
 * Create a mock logger with vitest spy methods.
 *
 * @returns Mock logger that records all calls
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * const tracker = new DefaultVersionTracker(fs, logger, cacheDir);
 *
 * await tracker.record("acme", "widget", "v1.0.0");
 *
 * expect(logger.debug).toHaveBeenCalledWith("Recorded version", expect.anything());
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    silly: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Create a mock logging service with vitest spy methods.
 *
 * @returns Mock logging service that tracks created loggers
 *
 * @example
 * ```typescript
 * const loggingService = createMockLoggingService();
 * const client = await createReleaseDownloader({ loggingService });
 *
 * expect(loggingService.getCreatedLoggerNames()).toContain("download");
 * ```
 */
export function createMockLoggingService(): MockLoggingService {
  const loggers = new Map<LoggerName, MockLogger>();

  const service: MockLoggingService = {
    createLogger: vi.fn((name: LoggerName): Logger => {
      const existing = loggers.get(name);
      if (existing) {
        return existing;
      }
      const logger = createMockLogger();
      loggers.set(name, logger);
      return logger;
    }),

    dispose: vi.fn(),

    getCreatedLoggerNames(): LoggerName[] {
      return Array.from(loggers.keys());
    },

    getLogger(name: LoggerName): MockLogger | undefined {
      return loggers.get(name);
    },
  };

  return service;
}

/**
 * Create a silent no-op logger.
 * Useful when you don't want to assert on log calls.
 *
 * @returns Logger that does nothing
 */
export function createSilentLogger(): Logger {
  return {
    silly: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}

// ============================================================================
// Behavioral Logger Mock
// ============================================================================

/**
 * Logged message type for behavioral testing.
 */
export interface LoggedMessage {
  readonly level: "silly" | "debug" | "info" | "warn" | "error";
  readonly message: string;
  readonly context?: LogContext | undefined;
}

/**
 * Behavioral logger that stores messages for verification.
 * Use this to verify logged output in integration tests.
 */
export interface BehavioralLogger extends Logger {
  /**
   * Get all logged messages.
   */
  getMessages(): readonly LoggedMessage[];

  /**
   * Get messages filtered by level.
   */
  getMessagesByLevel(level: LoggedMessage["level"]): readonly LoggedMessage[];

  /**
   * Clear all logged messages.
   */
  clear(): void;
}

/**
 * Create a logger that stores messages, for asserting on what was logged.
 *
 * @example
 * ```typescript
 * const logger = createBehavioralLogger();
 * const extractor = new DefaultArchiveExtractor(logger);
 *
 * await extractor.extract(archivePath);
 *
 * expect(logger.getMessagesByLevel("warn")).toHaveLength(0);
 * ```
 */
export function createBehavioralLogger(): BehavioralLogger {
  const messages: LoggedMessage[] = [];

  return {
    silly: (message: string, context?: LogContext) => {
      messages.push({ level: "silly", message, context });
    },
    debug: (message: string, context?: LogContext) => {
      messages.push({ level: "debug", message, context });
    },
    info: (message: string, context?: LogContext) => {
      messages.push({ level: "info", message, context });
    },
    warn: (message: string, context?: LogContext) => {
      messages.push({ level: "warn", message, context });
    },
    error: (message: string, context?: LogContext) => {
      messages.push({ level: "error", message, context });
    },
    getMessages: () => [...messages],
    getMessagesByLevel: (level) => messages.filter((m) => m.level === level),
    clear: () => {
      messages.length = 0;
    },
  };
}
