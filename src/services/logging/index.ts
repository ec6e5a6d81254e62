export type { Logger, LoggerName, LoggingService, LogContext } from "./types";
export { LogLevel, logAtLevel } from "./types";
export { NodeLogService, LOG_ENV, type NodeLogServiceOptions } from "./node-log-service";
