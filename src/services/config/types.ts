/**
 * Configuration types for the release downloader.
 */

import type { LogLevel } from "../logging";

/**
 * Fully resolved configuration. Every field has a value after
 * resolveConfig(); optional fields stay undefined when unset.
 */
export interface DownloaderConfig {
  /** Maximum number of artifacts transferred at the same time */
  readonly concurrency: number;
  /** Size of the write buffer per transfer, in bytes */
  readonly bufferSize: number;
  /** Deadline for a whole batch of downloads, in milliseconds */
  readonly timeoutMs: number;
  /** Where downloads, extracted output and version records live */
  readonly cacheDir: string;
  /** Final location for results. Unset: results stay in cacheDir */
  readonly targetDir: string | undefined;
  /** Unpack zip / tar.gz / gz artifacts after download */
  readonly autoExtract: boolean;
  /** Fetch the tagged source archive when a release has no artifacts */
  readonly downloadSource: boolean;
  /** Skip downloads when the recorded tag matches the latest release */
  readonly checkLatest: boolean;
  /** Draw a progress line per artifact on stderr */
  readonly showProgress: boolean;
  /** Bearer token for the catalog API */
  readonly accessToken: string | undefined;
  /** Catalog API root, e.g. https://api.github.com */
  readonly apiBaseUrl: string;
  /** Web root used for source archive URLs, e.g. https://github.com */
  readonly webBaseUrl: string;
  /** User-Agent sent with every request */
  readonly userAgent: string;
  readonly logLevel: LogLevel;
  /** Directory for session log files. Unset: no log file */
  readonly logDir: string | undefined;
  /** Print log lines to the console */
  readonly printLogs: boolean;
}

/**
 * Caller-supplied configuration. Anything left out takes the environment
 * value or the default.
 */
export type DownloaderOptions = Partial<DownloaderConfig>;

export const DEFAULT_CONCURRENCY = 5;
export const DEFAULT_BUFFER_SIZE = 8 * 1024 * 1024;
export const DEFAULT_TIMEOUT_MS = 30 * 60 * 1000;

/**
 * Defaults for everything except cacheDir, which depends on the platform.
 */
export const DEFAULT_DOWNLOADER_CONFIG: Omit<DownloaderConfig, "cacheDir"> = {
  concurrency: DEFAULT_CONCURRENCY,
  bufferSize: DEFAULT_BUFFER_SIZE,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  targetDir: undefined,
  autoExtract: false,
  downloadSource: true,
  checkLatest: true,
  showProgress: false,
  accessToken: undefined,
  apiBaseUrl: "https://api.github.com",
  webBaseUrl: "https://github.com",
  userAgent: "release-fetch",
  logLevel: "info",
  logDir: undefined,
  printLogs: false,
};

/**
 * Environment variables read by resolveConfig().
 */
export const CONFIG_ENV = {
  cacheDir: "RELEASE_FETCH_CACHE_DIR",
  token: "RELEASE_FETCH_TOKEN",
  githubToken: "GITHUB_TOKEN",
  logLevel: "RELEASE_FETCH_LOGLEVEL",
  logDir: "RELEASE_FETCH_LOG_DIR",
  printLogs: "RELEASE_FETCH_PRINT_LOGS",
  xdgCacheHome: "XDG_CACHE_HOME",
  localAppData: "LOCALAPPDATA",
} as const;
