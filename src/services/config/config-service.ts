/**
 * Configuration resolution.
 *
 * Precedence: explicit options > environment > defaults. The merged result
 * is validated with zod; invalid values raise ConfigError.
 */

import { z } from "zod";
import { join, resolve } from "node:path";
import { ConfigError } from "../errors";
import { parseLogLevel } from "../logging/node-log-service";
import type { PlatformInfo } from "../platform/platform-info";
import { createPlatformInfo } from "../platform/platform-info";
import type { DownloaderConfig, DownloaderOptions } from "./types";
import { CONFIG_ENV, DEFAULT_DOWNLOADER_CONFIG } from "./types";

const APP_DIR_NAME = "release-fetch";

/** Longest delay a Node.js timer accepts; larger values fire at once */
const MAX_TIMEOUT_MS = 2_147_483_647;

const configSchema = z.object({
  concurrency: z.number().int().min(1, "concurrency must be at least 1"),
  bufferSize: z.number().int().min(1, "bufferSize must be at least 1 byte"),
  timeoutMs: z
    .number()
    .int()
    .min(1, "timeoutMs must be positive")
    .max(MAX_TIMEOUT_MS, `timeoutMs must not exceed ${MAX_TIMEOUT_MS} ms`),
  cacheDir: z.string().min(1, "cacheDir must not be empty"),
  targetDir: z.string().min(1, "targetDir must not be empty").optional(),
  autoExtract: z.boolean(),
  downloadSource: z.boolean(),
  checkLatest: z.boolean(),
  showProgress: z.boolean(),
  accessToken: z.string().optional(),
  apiBaseUrl: z.string().url(),
  webBaseUrl: z.string().url(),
  userAgent: z.string().min(1),
  logLevel: z.enum(["silly", "debug", "info", "warn", "error"]),
  logDir: z.string().min(1).optional(),
  printLogs: z.boolean(),
});

/**
 * Per-user cache directory.
 *
 * - XDG_CACHE_HOME/release-fetch when set
 * - %LOCALAPPDATA%\release-fetch\cache on Windows
 * - ~/.cache/release-fetch otherwise
 */
export function defaultCacheDir(env: NodeJS.ProcessEnv, platformInfo: PlatformInfo): string {
  const xdg = env[CONFIG_ENV.xdgCacheHome];
  if (xdg) {
    return join(xdg, APP_DIR_NAME);
  }
  const localAppData = env[CONFIG_ENV.localAppData];
  if (platformInfo.platform === "win32" && localAppData) {
    return join(localAppData, APP_DIR_NAME, "cache");
  }
  return join(platformInfo.homeDir, ".cache", APP_DIR_NAME);
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Merge options, environment and defaults into a validated configuration.
 *
 * @throws ConfigError when a value is out of range or malformed
 *
 * @example
 * const config = resolveConfig({ autoExtract: true, targetDir: "./bin" });
 */
export function resolveConfig(
  options: DownloaderOptions = {},
  env: NodeJS.ProcessEnv = process.env,
  platformInfo: PlatformInfo = createPlatformInfo()
): DownloaderConfig {
  const defaults = DEFAULT_DOWNLOADER_CONFIG;

  const merged: DownloaderConfig = {
    concurrency: options.concurrency ?? defaults.concurrency,
    bufferSize: options.bufferSize ?? defaults.bufferSize,
    timeoutMs: options.timeoutMs ?? defaults.timeoutMs,
    cacheDir:
      options.cacheDir ?? (env[CONFIG_ENV.cacheDir] || defaultCacheDir(env, platformInfo)),
    targetDir: options.targetDir,
    autoExtract: options.autoExtract ?? defaults.autoExtract,
    downloadSource: options.downloadSource ?? defaults.downloadSource,
    checkLatest: options.checkLatest ?? defaults.checkLatest,
    showProgress: options.showProgress ?? defaults.showProgress,
    accessToken:
      options.accessToken ??
      (env[CONFIG_ENV.token] || env[CONFIG_ENV.githubToken] || defaults.accessToken),
    apiBaseUrl: stripTrailingSlash(options.apiBaseUrl ?? defaults.apiBaseUrl),
    webBaseUrl: stripTrailingSlash(options.webBaseUrl ?? defaults.webBaseUrl),
    userAgent: options.userAgent ?? defaults.userAgent,
    logLevel: options.logLevel ?? parseLogLevel(env[CONFIG_ENV.logLevel]) ?? defaults.logLevel,
    logDir: options.logDir ?? (env[CONFIG_ENV.logDir] || defaults.logDir),
    printLogs: options.printLogs ?? (!!env[CONFIG_ENV.printLogs] || defaults.printLogs),
  };

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${message}`);
  }

  return {
    ...merged,
    cacheDir: resolve(merged.cacheDir),
    targetDir: merged.targetDir === undefined ? undefined : resolve(merged.targetDir),
    logDir: merged.logDir === undefined ? undefined : resolve(merged.logDir),
  };
}
