/**
 * Default wiring of a ReleaseDownloader.
 */

import { resolve } from "node:path";
import { resolveConfig, type DownloaderOptions } from "../config";
import { NodeLogService, type LoggingService } from "../logging";
import { DefaultNetworkLayer, type HttpClient } from "../platform/network";
import { DefaultFileSystemLayer } from "../platform/filesystem";
import {
  createPlatformInfo,
  toPlatformKey,
  type PlatformInfo,
} from "../platform/platform-info";
import { GitHubReleaseCatalog } from "../release-catalog/github-release-catalog";
import { ReleaseResolver } from "../release-catalog/release-resolver";
import { DefaultArchiveExtractor } from "./archive-extractor";
import { BufferedTransfer } from "./buffered-transfer";
import { DefaultDownloadOrchestrator } from "./download-orchestrator";
import { DefaultFilePlacement } from "./file-placement";
import { createProgressReporter } from "./progress";
import { ReleaseDownloader } from "./release-downloader";
import { DefaultVersionTracker } from "./version-tracker";

/** Header timeout for catalog and download requests */
const REQUEST_TIMEOUT_MS = 30_000;

export interface CreateReleaseDownloaderOptions extends DownloaderOptions {
  /** Default: a NodeLogService configured from the options */
  readonly loggingService?: LoggingService;
  /** Default: DefaultNetworkLayer on the global fetch */
  readonly httpClient?: HttpClient;
  /** Environment read for defaults. Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
  /** Default: the running platform */
  readonly platformInfo?: PlatformInfo;
}

/**
 * Resolve the configuration, build every collaborator and create the cache
 * and target directories.
 *
 * @throws ConfigError when an option is invalid
 * @throws FileSystemError when a directory cannot be created
 *
 * @example
 * const downloader = await createReleaseDownloader({ autoExtract: true, targetDir: "./bin" });
 * const result = await downloader.downloadLatestRelease("acme", "widget");
 * if (result.kind === "downloaded") {
 *   console.log(result.path);
 * }
 */
export async function createReleaseDownloader(
  options: CreateReleaseDownloaderOptions = {}
): Promise<ReleaseDownloader> {
  const { loggingService: injectedLogging, httpClient: injectedHttp, env, platformInfo, ...rest } =
    options;
  const environment = env ?? process.env;
  const platform = platformInfo ?? createPlatformInfo();
  const config = resolveConfig(rest, environment, platform);

  const loggingService =
    injectedLogging ??
    new NodeLogService({
      level: config.logLevel,
      console: config.printLogs,
      env: environment,
      ...(config.logDir === undefined ? {} : { logDir: config.logDir }),
    });

  const configLogger = loggingService.createLogger("config");
  const catalogLogger = loggingService.createLogger("catalog");
  const downloadLogger = loggingService.createLogger("download");
  const fsLogger = loggingService.createLogger("fs");

  configLogger.debug("Configuration resolved", {
    cacheDir: config.cacheDir,
    targetDir: config.targetDir ?? null,
    concurrency: config.concurrency,
    bufferSize: config.bufferSize,
    timeoutMs: config.timeoutMs,
    autoExtract: config.autoExtract,
    downloadSource: config.downloadSource,
    checkLatest: config.checkLatest,
    authenticated: config.accessToken !== undefined,
  });

  const httpClient =
    injectedHttp ??
    new DefaultNetworkLayer(loggingService.createLogger("network"), {
      defaultTimeout: REQUEST_TIMEOUT_MS,
      defaultHeaders: { "User-Agent": config.userAgent },
    });
  const fileSystem = new DefaultFileSystemLayer(fsLogger);

  await fileSystem.mkdir(config.cacheDir, { recursive: true });
  if (config.targetDir !== undefined && resolve(config.targetDir) !== resolve(config.cacheDir)) {
    await fileSystem.mkdir(config.targetDir, { recursive: true });
  }

  const catalog = new GitHubReleaseCatalog(httpClient, catalogLogger, {
    apiBaseUrl: config.apiBaseUrl,
    accessToken: config.accessToken,
    requestTimeoutMs: REQUEST_TIMEOUT_MS,
  });
  const transfer = new BufferedTransfer(httpClient, downloadLogger, {
    bufferSize: config.bufferSize,
    requestTimeoutMs: REQUEST_TIMEOUT_MS,
  });

  return new ReleaseDownloader({
    config,
    resolver: new ReleaseResolver(catalog, catalogLogger, { webBaseUrl: config.webBaseUrl }),
    orchestrator: new DefaultDownloadOrchestrator(transfer, downloadLogger),
    transfer,
    extractor: new DefaultArchiveExtractor(loggingService.createLogger("archive")),
    placement: new DefaultFilePlacement(fileSystem, fsLogger),
    versionTracker: new DefaultVersionTracker(fileSystem, fsLogger, config.cacheDir),
    fileSystem,
    platform: toPlatformKey(platform),
    logger: loggingService.createLogger("client"),
    loggingService,
    ...(config.showProgress ? { onProgress: createProgressReporter() } : {}),
  });
}
