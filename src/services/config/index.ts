/**
 * Configuration module.
 */

export { resolveConfig, defaultCacheDir } from "./config-service";
export {
  type DownloaderConfig,
  type DownloaderOptions,
  CONFIG_ENV,
  DEFAULT_DOWNLOADER_CONFIG,
} from "./types";
