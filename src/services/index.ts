/**
 * Public API exports for the services layer.
 */

// Error types
export {
  ServiceError,
  ReleaseNotFoundError,
  CatalogError,
  DownloadError,
  ArchiveError,
  PlacementError,
  ConfigError,
  FileSystemError,
  isServiceError,
  getErrorMessage,
} from "./errors";
export type {
  SerializedError,
  CatalogErrorCode,
  DownloadErrorCode,
  ArchiveErrorCode,
  PlacementErrorCode,
} from "./errors";

// Configuration
export * from "./config";

// Logging
export * from "./logging";

// Platform abstractions
export type { HttpClient, HttpRequestOptions, NetworkLayerConfig } from "./platform/network";
export { DefaultNetworkLayer } from "./platform/network";
export type { FileSystemLayer, FileSystemErrorCode } from "./platform/filesystem";
export { DefaultFileSystemLayer } from "./platform/filesystem";
export type { PlatformInfo, PlatformKey } from "./platform/platform-info";
export { createPlatformInfo, toPlatformKey } from "./platform/platform-info";

// Release catalog
export * from "./release-catalog";

// Downloads
export * from "./release-download";
