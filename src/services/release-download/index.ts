export type {
  ArtifactTransfer,
  BatchDownloadOptions,
  BatchDownloadResult,
  DownloadFailure,
  DownloadOutcome,
  DownloadProgress,
  DownloadProgressCallback,
  DownloadWarning,
  DownloadWarningKind,
  ExtractionResult,
  PathResult,
  PlacementResult,
  ReleaseDownloadResult,
  ReleaseSource,
  TransferOptions,
  TransferResult,
} from "./types";
export { BufferedTransfer, type BufferedTransferOptions } from "./buffered-transfer";
export {
  DefaultDownloadOrchestrator,
  withDeadline,
  type DownloadOrchestrator,
} from "./download-orchestrator";
export {
  DefaultArchiveExtractor,
  resolveArchiveKind,
  type ArchiveExtractor,
  type ArchiveKind,
} from "./archive-extractor";
export { DefaultFilePlacement, type FilePlacement } from "./file-placement";
export { DefaultVersionTracker, type VersionTracker } from "./version-tracker";
export { createProgressReporter, readableBytesMb, type ProgressSink } from "./progress";
export { ReleaseDownloader, type ReleaseDownloaderDeps } from "./release-downloader";
export {
  createReleaseDownloader,
  type CreateReleaseDownloaderOptions,
} from "./create-release-downloader";
