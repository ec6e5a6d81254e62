/**
 * Types for release downloads.
 */

import type { Artifact } from "../release-catalog/types";

/**
 * Progress information for a single transfer.
 * Reported only when the server announced the body size.
 */
export interface DownloadProgress {
  /** Number of bytes written so far */
  readonly bytesDownloaded: number;
  /** Total bytes announced by Content-Length */
  readonly totalBytes: number;
}

export type DownloadProgressCallback = (progress: DownloadProgress) => void;

/**
 * Kinds of non-fatal problems reported alongside a successful result.
 */
export type DownloadWarningKind =
  | "platform-fallback" // no artifact matched the platform, the first was taken
  | "partial-download" // some artifacts of a batch failed
  | "extraction" // archive could not be unpacked, the archive is kept
  | "placement" // result could not be moved to the target directory
  | "symlink" // symbolic link inside an archive was skipped
  | "hardlink" // hard link inside an archive was skipped
  | "chmod" // permission bits could not be applied
  | "cleanup" // a leftover file could not be removed
  | "version-record"; // the fetched tag could not be recorded

export interface DownloadWarning {
  readonly kind: DownloadWarningKind;
  readonly message: string;
  /** File the warning is about, when there is one */
  readonly path?: string;
}

/**
 * A path plus the warnings collected while producing it.
 * Returned by extraction and placement.
 */
export interface PathResult {
  readonly path: string;
  readonly warnings: readonly DownloadWarning[];
}

export type ExtractionResult = PathResult;

export type PlacementResult = PathResult;

// ============================================================================
// Transfers
// ============================================================================

export interface TransferOptions {
  /** Cancels the request and the body read */
  readonly signal?: AbortSignal;
  readonly onProgress?: DownloadProgressCallback;
}

export interface TransferResult {
  readonly path: string;
  readonly bytesWritten: number;
  readonly durationMs: number;
}

/**
 * Streams one URL into one file.
 */
export interface ArtifactTransfer {
  /**
   * @throws DownloadError with code NETWORK_ERROR, HTTP_ERROR, ABORTED or WRITE_FAILED
   */
  transfer(url: string, destinationPath: string, options?: TransferOptions): Promise<TransferResult>;
}

// ============================================================================
// Batches
// ============================================================================

export interface BatchDownloadOptions {
  /** Maximum concurrent transfers */
  readonly concurrency: number;
  /** Deadline for the whole batch */
  readonly timeoutMs: number;
  /** Directory receiving `<destinationDir>/<artifact name>` */
  readonly destinationDir: string;
  /** Progress per artifact */
  readonly onProgress?: (artifact: Artifact, progress: DownloadProgress) => void;
}

export interface DownloadFailure {
  readonly artifact: Artifact;
  readonly error: Error;
}

export type DownloadOutcome =
  | { readonly artifact: Artifact; readonly path: string }
  | DownloadFailure;

export interface BatchDownloadResult {
  /** Downloaded files, in completion order */
  readonly paths: readonly string[];
  /** Artifacts that failed, in completion order */
  readonly failures: readonly DownloadFailure[];
}

// ============================================================================
// Client results
// ============================================================================

export type ReleaseSource = "assets" | "source-archive";

export type ReleaseDownloadResult =
  | {
      /** The recorded tag matches the latest release; nothing was fetched */
      readonly kind: "up-to-date";
      readonly tag: string;
    }
  | {
      readonly kind: "downloaded";
      /** File or directory holding the result */
      readonly path: string;
      readonly tag: string;
      readonly source: ReleaseSource;
      readonly warnings: readonly DownloadWarning[];
      readonly failures: readonly DownloadFailure[];
    };
