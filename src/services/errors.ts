/**
 * Service error definitions.
 *
 * Every failure surfaced by the library is a ServiceError subclass with a
 * `type` discriminator, so callers can branch on `error.type` (or use
 * instanceof) without parsing messages.
 */

import type { FileSystemErrorCode } from "./platform/filesystem";

/**
 * Error codes for release catalog transport failures.
 */
export type CatalogErrorCode = "NETWORK_ERROR" | "HTTP_ERROR" | "INVALID_RESPONSE";

/**
 * Error codes for artifact downloads.
 */
export type DownloadErrorCode =
  | "NETWORK_ERROR"
  | "HTTP_ERROR"
  | "WRITE_FAILED"
  | "ABORTED"
  | "ALL_FAILED"
  | "NO_ARTIFACTS";

/**
 * Error codes for archive extraction operations.
 */
export type ArchiveErrorCode =
  | "INVALID_ARCHIVE"
  | "EXTRACTION_FAILED"
  | "PERMISSION_DENIED"
  | "UNSUPPORTED_FORMAT";

/**
 * Error codes for moving files into place.
 */
export type PlacementErrorCode = "SOURCE_MISSING" | "PREPARE_FAILED" | "COPY_FAILED";

/**
 * Serialized error format, used for structured output.
 */
export interface SerializedError {
  readonly type:
    | "release-not-found"
    | "catalog"
    | "download"
    | "archive"
    | "placement"
    | "filesystem"
    | "config";
  readonly message: string;
  readonly code?: string;
  readonly path?: string;
}

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: SerializedError["type"];
  readonly code: string | undefined;

  constructor(message: string, code?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    const result: SerializedError = {
      type: this.type,
      message: this.message,
    };
    if (this.code !== undefined) {
      return { ...result, code: this.code };
    }
    return result;
  }
}

/**
 * The catalog has no release for the repository, or no release with the
 * requested tag. Distinct from CatalogError so callers can fall back to the
 * source archive.
 */
export class ReleaseNotFoundError extends ServiceError {
  readonly type = "release-not-found" as const;

  constructor(
    readonly owner: string,
    readonly repo: string,
    readonly tag?: string
  ) {
    super(
      tag === undefined
        ? `Repository ${owner}/${repo} has no releases`
        : `Repository ${owner}/${repo} has no release tagged ${tag}`
    );
    this.name = "ReleaseNotFoundError";
  }
}

/**
 * Transport failure while talking to the release catalog.
 */
export class CatalogError extends ServiceError {
  readonly type = "catalog" as const;
  /** HTTP status, when the catalog answered with one */
  readonly status: number | undefined;

  constructor(
    message: string,
    readonly errorCode: CatalogErrorCode,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, errorCode, options);
    this.name = "CatalogError";
    this.status = options?.status;
  }
}

/**
 * Error from downloading an artifact or a batch of artifacts.
 */
export class DownloadError extends ServiceError {
  readonly type = "download" as const;
  readonly status: number | undefined;

  constructor(
    message: string,
    readonly errorCode: DownloadErrorCode,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, errorCode, options);
    this.name = "DownloadError";
    this.status = options?.status;
  }
}

/**
 * Error from archive extraction operations (zip, tar.gz, gz).
 */
export class ArchiveError extends ServiceError {
  readonly type = "archive" as const;

  constructor(
    message: string,
    readonly errorCode: ArchiveErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, errorCode, options);
    this.name = "ArchiveError";
  }
}

/**
 * Error from moving a file or directory to its final location.
 */
export class PlacementError extends ServiceError {
  readonly type = "placement" as const;

  constructor(
    message: string,
    readonly errorCode: PlacementErrorCode,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, errorCode, options);
    this.name = "PlacementError";
  }

  override toJSON(): SerializedError {
    return {
      type: this.type,
      message: this.message,
      path: this.path,
      code: this.errorCode,
    };
  }
}

/**
 * Invalid configuration value.
 */
export class ConfigError extends ServiceError {
  readonly type = "config" as const;

  constructor(message: string) {
    super(message, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  readonly type = "filesystem" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    /** Original error for debugging */
    cause?: Error,
    /** Original Node.js error code (e.g., "EXDEV", "ENOSPC") */
    readonly originalCode?: string
  ) {
    super(message, fsCode, cause === undefined ? undefined : { cause });
    this.name = "FileSystemError";
  }

  override toJSON(): SerializedError {
    return {
      type: this.type,
      message: this.message,
      path: this.path,
      code: this.fsCode,
    };
  }
}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

/**
 * Extract a message string from an unknown error.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
