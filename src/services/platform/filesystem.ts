/**
 * FileSystemLayer - Abstraction over filesystem operations.
 *
 * Provides an injectable interface for filesystem access, enabling:
 * - Unit testing of services with a FileSystemLayer that injects failures
 * - Boundary testing of DefaultFileSystemLayer against the real filesystem
 * - Consistent error handling via FileSystemError
 */

import * as fs from "node:fs/promises";
import { createReadStream, createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { FileSystemError } from "../errors";
import type { Logger } from "../logging";

/**
 * Directory entry returned by readdir.
 */
export interface DirEntry {
  /** Entry name (not full path) */
  readonly name: string;
  readonly isDirectory: boolean;
  readonly isFile: boolean;
  readonly isSymbolicLink: boolean;
}

/**
 * Result of lstat. Symbolic links are reported as links, not followed.
 */
export interface FileStat {
  readonly isDirectory: boolean;
  readonly isFile: boolean;
  readonly isSymbolicLink: boolean;
  /** Permission bits (mode & 0o777) */
  readonly mode: number;
  readonly size: number;
}

/**
 * Options for mkdir operation.
 */
export interface MkdirOptions {
  /** Create parent directories if they don't exist (default: true) */
  readonly recursive?: boolean;
  /** Permission bits for created directories */
  readonly mode?: number;
}

/**
 * Options for rm operation.
 */
export interface RmOptions {
  /** Remove directories and their contents recursively (default: false) */
  readonly recursive?: boolean;
  /** Ignore errors if path doesn't exist (default: false) */
  readonly force?: boolean;
}

/**
 * Error codes for filesystem operations.
 */
export type FileSystemErrorCode =
  | "ENOENT" // File/directory not found
  | "EACCES" // Permission denied
  | "EPERM" // Operation not permitted
  | "EEXIST" // File/directory already exists
  | "ENOTDIR" // Not a directory
  | "EISDIR" // Is a directory (when file expected)
  | "ENOTEMPTY" // Directory not empty
  | "EXDEV" // Rename across devices
  | "UNKNOWN"; // Other errors (check originalCode)

/**
 * Abstraction over filesystem operations.
 *
 * All paths are absolute. Text operations use UTF-8.
 * Methods throw FileSystemError on failures.
 */
export interface FileSystemLayer {
  /**
   * Read entire file as UTF-8 string.
   *
   * @throws FileSystemError with code ENOENT if file not found
   */
  readFile(path: string): Promise<string>;

  /**
   * Write a UTF-8 string, replacing any existing content.
   */
  writeFile(path: string, content: string): Promise<void>;

  mkdir(path: string, options?: MkdirOptions): Promise<void>;

  readdir(path: string): Promise<readonly DirEntry[]>;

  /**
   * Stat a path without following a final symbolic link.
   *
   * @throws FileSystemError with code ENOENT if nothing exists at path
   */
  lstat(path: string): Promise<FileStat>;

  /**
   * Remove a file or directory.
   * Directories need `recursive: true` unless empty.
   */
  rm(path: string, options?: RmOptions): Promise<void>;

  /**
   * Rename within a filesystem.
   *
   * @throws FileSystemError with code EXDEV when source and target are on
   *   different devices
   */
  rename(oldPath: string, newPath: string): Promise<void>;

  /**
   * Stream a file's bytes to a new file. Permission bits are not copied.
   */
  copyFile(src: string, dest: string): Promise<void>;

  chmod(path: string, mode: number): Promise<void>;

  readlink(path: string): Promise<string>;

  symlink(target: string, linkPath: string): Promise<void>;
}

// ============================================================================
// Helper Functions
// ============================================================================

const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<FileSystemErrorCode>([
  "ENOENT",
  "EACCES",
  "EPERM",
  "EEXIST",
  "ENOTDIR",
  "EISDIR",
  "ENOTEMPTY",
  "EXDEV",
]);

function isKnownErrorCode(code: string): code is Exclude<FileSystemErrorCode, "UNKNOWN"> {
  return KNOWN_ERROR_CODES.has(code);
}

/**
 * Extract the POSIX error code from a Node.js error.
 * fs.rm() reports ERR_FS_* codes with the POSIX code under `info.code`.
 */
export function extractErrorCode(error: Error): string | undefined {
  if (
    "info" in error &&
    typeof error.info === "object" &&
    error.info !== null &&
    "code" in error.info &&
    typeof error.info.code === "string"
  ) {
    return error.info.code;
  }
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map a Node.js filesystem error to a FileSystemError.
 */
function mapError(error: unknown, path: string): FileSystemError {
  if (!(error instanceof Error)) {
    return new FileSystemError("UNKNOWN", path, String(error));
  }

  const code = extractErrorCode(error);

  if (code !== undefined && isKnownErrorCode(code)) {
    return new FileSystemError(code, path, error.message, error, code);
  }

  return new FileSystemError("UNKNOWN", path, error.message, error, code);
}

// ============================================================================
// DefaultFileSystemLayer Implementation
// ============================================================================

/**
 * Default implementation of FileSystemLayer using node:fs/promises.
 * Maps Node.js errors to FileSystemError for consistent error handling.
 */
export class DefaultFileSystemLayer implements FileSystemLayer {
  constructor(private readonly logger: Logger) {}

  /**
   * Run an fs operation, mapping and logging its failure.
   */
  private async run<T>(
    op: string,
    path: string,
    fn: () => Promise<T>,
    context: Record<string, string> = {}
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const fsError = mapError(error, path);
      this.logger.warn(`${op} failed`, {
        path,
        ...context,
        code: fsError.originalCode ?? fsError.fsCode,
        error: fsError.message,
      });
      throw fsError;
    }
  }

  async readFile(filePath: string): Promise<string> {
    this.logger.debug("Read", { path: filePath });
    return this.run("Read", filePath, () => fs.readFile(filePath, "utf-8"));
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    this.logger.debug("Write", { path: filePath });
    await this.run("Write", filePath, () => fs.writeFile(filePath, content, "utf-8"));
  }

  async mkdir(dirPath: string, options?: MkdirOptions): Promise<void> {
    const recursive = options?.recursive ?? true;
    this.logger.debug("Mkdir", { path: dirPath });
    await this.run("Mkdir", dirPath, () => fs.mkdir(dirPath, { recursive, mode: options?.mode }));
  }

  async readdir(dirPath: string): Promise<readonly DirEntry[]> {
    const entries = await this.run("Readdir", dirPath, () =>
      fs.readdir(dirPath, { withFileTypes: true })
    );
    const result = entries.map((entry) => ({
      name: entry.name,
      isDirectory: entry.isDirectory(),
      isFile: entry.isFile(),
      isSymbolicLink: entry.isSymbolicLink(),
    }));
    this.logger.silly("Readdir", { path: dirPath, count: result.length });
    return result;
  }

  async lstat(targetPath: string): Promise<FileStat> {
    const stat = await this.run("Lstat", targetPath, () => fs.lstat(targetPath));
    return {
      isDirectory: stat.isDirectory(),
      isFile: stat.isFile(),
      isSymbolicLink: stat.isSymbolicLink(),
      mode: stat.mode & 0o777,
      size: stat.size,
    };
  }

  async rm(targetPath: string, options?: RmOptions): Promise<void> {
    const recursive = options?.recursive ?? false;
    const force = options?.force ?? false;
    this.logger.debug("Rm", { path: targetPath, recursive });
    try {
      if (recursive) {
        await fs.rm(targetPath, { recursive, force });
      } else {
        const stat = await fs.lstat(targetPath);
        if (stat.isDirectory()) {
          // rmdir fails with ENOTEMPTY for non-empty directories
          await fs.rmdir(targetPath);
        } else {
          await fs.rm(targetPath, { force });
        }
      }
    } catch (error) {
      const fsError = mapError(error, targetPath);
      if (force && fsError.fsCode === "ENOENT") {
        return;
      }
      this.logger.warn("Rm failed", {
        path: targetPath,
        code: fsError.fsCode,
        error: fsError.message,
      });
      throw fsError;
    }
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    this.logger.debug("Rename", { oldPath, newPath });
    await this.run("Rename", oldPath, () => fs.rename(oldPath, newPath), { newPath });
  }

  async copyFile(src: string, dest: string): Promise<void> {
    this.logger.debug("CopyFile", { src, dest });
    await this.run("CopyFile", src, () => pipeline(createReadStream(src), createWriteStream(dest)), {
      dest,
    });
  }

  async chmod(targetPath: string, mode: number): Promise<void> {
    // Windows has no POSIX permission bits
    if (process.platform === "win32") {
      return;
    }
    await this.run("Chmod", targetPath, () => fs.chmod(targetPath, mode));
  }

  async readlink(linkPath: string): Promise<string> {
    return this.run("Readlink", linkPath, () => fs.readlink(linkPath));
  }

  async symlink(target: string, linkPath: string): Promise<void> {
    this.logger.debug("Symlink", { target, linkPath });
    await this.run("Symlink", linkPath, () => fs.symlink(target, linkPath), { target });
  }
}
