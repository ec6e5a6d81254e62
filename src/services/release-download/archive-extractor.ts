/**
 * Archive extraction for zip, tar.gz/tgz and gz files.
 *
 * Every archive is unpacked next to itself: `tool.tar.gz` into the directory
 * `tool`, `tool.gz` into the file `tool`. Extraction is all-or-nothing per
 * entry stream; link creation and permission bits are best-effort and
 * reported as warnings.
 */

import { createReadStream, createWriteStream } from "node:fs";
import { chmod, link, mkdir, realpath, rm, symlink } from "node:fs/promises";
import { dirname, resolve, sep } from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createGunzip } from "node:zlib";
import { Parser, type ReadEntry } from "tar";
import yauzl, { type Entry, type ZipFile } from "yauzl";
import type { Logger } from "../logging";
import { ArchiveError, getErrorMessage } from "../errors";
import { extractErrorCode } from "../platform/filesystem";
import type { DownloadWarning, ExtractionResult } from "./types";

/**
 * Archive format of a file, resolved from its name.
 * Supported kinds carry the path the archive is extracted to.
 */
export type ArchiveKind =
  | { readonly type: "zip"; readonly outputPath: string }
  | { readonly type: "tar.gz"; readonly outputPath: string }
  | { readonly type: "gz"; readonly outputPath: string }
  | { readonly type: "unsupported" };

const SUFFIXES: readonly (readonly [string, "zip" | "tar.gz" | "gz"])[] = [
  [".tar.gz", "tar.gz"],
  [".tgz", "tar.gz"],
  [".zip", "zip"],
  [".gz", "gz"],
];

export function resolveArchiveKind(archivePath: string): ArchiveKind {
  const lower = archivePath.toLowerCase();
  for (const [suffix, type] of SUFFIXES) {
    if (lower.endsWith(suffix) && lower.length > suffix.length) {
      return { type, outputPath: archivePath.slice(0, -suffix.length) };
    }
  }
  return { type: "unsupported" };
}

/**
 * Interface for extracting archives.
 */
export interface ArchiveExtractor {
  /**
   * Extract an archive next to itself.
   *
   * @returns The extracted directory (zip, tar.gz) or file (gz)
   * @throws ArchiveError on unsupported formats and extraction failure
   */
  extract(archivePath: string): Promise<ExtractionResult>;
}

function isWithin(root: string, target: string): boolean {
  return target === root || target.startsWith(root + sep);
}

/**
 * Resolve an entry name below the output root.
 * @throws ArchiveError with code INVALID_ARCHIVE if the entry escapes it
 */
function entryTarget(root: string, entryName: string): string {
  const target = resolve(root, entryName);
  if (!isWithin(root, target)) {
    throw new ArchiveError(`Path traversal detected in archive: ${entryName}`, "INVALID_ARCHIVE");
  }
  return target;
}

function isMissing(error: unknown): boolean {
  const code = error instanceof Error ? extractErrorCode(error) : undefined;
  return code === "ENOENT";
}

/**
 * Real location of the deepest part of `path` that exists, walking up no
 * further than `root`.
 */
async function realAncestor(root: string, path: string): Promise<string> {
  let current = path;
  for (;;) {
    try {
      return await realpath(current);
    } catch (error) {
      if (!isMissing(error) || current === root) {
        throw error;
      }
      current = dirname(current);
    }
  }
}

/**
 * Resolve an entry name below the output root, on disk as well as by name:
 * links extracted earlier must not lead the entry out of the root.
 * @throws ArchiveError with code INVALID_ARCHIVE if the entry escapes it
 */
async function resolveEntryTarget(root: string, entryName: string): Promise<string> {
  const target = entryTarget(root, entryName);
  if (target !== root && !isWithin(root, await realAncestor(root, dirname(target)))) {
    throw new ArchiveError(
      `Path traversal detected in archive: ${entryName} leads through a link outside the root`,
      "INVALID_ARCHIVE"
    );
  }
  return target;
}

function toArchiveError(error: unknown, archivePath: string): ArchiveError {
  if (error instanceof ArchiveError) {
    return error;
  }
  const message = getErrorMessage(error);
  const code = error instanceof Error ? extractErrorCode(error) : undefined;
  if (code === "EACCES" || code === "EPERM") {
    return new ArchiveError(
      `Permission denied extracting ${archivePath}: ${message}`,
      "PERMISSION_DENIED",
      { cause: error }
    );
  }
  if (code?.startsWith("Z_")) {
    return new ArchiveError(
      `Invalid or corrupt archive at ${archivePath}: ${message}`,
      "INVALID_ARCHIVE",
      { cause: error }
    );
  }
  return new ArchiveError(`Failed to extract ${archivePath}: ${message}`, "EXTRACTION_FAILED", {
    cause: error,
  });
}

function openZip(archivePath: string): Promise<ZipFile> {
  return new Promise((resolvePromise, reject) => {
    yauzl.open(archivePath, { lazyEntries: true }, (error, zipfile) => {
      if (error && extractErrorCode(error) !== undefined) {
        reject(error);
        return;
      }
      if (error || !zipfile) {
        reject(
          new ArchiveError(
            `Invalid or corrupt zip archive at ${archivePath}: ${getErrorMessage(error)}`,
            "INVALID_ARCHIVE",
            { cause: error }
          )
        );
        return;
      }
      resolvePromise(zipfile);
    });
  });
}

function openEntryStream(zipfile: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise((resolvePromise, reject) => {
    zipfile.openReadStream(entry, (error, stream) => {
      if (error || !stream) {
        reject(
          new ArchiveError(
            `Failed to read entry ${entry.fileName}: ${getErrorMessage(error)}`,
            "INVALID_ARCHIVE",
            { cause: error }
          )
        );
        return;
      }
      resolvePromise(stream);
    });
  });
}

/**
 * Copy a tar entry body into a new file. Resolves once the file is closed.
 */
function writeEntry(entry: ReadEntry, target: string): Promise<void> {
  return new Promise((resolvePromise, reject) => {
    const output = createWriteStream(target);
    output.on("error", (error) => {
      entry.resume();
      reject(error);
    });
    output.on("close", () => resolvePromise());
    entry.on("error", reject);
    entry.pipe(output);
  });
}

export class DefaultArchiveExtractor implements ArchiveExtractor {
  constructor(private readonly logger: Logger) {}

  async extract(archivePath: string): Promise<ExtractionResult> {
    const kind = resolveArchiveKind(archivePath);
    if (kind.type === "unsupported") {
      throw new ArchiveError(
        `Unsupported archive format: ${archivePath}. Supported formats: .zip, .tar.gz, .tgz, .gz`,
        "UNSUPPORTED_FORMAT"
      );
    }

    this.logger.info("Extracting", { path: archivePath, format: kind.type });
    const warnings: DownloadWarning[] = [];
    const outputPath = resolve(kind.outputPath);

    try {
      switch (kind.type) {
        case "zip":
          await mkdir(outputPath, { recursive: true });
          await this.extractZip(archivePath, await realpath(outputPath), warnings);
          break;
        case "tar.gz":
          await mkdir(outputPath, { recursive: true });
          await this.extractTarGz(archivePath, await realpath(outputPath), warnings);
          break;
        case "gz":
          await pipeline(
            createReadStream(archivePath),
            createGunzip(),
            createWriteStream(outputPath)
          );
          break;
      }
    } catch (error) {
      const archiveError = toArchiveError(error, archivePath);
      this.logger.warn("Extraction failed", {
        path: archivePath,
        code: archiveError.errorCode,
        error: archiveError.message,
      });
      throw archiveError;
    }

    this.logger.info("Extracted", {
      path: archivePath,
      output: outputPath,
      warnings: warnings.length,
    });
    return { path: outputPath, warnings };
  }

  // ==========================================================================
  // zip
  // ==========================================================================

  private async extractZip(
    archivePath: string,
    root: string,
    warnings: DownloadWarning[]
  ): Promise<void> {
    const zipfile = await openZip(archivePath);

    await new Promise<void>((resolvePromise, reject) => {
      const fail = (error: unknown): void => {
        zipfile.close();
        reject(error);
      };

      zipfile.on("entry", (entry: Entry) => {
        this.writeZipEntry(zipfile, entry, root, warnings).then(() => zipfile.readEntry(), fail);
      });
      zipfile.on("end", () => resolvePromise());
      zipfile.on("error", (error: Error) => {
        fail(
          new ArchiveError(
            `Invalid or corrupt zip archive at ${archivePath}: ${error.message}`,
            "INVALID_ARCHIVE",
            { cause: error }
          )
        );
      });
      zipfile.readEntry();
    });
  }

  private async writeZipEntry(
    zipfile: ZipFile,
    entry: Entry,
    root: string,
    warnings: DownloadWarning[]
  ): Promise<void> {
    const target = await resolveEntryTarget(root, entry.fileName);

    if (entry.fileName.endsWith("/")) {
      await mkdir(target, { recursive: true });
      return;
    }

    await mkdir(dirname(target), { recursive: true });
    await rm(target, { force: true });
    const stream = await openEntryStream(zipfile, entry);
    await pipeline(stream, createWriteStream(target));

    // Unix mode lives in the upper 16 bits
    const mode = (entry.externalFileAttributes >>> 16) & 0o777;
    if (mode !== 0) {
      await this.applyMode(target, mode, warnings);
    }
  }

  // ==========================================================================
  // tar.gz
  // ==========================================================================

  private extractTarGz(
    archivePath: string,
    root: string,
    warnings: DownloadWarning[]
  ): Promise<void> {
    return new Promise<void>((resolvePromise, reject) => {
      const source = createReadStream(archivePath);
      const parser = new Parser({ strict: true });
      let pending: Promise<void> = Promise.resolve();
      let failed = false;

      const fail = (error: unknown): void => {
        if (failed) return;
        failed = true;
        source.unpipe();
        source.destroy();
        reject(error);
      };

      // Entries are handled one after another so directories and link
      // targets exist before the entries that need them.
      parser.on("entry", (entry: ReadEntry) => {
        pending = pending.then(async () => {
          if (failed) {
            entry.resume();
            return;
          }
          await this.writeTarEntry(entry, root, warnings);
        });
        pending.catch(fail);
      });
      parser.on("error", (error: Error) => {
        fail(
          new ArchiveError(
            `Invalid or corrupt archive at ${archivePath}: ${error.message}`,
            "INVALID_ARCHIVE",
            { cause: error }
          )
        );
      });
      parser.on("end", () => {
        pending.then(() => {
          if (!failed) resolvePromise();
        }, fail);
      });
      source.on("error", fail);
      source.pipe(parser);
    });
  }

  private async writeTarEntry(
    entry: ReadEntry,
    root: string,
    warnings: DownloadWarning[]
  ): Promise<void> {
    let target: string;
    try {
      target = await resolveEntryTarget(root, entry.path);
    } catch (error) {
      entry.resume();
      throw error;
    }

    switch (entry.type) {
      case "Directory":
        entry.resume();
        await mkdir(target, { recursive: true });
        return;

      case "File":
      case "OldFile":
      case "ContiguousFile": {
        try {
          await mkdir(dirname(target), { recursive: true });
          // An earlier link at this name must not redirect the write
          await rm(target, { force: true });
        } catch (error) {
          entry.resume();
          throw error;
        }
        await writeEntry(entry, target);
        const mode = (entry.mode ?? 0) & 0o777;
        if (mode !== 0) {
          await this.applyMode(target, mode, warnings);
        }
        return;
      }

      case "SymbolicLink":
        entry.resume();
        await this.createSymlink(entry.linkpath ?? "", target, root, warnings);
        return;

      case "Link":
        entry.resume();
        await this.createHardLink(entry.linkpath ?? "", target, root, warnings);
        return;

      default:
        this.logger.debug("Skipping tar entry", { path: entry.path, type: entry.type });
        entry.resume();
    }
  }

  private async createSymlink(
    linkTarget: string,
    target: string,
    root: string,
    warnings: DownloadWarning[]
  ): Promise<void> {
    if (!isWithin(root, resolve(dirname(target), linkTarget))) {
      this.warn(
        warnings,
        "symlink",
        `Skipped symbolic link pointing outside the archive: ${linkTarget}`,
        target
      );
      return;
    }
    try {
      await mkdir(dirname(target), { recursive: true });
      await rm(target, { force: true });
      await symlink(linkTarget, target);
      if (await this.resolvesOutside(root, target)) {
        await rm(target, { force: true });
        this.warn(
          warnings,
          "symlink",
          `Skipped symbolic link pointing outside the archive: ${linkTarget}`,
          target
        );
      }
    } catch (error) {
      this.warn(
        warnings,
        "symlink",
        `Failed to create symbolic link to ${linkTarget}: ${getErrorMessage(error)}`,
        target
      );
    }
  }

  private async createHardLink(
    linkTarget: string,
    target: string,
    root: string,
    warnings: DownloadWarning[]
  ): Promise<void> {
    const existing = resolve(root, linkTarget);
    if (!isWithin(root, existing) || (await this.resolvesOutside(root, dirname(existing)))) {
      this.warn(
        warnings,
        "hardlink",
        `Skipped hard link pointing outside the archive: ${linkTarget}`,
        target
      );
      return;
    }
    try {
      await mkdir(dirname(target), { recursive: true });
      await rm(target, { force: true });
      await link(existing, target);
    } catch (error) {
      this.warn(
        warnings,
        "hardlink",
        `Failed to create hard link to ${linkTarget}: ${getErrorMessage(error)}`,
        target
      );
    }
  }

  // ==========================================================================
  // shared
  // ==========================================================================

  /**
   * Whether `path` exists and its real location is outside `root`.
   * Dangling links resolve nowhere and count as inside.
   */
  private async resolvesOutside(root: string, path: string): Promise<boolean> {
    try {
      return !isWithin(root, await realpath(path));
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw error;
    }
  }

  private async applyMode(
    target: string,
    mode: number,
    warnings: DownloadWarning[]
  ): Promise<void> {
    if (process.platform === "win32") {
      return;
    }
    try {
      await chmod(target, mode);
    } catch (error) {
      this.warn(
        warnings,
        "chmod",
        `Failed to set mode ${mode.toString(8)}: ${getErrorMessage(error)}`,
        target
      );
    }
  }

  private warn(
    warnings: DownloadWarning[],
    kind: DownloadWarning["kind"],
    message: string,
    path: string
  ): void {
    warnings.push({ kind, message, path });
    this.logger.warn(message, { path });
  }
}
