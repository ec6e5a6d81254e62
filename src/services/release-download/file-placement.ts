/**
 * Moves downloaded files and extracted directories to their final location.
 */

import { dirname, join, resolve } from "node:path";
import type { FileStat, FileSystemLayer } from "../platform/filesystem";
import type { Logger } from "../logging";
import { FileSystemError, PlacementError, getErrorMessage } from "../errors";
import type { DownloadWarning, PlacementResult } from "./types";

export interface FilePlacement {
  /**
   * Move `source` to `target`, replacing whatever is at `target`.
   *
   * Falls back to copy + delete when rename fails (e.g. across devices).
   *
   * @throws PlacementError with code SOURCE_MISSING, PREPARE_FAILED or COPY_FAILED
   */
  place(source: string, target: string): Promise<PlacementResult>;
}

export class DefaultFilePlacement implements FilePlacement {
  constructor(
    private readonly fs: FileSystemLayer,
    private readonly logger: Logger
  ) {}

  async place(source: string, target: string): Promise<PlacementResult> {
    if (resolve(source) === resolve(target)) {
      return { path: target, warnings: [] };
    }

    let sourceStat: FileStat;
    try {
      sourceStat = await this.fs.lstat(source);
    } catch (error) {
      if (error instanceof FileSystemError && error.fsCode === "ENOENT") {
        throw new PlacementError(`Nothing to move at ${source}`, "SOURCE_MISSING", source, {
          cause: error,
        });
      }
      throw new PlacementError(
        `Cannot read ${source}: ${getErrorMessage(error)}`,
        "PREPARE_FAILED",
        source,
        { cause: error }
      );
    }

    try {
      await this.fs.mkdir(dirname(target), { recursive: true });
      await this.fs.rm(target, { recursive: true, force: true });
    } catch (error) {
      throw new PlacementError(
        `Cannot prepare ${target}: ${getErrorMessage(error)}`,
        "PREPARE_FAILED",
        target,
        { cause: error }
      );
    }

    try {
      await this.fs.rename(source, target);
      this.logger.debug("Moved", { source, target });
      return { path: target, warnings: [] };
    } catch (error) {
      this.logger.debug("Rename failed, copying instead", {
        source,
        target,
        error: getErrorMessage(error),
      });
    }

    const warnings: DownloadWarning[] = [];
    try {
      await this.copy(source, target, sourceStat, warnings);
    } catch (error) {
      throw new PlacementError(
        `Failed to copy ${source} to ${target}: ${getErrorMessage(error)}`,
        "COPY_FAILED",
        target,
        { cause: error }
      );
    }

    try {
      await this.fs.rm(source, { recursive: true, force: true });
    } catch (error) {
      const message = `Copied ${source} but could not remove it: ${getErrorMessage(error)}`;
      warnings.push({ kind: "cleanup", message, path: source });
      this.logger.warn(message, { path: source });
    }

    this.logger.debug("Copied", { source, target, warnings: warnings.length });
    return { path: target, warnings };
  }

  private async copy(
    source: string,
    target: string,
    stat: FileStat,
    warnings: DownloadWarning[]
  ): Promise<void> {
    if (stat.isSymbolicLink) {
      await this.fs.symlink(await this.fs.readlink(source), target);
      return;
    }

    if (stat.isDirectory) {
      await this.fs.mkdir(target, { recursive: false, mode: stat.mode });
      for (const entry of await this.fs.readdir(source)) {
        const from = join(source, entry.name);
        await this.copy(from, join(target, entry.name), await this.fs.lstat(from), warnings);
      }
      return;
    }

    await this.fs.copyFile(source, target);
    try {
      await this.fs.chmod(target, stat.mode);
    } catch (error) {
      const message = `Failed to set mode ${stat.mode.toString(8)}: ${getErrorMessage(error)}`;
      warnings.push({ kind: "chmod", message, path: target });
      this.logger.warn(message, { path: target });
    }
  }
}
