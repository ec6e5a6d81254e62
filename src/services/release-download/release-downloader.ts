/**
 * ReleaseDownloader: the public client tying release resolution, artifact
 * selection, downloads, extraction, placement and version records together.
 */

import { basename, join, resolve } from "node:path";
import type { Logger, LoggingService } from "../logging";
import type { FileSystemLayer } from "../platform/filesystem";
import type { PlatformKey } from "../platform/platform-info";
import type { DownloaderConfig } from "../config";
import type { Artifact, Release } from "../release-catalog/types";
import type { ReleaseResolver } from "../release-catalog/release-resolver";
import { selectArtifacts } from "../release-catalog/asset-selector";
import { DownloadError, getErrorMessage } from "../errors";
import { resolveArchiveKind, type ArchiveExtractor } from "./archive-extractor";
import { withDeadline, type DownloadOrchestrator } from "./download-orchestrator";
import type { FilePlacement } from "./file-placement";
import type { VersionTracker } from "./version-tracker";
import type {
  ArtifactTransfer,
  DownloadFailure,
  DownloadProgress,
  DownloadWarning,
  ReleaseDownloadResult,
} from "./types";

/**
 * Collaborators of a ReleaseDownloader.
 * createReleaseDownloader() builds the default set.
 */
export interface ReleaseDownloaderDeps {
  readonly config: DownloaderConfig;
  readonly resolver: ReleaseResolver;
  readonly orchestrator: DownloadOrchestrator;
  readonly transfer: ArtifactTransfer;
  readonly extractor: ArchiveExtractor;
  readonly placement: FilePlacement;
  readonly versionTracker: VersionTracker;
  readonly fileSystem: FileSystemLayer;
  readonly platform: PlatformKey;
  readonly logger: Logger;
  /** Disposed together with the downloader */
  readonly loggingService?: LoggingService;
  readonly onProgress?: (artifact: Artifact, progress: DownloadProgress) => void;
}

/** Tags such as "release/1.0" must not introduce directories */
function fileSafe(tag: string): string {
  return tag.replace(/[\\/]/g, "-");
}

function stripV(version: string): string {
  return version.startsWith("v") ? version.slice(1) : version;
}

export class ReleaseDownloader {
  private readonly config: DownloaderConfig;
  private readonly logger: Logger;

  constructor(private readonly deps: ReleaseDownloaderDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
  }

  /**
   * Download the platform's artifacts of the latest release.
   *
   * With `checkLatest`, nothing is fetched when the recorded tag already
   * matches, and the fetched tag is recorded afterwards.
   *
   * @throws ReleaseNotFoundError when the repository has no releases
   * @throws CatalogError on catalog transport failure
   * @throws DownloadError when no artifact could be downloaded
   */
  async downloadLatestRelease(owner: string, repo: string): Promise<ReleaseDownloadResult> {
    this.logger.info("Downloading latest release", { owner, repo });
    const release = await this.deps.resolver.resolveLatest(owner, repo);

    if (
      this.config.checkLatest &&
      (await this.deps.versionTracker.isUpToDate(owner, repo, release.tag))
    ) {
      this.logger.info("Already up to date", { owner, repo, tag: release.tag });
      return { kind: "up-to-date", tag: release.tag };
    }

    return this.downloadRelease(owner, repo, release, this.config.checkLatest);
  }

  /**
   * Download the platform's artifacts of the release tagged `tag`.
   * Version records are neither read nor written.
   */
  async downloadSpecificRelease(
    owner: string,
    repo: string,
    tag: string
  ): Promise<ReleaseDownloadResult> {
    this.logger.info("Downloading release", { owner, repo, tag });
    const release = await this.deps.resolver.resolveByTag(owner, repo, tag);
    return this.downloadRelease(owner, repo, release, false);
  }

  /**
   * Download the source archive of `tag`, or of the latest release when no
   * tag is given.
   */
  async downloadSourceCode(
    owner: string,
    repo: string,
    tag?: string
  ): Promise<ReleaseDownloadResult> {
    const resolvedTag = tag || (await this.deps.resolver.latestTag(owner, repo));
    const warnings: DownloadWarning[] = [];
    const path = await this.fetchSourceArchive(owner, repo, resolvedTag, warnings);
    return {
      kind: "downloaded",
      path,
      tag: resolvedTag,
      source: "source-archive",
      warnings,
      failures: [],
    };
  }

  /**
   * Whether `currentVersion` names the latest release. One leading "v" is
   * ignored on both sides, so "1.2.0" matches "v1.2.0".
   */
  async isLatestVersion(owner: string, repo: string, currentVersion: string): Promise<boolean> {
    const latest = await this.deps.resolver.latestTag(owner, repo);
    const isLatest = stripV(latest) === stripV(currentVersion);
    this.logger.debug("Compared versions", { owner, repo, currentVersion, latest, isLatest });
    return isLatest;
  }

  /**
   * Release logging resources. The downloader must not be used afterwards.
   */
  dispose(): void {
    this.deps.loggingService?.dispose();
  }

  // ==========================================================================
  // Release downloads
  // ==========================================================================

  private async downloadRelease(
    owner: string,
    repo: string,
    release: Release,
    recordVersion: boolean
  ): Promise<ReleaseDownloadResult> {
    const { tag } = release;
    const warnings: DownloadWarning[] = [];
    const selection = selectArtifacts(release.artifacts, this.deps.platform);

    if (selection.outcome === "fallback") {
      const name = selection.artifacts[0]?.name ?? "";
      this.warn(
        warnings,
        "platform-fallback",
        `No artifact matches ${this.deps.platform.os}/${this.deps.platform.arch}, using ${name}`
      );
    }

    if (selection.artifacts.length === 0) {
      if (!this.config.downloadSource) {
        throw new DownloadError(
          `Release ${tag} of ${owner}/${repo} has no artifacts`,
          "NO_ARTIFACTS"
        );
      }
      this.logger.info("Release has no artifacts, downloading source archive", {
        owner,
        repo,
        tag,
      });
      const path = await this.fetchSourceArchive(owner, repo, tag, warnings);
      if (recordVersion) {
        await this.recordVersion(owner, repo, tag, warnings);
      }
      return { kind: "downloaded", path, tag, source: "source-archive", warnings, failures: [] };
    }

    const { paths, failures } = await this.deps.orchestrator.downloadAll(selection.artifacts, {
      concurrency: this.config.concurrency,
      timeoutMs: this.config.timeoutMs,
      destinationDir: this.config.cacheDir,
      ...(this.deps.onProgress ? { onProgress: this.deps.onProgress } : {}),
    });
    this.reportFailures(failures, warnings);

    const [single] = paths;
    const path =
      paths.length === 1 && single !== undefined
        ? await this.finishFile(single, warnings)
        : await this.finishDirectory(
            join(this.config.cacheDir, `${owner}-${repo}-${fileSafe(tag)}`),
            paths,
            warnings
          );

    if (recordVersion) {
      await this.recordVersion(owner, repo, tag, warnings);
    }

    this.logger.info("Release downloaded", {
      owner,
      repo,
      tag,
      path,
      files: paths.length,
      failed: failures.length,
      warnings: warnings.length,
    });
    return { kind: "downloaded", path, tag, source: "assets", warnings, failures };
  }

  private async fetchSourceArchive(
    owner: string,
    repo: string,
    tag: string,
    warnings: DownloadWarning[]
  ): Promise<string> {
    const url = this.deps.resolver.sourceArchiveUrlForTag(owner, repo, tag);
    const fileName = `${owner}-${repo}-${fileSafe(tag)}.tar.gz`;
    const filePath = join(this.config.cacheDir, fileName);
    this.logger.info("Downloading source archive", { owner, repo, tag, url });

    const { onProgress } = this.deps;
    const artifact: Artifact = { name: fileName, size: 0, downloadUrl: url };
    await withDeadline(this.config.timeoutMs, (signal) =>
      this.deps.transfer.transfer(url, filePath, {
        signal,
        ...(onProgress
          ? { onProgress: (progress: DownloadProgress) => onProgress(artifact, progress) }
          : {}),
      })
    );

    return this.finishFile(filePath, warnings);
  }

  // ==========================================================================
  // Post-processing
  // ==========================================================================

  /**
   * Extract (when enabled) and move a single download to the target directory.
   */
  private async finishFile(filePath: string, warnings: DownloadWarning[]): Promise<string> {
    const path = this.config.autoExtract ? await this.tryExtract(filePath, warnings) : filePath;
    return this.tryPlaceInTarget(path, warnings);
  }

  /**
   * Gather several downloads in one directory, extract each, then move the
   * directory to the target directory.
   */
  private async finishDirectory(
    dir: string,
    paths: readonly string[],
    warnings: DownloadWarning[]
  ): Promise<string> {
    await this.deps.fileSystem.mkdir(dir, { recursive: true });

    for (const filePath of paths) {
      let placed: string;
      try {
        const result = await this.deps.placement.place(filePath, join(dir, basename(filePath)));
        warnings.push(...result.warnings);
        placed = result.path;
      } catch (error) {
        this.warn(
          warnings,
          "placement",
          `Failed to move ${filePath} into ${dir}: ${getErrorMessage(error)}`,
          filePath
        );
        continue;
      }

      if (this.config.autoExtract) {
        await this.tryExtract(placed, warnings);
      }
    }

    return this.tryPlaceInTarget(dir, warnings);
  }

  /**
   * Extract an archive. Files that are no archive are returned as they are;
   * a failed extraction keeps the archive and adds a warning.
   */
  private async tryExtract(filePath: string, warnings: DownloadWarning[]): Promise<string> {
    if (resolveArchiveKind(filePath).type === "unsupported") {
      this.logger.debug("Not an archive, keeping as is", { path: filePath });
      return filePath;
    }
    try {
      const result = await this.deps.extractor.extract(filePath);
      warnings.push(...result.warnings);
      return result.path;
    } catch (error) {
      this.warn(
        warnings,
        "extraction",
        `Failed to extract ${filePath}: ${getErrorMessage(error)}`,
        filePath
      );
      return filePath;
    }
  }

  private async tryPlaceInTarget(path: string, warnings: DownloadWarning[]): Promise<string> {
    const { targetDir, cacheDir } = this.config;
    if (targetDir === undefined || resolve(targetDir) === resolve(cacheDir)) {
      return path;
    }
    try {
      const result = await this.deps.placement.place(path, join(targetDir, basename(path)));
      warnings.push(...result.warnings);
      return result.path;
    } catch (error) {
      this.warn(
        warnings,
        "placement",
        `Failed to move ${path} to ${targetDir}: ${getErrorMessage(error)}`,
        path
      );
      return path;
    }
  }

  private async recordVersion(
    owner: string,
    repo: string,
    tag: string,
    warnings: DownloadWarning[]
  ): Promise<void> {
    try {
      await this.deps.versionTracker.record(owner, repo, tag);
    } catch (error) {
      this.warn(
        warnings,
        "version-record",
        `Failed to record version ${tag}: ${getErrorMessage(error)}`,
        this.deps.versionTracker.recordPath(owner, repo)
      );
    }
  }

  private reportFailures(
    failures: readonly DownloadFailure[],
    warnings: DownloadWarning[]
  ): void {
    for (const { artifact, error } of failures) {
      warnings.push({
        kind: "partial-download",
        message: `Failed to download ${artifact.name}: ${error.message}`,
      });
    }
  }

  private warn(
    warnings: DownloadWarning[],
    kind: DownloadWarning["kind"],
    message: string,
    path?: string
  ): void {
    warnings.push(path === undefined ? { kind, message } : { kind, message, path });
    this.logger.warn(message, { kind, ...(path === undefined ? {} : { path }) });
  }
}
