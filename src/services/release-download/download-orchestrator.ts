/**
 * Downloads a batch of artifacts with bounded concurrency under one
 * deadline.
 */

import { basename, join } from "node:path";
import PQueue from "p-queue";
import type { Logger } from "../logging";
import type { Artifact } from "../release-catalog/types";
import { DownloadError, getErrorMessage } from "../errors";
import type {
  ArtifactTransfer,
  BatchDownloadOptions,
  BatchDownloadResult,
  DownloadFailure,
  DownloadOutcome,
  DownloadProgress,
} from "./types";

export interface DownloadOrchestrator {
  /**
   * Download every artifact into `options.destinationDir`.
   *
   * @returns Paths and failures in completion order
   * @throws DownloadError with code ALL_FAILED when nothing was downloaded;
   *   its cause is the first failure
   */
  downloadAll(
    artifacts: readonly Artifact[],
    options: BatchDownloadOptions
  ): Promise<BatchDownloadResult>;
}

/**
 * Run `fn` with a signal that aborts after `timeoutMs`.
 * The signal's reason is a DownloadError with code ABORTED.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new DownloadError(`Deadline of ${timeoutMs}ms exceeded`, "ABORTED"));
  }, timeoutMs);
  try {
    return await fn(controller.signal);
  } finally {
    clearTimeout(timer);
  }
}

function isFailure(outcome: DownloadOutcome): outcome is DownloadFailure {
  return "error" in outcome;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class DefaultDownloadOrchestrator implements DownloadOrchestrator {
  constructor(
    private readonly artifactTransfer: ArtifactTransfer,
    private readonly logger: Logger
  ) {}

  async downloadAll(
    artifacts: readonly Artifact[],
    options: BatchDownloadOptions
  ): Promise<BatchDownloadResult> {
    const { concurrency, timeoutMs } = options;
    this.logger.info("Downloading artifacts", {
      count: artifacts.length,
      concurrency,
      timeoutMs,
    });

    const outcomes: DownloadOutcome[] = [];
    await withDeadline(timeoutMs, async (signal) => {
      const queue = new PQueue({ concurrency });
      await queue.addAll(
        artifacts.map((artifact) => async () => {
          outcomes.push(await this.downloadOne(artifact, options, signal));
        })
      );
    });

    const paths: string[] = [];
    const failures: DownloadFailure[] = [];
    for (const outcome of outcomes) {
      if (isFailure(outcome)) {
        failures.push(outcome);
      } else {
        paths.push(outcome.path);
      }
    }

    const [firstFailure] = failures;
    if (firstFailure !== undefined && paths.length === 0) {
      this.logger.error("All downloads failed", {
        count: failures.length,
        error: firstFailure.error.message,
      });
      throw new DownloadError(
        `All ${failures.length} downloads failed: ${firstFailure.error.message}`,
        "ALL_FAILED",
        { cause: firstFailure.error }
      );
    }

    for (const failure of failures) {
      this.logger.warn("Download failed", {
        name: failure.artifact.name,
        error: failure.error.message,
      });
    }
    this.logger.info("Batch complete", { downloaded: paths.length, failed: failures.length });

    return { paths, failures };
  }

  private async downloadOne(
    artifact: Artifact,
    options: BatchDownloadOptions,
    signal: AbortSignal
  ): Promise<DownloadOutcome> {
    if (signal.aborted) {
      return {
        artifact,
        error: new DownloadError(
          `Download of ${artifact.name} not started: deadline exceeded`,
          "ABORTED"
        ),
      };
    }

    const fileName = basename(artifact.name);
    if (fileName === "" || fileName === "." || fileName === "..") {
      return {
        artifact,
        error: new DownloadError(
          `Artifact name "${artifact.name}" is not a file name`,
          "WRITE_FAILED"
        ),
      };
    }

    const destination = join(options.destinationDir, fileName);
    const { onProgress } = options;
    try {
      const result = await this.artifactTransfer.transfer(artifact.downloadUrl, destination, {
        signal,
        ...(onProgress
          ? { onProgress: (progress: DownloadProgress) => onProgress(artifact, progress) }
          : {}),
      });
      return { artifact, path: result.path };
    } catch (error) {
      this.logger.debug("Transfer failed", {
        name: artifact.name,
        error: getErrorMessage(error),
      });
      return { artifact, error: toError(error) };
    }
  }
}
