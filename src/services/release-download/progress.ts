/**
 * Console progress display for artifact downloads.
 */

import type { Artifact } from "../release-catalog/types";
import type { DownloadProgress } from "./types";

/** Where progress lines go; process.stderr by default */
export interface ProgressSink {
  write(text: string): unknown;
}

export function readableBytesMb(numBytes: number): string {
  return `${(numBytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Create a progress callback that redraws one line per artifact whenever
 * its whole-percent value changes, ending the line once it completes.
 */
export function createProgressReporter(
  sink: ProgressSink = process.stderr
): (artifact: Artifact, progress: DownloadProgress) => void {
  const lastPercent = new Map<string, number>();

  return (artifact, { bytesDownloaded, totalBytes }) => {
    const percent =
      totalBytes === 0 ? 100 : Math.min(100, Math.floor((bytesDownloaded / totalBytes) * 100));
    if (lastPercent.get(artifact.name) === percent) {
      return;
    }
    lastPercent.set(artifact.name, percent);

    const done = percent === 100;
    sink.write(
      `\r${artifact.name} [${readableBytesMb(bytesDownloaded)} of ${readableBytesMb(totalBytes)}] ${percent}%${done ? "\n" : ""}`
    );
  };
}
