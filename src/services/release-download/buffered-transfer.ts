/**
 * Streams an HTTP response body to disk through a fixed-size buffer.
 *
 * The body is copied into one preallocated buffer; the buffer is written
 * to the file only when it is full and once more at the end, so the number
 * of write calls depends on the buffer size rather than on chunk sizes.
 */

import { open, type FileHandle } from "node:fs/promises";
import { basename } from "node:path";
import type { HttpClient } from "../platform/network";
import type { Logger } from "../logging";
import { DownloadError, getErrorMessage } from "../errors";
import type {
  ArtifactTransfer,
  DownloadProgressCallback,
  TransferOptions,
  TransferResult,
} from "./types";

/** Debug log interval while reading a body */
const LOG_INTERVAL_BYTES = 10 * 1024 * 1024;

/** Header timeout; the body is bounded by the caller's signal */
const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export interface BufferedTransferOptions {
  /** Write buffer size in bytes */
  readonly bufferSize: number;
  /** Time to wait for response headers. Default: 60000 */
  readonly requestTimeoutMs?: number;
}

/**
 * File writer with a single fixed-size buffer.
 */
class BufferedFileWriter {
  private buffered = 0;
  private flushed = 0;

  private constructor(
    private readonly handle: FileHandle,
    private readonly buffer: Buffer
  ) {}

  /**
   * Open (and truncate) the destination.
   */
  static async open(path: string, bufferSize: number): Promise<BufferedFileWriter> {
    const handle = await open(path, "w");
    return new BufferedFileWriter(handle, Buffer.allocUnsafe(bufferSize));
  }

  /** Bytes handed to the file so far */
  get bytesFlushed(): number {
    return this.flushed;
  }

  /** Bytes accepted so far, flushed or not */
  get bytesAccepted(): number {
    return this.flushed + this.buffered;
  }

  /**
   * Copy a chunk into the buffer, draining it each time it fills up.
   */
  async write(chunk: Uint8Array, onDrain: () => void): Promise<void> {
    let position = 0;
    while (position < chunk.byteLength) {
      const count = Math.min(this.buffer.length - this.buffered, chunk.byteLength - position);
      this.buffer.set(chunk.subarray(position, position + count), this.buffered);
      this.buffered += count;
      position += count;
      if (this.buffered === this.buffer.length) {
        await this.drain();
        onDrain();
      }
    }
  }

  /**
   * Drain the remaining bytes, sync and close.
   */
  async commit(): Promise<void> {
    await this.drain();
    await this.handle.sync();
    await this.handle.close();
  }

  /**
   * Close without draining. Whatever reached the file stays there.
   */
  async abandon(): Promise<void> {
    await this.handle.close();
  }

  private async drain(): Promise<void> {
    let offset = 0;
    while (offset < this.buffered) {
      const { bytesWritten } = await this.handle.write(this.buffer, offset, this.buffered - offset);
      offset += bytesWritten;
    }
    this.flushed += this.buffered;
    this.buffered = 0;
  }
}

function parseContentLength(value: string | null): number | null {
  if (value === null) return null;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : null;
}

/**
 * ArtifactTransfer with a fixed-size write buffer. One attempt, no retry.
 */
export class BufferedTransfer implements ArtifactTransfer {
  private readonly bufferSize: number;
  private readonly requestTimeoutMs: number;

  constructor(
    private readonly httpClient: HttpClient,
    private readonly logger: Logger,
    options: BufferedTransferOptions
  ) {
    this.bufferSize = options.bufferSize;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async transfer(
    url: string,
    destinationPath: string,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    const { signal, onProgress } = options;
    const name = basename(destinationPath);
    const startTime = Date.now();

    this.logger.debug("Transfer starting", {
      url,
      path: destinationPath,
      bufferSize: this.bufferSize,
    });

    if (signal?.aborted) {
      throw new DownloadError(`Download of ${name} was aborted before it started`, "ABORTED");
    }

    let response: Response;
    try {
      response = await this.httpClient.fetch(url, {
        timeout: this.requestTimeoutMs,
        ...(signal ? { signal } : {}),
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new DownloadError(`Download of ${name} was aborted`, "ABORTED", { cause: error });
      }
      throw new DownloadError(
        `Network error downloading ${url}: ${getErrorMessage(error)}`,
        "NETWORK_ERROR",
        { cause: error }
      );
    }

    if (!response.ok) {
      await this.discardBody(response);
      throw new DownloadError(`HTTP ${response.status} downloading ${url}`, "HTTP_ERROR", {
        status: response.status,
      });
    }

    const totalBytes = parseContentLength(response.headers.get("content-length"));

    let writer: BufferedFileWriter;
    try {
      writer = await BufferedFileWriter.open(destinationPath, this.bufferSize);
    } catch (error) {
      await this.discardBody(response);
      throw new DownloadError(
        `Failed to open ${destinationPath}: ${getErrorMessage(error)}`,
        "WRITE_FAILED",
        { cause: error }
      );
    }

    try {
      await this.copyBody(response, writer, url, totalBytes, signal, onProgress);
      await writer.commit();
    } catch (error) {
      await writer.abandon().catch((closeError: unknown) => {
        this.logger.warn("Failed to close partial download", {
          path: destinationPath,
          error: getErrorMessage(closeError),
        });
      });
      if (error instanceof DownloadError) {
        throw error;
      }
      throw new DownloadError(
        `Failed to write ${destinationPath}: ${getErrorMessage(error)}`,
        "WRITE_FAILED",
        { cause: error }
      );
    }

    const bytesWritten = writer.bytesFlushed;
    if (totalBytes !== null) {
      onProgress?.({ bytesDownloaded: bytesWritten, totalBytes });
    }

    const durationMs = Date.now() - startTime;
    this.logger.info("Downloaded", {
      name,
      path: destinationPath,
      bytes: bytesWritten,
      durationMs,
    });

    return { path: destinationPath, bytesWritten, durationMs };
  }

  /**
   * Read the body into the writer. Read failures become NETWORK_ERROR (or
   * ABORTED); write failures propagate as they are.
   */
  private async copyBody(
    response: Response,
    writer: BufferedFileWriter,
    url: string,
    totalBytes: number | null,
    signal: AbortSignal | undefined,
    onProgress: DownloadProgressCallback | undefined
  ): Promise<void> {
    if (!response.body) {
      return;
    }

    const reader = response.body.getReader();
    const onAbort = (): void => {
      reader.cancel(signal?.reason).catch((error: unknown) => {
        this.logger.silly("Reader cancel failed", { url, error: getErrorMessage(error) });
      });
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    const reportDrain = (): void => {
      if (totalBytes !== null) {
        onProgress?.({ bytesDownloaded: writer.bytesFlushed, totalBytes });
      }
    };

    const read = async () => {
      try {
        return await reader.read();
      } catch (error) {
        if (signal?.aborted) {
          throw new DownloadError(`Download of ${url} was aborted`, "ABORTED", { cause: error });
        }
        throw new DownloadError(
          `Failed to read download from ${url}: ${getErrorMessage(error)}`,
          "NETWORK_ERROR",
          { cause: error }
        );
      }
    };

    let nextLogAt = LOG_INTERVAL_BYTES;
    let finished = false;
    try {
      for (;;) {
        const chunk = await read();

        // A cancelled reader reports done, so the signal decides.
        if (signal?.aborted) {
          throw new DownloadError(`Download of ${url} was aborted`, "ABORTED");
        }
        if (chunk.done) {
          finished = true;
          return;
        }

        await writer.write(chunk.value, reportDrain);

        if (writer.bytesAccepted >= nextLogAt) {
          this.logger.debug("Transfer progress", {
            url,
            bytes: writer.bytesAccepted,
            total: totalBytes,
          });
          nextLogAt =
            (Math.floor(writer.bytesAccepted / LOG_INTERVAL_BYTES) + 1) * LOG_INTERVAL_BYTES;
        }
      }
    } finally {
      signal?.removeEventListener("abort", onAbort);
      if (!finished) {
        await reader.cancel().catch((error: unknown) => {
          this.logger.silly("Reader cancel failed", { url, error: getErrorMessage(error) });
        });
      }
    }
  }

  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger.silly("Discarding body failed", { error: getErrorMessage(error) });
    }
  }
}
