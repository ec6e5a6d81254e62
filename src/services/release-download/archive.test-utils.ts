/**
 * Test utilities for archive extraction: real archives written to disk and
 * a mock ArchiveExtractor.
 */

import { createWriteStream } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { gzipSync } from "node:zlib";
import archiver from "archiver";
import * as tar from "tar";
import { vi, type Mock } from "vitest";
import { ArchiveError, type ArchiveErrorCode } from "../errors";
import type { ArchiveExtractor } from "./archive-extractor";
import type { ExtractionResult } from "./types";

/** File content, optionally with Unix permission bits */
export type TestFile = string | { readonly content: string; readonly mode: number };

function contentOf(file: TestFile): string {
  return typeof file === "string" ? file : file.content;
}

/**
 * Write a zip archive.
 *
 * @example
 * const archivePath = await createTestZip(tempDir.path, "tool.zip", {
 *   "bin/tool": { content: "#!/bin/sh", mode: 0o755 },
 *   "README.md": "readme",
 * });
 */
export function createTestZip(
  dir: string,
  name: string,
  files: Record<string, TestFile>
): Promise<string> {
  const archivePath = join(dir, name);

  return new Promise((resolve, reject) => {
    const output = createWriteStream(archivePath);
    const archive = archiver("zip", { zlib: { level: 9 } });

    output.on("close", () => resolve(archivePath));
    output.on("error", reject);
    archive.on("error", reject);
    archive.pipe(output);

    for (const [relativePath, file] of Object.entries(files)) {
      archive.append(contentOf(file), {
        name: relativePath,
        ...(typeof file === "string" ? {} : { mode: file.mode }),
      });
    }

    archive.finalize().catch(reject);
  });
}

/**
 * Write a tar.gz archive from files laid out in a scratch directory.
 */
export async function createTestTarGz(
  dir: string,
  name: string,
  files: Record<string, TestFile>
): Promise<string> {
  const sourceDir = join(dir, `${name}-source`);
  const archivePath = join(dir, name);

  for (const [relativePath, file] of Object.entries(files)) {
    const fullPath = join(sourceDir, relativePath);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, contentOf(file), typeof file === "string" ? {} : { mode: file.mode });
  }

  await tar.create({ gzip: true, file: archivePath, cwd: sourceDir }, ["."]);
  return archivePath;
}

/**
 * Entry of a hand-assembled tar archive. Unlike tar.create, nothing about
 * the entry is normalized, so links and hostile paths can be expressed.
 */
export interface RawTarEntry {
  readonly path: string;
  readonly type: "File" | "Directory" | "SymbolicLink" | "Link";
  readonly body?: string;
  readonly linkpath?: string;
  readonly mode?: number;
}

const BLOCK_SIZE = 512;

/**
 * Write a tar.gz archive entry by entry.
 */
export async function createRawTarGz(
  dir: string,
  name: string,
  entries: readonly RawTarEntry[]
): Promise<string> {
  const blocks: Buffer[] = [];

  for (const entry of entries) {
    const body = Buffer.from(entry.body ?? "");
    const header = new tar.Header({
      path: entry.path,
      type: entry.type,
      size: body.length,
      mode: entry.mode ?? (entry.type === "Directory" ? 0o755 : 0o644),
      linkpath: entry.linkpath,
      mtime: new Date(0),
      uid: 0,
      gid: 0,
    });
    const block = Buffer.alloc(BLOCK_SIZE);
    header.encode(block, 0);
    blocks.push(block);

    if (body.length > 0) {
      const padded = Buffer.alloc(Math.ceil(body.length / BLOCK_SIZE) * BLOCK_SIZE);
      body.copy(padded);
      blocks.push(padded);
    }
  }
  blocks.push(Buffer.alloc(BLOCK_SIZE * 2));

  const archivePath = join(dir, name);
  await writeFile(archivePath, gzipSync(Buffer.concat(blocks)));
  return archivePath;
}

/**
 * Write a single gzip-compressed file.
 */
export async function createTestGz(dir: string, name: string, content: string): Promise<string> {
  const archivePath = join(dir, name);
  await writeFile(archivePath, gzipSync(Buffer.from(content)));
  return archivePath;
}

// ============================================================================
// Mock ArchiveExtractor
// ============================================================================

export interface MockArchiveExtractorOptions {
  /** Reject every extraction with this error */
  error?: { message: string; code: ArchiveErrorCode };
  /** Result per archive path. Default: the path with its extension dropped */
  results?: Record<string, ExtractionResult>;
}

export interface MockArchiveExtractor extends ArchiveExtractor {
  extract: Mock<(archivePath: string) => Promise<ExtractionResult>>;
}

export function createMockArchiveExtractor(
  options: MockArchiveExtractorOptions = {}
): MockArchiveExtractor {
  return {
    extract: vi.fn(async (archivePath: string): Promise<ExtractionResult> => {
      if (options.error) {
        throw new ArchiveError(options.error.message, options.error.code);
      }
      return (
        options.results?.[archivePath] ?? {
          path: archivePath.replace(/\.[^./]+$/, ""),
          warnings: [],
        }
      );
    }),
  };
}
