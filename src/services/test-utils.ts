/**
 * Test utilities for service tests: temporary directories with cleanup.
 */

import { mkdtemp, rm, realpath } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export interface TempDir {
  readonly path: string;
  cleanup(): Promise<void>;
}

/**
 * Create a temporary directory.
 * Uses realpath so path comparisons hold on hosts where tmpdir is a link
 * (macOS /var → /private/var, Windows 8.3 short names).
 */
export async function createTempDir(prefix = "release-fetch-test-"): Promise<TempDir> {
  const tempPath = await mkdtemp(join(tmpdir(), prefix));
  const resolvedPath = await realpath(tempPath);
  return {
    path: resolvedPath,
    cleanup: async () => {
      await rm(resolvedPath, {
        recursive: true,
        force: true,
        // Windows may hold handles briefly after a file is closed
        maxRetries: 5,
        retryDelay: 200,
      });
    },
  };
}

/**
 * Run a test function with a temporary directory, removed afterwards even
 * if the function throws.
 */
export async function withTempDir(fn: (dirPath: string) => Promise<void>): Promise<void> {
  const { path, cleanup } = await createTempDir();
  try {
    await fn(path);
  } finally {
    await cleanup();
  }
}
