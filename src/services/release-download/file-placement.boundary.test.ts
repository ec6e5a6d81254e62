/**
 * Boundary tests for DefaultFilePlacement on the real filesystem.
 * Cross-device moves are simulated by a filesystem whose rename fails.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  chmod,
  mkdir,
  readFile,
  readdir,
  readlink,
  stat,
  symlink,
  writeFile,
} from "node:fs/promises";
import { join } from "node:path";
import { DefaultFilePlacement } from "./file-placement";
import { DefaultFileSystemLayer, type RmOptions } from "../platform/filesystem";
import { createSilentLogger } from "../logging/logging.test-utils";
import { createTempDir, type TempDir } from "../test-utils";
import { FileSystemError, PlacementError } from "../errors";

const isWindows = process.platform === "win32";

/**
 * Filesystem whose rename always fails like a move across devices.
 */
class CrossDeviceFileSystem extends DefaultFileSystemLayer {
  override async rename(oldPath: string): Promise<void> {
    throw new FileSystemError("EXDEV", oldPath, "cross-device link not permitted");
  }
}

/**
 * Cross-device filesystem that also refuses some removals and chmods.
 */
class FaultyFileSystem extends CrossDeviceFileSystem {
  constructor(
    private readonly failRm: string | null,
    private readonly failChmod: boolean
  ) {
    super(createSilentLogger());
  }

  override async rm(path: string, options?: RmOptions): Promise<void> {
    if (path === this.failRm) {
      throw new FileSystemError("EACCES", path, "permission denied");
    }
    return super.rm(path, options);
  }

  override async chmod(path: string): Promise<void> {
    if (this.failChmod) {
      throw new FileSystemError("EPERM", path, "operation not permitted");
    }
  }
}

describe("DefaultFilePlacement (boundary)", () => {
  let tempDir: TempDir;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  function createPlacement(fs = new DefaultFileSystemLayer(createSilentLogger())) {
    return new DefaultFilePlacement(fs, createSilentLogger());
  }

  it("moves a file and creates missing parent directories", async () => {
    const source = join(tempDir.path, "tool");
    const target = join(tempDir.path, "bin", "nested", "tool");
    await writeFile(source, "binary");

    const result = await createPlacement().place(source, target);

    expect(result).toEqual({ path: target, warnings: [] });
    expect(await readFile(target, "utf-8")).toBe("binary");
    await expect(stat(source)).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("replaces an existing target directory instead of merging", async () => {
    const source = join(tempDir.path, "new");
    const target = join(tempDir.path, "target");
    await mkdir(source);
    await writeFile(join(source, "a.txt"), "new a");
    await mkdir(target);
    await writeFile(join(target, "stale.txt"), "stale");

    await createPlacement().place(source, target);

    expect(await readdir(target)).toEqual(["a.txt"]);
    expect(await readFile(join(target, "a.txt"), "utf-8")).toBe("new a");
  });

  it("returns the target unchanged when source and target are the same", async () => {
    const source = join(tempDir.path, "tool");
    await writeFile(source, "binary");

    const result = await createPlacement().place(source, source);

    expect(result).toEqual({ path: source, warnings: [] });
    expect(await readFile(source, "utf-8")).toBe("binary");
  });

  it("fails with SOURCE_MISSING when there is nothing to move", async () => {
    const error = await createPlacement()
      .place(join(tempDir.path, "missing"), join(tempDir.path, "target"))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PlacementError);
    expect(error).toMatchObject({
      errorCode: "SOURCE_MISSING",
      path: join(tempDir.path, "missing"),
    });
  });

  it("fails with PREPARE_FAILED when the target parent cannot be created", async () => {
    const source = join(tempDir.path, "tool");
    const blocker = join(tempDir.path, "file");
    await writeFile(source, "binary");
    await writeFile(blocker, "not a directory");

    await expect(createPlacement().place(source, join(blocker, "tool"))).rejects.toMatchObject({
      errorCode: "PREPARE_FAILED",
    });
  });

  describe("copy fallback", () => {
    it("copies a directory tree when rename fails", async () => {
      const source = join(tempDir.path, "extracted");
      const target = join(tempDir.path, "out", "extracted");
      await mkdir(join(source, "bin"), { recursive: true });
      await writeFile(join(source, "bin", "tool"), "binary");
      await writeFile(join(source, "README.md"), "readme");

      const result = await createPlacement(new CrossDeviceFileSystem(createSilentLogger())).place(
        source,
        target
      );

      expect(result).toEqual({ path: target, warnings: [] });
      expect(await readFile(join(target, "bin", "tool"), "utf-8")).toBe("binary");
      expect(await readFile(join(target, "README.md"), "utf-8")).toBe("readme");
      await expect(stat(source)).rejects.toMatchObject({ code: "ENOENT" });
    });

    it.skipIf(isWindows)("keeps permission bits and symbolic links", async () => {
      const source = join(tempDir.path, "extracted");
      const target = join(tempDir.path, "out");
      await mkdir(source, { mode: 0o750 });
      await chmod(source, 0o750);
      await writeFile(join(source, "tool"), "binary");
      await chmod(join(source, "tool"), 0o755);
      await symlink("tool", join(source, "tool-link"));

      await createPlacement(new CrossDeviceFileSystem(createSilentLogger())).place(source, target);

      expect((await stat(target)).mode & 0o777).toBe(0o750);
      expect((await stat(join(target, "tool"))).mode & 0o777).toBe(0o755);
      expect(await readlink(join(target, "tool-link"))).toBe("tool");
    });

    it("reports a source that could not be removed as a warning", async () => {
      const source = join(tempDir.path, "tool");
      const target = join(tempDir.path, "out", "tool");
      await writeFile(source, "binary");

      const result = await createPlacement(new FaultyFileSystem(source, false)).place(
        source,
        target
      );

      expect(result.path).toBe(target);
      expect(result.warnings).toEqual([
        {
          kind: "cleanup",
          message: `Copied ${source} but could not remove it: permission denied`,
          path: source,
        },
      ]);
      expect(await readFile(target, "utf-8")).toBe("binary");
      expect(await readFile(source, "utf-8")).toBe("binary");
    });

    it("reports chmod failures as warnings", async () => {
      const source = join(tempDir.path, "tool");
      const target = join(tempDir.path, "out", "tool");
      await writeFile(source, "binary");

      const result = await createPlacement(new FaultyFileSystem(null, true)).place(source, target);

      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0]).toMatchObject({ kind: "chmod", path: target });
    });

    it("fails with COPY_FAILED when the copy fails", async () => {
      class BrokenCopyFileSystem extends CrossDeviceFileSystem {
        override async copyFile(src: string): Promise<void> {
          throw new FileSystemError("UNKNOWN", src, "disk full", undefined, "ENOSPC");
        }
      }
      const source = join(tempDir.path, "tool");
      await writeFile(source, "binary");

      await expect(
        createPlacement(new BrokenCopyFileSystem(createSilentLogger())).place(
          source,
          join(tempDir.path, "out", "tool")
        )
      ).rejects.toMatchObject({
        errorCode: "COPY_FAILED",
        message: `Failed to copy ${source} to ${join(tempDir.path, "out", "tool")}: disk full`,
      });
    });
  });
});
