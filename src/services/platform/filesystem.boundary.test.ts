// @vitest-environment node
/**
 * Boundary tests for DefaultFileSystemLayer.
 * Tests filesystem operations against real filesystem with temp directories.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import {
  mkdir as nodeMkdir,
  readFile as nodeReadFile,
  stat as nodeStat,
  symlink as nodeSymlink,
  writeFile as nodeWriteFile,
} from "node:fs/promises";
import { DefaultFileSystemLayer } from "./filesystem";
import { FileSystemError } from "../errors";
import { createSilentLogger } from "../logging/logging.test-utils";
import { createTempDir, type TempDir } from "../test-utils";

const isWindows = process.platform === "win32";

describe("DefaultFileSystemLayer", () => {
  let fs: DefaultFileSystemLayer;
  let tempDir: TempDir;

  beforeEach(async () => {
    fs = new DefaultFileSystemLayer(createSilentLogger());
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  describe("readFile / writeFile", () => {
    it("round-trips UTF-8 content", async () => {
      const filePath = join(tempDir.path, "version.txt");

      await fs.writeFile(filePath, "v1.2.3");

      expect(await fs.readFile(filePath)).toBe("v1.2.3");
    });

    it("throws ENOENT for a missing file", async () => {
      const filePath = join(tempDir.path, "missing.txt");

      await expect(fs.readFile(filePath)).rejects.toMatchObject({
        fsCode: "ENOENT",
        path: filePath,
      });
    });

    it("throws EISDIR when reading a directory", async () => {
      await expect(fs.readFile(tempDir.path)).rejects.toBeInstanceOf(FileSystemError);
      await expect(fs.readFile(tempDir.path)).rejects.toMatchObject({ fsCode: "EISDIR" });
    });
  });

  describe("mkdir", () => {
    it("creates nested directories by default", async () => {
      const dirPath = join(tempDir.path, "a", "b", "c");

      await fs.mkdir(dirPath);

      expect((await nodeStat(dirPath)).isDirectory()).toBe(true);
    });

    it("succeeds for an existing directory", async () => {
      await expect(fs.mkdir(tempDir.path)).resolves.toBeUndefined();
    });
  });

  describe("readdir", () => {
    it("reports entry types", async () => {
      await nodeWriteFile(join(tempDir.path, "file.txt"), "x");
      await nodeMkdir(join(tempDir.path, "dir"));

      const entries = await fs.readdir(tempDir.path);
      const byName = new Map(entries.map((entry) => [entry.name, entry]));

      expect(byName.get("file.txt")).toMatchObject({ isFile: true, isDirectory: false });
      expect(byName.get("dir")).toMatchObject({ isFile: false, isDirectory: true });
    });
  });

  describe("lstat", () => {
    it("returns size for files", async () => {
      const filePath = join(tempDir.path, "data.bin");
      await nodeWriteFile(filePath, Buffer.alloc(12));

      const stat = await fs.lstat(filePath);

      expect(stat).toMatchObject({ isFile: true, isDirectory: false, size: 12 });
    });

    it.skipIf(isWindows)("reports permission bits only", async () => {
      const filePath = join(tempDir.path, "tool");
      await nodeWriteFile(filePath, "#!/bin/sh\n", { mode: 0o755 });
      await fs.chmod(filePath, 0o750);

      expect((await fs.lstat(filePath)).mode).toBe(0o750);
    });

    it.skipIf(isWindows)("does not follow symbolic links", async () => {
      const target = join(tempDir.path, "target.txt");
      const link = join(tempDir.path, "link");
      await nodeWriteFile(target, "x");
      await nodeSymlink("target.txt", link);

      const stat = await fs.lstat(link);

      expect(stat.isSymbolicLink).toBe(true);
      expect(await fs.readlink(link)).toBe("target.txt");
    });
  });

  describe("rm", () => {
    it("removes a directory tree with recursive", async () => {
      const dirPath = join(tempDir.path, "tree");
      await nodeMkdir(join(dirPath, "nested"), { recursive: true });
      await nodeWriteFile(join(dirPath, "nested", "file.txt"), "x");

      await fs.rm(dirPath, { recursive: true });

      await expect(nodeStat(dirPath)).rejects.toMatchObject({ code: "ENOENT" });
    });

    it("refuses a non-empty directory without recursive", async () => {
      const dirPath = join(tempDir.path, "tree");
      await nodeMkdir(dirPath);
      await nodeWriteFile(join(dirPath, "file.txt"), "x");

      await expect(fs.rm(dirPath)).rejects.toMatchObject({ fsCode: "ENOTEMPTY" });
    });

    it("ignores a missing path with force", async () => {
      await expect(
        fs.rm(join(tempDir.path, "missing"), { force: true })
      ).resolves.toBeUndefined();
    });

    it("throws ENOENT for a missing path without force", async () => {
      await expect(fs.rm(join(tempDir.path, "missing"))).rejects.toMatchObject({
        fsCode: "ENOENT",
      });
    });
  });

  describe("rename", () => {
    it("moves a file", async () => {
      const src = join(tempDir.path, "src.txt");
      const dest = join(tempDir.path, "dest.txt");
      await nodeWriteFile(src, "payload");

      await fs.rename(src, dest);

      expect(await nodeReadFile(dest, "utf-8")).toBe("payload");
      await expect(nodeStat(src)).rejects.toMatchObject({ code: "ENOENT" });
    });

    it("maps a missing source to ENOENT with the source path", async () => {
      const src = join(tempDir.path, "missing");

      await expect(fs.rename(src, join(tempDir.path, "dest"))).rejects.toMatchObject({
        fsCode: "ENOENT",
        path: src,
      });
    });
  });

  describe("copyFile", () => {
    it("streams the bytes into a new file", async () => {
      const src = join(tempDir.path, "src.bin");
      const dest = join(tempDir.path, "dest.bin");
      const payload = Buffer.from([0, 1, 2, 3, 254, 255]);
      await nodeWriteFile(src, payload);

      await fs.copyFile(src, dest);

      expect(await nodeReadFile(dest)).toEqual(payload);
    });

    it("throws ENOENT for a missing source", async () => {
      await expect(
        fs.copyFile(join(tempDir.path, "missing"), join(tempDir.path, "dest"))
      ).rejects.toMatchObject({ fsCode: "ENOENT" });
    });
  });

  describe("symlink", () => {
    it.skipIf(isWindows)("creates a relative link", async () => {
      await nodeWriteFile(join(tempDir.path, "bin-1.0"), "x");
      const link = join(tempDir.path, "bin");

      await fs.symlink("bin-1.0", link);

      expect(await nodeReadFile(link, "utf-8")).toBe("x");
    });

    it.skipIf(isWindows)("throws EEXIST when the link path is taken", async () => {
      const link = join(tempDir.path, "taken");
      await nodeWriteFile(link, "x");

      await expect(fs.symlink("elsewhere", link)).rejects.toMatchObject({ fsCode: "EEXIST" });
    });
  });
});
