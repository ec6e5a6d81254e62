/**
 * Tests for platform key translation.
 */

import { describe, it, expect } from "vitest";
import { createPlatformInfo, toPlatformKey } from "./platform-info";
import { createMockPlatformInfo } from "./platform-info.test-utils";

describe("toPlatformKey", () => {
  it("maps linux x64 to linux/amd64", () => {
    expect(toPlatformKey(createMockPlatformInfo())).toEqual({ os: "linux", arch: "amd64" });
  });

  it("maps win32 to windows", () => {
    const key = toPlatformKey(createMockPlatformInfo({ platform: "win32", arch: "ia32" }));
    expect(key).toEqual({ os: "windows", arch: "386" });
  });

  it("keeps darwin and arm64 unchanged", () => {
    const key = toPlatformKey(createMockPlatformInfo({ platform: "darwin", arch: "arm64" }));
    expect(key).toEqual({ os: "darwin", arch: "arm64" });
  });

  it("maps mipsel to mipsle", () => {
    expect(toPlatformKey(createMockPlatformInfo({ arch: "mipsel" })).arch).toBe("mipsle");
  });

  it("distinguishes little-endian ppc64", () => {
    expect(toPlatformKey(createMockPlatformInfo({ arch: "ppc64", endianness: "LE" })).arch).toBe(
      "ppc64le"
    );
    expect(toPlatformKey(createMockPlatformInfo({ arch: "ppc64", endianness: "BE" })).arch).toBe(
      "ppc64"
    );
  });

  it("passes unknown names through", () => {
    const key = toPlatformKey(createMockPlatformInfo({ platform: "aix", arch: "riscv64" }));
    expect(key).toEqual({ os: "aix", arch: "riscv64" });
  });
});

describe("createPlatformInfo", () => {
  it("reflects the running process", () => {
    const info = createPlatformInfo();

    expect(info.platform).toBe(process.platform);
    expect(info.arch).toBe(process.arch);
    expect(["BE", "LE"]).toContain(info.endianness);
  });
});
