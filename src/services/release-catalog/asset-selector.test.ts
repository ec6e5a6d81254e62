import { describe, it, expect } from "vitest";
import { matchesPlatform, selectArtifacts } from "./asset-selector";
import { createArtifact } from "./release-catalog.test-utils";

const linuxAmd64 = { os: "linux", arch: "amd64" };

function names(selection: ReturnType<typeof selectArtifacts>): string[] {
  return selection.artifacts.map((artifact) => artifact.name);
}

describe("selectArtifacts", () => {
  it("passes an empty list through", () => {
    expect(selectArtifacts([], linuxAmd64)).toEqual({ artifacts: [], outcome: "passthrough" });
  });

  it("passes a single artifact through even if it names another platform", () => {
    const only = createArtifact("tool-windows-arm64.zip");

    expect(selectArtifacts([only], linuxAmd64)).toEqual({
      artifacts: [only],
      outcome: "passthrough",
    });
  });

  it("keeps every match in release order", () => {
    const artifacts = [
      createArtifact("tool-darwin-arm64.tar.gz"),
      createArtifact("tool-linux-x86_64.tar.gz"),
      createArtifact("tool-windows-amd64.zip"),
      createArtifact("tool-Linux-AMD64.deb"),
    ];

    const selection = selectArtifacts(artifacts, linuxAmd64);

    expect(selection.outcome).toBe("matched");
    expect(names(selection)).toEqual(["tool-linux-x86_64.tar.gz", "tool-Linux-AMD64.deb"]);
  });

  it("falls back to the first artifact when nothing matches", () => {
    const artifacts = [createArtifact("checksums.txt"), createArtifact("tool-src.tar.gz")];

    const selection = selectArtifacts(artifacts, linuxAmd64);

    expect(selection.outcome).toBe("fallback");
    expect(names(selection)).toEqual(["checksums.txt"]);
  });

  it("requires both OS and architecture", () => {
    const artifacts = [createArtifact("tool-linux-arm64"), createArtifact("tool-darwin-amd64")];

    expect(selectArtifacts(artifacts, linuxAmd64).outcome).toBe("fallback");
  });
});

describe("matchesPlatform", () => {
  it.each([
    ["tool_macOS_arm64.zip", { os: "darwin", arch: "arm64" }],
    ["tool-osx-aarch64.tar.gz", { os: "darwin", arch: "arm64" }],
    ["tool-win-32bit.exe", { os: "windows", arch: "386" }],
    ["tool-gnu-i386.tar.gz", { os: "linux", arch: "386" }],
    ["tool-freebsd-amd64", { os: "freebsd", arch: "amd64" }],
    ["tool-linux-armv7.tar.gz", { os: "linux", arch: "arm" }],
    ["tool-linux-powerpc64le", { os: "linux", arch: "ppc64le" }],
    ["tool-linux-mips32le", { os: "linux", arch: "mipsle" }],
    ["tool-linux-s390x", { os: "linux", arch: "s390x" }],
  ])("matches %s for %o", (name, platform) => {
    expect(matchesPlatform(name, platform)).toBe(true);
  });

  it("matches by substring, so darwin names satisfy the windows alias", () => {
    expect(matchesPlatform("tool-darwin-amd64", { os: "windows", arch: "amd64" })).toBe(true);
  });

  it("matches unknown platform names literally", () => {
    expect(matchesPlatform("tool-aix-riscv64", { os: "aix", arch: "riscv64" })).toBe(true);
    expect(matchesPlatform("tool-linux-riscv64", { os: "aix", arch: "riscv64" })).toBe(false);
  });

  it("shares the bsd alias between BSD flavours", () => {
    expect(matchesPlatform("tool-bsd-amd64", { os: "openbsd", arch: "amd64" })).toBe(true);
  });
});
