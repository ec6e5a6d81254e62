/**
 * Pick the release artifacts built for the current platform.
 *
 * An artifact matches when its lower-cased name contains an alias of the
 * operating system and an alias of the architecture. Matching is by plain
 * substring: "x86" is found inside "x86_64" and "win" inside "darwin".
 */

import type { PlatformKey } from "../platform/platform-info";
import type { Artifact, AssetSelection } from "./types";

/**
 * Operating system aliases seen in artifact names.
 */
export const OS_ALIASES: Readonly<Record<string, readonly string[]>> = {
  linux: ["linux", "gnu", "gnulinux"],
  darwin: ["darwin", "mac", "osx"],
  windows: ["windows", "win"],
  freebsd: ["freebsd", "bsd"],
  openbsd: ["openbsd", "bsd"],
  netbsd: ["netbsd", "bsd"],
};

/**
 * Architecture aliases seen in artifact names.
 */
export const ARCH_ALIASES: Readonly<Record<string, readonly string[]>> = {
  amd64: ["amd64", "x86_64", "64bit"],
  "386": ["386", "i386", "x86", "32bit"],
  arm: ["arm", "armv5", "armv6", "armv7"],
  arm64: ["arm64", "aarch64"],
  mips: ["mips"],
  mipsle: ["mipsle", "mips32le"],
  mips64: ["mips64"],
  mips64le: ["mips64le"],
  ppc64: ["ppc64", "powerpc64"],
  ppc64le: ["ppc64le", "powerpc64le"],
  s390x: ["s390x", "s390"],
};

function containsAny(name: string, aliases: readonly string[]): boolean {
  return aliases.some((alias) => name.includes(alias));
}

/**
 * Whether an artifact name refers to the given platform.
 * Unknown OS or architecture names are matched literally.
 */
export function matchesPlatform(artifactName: string, platform: PlatformKey): boolean {
  const name = artifactName.toLowerCase();
  const osAliases = OS_ALIASES[platform.os] ?? [platform.os];
  const archAliases = ARCH_ALIASES[platform.arch] ?? [platform.arch];
  return containsAny(name, osAliases) && containsAny(name, archAliases);
}

/**
 * Choose which artifacts to download.
 *
 * - zero or one artifact: returned unchanged ("passthrough")
 * - otherwise every matching artifact, in release order ("matched")
 * - no match: the first artifact alone ("fallback")
 */
export function selectArtifacts(
  artifacts: readonly Artifact[],
  platform: PlatformKey
): AssetSelection {
  const [first] = artifacts;
  if (first === undefined || artifacts.length === 1) {
    return { artifacts, outcome: "passthrough" };
  }

  const matched = artifacts.filter((artifact) => matchesPlatform(artifact.name, platform));
  if (matched.length > 0) {
    return { artifacts: matched, outcome: "matched" };
  }

  return { artifacts: [first], outcome: "fallback" };
}
