/**
 * Platform information provider.
 * Abstracts process.platform, process.arch, os.endianness() and os.homedir()
 * for testability.
 */

import { endianness, homedir } from "node:os";

export interface PlatformInfo {
  /** Operating system platform: 'linux', 'darwin', 'win32', ... */
  readonly platform: NodeJS.Platform;

  /** CPU architecture as reported by Node.js: 'x64', 'arm64', 'ia32', ... */
  readonly arch: string;

  /** Byte order of the CPU */
  readonly endianness: "BE" | "LE";

  /** User's home directory */
  readonly homeDir: string;
}

/**
 * Operating system and architecture in the vocabulary release artifacts
 * are usually named with (linux/darwin/windows, amd64/386/arm64).
 */
export interface PlatformKey {
  readonly os: string;
  readonly arch: string;
}

/**
 * Read platform information from the running process.
 */
export function createPlatformInfo(): PlatformInfo {
  return {
    platform: process.platform,
    arch: process.arch,
    endianness: endianness(),
    homeDir: homedir(),
  };
}

const OS_NAMES: Partial<Record<NodeJS.Platform, string>> = {
  win32: "windows",
};

const ARCH_NAMES: Record<string, string> = {
  x64: "amd64",
  ia32: "386",
  mipsel: "mipsle",
};

/**
 * Translate Node.js platform names into a PlatformKey.
 * Names without a translation pass through unchanged.
 */
export function toPlatformKey(info: PlatformInfo): PlatformKey {
  const os = OS_NAMES[info.platform] ?? info.platform;
  let arch = ARCH_NAMES[info.arch] ?? info.arch;
  if (arch === "ppc64" && info.endianness === "LE") {
    arch = "ppc64le";
  }
  return { os, arch };
}
