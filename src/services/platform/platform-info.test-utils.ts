/**
 * Test utilities for PlatformInfo.
 */
import type { PlatformInfo } from "./platform-info";

/**
 * Create a mock PlatformInfo.
 * Defaults to little-endian Linux x64 with a test home directory.
 */
export function createMockPlatformInfo(overrides?: Partial<PlatformInfo>): PlatformInfo {
  return {
    platform: overrides?.platform ?? "linux",
    arch: overrides?.arch ?? "x64",
    endianness: overrides?.endianness ?? "LE",
    homeDir: overrides?.homeDir ?? "/home/test",
  };
}
