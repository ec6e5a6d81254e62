/**
 * Tests for configuration resolution.
 */

import { describe, it, expect } from "vitest";
import { join, resolve } from "node:path";
import { resolveConfig, defaultCacheDir } from "./config-service";
import { ConfigError } from "../errors";
import { createMockPlatformInfo } from "../platform/platform-info.test-utils";

const platformInfo = createMockPlatformInfo({ homeDir: "/home/test" });

describe("resolveConfig", () => {
  it("applies defaults", () => {
    const config = resolveConfig({}, {}, platformInfo);

    expect(config).toEqual({
      concurrency: 5,
      bufferSize: 8 * 1024 * 1024,
      timeoutMs: 30 * 60 * 1000,
      cacheDir: resolve(join("/home/test", ".cache", "release-fetch")),
      targetDir: undefined,
      autoExtract: false,
      downloadSource: true,
      checkLatest: true,
      showProgress: false,
      accessToken: undefined,
      apiBaseUrl: "https://api.github.com",
      webBaseUrl: "https://github.com",
      userAgent: "release-fetch",
      logLevel: "info",
      logDir: undefined,
      printLogs: false,
    });
  });

  it("prefers explicit options over the environment", () => {
    const config = resolveConfig(
      { cacheDir: "/opt/cache", accessToken: "option-token", logLevel: "error" },
      {
        RELEASE_FETCH_CACHE_DIR: "/env/cache",
        RELEASE_FETCH_TOKEN: "test-secret",
        RELEASE_FETCH_LOGLEVEL: "debug",
      },
      platformInfo
    );

    expect(config.cacheDir).toBe(resolve("/opt/cache"));
    expect(config.accessToken).toBe("option-token");
    expect(config.logLevel).toBe("error");
  });

  it("reads the environment when options are absent", () => {
    const config = resolveConfig(
      {},
      {
        RELEASE_FETCH_CACHE_DIR: "/env/cache",
        GITHUB_TOKEN: "test-secret",
        RELEASE_FETCH_LOGLEVEL: "DEBUG",
        RELEASE_FETCH_LOG_DIR: "/env/logs",
        RELEASE_FETCH_PRINT_LOGS: "1",
      },
      platformInfo
    );

    expect(config.cacheDir).toBe(resolve("/env/cache"));
    expect(config.accessToken).toBe("test-secret");
    expect(config.logLevel).toBe("debug");
    expect(config.logDir).toBe(resolve("/env/logs"));
    expect(config.printLogs).toBe(true);
  });

  it("prefers RELEASE_FETCH_TOKEN over GITHUB_TOKEN", () => {
    const config = resolveConfig(
      {},
      { RELEASE_FETCH_TOKEN: "test-secret", GITHUB_TOKEN: "other-secret" },
      platformInfo
    );

    expect(config.accessToken).toBe("test-secret");
  });

  it("ignores an invalid log level from the environment", () => {
    const config = resolveConfig({}, { RELEASE_FETCH_LOGLEVEL: "loud" }, platformInfo);

    expect(config.logLevel).toBe("info");
  });

  it("strips trailing slashes from base URLs", () => {
    const config = resolveConfig(
      { apiBaseUrl: "http://127.0.0.1:8080/api/", webBaseUrl: "http://127.0.0.1:8080//" },
      {},
      platformInfo
    );

    expect(config.apiBaseUrl).toBe("http://127.0.0.1:8080/api");
    expect(config.webBaseUrl).toBe("http://127.0.0.1:8080");
  });

  it("resolves relative target directories", () => {
    const config = resolveConfig({ targetDir: "bin" }, {}, platformInfo);

    expect(config.targetDir).toBe(resolve("bin"));
  });

  it("accepts the longest timeout a timer can wait", () => {
    expect(resolveConfig({ timeoutMs: 2_147_483_647 }, {}, platformInfo).timeoutMs).toBe(
      2_147_483_647
    );
  });

  it.each([
    [{ concurrency: 0 }, "concurrency: concurrency must be at least 1"],
    [{ bufferSize: 0 }, "bufferSize: bufferSize must be at least 1 byte"],
    [{ timeoutMs: -1 }, "timeoutMs: timeoutMs must be positive"],
    [{ timeoutMs: 2_147_483_648 }, "timeoutMs: timeoutMs must not exceed 2147483647 ms"],
    [{ targetDir: "" }, "targetDir: targetDir must not be empty"],
  ])("rejects %o", (options, detail) => {
    expect(() => resolveConfig(options, {}, platformInfo)).toThrow(
      new ConfigError(`Invalid configuration: ${detail}`)
    );
  });

  it("rejects a malformed API URL with code INVALID_CONFIG", () => {
    try {
      resolveConfig({ apiBaseUrl: "not a url" }, {}, platformInfo);
      expect.fail("expected ConfigError");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ code: "INVALID_CONFIG", type: "config" });
    }
  });
});

describe("defaultCacheDir", () => {
  it("uses XDG_CACHE_HOME when set", () => {
    expect(defaultCacheDir({ XDG_CACHE_HOME: "/xdg" }, platformInfo)).toBe(
      join("/xdg", "release-fetch")
    );
  });

  it("uses LOCALAPPDATA on Windows", () => {
    const windows = createMockPlatformInfo({ platform: "win32", homeDir: "C:\\Users\\test" });

    expect(defaultCacheDir({ LOCALAPPDATA: "C:\\Users\\test\\AppData\\Local" }, windows)).toBe(
      join("C:\\Users\\test\\AppData\\Local", "release-fetch", "cache")
    );
  });

  it("falls back to ~/.cache", () => {
    expect(defaultCacheDir({}, platformInfo)).toBe(join("/home/test", ".cache", "release-fetch"));
  });
});
