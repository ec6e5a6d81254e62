import { describe, it, expect } from "vitest";
import { ReleaseResolver } from "./release-resolver";
import { createFakeReleaseCatalog, createRelease } from "./release-catalog.test-utils";
import { ReleaseNotFoundError } from "../errors";
import { createSilentLogger } from "../logging/logging.test-utils";

function createResolver(webBaseUrl?: string) {
  const catalog = createFakeReleaseCatalog({
    "acme/widget": [createRelease("v1.1.0", ["widget.zip"]), createRelease("v1.0.0")],
    "acme/empty": [],
  });
  const resolver = new ReleaseResolver(catalog, createSilentLogger(), { webBaseUrl });
  return { catalog, resolver };
}

describe("ReleaseResolver", () => {
  it("resolves the latest release", async () => {
    const { resolver } = createResolver();

    const release = await resolver.resolveLatest("acme", "widget");

    expect(release.tag).toBe("v1.1.0");
    expect(release.artifacts.map((artifact) => artifact.name)).toEqual(["widget.zip"]);
  });

  it("resolves a release by tag", async () => {
    const { resolver } = createResolver();

    expect((await resolver.resolveByTag("acme", "widget", "v1.0.0")).tag).toBe("v1.0.0");
  });

  it("propagates ReleaseNotFoundError", async () => {
    const { resolver } = createResolver();

    await expect(resolver.resolveLatest("acme", "empty")).rejects.toBeInstanceOf(
      ReleaseNotFoundError
    );
    await expect(resolver.resolveByTag("acme", "widget", "v0.1.0")).rejects.toMatchObject({
      type: "release-not-found",
      tag: "v0.1.0",
    });
  });

  it("returns the latest tag", async () => {
    const { resolver } = createResolver();

    expect(await resolver.latestTag("acme", "widget")).toBe("v1.1.0");
  });

  describe("sourceArchiveUrl", () => {
    it("builds the URL for an explicit tag without a lookup", async () => {
      const { resolver, catalog } = createResolver();

      const url = await resolver.sourceArchiveUrl("acme", "widget", "v1.0.0");

      expect(url).toBe("https://github.com/acme/widget/archive/refs/tags/v1.0.0.tar.gz");
      expect(catalog.getLatestRelease).not.toHaveBeenCalled();
    });

    it("uses the latest tag when the tag is empty", async () => {
      const { resolver } = createResolver();

      expect(await resolver.sourceArchiveUrl("acme", "widget", "")).toBe(
        "https://github.com/acme/widget/archive/refs/tags/v1.1.0.tar.gz"
      );
    });

    it("uses the configured web root", async () => {
      const { resolver } = createResolver("http://127.0.0.1:9000");

      expect(await resolver.sourceArchiveUrl("acme", "widget")).toBe(
        "http://127.0.0.1:9000/acme/widget/archive/refs/tags/v1.1.0.tar.gz"
      );
    });

    it("encodes each segment of the tag", async () => {
      const { resolver } = createResolver();

      expect(await resolver.sourceArchiveUrl("acme", "widget", "release/1.0#rc?1%")).toBe(
        "https://github.com/acme/widget/archive/refs/tags/release/1.0%23rc%3F1%25.tar.gz"
      );
    });

    it("fails when there is no release to take the tag from", async () => {
      const { resolver } = createResolver();

      await expect(resolver.sourceArchiveUrl("acme", "empty")).rejects.toBeInstanceOf(
        ReleaseNotFoundError
      );
    });
  });
});
