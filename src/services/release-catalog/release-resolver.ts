/**
 * Release resolution on top of a ReleaseCatalog: latest / by tag lookups,
 * the latest tag name and source archive URLs.
 */

import type { Logger } from "../logging";
import type { Release, ReleaseCatalog } from "./types";

export interface ReleaseResolverOptions {
  /** Web root without trailing slash. Default: https://github.com */
  readonly webBaseUrl?: string;
}

export class ReleaseResolver {
  private readonly webBaseUrl: string;

  constructor(
    private readonly catalog: ReleaseCatalog,
    private readonly logger: Logger,
    options: ReleaseResolverOptions = {}
  ) {
    this.webBaseUrl = options.webBaseUrl ?? "https://github.com";
  }

  /**
   * @throws ReleaseNotFoundError when the repository has no releases
   * @throws CatalogError on transport failure
   */
  async resolveLatest(owner: string, repo: string): Promise<Release> {
    const release = await this.catalog.getLatestRelease(owner, repo);
    this.logger.debug("Resolved latest release", {
      owner,
      repo,
      tag: release.tag,
      artifacts: release.artifacts.length,
    });
    return release;
  }

  /**
   * @throws ReleaseNotFoundError when no release carries the tag
   * @throws CatalogError on transport failure
   */
  async resolveByTag(owner: string, repo: string, tag: string): Promise<Release> {
    const release = await this.catalog.getReleaseByTag(owner, repo, tag);
    this.logger.debug("Resolved release by tag", {
      owner,
      repo,
      tag: release.tag,
      artifacts: release.artifacts.length,
    });
    return release;
  }

  async latestTag(owner: string, repo: string): Promise<string> {
    return (await this.resolveLatest(owner, repo)).tag;
  }

  /**
   * URL of the gzipped tarball of the tagged source tree.
   * Without a tag (or with an empty one) the latest release's tag is used.
   *
   * @example
   * await resolver.sourceArchiveUrl("acme", "widget", "v1.0.0");
   * // "https://github.com/acme/widget/archive/refs/tags/v1.0.0.tar.gz"
   */
  async sourceArchiveUrl(owner: string, repo: string, tag?: string): Promise<string> {
    const resolvedTag = tag || (await this.latestTag(owner, repo));
    const url = this.sourceArchiveUrlForTag(owner, repo, resolvedTag);
    this.logger.debug("Source archive URL", { owner, repo, tag: resolvedTag, url });
    return url;
  }

  /**
   * Slashes in the tag stay path separators; every segment is encoded.
   */
  sourceArchiveUrlForTag(owner: string, repo: string, tag: string): string {
    const encodedTag = tag.split("/").map(encodeURIComponent).join("/");
    const repoPath = `${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
    return `${this.webBaseUrl}/${repoPath}/archive/refs/tags/${encodedTag}.tar.gz`;
  }
}
