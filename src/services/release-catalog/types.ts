/**
 * Types for release catalog lookups.
 */

/**
 * A file attached to a release.
 */
export interface Artifact {
  /** File name as published, e.g. "tool_1.2.0_linux_amd64.tar.gz" */
  readonly name: string;
  /** Size in bytes as reported by the catalog */
  readonly size: number;
  /** Direct download URL */
  readonly downloadUrl: string;
}

/**
 * A tagged release and its artifacts, in catalog order.
 */
export interface Release {
  readonly tag: string;
  /** Display name; empty when the release has none */
  readonly name: string;
  readonly artifacts: readonly Artifact[];
}

/**
 * Remote source of release metadata.
 */
export interface ReleaseCatalog {
  /**
   * Most recent published release.
   *
   * @throws ReleaseNotFoundError when the repository has no releases
   * @throws CatalogError on transport or decoding failure
   */
  getLatestRelease(owner: string, repo: string): Promise<Release>;

  /**
   * Release with the given tag.
   *
   * @throws ReleaseNotFoundError when no release carries the tag
   * @throws CatalogError on transport or decoding failure
   */
  getReleaseByTag(owner: string, repo: string, tag: string): Promise<Release>;
}

/**
 * How the asset selector arrived at its result.
 * - passthrough: zero or one artifact, returned unchanged
 * - matched: every artifact naming the current OS and architecture
 * - fallback: nothing matched, the first artifact was taken
 */
export type SelectionOutcome = "passthrough" | "matched" | "fallback";

export interface AssetSelection {
  readonly artifacts: readonly Artifact[];
  readonly outcome: SelectionOutcome;
}
