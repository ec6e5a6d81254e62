/**
 * In-memory ReleaseCatalog for tests.
 */

import { vi, type Mock } from "vitest";
import { ReleaseNotFoundError } from "../errors";
import type { Artifact, Release, ReleaseCatalog } from "./types";

export interface FakeReleaseCatalog extends ReleaseCatalog {
  getLatestRelease: Mock<(owner: string, repo: string) => Promise<Release>>;
  getReleaseByTag: Mock<(owner: string, repo: string, tag: string) => Promise<Release>>;
}

/**
 * Create a catalog serving fixed releases.
 *
 * @param releases - Releases per "owner/repo", newest first
 *
 * @example
 * const catalog = createFakeReleaseCatalog({
 *   "acme/widget": [createRelease("v1.1.0"), createRelease("v1.0.0")],
 * });
 */
export function createFakeReleaseCatalog(
  releases: Record<string, readonly Release[]>
): FakeReleaseCatalog {
  return {
    getLatestRelease: vi.fn(async (owner: string, repo: string) => {
      const latest = releases[`${owner}/${repo}`]?.[0];
      if (!latest) {
        throw new ReleaseNotFoundError(owner, repo);
      }
      return latest;
    }),
    getReleaseByTag: vi.fn(async (owner: string, repo: string, tag: string) => {
      const match = releases[`${owner}/${repo}`]?.find((release) => release.tag === tag);
      if (!match) {
        throw new ReleaseNotFoundError(owner, repo, tag);
      }
      return match;
    }),
  };
}

/**
 * Build an artifact served from https://dl.example.test/<name>.
 */
export function createArtifact(name: string, size = 0): Artifact {
  return { name, size, downloadUrl: `https://dl.example.test/${name}` };
}

export function createRelease(tag: string, artifactNames: readonly string[] = []): Release {
  return { tag, name: tag, artifacts: artifactNames.map((name) => createArtifact(name)) };
}
