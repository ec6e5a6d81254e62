/**
 * ReleaseCatalog backed by the GitHub REST API.
 *
 * Endpoints:
 * - GET {apiBaseUrl}/repos/{owner}/{repo}/releases/latest
 * - GET {apiBaseUrl}/repos/{owner}/{repo}/releases/tags/{tag}
 *
 * Payloads are validated with zod before they are mapped to Release.
 */

import { z } from "zod";
import type { HttpClient } from "../platform/network";
import type { Logger } from "../logging";
import { CatalogError, ReleaseNotFoundError, getErrorMessage } from "../errors";
import type { Release, ReleaseCatalog } from "./types";

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const releaseAssetSchema = z.object({
  name: z.string().min(1),
  size: z.number().int().nonnegative(),
  browser_download_url: z.string().url(),
});

const releaseSchema = z.object({
  tag_name: z.string().min(1),
  name: z.string().nullish(),
  assets: z.array(releaseAssetSchema),
});

const apiErrorSchema = z.object({
  message: z.string(),
});

type ReleasePayload = z.infer<typeof releaseSchema>;

export interface GitHubReleaseCatalogOptions {
  /** API root without trailing slash. Default: https://api.github.com */
  readonly apiBaseUrl?: string;
  /** Sent as `Authorization: Bearer <token>` */
  readonly accessToken?: string;
  /** Header timeout per request. Default: 30000 */
  readonly requestTimeoutMs?: number;
}

function toRelease(payload: ReleasePayload): Release {
  return {
    tag: payload.tag_name,
    name: payload.name ?? "",
    artifacts: payload.assets.map((asset) => ({
      name: asset.name,
      size: asset.size,
      downloadUrl: asset.browser_download_url,
    })),
  };
}

/**
 * Read an error payload's `message` field, if the body is JSON with one.
 */
async function readApiErrorMessage(response: Response): Promise<string | undefined> {
  try {
    const body: unknown = await response.json();
    const parsed = apiErrorSchema.safeParse(body);
    return parsed.success ? parsed.data.message : undefined;
  } catch {
    // Not JSON: the status alone has to do.
    return undefined;
  }
}

export class GitHubReleaseCatalog implements ReleaseCatalog {
  private readonly apiBaseUrl: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly requestTimeoutMs: number;

  constructor(
    private readonly httpClient: HttpClient,
    private readonly logger: Logger,
    options: GitHubReleaseCatalogOptions = {}
  ) {
    this.apiBaseUrl = options.apiBaseUrl ?? "https://api.github.com";
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.headers = {
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
      ...(options.accessToken ? { Authorization: `Bearer ${options.accessToken}` } : {}),
    };
  }

  async getLatestRelease(owner: string, repo: string): Promise<Release> {
    const url = `${this.repoUrl(owner, repo)}/releases/latest`;
    return this.fetchRelease(url, owner, repo);
  }

  async getReleaseByTag(owner: string, repo: string, tag: string): Promise<Release> {
    const url = `${this.repoUrl(owner, repo)}/releases/tags/${encodeURIComponent(tag)}`;
    return this.fetchRelease(url, owner, repo, tag);
  }

  private repoUrl(owner: string, repo: string): string {
    return `${this.apiBaseUrl}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
  }

  private async fetchRelease(
    url: string,
    owner: string,
    repo: string,
    tag?: string
  ): Promise<Release> {
    this.logger.debug("Fetching release", { owner, repo, tag: tag ?? "latest" });

    let response: Response;
    try {
      response = await this.httpClient.fetch(url, {
        timeout: this.requestTimeoutMs,
        headers: this.headers,
      });
    } catch (error) {
      throw new CatalogError(
        `Failed to reach release catalog for ${owner}/${repo}: ${getErrorMessage(error)}`,
        "NETWORK_ERROR",
        { cause: error }
      );
    }

    if (response.status === 404) {
      await readApiErrorMessage(response);
      throw new ReleaseNotFoundError(owner, repo, tag);
    }

    if (!response.ok) {
      const detail = await readApiErrorMessage(response);
      throw new CatalogError(
        `Release catalog returned HTTP ${response.status} for ${owner}/${repo}` +
          (detail ? `: ${detail}` : ""),
        "HTTP_ERROR",
        { status: response.status }
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new CatalogError(
        `Release catalog sent a body that is not JSON for ${owner}/${repo}`,
        "INVALID_RESPONSE",
        { cause: error }
      );
    }

    const parsed = releaseSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new CatalogError(
        `Release catalog sent an unexpected payload for ${owner}/${repo}: ${issues}`,
        "INVALID_RESPONSE",
        { cause: parsed.error }
      );
    }

    const release = toRelease(parsed.data);
    this.logger.info("Fetched release", {
      owner,
      repo,
      tag: release.tag,
      name: release.name,
      artifacts: release.artifacts.length,
    });
    return release;
  }
}
