/**
 * Remembers the last release tag fetched per repository.
 */

import { join } from "node:path";
import type { FileSystemLayer } from "../platform/filesystem";
import type { Logger } from "../logging";
import { getErrorMessage } from "../errors";

export interface VersionTracker {
  /** `<cacheDir>/<owner>-<repo>-version.txt` */
  recordPath(owner: string, repo: string): string;

  /**
   * Whether the recorded tag equals `tag` exactly.
   * A missing or unreadable record counts as not up to date.
   */
  isUpToDate(owner: string, repo: string, tag: string): Promise<boolean>;

  /**
   * Overwrite the record with `tag`.
   *
   * @throws FileSystemError when the record cannot be written
   */
  record(owner: string, repo: string, tag: string): Promise<void>;
}

export class DefaultVersionTracker implements VersionTracker {
  constructor(
    private readonly fs: FileSystemLayer,
    private readonly logger: Logger,
    private readonly cacheDir: string
  ) {}

  recordPath(owner: string, repo: string): string {
    return join(this.cacheDir, `${owner}-${repo}-version.txt`);
  }

  async isUpToDate(owner: string, repo: string, tag: string): Promise<boolean> {
    const path = this.recordPath(owner, repo);
    let recorded: string;
    try {
      recorded = await this.fs.readFile(path);
    } catch (error) {
      this.logger.debug("No recorded version", { path, error: getErrorMessage(error) });
      return false;
    }
    const upToDate = recorded === tag;
    this.logger.debug("Checked version", { owner, repo, recorded, latest: tag, upToDate });
    return upToDate;
  }

  async record(owner: string, repo: string, tag: string): Promise<void> {
    const path = this.recordPath(owner, repo);
    await this.fs.writeFile(path, tag);
    this.logger.debug("Recorded version", { owner, repo, tag });
  }
}
