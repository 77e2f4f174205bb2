/**
 * GitHub-hosted OCD division id dataset
 *
 * Commit history and directory listing through the REST API, file bodies
 * through raw.githubusercontent.com. Responses are validated with zod
 * before use.
 *
 * @module github-source
 */

import { z } from 'zod';
import { HTTPClient } from '../core/http-client.js';

export const DEFAULT_OCD_REPOSITORY = 'opencivicdata/ocd-division-ids';
export const OCD_DIRECTORY = 'identifiers';

/**
 * Where the dataset files live
 */
export interface OcdSource {
  /** Time of the most recent commit touching `fileName`, second precision */
  latestCommitDate(fileName: string): Promise<Date>;
  /** Full body of `fileName` */
  download(fileName: string): Promise<string>;
  /** Blob sha of `fileName` in the dataset directory, null when absent */
  blobSha(fileName: string): Promise<string | null>;
}

const commitListSchema = z
  .array(
    z.object({
      commit: z.object({
        committer: z.object({ date: z.string() }),
      }),
    })
  )
  .min(1, 'no commits touch this file');

const directoryListingSchema = z.array(
  z.object({
    name: z.string(),
    sha: z.string(),
  })
);

export interface GitHubOcdSourceOptions {
  readonly repository?: string;
  readonly client?: HTTPClient;
  readonly token?: string;
}

export class GitHubOcdSource implements OcdSource {
  private readonly repository: string;
  private readonly client: HTTPClient;
  private readonly headers: Record<string, string>;

  constructor(options: GitHubOcdSourceOptions = {}) {
    this.repository = options.repository ?? DEFAULT_OCD_REPOSITORY;
    this.client = options.client ?? new HTTPClient();
    this.headers = options.token ? { Authorization: `Bearer ${options.token}` } : {};
  }

  commitsUrl(fileName: string): string {
    const path = encodeURIComponent(`${OCD_DIRECTORY}/${fileName}`);
    return `https://api.github.com/repos/${this.repository}/commits?path=${path}`;
  }

  rawUrl(fileName: string): string {
    return `https://raw.githubusercontent.com/${this.repository}/master/${OCD_DIRECTORY}/${fileName}`;
  }

  contentsUrl(): string {
    return `https://api.github.com/repos/${this.repository}/contents/${OCD_DIRECTORY}`;
  }

  async latestCommitDate(fileName: string): Promise<Date> {
    const commits = await this.client.fetchJSON(this.commitsUrl(fileName), commitListSchema, {
      headers: this.headers,
    });
    const [latest] = commits;
    const date = new Date(latest?.commit.committer.date ?? Number.NaN);
    if (Number.isNaN(date.getTime())) {
      throw new Error(`Unreadable commit date for ${fileName}`);
    }
    date.setMilliseconds(0);
    return date;
  }

  async download(fileName: string): Promise<string> {
    return this.client.fetchText(this.rawUrl(fileName));
  }

  async blobSha(fileName: string): Promise<string | null> {
    const entries = await this.client.fetchJSON(this.contentsUrl(), directoryListingSchema, {
      headers: this.headers,
    });
    return entries.find((entry) => entry.name === fileName)?.sha ?? null;
  }
}
