/**
 * OCD Dataset Cache
 *
 * Supplies the valid OCD division ids for a country:
 * 1. A configured local file is read directly; no network.
 * 2. Otherwise `country-<cc>.csv` is looked up remotely. The cached copy is
 *    reused while its mtime is not older than the latest commit to the
 *    file; when it is older, or missing, the file is downloaded, checked
 *    against the published blob sha and the CSV shape, and only then moved
 *    over the cache.
 *
 * One load per country per cache instance; concurrent callers share it.
 *
 * @module ocd-dataset-cache
 */

import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { DatasetError, DatasetVerificationError } from '../core/errors.js';
import { writeVerifiedFile } from '../core/utils/atomic-write.js';
import { createLogger, type LoggerLike } from '../core/utils/logger.js';
import type { OcdIdProvider } from '../rules/rule.js';
import type { OcdSource } from './github-source.js';
import { gitBlobSha, parseOcdCsv, verifyOcdCsv } from './ocd-id.js';

export interface OcdDatasetCacheOptions {
  readonly cacheDir: string;
  readonly source: OcdSource;
  /** Local dataset used instead of the remote one */
  readonly localFile?: string | null;
  readonly logger?: LoggerLike;
}

export function remoteFileName(countryCode: string): string {
  return `country-${countryCode.toLowerCase()}.csv`;
}

async function modifiedTime(path: string): Promise<Date | null> {
  try {
    return (await stat(path)).mtime;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export class OcdDatasetCache implements OcdIdProvider {
  private readonly loads = new Map<string, Promise<ReadonlySet<string>>>();
  private readonly log: LoggerLike;

  constructor(private readonly options: OcdDatasetCacheOptions) {
    this.log = options.logger ?? createLogger({ module: 'ocd-dataset' });
  }

  cachePath(countryCode: string): string {
    return join(this.options.cacheDir, remoteFileName(countryCode));
  }

  ids(countryCode: string): Promise<ReadonlySet<string>> {
    const key = countryCode.toLowerCase();
    let load = this.loads.get(key);
    if (load === undefined) {
      load = this.load(key);
      this.loads.set(key, load);
    }
    return load;
  }

  private async load(countryCode: string): Promise<ReadonlySet<string>> {
    const localFile = this.options.localFile;
    if (localFile) {
      this.log.debug('Using local OCD dataset', { file: localFile });
      return this.readDataset(localFile, countryCode);
    }

    const cachePath = this.cachePath(countryCode);
    await this.refresh(countryCode, cachePath);
    return this.readDataset(cachePath, countryCode);
  }

  /**
   * Make the cache file current, downloading when it is absent or stale
   */
  async refresh(countryCode: string, cachePath = this.cachePath(countryCode)): Promise<'fresh' | 'downloaded'> {
    const fileName = remoteFileName(countryCode);
    const cachedAt = await modifiedTime(cachePath);

    let committedAt: Date;
    try {
      committedAt = await this.options.source.latestCommitDate(fileName);
    } catch (error) {
      if (cachedAt !== null) {
        this.log.warn('Could not check OCD dataset freshness, using cached copy', {
          file: fileName,
          error: error instanceof Error ? error.message : String(error),
        });
        return 'fresh';
      }
      throw new DatasetError(`Could not look up ${fileName}`, countryCode, error);
    }

    if (cachedAt !== null && cachedAt.getTime() >= committedAt.getTime()) {
      this.log.debug('OCD dataset cache is fresh', { file: cachePath });
      return 'fresh';
    }

    await this.download(countryCode, cachePath);
    return 'downloaded';
  }

  private async download(countryCode: string, cachePath: string): Promise<void> {
    const fileName = remoteFileName(countryCode);
    let body: string;
    let expectedSha: string | null;
    try {
      [body, expectedSha] = await Promise.all([
        this.options.source.download(fileName),
        this.options.source.blobSha(fileName),
      ]);
    } catch (error) {
      throw new DatasetError(`Could not download ${fileName}`, countryCode, error);
    }

    await writeVerifiedFile(cachePath, body, async (tempPath) => {
      const written = await readFile(tempPath);
      if (expectedSha !== null && gitBlobSha(written) !== expectedSha) {
        throw new DatasetVerificationError(`Downloaded ${fileName} failed verification: checksum mismatch`, countryCode);
      }
      const problem = verifyOcdCsv(written.toString('utf-8'));
      if (problem !== null) {
        throw new DatasetVerificationError(`Downloaded ${fileName} failed verification: ${problem}`, countryCode);
      }
    });
    this.log.info('Downloaded OCD dataset', { file: cachePath });
  }

  private async readDataset(path: string, countryCode: string): Promise<ReadonlySet<string>> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      throw new DatasetError(`Could not read OCD dataset ${path}`, countryCode, error);
    }
    const problem = verifyOcdCsv(content);
    if (problem !== null) {
      throw new DatasetVerificationError(`OCD dataset ${path} is unusable: ${problem}`, countryCode);
    }
    return new Set(parseOcdCsv(content).names.keys());
  }
}
