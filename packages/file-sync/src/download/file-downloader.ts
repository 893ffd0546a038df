/**
 * File downloader.
 *
 * Streams manifest entries from the patch server to disk on a bounded
 * worker pool. Each file is written to a temporary `.part` file beside its
 * target and renamed into place once complete, so an interrupted download
 * never leaves a truncated file under the real name.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { Logger } from 'pino';
import type { ResolvedManifestEntry } from '../manifest/types.js';
import type { DownloadConfig, DownloadResult } from './types.js';
import { ProgressTracker } from './progress.js';
import { runWithConcurrency } from '../util/worker-pool.js';
import { errorMessage } from '../util/errors.js';

/**
 * Downloads files with per-file failure isolation.
 *
 * A failed file is recorded in its own DownloadResult; the rest of the batch
 * keeps going.
 */
export class FileDownloader {
  private readonly config: DownloadConfig;
  private readonly logger: Logger;
  private readonly fetchFn: typeof fetch;

  constructor(config: DownloadConfig, logger: Logger, fetchFn: typeof fetch = fetch) {
    this.config = config;
    this.logger = logger.child({ component: 'file-downloader' });
    this.fetchFn = fetchFn;
  }

  /**
   * Create a tracker sized for a batch: total bytes is the sum of the
   * expected sizes.
   */
  static trackerFor(entries: readonly ResolvedManifestEntry[]): ProgressTracker {
    const totalBytes = entries.reduce((sum, e) => sum + e.expectedSize, 0);
    return new ProgressTracker(totalBytes, entries.length);
  }

  /**
   * Download every entry, at most `maxConcurrentDownloads` at a time.
   * Results come back in input order.
   */
  async download(
    entries: readonly ResolvedManifestEntry[],
    tracker: ProgressTracker = FileDownloader.trackerFor(entries)
  ): Promise<DownloadResult[]> {
    if (entries.length === 0) {
      return [];
    }

    const { totalBytes } = tracker.snapshot();
    this.logger.info(
      { files: entries.length, totalBytes, concurrency: this.config.maxConcurrentDownloads },
      'Starting downloads'
    );

    const results = await runWithConcurrency(
      entries,
      this.config.maxConcurrentDownloads,
      (entry) => this.downloadFile(entry, tracker)
    );

    const failed = results.filter((r) => !r.success).length;
    this.logger.info(
      { downloaded: results.length - failed, failed },
      'Downloads complete'
    );

    return results;
  }

  /**
   * Download a single file. Never throws.
   */
  private async downloadFile(
    entry: ResolvedManifestEntry,
    tracker: ProgressTracker
  ): Promise<DownloadResult> {
    const startTime = Date.now();
    const { localPath, remoteUrl } = entry;
    const tempPath = `${localPath}.${crypto.randomBytes(4).toString('hex')}.part`;
    let bytesDownloaded = 0;

    try {
      const response = await this.fetchFn(remoteUrl);

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      if (!response.body) {
        throw new Error('Response body is empty');
      }

      await fs.promises.mkdir(path.dirname(localPath), { recursive: true });

      const counted = countBytes(response.body, (n) => {
        bytesDownloaded += n;
        tracker.advance(n);
      });
      await pipeline(Readable.from(counted), fs.createWriteStream(tempPath));
      await fs.promises.rename(tempPath, localPath);

      tracker.fileCompleted();
      this.logger.debug({ path: localPath, bytes: bytesDownloaded }, 'File downloaded');

      return {
        localPath,
        remoteUrl,
        success: true,
        bytesDownloaded,
        durationMs: Date.now() - startTime,
      };
    } catch (err) {
      const message = errorMessage(err);
      await this.removeTempFile(tempPath);
      tracker.fileFailed();
      this.logger.error({ path: localPath, url: remoteUrl, error: message }, 'Failed to download file');

      return {
        localPath,
        remoteUrl,
        success: false,
        bytesDownloaded,
        durationMs: Date.now() - startTime,
        error: message,
      };
    }
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await fs.promises.rm(tempPath, { force: true });
    } catch (err) {
      this.logger.warn({ path: tempPath, error: errorMessage(err) }, 'Failed to remove partial download');
    }
  }
}

async function* countBytes(
  source: AsyncIterable<Uint8Array>,
  onChunk: (bytes: number) => void
): AsyncGenerator<Uint8Array> {
  for await (const chunk of source) {
    onChunk(chunk.byteLength);
    yield chunk;
  }
}
