/**
 * Staleness detector.
 *
 * Compares manifest entries against the local disk and the hash cache to
 * decide which files need downloading. Size is checked before any hashing,
 * so files that are obviously wrong are never read.
 */

import * as fs from 'node:fs/promises';
import type { Logger } from 'pino';
import type { ResolvedManifestEntry } from '../manifest/types.js';
import type { ContentHasher } from '../hash/content-hasher.js';
import type { HashCache, StaleEntry, StaleReason, StalenessResult } from './types.js';
import { errorMessage, isNodeError } from '../util/errors.js';

export class StalenessDetector {
  private readonly hasher: ContentHasher;
  private readonly logger: Logger;

  constructor(hasher: ContentHasher, logger: Logger) {
    this.hasher = hasher;
    this.logger = logger.child({ component: 'staleness-detector' });
  }

  /**
   * Find entries whose local copy is missing, the wrong size, or has a
   * different hash than the manifest lists.
   *
   * With `validate`, every file that passes the size check is re-hashed and
   * the fresh digests replace the cached ones. Without it, entries the cache
   * has never seen are trusted and seeded with the manifest hash.
   */
  async check(
    entries: readonly ResolvedManifestEntry[],
    cachedHashes: Readonly<HashCache>,
    validate: boolean
  ): Promise<StalenessResult> {
    const hashes: HashCache = { ...cachedHashes };
    const reasons = new Map<string, StaleReason>();

    const sizes = await Promise.all(entries.map((e) => this.localFileSize(e.localPath)));
    entries.forEach((entry, i) => {
      const size = sizes[i];
      if (size === null || size === undefined) {
        reasons.set(entry.localPath, 'missing');
      } else if (size !== entry.expectedSize) {
        reasons.set(entry.localPath, 'size-mismatch');
      }
    });

    const survivors = entries.filter((e) => !reasons.has(e.localPath));

    if (validate) {
      const fresh = await this.hasher.hash(survivors.map((e) => e.localPath));
      Object.assign(hashes, fresh);
      this.logger.info({ files: survivors.length }, 'Re-validated local file hashes');
    } else {
      let seeded = 0;
      for (const entry of entries) {
        if (!(entry.localPath in hashes)) {
          hashes[entry.localPath] = entry.expectedHash;
          seeded++;
        }
      }
      if (seeded > 0) {
        this.logger.debug({ seeded }, 'Seeded hash cache from manifest');
      }
    }

    for (const entry of survivors) {
      if (hashes[entry.localPath] !== entry.expectedHash) {
        reasons.set(entry.localPath, 'hash-mismatch');
      }
    }

    const stale: StaleEntry[] = [];
    for (const entry of entries) {
      const reason = reasons.get(entry.localPath);
      if (reason) {
        this.logger.debug({ path: entry.localPath, reason }, 'File is stale');
        stale.push({ entry, reason });
      }
    }

    this.logger.info(
      {
        entries: entries.length,
        missing: stale.filter((s) => s.reason === 'missing').length,
        sizeMismatch: stale.filter((s) => s.reason === 'size-mismatch').length,
        hashMismatch: stale.filter((s) => s.reason === 'hash-mismatch').length,
      },
      'Staleness check complete'
    );

    return { stale, hashes };
  }

  /**
   * Size of a regular file, or null when it cannot be used as-is: missing,
   * not a regular file, or not stat-able. Only the affected file becomes stale.
   */
  private async localFileSize(filePath: string): Promise<number | null> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile() ? stat.size : null;
    } catch (err) {
      if (isNodeError(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
        return null;
      }
      this.logger.warn(
        { path: filePath, error: errorMessage(err) },
        'Cannot stat local file, treating it as missing'
      );
      return null;
    }
  }
}
