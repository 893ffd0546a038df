/**
 * Redundant-file reconciler.
 *
 * Removes files the cache tracks but the manifest no longer lists. Only
 * cached paths are ever considered, so files the sync never wrote or hashed
 * are left alone.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import type { ResolvedManifestEntry } from '../manifest/types.js';
import type { HashCache } from '../download/types.js';
import type { ConfirmFn, ReconcilerHooks, ReconcilerOptions } from './types.js';
import { DEFAULT_CONFIRM_THRESHOLD } from './types.js';
import { errorMessage, isNodeError } from '../util/errors.js';

export class RedundantFileReconciler {
  private readonly logger: Logger;
  private readonly confirm: ConfirmFn | undefined;
  private readonly confirmThreshold: number;

  constructor(logger: Logger, options?: ReconcilerOptions) {
    this.logger = logger.child({ component: 'redundant-files' });
    this.confirm = options?.confirm;
    this.confirmThreshold = options?.confirmThreshold ?? DEFAULT_CONFIRM_THRESHOLD;
  }

  /**
   * Cached paths that are not on the manifest, in cache order.
   *
   * Paths are compared after resolution, so a cache key spelled differently
   * for a listed file is never a candidate. Candidates keep their cache key.
   */
  static findCandidates(
    cache: Readonly<HashCache>,
    entries: readonly ResolvedManifestEntry[]
  ): string[] {
    const listed = new Set(entries.map((e) => path.resolve(e.localPath)));
    return Object.keys(cache).filter((p) => !listed.has(path.resolve(p)));
  }

  /**
   * Delete redundant files.
   *
   * Returns the paths that are now gone (deleted, or already missing), or
   * undefined when there was nothing to do or the operator declined. Paths
   * that could not be deleted are left out so they stay cached.
   */
  async reconcile(
    cache: Readonly<HashCache>,
    entries: readonly ResolvedManifestEntry[],
    hooks?: ReconcilerHooks
  ): Promise<string[] | undefined> {
    const candidates = RedundantFileReconciler.findCandidates(cache, entries);

    if (candidates.length === 0) {
      this.logger.debug('No redundant files');
      return undefined;
    }

    if (candidates.length > this.confirmThreshold) {
      const question = `About to delete ${candidates.length} files that are no longer listed. Continue?`;
      const approved = this.confirm ? await this.confirm(question, false) : false;
      if (!approved) {
        this.logger.info({ count: candidates.length }, 'Deletion of redundant files declined');
        hooks?.onDeclined?.(candidates.length);
        return undefined;
      }
    }

    const removed: string[] = [];
    const alreadyMissing: string[] = [];

    for (const filePath of candidates) {
      try {
        await fs.unlink(filePath);
        removed.push(filePath);
        hooks?.onDeleted?.(filePath);
        this.logger.debug({ path: filePath }, 'Deleted redundant file');
      } catch (err) {
        if (isNodeError(err) && err.code === 'ENOENT') {
          alreadyMissing.push(filePath);
          continue;
        }
        this.logger.error({ path: filePath, error: errorMessage(err) }, 'Failed to delete redundant file');
      }
    }

    if (alreadyMissing.length > 0) {
      this.logger.warn(
        { paths: alreadyMissing },
        'Redundant files were already missing from disk'
      );
      hooks?.onDiscrepancy?.(alreadyMissing);
    }

    this.logger.info(
      { deleted: removed.length, alreadyMissing: alreadyMissing.length },
      'Redundant file cleanup complete'
    );

    const gone = new Set([...removed, ...alreadyMissing]);
    return candidates.filter((p) => gone.has(p));
  }
}
