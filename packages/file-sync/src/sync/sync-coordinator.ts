/**
 * SyncCoordinator - runs one end-to-end sync of a local directory against
 * the patch server.
 *
 * Integrates:
 * - isUnderMaintenance: skips the run while the server is being updated
 * - ManifestReader: fetches and parses the file list
 * - StalenessDetector: decides what to download
 * - FileDownloader: fetches stale files on a bounded pool
 * - ContentHasher: verifies what was downloaded
 * - RedundantFileReconciler: removes files no longer listed
 *
 * Each phase receives the previous phase's output and returns a new value;
 * the hash cache is copied on entry and the caller's object is never touched.
 */

import { EventEmitter } from 'node:events';
import * as path from 'node:path';
import type { Logger } from 'pino';
import type {
  SyncCoordinatorEvents,
  SyncCoordinatorOptions,
  SyncEngineConfig,
  SyncOutcome,
  SyncPhase,
  SyncRequest,
  FailedDownload,
  HashMismatch,
} from './types.js';
import type { DownloadResult, HashCache, StaleEntry } from '../download/types.js';
import type { ResolvedManifestEntry } from '../manifest/types.js';
import { buildSyncConfig, validateSyncConfig } from './config.js';
import { SyncError } from './errors.js';
import { isUnderMaintenance } from './maintenance.js';
import { ManifestReader } from '../manifest/manifest-reader.js';
import { resolveEntries } from '../manifest/manifest-parser.js';
import { ContentHasher } from '../hash/content-hasher.js';
import { StalenessDetector } from '../download/staleness-detector.js';
import { FileDownloader } from '../download/file-downloader.js';
import { RedundantFileReconciler } from '../reconcile/redundant-files.js';
import { errorMessage } from '../util/errors.js';

/**
 * Typed event emitter interface for the sync coordinator.
 */
export interface TypedSyncCoordinatorEmitter {
  on<K extends keyof SyncCoordinatorEvents>(
    event: K,
    listener: SyncCoordinatorEvents[K]
  ): this;
  off<K extends keyof SyncCoordinatorEvents>(
    event: K,
    listener: SyncCoordinatorEvents[K]
  ): this;
  emit<K extends keyof SyncCoordinatorEvents>(
    event: K,
    ...args: Parameters<SyncCoordinatorEvents[K]>
  ): boolean;
}

interface DownloadPhaseResult {
  hashes: HashCache;
  newHashes: HashCache | undefined;
  failedDownloads: FailedDownload[];
  hashMismatches: HashMismatch[];
}

export class SyncCoordinator
  extends EventEmitter
  implements TypedSyncCoordinatorEmitter
{
  private readonly config: SyncEngineConfig;
  private readonly logger: Logger;
  private readonly fetchFn: typeof fetch;
  private readonly hasher: ContentHasher;
  private readonly reader: ManifestReader;
  private readonly detector: StalenessDetector;
  private readonly downloader: FileDownloader;
  private readonly reconciler: RedundantFileReconciler;

  private _phase: SyncPhase | null = null;
  private _isRunning = false;

  constructor(options: SyncCoordinatorOptions) {
    super();

    const config = buildSyncConfig(options.config);
    const errors = validateSyncConfig(config);
    if (errors.length > 0) {
      throw new Error(`Invalid sync config: ${errors.join('; ')}`);
    }

    this.config = config;
    this.logger = options.logger.child({ component: 'sync-coordinator' });
    this.fetchFn = options.fetchFn ?? fetch;

    this.hasher = new ContentHasher(options.logger, {
      concurrency: config.hashConcurrency,
      ...(options.platform !== undefined ? { platform: options.platform } : {}),
      ...(options.execCommand !== undefined ? { execCommand: options.execCommand } : {}),
    });
    this.reader = new ManifestReader(options.logger, this.fetchFn);
    this.detector = new StalenessDetector(this.hasher, options.logger);
    this.downloader = new FileDownloader(
      { maxConcurrentDownloads: config.maxConcurrentDownloads },
      options.logger,
      this.fetchFn
    );
    this.reconciler = new RedundantFileReconciler(options.logger, {
      confirmThreshold: config.confirmThreshold,
      ...(options.confirm !== undefined ? { confirm: options.confirm } : {}),
    });
  }

  /** Phase of the current or most recent run */
  get phase(): SyncPhase | null {
    return this._phase;
  }

  /** Whether a run is in progress */
  get isRunning(): boolean {
    return this._isRunning;
  }

  /**
   * Run one sync.
   *
   * @throws SyncError when the server or manifest is unreachable, the
   *   manifest is invalid, or a local I/O step fails outright
   */
  async sync(request: SyncRequest): Promise<SyncOutcome> {
    if (this._isRunning) {
      throw new Error('A sync is already running on this coordinator');
    }
    this._isRunning = true;

    const startTime = Date.now();
    try {
      const outcome = await this.run(request);
      this.logger.info(
        {
          status: outcome.status,
          downloaded: Object.keys(outcome.newHashes ?? {}).length,
          deleted: Object.keys(outcome.deletedHashes ?? {}).length,
          failed: outcome.failedDownloads.length,
          mismatched: outcome.hashMismatches.length,
          durationMs: Date.now() - startTime,
        },
        'Sync finished'
      );
      return outcome;
    } catch (err) {
      if (err instanceof SyncError) {
        throw err;
      }
      throw new SyncError(this._phase ?? 'check-maintenance', errorMessage(err), { cause: err });
    } finally {
      this._isRunning = false;
    }
  }

  private async run(request: SyncRequest): Promise<SyncOutcome> {
    const root = request.rootDomain.replace(/\/+$/, '');
    const outputDir = path.resolve(request.outputDir);

    this.enterPhase('check-maintenance');
    const maintenanceUrl = root + this.config.maintenancePath;
    if (await isUnderMaintenance(maintenanceUrl, this.fetchFn, this.logger)) {
      this.enterPhase('deferred');
      this.logger.warn({ url: maintenanceUrl }, 'Server is under maintenance, sync deferred');
      return { status: 'deferred', failedDownloads: [], hashMismatches: [] };
    }

    this.enterPhase('fetch-manifest');
    const parsed = await this.reader.read(root + this.config.manifestPath);
    const entries = resolveEntries(parsed, outputDir, root + this.config.patchPath, this.logger);

    this.enterPhase('detect-staleness');
    const staleness = await this.detector.check(
      entries,
      request.cachedHashes ?? {},
      request.validate
    );
    for (const { entry, reason } of staleness.stale) {
      this.emit('fileStale', entry.localPath, reason);
    }

    const downloaded = await this.downloadAndVerify(staleness.stale, staleness.hashes);

    let hashes = downloaded.hashes;
    let deletedHashes: HashCache | undefined;
    if (request.removeStale) {
      this.enterPhase('reconcile');
      const reconciled = await this.reconcile(hashes, entries);
      hashes = reconciled.hashes;
      deletedHashes = reconciled.deletedHashes;
    }

    this.enterPhase('done');

    return {
      status: 'completed',
      ...(downloaded.newHashes ? { newHashes: downloaded.newHashes } : {}),
      ...(deletedHashes ? { deletedHashes } : {}),
      hashes,
      failedDownloads: downloaded.failedDownloads,
      hashMismatches: downloaded.hashMismatches,
    };
  }

  /**
   * Download stale entries, then re-hash what arrived.
   *
   * A failed file keeps its cached hash only when the local copy is intact
   * but outdated; a missing or truncated file is dropped from the cache so
   * the next run does not seed it as trusted.
   */
  private async downloadAndVerify(
    stale: readonly StaleEntry[],
    incoming: Readonly<HashCache>
  ): Promise<DownloadPhaseResult> {
    const hashes: HashCache = { ...incoming };
    const failedDownloads: FailedDownload[] = [];
    const hashMismatches: HashMismatch[] = [];

    if (stale.length === 0) {
      this.logger.info('All files are up to date');
      return { hashes, newHashes: undefined, failedDownloads, hashMismatches };
    }

    this.enterPhase('download');
    const toFetch = stale.map((s) => s.entry);
    const tracker = FileDownloader.trackerFor(toFetch);
    const unsubscribe = tracker.subscribe((progress) => {
      this.emit('downloadProgress', progress);
    });

    let results: DownloadResult[];
    try {
      results = await this.downloader.download(toFetch, tracker);
    } finally {
      unsubscribe();
    }

    const succeeded: ResolvedManifestEntry[] = [];
    results.forEach((result, i) => {
      const item = stale[i];
      if (!item) return;
      if (result.success) {
        succeeded.push(item.entry);
        this.emit('fileDownloaded', result);
        return;
      }
      const failure: FailedDownload = {
        path: result.localPath,
        url: result.remoteUrl,
        error: result.error ?? 'Unknown error',
      };
      failedDownloads.push(failure);
      if (item.reason !== 'hash-mismatch') {
        delete hashes[result.localPath];
      }
      this.emit('downloadFailed', failure);
    });

    if (succeeded.length === 0) {
      return { hashes, newHashes: undefined, failedDownloads, hashMismatches };
    }

    this.enterPhase('verify');
    const digests = await this.hasher.hash(succeeded.map((e) => e.localPath));
    const newHashes: HashCache = {};

    for (const entry of succeeded) {
      const actual = digests[entry.localPath];
      if (actual === undefined) continue;
      newHashes[entry.localPath] = actual;
      hashes[entry.localPath] = actual;

      if (actual !== entry.expectedHash) {
        const mismatch: HashMismatch = {
          path: entry.localPath,
          expected: entry.expectedHash,
          actual,
        };
        hashMismatches.push(mismatch);
        this.logger.warn(mismatch, 'Downloaded file does not match the manifest hash');
        this.emit('hashMismatch', mismatch);
      }
    }

    return { hashes, newHashes, failedDownloads, hashMismatches };
  }

  private async reconcile(
    incoming: Readonly<HashCache>,
    entries: readonly ResolvedManifestEntry[]
  ): Promise<{ hashes: HashCache; deletedHashes: HashCache | undefined }> {
    const hashes: HashCache = { ...incoming };

    const removed = await this.reconciler.reconcile(hashes, entries, {
      onDeleted: (p) => this.emit('fileDeleted', p),
      onDiscrepancy: (paths) => this.emit('deletionDiscrepancy', paths),
      onDeclined: (count) => this.emit('deletionDeclined', count),
    });

    if (!removed || removed.length === 0) {
      return { hashes, deletedHashes: undefined };
    }

    const deletedHashes: HashCache = {};
    for (const p of removed) {
      const previous = hashes[p];
      if (previous !== undefined) {
        deletedHashes[p] = previous;
      }
      delete hashes[p];
    }

    return { hashes, deletedHashes };
  }

  private enterPhase(phase: SyncPhase): void {
    this._phase = phase;
    this.logger.debug({ phase }, 'Entering sync phase');
    this.emit('phase', phase);
  }
}

/**
 * Run a single sync with a fresh coordinator.
 */
export async function syncDirectory(
  request: SyncRequest,
  options: SyncCoordinatorOptions
): Promise<SyncOutcome> {
  return new SyncCoordinator(options).sync(request);
}
