/**
 * Types for the sync coordinator.
 *
 * One run walks a fixed sequence of phases:
 *   check-maintenance -> fetch-manifest -> detect-staleness -> download
 *   -> verify -> reconcile -> done
 * A server in maintenance ends the run early in the 'deferred' phase.
 */

import type { Logger } from 'pino';
import type { HashCache, DownloadProgress, DownloadResult, StaleReason } from '../download/types.js';
import type { ConfirmFn } from '../reconcile/types.js';
import type { ExecFileFn } from '../hash/types.js';

export type SyncPhase =
  | 'check-maintenance'
  | 'fetch-manifest'
  | 'detect-staleness'
  | 'download'
  | 'verify'
  | 'reconcile'
  | 'done'
  | 'deferred';

/** Tunables for the sync engine */
export interface SyncEngineConfig {
  /** Maximum number of files downloaded at once (default: 4) */
  maxConcurrentDownloads: number;

  /** Maximum number of files hashed at once (default: available parallelism) */
  hashConcurrency: number;

  /** Redundant-file count above which deletion needs confirmation (default: 10) */
  confirmThreshold: number;

  /** Manifest location relative to the root domain */
  manifestPath: string;

  /** Prefix for file downloads relative to the root domain */
  patchPath: string;

  /** Maintenance marker location relative to the root domain */
  maintenancePath: string;
}

/** Input for one sync run */
export interface SyncRequest {
  /** Base URL of the patch server, e.g. https://patch.example.test */
  rootDomain: string;

  /** Local directory kept in sync */
  outputDir: string;

  /** Re-hash local files instead of trusting the cache */
  validate: boolean;

  /** Hashes persisted by a previous run */
  cachedHashes?: HashCache;

  /** Delete cached files the manifest no longer lists */
  removeStale?: boolean;
}

/** A download that failed, as reported in the outcome */
export interface FailedDownload {
  path: string;
  url: string;
  error: string;
}

/** A downloaded file whose content does not match the manifest */
export interface HashMismatch {
  path: string;
  expected: string;
  actual: string;
}

/** Result of one sync run */
export interface SyncOutcome {
  status: 'completed' | 'deferred';

  /** Hashes of files downloaded this run; absent when none were */
  newHashes?: HashCache;

  /** Previously cached hashes of files removed this run; absent when none were */
  deletedHashes?: HashCache;

  /** Full cache to persist; absent when the run was deferred */
  hashes?: HashCache;

  /** Per-file download failures */
  failedDownloads: FailedDownload[];

  /** Downloaded files whose hash differs from the manifest */
  hashMismatches: HashMismatch[];
}

/** Collaborators for a SyncCoordinator */
export interface SyncCoordinatorOptions {
  logger: Logger;

  /** Engine tunables; unset fields come from the environment and defaults */
  config?: Partial<SyncEngineConfig>;

  /** HTTP client (default: global fetch) */
  fetchFn?: typeof fetch;

  /** Asked before deleting more than `confirmThreshold` files */
  confirm?: ConfirmFn;

  /** Platform used to pick the native hash tool (default: process.platform) */
  platform?: NodeJS.Platform;

  /** Command runner for the native hash tool (for testing) */
  execCommand?: ExecFileFn;
}

/** Events emitted by the SyncCoordinator */
export interface SyncCoordinatorEvents {
  /** The run entered a new phase */
  phase: (phase: SyncPhase) => void;

  /** An entry needs downloading */
  fileStale: (path: string, reason: StaleReason) => void;

  /** Aggregate download progress changed */
  downloadProgress: (progress: DownloadProgress) => void;

  /** A file finished downloading */
  fileDownloaded: (result: DownloadResult) => void;

  /** A file failed to download */
  downloadFailed: (failure: FailedDownload) => void;

  /** A downloaded file hashes differently than the manifest says */
  hashMismatch: (mismatch: HashMismatch) => void;

  /** The operator declined a bulk deletion */
  deletionDeclined: (count: number) => void;

  /** A redundant file was deleted */
  fileDeleted: (path: string) => void;

  /** Redundant files were already missing from disk */
  deletionDiscrepancy: (paths: string[]) => void;
}
