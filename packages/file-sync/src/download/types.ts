/**
 * Types for staleness detection and downloading.
 */

import type { ResolvedManifestEntry } from '../manifest/types.js';

/** Absolute local path -> last known-good lowercase hex SHA-256 */
export type HashCache = Record<string, string>;

/** Why an entry needs to be downloaded */
export type StaleReason = 'missing' | 'size-mismatch' | 'hash-mismatch';

/** An entry that needs downloading, with the reason it was picked */
export interface StaleEntry {
  entry: ResolvedManifestEntry;
  reason: StaleReason;
}

/** Output of a staleness check */
export interface StalenessResult {
  /** Entries to download, in manifest order */
  stale: StaleEntry[];

  /** Updated cache (seeded or re-validated); the input cache is untouched */
  hashes: HashCache;
}

/** Configuration for the download orchestrator */
export interface DownloadConfig {
  /** Maximum number of files downloaded at once (default: 4) */
  maxConcurrentDownloads: number;
}

export const DEFAULT_MAX_CONCURRENT_DOWNLOADS = 4;

/** Result of downloading a single file */
export interface DownloadResult {
  /** Absolute local path */
  localPath: string;

  /** Source URL */
  remoteUrl: string;

  /** Whether the download succeeded */
  success: boolean;

  /** Bytes written to disk */
  bytesDownloaded: number;

  /** Duration of the download in milliseconds */
  durationMs: number;

  /** Error message if the download failed */
  error?: string;
}

/** Snapshot of aggregate download progress */
export interface DownloadProgress {
  /** Sum of expected sizes of every file in the batch */
  totalBytes: number;

  /** Bytes received so far across all workers */
  transferredBytes: number;

  /** Files in the batch */
  totalFiles: number;

  /** Files finished successfully */
  filesCompleted: number;

  /** Files that failed */
  filesFailed: number;
}

/** Callback for progress updates */
export type DownloadProgressCallback = (progress: DownloadProgress) => void;
