/**
 * Sync engine configuration builder.
 *
 * Reads from environment variables with sensible defaults.
 * All values can be overridden programmatically.
 */

import * as os from 'node:os';
import type { SyncEngineConfig } from './types.js';
import { DEFAULT_MAX_CONCURRENT_DOWNLOADS } from '../download/types.js';
import { DEFAULT_CONFIRM_THRESHOLD } from '../reconcile/types.js';

export const DEFAULT_SYNC_CONFIG: SyncEngineConfig = {
  maxConcurrentDownloads: DEFAULT_MAX_CONCURRENT_DOWNLOADS,
  hashConcurrency: os.availableParallelism(),
  confirmThreshold: DEFAULT_CONFIRM_THRESHOLD,
  manifestPath: '/PatchFileList.txt',
  patchPath: '/Patch',
  maintenancePath: '/MaintenanceLock.lck',
};

function getEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Build sync engine config from environment variables and optional overrides.
 *
 * Environment variables:
 * - PATCHSYNC_MAX_CONCURRENT_DOWNLOADS: Parallel downloads (default: 4)
 * - PATCHSYNC_HASH_CONCURRENCY: Parallel hash jobs (default: CPU count)
 * - PATCHSYNC_CONFIRM_THRESHOLD: Deletions allowed without asking (default: 10)
 * - PATCHSYNC_MANIFEST_PATH: Manifest path under the root (default: /PatchFileList.txt)
 * - PATCHSYNC_PATCH_PATH: Download prefix under the root (default: /Patch)
 * - PATCHSYNC_MAINTENANCE_PATH: Maintenance marker path (default: /MaintenanceLock.lck)
 */
export function buildSyncConfig(overrides?: Partial<SyncEngineConfig>): SyncEngineConfig {
  return {
    maxConcurrentDownloads:
      overrides?.maxConcurrentDownloads ??
      getEnvNumber('PATCHSYNC_MAX_CONCURRENT_DOWNLOADS', DEFAULT_SYNC_CONFIG.maxConcurrentDownloads),
    hashConcurrency:
      overrides?.hashConcurrency ??
      getEnvNumber('PATCHSYNC_HASH_CONCURRENCY', DEFAULT_SYNC_CONFIG.hashConcurrency),
    confirmThreshold:
      overrides?.confirmThreshold ??
      getEnvNumber('PATCHSYNC_CONFIRM_THRESHOLD', DEFAULT_SYNC_CONFIG.confirmThreshold),
    manifestPath:
      overrides?.manifestPath ?? getEnv('PATCHSYNC_MANIFEST_PATH', DEFAULT_SYNC_CONFIG.manifestPath),
    patchPath: overrides?.patchPath ?? getEnv('PATCHSYNC_PATCH_PATH', DEFAULT_SYNC_CONFIG.patchPath),
    maintenancePath:
      overrides?.maintenancePath ??
      getEnv('PATCHSYNC_MAINTENANCE_PATH', DEFAULT_SYNC_CONFIG.maintenancePath),
  };
}

/**
 * Validate a sync engine configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateSyncConfig(config: SyncEngineConfig): string[] {
  const errors: string[] = [];

  if (config.maxConcurrentDownloads < 1) {
    errors.push('maxConcurrentDownloads must be at least 1');
  }

  if (config.maxConcurrentDownloads > 16) {
    errors.push('maxConcurrentDownloads must not exceed 16');
  }

  if (config.hashConcurrency < 1) {
    errors.push('hashConcurrency must be at least 1');
  }

  if (config.confirmThreshold < 0) {
    errors.push('confirmThreshold must not be negative');
  }

  for (const key of ['manifestPath', 'patchPath', 'maintenancePath'] as const) {
    if (!config[key].startsWith('/')) {
      errors.push(`${key} must start with "/"`);
    }
  }

  return errors;
}
