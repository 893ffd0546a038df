// Sync coordinator
export {
  SyncCoordinator,
  syncDirectory,
  SyncError,
  isSyncError,
  isUnderMaintenance,
  buildSyncConfig,
  validateSyncConfig,
  DEFAULT_SYNC_CONFIG,
} from './sync/index.js';

export type {
  TypedSyncCoordinatorEmitter,
  SyncPhase,
  SyncEngineConfig,
  SyncRequest,
  SyncOutcome,
  FailedDownload,
  HashMismatch,
  SyncCoordinatorOptions,
  SyncCoordinatorEvents,
} from './sync/index.js';

// Manifest module
export { ManifestReader, parseManifest, resolveEntries, joinUrl } from './manifest/index.js';

export type { ManifestEntry, ResolvedManifestEntry } from './manifest/index.js';

// Hashing module
export {
  ContentHasher,
  hashFile,
  hashBuffer,
  nativeHashCommand,
  parseNativeDigest,
  hashFileNative,
  HASH_CHUNK_SIZE,
} from './hash/index.js';

export type {
  HashMap,
  HashStrategy,
  FileHashResult,
  ExecFileFn,
  NativeHashCommand,
  ContentHasherOptions,
} from './hash/index.js';

// Download module
export {
  StalenessDetector,
  FileDownloader,
  ProgressTracker,
  DEFAULT_MAX_CONCURRENT_DOWNLOADS,
} from './download/index.js';

export type {
  HashCache,
  StaleReason,
  StaleEntry,
  StalenessResult,
  DownloadConfig,
  DownloadResult,
  DownloadProgress,
  DownloadProgressCallback,
} from './download/index.js';

// Reconcile module
export { RedundantFileReconciler, DEFAULT_CONFIRM_THRESHOLD } from './reconcile/index.js';

export type { ConfirmFn, ReconcilerOptions, ReconcilerHooks } from './reconcile/index.js';

// Utilities
export { runWithConcurrency } from './util/worker-pool.js';
