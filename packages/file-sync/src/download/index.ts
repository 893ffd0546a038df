export { StalenessDetector } from './staleness-detector.js';
export { FileDownloader } from './file-downloader.js';
export { ProgressTracker } from './progress.js';
export { DEFAULT_MAX_CONCURRENT_DOWNLOADS } from './types.js';
export type {
  HashCache,
  StaleReason,
  StaleEntry,
  StalenessResult,
  DownloadConfig,
  DownloadResult,
  DownloadProgress,
  DownloadProgressCallback,
} from './types.js';
