/**
 * In-place download progress line (TTY only).
 * Non-TTY environments get no progress output; the summary covers it.
 */

import type { DownloadProgress } from '@patchsync/file-sync';

const UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];

/**
 * Human-readable byte count, e.g. 1536 -> "1.5 KiB".
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${UNITS[0]}` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

export function formatProgress(progress: DownloadProgress): string {
  const { transferredBytes, totalBytes, filesCompleted, filesFailed, totalFiles } = progress;
  const pct = totalBytes > 0 ? Math.min(100, Math.round((transferredBytes / totalBytes) * 100)) : 100;
  const done = filesCompleted + filesFailed;
  return `Downloading: ${formatBytes(transferredBytes)} / ${formatBytes(totalBytes)} (${pct}%) - ${done}/${totalFiles} files`;
}

export function writeProgressLine(progress: DownloadProgress): void {
  if (process.stderr.isTTY) {
    process.stderr.write(`\r${formatProgress(progress)}`);
  }
}

export function clearProgressLine(): void {
  if (process.stderr.isTTY) {
    process.stderr.write('\r' + ' '.repeat(80) + '\r');
  }
}
