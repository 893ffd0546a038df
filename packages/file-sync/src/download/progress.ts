/**
 * Shared progress counter for a batch of downloads.
 *
 * Every worker advances the same tracker. Node runs callbacks on one thread,
 * so increments from concurrent downloads never interleave mid-update.
 */

import type { DownloadProgress, DownloadProgressCallback } from './types.js';

export class ProgressTracker {
  private readonly listeners: DownloadProgressCallback[] = [];
  private readonly state: DownloadProgress;

  constructor(totalBytes: number, totalFiles: number) {
    this.state = {
      totalBytes,
      transferredBytes: 0,
      totalFiles,
      filesCompleted: 0,
      filesFailed: 0,
    };
  }

  /** Register a listener; returns a function that removes it */
  subscribe(listener: DownloadProgressCallback): () => void {
    this.listeners.push(listener);
    return () => {
      const i = this.listeners.indexOf(listener);
      if (i !== -1) this.listeners.splice(i, 1);
    };
  }

  advance(bytes: number): void {
    this.state.transferredBytes += bytes;
    this.notify();
  }

  fileCompleted(): void {
    this.state.filesCompleted++;
    this.notify();
  }

  fileFailed(): void {
    this.state.filesFailed++;
    this.notify();
  }

  snapshot(): DownloadProgress {
    return { ...this.state };
  }

  private notify(): void {
    const snap = this.snapshot();
    for (const listener of this.listeners) {
      listener(snap);
    }
  }
}
