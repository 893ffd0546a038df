/**
 * Fatal sync errors.
 *
 * Only conditions that end a run are thrown as SyncError. Per-file problems
 * (failed downloads, hash mismatches, missing files at deletion) are logged
 * and emitted as events instead.
 */

import type { SyncPhase } from './types.js';

export class SyncError extends Error {
  /** Phase the run was in when it failed */
  readonly phase: SyncPhase;

  /** URL involved, when the failure was a request */
  readonly url?: string;

  /** HTTP status, when the server answered */
  readonly status?: number;

  constructor(
    phase: SyncPhase,
    message: string,
    options?: { url?: string; status?: number; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'SyncError';
    this.phase = phase;
    if (options?.url !== undefined) this.url = options.url;
    if (options?.status !== undefined) this.status = options.status;
  }
}

export function isSyncError(err: unknown): err is SyncError {
  return err instanceof SyncError;
}
