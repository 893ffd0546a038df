/**
 * Types for removing files that are no longer listed on the manifest.
 */

/**
 * Ask the operator a yes/no question. `defaultAnswer` is what an empty reply
 * (or a non-interactive session) should mean.
 */
export type ConfirmFn = (question: string, defaultAnswer: boolean) => Promise<boolean>;

/** Above this many deletions the operator is asked first */
export const DEFAULT_CONFIRM_THRESHOLD = 10;

export interface ReconcilerOptions {
  /** Confirmation callback; without one, bulk deletion is declined */
  confirm?: ConfirmFn;

  /** Candidate count above which confirmation is required (default: 10) */
  confirmThreshold?: number;
}

/** Callbacks fired while reconciling */
export interface ReconcilerHooks {
  /** A file was removed from disk */
  onDeleted?: (path: string) => void;

  /** Paths that were already gone from disk */
  onDiscrepancy?: (paths: string[]) => void;

  /** The operator declined a bulk deletion */
  onDeclined?: (count: number) => void;
}
