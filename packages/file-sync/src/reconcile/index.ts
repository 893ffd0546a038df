export { RedundantFileReconciler } from './redundant-files.js';
export { DEFAULT_CONFIRM_THRESHOLD } from './types.js';
export type { ConfirmFn, ReconcilerOptions, ReconcilerHooks } from './types.js';
