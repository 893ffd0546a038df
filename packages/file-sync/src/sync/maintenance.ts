/**
 * Maintenance probe.
 *
 * The patch server publishes a marker file while it is being updated. A 200
 * response means a sync must not start; any other status means it may.
 */

import type { Logger } from 'pino';
import { SyncError } from './errors.js';
import { errorMessage } from '../util/errors.js';

/**
 * Check whether the server is in maintenance.
 *
 * @throws SyncError (phase 'check-maintenance') when the server is unreachable
 */
export async function isUnderMaintenance(
  url: string,
  fetchFn: typeof fetch,
  logger: Logger
): Promise<boolean> {
  let response: Response;
  try {
    response = await fetchFn(url);
  } catch (err) {
    throw new SyncError(
      'check-maintenance',
      `Failed to check maintenance status: ${errorMessage(err)}`,
      { url, cause: err }
    );
  }

  // Only the status matters; release the connection.
  try {
    await response.body?.cancel();
  } catch (err) {
    logger.debug({ url, error: errorMessage(err) }, 'Failed to discard maintenance response body');
  }

  logger.debug({ url, status: response.status }, 'Maintenance probe answered');
  return response.status === 200;
}
