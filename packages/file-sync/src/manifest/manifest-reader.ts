/**
 * ManifestReader - fetches and parses the remote file list.
 */

import type { Logger } from 'pino';
import type { ManifestEntry } from './types.js';
import { parseManifest } from './manifest-parser.js';
import { SyncError } from '../sync/errors.js';

export class ManifestReader {
  private readonly logger: Logger;
  private readonly fetchFn: typeof fetch;

  constructor(logger: Logger, fetchFn: typeof fetch = fetch) {
    this.logger = logger.child({ component: 'manifest-reader' });
    this.fetchFn = fetchFn;
  }

  /**
   * Download the manifest at `url` and parse it.
   *
   * @throws SyncError (phase 'fetch-manifest') when the request fails, the
   *   server answers with a non-2xx status, or a size field is invalid
   */
  async read(url: string): Promise<ManifestEntry[]> {
    let response: Response;
    try {
      response = await this.fetchFn(url);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new SyncError('fetch-manifest', `Failed to fetch manifest: ${message}`, {
        url,
        cause: err,
      });
    }

    if (!response.ok) {
      throw new SyncError(
        'fetch-manifest',
        `Failed to fetch manifest: HTTP ${response.status}`,
        { url, status: response.status }
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new SyncError('fetch-manifest', `Failed to read manifest body: ${message}`, {
        url,
        cause: err,
      });
    }

    const entries = parseManifest(text, this.logger);

    this.logger.info({ url, entries: entries.length }, 'Manifest loaded');
    return entries;
  }
}
