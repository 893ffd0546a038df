/**
 * Manifest parsing and path resolution.
 *
 * Parsing is pure: text in, entries out. Resolution is a separate step that
 * returns new objects carrying the absolute local path and download URL.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import type { ManifestEntry, ResolvedManifestEntry } from './types.js';
import { SyncError } from '../sync/errors.js';

const SIZE_PATTERN = /^\d+$/;

/**
 * Parse manifest text into entries.
 *
 * Lines without exactly three comma-separated fields are skipped. A size that
 * is not a non-negative integer fails the whole manifest.
 *
 * @throws SyncError (phase 'fetch-manifest') on an invalid size field
 */
export function parseManifest(text: string, logger?: Logger): ManifestEntry[] {
  const entries: ManifestEntry[] = [];
  const lines = text.replace(/\\/g, '/').split('\n');

  lines.forEach((rawLine, index) => {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    const fields = line.split(',');

    if (fields.length !== 3) {
      if (line.trim()) {
        logger?.debug({ line: index + 1 }, 'Skipping malformed manifest line');
      }
      return;
    }

    const [pathToken = '', hashToken = '', sizeToken = ''] = fields;

    const size = sizeToken.trim();
    if (!SIZE_PATTERN.test(size)) {
      throw new SyncError(
        'fetch-manifest',
        `Invalid size ${JSON.stringify(sizeToken)} on manifest line ${index + 1}`
      );
    }

    const relativePath = pathToken.replace(/^\/+/, '');
    if (!relativePath) {
      logger?.warn({ line: index + 1 }, 'Skipping manifest line with empty path');
      return;
    }

    entries.push({
      relativePath,
      remoteUrlSuffix: pathToken,
      expectedHash: hashToken.trim().toLowerCase(),
      expectedSize: Number(size),
    });
  });

  return entries;
}

/**
 * Join the patch root and an entry's suffix with exactly one separator.
 */
export function joinUrl(base: string, suffix: string): string {
  const trimmedBase = base.replace(/\/+$/, '');
  const trimmedSuffix = suffix.replace(/^\/+/, '');
  return `${trimmedBase}/${trimmedSuffix}`;
}

/**
 * Resolve local paths and download URLs.
 *
 * Entries whose path would land outside the output directory are dropped.
 */
export function resolveEntries(
  entries: readonly ManifestEntry[],
  outputDir: string,
  patchRoot: string,
  logger?: Logger
): ResolvedManifestEntry[] {
  const root = path.resolve(outputDir);
  const resolved: ResolvedManifestEntry[] = [];

  for (const entry of entries) {
    const localPath = path.resolve(root, entry.relativePath);
    const rel = path.relative(root, localPath);
    if (!rel || rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
      logger?.warn(
        { relativePath: entry.relativePath },
        'Skipping manifest entry outside the output directory'
      );
      continue;
    }

    resolved.push({
      ...entry,
      localPath,
      remoteUrl: joinUrl(patchRoot, entry.remoteUrlSuffix),
    });
  }

  return resolved;
}
