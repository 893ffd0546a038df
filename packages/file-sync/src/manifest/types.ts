/**
 * Types for the remote file manifest.
 *
 * The manifest is a plain-text list, one file per line:
 *   \Data\Maps\town.bin,<sha256 hex>,<size in bytes>
 */

/** One parsed manifest line */
export interface ManifestEntry {
  /** Path under the output directory, forward slashes, no leading separator */
  relativePath: string;

  /** Path token as listed (backslashes normalized), appended to the patch root */
  remoteUrlSuffix: string;

  /** Expected lowercase hex SHA-256 digest */
  expectedHash: string;

  /** Expected size in bytes */
  expectedSize: number;

  /** Absolute local path, set by resolveEntries */
  localPath?: string;

  /** Full download URL, set by resolveEntries */
  remoteUrl?: string;
}

/** A manifest entry with its local path and URL resolved */
export interface ResolvedManifestEntry extends ManifestEntry {
  localPath: string;
  remoteUrl: string;
}
