/**
 * Types for the content hashing module.
 */

/** Size of each read when hashing in-process (8 KiB) */
export const HASH_CHUNK_SIZE = 8 * 1024;

/** Which strategy produced a batch of digests */
export type HashStrategy = 'native' | 'portable';

/** Result of hashing a single file */
export interface FileHashResult {
  /** Lowercase hex SHA-256 digest */
  hash: string;

  /** Bytes read while hashing */
  sizeBytes: number;
}

/** Runs a command and resolves with its captured output; injectable for tests */
export type ExecFileFn = (
  file: string,
  args: readonly string[]
) => Promise<{ stdout: string; stderr: string }>;

/** Native tool invocation for one platform */
export interface NativeHashCommand {
  /** Executable name */
  command: string;

  /** Arguments placed before the file path */
  args: string[];
}

/** Options for creating a ContentHasher */
export interface ContentHasherOptions {
  /** Maximum files hashed at once (default: available parallelism) */
  concurrency?: number;

  /** Platform used to pick the native tool (default: process.platform) */
  platform?: NodeJS.Platform;

  /** Custom command executor (for testing) */
  execCommand?: ExecFileFn;
}
