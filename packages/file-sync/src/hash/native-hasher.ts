/**
 * Native SHA-256 hashing through the platform's checksum tool.
 *
 * Linux ships `sha256sum`, macOS ships `shasum`. Both print
 * `<digest>  <path>`; a leading backslash marks a path that was escaped.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { ExecFileFn, NativeHashCommand } from './types.js';

const execFileAsync = promisify(execFile);

/** Default executor: runs the tool and captures stdout/stderr as text */
export const defaultExecFile: ExecFileFn = (file, args) => execFileAsync(file, args);

const DIGEST_PATTERN = /^\\?([0-9a-fA-F]{64})(?:\s|$)/;

/**
 * Pick the native hashing tool for a platform.
 * Returns null when the platform has no known tool.
 */
export function nativeHashCommand(platform: NodeJS.Platform): NativeHashCommand | null {
  switch (platform) {
    case 'linux':
      return { command: 'sha256sum', args: [] };
    case 'darwin':
      return { command: 'shasum', args: ['-a', '256'] };
    default:
      return null;
  }
}

/**
 * Extract the digest from checksum tool output.
 *
 * @throws If the output does not start with a 64-character hex digest
 */
export function parseNativeDigest(stdout: string): string {
  const match = DIGEST_PATTERN.exec(stdout.trimStart());
  if (!match?.[1]) {
    const firstLine = stdout.split('\n')[0] ?? '';
    throw new Error(`Unexpected checksum output: ${JSON.stringify(firstLine)}`);
  }
  return match[1].toLowerCase();
}

/**
 * Hash one file with the native tool.
 *
 * @throws If the tool cannot be spawned, exits non-zero, or prints no digest
 */
export async function hashFileNative(
  filePath: string,
  tool: NativeHashCommand,
  exec: ExecFileFn = defaultExecFile
): Promise<string> {
  const { stdout, stderr } = await exec(tool.command, [...tool.args, filePath]);
  if (!stdout.trim() && stderr.trim()) {
    throw new Error(`${tool.command} failed: ${stderr.trim()}`);
  }
  return parseNativeDigest(stdout);
}
