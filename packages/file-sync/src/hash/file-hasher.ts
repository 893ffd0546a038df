/**
 * In-process SHA-256 hashing.
 *
 * Streams the file through node:crypto in 8 KiB reads, so memory stays
 * constant regardless of file size. This is the portable strategy used when
 * no native hashing tool is available or the native tool fails.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import type { FileHashResult } from './types.js';
import { HASH_CHUNK_SIZE } from './types.js';

/**
 * Compute the SHA-256 digest of a file using a streaming approach.
 *
 * @throws If the file cannot be read
 */
export async function hashFile(filePath: string): Promise<FileHashResult> {
  return new Promise<FileHashResult>((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    let sizeBytes = 0;

    const stream = fs.createReadStream(filePath, { highWaterMark: HASH_CHUNK_SIZE });

    stream.on('data', (chunk: string | Buffer) => {
      sizeBytes += chunk.length;
      hash.update(chunk);
    });

    stream.on('end', () => {
      resolve({
        hash: hash.digest('hex'),
        sizeBytes,
      });
    });

    stream.on('error', (err: Error) => {
      reject(new Error(`Failed to hash file ${filePath}: ${err.message}`));
    });
  });
}

/**
 * Compute the SHA-256 digest of in-memory content.
 */
export function hashBuffer(content: Buffer | string): FileHashResult {
  const hash = crypto.createHash('sha256');
  hash.update(content);

  return {
    hash: hash.digest('hex'),
    sizeBytes: Buffer.byteLength(content),
  };
}
