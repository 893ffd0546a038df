/**
 * ContentHasher - batch SHA-256 hashing with a native fast path.
 *
 * The whole batch is first hashed with the platform tool. If any single
 * invocation fails, the native results are discarded and the batch is
 * re-hashed in-process, so a run never mixes the two strategies.
 */

import * as os from 'node:os';
import type { Logger } from 'pino';
import type { ContentHasherOptions, ExecFileFn, HashStrategy } from './types.js';
import { hashFile } from './file-hasher.js';
import { defaultExecFile, hashFileNative, nativeHashCommand } from './native-hasher.js';
import { runWithConcurrency } from '../util/worker-pool.js';

/** Digests for a batch, keyed by the path that was passed in */
export type HashMap = Record<string, string>;

export class ContentHasher {
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly platform: NodeJS.Platform;
  private readonly exec: ExecFileFn;
  private _lastStrategy: HashStrategy | null = null;

  constructor(logger: Logger, options?: ContentHasherOptions) {
    this.logger = logger.child({ component: 'content-hasher' });
    this.concurrency = options?.concurrency ?? os.availableParallelism();
    this.platform = options?.platform ?? process.platform;
    this.exec = options?.execCommand ?? defaultExecFile;
  }

  /** Strategy used by the most recent non-empty batch */
  get lastStrategy(): HashStrategy | null {
    return this._lastStrategy;
  }

  /**
   * Hash every path and return path -> lowercase hex digest.
   *
   * @throws If the portable fallback cannot read a file
   */
  async hash(paths: readonly string[]): Promise<HashMap> {
    if (paths.length === 0) {
      return {};
    }

    const tool = nativeHashCommand(this.platform);
    if (tool) {
      try {
        const digests = await runWithConcurrency(paths, this.concurrency, (p) =>
          hashFileNative(p, tool, this.exec)
        );
        this._lastStrategy = 'native';
        this.logger.debug(
          { files: paths.length, tool: tool.command },
          'Hashed batch with native tool'
        );
        return toHashMap(paths, digests);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(
          { tool: tool.command, error: message },
          'Native hashing failed, falling back to in-process hashing'
        );
      }
    }

    const results = await runWithConcurrency(paths, this.concurrency, (p) => hashFile(p));
    this._lastStrategy = 'portable';
    this.logger.debug({ files: paths.length }, 'Hashed batch in-process');
    return toHashMap(
      paths,
      results.map((r) => r.hash)
    );
  }
}

function toHashMap(paths: readonly string[], digests: readonly string[]): HashMap {
  const map: HashMap = {};
  paths.forEach((p, i) => {
    const digest = digests[i];
    if (digest !== undefined) {
      map[p] = digest;
    }
  });
  return map;
}
