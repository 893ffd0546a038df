/**
 * Persistent CLI configuration: where to sync from, where to sync to, and the
 * hash cache from the last run.
 *
 * Lookup order for the file:
 *   1. ./config.json in the working directory, if it exists
 *   2. $PATCHSYNC_CONFIG
 *   3. ~/.patchsync/config.json
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import * as crypto from 'crypto';
import type { Logger } from 'pino';
import type { HashCache, SyncOutcome } from '@patchsync/file-sync';

/** Stored config shape */
export interface StoredConfig {
  /** Base URL of the patch server */
  rootDomain: string;
  /** Local directory kept in sync */
  outputDir: string;
  /** Absolute path -> last verified SHA-256 */
  hashes?: HashCache;
}

/** Values given on the command line */
export interface ConfigFlags {
  rootDomain?: string;
  outputDir?: string;
}

/** Asks the operator for a free-text value */
export type AskFn = (question: string) => Promise<string>;

/**
 * Resolve the config file path.
 */
export function resolveConfigPath(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): string {
  const local = path.join(cwd, 'config.json');
  if (fs.existsSync(local)) {
    return local;
  }
  const fromEnv = env['PATCHSYNC_CONFIG'];
  if (fromEnv) {
    return path.resolve(cwd, fromEnv);
  }
  return path.join(os.homedir(), '.patchsync', 'config.json');
}

/**
 * Check a parsed config file.
 * Returns an array of error messages (empty = valid).
 */
export function validateStoredConfig(raw: unknown): string[] {
  const errors: string[] = [];

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return ['config must be a JSON object'];
  }

  const rootDomain: unknown = Reflect.get(raw, 'rootDomain');
  const outputDir: unknown = Reflect.get(raw, 'outputDir');
  const hashes: unknown = Reflect.get(raw, 'hashes');

  if (typeof rootDomain !== 'string' || !rootDomain) {
    errors.push('rootDomain must be a non-empty string');
  } else if (!/^https?:\/\//.test(rootDomain)) {
    errors.push('rootDomain must be an http(s) URL');
  }

  if (typeof outputDir !== 'string' || !outputDir) {
    errors.push('outputDir must be a non-empty string');
  }

  if (hashes !== undefined) {
    if (typeof hashes !== 'object' || hashes === null || Array.isArray(hashes)) {
      errors.push('hashes must be an object');
    } else if (!Object.values(hashes).every((v) => typeof v === 'string')) {
      errors.push('hashes values must be strings');
    }
  }

  return errors;
}

function isStoredConfig(raw: unknown): raw is StoredConfig {
  return validateStoredConfig(raw).length === 0;
}

/** Outcome of reading the config file */
export type ReadConfigResult =
  | { status: 'missing' }
  | { status: 'invalid'; errors: string[] }
  | { status: 'ok'; config: StoredConfig };

/**
 * Read and validate the config file.
 */
export function readStoredConfig(configPath: string): ReadConfigResult {
  if (!fs.existsSync(configPath)) {
    return { status: 'missing' };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    return { status: 'invalid', errors: [`unreadable JSON: ${err instanceof Error ? err.message : String(err)}`] };
  }

  if (!isStoredConfig(raw)) {
    return { status: 'invalid', errors: validateStoredConfig(raw) };
  }
  return { status: 'ok', config: raw };
}

/**
 * Write the config file atomically (temp file + rename).
 */
export function writeStoredConfig(configPath: string, config: StoredConfig): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  const tempPath = `${configPath}.${crypto.randomBytes(4).toString('hex')}.tmp`;
  fs.writeFileSync(tempPath, JSON.stringify(config, null, 2) + '\n');
  fs.renameSync(tempPath, configPath);
}

async function requireValue(
  flag: string | undefined,
  question: string,
  ask: AskFn
): Promise<string> {
  if (flag) return flag;
  const answer = (await ask(question)).trim();
  if (!answer) {
    throw new Error(`No value given for: ${question}`);
  }
  return answer;
}

/**
 * Load the config, creating or repairing it as needed.
 *
 * - Missing file: values come from flags, or the operator is asked.
 * - Invalid file: it is regenerated the same way and its cache is dropped.
 * - Flags that differ from stored values replace them.
 *
 * The file is written back whenever anything changed.
 */
export async function loadConfig(
  configPath: string,
  flags: ConfigFlags,
  ask: AskFn,
  logger: Logger
): Promise<StoredConfig> {
  const result = readStoredConfig(configPath);

  if (result.status !== 'ok') {
    if (result.status === 'invalid') {
      logger.warn({ path: configPath, errors: result.errors }, 'Config file is invalid, regenerating');
    } else {
      logger.info({ path: configPath }, 'No config file found, creating one');
    }

    const config: StoredConfig = {
      rootDomain: await requireValue(flags.rootDomain, 'Root domain of the patch server:', ask),
      outputDir: path.resolve(await requireValue(flags.outputDir, 'Output directory:', ask)),
      hashes: {},
    };
    const errors = validateStoredConfig(config);
    if (errors.length > 0) {
      throw new Error(`Invalid config: ${errors.join('; ')}`);
    }
    writeStoredConfig(configPath, config);
    return config;
  }

  const config: StoredConfig = { ...result.config };
  let changed = false;

  if (flags.rootDomain && flags.rootDomain !== config.rootDomain) {
    logger.info({ from: config.rootDomain, to: flags.rootDomain }, 'Updating stored root domain');
    config.rootDomain = flags.rootDomain;
    changed = true;
  }

  if (flags.outputDir) {
    const outputDir = path.resolve(flags.outputDir);
    if (outputDir !== config.outputDir) {
      logger.info({ from: config.outputDir, to: outputDir }, 'Updating stored output directory');
      config.outputDir = outputDir;
      changed = true;
    }
  }

  if (changed) {
    const errors = validateStoredConfig(config);
    if (errors.length > 0) {
      throw new Error(`Invalid config: ${errors.join('; ')}`);
    }
    writeStoredConfig(configPath, config);
  }

  return config;
}

/**
 * Fold a sync outcome into the stored config.
 *
 * A deferred run carries no hashes and leaves the cache as it was.
 */
export function applyOutcome(config: StoredConfig, outcome: SyncOutcome): StoredConfig {
  if (!outcome.hashes) {
    return config;
  }
  return { ...config, hashes: { ...outcome.hashes } };
}
