/**
 * patchsync sync command (default command)
 *
 * Loads the stored config, runs one sync against the patch server and writes
 * the updated hash cache back.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { Logger } from 'pino';
import {
  SyncCoordinator,
  isSyncError,
} from '@patchsync/file-sync';
import type { ConfirmFn, SyncOutcome } from '@patchsync/file-sync';
import {
  loadConfig,
  applyOutcome,
  writeStoredConfig,
  resolveConfigPath,
} from '../utils/config-store.js';
import type { AskFn } from '../utils/config-store.js';
import { promptInput, promptYesNo } from '../utils/prompt.js';
import { clearProgressLine, writeProgressLine } from '../utils/progress.js';
import { createLogger, resolveLogLevel } from '../utils/logger.js';

/** Flags accepted by the sync command */
export interface SyncCommandOptions {
  rootDomain?: string;
  outputDir?: string;
  validate?: boolean;
  deleteFiles?: boolean;
  yes?: boolean;
  logLevel?: string;
}

/** Collaborators for runSync; tests swap these out */
export interface SyncCommandDeps {
  logger: Logger;
  configPath: string;
  fetchFn?: typeof fetch;
  ask?: AskFn;
  confirm?: ConfirmFn;
  platform?: NodeJS.Platform;
}

export interface SyncCommandResult {
  outcome: SyncOutcome;
  exitCode: number;
}

const MAX_LISTED = 5;

function plural(n: number, word: string): string {
  return `${n} ${word}${n !== 1 ? 's' : ''}`;
}

function printList(items: string[]): void {
  for (const item of items.slice(0, MAX_LISTED)) {
    console.log(chalk.red(`    - ${item}`));
  }
  if (items.length > MAX_LISTED) {
    console.log(chalk.dim(`    ... and ${items.length - MAX_LISTED} more`));
  }
}

/**
 * Print the run summary to stdout.
 */
export function printSyncSummary(outcome: SyncOutcome): void {
  if (outcome.status === 'deferred') {
    console.log(chalk.yellow('Server is under maintenance. Try again later.'));
    return;
  }

  const downloaded = Object.keys(outcome.newHashes ?? {}).length;
  const deleted = Object.keys(outcome.deletedHashes ?? {}).length;
  const { failedDownloads, hashMismatches } = outcome;

  if (downloaded === 0 && deleted === 0 && failedDownloads.length === 0) {
    console.log(chalk.green('Already up to date.'));
    return;
  }

  if (downloaded > 0) {
    console.log(chalk.green(`Downloaded ${plural(downloaded, 'file')}.`));
  }
  if (deleted > 0) {
    console.log(chalk.green(`Removed ${plural(deleted, 'redundant file')}.`));
  }

  if (hashMismatches.length > 0) {
    console.log(chalk.yellow(`  ${plural(hashMismatches.length, 'file')} did not match the manifest hash:`));
    printList(hashMismatches.map((m) => m.path));
  }

  if (failedDownloads.length > 0) {
    console.log(chalk.yellow(`  ${plural(failedDownloads.length, 'download')} failed:`));
    printList(failedDownloads.map((f) => `${f.path}: ${f.error}`));
  }
}

/**
 * Run one sync from CLI options.
 *
 * The hash cache is persisted before returning, including after partial
 * failures, so verified downloads are not repeated next time.
 */
export async function runSync(
  options: SyncCommandOptions,
  deps: SyncCommandDeps
): Promise<SyncCommandResult> {
  const { logger, configPath } = deps;
  const config = await loadConfig(
    configPath,
    {
      ...(options.rootDomain !== undefined ? { rootDomain: options.rootDomain } : {}),
      ...(options.outputDir !== undefined ? { outputDir: options.outputDir } : {}),
    },
    deps.ask ?? promptInput,
    logger
  );

  const confirm: ConfirmFn = options.yes ? async () => true : deps.confirm ?? promptYesNo;

  const coordinator = new SyncCoordinator({
    logger,
    confirm,
    ...(deps.fetchFn !== undefined ? { fetchFn: deps.fetchFn } : {}),
    ...(deps.platform !== undefined ? { platform: deps.platform } : {}),
  });

  coordinator.on('downloadProgress', writeProgressLine);
  coordinator.on('phase', (phase) => {
    if (phase === 'verify') clearProgressLine();
  });

  let outcome: SyncOutcome;
  try {
    outcome = await coordinator.sync({
      rootDomain: config.rootDomain,
      outputDir: config.outputDir,
      validate: options.validate ?? false,
      cachedHashes: config.hashes ?? {},
      removeStale: options.deleteFiles ?? false,
    });
  } finally {
    clearProgressLine();
  }

  if (outcome.status === 'completed') {
    writeStoredConfig(configPath, applyOutcome(config, outcome));
    logger.debug({ path: configPath }, 'Saved hash cache');
  }

  return {
    outcome,
    exitCode: outcome.failedDownloads.length > 0 ? 1 : 0,
  };
}

export function registerSyncCommand(program: Command, version: string): void {
  program
    .command('sync', { isDefault: true })
    .description('Bring the output directory in line with the remote file list')
    .option('-r, --root-domain <url>', 'Base URL of the patch server')
    .option('-o, --output-dir <dir>', 'Directory to keep in sync')
    .option('-v, --validate', 'Re-hash local files instead of trusting the cache')
    .option('-d, --delete-files', 'Delete cached files the file list no longer contains')
    .option('-y, --yes', 'Do not ask before deleting many files')
    .option('--log-level <level>', 'Log level (default: $PATCHSYNC_LOGLEVEL or info)')
    .action(async (options: SyncCommandOptions) => {
      try {
        const logger = createLogger(resolveLogLevel(options.logLevel));
        logger.info({ version }, 'patchsync starting');

        const { outcome, exitCode } = await runSync(options, {
          logger,
          configPath: resolveConfigPath(),
        });

        printSyncSummary(outcome);
        process.exitCode = exitCode;
      } catch (error) {
        if (isSyncError(error)) {
          console.error(chalk.red('Sync failed:'), `${error.phase}: ${error.message}`);
        } else {
          console.error(chalk.red('Sync failed:'), error instanceof Error ? error.message : error);
        }
        process.exit(1);
      }
    });
}
