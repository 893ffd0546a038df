/**
 * patchsync config command - show where the config lives and what it holds.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { readStoredConfig, resolveConfigPath } from '../utils/config-store.js';

/**
 * Print the config file location and its values. The hash cache is
 * summarized by count.
 */
export function printConfig(configPath: string): void {
  console.log(`Config file: ${configPath}`);

  const result = readStoredConfig(configPath);
  switch (result.status) {
    case 'missing':
      console.log(chalk.dim('  (not created yet; run patchsync to create it)'));
      break;
    case 'invalid':
      console.log(chalk.yellow('  Invalid config, it will be regenerated on the next sync:'));
      for (const err of result.errors) {
        console.log(chalk.yellow(`    - ${err}`));
      }
      break;
    case 'ok': {
      const hashCount = Object.keys(result.config.hashes ?? {}).length;
      console.log(`  Root domain:   ${result.config.rootDomain}`);
      console.log(`  Output dir:    ${result.config.outputDir}`);
      console.log(`  Cached hashes: ${hashCount}`);
      break;
    }
  }
}

export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Show the config file location and stored settings')
    .action(() => {
      printConfig(resolveConfigPath());
    });
}
