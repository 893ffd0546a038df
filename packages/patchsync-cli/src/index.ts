#!/usr/bin/env node

/**
 * patchsync CLI - keep a local directory in sync with a remote file list
 */

import { Command } from "commander";
import { createRequire } from "module";
import dotenv from "dotenv";
import { registerSyncCommand } from "./commands/sync.js";
import { registerConfigCommand } from "./commands/config.js";

dotenv.config();

const require = createRequire(import.meta.url);
const pkg = require("patchsync-cli/package.json") as { version: string };

const program = new Command();

program
  .name("patchsync")
  .description("Download what changed on the patch server, and nothing else")
  .version(pkg.version);

// patchsync [sync] -r <url> -o <dir> [-v] [-d]
registerSyncCommand(program, pkg.version);

// patchsync config
registerConfigCommand(program);

await program.parseAsync();
