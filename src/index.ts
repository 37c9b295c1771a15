#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { program } from 'commander';
import chalk from 'chalk';
import { loadGlobalConfig, resolveConfig, type CliOptions } from './config.js';
import { toError } from './errors.js';
import { logger } from './logger.js';
import { createShell } from './shell.js';
import { VERSION } from './version.js';

// CLI setup
program
  .name('agent-shell')
  .description('Interactive shell for loading and driving agents')
  .version(VERSION, '-v, --version', 'Output the current version')
  .option('-a, --agents-dir <dir>', 'Directory holding agent definitions (default: ./agents)')
  .option('--history-file <file>', 'File the line history is kept in')
  .option('--no-default-agent', 'Do not load the default agent on startup')
  .option('--verbose', 'Show dispatch and agent details')
  .option('--debug', 'Show config resolution and stack traces')
  .option('--trace', 'Show tokenized input')
  .parse();

const options = program.opts<CliOptions>();

async function main(): Promise<void> {
  const { config, configPath } = loadGlobalConfig();
  const resolved = resolveConfig(config, options);
  logger.setLevel(resolved.logLevel);
  if (configPath) {
    logger.debug(`Loaded config from ${configPath}`);
  }

  const { repl } = createShell(resolved);
  await repl.run();
}

// Handle uncaught errors gracefully
process.on('uncaughtException', (error) => {
  console.error(chalk.red(`\nUncaught exception: ${error.message}`));
  if (process.env.DEBUG) {
    console.error(error.stack);
  }
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error(chalk.red(`\nUnhandled rejection: ${toError(reason).message}`));
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error(toError(error).message, toError(error));
  process.exit(1);
});
