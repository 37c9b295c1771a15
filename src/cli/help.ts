// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Help Display
 *
 * Command listing for the `help` command.
 */

import chalk from 'chalk';
import type { CommandRegistry } from '../commands/index.js';
import { logger } from '../logger.js';

const NAME_COLUMN = 20;

/**
 * Print every command once, with its description.
 */
export function showHelp(registry: CommandRegistry): void {
  logger.info(chalk.bold('Commands:'));
  for (const command of registry.list()) {
    logger.info(`  ${chalk.cyan(command.name.padEnd(NAME_COLUMN))} - ${command.description}`);
  }
  logger.info(chalk.dim("Type 'help <command>' for details."));
}
