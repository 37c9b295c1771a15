// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import chalk from 'chalk';
import { logger } from '../logger.js';

export const SEPARATOR = '-'.repeat(60);
export const PROMPT_NAME = 'agent-shell';

export function printSeparator(): void {
  logger.info(SEPARATOR);
}

export function printBanner(): void {
  printSeparator();
  logger.info('👋 Welcome to the agent shell!');
  logger.info("Type 'help' to list commands.");
  printSeparator();
}

/**
 * Prompt text showing the active agent, e.g. `agent-shell (demo) > `.
 */
export function formatPrompt(agentName: string | null): string {
  const status = agentName ? `(${agentName})` : chalk.dim('(no agent)');
  return `${chalk.bold.cyan(PROMPT_NAME)} ${status} > `;
}
