// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Dispatcher
 *
 * Turns one input line into a command invocation. Nothing a command does
 * escapes `handle`: failures are logged and reported in the outcome.
 */

import { TokenizeError, toError } from './errors.js';
import { logger } from './logger.js';
import { suggest } from './suggestions.js';
import { tokenize } from './tokenize.js';
import type { Command, CommandContext, CommandRegistry } from './commands/index.js';

export type DispatchOutcome =
  | { status: 'empty' }
  | { status: 'invalid'; error: TokenizeError }
  | { status: 'unknown'; token: string; suggestions: string[] }
  | { status: 'ok'; command: Command }
  | { status: 'failed'; command: Command; error: Error };

/**
 * Warn about an unknown command and list close matches.
 * @returns the suggestions printed
 */
export function reportUnknownCommand(token: string, registry: CommandRegistry): string[] {
  logger.warn(`Unknown command: '${token}'`);
  const suggestions = suggest(token, registry.keys());
  if (suggestions.length > 0) {
    logger.info('Did you mean?');
    for (const suggestion of suggestions) {
      logger.info(`  - ${suggestion}`);
    }
  }
  logger.info("Use 'help' to see all commands.");
  return suggestions;
}

export class Dispatcher {
  constructor(
    private readonly registry: CommandRegistry,
    private readonly context: CommandContext
  ) {}

  async handle(line: string): Promise<DispatchOutcome> {
    let args: string[];
    try {
      args = tokenize(line);
    } catch (error) {
      if (error instanceof TokenizeError) {
        logger.error(`Invalid input: ${error.message}`);
        return { status: 'invalid', error };
      }
      throw error;
    }

    if (args.length === 0) {
      return { status: 'empty' };
    }
    logger.trace(`tokens: ${JSON.stringify(args)}`);

    const token = args[0].toLowerCase();
    const command = this.registry.resolve(token);
    if (!command) {
      return { status: 'unknown', token, suggestions: reportUnknownCommand(token, this.registry) };
    }

    logger.verbose(`→ ${command.name}${token === command.name ? '' : ` (via ${token})`}`);

    try {
      const result = await command.execute(args, this.context);
      if (result.ok) {
        return { status: 'ok', command };
      }
      logger.error(result.error.message, result.error);
      return { status: 'failed', command, error: result.error };
    } catch (thrown) {
      const error = toError(thrown);
      logger.error(error.message, error);
      return { status: 'failed', command, error };
    }
  }
}
