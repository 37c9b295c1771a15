// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Commands for the active agent's connections.
 */

import chalk from 'chalk';
import { logger } from '../logger.js';
import { attempt, ok, shouldShowHelp, showUsage, type Command } from './index.js';

export const listActionsCommand: Command = {
  name: 'list-actions',
  aliases: ['actions', 'ls-actions'],
  description: "List a connection's actions",
  usage: ['list-actions <connection>'],
  execute: async (args, { session }) => {
    const agent = session.requireAgent();
    if (!agent) return ok();
    if (shouldShowHelp(args)) return showUsage(listActionsCommand);
    if (args.length < 2) {
      logger.info('Usage: list-actions <connection>');
      return ok();
    }

    const connection = args[1];
    return attempt(() => {
      const actions = agent.connectionManager.listActions(connection);
      if (actions.length === 0) {
        logger.info(`No actions available for connection '${connection}'`);
        return;
      }
      logger.info(`Available actions for connection '${connection}':`);
      for (const action of actions) {
        logger.info(`  - ${action}`);
      }
    });
  },
};

export const configureConnectionCommand: Command = {
  name: 'configure-connection',
  aliases: ['config', 'setup'],
  description: 'Configure a connection for the active agent',
  usage: ['configure-connection <connection>'],
  execute: async (args, { session }) => {
    const agent = session.requireAgent();
    if (!agent) return ok();
    if (shouldShowHelp(args)) return showUsage(configureConnectionCommand);
    if (args.length < 2) {
      logger.info('Usage: configure-connection <connection>');
      return ok();
    }

    return attempt(async () => {
      const info = await agent.connectionManager.configure(args[1]);
      logger.success(`Configured connection '${info.name}'`);
    });
  },
};

export const listConnectionsCommand: Command = {
  name: 'list-connections',
  aliases: ['connections', 'ls-connections'],
  description: "List the active agent's connections",
  usage: ['list-connections'],
  execute: async (args, { session }) => {
    const agent = session.requireAgent();
    if (!agent) return ok();
    if (shouldShowHelp(args)) return showUsage(listConnectionsCommand);

    const connections = agent.connectionManager.listConnections();
    if (connections.length === 0) {
      logger.info(`${agent.name} has no connections`);
      return ok();
    }
    logger.info('Available connections:');
    for (const connection of connections) {
      const status = connection.configured ? chalk.green('configured') : chalk.yellow('not configured');
      logger.info(`  - ${connection.name} (${status})`);
    }
    return ok();
  },
};
