// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { showHelp } from '../cli/help.js';
import { reportUnknownCommand } from '../dispatcher.js';
import { ok, shouldShowHelp, showUsage, type Command } from './index.js';

export const helpCommand: Command = {
  name: 'help',
  aliases: ['h', '?'],
  description: 'Display available commands, or details for one',
  usage: ['help', 'help load-agent'],
  execute: async (args, { registry }) => {
    if (shouldShowHelp(args)) return showUsage(helpCommand);
    if (args.length > 1) {
      const command = registry.resolve(args[1]);
      if (command) {
        showUsage(command);
      } else {
        reportUnknownCommand(args[1].toLowerCase(), registry);
      }
      return ok();
    }

    showHelp(registry);
    return ok();
  },
};

export const clearCommand: Command = {
  name: 'clear',
  aliases: ['cls'],
  description: 'Clear the terminal screen',
  usage: ['clear'],
  execute: async (args, { clearScreen }) => {
    if (shouldShowHelp(args)) return showUsage(clearCommand);
    clearScreen();
    return ok();
  },
};

export const exitCommand: Command = {
  name: 'exit',
  aliases: ['quit', 'q'],
  description: 'Exit the shell',
  usage: ['exit'],
  execute: async (args, { exit }) => {
    if (shouldShowHelp(args)) return showUsage(exitCommand);
    exit();
    return ok();
  },
};
