// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import {
  agentActionCommand,
  agentLoopCommand,
  chatCommand,
  createAgentCommand,
  listAgentsCommand,
  loadAgentCommand,
  setDefaultAgentCommand,
} from './agent-commands.js';
import {
  configureConnectionCommand,
  listActionsCommand,
  listConnectionsCommand,
} from './connection-commands.js';
import { clearCommand, exitCommand, helpCommand } from './general-commands.js';
import { CommandRegistry, type Command } from './index.js';

/**
 * Built-in commands in the order `help` lists them.
 */
export const BUILTIN_COMMANDS: readonly Command[] = [
  helpCommand,
  clearCommand,
  agentActionCommand,
  agentLoopCommand,
  listAgentsCommand,
  loadAgentCommand,
  createAgentCommand,
  setDefaultAgentCommand,
  chatCommand,
  listActionsCommand,
  configureConnectionCommand,
  listConnectionsCommand,
  exitCommand,
];

/**
 * Registry holding the built-in commands.
 * Throws CommandRegistrationError if any two collide.
 */
export function createCommandRegistry(commands: readonly Command[] = BUILTIN_COMMANDS): CommandRegistry {
  const registry = new CommandRegistry();
  registry.registerAll(commands);
  return registry;
}
