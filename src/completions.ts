// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Command Auto-Completion
 *
 * Provides tab-completion in the REPL:
 * - Command names and aliases (lo<TAB> -> load, load-agent, loop)
 * - Agent names (load-agent de<TAB> -> load-agent demo)
 * - Connection and action names of the active agent
 * - The -h / --help flag
 */

import type { AgentStore } from './agent/index.js';
import type { CommandRegistry } from './commands/index.js';
import { toError } from './errors.js';
import { logger } from './logger.js';
import type { SessionContext } from './session.js';

/**
 * Commands whose first argument is an agent name.
 */
const AGENT_NAME_COMMANDS = ['load-agent', 'set-default-agent'];

/**
 * Commands whose first argument is a connection of the active agent.
 */
const CONNECTION_COMMANDS = ['agent-action', 'list-actions', 'configure-connection'];

const HELP_FLAGS = ['-h', '--help'];

export interface CompletionSources {
  registry: CommandRegistry;
  store?: AgentStore;
  session?: SessionContext;
}

function argumentCandidates(
  commandName: string,
  position: number,
  completedArgs: string[],
  sources: CompletionSources
): string[] {
  if (position === 1 && AGENT_NAME_COMMANDS.includes(commandName)) {
    try {
      return sources.store?.listAgents() ?? [];
    } catch (error) {
      // A completer that throws takes readline down with it
      logger.debug(`Could not list agents for completion: ${toError(error).message}`);
      return [];
    }
  }

  const agent = sources.session?.agent;
  if (!agent) return [];
  const connections = agent.connectionManager.listConnections();

  if (position === 1 && CONNECTION_COMMANDS.includes(commandName)) {
    return connections.map((c) => c.name);
  }

  if (position === 2 && commandName === 'agent-action') {
    return connections.find((c) => c.name === completedArgs[0])?.actions ?? [];
  }

  return [];
}

/**
 * Create a completer function for readline.
 * The completer is called on TAB press and returns matching completions.
 */
export function createCompleter(sources: CompletionSources): (line: string) => [string[], string] {
  // Aliases never change during a session
  const commandNames = [...sources.registry.keys()].sort();

  return (line: string): [string[], string] => {
    const trimmed = line.trimStart();
    const parts = trimmed.split(/\s+/);

    // Complete command names
    if (parts.length === 1) {
      const partial = parts[0].toLowerCase();
      const matches = commandNames.filter((name) => name.startsWith(partial)).map((name) => `${name} `);
      return [matches, line];
    }

    const command = sources.registry.resolve(parts[0]);
    if (!command) {
      return [[], line];
    }

    const currentArg = parts[parts.length - 1];
    const completedArgs = parts.slice(1, -1);
    const position = completedArgs.length + 1;

    const completions: string[] = argumentCandidates(command.name, position, completedArgs, sources).filter(
      (candidate) => candidate.startsWith(currentArg)
    );

    if (position === 1 && (currentArg === '' || currentArg.startsWith('-'))) {
      completions.push(...HELP_FLAGS.filter((flag) => flag.startsWith(currentArg)));
    }

    const prefix = parts.slice(0, -1).join(' ') + ' ';
    return [[...new Set(completions)].sort().map((c) => prefix + c), line];
  };
}
