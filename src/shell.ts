// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Wires the registry, session, agent store and terminal into a REPL.
 */

import { AgentStore, loadAgent as loadAgentFromStore, type AgentLoader } from './agent/index.js';
import { loadHistory, MAX_HISTORY_SIZE, saveToHistory } from './cli/history.js';
import { TerminalInput, type LineReader } from './cli/input.js';
import { createCommandRegistry } from './commands/builtin.js';
import type { CommandRegistry } from './commands/index.js';
import { createCompleter } from './completions.js';
import type { ResolvedConfig } from './config.js';
import { logger } from './logger.js';
import { Repl } from './repl.js';
import { SessionContext } from './session.js';

export interface ShellOverrides {
  input?: LineReader;
  loadAgent?: AgentLoader;
  terminate?: (code: number) => void;
  clearScreen?: () => void;
}

export interface Shell {
  repl: Repl;
  session: SessionContext;
  registry: CommandRegistry;
  store: AgentStore;
}

/**
 * Build a shell from resolved config.
 * Throws CommandRegistrationError if the command table is inconsistent.
 */
export function createShell(config: ResolvedConfig, overrides: ShellOverrides = {}): Shell {
  const registry = createCommandRegistry();
  const session = new SessionContext();
  const store = new AgentStore(config.agentsDir);

  logger.debug(`Agents directory: ${store.directory}`);
  logger.debug(`History file: ${config.historyFile}`);

  const input =
    overrides.input ??
    new TerminalInput({
      history: loadHistory(config.historyFile),
      historySize: MAX_HISTORY_SIZE,
      completer: createCompleter({ registry, store, session }),
    });

  const repl = new Repl({
    session,
    registry,
    store,
    loadAgent: overrides.loadAgent ?? ((name) => loadAgentFromStore(name, store)),
    input,
    loadDefaultAgent: config.loadDefaultAgent,
    recordHistory: (line) => {
      saveToHistory(config.historyFile, line);
    },
    terminate: overrides.terminate,
    clearScreen: overrides.clearScreen,
  });

  return { repl, session, registry, store };
}
