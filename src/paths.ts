// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized path management for the shell.
 *
 * Each getter computes its path at call time so environment overrides
 * set by tests take effect.
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the base shell directory.
 * Supports override via AGENT_SHELL_HOME.
 */
export function getShellHome(): string {
  if (process.env.AGENT_SHELL_HOME) {
    return process.env.AGENT_SHELL_HOME;
  }
  return join(homedir(), '.agent-shell');
}

export const ShellPaths = {
  /**
   * Base directory (~/.agent-shell)
   */
  home: (): string => getShellHome(),

  /**
   * Global config file
   */
  config: (): string => join(getShellHome(), 'config.json'),

  /**
   * Line history file.
   * Supports override via AGENT_SHELL_HISTORY_FILE.
   */
  history: (): string => process.env.AGENT_SHELL_HISTORY_FILE || join(getShellHome(), 'history.txt'),

  /**
   * Default agents directory, relative to the working directory.
   */
  agents: (cwd: string = process.cwd()): string => resolve(cwd, 'agents'),
};
