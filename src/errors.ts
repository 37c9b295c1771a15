// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Error types raised by the shell and the local agent.
 */

export type ShellErrorCode =
  | 'TOKENIZE'
  | 'COMMAND_REGISTRATION'
  | 'AGENT_NOT_FOUND'
  | 'AGENT_DEFINITION'
  | 'AGENT_STORE'
  | 'CONNECTION_NOT_FOUND'
  | 'ACTION_NOT_FOUND'
  | 'MODEL_PROVIDER';

/**
 * Base class for every error the shell reports to the user.
 */
export class ShellError extends Error {
  constructor(
    message: string,
    public readonly code: ShellErrorCode
  ) {
    super(message);
    this.name = 'ShellError';
  }
}

/**
 * Malformed quoting or escaping in an input line.
 */
export class TokenizeError extends ShellError {
  constructor(message: string, public readonly position: number) {
    super(message, 'TOKENIZE');
    this.name = 'TokenizeError';
  }
}

/**
 * Two commands claim the same name or alias. Fatal at startup.
 */
export class CommandRegistrationError extends ShellError {
  constructor(message: string, public readonly key: string) {
    super(message, 'COMMAND_REGISTRATION');
    this.name = 'CommandRegistrationError';
  }
}

export class AgentNotFoundError extends ShellError {
  constructor(public readonly agentName: string, directory: string) {
    super(`Agent "${agentName}" not found in ${directory}`, 'AGENT_NOT_FOUND');
    this.name = 'AgentNotFoundError';
  }
}

export class AgentDefinitionError extends ShellError {
  constructor(public readonly agentName: string, public readonly problems: string[]) {
    super(`Invalid definition for agent "${agentName}": ${problems.join('; ')}`, 'AGENT_DEFINITION');
    this.name = 'AgentDefinitionError';
  }
}

/**
 * The agents directory or its general.json record could not be read or written.
 */
export class AgentStoreError extends ShellError {
  constructor(message: string) {
    super(message, 'AGENT_STORE');
    this.name = 'AgentStoreError';
  }
}

export class ConnectionNotFoundError extends ShellError {
  constructor(public readonly connection: string, available: string[]) {
    super(
      available.length > 0
        ? `Unknown connection "${connection}". Available: ${available.join(', ')}`
        : `Unknown connection "${connection}". This agent has no connections`,
      'CONNECTION_NOT_FOUND'
    );
    this.name = 'ConnectionNotFoundError';
  }
}

export class ActionNotFoundError extends ShellError {
  constructor(public readonly connection: string, public readonly action: string) {
    super(`Connection "${connection}" has no action "${action}"`, 'ACTION_NOT_FOUND');
    this.name = 'ActionNotFoundError';
  }
}

export class ModelProviderError extends ShellError {
  constructor(message: string) {
    super(message, 'MODEL_PROVIDER');
    this.name = 'ModelProviderError';
  }
}

/**
 * Normalize a thrown value into an Error.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : String(value));
}
