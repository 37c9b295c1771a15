// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { CommandRegistrationError, toError } from '../errors.js';
import { logger } from '../logger.js';
import type { AgentLoader, AgentStore } from '../agent/index.js';
import type { LineReader } from '../cli/input.js';
import type { SessionContext } from '../session.js';

/**
 * Outcome of a command. Handlers report failures as values; the
 * dispatcher logs them.
 */
export type CommandResult = { ok: true } | { ok: false; error: Error };

export interface Command {
  name: string;
  aliases: string[];
  description: string;
  /** Usage hints shown by `help <command>` */
  usage: string[];
  /**
   * @param args - Full token list; args[0] is the name the command was invoked by
   */
  execute: (args: string[], context: CommandContext) => Promise<CommandResult>;
}

export interface CommandContext {
  session: SessionContext;
  registry: CommandRegistry;
  store: AgentStore;
  loadAgent: AgentLoader;
  /** Input for commands that read their own lines (chat) or listen for Ctrl+C */
  input: LineReader;
  /** Runs the shell's exit path */
  exit: () => void;
  /** Clears the terminal and reprints the banner */
  clearScreen: () => void;
}

export function ok(): CommandResult {
  return { ok: true };
}

export function fail(error: unknown): CommandResult {
  return { ok: false, error: toError(error) };
}

/**
 * Run `fn`, turning anything it throws into a failed result.
 */
export async function attempt(fn: () => Promise<void> | void): Promise<CommandResult> {
  try {
    await fn();
    return ok();
  } catch (error) {
    return fail(error);
  }
}

export function shouldShowHelp(args: string[]): boolean {
  const flag = args[1]?.toLowerCase();
  return flag === '-h' || flag === '--help';
}

/**
 * Print a command's help. Handlers call this for -h / --help once their
 * own preconditions (such as an active agent) have passed.
 */
export function showUsage(command: Command): CommandResult {
  for (const line of formatCommandHelp(command)) {
    logger.info(line);
  }
  return ok();
}

/**
 * Help lines for a single command.
 */
export function formatCommandHelp(command: Command): string[] {
  const lines = [`${command.name}: ${command.description}`];
  if (command.aliases.length > 0) {
    lines.push(`  Aliases: ${command.aliases.join(', ')}`);
  }
  for (const hint of command.usage) {
    lines.push(`  - ${hint}`);
  }
  return lines;
}

/**
 * Commands keyed by lower-cased name and alias.
 * Filled once at startup; there is no removal.
 */
export class CommandRegistry {
  private readonly entries = new Map<string, Command>();
  private readonly commands: Command[] = [];

  /**
   * Register a command under its name and aliases.
   * Throws CommandRegistrationError, registering nothing, on any collision.
   */
  register(command: Command): void {
    const keys = new Set<string>();

    for (const raw of [command.name, ...command.aliases]) {
      const key = raw.toLowerCase();
      if (!key || /\s/.test(key)) {
        throw new CommandRegistrationError(`Command "${command.name}" has an invalid name or alias "${raw}"`, key);
      }
      if (keys.has(key)) {
        throw new CommandRegistrationError(`Command "${command.name}" lists "${key}" more than once`, key);
      }
      const existing = this.entries.get(key);
      if (existing) {
        throw new CommandRegistrationError(
          `"${key}" is already registered by "${existing.name}" (while registering "${command.name}")`,
          key
        );
      }
      keys.add(key);
    }

    for (const key of keys) {
      this.entries.set(key, command);
    }
    this.commands.push(command);
  }

  registerAll(commands: readonly Command[]): void {
    for (const command of commands) this.register(command);
  }

  /**
   * Case-insensitive lookup by name or alias.
   */
  resolve(token: string): Command | undefined {
    return this.entries.get(token.toLowerCase());
  }

  /**
   * Distinct commands in registration order.
   */
  *list(): IterableIterator<Command> {
    yield* this.commands;
  }

  /**
   * Every name and alias, in registration order.
   */
  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.commands.length;
  }
}
