// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * REPL Loop
 *
 * awaiting-input → dispatching → awaiting-input, until the exit command or
 * end of input moves it to exited.
 */

import { formatPrompt, printBanner, printSeparator } from './cli/banner.js';
import type { LineReader } from './cli/input.js';
import { loadDefaultAgent } from './commands/agent-commands.js';
import type { CommandRegistry } from './commands/index.js';
import { Dispatcher } from './dispatcher.js';
import { logger } from './logger.js';
import type { AgentLoader, AgentStore } from './agent/index.js';
import type { SessionContext } from './session.js';

export type ReplState = 'awaiting-input' | 'dispatching' | 'exited';

export interface ReplOptions {
  session: SessionContext;
  registry: CommandRegistry;
  store: AgentStore;
  loadAgent: AgentLoader;
  input: LineReader;
  /** Load the default agent before the first prompt (default: true) */
  loadDefaultAgent?: boolean;
  /** Receives each non-empty line before it is dispatched */
  recordHistory?: (line: string) => void;
  /** Ends the process; defaults to process.exit */
  terminate?: (code: number) => void;
  /** Clears the terminal; defaults to console.clear */
  clearScreen?: () => void;
}

export class Repl {
  readonly dispatcher: Dispatcher;
  private state: ReplState = 'awaiting-input';

  constructor(private readonly options: ReplOptions) {
    const { session, registry, store, loadAgent, input } = options;
    const clear = options.clearScreen ?? (() => console.clear());

    this.dispatcher = new Dispatcher(registry, {
      session,
      registry,
      store,
      loadAgent,
      input,
      exit: () => this.exit(),
      clearScreen: () => {
        clear();
        printBanner();
      },
    });
  }

  getState(): ReplState {
    return this.state;
  }

  isExited(): boolean {
    return this.state === 'exited';
  }

  /**
   * Print the banner, load the default agent, then read and dispatch
   * lines until exit.
   */
  async run(): Promise<void> {
    const { session, store, loadAgent, input } = this.options;

    printBanner();
    if (this.options.loadDefaultAgent !== false) {
      await loadDefaultAgent({ session, store, loadAgent });
    }

    while (!this.isExited()) {
      const event = await input.read(formatPrompt(session.agentName));

      if (event.type === 'interrupt') {
        logger.debug('Interrupt at prompt ignored');
        continue;
      }
      if (event.type === 'eof') {
        this.exit();
        break;
      }

      const line = event.line.trim();
      if (!line) continue;

      this.options.recordHistory?.(line);
      this.state = 'dispatching';
      await this.dispatcher.handle(line);
      if (this.isExited()) break;

      printSeparator();
      this.state = 'awaiting-input';
    }
  }

  /**
   * Shared exit path for the exit command and end of input.
   */
  exit(): void {
    if (this.isExited()) return;
    this.state = 'exited';
    logger.info('Goodbye!');
    this.options.input.close();
    (this.options.terminate ?? ((code: number) => process.exit(code)))(0);
  }
}
