// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Terminal line input.
 *
 * Wraps a readline interface so the REPL (and commands that read their own
 * input, like chat) can await one event at a time: a line, Ctrl+C, or EOF.
 */

import { createInterface, type Interface } from 'readline';
import { logger } from '../logger.js';

export type InputEvent =
  | { type: 'line'; line: string }
  | { type: 'interrupt' }
  | { type: 'eof' };

export interface LineReader {
  /** Show `prompt` and wait for the next input event. */
  read(prompt: string): Promise<InputEvent>;
  /**
   * Route Ctrl+C to `listener` while it is registered, instead of ending a read.
   * @returns a function that removes the listener
   */
  onInterrupt(listener: () => void): () => void;
  close(): void;
}

export interface TerminalInputOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Previous lines, newest first */
  history?: string[];
  historySize?: number;
  completer?: (line: string) => [string[], string];
  terminal?: boolean;
}

export class TerminalInput implements LineReader {
  private readonly rl: Interface;
  private readonly queued: string[] = [];
  private readonly interruptListeners = new Set<() => void>();
  private waiting: ((event: InputEvent) => void) | null = null;
  private closed = false;

  constructor(options: TerminalInputOptions = {}) {
    this.rl = createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
      history: options.history ?? [],
      historySize: options.historySize,
      completer: options.completer,
      terminal: options.terminal ?? Boolean(process.stdin.isTTY),
    });

    this.rl.on('line', (line) => {
      if (this.waiting) {
        this.settle({ type: 'line', line });
      } else {
        // Typed (or piped) while a command was running
        this.queued.push(line);
      }
    });

    this.rl.on('SIGINT', () => this.handleInterrupt());

    this.rl.on('close', () => {
      this.closed = true;
      this.settle({ type: 'eof' });
    });
  }

  read(prompt: string): Promise<InputEvent> {
    if (this.waiting) {
      return Promise.reject(new Error('A read is already pending'));
    }

    const line = this.queued.shift();
    if (line !== undefined) {
      return Promise.resolve({ type: 'line', line });
    }
    if (this.closed) {
      return Promise.resolve({ type: 'eof' });
    }

    return new Promise((resolve) => {
      this.waiting = resolve;
      this.rl.setPrompt(prompt);
      this.rl.prompt();
    });
  }

  onInterrupt(listener: () => void): () => void {
    this.interruptListeners.add(listener);
    return () => {
      this.interruptListeners.delete(listener);
    };
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }

  private handleInterrupt(): void {
    if (this.interruptListeners.size > 0) {
      for (const listener of [...this.interruptListeners]) {
        listener();
      }
      return;
    }

    if (this.waiting) {
      // Drop whatever was typed on the current line
      this.rl.write(null, { ctrl: true, name: 'u' });
      this.settle({ type: 'interrupt' });
      return;
    }

    logger.debug('Interrupt ignored: nothing is listening');
  }

  private settle(event: InputEvent): void {
    const resolve = this.waiting;
    this.waiting = null;
    resolve?.(event);
  }
}
