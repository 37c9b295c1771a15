// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * In-process stand-in for the terminal.
 *
 * Replays a fixed script of lines and Ctrl+C presses, then reports end of
 * input. Prompts passed to read() are recorded for assertions.
 */

import type { InputEvent, LineReader } from '../../src/cli/input.js';

export const INTERRUPT = Symbol('interrupt');

export type ScriptStep = string | typeof INTERRUPT;

export class ScriptedInput implements LineReader {
  readonly prompts: string[] = [];
  closed = false;
  private readonly steps: ScriptStep[];
  private readonly interruptListeners = new Set<() => void>();

  constructor(steps: ScriptStep[] = []) {
    this.steps = [...steps];
  }

  async read(prompt: string): Promise<InputEvent> {
    this.prompts.push(prompt);
    if (this.closed) return { type: 'eof' };

    const step = this.steps.shift();
    if (step === undefined) return { type: 'eof' };
    if (step === INTERRUPT) return { type: 'interrupt' };
    return { type: 'line', line: step };
  }

  onInterrupt(listener: () => void): () => void {
    this.interruptListeners.add(listener);
    return () => {
      this.interruptListeners.delete(listener);
    };
  }

  /**
   * Simulate Ctrl+C while a command is running.
   */
  interrupt(): void {
    for (const listener of [...this.interruptListeners]) {
      listener();
    }
  }

  get listenerCount(): number {
    return this.interruptListeners.size;
  }

  close(): void {
    this.closed = true;
  }
}
