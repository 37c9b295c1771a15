// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { clearCommand, exitCommand, helpCommand } from '../src/commands/general-commands.js';
import { captureOutput } from './helpers/output.js';
import { createAgentsDir, createTestContext, removeDir, type TestContext } from './helpers/agents.js';

describe('general commands', () => {
  let dir: string;
  let output: string[];
  let context: TestContext;

  beforeEach(() => {
    dir = createAgentsDir();
    output = captureOutput();
    context = createTestContext(dir);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(dir);
  });

  describe('help', () => {
    it('lists every command once, in table order', async () => {
      await helpCommand.execute(['help'], context);

      expect(output[0]).toBe('Commands:');
      expect(output[1]).toBe(`  ${'help'.padEnd(20)} - Display available commands, or details for one`);
      expect(output[13]).toBe(`  ${'exit'.padEnd(20)} - Exit the shell`);
      expect(output[14]).toBe("Type 'help <command>' for details.");
      expect(output).toHaveLength(15);
    });

    it('shows details for one command, looked up by alias', async () => {
      await helpCommand.execute(['?', 'Q'], context);

      expect(output).toEqual(['exit: Exit the shell', '  Aliases: quit, q', '  - exit']);
    });

    it('suggests commands for an unknown name', async () => {
      await helpCommand.execute(['help', 'Lod'], context);

      expect(output).toEqual([
        "Warning: Unknown command: 'lod'",
        'Did you mean?',
        '  - load',
        "Use 'help' to see all commands.",
      ]);
    });
  });

  it('clear clears the screen', async () => {
    await clearCommand.execute(['cls'], context);
    expect(context.clearScreen).toHaveBeenCalledTimes(1);
  });

  it('exit runs the exit path', async () => {
    expect(await exitCommand.execute(['exit'], context)).toEqual({ ok: true });
    expect(context.exit).toHaveBeenCalledTimes(1);
  });
});
