// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { createShell } from '../src/shell.js';
import { loadHistory } from '../src/cli/history.js';
import { LogLevel } from '../src/logger.js';
import { captureOutput } from './helpers/output.js';
import { ScriptedInput } from './helpers/scripted-input.js';
import { createAgentsDir, DEMO_DEFINITION, removeDir } from './helpers/agents.js';

describe('createShell', () => {
  let dir: string;
  let output: string[];

  beforeEach(() => {
    dir = createAgentsDir({ demo: DEMO_DEFINITION, general: { default_agent: 'demo' } });
    output = captureOutput();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(dir);
  });

  it('wires config into a running shell', async () => {
    const historyFile = join(dir, 'state', 'history.txt');
    const terminate = vi.fn();
    const input = new ScriptedInput(['list-connections', 'agent-action conn act password=test-secret', 'exit']);

    const { repl, session, registry, store } = createShell(
      { agentsDir: dir, historyFile, loadDefaultAgent: true, logLevel: LogLevel.NORMAL },
      { input, terminate }
    );
    await repl.run();

    expect(store.directory).toBe(dir);
    expect(registry.size).toBe(13);
    expect(session.agentName).toBe('demo');
    expect(output).toContain('✓ Loaded agent: demo');
    expect(output).toContain('  - conn (not configured)');
    expect(terminate).toHaveBeenCalledWith(0);
    expect(loadHistory(historyFile)).toEqual(['exit', 'list-connections']);
  });

  it('skips the default agent when disabled', async () => {
    const { repl, session } = createShell(
      { agentsDir: dir, historyFile: join(dir, 'history.txt'), loadDefaultAgent: false, logLevel: LogLevel.NORMAL },
      { input: new ScriptedInput([]), terminate: vi.fn() }
    );

    await repl.run();

    expect(session.hasAgent).toBe(false);
  });

  it('uses a custom agent loader', async () => {
    const loadAgent = vi.fn().mockRejectedValue(new Error('offline'));
    const { repl } = createShell(
      { agentsDir: dir, historyFile: join(dir, 'history.txt'), loadDefaultAgent: true, logLevel: LogLevel.NORMAL },
      { input: new ScriptedInput([]), terminate: vi.fn(), loadAgent }
    );

    await repl.run();

    expect(loadAgent).toHaveBeenCalledWith('demo');
    expect(output).toContain('Warning: Failed to load default agent: offline');
  });
});
