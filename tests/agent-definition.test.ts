// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { parseAgentDefinition, DEFAULT_LOOP_INTERVAL_MS, MAX_LOOP_INTERVAL_MS } from '../src/agent/index.js';
import { AgentDefinitionError } from '../src/errors.js';

function problemsOf(raw: unknown): string[] {
  try {
    parseAgentDefinition('test', raw);
  } catch (error) {
    if (error instanceof AgentDefinitionError) return error.problems;
    throw error;
  }
  return [];
}

describe('parseAgentDefinition', () => {
  it('fills defaults for an empty definition', () => {
    expect(parseAgentDefinition('minimal', {})).toEqual({
      name: 'minimal',
      bio: [],
      model: { provider: 'echo' },
      connections: [],
      loop: { intervalMs: DEFAULT_LOOP_INTERVAL_MS, tasks: [] },
    });
  });

  it('parses a full definition', () => {
    const definition = parseAgentDefinition('file-name', {
      name: 'poster',
      bio: ['Posts things'],
      model: { provider: 'echo', model: 'small' },
      connections: [{ name: 'feed', actions: ['post'], configured: true }],
      loop: { intervalMs: 250, maxIterations: 2, tasks: [{ connection: 'feed', action: 'post', params: ['hi'] }] },
    });

    expect(definition).toEqual({
      name: 'poster',
      bio: ['Posts things'],
      model: { provider: 'echo', model: 'small' },
      connections: [{ name: 'feed', actions: ['post'], configured: true }],
      loop: { intervalMs: 250, maxIterations: 2, tasks: [{ connection: 'feed', action: 'post', params: ['hi'] }] },
    });
  });

  it('rejects a definition that is not an object', () => {
    expect(problemsOf(['demo'])).toEqual(['definition must be a JSON object']);
    expect(problemsOf(null)).toEqual(['definition must be a JSON object']);
  });

  it('collects every problem', () => {
    expect(
      problemsOf({
        name: '',
        bio: 'not a list',
        model: { provider: 3 },
        connections: [{ name: 'a', actions: [1] }, { actions: [] }],
        loop: { intervalMs: -1, maxIterations: 1.5 },
      })
    ).toEqual([
      'name must be a non-empty string',
      'bio must be an array of strings',
      'model.provider must be a string',
      'connections[0].actions must be an array of strings',
      'connections[1].name must be a non-empty string',
      'loop.intervalMs must be a non-negative number',
      'loop.maxIterations must be a positive integer',
    ]);
  });

  it('rejects an interval longer than a timer can wait', () => {
    expect(problemsOf({ loop: { intervalMs: 3_000_000_000 } })).toEqual([
      'loop.intervalMs must be at most 2147483647',
    ]);
    expect(problemsOf({ loop: { intervalMs: MAX_LOOP_INTERVAL_MS } })).toEqual([]);
  });

  it('rejects duplicate connection names', () => {
    expect(problemsOf({ connections: [{ name: 'a' }, { name: 'a' }] })).toEqual(['connection "a" is defined twice']);
  });

  it('checks loop tasks against the declared connections', () => {
    expect(
      problemsOf({
        connections: [{ name: 'feed', actions: ['post'] }],
        loop: {
          tasks: [
            { connection: 'feed', action: 'delete' },
            { connection: 'mail', action: 'send' },
            { connection: 'feed' },
          ],
        },
      })
    ).toEqual([
      'loop.tasks[2] needs string "connection" and "action"',
      'loop task uses unknown action "delete" on "feed"',
      'loop task uses unknown connection "mail"',
    ]);
  });

  it('names the file in the error message', () => {
    expect(() => parseAgentDefinition('demo', { bio: [1] })).toThrow(
      'Invalid definition for agent "demo": bio must be an array of strings'
    );
  });
});
