// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  createModelProvider,
  EchoProvider,
  getProviderTypes,
  LocalAgent,
  LocalConnectionManager,
  parseAgentDefinition,
} from '../src/agent/index.js';
import { ConnectionNotFoundError, ModelProviderError } from '../src/errors.js';
import { captureOutput } from './helpers/output.js';
import { DEMO_DEFINITION } from './helpers/agents.js';

describe('LocalConnectionManager', () => {
  const definitions = [
    { name: 'conn', actions: ['act'], configured: false },
    { name: 'mail', actions: [], configured: true },
  ];

  it('lists connections in definition order', () => {
    const manager = new LocalConnectionManager(definitions);
    expect(manager.listConnections()).toEqual([
      { name: 'conn', actions: ['act'], configured: false },
      { name: 'mail', actions: [], configured: true },
    ]);
  });

  it('hands out copies', () => {
    const manager = new LocalConnectionManager(definitions);
    manager.listConnections()[0].actions.push('injected');
    manager.listActions('conn').push('injected');
    expect(manager.listActions('conn')).toEqual(['act']);
  });

  it('configures a connection', async () => {
    const manager = new LocalConnectionManager(definitions);
    expect(await manager.configure('conn')).toEqual({ name: 'conn', actions: ['act'], configured: true });
    expect(manager.get('conn').configured).toBe(true);
  });

  it('throws for an unknown connection', async () => {
    const manager = new LocalConnectionManager(definitions);
    expect(() => manager.listActions('ghost')).toThrow(ConnectionNotFoundError);
    await expect(manager.configure('ghost')).rejects.toThrow('Unknown connection "ghost". Available: conn, mail');
  });
});

describe('LocalAgent', () => {
  let output: string[];

  beforeEach(() => {
    output = captureOutput();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('takes its name from the definition', () => {
    const agent = new LocalAgent(parseAgentDefinition('demo', DEMO_DEFINITION));
    expect(agent.name).toBe('demo');
  });

  it('performs a declared action', async () => {
    const agent = new LocalAgent(parseAgentDefinition('demo', DEMO_DEFINITION));
    await expect(agent.performAction('conn', 'ping', [])).resolves.toBe(
      "Performed action 'ping' on connection 'conn' with params []"
    );
  });

  it('rejects undeclared connections and actions', async () => {
    const agent = new LocalAgent(parseAgentDefinition('demo', DEMO_DEFINITION));
    await expect(agent.performAction('ghost', 'ping', [])).rejects.toThrow(ConnectionNotFoundError);
    await expect(agent.performAction('mail', 'ping', [])).rejects.toThrow('Connection "mail" has no action "ping"');
  });

  it('needs its model provider before chatting', async () => {
    const agent = new LocalAgent(parseAgentDefinition('demo', DEMO_DEFINITION));
    await expect(agent.promptModel('hi')).rejects.toThrow(ModelProviderError);

    await agent.initializeModelProvider();

    expect(agent.isModelReady).toBe(true);
    await expect(agent.promptModel('hi')).resolves.toBe('Echo: hi');
  });

  it('runs nothing but still finishes a loop without tasks', async () => {
    const agent = new LocalAgent(parseAgentDefinition('idle', { loop: { intervalMs: 0, maxIterations: 1 } }));

    await agent.runLoop(new AbortController().signal);

    expect(output).toEqual(['Running agent loop... (Ctrl+C to stop)', 'Agent loop finished after 1 iteration.']);
  });

  it('does not start a loop that is already aborted', async () => {
    const agent = new LocalAgent(
      parseAgentDefinition('demo', {
        ...DEMO_DEFINITION,
        loop: { tasks: [{ connection: 'conn', action: 'ping' }] },
      })
    );
    const controller = new AbortController();
    controller.abort();

    await agent.runLoop(controller.signal);

    expect(output).toEqual(['Running agent loop... (Ctrl+C to stop)']);
  });
});

describe('model providers', () => {
  it('creates the echo provider regardless of case', () => {
    const provider = createModelProvider({ provider: 'Echo' });
    expect(provider).toBeInstanceOf(EchoProvider);
    expect(provider.getName()).toBe('Echo');
    expect(provider.getModel()).toBe('default');
  });

  it('reports the configured model', () => {
    expect(createModelProvider({ provider: 'echo', model: 'tiny' }).getModel()).toBe('tiny');
  });

  it('lists the known provider types', () => {
    expect(getProviderTypes()).toEqual(['echo']);
  });

  it('rejects unknown providers', () => {
    expect(() => createModelProvider({ provider: 'remote' })).toThrow(
      'Unknown model provider "remote". Available: echo'
    );
  });
});
