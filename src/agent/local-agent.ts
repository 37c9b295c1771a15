// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Local Agent
 *
 * An agent built from an on-disk definition. Connections and their actions
 * come from the definition; chat goes through a model provider that is set
 * up the first time it is needed.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { ActionNotFoundError, ConnectionNotFoundError, ModelProviderError } from '../errors.js';
import { logger } from '../logger.js';
import { createModelProvider, type ModelProvider } from './model-provider.js';
import type {
  Agent,
  AgentDefinition,
  ConnectionDefinition,
  ConnectionInfo,
  ConnectionManager,
} from './types.js';

/**
 * Tracks the connections declared by an agent definition.
 * Configuration state lives in memory for the lifetime of the agent.
 */
export class LocalConnectionManager implements ConnectionManager {
  private readonly connections: Map<string, ConnectionInfo>;

  constructor(definitions: ConnectionDefinition[]) {
    this.connections = new Map(
      definitions.map((d) => [d.name, { name: d.name, actions: [...d.actions], configured: d.configured }])
    );
  }

  listConnections(): ConnectionInfo[] {
    return Array.from(this.connections.values(), (c) => ({ ...c, actions: [...c.actions] }));
  }

  listActions(connection: string): string[] {
    return [...this.get(connection).actions];
  }

  async configure(connection: string): Promise<ConnectionInfo> {
    const info = this.get(connection);
    info.configured = true;
    logger.debug(`Connection ${connection} configured`);
    return { ...info, actions: [...info.actions] };
  }

  /**
   * Look up a connection, throwing when it is not declared.
   */
  get(connection: string): ConnectionInfo {
    const info = this.connections.get(connection);
    if (!info) {
      throw new ConnectionNotFoundError(connection, Array.from(this.connections.keys()));
    }
    return info;
  }
}

/**
 * Wait for `ms`, returning false instead when the signal aborts first.
 */
async function pause(ms: number, signal: AbortSignal): Promise<boolean> {
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal.aborted) return false;
    throw error;
  }
}

export class LocalAgent implements Agent {
  readonly connectionManager: LocalConnectionManager;
  private provider: ModelProvider | null = null;

  constructor(private readonly definition: AgentDefinition) {
    this.connectionManager = new LocalConnectionManager(definition.connections);
  }

  get name(): string {
    return this.definition.name;
  }

  get isModelReady(): boolean {
    return this.provider !== null;
  }

  async performAction(connection: string, action: string, params: string[]): Promise<string> {
    const info = this.connectionManager.get(connection);
    if (!info.actions.includes(action)) {
      throw new ActionNotFoundError(connection, action);
    }
    logger.verbose(`${this.name}: ${connection}.${action}(${params.join(', ')})`);
    return `Performed action '${action}' on connection '${connection}' with params ${JSON.stringify(params)}`;
  }

  async runLoop(signal: AbortSignal): Promise<void> {
    const { tasks, intervalMs, maxIterations } = this.definition.loop;
    logger.info('Running agent loop... (Ctrl+C to stop)');

    let iteration = 0;
    while (!signal.aborted) {
      if (tasks.length > 0) {
        const task = tasks[iteration % tasks.length];
        const result = await this.performAction(task.connection, task.action, task.params);
        logger.info(`[${iteration + 1}] ${result}`);
      }
      iteration++;

      if (maxIterations !== undefined && iteration >= maxIterations) {
        logger.info(`Agent loop finished after ${iteration} iteration${iteration === 1 ? '' : 's'}.`);
        return;
      }
      if (!(await pause(intervalMs, signal))) return;
    }
  }

  async initializeModelProvider(): Promise<void> {
    if (this.provider) return;
    const provider = createModelProvider(this.definition.model);
    logger.verbose(`${this.name}: using ${provider.getName()} (${provider.getModel()})`);
    this.provider = provider;
  }

  async promptModel(text: string): Promise<string> {
    if (!this.provider) {
      throw new ModelProviderError(`Model provider for ${this.name} is not initialized`);
    }
    return this.provider.complete(text);
  }
}
