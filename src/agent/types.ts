// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Agent capability types.
 *
 * The shell only talks to agents through these interfaces.
 */

export interface ConnectionInfo {
  name: string;
  actions: string[];
  configured: boolean;
}

export interface ConnectionManager {
  listConnections(): ConnectionInfo[];
  /** Throws ConnectionNotFoundError for an unknown connection. */
  listActions(connection: string): string[];
  /** Throws ConnectionNotFoundError for an unknown connection. */
  configure(connection: string): Promise<ConnectionInfo>;
}

export interface Agent {
  readonly name: string;
  readonly connectionManager: ConnectionManager;
  /** True once the model provider has been initialized. Never reset. */
  readonly isModelReady: boolean;

  performAction(connection: string, action: string, params: string[]): Promise<string>;
  /** Runs until the signal aborts or the loop's configured iterations finish. */
  runLoop(signal: AbortSignal): Promise<void>;
  initializeModelProvider(): Promise<void>;
  promptModel(text: string): Promise<string>;
}

/**
 * On-disk agent definition (agents/<name>.json).
 */
export interface AgentDefinition {
  name: string;
  bio: string[];
  model: ModelConfig;
  connections: ConnectionDefinition[];
  loop: LoopDefinition;
}

export interface ModelConfig {
  provider: string;
  model?: string;
}

export interface ConnectionDefinition {
  name: string;
  actions: string[];
  configured: boolean;
}

export interface LoopTask {
  connection: string;
  action: string;
  params: string[];
}

export interface LoopDefinition {
  intervalMs: number;
  maxIterations?: number;
  tasks: LoopTask[];
}
