// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Agent Module
 *
 * - types.ts: the Agent and ConnectionManager capabilities the shell uses
 * - definition.ts: parsing agents/<name>.json
 * - store.ts: the agents directory and the default-agent record
 * - local-agent.ts: the agent built from a definition
 * - model-provider.ts: model providers used for chat
 */

import { LocalAgent } from './local-agent.js';
import type { AgentStore } from './store.js';
import type { Agent } from './types.js';

export type {
  Agent,
  AgentDefinition,
  ConnectionDefinition,
  ConnectionInfo,
  ConnectionManager,
  LoopDefinition,
  LoopTask,
  ModelConfig,
} from './types.js';
export { parseAgentDefinition, DEFAULT_LOOP_INTERVAL_MS, DEFAULT_MODEL_PROVIDER, MAX_LOOP_INTERVAL_MS } from './definition.js';
export { AgentStore, isValidAgentName, GENERAL_RECORD, DEFAULT_AGENT_KEY } from './store.js';
export { LocalAgent, LocalConnectionManager } from './local-agent.js';
export { ModelProvider, EchoProvider, createModelProvider, getProviderTypes } from './model-provider.js';

/**
 * Builds an agent by name. Swapped out in tests.
 */
export type AgentLoader = (name: string) => Promise<Agent>;

/**
 * Load an agent from its definition in the store.
 */
export async function loadAgent(name: string, store: AgentStore): Promise<Agent> {
  return new LocalAgent(store.readDefinition(name));
}
