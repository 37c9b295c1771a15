// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Agent definition parsing.
 *
 * Turns the parsed JSON of agents/<name>.json into an AgentDefinition,
 * filling defaults and collecting every problem before failing.
 */

import { AgentDefinitionError } from '../errors.js';
import type {
  AgentDefinition,
  ConnectionDefinition,
  LoopDefinition,
  LoopTask,
  ModelConfig,
} from './types.js';

export const DEFAULT_LOOP_INTERVAL_MS = 1000;
export const DEFAULT_MODEL_PROVIDER = 'echo';
/** Longest delay setTimeout honours; larger values fire after 1 ms. */
export const MAX_LOOP_INTERVAL_MS = 2_147_483_647;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function parseModel(raw: unknown, problems: string[]): ModelConfig {
  if (raw === undefined) return { provider: DEFAULT_MODEL_PROVIDER };
  if (!isRecord(raw) || typeof raw.provider !== 'string') {
    problems.push('model.provider must be a string');
    return { provider: DEFAULT_MODEL_PROVIDER };
  }
  if (raw.model !== undefined && typeof raw.model !== 'string') {
    problems.push('model.model must be a string');
  }
  return {
    provider: raw.provider,
    model: typeof raw.model === 'string' ? raw.model : undefined,
  };
}

function parseConnections(raw: unknown, problems: string[]): ConnectionDefinition[] {
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) {
    problems.push('connections must be an array');
    return [];
  }

  const connections: ConnectionDefinition[] = [];
  const names = new Set<string>();

  raw.forEach((entry: unknown, index) => {
    if (!isRecord(entry) || typeof entry.name !== 'string' || entry.name.trim() === '') {
      problems.push(`connections[${index}].name must be a non-empty string`);
      return;
    }
    if (names.has(entry.name)) {
      problems.push(`connection "${entry.name}" is defined twice`);
      return;
    }
    const actions = entry.actions ?? [];
    if (!isStringArray(actions)) {
      problems.push(`connections[${index}].actions must be an array of strings`);
      return;
    }
    names.add(entry.name);
    connections.push({
      name: entry.name,
      actions,
      configured: entry.configured === true,
    });
  });

  return connections;
}

function parseTask(entry: unknown, index: number, problems: string[]): LoopTask | null {
  if (!isRecord(entry) || typeof entry.connection !== 'string' || typeof entry.action !== 'string') {
    problems.push(`loop.tasks[${index}] needs string "connection" and "action"`);
    return null;
  }
  const params = entry.params ?? [];
  if (!isStringArray(params)) {
    problems.push(`loop.tasks[${index}].params must be an array of strings`);
    return null;
  }
  return { connection: entry.connection, action: entry.action, params };
}

function parseLoop(raw: unknown, problems: string[]): LoopDefinition {
  const loop: LoopDefinition = { intervalMs: DEFAULT_LOOP_INTERVAL_MS, tasks: [] };
  if (raw === undefined) return loop;
  if (!isRecord(raw)) {
    problems.push('loop must be an object');
    return loop;
  }

  if (raw.intervalMs !== undefined) {
    if (typeof raw.intervalMs === 'number' && Number.isFinite(raw.intervalMs) && raw.intervalMs >= 0) {
      if (raw.intervalMs > MAX_LOOP_INTERVAL_MS) {
        problems.push(`loop.intervalMs must be at most ${MAX_LOOP_INTERVAL_MS}`);
      } else {
        loop.intervalMs = raw.intervalMs;
      }
    } else {
      problems.push('loop.intervalMs must be a non-negative number');
    }
  }

  if (raw.maxIterations !== undefined) {
    if (typeof raw.maxIterations === 'number' && Number.isInteger(raw.maxIterations) && raw.maxIterations > 0) {
      loop.maxIterations = raw.maxIterations;
    } else {
      problems.push('loop.maxIterations must be a positive integer');
    }
  }

  if (raw.tasks !== undefined) {
    if (!Array.isArray(raw.tasks)) {
      problems.push('loop.tasks must be an array');
    } else {
      raw.tasks.forEach((entry: unknown, index) => {
        const task = parseTask(entry, index, problems);
        if (task) loop.tasks.push(task);
      });
    }
  }

  return loop;
}

/**
 * Parse and validate an agent definition.
 * @param fileName - Name the definition was loaded under, used when it has no "name"
 */
export function parseAgentDefinition(fileName: string, raw: unknown): AgentDefinition {
  if (!isRecord(raw)) {
    throw new AgentDefinitionError(fileName, ['definition must be a JSON object']);
  }

  const problems: string[] = [];

  let name = fileName;
  if (raw.name !== undefined) {
    if (typeof raw.name === 'string' && raw.name.trim() !== '') {
      name = raw.name;
    } else {
      problems.push('name must be a non-empty string');
    }
  }

  let bio: string[] = [];
  if (raw.bio !== undefined) {
    if (isStringArray(raw.bio)) {
      bio = raw.bio;
    } else {
      problems.push('bio must be an array of strings');
    }
  }

  const model = parseModel(raw.model, problems);
  const connections = parseConnections(raw.connections, problems);
  const loop = parseLoop(raw.loop, problems);

  for (const task of loop.tasks) {
    const connection = connections.find((c) => c.name === task.connection);
    if (!connection) {
      problems.push(`loop task uses unknown connection "${task.connection}"`);
    } else if (!connection.actions.includes(task.action)) {
      problems.push(`loop task uses unknown action "${task.action}" on "${task.connection}"`);
    }
  }

  if (problems.length > 0) {
    throw new AgentDefinitionError(fileName, problems);
  }

  return { name, bio, model, connections, loop };
}
