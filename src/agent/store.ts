// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Agent Store
 *
 * The agents directory: one <name>.json definition per agent plus a
 * general.json record holding the default agent name.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { AgentDefinitionError, AgentNotFoundError, AgentStoreError } from '../errors.js';
import { logger } from '../logger.js';
import { parseAgentDefinition } from './definition.js';
import type { AgentDefinition } from './types.js';

export const GENERAL_RECORD = 'general';
export const DEFAULT_AGENT_KEY = 'default_agent';

const AGENT_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check an agent name is safe to use as a file name.
 */
export function isValidAgentName(name: string): boolean {
  return AGENT_NAME_PATTERN.test(name) && name !== GENERAL_RECORD && !/^\.+$/.test(name);
}

export class AgentStore {
  constructor(readonly directory: string) {}

  /**
   * Path of an agent's definition file.
   */
  agentFile(name: string): string {
    return join(this.directory, `${name}.json`);
  }

  get generalFile(): string {
    return join(this.directory, `${GENERAL_RECORD}.json`);
  }

  /**
   * Names of all agent definitions, sorted. Empty when the directory is missing.
   */
  listAgents(): string[] {
    if (!existsSync(this.directory)) return [];
    return readdirSync(this.directory)
      .filter((f) => f.endsWith('.json'))
      .map((f) => f.slice(0, -'.json'.length))
      .filter((name) => name !== GENERAL_RECORD)
      .sort();
  }

  hasAgent(name: string): boolean {
    return isValidAgentName(name) && existsSync(this.agentFile(name));
  }

  /**
   * Read and validate an agent definition.
   */
  readDefinition(name: string): AgentDefinition {
    this.assertName(name);

    const file = this.agentFile(name);
    if (!existsSync(file)) {
      throw new AgentNotFoundError(name, this.directory);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error) {
      throw new AgentDefinitionError(name, [
        `invalid JSON (${error instanceof Error ? error.message : String(error)})`,
      ]);
    }
    return parseAgentDefinition(name, raw);
  }

  /**
   * Default agent name from general.json, or null when none is set.
   */
  getDefaultAgent(): string | null {
    if (!existsSync(this.generalFile)) {
      throw new AgentStoreError(`No ${GENERAL_RECORD}.json in ${this.directory}`);
    }
    const value = this.readGeneral()[DEFAULT_AGENT_KEY];
    return typeof value === 'string' && value.trim() !== '' ? value : null;
  }

  /**
   * Persist the default agent name. Other keys in general.json are kept.
   */
  setDefaultAgent(name: string): void {
    this.assertName(name);

    const record = existsSync(this.generalFile) ? this.readGeneral() : {};
    record[DEFAULT_AGENT_KEY] = name;

    try {
      mkdirSync(this.directory, { recursive: true });
      writeFileSync(this.generalFile, JSON.stringify(record, null, 2) + '\n');
    } catch (error) {
      throw new AgentStoreError(
        `Could not write ${this.generalFile}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    logger.debug(`Wrote ${DEFAULT_AGENT_KEY}=${name} to ${this.generalFile}`);
  }

  private readGeneral(): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.generalFile, 'utf-8'));
    } catch (error) {
      throw new AgentStoreError(
        `Could not read ${this.generalFile}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (!isRecord(parsed)) {
      throw new AgentStoreError(`${this.generalFile} must contain a JSON object`);
    }
    return parsed;
  }

  private assertName(name: string): void {
    if (!isValidAgentName(name)) {
      throw new AgentStoreError(`Invalid agent name "${name}"`);
    }
  }
}
