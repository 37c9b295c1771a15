// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Session Context
 *
 * Holds the active agent for one shell session. Created once and passed to
 * the dispatcher and the REPL; nothing else keeps a reference to the agent.
 */

import { logger } from './logger.js';
import { spinner } from './spinner.js';
import type { Agent } from './agent/index.js';

export const NO_AGENT_MESSAGE = 'No agent loaded.';

export class SessionContext {
  private current: Agent | null = null;

  get agent(): Agent | null {
    return this.current;
  }

  get hasAgent(): boolean {
    return this.current !== null;
  }

  get agentName(): string | null {
    return this.current?.name ?? null;
  }

  /**
   * Make `agent` the active agent, dropping the previous one entirely.
   */
  load(agent: Agent): void {
    if (this.current) {
      logger.debug(`Replacing active agent ${this.current.name} with ${agent.name}`);
    }
    this.current = agent;
  }

  /**
   * Return the active agent, or print `message` and return null.
   * Agent-dependent commands call this before doing anything else.
   */
  requireAgent(message: string = NO_AGENT_MESSAGE): Agent | null {
    if (!this.current) {
      logger.info(message);
      return null;
    }
    return this.current;
  }

  /**
   * Whether the active agent can chat without further setup.
   */
  get isReadyForChat(): boolean {
    return this.current?.isModelReady ?? false;
  }

  /**
   * Initialize the active agent's model provider if it is not ready yet.
   * Readiness sticks for the lifetime of the agent.
   */
  async ensureModelReady(): Promise<void> {
    const agent = this.current;
    if (!agent || agent.isModelReady) return;

    spinner.modelSetup(agent.name);
    try {
      await agent.initializeModelProvider();
    } catch (error) {
      spinner.fail();
      throw error;
    }
    spinner.succeed(`Model provider ready for ${agent.name}`);
  }
}
