// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Commands that load, list and drive agents.
 */

import { printSeparator } from '../cli/banner.js';
import type { LineReader } from '../cli/input.js';
import { toError } from '../errors.js';
import { logger } from '../logger.js';
import { spinner } from '../spinner.js';
import {
  attempt,
  fail,
  ok,
  shouldShowHelp,
  showUsage,
  type Command,
  type CommandContext,
  type CommandResult,
} from './index.js';

export const CHAT_NO_AGENT_MESSAGE = 'Load an agent first.';
export const CHAT_PROMPT = '\nYou: ';

/**
 * Definition printed by create-agent as a starting point.
 */
const EXAMPLE_DEFINITION = {
  name: 'example',
  bio: ['A short description of what this agent does.'],
  model: { provider: 'echo' },
  connections: [{ name: 'example_connection', actions: ['ping'] }],
  loop: {
    intervalMs: 1000,
    tasks: [{ connection: 'example_connection', action: 'ping', params: [] }],
  },
};

/**
 * Wait for a model reply, or resolve null as soon as Ctrl+C is pressed.
 * A reply that arrives after the interrupt is dropped.
 */
async function replyOrInterrupt(pending: Promise<string>, input: LineReader): Promise<string | null> {
  let stopListening = (): void => undefined;
  const interrupted = new Promise<null>((resolve) => {
    stopListening = input.onInterrupt(() => resolve(null));
  });

  try {
    return await Promise.race([pending, interrupted]);
  } finally {
    stopListening();
    void pending.catch((error: unknown) => {
      logger.debug(`Dropped chat reply: ${toError(error).message}`);
    });
  }
}

function usage(text: string): CommandResult {
  logger.info(`Usage: ${text}`);
  return ok();
}

/**
 * Load the agent named in general.json. Failures are warnings: the
 * session carries on without an agent.
 */
export async function loadDefaultAgent(
  context: Pick<CommandContext, 'session' | 'store' | 'loadAgent'>
): Promise<void> {
  const { session, store, loadAgent } = context;
  try {
    const name = store.getDefaultAgent();
    if (!name) {
      logger.warn('No default agent set.');
      return;
    }
    const agent = await loadAgent(name);
    session.load(agent);
    logger.success(`Loaded agent: ${agent.name}`);
  } catch (error) {
    logger.warn(`Failed to load default agent: ${toError(error).message}`);
  }
}

export const agentActionCommand: Command = {
  name: 'agent-action',
  aliases: ['action', 'run'],
  description: 'Perform an action on a connection through the active agent',
  usage: [
    'agent-action <connection> <action> [params...]',
    'agent-action example_connection ping "hello world"',
  ],
  execute: async (args, { session }) => {
    const agent = session.requireAgent();
    if (!agent) return ok();
    if (shouldShowHelp(args)) return showUsage(agentActionCommand);
    if (args.length < 3) return usage('agent-action <connection> <action> [params...]');

    return attempt(async () => {
      const result = await agent.performAction(args[1], args[2], args.slice(3));
      logger.info(`Result: ${result}`);
    });
  },
};

export const agentLoopCommand: Command = {
  name: 'agent-loop',
  aliases: ['loop', 'start'],
  description: "Run the active agent's loop until interrupted (Ctrl+C)",
  usage: ['agent-loop'],
  execute: async (args, { session, input }) => {
    const agent = session.requireAgent();
    if (!agent) return ok();
    if (shouldShowHelp(args)) return showUsage(agentLoopCommand);

    const controller = new AbortController();
    const stopListening = input.onInterrupt(() => controller.abort());
    try {
      await agent.runLoop(controller.signal);
    } catch (error) {
      // An agent may reject with its own abort error once stopped
      if (!controller.signal.aborted) return fail(error);
    } finally {
      stopListening();
    }

    if (controller.signal.aborted) {
      logger.info('Stopped.');
    }
    return ok();
  },
};

export const listAgentsCommand: Command = {
  name: 'list-agents',
  aliases: ['agents', 'ls-agents'],
  description: 'List agent definitions in the agents directory',
  usage: ['list-agents'],
  execute: async (args, { store }) => {
    if (shouldShowHelp(args)) return showUsage(listAgentsCommand);
    const agents = store.listAgents();
    if (agents.length === 0) {
      logger.info(`No agents found in ${store.directory}`);
      return ok();
    }
    logger.info('Available agents:');
    for (const name of agents) {
      logger.info(`- ${name}`);
    }
    return ok();
  },
};

export const loadAgentCommand: Command = {
  name: 'load-agent',
  aliases: ['load'],
  description: 'Load an agent by name, replacing the active one',
  usage: ['load-agent <agent_name>', 'load-agent example'],
  execute: async (args, { session, loadAgent }) => {
    if (shouldShowHelp(args)) return showUsage(loadAgentCommand);
    if (args.length < 2) return usage('load-agent <agent_name>');

    try {
      const agent = await loadAgent(args[1]);
      session.load(agent);
      logger.success(`Loaded agent: ${agent.name}`);
      return ok();
    } catch (error) {
      return fail(new Error(`Could not load agent: ${toError(error).message}`));
    }
  },
};

export const createAgentCommand: Command = {
  name: 'create-agent',
  aliases: ['new-agent', 'create'],
  description: 'Show how to create a new agent definition',
  usage: ['create-agent'],
  execute: async (args, { store }) => {
    if (shouldShowHelp(args)) return showUsage(createAgentCommand);
    logger.info(`Manual creation: add a <name>.json file to ${store.directory}`);
    logger.info('Example:');
    logger.info(JSON.stringify(EXAMPLE_DEFINITION, null, 2));
    return ok();
  },
};

export const setDefaultAgentCommand: Command = {
  name: 'set-default-agent',
  aliases: ['default'],
  description: 'Set the agent loaded on startup',
  usage: ['set-default-agent <agent_name>', 'default example'],
  execute: async (args, { store }) => {
    if (shouldShowHelp(args)) return showUsage(setDefaultAgentCommand);
    if (args.length < 2) return usage('set-default-agent <agent_name>');

    const name = args[1];
    try {
      if (!store.hasAgent(name)) {
        logger.warn(`No definition for "${name}" in ${store.directory} yet`);
      }
      store.setDefaultAgent(name);
      logger.info(`Default agent set to ${name}`);
      return ok();
    } catch (error) {
      return fail(new Error(`Could not update default agent: ${toError(error).message}`));
    }
  },
};

export const chatCommand: Command = {
  name: 'chat',
  aliases: ['talk'],
  description: "Chat with the active agent (type 'exit' to leave)",
  usage: ['chat'],
  execute: async (args, { session, input }) => {
    const agent = session.requireAgent(CHAT_NO_AGENT_MESSAGE);
    if (!agent) return ok();
    if (shouldShowHelp(args)) return showUsage(chatCommand);

    return attempt(async () => {
      await session.ensureModelReady();

      printSeparator();
      logger.info(`Chatting with ${agent.name}`);
      printSeparator();

      for (;;) {
        const event = await input.read(CHAT_PROMPT);
        if (event.type !== 'line') break;

        const message = event.line.trim();
        if (message.toLowerCase() === 'exit') break;
        if (!message) continue;

        spinner.awaitingReply(agent.name);
        let reply: string | null;
        try {
          reply = await replyOrInterrupt(agent.promptModel(message), input);
        } finally {
          spinner.stop();
        }
        if (reply === null) {
          logger.info('Stopped.');
          break;
        }
        logger.info(`${agent.name}: ${reply}`);
        printSeparator();
      }
    });
  },
};
