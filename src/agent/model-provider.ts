// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { ModelProviderError } from '../errors.js';
import type { ModelConfig } from './types.js';

/**
 * Abstract base class for model providers an agent chats through.
 */
export abstract class ModelProvider {
  protected config: ModelConfig;

  constructor(config: ModelConfig) {
    this.config = config;
  }

  /**
   * Send one prompt to the model and return its reply.
   */
  abstract complete(prompt: string): Promise<string>;

  /**
   * Get the provider name for display.
   */
  abstract getName(): string;

  /**
   * Get the model in use.
   */
  getModel(): string {
    return this.config.model ?? 'default';
  }
}

/**
 * Replies with the prompt it was given. Needs no credentials.
 */
export class EchoProvider extends ModelProvider {
  async complete(prompt: string): Promise<string> {
    return `Echo: ${prompt}`;
  }

  getName(): string {
    return 'Echo';
  }
}

/** Provider factory function type */
export type ModelProviderFactory = (config: ModelConfig) => ModelProvider;

const providerFactories: ReadonlyMap<string, ModelProviderFactory> = new Map([
  ['echo', (config: ModelConfig) => new EchoProvider(config)],
]);

/**
 * Get list of known provider types.
 */
export function getProviderTypes(): string[] {
  return Array.from(providerFactories.keys());
}

/**
 * Create a provider for an agent's model config.
 */
export function createModelProvider(config: ModelConfig): ModelProvider {
  const factory = providerFactories.get(config.provider.toLowerCase());
  if (!factory) {
    throw new ModelProviderError(
      `Unknown model provider "${config.provider}". Available: ${getProviderTypes().join(', ')}`
    );
  }
  return factory(config);
}
