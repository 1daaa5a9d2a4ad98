/**
 * Model backend factory.
 * Resolves a ModelBackendConfig into a concrete ModelBackend instance.
 * Handles API key resolution from environment variables.
 */
import type { ModelBackendConfig } from '@/config/schema.js';
import { ProviderError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import { createAnthropicModelBackend } from './anthropic.js';
import { createOpenAIModelBackend } from './openai.js';
import type { ModelBackend } from './types.js';

const logger = createLogger({ name: 'model-backend-factory' });

const OLLAMA_DEFAULT_BASE_URL = 'http://localhost:11434/v1';

/**
 * Resolve an API key from an environment variable name.
 * Never logs or returns the actual key value — only whether it was found.
 */
function resolveApiKey(envVar: string | undefined, provider: string): string {
  if (!envVar) {
    throw new ProviderError(provider, 'No apiKeyEnvVar configured');
  }
  const key = process.env[envVar];
  if (!key) {
    throw new ProviderError(
      provider,
      `Environment variable "${envVar}" is not set or empty`,
    );
  }
  return key;
}

/**
 * Create a ModelBackend from a configuration object.
 * Returns undefined for `none`; the coordinator then synthesizes deterministically.
 */
export function createModelBackend(config: ModelBackendConfig): ModelBackend | undefined {
  if (config.provider === 'none') {
    logger.info('No model backend configured; using fallback synthesis', {
      component: 'model-backend-factory',
    });
    return undefined;
  }

  logger.info('Creating model backend', {
    component: 'model-backend-factory',
    provider: config.provider,
    model: config.model,
  });

  const settings = {
    model: config.model,
    baseUrl: config.baseUrl,
    temperature: config.temperature,
    maxOutputTokens: config.maxOutputTokens,
  };

  switch (config.provider) {
    case 'openai':
      return createOpenAIModelBackend({
        ...settings,
        apiKey: resolveApiKey(config.apiKeyEnvVar, 'openai'),
        providerLabel: 'openai',
      });

    case 'anthropic':
      return createAnthropicModelBackend({
        ...settings,
        apiKey: resolveApiKey(config.apiKeyEnvVar, 'anthropic'),
      });

    case 'ollama':
      // Ollama doesn't need an API key, but uses the OpenAI-compatible API
      return createOpenAIModelBackend({
        ...settings,
        apiKey: 'ollama',
        baseUrl: config.baseUrl ?? OLLAMA_DEFAULT_BASE_URL,
        providerLabel: 'ollama',
      });

    default: {
      // Exhaustiveness check — TypeScript narrows to `never`
      const _exhaustive: never = config.provider;
      throw new ProviderError(
        String(_exhaustive),
        `Unknown provider: ${String(_exhaustive)}`,
      );
    }
  }
}
