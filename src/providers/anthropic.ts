/**
 * Anthropic model backend adapter.
 * Wraps the @anthropic-ai/sdk messages endpoint.
 */
import Anthropic from '@anthropic-ai/sdk';

import { ProviderError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import type { GenerationSettings, ModelBackend } from './types.js';

const logger = createLogger({ name: 'anthropic-backend' });

const DEFAULT_MAX_OUTPUT_TOKENS = 1024;

/** Configuration for the Anthropic backend. */
export interface AnthropicBackendOptions extends GenerationSettings {
  /** API key. Resolved from env at construction time. */
  apiKey: string;
  model: string;
  baseUrl?: string;
}

/**
 * Create a ModelBackend backed by the Anthropic messages API.
 * Text blocks of the reply are concatenated.
 */
export function createAnthropicModelBackend(options: AnthropicBackendOptions): ModelBackend {
  const client = new Anthropic({
    apiKey: options.apiKey,
    ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
  });

  return {
    id: `anthropic:${options.model}`,

    async generate(prompt, generateOptions): Promise<string> {
      try {
        const response = await client.messages.create(
          {
            model: options.model,
            max_tokens: options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
            messages: [{ role: 'user', content: prompt }],
            ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
          },
          { signal: generateOptions?.signal },
        );

        let text = '';
        for (const block of response.content) {
          if (block.type === 'text') text += block.text;
        }

        logger.debug('Generated completion', {
          component: 'anthropic',
          model: options.model,
          outputTokens: response.usage.output_tokens,
        });
        return text;
      } catch (error) {
        if (error instanceof Anthropic.APIError) {
          logger.error('Anthropic API error', {
            component: 'anthropic',
            status: error.status,
            errorMessage: error.message,
          });
          throw new ProviderError('anthropic', `${String(error.status)}: ${error.message}`, error);
        }
        throw new ProviderError(
          'anthropic',
          error instanceof Error ? error.message : String(error),
          error instanceof Error ? error : undefined,
        );
      }
    },
  };
}
