/**
 * OpenAI model backend adapter.
 * Wraps the openai SDK's chat completions endpoint.
 * Also usable for OpenAI-compatible APIs (Ollama, etc.) via baseUrl.
 */
import OpenAI from 'openai';

import { ProviderError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import type { GenerationSettings, ModelBackend } from './types.js';

const logger = createLogger({ name: 'openai-backend' });

/** Configuration for the OpenAI backend. */
export interface OpenAIBackendOptions extends GenerationSettings {
  /** API key. Resolved from env at construction time. */
  apiKey: string;
  /** Model identifier (e.g. 'gpt-4o-mini'). */
  model: string;
  /** Custom base URL (for Ollama, proxies, etc.). */
  baseUrl?: string;
  /** Provider label for logging and the backend id. Defaults to 'openai'. */
  providerLabel?: string;
}

/**
 * Create a ModelBackend backed by the OpenAI chat completions API.
 */
export function createOpenAIModelBackend(options: OpenAIBackendOptions): ModelBackend {
  const label = options.providerLabel ?? 'openai';
  const client = new OpenAI({
    apiKey: options.apiKey,
    ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
  });

  return {
    id: `${label}:${options.model}`,

    async generate(prompt, generateOptions): Promise<string> {
      try {
        const completion = await client.chat.completions.create(
          {
            model: options.model,
            messages: [{ role: 'user', content: prompt }],
            ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
            ...(options.maxOutputTokens !== undefined ? { max_tokens: options.maxOutputTokens } : {}),
          },
          { signal: generateOptions?.signal },
        );

        const text = completion.choices[0]?.message.content ?? '';
        logger.debug('Generated completion', {
          component: label,
          model: options.model,
          outputTokens: completion.usage?.completion_tokens,
        });
        return text;
      } catch (error) {
        if (error instanceof OpenAI.APIError) {
          logger.error('OpenAI API error', {
            component: label,
            status: error.status,
            errorMessage: error.message,
          });
          throw new ProviderError(label, `${String(error.status)}: ${error.message}`, error);
        }
        throw new ProviderError(
          label,
          error instanceof Error ? error.message : String(error),
          error instanceof Error ? error : undefined,
        );
      }
    },
  };
}
