// Model backends — narrow text-generation interface plus SDK adapters
export type { GenerateOptions, GenerationSettings, ModelBackend } from './types.js';
export type { OpenAIBackendOptions } from './openai.js';
export { createOpenAIModelBackend } from './openai.js';
export type { AnthropicBackendOptions } from './anthropic.js';
export { createAnthropicModelBackend } from './anthropic.js';
export { createModelBackend } from './factory.js';
