import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { modelBackendConfigSchema } from '@/config/schema.js';
import { ProviderError } from '@/core/errors.js';

// Mock the adapters to avoid real SDK initialization
vi.mock('./openai.js', () => ({
  createOpenAIModelBackend: vi.fn(() => ({ id: 'openai:gpt-4o-mini', generate: vi.fn() })),
}));

vi.mock('./anthropic.js', () => ({
  createAnthropicModelBackend: vi.fn(() => ({ id: 'anthropic:claude-test-model', generate: vi.fn() })),
}));

// Import after mocks are set up
const { createModelBackend } = await import('./factory.js');
const { createOpenAIModelBackend } = await import('./openai.js');
const { createAnthropicModelBackend } = await import('./anthropic.js');

describe('createModelBackend', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('returns undefined for the none provider', () => {
    expect(createModelBackend(modelBackendConfigSchema.parse({}))).toBeUndefined();
    expect(createOpenAIModelBackend).not.toHaveBeenCalled();
  });

  it('creates an OpenAI backend with the key from the named env var', () => {
    vi.stubEnv('TEST_OPENAI_KEY', 'test-key');

    createModelBackend(
      modelBackendConfigSchema.parse({
        provider: 'openai',
        model: 'gpt-4o-mini',
        apiKeyEnvVar: 'TEST_OPENAI_KEY',
        temperature: 0.3,
      }),
    );

    expect(createOpenAIModelBackend).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      baseUrl: undefined,
      temperature: 0.3,
      maxOutputTokens: undefined,
      apiKey: 'test-key',
      providerLabel: 'openai',
    });
  });

  it('creates an Anthropic backend', () => {
    vi.stubEnv('TEST_ANTHROPIC_KEY', 'test-key');

    createModelBackend(
      modelBackendConfigSchema.parse({
        provider: 'anthropic',
        model: 'claude-test-model',
        apiKeyEnvVar: 'TEST_ANTHROPIC_KEY',
      }),
    );

    expect(createAnthropicModelBackend).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'claude-test-model', apiKey: 'test-key' }),
    );
  });

  it('creates an Ollama backend on the OpenAI-compatible API without a key', () => {
    createModelBackend(modelBackendConfigSchema.parse({ provider: 'ollama', model: 'llama3.1' }));

    expect(createOpenAIModelBackend).toHaveBeenCalledWith(
      expect.objectContaining({
        apiKey: 'ollama',
        model: 'llama3.1',
        baseUrl: 'http://localhost:11434/v1',
        providerLabel: 'ollama',
      }),
    );
  });

  it('throws ProviderError when no apiKeyEnvVar is configured', () => {
    expect(() =>
      createModelBackend(modelBackendConfigSchema.parse({ provider: 'openai' })),
    ).toThrow(ProviderError);
  });

  it('throws ProviderError when the env var is not set', () => {
    expect(() =>
      createModelBackend(
        modelBackendConfigSchema.parse({ provider: 'openai', apiKeyEnvVar: 'MISSING_KEY_VAR' }),
      ),
    ).toThrow('Environment variable "MISSING_KEY_VAR" is not set or empty');
  });
});
