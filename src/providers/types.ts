/**
 * Model backend contract. The core only ever asks for text generated from a
 * prompt; everything provider-specific stays behind this interface.
 */

export interface GenerateOptions {
  /** Aborts the in-flight request. */
  signal?: AbortSignal;
}

export interface ModelBackend {
  /** `{provider}:{model}`, e.g. `openai:gpt-4o-mini`. */
  readonly id: string;

  /** Generate a completion for `prompt`. Rejects with ProviderError on failure. */
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

/** Sampling settings shared by every adapter. */
export interface GenerationSettings {
  temperature?: number;
  maxOutputTokens?: number;
}
