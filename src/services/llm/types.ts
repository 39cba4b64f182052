// src/services/llm/types.ts

export interface CompletionOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Opaque text-completion capability. Implementations must reject with a
 * `ModelCallError` on timeout or transport failure; repeated identical
 * prompts are not assumed to return identical text.
 */
export interface CompletionModel {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}
