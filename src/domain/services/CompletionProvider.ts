export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
}

export interface CompletionProviderConfig {
  apiKey: string;
  baseUrl?: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

/**
 * Turns a single prompt into generated text.
 * Implementations throw CompletionError on provider failure, timeout or empty output.
 */
export interface CompletionProvider {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}
