import OpenAI from 'openai';
import type {
  CompletionOptions,
  CompletionProvider,
  CompletionProviderConfig,
} from '../../domain/services/CompletionProvider';
import { CompletionError } from '../../domain/errors';
import { errorMessage, log } from '../../utils/logger';

/**
 * Completion provider for any OpenAI-compatible chat endpoint
 * (OpenAI, Groq, OpenRouter, a local server).
 */
export class OpenAIProvider implements CompletionProvider {
  private client: OpenAI;
  private config: CompletionProviderConfig;

  constructor(config: CompletionProviderConfig, client?: OpenAI) {
    this.config = config;
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        timeout: config.timeoutMs ?? 60000,
        maxRetries: 0,
      });
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const requestParams: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: this.config.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: options.temperature ?? this.config.temperature ?? 0.3,
      max_tokens: options.maxTokens ?? this.config.maxTokens ?? 1500,
    };

    log('debug', 'Sending completion request', {
      model: this.config.model,
      promptLength: prompt.length,
    });

    const startTime = performance.now();
    let response: OpenAI.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(requestParams);
    } catch (error) {
      const timedOut = error instanceof OpenAI.APIConnectionTimeoutError;
      log('error', 'Completion request failed', {
        model: this.config.model,
        timedOut,
        error: errorMessage(error),
      });
      throw new CompletionError(
        timedOut ? 'Completion provider timed out' : `Completion provider failed: ${errorMessage(error)}`,
        { cause: error, retryable: timedOut || isRetryableStatus(error) }
      );
    }

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new CompletionError('No response content from completion provider');
    }

    log('debug', 'Received completion', {
      tokensUsed: response.usage?.total_tokens,
      responseTimeMs: Math.round(performance.now() - startTime),
      length: content.length,
    });

    return content;
  }
}

function isRetryableStatus(error: unknown): boolean {
  if (!(error instanceof OpenAI.APIError)) {
    return false;
  }
  return error.status === 429 || (error.status !== undefined && error.status >= 500);
}
