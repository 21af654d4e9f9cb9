import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import { OpenAIProvider } from '../../../src/infrastructure/ai/OpenAIProvider';
import { OpenAIEmbeddingProvider } from '../../../src/infrastructure/ai/OpenAIEmbeddingProvider';
import { CompletionError, EmbeddingError } from '../../../src/domain/errors';

const CONFIG = {
  apiKey: 'test-secret',
  baseUrl: 'http://localhost:9999/v1',
  model: 'llama-3.1-8b-instant',
  temperature: 0.3,
  maxTokens: 1500,
};

function completion(content: string | null): OpenAI.ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: CONFIG.model,
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
  };
}

function setup() {
  const client = new OpenAI({ apiKey: 'test-secret', baseURL: CONFIG.baseUrl, maxRetries: 0 });
  const create = vi.spyOn(client.chat.completions, 'create');
  return { provider: new OpenAIProvider(CONFIG, client), create };
}

describe('OpenAIProvider', () => {
  it('sends the prompt as a single user message with configured defaults', async () => {
    const { provider, create } = setup();
    create.mockResolvedValue(completion('Mitochondria produce ATP.'));

    const answer = await provider.complete('What do mitochondria do?');

    expect(answer).toBe('Mitochondria produce ATP.');
    expect(create).toHaveBeenCalledWith({
      model: 'llama-3.1-8b-instant',
      messages: [{ role: 'user', content: 'What do mitochondria do?' }],
      temperature: 0.3,
      max_tokens: 1500,
    });
  });

  it('lets per-call options override the defaults', async () => {
    const { provider, create } = setup();
    create.mockResolvedValue(completion('[]'));

    await provider.complete('Make a quiz', { maxTokens: 4000, temperature: 0.1 });

    expect(create).toHaveBeenCalledWith(expect.objectContaining({ max_tokens: 4000, temperature: 0.1 }));
  });

  it('treats an empty completion as a failure', async () => {
    const { provider, create } = setup();
    create.mockResolvedValue(completion(null));

    await expect(provider.complete('Hello')).rejects.toThrow('No response content from completion provider');
  });

  it('marks rate limits as retryable', async () => {
    const { provider, create } = setup();
    create.mockRejectedValue(new OpenAI.APIError(429, undefined, 'Rate limit reached', undefined));

    await expect(provider.complete('Hello')).rejects.toMatchObject({
      name: 'CompletionError',
      retryable: true,
    });
  });

  it('marks client errors as not retryable', async () => {
    const { provider, create } = setup();
    create.mockRejectedValue(new OpenAI.APIError(401, undefined, 'Invalid API key', undefined));

    const error = await provider.complete('Hello').then(
      () => null,
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(CompletionError);
    expect(error).toMatchObject({ retryable: false });
  });

  it('reports timeouts distinctly', async () => {
    const { provider, create } = setup();
    create.mockRejectedValue(new OpenAI.APIConnectionTimeoutError());

    await expect(provider.complete('Hello')).rejects.toMatchObject({
      message: 'Completion provider timed out',
      retryable: true,
    });
  });
});

describe('OpenAIEmbeddingProvider', () => {
  function embeddingSetup(dimension: number) {
    const client = new OpenAI({ apiKey: 'test-secret', baseURL: CONFIG.baseUrl, maxRetries: 0 });
    const create = vi.spyOn(client.embeddings, 'create');
    const provider = new OpenAIEmbeddingProvider(
      { apiKey: 'test-secret', model: 'text-embedding-3-small', dimension },
      client
    );
    return { provider, create };
  }

  function embeddingResponse(embedding: number[]): OpenAI.CreateEmbeddingResponse {
    return {
      object: 'list',
      model: 'text-embedding-3-small',
      data: [{ object: 'embedding', index: 0, embedding }],
      usage: { prompt_tokens: 3, total_tokens: 3 },
    };
  }

  it('returns the embedding vector', async () => {
    const { provider, create } = embeddingSetup(3);
    create.mockResolvedValue(embeddingResponse([0.1, 0.2, 0.3]));

    expect(await provider.embed('cells')).toEqual([0.1, 0.2, 0.3]);
    expect(create).toHaveBeenCalledWith({ model: 'text-embedding-3-small', input: 'cells' });
  });

  it('rejects a vector of the wrong size', async () => {
    const { provider, create } = embeddingSetup(4);
    create.mockResolvedValue(embeddingResponse([0.1, 0.2, 0.3]));

    await expect(provider.embed('cells')).rejects.toThrow(EmbeddingError);
  });

  it('wraps provider failures', async () => {
    const { provider, create } = embeddingSetup(3);
    create.mockRejectedValue(new OpenAI.APIError(500, undefined, 'Internal error', undefined));

    await expect(provider.embed('cells')).rejects.toThrow(EmbeddingError);
  });
});
