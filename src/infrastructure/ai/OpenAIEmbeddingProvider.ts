import OpenAI from 'openai';
import type { EmbeddingProvider } from '../../domain/services/EmbeddingProvider';
import { EmbeddingError } from '../../domain/errors';
import { errorMessage, log } from '../../utils/logger';

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  baseUrl?: string;
  model: string;
  dimension: number;
  timeoutMs?: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly dimension: number;
  private client: OpenAI;
  private model: string;

  constructor(config: OpenAIEmbeddingConfig, client?: OpenAI) {
    this.dimension = config.dimension;
    this.model = config.model;
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        timeout: config.timeoutMs ?? 30000,
        maxRetries: 0,
      });
  }

  async embed(text: string): Promise<number[]> {
    let embedding: number[] | undefined;
    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: text,
      });
      embedding = response.data[0]?.embedding;
    } catch (error) {
      log('error', 'Embedding request failed', { model: this.model, error: errorMessage(error) });
      throw new EmbeddingError(`Embedding provider failed: ${errorMessage(error)}`, {
        cause: error,
        retryable: error instanceof OpenAI.APIConnectionTimeoutError,
      });
    }

    if (!embedding) {
      throw new EmbeddingError('Embedding provider returned no vector');
    }
    if (embedding.length !== this.dimension) {
      throw new EmbeddingError(
        `Embedding dimension mismatch: expected ${this.dimension}, got ${embedding.length}`
      );
    }

    return embedding;
  }
}
