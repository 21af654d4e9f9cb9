import type { CourseDocument } from '../../src/domain/entities/CourseDocument';
import type { CompletionOptions, CompletionProvider } from '../../src/domain/services/CompletionProvider';
import type { EmbeddingProvider } from '../../src/domain/services/EmbeddingProvider';
import type { VectorStore } from '../../src/domain/repositories/VectorStore';
import { StorageError } from '../../src/domain/errors';

export const FAKE_DIMENSION = 4;

/**
 * Deterministic embeddings: the vector counts vowels, consonants, digits and
 * whitespace, so texts with similar letter mix land close together.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly dimension = FAKE_DIMENSION;
  readonly calls: string[] = [];
  failWith: Error | null = null;

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failWith) {
      throw this.failWith;
    }

    const vector = [0, 0, 0, 1];
    for (const char of text.toLowerCase()) {
      if ('aeiou'.includes(char)) vector[0]++;
      else if (char >= 'a' && char <= 'z') vector[1]++;
      else if (char >= '0' && char <= '9') vector[2]++;
      else if (char.trim() === '') vector[3]++;
    }
    return vector;
  }
}

export interface CompletionCall {
  prompt: string;
  options?: CompletionOptions;
}

export class FakeCompletionProvider implements CompletionProvider {
  readonly calls: CompletionCall[] = [];
  failWith: Error | null = null;

  constructor(private reply: string | ((prompt: string) => string) = 'fake answer') {}

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    this.calls.push({ prompt, options });
    if (this.failWith) {
      throw this.failWith;
    }
    return typeof this.reply === 'string' ? this.reply : this.reply(prompt);
  }
}

// Every call fails the way an unreachable backend does
export class UnreachableVectorStore implements VectorStore {
  readonly name = 'unreachable';

  private fail(): never {
    throw new StorageError('connect ECONNREFUSED 127.0.0.1:6333', { retryable: true });
  }

  async collectionExists(): Promise<boolean> {
    return this.fail();
  }
  async createCollection(): Promise<void> {
    this.fail();
  }
  async deleteCollection(): Promise<void> {
    this.fail();
  }
  async upsert(): Promise<void> {
    this.fail();
  }
  async search(): Promise<never> {
    return this.fail();
  }
  async stats(): Promise<never> {
    return this.fail();
  }
}

export function makeDocument(overrides: Partial<CourseDocument> = {}): CourseDocument {
  return {
    type: 'page',
    source: 'Page: Week 1',
    content: 'Photosynthesis converts light energy into chemical energy stored in glucose molecules.',
    ...overrides,
  };
}
