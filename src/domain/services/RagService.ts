import { collectionNameForCourse } from '../entities/CourseDocument';
import { AppError, InvalidInputError } from '../errors';
import type { ScoredPoint, VectorStore } from '../repositories/VectorStore';
import type { CompletionProvider } from './CompletionProvider';
import type { EmbeddingProvider } from './EmbeddingProvider';
import type { IndexingService } from './IndexingService';
import { errorMessage, log } from '../../utils/logger';
import { TimeoutError, withTimeout } from '../../utils/timeout';

export type AnswerMode = 'grounded' | 'general';

export interface AnswerResult {
  answer: string;
  mode: AnswerMode;
  sources: string[];
}

export interface RagServiceConfig {
  topK: number;
  searchTimeoutMs: number;
}

const CONTEXT_SEPARATOR = '\n\n---\n\n';

export function formatContext(hits: ScoredPoint[]): string {
  return hits.map((hit) => `[Source: ${hit.payload.source}]\n${hit.payload.text}`).join(CONTEXT_SEPARATOR);
}

export function buildGroundedPrompt(question: string, context: string): string {
  return `You are a helpful Moodle course assistant.
Answer the student's question using ONLY the course context below.
If the context does not contain the information needed, say so plainly instead of guessing or inventing facts.
Keep the answer clear and concise.

CONTEXT:
${context}

QUESTION:
${question}

ANSWER:`;
}

export function buildGeneralPrompt(question: string): string {
  return `You are a helpful and patient tutor for a Moodle course.
No course material is available for this question, so answer from general knowledge.
Explain clearly and simply, and keep the answer concise.

QUESTION:
${question}

ANSWER:`;
}

/**
 * Answers questions about a course.
 *
 * Indexed courses get answers grounded in the top retrieved chunks. Anything
 * that prevents retrieval (no collection, empty collection, storage,
 * embedding or search failure, zero hits) degrades to a general-knowledge
 * answer. Completion failures are never masked.
 */
export class RagService {
  constructor(
    private vectorStore: VectorStore,
    private embeddingProvider: EmbeddingProvider,
    private completionProvider: CompletionProvider,
    private indexingService: IndexingService,
    private config: RagServiceConfig
  ) {}

  async answer(courseId: number, question: string): Promise<AnswerResult> {
    const trimmedQuestion = question.trim();
    if (!trimmedQuestion) {
      throw new InvalidInputError('question must not be empty');
    }

    const status = await this.indexingService.getCourseStatus(courseId);

    if (status.indexed) {
      const hits = await this.retrieve(courseId, trimmedQuestion);

      if (hits.length > 0) {
        const prompt = buildGroundedPrompt(trimmedQuestion, formatContext(hits));
        const answer = await this.completionProvider.complete(prompt);

        log('info', 'Answered from course material', { courseId, hits: hits.length });
        return {
          answer,
          mode: 'grounded',
          sources: [...new Set(hits.map((hit) => hit.payload.source))],
        };
      }
    }

    log('info', 'Answering from general knowledge', { courseId, indexed: status.indexed });
    const answer = await this.completionProvider.complete(buildGeneralPrompt(trimmedQuestion));
    return { answer, mode: 'general', sources: [] };
  }

  // Returns [] when retrieval is unavailable; callers fall back to general mode
  private async retrieve(courseId: number, question: string): Promise<ScoredPoint[]> {
    const collection = collectionNameForCourse(courseId);

    try {
      const queryVector = await this.embeddingProvider.embed(question);
      const hits = await withTimeout(
        this.vectorStore.search(collection, queryVector, this.config.topK),
        this.config.searchTimeoutMs,
        'Vector search'
      );

      if (hits.length === 0) {
        log('warn', 'Search returned no hits', { courseId, collection });
      }
      return hits;
    } catch (error) {
      if (!(error instanceof AppError) && !(error instanceof TimeoutError)) {
        throw error;
      }
      log('warn', 'Retrieval failed, falling back to general knowledge', {
        courseId,
        collection,
        error: errorMessage(error),
      });
      return [];
    }
  }
}
