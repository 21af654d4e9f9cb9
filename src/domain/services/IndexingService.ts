import {
  MIN_CONTENT_LENGTH,
  collectionNameForCourse,
  type CourseDocument,
  type IndexedPoint,
} from '../entities/CourseDocument';
import { AppError, NoContentError } from '../errors';
import type { VectorStore } from '../repositories/VectorStore';
import { embedAll, type EmbeddingProvider } from './EmbeddingProvider';
import { FixedWindowTextSplitter, type SplitterConfig } from './textSplitter';
import { errorMessage, log } from '../../utils/logger';

export interface IndexResult {
  chunks_indexed: number;
  documents_processed: number;
  total_content_chars: number;
  collection: string;
}

export interface IngestResult {
  chunks_indexed: number;
  collection: string;
}

export interface CourseStatus {
  course_id: number;
  collection: string;
  indexed: boolean;
  chunks: number;
}

export interface DeleteResult {
  collection: string;
  deleted: boolean;
}

interface BuildContext {
  courseId: number;
  courseName: string;
  docIndex: number;
  nextId: number;
}

/**
 * Writes course material into the vector store.
 *
 * `indexCourse` replaces a course's collection wholesale; `ingestDocument`
 * appends to it. The delete/create/upsert sequence is not atomic: a crash in
 * between leaves a partially filled collection, and re-running the index is the
 * recovery. Writes to one collection are queued and run one at a time, so
 * appended ids never collide with a concurrent append or re-index.
 */
export class IndexingService {
  private splitter: FixedWindowTextSplitter;
  private queues = new Map<string, Promise<void>>();

  constructor(
    private vectorStore: VectorStore,
    private embeddingProvider: EmbeddingProvider,
    splitterConfig: SplitterConfig
  ) {
    this.splitter = new FixedWindowTextSplitter(splitterConfig);
  }

  async indexCourse(courseId: number, courseName: string, documents: CourseDocument[]): Promise<IndexResult> {
    const collection = collectionNameForCourse(courseId);
    return this.exclusive(collection, () => this.replaceCollection(collection, courseId, courseName, documents));
  }

  async ingestDocument(courseId: number, courseName: string, document: CourseDocument): Promise<IngestResult> {
    const collection = collectionNameForCourse(courseId);
    return this.exclusive(collection, () => this.appendDocument(collection, courseId, courseName, document));
  }

  private async replaceCollection(
    collection: string,
    courseId: number,
    courseName: string,
    documents: CourseDocument[]
  ): Promise<IndexResult> {
    log('info', 'Indexing course', { courseId, courseName, collection, documents: documents.length });

    await this.vectorStore.deleteCollection(collection);
    await this.vectorStore.createCollection(collection, this.embeddingProvider.dimension, 'cosine');

    const points: IndexedPoint[] = [];
    let documentsProcessed = 0;
    let totalContentChars = 0;
    let nextId = 0;

    for (const [docIndex, document] of documents.entries()) {
      const content = document.content.trim();
      if (content.length < MIN_CONTENT_LENGTH) {
        log('debug', 'Skipping short document', { courseId, source: document.source, length: content.length });
        continue;
      }

      documentsProcessed++;
      totalContentChars += content.length;

      const built = await this.buildPoints(document, { courseId, courseName, docIndex, nextId });
      points.push(...built);
      nextId += built.length;
    }

    if (points.length === 0) {
      throw new NoContentError(
        `No indexable content for course ${courseId}: all ${documents.length} documents were empty or too short`
      );
    }

    await this.vectorStore.upsert(collection, points);

    log('info', 'Course indexed', {
      courseId,
      collection,
      chunksIndexed: points.length,
      documentsProcessed,
      totalContentChars,
    });

    return {
      chunks_indexed: points.length,
      documents_processed: documentsProcessed,
      total_content_chars: totalContentChars,
      collection,
    };
  }

  private async appendDocument(
    collection: string,
    courseId: number,
    courseName: string,
    document: CourseDocument
  ): Promise<IngestResult> {
    await this.vectorStore.createCollection(collection, this.embeddingProvider.dimension, 'cosine');

    // Points are only ever removed with their whole collection, so the count is the next free id
    const { pointCount } = await this.vectorStore.stats(collection);

    const points = await this.buildPoints(document, {
      courseId,
      courseName,
      docIndex: 0,
      nextId: pointCount,
    });

    if (points.length === 0) {
      throw new NoContentError(`Document '${document.source}' produced no indexable chunks`);
    }

    await this.vectorStore.upsert(collection, points);

    log('info', 'Document ingested', { courseId, collection, source: document.source, chunksIndexed: points.length });

    return { chunks_indexed: points.length, collection };
  }

  async getCourseStatus(courseId: number): Promise<CourseStatus> {
    const collection = collectionNameForCourse(courseId);
    const notIndexed: CourseStatus = { course_id: courseId, collection, indexed: false, chunks: 0 };

    try {
      if (!(await this.vectorStore.collectionExists(collection))) {
        return notIndexed;
      }
      const { pointCount } = await this.vectorStore.stats(collection);
      return { course_id: courseId, collection, indexed: pointCount > 0, chunks: pointCount };
    } catch (error) {
      if (!(error instanceof AppError)) {
        throw error;
      }
      log('warn', 'Course status lookup failed, treating course as not indexed', {
        courseId,
        collection,
        error: errorMessage(error),
      });
      return notIndexed;
    }
  }

  async deleteCourseIndex(courseId: number): Promise<DeleteResult> {
    const collection = collectionNameForCourse(courseId);

    return this.exclusive(collection, async () => {
      const existed = await this.vectorStore.collectionExists(collection);
      await this.vectorStore.deleteCollection(collection);

      log('info', 'Course index deleted', { courseId, collection, existed });
      return { collection, deleted: existed };
    });
  }

  // Runs task after every earlier task on the same collection has settled
  private async exclusive<T>(collection: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(collection) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(collection, settled);

    try {
      return await run;
    } finally {
      if (this.queues.get(collection) === settled) {
        this.queues.delete(collection);
      }
    }
  }

  private async buildPoints(document: CourseDocument, context: BuildContext): Promise<IndexedPoint[]> {
    const chunks = this.splitter.split(document.content);
    const vectors = await embedAll(this.embeddingProvider, chunks);

    const points = chunks.map(
      (text, chunkIndex): IndexedPoint => ({
        id: context.nextId + chunkIndex,
        vector: vectors[chunkIndex],
        payload: {
          text,
          course_id: context.courseId,
          course_name: context.courseName,
          source: document.source,
          type: document.type,
          doc_index: context.docIndex,
          chunk_index: chunkIndex,
        },
      })
    );

    log('debug', 'Document chunked', { source: document.source, chunks: chunks.length });
    return points;
  }
}
