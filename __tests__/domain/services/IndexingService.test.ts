import { describe, it, expect, beforeEach } from 'vitest';
import { IndexingService } from '../../../src/domain/services/IndexingService';
import { InMemoryVectorStore } from '../../../src/infrastructure/vectorstore/InMemoryVectorStore';
import { EmbeddingError, NoContentError } from '../../../src/domain/errors';
import { FakeEmbeddingProvider, UnreachableVectorStore, makeDocument } from '../../helpers/fakes';

const SPLITTER = { chunkSize: 1000, chunkOverlap: 200 };

describe('IndexingService', () => {
  let store: InMemoryVectorStore;
  let embeddings: FakeEmbeddingProvider;
  let service: IndexingService;

  beforeEach(() => {
    store = new InMemoryVectorStore();
    embeddings = new FakeEmbeddingProvider();
    service = new IndexingService(store, embeddings, SPLITTER);
  });

  async function storedPoints(collection: string) {
    const hits = await store.search(collection, [1, 1, 1, 1], 100);
    return hits.sort((a, b) => a.id - b.id);
  }

  describe('indexCourse', () => {
    it('chunks, embeds and stores every document', async () => {
      const result = await service.indexCourse(1, 'Biology', [makeDocument({ content: 'A'.repeat(2500) })]);

      expect(result).toEqual({
        chunks_indexed: 4,
        documents_processed: 1,
        total_content_chars: 2500,
        collection: 'course_1_chunks',
      });
      expect(embeddings.calls).toHaveLength(4);

      const points = await storedPoints('course_1_chunks');
      expect(points.map((point) => point.id)).toEqual([0, 1, 2, 3]);
      expect(points.map((point) => point.payload.chunk_index)).toEqual([0, 1, 2, 3]);
      expect(points[0].payload).toMatchObject({
        course_id: 1,
        course_name: 'Biology',
        source: 'Page: Week 1',
        type: 'page',
        doc_index: 0,
      });
    });

    it('leaves the same point count when run twice', async () => {
      const documents = [makeDocument({ content: 'A'.repeat(2500) }), makeDocument({ source: 'Page: Week 2' })];

      await service.indexCourse(2, 'Biology', documents);
      const first = await store.stats('course_2_chunks');
      await service.indexCourse(2, 'Biology', documents);
      const second = await store.stats('course_2_chunks');

      expect(first.pointCount).toBe(5);
      expect(second.pointCount).toBe(5);
    });

    it('skips short documents but keeps their original position in doc_index', async () => {
      const result = await service.indexCourse(3, 'Chemistry', [
        makeDocument({ content: 'too short' }),
        makeDocument({ source: 'Label in Week 1', type: 'label' }),
      ]);

      expect(result.documents_processed).toBe(1);
      expect(result.total_content_chars).toBe(86);

      const [point] = await storedPoints('course_3_chunks');
      expect(point.id).toBe(0);
      expect(point.payload.doc_index).toBe(1);
      expect(point.payload.type).toBe('label');
    });

    it('throws NoContentError when nothing is long enough to index', async () => {
      await expect(service.indexCourse(7, 'Algebra', [makeDocument({ content: 'x'.repeat(10) })])).rejects.toThrow(
        NoContentError
      );
    });

    it('replaces the previous index', async () => {
      await service.indexCourse(4, 'Physics', [makeDocument({ content: 'B'.repeat(2500) })]);
      await service.indexCourse(4, 'Physics', [makeDocument()]);

      const points = await storedPoints('course_4_chunks');
      expect(points).toHaveLength(1);
      expect(points[0].payload.text).toBe(makeDocument().content);
    });

    it('propagates embedding failures', async () => {
      embeddings.failWith = new EmbeddingError('model unavailable');

      await expect(service.indexCourse(5, 'History', [makeDocument()])).rejects.toThrow('model unavailable');
    });
  });

  describe('ingestDocument', () => {
    it('appends after the existing points without replacing them', async () => {
      await service.indexCourse(10, 'Art', [makeDocument()]);

      const result = await service.ingestDocument(10, 'Art', makeDocument({ type: 'file_upload', source: 'Upload: notes.txt' }));

      expect(result).toEqual({ chunks_indexed: 1, collection: 'course_10_chunks' });
      const points = await storedPoints('course_10_chunks');
      expect(points.map((point) => [point.id, point.payload.source])).toEqual([
        [0, 'Page: Week 1'],
        [1, 'Upload: notes.txt'],
      ]);
    });

    it('creates the collection for a course that was never indexed', async () => {
      const result = await service.ingestDocument(11, 'Music', makeDocument());

      expect(result.chunks_indexed).toBe(1);
      expect(await service.getCourseStatus(11)).toMatchObject({ indexed: true, chunks: 1 });
    });

    it('throws NoContentError for a document with no usable text', async () => {
      await expect(service.ingestDocument(12, 'Music', makeDocument({ content: 'hi' }))).rejects.toThrow(NoContentError);
    });

    it('gives concurrent uploads to one course distinct ids', async () => {
      await Promise.all([
        service.ingestDocument(13, 'Drama', makeDocument({ type: 'file_upload', source: 'Upload: a.txt' })),
        service.ingestDocument(13, 'Drama', makeDocument({ type: 'file_upload', source: 'Upload: b.txt' })),
      ]);

      const points = await storedPoints('course_13_chunks');
      expect(await store.stats('course_13_chunks')).toEqual({ pointCount: 2 });
      expect(points.map((point) => [point.id, point.payload.source])).toEqual([
        [0, 'Upload: a.txt'],
        [1, 'Upload: b.txt'],
      ]);
    });

    it('keeps accepting writes after a failed one', async () => {
      const [failed, succeeded] = await Promise.allSettled([
        service.ingestDocument(14, 'Drama', makeDocument({ content: 'hi' })),
        service.ingestDocument(14, 'Drama', makeDocument()),
      ]);

      expect(failed.status).toBe('rejected');
      expect(succeeded).toEqual({ status: 'fulfilled', value: { chunks_indexed: 1, collection: 'course_14_chunks' } });
    });
  });

  describe('getCourseStatus', () => {
    it('reports a fresh course as not indexed', async () => {
      expect(await service.getCourseStatus(20)).toEqual({
        course_id: 20,
        collection: 'course_20_chunks',
        indexed: false,
        chunks: 0,
      });
    });

    it('reports chunks after indexing', async () => {
      await service.indexCourse(21, 'Geography', [makeDocument({ content: 'A'.repeat(2500) })]);

      expect(await service.getCourseStatus(21)).toEqual({
        course_id: 21,
        collection: 'course_21_chunks',
        indexed: true,
        chunks: 4,
      });
    });

    it('reports not indexed when the store is unreachable', async () => {
      const offline = new IndexingService(new UnreachableVectorStore(), embeddings, SPLITTER);

      expect(await offline.getCourseStatus(22)).toMatchObject({ indexed: false, chunks: 0 });
    });
  });

  describe('deleteCourseIndex', () => {
    it('drops the collection and reports whether it existed', async () => {
      await service.indexCourse(30, 'Latin', [makeDocument()]);

      expect(await service.deleteCourseIndex(30)).toEqual({ collection: 'course_30_chunks', deleted: true });
      expect(await service.deleteCourseIndex(30)).toEqual({ collection: 'course_30_chunks', deleted: false });
      expect((await service.getCourseStatus(30)).indexed).toBe(false);
    });
  });
});
