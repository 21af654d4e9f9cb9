import type { IndexedPoint } from '../../domain/entities/CourseDocument';
import { NotFoundError, StorageError } from '../../domain/errors';
import {
  compareScoredPoints,
  type CollectionStats,
  type DistanceMetric,
  type ScoredPoint,
  type VectorStore,
} from '../../domain/repositories/VectorStore';

interface MemoryCollection {
  vectorSize: number;
  distance: DistanceMetric;
  points: Map<number, IndexedPoint>;
}

function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

function score(distance: DistanceMetric, a: number[], b: number[]): number {
  switch (distance) {
    case 'dot':
      return dot(a, b);
    case 'euclid': {
      let sum = 0;
      for (let i = 0; i < a.length; i++) {
        sum += (a[i] - b[i]) ** 2;
      }
      return -Math.sqrt(sum);
    }
    case 'cosine': {
      const norm = Math.sqrt(dot(a, a)) * Math.sqrt(dot(b, b));
      return norm === 0 ? 0 : dot(a, b) / norm;
    }
  }
}

export class InMemoryVectorStore implements VectorStore {
  readonly name = 'memory';
  private collections = new Map<string, MemoryCollection>();

  async collectionExists(collection: string): Promise<boolean> {
    return this.collections.has(collection);
  }

  async createCollection(collection: string, vectorSize: number, distance: DistanceMetric = 'cosine'): Promise<void> {
    if (this.collections.has(collection)) {
      return;
    }
    if (!Number.isInteger(vectorSize) || vectorSize <= 0) {
      throw new StorageError(`Invalid vector size ${vectorSize} for collection '${collection}'`);
    }
    this.collections.set(collection, { vectorSize, distance, points: new Map() });
  }

  async deleteCollection(collection: string): Promise<void> {
    this.collections.delete(collection);
  }

  async upsert(collection: string, points: IndexedPoint[]): Promise<void> {
    const target = this.getCollection(collection);

    // Validate the whole batch before writing any of it
    for (const point of points) {
      if (point.vector.length !== target.vectorSize) {
        throw new StorageError(
          `Vector size mismatch in '${collection}': expected ${target.vectorSize}, got ${point.vector.length} (point ${point.id})`
        );
      }
    }

    for (const point of points) {
      target.points.set(point.id, {
        id: point.id,
        vector: [...point.vector],
        payload: { ...point.payload },
      });
    }
  }

  async search(collection: string, queryVector: number[], limit: number): Promise<ScoredPoint[]> {
    const target = this.getCollection(collection);

    if (queryVector.length !== target.vectorSize) {
      throw new StorageError(
        `Query vector size mismatch in '${collection}': expected ${target.vectorSize}, got ${queryVector.length}`
      );
    }

    return [...target.points.values()]
      .map((point) => ({
        id: point.id,
        score: score(target.distance, queryVector, point.vector),
        payload: { ...point.payload },
      }))
      .sort(compareScoredPoints)
      .slice(0, Math.max(0, limit));
  }

  async stats(collection: string): Promise<CollectionStats> {
    const target = this.collections.get(collection);
    if (!target) {
      throw new NotFoundError(`Collection '${collection}' does not exist`);
    }
    return { pointCount: target.points.size };
  }

  private getCollection(collection: string): MemoryCollection {
    const target = this.collections.get(collection);
    if (!target) {
      throw new StorageError(`Collection '${collection}' does not exist`);
    }
    return target;
  }
}
