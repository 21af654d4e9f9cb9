import type { ChunkPayload, IndexedPoint } from '../entities/CourseDocument';

export type DistanceMetric = 'cosine' | 'dot' | 'euclid';

export interface ScoredPoint {
  id: number;
  score: number;  // Higher is more similar
  payload: ChunkPayload;
}

export interface CollectionStats {
  pointCount: number;
}

/**
 * Collection-per-course vector index.
 *
 * Backend failures surface as StorageError; `stats` on a missing collection
 * throws NotFoundError. Implementations must be safe to share between
 * concurrent requests.
 */
export interface VectorStore {
  readonly name: string;
  collectionExists(collection: string): Promise<boolean>;
  /** No-op when the collection already exists. */
  createCollection(collection: string, vectorSize: number, distance?: DistanceMetric): Promise<void>;
  /** No-op when the collection does not exist. */
  deleteCollection(collection: string): Promise<void>;
  upsert(collection: string, points: IndexedPoint[]): Promise<void>;
  /** Best match first; equal scores ordered by ascending id. */
  search(collection: string, queryVector: number[], limit: number): Promise<ScoredPoint[]>;
  stats(collection: string): Promise<CollectionStats>;
  close?(): Promise<void>;
}

export function compareScoredPoints(a: ScoredPoint, b: ScoredPoint): number {
  return b.score - a.score || a.id - b.id;
}
