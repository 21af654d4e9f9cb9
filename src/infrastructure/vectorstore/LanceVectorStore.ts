import * as lancedb from '@lancedb/lancedb';
import { DataType, Field, FixedSizeList, Float32, Int32, Schema, Utf8 } from 'apache-arrow';
import { isDocumentType, type IndexedPoint } from '../../domain/entities/CourseDocument';
import { AppError, NotFoundError, StorageError } from '../../domain/errors';
import {
  compareScoredPoints,
  type CollectionStats,
  type DistanceMetric,
  type ScoredPoint,
  type VectorStore,
} from '../../domain/repositories/VectorStore';
import { errorMessage, log } from '../../utils/logger';

const DISTANCE_METADATA_KEY = 'distance';

type LanceDistance = 'cosine' | 'dot' | 'l2';

const LANCE_DISTANCE: Record<DistanceMetric, LanceDistance> = {
  cosine: 'cosine',
  dot: 'dot',
  euclid: 'l2',
};

function isDistanceMetric(value: string | undefined): value is DistanceMetric {
  return value === 'cosine' || value === 'dot' || value === 'euclid';
}

function buildSchema(vectorSize: number, distance: DistanceMetric): Schema {
  return new Schema(
    [
      new Field('id', new Int32(), false),
      new Field('vector', new FixedSizeList(vectorSize, new Field('item', new Float32(), true)), false),
      new Field('text', new Utf8(), false),
      new Field('course_id', new Int32(), false),
      new Field('course_name', new Utf8(), false),
      new Field('source', new Utf8(), false),
      new Field('type', new Utf8(), false),
      new Field('doc_index', new Int32(), false),
      new Field('chunk_index', new Int32(), false),
    ],
    new Map([[DISTANCE_METADATA_KEY, distance]])
  );
}

function toRow(point: IndexedPoint): Record<string, unknown> {
  return {
    id: point.id,
    vector: point.vector,
    ...point.payload,
  };
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  throw new StorageError(`Unexpected numeric column value: ${String(value)}`);
}

function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  throw new StorageError(`Unexpected text column value: ${String(value)}`);
}

// Lance reports distances (lower is closer); callers expect similarity (higher is closer)
function toScore(distance: DistanceMetric, rawDistance: number): number {
  return distance === 'cosine' ? 1 - rawDistance : -rawDistance;
}

function toScoredPoint(row: Record<string, unknown>, distance: DistanceMetric): ScoredPoint {
  const type = toText(row.type);
  if (!isDocumentType(type)) {
    throw new StorageError(`Unexpected document type in index: ${type}`);
  }

  return {
    id: toNumber(row.id),
    score: toScore(distance, toNumber(row._distance)),
    payload: {
      text: toText(row.text),
      course_id: toNumber(row.course_id),
      course_name: toText(row.course_name),
      source: toText(row.source),
      type,
      doc_index: toNumber(row.doc_index),
      chunk_index: toNumber(row.chunk_index),
    },
  };
}

/**
 * Embedded LanceDB database with one table per collection.
 * The table's Arrow schema pins the vector size; the distance metric travels
 * in the schema metadata.
 */
export class LanceVectorStore implements VectorStore {
  readonly name = 'lancedb';

  private constructor(private db: lancedb.Connection) {}

  static async connect(dataPath: string): Promise<LanceVectorStore> {
    log('info', 'Connecting to LanceDB', { dataPath });
    try {
      const db = await lancedb.connect(dataPath);
      log('info', 'LanceDB connected');
      return new LanceVectorStore(db);
    } catch (error) {
      throw new StorageError(`Failed to connect to LanceDB at ${dataPath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async collectionExists(collection: string): Promise<boolean> {
    return this.guard(`check collection '${collection}'`, async () => {
      const tables = await this.db.tableNames();
      return tables.includes(collection);
    });
  }

  async createCollection(collection: string, vectorSize: number, distance: DistanceMetric = 'cosine'): Promise<void> {
    if (!Number.isInteger(vectorSize) || vectorSize <= 0) {
      throw new StorageError(`Invalid vector size ${vectorSize} for collection '${collection}'`);
    }

    await this.guard(`create collection '${collection}'`, async () => {
      await this.db.createEmptyTable(collection, buildSchema(vectorSize, distance), { existOk: true });
      log('debug', 'Collection ready', { collection, vectorSize, distance });
    });
  }

  async deleteCollection(collection: string): Promise<void> {
    await this.guard(`delete collection '${collection}'`, async () => {
      const tables = await this.db.tableNames();
      if (!tables.includes(collection)) {
        return;
      }
      await this.db.dropTable(collection);
      log('debug', 'Collection dropped', { collection });
    });
  }

  async upsert(collection: string, points: IndexedPoint[]): Promise<void> {
    const table = await this.openTable(collection, (message) => new StorageError(message));

    await this.guard(`upsert into '${collection}'`, async () => {
      try {
        const schema = await table.schema();
        const { vectorSize } = this.describe(table.name, schema);

        for (const point of points) {
          if (point.vector.length !== vectorSize) {
            throw new StorageError(
              `Vector size mismatch in '${collection}': expected ${vectorSize}, got ${point.vector.length} (point ${point.id})`
            );
          }
        }

        if (points.length === 0) {
          return;
        }

        // Plain rows would be inferred as nullable doubles; build the batch against the stored schema
        const batch = lancedb.makeArrowTable(points.map(toRow), { schema });

        await table.mergeInsert('id').whenMatchedUpdateAll().whenNotMatchedInsertAll().execute(batch);
      } finally {
        table.close();
      }
    });
  }

  async search(collection: string, queryVector: number[], limit: number): Promise<ScoredPoint[]> {
    const table = await this.openTable(collection, (message) => new StorageError(message));

    return this.guard(`search '${collection}'`, async () => {
      try {
        const { vectorSize, distance } = this.describe(table.name, await table.schema());
        if (queryVector.length !== vectorSize) {
          throw new StorageError(
            `Query vector size mismatch in '${collection}': expected ${vectorSize}, got ${queryVector.length}`
          );
        }
        if (limit <= 0) {
          return [];
        }

        const rows: Record<string, unknown>[] = await table
          .vectorSearch(queryVector)
          .distanceType(LANCE_DISTANCE[distance])
          .limit(limit)
          .toArray();

        return rows.map((row) => toScoredPoint(row, distance)).sort(compareScoredPoints);
      } finally {
        table.close();
      }
    });
  }

  async stats(collection: string): Promise<CollectionStats> {
    const table = await this.openTable(collection, (message) => new NotFoundError(message));

    return this.guard(`count '${collection}'`, async () => {
      try {
        return { pointCount: await table.countRows() };
      } finally {
        table.close();
      }
    });
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private async openTable(collection: string, missing: (message: string) => AppError): Promise<lancedb.Table> {
    if (!(await this.collectionExists(collection))) {
      throw missing(`Collection '${collection}' does not exist`);
    }
    return this.guard(`open collection '${collection}'`, () => this.db.openTable(collection));
  }

  private describe(tableName: string, schema: Schema): { vectorSize: number; distance: DistanceMetric } {
    const vectorField = schema.fields.find((field) => field.name === 'vector');

    if (!vectorField || !DataType.isFixedSizeList(vectorField.type)) {
      throw new StorageError(`Table '${tableName}' has no fixed-size vector column`);
    }

    const storedDistance = schema.metadata.get(DISTANCE_METADATA_KEY);
    return {
      vectorSize: vectorField.type.listSize,
      distance: isDistanceMetric(storedDistance) ? storedDistance : 'cosine',
    };
  }

  // Wraps driver failures in StorageError; errors already in the taxonomy pass through
  private async guard<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new StorageError(`LanceDB failed to ${action}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
