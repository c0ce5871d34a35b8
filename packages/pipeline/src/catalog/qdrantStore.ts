import { QdrantClient } from '@qdrant/js-client-rest';

import { NamespaceNotFoundError } from '../errors';
import type { DocumentMetadata } from '../schema';
import type { TextEmbedding } from './embeddings';
import {
  type NamespaceVectorConfig,
  type ScoredRecord,
  type StoredRecord,
  type UpsertRecord,
  type VectorSpace,
  type VectorStore
} from './vectorStore';

export type QdrantVectorStoreOptions = {
  url: string;
  apiKey?: string;
  client?: QdrantClient;
};

const SCROLL_PAGE_SIZE = 256;

// Qdrant point ids are unsigned integers or UUIDs.
const POINT_ID = /^(\d+|[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})$/i;

const toPayload = (payload: Record<string, unknown> | null | undefined): DocumentMetadata => ({ ...(payload ?? {}) });

export class QdrantVectorStore implements VectorStore {
  private readonly client: QdrantClient;

  constructor(options: QdrantVectorStoreOptions) {
    this.client =
      options.client ??
      new QdrantClient({
        url: options.url,
        apiKey: options.apiKey?.trim() ? options.apiKey.trim() : undefined
      });
  }

  async namespaceExists(namespace: string): Promise<boolean> {
    const result = await this.client.collectionExists(namespace);
    return result.exists;
  }

  async ensureNamespace(namespace: string, config: NamespaceVectorConfig): Promise<void> {
    if (await this.namespaceExists(namespace)) {
      return;
    }
    try {
      await this.client.createCollection(namespace, {
        vectors: {
          dense: {
            size: config.denseSize,
            distance: 'Cosine'
          },
          late: {
            size: config.lateSize,
            distance: 'Cosine',
            multivector_config: {
              comparator: 'max_sim'
            }
          }
        },
        sparse_vectors: {
          sparse: {
            modifier: 'idf'
          }
        }
      });
    } catch (err) {
      // A concurrent insert may have created the collection in between.
      if (await this.namespaceExists(namespace)) {
        return;
      }
      throw err;
    }
  }

  async upsert(namespace: string, record: UpsertRecord): Promise<void> {
    await this.client.upsert(namespace, {
      wait: true,
      points: [
        {
          id: record.id,
          vector: {
            dense: record.embedding.dense,
            sparse: record.embedding.sparse,
            late: record.embedding.late
          },
          payload: record.payload
        }
      ]
    });
  }

  async search(namespace: string, space: VectorSpace, query: TextEmbedding, limit: number): Promise<ScoredRecord[]> {
    await this.requireNamespace(namespace);
    const vector = space === 'dense' ? query.dense : space === 'sparse' ? query.sparse : query.late;
    const result = await this.client.query(namespace, {
      query: vector,
      using: space,
      limit,
      with_payload: true
    });
    return result.points.map((point) => ({
      id: String(point.id),
      score: point.score,
      payload: toPayload(point.payload)
    }));
  }

  async setPayload(namespace: string, id: string, payload: DocumentMetadata): Promise<boolean> {
    await this.requireNamespace(namespace);
    if (!POINT_ID.test(id)) {
      return false;
    }
    const existing = await this.client.retrieve(namespace, { ids: [id], with_payload: false, with_vector: false });
    if (existing.length === 0) {
      return false;
    }
    await this.client.overwritePayload(namespace, { wait: true, payload, points: [id] });
    return true;
  }

  async get(namespace: string, id: string): Promise<StoredRecord | null> {
    await this.requireNamespace(namespace);
    if (!POINT_ID.test(id)) {
      return null;
    }
    const [point] = await this.client.retrieve(namespace, { ids: [id], with_payload: true, with_vector: false });
    return point ? { id: String(point.id), payload: toPayload(point.payload) } : null;
  }

  async delete(namespace: string, id: string): Promise<boolean> {
    if (!(await this.get(namespace, id))) {
      return false;
    }
    await this.client.delete(namespace, { wait: true, points: [id] });
    return true;
  }

  async list(namespace: string): Promise<StoredRecord[]> {
    await this.requireNamespace(namespace);
    const records: StoredRecord[] = [];
    let offset: string | number | undefined;
    do {
      const page = await this.client.scroll(namespace, {
        limit: SCROLL_PAGE_SIZE,
        offset,
        with_payload: true,
        with_vector: false
      });
      for (const point of page.points) {
        records.push({ id: String(point.id), payload: toPayload(point.payload) });
      }
      const next = page.next_page_offset;
      offset = typeof next === 'string' || typeof next === 'number' ? next : undefined;
    } while (offset !== undefined);
    return records;
  }

  async healthCheck(): Promise<boolean> {
    await this.client.getCollections();
    return true;
  }

  private async requireNamespace(namespace: string): Promise<void> {
    if (!(await this.namespaceExists(namespace))) {
      throw new NamespaceNotFoundError(namespace);
    }
  }
}
