import { NamespaceNotFoundError } from '../errors';
import type { DocumentMetadata } from '../schema';
import type { TextEmbedding } from './embeddings';
import { cosineSimilarity, maxSimilarity, type SparseVector } from './lexical';
import {
  compareScored,
  type NamespaceVectorConfig,
  type ScoredRecord,
  type StoredRecord,
  type UpsertRecord,
  type VectorSpace,
  type VectorStore
} from './vectorStore';

type MemoryRecord = {
  id: string;
  embedding: TextEmbedding;
  payload: DocumentMetadata;
};

type MemoryNamespace = {
  config: NamespaceVectorConfig;
  records: Map<string, MemoryRecord>;
};

const clone = <T>(value: T): T => structuredClone(value);

const sparseDot = (query: SparseVector, document: SparseVector, idf: Map<number, number>): number => {
  const weights = new Map<number, number>();
  document.indices.forEach((index, position) => {
    weights.set(index, document.values[position]);
  });
  let score = 0;
  query.indices.forEach((index, position) => {
    const documentWeight = weights.get(index);
    if (documentWeight !== undefined) {
      score += query.values[position] * documentWeight * (idf.get(index) ?? 0);
    }
  });
  return score;
};

/**
 * Process-local vector store with the same scoring rules as the Qdrant
 * namespace configuration: cosine for dense, IDF-weighted dot product for
 * sparse, MaxSim for late interaction.
 */
export class InMemoryVectorStore implements VectorStore {
  private readonly namespaces = new Map<string, MemoryNamespace>();

  async namespaceExists(namespace: string): Promise<boolean> {
    return this.namespaces.has(namespace);
  }

  async ensureNamespace(namespace: string, config: NamespaceVectorConfig): Promise<void> {
    if (!this.namespaces.has(namespace)) {
      this.namespaces.set(namespace, { config: { ...config }, records: new Map() });
    }
  }

  async upsert(namespace: string, record: UpsertRecord): Promise<void> {
    const entry = this.requireNamespace(namespace);
    entry.records.set(record.id, {
      id: record.id,
      embedding: clone(record.embedding),
      payload: clone(record.payload)
    });
  }

  async search(namespace: string, space: VectorSpace, query: TextEmbedding, limit: number): Promise<ScoredRecord[]> {
    const entry = this.requireNamespace(namespace);
    const records = [...entry.records.values()];
    let scored: ScoredRecord[];

    switch (space) {
      case 'dense':
        scored = records.map((record) => ({
          id: record.id,
          payload: record.payload,
          score: cosineSimilarity(query.dense, record.embedding.dense)
        }));
        break;
      case 'sparse': {
        const idf = this.inverseDocumentFrequency(records);
        scored = records
          .map((record) => ({
            id: record.id,
            payload: record.payload,
            score: sparseDot(query.sparse, record.embedding.sparse, idf)
          }))
          .filter((record) => record.score > 0);
        break;
      }
      case 'late':
        scored = records.map((record) => ({
          id: record.id,
          payload: record.payload,
          score: maxSimilarity(query.late, record.embedding.late)
        }));
        break;
    }

    return scored
      .sort(compareScored)
      .slice(0, limit)
      .map((record) => ({ ...record, payload: clone(record.payload) }));
  }

  async setPayload(namespace: string, id: string, payload: DocumentMetadata): Promise<boolean> {
    const entry = this.requireNamespace(namespace);
    const record = entry.records.get(id);
    if (!record) {
      return false;
    }
    record.payload = clone(payload);
    return true;
  }

  async get(namespace: string, id: string): Promise<StoredRecord | null> {
    const record = this.requireNamespace(namespace).records.get(id);
    return record ? { id: record.id, payload: clone(record.payload) } : null;
  }

  async delete(namespace: string, id: string): Promise<boolean> {
    return this.requireNamespace(namespace).records.delete(id);
  }

  async list(namespace: string): Promise<StoredRecord[]> {
    const entry = this.requireNamespace(namespace);
    return [...entry.records.values()]
      .map((record) => ({ id: record.id, payload: clone(record.payload) }))
      .sort((left, right) => (left.id < right.id ? -1 : left.id > right.id ? 1 : 0));
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  getNamespaceConfig(namespace: string): NamespaceVectorConfig | null {
    const entry = this.namespaces.get(namespace);
    return entry ? { ...entry.config } : null;
  }

  private requireNamespace(namespace: string): MemoryNamespace {
    const entry = this.namespaces.get(namespace);
    if (!entry) {
      throw new NamespaceNotFoundError(namespace);
    }
    return entry;
  }

  private inverseDocumentFrequency(records: MemoryRecord[]): Map<number, number> {
    const documentFrequency = new Map<number, number>();
    for (const record of records) {
      for (const index of new Set(record.embedding.sparse.indices)) {
        documentFrequency.set(index, (documentFrequency.get(index) ?? 0) + 1);
      }
    }
    const total = records.length;
    const idf = new Map<number, number>();
    for (const [index, frequency] of documentFrequency) {
      idf.set(index, Math.log((total - frequency + 0.5) / (frequency + 0.5) + 1));
    }
    return idf;
  }
}
