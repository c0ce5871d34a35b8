import type { DocumentMetadata } from '../schema';
import type { TextEmbedding } from './embeddings';

export const VECTOR_SPACES = ['dense', 'sparse', 'late'] as const;

export type VectorSpace = (typeof VECTOR_SPACES)[number];

export interface NamespaceVectorConfig {
  denseSize: number;
  lateSize: number;
}

export interface StoredRecord {
  id: string;
  payload: DocumentMetadata;
}

export interface ScoredRecord extends StoredRecord {
  score: number;
}

export interface UpsertRecord {
  id: string;
  embedding: TextEmbedding;
  payload: DocumentMetadata;
}

/**
 * Storage for per-namespace operation records. A namespace's vector
 * configuration is fixed by the first `ensureNamespace` call.
 */
export interface VectorStore {
  namespaceExists(namespace: string): Promise<boolean>;
  ensureNamespace(namespace: string, config: NamespaceVectorConfig): Promise<void>;
  upsert(namespace: string, record: UpsertRecord): Promise<void>;
  /** Nearest neighbours in one space. Throws NamespaceNotFoundError for unknown namespaces. */
  search(namespace: string, space: VectorSpace, query: TextEmbedding, limit: number): Promise<ScoredRecord[]>;
  /** Replaces a record's payload; resolves false when the record does not exist. */
  setPayload(namespace: string, id: string, payload: DocumentMetadata): Promise<boolean>;
  /** Resolves null when the record does not exist. */
  get(namespace: string, id: string): Promise<StoredRecord | null>;
  /** Removes a record; resolves false when it does not exist. */
  delete(namespace: string, id: string): Promise<boolean>;
  list(namespace: string): Promise<StoredRecord[]>;
  healthCheck(): Promise<boolean>;
}

export const compareScored = (left: ScoredRecord, right: ScoredRecord): number => {
  if (right.score !== left.score) {
    return right.score - left.score;
  }
  return left.id < right.id ? -1 : left.id > right.id ? 1 : 0;
};
