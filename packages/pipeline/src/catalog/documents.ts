import { createHash, randomUUID } from 'node:crypto';

import { DocumentNotFoundError } from '../errors';
import { noopLogger, type PipelineLogger } from '../logger';
import type { DocumentMetadata } from '../schema';
import type { Embedder } from './embeddings';
import { LATE_INTERACTION_DIMENSIONS } from './lexical';
import type { StoredRecord, VectorStore } from './vectorStore';

export interface OperationCatalogOptions {
  store: VectorStore;
  embedder: Embedder;
  logger?: PipelineLogger;
}

const formatUuid = (hex: string): string =>
  [hex.slice(0, 8), hex.slice(8, 12), `5${hex.slice(13, 16)}`, `8${hex.slice(17, 20)}`, hex.slice(20, 32)].join('-');

/**
 * Operations are unique within a namespace by method and url, so their record id
 * is derived from both and a repeated insert replaces the earlier record.
 */
export function deriveDocumentId(namespace: string, metadata: DocumentMetadata): string {
  const { method, url } = metadata;
  if (typeof method !== 'string' || typeof url !== 'string' || !method.trim() || !url.trim()) {
    return randomUUID();
  }
  const digest = createHash('sha1')
    .update(`${namespace}\n${method.trim().toUpperCase()}\n${url.trim()}`)
    .digest('hex');
  return formatUuid(digest);
}

const INDEXED_FIELDS = ['method', 'url', 'description'] as const;

const requiresReindex = (previous: DocumentMetadata, next: DocumentMetadata): boolean =>
  INDEXED_FIELDS.some((field) => previous[field] !== next[field]);

const passageText = (metadata: DocumentMetadata): string => {
  const parts = INDEXED_FIELDS.map((field) => metadata[field]).filter(
    (value): value is string => typeof value === 'string' && value.trim().length > 0
  );
  return parts.length > 0 ? parts.join(' ') : JSON.stringify(metadata);
};

export class OperationCatalog {
  private readonly store: VectorStore;
  private readonly embedder: Embedder;
  private readonly logger: PipelineLogger;

  constructor(options: OperationCatalogOptions) {
    this.store = options.store;
    this.embedder = options.embedder;
    this.logger = options.logger ?? noopLogger;
  }

  async insertDocument(namespace: string, text: string, metadata: DocumentMetadata): Promise<string> {
    const embedding = await this.embedder.embedPassage(text);
    await this.store.ensureNamespace(namespace, {
      denseSize: embedding.dense.length,
      lateSize: LATE_INTERACTION_DIMENSIONS
    });

    const id = deriveDocumentId(namespace, metadata);
    await this.store.upsert(namespace, { id, embedding, payload: metadata });
    this.logger.info('Inserted catalog document', {
      namespace,
      documentId: id,
      method: metadata.method,
      url: metadata.url
    });
    return id;
  }

  /**
   * Replaces a document's metadata. A change of method, url or description
   * re-embeds the document and may move it to a new id, which is returned.
   */
  async editDocument(namespace: string, documentId: string, metadata: DocumentMetadata, text?: string): Promise<string> {
    const existing = await this.store.get(namespace, documentId);
    if (!existing) {
      throw new DocumentNotFoundError(namespace, documentId);
    }

    if (!requiresReindex(existing.payload, metadata) && !text?.trim()) {
      await this.store.setPayload(namespace, documentId, metadata);
      this.logger.info('Replaced catalog document metadata', { namespace, documentId });
      return documentId;
    }

    await this.store.delete(namespace, documentId);
    const id = await this.insertDocument(namespace, text?.trim() || passageText(metadata), metadata);
    this.logger.info('Re-indexed edited catalog document', { namespace, previousId: documentId, documentId: id });
    return id;
  }

  async listDocuments(namespace: string): Promise<StoredRecord[]> {
    return this.store.list(namespace);
  }
}
