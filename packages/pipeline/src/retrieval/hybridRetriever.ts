import type { Embedder } from '../catalog/embeddings';
import { VECTOR_SPACES, type VectorStore } from '../catalog/vectorStore';
import { NamespaceNotFoundError } from '../errors';
import { noopLogger, type PipelineLogger } from '../logger';
import type { DocumentMetadata } from '../schema';
import { DEFAULT_RRF_K, reciprocalRankFusion, type RankedItem } from './fusion';

export const DEFAULT_PER_SPACE_LIMIT = 20;
export const DEFAULT_RESULT_LIMIT = 5;

export interface Candidate {
  id: string;
  rank: number;
  score: number;
  payload: DocumentMetadata;
}

export interface RetrieveOptions {
  perSpaceLimit?: number;
  limit?: number;
}

export interface HybridRetrieverOptions {
  store: VectorStore;
  embedder: Embedder;
  k?: number;
  logger?: PipelineLogger;
}

export class HybridRetriever {
  private readonly store: VectorStore;
  private readonly embedder: Embedder;
  private readonly k: number;
  private readonly logger: PipelineLogger;

  constructor(options: HybridRetrieverOptions) {
    this.store = options.store;
    this.embedder = options.embedder;
    this.k = options.k ?? DEFAULT_RRF_K;
    this.logger = options.logger ?? noopLogger;
  }

  async retrieve(namespace: string, query: string, options: RetrieveOptions = {}): Promise<Candidate[]> {
    if (!(await this.store.namespaceExists(namespace))) {
      throw new NamespaceNotFoundError(namespace);
    }

    const perSpaceLimit = options.perSpaceLimit ?? DEFAULT_PER_SPACE_LIMIT;
    const limit = options.limit ?? DEFAULT_RESULT_LIMIT;
    const embedding = await this.embedder.embedQuery(query);

    // One space at a time: sessions never fan out.
    const rankings: RankedItem<DocumentMetadata>[][] = [];
    for (const space of VECTOR_SPACES) {
      const hits = await this.store.search(namespace, space, embedding, perSpaceLimit);
      rankings.push(hits.map((hit) => ({ id: hit.id, item: hit.payload })));
    }

    const fused = reciprocalRankFusion(rankings, { k: this.k, limit });
    this.logger.debug('Fused catalog candidates', {
      namespace,
      perSpace: rankings.map((ranking) => ranking.length),
      candidates: fused.map((entry) => entry.id)
    });

    return fused.map((entry) => ({
      id: entry.id,
      rank: entry.rank,
      score: entry.score,
      payload: entry.item
    }));
  }
}
