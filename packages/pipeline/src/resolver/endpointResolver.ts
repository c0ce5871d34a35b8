import { NamespaceNotFoundError } from '../errors';
import { noopLogger, type PipelineLogger } from '../logger';
import { filterEndpointsTask, rephraseQueryTask, type EndpointSummary } from '../oracle/tasks';
import type { Oracle } from '../oracle/types';
import type { Candidate, HybridRetriever } from '../retrieval/hybridRetriever';
import { toOperationDocument, type ModelConfig, type OperationDocument } from '../schema';

export type ResolvedOperation = OperationDocument & {
  rank: number;
  score: number;
};

export type EndpointSelection = {
  url: string;
  method: string;
};

/**
 * Narrows fused candidates. Any implementation may stand in for the default as
 * long as it returns a subset of the endpoints it was given.
 */
export type CandidateFilter = (input: {
  query: string;
  endpoints: EndpointSummary[];
  model: ModelConfig;
}) => Promise<EndpointSelection[]>;

export function createOracleCandidateFilter(oracle: Oracle): CandidateFilter {
  return async ({ query, endpoints, model }) => {
    const result = await oracle.invoke(filterEndpointsTask, { query, endpoints }, model);
    return result.selected;
  };
}

export type ResolveRequest = {
  namespace: string;
  query: string;
  model: ModelConfig;
  rephrase?: boolean;
  rephraseInstructions?: string | null;
};

export type ResolveResult = {
  endpoint: ResolvedOperation | null;
  rephrasedQuery: string;
};

export interface EndpointResolverOptions {
  retriever: HybridRetriever;
  oracle: Oracle;
  filter?: CandidateFilter;
  logger?: PipelineLogger;
}

const DEFAULT_REPHRASE_INSTRUCTIONS = 'Rewrite the request as a concise description of the API action it needs.';

const sameEndpoint = (selection: EndpointSelection, operation: OperationDocument): boolean =>
  selection.method.trim().toUpperCase() === operation.method && selection.url.trim() === operation.url;

export class EndpointResolver {
  private readonly retriever: HybridRetriever;
  private readonly oracle: Oracle;
  private readonly filter: CandidateFilter;
  private readonly logger: PipelineLogger;

  constructor(options: EndpointResolverOptions) {
    this.retriever = options.retriever;
    this.oracle = options.oracle;
    this.filter = options.filter ?? createOracleCandidateFilter(options.oracle);
    this.logger = options.logger ?? noopLogger;
  }

  async resolve(request: ResolveRequest): Promise<ResolveResult> {
    const rephrasedQuery = await this.rephrase(request);

    let candidates: Candidate[];
    try {
      candidates = await this.retriever.retrieve(request.namespace, rephrasedQuery);
    } catch (err) {
      if (!(err instanceof NamespaceNotFoundError)) {
        throw err;
      }
      this.logger.warn('Catalog namespace does not exist; no candidates', { namespace: request.namespace });
      candidates = [];
    }

    if (candidates.length === 0) {
      return { endpoint: null, rephrasedQuery };
    }

    const operations: ResolvedOperation[] = candidates.map((candidate) => ({
      ...toOperationDocument(candidate.id, request.namespace, candidate.payload),
      rank: candidate.rank,
      score: candidate.score
    }));

    const selections = await this.filter({
      query: rephrasedQuery,
      endpoints: operations.map((operation) => ({
        url: operation.url,
        method: operation.method,
        description: operation.description
      })),
      model: request.model
    });

    let chosen: ResolvedOperation | undefined;
    for (const selection of selections) {
      chosen = operations.find((operation) => sameEndpoint(selection, operation));
      if (chosen) {
        break;
      }
    }

    if (!chosen) {
      chosen = operations[0];
      this.logger.info('Candidate filter kept nothing; using top fused candidate', {
        namespace: request.namespace,
        selected: selections.length,
        fallback: `${chosen.method} ${chosen.url}`
      });
    }

    this.logger.debug('Resolved operation', {
      namespace: request.namespace,
      method: chosen.method,
      url: chosen.url,
      rank: chosen.rank
    });
    return { endpoint: chosen, rephrasedQuery };
  }

  private async rephrase(request: ResolveRequest): Promise<string> {
    if (!request.rephrase) {
      return request.query;
    }
    const instructions = request.rephraseInstructions?.trim() || DEFAULT_REPHRASE_INSTRUCTIONS;
    const result = await this.oracle.invoke(
      rephraseQueryTask,
      { query: request.query, rephraseInstructions: instructions },
      request.model
    );
    const rephrased = result.rephrasedQuery.trim();
    return rephrased.length > 0 ? rephrased : request.query;
  }
}
