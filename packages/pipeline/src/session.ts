import type { Embedder } from './catalog/embeddings';
import { OperationCatalog } from './catalog/documents';
import type { VectorStore } from './catalog/vectorStore';
import { NoCandidateError } from './errors';
import { Executor, type ExecutionResult, type RemoteCallObservation } from './execution/executor';
import { joinUrl } from './execution/operationCommand';
import { SchemaExtractor } from './extraction/schemaExtractor';
import { emptyGuidance, loadWorkflowGuidance, type GuidanceSource } from './guidance';
import { noopLogger, type PipelineLogger } from './logger';
import { StaticNamespaceDirectory, type NamespaceDirectory } from './namespaces';
import type { Oracle } from './oracle/types';
import { ExecutionContext, type StepRecordInput } from './planning/context';
import { IntegrationSelector } from './planning/integrationSelector';
import { MAX_PLANNING_STEPS, resolveStepLimit } from './planning/loop';
import { Planner } from './planning/planner';
import { EndpointResolver, type CandidateFilter, type ResolvedOperation } from './resolver/endpointResolver';
import { HybridRetriever } from './retrieval/hybridRetriever';
import { operationKey, type ModelConfig, type NamespaceDescriptor } from './schema';
import { systemClock, withTemporalContext, type Clock } from './temporal';

export type IdentifyRequest = {
  namespace: string;
  baseUrl: string;
  query: string;
  model: ModelConfig;
  rephrase?: boolean;
  rephraseInstructions?: string | null;
};

export type IdentifiedEndpoint = ResolvedOperation & {
  key: string;
};

export type IdentifyResult = {
  endpoint: IdentifiedEndpoint | null;
  rephrasedQuery: string;
};

export type ActionRequest = IdentifyRequest & {
  headers?: Record<string, unknown> | null;
  context?: Record<string, StepRecordInput> | ExecutionContext | null;
  naturalLanguage?: boolean;
};

export type ActionResult = ExecutionResult & {
  endpoint: IdentifiedEndpoint;
  rephrasedQuery: string;
  guidanceUsed: boolean;
};

export type GenerateStepsRequest = {
  namespaces: string[];
  query: string;
  model: ModelConfig;
};

export type GeneratedStep = {
  step: string;
  namespace: string;
  namespaceName: string;
};

export type GenerateStepsResult = {
  query: string;
  steps: GeneratedStep[];
  namespaces: NamespaceDescriptor[];
};

export interface PipelineOptions {
  store: VectorStore;
  embedder: Embedder;
  oracle: Oracle;
  guidance?: GuidanceSource;
  namespaces?: NamespaceDirectory;
  filter?: CandidateFilter;
  enforceNested?: boolean;
  maxSteps?: number;
  clock?: Clock;
  remoteTimeoutMs?: number;
  onRemoteCall?: (observation: RemoteCallObservation) => void;
  logger?: PipelineLogger;
}

/**
 * Wires retrieval, resolution, extraction, execution and planning over shared
 * singletons (store, embedder, oracle). Holds no per-session state: every
 * session gets its own ExecutionContext and step counter.
 */
export class Pipeline {
  readonly catalog: OperationCatalog;
  readonly retriever: HybridRetriever;
  readonly resolver: EndpointResolver;
  readonly extractor: SchemaExtractor;
  readonly executor: Executor;
  readonly planner: Planner;
  readonly selector: IntegrationSelector;
  readonly oracle: Oracle;
  readonly guidance: GuidanceSource;
  readonly namespaces: NamespaceDirectory;
  readonly maxSteps: number;
  readonly clock: Clock;
  readonly logger: PipelineLogger;

  constructor(options: PipelineOptions) {
    const logger = options.logger ?? noopLogger;
    this.logger = logger;
    this.oracle = options.oracle;
    this.guidance = options.guidance ?? emptyGuidance;
    this.namespaces = options.namespaces ?? new StaticNamespaceDirectory();
    this.maxSteps = resolveStepLimit(options.maxSteps ?? MAX_PLANNING_STEPS);
    this.clock = options.clock ?? systemClock;

    this.catalog = new OperationCatalog({ store: options.store, embedder: options.embedder, logger });
    this.retriever = new HybridRetriever({ store: options.store, embedder: options.embedder, logger });
    this.resolver = new EndpointResolver({
      retriever: this.retriever,
      oracle: options.oracle,
      filter: options.filter,
      logger
    });
    this.extractor = new SchemaExtractor({ oracle: options.oracle, enforceNested: options.enforceNested, logger });
    this.executor = new Executor({
      extractor: this.extractor,
      oracle: options.oracle,
      timeoutMs: options.remoteTimeoutMs,
      onRemoteCall: options.onRemoteCall,
      logger
    });
    this.planner = new Planner({ oracle: options.oracle, logger });
    this.selector = new IntegrationSelector({ oracle: options.oracle, logger });
  }

  withTemporalContext(query: string): string {
    return withTemporalContext(query, this.clock);
  }

  async identifyEndpoints(request: IdentifyRequest): Promise<IdentifyResult> {
    this.oracle.assertReady(request.model);
    return this.identify({ ...request, query: this.withTemporalContext(request.query) });
  }

  /** Resolve, extract and execute one operation. Throws NoCandidateError when nothing matches. */
  async runAction(request: ActionRequest): Promise<ActionResult> {
    this.oracle.assertReady(request.model);
    const guidance = await this.guidance.load(request.namespace);
    const context =
      request.context instanceof ExecutionContext
        ? request.context
        : ExecutionContext.fromEntries(request.context ?? {});
    return this.execute({ ...request, query: this.withTemporalContext(request.query), context }, guidance);
  }

  async generateSteps(request: GenerateStepsRequest): Promise<GenerateStepsResult> {
    this.oracle.assertReady(request.model);
    const descriptors = await this.namespaces.describe(request.namespaces);
    const guidance = await loadWorkflowGuidance(this.guidance, request.namespaces);
    const steps = await this.planner.decompose(this.withTemporalContext(request.query), guidance, request.model);

    const generated: GeneratedStep[] = [];
    for (const step of steps) {
      const namespace = await this.selector.select(step, descriptors, request.model);
      generated.push({ step, namespace: namespace.id, namespaceName: namespace.name });
    }
    return { query: request.query, steps: generated, namespaces: descriptors };
  }

  /**
   * Single step against an already timestamped query. Used by runAction and by
   * each iteration of a deep session.
   */
  async execute(
    request: ActionRequest & { context: ExecutionContext },
    guidance: string | null
  ): Promise<ActionResult> {
    const identified = await this.identify(request);
    if (!identified.endpoint) {
      throw new NoCandidateError(request.namespace, request.query);
    }

    const result = await this.executor.execute({
      operation: identified.endpoint,
      baseUrl: request.baseUrl,
      headers: request.headers,
      query: request.query,
      context: request.context,
      guidance,
      model: request.model,
      naturalLanguage: request.naturalLanguage
    });

    return {
      ...result,
      endpoint: identified.endpoint,
      rephrasedQuery: identified.rephrasedQuery,
      guidanceUsed: guidance !== null
    };
  }

  private async identify(request: IdentifyRequest): Promise<IdentifyResult> {
    const { endpoint, rephrasedQuery } = await this.resolver.resolve({
      namespace: request.namespace,
      query: request.query,
      model: request.model,
      rephrase: request.rephrase,
      rephraseInstructions: request.rephraseInstructions
    });
    if (!endpoint) {
      return { endpoint: null, rephrasedQuery };
    }
    return {
      endpoint: { ...endpoint, key: operationKey(endpoint.method, joinUrl(request.baseUrl, endpoint.url)) },
      rephrasedQuery
    };
  }
}
