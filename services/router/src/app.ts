import cors from '@fastify/cors';
import fastify, { type FastifyInstance } from 'fastify';

import {
  FileGuidanceSource,
  InMemoryVectorStore,
  LocalEmbedder,
  OpenAiEmbedder,
  OpenAiOracle,
  Pipeline,
  QdrantVectorStore,
  StaticNamespaceDirectory,
  createPinoPipelineLogger,
  loadNamespaceRegistry,
  type Clock,
  type Embedder,
  type GuidanceSource,
  type NamespaceDirectory,
  type Oracle,
  type VectorStore
} from '@switchyard/pipeline';

import { createLogger } from './logger';
import { createMetrics } from './metrics';
import { registerHealthRoutes } from './routes/health';
import { registerRunRoutes } from './routes/run';
import { registerCatalogRoutes } from './routes/catalog';
import { mapErrorToResponse } from './errors';
import { EnvConfigError } from './envConfig';
import type { AppContext } from './types';
import type { RouterConfig } from './config';

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

/** Collaborators tests replace with in-process stand-ins. */
export interface AppOverrides {
  store?: VectorStore;
  embedder?: Embedder;
  oracle?: Oracle;
  guidance?: GuidanceSource;
  namespaces?: NamespaceDirectory;
  clock?: Clock;
}

const createStore = (config: RouterConfig): VectorStore => {
  if (config.catalogBackend === 'memory') {
    return new InMemoryVectorStore();
  }
  return new QdrantVectorStore({ url: config.qdrantUrl, apiKey: config.qdrantApiKey ?? undefined });
};

const createEmbedder = (config: RouterConfig): Embedder => {
  if (config.embeddingBackend === 'local') {
    return new LocalEmbedder();
  }
  if (!config.openAiApiKey) {
    throw new EnvConfigError('[router] EMBEDDING_BACKEND=openai requires OPENAI_API_KEY');
  }
  return new OpenAiEmbedder({
    apiKey: config.openAiApiKey,
    model: config.embeddingModel,
    baseUrl: config.openAiBaseUrl ?? undefined
  });
};

export const createApp = async (config: RouterConfig, overrides: AppOverrides = {}): Promise<CreateAppResult> => {
  const logger = createLogger(config);
  const app = fastify({ logger });
  await app.register(cors, { origin: true, credentials: true });

  const metrics = createMetrics();
  metrics.readinessGauge.set({ component: 'store' }, 0);
  metrics.readinessGauge.set({ component: 'oracle' }, 0);

  const pipelineLogger = createPinoPipelineLogger(app.log);
  const store = overrides.store ?? createStore(config);
  const embedder = overrides.embedder ?? createEmbedder(config);
  const oracle =
    overrides.oracle ??
    new OpenAiOracle({
      credentials: { openai: config.openAiApiKey, openrouter: config.openRouterApiKey },
      openAiBaseUrl: config.openAiBaseUrl ?? undefined,
      timeoutMs: config.oracleTimeoutMs,
      title: 'Switchyard',
      logger: pipelineLogger
    });
  const namespaces =
    overrides.namespaces ??
    (config.namespaceRegistryPath
      ? await loadNamespaceRegistry(config.namespaceRegistryPath)
      : new StaticNamespaceDirectory());

  const pipeline = new Pipeline({
    store,
    embedder,
    oracle,
    guidance: overrides.guidance ?? new FileGuidanceSource(config.guidanceDir, pipelineLogger),
    namespaces,
    enforceNested: config.enforceNested,
    maxSteps: config.maxSteps,
    clock: overrides.clock,
    remoteTimeoutMs: config.remoteTimeoutMs,
    onRemoteCall: ({ method, durationMs, statusCode }) => {
      metrics.remoteCallSeconds.observe(
        { method, status: statusCode === null ? 'error' : String(statusCode) },
        durationMs / 1000
      );
    },
    logger: pipelineLogger
  });

  const ctx: AppContext = {
    config,
    pipeline,
    store,
    oracle,
    metrics,
    readiness: {
      store: false,
      oracle: false
    },
    defaultModel: { model: config.defaultModel }
  };

  registerHealthRoutes(app, ctx);
  registerRunRoutes(app, ctx);
  registerCatalogRoutes(app, ctx);

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode === 500 && error.statusCode !== undefined && error.statusCode < 500) {
      // Fastify's own client errors (malformed JSON, body too large)
      reply.status(error.statusCode).send({ message: error.message, code: error.code });
      return;
    }
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(mapped.statusCode).send({ message: mapped.message, code: mapped.code, details: mapped.details });
  });

  return { app, ctx };
};
