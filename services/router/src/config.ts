import path from 'node:path';

import { MAX_PLANNING_STEPS } from '@switchyard/pipeline';
import { z } from 'zod';

import { booleanVar, enumVar, integerVar, loadEnvConfig, stringVar, type EnvSource } from './envConfig';

export type CatalogBackend = 'qdrant' | 'memory';
export type EmbeddingBackend = 'openai' | 'local';

export interface RouterConfig {
  host: string;
  port: number;
  logLevel: string;
  catalogBackend: CatalogBackend;
  qdrantUrl: string;
  qdrantApiKey: string | null;
  embeddingBackend: EmbeddingBackend;
  embeddingModel: string;
  openAiApiKey: string | null;
  openRouterApiKey: string | null;
  openAiBaseUrl: string | null;
  defaultModel: string;
  oracleTimeoutMs: number;
  remoteTimeoutMs: number;
  guidanceDir: string;
  namespaceRegistryPath: string | null;
  enforceNested: boolean;
  maxSteps: number;
}

const routerEnvSchema = z
  .object({
    ROUTER_HOST: stringVar(),
    ROUTER_PORT: integerVar({ min: 0, max: 65535, description: 'ROUTER_PORT' }),
    ROUTER_LOG_LEVEL: stringVar({ lowercase: true }),
    CATALOG_BACKEND: enumVar(['qdrant', 'memory'], 'qdrant'),
    QDRANT_URL: stringVar(),
    QDRANT_API_KEY: stringVar(),
    EMBEDDING_BACKEND: enumVar(['openai', 'local'], 'openai'),
    EMBEDDING_MODEL: stringVar(),
    OPENAI_API_KEY: stringVar(),
    OPENROUTER_API_KEY: stringVar(),
    OPENAI_BASE_URL: stringVar(),
    DEFAULT_MODEL: stringVar(),
    ORACLE_TIMEOUT_MS: integerVar({ min: 1 }),
    REMOTE_CALL_TIMEOUT_MS: integerVar({ min: 1 }),
    GUIDANCE_DIR: stringVar(),
    NAMESPACE_REGISTRY_PATH: stringVar(),
    EXTRACTION_ENFORCE_NESTED: booleanVar({ defaultValue: false }),
    MAX_PLANNING_STEPS: integerVar({ min: 1 })
  })
  .passthrough();

export const loadConfig = (env?: EnvSource): RouterConfig => {
  const parsed = loadEnvConfig(routerEnvSchema, { env, context: 'router' });

  return {
    host: parsed.ROUTER_HOST ?? '0.0.0.0',
    port: parsed.ROUTER_PORT ?? 4200,
    logLevel: parsed.ROUTER_LOG_LEVEL ?? 'info',
    catalogBackend: parsed.CATALOG_BACKEND,
    qdrantUrl: parsed.QDRANT_URL ?? 'http://127.0.0.1:6333',
    qdrantApiKey: parsed.QDRANT_API_KEY ?? null,
    embeddingBackend: parsed.EMBEDDING_BACKEND,
    embeddingModel: parsed.EMBEDDING_MODEL ?? 'text-embedding-3-small',
    openAiApiKey: parsed.OPENAI_API_KEY ?? null,
    openRouterApiKey: parsed.OPENROUTER_API_KEY ?? null,
    openAiBaseUrl: parsed.OPENAI_BASE_URL ?? null,
    defaultModel: parsed.DEFAULT_MODEL ?? 'openai/gpt-4.1',
    oracleTimeoutMs: parsed.ORACLE_TIMEOUT_MS ?? 120_000,
    remoteTimeoutMs: parsed.REMOTE_CALL_TIMEOUT_MS ?? 30_000,
    guidanceDir: path.resolve(process.cwd(), parsed.GUIDANCE_DIR ?? 'guidance'),
    namespaceRegistryPath: parsed.NAMESPACE_REGISTRY_PATH
      ? path.resolve(process.cwd(), parsed.NAMESPACE_REGISTRY_PATH)
      : null,
    enforceNested: parsed.EXTRACTION_ENFORCE_NESTED,
    maxSteps: Math.min(parsed.MAX_PLANNING_STEPS ?? MAX_PLANNING_STEPS, MAX_PLANNING_STEPS)
  };
};
