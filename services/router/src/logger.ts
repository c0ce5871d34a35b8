import type { LoggerOptions } from 'pino';
import { stdTimeFunctions } from 'pino';

import type { RouterConfig } from './config';

// Callers forward per-namespace credentials on run requests.
const REDACTED_PATHS = ['req.headers.authorization', 'req.headers.cookie', 'headers.*.authorization', 'headers.*.Authorization'];

export const createLogger = (config: Pick<RouterConfig, 'logLevel'>): LoggerOptions => ({
  name: 'router',
  level: config.logLevel,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label })
  },
  redact: { paths: REDACTED_PATHS, censor: '[redacted]' }
});

/** Startup summary of the configuration without credentials. */
export const describeConfig = (config: RouterConfig) => ({
  host: config.host,
  port: config.port,
  catalog: config.catalogBackend === 'qdrant' ? { backend: 'qdrant', url: config.qdrantUrl } : { backend: 'memory' },
  embeddings: { backend: config.embeddingBackend, model: config.embeddingModel },
  defaultModel: config.defaultModel,
  credentials: {
    openAi: config.openAiApiKey !== null,
    openRouter: config.openRouterApiKey !== null,
    qdrant: config.qdrantApiKey !== null
  },
  maxSteps: config.maxSteps,
  enforceNested: config.enforceNested
});
