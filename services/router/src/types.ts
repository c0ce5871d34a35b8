import type { ModelConfig, Oracle, Pipeline, VectorStore } from '@switchyard/pipeline';

import type { RouterConfig } from './config';
import type { RouterMetrics } from './metrics';

export interface ReadinessState {
  store: boolean;
  oracle: boolean;
}

export interface AppContext {
  config: RouterConfig;
  pipeline: Pipeline;
  store: VectorStore;
  oracle: Oracle;
  metrics: RouterMetrics;
  readiness: ReadinessState;
  defaultModel: ModelConfig;
}
