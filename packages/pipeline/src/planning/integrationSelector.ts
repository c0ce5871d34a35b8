import { UnknownNamespaceError } from '../errors';
import { noopLogger, type PipelineLogger } from '../logger';
import { selectNamespaceTask } from '../oracle/tasks';
import type { Oracle } from '../oracle/types';
import type { ModelConfig, NamespaceDescriptor } from '../schema';

export interface IntegrationSelectorOptions {
  oracle: Oracle;
  logger?: PipelineLogger;
}

export class IntegrationSelector {
  private readonly oracle: Oracle;
  private readonly logger: PipelineLogger;

  constructor(options: IntegrationSelectorOptions) {
    this.oracle = options.oracle;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Picks the namespace that should execute `step`. The answer must be one of
   * the supplied ids; anything else raises UnknownNamespaceError.
   */
  async select(step: string, namespaces: NamespaceDescriptor[], model: ModelConfig): Promise<NamespaceDescriptor> {
    const known = namespaces.map((namespace) => namespace.id);
    const result = await this.oracle.invoke(selectNamespaceTask, { step, namespaces }, model);
    const chosen = namespaces.find((namespace) => namespace.id === result.namespace.trim());
    if (!chosen) {
      this.logger.warn('Integration selector returned an unknown namespace', {
        returned: result.namespace,
        known
      });
      throw new UnknownNamespaceError(result.namespace, known);
    }
    return chosen;
  }
}
