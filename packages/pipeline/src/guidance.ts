import { promises as fs } from 'node:fs';
import path from 'node:path';

import { noopLogger, type PipelineLogger } from './logger';

/** Free-text usage notes per namespace. Absence is never an error. */
export interface GuidanceSource {
  load(namespace: string): Promise<string | null>;
}

export const emptyGuidance: GuidanceSource = {
  load: async () => null
};

const SAFE_NAMESPACE = /^[A-Za-z0-9._-]+$/;

/** Reads `<directory>/<namespace>.md`. */
export class FileGuidanceSource implements GuidanceSource {
  private readonly directory: string;
  private readonly logger: PipelineLogger;

  constructor(directory: string, logger: PipelineLogger = noopLogger) {
    this.directory = path.resolve(directory);
    this.logger = logger;
  }

  async load(namespace: string): Promise<string | null> {
    if (!SAFE_NAMESPACE.test(namespace) || namespace.startsWith('.')) {
      this.logger.warn('Skipping usage guidance for namespace with unsafe characters', { namespace });
      return null;
    }
    const filePath = path.join(this.directory, `${namespace}.md`);
    try {
      const contents = await fs.readFile(filePath, 'utf8');
      const trimmed = contents.trim();
      return trimmed.length > 0 ? trimmed : null;
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        this.logger.debug('No usage guidance for namespace', { namespace });
        return null;
      }
      this.logger.warn('Failed to read usage guidance', {
        namespace,
        error: err instanceof Error ? err.message : String(err)
      });
      return null;
    }
  }
}

export class StaticGuidanceSource implements GuidanceSource {
  private readonly entries: Map<string, string>;

  constructor(entries: Record<string, string>) {
    this.entries = new Map(Object.entries(entries));
  }

  async load(namespace: string): Promise<string | null> {
    return this.entries.get(namespace) ?? null;
  }
}

/** Concatenates the guidance of several namespaces for planning prompts. */
export async function loadWorkflowGuidance(source: GuidanceSource, namespaces: string[]): Promise<string | null> {
  const sections: string[] = [];
  for (const namespace of namespaces) {
    const guidance = await source.load(namespace);
    if (guidance) {
      sections.push(`Integration ${namespace} manual:\n${guidance}`);
    }
  }
  return sections.length > 0 ? sections.join('\n\n') : null;
}
