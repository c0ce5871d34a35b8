import { noopLogger, type PipelineLogger } from '../logger';
import { extractDataTask } from '../oracle/tasks';
import type { Oracle } from '../oracle/types';
import type { ExecutionContext } from '../planning/context';
import type { FieldSchema, FieldSpec, ModelConfig } from '../schema';

export type SchemaType = 'parameters' | 'body';

export type ExtractRequest = {
  schema: FieldSchema;
  schemaType: SchemaType;
  query: string;
  model: ModelConfig;
  context?: ExecutionContext | null;
  guidance?: string | null;
};

export type ConformResult = {
  data: Record<string, unknown>;
  stripped: string[];
};

export interface SchemaExtractorOptions {
  oracle: Oracle;
  enforceNested?: boolean;
  logger?: PipelineLogger;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function buildEnrichedQuery(
  query: string,
  context?: ExecutionContext | null,
  guidance?: string | null
): string {
  const sections = [query];
  const previous = context?.describeForExtraction();
  if (previous) {
    sections.push(previous);
  }
  if (guidance && guidance.trim().length > 0) {
    sections.push(`Platform usage guidance:\n${guidance.trim()}`);
  }
  return sections.join('\n\n');
}

function conformFields(
  value: Record<string, unknown>,
  fields: FieldSchema,
  enforceNested: boolean,
  path: string,
  stripped: string[]
): Record<string, unknown> {
  const declared = new Map<string, FieldSpec>(fields.map((field) => [field.name, field]));
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const field = declared.get(key);
    if (!field) {
      stripped.push(path ? `${path}.${key}` : key);
      continue;
    }
    result[key] = enforceNested ? conformNested(entry, field, path ? `${path}.${key}` : key, stripped) : entry;
  }
  return result;
}

function conformNested(value: unknown, field: FieldSpec, path: string, stripped: string[]): unknown {
  if (field.type === 'object' && field.fields && field.fields.length > 0 && isRecord(value)) {
    return conformFields(value, field.fields, true, path, stripped);
  }
  const itemFields = field.items?.fields;
  if (field.type === 'array' && itemFields && itemFields.length > 0 && Array.isArray(value)) {
    return value.map((item, index) =>
      isRecord(item) ? conformFields(item, itemFields, true, `${path}[${index}]`, stripped) : item
    );
  }
  return value;
}

/**
 * Drops every key the schema does not declare. Only top-level keys are checked
 * unless `enforceNested` is set, in which case declared nested objects and
 * arrays of objects are pruned the same way.
 */
export function conformToSchema(
  value: Record<string, unknown>,
  schema: FieldSchema,
  options: { enforceNested?: boolean } = {}
): ConformResult {
  const stripped: string[] = [];
  const data = conformFields(value, schema, options.enforceNested ?? false, '', stripped);
  return { data, stripped };
}

export class SchemaExtractor {
  private readonly oracle: Oracle;
  private readonly enforceNested: boolean;
  private readonly logger: PipelineLogger;

  constructor(options: SchemaExtractorOptions) {
    this.oracle = options.oracle;
    this.enforceNested = options.enforceNested ?? false;
    this.logger = options.logger ?? noopLogger;
  }

  async extract(request: ExtractRequest): Promise<Record<string, unknown>> {
    if (request.schema.length === 0) {
      return {};
    }

    const result = await this.oracle.invoke(
      extractDataTask,
      {
        query: buildEnrichedQuery(request.query, request.context, request.guidance),
        schemaType: request.schemaType,
        schema: request.schema
      },
      request.model
    );

    if (!isRecord(result.data)) {
      this.logger.warn('Extractor returned a non-object value; using an empty object', {
        schemaType: request.schemaType,
        received: Array.isArray(result.data) ? 'array' : typeof result.data
      });
      return {};
    }

    const { data, stripped } = conformToSchema(result.data, request.schema, { enforceNested: this.enforceNested });
    if (stripped.length > 0) {
      this.logger.warn('Schema violation: removed undeclared fields from extracted data', {
        code: 'SCHEMA_VIOLATION',
        schemaType: request.schemaType,
        stripped
      });
    }
    return data;
  }
}
