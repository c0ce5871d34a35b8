import { z } from 'zod';

export const FIELD_TYPES = ['string', 'integer', 'number', 'boolean', 'object', 'array', 'null'] as const;

export const fieldTypeSchema = z.enum(FIELD_TYPES);

export type FieldType = z.infer<typeof fieldTypeSchema>;

export interface FieldItems {
  type: FieldType;
  fields?: FieldSpec[];
}

export interface FieldSpec {
  name: string;
  type: FieldType;
  required: boolean;
  description?: string;
  fields?: FieldSpec[];
  items?: FieldItems;
}

export type FieldSchema = FieldSpec[];

export const fieldSpecSchema: z.ZodType<FieldSpec> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    type: fieldTypeSchema,
    required: z.boolean(),
    description: z.string().optional(),
    fields: z.array(fieldSpecSchema).optional(),
    items: z
      .object({
        type: fieldTypeSchema,
        fields: z.array(fieldSpecSchema).optional()
      })
      .optional()
  })
);

export const fieldSchemaSchema = z.array(fieldSpecSchema);

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'HEAD'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export const modelConfigSchema = z.object({
  model: z.string().trim().min(1)
});

export type ModelConfig = z.infer<typeof modelConfigSchema>;

export const namespaceDescriptorSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional()
});

export type NamespaceDescriptor = z.infer<typeof namespaceDescriptorSchema>;

export type DocumentMetadata = Record<string, unknown>;

export interface OperationDocument {
  id: string;
  namespace: string;
  method: string;
  url: string;
  description: string;
  parameters: FieldSchema;
  body: FieldSchema;
  response: unknown;
}

export const operationKey = (method: string, url: string): string => `${method.toUpperCase()}_${url}`;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseMaybeJson = (value: unknown): unknown => {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    return null;
  }
};

const toFieldType = (value: unknown): FieldType => {
  if (typeof value === 'string') {
    const parsed = fieldTypeSchema.safeParse(value.trim().toLowerCase());
    return parsed.success ? parsed.data : 'string';
  }
  return 'string';
};

const resolveDeclaredType = (definition: Record<string, unknown>): FieldType => {
  const anyOf = definition.anyOf ?? definition.oneOf;
  if (Array.isArray(anyOf)) {
    for (const option of anyOf) {
      if (isRecord(option) && option.type !== 'null') {
        return toFieldType(option.type);
      }
    }
  }
  if (Array.isArray(definition.type)) {
    const firstNonNull = definition.type.find((entry) => entry !== 'null');
    return toFieldType(firstNonNull);
  }
  if (definition.type === undefined && (isRecord(definition.properties) || Array.isArray(definition.properties))) {
    return 'object';
  }
  return toFieldType(definition.type);
};

const nestedFields = (definition: Record<string, unknown>): FieldSchema | undefined => {
  const container = definition.properties ?? definition.fields;
  if (container === undefined) {
    return undefined;
  }
  const requiredNames = Array.isArray(definition.required)
    ? definition.required.filter((entry): entry is string => typeof entry === 'string')
    : null;
  return normalizeContainer(container, requiredNames);
};

const normalizeItems = (value: unknown): FieldItems | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }
  const type = resolveDeclaredType(value);
  const fields = type === 'object' ? nestedFields(value) : undefined;
  return fields ? { type, fields } : { type };
};

const normalizeField = (raw: Record<string, unknown>, fallbackName?: string, requiredNames?: string[] | null): FieldSpec | null => {
  const nameSource = raw.name ?? raw.key ?? fallbackName;
  if (typeof nameSource !== 'string' || nameSource.trim().length === 0) {
    return null;
  }
  const name = nameSource.trim();
  const definition = isRecord(raw.schema) ? raw.schema : raw;
  const type = resolveDeclaredType(definition);

  let required: boolean;
  if (typeof raw.required === 'boolean') {
    required = raw.required;
  } else if (requiredNames) {
    required = requiredNames.includes(name);
  } else {
    required = true;
  }

  const field: FieldSpec = { name, type, required };
  if (typeof raw.description === 'string' && raw.description.trim().length > 0) {
    field.description = raw.description.trim();
  }

  if (type === 'object') {
    const fields = nestedFields(definition) ?? nestedFields(raw);
    if (fields && fields.length > 0) {
      field.fields = fields;
    }
  }

  if (type === 'array') {
    const items = normalizeItems(definition.items ?? raw.items);
    if (items) {
      field.items = items;
    }
  }

  return field;
};

function normalizeContainer(container: unknown, requiredNames: string[] | null): FieldSchema {
  if (Array.isArray(container)) {
    const fields: FieldSchema = [];
    for (const entry of container) {
      if (!isRecord(entry)) {
        continue;
      }
      const field = normalizeField(entry, undefined, requiredNames);
      if (field) {
        fields.push(field);
      }
    }
    return fields;
  }
  if (isRecord(container)) {
    const fields: FieldSchema = [];
    for (const [name, definition] of Object.entries(container)) {
      if (!isRecord(definition)) {
        continue;
      }
      const field = normalizeField(definition, name, requiredNames ?? []);
      if (field) {
        fields.push(field);
      }
    }
    return fields;
  }
  return [];
}

/**
 * Accepts the field-list shapes produced by catalog ingestion (`key` or `name`,
 * nested `schema`/`properties`/`fields`, JSON-encoded strings) as well as plain
 * JSON Schema objects, and returns the canonical field list.
 */
export function normalizeFieldSchema(raw: unknown): FieldSchema {
  const value = parseMaybeJson(raw);
  if (Array.isArray(value)) {
    return normalizeContainer(value, null);
  }
  if (isRecord(value)) {
    if (value.type === 'object' || isRecord(value.properties)) {
      return nestedFields(value) ?? [];
    }
    return normalizeContainer(value, []);
  }
  return [];
}

export function toOperationDocument(id: string, namespace: string, payload: DocumentMetadata): OperationDocument {
  const method = typeof payload.method === 'string' ? payload.method.trim().toUpperCase() : '';
  const url = typeof payload.url === 'string' ? payload.url.trim() : '';
  const description = typeof payload.description === 'string' ? payload.description : '';
  return {
    id,
    namespace,
    method,
    url,
    description,
    parameters: normalizeFieldSchema(payload.parameters),
    body: normalizeFieldSchema(payload.body),
    response: parseMaybeJson(payload.response) ?? null
  };
}
