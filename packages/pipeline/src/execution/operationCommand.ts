import { z } from 'zod';

import { UnsupportedMethodError } from '../errors';
import { HTTP_METHODS, type FieldItems, type FieldSchema, type FieldSpec, type HttpMethod } from '../schema';

export type OperationArguments = {
  parameters: Record<string, unknown>;
  body: Record<string, unknown>;
};

export type ArgumentIssue = {
  schemaType: 'parameters' | 'body';
  path: string;
  message: string;
};

export type PreparedRequest = {
  method: HttpMethod;
  url: string;
  body: Record<string, unknown> | null;
};

export interface OperationCommand {
  readonly method: HttpMethod;
  readonly path: string;
  validate(args: OperationArguments): ArgumentIssue[];
  prepare(baseUrl: string, args: OperationArguments): PreparedRequest;
}

const METHODS_WITHOUT_BODY: ReadonlySet<HttpMethod> = new Set(['GET', 'DELETE', 'HEAD']);
const PATH_PLACEHOLDER = /\{([^{}]+)\}/g;

export function parseHttpMethod(method: string): HttpMethod {
  const upper = method.trim().toUpperCase();
  const match = HTTP_METHODS.find((candidate) => candidate === upper);
  if (!match) {
    throw new UnsupportedMethodError(method);
  }
  return match;
}

function itemsToZod(items: FieldItems): z.ZodTypeAny {
  return typeToZod(items.type, items.fields);
}

function typeToZod(type: FieldSpec['type'], fields?: FieldSchema, items?: FieldItems): z.ZodTypeAny {
  switch (type) {
    case 'string':
      return z.string();
    case 'integer':
      return z.number().int();
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
    case 'null':
      return z.null();
    case 'array':
      return z.array(items ? itemsToZod(items) : z.unknown());
    case 'object':
      return fields && fields.length > 0 ? fieldSchemaToZod(fields) : z.record(z.unknown());
  }
}

export function fieldSchemaToZod(schema: FieldSchema): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const field of schema) {
    const fieldType = typeToZod(field.type, field.fields, field.items);
    shape[field.name] = field.required ? fieldType : fieldType.optional();
  }
  return z.object(shape).passthrough();
}

export function joinUrl(baseUrl: string, path: string): string {
  if (/^https?:\/\//i.test(path)) {
    return path;
  }
  const base = baseUrl.trim().replace(/\/+$/, '');
  if (!path) {
    return base;
  }
  return path.startsWith('/') ? `${base}${path}` : `${base}/${path}`;
}

const toQueryValue = (value: unknown): string =>
  value !== null && typeof value === 'object' ? JSON.stringify(value) : String(value);

export function appendSearchParams(params: URLSearchParams, values: Record<string, unknown>): URLSearchParams {
  for (const [name, value] of Object.entries(values)) {
    if (value === undefined || value === null) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const entry of value) {
        params.append(name, toQueryValue(entry));
      }
    } else {
      params.append(name, toQueryValue(value));
    }
  }
  return params;
}

/**
 * Builds the dispatcher for one catalog operation. Throws UnsupportedMethodError
 * for verbs outside GET, POST, PUT, DELETE and HEAD.
 */
export function buildOperationCommand(operation: {
  method: string;
  url: string;
  parameters: FieldSchema;
  body: FieldSchema;
}): OperationCommand {
  const method = parseHttpMethod(operation.method);
  const path = operation.url;
  const parameterValidator = fieldSchemaToZod(operation.parameters);
  const bodyValidator = fieldSchemaToZod(operation.body);
  const placeholders = new Set([...path.matchAll(PATH_PLACEHOLDER)].map((match) => match[1]));

  return {
    method,
    path,
    validate(args) {
      const issues: ArgumentIssue[] = [];
      const parameters = parameterValidator.safeParse(args.parameters);
      if (!parameters.success) {
        for (const issue of parameters.error.issues) {
          issues.push({ schemaType: 'parameters', path: issue.path.join('.'), message: issue.message });
        }
      }
      if (!METHODS_WITHOUT_BODY.has(method)) {
        const body = bodyValidator.safeParse(args.body);
        if (!body.success) {
          for (const issue of body.error.issues) {
            issues.push({ schemaType: 'body', path: issue.path.join('.'), message: issue.message });
          }
        }
      }
      return issues;
    },
    prepare(baseUrl, args) {
      const query: Record<string, unknown> = {};
      for (const [name, value] of Object.entries(args.parameters)) {
        if (!placeholders.has(name)) {
          query[name] = value;
        }
      }
      const resolvedPath = path.replace(PATH_PLACEHOLDER, (placeholder, name: string) => {
        const value = args.parameters[name];
        return value === undefined || value === null ? placeholder : encodeURIComponent(toQueryValue(value));
      });

      const url = new URL(joinUrl(baseUrl, resolvedPath));
      appendSearchParams(url.searchParams, query);

      return {
        method,
        url: url.toString(),
        body: METHODS_WITHOUT_BODY.has(method) ? null : args.body
      };
    }
  };
}
