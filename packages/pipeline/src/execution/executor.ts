import { performance } from 'node:perf_hooks';

import { fetch } from 'undici';

import { RemoteCallFailureError } from '../errors';
import type { SchemaExtractor } from '../extraction/schemaExtractor';
import { noopLogger, type PipelineLogger } from '../logger';
import { summarizeResponseTask } from '../oracle/tasks';
import type { Oracle } from '../oracle/types';
import type { ExecutionContext } from '../planning/context';
import type { HttpMethod, ModelConfig, OperationDocument } from '../schema';
import { normalizeHeaders, selectBodyTransport } from './headers';
import { appendSearchParams, buildOperationCommand, type PreparedRequest } from './operationCommand';

export type ExecuteRequest = {
  operation: OperationDocument;
  baseUrl: string;
  query: string;
  model: ModelConfig;
  headers?: Record<string, unknown> | null;
  context?: ExecutionContext | null;
  guidance?: string | null;
  naturalLanguage?: boolean;
};

export type Latencies = {
  remoteCallMs: number;
  orchestrationMs: number;
};

export type ExecutionResult = {
  endpoint: OperationDocument;
  parameters: Record<string, unknown>;
  body: Record<string, unknown>;
  statusCode: number;
  response: unknown;
  latencies: Latencies;
  naturalLanguageResponse?: string;
};

export type RemoteCallObservation = {
  method: HttpMethod;
  durationMs: number;
  statusCode: number | null;
};

export interface ExecutorOptions {
  extractor: SchemaExtractor;
  oracle: Oracle;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  logger?: PipelineLogger;
  onRemoteCall?: (observation: RemoteCallObservation) => void;
}

const roundMs = (value: number): number => Math.round(value * 1000) / 1000;

function decodeBody(method: HttpMethod, text: string): unknown {
  if (method === 'HEAD' || text.trim().length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class Executor {
  private readonly extractor: SchemaExtractor;
  private readonly oracle: Oracle;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number | null;
  private readonly logger: PipelineLogger;
  private readonly onRemoteCall?: (observation: RemoteCallObservation) => void;

  constructor(options: ExecutorOptions) {
    this.extractor = options.extractor;
    this.oracle = options.oracle;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : null;
    this.logger = options.logger ?? noopLogger;
    this.onRemoteCall = options.onRemoteCall;
  }

  async execute(request: ExecuteRequest): Promise<ExecutionResult> {
    const startedAt = performance.now();
    const { operation } = request;
    const command = buildOperationCommand(operation);

    const parameters = await this.extractor.extract({
      schema: operation.parameters,
      schemaType: 'parameters',
      query: request.query,
      context: request.context,
      guidance: request.guidance,
      model: request.model
    });
    const body = await this.extractor.extract({
      schema: operation.body,
      schemaType: 'body',
      query: request.query,
      context: request.context,
      guidance: request.guidance,
      model: request.model
    });

    const issues = command.validate({ parameters, body });
    if (issues.length > 0) {
      this.logger.warn('Extracted arguments do not match the declared types', {
        operation: `${command.method} ${command.path}`,
        issues
      });
    }

    let prepared: PreparedRequest;
    try {
      prepared = command.prepare(request.baseUrl, { parameters, body });
    } catch (err) {
      throw new RemoteCallFailureError(`Invalid target address for ${command.method} ${command.path}`, {
        url: `${request.baseUrl}${command.path}`,
        cause: err
      });
    }

    const headers = normalizeHeaders(request.headers);
    const remoteStartedAt = performance.now();
    const { statusCode, payload } = await this.send(prepared, headers);
    const remoteCallMs = performance.now() - remoteStartedAt;
    const orchestrationMs = performance.now() - startedAt - remoteCallMs;

    const result: ExecutionResult = {
      endpoint: operation,
      parameters,
      body,
      statusCode,
      response: payload,
      latencies: { remoteCallMs: roundMs(remoteCallMs), orchestrationMs: roundMs(orchestrationMs) }
    };

    if (request.naturalLanguage) {
      const summary = await this.oracle.invoke(
        summarizeResponseTask,
        { query: request.query, responseSchema: operation.response, data: payload },
        request.model
      );
      result.naturalLanguageResponse = summary.response;
    }

    return result;
  }

  private async send(
    prepared: PreparedRequest,
    headers: Record<string, string>
  ): Promise<{ statusCode: number; payload: unknown }> {
    const requestHeaders = { ...headers };
    let requestBody: string | undefined;
    if (prepared.body !== null) {
      if (selectBodyTransport(headers) === 'form') {
        requestBody = appendSearchParams(new URLSearchParams(), prepared.body).toString();
      } else {
        requestBody = JSON.stringify(prepared.body);
        if (!Object.keys(requestHeaders).some((name) => name.toLowerCase() === 'content-type')) {
          requestHeaders['content-type'] = 'application/json';
        }
      }
    }

    const startedAt = performance.now();
    let response: Awaited<ReturnType<typeof fetch>>;
    try {
      response = await this.fetchImpl(prepared.url, {
        method: prepared.method,
        headers: requestHeaders,
        body: requestBody,
        signal: this.timeoutMs ? AbortSignal.timeout(this.timeoutMs) : undefined
      });
    } catch (err) {
      this.observe(prepared.method, startedAt, null);
      throw new RemoteCallFailureError(
        `${prepared.method} ${prepared.url} failed: ${err instanceof Error ? err.message : String(err)}`,
        { url: prepared.url, cause: err }
      );
    }

    const text = await response.text();
    this.observe(prepared.method, startedAt, response.status);
    const payload = decodeBody(prepared.method, text);

    if (!response.ok) {
      throw new RemoteCallFailureError(`${prepared.method} ${prepared.url} returned ${response.status}`, {
        url: prepared.url,
        statusCode: response.status,
        details: payload
      });
    }

    this.logger.debug('Remote operation completed', {
      method: prepared.method,
      url: prepared.url,
      statusCode: response.status
    });
    return { statusCode: response.status, payload };
  }

  private observe(method: HttpMethod, startedAt: number, statusCode: number | null): void {
    this.onRemoteCall?.({ method, durationMs: performance.now() - startedAt, statusCode });
  }
}
