import http from 'node:http';
import type { IncomingMessage } from 'node:http';
import { once } from 'node:events';
import type { AddressInfo } from 'node:net';

import {
  InMemoryVectorStore,
  LocalEmbedder,
  Pipeline,
  ScriptedOracle,
  StaticGuidanceSource,
  StaticNamespaceDirectory,
  type DocumentMetadata,
  type NamespaceDescriptor,
  type PipelineOptions
} from '../src';

export const TEST_MODEL = { model: 'openai/gpt-4.1-mini' };

export const FIXED_NOW = new Date(Date.UTC(2024, 0, 15, 14, 30, 0));

export const TEMPORAL_PREFIX = '[Current date and time: 2024-01-15 14:30:00 UTC (Monday, January 15, 2024)]';

export const issueDocuments: Array<{ text: string; metadata: DocumentMetadata }> = [
  {
    text: 'GET /issues list issues filter by state open closed',
    metadata: {
      method: 'GET',
      url: '/issues',
      description: 'List issues, optionally filtered by state',
      parameters: '[]',
      body: '[]',
      response: '{"type":"array","items":{"type":"object"}}'
    }
  },
  {
    text: 'POST /issues create a new issue with title and body',
    metadata: {
      method: 'POST',
      url: '/issues',
      description: 'Create an issue',
      parameters: '[]',
      body: '[{"key":"title","schema":{"type":"string"},"required":true},{"key":"body","schema":{"type":"string"},"required":false}]',
      response: '{"type":"object"}'
    }
  }
];

export type TestPipeline = {
  pipeline: Pipeline;
  oracle: ScriptedOracle;
  store: InMemoryVectorStore;
};

export function createTestPipeline(
  options: {
    guidance?: Record<string, string>;
    namespaces?: NamespaceDescriptor[];
    unavailableModels?: string[];
  } & Partial<Pick<PipelineOptions, 'maxSteps' | 'enforceNested' | 'filter'>> = {}
): TestPipeline {
  const store = new InMemoryVectorStore();
  const oracle = new ScriptedOracle({ unavailableModels: options.unavailableModels });
  const pipeline = new Pipeline({
    store,
    embedder: new LocalEmbedder(),
    oracle,
    guidance: new StaticGuidanceSource(options.guidance ?? {}),
    namespaces: new StaticNamespaceDirectory(options.namespaces ?? []),
    maxSteps: options.maxSteps,
    enforceNested: options.enforceNested,
    filter: options.filter,
    clock: () => FIXED_NOW
  });
  return { pipeline, oracle, store };
}

export async function seedIssues(pipeline: Pipeline, namespace = 'issues'): Promise<string[]> {
  const ids: string[] = [];
  for (const document of issueDocuments) {
    ids.push(await pipeline.catalog.insertDocument(namespace, document.text, document.metadata));
  }
  return ids;
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export type ServerReply = {
  status?: number;
  body?: string;
  contentType?: string;
};

export type TestServer = {
  baseUrl: string;
  requests: RecordedRequest[];
  close(): Promise<void>;
};

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

export async function startServer(handler: (request: RecordedRequest) => ServerReply): Promise<TestServer> {
  const requests: RecordedRequest[] = [];
  const server = http.createServer(async (req, res) => {
    const recorded: RecordedRequest = {
      method: req.method ?? '',
      url: req.url ?? '',
      headers: req.headers,
      body: await readBody(req)
    };
    requests.push(recorded);
    const reply = handler(recorded);
    res.statusCode = reply.status ?? 200;
    if (reply.body !== undefined) {
      res.setHeader('Content-Type', reply.contentType ?? 'application/json');
    }
    res.end(reply.body);
  });
  server.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const { port } = server.address() as AddressInfo;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    requests,
    close: async () => {
      server.closeAllConnections();
      server.close();
      await once(server, 'close');
    }
  };
}

export const json = (value: unknown, status = 200): ServerReply => ({ status, body: JSON.stringify(value) });
