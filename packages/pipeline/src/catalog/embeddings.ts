import { fetch } from 'undici';
import { z } from 'zod';

import { SwitchyardError } from '../errors';
import {
  bm25PassageVector,
  bm25QueryVector,
  hashedDenseVector,
  lateInteractionVectors,
  type SparseVector
} from './lexical';

export interface TextEmbedding {
  dense: number[];
  sparse: SparseVector;
  late: number[][];
}

/**
 * Produces the three vector spaces a catalog namespace stores: a pooled dense
 * vector, a sparse lexical vector and one late-interaction vector per token.
 */
export interface Embedder {
  readonly name: string;
  embedPassage(text: string): Promise<TextEmbedding>;
  embedQuery(text: string): Promise<TextEmbedding>;
}

export class LocalEmbedder implements Embedder {
  readonly name = 'local-hashing';

  async embedPassage(text: string): Promise<TextEmbedding> {
    return {
      dense: hashedDenseVector(text),
      sparse: bm25PassageVector(text),
      late: lateInteractionVectors(text)
    };
  }

  async embedQuery(text: string): Promise<TextEmbedding> {
    return {
      dense: hashedDenseVector(text),
      sparse: bm25QueryVector(text),
      late: lateInteractionVectors(text)
    };
  }
}

export type OpenAiEmbedderOptions = {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

const embeddingsResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1)
});

const embeddingsErrorSchema = z.object({
  error: z.object({ message: z.string() })
});

const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Dense vectors come from an OpenAI-compatible embeddings endpoint; the sparse
 * and late-interaction spaces are computed locally.
 */
export class OpenAiEmbedder implements Embedder {
  readonly name: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAiEmbedderOptions) {
    if (!options.apiKey.trim()) {
      throw new SwitchyardError('OpenAiEmbedder requires an API key', 'MISSING_CREDENTIAL');
    }
    this.apiKey = options.apiKey.trim();
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.baseUrl = (options.baseUrl?.trim() || DEFAULT_BASE_URL).replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.name = `openai:${this.model}`;
  }

  async embedPassage(text: string): Promise<TextEmbedding> {
    return {
      dense: await this.embedDense(text),
      sparse: bm25PassageVector(text),
      late: lateInteractionVectors(text)
    };
  }

  async embedQuery(text: string): Promise<TextEmbedding> {
    return {
      dense: await this.embedDense(text),
      sparse: bm25QueryVector(text),
      late: lateInteractionVectors(text)
    };
  }

  private async embedDense(text: string): Promise<number[]> {
    const response = await this.fetchImpl(`${this.baseUrl}/embeddings`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`
      },
      body: JSON.stringify({ model: this.model, input: text }),
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    const payload: unknown = await response.json().catch(() => null);
    if (!response.ok) {
      const parsedError = embeddingsErrorSchema.safeParse(payload);
      const message = parsedError.success ? parsedError.data.error.message : `status ${response.status}`;
      throw new SwitchyardError(`Embedding request failed: ${message}`, 'EMBEDDING_FAILED');
    }

    const parsed = embeddingsResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SwitchyardError('Embedding response did not include a numeric vector', 'EMBEDDING_FAILED');
    }
    return parsed.data.data[0].embedding;
  }
}
