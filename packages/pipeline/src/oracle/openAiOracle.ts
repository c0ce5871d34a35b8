import { fetch } from 'undici';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import { MissingCredentialError, OracleError } from '../errors';
import { noopLogger, type PipelineLogger } from '../logger';
import type { ModelConfig } from '../schema';
import type { Oracle, OracleTask } from './types';

const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';
const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
const DEFAULT_TIMEOUT_MS = 120_000;

export type OracleProvider = 'openai' | 'openrouter';

export type OracleCredentials = {
  openai?: string | null;
  openrouter?: string | null;
};

export type OpenAiOracleOptions = {
  credentials: OracleCredentials;
  openAiBaseUrl?: string;
  openRouterBaseUrl?: string;
  timeoutMs?: number;
  referer?: string;
  title?: string;
  temperature?: number;
  fetchImpl?: typeof fetch;
  logger?: PipelineLogger;
};

export type ResolvedModel = {
  provider: OracleProvider;
  modelId: string;
};

/**
 * `openai/gpt-4.1` and bare ids such as `gpt-4.1` go to OpenAI; `openrouter/<id>`
 * goes to OpenRouter as `<id>`; any other vendor prefix (`x-ai/grok-4-fast:free`)
 * is an OpenRouter model id as written.
 */
export function resolveModel(model: ModelConfig): ResolvedModel {
  const id = model.model.trim();
  const slash = id.indexOf('/');
  if (slash === -1) {
    return { provider: 'openai', modelId: id };
  }
  const prefix = id.slice(0, slash).toLowerCase();
  const rest = id.slice(slash + 1);
  if (prefix === 'openai') {
    return { provider: 'openai', modelId: rest };
  }
  if (prefix === 'openrouter') {
    return { provider: 'openrouter', modelId: rest };
  }
  return { provider: 'openrouter', modelId: id };
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.union([
            z.string(),
            z.array(z.object({ type: z.string().optional(), text: z.string().optional() })),
            z.null()
          ])
        })
      })
    )
    .min(1)
});

const providerErrorSchema = z.object({
  error: z.object({ message: z.string() })
});

type ChatCompletion = z.infer<typeof chatCompletionSchema>;

function extractContent(payload: ChatCompletion): string | null {
  for (const choice of payload.choices) {
    const content = choice.message.content;
    if (typeof content === 'string' && content.trim().length > 0) {
      return content.trim();
    }
    if (Array.isArray(content)) {
      for (const entry of content) {
        if (typeof entry.text === 'string' && entry.text.trim().length > 0) {
          return entry.text.trim();
        }
      }
    }
  }
  return null;
}

function stripJsonFences(value: string): string {
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/.exec(value);
  return fenced ? fenced[1] : value;
}

function buildUserPrompt(input: unknown): string {
  return [
    'Input:\n<<<\n' + JSON.stringify(input, null, 2) + '\n>>>',
    'Respond with JSON that satisfies the response schema. Do not include explanatory prose outside the JSON payload.'
  ].join('\n\n');
}

/**
 * Oracle backed by OpenAI-compatible chat completions. OpenAI models receive a
 * JSON schema response format; OpenRouter models receive `json_object` plus the
 * schema in the system prompt, since schema support varies per upstream model.
 * No retries: a failed call fails the session.
 */
export class OpenAiOracle implements Oracle {
  private readonly credentials: OracleCredentials;
  private readonly openAiBaseUrl: string;
  private readonly openRouterBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly referer?: string;
  private readonly title?: string;
  private readonly temperature: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: PipelineLogger;

  constructor(options: OpenAiOracleOptions) {
    this.credentials = options.credentials;
    this.openAiBaseUrl = (options.openAiBaseUrl?.trim() || DEFAULT_OPENAI_BASE_URL).replace(/\/$/, '');
    this.openRouterBaseUrl = (options.openRouterBaseUrl?.trim() || OPENROUTER_BASE_URL).replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : DEFAULT_TIMEOUT_MS;
    this.referer = options.referer;
    this.title = options.title;
    this.temperature = options.temperature ?? 0;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? noopLogger;
  }

  assertReady(model: ModelConfig): void {
    this.apiKeyFor(model);
  }

  async invoke<I, O>(task: OracleTask<I, O>, input: I, model: ModelConfig): Promise<O> {
    const apiKey = this.apiKeyFor(model);
    const { provider, modelId } = resolveModel(model);

    const parsedInput = task.input.safeParse(input);
    if (!parsedInput.success) {
      throw new OracleError(task.name, 'input did not match the task contract', parsedInput.error.issues);
    }

    const outputSchema = zodToJsonSchema(task.output, { target: 'jsonSchema7', $refStrategy: 'none' });
    const headers: Record<string, string> = {
      'content-type': 'application/json',
      accept: 'application/json',
      authorization: `Bearer ${apiKey}`
    };
    let baseUrl = this.openAiBaseUrl;
    let systemPrompt = task.instructions;
    let responseFormat: unknown = {
      type: 'json_schema',
      json_schema: { name: task.name, schema: outputSchema }
    };
    if (provider === 'openrouter') {
      baseUrl = this.openRouterBaseUrl;
      systemPrompt = `${task.instructions}\n- Return only JSON matching this schema:\n${JSON.stringify(outputSchema)}`;
      responseFormat = { type: 'json_object' };
      if (this.referer) {
        headers['HTTP-Referer'] = this.referer;
      }
      if (this.title) {
        headers['X-Title'] = this.title;
      }
    }

    const startedAt = Date.now();
    let response: Awaited<ReturnType<typeof fetch>>;
    try {
      response = await this.fetchImpl(`${baseUrl}/chat/completions`, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model: modelId,
          temperature: this.temperature,
          response_format: responseFormat,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: buildUserPrompt(parsedInput.data) }
          ]
        }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        throw new OracleError(task.name, `request timed out after ${this.timeoutMs}ms`);
      }
      throw new OracleError(task.name, err instanceof Error ? err.message : String(err));
    }

    const payload: unknown = await response.json().catch(() => null);
    if (!response.ok) {
      const parsedError = providerErrorSchema.safeParse(payload);
      const detail = parsedError.success ? parsedError.data.error.message : `status ${response.status}`;
      throw new OracleError(task.name, `${provider} request failed (${response.status}): ${detail}`);
    }

    const completion = chatCompletionSchema.safeParse(payload);
    const content = completion.success ? extractContent(completion.data) : null;
    if (!content) {
      throw new OracleError(task.name, 'response did not include any output text');
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(stripJsonFences(content));
    } catch (err) {
      throw new OracleError(task.name, 'response was not valid JSON', {
        content,
        reason: err instanceof Error ? err.message : String(err)
      });
    }

    const output = task.output.safeParse(decoded);
    if (!output.success) {
      throw new OracleError(task.name, 'response did not match the task contract', output.error.issues);
    }

    this.logger.debug('Oracle task completed', {
      task: task.name,
      provider,
      model: modelId,
      durationMs: Date.now() - startedAt
    });
    return output.data;
  }

  private apiKeyFor(model: ModelConfig): string {
    const { provider } = resolveModel(model);
    const key = provider === 'openai' ? this.credentials.openai : this.credentials.openrouter;
    if (!key || key.trim().length === 0) {
      throw new MissingCredentialError(
        model.model,
        provider === 'openai' ? 'set OPENAI_API_KEY' : 'set OPENROUTER_API_KEY'
      );
    }
    return key.trim();
  }
}
