import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';

import {
  modelConfigSchema,
  runDeepSession,
  serializeEvent,
  type ModelConfig,
  type StepRecordInput,
  type StreamEvent
} from '@switchyard/pipeline';

import { mapErrorToResponse } from '../errors';
import type { AppContext } from '../types';

const headerRecordSchema = z.record(z.unknown());

const resolutionFields = {
  query: z.string().trim().min(1),
  model: modelConfigSchema.optional(),
  rephrase: z.boolean().optional(),
  rephraseInstructions: z.string().nullable().optional()
};

const identifyBodySchema = z.object({
  namespace: z.string().trim().min(1),
  baseUrl: z.string().trim().min(1),
  ...resolutionFields
});

const contextEntrySchema = z.object({
  step: z.string(),
  namespace: z.string(),
  response: z.unknown(),
  reasoning: z.string().default(''),
  guidanceUsed: z.boolean().default(false)
});

const actionBodySchema = identifyBodySchema.extend({
  headers: headerRecordSchema.nullable().optional(),
  context: z.record(contextEntrySchema).nullable().optional(),
  naturalLanguage: z.boolean().optional()
});

const generateStepsBodySchema = z.object({
  namespaces: z.array(z.string().trim().min(1)).min(1),
  query: z.string().trim().min(1),
  model: modelConfigSchema.optional()
});

const deepBodySchema = z.object({
  namespaces: z.array(z.string().trim().min(1)).min(1),
  baseUrls: z.record(z.string()),
  headers: z.record(headerRecordSchema).optional(),
  naturalLanguage: z.boolean().optional(),
  ...resolutionFields
});

const sendError = (reply: FastifyReply, error: unknown) => {
  const mapped = mapErrorToResponse(error);
  if (mapped.statusCode >= 500) {
    reply.log.error({ err: error }, 'Request failed');
  }
  return reply.status(mapped.statusCode).send({ message: mapped.message, code: mapped.code, details: mapped.details });
};

const toContextEntries = (
  context: Record<string, z.infer<typeof contextEntrySchema>> | null | undefined
): Record<string, StepRecordInput> => {
  const entries: Record<string, StepRecordInput> = {};
  for (const [key, entry] of Object.entries(context ?? {})) {
    entries[key] = { ...entry, response: entry.response };
  }
  return entries;
};

const stepOutcome = (event: StreamEvent): string | null => {
  if (event.type !== 'step_complete') {
    return null;
  }
  return 'error' in event.response ? 'no_candidate' : 'executed';
};

export const registerRunRoutes = (app: FastifyInstance, ctx: AppContext) => {
  const modelOrDefault = (model: ModelConfig | undefined): ModelConfig => model ?? ctx.defaultModel;

  app.post('/run/identify-endpoints', async (request, reply) => {
    const parseResult = identifyBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      return sendError(reply, parseResult.error);
    }

    ctx.metrics.sessions.inc({ mode: 'identify' });
    try {
      return await ctx.pipeline.identifyEndpoints({
        ...parseResult.data,
        model: modelOrDefault(parseResult.data.model)
      });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.post('/run/action', async (request, reply) => {
    const parseResult = actionBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      return sendError(reply, parseResult.error);
    }

    const body = parseResult.data;
    ctx.metrics.sessions.inc({ mode: 'action' });
    try {
      return await ctx.pipeline.runAction({
        ...body,
        model: modelOrDefault(body.model),
        context: toContextEntries(body.context)
      });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.post('/run/generate-steps', async (request, reply) => {
    const parseResult = generateStepsBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      return sendError(reply, parseResult.error);
    }

    ctx.metrics.sessions.inc({ mode: 'generate' });
    try {
      return await ctx.pipeline.generateSteps({
        ...parseResult.data,
        model: modelOrDefault(parseResult.data.model)
      });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.post('/run/deep', async (request, reply) => {
    const parseResult = deepBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      return sendError(reply, parseResult.error);
    }

    const body = parseResult.data;
    const stream = runDeepSession(ctx.pipeline, { ...body, model: modelOrDefault(body.model) });

    // Failures before the first event (missing credentials) still get a status code.
    let current: IteratorResult<StreamEvent>;
    try {
      current = await stream.next();
    } catch (error) {
      return sendError(reply, error);
    }

    ctx.metrics.sessions.inc({ mode: 'deep' });
    reply.raw.statusCode = 200;
    // Fastify does not send hook-set headers such as CORS on a hijacked reply.
    for (const [name, value] of Object.entries(reply.getHeaders())) {
      if (value !== undefined) {
        reply.raw.setHeader(name, value);
      }
    }
    reply.raw.setHeader('Content-Type', 'application/x-ndjson; charset=utf-8');
    reply.raw.setHeader('Cache-Control', 'no-cache, no-transform');
    reply.hijack();

    let disconnected = false;
    reply.raw.on('close', () => {
      disconnected = true;
    });

    try {
      while (!current.done) {
        const outcome = stepOutcome(current.value);
        if (outcome) {
          ctx.metrics.steps.inc({ outcome });
        }
        reply.raw.write(serializeEvent(current.value));
        if (disconnected) {
          request.log.info('Client disconnected; abandoning deep session');
          await stream.return(undefined);
          break;
        }
        current = await stream.next();
      }
    } catch (error) {
      request.log.error({ err: error }, 'Deep session failed after streaming started');
    } finally {
      reply.raw.end();
    }

    return reply;
  });
};
