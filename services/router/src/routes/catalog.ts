import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import type { AppContext } from '../types';
import { mapErrorToResponse } from '../errors';

const namespaceParamsSchema = z.object({
  namespace: z.string().trim().min(1)
});

const documentParamsSchema = namespaceParamsSchema.extend({
  documentId: z.string().trim().min(1)
});

const insertDocumentBodySchema = z.object({
  text: z.string().trim().min(1),
  metadata: z.record(z.unknown()).default({})
});

const editDocumentBodySchema = z.object({
  text: z.string().trim().min(1).optional(),
  metadata: z.record(z.unknown())
});

export const registerCatalogRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.post('/catalog/:namespace/documents', async (request, reply) => {
    const params = namespaceParamsSchema.safeParse(request.params);
    const body = insertDocumentBodySchema.safeParse(request.body);
    if (!params.success || !body.success) {
      const mapped = mapErrorToResponse(params.success ? body.error : params.error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
    }

    try {
      const id = await ctx.pipeline.catalog.insertDocument(params.data.namespace, body.data.text, body.data.metadata);
      ctx.metrics.documentsInserted.inc({ namespace: params.data.namespace });
      return reply.status(201).send({ id, namespace: params.data.namespace });
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, code: mapped.code, details: mapped.details });
    }
  });

  app.patch('/catalog/:namespace/documents/:documentId', async (request, reply) => {
    const params = documentParamsSchema.safeParse(request.params);
    const body = editDocumentBodySchema.safeParse(request.body);
    if (!params.success || !body.success) {
      const mapped = mapErrorToResponse(params.success ? body.error : params.error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
    }

    try {
      const id = await ctx.pipeline.catalog.editDocument(
        params.data.namespace,
        params.data.documentId,
        body.data.metadata,
        body.data.text
      );
      return { id, previousId: params.data.documentId, namespace: params.data.namespace };
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, code: mapped.code, details: mapped.details });
    }
  });

  app.get('/catalog/:namespace/documents', async (request, reply) => {
    const params = namespaceParamsSchema.safeParse(request.params);
    if (!params.success) {
      const mapped = mapErrorToResponse(params.error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
    }

    try {
      const documents = await ctx.pipeline.catalog.listDocuments(params.data.namespace);
      return { namespace: params.data.namespace, documents };
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, code: mapped.code, details: mapped.details });
    }
  });
};
