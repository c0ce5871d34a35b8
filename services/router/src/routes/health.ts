import type { FastifyInstance } from 'fastify';

import { MissingCredentialError } from '@switchyard/pipeline';

import type { AppContext } from '../types';

export const registerHealthRoutes = (app: FastifyInstance, ctx: AppContext) => {
  const checkStore = async (): Promise<boolean> => {
    try {
      return await ctx.store.healthCheck();
    } catch (error) {
      app.log.warn({ err: error }, 'Vector store health check failed');
      return false;
    }
  };

  const checkOracle = (): boolean => {
    try {
      ctx.oracle.assertReady(ctx.defaultModel);
      return true;
    } catch (error) {
      if (error instanceof MissingCredentialError) {
        return false;
      }
      throw error;
    }
  };

  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    const { readiness } = ctx;
    readiness.store = await checkStore();
    readiness.oracle = checkOracle();

    const components: Record<string, boolean> = {
      store: readiness.store,
      oracle: readiness.oracle
    };
    ctx.metrics.readinessGauge.set({ component: 'store' }, readiness.store ? 1 : 0);
    ctx.metrics.readinessGauge.set({ component: 'oracle' }, readiness.oracle ? 1 : 0);

    if (!Object.values(components).every(Boolean)) {
      return reply.status(503).send({ status: 'not_ready', components });
    }
    return { status: 'ready', components };
  });

  app.get('/metrics', async (request, reply) => {
    reply.header('Content-Type', ctx.metrics.register.contentType);
    return ctx.metrics.register.metrics();
  });
};
