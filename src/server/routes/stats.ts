import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { createApiKeyGuard } from '../auth.js';

const ElementsBodySchema = z
  .object({
    count: z.number().int().positive().default(1),
  })
  .default({});

const statsRoutes: FastifyPluginAsync = async (fastify) => {
  const { filterEngine: engine, config } = fastify;
  const requireApiKey = createApiKeyGuard(config.server.api_key);

  fastify.get('/api/stats', async () => {
    return {
      ...engine.getStatistics(),
      filters: engine.getFilterCounts(),
      cache: engine.getCacheStats(),
    };
  });

  fastify.post('/api/stats/elements', async (request) => {
    const { count } = ElementsBodySchema.parse(request.body);
    engine.incrementBlockedElementCount(count);
    return { blockedElements: engine.blockedElementsCount };
  });

  fastify.delete('/api/stats', { onRequest: requireApiKey }, async (_request, reply) => {
    engine.resetStatistics();
    return reply.code(204).send();
  });
};

export default statsRoutes;
