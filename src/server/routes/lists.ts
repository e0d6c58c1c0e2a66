import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { createApiKeyGuard } from '../auth.js';

const LIST_NAME_REGEX = /^[a-zA-Z0-9_.-]{1,64}$/;

const ListParamsSchema = z.object({
  name: z.string().regex(LIST_NAME_REGEX, 'Invalid list name'),
});

const ListBodySchema = z.string({ invalid_type_error: 'Filter list must be sent as text/plain' });

const FilteringBodySchema = z.object({
  enabled: z.boolean(),
});

const listRoutes: FastifyPluginAsync = async (fastify) => {
  const { filterEngine: engine, config } = fastify;
  const requireApiKey = createApiKeyGuard(config.server.api_key);

  fastify.get('/api/lists', async () => {
    return { lists: engine.getFilterLists() };
  });

  fastify.put('/api/lists/:name', { onRequest: requireApiKey }, async (request, reply) => {
    const { name } = ListParamsSchema.parse(request.params);
    const text = ListBodySchema.parse(request.body);

    const result = engine.loadFilterList(name, text);
    return reply.code(201).send(result);
  });

  fastify.post('/api/lists/default', { onRequest: requireApiKey }, async (_request, reply) => {
    return reply.code(201).send(engine.loadDefaultFilterList());
  });

  fastify.delete('/api/lists/:name', { onRequest: requireApiKey }, async (request, reply) => {
    const { name } = ListParamsSchema.parse(request.params);

    if (!engine.removeFilterList(name)) {
      return reply.code(404).send({ error: 'Filter list not found' });
    }
    return reply.code(204).send();
  });

  fastify.get('/api/filtering', async () => {
    return { enabled: engine.isFilteringEnabled() };
  });

  fastify.put('/api/filtering', { onRequest: requireApiKey }, async (request) => {
    const { enabled } = FilteringBodySchema.parse(request.body);
    engine.setFilteringEnabled(enabled);
    return { enabled: engine.isFilteringEnabled() };
  });
};

export default listRoutes;
