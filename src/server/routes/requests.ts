import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { requestTypeFromString } from '../../models/filter.js';
import { stripQueryParams } from '../../filters/index.js';

const MAX_URL_LENGTH = 8192;

const RequestBodySchema = z.object({
  url: z.string().min(1).max(MAX_URL_LENGTH),
  type: z.string().max(32).default('other').transform(requestTypeFromString),
  origin: z.string().min(1).max(253).optional(),
  // Set to false to query without counting the request as blocked
  count: z.boolean().optional(),
});

const requestRoutes: FastifyPluginAsync = async (fastify) => {
  const { filterEngine: engine } = fastify;

  fastify.post('/api/requests/block', async (request) => {
    const { url, type, origin, count } = RequestBodySchema.parse(request.body);

    const { blocked, filter, exception } = engine.matchRequest(url, type, origin);
    if (blocked && count !== false) {
      engine.incrementBlockedRequestCount();
    }

    return { blocked, filter, exception };
  });

  fastify.post('/api/requests/redirect', async (request) => {
    const { url, type, origin } = RequestBodySchema.parse(request.body);
    return { resource: engine.getRedirectResource(url, type, origin) ?? null };
  });

  fastify.post('/api/requests/remove-params', async (request) => {
    const { url, type, origin } = RequestBodySchema.parse(request.body);
    const params = engine.getRemoveParams(url, type, origin);
    return { params, url: stripQueryParams(url, params) };
  });
};

export default requestRoutes;
