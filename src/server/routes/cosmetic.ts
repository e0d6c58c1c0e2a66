import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

const DomainQuerySchema = z.object({
  domain: z.string().trim().min(1).max(253),
});

const cosmeticRoutes: FastifyPluginAsync = async (fastify) => {
  const { filterEngine: engine } = fastify;

  fastify.get('/api/cosmetic', async (request) => {
    const { domain } = DomainQuerySchema.parse(request.query);
    return { domain, selectors: engine.getCosmeticSelectors(domain) };
  });

  fastify.get('/api/scriptlets', async (request) => {
    const { domain } = DomainQuerySchema.parse(request.query);
    return { domain, scriptlets: engine.getScriptlets(domain) };
  });
};

export default cosmeticRoutes;
