import { timingSafeEqual } from 'crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';

/**
 * Constant-time string comparison to prevent timing attacks
 */
export function safeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

export function hasValidApiKey(request: FastifyRequest, configuredKey: string | undefined): boolean {
  if (!configuredKey) return false;
  const apiKey = request.headers['x-api-key'];
  return typeof apiKey === 'string' && safeCompare(apiKey, configuredKey);
}

/**
 * onRequest hook for mutating routes. Without a configured key every caller
 * is let through.
 */
export function createApiKeyGuard(configuredKey: string | undefined) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    // No API key configured = development mode (allow all)
    if (!configuredKey) return;

    if (!hasValidApiKey(request, configuredKey)) {
      return reply.code(401).send({ error: 'Unauthorized' });
    }
  };
}
