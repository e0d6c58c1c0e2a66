import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { ZodError } from 'zod';
import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import { FilterListError, type ContentFilterEngine } from '../filters/index.js';
import { hasValidApiKey } from './auth.js';

/**
 * Validate CORS origin - must be empty or a valid URL
 */
export function validateCorsOrigin(origin: string | undefined): string | false {
  if (!origin) return false;

  try {
    const url = new URL(origin);
    // Only allow http/https protocols
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }
    return origin;
  } catch {
    return false;
  }
}

export interface ServerDeps {
  config: Config;
  engine: ContentFilterEngine;
  logger: Logger;
}

export async function createServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { config, engine, logger } = deps;
  const apiKey = config.server.api_key;

  const app = Fastify({
    logger: false, // We use our own logger
    bodyLimit: config.server.body_limit_bytes,
  });

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
      },
    },
    // Enable HSTS only in production to avoid issues on non-HTTPS environments
    hsts:
      process.env.NODE_ENV === 'production'
        ? { maxAge: 60 * 60 * 24 * 180, includeSubDomains: true, preload: false }
        : false,
    referrerPolicy: { policy: 'no-referrer' },
  });

  if (!apiKey) {
    logger.warn('No API key configured; list and settings changes are not authenticated');
  }

  await app.register(rateLimit, {
    max: config.server.rate_limit.max,
    timeWindow: config.server.rate_limit.window_ms,
    allowList: (request) => {
      if (hasValidApiKey(request, apiKey)) {
        return true;
      }
      // In development, exclude localhost requests based on connection IP
      if (process.env.NODE_ENV !== 'production') {
        const clientIp = (request.ip || '').replace('::ffff:', '');
        if (clientIp === '127.0.0.1' || clientIp === '::1') {
          return true;
        }
      }
      return false;
    },
  });

  // CORS - restrictive by default, validate origin URL
  await app.register(cors, {
    origin: validateCorsOrigin(config.server.cors_origin),
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
  });

  // Decorate with dependencies
  app.decorate('config', config);
  app.decorate('filterEngine', engine);
  app.decorate('serverLogger', logger);

  // Request logging
  app.addHook('onRequest', async (request) => {
    logger.debug(
      {
        method: request.method,
        url: request.url,
      },
      'Incoming request'
    );
  });

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({ error: 'Invalid request', details: error.issues });
    }

    if (error instanceof FilterListError) {
      logger.warn({ list: error.listName, error: error.message }, 'Filter list rejected');
      return reply.code(422).send({ error: error.message, list: error.listName });
    }

    logger.error(
      {
        err: error,
        method: request.method,
        url: request.url,
      },
      'Request error'
    );

    // Don't expose internal errors to clients
    return reply.code(error.statusCode || 500).send({
      error: error.statusCode ? error.message : 'Internal Server Error',
    });
  });

  // Health check endpoint
  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Register routes
  await app.register(import('./routes/requests.js'));
  await app.register(import('./routes/cosmetic.js'));
  await app.register(import('./routes/lists.js'));
  await app.register(import('./routes/stats.js'));

  return app;
}

// Extend Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    filterEngine: ContentFilterEngine;
    serverLogger: Logger;
  }
}
