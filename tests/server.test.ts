import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import pino from 'pino';
import { parseConfig } from '../src/config/index.js';
import { ContentFilterEngine } from '../src/filters/index.js';
import { DomainIndex } from '../src/filters/domain-index.js';
import { createServer } from '../src/server/server.js';

const logger = pino({ level: 'silent' });

async function buildApp(
  server: Record<string, unknown> = {},
  engineOptions: ConstructorParameters<typeof ContentFilterEngine>[0] = {}
): Promise<{ app: FastifyInstance; engine: ContentFilterEngine }> {
  const config = parseConfig({ server });
  const engine = new ContentFilterEngine(engineOptions, logger);
  const app = await createServer({ config, engine, logger });
  return { app, engine };
}

function putList(app: FastifyInstance, name: string, text: string, headers: Record<string, string> = {}) {
  return app.inject({
    method: 'PUT',
    url: `/api/lists/${encodeURIComponent(name)}`,
    headers: { 'content-type': 'text/plain', ...headers },
    payload: text,
  });
}

describe('HTTP API', () => {
  let app: FastifyInstance;
  let engine: ContentFilterEngine;

  beforeEach(async () => {
    ({ app, engine } = await buildApp({}, { maxRulesPerList: 10 }));
  });

  afterEach(async () => {
    await app.close();
  });

  it('should report health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok' });
  });

  describe('request decisions', () => {
    beforeEach(() => {
      engine.loadFilterList(
        'test',
        [
          '||ads.test^',
          '@@||ads.test/ok^',
          '||api.test^$xmlhttprequest',
          '||cdn.test/analytics.js$script,redirect=noop.js',
          '||shop.example^$removeparam=utm_source',
        ].join('\n')
      );
    });

    it('should block and count matching requests', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/requests/block',
        payload: { url: 'https://ads.test/x.js', type: 'script' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ blocked: true, filter: '||ads.test^' });
      expect(engine.blockedRequestsCount).toBe(1);
    });

    it('should report the exception that allowed a request', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/requests/block',
        payload: { url: 'https://ads.test/ok/x.js', type: 'script' },
      });

      expect(res.json()).toEqual({
        blocked: false,
        filter: '||ads.test^',
        exception: '@@||ads.test/ok^',
      });
      expect(engine.blockedRequestsCount).toBe(0);
    });

    it('should answer repeated decisions from the cache', async () => {
      const scans = vi.spyOn(DomainIndex.prototype, 'candidates');
      const payload = { url: 'https://ads.test/ok/x.js', type: 'script' };

      try {
        const bodies: unknown[] = [];
        for (let i = 0; i < 3; i++) {
          const res = await app.inject({ method: 'POST', url: '/api/requests/block', payload });
          bodies.push(res.json());
        }

        expect(bodies[2]).toEqual(bodies[0]);
        expect(bodies[2]).toEqual({ blocked: false, filter: '||ads.test^', exception: '@@||ads.test/ok^' });
        expect(scans).toHaveBeenCalledTimes(1);
        expect(engine.getCacheStats().requests).toMatchObject({ hits: 2, misses: 1 });
      } finally {
        scans.mockRestore();
      }
    });

    it('should not count when asked not to', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/requests/block',
        payload: { url: 'https://ads.test/x.js', type: 'script', count: false },
      });

      expect(res.json()).toMatchObject({ blocked: true });
      expect(engine.blockedRequestsCount).toBe(0);
    });

    it('should map request type aliases', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/requests/block',
        payload: { url: 'https://api.test/v1', type: 'xhr' },
      });

      expect(res.json()).toMatchObject({ blocked: true });
    });

    it('should reject a body without url', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/requests/block',
        payload: { type: 'script' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ error: 'Invalid request' });
      expect(res.json().details[0].path).toEqual(['url']);
    });

    it('should return redirect resources', async () => {
      const hit = await app.inject({
        method: 'POST',
        url: '/api/requests/redirect',
        payload: { url: 'https://cdn.test/analytics.js', type: 'script' },
      });
      const miss = await app.inject({
        method: 'POST',
        url: '/api/requests/redirect',
        payload: { url: 'https://cdn.test/app.js', type: 'script' },
      });

      expect(hit.json()).toEqual({ resource: 'noop.js' });
      expect(miss.json()).toEqual({ resource: null });
    });

    it('should return parameters to remove and the cleaned URL', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/requests/remove-params',
        payload: { url: 'https://shop.example/p?utm_source=mail&id=1', type: 'document' },
      });

      expect(res.json()).toEqual({ params: ['utm_source'], url: 'https://shop.example/p?id=1' });
    });
  });

  describe('page rules', () => {
    beforeEach(() => {
      engine.loadFilterList('page', ['example.com##.promo', 'example.com##+js(noop-timers)'].join('\n'));
    });

    it('should return cosmetic selectors for a domain', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/cosmetic?domain=example.com' });

      expect(res.json()).toEqual({ domain: 'example.com', selectors: ['.promo'] });
    });

    it('should return scriptlets for a domain', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/scriptlets?domain=example.com' });

      expect(res.json()).toEqual({ domain: 'example.com', scriptlets: ['+js(noop-timers)'] });
    });

    it('should require a domain', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/cosmetic' });

      expect(res.statusCode).toBe(400);
    });
  });

  describe('filter lists', () => {
    it('should load a list sent as text', async () => {
      const res = await putList(app, 'custom', '||x.test^\n##.ad\n/x$bogus');

      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({
        name: 'custom',
        networkCount: 1,
        cosmeticCount: 1,
        scriptletCount: 0,
        errorCount: 1,
        errors: [{ line: 3, text: '/x$bogus', error: 'Unknown option "bogus"' }],
      });

      const lists = await app.inject({ method: 'GET', url: '/api/lists' });
      expect(lists.json().lists).toHaveLength(1);
      expect(lists.json().lists[0]).toMatchObject({ name: 'custom', networkCount: 1 });
    });

    it('should reject invalid list names', async () => {
      const res = await putList(app, 'bad name', '||x.test^');

      expect(res.statusCode).toBe(400);
    });

    it('should reject JSON bodies', async () => {
      const res = await app.inject({
        method: 'PUT',
        url: '/api/lists/custom',
        payload: { rules: ['||x.test^'] },
      });

      expect(res.statusCode).toBe(400);
      expect(engine.getFilterLists()).toEqual([]);
    });

    it('should answer 422 when a list is rejected', async () => {
      const text = Array.from({ length: 11 }, (_, i) => `||host${i}.test^`).join('\n');
      const res = await putList(app, 'huge', text);

      expect(res.statusCode).toBe(422);
      expect(res.json()).toEqual({
        error: 'Filter list "huge" has 11 rules, limit is 10',
        list: 'huge',
      });
    });

    it('should delete lists', async () => {
      await putList(app, 'custom', '||x.test^');

      const first = await app.inject({ method: 'DELETE', url: '/api/lists/custom' });
      const second = await app.inject({ method: 'DELETE', url: '/api/lists/custom' });

      expect(first.statusCode).toBe(204);
      expect(second.statusCode).toBe(404);
    });

    it('should load the built-in default list', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/lists/default' });

      expect(res.statusCode).toBe(201);
      expect(res.json()).toMatchObject({ name: 'default', errorCount: 0 });
      expect(engine.shouldBlockRequest('https://doubleclick.net/gampad/ads', 'script')).toBe(true);
    });
  });

  describe('filtering switch', () => {
    it('should report and change the enabled state', async () => {
      const initial = await app.inject({ method: 'GET', url: '/api/filtering' });
      expect(initial.json()).toEqual({ enabled: true });

      const res = await app.inject({ method: 'PUT', url: '/api/filtering', payload: { enabled: false } });

      expect(res.json()).toEqual({ enabled: false });
      expect(engine.isFilteringEnabled()).toBe(false);
    });

    it('should reject non-boolean values', async () => {
      const res = await app.inject({ method: 'PUT', url: '/api/filtering', payload: { enabled: 'no' } });

      expect(res.statusCode).toBe(400);
      expect(engine.isFilteringEnabled()).toBe(true);
    });
  });

  describe('statistics', () => {
    it('should report counters and cache state', async () => {
      engine.loadFilterList('test', '||ads.test^');
      await app.inject({
        method: 'POST',
        url: '/api/requests/block',
        payload: { url: 'https://ads.test/x', type: 'image' },
      });

      const res = await app.inject({ method: 'GET', url: '/api/stats' });
      const body = res.json();

      expect(body.blockedRequests).toBe(1);
      expect(body.blockedElements).toBe(0);
      expect(body.filters).toMatchObject({ network: 1, cosmetic: 0, scriptlets: 0 });
      expect(body.cache.requests).toMatchObject({ size: 1, capacity: 1000 });
    });

    it('should add blocked elements', async () => {
      const one = await app.inject({ method: 'POST', url: '/api/stats/elements' });
      const three = await app.inject({ method: 'POST', url: '/api/stats/elements', payload: { count: 3 } });

      expect(one.json()).toEqual({ blockedElements: 1 });
      expect(three.json()).toEqual({ blockedElements: 4 });
    });

    it('should reject non-positive element counts', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/stats/elements', payload: { count: 0 } });

      expect(res.statusCode).toBe(400);
    });

    it('should reset counters', async () => {
      engine.incrementBlockedRequestCount();

      const res = await app.inject({ method: 'DELETE', url: '/api/stats' });

      expect(res.statusCode).toBe(204);
      expect(engine.blockedRequestsCount).toBe(0);
    });
  });
});
