import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { MockAgent, type Dispatcher } from 'undici';
import { gzipSync } from 'zlib';
import {
  HttpClientHandler,
  HttpTransport,
  ResponseTooLargeError,
  RetryPolicy,
  hardenHandler,
  policyMiddleware,
  type Middleware,
} from '../../src/index.js';

const ORIGIN = 'https://op.example.test';

class MockedHandler extends HttpClientHandler {
  constructor(private readonly agent: MockAgent) {
    super();
  }

  override getDispatcher(): Dispatcher {
    return this.agent;
  }
}

function lowerCaseKeys(headers: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.entries(headers).map(([k, v]) => [k.toLowerCase(), v]));
}

describe('HttpTransport', () => {
  let agent: MockAgent;
  let handler: MockedHandler;

  function createTransport(additionalHandlers: Middleware[] = []): HttpTransport {
    return new HttpTransport({
      name: 'test',
      primaryHandler: handler,
      additionalHandlers,
      userAgent: 'test-agent/1.0',
    });
  }

  /** Intercepts one GET on `path` and records the request headers it was sent with */
  function captureGet(path: string): Record<string, string> {
    const seen: Record<string, string> = {};
    agent
      .get(ORIGIN)
      .intercept({
        path,
        method: 'GET',
        headers: (headers) => {
          Object.assign(seen, lowerCaseKeys(headers));
          return true;
        },
      })
      .reply(200, 'ok', { headers: { 'content-type': 'text/plain' } });
    return seen;
  }

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    handler = new MockedHandler(agent);
  });

  afterEach(async () => {
    await agent.close();
  });

  describe('headers', () => {
    it('sends the user agent', async () => {
      const seen = captureGet('/ua');

      const response = await createTransport().get(`${ORIGIN}/ua`);

      expect(response.statusCode).toBe(200);
      expect(response.body).toBe('ok');
      expect(seen['user-agent']).toBe('test-agent/1.0');
    });

    it('advertises compression while automatic decompression is on', async () => {
      const seen = captureGet('/compressed');

      await createTransport().get(`${ORIGIN}/compressed`);

      expect(seen['accept-encoding']).toBe('gzip, deflate, br');
    });

    it('does not advertise compression once hardened', async () => {
      hardenHandler(handler);
      const seen = captureGet('/plain');

      await createTransport().get(`${ORIGIN}/plain`);

      expect(seen['user-agent']).toBe('test-agent/1.0');
      expect('accept-encoding' in seen).toBe(false);
    });

    it('sends the default headers of the transport', async () => {
      const seen = captureGet('/defaults');
      const transport = createTransport();
      transport.defaultHeaders['x-request-source'] = 'tests';

      await transport.get(`${ORIGIN}/defaults`);

      expect(seen['x-request-source']).toBe('tests');
    });
  });

  describe('responses', () => {
    it('parses JSON bodies', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/json', method: 'GET' })
        .reply(200, JSON.stringify({ issuer: ORIGIN }), {
          headers: { 'content-type': 'application/json' },
        });

      const response = await createTransport().get(`${ORIGIN}/json`);

      expect(response.body).toEqual({ issuer: ORIGIN });
    });

    it('decodes gzip responses even when compression was not advertised', async () => {
      hardenHandler(handler);
      agent
        .get(ORIGIN)
        .intercept({ path: '/gzip', method: 'GET' })
        .reply(200, gzipSync(JSON.stringify({ keys: [] })), {
          headers: { 'content-type': 'application/json', 'content-encoding': 'gzip' },
        });

      const response = await createTransport().get(`${ORIGIN}/gzip`);

      expect(response.body).toEqual({ keys: [] });
    });

    it('rejects bodies larger than the buffer limit', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/large', method: 'GET' })
        .reply(200, 'x'.repeat(20), { headers: { 'content-type': 'text/plain' } });
      const transport = createTransport();
      transport.maxResponseContentBufferSize = 10;

      await expect(transport.get(`${ORIGIN}/large`)).rejects.toBeInstanceOf(
        ResponseTooLargeError,
      );
    });

    it('rejects compressed bodies that expand beyond the buffer limit', async () => {
      const compressed = gzipSync(Buffer.alloc(1000));
      agent
        .get(ORIGIN)
        .intercept({ path: '/bomb', method: 'GET' })
        .reply(200, compressed, {
          headers: { 'content-type': 'application/octet-stream', 'content-encoding': 'gzip' },
        });
      const transport = createTransport();
      transport.maxResponseContentBufferSize = 100;

      expect(compressed.length).toBeLessThan(100);
      await expect(transport.get(`${ORIGIN}/bomb`)).rejects.toBeInstanceOf(ResponseTooLargeError);
    });
  });

  describe('requests', () => {
    it('serializes objects as JSON', async () => {
      let sentBody = '';
      let sentHeaders: Record<string, string> = {};
      agent
        .get(ORIGIN)
        .intercept({
          path: '/token',
          method: 'POST',
          body: (body) => {
            sentBody = body;
            return true;
          },
          headers: (headers) => {
            sentHeaders = lowerCaseKeys(headers);
            return true;
          },
        })
        .reply(200, '', { headers: { 'content-type': 'application/json' } });

      const response = await createTransport().post(`${ORIGIN}/token`, { grant_type: 'test' });

      expect(sentBody).toBe('{"grant_type":"test"}');
      expect(sentHeaders['content-type']).toBe('application/json');
      expect(response.body).toBeNull();
    });

    it('sends form bodies as application/x-www-form-urlencoded', async () => {
      let sentBody = '';
      let sentHeaders: Record<string, string> = {};
      agent
        .get(ORIGIN)
        .intercept({
          path: '/form',
          method: 'POST',
          body: (body) => {
            sentBody = body;
            return true;
          },
          headers: (headers) => {
            sentHeaders = lowerCaseKeys(headers);
            return true;
          },
        })
        .reply(200, 'done', { headers: { 'content-type': 'text/plain' } });

      await createTransport().post(
        `${ORIGIN}/form`,
        new URLSearchParams({ client_id: 'client-1', scope: 'openid' }),
      );

      expect(sentBody).toBe('client_id=client-1&scope=openid');
      expect(sentHeaders['content-type']).toBe('application/x-www-form-urlencoded');
    });
  });

  describe('cookies', () => {
    function replyWithCookie(): void {
      agent
        .get(ORIGIN)
        .intercept({ path: '/login', method: 'GET' })
        .reply(200, 'ok', {
          headers: { 'content-type': 'text/plain', 'set-cookie': 'sid=abc123; Path=/; HttpOnly' },
        });
    }

    it('replays cookies to the same origin', async () => {
      replyWithCookie();
      const transport = createTransport();

      await transport.get(`${ORIGIN}/login`);
      const seen = captureGet('/next');
      await transport.get(`${ORIGIN}/next`);

      expect(handler.cookies.get(ORIGIN)?.get('sid')).toBe('abc123');
      expect(seen['cookie']).toBe('sid=abc123');
    });

    it('neither stores nor sends cookies once hardened', async () => {
      hardenHandler(handler);
      replyWithCookie();
      const transport = createTransport();

      await transport.get(`${ORIGIN}/login`);
      const seen = captureGet('/next');
      await transport.get(`${ORIGIN}/next`);

      expect(handler.cookies.size).toBe(0);
      expect('cookie' in seen).toBe(false);
    });
  });

  describe('policies', () => {
    it('replays a request through an error policy', async () => {
      const pool = agent.get(ORIGIN);
      pool.intercept({ path: '/flaky', method: 'GET' }).reply(503, '');
      pool
        .intercept({ path: '/flaky', method: 'GET' })
        .reply(200, JSON.stringify({ ok: true }), {
          headers: { 'content-type': 'application/json' },
        });

      const attempts: number[] = [];
      const observer: Middleware = async (context, next) => {
        const response = await next();
        attempts.push(context.attempt);
        return response;
      };
      const policy = new RetryPolicy({ baseDelayMs: 0, maxDelayMs: 0, jitterPercent: 0 });

      const response = await createTransport([policyMiddleware(policy), observer]).get(
        `${ORIGIN}/flaky`,
      );

      expect(response.statusCode).toBe(200);
      expect(response.body).toEqual({ ok: true });
      expect(attempts).toEqual([1, 2]);
      agent.assertNoPendingInterceptors();
    });
  });

  describe('timeout', () => {
    it('bounds the whole request across replays', async () => {
      agent.get(ORIGIN).intercept({ path: '/slow', method: 'GET' }).reply(503, '').persist();

      const attempts: number[] = [];
      const signals = new Set<AbortSignal>();
      const slow: Middleware = async (context, next) => {
        attempts.push(context.attempt);
        signals.add(context.signal);
        await new Promise((resolve) => setTimeout(resolve, 60));
        return next();
      };
      const policy = new RetryPolicy({
        maxRetries: 10,
        baseDelayMs: 0,
        maxDelayMs: 0,
        jitterPercent: 0,
      });
      const transport = createTransport([policyMiddleware(policy), slow]);
      transport.timeoutMs = 100;

      const error = await transport.get(`${ORIGIN}/slow`).catch((e: unknown) => e);

      expect(error).toMatchObject({ name: 'TimeoutError' });
      expect(attempts).toEqual([1, 2]);
      expect(signals.size).toBe(1);
    });

    it('starts a fresh timeout for each request', async () => {
      const pool = agent.get(ORIGIN);
      pool.intercept({ path: '/a', method: 'GET' }).reply(200, '');
      pool.intercept({ path: '/b', method: 'GET' }).reply(200, '');

      const signals: AbortSignal[] = [];
      const recorder: Middleware = (context, next) => {
        signals.push(context.signal);
        return next();
      };
      const transport = createTransport([recorder]);

      await transport.get(`${ORIGIN}/a`);
      await transport.get(`${ORIGIN}/b`);

      expect(signals).toHaveLength(2);
      expect(signals[0]).not.toBe(signals[1]);
      expect(signals[1].aborted).toBe(false);
    });
  });
});
