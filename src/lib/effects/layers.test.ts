import { Effect } from 'effect';
import { HttpResponse, http } from 'msw';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { server } from '../../test/setup-msw.js';
import { HttpStatusError } from './errors.js';
import { formatLog, linkAbortSignal, makeConsoleLogger, makeHttpClient, resolveLogLevel } from './layers.js';
import { makeTestHttpClient } from './test-layers.js';

describe('HttpClientService', () => {
  beforeEach(() => {
    delete process.env.ALLOW_REAL_API_CALLS;
  });

  afterEach(() => {
    delete process.env.ALLOW_REAL_API_CALLS;
  });

  it('blocks real HTTP calls in the test environment', () => {
    expect(() => makeHttpClient()).toThrow('Real HTTP calls detected in test environment!');
  });

  it('keeps the guard in place after building a test client', () => {
    makeTestHttpClient();

    expect(process.env.ALLOW_REAL_API_CALLS).toBeUndefined();
    expect(() => makeHttpClient()).toThrow('Real HTTP calls detected in test environment!');
  });

  describe('with ALLOW_REAL_API_CALLS=true', () => {
    beforeEach(() => {
      process.env.ALLOW_REAL_API_CALLS = 'true';
    });

    it('posts JSON and parses the response', async () => {
      server.use(
        http.post('https://node.test/echo', async ({ request }) =>
          HttpResponse.json({ received: await request.json(), type: request.headers.get('content-type') }),
        ),
      );

      const result = await Effect.runPromise(makeHttpClient().post('https://node.test/echo', { a: 1 }));
      expect(result).toEqual({ received: { a: 1 }, type: 'application/json' });
    });

    it('treats an empty body as an empty object', async () => {
      server.use(http.get('https://node.test/empty', () => new HttpResponse(null, { status: 200 })));
      await expect(Effect.runPromise(makeHttpClient().get('https://node.test/empty'))).resolves.toEqual({});
    });

    it('fails with the status and body of error responses', async () => {
      server.use(http.get('https://node.test/broken', () => new HttpResponse('down', { status: 503 })));

      const error = await Effect.runPromise(Effect.flip(makeHttpClient().get('https://node.test/broken')));
      expect(error).toBeInstanceOf(HttpStatusError);
      if (error instanceof HttpStatusError) {
        expect([error.status, error.body, error.retryable]).toEqual([503, 'down', true]);
      }
    });

    it('fails with a NetworkError when the connection drops', async () => {
      server.use(http.get('https://node.test/gone', () => HttpResponse.error()));

      const error = await Effect.runPromise(Effect.flip(makeHttpClient().get('https://node.test/gone')));
      expect(error._tag).toBe('NetworkError');
    });
  });
});

describe('linkAbortSignal', () => {
  it('forwards an abort until unlinked', () => {
    const source = new AbortController();
    const linked = new AbortController();
    const unlink = linkAbortSignal(source.signal, linked);

    source.abort();
    expect(linked.signal.aborted).toBe(true);
    unlink();
  });

  it('stops forwarding once unlinked', () => {
    const source = new AbortController();
    const linked = new AbortController();

    linkAbortSignal(source.signal, linked)();
    source.abort();

    expect(linked.signal.aborted).toBe(false);
  });
});

describe('logger', () => {
  afterEach(() => {
    delete process.env.KADENA_LOG_LEVEL;
  });

  it('resolves the level from the environment', () => {
    process.env.KADENA_LOG_LEVEL = 'DEBUG';
    expect(resolveLogLevel()).toBe('debug');

    process.env.KADENA_LOG_LEVEL = 'loud';
    expect(resolveLogLevel('warn')).toBe('warn');
  });

  it('formats lines with a timestamp and context', () => {
    expect(formatLog('info', 'hello', { a: 1 })).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] INFO: hello \{"a":1\}$/);
    expect(formatLog('warn', 'bare', {})).toMatch(/\] WARN: bare$/);
  });

  it('drops messages below the minimum level', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = makeConsoleLogger('warn');

    await Effect.runPromise(logger.info('quiet'));
    await Effect.runPromise(logger.warn('careful'));

    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining('WARN: careful'));
  });
});
