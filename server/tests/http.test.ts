import { backoffDelay, createHttpClient, joinUrl, snippet, toFailure, type RetryPolicy } from '../src/lib/http';
import { createStubTransport, ok } from './helpers/transport';

const NO_DELAY = { baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 };

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the request to fail');
}

describe('createHttpClient retry policy', () => {
  it('retries a 503 and returns the next successful response', async () => {
    let count = 0;
    const stub = createStubTransport(() => {
      count += 1;
      return count === 1 ? { status: 503, data: 'busy' } : ok({ hello: 'world' });
    });
    const client = createHttpClient({ adapter: stub.adapter, retry: NO_DELAY });

    const res = await client.get('https://upstream.test/resource');

    expect(res.data).toEqual({ hello: 'world' });
    expect(stub.calls).toHaveLength(2);
  });

  it('does not retry a 404', async () => {
    const stub = createStubTransport(() => ({ status: 404, data: 'Not Found' }));
    const client = createHttpClient({ adapter: stub.adapter, retry: NO_DELAY });

    const error = await captureError(client.get('https://upstream.test/missing'));

    expect(stub.calls).toHaveLength(1);
    expect(toFailure(error)).toEqual({ kind: 'http_error', status: 404, message: 'Not Found' });
  });

  it('stops after maxAttempts on repeated timeouts', async () => {
    const stub = createStubTransport(() => ({ timeout: true }));
    const client = createHttpClient({ adapter: stub.adapter, timeoutMs: 20000, retry: { ...NO_DELAY, maxAttempts: 3 } });

    const error = await captureError(client.get('https://upstream.test/slow'));

    expect(stub.calls).toHaveLength(3);
    expect(toFailure(error)).toEqual({
      kind: 'network_error',
      message: 'timeout (timeout of 20000ms exceeded)',
      code: 'ECONNABORTED',
    });
  });

  it('makes a single attempt when maxAttempts is 1', async () => {
    const stub = createStubTransport(() => ({ networkError: true }));
    const client = createHttpClient({ adapter: stub.adapter, retry: { ...NO_DELAY, maxAttempts: 1 } });

    const error = await captureError(client.get('https://upstream.test/down'));

    expect(stub.calls).toHaveLength(1);
    expect(toFailure(error)).toEqual({
      kind: 'network_error',
      message: 'connect ECONNREFUSED 127.0.0.1:443',
      code: 'ECONNREFUSED',
    });
  });

  it('sends the configured User-Agent', async () => {
    let userAgent: unknown;
    const stub = createStubTransport(() => ok('fine'));
    const client = createHttpClient({ adapter: stub.adapter, userAgent: 'lookup-test/0.1' });
    client.interceptors.request.use((config) => {
      userAgent = config.headers.get('User-Agent');
      return config;
    });

    await client.get('https://upstream.test/ua');

    expect(userAgent).toBe('lookup-test/0.1');
  });
});

describe('backoffDelay', () => {
  const policy: RetryPolicy = {
    maxAttempts: 5,
    baseDelayMs: 300,
    maxDelayMs: 1000,
    jitterMs: 0,
    retryableStatuses: [503],
  };

  it('doubles per retry and caps at maxDelayMs', () => {
    expect([1, 2, 3, 4].map((n) => backoffDelay(policy, n))).toEqual([300, 600, 1000, 1000]);
  });
});

describe('http helpers', () => {
  it('joins base and path with a single slash', () => {
    expect(joinUrl('https://dapi.kakao.com/', '/v2/local')).toBe('https://dapi.kakao.com/v2/local');
    expect(joinUrl('https://dapi.kakao.com', 'v2/local')).toBe('https://dapi.kakao.com/v2/local');
  });

  it('collapses whitespace and truncates long bodies', () => {
    expect(snippet('  a\n\n b  ')).toBe('a b');
    expect(snippet('x'.repeat(200))).toHaveLength(160);
    expect(snippet('   ')).toBeUndefined();
  });

  it('treats non-axios errors as network errors', () => {
    expect(toFailure(new Error('socket hang up'))).toEqual({ kind: 'network_error', message: 'socket hang up' });
  });
});
