import { describe, expect, it, vi } from 'vitest';
import { ApiError, LocalError, NetworkError, RateLimitError } from './errors.js';
import { requestJson, type JsonRequest } from './http.js';

function createRequest(fetch: JsonRequest['fetch'], overrides: Partial<JsonRequest> = {}): JsonRequest {
  return {
    method: 'GET',
    url: 'https://vendor.test/tasks/1',
    headers: { Authorization: 'Bearer test-token' },
    provider: 'Vendor',
    fetch,
    timeoutMs: 1000,
    ...overrides,
  };
}

describe('requestJson', () => {
  it('decodes a vendor envelope whatever the status', async () => {
    const fetch = vi.fn(async () => new Response('{"code":1001,"message":"bad"}', { status: 400 }));
    await expect(requestJson(createRequest(fetch))).resolves.toEqual({
      status: 400,
      payload: { code: 1001, message: 'bad' },
    });
  });

  it('sends method, headers and body', async () => {
    const fetch = vi.fn(async (_url: string, _init?: RequestInit) => new Response('{}'));
    await requestJson(createRequest(fetch, { method: 'POST', body: '{"prompt":"p"}' }));

    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe('https://vendor.test/tasks/1');
    expect(init).toMatchObject({
      method: 'POST',
      headers: { Authorization: 'Bearer test-token' },
      body: '{"prompt":"p"}',
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('maps a non-JSON 429 to RateLimitError', async () => {
    const fetch = vi.fn(async () => new Response('slow down', { status: 429 }));
    await expect(requestJson(createRequest(fetch))).rejects.toThrow(RateLimitError);
  });

  it('maps a non-JSON error status to ApiError on that status', async () => {
    const fetch = vi.fn(async () => new Response('  gateway timeout  ', { status: 504 }));
    const error = await requestJson(createRequest(fetch)).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ apiCode: 504, apiMessage: 'gateway timeout', message: '[Vendor] API error 504: gateway timeout' });
  });

  it('maps a JSON error body without a vendor code to ApiError on the status', async () => {
    const fetch = vi.fn(async () => new Response('{"error":"upstream overloaded"}', { status: 503 }));
    const error = await requestJson(createRequest(fetch)).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ apiCode: 503, apiMessage: '{"error":"upstream overloaded"}', retryable: true });
  });

  it('maps a JSON 429 without a vendor code to RateLimitError', async () => {
    const fetch = vi.fn(async () => new Response('{"error":"too many requests"}', { status: 429 }));
    await expect(requestJson(createRequest(fetch))).rejects.toThrow(RateLimitError);
  });

  it('maps a non-JSON success to a decoding error', async () => {
    const fetch = vi.fn(async () => new Response('<html>', { status: 200 }));
    const error = await requestJson(createRequest(fetch)).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(LocalError);
    expect(error).toMatchObject({ code: 'S012' });
  });

  it('wraps transport failures', async () => {
    const fetch = vi.fn(async (): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const error = await requestJson(createRequest(fetch)).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ message: 'failed to make request: fetch failed', provider: 'Vendor' });
  });

  it('rethrows the caller abort reason untouched', async () => {
    const reason = new Error('caller cancelled');
    const fetch = vi.fn(async (_url: string, init?: RequestInit): Promise<Response> => {
      throw init?.signal?.reason;
    });
    await expect(requestJson(createRequest(fetch, { signal: AbortSignal.abort(reason) }))).rejects.toBe(reason);
  });

  it('treats its own transport timeout as a network failure', async () => {
    const fetch = vi.fn(
      (_url: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason), { once: true });
        }),
    );
    const error = await requestJson(createRequest(fetch, { timeoutMs: 10 })).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ message: 'failed to make request: operation timed out after 10ms' });
  });
});
