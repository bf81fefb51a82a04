import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ApiClient } from '../cli/src/lib/client';
import { createLogger } from '../cli/src/utils/logger';
import { HttpError, TransportError } from '../cli/src/utils/error-handler';
import { createFetchMock, FetchMock } from './helpers/fetch.mock';

const logger = createLogger({ logLevel: 'error', componentName: 'test', silent: true });

function rejectOnAbort(init?: RequestInit): Promise<Response> {
  return new Promise((_, reject) => {
    const signal = init?.signal;
    if (signal?.aborted) {
      reject(new Error('aborted'));
      return;
    }
    signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });
}

describe('ApiClient', () => {
  let mock: FetchMock;

  beforeEach(() => {
    mock = createFetchMock();
  });

  function client(overrides: Partial<ConstructorParameters<typeof ApiClient>[0]> = {}): ApiClient {
    return new ApiClient({
      baseUrl: 'https://api.test/',
      token: 'test-secret',
      logger,
      fetchImplementation: mock.fetch,
      ...overrides
    });
  }

  it('sends GET requests with JSON:API headers and the bearer token', async () => {
    mock.pushJson({ data: [] });
    const response = await client().get('/v1/users', new URLSearchParams([['filter[q]', 'ada']]));

    expect(response).toEqual({ status: 200, body: '{"data":[]}' });
    expect(mock.calls).toHaveLength(1);
    expect(mock.calls[0].method).toBe('GET');
    expect(mock.path()).toBe('/v1/users');
    expect(mock.query().get('filter[q]')).toBe('ada');
    expect(mock.calls[0].headers.accept).toBe('application/vnd.api+json');
    expect(mock.calls[0].headers.authorization).toBe('Bearer test-secret');
    expect(mock.calls[0].headers['content-type']).toBeUndefined();
    expect(mock.calls[0].headers['user-agent']).toMatch(/^xbe-cli\//);
  });

  it('omits the authorization header without a token', async () => {
    mock.pushJson({ data: [] });
    await client({ token: undefined }).get('/v1/users');
    expect(mock.calls[0].headers.authorization).toBeUndefined();
  });

  it('sends JSON bodies on POST and PATCH', async () => {
    mock.pushJson({ data: { type: 'tags', id: '1' } }, 201);
    mock.pushJson({ data: { type: 'tags', id: '1' } });
    const body = { data: { type: 'tags', attributes: { name: 'urgent' } } };

    await client().post('/v1/tags', body);
    await client().patch('/v1/tags/1', body);

    expect(mock.calls.map(call => call.method)).toEqual(['POST', 'PATCH']);
    expect(mock.calls[0].body).toEqual(body);
    expect(mock.calls[0].headers['content-type']).toBe('application/vnd.api+json');
    expect(mock.path(1)).toBe('/v1/tags/1');
  });

  it('accepts an empty 204 response to DELETE', async () => {
    mock.pushJson(undefined, 204);
    await expect(client().delete('/v1/tags/1')).resolves.toEqual({ status: 204, body: '' });
  });

  it('raises HttpError with the raw body on non-2xx statuses', async () => {
    mock.pushJson('{"errors":[{"detail":"name is taken"}]}', 422);

    const error = await client()
      .post('/v1/tags', {})
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HttpError);
    if (error instanceof HttpError) {
      expect(error.status).toBe(422);
      expect(error.body).toBe('{"errors":[{"detail":"name is taken"}]}');
      expect(error.message).toBe('POST /v1/tags failed: HTTP 422');
    }
  });

  it('wraps network failures', async () => {
    mock.push(() => {
      throw new Error('connect ECONNREFUSED');
    });
    await expect(client().get('/v1/users')).rejects.toThrow(
      new TransportError('GET /v1/users failed: connect ECONNREFUSED')
    );
  });

  it('times out slow requests', async () => {
    mock.push((_input, init) => rejectOnAbort(init));
    await expect(client({ timeoutMs: 20 }).get('/v1/users')).rejects.toThrow('GET /v1/users timed out after 20ms');
  });

  it('reports an interrupted request as cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    mock.push((_input, init) => rejectOnAbort(init));
    await expect(client({ signal: controller.signal }).get('/v1/users')).rejects.toThrow('GET /v1/users cancelled');
  });

  it('detaches from the interrupt signal once the request settles', async () => {
    const controller = new AbortController();
    const added = vi.spyOn(controller.signal, 'addEventListener');
    const removed = vi.spyOn(controller.signal, 'removeEventListener');
    mock.pushJson({ data: [] });

    await client({ signal: controller.signal }).get('/v1/users');

    expect(added).toHaveBeenCalledTimes(1);
    expect(removed).toHaveBeenCalledTimes(1);
    expect(removed.mock.calls[0][0]).toBe('abort');
    expect(removed.mock.calls[0][1]).toBe(added.mock.calls[0][1]);
  });
});
