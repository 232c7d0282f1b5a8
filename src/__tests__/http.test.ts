import { afterEach, describe, expect, it, vi } from 'vitest';
import { request } from '../internal/http.js';
import { ProvisioningAPIError, ProvisioningConnectionError } from '../errors.js';
import { FakeApi, reply } from './fake-api.js';

const BASE_URL = 'https://api.example.test';

describe('request', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends JSON bodies with a bearer token', async () => {
    const api = new FakeApi().on('POST', '/v1/things', reply(200, { data: { ok: true } })).install();

    const body = await request(BASE_URL, {
      method: 'POST',
      path: '/v1/things',
      body: { a: 1 },
      auth: { type: 'bearer', token: 'test-token' },
    });

    expect(body).toEqual({ data: { ok: true } });
    const [call] = api.requests;
    expect(call?.headers.get('authorization')).toBe('Bearer test-token');
    expect(call?.headers.get('content-type')).toBe('application/json');
    expect(call?.headers.get('accept')).toBe('application/json');
    expect(call?.body).toBe('{"a":1}');
  });

  it('returns undefined for 204 responses', async () => {
    new FakeApi().on('DELETE', '/v1/things/1', reply(204)).install();

    await expect(request(BASE_URL, { method: 'DELETE', path: '/v1/things/1' })).resolves.toBeUndefined();
  });

  it('takes the message from an errors array', async () => {
    new FakeApi()
      .on('GET', '/v1/things', reply(400, { errors: [{ message: 'bad region', reason: 'invalid' }] }))
      .install();

    const err = await request(BASE_URL, { method: 'GET', path: '/v1/things' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProvisioningAPIError);
    expect(err).toMatchObject({ statusCode: 400, message: 'API error 400: bad region' });
  });

  it('falls back to the status when the error body is empty', async () => {
    new FakeApi().on('GET', '/v1/things', reply(503)).install();

    const err = await request(BASE_URL, { method: 'GET', path: '/v1/things' }).catch((e: unknown) => e);

    expect(err).toMatchObject({ statusCode: 503, errorMessage: 'HTTP 503' });
  });

  it('wraps network failures', async () => {
    const cause = new TypeError('fetch failed');
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(cause));

    const err = await request(BASE_URL, { method: 'GET', path: '/v1/things' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProvisioningConnectionError);
    expect(err).toMatchObject({ message: `Failed to connect to ${BASE_URL}`, cause });
  });

  it('reports timeouts', async () => {
    const cause = new Error('The operation was aborted due to timeout');
    cause.name = 'TimeoutError';
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(cause));

    const err = await request(BASE_URL, { method: 'GET', path: '/v1/things', timeout: 50 }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(ProvisioningConnectionError);
    expect(err).toMatchObject({ message: 'Request timed out after 50ms' });
  });
});
