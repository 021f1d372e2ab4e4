import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CredentialCache } from '../../src/backend/credentials.js';
import { BackendServiceError } from '../../src/backend/errors.js';
import { HttpBackendService } from '../../src/backend/http-backend.js';
import { createTestLogger } from '../helpers/fake-backend.js';

const TENANTS = [{ name: 'acme', clientId: 'acme-client', clientSecretEnv: 'ACME_SECRET' }];
const MODEL = { uuid: '5d1f0c1e-8a7b-4c3d-9e2f-0a1b2c3d4e5f', name: 'Hex nut M6', state: 'ready' };

function json(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' }, ...init });
}

function tokenResponse(token = 'test-token', expiresIn = 3600): Response {
  return json({ access_token: token, expires_in: expiresIn, token_type: 'Bearer' });
}

describe('HttpBackendService', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function createBackend(credentials?: CredentialCache): HttpBackendService {
    return new HttpBackendService({
      apiUrl: 'http://api.test/v2',
      authUrl: 'http://auth.test/oauth2/token',
      timeoutMs: 2000,
      tenants: TENANTS,
      logger: createTestLogger().logger,
      env: { ACME_SECRET: 'test-secret' },
      credentials,
    });
  }

  function requestAt(index: number): { url: string; init: RequestInit | undefined } {
    const call = fetchMock.mock.calls[index];
    return { url: String(call?.[0]), init: call?.[1] };
  }

  it('signs in with client credentials', async () => {
    fetchMock.mockResolvedValueOnce(tokenResponse());
    await createBackend().establishSession('acme');

    const { url, init } = requestAt(0);
    expect(url).toBe('http://auth.test/oauth2/token');
    expect(init?.method).toBe('POST');
    expect(new Headers(init?.headers).get('Content-Type')).toBe('application/x-www-form-urlencoded');
    expect(init?.body).toBe(
      'grant_type=client_credentials&client_id=acme-client&client_secret=test-secret&scope=tenant%3Aacme'
    );
  });

  it('lists folders with the session token', async () => {
    fetchMock.mockResolvedValueOnce(tokenResponse()).mockResolvedValueOnce(json({ folders: [{ id: 1, name: 'Brackets' }] }));
    const backend = createBackend();
    await backend.establishSession('acme');

    await expect(backend.listFolders()).resolves.toEqual([{ id: 1, name: 'Brackets' }]);

    const { url, init } = requestAt(1);
    const headers = new Headers(init?.headers);
    expect(url).toBe('http://api.test/v2/folders');
    expect(init?.method).toBe('GET');
    expect(headers.get('Authorization')).toBe('Bearer test-token');
    expect(headers.get('X-Tenant-Id')).toBe('acme');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('sends folder ids sorted and the search query encoded', async () => {
    fetchMock
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(json({ models: [MODEL] }))
      .mockResolvedValueOnce(json({ models: [] }));
    const backend = createBackend();
    await backend.establishSession('acme');

    await expect(backend.listModels(new Set([10, 2, 1]))).resolves.toEqual([MODEL]);
    await expect(backend.submitSearch('hex nut')).resolves.toEqual([]);

    expect(requestAt(1).url).toBe('http://api.test/v2/models?folderIds=1%2C2%2C10');
    expect(requestAt(2).url).toBe('http://api.test/v2/search?q=hex+nut');
  });

  it('signs in again on every session and uses the newest token', async () => {
    fetchMock
      .mockResolvedValueOnce(tokenResponse('first-token'))
      .mockResolvedValueOnce(tokenResponse('second-token'))
      .mockResolvedValueOnce(json({ folders: [] }));
    const backend = createBackend();

    await backend.establishSession('acme');
    await backend.establishSession('acme');
    await backend.listFolders();

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(requestAt(0).url).toBe('http://auth.test/oauth2/token');
    expect(requestAt(1).url).toBe('http://auth.test/oauth2/token');
    expect(new Headers(requestAt(2).init?.headers).get('Authorization')).toBe('Bearer second-token');
  });

  it('drops the cached token before signing in again', async () => {
    const credentials = new CredentialCache();
    fetchMock
      .mockResolvedValueOnce(tokenResponse('first-token'))
      .mockResolvedValueOnce(new Response('nope', { status: 401, statusText: 'Unauthorized' }));
    const backend = createBackend(credentials);

    await backend.establishSession('acme');
    expect(credentials.get('acme')).toBe('first-token');

    await expect(backend.establishSession('acme')).rejects.toBeInstanceOf(BackendServiceError);
    expect(credentials.get('acme')).toBeNull();
  });

  it('requires a session before listing', async () => {
    await expect(createBackend().listFolders()).rejects.toThrow('No active session; pick a tenant first');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects unknown tenants and missing secrets', async () => {
    const backend = createBackend();
    await expect(backend.establishSession('nope')).rejects.toThrow("Unknown tenant 'nope'");

    const withoutSecret = new HttpBackendService({
      apiUrl: 'http://api.test/v2',
      authUrl: 'http://auth.test/oauth2/token',
      timeoutMs: 2000,
      tenants: TENANTS,
      logger: createTestLogger().logger,
      env: {},
    });
    await expect(withoutSecret.establishSession('acme')).rejects.toThrow(
      "Environment variable ACME_SECRET is not set for tenant 'acme'"
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('turns HTTP errors into BackendServiceError with the status', async () => {
    fetchMock
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(new Response('down', { status: 503, statusText: 'Service Unavailable' }));
    const backend = createBackend();
    await backend.establishSession('acme');

    const error = await backend.listFolders().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(BackendServiceError);
    if (!(error instanceof BackendServiceError)) return;
    expect(error.message).toBe('HTTP 503 Service Unavailable for /folders');
    expect(error.status).toBe(503);
  });

  it('reports bodies that do not match the expected shape', async () => {
    fetchMock
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(json({ folders: [{ id: 'x', name: 'A' }] }))
      .mockResolvedValueOnce(new Response('not json', { status: 200 }));
    const backend = createBackend();
    await backend.establishSession('acme');

    await expect(backend.listFolders()).rejects.toThrow(
      'Unexpected response from /folders: folders.0.id: Expected number, received string'
    );
    await expect(backend.listFolders()).rejects.toThrow('Invalid JSON from /folders');
  });

  it('reports network failures and timeouts', async () => {
    fetchMock
      .mockResolvedValueOnce(tokenResponse())
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockRejectedValueOnce(Object.assign(new Error('aborted'), { name: 'TimeoutError' }));
    const backend = createBackend();
    await backend.establishSession('acme');

    await expect(backend.listFolders()).rejects.toThrow('Request to /folders failed: fetch failed');
    await expect(backend.listFolders()).rejects.toThrow('Request to /folders timed out after 2000 ms');
  });

  it('rejects a token response without a token', async () => {
    fetchMock.mockResolvedValueOnce(json({ access_token: '', expires_in: 60 }));
    await expect(createBackend().establishSession('acme')).rejects.toThrow(
      'Unexpected response from token endpoint: access_token: String must contain at least 1 character(s)'
    );
  });

  it('signs in again once when the cached token is rejected', async () => {
    fetchMock
      .mockResolvedValueOnce(tokenResponse('test-token-1'))
      .mockResolvedValueOnce(new Response('', { status: 401, statusText: 'Unauthorized' }))
      .mockResolvedValueOnce(tokenResponse('test-token-2'))
      .mockResolvedValueOnce(json({ folders: [] }));
    const backend = createBackend();
    await backend.establishSession('acme');

    await expect(backend.listFolders()).resolves.toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(requestAt(2).url).toBe('http://auth.test/oauth2/token');
    expect(new Headers(requestAt(3).init?.headers).get('Authorization')).toBe('Bearer test-token-2');
  });

  it('refreshes an expired token before a request', async () => {
    let now = 0;
    const credentials = new CredentialCache(() => now);
    fetchMock
      .mockResolvedValueOnce(tokenResponse('test-token-1', 60))
      .mockResolvedValueOnce(tokenResponse('test-token-2', 60))
      .mockResolvedValueOnce(json({ folders: [] }));
    const backend = createBackend(credentials);
    await backend.establishSession('acme');

    // 60 s lifetime minus the 30 s margin.
    now = 30_000;
    await backend.listFolders();

    expect(requestAt(1).url).toBe('http://auth.test/oauth2/token');
    expect(new Headers(requestAt(2).init?.headers).get('Authorization')).toBe('Bearer test-token-2');
  });
});
