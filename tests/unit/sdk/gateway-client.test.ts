import { describe, it, expect, beforeEach, vi, afterEach, type MockInstance } from 'vitest';

import { GatewayClient } from '@/sdk/gateway-client.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function mockFetchResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

function mockErrorResponse(code: string, message: string, statusCode: number): Response {
  return mockFetchResponse(
    {
      error: { code, message, statusCode },
      requestId: 'req-1',
      timestamp: '2026-01-01T00:00:00.000Z',
    },
    statusCode,
    'Error'
  );
}

const CAPABILITIES = { list: true, copy: true, rename: true, createDir: true };
const TOKEN = '3f2b8c1e-9a4d-4e6f-8b7a-1c2d3e4f5a6b';
const OTHER_TOKEN = '0a1b2c3d-4e5f-4a6b-9c8d-7e6f5a4b3c2d';

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('GatewayClient', () => {
  let fetchSpy: MockInstance<typeof fetch>;
  let client: GatewayClient;

  beforeEach(() => {
    fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(mockFetchResponse({}));
    client = new GatewayClient({ baseUrl: 'http://localhost:3000/' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ---- Requests ----

  describe('schemes()', () => {
    it('should GET /schemes with the trailing slash stripped from baseUrl', async () => {
      fetchSpy.mockResolvedValueOnce(mockFetchResponse({ schemes: ['fs', 'memory'] }));

      await expect(client.schemes()).resolves.toEqual(['fs', 'memory']);
      expect(fetchSpy).toHaveBeenCalledWith(
        'http://localhost:3000/schemes',
        expect.objectContaining({ method: 'GET' })
      );
    });
  });

  describe('open()', () => {
    it('should POST the scheme and config as JSON', async () => {
      fetchSpy.mockResolvedValueOnce(
        mockFetchResponse({ handle: TOKEN, scheme: 'memory', capabilities: CAPABILITIES }, 201)
      );

      const opened = await client.open('memory', { root: '/tmp' });

      expect(opened).toEqual({ handle: TOKEN, scheme: 'memory', capabilities: CAPABILITIES });
      expect(fetchSpy).toHaveBeenCalledWith(
        'http://localhost:3000/operators',
        expect.objectContaining({
          method: 'POST',
          body: '{"scheme":"memory","config":{"root":"/tmp"}}',
          headers: expect.objectContaining({ 'Content-Type': 'application/json' }),
        })
      );
    });

    it('should send custom headers with every request', async () => {
      const withAuth = new GatewayClient({
        baseUrl: 'http://localhost:3000',
        headers: { Authorization: 'Bearer test-token' },
      });
      fetchSpy.mockResolvedValueOnce(
        mockFetchResponse(
          { handle: OTHER_TOKEN, scheme: 'memory', capabilities: CAPABILITIES },
          201
        )
      );

      await withAuth.open('memory');

      expect(fetchSpy).toHaveBeenCalledWith(
        expect.any(String),
        expect.objectContaining({
          headers: expect.objectContaining({ Authorization: 'Bearer test-token' }),
        })
      );
    });

    it('should rebuild BACKEND_UNKNOWN_SCHEME from the error body', async () => {
      fetchSpy.mockResolvedValueOnce(
        mockErrorResponse('BACKEND_UNKNOWN_SCHEME', 'Unknown storage scheme: bogus', 400)
      );

      await expect(client.open('bogus')).rejects.toMatchObject({
        code: 'BACKEND_UNKNOWN_SCHEME',
        message: 'Unknown storage scheme: bogus',
        statusCode: 400,
      });
    });

    it('should rebuild GATEWAY_CONFIG_KEY_NOT_ALLOWED from the error body', async () => {
      fetchSpy.mockResolvedValueOnce(
        mockErrorResponse(
          'GATEWAY_CONFIG_KEY_NOT_ALLOWED',
          'Configuration key root cannot be set by clients for scheme fs',
          403
        )
      );

      await expect(client.open('fs', { root: '/' })).rejects.toMatchObject({
        code: 'GATEWAY_CONFIG_KEY_NOT_ALLOWED',
        message: 'Configuration key root cannot be set by clients for scheme fs',
        statusCode: 403,
      });
    });

    it('should reject a response that does not match the schema', async () => {
      fetchSpy.mockResolvedValueOnce(
        mockFetchResponse({ handle: 3, scheme: 'memory', capabilities: CAPABILITIES }, 201)
      );

      await expect(client.open('memory')).rejects.toMatchObject({ code: 'STORAGE_IO' });
    });
  });

  describe('objects', () => {
    it('should read raw bytes from the encoded object URL', async () => {
      fetchSpy.mockResolvedValueOnce(new Response('hello world'));

      const content = await client.read(TOKEN, 'my docs/a b.txt');

      expect(content.toString()).toBe('hello world');
      expect(fetchSpy).toHaveBeenCalledWith(
        `http://localhost:3000/operators/${TOKEN}/objects/my%20docs/a%20b.txt`,
        expect.objectContaining({ method: 'GET' })
      );
    });

    it('should PUT strings as text/plain', async () => {
      fetchSpy.mockResolvedValueOnce(new Response(null, { status: 204 }));

      await client.write(TOKEN, 'note.txt', 'hi');

      expect(fetchSpy).toHaveBeenCalledWith(
        `http://localhost:3000/operators/${TOKEN}/objects/note.txt`,
        expect.objectContaining({
          method: 'PUT',
          body: 'hi',
          headers: expect.objectContaining({ 'Content-Type': 'text/plain' }),
        })
      );
    });

    it('should PUT byte arrays as application/octet-stream', async () => {
      fetchSpy.mockResolvedValueOnce(new Response(null, { status: 204 }));
      const bytes = new Uint8Array([1, 2, 3]);

      await client.write(TOKEN, 'blob', bytes);

      expect(fetchSpy).toHaveBeenCalledWith(
        `http://localhost:3000/operators/${TOKEN}/objects/blob`,
        expect.objectContaining({
          body: bytes,
          headers: expect.objectContaining({ 'Content-Type': 'application/octet-stream' }),
        })
      );
    });

    it('should DELETE objects', async () => {
      fetchSpy.mockResolvedValueOnce(new Response(null, { status: 204 }));

      await client.delete(TOKEN, 'old.txt');

      expect(fetchSpy).toHaveBeenCalledWith(
        `http://localhost:3000/operators/${TOKEN}/objects/old.txt`,
        expect.objectContaining({ method: 'DELETE' })
      );
    });

    it('should rebuild STORAGE_NOT_FOUND for a missing object', async () => {
      fetchSpy.mockResolvedValueOnce(
        mockErrorResponse('STORAGE_NOT_FOUND', 'Path not found: missing', 404)
      );

      await expect(client.read(TOKEN, 'missing')).rejects.toMatchObject({
        code: 'STORAGE_NOT_FOUND',
        message: 'Path not found: missing',
      });
    });
  });

  describe('stat() and list()', () => {
    it('should turn lastModified back into a Date', async () => {
      fetchSpy.mockResolvedValueOnce(
        mockFetchResponse({
          mode: 'file',
          contentLength: 11,
          lastModified: '2026-03-01T12:00:00.000Z',
          etag: '"abc"',
        })
      );

      const stat = await client.stat(TOKEN, 'greeting');

      expect(stat).toEqual({
        mode: 'file',
        contentLength: 11,
        lastModified: new Date('2026-03-01T12:00:00.000Z'),
        etag: '"abc"',
      });
    });

    it('should keep the trailing slash of a directory path', async () => {
      fetchSpy.mockResolvedValueOnce(
        mockFetchResponse({
          entries: [
            { path: 'docs/a', metadata: { mode: 'file', contentLength: 1, lastModified: null } },
          ],
        })
      );

      const entries = await client.list(TOKEN, 'docs/');

      expect(entries).toEqual([
        { path: 'docs/a', metadata: { mode: 'file', contentLength: 1, lastModified: null } },
      ]);
      expect(fetchSpy).toHaveBeenCalledWith(
        `http://localhost:3000/operators/${TOKEN}/list/docs/`,
        expect.any(Object)
      );
    });

    it('should list the root with an empty path', async () => {
      fetchSpy.mockResolvedValueOnce(mockFetchResponse({ entries: [] }));

      await expect(client.list(TOKEN)).resolves.toEqual([]);
      expect(fetchSpy).toHaveBeenCalledWith(
        `http://localhost:3000/operators/${TOKEN}/list/`,
        expect.any(Object)
      );
    });
  });

  describe('release()', () => {
    it('should encode the token into the URL', async () => {
      fetchSpy.mockResolvedValueOnce(new Response(null, { status: 204 }));

      await client.release('a/b');

      expect(fetchSpy).toHaveBeenCalledWith(
        'http://localhost:3000/operators/a%2Fb',
        expect.objectContaining({ method: 'DELETE' })
      );
    });

    it('should DELETE the operator', async () => {
      fetchSpy.mockResolvedValueOnce(new Response(null, { status: 204 }));

      await client.release(TOKEN);

      expect(fetchSpy).toHaveBeenCalledWith(
        `http://localhost:3000/operators/${TOKEN}`,
        expect.objectContaining({ method: 'DELETE' })
      );
    });

    it('should rebuild STORAGE_USED_AFTER_RELEASE for a released handle', async () => {
      fetchSpy.mockResolvedValueOnce(
        mockErrorResponse(
          'STORAGE_USED_AFTER_RELEASE',
          'Operator has been released: read on handle 4',
          410
        )
      );

      await expect(client.read(TOKEN, 'x')).rejects.toMatchObject({
        code: 'STORAGE_USED_AFTER_RELEASE',
        statusCode: 410,
      });
    });
  });

  // ---- Failure modes ----

  describe('failures', () => {
    it('should map unknown error codes to INTERNAL_ERROR', async () => {
      fetchSpy.mockResolvedValueOnce(
        mockErrorResponse('FST_ERR_VALIDATION', 'body/scheme Required', 400)
      );

      await expect(client.open('memory')).rejects.toMatchObject({
        code: 'INTERNAL_ERROR',
        message: 'body/scheme Required',
      });
    });

    it('should report a non-JSON error response as STORAGE_IO', async () => {
      fetchSpy.mockResolvedValueOnce(
        new Response('upstream down', { status: 502, statusText: 'Bad Gateway' })
      );

      await expect(client.schemes()).rejects.toMatchObject({
        code: 'STORAGE_IO',
        message: 'Storage I/O failure: gateway returned 502 Bad Gateway',
      });
    });

    it('should abort and report a timeout', async () => {
      const slow = new GatewayClient({ baseUrl: 'http://localhost:3000', timeout: 10 });
      fetchSpy.mockImplementationOnce(
        (_url: unknown, init?: RequestInit) =>
          new Promise((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              reject(new DOMException('This operation was aborted', 'AbortError'));
            });
          })
      );

      await expect(slow.schemes()).rejects.toMatchObject({
        code: 'STORAGE_IO',
        message: 'Storage I/O failure: GET /schemes timed out after 10ms',
      });
    });

    it('should pass network errors through', async () => {
      fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(client.schemes()).rejects.toThrow('fetch failed');
    });
  });
});
