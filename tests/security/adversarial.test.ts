// Adversarial security test suite for the storage gateway
//
// Validates security properties across five categories:
// 1. Credential leakage prevention (backend secrets never in responses)
// 2. Path confinement (fs operators cannot escape their root, clients cannot
//    pick roots or endpoints)
// 3. Forged handles (guessed, malformed and unknown operator tokens)
// 4. Malformed input handling (invalid JSON, wrong shapes, oversized strings)
// 5. Production error sanitization (no stack traces, generic messages)

import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { FastifyInstance } from 'fastify';
import pino from 'pino';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';

import { ConfigSchema } from '../../src/config/schema.js';
import type { Config, GatewayBackend } from '../../src/config/schema.js';
import { createServer } from '../../src/server.js';
import { MemoryBackend } from '../../src/storage/memory-backend.js';
import { BackendRegistry } from '../../src/storage/registry.js';
import type { Backend } from '../../src/storage/types.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const TEST_PASSWORD = 'test-secret';
const UNKNOWN_TOKEN = '00000000-0000-4000-8000-000000000000';

function createTestConfig(
  env: Config['env'] = 'test',
  backends?: Record<string, Partial<GatewayBackend>>
): Config {
  return ConfigSchema.parse({
    env,
    logging: { level: 'error', pretty: false },
    rateLimit: { global: 1000, windowMs: 60000, sensitive: 100 },
    ...(backends && { gateway: { backends } }),
  });
}

const FLAKY_BACKENDS = {
  memory: { clientKeys: ['root', 'max_bytes'] },
  flaky: {},
};

/** Registry with a memory scheme and a "flaky" scheme whose reads fail with a chatty driver error */
function createFlakyRegistry(): BackendRegistry {
  return new BackendRegistry({ logger: pino({ level: 'silent' }) })
    .register('memory', (config) => MemoryBackend.fromConfig(config))
    .register('flaky', (): Backend => {
      const memory = new MemoryBackend();
      return {
        info: () => ({
          scheme: 'flaky',
          root: '/',
          capabilities: { list: false, copy: false, rename: false, createDir: false },
        }),
        read: async () => {
          throw new Error(`connect ECONNREFUSED 10.0.0.5:8080 (password=${TEST_PASSWORD})`);
        },
        write: (path, content) => memory.write(path, content),
        delete: (path) => memory.delete(path),
        stat: (path) => memory.stat(path),
        close: () => memory.close(),
      };
    });
}

async function openOperator(
  server: FastifyInstance,
  scheme: string,
  config: Record<string, string> = {}
): Promise<string> {
  const response = await server.inject({
    method: 'POST',
    url: '/operators',
    payload: { scheme, config },
  });
  expect(response.statusCode).toBe(201);
  return response.json().handle;
}

// ===========================================================================
// 1. Credential Leakage Prevention
// ===========================================================================

describe('Credential Leakage Prevention', () => {
  let server: FastifyInstance;

  beforeAll(async () => {
    server = await createServer({
      config: createTestConfig('test', FLAKY_BACKENDS),
      registry: createFlakyRegistry(),
    });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
  });

  it('should not echo a configured password in construction errors', async () => {
    const responses = [
      await server.inject({
        method: 'POST',
        url: '/operators',
        payload: { scheme: 'memory', config: { max_bytes: TEST_PASSWORD } },
      }),
      await server.inject({
        method: 'POST',
        url: '/operators',
        payload: { scheme: 'bogus', config: { password: TEST_PASSWORD } },
      }),
    ];

    for (const res of responses) {
      expect(res.statusCode).toBe(400);
      expect(res.body).not.toContain(TEST_PASSWORD);
    }
  });

  it('should not include backend driver details in I/O failures', async () => {
    const handle = await openOperator(server, 'flaky');

    const response = await server.inject({
      method: 'GET',
      url: `/operators/${handle}/objects/report.csv`,
    });

    expect(response.statusCode).toBe(502);
    expect(response.json().error).toEqual({
      code: 'STORAGE_IO',
      message: 'The storage backend could not complete the request',
      statusCode: 502,
    });
  });
});

// ===========================================================================
// 2. Path Confinement
// ===========================================================================

describe('Path Confinement', () => {
  let server: FastifyInstance;
  let baseDir: string;
  let rootDir: string;

  beforeAll(async () => {
    baseDir = mkdtempSync(join(tmpdir(), 'stowage-security-'));
    rootDir = join(baseDir, 'root');
    writeFileSync(join(baseDir, 'outside.txt'), 'private');

    server = await createServer({
      config: createTestConfig('test', { fs: { config: { root: rootDir } } }),
    });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
    rmSync(baseDir, { recursive: true, force: true });
  });

  it('should refuse writes that resolve outside the fs root', async () => {
    const handle = await openOperator(server, 'fs');

    const response = await server.inject({
      method: 'PUT',
      url: `/operators/${handle}/objects/..%2Fescape.txt`,
      headers: { 'content-type': 'text/plain' },
      payload: 'x',
    });

    expect(response.statusCode).toBe(403);
    expect(response.json().error.code).toBe('STORAGE_PERMISSION_DENIED');
    expect(existsSync(join(baseDir, 'escape.txt'))).toBe(false);
  });

  it('should refuse reads that resolve outside the fs root', async () => {
    const handle = await openOperator(server, 'fs');

    const response = await server.inject({
      method: 'GET',
      url: `/operators/${handle}/objects/..%2Foutside.txt`,
    });

    expect(response.statusCode).toBe(403);
    expect(response.body).not.toContain('private');
  });

  it('should still serve paths inside the root', async () => {
    const handle = await openOperator(server, 'fs');

    await server.inject({
      method: 'PUT',
      url: `/operators/${handle}/objects/inside/ok.txt`,
      headers: { 'content-type': 'text/plain' },
      payload: 'fine',
    });
    const response = await server.inject({
      method: 'GET',
      url: `/operators/${handle}/objects/inside/ok.txt`,
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('fine');
  });

  it('should not let a client move the fs root', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/operators',
      payload: { scheme: 'fs', config: { root: '/' } },
    });

    expect(response.statusCode).toBe(403);
    expect(response.json().error).toMatchObject({
      code: 'GATEWAY_CONFIG_KEY_NOT_ALLOWED',
      message: 'Configuration key root cannot be set by clients for scheme fs',
    });
  });
});

describe('Backend Exposure With Default Config', () => {
  let server: FastifyInstance;

  beforeAll(async () => {
    server = await createServer({ config: createTestConfig() });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
  });

  it.each([
    ['fs', { root: '/' }],
    ['webdav', { endpoint: 'http://169.254.169.254/latest/' }],
    ['redis', { host: '10.0.0.5', port: '6379' }],
  ])('should refuse to open %s for clients', async (scheme, config) => {
    const response = await server.inject({
      method: 'POST',
      url: '/operators',
      payload: { scheme, config },
    });

    expect(response.statusCode).toBe(403);
    expect(response.json().error.code).toBe('GATEWAY_SCHEME_NOT_ALLOWED');
  });
});

// ===========================================================================
// 3. Forged Handles
// ===========================================================================

describe('Forged Handles', () => {
  let server: FastifyInstance;

  beforeAll(async () => {
    server = await createServer({ config: createTestConfig() });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
  });

  it('should answer HANDLE_INVALID for a well-formed token that was never issued', async () => {
    const response = await server.inject({
      method: 'GET',
      url: `/operators/${UNKNOWN_TOKEN}/objects/x`,
    });

    expect(response.statusCode).toBe(404);
    expect(response.json().error.code).toBe('HANDLE_INVALID');
  });

  it.each(['0', '1', '-1', 'abc', '1.5', '99999999999999999999'])(
    'should reject handle %s as malformed',
    async (handle) => {
      const response = await server.inject({
        method: 'GET',
        url: `/operators/${handle}/objects/x`,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('FST_ERR_VALIDATION');
    }
  );

  it('should not reach or release another client operator by counting handles', async () => {
    const victim = await openOperator(server, 'memory');
    await server.inject({
      method: 'PUT',
      url: `/operators/${victim}/objects/secret.txt`,
      headers: { 'content-type': 'text/plain' },
      payload: 'victim data',
    });
    await openOperator(server, 'memory');

    const victimHandle = server.tokens.resolve(victim);
    for (const guess of [victimHandle, victimHandle - 1, victimHandle + 1]) {
      const read = await server.inject({
        method: 'GET',
        url: `/operators/${guess}/objects/secret.txt`,
      });
      const release = await server.inject({ method: 'DELETE', url: `/operators/${guess}` });

      expect(read.statusCode).toBe(400);
      expect(release.statusCode).toBe(400);
    }

    const stillThere = await server.inject({
      method: 'GET',
      url: `/operators/${victim}/objects/secret.txt`,
    });
    expect(stillThere.statusCode).toBe(200);
    expect(stillThere.body).toBe('victim data');
  });

  it('should issue a different token for every operator', async () => {
    const first = await openOperator(server, 'memory');
    const second = await openOperator(server, 'memory');

    expect(first).not.toBe(second);
    expect(first).not.toMatch(/^\d+$/);
  });
});

// ===========================================================================
// 4. Malformed Input Handling
// ===========================================================================

describe('Malformed Input Handling', () => {
  let server: FastifyInstance;

  beforeAll(async () => {
    server = await createServer({ config: createTestConfig() });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
  });

  it('should reject invalid JSON without crashing', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/operators',
      headers: { 'content-type': 'application/json' },
      payload: 'not-json{{{',
    });

    expect(response.statusCode).toBe(400);
  });

  it('should reject a config that is not a string map', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/operators',
      payload: { scheme: 'memory', config: ['root', '/tmp'] },
    });

    expect(response.statusCode).toBe(400);
  });

  it('should handle extremely long scheme names without crash', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/operators',
      payload: { scheme: 'x'.repeat(10000) },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.code).toBe('BACKEND_UNKNOWN_SCHEME');
  });
});

// ===========================================================================
// 5. Production Error Sanitization
// ===========================================================================

describe('Production Error Sanitization', () => {
  let server: FastifyInstance;

  beforeAll(async () => {
    // Create server in production mode for sanitization tests
    server = await createServer({
      config: createTestConfig('production', FLAKY_BACKENDS),
      registry: createFlakyRegistry(),
    });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
  });

  it('should not include stack traces in production error responses', async () => {
    const handle = await openOperator(server, 'flaky');

    const response = await server.inject({
      method: 'GET',
      url: `/operators/${handle}/objects/x`,
    });

    expect(response.statusCode).toBe(502);
    const body = JSON.stringify(response.json());
    expect(body).not.toContain('stack');
    expect(body).not.toContain('ECONNREFUSED');
    expect(body).not.toContain(TEST_PASSWORD);
  });

  it('should keep actionable storage errors visible', async () => {
    const handle = await openOperator(server, 'memory');

    const response = await server.inject({
      method: 'GET',
      url: `/operators/${handle}/objects/missing.txt`,
    });

    expect(response.statusCode).toBe(404);
    expect(response.json().error.message).toBe('Path not found: missing.txt');
  });

  it('should return proper 404 for unknown routes', async () => {
    const response = await server.inject({ method: 'GET', url: '/admin' });
    expect(response.statusCode).toBe(404);
    const body = response.json();
    expect(body.error.code).toBe('NOT_FOUND');
    // Should not reveal internal paths
    expect(body.error.message).not.toContain('/src/');
    expect(body.error.message).not.toContain('/dist/');
  });
});
