// Redis storage backend.
//
// Each file is a hash at `<root><path>` holding the raw bytes in `content`
// and the write time (epoch ms) in `mtime`. Directories are implicit: a path
// ending in "/" exists when any key lives below it, and deleting it deletes
// those keys.

import type Redis from 'ioredis';
import type { BaseLogger } from 'pino';
import { z } from 'zod';

import { directChild, isDirPath, normalizePath, normalizeRoot } from './path.js';
import { createRedisClient, disconnectRedis } from './redis-client.js';
import { parseBackendConfig } from './registry.js';
import type { Backend, BackendConfig, BackendInfo, Entry, Metadata } from './types.js';
import {
  BackendConfigInvalidError,
  NotFoundError,
  PermissionDeniedError,
  QuotaExceededError,
  StorageIoError,
} from '../errors/index.js';

const CONTENT_FIELD = 'content';
const MTIME_FIELD = 'mtime';
const SCAN_COUNT = 200;

const integer = (label: string) =>
  z
    .string()
    .regex(/^\d+$/, `${label} must be a non-negative integer`)
    .transform((value) => Number.parseInt(value, 10));

const RedisConfigSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: integer('port')
    .refine((value) => value >= 1 && value <= 65535, 'port must be within 1-65535')
    .default('6379'),
  username: z.string().optional(),
  password: z.string().optional(),
  db: integer('db')
    .refine((value) => value <= 15, 'db must be within 0-15')
    .default('0'),
  root: z.string().optional(),
});

export class RedisBackend implements Backend {
  private readonly client: Redis;
  private readonly root: string;

  constructor(client: Redis, options: { root?: string } = {}) {
    this.client = client;
    this.root = normalizeRoot(options.root);
  }

  /** Parse the config map, connect, and fail construction if Redis is unreachable */
  static async fromConfig(config: BackendConfig, logger: BaseLogger): Promise<RedisBackend> {
    const options = parseBackendConfig('redis', RedisConfigSchema, config);
    const client = createRedisClient({ ...options, root: normalizeRoot(options.root) }, logger);

    try {
      await client.connect();
    } catch (error) {
      client.disconnect();
      throw new BackendConfigInvalidError(
        'redis',
        `cannot reach ${options.host}:${options.port}: ${
          error instanceof Error ? error.message : 'Unknown error'
        }`
      );
    }

    return new RedisBackend(client, { root: options.root });
  }

  info(): BackendInfo {
    return {
      scheme: 'redis',
      root: this.root,
      capabilities: { list: true, copy: true, rename: true, createDir: false },
    };
  }

  async read(path: string): Promise<Buffer> {
    const content = await this.call(path, () =>
      this.client.hgetBuffer(this.keyFor(path), CONTENT_FIELD)
    );
    if (content === null) {
      throw new NotFoundError(path);
    }
    return content;
  }

  async write(path: string, content: Buffer): Promise<void> {
    if (isDirPath(normalizePath(path))) {
      throw new StorageIoError(`cannot write file content to directory path ${path}`);
    }
    await this.call(path, () =>
      this.client.hset(
        this.keyFor(path),
        CONTENT_FIELD,
        content,
        MTIME_FIELD,
        Date.now().toString()
      )
    );
  }

  async delete(path: string): Promise<void> {
    const normalized = normalizePath(path);
    if (!isDirPath(normalized)) {
      await this.call(path, () => this.client.del(this.keyFor(path)));
      return;
    }

    // A directory goes with every key below it
    const keys = (await this.scanBelow(normalized === '/' ? '' : normalized)).map(
      (relativeKey) => `${this.root}${relativeKey}`
    );
    for (let start = 0; start < keys.length; start += SCAN_COUNT) {
      const batch = keys.slice(start, start + SCAN_COUNT);
      await this.call(path, () => this.client.del(...batch));
    }
  }

  async stat(path: string): Promise<Metadata> {
    const normalized = normalizePath(path);

    if (isDirPath(normalized)) {
      if (normalized === '/' || (await this.hasKeysBelow(normalized))) {
        return { mode: 'dir', contentLength: 0, lastModified: null };
      }
      throw new NotFoundError(path);
    }

    const key = this.keyFor(normalized);
    const [mtime, size] = await this.call(path, () =>
      Promise.all([this.client.hget(key, MTIME_FIELD), this.client.hstrlen(key, CONTENT_FIELD)])
    );
    if (mtime === null) {
      throw new NotFoundError(path);
    }

    return {
      mode: 'file',
      contentLength: size,
      lastModified: new Date(Number.parseInt(mtime, 10)),
    };
  }

  async list(path: string): Promise<Entry[]> {
    const dir = normalizePath(path);
    const children = new Map<string, Entry>();

    for (const relativeKey of await this.scanBelow(dir === '/' ? '' : dir)) {
      const child = directChild(dir, relativeKey);
      if (child === null || children.has(child)) {
        continue;
      }
      children.set(child, { path: child, metadata: await this.stat(child) });
    }

    if (children.size === 0 && dir !== '/') {
      throw new NotFoundError(path);
    }
    return [...children.values()].sort((a, b) => a.path.localeCompare(b.path));
  }

  async copy(from: string, to: string): Promise<void> {
    await this.write(to, await this.read(from));
  }

  async rename(from: string, to: string): Promise<void> {
    const source = this.keyFor(from);
    const target = this.keyFor(to);
    if (source === target) {
      await this.stat(from);
      return;
    }

    try {
      await this.client.rename(source, target);
    } catch (error) {
      if (error instanceof Error && error.message.includes('no such key')) {
        throw new NotFoundError(from);
      }
      throw translateRedisError(error, from);
    }
  }

  async close(): Promise<void> {
    await disconnectRedis(this.client);
  }

  // ---- Private helpers ----

  private keyFor(path: string): string {
    const normalized = normalizePath(path);
    return `${this.root}${normalized === '/' ? '' : normalized}`;
  }

  private async hasKeysBelow(dir: string): Promise<boolean> {
    return (await this.scanBelow(dir, 1)).length > 0;
  }

  /** Keys below a relative prefix, returned relative to the root */
  private async scanBelow(prefix: string, limit = Number.POSITIVE_INFINITY): Promise<string[]> {
    const pattern = `${escapeGlob(`${this.root}${prefix}`)}*`;
    const found: string[] = [];
    let cursor = '0';

    do {
      const [next, keys] = await this.call(prefix || '/', () =>
        this.client.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_COUNT)
      );
      cursor = next;
      for (const key of keys) {
        found.push(key.slice(this.root.length));
        if (found.length >= limit) {
          return found;
        }
      }
    } while (cursor !== '0');

    return found;
  }

  /** Run a Redis command, translating client failures into the taxonomy */
  private async call<T>(path: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      throw translateRedisError(error, path);
    }
  }
}

function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, (char) => `\\${char}`);
}

export function translateRedisError(error: unknown, path: string): Error {
  const message = error instanceof Error ? error.message : 'Unknown error';

  if (/^(NOAUTH|WRONGPASS|NOPERM)/.test(message)) {
    return new PermissionDeniedError(`${path}: ${message}`);
  }
  if (message.startsWith('OOM')) {
    return new QuotaExceededError(`${path}: ${message}`);
  }

  const wrapped = new StorageIoError(`${path}: ${message}`);
  wrapped.cause = error;
  return wrapped;
}
