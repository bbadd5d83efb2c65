// WebDAV storage backend.
//
// Talks to a WebDAV server over native fetch (Node 20+) -- no DAV client
// library needed. Reads and writes map onto GET/PUT, stat onto HEAD, and
// copy/rename/createDir onto COPY/MOVE/MKCOL. Listing would need PROPFIND
// multistatus parsing and is not offered.

import { z } from 'zod';

import { isDirPath, normalizePath, normalizeRoot } from './path.js';
import { parseBackendConfig } from './registry.js';
import type { Backend, BackendConfig, BackendInfo, Metadata } from './types.js';
import {
  isOperationError,
  NotFoundError,
  PermissionDeniedError,
  QuotaExceededError,
  StorageIoError,
} from '../errors/index.js';

const WebdavConfigSchema = z
  .object({
    endpoint: z.string({ required_error: 'endpoint is required' }).url(),
    root: z.string().optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    token: z.string().optional(),
    timeout_ms: z
      .string()
      .regex(/^\d+$/, 'must be a positive integer')
      .transform((value) => Number.parseInt(value, 10))
      .refine((value) => value > 0, 'must be a positive integer')
      .optional(),
  })
  .refine((d) => !(d.username && d.token), 'username/password and token are mutually exclusive')
  .refine((d) => d.password === undefined || d.username !== undefined, {
    message: 'password requires username',
    path: ['password'],
  });

export type WebdavBackendOptions = z.infer<typeof WebdavConfigSchema>;

export class WebdavBackend implements Backend {
  private readonly endpoint: string;
  private readonly root: string;
  private readonly timeout: number;
  private readonly authorization: string | undefined;
  private readonly controllers = new Set<AbortController>();
  private closed = false;

  constructor(options: WebdavBackendOptions) {
    // Strip trailing slash
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.root = normalizeRoot(options.root);
    this.timeout = options.timeout_ms ?? 30_000;

    if (options.token) {
      this.authorization = `Bearer ${options.token}`;
    } else if (options.username) {
      const credentials = `${options.username}:${options.password ?? ''}`;
      this.authorization = `Basic ${Buffer.from(credentials).toString('base64')}`;
    }
  }

  static fromConfig(config: BackendConfig): WebdavBackend {
    return new WebdavBackend(parseBackendConfig('webdav', WebdavConfigSchema, config));
  }

  info(): BackendInfo {
    return {
      scheme: 'webdav',
      root: this.root,
      capabilities: { list: false, copy: true, rename: true, createDir: true },
    };
  }

  async read(path: string): Promise<Buffer> {
    return this.exchange('GET', path, {}, async (response) => {
      if (!response.ok) {
        throw statusError(response, path);
      }
      return Buffer.from(await response.arrayBuffer());
    });
  }

  async write(path: string, content: Buffer): Promise<void> {
    const init = {
      body: new Uint8Array(content),
      headers: { 'Content-Type': 'application/octet-stream' },
    };
    await this.exchange('PUT', path, init, async (response) => {
      if (!response.ok) {
        throw statusError(response, path);
      }
    });
  }

  async delete(path: string): Promise<void> {
    await this.exchange('DELETE', path, {}, async (response) => {
      if (!response.ok && response.status !== 404) {
        throw statusError(response, path);
      }
    });
  }

  async stat(path: string): Promise<Metadata> {
    return this.exchange('HEAD', path, {}, async (response) => {
      if (!response.ok) {
        throw statusError(response, path);
      }

      const lastModified = response.headers.get('last-modified');
      const parsed = lastModified ? new Date(lastModified) : null;
      const contentType = response.headers.get('content-type');
      const etag = response.headers.get('etag');

      return {
        mode: isDirPath(normalizePath(path)) ? 'dir' : 'file',
        contentLength: Number.parseInt(response.headers.get('content-length') ?? '0', 10) || 0,
        lastModified: parsed && !Number.isNaN(parsed.getTime()) ? parsed : null,
        ...(contentType && { contentType }),
        ...(etag && { etag }),
      };
    });
  }

  async copy(from: string, to: string): Promise<void> {
    await this.transfer('COPY', from, to);
  }

  async rename(from: string, to: string): Promise<void> {
    await this.transfer('MOVE', from, to);
  }

  async createDir(path: string): Promise<void> {
    const normalized = normalizePath(path);
    const dir = isDirPath(normalized) ? normalized : `${normalized}/`;
    await this.exchange('MKCOL', dir, {}, async (response) => {
      // 405: collection already exists
      if (!response.ok && response.status !== 405) {
        throw statusError(response, path);
      }
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const controller of this.controllers) {
      controller.abort();
    }
    this.controllers.clear();
  }

  // ---- Private helpers ----

  private urlFor(path: string): string {
    const normalized = normalizePath(path);
    const relativePath = normalized === '/' ? '' : normalized;
    const encoded = `${this.root}${relativePath}`
      .split('/')
      .map((segment) => encodeURIComponent(segment))
      .join('/');
    return `${this.endpoint}${encoded}`;
  }

  private async transfer(method: 'COPY' | 'MOVE', from: string, to: string): Promise<void> {
    const destination = this.urlFor(to);
    // Servers refuse COPY/MOVE onto the source itself
    if (destination === this.urlFor(from)) {
      await this.stat(from);
      return;
    }

    const init = { headers: { Destination: destination, Overwrite: 'T' } };
    await this.exchange(method, from, init, async (response) => {
      if (!response.ok) {
        throw statusError(response, from);
      }
    });
  }

  /**
   * One request and its response. The timeout and close() cover reading the
   * body as well as the headers. A body the handler leaves unread is
   * cancelled so the connection is returned to the pool.
   */
  private async exchange<T>(
    method: string,
    path: string,
    init: { body?: Uint8Array; headers?: Record<string, string> },
    handle: (response: Response) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    this.controllers.add(controller);

    try {
      const response = await fetch(this.urlFor(path), {
        method,
        headers: {
          ...(this.authorization && { Authorization: this.authorization }),
          ...init.headers,
        },
        body: init.body,
        signal: controller.signal,
      });
      try {
        return await handle(response);
      } finally {
        if (!response.bodyUsed) {
          await response.body?.cancel();
        }
      }
    } catch (error) {
      if (isOperationError(error)) {
        throw error;
      }
      if (controller.signal.aborted || (error instanceof Error && error.name === 'AbortError')) {
        throw new StorageIoError(
          this.closed
            ? `${method} ${path} aborted: backend closed`
            : `${method} ${path} timed out after ${this.timeout}ms`
        );
      }
      const wrapped = new StorageIoError(
        `${method} ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
      wrapped.cause = error;
      throw wrapped;
    } finally {
      clearTimeout(timeoutId);
      this.controllers.delete(controller);
    }
  }
}

/** Map a non-2xx WebDAV response onto the operation error taxonomy */
function statusError(response: Response, path: string): Error {
  switch (response.status) {
    case 404:
      return new NotFoundError(path);
    case 401:
    case 403:
      return new PermissionDeniedError(path);
    case 507:
      return new QuotaExceededError(path);
    default:
      return new StorageIoError(`${path}: ${response.status} ${response.statusText}`.trim());
  }
}
