// GatewayClient -- HTTP wrapper for the storage gateway API.
//
// Opens operators on a remote gateway and drives them by the token the
// gateway returned for each.
// Uses native fetch (Node 20+) with AbortController timeout and Zod validation.
// Error bodies are rebuilt into the same taxonomy errors the gateway threw.

import type { z } from 'zod';

import {
  ErrorResponseSchema,
  ListResponseSchema,
  OpenOperatorResponseSchema,
  SchemesResponseSchema,
  StatResponseSchema,
  fromListResponse,
  fromStatResponse,
} from './types.js';
import type { OpenOperatorRequest, OpenOperatorResponse } from './types.js';
import { StorageIoError, errorFromCode } from '../errors/index.js';
import type { Entry, Metadata } from '../storage/index.js';

export interface GatewayClientOptions {
  /** Base URL of the gateway (e.g. "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Additional headers to send with every request */
  headers?: Record<string, string>;
}

interface RequestOptions {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  body?: string | Uint8Array;
  contentType?: string;
}

export class GatewayClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly headers: Record<string, string>;

  constructor(options: GatewayClientOptions) {
    // Strip trailing slash for consistent URL building
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeout = options.timeout ?? 30_000;
    this.headers = options.headers ?? {};
  }

  /** GET /schemes */
  async schemes(): Promise<string[]> {
    const response = await this.request('/schemes', { method: 'GET' });
    return (await this.parse(response, SchemesResponseSchema)).schemes;
  }

  /** POST /operators */
  async open(
    scheme: string,
    config: OpenOperatorRequest['config'] = {}
  ): Promise<OpenOperatorResponse> {
    const response = await this.request('/operators', {
      method: 'POST',
      body: JSON.stringify({ scheme, config }),
      contentType: 'application/json',
    });
    return this.parse(response, OpenOperatorResponseSchema);
  }

  /** GET /operators/:handle/objects/* */
  async read(handle: string, path: string): Promise<Buffer> {
    const response = await this.request(this.objectUrl(handle, 'objects', path), {
      method: 'GET',
    });
    return Buffer.from(await response.arrayBuffer());
  }

  /** PUT /operators/:handle/objects/* */
  async write(handle: string, path: string, content: string | Uint8Array): Promise<void> {
    await this.request(this.objectUrl(handle, 'objects', path), {
      method: 'PUT',
      body: content,
      contentType: typeof content === 'string' ? 'text/plain' : 'application/octet-stream',
    });
  }

  /** DELETE /operators/:handle/objects/* */
  async delete(handle: string, path: string): Promise<void> {
    await this.request(this.objectUrl(handle, 'objects', path), { method: 'DELETE' });
  }

  /** GET /operators/:handle/stat/* */
  async stat(handle: string, path: string): Promise<Metadata> {
    const response = await this.request(this.objectUrl(handle, 'stat', path), { method: 'GET' });
    return fromStatResponse(await this.parse(response, StatResponseSchema));
  }

  /** GET /operators/:handle/list/* */
  async list(handle: string, path = ''): Promise<Entry[]> {
    const response = await this.request(this.objectUrl(handle, 'list', path), { method: 'GET' });
    return fromListResponse(await this.parse(response, ListResponseSchema));
  }

  /** DELETE /operators/:handle */
  async release(handle: string): Promise<void> {
    await this.request(`/operators/${encodeURIComponent(handle)}`, { method: 'DELETE' });
  }

  // ---- Private helpers ----

  private objectUrl(handle: string, kind: 'objects' | 'stat' | 'list', path: string): string {
    const encoded = path
      .split('/')
      .filter((segment) => segment.length > 0)
      .map((segment) => encodeURIComponent(segment))
      .join('/');
    const trailing = path.endsWith('/') && encoded.length > 0 ? '/' : '';
    return `/operators/${encodeURIComponent(handle)}/${kind}/${encoded}${trailing}`;
  }

  private async request(path: string, options: RequestOptions): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        method: options.method,
        headers: {
          ...(options.contentType && { 'Content-Type': options.contentType }),
          ...this.headers,
        },
        body: options.body,
        signal: controller.signal,
      });

      if (!response.ok) {
        throw await this.errorFrom(response);
      }

      return response;
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new StorageIoError(`${options.method} ${path} timed out after ${this.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async parse<T>(
    response: Response,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const json: unknown = await response.json();
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new StorageIoError(`invalid gateway response: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  /** Rebuild the taxonomy error from the gateway's error body */
  private async errorFrom(response: Response): Promise<Error> {
    const contentType = response.headers.get('content-type') ?? '';
    const body: unknown = contentType.includes('application/json') ? await response.json() : null;

    const parsed = ErrorResponseSchema.safeParse(body);
    if (parsed.success) {
      return errorFromCode(parsed.data.error.code, parsed.data.error.message);
    }
    return new StorageIoError(`gateway returned ${response.status} ${response.statusText}`.trim());
  }
}
