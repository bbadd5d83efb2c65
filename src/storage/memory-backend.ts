// In-memory storage backend.
//
// Map-based reference implementation. Every operator owns its own map, so two
// memory operators never see each other's data. Optionally bounded by
// `max_bytes`, in which case writes past the limit fail with QuotaExceeded.

import { z } from 'zod';

import { directChild, isDirPath, normalizePath, normalizeRoot, parentOf } from './path.js';
import { parseBackendConfig } from './registry.js';
import type { Backend, BackendConfig, BackendInfo, Entry, Metadata } from './types.js';
import { NotFoundError, QuotaExceededError, StorageIoError } from '../errors/index.js';

const MemoryConfigSchema = z.object({
  root: z.string().optional(),
  max_bytes: z
    .string()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .transform((value) => Number.parseInt(value, 10))
    .optional(),
});

export type MemoryBackendOptions = z.infer<typeof MemoryConfigSchema>;

interface StoredObject {
  content: Buffer;
  lastModified: Date;
}

export class MemoryBackend implements Backend {
  private readonly objects = new Map<string, StoredObject>();
  private readonly dirs = new Set<string>();
  private readonly root: string;
  private readonly maxBytes: number | undefined;
  private usedBytes = 0;

  constructor(options: MemoryBackendOptions = {}) {
    this.root = normalizeRoot(options.root);
    this.maxBytes = options.max_bytes;
  }

  static fromConfig(config: BackendConfig): MemoryBackend {
    return new MemoryBackend(parseBackendConfig('memory', MemoryConfigSchema, config));
  }

  info(): BackendInfo {
    return {
      scheme: 'memory',
      root: this.root,
      capabilities: { list: true, copy: true, rename: true, createDir: true },
    };
  }

  async read(path: string): Promise<Buffer> {
    const stored = this.objects.get(normalizePath(path));
    if (!stored) {
      throw new NotFoundError(path);
    }
    // Return a copy to prevent external mutation
    return Buffer.from(stored.content);
  }

  async write(path: string, content: Buffer): Promise<void> {
    const key = normalizePath(path);
    if (isDirPath(key)) {
      throw new StorageIoError(`cannot write file content to directory path ${key}`);
    }

    const previous = this.objects.get(key)?.content.length ?? 0;
    const nextUsed = this.usedBytes - previous + content.length;

    if (this.maxBytes !== undefined && nextUsed > this.maxBytes) {
      throw new QuotaExceededError(
        `writing ${content.length} bytes to ${key} exceeds max_bytes ${this.maxBytes}`
      );
    }

    this.objects.set(key, { content: Buffer.from(content), lastModified: new Date() });
    this.usedBytes = nextUsed;
    this.addParents(key);
  }

  async delete(path: string): Promise<void> {
    const key = normalizePath(path);

    if (isDirPath(key)) {
      this.deleteBelow(key);
      return;
    }

    const stored = this.objects.get(key);
    if (stored) {
      this.usedBytes -= stored.content.length;
      this.objects.delete(key);
    }
  }

  async stat(path: string): Promise<Metadata> {
    const key = normalizePath(path);

    if (isDirPath(key)) {
      if (key === '/' || this.dirs.has(key)) {
        return { mode: 'dir', contentLength: 0, lastModified: null };
      }
      throw new NotFoundError(path);
    }

    const stored = this.objects.get(key);
    if (!stored) {
      throw new NotFoundError(path);
    }
    return {
      mode: 'file',
      contentLength: stored.content.length,
      lastModified: stored.lastModified,
    };
  }

  async list(path: string): Promise<Entry[]> {
    const dir = normalizePath(path);
    if (dir !== '/' && !this.dirs.has(dir)) {
      throw new NotFoundError(path);
    }

    const children = new Map<string, Entry>();
    for (const candidate of [...this.dirs, ...this.objects.keys()]) {
      const child = directChild(dir, candidate);
      if (child === null || children.has(child)) {
        continue;
      }
      children.set(child, { path: child, metadata: await this.stat(child) });
    }

    return [...children.values()].sort((a, b) => a.path.localeCompare(b.path));
  }

  async copy(from: string, to: string): Promise<void> {
    await this.write(to, await this.read(from));
  }

  async rename(from: string, to: string): Promise<void> {
    if (normalizePath(from) === normalizePath(to)) {
      await this.stat(from);
      return;
    }
    await this.copy(from, to);
    await this.delete(from);
  }

  async createDir(path: string): Promise<void> {
    const key = normalizePath(path);
    const dir = isDirPath(key) ? key : `${key}/`;
    if (dir !== '/') {
      this.dirs.add(dir);
      this.addParents(dir);
    }
  }

  async close(): Promise<void> {
    this.objects.clear();
    this.dirs.clear();
    this.usedBytes = 0;
  }

  /** Directories are deleted with everything below them */
  private deleteBelow(dir: string): void {
    const prefix = dir === '/' ? '' : dir;
    for (const [key, stored] of this.objects) {
      if (key.startsWith(prefix)) {
        this.usedBytes -= stored.content.length;
        this.objects.delete(key);
      }
    }
    for (const key of this.dirs) {
      if (key.startsWith(prefix)) {
        this.dirs.delete(key);
      }
    }
  }

  private addParents(key: string): void {
    for (let parent = parentOf(key); parent !== '/'; parent = parentOf(parent)) {
      this.dirs.add(parent);
    }
  }
}
