// Filesystem storage backend.
//
// Stores entries on the local filesystem below a configured root directory.
// Paths are resolved against the root and anything resolving outside of it
// is refused with PermissionDenied.

import { copyFile, mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, join, relative, resolve, sep } from 'node:path';

import { z } from 'zod';

import { isDirPath, normalizePath, normalizeRoot } from './path.js';
import { parseBackendConfig } from './registry.js';
import type { Backend, BackendConfig, BackendInfo, Entry, Metadata } from './types.js';
import {
  NotFoundError,
  PermissionDeniedError,
  QuotaExceededError,
  StorageIoError,
  isOperationError,
} from '../errors/index.js';

const FsConfigSchema = z.object({
  root: z.string({ required_error: 'root is required' }).min(1, 'root must not be empty'),
});

export class FsBackend implements Backend {
  private readonly dataDir: string;
  private initialized = false;

  constructor(dataDir: string) {
    this.dataDir = resolve(dataDir);
  }

  static fromConfig(config: BackendConfig): FsBackend {
    const { root } = parseBackendConfig('fs', FsConfigSchema, config);
    return new FsBackend(root);
  }

  info(): BackendInfo {
    return {
      scheme: 'fs',
      root: normalizeRoot(this.dataDir),
      capabilities: { list: true, copy: true, rename: true, createDir: true },
    };
  }

  async read(path: string): Promise<Buffer> {
    const filePath = this.resolvePath(path);
    try {
      return await readFile(filePath);
    } catch (error) {
      throw translateFsError(error, path);
    }
  }

  async write(path: string, content: Buffer): Promise<void> {
    await this.ensureDir();
    const filePath = this.resolvePath(path);
    try {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, content);
    } catch (error) {
      throw translateFsError(error, path);
    }
  }

  async delete(path: string): Promise<void> {
    const filePath = this.resolvePath(path);
    try {
      // force: a missing path is not an error
      await rm(filePath, { force: true, recursive: isDirPath(normalizePath(path)) });
    } catch (error) {
      throw translateFsError(error, path);
    }
  }

  async stat(path: string): Promise<Metadata> {
    const filePath = this.resolvePath(path);
    try {
      const stats = await stat(filePath);
      const mode = stats.isDirectory() ? 'dir' : 'file';
      if (mode === 'file' && isDirPath(normalizePath(path))) {
        throw new NotFoundError(path);
      }
      return {
        mode,
        contentLength: mode === 'dir' ? 0 : stats.size,
        lastModified: stats.mtime,
      };
    } catch (error) {
      throw translateFsError(error, path);
    }
  }

  async list(path: string): Promise<Entry[]> {
    const dir = normalizePath(path);
    const dirPath = this.resolvePath(dir);
    const prefix = dir === '/' ? '' : dir;

    try {
      const dirents = await readdir(dirPath, { withFileTypes: true });
      const entries: Entry[] = [];
      for (const dirent of dirents) {
        const child = dirent.isDirectory()
          ? `${prefix}${dirent.name}/`
          : `${prefix}${dirent.name}`;
        entries.push({ path: child, metadata: await this.stat(child) });
      }
      return entries.sort((a, b) => a.path.localeCompare(b.path));
    } catch (error) {
      throw translateFsError(error, path);
    }
  }

  async copy(from: string, to: string): Promise<void> {
    const target = this.resolvePath(to);
    try {
      await mkdir(dirname(target), { recursive: true });
      await copyFile(this.resolvePath(from), target);
    } catch (error) {
      throw translateFsError(error, from);
    }
  }

  async rename(from: string, to: string): Promise<void> {
    const target = this.resolvePath(to);
    try {
      await mkdir(dirname(target), { recursive: true });
      await rename(this.resolvePath(from), target);
    } catch (error) {
      throw translateFsError(error, from);
    }
  }

  async createDir(path: string): Promise<void> {
    try {
      await mkdir(this.resolvePath(path), { recursive: true });
    } catch (error) {
      throw translateFsError(error, path);
    }
  }

  async close(): Promise<void> {
    // Nothing pooled: every call opens and closes its own descriptors
    this.initialized = false;
  }

  /** Map a relative path onto the data directory, refusing escapes */
  private resolvePath(path: string): string {
    const normalized = normalizePath(path);
    const target = normalized === '/' ? this.dataDir : join(this.dataDir, normalized);
    const rel = relative(this.dataDir, target);

    if (rel === '..' || rel.startsWith(`..${sep}`)) {
      throw new PermissionDeniedError(`${path} resolves outside of the root directory`);
    }
    return target;
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.dataDir, { recursive: true });
    this.initialized = true;
  }
}

function errnoOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Translate a Node.js errno failure into the operation error taxonomy */
export function translateFsError(error: unknown, path: string): Error {
  if (isOperationError(error)) {
    return error;
  }

  switch (errnoOf(error)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return new NotFoundError(path);
    case 'EACCES':
    case 'EPERM':
      return new PermissionDeniedError(path);
    case 'ENOSPC':
    case 'EDQUOT':
      return new QuotaExceededError(path);
    default: {
      const wrapped = new StorageIoError(
        `${path}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
      wrapped.cause = error;
      return wrapped;
    }
  }
}
