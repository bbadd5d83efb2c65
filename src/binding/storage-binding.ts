// Status-code boundary over the handle manager.
//
// Nothing thrown ever crosses this surface: every call returns a numeric
// Status together with the record of its own failure, which lastError() also
// keeps for callers that only look at the status.
// A handle that was issued and then released is "retired": operations on it
// report UsedAfterRelease and releasing it again is a no-op. A handle this
// binding never issued reports HandleInvalid.

import type { FastifyError } from 'fastify';
import type { BaseLogger } from 'pino';

import { Status, statusFromCode } from './status.js';
import { unflattenConfig } from './config-transport.js';
import { isConstructionError, isLookupError, isOperationError } from '../errors/index.js';
import { HandleManager, NULL_HANDLE } from '../handles/index.js';
import type { Handle } from '../handles/index.js';
import { createLogger } from '../logger.js';
import { Operator } from '../operator/index.js';
import { createDefaultRegistry } from '../storage/index.js';
import type { BackendRegistry, Entry, Metadata } from '../storage/index.js';

export interface StorageBindingOptions {
  registry?: BackendRegistry;
  logger?: BaseLogger;
  handles?: HandleManager;
}

export interface LastError {
  status: Status;
  code: string;
  message: string;
}

/** Outcome of one binding call; `error` describes this call's failure, never another's */
export interface StatusResult {
  status: Status;
  error: LastError | null;
}

export interface ConstructResult extends StatusResult {
  /** NULL_HANDLE unless status is Ok */
  handle: Handle;
}

export interface ReadResult extends StatusResult {
  content: Buffer | null;
}

export interface StatResult extends StatusResult {
  stat: Metadata | null;
}

export interface ListResult extends StatusResult {
  entries: Entry[];
}

const OK: StatusResult = { status: Status.Ok, error: null };

export class StorageBinding {
  private readonly registry: BackendRegistry;
  private readonly handles: HandleManager;
  private readonly logger: BaseLogger;
  private failure: LastError | null = null;

  constructor(options: StorageBindingOptions = {}) {
    this.logger = options.logger ?? createLogger();
    this.registry = options.registry ?? createDefaultRegistry({ logger: this.logger });
    this.handles = options.handles ?? new HandleManager({ logger: this.logger });
  }

  /** Build an Operator from a scheme and a flat key/value list holding `count` pairs */
  async construct(
    scheme: string,
    params: readonly string[],
    count: number
  ): Promise<ConstructResult> {
    try {
      const config = unflattenConfig(scheme, params, count);
      const operator = await Operator.open(scheme, config, {
        registry: this.registry,
        logger: this.logger,
      });
      try {
        return { ...OK, handle: this.handles.issue(operator) };
      } catch (error) {
        await operator.release();
        throw error;
      }
    } catch (error) {
      return { ...this.fail(error), handle: NULL_HANDLE };
    }
  }

  async read(handle: Handle, path: string): Promise<ReadResult> {
    try {
      const content = await this.handles.acquire(handle, 'read').read(path);
      return { ...OK, content };
    } catch (error) {
      return { ...this.fail(error), content: null };
    }
  }

  async write(handle: Handle, path: string, content: string | Uint8Array): Promise<StatusResult> {
    try {
      await this.handles.acquire(handle, 'write').write(path, content);
      return { ...OK };
    } catch (error) {
      return this.fail(error);
    }
  }

  async delete(handle: Handle, path: string): Promise<StatusResult> {
    try {
      await this.handles.acquire(handle, 'delete').delete(path);
      return { ...OK };
    } catch (error) {
      return this.fail(error);
    }
  }

  async stat(handle: Handle, path: string): Promise<StatResult> {
    try {
      const stat = await this.handles.acquire(handle, 'stat').stat(path);
      return { ...OK, stat };
    } catch (error) {
      return { ...this.fail(error), stat: null };
    }
  }

  async list(handle: Handle, path = '/'): Promise<ListResult> {
    try {
      const entries = await this.handles.acquire(handle, 'list').list(path);
      return { ...OK, entries };
    } catch (error) {
      return { ...this.fail(error), entries: [] };
    }
  }

  /**
   * Release a handle. Safe to call from a finalizer: the table entry is
   * dropped before any teardown is awaited, and a retired handle returns Ok
   * without touching the Operator again.
   */
  async release(handle: Handle): Promise<StatusResult> {
    if (this.handles.isRetired(handle)) {
      return { ...OK };
    }
    try {
      await this.handles.release(handle);
      return { ...OK };
    } catch (error) {
      return this.fail(error);
    }
  }

  /**
   * Most recent failure on this binding, or null if none occurred. Calls
   * that overlap each overwrite it; the `error` of each result is exact.
   */
  lastError(): LastError | null {
    return this.failure ? { ...this.failure } : null;
  }

  // ---- Private helpers ----

  private fail(error: unknown): StatusResult {
    const failure = describeFailure(error);
    this.failure = failure;
    if (!isTaxonomyError(error)) {
      this.logger.warn({ err: failure.message }, 'Binding call raised an unclassified error');
    } else {
      this.logger.debug({ code: failure.code, status: failure.status }, 'Binding call failed');
    }
    return { status: failure.status, error: { ...failure } };
  }
}

function isTaxonomyError(error: unknown): error is FastifyError {
  return isConstructionError(error) || isOperationError(error) || isLookupError(error);
}

function describeFailure(error: unknown): LastError {
  if (isTaxonomyError(error)) {
    return { status: statusFromCode(error.code), code: error.code, message: error.message };
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  return { status: Status.Io, code: 'STORAGE_IO', message };
}
