// Operator façade over a single storage backend.
//
// An Operator is either live (backend present) or released (backend handed
// to teardown). The transition is one-way: release() flips the state
// synchronously, so every call made afterwards fails with UsedAfterRelease
// before it can reach the backend. Teardown itself waits for operations
// that were already running when release() was called.

import type { BaseLogger } from 'pino';

import {
  StorageIoError,
  UnsupportedError,
  UsedAfterReleaseError,
  isOperationError,
  withContext,
} from '../errors/index.js';
import type { ErrorContext, Operation } from '../errors/index.js';
import { createLogger } from '../logger.js';
import { createDefaultRegistry } from '../storage/index.js';
import type {
  Backend,
  BackendConfig,
  BackendInfo,
  BackendRegistry,
  Entry,
  Metadata,
} from '../storage/index.js';

export type OperatorState = 'live' | 'released';

export interface OperatorOptions {
  /** Registry used to resolve the scheme (default: the built-in schemes) */
  registry?: BackendRegistry;
  logger?: BaseLogger;
}

let defaultRegistry: BackendRegistry | undefined;

function getDefaultRegistry(): BackendRegistry {
  defaultRegistry ??= createDefaultRegistry();
  return defaultRegistry;
}

export class Operator {
  readonly scheme: string;
  private backend: Backend | null;
  private readonly logger: BaseLogger;
  private pending = 0;
  private onDrained: (() => void) | null = null;
  private teardown: Promise<void> | null = null;

  constructor(backend: Backend, options: { logger?: BaseLogger } = {}) {
    this.backend = backend;
    this.scheme = backend.info().scheme;
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Resolve `scheme` + `config` into a live Operator.
   *
   * All-or-nothing: when the registry rejects the scheme or the
   * configuration, the construction error propagates and no Operator exists.
   */
  static async open(
    scheme: string,
    config: BackendConfig,
    options: OperatorOptions = {}
  ): Promise<Operator> {
    const registry = options.registry ?? getDefaultRegistry();
    const backend = await registry.construct(scheme, config);
    return new Operator(backend, { logger: options.logger });
  }

  get state(): OperatorState {
    return this.backend === null ? 'released' : 'live';
  }

  info(): BackendInfo {
    if (this.backend === null) {
      throw new UsedAfterReleaseError(`info on ${this.scheme} operator`);
    }
    return this.backend.info();
  }

  read(path: string): Promise<Buffer> {
    return this.run('read', path, (backend) => backend.read(path));
  }

  /** Unconditional overwrite. Strings are stored as UTF-8. */
  write(path: string, content: string | Uint8Array): Promise<void> {
    const bytes =
      typeof content === 'string' ? Buffer.from(content, 'utf-8') : Buffer.from(content);
    return this.run('write', path, (backend) => backend.write(path, bytes));
  }

  /** Deleting a missing path succeeds */
  delete(path: string): Promise<void> {
    return this.run('delete', path, (backend) => backend.delete(path));
  }

  stat(path: string): Promise<Metadata> {
    return this.run('stat', path, (backend) => backend.stat(path));
  }

  async isExist(path: string): Promise<boolean> {
    try {
      await this.stat(path);
      return true;
    } catch (error) {
      if (isOperationError(error) && error.code === 'STORAGE_NOT_FOUND') {
        return false;
      }
      throw error;
    }
  }

  list(path = '/'): Promise<Entry[]> {
    return this.run('list', path, (backend) => {
      if (!backend.list) throw new UnsupportedError('list', this.scheme);
      return backend.list(path);
    });
  }

  copy(from: string, to: string): Promise<void> {
    return this.run('copy', from, (backend) => {
      if (!backend.copy) throw new UnsupportedError('copy', this.scheme);
      return backend.copy(from, to);
    });
  }

  rename(from: string, to: string): Promise<void> {
    return this.run('rename', from, (backend) => {
      if (!backend.rename) throw new UnsupportedError('rename', this.scheme);
      return backend.rename(from, to);
    });
  }

  createDir(path: string): Promise<void> {
    return this.run('createDir', path, (backend) => {
      if (!backend.createDir) throw new UnsupportedError('createDir', this.scheme);
      return backend.createDir(path);
    });
  }

  /**
   * Release the backend. Idempotent: later calls return the same teardown
   * promise and never close the backend twice. The returned promise always
   * resolves; a failing backend teardown is logged, not thrown.
   */
  release(): Promise<void> {
    if (this.teardown) {
      return this.teardown;
    }

    const backend = this.backend;
    this.backend = null;

    if (backend === null) {
      return Promise.resolve();
    }

    this.logger.debug({ scheme: this.scheme, pending: this.pending }, 'Releasing operator');

    this.teardown = this.drain()
      .then(() => backend.close())
      .then(
        () => {
          this.logger.debug({ scheme: this.scheme }, 'Backend closed');
        },
        (error: unknown) => {
          this.logger.error(
            { scheme: this.scheme, err: error instanceof Error ? error.message : 'Unknown error' },
            'Backend teardown failed'
          );
        }
      );
    return this.teardown;
  }

  // ---- Private helpers ----

  private async run<T>(
    operation: Operation,
    path: string,
    call: (backend: Backend) => Promise<T>
  ): Promise<T> {
    const context: ErrorContext = { operation, scheme: this.scheme, path };
    const backend = this.backend;

    if (backend === null) {
      throw withContext(new UsedAfterReleaseError(`${operation} ${path}`), context);
    }

    this.pending += 1;
    try {
      return await call(backend);
    } catch (error) {
      throw this.translate(error, context);
    } finally {
      this.pending -= 1;
      if (this.pending === 0 && this.onDrained) {
        const resolve = this.onDrained;
        this.onDrained = null;
        resolve();
      }
    }
  }

  /** Wait until no operation is running against the backend */
  private drain(): Promise<void> {
    if (this.pending === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.onDrained = resolve;
    });
  }

  /** Pass taxonomy errors through with context; anything else becomes Io */
  private translate(error: unknown, context: ErrorContext): Error {
    if (isOperationError(error)) {
      this.logger.debug({ ...context, code: error.code }, 'Operation failed');
      return withContext(error, context);
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    this.logger.warn({ ...context, err: message }, 'Backend raised an unclassified error');
    const wrapped = new StorageIoError(`${context.operation} ${context.path}: ${message}`);
    wrapped.cause = error;
    return withContext(wrapped, context);
  }
}
