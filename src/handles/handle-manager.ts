// Handle lifecycle manager: opaque numeric handles for live Operators.
//
// Handles come from a monotonically increasing counter and are never reused,
// so a stale handle can never alias a newer Operator. The table is the only
// authority on liveness: release() removes the entry synchronously, before
// any teardown work is awaited, which makes it linearizable with resolve().
// JavaScript runs callbacks one at a time per isolate, so each table access
// is atomic without a lock; no I/O ever runs while the table is touched.

import type { BaseLogger } from 'pino';

import { HandleInvalidError, InternalError, UsedAfterReleaseError } from '../errors/index.js';
import { createLogger } from '../logger.js';
import type { Operator } from '../operator/index.js';

/** Opaque reference to a live Operator. 0 is never issued. */
export type Handle = number;

export const NULL_HANDLE: Handle = 0;

export class HandleManager {
  private readonly live = new Map<Handle, Operator>();
  private nextHandle: Handle = 1;
  private readonly logger: BaseLogger;

  constructor(options: { logger?: BaseLogger } = {}) {
    this.logger = options.logger ?? createLogger();
  }

  /** Number of live handles */
  get size(): number {
    return this.live.size;
  }

  handles(): Handle[] {
    return [...this.live.keys()];
  }

  /** Register an Operator and return a fresh handle for it */
  issue(operator: Operator): Handle {
    if (this.nextHandle > Number.MAX_SAFE_INTEGER) {
      throw new InternalError('handle space exhausted');
    }

    const handle = this.nextHandle;
    this.nextHandle += 1;
    this.live.set(handle, operator);

    this.logger.debug({ handle, scheme: operator.scheme, live: this.live.size }, 'Handle issued');
    return handle;
  }

  /**
   * Look up the Operator behind a handle.
   * Throws HandleInvalidError for handles never issued or already released.
   */
  resolve(handle: Handle): Operator {
    const operator = this.live.get(handle);
    if (!operator) {
      throw new HandleInvalidError(String(handle));
    }
    return operator;
  }

  /**
   * resolve() for callers at a boundary: a retired handle reports
   * UsedAfterRelease, the same outcome as calling into a released Operator.
   */
  acquire(handle: Handle, operation: string): Operator {
    if (this.isRetired(handle)) {
      throw new UsedAfterReleaseError(`${operation} on handle ${handle}`);
    }
    return this.resolve(handle);
  }

  /** True for a handle that was issued by this manager and has since been released */
  isRetired(handle: Handle): boolean {
    return (
      Number.isSafeInteger(handle) &&
      handle > NULL_HANDLE &&
      handle < this.nextHandle &&
      !this.live.has(handle)
    );
  }

  /**
   * Invalidate a handle and release its Operator.
   *
   * The entry is gone as soon as this method returns its promise; the promise
   * settles once the backend teardown has finished. Only the first call for a
   * handle reaches the Operator: every later call (an explicit release racing
   * a finalizer, say) rejects with HandleInvalidError.
   */
  async release(handle: Handle): Promise<void> {
    const operator = this.live.get(handle);
    if (!operator) {
      throw new HandleInvalidError(String(handle));
    }

    this.live.delete(handle);
    this.logger.debug({ handle, scheme: operator.scheme, live: this.live.size }, 'Handle released');

    await operator.release();
  }

  /** Release every live handle (shutdown path) */
  async releaseAll(): Promise<void> {
    const handles = this.handles();
    await Promise.all(handles.map((handle) => this.release(handle)));
    if (handles.length > 0) {
      this.logger.info({ released: handles.length }, 'Released all live handles');
    }
  }
}
