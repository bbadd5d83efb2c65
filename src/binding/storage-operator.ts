// Host-side wrapper that turns binding statuses back into thrown errors.
//
// The wrapper owns one handle. close() releases it deterministically; if the
// wrapper is garbage-collected first, a FinalizationRegistry callback releases
// it instead. Both paths go through StorageBinding.release(), which treats a
// handle that is already retired as a no-op, so the two may race freely.

import { Status } from './status.js';
import { flattenConfig } from './config-transport.js';
import type { StatusResult, StorageBinding } from './storage-binding.js';
import { StorageIoError, errorFromCode } from '../errors/index.js';
import type { Handle } from '../handles/index.js';
import type { BackendConfig, Entry, Metadata } from '../storage/index.js';

export interface HeldHandle {
  binding: StorageBinding;
  handle: Handle;
}

/**
 * Finalizer callback: release a handle whose wrapper was collected without
 * close(). StorageBinding.release reports failures as a status and never
 * rejects.
 */
export function releaseOnCollect({ binding, handle }: HeldHandle): void {
  void binding.release(handle);
}

const finalizer = new FinalizationRegistry<HeldHandle>(releaseOnCollect);

export class StorageOperator {
  readonly scheme: string;
  readonly handle: Handle;
  private readonly binding: StorageBinding;
  private closed = false;

  private constructor(binding: StorageBinding, scheme: string, handle: Handle) {
    this.binding = binding;
    this.scheme = scheme;
    this.handle = handle;
    finalizer.register(this, { binding, handle }, this);
  }

  static async open(
    binding: StorageBinding,
    scheme: string,
    config: BackendConfig = {}
  ): Promise<StorageOperator> {
    const { params, count } = flattenConfig(config);
    const result = await binding.construct(scheme, params, count);
    check(result);
    return new StorageOperator(binding, scheme, result.handle);
  }

  async read(path: string): Promise<Buffer> {
    const result = await this.binding.read(this.handle, path);
    check(result);
    if (result.content === null) {
      throw new StorageIoError('binding returned no content for a successful read');
    }
    return result.content;
  }

  async readText(path: string): Promise<string> {
    return (await this.read(path)).toString('utf-8');
  }

  async write(path: string, content: string | Uint8Array): Promise<void> {
    check(await this.binding.write(this.handle, path, content));
  }

  async delete(path: string): Promise<void> {
    check(await this.binding.delete(this.handle, path));
  }

  async stat(path: string): Promise<Metadata> {
    const result = await this.binding.stat(this.handle, path);
    check(result);
    if (result.stat === null) {
      throw new StorageIoError('binding returned no metadata for a successful stat');
    }
    return result.stat;
  }

  async list(path = '/'): Promise<Entry[]> {
    const result = await this.binding.list(this.handle, path);
    check(result);
    return result.entries;
  }

  /** Release the handle now. Later calls are no-ops. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    finalizer.unregister(this);
    check(await this.binding.release(this.handle));
  }
}

/** Throw the failure carried by this call's own result */
function check(result: StatusResult): void {
  if (result.status === Status.Ok) return;
  throw result.error
    ? errorFromCode(result.error.code, result.error.message)
    : new StorageIoError(`binding reported status ${result.status} without an error record`);
}
