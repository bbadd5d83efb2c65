// Backend capability interface.
//
// Every storage protocol implements this set against its own service. The
// mandatory surface is read/write/delete/stat; list, copy, rename and
// createDir are optional and advertised through `capabilities`.

import type { BaseLogger } from 'pino';

/** String-keyed configuration map handed to a backend factory */
export type BackendConfig = Record<string, string>;

export type EntryMode = 'file' | 'dir';

/** Stat result: metadata of an existing entry */
export interface Metadata {
  mode: EntryMode;
  contentLength: number;
  lastModified: Date | null;
  contentType?: string;
  etag?: string;
}

export interface Entry {
  /** Path relative to the operator root; directories end with "/" */
  path: string;
  metadata: Metadata;
}

export interface Capabilities {
  list: boolean;
  copy: boolean;
  rename: boolean;
  createDir: boolean;
}

export interface BackendInfo {
  scheme: string;
  /** Normalized root, always starting and ending with "/" */
  root: string;
  capabilities: Capabilities;
}

/**
 * A live connection or context for one storage protocol.
 *
 * Implementations throw the taxonomy errors from `errors/` (NotFound,
 * PermissionDenied, Io, QuotaExceeded). Retry and timeout policy belongs
 * here, not in the Operator.
 */
export interface Backend {
  info(): BackendInfo;

  /** Full content of a file, or NotFound */
  read(path: string): Promise<Buffer>;

  /** Unconditional overwrite */
  write(path: string, content: Buffer): Promise<void>;

  /** Removing a missing path succeeds */
  delete(path: string): Promise<void>;

  stat(path: string): Promise<Metadata>;

  /** Direct children of a directory path */
  list?(path: string): Promise<Entry[]>;

  copy?(from: string, to: string): Promise<void>;

  rename?(from: string, to: string): Promise<void>;

  createDir?(path: string): Promise<void>;

  /** Tear down sub-resources (sockets, clients). Called exactly once. */
  close(): Promise<void>;
}

export interface BackendContext {
  logger: BaseLogger;
}

/**
 * Builds a backend for one scheme. Rejects with BackendConfigInvalidError
 * when the configuration cannot produce a working backend.
 */
export type BackendFactory = (
  config: BackendConfig,
  context: BackendContext
) => Backend | Promise<Backend>;
