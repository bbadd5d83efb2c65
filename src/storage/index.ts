// Storage module barrel export and default registry.

import type { BaseLogger } from 'pino';

import { FsBackend } from './fs-backend.js';
import { MemoryBackend } from './memory-backend.js';
import { RedisBackend } from './redis-backend.js';
import { BackendRegistry } from './registry.js';
import { WebdavBackend } from './webdav-backend.js';

export type {
  Backend,
  BackendConfig,
  BackendContext,
  BackendFactory,
  BackendInfo,
  Capabilities,
  Entry,
  EntryMode,
  Metadata,
} from './types.js';
export { BackendRegistry, parseBackendConfig } from './registry.js';
export { FsBackend } from './fs-backend.js';
export { MemoryBackend } from './memory-backend.js';
export { RedisBackend } from './redis-backend.js';
export { WebdavBackend } from './webdav-backend.js';
export { normalizePath, normalizeRoot } from './path.js';

/** Registry with every built-in scheme: memory, fs, webdav, redis */
export function createDefaultRegistry(options: { logger?: BaseLogger } = {}): BackendRegistry {
  return new BackendRegistry(options)
    .register('memory', (config) => MemoryBackend.fromConfig(config))
    .register('fs', (config) => FsBackend.fromConfig(config))
    .register('webdav', (config) => WebdavBackend.fromConfig(config))
    .register('redis', (config, { logger }) => RedisBackend.fromConfig(config, logger));
}
