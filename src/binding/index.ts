export { Status, statusFromCode } from './status.js';
export { flattenConfig, unflattenConfig } from './config-transport.js';
export type { FlatConfig } from './config-transport.js';
export { StorageBinding } from './storage-binding.js';
export type {
  ConstructResult,
  LastError,
  ListResult,
  ReadResult,
  StatResult,
  StatusResult,
  StorageBindingOptions,
} from './storage-binding.js';
export { StorageOperator, releaseOnCollect } from './storage-operator.js';
export type { HeldHandle } from './storage-operator.js';
