// Public library API: registry, Operator, handles, binding and the gateway client

export {
  BackendRegistry,
  FsBackend,
  MemoryBackend,
  RedisBackend,
  WebdavBackend,
  createDefaultRegistry,
  normalizePath,
  normalizeRoot,
  parseBackendConfig,
} from '../storage/index.js';
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
} from '../storage/index.js';
export { Operator } from '../operator/index.js';
export type { OperatorOptions, OperatorState } from '../operator/index.js';
export { HandleManager, NULL_HANDLE } from '../handles/index.js';
export type { Handle } from '../handles/index.js';
export {
  Status,
  StorageBinding,
  StorageOperator,
  flattenConfig,
  statusFromCode,
  unflattenConfig,
} from '../binding/index.js';
export type {
  ConstructResult,
  FlatConfig,
  LastError,
  ListResult,
  ReadResult,
  StatResult,
  StatusResult,
  StorageBindingOptions,
} from '../binding/index.js';
export {
  BackendConfigInvalidError,
  HandleInvalidError,
  NotFoundError,
  PermissionDeniedError,
  QuotaExceededError,
  StorageIoError,
  UnknownSchemeError,
  UnsupportedError,
  UsedAfterReleaseError,
  errorFromCode,
  isConstructionError,
  isLookupError,
  isOperationError,
} from '../errors/index.js';
export type { ErrorContext, Operation } from '../errors/index.js';
export { createLogger } from '../logger.js';
export { GatewayClient } from './gateway-client.js';
export type { GatewayClientOptions } from './gateway-client.js';
export type {
  HealthResponse,
  ListResponse,
  OpenOperatorRequest,
  OpenOperatorResponse,
  SchemesResponse,
  StatResponse,
} from './types.js';
export {
  ListResponseSchema,
  OpenOperatorRequestSchema,
  OpenOperatorResponseSchema,
  StatResponseSchema,
} from './types.js';
