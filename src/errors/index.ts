import createError from '@fastify/error';
import type { FastifyError } from 'fastify';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Server errors (SERVER_*)
export const ServerStartError = createError<[string]>(
  'SERVER_START_ERROR',
  'Failed to start server: %s',
  500
);

// Gateway request errors (GATEWAY_*)
export const GatewayBodyInvalidError = createError<[string]>(
  'GATEWAY_BODY_INVALID',
  'Object body must be raw bytes or text, got %s',
  415
);

export const SchemeNotAllowedError = createError<[string]>(
  'GATEWAY_SCHEME_NOT_ALLOWED',
  'Scheme is not enabled on this gateway: %s',
  403
);

/** Roots, endpoints and other server-owned keys are never taken from clients */
export const ConfigKeyNotAllowedError = createError<[string, string]>(
  'GATEWAY_CONFIG_KEY_NOT_ALLOWED',
  'Configuration key %s cannot be set by clients for scheme %s',
  403
);

// Generic internal error
export const InternalError = createError<[string]>('INTERNAL_ERROR', 'Internal error: %s', 500);

// Construction errors (BACKEND_*) -- raised while resolving a scheme into a backend

/** No factory is registered for the requested scheme (400) */
export const UnknownSchemeError = createError<[string]>(
  'BACKEND_UNKNOWN_SCHEME',
  'Unknown storage scheme: %s',
  400
);

/** The scheme is known but its configuration map was rejected (400) */
export const BackendConfigInvalidError = createError<[string, string]>(
  'BACKEND_CONFIG_INVALID',
  'Invalid configuration for scheme %s: %s',
  400
);

/** A second factory was registered under an existing scheme (500) */
export const SchemeAlreadyRegisteredError = createError<[string]>(
  'BACKEND_SCHEME_REGISTERED',
  'Storage scheme already registered: %s',
  500
);

// Operation errors (STORAGE_*) -- outcomes of read/write/delete/stat and friends

/** Path does not exist in the backend (404) */
export const NotFoundError = createError<[string]>(
  'STORAGE_NOT_FOUND',
  'Path not found: %s',
  404
);

/** Backend refused the credentials or the path (403) */
export const PermissionDeniedError = createError<[string]>(
  'STORAGE_PERMISSION_DENIED',
  'Permission denied: %s',
  403
);

/** Transport or protocol failure talking to the backend (502) */
export const StorageIoError = createError<[string]>(
  'STORAGE_IO',
  'Storage I/O failure: %s',
  502
);

/** Backend capacity exhausted (507) */
export const QuotaExceededError = createError<[string]>(
  'STORAGE_QUOTA_EXCEEDED',
  'Storage quota exceeded: %s',
  507
);

/** Operator was released before the call reached it (410) */
export const UsedAfterReleaseError = createError<[string]>(
  'STORAGE_USED_AFTER_RELEASE',
  'Operator has been released: %s',
  410
);

/** Backend does not implement an optional operation (501) */
export const UnsupportedError = createError<[string, string]>(
  'STORAGE_UNSUPPORTED',
  'Operation %s is not supported by scheme %s',
  501
);

// Lookup errors (HANDLE_*) -- lifecycle bugs on the caller side, never storage outcomes

/** Handle was never issued or has already been released (404) */
export const HandleInvalidError = createError<[string]>(
  'HANDLE_INVALID',
  'Invalid or released handle: %s',
  404
);

export const CONSTRUCTION_ERROR_CODES: ReadonlySet<string> = new Set([
  'BACKEND_UNKNOWN_SCHEME',
  'BACKEND_CONFIG_INVALID',
]);

export const OPERATION_ERROR_CODES: ReadonlySet<string> = new Set([
  'STORAGE_NOT_FOUND',
  'STORAGE_PERMISSION_DENIED',
  'STORAGE_IO',
  'STORAGE_QUOTA_EXCEEDED',
  'STORAGE_USED_AFTER_RELEASE',
  'STORAGE_UNSUPPORTED',
]);

export const LOOKUP_ERROR_CODES: ReadonlySet<string> = new Set(['HANDLE_INVALID']);

function hasCode(error: unknown, codes: ReadonlySet<string>): error is FastifyError {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    codes.has(error.code)
  );
}

export function isConstructionError(error: unknown): error is FastifyError {
  return hasCode(error, CONSTRUCTION_ERROR_CODES);
}

export function isOperationError(error: unknown): error is FastifyError {
  return hasCode(error, OPERATION_ERROR_CODES);
}

export function isLookupError(error: unknown): error is FastifyError {
  return hasCode(error, LOOKUP_ERROR_CODES);
}

export type Operation =
  | 'read'
  | 'write'
  | 'delete'
  | 'stat'
  | 'list'
  | 'copy'
  | 'rename'
  | 'createDir';

/** Where an operation error came from. Attached by the Operator façade. */
export interface ErrorContext {
  operation: Operation;
  scheme: string;
  path: string;
}

export function withContext<E extends Error>(error: E, context: ErrorContext): E & {
  context: ErrorContext;
} {
  return Object.assign(error, { context });
}

/**
 * Rebuild a taxonomy error from a code + message pair, e.g. after it crossed
 * the binding or the HTTP gateway. The received message is kept verbatim.
 */
export function errorFromCode(code: string, message: string): FastifyError {
  const error = instantiate(code, message);
  error.message = message;
  return error;
}

function instantiate(code: string, detail: string): FastifyError {
  switch (code) {
    case 'BACKEND_UNKNOWN_SCHEME':
      return new UnknownSchemeError(detail);
    case 'BACKEND_CONFIG_INVALID':
      return new BackendConfigInvalidError('', detail);
    case 'STORAGE_NOT_FOUND':
      return new NotFoundError(detail);
    case 'STORAGE_PERMISSION_DENIED':
      return new PermissionDeniedError(detail);
    case 'STORAGE_IO':
      return new StorageIoError(detail);
    case 'STORAGE_QUOTA_EXCEEDED':
      return new QuotaExceededError(detail);
    case 'STORAGE_USED_AFTER_RELEASE':
      return new UsedAfterReleaseError(detail);
    case 'STORAGE_UNSUPPORTED':
      return new UnsupportedError(detail, '');
    case 'HANDLE_INVALID':
      return new HandleInvalidError(detail);
    case 'GATEWAY_BODY_INVALID':
      return new GatewayBodyInvalidError(detail);
    case 'GATEWAY_SCHEME_NOT_ALLOWED':
      return new SchemeNotAllowedError(detail);
    case 'GATEWAY_CONFIG_KEY_NOT_ALLOWED':
      return new ConfigKeyNotAllowedError(detail, '');
    default:
      return new InternalError(`${code}: ${detail}`);
  }
}
