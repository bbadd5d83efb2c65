import type { FastifyPluginCallback, FastifyError, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

import type { ErrorContext } from '../errors/index.js';
import { Sentry } from '../instrument.js';
import type { ErrorResponse } from '../sdk/types.js';

interface ErrorHandlerOptions {
  isDev: boolean;
}

const GENERIC_INTERNAL = 'An internal error occurred';
const GENERIC_STORAGE_IO = 'The storage backend could not complete the request';

const errorHandler: FastifyPluginCallback<ErrorHandlerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    const code = error.code ?? 'INTERNAL_ERROR';
    const context = contextOf(error);
    const handle = handleOf(request);

    // Storage outcomes (missing paths, released handles) are client-side; only 5xx is an error
    const logData = { err: error, code, statusCode, handle, ...context };
    if (statusCode >= 500) {
      request.log.error(logData, 'Request error');
    } else {
      request.log.warn(logData, 'Request failed');
    }

    if (statusCode >= 500) {
      Sentry.captureException(error, {
        extra: {
          requestId: request.id,
          url: request.url,
          method: request.method,
          handle,
        },
        ...(context && { tags: { scheme: context.scheme, operation: context.operation } }),
      });
    }

    const response: ErrorResponse = {
      error: {
        code,
        message: isDev ? error.message : sanitizeMessage(error.message, code, statusCode),
        statusCode,
        // Only include stack in development
        ...(isDev && error.stack && { stack: error.stack }),
      },
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };

    reply.status(statusCode).send(response);
  });

  // Handle 404 not found with consistent format
  fastify.setNotFoundHandler((request, reply) => {
    const response: ErrorResponse = {
      error: {
        code: 'NOT_FOUND',
        message: `Route ${request.method}:${request.url} not found`,
        statusCode: 404,
      },
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };

    request.log.warn(
      {
        method: request.method,
        url: request.url,
        requestId: request.id,
      },
      'Route not found'
    );

    reply.status(404).send(response);
  });

  done();
};

/** Operation context attached by the Operator façade, if any */
function contextOf(error: FastifyError): ErrorContext | undefined {
  if (!('context' in error) || typeof error.context !== 'object' || error.context === null) {
    return undefined;
  }
  const { context } = error;
  if (
    'operation' in context &&
    'scheme' in context &&
    'path' in context &&
    typeof context.operation === 'string' &&
    typeof context.scheme === 'string' &&
    typeof context.path === 'string'
  ) {
    return { operation: context.operation, scheme: context.scheme, path: context.path };
  }
  return undefined;
}

/**
 * Operator handle the request's token resolved to. Tokens are bearer
 * credentials and never reach the logs; the handle identifies the Operator.
 */
export function handleOf(request: FastifyRequest): number | undefined {
  return request.operatorHandle ?? undefined;
}

function sanitizeMessage(message: string, code: string, statusCode: number): string {
  // Allow rate limit messages
  if (statusCode === 429) {
    return message;
  }
  if (code === 'INTERNAL_ERROR' || code.startsWith('SERVER_')) {
    return GENERIC_INTERNAL;
  }
  // Backend transport failures may echo endpoints or driver internals
  if (code === 'STORAGE_IO') {
    return GENERIC_STORAGE_IO;
  }
  // Everything else (CONFIG_*, BACKEND_*, STORAGE_*, HANDLE_*, GATEWAY_*) is user-facing
  return message;
}

export const errorHandlerPlugin = fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
