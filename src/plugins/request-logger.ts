import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import { handleOf } from './error-handler.js';

// Bodies are never logged: objects are opaque bytes and operator configs carry credentials
const requestLogger: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.addHook('onRequest', async (request) => {
    request.log.info(
      {
        method: request.method,
        url: request.url,
        requestId: request.id,
        userAgent: request.headers['user-agent'],
        contentType: request.headers['content-type'],
        contentLength: request.headers['content-length'],
      },
      'Incoming request'
    );
  });

  // Completed requests are keyed by route pattern and operator handle, not by object path
  fastify.addHook('onResponse', async (request, reply) => {
    const logData = {
      method: request.method,
      route: request.routeOptions.url ?? request.url,
      handle: handleOf(request),
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      bytesOut: reply.getHeader('content-length'),
      requestId: request.id,
    };

    if (reply.statusCode >= 500) {
      request.log.error(logData, 'Request completed with server error');
    } else if (reply.statusCode >= 400) {
      request.log.warn(logData, 'Request completed with client error');
    } else {
      request.log.info(logData, 'Request completed');
    }
  });

  done();
};

export const requestLoggerPlugin = fp(requestLogger, {
  name: 'request-logger',
  fastify: '5.x',
});
