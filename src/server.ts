import { randomUUID } from 'node:crypto';

import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import type { Config } from './config/index.js';
import { HandleManager, HandleTokens } from './handles/index.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { requestLoggerPlugin } from './plugins/request-logger.js';
import { healthRoutesPlugin } from './routes/health.js';
import { objectRoutesPlugin } from './routes/objects.js';
import { operatorRoutesPlugin } from './routes/operators.js';
import { schemesRoutesPlugin } from './routes/schemes.js';
import type { BackendRegistry } from './storage/index.js';
import { createDefaultRegistry } from './storage/index.js';

// Import types to ensure augmentation is loaded
import './types/index.js';

export interface CreateServerOptions {
  config: Config;
  /** Backend registry (default: every built-in scheme) */
  registry?: BackendRegistry;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const isDev = config.env === 'development';

  const server = fastify({
    logger: {
      level: config.logging.level,
      transport: config.logging.pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    },
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
    // request-logger plugin owns request logging
    disableRequestLogging: true,
    // JSON bodies stay small; object uploads set their own limit per route
    bodyLimit: 51200,
  });

  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  server.decorate('config', config);

  // Security headers
  await server.register(helmet, {
    global: true,
    contentSecurityPolicy: isDev ? false : undefined,
  });

  // Rate limiting
  await server.register(rateLimit, {
    max: config.rateLimit.global,
    timeWindow: config.rateLimit.windowMs,
  });

  // Browser clients read object lengths off GET responses
  await server.register(cors, {
    origin: isDev ? true : false,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    exposedHeaders: ['Content-Length', 'X-Request-ID'],
  });

  await server.register(errorHandlerPlugin, { isDev });
  await server.register(requestLoggerPlugin);

  // ---- OpenAPI documentation ----
  await server.register(swagger, {
    openapi: {
      openapi: '3.0.3',
      info: {
        title: 'stowage storage gateway',
        description: 'Uniform storage access over pluggable backends through operator handles.',
        version: '0.1.0',
        license: { name: 'Apache-2.0', url: 'https://www.apache.org/licenses/LICENSE-2.0' },
      },
      servers: [{ url: 'http://localhost:3000', description: 'Development' }],
      tags: [
        { name: 'Health', description: 'Server health and available schemes' },
        { name: 'Gateway', description: 'Operator handles and object access' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await server.register(swaggerUi, {
    routePrefix: '/docs',
  });

  // ---- Operator layer initialization ----
  const registry = options.registry ?? createDefaultRegistry({ logger: server.log });
  const handles = new HandleManager({ logger: server.log });
  const tokens = new HandleTokens();
  server.decorate('registry', registry);
  server.decorate('handles', handles);
  server.decorate('tokens', tokens);
  server.decorateRequest('operatorHandle', null);

  server.log.info(
    { schemes: registry.schemes(), gateway: Object.keys(config.gateway.backends) },
    'Operator layer initialized'
  );

  // Release every live handle so backends close their clients
  server.addHook('onClose', async () => {
    await handles.releaseAll();
    tokens.clear();
    server.log.info('Operator layer shutdown complete');
  });

  // Routes
  await server.register(healthRoutesPlugin);
  await server.register(schemesRoutesPlugin);
  await server.register(operatorRoutesPlugin);
  await server.register(objectRoutesPlugin);

  return server;
}
