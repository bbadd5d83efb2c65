// Operator lifecycle routes.
//
// POST /operators resolves a scheme into a live Operator and returns a token
// for it; DELETE /operators/:handle releases it. Releasing a token whose
// Operator was already released succeeds again, so clients may retry.
//
// The server's `gateway.backends` entry owns each scheme's configuration.
// A client may add only the keys listed in its `clientKeys`, so roots,
// endpoints and hosts never come from the network.

import type { FastifyInstance, FastifyPluginCallback, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import { ConfigKeyNotAllowedError, SchemeNotAllowedError } from '../errors/index.js';
import type { Operation } from '../errors/index.js';
import { Operator } from '../operator/index.js';
import { OpenOperatorRequestSchema, OpenOperatorResponseSchema } from '../sdk/types.js';
import type { OpenOperatorResponse } from '../sdk/types.js';
import type { BackendConfig } from '../storage/index.js';

export const HandleParamsSchema = z.object({
  handle: z.string().uuid().describe('Operator token returned by POST /operators'),
});

type OpenOperatorBody = z.infer<typeof OpenOperatorRequestSchema>;
type HandleParams = z.infer<typeof HandleParamsSchema>;

/**
 * The Operator behind a client token, for one operation. The resolved handle
 * is kept on the request for logging.
 */
export function operatorFor(
  fastify: FastifyInstance,
  request: FastifyRequest,
  token: string,
  operation: Operation
): Operator {
  const handle = fastify.tokens.resolve(token);
  request.operatorHandle = handle;
  return fastify.handles.acquire(handle, operation);
}

/** Server-owned config for `scheme` plus the client keys it permits */
function gatewayConfig(
  fastify: FastifyInstance,
  scheme: string,
  requested: BackendConfig
): BackendConfig {
  const { backends } = fastify.config.gateway;
  const backend = Object.hasOwn(backends, scheme) ? backends[scheme] : undefined;
  // Unknown schemes pass through so the registry reports BACKEND_UNKNOWN_SCHEME
  if (!backend) {
    if (fastify.registry.has(scheme)) {
      throw new SchemeNotAllowedError(scheme);
    }
    return {};
  }

  for (const key of Object.keys(requested)) {
    if (!backend.clientKeys.includes(key)) {
      throw new ConfigKeyNotAllowedError(key, scheme);
    }
  }
  return { ...backend.config, ...requested };
}

const operatorRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.post<{ Body: OpenOperatorBody; Reply: OpenOperatorResponse }>(
    '/operators',
    {
      schema: {
        description: 'Open an operator for an enabled storage scheme',
        tags: ['Gateway'],
        body: OpenOperatorRequestSchema,
        response: { 201: OpenOperatorResponseSchema },
      },
      config: {
        rateLimit: {
          max: fastify.config.rateLimit.sensitive,
          timeWindow: fastify.config.rateLimit.windowMs,
        },
      },
    },
    async (request, reply) => {
      const { scheme } = request.body;
      const config = gatewayConfig(fastify, scheme, request.body.config);

      const operator = await Operator.open(scheme, config, {
        registry: fastify.registry,
        logger: fastify.log,
      });
      const handle = fastify.handles.issue(operator);
      request.operatorHandle = handle;

      request.log.info({ handle, scheme }, 'Operator opened');

      return reply.status(201).send({
        handle: fastify.tokens.issue(handle),
        scheme,
        capabilities: operator.info().capabilities,
      });
    }
  );

  fastify.delete<{ Params: HandleParams }>(
    '/operators/:handle',
    {
      schema: {
        description: 'Release an operator (repeat releases succeed)',
        tags: ['Gateway'],
        params: HandleParamsSchema,
      },
    },
    async (request, reply) => {
      const handle = fastify.tokens.resolve(request.params.handle);
      request.operatorHandle = handle;

      if (!fastify.handles.isRetired(handle)) {
        await fastify.handles.release(handle);
        request.log.info({ handle }, 'Operator released');
      }

      return reply.status(204).send();
    }
  );

  done();
};

export const operatorRoutesPlugin = fp(operatorRoutes, {
  name: 'operator-routes',
  fastify: '5.x',
});
