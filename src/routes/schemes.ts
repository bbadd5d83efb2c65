// GET /schemes route -- storage schemes this gateway can open.
//
// Registered schemes that have a `gateway.backends` entry. Schemes without
// one stay usable in process but are refused over HTTP.

import type { FastifyInstance, FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import { SchemesResponseSchema } from '../sdk/types.js';

export function gatewaySchemes(fastify: FastifyInstance): string[] {
  const configured = fastify.config.gateway.backends;
  return fastify.registry.schemes().filter((scheme) => Object.hasOwn(configured, scheme));
}

const schemesRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get(
    '/schemes',
    {
      schema: {
        description: 'List the storage schemes operators can be opened with',
        tags: ['Health'],
        response: { 200: SchemesResponseSchema },
      },
    },
    async (_request, reply) => {
      return reply.status(200).send({ schemes: gatewaySchemes(fastify) });
    }
  );

  done();
};

export const schemesRoutesPlugin = fp(schemesRoutes, {
  name: 'schemes-routes',
  fastify: '5.x',
});
