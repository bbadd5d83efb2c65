import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import { HealthResponseSchema } from '../sdk/types.js';
import type { HealthResponse } from '../sdk/types.js';
import { gatewaySchemes } from './schemes.js';

// Read version once at startup (not on every request)
const packageJson = JSON.parse(readFileSync(resolve(process.cwd(), 'package.json'), 'utf-8')) as {
  version: string;
};
const APP_VERSION = packageJson.version;

const healthRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    {
      schema: {
        description: 'Liveness, version and the number of live operator handles',
        tags: ['Health'],
        response: { 200: HealthResponseSchema },
      },
    },
    async (_request, reply) => {
      const response: HealthResponse = {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: APP_VERSION,
        uptime: process.uptime(),
        handles: fastify.handles.size,
        schemes: gatewaySchemes(fastify),
      };

      return reply.status(200).send(response);
    }
  );

  done();
};

export const healthRoutesPlugin = fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
