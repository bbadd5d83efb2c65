// Object routes -- read/write/delete/stat/list through an operator token.
//
// The object path is the wildcard tail of the URL, relative to the operator
// root. A token whose operator was released answers 410
// (STORAGE_USED_AFTER_RELEASE); one that was never issued answers 404
// (HANDLE_INVALID).

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import { HandleParamsSchema, operatorFor } from './operators.js';
import { GatewayBodyInvalidError } from '../errors/index.js';
import { ListResponseSchema, StatResponseSchema, toStatResponse } from '../sdk/types.js';
import type { ListResponse, StatResponse } from '../sdk/types.js';

const ObjectParamsSchema = HandleParamsSchema.extend({
  '*': z.string().describe('Object path relative to the operator root'),
});

type ObjectParams = z.infer<typeof ObjectParamsSchema>;

const objectRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const { bodyLimit } = fastify.config.gateway;

  // Raw uploads arrive as Buffers; text/plain keeps Fastify's string parser
  fastify.addContentTypeParser(
    'application/octet-stream',
    { parseAs: 'buffer', bodyLimit },
    (_request, body, parsed) => {
      parsed(null, body);
    }
  );

  fastify.get<{ Params: ObjectParams }>(
    '/operators/:handle/objects/*',
    {
      schema: {
        description: 'Read an object (application/octet-stream)',
        tags: ['Gateway'],
        params: ObjectParamsSchema,
      },
    },
    async (request, reply) => {
      const { handle, '*': path } = request.params;
      const content = await operatorFor(fastify, request, handle, 'read').read(path);

      return reply
        .status(200)
        .header('Content-Type', 'application/octet-stream')
        .header('Content-Length', content.length.toString())
        .send(content);
    }
  );

  fastify.put<{ Params: ObjectParams; Body: unknown }>(
    '/operators/:handle/objects/*',
    {
      schema: {
        description: 'Write an object, replacing any existing content',
        tags: ['Gateway'],
        params: ObjectParamsSchema,
      },
      bodyLimit,
    },
    async (request, reply) => {
      const { handle, '*': path } = request.params;
      const { body } = request;

      if (!Buffer.isBuffer(body) && typeof body !== 'string') {
        throw new GatewayBodyInvalidError(request.headers['content-type'] ?? 'no content type');
      }

      await operatorFor(fastify, request, handle, 'write').write(path, body);
      return reply.status(204).send();
    }
  );

  fastify.delete<{ Params: ObjectParams }>(
    '/operators/:handle/objects/*',
    {
      schema: {
        description: 'Delete an object (deleting a missing object succeeds)',
        tags: ['Gateway'],
        params: ObjectParamsSchema,
      },
    },
    async (request, reply) => {
      const { handle, '*': path } = request.params;
      await operatorFor(fastify, request, handle, 'delete').delete(path);
      return reply.status(204).send();
    }
  );

  fastify.get<{ Params: ObjectParams; Reply: StatResponse }>(
    '/operators/:handle/stat/*',
    {
      schema: {
        description: 'Metadata of a file or directory',
        tags: ['Gateway'],
        params: ObjectParamsSchema,
        response: { 200: StatResponseSchema },
      },
    },
    async (request, reply) => {
      const { handle, '*': path } = request.params;
      const metadata = await operatorFor(fastify, request, handle, 'stat').stat(path);
      return reply.status(200).send(toStatResponse(metadata));
    }
  );

  fastify.get<{ Params: ObjectParams; Reply: ListResponse }>(
    '/operators/:handle/list/*',
    {
      schema: {
        description: 'Direct children of a directory',
        tags: ['Gateway'],
        params: ObjectParamsSchema,
        response: { 200: ListResponseSchema },
      },
    },
    async (request, reply) => {
      const { handle, '*': path } = request.params;
      const entries = await operatorFor(fastify, request, handle, 'list').list(path || '/');

      return reply.status(200).send({
        entries: entries.map((entry) => ({
          path: entry.path,
          metadata: toStatResponse(entry.metadata),
        })),
      });
    }
  );

  done();
};

export const objectRoutesPlugin = fp(objectRoutes, {
  name: 'object-routes',
  fastify: '5.x',
});
