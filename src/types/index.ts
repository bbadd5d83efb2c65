// stowage gateway type definitions

import type { Config } from '../config/index.js';
import type { Handle, HandleManager, HandleTokens } from '../handles/index.js';
import type { BackendRegistry } from '../storage/index.js';

// Augment Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    registry: BackendRegistry;
    handles: HandleManager;
    tokens: HandleTokens;
  }

  interface FastifyRequest {
    /** Handle behind the request's token, once a route has resolved it */
    operatorHandle: Handle | null;
  }
}
