import { z } from 'zod';

const DEFAULT_BODY_LIMIT = 10 * 1024 * 1024; // 10MB

/**
 * A scheme the gateway opens for clients. `config` is owned by the server;
 * clients may add only the keys listed in `clientKeys`, so storage roots,
 * endpoints and credentials stay under the operator's control.
 */
export const GatewayBackendSchema = z
  .object({
    config: z.record(z.string(), z.string()).default({}),
    clientKeys: z.array(z.string().min(1)).default([]),
  })
  .refine((backend) => backend.clientKeys.every((key) => !(key in backend.config)), {
    message: 'clientKeys must not repeat keys fixed in config',
    path: ['clientKeys'],
  });

export type GatewayBackend = z.infer<typeof GatewayBackendSchema>;

const defaultBackends = (): Record<string, GatewayBackend> => ({
  memory: { config: {}, clientKeys: ['root', 'max_bytes'] },
});

export const ConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(1).max(65535).default(3000),
    })
    .default(() => ({ host: '0.0.0.0', port: 3000 })),

  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default(() => ({ level: 'info' as const, pretty: false })),

  // Optional Sentry integration
  sentry: z
    .object({
      dsn: z.string().url(),
      environment: z.string().default('development'),
      tracesSampleRate: z.number().min(0).max(1).default(0.1),
    })
    .optional(),

  // Environment mode
  env: z.enum(['development', 'production', 'test']).default('development'),

  // Rate limiting configuration
  rateLimit: z
    .object({
      global: z.number().int().min(1).default(100),
      /** Applies to opening operators (each one may hold sockets or clients) */
      sensitive: z.number().int().min(1).default(20),
      windowMs: z.number().int().min(1000).default(60000),
    })
    .default(() => ({ global: 100, sensitive: 20, windowMs: 60000 })),

  // HTTP gateway over the operator handles
  gateway: z
    .object({
      /** Maximum object size accepted by PUT (default: 10MB) */
      bodyLimit: z.number().int().min(1024).default(DEFAULT_BODY_LIMIT),
      /** Schemes the gateway may open, by name (default: memory only) */
      backends: z.record(z.string().min(1), GatewayBackendSchema).default(defaultBackends),
    })
    .default(() => ({ bodyLimit: DEFAULT_BODY_LIMIT, backends: defaultBackends() })),
});

export type Config = z.infer<typeof ConfigSchema>;
