// Standalone pino logger for library use (registry, operator, binding).
//
// The gateway does not use this: Fastify builds its own pino instance from
// the same logging config and hands `server.log` to the components.

import pino from 'pino';
import type { Logger } from 'pino';

import type { Config } from './config/index.js';

export type LoggingConfig = Config['logging'];

export function createLogger(
  config: LoggingConfig = { level: 'warn', pretty: false },
  name = 'stowage'
): Logger {
  return pino({
    name,
    level: config.level,
    // Never log credentials carried in backend configuration maps
    redact: ['config.password', 'config.token'],
    transport: config.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  });
}
