// One ioredis client per redis operator. Connection events are logged with
// the keyspace they serve so several operators on one server stay apart.

import Redis from 'ioredis';
import type { BaseLogger } from 'pino';

export interface RedisConnectionOptions {
  host: string;
  port: number;
  password?: string;
  username?: string;
  db?: number;
  /** Key prefix the operator works under; only used to label the connection */
  root?: string;
}

/** Reconnect attempts after a dropped connection before commands start failing */
const MAX_RECONNECTS = 10;

/**
 * Build a client that is not yet connected; RedisBackend.fromConfig connects
 * it so an unreachable server fails construction. While disconnected,
 * commands fail at once instead of queueing, and each failure surfaces as
 * STORAGE_IO on the operation that issued it.
 */
export function createRedisClient(options: RedisConnectionOptions, logger: BaseLogger): Redis {
  const keyspace = {
    host: options.host,
    port: options.port,
    db: options.db ?? 0,
    root: options.root ?? '/',
  };

  const client = new Redis({
    host: options.host,
    port: options.port,
    ...(options.password && { password: options.password }),
    ...(options.username && { username: options.username }),
    ...(options.db !== undefined && { db: options.db }),
    connectionName: `stowage:${keyspace.root}`,
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 3,
    retryStrategy(times: number): number | null {
      if (times > MAX_RECONNECTS) {
        logger.warn({ ...keyspace, attempts: times - 1 }, 'Redis reconnect attempts exhausted');
        return null;
      }
      return Math.min(times * 200, 2000);
    },
  });

  client.on('ready', () => {
    logger.debug(keyspace, 'Redis operator connection ready');
  });

  client.on('error', (err: Error) => {
    logger.warn({ ...keyspace, err: err.message }, 'Redis operator connection error');
  });

  client.on('end', () => {
    logger.debug(keyspace, 'Redis operator connection ended');
  });

  return client;
}

/** QUIT unless the connection has already ended (release after a failed reconnect) */
export async function disconnectRedis(redis: Redis): Promise<void> {
  if (redis.status === 'end') return;
  await redis.quit();
}
