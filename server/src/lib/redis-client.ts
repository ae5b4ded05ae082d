import { Redis } from 'ioredis';
import { errorMessage } from './errors.js';
import logger from './logger.js';

/**
 * Creates a Redis client for the worker process. Owned by the caller, which
 * closes it with `closeRedis` during shutdown.
 *
 * `maxRetriesPerRequest: null` keeps blocking stream reads from failing while
 * the connection is re-established.
 */
export function createRedisClient(redisUrl: string, name = 'worker'): Redis {
  const client = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    connectTimeout: 5000,
    lazyConnect: true,
    connectionName: name,
  });

  client.on('error', (err: Error) => {
    logger.warn(
      { err: err.message, connection: name },
      'Redis connection error',
    );
  });

  return client;
}

/**
 * Gracefully closes a Redis connection. Safe to call on a client that never
 * connected.
 */
export async function closeRedis(client: Redis): Promise<void> {
  try {
    await client.quit();
  } catch (err) {
    logger.warn({ err: errorMessage(err) }, 'Redis quit failed, disconnecting');
    client.disconnect();
  }
}
