/**
 * Shared Redis connection helper for the record store and event publisher.
 *
 * @module services/redis-client
 */

import { createClient } from 'redis';
import { errorMessage, logger } from '../utils/logger';

export type RedisClient = ReturnType<typeof createClient>;

/**
 * Connect and PING. Reconnection gives up after three retries so a missing
 * Redis falls through to the caller's in-memory fallback.
 */
export async function connectRedis(url: string, label: string): Promise<RedisClient> {
  const client = createClient({
    url,
    socket: {
      connectTimeout: 5000,
      reconnectStrategy: (retries) => {
        if (retries > 3) {
          logger.error(`${label}: Redis max reconnection attempts reached`);
          return false;
        }
        return Math.min(retries * 100, 3000);
      }
    }
  });

  client.on('error', (err: unknown) => {
    logger.error(`${label}: Redis client error`, { error: errorMessage(err) });
  });

  try {
    await client.connect();
    await client.ping();
  } catch (error) {
    if (client.isOpen) {
      await client.quit();
    }
    throw error;
  }
  return client;
}
