import { Redis } from 'ioredis';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';

const redisLogger = logger.child({ service: 'redis' });

let client: Redis | null = null;

/**
 * Redis client for registration persistence, or null when REDIS_URL is unset.
 * Created on first use.
 */
export function getRedis(): Redis | null {
  if (!config.REDIS_URL) {
    return null;
  }
  if (client) {
    return client;
  }

  client = new Redis(config.REDIS_URL, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      const delay = Math.min(times * 50, 2000);
      redisLogger.warn({ attempt: times, delay }, 'Redis connection retry');
      return delay;
    },
    reconnectOnError(err) {
      const targetError = 'READONLY';
      if (err.message.includes(targetError)) {
        return true;
      }
      return false;
    },
  });

  client.on('connect', () => {
    redisLogger.info('Redis connected');
  });

  client.on('error', (err) => {
    redisLogger.error({ err }, 'Redis error');
  });

  client.on('close', () => {
    redisLogger.warn('Redis connection closed');
  });

  return client;
}

/**
 * Redis key prefixes for different data types.
 */
export const RedisKeys = {
  // Persisted registration: registration:{instanceId}
  registration: (instanceId: string) => `trixel:registration:${instanceId}`,
} as const;

/**
 * Health check for Redis connection. Healthy when Redis is not configured.
 */
export async function redisHealthCheck(): Promise<boolean> {
  if (!client) {
    return true;
  }
  try {
    await client.ping();
    return true;
  } catch {
    return false;
  }
}

/**
 * Graceful shutdown.
 */
export async function redisShutdown(): Promise<void> {
  if (!client) {
    return;
  }
  redisLogger.info('Closing Redis connection');
  await client.quit();
  client = null;
}
