import { Redis, RedisOptions } from 'ioredis';
import { config } from '../config/index.js';

let redisConnection: Redis | null = null;

/**
 * Connection options shared by the dispatch queue and worker
 */
export function redisOptions(): RedisOptions {
  return {
    connectionName: 'webhook-dispatch',
    maxRetriesPerRequest: null, // Required for BullMQ
  };
}

export function getRedisConnection(): Redis {
  if (!redisConnection) {
    const redisConfig = config.redis;

    redisConnection =
      'url' in redisConfig
        ? new Redis(redisConfig.url, redisOptions())
        : new Redis({
            ...redisOptions(),
            host: redisConfig.host,
            port: redisConfig.port,
            password: redisConfig.password,
          });

    redisConnection.on('error', (err) => {
      console.error('[Redis] Connection error:', err.message);
    });

    redisConnection.on('connect', () => {
      console.log('[Redis] Connected successfully');
    });
  }

  return redisConnection;
}

/**
 * Readiness check for the scheduler's queue backend
 */
export async function checkRedisConnection(): Promise<boolean> {
  try {
    return (await getRedisConnection().ping()) === 'PONG';
  } catch (error) {
    console.error('[Redis] Ping failed:', error);
    return false;
  }
}

export async function closeRedisConnection(): Promise<void> {
  if (redisConnection) {
    await redisConnection.quit();
    redisConnection = null;
    console.log('[Redis] Connection closed');
  }
}
