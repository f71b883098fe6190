import { createClient } from 'redis';
import { logger } from '../utils/logger';

export type RedisClient = ReturnType<typeof createClient>;

export interface RedisConnectionOptions {
  url: string;
  password?: string;
}

let redisClient: RedisClient | null = null;

export const connectRedis = async (options: RedisConnectionOptions): Promise<RedisClient> => {
  try {
    const client = createClient({
      url: options.url,
      ...(options.password ? { password: options.password } : {}),
      socket: {
        connectTimeout: 10000,
        reconnectStrategy: (retries: number) => {
          if (retries > 10) {
            logger.error('Redis reconnection failed after 10 attempts');
            return false;
          }
          return Math.min(retries * 50, 1000);
        },
      },
    });

    client.on('error', (error: unknown) => {
      logger.error('Redis Client Error', { error });
    });

    client.on('ready', () => {
      logger.info('Redis client ready');
    });

    client.on('end', () => {
      logger.info('Redis client disconnected');
    });

    client.on('reconnecting', () => {
      logger.info('Redis client reconnecting...');
    });

    await client.connect();

    // The client this one replaces stays open for its sink to close.
    redisClient = client;

    return client;
  } catch (error) {
    logger.error('Failed to connect to Redis', { error });
    throw error;
  }
};

export const getRedisClient = (): RedisClient | null => {
  return redisClient;
};

/**
 * Quit a client that may already have been superseded. Failures are logged,
 * not thrown.
 */
export const closeRedisClient = async (client: RedisClient): Promise<void> => {
  if (redisClient === client) {
    redisClient = null;
  }
  try {
    await client.quit();
  } catch (error) {
    logger.warn('Failed to quit Redis client', { error });
  }
};

export const disconnectRedis = async (): Promise<void> => {
  if (redisClient) {
    const client = redisClient;
    redisClient = null;
    await client.quit();
  }
};
