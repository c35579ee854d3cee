import { createClient } from 'redis';
import { redisConfig } from '../config/redis.config';
import { logger, errorMeta } from '../../utils/logging';

const client = createClient({
  socket: {
    host: redisConfig.host,
    port: redisConfig.port,
  },
  ...(redisConfig.password ? { password: redisConfig.password } : {}),
  database: redisConfig.db,
  // commands fail at once while disconnected instead of queueing
  disableOfflineQueue: true,
});

client.on('error', (err: Error) => {
  logger.error('Redis Client Error', { error: err.message, stack: err.stack });
});

/**
 * Connect to Redis
 * @returns Promise that resolves when Redis is connected
 */
export const connectRedis = async (): Promise<void> => {
  try {
    if (!client.isOpen) {
      await client.connect();
      logger.info('Redis connected successfully');
    } else {
      logger.info('Redis already connected');
    }
  } catch (err) {
    logger.error('Failed to connect to Redis:', errorMeta(err));
    throw err;
  }
};

export const disconnectRedis = async (): Promise<void> => {
  if (client.isOpen) {
    await client.quit();
  }
};

export const redisClient = client;
