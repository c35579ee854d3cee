// Database
export { pool, migrate, connectDatabase, createPgUnitOfWork } from './db';

// Redis
export { redisClient, connectRedis, disconnectRedis } from './redis';

// Config - All configurations in one place
export { appConfig, orderConfig, loggingConfig, dbConfig, redisConfig } from './config';
