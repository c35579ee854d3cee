export { appConfig, orderConfig, loggingConfig } from './app.config';
export { dbConfig } from './database.config';
export { redisConfig } from './redis.config';
