import { pool } from '../../connections/db/connection';
import { createPgUnitOfWork } from '../../connections/db/pg-store';
import { redisClient } from '../../connections/redis';
import { orderConfig } from '../../connections/config/app.config';
import { RedisNotificationPublisher } from '../notifications/notification.publisher';
import type { OrderServiceDeps } from './orders.types';

/**
 * Production wiring shared by the HTTP controllers
 */
export const orderDeps: OrderServiceDeps = {
  uow: createPgUnitOfWork(pool, { lockTimeoutMs: orderConfig.lockTimeoutMs }),
  notifier: new RedisNotificationPublisher({
    publish: (channel, message) => redisClient.publish(channel, message),
  }),
};
