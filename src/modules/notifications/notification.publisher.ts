import type { Order } from '../../connections/db/models';
import { orderConfig } from '../../connections/config/app.config';
import { ORDER_EVENT_BY_STATUS, OrderEventName, OrderStatus } from '../../constants';
import { logger, errorMeta } from '../../utils/logging';

export interface OrderEvent {
  event: OrderEventName;
  order_id: number;
  shopkeeper_id: number;
  warehouse_id: number;
  status: OrderStatus;
  rider_id: number | null;
  occurred_at: string;
}

/**
 * Fire-and-forget fan-out of committed order changes. Implementations must
 * not reject: a failed publish never undoes the change it reports.
 */
export interface NotificationPublisher {
  publish(event: OrderEvent): Promise<void>;
}

// The slice of the redis client the publisher needs
export interface MessageChannel {
  publish(channel: string, message: string): Promise<unknown>;
}

export const buildOrderEvent = (order: Order, riderId: number | null, occurredAt: Date = new Date()): OrderEvent => ({
  event: ORDER_EVENT_BY_STATUS[order.status],
  order_id: order.id,
  shopkeeper_id: order.shopkeeper_id,
  warehouse_id: order.warehouse_id,
  status: order.status,
  rider_id: riderId,
  occurred_at: occurredAt.toISOString(),
});

export class RedisNotificationPublisher implements NotificationPublisher {
  constructor(
    private readonly client: MessageChannel,
    private readonly channel: string = orderConfig.notificationChannel
  ) {}

  async publish(event: OrderEvent): Promise<void> {
    try {
      await this.client.publish(this.channel, JSON.stringify(event));
      logger.debug(`Published ${event.event}`, { orderId: event.order_id, channel: this.channel });
    } catch (error) {
      logger.warn(`Failed to publish ${event.event}`, { orderId: event.order_id, ...errorMeta(error) });
    }
  }
}
