import type { Order } from '../../connections/db/models';
import type { OrderStatus } from '../../constants';
import { auditLog, errorMeta, logger } from '../../utils/logging';
import { buildOrderEvent } from '../notifications/notification.publisher';
import type { TransitionDenialCode } from './order-state-machine';
import type { Actor, OrderServiceDeps } from './orders.types';

export interface AppliedTransition {
  order: Order;
  from: OrderStatus | null;
  actor: Actor;
  reason?: string | null;
  riderId?: number | null;
}

export interface DeniedTransition {
  order: Order;
  target: OrderStatus;
  actor: Actor;
  code: TransitionDenialCode;
  reason: string;
}

/**
 * Post-commit hook for a successful creation or transition: history row,
 * audit line and notification. Nothing here can undo the committed change.
 */
export const recordTransition = async (deps: OrderServiceDeps, transition: AppliedTransition): Promise<void> => {
  const { order, from, actor } = transition;
  const occurredAt = deps.now ? deps.now() : new Date();

  auditLog(from === null ? 'ORDER_CREATED' : 'ORDER_STATUS_CHANGED', {
    orderId: order.id,
    from,
    to: order.status,
    actorId: actor.id,
    actorRole: actor.role,
    reason: transition.reason ?? undefined,
  });

  try {
    await deps.uow.store.history.record({
      order_id: order.id,
      from_status: from,
      to_status: order.status,
      actor_id: actor.id,
      actor_role: actor.role,
      reason: transition.reason ?? null,
      succeeded: true,
    });
  } catch (error) {
    logger.error('Failed to record order status history', { orderId: order.id, ...errorMeta(error) });
  }

  dispatchEvent(deps, order, transition.riderId ?? null, occurredAt);
};

// Not awaited: the caller's response never waits on the broker
const dispatchEvent = (deps: OrderServiceDeps, order: Order, riderId: number | null, occurredAt: Date): void => {
  const event = buildOrderEvent(order, riderId, occurredAt);
  deps.notifier.publish(event).catch((error: unknown) => {
    logger.warn(`Failed to publish ${event.event}`, { orderId: order.id, ...errorMeta(error) });
  });
};

export const recordDeniedTransition = async (deps: OrderServiceDeps, denial: DeniedTransition): Promise<void> => {
  const { order, actor } = denial;

  auditLog('ORDER_TRANSITION_DENIED', {
    orderId: order.id,
    from: order.status,
    to: denial.target,
    actorId: actor.id,
    actorRole: actor.role,
    code: denial.code,
  });

  try {
    await deps.uow.store.history.record({
      order_id: order.id,
      from_status: order.status,
      to_status: denial.target,
      actor_id: actor.id,
      actor_role: actor.role,
      reason: denial.reason,
      succeeded: false,
      denial_code: denial.code,
    });
  } catch (error) {
    logger.error('Failed to record denied order transition', { orderId: order.id, ...errorMeta(error) });
  }
};
