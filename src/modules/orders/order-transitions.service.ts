import type { DataStore } from '../../connections/db/store';
import type { Delivery, Order, OrderWithDelivery, UpdateOrderStatusInput } from '../../connections/db/models';
import { DELIVERY_STATUS, ORDER_STATUS, OrderStatus, RIDER_STATUS } from '../../constants';
import { BusinessRuleError, NotFoundError, ValidationError } from '../../utils/errors';
import { parseInput } from '../../utils/validation';
import { computeDeliveryFee } from '../deliveries/delivery-fee';
import { StockLedger } from '../inventory/stock-ledger';
import { recordDeniedTransition, recordTransition } from './order-audit';
import { TransitionDecision, validateTransition } from './order-state-machine';
import { loadScopedOrder, orderNotFound } from './order-scope';
import {
  assignRiderSchema,
  cancelOrderSchema,
  cancellationReasonSchema,
  rejectOrderSchema,
  rejectionReasonSchema,
  updateOrderStatusSchema,
} from './orders.validation';
import type { Actor, OrderServiceDeps, TransitionRequest } from './orders.types';

interface PreparedTransition {
  target: OrderStatus;
  reason: string | null;
  riderId: number | null;
}

type TransitionOutcome =
  | { applied: true; from: OrderStatus; order: OrderWithDelivery }
  | { applied: false; order: Order; decision: Exclude<TransitionDecision, { allowed: true }> };

/**
 * Input checks that need no database access
 */
const prepareTransition = (request: TransitionRequest): PreparedTransition => {
  const target = request.status;

  if (target === ORDER_STATUS.REJECTED) {
    const result = rejectionReasonSchema.safeParse(request.reason ?? '');
    if (!result.success) {
      throw new ValidationError(
        result.error.errors[0]?.message ?? 'Rejection reason is required',
        result.error.errors,
        'REJECTION_REASON_REQUIRED'
      );
    }
    return { target, reason: result.data, riderId: null };
  }

  if (target === ORDER_STATUS.ASSIGNED && !request.riderId) {
    throw new ValidationError('A rider is required to assign an order', undefined, 'RIDER_REQUIRED');
  }

  const reason = parseInput(cancellationReasonSchema, request.reason);

  return { target, reason: reason ? reason : null, riderId: request.riderId ?? null };
};

/**
 * Return every reserved unit of the order to stock, locking rows in id order
 */
const releaseOrderStock = async (tx: DataStore, orderId: number): Promise<void> => {
  const lines = await tx.orders.findItems(orderId);
  const ledger = new StockLedger(tx.items);

  await ledger.lock(lines.map((line) => line.item_id));
  for (const line of lines) {
    await ledger.release(line.item_id, line.quantity);
  }
};

const assignRiderToOrder = async (tx: DataStore, order: Order, riderId: number): Promise<Delivery> => {
  const rider = await tx.riders.lockByUserId(riderId);

  if (!rider || rider.warehouse_id !== order.warehouse_id) {
    throw new NotFoundError('RIDER_NOT_FOUND', `Rider ${riderId} not found for this warehouse`, { rider_id: riderId });
  }
  if (rider.is_suspended || rider.status === RIDER_STATUS.INACTIVE) {
    throw new BusinessRuleError('RIDER_UNAVAILABLE', 'Rider is not available for deliveries', { rider_id: riderId });
  }
  if (await tx.deliveries.findByOrderId(order.id)) {
    throw new BusinessRuleError('DELIVERY_ALREADY_EXISTS', 'A delivery already exists for this order', {
      order_id: order.id,
    });
  }

  const lines = await tx.orders.findItems(order.id);
  const delivery = await tx.deliveries.create({
    order_id: order.id,
    rider_id: riderId,
    delivery_fee: computeDeliveryFee(lines.length),
  });
  await tx.riders.setStatus(riderId, RIDER_STATUS.BUSY);

  return delivery;
};

// A rider goes back to available only once no other delivery of theirs is still assigned or in transit
const freeRider = async (tx: DataStore, delivery: Delivery | null): Promise<void> => {
  if (!delivery || delivery.rider_id === null) {
    return;
  }
  const rider = await tx.riders.lockByUserId(delivery.rider_id);
  if (!rider || rider.status !== RIDER_STATUS.BUSY) {
    return;
  }
  if (await tx.deliveries.hasOtherActiveDelivery(rider.user_id, delivery.order_id)) {
    return;
  }
  await tx.riders.setStatus(rider.user_id, RIDER_STATUS.AVAILABLE);
};

/**
 * Side effects of an allowed transition, inside the caller's transaction
 */
const applyTransition = async (
  tx: DataStore,
  actor: Actor,
  order: Order,
  prepared: PreparedTransition
): Promise<OrderWithDelivery> => {
  const update: UpdateOrderStatusInput = { status: prepared.target };
  let delivery = await tx.deliveries.findByOrderId(order.id);

  switch (prepared.target) {
    case ORDER_STATUS.REJECTED:
      update.rejection_reason = prepared.reason;
      await releaseOrderStock(tx, order.id);
      break;
    case ORDER_STATUS.CANCELLED:
      update.cancellation_reason = prepared.reason;
      update.cancelled_by = actor.id;
      await releaseOrderStock(tx, order.id);
      if (delivery) {
        delivery = await tx.deliveries.updateStatus(order.id, DELIVERY_STATUS.FAILED);
        await freeRider(tx, delivery);
      }
      break;
    case ORDER_STATUS.ASSIGNED:
      if (prepared.riderId === null) {
        throw new ValidationError('A rider is required to assign an order', undefined, 'RIDER_REQUIRED');
      }
      delivery = await assignRiderToOrder(tx, order, prepared.riderId);
      break;
    case ORDER_STATUS.IN_TRANSIT:
      if (delivery) {
        delivery = await tx.deliveries.updateStatus(order.id, DELIVERY_STATUS.IN_TRANSIT);
      }
      break;
    case ORDER_STATUS.DELIVERED:
      if (delivery) {
        delivery = await tx.deliveries.updateStatus(order.id, DELIVERY_STATUS.DELIVERED);
        await freeRider(tx, delivery);
      }
      break;
    default:
      break;
  }

  const updated = await tx.orders.updateStatus(order.id, update);
  if (!updated) {
    throw orderNotFound(order.id);
  }

  const items = await tx.orders.findItems(order.id);
  return { ...updated, items, delivery };
};

/**
 * Move an order to `request.status` on behalf of `actor`.
 *
 * The order row is locked for the whole unit of work, so two concurrent
 * requests against one order are decided one after the other against the
 * status the first one left behind.
 */
export const transitionOrder = async (
  deps: OrderServiceDeps,
  actor: Actor,
  orderId: number,
  request: TransitionRequest
): Promise<OrderWithDelivery> => {
  const prepared = prepareTransition(request);

  const outcome = await deps.uow.transaction(async (tx): Promise<TransitionOutcome> => {
    const order = await loadScopedOrder(tx, actor, orderId, true);

    const decision = validateTransition(order.status, prepared.target, actor.role);
    if (!decision.allowed) {
      return { applied: false, order, decision };
    }

    const updated = await applyTransition(tx, actor, order, prepared);
    return { applied: true, from: order.status, order: updated };
  });

  if (!outcome.applied) {
    const { order, decision } = outcome;
    await recordDeniedTransition(deps, {
      order,
      target: prepared.target,
      actor,
      code: decision.code,
      reason: decision.reason,
    });
    throw new BusinessRuleError(decision.code, decision.reason, {
      order_id: order.id,
      current_status: order.status,
      requested_status: prepared.target,
    });
  }

  await recordTransition(deps, {
    order: outcome.order,
    from: outcome.from,
    actor,
    reason: prepared.reason,
    riderId: outcome.order.delivery?.rider_id ?? null,
  });

  return outcome.order;
};

export const acceptOrder = async (deps: OrderServiceDeps, actor: Actor, orderId: number) =>
  transitionOrder(deps, actor, orderId, { status: ORDER_STATUS.ACCEPTED });

export const rejectOrder = async (deps: OrderServiceDeps, actor: Actor, orderId: number, body: unknown) => {
  const { rejection_reason: reason } = parseInput(rejectOrderSchema, body);
  return transitionOrder(deps, actor, orderId, { status: ORDER_STATUS.REJECTED, reason });
};

export const assignRider = async (deps: OrderServiceDeps, actor: Actor, orderId: number, body: unknown) => {
  const { rider_id: riderId } = parseInput(assignRiderSchema, body);
  return transitionOrder(deps, actor, orderId, { status: ORDER_STATUS.ASSIGNED, riderId });
};

export const markInTransit = async (deps: OrderServiceDeps, actor: Actor, orderId: number) =>
  transitionOrder(deps, actor, orderId, { status: ORDER_STATUS.IN_TRANSIT });

export const markDelivered = async (deps: OrderServiceDeps, actor: Actor, orderId: number) =>
  transitionOrder(deps, actor, orderId, { status: ORDER_STATUS.DELIVERED });

export const cancelOrder = async (deps: OrderServiceDeps, actor: Actor, orderId: number, body: unknown) => {
  const { reason } = parseInput(cancelOrderSchema, body ?? {});
  return transitionOrder(deps, actor, orderId, { status: ORDER_STATUS.CANCELLED, reason });
};

export const changeOrderStatus = async (deps: OrderServiceDeps, actor: Actor, orderId: number, body: unknown) => {
  const { status, reason, rider_id: riderId } = parseInput(updateOrderStatusSchema, body);
  return transitionOrder(deps, actor, orderId, { status, reason, riderId });
};
