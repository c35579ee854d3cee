import type { DataStore } from '../../connections/db/store';
import type { Order } from '../../connections/db/models';
import { USER_ROLE } from '../../constants';
import { NotFoundError } from '../../utils/errors';
import type { OrderScope } from './orders.repository';
import type { Actor } from './orders.types';

export const scopeForActor = (actor: Actor): OrderScope => {
  switch (actor.role) {
    case USER_ROLE.ADMIN:
      return { kind: 'all' };
    case USER_ROLE.SHOPKEEPER:
      return { kind: 'shopkeeper', shopkeeperId: actor.id };
    case USER_ROLE.WAREHOUSE_MANAGER:
      return { kind: 'warehouse_admin', adminId: actor.id };
    case USER_ROLE.RIDER:
      return { kind: 'rider', riderId: actor.id };
  }
};

export const canAccessOrder = async (store: DataStore, actor: Actor, order: Order): Promise<boolean> => {
  switch (actor.role) {
    case USER_ROLE.ADMIN:
      return true;
    case USER_ROLE.SHOPKEEPER:
      return order.shopkeeper_id === actor.id;
    case USER_ROLE.WAREHOUSE_MANAGER: {
      const warehouse = await store.warehouses.findById(order.warehouse_id);
      return warehouse !== null && warehouse.admin_id === actor.id;
    }
    case USER_ROLE.RIDER: {
      const delivery = await store.deliveries.findByOrderId(order.id);
      return delivery !== null && delivery.rider_id === actor.id;
    }
  }
};

export const orderNotFound = (orderId: number): NotFoundError =>
  new NotFoundError('ORDER_NOT_FOUND', `Order ${orderId} not found`, { order_id: orderId });

/**
 * Orders outside the caller's scope are reported exactly like missing ones
 */
export const loadScopedOrder = async (
  store: DataStore,
  actor: Actor,
  orderId: number,
  lock: boolean = false
): Promise<Order> => {
  const order = lock ? await store.orders.lockById(orderId) : await store.orders.findById(orderId);

  if (!order || !(await canAccessOrder(store, actor, order))) {
    throw orderNotFound(orderId);
  }

  return order;
};
