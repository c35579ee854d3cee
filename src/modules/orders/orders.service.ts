import type { DataStore } from '../../connections/db/store';
import type {
  CreateOrderItemInput,
  Item,
  OrderDetail,
  OrderItem,
  OrderWithItems,
} from '../../connections/db/models';
import { OrderStatus, USER_ROLE } from '../../constants';
import {
  BusinessRuleError,
  ConflictError,
  InsufficientStockError,
  NotFoundError,
  ValidationError,
} from '../../utils/errors';
import { sumLineTotals, toCents } from '../../utils/money';
import { parseInput } from '../../utils/validation';
import { StockLedger } from '../inventory/stock-ledger';
import { recordTransition } from './order-audit';
import { getAllowedTransitions } from './order-state-machine';
import { loadScopedOrder, scopeForActor } from './order-scope';
import { createOrderSchema, CreateOrderRequest, findDuplicateItemIds, orderListQuerySchema } from './orders.validation';
import type { Actor, OrderServiceDeps, ServiceDeps } from './orders.types';

const inFlightOrderError = (warehouseId: number): BusinessRuleError =>
  new BusinessRuleError(
    'DUPLICATE_IN_FLIGHT_ORDER',
    'You already have a pending or accepted order with this warehouse',
    { warehouse_id: warehouseId }
  );

const itemNotFound = (itemId: number, warehouseId: number): NotFoundError =>
  new NotFoundError('ITEM_NOT_FOUND', `Item ${itemId} not found in warehouse ${warehouseId}`, { item_id: itemId });

// Order lines are charged at least one cent
const MIN_LINE_PRICE_CENTS = 1;

const assertPurchasable = (item: Item): void => {
  if (toCents(item.price) < MIN_LINE_PRICE_CENTS) {
    throw new BusinessRuleError('ITEM_NOT_PURCHASABLE', `Item ${item.id} has no valid price`, {
      item_id: item.id,
      price: item.price,
    });
  }
};

const assertWarehouseOpen = async (store: DataStore, warehouseId: number): Promise<void> => {
  const warehouse = await store.warehouses.findById(warehouseId);

  if (!warehouse) {
    throw new NotFoundError('WAREHOUSE_NOT_FOUND', `Warehouse ${warehouseId} not found`, { warehouse_id: warehouseId });
  }
  if (!warehouse.is_active) {
    throw new BusinessRuleError('WAREHOUSE_INACTIVE', 'Warehouse is not active', { warehouse_id: warehouseId });
  }
  if (!warehouse.is_approved) {
    throw new BusinessRuleError('WAREHOUSE_NOT_APPROVED', 'Warehouse is not approved', { warehouse_id: warehouseId });
  }
};

/**
 * Checks that need no lock. Anything they establish is re-checked inside the
 * transaction; they only let obviously doomed requests fail early.
 */
const checkPreconditions = async (store: DataStore, actor: Actor, request: CreateOrderRequest): Promise<void> => {
  const { warehouse_id: warehouseId } = request;

  await assertWarehouseOpen(store, warehouseId);

  const items = await store.items.findByIds(request.items.map((line) => line.item_id));
  const itemsById = new Map(items.map((item): [number, Item] => [item.id, item]));

  for (const line of request.items) {
    const item = itemsById.get(line.item_id);
    if (!item || item.warehouse_id !== warehouseId) {
      throw itemNotFound(line.item_id, warehouseId);
    }
    assertPurchasable(item);
  }

  if (await store.orders.findInFlight(actor.id, warehouseId)) {
    throw inFlightOrderError(warehouseId);
  }

  for (const line of request.items) {
    const item = itemsById.get(line.item_id);
    if (item && item.quantity < line.quantity) {
      throw new InsufficientStockError({ item_id: item.id, available: item.quantity, requested: line.quantity });
    }
  }
};

/**
 * Place an order: reserve stock for every line and persist the order with
 * its price snapshots, all in one transaction.
 */
export const createOrder = async (deps: OrderServiceDeps, actor: Actor, input: unknown): Promise<OrderWithItems> => {
  if (actor.role !== USER_ROLE.SHOPKEEPER) {
    throw new BusinessRuleError('ROLE_NOT_PERMITTED', 'Only shopkeepers can place orders');
  }

  const request = parseInput(createOrderSchema, input);

  const duplicates = findDuplicateItemIds(request.items);
  if (duplicates.length > 0) {
    throw new ValidationError('Each item may appear only once per order', { item_ids: duplicates }, 'DUPLICATE_ITEMS');
  }

  await checkPreconditions(deps.uow.store, actor, request);

  const warehouseId = request.warehouse_id;

  const order = await deps.uow.transaction(async (tx) => {
    await tx.orders.lockInFlightSlot(actor.id, warehouseId);
    if (await tx.orders.findInFlight(actor.id, warehouseId)) {
      throw inFlightOrderError(warehouseId);
    }

    const ledger = new StockLedger(tx.items);
    const locked = await ledger.lock(request.items.map((line) => line.item_id));

    for (const line of request.items) {
      const item = locked.get(line.item_id);
      if (!item || item.warehouse_id !== warehouseId) {
        throw itemNotFound(line.item_id, warehouseId);
      }
      assertPurchasable(item);
      if (item.quantity < line.quantity) {
        throw new ConflictError(
          'INSUFFICIENT_STOCK',
          `Insufficient stock for item ${item.id}. Available: ${item.quantity}, requested: ${line.quantity}`,
          { item_id: item.id, available: item.quantity, requested: line.quantity }
        );
      }
    }

    const lines: CreateOrderItemInput[] = [];
    for (const line of request.items) {
      const reserved = await ledger.reserve(line.item_id, line.quantity);
      lines.push({ item_id: reserved.id, quantity: line.quantity, price: reserved.price });
    }

    const created = await tx.orders.create({
      shopkeeper_id: actor.id,
      warehouse_id: warehouseId,
      total_amount: sumLineTotals(lines),
      notes: request.notes ? request.notes : null,
    });
    const items = await tx.orders.addItems(created.id, lines);

    return { ...created, items };
  });

  await recordTransition(deps, { order, from: null, actor });

  return order;
};

const groupItemsByOrder = (items: readonly OrderItem[]): Map<number, OrderItem[]> => {
  const grouped = new Map<number, OrderItem[]>();
  for (const item of items) {
    const bucket = grouped.get(item.order_id);
    if (bucket) {
      bucket.push(item);
    } else {
      grouped.set(item.order_id, [item]);
    }
  }
  return grouped;
};

export interface OrderList {
  orders: OrderWithItems[];
  pagination: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
  };
}

/**
 * Orders visible to the actor, newest first. `statuses` narrows the list
 * beyond the optional `status` query filter.
 */
export const listOrders = async (
  deps: ServiceDeps,
  actor: Actor,
  query: unknown,
  statuses?: readonly OrderStatus[]
): Promise<OrderList> => {
  const { status, page, limit } = parseInput(orderListQuerySchema, query, 'Invalid query parameters');
  const { store } = deps.uow;

  const filterStatuses = status ? (statuses && !statuses.includes(status) ? [] : [status]) : statuses;
  if (filterStatuses && filterStatuses.length === 0) {
    return { orders: [], pagination: { page, limit, total: 0, totalPages: 0 } };
  }

  const { orders, total } = await store.orders.list({
    scope: scopeForActor(actor),
    statuses: filterStatuses,
    limit,
    offset: (page - 1) * limit,
  });

  const itemsByOrder = groupItemsByOrder(await store.orders.findItemsByOrderIds(orders.map((order) => order.id)));

  return {
    orders: orders.map((order) => ({ ...order, items: itemsByOrder.get(order.id) ?? [] })),
    pagination: { page, limit, total, totalPages: Math.ceil(total / limit) },
  };
};

export const getOrder = async (deps: ServiceDeps, actor: Actor, orderId: number): Promise<OrderDetail> => {
  const { store } = deps.uow;
  const order = await loadScopedOrder(store, actor, orderId);

  const [items, delivery, statusHistory] = await Promise.all([
    store.orders.findItems(order.id),
    store.deliveries.findByOrderId(order.id),
    store.history.findByOrderId(order.id),
  ]);

  return { ...order, items, delivery, status_history: statusHistory };
};

export interface OrderTransitions {
  order_id: number;
  status: OrderStatus;
  allowed: OrderStatus[];
}

export const getOrderTransitions = async (
  deps: ServiceDeps,
  actor: Actor,
  orderId: number
): Promise<OrderTransitions> => {
  const order = await loadScopedOrder(deps.uow.store, actor, orderId);
  return { order_id: order.id, status: order.status, allowed: getAllowedTransitions(order.status, actor.role) };
};
