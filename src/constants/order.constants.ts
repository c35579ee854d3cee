/**
 * Order Status Constants
 */
export const ORDER_STATUS = {
  PENDING: 'pending',
  ACCEPTED: 'accepted',
  REJECTED: 'rejected',
  ASSIGNED: 'assigned',
  IN_TRANSIT: 'in_transit',
  DELIVERED: 'delivered',
  CANCELLED: 'cancelled',
} as const;

export type OrderStatus = typeof ORDER_STATUS[keyof typeof ORDER_STATUS];

export const ORDER_STATUSES = [
  ORDER_STATUS.PENDING,
  ORDER_STATUS.ACCEPTED,
  ORDER_STATUS.REJECTED,
  ORDER_STATUS.ASSIGNED,
  ORDER_STATUS.IN_TRANSIT,
  ORDER_STATUS.DELIVERED,
  ORDER_STATUS.CANCELLED,
] as const;

/**
 * Statuses in which a shopkeeper's order still blocks a new order to the same warehouse
 */
export const IN_FLIGHT_ORDER_STATUSES: readonly OrderStatus[] = [ORDER_STATUS.PENDING, ORDER_STATUS.ACCEPTED];

export const isOrderStatus = (value: unknown): value is OrderStatus =>
  typeof value === 'string' && ORDER_STATUSES.some((status) => status === value);

/**
 * Order event names published after a committed change
 */
export const ORDER_EVENT = {
  CREATED: 'order.created',
  ACCEPTED: 'order.accepted',
  REJECTED: 'order.rejected',
  ASSIGNED: 'order.assigned',
  IN_TRANSIT: 'order.in_transit',
  DELIVERED: 'order.delivered',
  CANCELLED: 'order.cancelled',
} as const;

export type OrderEventName = typeof ORDER_EVENT[keyof typeof ORDER_EVENT];

export const ORDER_EVENT_BY_STATUS: Record<OrderStatus, OrderEventName> = {
  pending: ORDER_EVENT.CREATED,
  accepted: ORDER_EVENT.ACCEPTED,
  rejected: ORDER_EVENT.REJECTED,
  assigned: ORDER_EVENT.ASSIGNED,
  in_transit: ORDER_EVENT.IN_TRANSIT,
  delivered: ORDER_EVENT.DELIVERED,
  cancelled: ORDER_EVENT.CANCELLED,
};
