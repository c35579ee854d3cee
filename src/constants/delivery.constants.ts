/**
 * Delivery Status Constants
 */
export const DELIVERY_STATUS = {
  ASSIGNED: 'assigned',
  IN_TRANSIT: 'in_transit',
  DELIVERED: 'delivered',
  FAILED: 'failed',
} as const;

export type DeliveryStatus = typeof DELIVERY_STATUS[keyof typeof DELIVERY_STATUS];

/**
 * Rider Status Constants
 */
export const RIDER_STATUS = {
  AVAILABLE: 'available',
  BUSY: 'busy',
  INACTIVE: 'inactive',
} as const;

export type RiderStatus = typeof RIDER_STATUS[keyof typeof RIDER_STATUS];

export const DELIVERY_STATUSES = [
  DELIVERY_STATUS.ASSIGNED,
  DELIVERY_STATUS.IN_TRANSIT,
  DELIVERY_STATUS.DELIVERED,
  DELIVERY_STATUS.FAILED,
] as const;

/**
 * Delivery statuses that keep a rider busy
 */
export const ACTIVE_DELIVERY_STATUSES: readonly DeliveryStatus[] = [DELIVERY_STATUS.ASSIGNED, DELIVERY_STATUS.IN_TRANSIT];

export const isDeliveryStatus = (value: unknown): value is DeliveryStatus =>
  typeof value === 'string' && DELIVERY_STATUSES.some((status) => status === value);

export const RIDER_STATUSES = [RIDER_STATUS.AVAILABLE, RIDER_STATUS.BUSY, RIDER_STATUS.INACTIVE] as const;

export const isRiderStatus = (value: unknown): value is RiderStatus =>
  typeof value === 'string' && RIDER_STATUSES.some((status) => status === value);
