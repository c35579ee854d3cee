import {
  AppError,
  BusinessRuleError,
  ConflictError,
  SystemError,
  isAppError,
} from '../../utils/errors';

interface PgErrorLike {
  code: string;
  constraint?: string;
  message: string;
}

const isPgError = (error: unknown): error is PgErrorLike =>
  error instanceof Error &&
  'code' in error &&
  typeof error.code === 'string' &&
  /^[0-9A-Z]{5}$/.test(error.code);

// Constraint names created by the migrations
export const CONSTRAINTS = {
  ORDERS_IN_FLIGHT: 'idx_orders_in_flight',
  DELIVERIES_ORDER: 'deliveries_order_id_key',
  ITEMS_QUANTITY: 'items_quantity_check',
} as const;

/**
 * Translate a failure raised inside a unit of work into the error taxonomy.
 * AppErrors thrown by the services pass through untouched.
 */
export const translateDatabaseError = (error: unknown): AppError => {
  if (isAppError(error)) {
    return error;
  }

  if (!isPgError(error)) {
    return new SystemError('DATABASE_ERROR', 'Database operation failed', error);
  }

  const constraint = 'constraint' in error ? error.constraint : undefined;

  switch (error.code) {
    case '23505':
      if (constraint === CONSTRAINTS.ORDERS_IN_FLIGHT) {
        return new BusinessRuleError(
          'DUPLICATE_IN_FLIGHT_ORDER',
          'An order to this warehouse is already pending or accepted'
        );
      }
      if (constraint === CONSTRAINTS.DELIVERIES_ORDER) {
        return new BusinessRuleError('DELIVERY_ALREADY_EXISTS', 'A delivery already exists for this order');
      }
      break;
    case '23514':
      if (constraint === CONSTRAINTS.ITEMS_QUANTITY) {
        return new ConflictError('INSUFFICIENT_STOCK', 'Stock changed while the order was being placed', undefined, error);
      }
      break;
    case '40P01':
      return new ConflictError('DEADLOCK_DETECTED', 'Concurrent update detected, please retry', undefined, error);
    case '55P03':
      return new SystemError('LOCK_TIMEOUT', 'Timed out waiting for a row lock', error);
  }

  return new SystemError('DATABASE_ERROR', 'Database operation failed', error);
};
