/**
 * Error taxonomy for the order core.
 *
 * Every failure surfaced by the services is one of five kinds so callers can
 * branch on `kind` (or `instanceof`) instead of matching message strings:
 *
 * - `validation`    client input malformed; nothing was started
 * - `not_found`     resource missing or outside the caller's scope
 * - `business_rule` a rule refused the request (stock, state machine, ...)
 * - `conflict`      a race was lost; retrying may succeed
 * - `system`        infrastructure failure; the unit of work was rolled back
 */
export type AppErrorKind = 'validation' | 'not_found' | 'business_rule' | 'conflict' | 'system';

export type AppErrorCode =
  | 'VALIDATION_ERROR'
  | 'DUPLICATE_ITEMS'
  | 'REJECTION_REASON_REQUIRED'
  | 'RIDER_REQUIRED'
  | 'WAREHOUSE_NOT_FOUND'
  | 'ITEM_NOT_FOUND'
  | 'ORDER_NOT_FOUND'
  | 'RIDER_NOT_FOUND'
  | 'WAREHOUSE_INACTIVE'
  | 'WAREHOUSE_NOT_APPROVED'
  | 'INSUFFICIENT_STOCK'
  | 'ITEM_NOT_PURCHASABLE'
  | 'DUPLICATE_IN_FLIGHT_ORDER'
  | 'INVALID_TRANSITION'
  | 'ROLE_NOT_PERMITTED'
  | 'RIDER_UNAVAILABLE'
  | 'DELIVERY_ALREADY_EXISTS'
  | 'DEADLOCK_DETECTED'
  | 'LOCK_TIMEOUT'
  | 'DATABASE_ERROR';

export abstract class AppError extends Error {
  abstract readonly kind: AppErrorKind;
  readonly code: AppErrorCode;
  readonly status: number;
  readonly details?: unknown;
  readonly retryable: boolean;

  protected constructor(
    message: string,
    code: AppErrorCode,
    status: number,
    options: { details?: unknown; retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = options.details;
    this.retryable = options.retryable ?? false;
  }
}

export class ValidationError extends AppError {
  readonly kind = 'validation';

  constructor(message: string, details?: unknown, code: AppErrorCode = 'VALIDATION_ERROR') {
    super(message, code, 400, { details });
  }
}

export class NotFoundError extends AppError {
  readonly kind = 'not_found';

  constructor(
    code: 'WAREHOUSE_NOT_FOUND' | 'ITEM_NOT_FOUND' | 'ORDER_NOT_FOUND' | 'RIDER_NOT_FOUND',
    message: string,
    details?: unknown
  ) {
    super(message, code, 404, { details });
  }
}

export class BusinessRuleError extends AppError {
  readonly kind = 'business_rule';

  constructor(code: AppErrorCode, message: string, details?: unknown) {
    super(message, code, code === 'ROLE_NOT_PERMITTED' ? 403 : 400, { details });
  }
}

export interface StockShortage {
  item_id: number;
  available: number;
  requested: number;
}

export class InsufficientStockError extends BusinessRuleError {
  constructor(shortage: StockShortage) {
    super(
      'INSUFFICIENT_STOCK',
      `Insufficient stock for item ${shortage.item_id}. Available: ${shortage.available}, requested: ${shortage.requested}`,
      shortage
    );
  }
}

export class ConflictError extends AppError {
  readonly kind = 'conflict';

  constructor(code: AppErrorCode, message: string, details?: unknown, cause?: unknown) {
    super(message, code, 409, { details, retryable: true, cause });
  }
}

export class SystemError extends AppError {
  readonly kind = 'system';

  constructor(code: 'LOCK_TIMEOUT' | 'DATABASE_ERROR', message: string, cause?: unknown) {
    super(message, code, code === 'LOCK_TIMEOUT' ? 503 : 500, { retryable: code === 'LOCK_TIMEOUT', cause });
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;
