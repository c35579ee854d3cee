import dotenv from 'dotenv';

dotenv.config();

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

const parseInteger = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const appConfig = {
  port: parseInteger(process.env.APP_PORT || process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',
  jwtSecret: process.env.JWT_SECRET || 'secret',
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:5173',
  corsOrigins: parseCorsOrigins(),
};

export const orderConfig = {
  maxItemsPerOrder: 100,
  minQuantity: 1,
  maxQuantity: 10000,
  maxNotesLength: 1000,
  rejectionReasonMinLength: 10,
  rejectionReasonMaxLength: 500,
  // 0 = wait for row locks without a deadline
  lockTimeoutMs: parseInteger(process.env.ORDER_LOCK_TIMEOUT_MS, 0),
  deliveryBaseFee: process.env.DELIVERY_BASE_FEE || '20.00',
  deliveryFeePerLine: process.env.DELIVERY_FEE_PER_LINE || '2.50',
  notificationChannel: process.env.ORDER_EVENTS_CHANNEL || 'order-events',
};

export const loggingConfig = {
  level: process.env.LOG_LEVEL || 'info',
  dir: process.env.LOG_DIR || 'logs',
  rotation: process.env.LOG_ROTATION || '10MB',
  retention: process.env.LOG_RETENTION || '30d',
  compression: process.env.LOG_COMPRESSION !== 'false',
};
