import express from 'express';
import { pool } from '../connections/db/connection';
import { rateLimiters } from '../middlewares/rateLimit.middleware';
import ordersRoutes from '../modules/orders/orders.routes';
import warehouseOrdersRoutes from '../modules/orders/warehouse-orders.routes';
import riderOrdersRoutes from '../modules/orders/rider-orders.routes';
import adminRoutes from '../modules/admin/admin.routes';
import inventoryRoutes from '../modules/inventory/inventory.routes';
import { ResponseHandler } from '../utils/response';
import { logger, errorMeta } from '../utils/logging';

const router = express.Router();

// Health check
router.get('/health', async (_req, res) => {
  try {
    await pool.query('SELECT 1');
    return ResponseHandler.success(res, { status: 'ok', database: 'connected' });
  } catch (error) {
    logger.warn('Health check failed', errorMeta(error));
    return ResponseHandler.error(res, 'Database unavailable', 503, { code: 'DATABASE_UNAVAILABLE' });
  }
});

router.use(rateLimiters.general);

// API Routes
router.use('/orders', ordersRoutes);
router.use('/warehouse/orders', warehouseOrdersRoutes);
router.use('/rider/orders', riderOrdersRoutes);
router.use('/admin', adminRoutes);
router.use('/inventory', inventoryRoutes);

export default router;
