import express from 'express';
import * as inventoryController from './inventory.controller';
import { authenticate, requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';

const router = express.Router();

// All inventory routes require authentication
router.use(authenticate);

router.get('/warehouses/:warehouseId/items', inventoryController.getWarehouseItems);
router.post(
  '/items/:id/restock',
  requireRole(USER_ROLE.WAREHOUSE_MANAGER, USER_ROLE.ADMIN),
  inventoryController.restockItem
);

export default router;
