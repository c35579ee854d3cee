import express from 'express';
import * as ordersController from './orders.controller';
import { authenticate, requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';

const router = express.Router();

// Warehouse managers act on orders of the warehouses they administer
router.use(authenticate, requireRole(USER_ROLE.WAREHOUSE_MANAGER, USER_ROLE.ADMIN));

router.get('/', ordersController.getOrders);
router.get('/pending', ordersController.getPendingOrders);

router.post('/:id/accept', ordersController.acceptOrder);
router.post('/:id/reject', ordersController.rejectOrder);
router.post('/:id/assign', ordersController.assignRider);

export default router;
