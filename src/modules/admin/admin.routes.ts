import express from 'express';
import * as ordersController from '../orders/orders.controller';
import { authenticate, requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';

const router = express.Router();

// All admin routes require admin role
router.use(authenticate);
router.use(requireRole(USER_ROLE.ADMIN));

router.get('/orders', ordersController.getOrders);
router.put('/orders/:id/status', ordersController.updateOrderStatus);

export default router;
