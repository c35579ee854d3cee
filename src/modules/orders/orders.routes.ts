import express from 'express';
import * as ordersController from './orders.controller';
import { authenticate, requireRole } from '../../middlewares/auth.middleware';
import { rateLimiters } from '../../middlewares/rateLimit.middleware';
import { USER_ROLE } from '../../constants';

const router = express.Router();

// All order routes require authentication
router.use(authenticate);

router.post('/', requireRole(USER_ROLE.SHOPKEEPER), rateLimiters.orders, ordersController.createOrder);

router.get('/', ordersController.getOrders);
router.get('/:id', ordersController.getOrderById);
router.get('/:id/transitions', ordersController.getOrderTransitions);

router.post('/:id/cancel', requireRole(USER_ROLE.SHOPKEEPER, USER_ROLE.ADMIN), ordersController.cancelOrder);

export default router;
