import express from 'express';
import * as ordersController from './orders.controller';
import { authenticate, requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';

const router = express.Router();

router.use(authenticate, requireRole(USER_ROLE.RIDER));

router.get('/', ordersController.getOrders);
router.post('/:id/deliver', ordersController.markDelivered);

export default router;
