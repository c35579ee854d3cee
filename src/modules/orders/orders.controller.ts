import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import { ORDER_STATUS } from '../../constants';
import { ResponseHandler } from '../../utils/response';
import { parseInput } from '../../utils/validation';
import { orderDeps } from './orders.deps';
import { orderIdParamSchema } from './orders.validation';
import * as ordersService from './orders.service';
import * as transitions from './order-transitions.service';

const readOrderId = (req: AuthRequest): number => parseInput(orderIdParamSchema, req.params, 'Invalid order id').id;

// Place an order (shopkeeper)
export const createOrder = async (req: AuthRequest, res: Response) => {
  if (!req.user) {
    return ResponseHandler.unauthorized(res);
  }

  try {
    const order = await ordersService.createOrder(orderDeps, req.user, req.body);
    return ResponseHandler.created(res, order, 'Order created successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to create order');
  }
};

// Orders visible to the caller
export const getOrders = async (req: AuthRequest, res: Response) => {
  if (!req.user) {
    return ResponseHandler.unauthorized(res);
  }

  try {
    const { orders, pagination } = await ordersService.listOrders(orderDeps, req.user, req.query);
    return ResponseHandler.success(res, orders, 'Orders retrieved successfully', 200, { pagination });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to retrieve orders');
  }
};

// Warehouse queue: pending orders only
export const getPendingOrders = async (req: AuthRequest, res: Response) => {
  if (!req.user) {
    return ResponseHandler.unauthorized(res);
  }

  try {
    const { orders, pagination } = await ordersService.listOrders(orderDeps, req.user, req.query, [
      ORDER_STATUS.PENDING,
    ]);
    return ResponseHandler.success(res, orders, 'Pending orders retrieved successfully', 200, { pagination });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to retrieve orders');
  }
};

export const getOrderById = async (req: AuthRequest, res: Response) => {
  if (!req.user) {
    return ResponseHandler.unauthorized(res);
  }

  try {
    const order = await ordersService.getOrder(orderDeps, req.user, readOrderId(req));
    return ResponseHandler.success(res, order, 'Order retrieved successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to retrieve order');
  }
};

export const getOrderTransitions = async (req: AuthRequest, res: Response) => {
  if (!req.user) {
    return ResponseHandler.unauthorized(res);
  }

  try {
    const result = await ordersService.getOrderTransitions(orderDeps, req.user, readOrderId(req));
    return ResponseHandler.success(res, result, 'Allowed transitions retrieved successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to retrieve transitions');
  }
};

export const acceptOrder = async (req: AuthRequest, res: Response) => {
  if (!req.user) {
    return ResponseHandler.unauthorized(res);
  }

  try {
    const order = await transitions.acceptOrder(orderDeps, req.user, readOrderId(req));
    return ResponseHandler.success(res, order, 'Order accepted');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to accept order');
  }
};

export const rejectOrder = async (req: AuthRequest, res: Response) => {
  if (!req.user) {
    return ResponseHandler.unauthorized(res);
  }

  try {
    const order = await transitions.rejectOrder(orderDeps, req.user, readOrderId(req), req.body);
    return ResponseHandler.success(res, order, 'Order rejected');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to reject order');
  }
};

export const assignRider = async (req: AuthRequest, res: Response) => {
  if (!req.user) {
    return ResponseHandler.unauthorized(res);
  }

  try {
    const order = await transitions.assignRider(orderDeps, req.user, readOrderId(req), req.body);
    return ResponseHandler.success(res, order, 'Rider assigned');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to assign rider');
  }
};

export const markDelivered = async (req: AuthRequest, res: Response) => {
  if (!req.user) {
    return ResponseHandler.unauthorized(res);
  }

  try {
    const order = await transitions.markDelivered(orderDeps, req.user, readOrderId(req));
    return ResponseHandler.success(res, order, 'Order delivered');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to mark order delivered');
  }
};

export const cancelOrder = async (req: AuthRequest, res: Response) => {
  if (!req.user) {
    return ResponseHandler.unauthorized(res);
  }

  try {
    const order = await transitions.cancelOrder(orderDeps, req.user, readOrderId(req), req.body);
    return ResponseHandler.success(res, order, 'Order cancelled');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to cancel order');
  }
};

// Admin: any transition the table permits, including in_transit
export const updateOrderStatus = async (req: AuthRequest, res: Response) => {
  if (!req.user) {
    return ResponseHandler.unauthorized(res);
  }

  try {
    const order = await transitions.changeOrderStatus(orderDeps, req.user, readOrderId(req), req.body);
    return ResponseHandler.success(res, order, 'Order status updated');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to update order status');
  }
};
