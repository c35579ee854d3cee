import { Response } from 'express';
import { z } from 'zod';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { idSchema, parseInput } from '../../utils/validation';
import { orderDeps } from '../orders/orders.deps';
import * as inventoryService from './inventory.service';

const itemParamsSchema = z.object({ id: idSchema });
const warehouseParamsSchema = z.object({ warehouseId: idSchema });

// Restock (warehouse manager of the item's warehouse, or admin)
export const restockItem = async (req: AuthRequest, res: Response) => {
  if (!req.user) {
    return ResponseHandler.unauthorized(res);
  }

  try {
    const { id } = parseInput(itemParamsSchema, req.params, 'Invalid item id');
    const result = await inventoryService.restockItem(orderDeps, req.user, id, req.body);
    return ResponseHandler.success(res, result, 'Item restocked successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to restock item');
  }
};

export const getWarehouseItems = async (req: AuthRequest, res: Response) => {
  if (!req.user) {
    return ResponseHandler.unauthorized(res);
  }

  try {
    const { warehouseId } = parseInput(warehouseParamsSchema, req.params, 'Invalid warehouse id');
    const items = await inventoryService.listWarehouseItems(orderDeps, req.user, warehouseId);
    return ResponseHandler.success(res, items, 'Items retrieved successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to retrieve items');
  }
};
