import type { DataStore } from '../../connections/db/store';
import type { Item, Warehouse } from '../../connections/db/models';
import { USER_ROLE } from '../../constants';
import { BusinessRuleError, NotFoundError } from '../../utils/errors';
import { auditLog } from '../../utils/logging';
import { parseInput } from '../../utils/validation';
import type { Actor, ServiceDeps } from '../orders/orders.types';
import { StockLedger } from './stock-ledger';
import { restockSchema } from './inventory.validation';

export interface RestockResult {
  item: Item;
  previous_quantity: number;
  quantity_added: number;
  new_quantity: number;
}

const canManageWarehouse = (actor: Actor, warehouse: Warehouse | null): boolean =>
  warehouse !== null && (actor.role === USER_ROLE.ADMIN || warehouse.admin_id === actor.id);

const canViewWarehouse = (actor: Actor, warehouse: Warehouse | null): boolean => {
  if (!warehouse) {
    return false;
  }
  if (actor.role === USER_ROLE.ADMIN) {
    return true;
  }
  if (actor.role === USER_ROLE.WAREHOUSE_MANAGER) {
    return warehouse.admin_id === actor.id;
  }
  return warehouse.is_active && warehouse.is_approved;
};

const loadManagedItem = async (tx: DataStore, ledger: StockLedger, actor: Actor, itemId: number): Promise<Item> => {
  const locked = await ledger.lock([itemId]);
  const item = locked.get(itemId);
  const warehouse = item ? await tx.warehouses.findById(item.warehouse_id) : null;

  if (!item || !canManageWarehouse(actor, warehouse)) {
    throw new NotFoundError('ITEM_NOT_FOUND', `Item ${itemId} not found`, { item_id: itemId });
  }

  return item;
};

/**
 * Manual restock by a warehouse manager of the item's warehouse, or an admin
 */
export const restockItem = async (
  deps: ServiceDeps,
  actor: Actor,
  itemId: number,
  body: unknown
): Promise<RestockResult> => {
  if (actor.role !== USER_ROLE.WAREHOUSE_MANAGER && actor.role !== USER_ROLE.ADMIN) {
    throw new BusinessRuleError('ROLE_NOT_PERMITTED', 'Only warehouse managers can restock items');
  }

  const { quantity, reason } = parseInput(restockSchema, body);

  const result = await deps.uow.transaction(async (tx) => {
    const ledger = new StockLedger(tx.items);
    const item = await loadManagedItem(tx, ledger, actor, itemId);
    const updated = await ledger.restock(itemId, quantity);

    return {
      item: updated,
      previous_quantity: item.quantity,
      quantity_added: quantity,
      new_quantity: updated.quantity,
    };
  });

  auditLog('STOCK_RESTOCKED', {
    itemId,
    warehouseId: result.item.warehouse_id,
    previousQuantity: result.previous_quantity,
    newQuantity: result.new_quantity,
    actorId: actor.id,
    reason: reason ?? undefined,
  });

  return result;
};

export const listWarehouseItems = async (deps: ServiceDeps, actor: Actor, warehouseId: number): Promise<Item[]> => {
  const { store } = deps.uow;
  const warehouse = await store.warehouses.findById(warehouseId);

  if (!canViewWarehouse(actor, warehouse)) {
    throw new NotFoundError('WAREHOUSE_NOT_FOUND', `Warehouse ${warehouseId} not found`, { warehouse_id: warehouseId });
  }

  return store.items.findByWarehouse(warehouseId);
};
