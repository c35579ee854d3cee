import { beforeEach, describe, expect, it } from 'vitest';
import { listWarehouseItems, restockItem } from '../../src/modules/inventory/inventory.service';
import {
  ADMIN,
  type Harness,
  MANAGER,
  type Marketplace,
  OTHER_MANAGER,
  SHOPKEEPER,
  createHarness,
  seedMarketplace,
} from '../support/fixtures';

describe('inventory service', () => {
  let harness: Harness;
  let market: Marketplace;

  beforeEach(() => {
    harness = createHarness();
    market = seedMarketplace(harness.db);
  });

  describe('restockItem', () => {
    it('adds stock for the warehouse manager', async () => {
      const result = await restockItem(harness.deps, MANAGER, market.itemA, { quantity: 5, reason: ' Supplier run ' });

      expect(result).toMatchObject({ previous_quantity: 10, quantity_added: 5, new_quantity: 15 });
      expect(result.item.quantity).toBe(15);
      expect(harness.db.itemQuantity(market.itemA)).toBe(15);
    });

    it('lets an admin restock any warehouse', async () => {
      await restockItem(harness.deps, ADMIN, market.itemB, { quantity: 2 });

      expect(harness.db.itemQuantity(market.itemB)).toBe(5);
    });

    it('hides items of other warehouses', async () => {
      await expect(restockItem(harness.deps, OTHER_MANAGER, market.itemA, { quantity: 5 })).rejects.toMatchObject({
        code: 'ITEM_NOT_FOUND',
        details: { item_id: market.itemA },
      });
      expect(harness.db.itemQuantity(market.itemA)).toBe(10);
    });

    it('reports missing items', async () => {
      await expect(restockItem(harness.deps, MANAGER, 999, { quantity: 5 })).rejects.toMatchObject({
        code: 'ITEM_NOT_FOUND',
      });
    });

    it('refuses shopkeepers', async () => {
      await expect(restockItem(harness.deps, SHOPKEEPER, market.itemA, { quantity: 5 })).rejects.toMatchObject({
        code: 'ROLE_NOT_PERMITTED',
      });
    });

    it('validates the quantity', async () => {
      await expect(restockItem(harness.deps, MANAGER, market.itemA, { quantity: 0 })).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
      });
      await expect(restockItem(harness.deps, MANAGER, market.itemA, { quantity: 10001 })).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
      });
    });
  });

  describe('listWarehouseItems', () => {
    it('shows an open warehouse to shopkeepers', async () => {
      const items = await listWarehouseItems(harness.deps, SHOPKEEPER, market.warehouseId);

      expect(items.map((item) => item.sku)).toEqual(['A-001', 'B-001']);
    });

    it('shows managers only their own warehouse', async () => {
      await expect(listWarehouseItems(harness.deps, MANAGER, market.warehouseId)).resolves.toHaveLength(2);
      await expect(listWarehouseItems(harness.deps, OTHER_MANAGER, market.warehouseId)).rejects.toMatchObject({
        code: 'WAREHOUSE_NOT_FOUND',
      });
    });

    it('hides closed warehouses from shopkeepers but not from admins', async () => {
      const closed = harness.db.addWarehouse({ admin_id: MANAGER.id, is_active: false });

      await expect(listWarehouseItems(harness.deps, SHOPKEEPER, closed.id)).rejects.toMatchObject({
        code: 'WAREHOUSE_NOT_FOUND',
      });
      await expect(listWarehouseItems(harness.deps, ADMIN, closed.id)).resolves.toEqual([]);
    });
  });
});
