import { describe, expect, it, vi } from 'vitest';
import { StockLedger } from '../../src/modules/inventory/stock-ledger';
import { InsufficientStockError, NotFoundError, ValidationError } from '../../src/utils/errors';
import { MemoryDatabase, MemoryUnitOfWork } from '../support/memory-store';

const setup = () => {
  const db = new MemoryDatabase();
  const uow = new MemoryUnitOfWork(db);
  const warehouse = db.addWarehouse({ admin_id: 1 });
  const item = db.addItem({ warehouse_id: warehouse.id, price: '4.00', quantity: 5 });
  const other = db.addItem({ warehouse_id: warehouse.id, price: '1.00', quantity: 2 });
  return { db, uow, itemId: item.id, otherId: other.id };
};

describe('StockLedger', () => {
  describe('reserve', () => {
    it('decrements the stock of the item', async () => {
      const { db, uow, itemId } = setup();

      const updated = await uow.transaction((tx) => new StockLedger(tx.items).reserve(itemId, 3));

      expect(updated.quantity).toBe(2);
      expect(db.itemQuantity(itemId)).toBe(2);
    });

    it('may take the stock down to exactly zero', async () => {
      const { db, uow, itemId } = setup();

      await uow.transaction((tx) => new StockLedger(tx.items).reserve(itemId, 5));

      expect(db.itemQuantity(itemId)).toBe(0);
    });

    it('refuses to go below zero and leaves the stock alone', async () => {
      const { db, uow, itemId } = setup();

      const attempt = uow.transaction((tx) => new StockLedger(tx.items).reserve(itemId, 6));

      await expect(attempt).rejects.toBeInstanceOf(InsufficientStockError);
      await expect(attempt).rejects.toMatchObject({
        code: 'INSUFFICIENT_STOCK',
        details: { item_id: itemId, available: 5, requested: 6 },
      });
      expect(db.itemQuantity(itemId)).toBe(5);
    });

    it('rejects non-positive quantities', async () => {
      const { uow, itemId } = setup();

      await expect(uow.transaction((tx) => new StockLedger(tx.items).reserve(itemId, 0))).rejects.toBeInstanceOf(
        ValidationError
      );
      await expect(uow.transaction((tx) => new StockLedger(tx.items).reserve(itemId, -2))).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('reports a missing item', async () => {
      const { uow } = setup();

      const attempt = uow.transaction((tx) => new StockLedger(tx.items).reserve(999, 1));

      await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
      await expect(attempt).rejects.toMatchObject({ code: 'ITEM_NOT_FOUND', details: { item_id: 999 } });
    });

    it('sees its own earlier reservations within one transaction', async () => {
      const { db, uow, itemId } = setup();

      const attempt = uow.transaction(async (tx) => {
        const ledger = new StockLedger(tx.items);
        await ledger.reserve(itemId, 3);
        return ledger.reserve(itemId, 3);
      });

      await expect(attempt).rejects.toMatchObject({ details: { available: 2, requested: 3 } });
      expect(db.itemQuantity(itemId)).toBe(5);
    });
  });

  describe('release', () => {
    it('returns units to stock', async () => {
      const { db, uow, itemId } = setup();

      await uow.transaction((tx) => new StockLedger(tx.items).release(itemId, 4));

      expect(db.itemQuantity(itemId)).toBe(9);
    });

    it('ignores non-positive quantities and missing items', async () => {
      const { db, uow, itemId } = setup();

      const results = await uow.transaction(async (tx) => {
        const ledger = new StockLedger(tx.items);
        return [await ledger.release(itemId, 0), await ledger.release(999, 2)];
      });

      expect(results).toEqual([null, null]);
      expect(db.itemQuantity(itemId)).toBe(5);
    });
  });

  describe('restock', () => {
    it('adds units to stock', async () => {
      const { db, uow, itemId } = setup();

      const updated = await uow.transaction((tx) => new StockLedger(tx.items).restock(itemId, 10));

      expect(updated.quantity).toBe(15);
      expect(db.itemQuantity(itemId)).toBe(15);
    });

    it('rejects non-positive quantities', async () => {
      const { uow, itemId } = setup();

      await expect(uow.transaction((tx) => new StockLedger(tx.items).restock(itemId, 0))).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
      });
    });
  });

  describe('lock', () => {
    it('locks distinct ids in ascending order and only once per ledger', async () => {
      const { uow, itemId, otherId } = setup();

      await uow.transaction(async (tx) => {
        const lockByIds = vi.spyOn(tx.items, 'lockByIds');
        const ledger = new StockLedger(tx.items);

        const locked = await ledger.lock([otherId, itemId, otherId]);
        await ledger.reserve(itemId, 1);
        await ledger.lock([itemId, otherId]);

        expect(lockByIds).toHaveBeenCalledTimes(1);
        expect(lockByIds).toHaveBeenCalledWith([itemId, otherId]);
        expect(Array.from(locked.keys())).toEqual([otherId, itemId]);
      });
    });
  });

  it('never oversells under concurrent reservations', async () => {
    const { db, uow, itemId } = setup();

    const attempts = await Promise.allSettled(
      Array.from({ length: 8 }, () => uow.transaction((tx) => new StockLedger(tx.items).reserve(itemId, 1)))
    );

    expect(attempts.filter((attempt) => attempt.status === 'fulfilled')).toHaveLength(5);
    expect(attempts.filter((attempt) => attempt.status === 'rejected')).toHaveLength(3);
    expect(db.itemQuantity(itemId)).toBe(0);
  });
});
