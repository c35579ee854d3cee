import type { Item } from '../../connections/db/models';
import type { ItemRepository } from './items.repository';
import { InsufficientStockError, NotFoundError, ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logging';

/**
 * Stock mutations for one unit of work.
 *
 * A ledger is bound to the item repository of an open transaction and holds no
 * transaction of its own. Rows it touches stay exclusively locked until that
 * transaction ends; callers that need several rows lock them together with
 * `lock` so every caller acquires them in ascending id order.
 */
export class StockLedger {
  private readonly locked = new Map<number, Item>();

  constructor(private readonly items: ItemRepository) {}

  async lock(itemIds: readonly number[]): Promise<Map<number, Item>> {
    const missing = Array.from(new Set(itemIds))
      .filter((id) => !this.locked.has(id))
      .sort((a, b) => a - b);

    if (missing.length > 0) {
      const rows = await this.items.lockByIds(missing);
      for (const row of rows) {
        this.locked.set(row.id, row);
      }
    }

    const result = new Map<number, Item>();
    for (const id of itemIds) {
      const item = this.locked.get(id);
      if (item) {
        result.set(id, item);
      }
    }
    return result;
  }

  async reserve(itemId: number, quantity: number): Promise<Item> {
    assertPositiveQuantity(quantity);

    const item = await this.lockOne(itemId);
    if (!item) {
      throw new NotFoundError('ITEM_NOT_FOUND', `Item ${itemId} not found`, { item_id: itemId });
    }

    if (item.quantity < quantity) {
      throw new InsufficientStockError({ item_id: itemId, available: item.quantity, requested: quantity });
    }

    return this.write(itemId, item.quantity - quantity);
  }

  /**
   * Return reserved units. Never throws for bad input: it is called while
   * unwinding orders and a missing row must not block a cancellation.
   */
  async release(itemId: number, quantity: number): Promise<Item | null> {
    if (!Number.isInteger(quantity) || quantity <= 0) {
      logger.warn('Ignoring stock release with non-positive quantity', { itemId, quantity });
      return null;
    }

    const item = await this.lockOne(itemId);
    if (!item) {
      logger.warn('Ignoring stock release for missing item', { itemId, quantity });
      return null;
    }

    return this.write(itemId, Math.max(0, item.quantity + quantity));
  }

  async restock(itemId: number, quantity: number): Promise<Item> {
    assertPositiveQuantity(quantity);

    const item = await this.lockOne(itemId);
    if (!item) {
      throw new NotFoundError('ITEM_NOT_FOUND', `Item ${itemId} not found`, { item_id: itemId });
    }

    return this.write(itemId, item.quantity + quantity);
  }

  private async lockOne(itemId: number): Promise<Item | undefined> {
    const rows = await this.lock([itemId]);
    return rows.get(itemId);
  }

  private async write(itemId: number, quantity: number): Promise<Item> {
    const updated = await this.items.setQuantity(itemId, quantity);
    if (!updated) {
      this.locked.delete(itemId);
      throw new NotFoundError('ITEM_NOT_FOUND', `Item ${itemId} not found`, { item_id: itemId });
    }

    this.locked.set(itemId, updated);
    return updated;
  }
}

const assertPositiveQuantity = (quantity: number): void => {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new ValidationError('Quantity must be a positive integer', { quantity });
  }
};
