import { beforeEach, describe, expect, it } from 'vitest';
import { createOrder } from '../../src/modules/orders/orders.service';
import {
  ADMIN,
  FIXED_NOW,
  type Harness,
  MANAGER,
  type Marketplace,
  OTHER_SHOPKEEPER,
  SHOPKEEPER,
  createHarness,
  seedMarketplace,
} from '../support/fixtures';
import type { Actor } from '../../src/modules/orders/orders.types';
import type { DataStore, UnitOfWork } from '../../src/connections/db/store';
import type { NotificationPublisher, OrderEvent } from '../../src/modules/notifications/notification.publisher';

describe('createOrder', () => {
  let harness: Harness;
  let market: Marketplace;

  beforeEach(() => {
    harness = createHarness();
    market = seedMarketplace(harness.db);
  });

  const order = (actor: Actor, items: Array<[number, number]>, extra: Record<string, unknown> = {}) =>
    createOrder(harness.deps, actor, {
      warehouse_id: market.warehouseId,
      items: items.map(([item_id, quantity]) => ({ item_id, quantity })),
      ...extra,
    });

  it('reserves stock and snapshots prices', async () => {
    const created = await order(SHOPKEEPER, [[market.itemA, 2], [market.itemB, 1]]);

    expect(created).toMatchObject({
      shopkeeper_id: SHOPKEEPER.id,
      warehouse_id: market.warehouseId,
      status: 'pending',
      total_amount: '30.00',
      notes: null,
    });
    expect(created.items.map(({ item_id, quantity, price }) => ({ item_id, quantity, price }))).toEqual([
      { item_id: market.itemA, quantity: 2, price: '5.00' },
      { item_id: market.itemB, quantity: 1, price: '20.00' },
    ]);
    expect(harness.db.itemQuantity(market.itemA)).toBe(8);
    expect(harness.db.itemQuantity(market.itemB)).toBe(2);
  });

  it('totals each line as price times quantity', async () => {
    const created = await order(SHOPKEEPER, [[market.itemA, 2], [market.itemB, 3]]);

    expect(created.total_amount).toBe('70.00');
    expect(harness.db.itemQuantity(market.itemB)).toBe(0);
  });

  it('keeps sanitized notes', async () => {
    const created = await order(SHOPKEEPER, [[market.itemA, 1]], { notes: '  Leave at the back door ' });

    expect(created.notes).toBe('Leave at the back door');
  });

  it('records history and publishes a creation event after commit', async () => {
    const created = await order(SHOPKEEPER, [[market.itemA, 1]]);

    expect(Array.from(harness.db.history.values())).toEqual([
      expect.objectContaining({
        order_id: created.id,
        from_status: null,
        to_status: 'pending',
        actor_id: SHOPKEEPER.id,
        actor_role: 'SHOPKEEPER',
        reason: null,
        succeeded: true,
        denial_code: null,
      }),
    ]);
    expect(harness.notifier.events).toEqual([
      {
        event: 'order.created',
        order_id: created.id,
        shopkeeper_id: SHOPKEEPER.id,
        warehouse_id: market.warehouseId,
        status: 'pending',
        rider_id: null,
        occurred_at: FIXED_NOW.toISOString(),
      },
    ]);
  });

  it('fails on insufficient stock without touching anything', async () => {
    const attempt = order(SHOPKEEPER, [[market.itemB, 5]]);

    await expect(attempt).rejects.toMatchObject({
      code: 'INSUFFICIENT_STOCK',
      details: { item_id: market.itemB, available: 3, requested: 5 },
    });
    expect(harness.db.itemQuantity(market.itemB)).toBe(3);
    expect(harness.db.orders.size).toBe(0);
    expect(harness.notifier.events).toEqual([]);
  });

  it('fails as a whole when a later line is short', async () => {
    await expect(order(SHOPKEEPER, [[market.itemA, 4], [market.itemB, 4]])).rejects.toMatchObject({
      code: 'INSUFFICIENT_STOCK',
    });

    expect(harness.db.itemQuantity(market.itemA)).toBe(10);
    expect(harness.db.orders.size).toBe(0);
  });

  it('refuses items priced below one cent', async () => {
    const free = harness.db.addItem({ warehouse_id: market.warehouseId, price: '0.00', quantity: 5 });

    await expect(order(SHOPKEEPER, [[market.itemA, 1], [free.id, 1]])).rejects.toMatchObject({
      code: 'ITEM_NOT_PURCHASABLE',
      status: 400,
      details: { item_id: free.id, price: '0.00' },
    });
    expect(harness.db.itemQuantity(market.itemA)).toBe(10);
    expect(harness.db.itemQuantity(free.id)).toBe(5);
    expect(harness.db.orders.size).toBe(0);
  });

  it('re-checks the price under lock', async () => {
    const repricing: UnitOfWork = {
      store: harness.uow.store,
      transaction: <T>(work: (tx: DataStore) => Promise<T>): Promise<T> => {
        const item = harness.db.items.get(market.itemA);
        if (item) {
          harness.db.items.set(market.itemA, { ...item, price: '0.00' });
        }
        return harness.uow.transaction(work);
      },
    };

    const attempt = createOrder({ ...harness.deps, uow: repricing }, SHOPKEEPER, {
      warehouse_id: market.warehouseId,
      items: [{ item_id: market.itemA, quantity: 2 }],
    });

    await expect(attempt).rejects.toMatchObject({ code: 'ITEM_NOT_PURCHASABLE' });
    expect(harness.db.itemQuantity(market.itemA)).toBe(10);
    expect(harness.db.orders.size).toBe(0);
  });

  it('accepts a one-cent item', async () => {
    const cheap = harness.db.addItem({ warehouse_id: market.warehouseId, price: '0.01', quantity: 5 });

    const created = await order(SHOPKEEPER, [[cheap.id, 3]]);

    expect(created.total_amount).toBe('0.03');
  });

  it('lets exactly one of two racing orders take the last unit', async () => {
    const itemC = harness.db.addItem({ warehouse_id: market.warehouseId, price: '7.25', quantity: 1 });

    const results = await Promise.allSettled([
      order(SHOPKEEPER, [[itemC.id, 1]]),
      order(OTHER_SHOPKEEPER, [[itemC.id, 1]]),
    ]);

    const fulfilled = results.filter((result) => result.status === 'fulfilled');
    const rejected = results.flatMap((result) => (result.status === 'rejected' ? [result.reason] : []));

    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toMatchObject({ code: 'INSUFFICIENT_STOCK' });
    expect(harness.db.itemQuantity(itemC.id)).toBe(0);
    expect(harness.db.orders.size).toBe(1);
  });

  it('never oversells across many concurrent shopkeepers', async () => {
    const item = harness.db.addItem({ warehouse_id: market.warehouseId, price: '1.00', quantity: 5 });
    const shoppers: Actor[] = Array.from({ length: 8 }, (_, index): Actor => ({ id: 1000 + index, role: 'SHOPKEEPER' }));

    const results = await Promise.allSettled(shoppers.map((shopper) => order(shopper, [[item.id, 1]])));

    const placed = results.filter((result) => result.status === 'fulfilled');
    const refused = results.flatMap((result) => (result.status === 'rejected' ? [result.reason] : []));

    expect(placed).toHaveLength(5);
    expect(refused).toHaveLength(3);
    for (const reason of refused) {
      expect(reason).toMatchObject({ code: 'INSUFFICIENT_STOCK' });
    }
    expect(harness.db.itemQuantity(item.id)).toBe(0);
  });

  it('rolls back reserved stock when a later write fails', async () => {
    harness.db.failNext('orders.addItems');

    await expect(order(SHOPKEEPER, [[market.itemA, 2]])).rejects.toMatchObject({
      kind: 'system',
      code: 'DATABASE_ERROR',
    });

    expect(harness.db.itemQuantity(market.itemA)).toBe(10);
    expect(harness.db.orders.size).toBe(0);
    expect(harness.db.orderItems.size).toBe(0);
    expect(harness.db.rollbacks).toBe(1);
    expect(harness.notifier.events).toEqual([]);
  });

  it('keeps the order when the history write fails afterwards', async () => {
    harness.db.failNext('history.record');

    const created = await order(SHOPKEEPER, [[market.itemA, 1]]);

    expect(harness.db.orders.get(created.id)?.status).toBe('pending');
    expect(harness.db.history.size).toBe(0);
    expect(harness.notifier.events).toHaveLength(1);
  });

  it('does not wait for a publisher that never answers', async () => {
    const published: OrderEvent[] = [];
    const stalled: NotificationPublisher = {
      publish: (event) => {
        published.push(event);
        return new Promise<void>(() => undefined);
      },
    };

    const created = await createOrder({ ...harness.deps, notifier: stalled }, SHOPKEEPER, {
      warehouse_id: market.warehouseId,
      items: [{ item_id: market.itemA, quantity: 1 }],
    });

    expect(harness.db.orders.get(created.id)?.status).toBe('pending');
    expect(published.map((event) => event.event)).toEqual(['order.created']);
  });

  it('keeps the order when the publisher rejects', async () => {
    const failing: NotificationPublisher = {
      publish: () => Promise.reject(new Error('broker down')),
    };

    const created = await createOrder({ ...harness.deps, notifier: failing }, SHOPKEEPER, {
      warehouse_id: market.warehouseId,
      items: [{ item_id: market.itemA, quantity: 1 }],
    });

    expect(harness.db.orders.get(created.id)?.status).toBe('pending');
    expect(harness.db.itemQuantity(market.itemA)).toBe(9);
  });

  describe('in-flight orders', () => {
    it('refuses a second pending order to the same warehouse', async () => {
      await order(SHOPKEEPER, [[market.itemA, 1]]);

      await expect(order(SHOPKEEPER, [[market.itemA, 1]])).rejects.toMatchObject({
        code: 'DUPLICATE_IN_FLIGHT_ORDER',
        status: 400,
      });
      expect(harness.db.itemQuantity(market.itemA)).toBe(9);
    });

    it('lets other shopkeepers order from the same warehouse', async () => {
      await order(SHOPKEEPER, [[market.itemA, 1]]);

      await expect(order(OTHER_SHOPKEEPER, [[market.itemA, 1]])).resolves.toMatchObject({ status: 'pending' });
    });

    it('lets the shopkeeper order from another warehouse', async () => {
      await order(SHOPKEEPER, [[market.itemA, 1]]);
      const second = harness.db.addWarehouse({ admin_id: MANAGER.id });
      const item = harness.db.addItem({ warehouse_id: second.id, price: '2.00', quantity: 4 });

      await expect(
        createOrder(harness.deps, SHOPKEEPER, { warehouse_id: second.id, items: [{ item_id: item.id, quantity: 1 }] })
      ).resolves.toMatchObject({ warehouse_id: second.id });
    });

    it('admits only one of two concurrent orders from the same shopkeeper', async () => {
      const results = await Promise.allSettled([
        order(SHOPKEEPER, [[market.itemA, 1]]),
        order(SHOPKEEPER, [[market.itemA, 1]]),
      ]);

      expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
      expect(results.find((result) => result.status === 'rejected')).toMatchObject({
        reason: { code: 'DUPLICATE_IN_FLIGHT_ORDER' },
      });
      expect(harness.db.itemQuantity(market.itemA)).toBe(9);
    });
  });

  describe('refusals', () => {
    it('only accepts orders from shopkeepers', async () => {
      for (const actor of [MANAGER, ADMIN]) {
        await expect(order(actor, [[market.itemA, 1]])).rejects.toMatchObject({
          code: 'ROLE_NOT_PERMITTED',
          status: 403,
        });
      }
    });

    it('rejects malformed bodies', async () => {
      await expect(createOrder(harness.deps, SHOPKEEPER, { warehouse_id: market.warehouseId, items: [] })).rejects.toMatchObject({
        kind: 'validation',
        code: 'VALIDATION_ERROR',
      });
    });

    it('rejects the same item twice', async () => {
      await expect(order(SHOPKEEPER, [[market.itemA, 1], [market.itemA, 2]])).rejects.toMatchObject({
        code: 'DUPLICATE_ITEMS',
        details: { item_ids: [market.itemA] },
      });
    });

    it('reports an unknown warehouse', async () => {
      await expect(
        createOrder(harness.deps, SHOPKEEPER, { warehouse_id: 99, items: [{ item_id: market.itemA, quantity: 1 }] })
      ).rejects.toMatchObject({ code: 'WAREHOUSE_NOT_FOUND', status: 404 });
    });

    it('refuses inactive and unapproved warehouses', async () => {
      const inactive = harness.db.addWarehouse({ admin_id: MANAGER.id, is_active: false });
      const unapproved = harness.db.addWarehouse({ admin_id: MANAGER.id, is_approved: false });

      await expect(
        createOrder(harness.deps, SHOPKEEPER, { warehouse_id: inactive.id, items: [{ item_id: 1, quantity: 1 }] })
      ).rejects.toMatchObject({ code: 'WAREHOUSE_INACTIVE' });
      await expect(
        createOrder(harness.deps, SHOPKEEPER, { warehouse_id: unapproved.id, items: [{ item_id: 1, quantity: 1 }] })
      ).rejects.toMatchObject({ code: 'WAREHOUSE_NOT_APPROVED' });
    });

    it('refuses items stocked by another warehouse', async () => {
      const elsewhere = harness.db.addWarehouse({ admin_id: MANAGER.id });
      const foreign = harness.db.addItem({ warehouse_id: elsewhere.id, price: '1.00', quantity: 50 });

      await expect(order(SHOPKEEPER, [[foreign.id, 1]])).rejects.toMatchObject({
        code: 'ITEM_NOT_FOUND',
        message: `Item ${foreign.id} not found in warehouse ${market.warehouseId}`,
      });
      expect(harness.db.itemQuantity(foreign.id)).toBe(50);
    });
  });
});
