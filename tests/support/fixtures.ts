import { MemoryDatabase, MemoryUnitOfWork } from './memory-store';
import type { Actor, OrderServiceDeps } from '../../src/modules/orders/orders.types';
import type { NotificationPublisher, OrderEvent } from '../../src/modules/notifications/notification.publisher';
import { USER_ROLE } from '../../src/constants';

export const SHOPKEEPER: Actor = { id: 101, role: USER_ROLE.SHOPKEEPER };
export const OTHER_SHOPKEEPER: Actor = { id: 102, role: USER_ROLE.SHOPKEEPER };
export const MANAGER: Actor = { id: 201, role: USER_ROLE.WAREHOUSE_MANAGER };
export const OTHER_MANAGER: Actor = { id: 202, role: USER_ROLE.WAREHOUSE_MANAGER };
export const RIDER: Actor = { id: 301, role: USER_ROLE.RIDER };
export const OTHER_RIDER: Actor = { id: 302, role: USER_ROLE.RIDER };
export const ADMIN: Actor = { id: 401, role: USER_ROLE.ADMIN };

export const FIXED_NOW = new Date('2026-03-01T10:00:00.000Z');

export class RecordingPublisher implements NotificationPublisher {
  readonly events: OrderEvent[] = [];

  async publish(event: OrderEvent): Promise<void> {
    this.events.push(event);
  }
}

export interface Harness {
  db: MemoryDatabase;
  uow: MemoryUnitOfWork;
  notifier: RecordingPublisher;
  deps: OrderServiceDeps;
}

export const createHarness = (): Harness => {
  const db = new MemoryDatabase();
  const uow = new MemoryUnitOfWork(db);
  const notifier = new RecordingPublisher();
  return { db, uow, notifier, deps: { uow, notifier, now: () => FIXED_NOW } };
};

export interface Marketplace {
  warehouseId: number;
  itemA: number;
  itemB: number;
}

/**
 * Active, approved warehouse run by MANAGER with
 * item A (stock 10 at 5.00) and item B (stock 3 at 20.00)
 */
export const seedMarketplace = (db: MemoryDatabase): Marketplace => {
  const warehouse = db.addWarehouse({ admin_id: MANAGER.id });
  const itemA = db.addItem({ warehouse_id: warehouse.id, price: '5.00', quantity: 10, sku: 'A-001' });
  const itemB = db.addItem({ warehouse_id: warehouse.id, price: '20.00', quantity: 3, sku: 'B-001' });
  db.addRider({ user_id: RIDER.id, warehouse_id: warehouse.id });
  return { warehouseId: warehouse.id, itemA: itemA.id, itemB: itemB.id };
};
