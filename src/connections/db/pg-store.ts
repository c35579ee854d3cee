import type { Pool } from 'pg';
import { DbExecutor, poolExecutor } from './executor';
import { connectorFromPool, TransactionConnector, TransactionOptions, withTransaction } from './transaction';
import { translateDatabaseError } from './errors';
import type { DataStore, UnitOfWork } from './store';
import { PgWarehouseRepository } from '../../modules/warehouses/warehouses.repository';
import { PgItemRepository } from '../../modules/inventory/items.repository';
import { PgRiderRepository } from '../../modules/riders/riders.repository';
import { PgDeliveryRepository } from '../../modules/deliveries/deliveries.repository';
import { PgOrderRepository } from '../../modules/orders/orders.repository';
import { PgOrderHistoryRepository } from '../../modules/orders/order-history.repository';

export const createPgStore = (db: DbExecutor): DataStore => ({
  warehouses: new PgWarehouseRepository(db),
  items: new PgItemRepository(db),
  riders: new PgRiderRepository(db),
  deliveries: new PgDeliveryRepository(db),
  orders: new PgOrderRepository(db),
  history: new PgOrderHistoryRepository(db),
});

export class PgUnitOfWork implements UnitOfWork {
  readonly store: DataStore;

  constructor(
    reader: DbExecutor,
    private readonly connect: TransactionConnector,
    private readonly options: TransactionOptions = {}
  ) {
    this.store = createPgStore(reader);
  }

  async transaction<T>(work: (tx: DataStore) => Promise<T>): Promise<T> {
    try {
      return await withTransaction(this.connect, (db) => work(createPgStore(db)), this.options);
    } catch (error) {
      throw translateDatabaseError(error);
    }
  }
}

export const createPgUnitOfWork = (pool: Pool, options: TransactionOptions = {}): UnitOfWork =>
  new PgUnitOfWork(poolExecutor(pool), connectorFromPool(pool), options);
