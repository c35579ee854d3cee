import type { WarehouseRepository } from '../../modules/warehouses/warehouses.repository';
import type { ItemRepository } from '../../modules/inventory/items.repository';
import type { RiderRepository } from '../../modules/riders/riders.repository';
import type { DeliveryRepository } from '../../modules/deliveries/deliveries.repository';
import type { OrderRepository } from '../../modules/orders/orders.repository';
import type { OrderHistoryRepository } from '../../modules/orders/order-history.repository';

/**
 * Every repository the order core touches, bound to one connection
 */
export interface DataStore {
  warehouses: WarehouseRepository;
  items: ItemRepository;
  riders: RiderRepository;
  deliveries: DeliveryRepository;
  orders: OrderRepository;
  history: OrderHistoryRepository;
}

/**
 * Explicit transaction scope. `transaction` commits when `work` resolves and
 * rolls back when it throws; the rejection carries the translated AppError.
 * `store` reads outside any transaction.
 */
export interface UnitOfWork {
  readonly store: DataStore;
  transaction<T>(work: (tx: DataStore) => Promise<T>): Promise<T>;
}
