import { MigrationInfo } from './types';

// Import all migrations
import * as migration001 from './20261018_000001_create_users_table';
import * as migration002 from './20261018_000002_create_warehouses_table';
import * as migration003 from './20261018_000003_create_items_table';
import * as migration004 from './20261018_000004_create_riders_table';
import * as migration005 from './20261018_000005_create_orders_table';
import * as migration006 from './20261018_000006_create_order_items_table';
import * as migration007 from './20261018_000007_create_deliveries_table';
import * as migration008 from './20261018_000008_create_order_status_history_table';

export const migrations: MigrationInfo[] = [
  { name: '20261018_000001_create_users_table', migration: migration001.migration },
  { name: '20261018_000002_create_warehouses_table', migration: migration002.migration },
  { name: '20261018_000003_create_items_table', migration: migration003.migration },
  { name: '20261018_000004_create_riders_table', migration: migration004.migration },
  { name: '20261018_000005_create_orders_table', migration: migration005.migration },
  { name: '20261018_000006_create_order_items_table', migration: migration006.migration },
  { name: '20261018_000007_create_deliveries_table', migration: migration007.migration },
  { name: '20261018_000008_create_order_status_history_table', migration: migration008.migration },
];
