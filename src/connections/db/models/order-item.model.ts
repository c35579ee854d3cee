// OrderItem Model - Based on migration 20261018_000006_create_order_items_table

export interface OrderItem {
  id: number;
  order_id: number;
  item_id: number;
  quantity: number; // >= 1
  price: string; // DECIMAL(10, 2) - snapshot of items.price at order time
  created_at: Date;
}

export interface CreateOrderItemInput {
  item_id: number; // REQUIRED
  quantity: number; // REQUIRED
  price: string; // REQUIRED
}
