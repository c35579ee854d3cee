// Item Model - Based on migration 20261018_000003_create_items_table

export interface Item {
  id: number;
  warehouse_id: number;
  name: string;
  description: string | null;
  sku: string; // unique
  price: string; // DECIMAL(10, 2) - not null, >= 0
  quantity: number; // not null, >= 0
  created_at: Date;
  updated_at: Date;
}
