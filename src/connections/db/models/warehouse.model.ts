// Warehouse Model - Based on migration 20261018_000002_create_warehouses_table

export interface Warehouse {
  id: number;
  admin_id: number; // WAREHOUSE_MANAGER user administering the warehouse
  name: string;
  address: string;
  latitude: string | null; // DECIMAL(9, 6)
  longitude: string | null; // DECIMAL(9, 6)
  is_active: boolean;
  is_approved: boolean;
  created_at: Date;
  updated_at: Date;
}
