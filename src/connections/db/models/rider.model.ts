import type { RiderStatus } from '../../../constants';

// Rider Model - Based on migration 20261018_000004_create_riders_table

export interface Rider {
  id: number;
  user_id: number; // unique
  warehouse_id: number;
  status: RiderStatus; // default: 'available'
  is_suspended: boolean;
  created_at: Date;
  updated_at: Date;
}
