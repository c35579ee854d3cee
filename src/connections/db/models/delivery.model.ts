import type { DeliveryStatus } from '../../../constants';

// Delivery Model - Based on migration 20261018_000007_create_deliveries_table

export interface Delivery {
  id: number;
  order_id: number; // unique - one delivery per order
  rider_id: number | null;
  status: DeliveryStatus; // default: 'assigned'
  delivery_fee: string; // DECIMAL(10, 2)
  created_at: Date;
  updated_at: Date;
}

export interface CreateDeliveryInput {
  order_id: number;
  rider_id: number;
  delivery_fee: string;
}
