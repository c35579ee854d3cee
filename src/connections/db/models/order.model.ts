import type { OrderStatus } from '../../../constants';
import type { OrderItem } from './order-item.model';
import type { Delivery } from './delivery.model';
import type { OrderStatusHistory } from './order-status-history.model';

// Order Model - Based on migration 20261018_000005_create_orders_table

export interface Order {
  id: number;
  shopkeeper_id: number;
  warehouse_id: number;
  status: OrderStatus; // default: 'pending'
  total_amount: string; // DECIMAL(10, 2) - computed at creation, frozen afterwards
  rejection_reason: string | null; // required when rejected
  cancellation_reason: string | null;
  cancelled_by: number | null;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateOrderInput {
  shopkeeper_id: number; // REQUIRED
  warehouse_id: number; // REQUIRED
  total_amount: string; // REQUIRED
  notes?: string | null;
}

export interface UpdateOrderStatusInput {
  status: OrderStatus; // REQUIRED
  rejection_reason?: string | null;
  cancellation_reason?: string | null;
  cancelled_by?: number | null;
}

export interface OrderWithItems extends Order {
  items: OrderItem[];
}

export interface OrderWithDelivery extends OrderWithItems {
  delivery: Delivery | null;
}

export interface OrderDetail extends OrderWithDelivery {
  status_history: OrderStatusHistory[];
}
