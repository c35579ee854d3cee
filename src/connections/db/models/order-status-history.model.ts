import type { OrderStatus, UserRole } from '../../../constants';

// OrderStatusHistory Model - Based on migration 20261018_000008_create_order_status_history_table

export interface OrderStatusHistory {
  id: number;
  order_id: number;
  from_status: OrderStatus | null; // null for the creation entry
  to_status: OrderStatus;
  actor_id: number | null;
  actor_role: UserRole | null;
  reason: string | null;
  succeeded: boolean;
  denial_code: string | null;
  created_at: Date;
}

export interface CreateOrderStatusHistoryInput {
  order_id: number;
  from_status: OrderStatus | null;
  to_status: OrderStatus;
  actor_id: number;
  actor_role: UserRole;
  reason?: string | null;
  succeeded: boolean;
  denial_code?: string | null;
}
