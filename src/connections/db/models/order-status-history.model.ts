import type { OrderStatus } from '../../../constants';

// OrderStatusHistory Model - migration 20261018_000005_create_order_status_history_table

export interface OrderStatusHistory {
  id: number;
  order_id: number;
  status: OrderStatus;
  notes: string | null;
  updated_by: string | null; // UUID
  created_at: Date;
}

export interface CreateOrderStatusHistoryInput {
  order_id: number;
  status: OrderStatus;
  notes?: string | null;
  updated_by?: string | null;
}
