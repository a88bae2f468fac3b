import type { OrderStatus } from '../../../constants';
import type { OrderItem } from './order-item.model';

// Order Model - migration 20261018_000003_create_orders_table

export interface Order {
  id: number;
  user_id: string; // UUID of the owner
  locator: string; // pickup code
  status: OrderStatus; // default: 'created'
  total: number; // DECIMAL(10, 2), sum of item snapshots
  notes: string | null;
  rating: number | null; // 1..5, only once delivered
  confirmed_at: Date | null;
  preparing_at: Date | null;
  ready_at: Date | null;
  delivered_at: Date | null;
  cancelled_at: Date | null;
  cancelled_by: string | null; // UUID
  cancellation_reason: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface OrderWithItems extends Order {
  items: OrderItem[];
}

export interface CreateOrderInput {
  user_id: string;
  locator: string;
  total: number;
  notes?: string | null;
}

export interface OrderStatusChange {
  status: OrderStatus;
  changed_at: Date;
  cancelled_by?: string | null;
  cancellation_reason?: string | null;
}

export interface OrderListFilter {
  user_id?: string; // restrict to one owner
  status?: OrderStatus;
  offset: number;
  limit: number;
}

/**
 * Entry of the public pickup board
 */
export interface PickupBoardEntry {
  locator: string;
  status: OrderStatus;
  updated_at: Date;
}
