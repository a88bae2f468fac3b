// OrderItem Model - migration 20261018_000004_create_order_items_table

export interface OrderItem {
  id: number;
  order_id: number;
  product_id: number | null; // null once the product row is hard deleted
  product_name: string; // snapshot at the time the item was added
  unit_price: number; // snapshot, DECIMAL(10, 2)
  quantity: number; // >= 1
  created_at: Date;
  updated_at: Date;
}

export interface CreateOrderItemInput {
  order_id: number;
  product_id: number;
  product_name: string;
  unit_price: number;
  quantity: number;
}
