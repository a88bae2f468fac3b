import type { PoolClient } from 'pg';
import type {
  CreateOrderInput,
  CreateOrderItemInput,
  CreateOrderStatusHistoryInput,
  Order,
  OrderItem,
  OrderListFilter,
  OrderStatusChange,
  OrderStatusHistory,
  OrderWithItems,
  PickupBoardEntry,
} from '../../connections/db/models';
import type { OrderStatus } from '../../constants';
import { STATUS_TIMESTAMP_FIELD } from './order-state-machine';

export interface OrderRepository {
  findById(id: number): Promise<OrderWithItems | null>;
  /** Read the order and lock its row until the transaction ends */
  findByIdForUpdate(id: number): Promise<OrderWithItems | null>;
  list(filter: OrderListFilter): Promise<{ orders: OrderWithItems[]; total: number }>;
  create(input: CreateOrderInput): Promise<Order>;
  addItem(input: CreateOrderItemInput): Promise<OrderItem>;
  updateItemQuantity(itemId: number, quantity: number): Promise<OrderItem | null>;
  removeItem(itemId: number): Promise<boolean>;
  updateTotal(orderId: number, total: number): Promise<void>;
  updateStatus(orderId: number, change: OrderStatusChange): Promise<Order>;
  setRating(orderId: number, rating: number): Promise<Order>;
  delete(orderId: number): Promise<boolean>;
  addHistory(input: CreateOrderStatusHistoryInput): Promise<OrderStatusHistory>;
  listHistory(orderId: number): Promise<OrderStatusHistory[]>;
  listByStatuses(statuses: readonly OrderStatus[]): Promise<PickupBoardEntry[]>;
}

interface OrderRow extends Omit<Order, 'total'> {
  total: string;
}

interface OrderItemRow extends Omit<OrderItem, 'unit_price'> {
  unit_price: string;
}

const ORDER_COLUMNS = `id, user_id, locator, status, total, notes, rating,
  confirmed_at, preparing_at, ready_at, delivered_at, cancelled_at,
  cancelled_by, cancellation_reason, created_at, updated_at`;

const ITEM_COLUMNS = 'id, order_id, product_id, product_name, unit_price, quantity, created_at, updated_at';

const toOrder = (row: OrderRow): Order => ({
  ...row,
  total: Number(row.total),
});

const toOrderItem = (row: OrderItemRow): OrderItem => ({
  ...row,
  unit_price: Number(row.unit_price),
});

export class PgOrderRepository implements OrderRepository {
  constructor(private readonly client: PoolClient) {}

  private async itemsFor(orderIds: number[]): Promise<Map<number, OrderItem[]>> {
    const grouped = new Map<number, OrderItem[]>(orderIds.map(id => [id, []]));
    if (orderIds.length === 0) {
      return grouped;
    }

    const result = await this.client.query<OrderItemRow>(
      `SELECT ${ITEM_COLUMNS} FROM order_items
       WHERE order_id = ANY($1::int[])
       ORDER BY id ASC`,
      [orderIds]
    );

    for (const row of result.rows) {
      grouped.get(row.order_id)?.push(toOrderItem(row));
    }
    return grouped;
  }

  private async withItems(row: OrderRow | undefined): Promise<OrderWithItems | null> {
    if (!row) {
      return null;
    }
    const items = await this.itemsFor([row.id]);
    return { ...toOrder(row), items: items.get(row.id) ?? [] };
  }

  async findById(id: number): Promise<OrderWithItems | null> {
    const result = await this.client.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1`,
      [id]
    );
    return this.withItems(result.rows[0]);
  }

  async findByIdForUpdate(id: number): Promise<OrderWithItems | null> {
    const result = await this.client.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1 FOR UPDATE`,
      [id]
    );
    return this.withItems(result.rows[0]);
  }

  async list({ user_id, status, offset, limit }: OrderListFilter): Promise<{ orders: OrderWithItems[]; total: number }> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (user_id) {
      params.push(user_id);
      conditions.push(`user_id = $${params.length}`);
    }

    if (status) {
      params.push(status);
      conditions.push(`status = $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const countResult = await this.client.query<{ count: string }>(
      `SELECT COUNT(*) FROM orders ${where}`,
      params
    );

    const result = await this.client.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders ${where}
       ORDER BY created_at DESC, id DESC
       LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, limit, offset]
    );

    const items = await this.itemsFor(result.rows.map(row => row.id));

    return {
      orders: result.rows.map(row => ({ ...toOrder(row), items: items.get(row.id) ?? [] })),
      total: parseInt(countResult.rows[0].count),
    };
  }

  async create(input: CreateOrderInput): Promise<Order> {
    const result = await this.client.query<OrderRow>(
      `INSERT INTO orders (user_id, locator, total, notes)
       VALUES ($1, $2, $3, $4)
       RETURNING ${ORDER_COLUMNS}`,
      [input.user_id, input.locator, input.total, input.notes ?? null]
    );
    return toOrder(result.rows[0]);
  }

  async addItem(input: CreateOrderItemInput): Promise<OrderItem> {
    const result = await this.client.query<OrderItemRow>(
      `INSERT INTO order_items (order_id, product_id, product_name, unit_price, quantity)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${ITEM_COLUMNS}`,
      [input.order_id, input.product_id, input.product_name, input.unit_price, input.quantity]
    );
    return toOrderItem(result.rows[0]);
  }

  async updateItemQuantity(itemId: number, quantity: number): Promise<OrderItem | null> {
    // Only the quantity is writable, the price snapshot never changes
    const result = await this.client.query<OrderItemRow>(
      `UPDATE order_items SET quantity = $1, updated_at = NOW()
       WHERE id = $2
       RETURNING ${ITEM_COLUMNS}`,
      [quantity, itemId]
    );
    return result.rows[0] ? toOrderItem(result.rows[0]) : null;
  }

  async removeItem(itemId: number): Promise<boolean> {
    const result = await this.client.query('DELETE FROM order_items WHERE id = $1', [itemId]);
    return (result.rowCount ?? 0) > 0;
  }

  async updateTotal(orderId: number, total: number): Promise<void> {
    await this.client.query(
      'UPDATE orders SET total = $1, updated_at = NOW() WHERE id = $2',
      [total, orderId]
    );
  }

  async updateStatus(orderId: number, change: OrderStatusChange): Promise<Order> {
    const updates = ['status = $1', 'updated_at = NOW()'];
    const values: unknown[] = [change.status];

    if (change.status !== 'created') {
      values.push(change.changed_at);
      updates.push(`${STATUS_TIMESTAMP_FIELD[change.status]} = $${values.length}`);
    }

    if (change.cancelled_by !== undefined) {
      values.push(change.cancelled_by);
      updates.push(`cancelled_by = $${values.length}`);
    }

    if (change.cancellation_reason !== undefined) {
      values.push(change.cancellation_reason);
      updates.push(`cancellation_reason = $${values.length}`);
    }

    values.push(orderId);

    const result = await this.client.query<OrderRow>(
      `UPDATE orders SET ${updates.join(', ')}
       WHERE id = $${values.length}
       RETURNING ${ORDER_COLUMNS}`,
      values
    );
    return toOrder(result.rows[0]);
  }

  async setRating(orderId: number, rating: number): Promise<Order> {
    const result = await this.client.query<OrderRow>(
      `UPDATE orders SET rating = $1, updated_at = NOW()
       WHERE id = $2
       RETURNING ${ORDER_COLUMNS}`,
      [rating, orderId]
    );
    return toOrder(result.rows[0]);
  }

  async delete(orderId: number): Promise<boolean> {
    const result = await this.client.query('DELETE FROM orders WHERE id = $1', [orderId]);
    return (result.rowCount ?? 0) > 0;
  }

  async addHistory(input: CreateOrderStatusHistoryInput): Promise<OrderStatusHistory> {
    const result = await this.client.query<OrderStatusHistory>(
      `INSERT INTO order_status_history (order_id, status, notes, updated_by)
       VALUES ($1, $2, $3, $4)
       RETURNING id, order_id, status, notes, updated_by, created_at`,
      [input.order_id, input.status, input.notes ?? null, input.updated_by ?? null]
    );
    return result.rows[0];
  }

  async listHistory(orderId: number): Promise<OrderStatusHistory[]> {
    const result = await this.client.query<OrderStatusHistory>(
      `SELECT id, order_id, status, notes, updated_by, created_at
       FROM order_status_history
       WHERE order_id = $1
       ORDER BY created_at ASC, id ASC`,
      [orderId]
    );
    return result.rows;
  }

  async listByStatuses(statuses: readonly OrderStatus[]): Promise<PickupBoardEntry[]> {
    const result = await this.client.query<PickupBoardEntry>(
      `SELECT locator, status, updated_at
       FROM orders
       WHERE status = ANY($1::text[])
       ORDER BY created_at ASC`,
      [[...statuses]]
    );
    return result.rows;
  }
}
