import type { Database, Repositories } from '../../connections/db/database';
import type {
  CreateOrderItemInput,
  OrderItem,
  OrderStatusHistory,
  OrderWithItems,
  PickupBoardEntry,
  Product,
} from '../../connections/db/models';
import {
  INITIAL_ORDER_STATUS,
  ORDER_LIMITS,
  ORDER_RATING,
  ORDER_STATUS,
  PICKUP_BOARD_STATUSES,
  type OrderStatus,
} from '../../constants';
import type { Actor } from '../../types/request.types';
import { authorize, can, type Action } from '../access/access-control';
import {
  AuthorizationError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
} from '../../utils/errors';
import { generateLocator } from '../../utils/locator';
import { auditLog } from '../../utils/logging';
import { sumLineTotals } from '../../utils/money';
import { TRANSITION_ACTIONS, assertTransition, isTerminal } from './order-state-machine';

export interface OrderLineRequest {
  product_id: number;
  quantity: number;
}

export interface CreateOrderData {
  items: OrderLineRequest[];
  notes?: string | null;
  /** Owner of the order when crew places it for a customer */
  user_id?: string;
}

export interface TransitionData {
  status: OrderStatus;
  notes?: string | null;
  reason?: string | null;
}

export interface ListOrdersOptions {
  status?: OrderStatus;
  offset: number;
  limit: number;
}

const assertQuantity = (quantity: number): void => {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new ValidationError('Quantity must be an integer greater than or equal to 1', { quantity });
  }
  if (quantity > ORDER_LIMITS.MAX_ITEM_QUANTITY) {
    throw new ValidationError(`Quantity must be at most ${ORDER_LIMITS.MAX_ITEM_QUANTITY}`, { quantity });
  }
};

const assertTotal = (total: number): void => {
  if (total > ORDER_LIMITS.MAX_TOTAL) {
    throw new ValidationError(`Order total must be at most ${ORDER_LIMITS.MAX_TOTAL}`, { total });
  }
};

/**
 * Same product twice in one request becomes a single line
 */
const mergeLines = (lines: OrderLineRequest[]): OrderLineRequest[] => {
  const merged = new Map<number, number>();
  for (const { product_id, quantity } of lines) {
    assertQuantity(quantity);
    const combined = (merged.get(product_id) ?? 0) + quantity;
    assertQuantity(combined);
    merged.set(product_id, combined);
  }
  return [...merged].map(([product_id, quantity]) => ({ product_id, quantity }));
};

const isOwner = (actor: Actor, order: { user_id: string }): boolean => order.user_id === actor.id;

/**
 * Order Workflow: creation, line items, status transitions and the pickup board
 */
export class OrdersService {
  constructor(
    private readonly db: Database,
    private readonly nextLocator: () => string = generateLocator
  ) {}

  private async lockOrder(orders: Repositories['orders'], id: number): Promise<OrderWithItems> {
    const order = await orders.findByIdForUpdate(id);
    if (!order) {
      throw new NotFoundError('Order not found');
    }
    return order;
  }

  private assertVisible(actor: Actor, order: OrderWithItems): void {
    if (!isOwner(actor, order)) {
      authorize(actor.role, 'order', 'read_any');
    }
  }

  /**
   * Line items change only while the order is still `created`
   */
  private assertEditable(actor: Actor, order: OrderWithItems): void {
    authorize(actor.role, 'order', isOwner(actor, order) ? 'update_own_items' : 'update_any_items');

    if (order.status !== ORDER_STATUS.CREATED) {
      throw new InvalidStateError(`Items can only be changed while the order is '${ORDER_STATUS.CREATED}'`, {
        status: order.status,
      });
    }
  }

  private async orderableProduct(products: Repositories['products'], productId: number): Promise<Product> {
    const product = await products.findByIdForShare(productId);
    if (!product) {
      throw new NotFoundError(`Product ${productId} not found`);
    }
    if (!product.is_available) {
      throw new ValidationError(`Product '${product.name}' is not available`, { product_id: productId });
    }
    return product;
  }

  private async refreshTotal(orders: Repositories['orders'], id: number): Promise<OrderWithItems> {
    const order = await orders.findById(id);
    if (!order) {
      throw new NotFoundError('Order not found');
    }
    const total = sumLineTotals(order.items);
    assertTotal(total);
    await orders.updateTotal(id, total);
    return { ...order, total };
  }

  async createOrder(actor: Actor, data: CreateOrderData): Promise<OrderWithItems> {
    const ownerId = data.user_id ?? actor.id;
    authorize(actor.role, 'order', ownerId === actor.id ? 'create' : 'create_for_other');

    if (data.items.length === 0) {
      throw new ValidationError('An order needs at least one item');
    }
    const lines = mergeLines(data.items);

    const order = await this.db.transaction(async ({ users, products, orders }) => {
      if (ownerId !== actor.id) {
        const owner = await users.findById(ownerId);
        if (!owner || !owner.is_active) {
          throw new NotFoundError('Order owner not found');
        }
      }

      const snapshots: Omit<CreateOrderItemInput, 'order_id'>[] = [];
      for (const line of lines) {
        const product = await this.orderableProduct(products, line.product_id);
        snapshots.push({
          product_id: product.id,
          product_name: product.name,
          unit_price: product.price,
          quantity: line.quantity,
        });
      }

      const total = sumLineTotals(snapshots);
      assertTotal(total);

      const created = await orders.create({
        user_id: ownerId,
        locator: this.nextLocator(),
        total,
        notes: data.notes ?? null,
      });

      for (const snapshot of snapshots) {
        await orders.addItem({ order_id: created.id, ...snapshot });
      }

      await orders.addHistory({
        order_id: created.id,
        status: INITIAL_ORDER_STATUS,
        notes: 'Order created',
        updated_by: actor.id,
      });

      const withItems = await orders.findById(created.id);
      if (!withItems) {
        throw new NotFoundError('Order not found');
      }
      return withItems;
    });

    auditLog('ORDER_CREATED', {
      actorId: actor.id,
      orderId: order.id,
      ownerId,
      total: order.total,
    });
    return order;
  }

  async listOrders(actor: Actor, options: ListOrdersOptions): Promise<{ orders: OrderWithItems[]; total: number }> {
    // Customers only ever see their own orders
    const user_id = can(actor.role, 'order', 'read_any') ? undefined : actor.id;
    return this.db.read(({ orders }) => orders.list({ ...options, user_id }));
  }

  async getOrder(actor: Actor, id: number): Promise<OrderWithItems> {
    const order = await this.db.read(({ orders }) => orders.findById(id));
    if (!order) {
      throw new NotFoundError('Order not found');
    }
    this.assertVisible(actor, order);
    return order;
  }

  async getOrderItems(actor: Actor, id: number): Promise<OrderItem[]> {
    const order = await this.getOrder(actor, id);
    return order.items;
  }

  async getStatusHistory(actor: Actor, id: number): Promise<OrderStatusHistory[]> {
    return this.db.read(async ({ orders }) => {
      const order = await orders.findById(id);
      if (!order) {
        throw new NotFoundError('Order not found');
      }
      this.assertVisible(actor, order);
      return orders.listHistory(id);
    });
  }

  /**
   * Move an order along the state machine. Checks run in a fixed order:
   * existence, then role, then the transition table.
   */
  async transition(actor: Actor, id: number, data: TransitionData): Promise<OrderWithItems> {
    const { order, from } = await this.db.transaction(async ({ orders }) => {
      const current = await this.lockOrder(orders, id);
      this.assertVisible(actor, current);

      const target = data.status;
      let action: Action<'order'> | undefined;
      if (target === ORDER_STATUS.CANCELLED) {
        action = isOwner(actor, current) ? 'cancel_own' : 'cancel_any';
      } else if (target !== ORDER_STATUS.CREATED) {
        action = TRANSITION_ACTIONS[target];
      }
      if (action) {
        authorize(actor.role, 'order', action);
      }

      assertTransition(current.status, target);

      const cancelled = target === ORDER_STATUS.CANCELLED;
      await orders.updateStatus(id, {
        status: target,
        changed_at: new Date(),
        ...(cancelled && { cancelled_by: actor.id, cancellation_reason: data.reason ?? null }),
      });

      await orders.addHistory({
        order_id: id,
        status: target,
        notes: data.notes ?? data.reason ?? null,
        updated_by: actor.id,
      });

      const updated = await orders.findById(id);
      if (!updated) {
        throw new NotFoundError('Order not found');
      }
      return { order: updated, from: current.status };
    });

    auditLog('ORDER_STATUS_CHANGED', { actorId: actor.id, orderId: id, from, to: order.status });
    return order;
  }

  /**
   * Add a product line. A product already on the order keeps its original
   * snapshot and only gains quantity.
   */
  async addItem(actor: Actor, id: number, line: OrderLineRequest): Promise<OrderWithItems> {
    assertQuantity(line.quantity);

    return this.db.transaction(async ({ products, orders }) => {
      const order = await this.lockOrder(orders, id);
      this.assertEditable(actor, order);

      const product = await this.orderableProduct(products, line.product_id);
      const existing = order.items.find(item => item.product_id === product.id);

      if (existing) {
        const quantity = existing.quantity + line.quantity;
        assertQuantity(quantity);
        await orders.updateItemQuantity(existing.id, quantity);
      } else {
        await orders.addItem({
          order_id: id,
          product_id: product.id,
          product_name: product.name,
          unit_price: product.price,
          quantity: line.quantity,
        });
      }

      return this.refreshTotal(orders, id);
    });
  }

  async updateItemQuantity(actor: Actor, id: number, itemId: number, quantity: number): Promise<OrderWithItems> {
    assertQuantity(quantity);

    return this.db.transaction(async ({ orders }) => {
      const order = await this.lockOrder(orders, id);
      this.assertEditable(actor, order);

      if (!order.items.some(item => item.id === itemId)) {
        throw new NotFoundError('Order item not found');
      }

      await orders.updateItemQuantity(itemId, quantity);
      return this.refreshTotal(orders, id);
    });
  }

  async removeItem(actor: Actor, id: number, itemId: number): Promise<OrderWithItems> {
    return this.db.transaction(async ({ orders }) => {
      const order = await this.lockOrder(orders, id);
      this.assertEditable(actor, order);

      if (!order.items.some(item => item.id === itemId)) {
        throw new NotFoundError('Order item not found');
      }
      if (order.items.length === 1) {
        throw new ValidationError('An order needs at least one item; cancel the order instead');
      }

      await orders.removeItem(itemId);
      return this.refreshTotal(orders, id);
    });
  }

  async deleteOrder(actor: Actor, id: number): Promise<void> {
    authorize(actor.role, 'order', 'delete');

    const status = await this.db.transaction(async ({ orders }) => {
      const order = await this.lockOrder(orders, id);
      if (!isTerminal(order.status)) {
        throw new InvalidStateError('Only delivered or cancelled orders can be deleted', {
          status: order.status,
        });
      }
      await orders.delete(id);
      return order.status;
    });

    auditLog('ORDER_DELETED', { actorId: actor.id, orderId: id, status });
  }

  async rateOrder(actor: Actor, id: number, rating: number): Promise<OrderWithItems> {
    authorize(actor.role, 'order', 'rate_own');

    if (!Number.isInteger(rating) || rating < ORDER_RATING.MIN || rating > ORDER_RATING.MAX) {
      throw new ValidationError(`Rating must be an integer between ${ORDER_RATING.MIN} and ${ORDER_RATING.MAX}`);
    }

    return this.db.transaction(async ({ orders }) => {
      const order = await this.lockOrder(orders, id);
      if (!isOwner(actor, order)) {
        throw new AuthorizationError('Only the customer who placed the order can rate it');
      }
      if (order.status !== ORDER_STATUS.DELIVERED) {
        throw new InvalidStateError('Only delivered orders can be rated', { status: order.status });
      }
      if (order.rating !== null) {
        throw new InvalidStateError('Order has already been rated', { rating: order.rating });
      }

      const rated = await orders.setRating(id, rating);
      return { ...rated, items: order.items };
    });
  }

  /**
   * Public board of orders waiting for pickup, no personal data
   */
  async pickupBoard(): Promise<PickupBoardEntry[]> {
    return this.db.read(({ orders }) => orders.listByStatuses(PICKUP_BOARD_STATUSES));
  }
}
