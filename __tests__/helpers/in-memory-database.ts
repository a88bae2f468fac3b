/**
 * In-process stand-in for PgDatabase. Transactions snapshot the whole state
 * and restore it when the work throws, like a ROLLBACK would.
 */

import { randomUUID } from 'crypto';
import type { Database, Repositories } from '../../src/connections/db/database';
import type {
  CreateOrderInput,
  CreateOrderItemInput,
  CreateOrderStatusHistoryInput,
  CreateProductInput,
  CreateUserInput,
  Order,
  OrderItem,
  OrderListFilter,
  OrderStatusChange,
  OrderStatusHistory,
  OrderWithItems,
  PickupBoardEntry,
  Product,
  ProductListFilter,
  UpdateProductInput,
  UpdateUserInput,
  User,
} from '../../src/connections/db/models';
import { ORDER_STATUS, TERMINAL_ORDER_STATUSES, type OrderStatus } from '../../src/constants';
import type { OrderRepository } from '../../src/modules/orders/orders.repository';
import { STATUS_TIMESTAMP_FIELD } from '../../src/modules/orders/order-state-machine';
import type { ProductRepository } from '../../src/modules/products/products.repository';
import type { UserListFilter, UserRepository } from '../../src/modules/users/users.repository';

export interface MemoryState {
  users: User[];
  products: Product[];
  orders: Order[];
  items: OrderItem[];
  history: OrderStatusHistory[];
  sequence: number;
}

const emptyState = (): MemoryState => ({
  users: [],
  products: [],
  orders: [],
  items: [],
  history: [],
  sequence: 0,
});

const withoutUndefined = <T extends object>(input: T): Partial<T> =>
  Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));

class MemoryUserRepository implements UserRepository {
  constructor(private readonly db: InMemoryDatabase) {}

  async findById(id: string): Promise<User | null> {
    const user = this.db.state.users.find(u => u.id === id);
    return user ? structuredClone(user) : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const user = this.db.state.users.find(u => u.username === username);
    return user ? structuredClone(user) : null;
  }

  async findConflicting(username: string | undefined, email: string | undefined, excludeId?: string): Promise<User[]> {
    return this.db.state.users
      .filter(u => (u.username === username || u.email === email) && u.id !== excludeId)
      .map(u => structuredClone(u));
  }

  async count(): Promise<number> {
    return this.db.state.users.length;
  }

  async list({ role, offset, limit }: UserListFilter): Promise<{ users: User[]; total: number }> {
    const matching = this.db.state.users.filter(u => !role || u.role === role);
    return { users: structuredClone(matching.slice(offset, offset + limit)), total: matching.length };
  }

  async create(input: CreateUserInput): Promise<User> {
    const now = new Date();
    const user: User = {
      id: randomUUID(),
      username: input.username,
      email: input.email,
      password_hash: input.password_hash,
      full_name: input.full_name ?? null,
      role: input.role,
      is_active: input.is_active ?? true,
      created_at: now,
      updated_at: now,
    };
    this.db.state.users.push(user);
    return structuredClone(user);
  }

  async update(id: string, input: UpdateUserInput): Promise<User | null> {
    const index = this.db.state.users.findIndex(u => u.id === id);
    if (index === -1) {
      return null;
    }
    const updated: User = { ...this.db.state.users[index], ...withoutUndefined(input), updated_at: new Date() };
    this.db.state.users[index] = updated;
    return structuredClone(updated);
  }

  async lockForBootstrap(): Promise<void> {
    this.db.locks.push('users');
  }
}

class MemoryProductRepository implements ProductRepository {
  constructor(private readonly db: InMemoryDatabase) {}

  async findById(id: number): Promise<Product | null> {
    const product = this.db.state.products.find(p => p.id === id);
    return product ? structuredClone(product) : null;
  }

  async findByIdForShare(id: number): Promise<Product | null> {
    this.db.locks.push(`product:${id}`);
    return this.findById(id);
  }

  async findByName(name: string): Promise<Product | null> {
    const product = this.db.state.products.find(p => p.name.toLowerCase() === name.toLowerCase());
    return product ? structuredClone(product) : null;
  }

  async list({ category, is_available, offset, limit }: ProductListFilter): Promise<{ products: Product[]; total: number }> {
    const matching = this.db.state.products.filter(
      p => (!category || p.category === category) && (is_available === undefined || p.is_available === is_available)
    );
    return { products: structuredClone(matching.slice(offset, offset + limit)), total: matching.length };
  }

  async create(input: CreateProductInput): Promise<Product> {
    const now = new Date();
    const product: Product = {
      id: this.db.nextId(),
      name: input.name,
      description: input.description ?? null,
      price: input.price,
      category: input.category,
      is_available: input.is_available ?? true,
      created_at: now,
      updated_at: now,
    };
    this.db.state.products.push(product);
    return structuredClone(product);
  }

  async update(id: number, input: UpdateProductInput): Promise<Product | null> {
    const index = this.db.state.products.findIndex(p => p.id === id);
    if (index === -1) {
      return null;
    }
    const updated: Product = { ...this.db.state.products[index], ...withoutUndefined(input), updated_at: new Date() };
    this.db.state.products[index] = updated;
    return structuredClone(updated);
  }

  async delete(id: number): Promise<boolean> {
    const before = this.db.state.products.length;
    this.db.state.products = this.db.state.products.filter(p => p.id !== id);
    // ON DELETE SET NULL
    for (const item of this.db.state.items) {
      if (item.product_id === id) {
        item.product_id = null;
      }
    }
    return this.db.state.products.length < before;
  }

  async isReferencedByOpenOrder(id: number): Promise<boolean> {
    return this.db.state.items.some(item => {
      const order = this.db.state.orders.find(o => o.id === item.order_id);
      return item.product_id === id && order !== undefined && !TERMINAL_ORDER_STATUSES.includes(order.status);
    });
  }
}

class MemoryOrderRepository implements OrderRepository {
  constructor(private readonly db: InMemoryDatabase) {}

  private withItems(order: Order): OrderWithItems {
    const items = this.db.state.items.filter(item => item.order_id === order.id).sort((a, b) => a.id - b.id);
    return structuredClone({ ...order, items });
  }

  private mustFind(id: number): Order {
    const order = this.db.state.orders.find(o => o.id === id);
    if (!order) {
      throw new Error(`order ${id} missing`);
    }
    return order;
  }

  async findById(id: number): Promise<OrderWithItems | null> {
    const order = this.db.state.orders.find(o => o.id === id);
    return order ? this.withItems(order) : null;
  }

  async findByIdForUpdate(id: number): Promise<OrderWithItems | null> {
    this.db.locks.push(`order:${id}`);
    return this.findById(id);
  }

  async list({ user_id, status, offset, limit }: OrderListFilter): Promise<{ orders: OrderWithItems[]; total: number }> {
    const matching = this.db.state.orders
      .filter(o => (!user_id || o.user_id === user_id) && (!status || o.status === status))
      .sort((a, b) => b.id - a.id);
    return {
      orders: matching.slice(offset, offset + limit).map(o => this.withItems(o)),
      total: matching.length,
    };
  }

  async create(input: CreateOrderInput): Promise<Order> {
    const now = new Date();
    const order: Order = {
      id: this.db.nextId(),
      user_id: input.user_id,
      locator: input.locator,
      status: ORDER_STATUS.CREATED,
      total: input.total,
      notes: input.notes ?? null,
      rating: null,
      confirmed_at: null,
      preparing_at: null,
      ready_at: null,
      delivered_at: null,
      cancelled_at: null,
      cancelled_by: null,
      cancellation_reason: null,
      created_at: now,
      updated_at: now,
    };
    this.db.state.orders.push(order);
    return structuredClone(order);
  }

  async addItem(input: CreateOrderItemInput): Promise<OrderItem> {
    const now = new Date();
    const item: OrderItem = { id: this.db.nextId(), ...input, created_at: now, updated_at: now };
    this.db.state.items.push(item);
    return structuredClone(item);
  }

  async updateItemQuantity(itemId: number, quantity: number): Promise<OrderItem | null> {
    const item = this.db.state.items.find(i => i.id === itemId);
    if (!item) {
      return null;
    }
    item.quantity = quantity;
    item.updated_at = new Date();
    return structuredClone(item);
  }

  async removeItem(itemId: number): Promise<boolean> {
    const before = this.db.state.items.length;
    this.db.state.items = this.db.state.items.filter(i => i.id !== itemId);
    return this.db.state.items.length < before;
  }

  async updateTotal(orderId: number, total: number): Promise<void> {
    const order = this.mustFind(orderId);
    order.total = total;
    order.updated_at = new Date();
  }

  async updateStatus(orderId: number, change: OrderStatusChange): Promise<Order> {
    const order = this.mustFind(orderId);
    order.status = change.status;
    order.updated_at = new Date();
    if (change.status !== ORDER_STATUS.CREATED) {
      order[STATUS_TIMESTAMP_FIELD[change.status]] = change.changed_at;
    }
    if (change.cancelled_by !== undefined) {
      order.cancelled_by = change.cancelled_by;
    }
    if (change.cancellation_reason !== undefined) {
      order.cancellation_reason = change.cancellation_reason;
    }
    return structuredClone(order);
  }

  async setRating(orderId: number, rating: number): Promise<Order> {
    const order = this.mustFind(orderId);
    order.rating = rating;
    return structuredClone(order);
  }

  async delete(orderId: number): Promise<boolean> {
    const before = this.db.state.orders.length;
    this.db.state.orders = this.db.state.orders.filter(o => o.id !== orderId);
    this.db.state.items = this.db.state.items.filter(i => i.order_id !== orderId);
    this.db.state.history = this.db.state.history.filter(h => h.order_id !== orderId);
    return this.db.state.orders.length < before;
  }

  async addHistory(input: CreateOrderStatusHistoryInput): Promise<OrderStatusHistory> {
    const entry: OrderStatusHistory = {
      id: this.db.nextId(),
      order_id: input.order_id,
      status: input.status,
      notes: input.notes ?? null,
      updated_by: input.updated_by ?? null,
      created_at: new Date(),
    };
    this.db.state.history.push(entry);
    return structuredClone(entry);
  }

  async listHistory(orderId: number): Promise<OrderStatusHistory[]> {
    return structuredClone(this.db.state.history.filter(h => h.order_id === orderId));
  }

  async listByStatuses(statuses: readonly OrderStatus[]): Promise<PickupBoardEntry[]> {
    return this.db.state.orders
      .filter(o => statuses.includes(o.status))
      .map(({ locator, status, updated_at }) => ({ locator, status, updated_at }));
  }
}

export class InMemoryDatabase implements Database {
  state: MemoryState = emptyState();
  /** Row and table locks taken, in order */
  locks: string[] = [];
  transactions = 0;
  rollbacks = 0;
  /** Runs once after the next read, standing in for a write racing that read */
  afterNextRead?: () => Promise<void>;

  private readonly repos: Repositories = {
    users: new MemoryUserRepository(this),
    products: new MemoryProductRepository(this),
    orders: new MemoryOrderRepository(this),
  };

  nextId(): number {
    this.state.sequence += 1;
    return this.state.sequence;
  }

  async read<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const result = await work(this.repos);
    const hook = this.afterNextRead;
    if (hook) {
      this.afterNextRead = undefined;
      await hook();
    }
    return result;
  }

  async transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    this.transactions += 1;
    const snapshot = structuredClone(this.state);
    try {
      return await work(this.repos);
    } catch (error) {
      this.rollbacks += 1;
      this.state = snapshot;
      throw error;
    }
  }
}
