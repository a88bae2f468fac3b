import { describe, it, expect, beforeEach } from 'vitest';
import { OrdersService } from '../src/modules/orders/orders.service';
import type { OrderWithItems, Product } from '../src/connections/db/models';
import type { OrderStatus } from '../src/constants';
import type { Actor } from '../src/types/request.types';
import {
  AuthorizationError,
  InvalidStateError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
} from '../src/utils/errors';
import { InMemoryDatabase } from './helpers/in-memory-database';
import { seedCrew, seedProduct, type Crew } from './helpers/fixtures';

describe('OrdersService', () => {
  let db: InMemoryDatabase;
  let service: OrdersService;
  let crew: Crew;
  let burger: Product;
  let lemonade: Product;
  let locators: string[];

  beforeEach(async () => {
    db = new InMemoryDatabase();
    crew = await seedCrew(db);
    burger = await seedProduct(db, 'Burger', 5);
    lemonade = await seedProduct(db, 'Lemonade', 3.5, 'DRINK');
    locators = ['A001', 'B002', 'C003', 'D004'];
    service = new OrdersService(db, () => locators.shift() ?? 'Z999');
  });

  const orderFor = (actor: Actor, lines = [{ product_id: burger.id, quantity: 2 }, { product_id: lemonade.id, quantity: 1 }]) =>
    service.createOrder(actor, { items: lines });

  const advance = async (order: OrderWithItems, ...statuses: OrderStatus[]): Promise<OrderWithItems> => {
    let current = order;
    for (const status of statuses) {
      current = await service.transition(crew.staff, current.id, { status });
    }
    return current;
  };

  describe('createOrder', () => {
    it('snapshots prices and totals the lines', async () => {
      const order = await orderFor(crew.alice);

      expect(order.status).toBe('created');
      expect(order.total).toBe(13.5);
      expect(order.user_id).toBe(crew.alice.id);
      expect(order.locator).toBe('A001');
      expect(order.items.map(item => [item.product_name, item.unit_price, item.quantity])).toEqual([
        ['Burger', 5, 2],
        ['Lemonade', 3.5, 1],
      ]);
    });

    it('records the initial status in the history', async () => {
      const order = await orderFor(crew.alice);
      const history = await service.getStatusHistory(crew.alice, order.id);

      expect(history.map(entry => entry.status)).toEqual(['created']);
      expect(history[0].updated_by).toBe(crew.alice.id);
    });

    it('merges repeated products into one line', async () => {
      const order = await orderFor(crew.alice, [
        { product_id: burger.id, quantity: 1 },
        { product_id: burger.id, quantity: 2 },
      ]);

      expect(order.items).toHaveLength(1);
      expect(order.items[0].quantity).toBe(3);
      expect(order.total).toBe(15);
    });

    it('locks every product it snapshots', async () => {
      await orderFor(crew.alice);
      expect(db.locks).toEqual([`product:${burger.id}`, `product:${lemonade.id}`]);
    });

    it('rejects an empty order', async () => {
      await expect(orderFor(crew.alice, [])).rejects.toThrow(ValidationError);
    });

    it('rejects a quantity below one', async () => {
      await expect(orderFor(crew.alice, [{ product_id: burger.id, quantity: 0 }])).rejects.toThrow(ValidationError);
    });

    it('caps the quantity of a line', async () => {
      const order = await orderFor(crew.alice, [{ product_id: lemonade.id, quantity: 999 }]);
      expect(order.total).toBe(3496.5);

      await expect(orderFor(crew.alice, [{ product_id: lemonade.id, quantity: 1000 }])).rejects.toThrow(
        'Quantity must be at most 999'
      );
    });

    it('applies the quantity cap after merging repeated products', async () => {
      await expect(orderFor(crew.alice, [
        { product_id: burger.id, quantity: 600 },
        { product_id: burger.id, quantity: 600 },
      ])).rejects.toThrow(ValidationError);
    });

    it('rejects a total the order cannot hold', async () => {
      const truck = await seedProduct(db, 'Whole Truck', 99999999.99);

      await expect(orderFor(crew.alice, [{ product_id: truck.id, quantity: 2 }])).rejects.toThrow(
        'Order total must be at most 99999999.99'
      );
      expect(db.state.orders).toHaveLength(0);
    });

    it('fails for unknown products without leaving an order behind', async () => {
      await expect(orderFor(crew.alice, [
        { product_id: burger.id, quantity: 1 },
        { product_id: 999, quantity: 1 },
      ])).rejects.toThrow(NotFoundError);

      expect(db.state.orders).toHaveLength(0);
    });

    it('refuses unavailable products', async () => {
      const retired = await seedProduct(db, 'Retired Taco', 4, 'FOOD', false);

      await expect(orderFor(crew.alice, [{ product_id: retired.id, quantity: 1 }])).rejects.toThrow(ValidationError);
    });

    it('lets crew order on behalf of a customer', async () => {
      const order = await service.createOrder(crew.staff, {
        items: [{ product_id: burger.id, quantity: 1 }],
        user_id: crew.alice.id,
      });

      expect(order.user_id).toBe(crew.alice.id);
    });

    it('forbids customers from ordering for someone else', async () => {
      await expect(service.createOrder(crew.alice, {
        items: [{ product_id: burger.id, quantity: 1 }],
        user_id: crew.bob.id,
      })).rejects.toThrow(AuthorizationError);
    });
  });

  describe('transition', () => {
    it('moves forward one step and stamps the status time', async () => {
      const order = await orderFor(crew.alice);
      const confirmed = await service.transition(crew.staff, order.id, { status: 'confirmed' });

      expect(confirmed.status).toBe('confirmed');
      expect(confirmed.confirmed_at).toBeInstanceOf(Date);
      expect(db.locks).toContain(`order:${order.id}`);
    });

    it('rejects skipping straight to delivered', async () => {
      const order = await orderFor(crew.alice);

      await expect(service.transition(crew.staff, order.id, { status: 'delivered' }))
        .rejects.toThrow(InvalidTransitionError);

      const unchanged = await service.getOrder(crew.staff, order.id);
      expect(unchanged.status).toBe('created');
    });

    it('keeps customers from progressing their own order', async () => {
      const order = await orderFor(crew.alice);

      await expect(service.transition(crew.alice, order.id, { status: 'confirmed' }))
        .rejects.toThrow(AuthorizationError);
    });

    it('checks the role before the transition table', async () => {
      const order = await orderFor(crew.alice);

      await expect(service.transition(crew.alice, order.id, { status: 'delivered' }))
        .rejects.toThrow(AuthorizationError);
    });

    it('lets staff cancel a preparing order of another user', async () => {
      const order = await advance(await orderFor(crew.alice), 'confirmed', 'preparing');

      const cancelled = await service.transition(crew.staff, order.id, {
        status: 'cancelled',
        reason: 'Out of buns',
      });

      expect(cancelled.status).toBe('cancelled');
      expect(cancelled.cancelled_by).toBe(crew.staff.id);
      expect(cancelled.cancellation_reason).toBe('Out of buns');
      expect(cancelled.cancelled_at).toBeInstanceOf(Date);
    });

    it('forbids a customer from cancelling another user\'s preparing order', async () => {
      const order = await advance(await orderFor(crew.alice), 'confirmed', 'preparing');

      await expect(service.transition(crew.bob, order.id, { status: 'cancelled' }))
        .rejects.toThrow(AuthorizationError);
    });

    it('lets the owner cancel their own order', async () => {
      const order = await orderFor(crew.alice);
      const cancelled = await service.transition(crew.alice, order.id, { status: 'cancelled' });

      expect(cancelled.status).toBe('cancelled');
      expect(cancelled.cancelled_by).toBe(crew.alice.id);
    });

    it('never leaves a terminal status', async () => {
      const order = await advance(await orderFor(crew.alice), 'cancelled');

      await expect(service.transition(crew.staff, order.id, { status: 'confirmed' }))
        .rejects.toThrow(InvalidTransitionError);
    });

    it('reports missing orders', async () => {
      await expect(service.transition(crew.staff, 4242, { status: 'confirmed' }))
        .rejects.toThrow(NotFoundError);
    });

    it('appends every step to the history', async () => {
      const order = await advance(await orderFor(crew.alice), 'confirmed', 'preparing', 'ready', 'delivered');
      const history = await service.getStatusHistory(crew.alice, order.id);

      expect(history.map(entry => entry.status)).toEqual(['created', 'confirmed', 'preparing', 'ready', 'delivered']);
      expect(order.delivered_at).toBeInstanceOf(Date);
    });
  });

  describe('line items', () => {
    it('adds a new product with a fresh snapshot', async () => {
      const order = await orderFor(crew.alice, [{ product_id: burger.id, quantity: 1 }]);
      const updated = await service.addItem(crew.alice, order.id, { product_id: lemonade.id, quantity: 2 });

      expect(updated.items).toHaveLength(2);
      expect(updated.total).toBe(12);
    });

    it('merges a repeated product into its line', async () => {
      const order = await orderFor(crew.alice, [{ product_id: burger.id, quantity: 1 }]);
      const updated = await service.addItem(crew.alice, order.id, { product_id: burger.id, quantity: 2 });

      expect(updated.items).toHaveLength(1);
      expect(updated.items[0].quantity).toBe(3);
      expect(updated.total).toBe(15);
    });

    it('changes a quantity and recomputes the total', async () => {
      const order = await orderFor(crew.alice);
      const burgerLine = order.items[0];

      const updated = await service.updateItemQuantity(crew.alice, order.id, burgerLine.id, 4);

      expect(updated.total).toBe(23.5);
      expect(db.state.orders[0].total).toBe(23.5);
    });

    it('keeps a merged line within the quantity cap', async () => {
      const order = await orderFor(crew.alice, [{ product_id: burger.id, quantity: 998 }]);

      await expect(service.addItem(crew.alice, order.id, { product_id: burger.id, quantity: 2 })).rejects.toThrow(
        ValidationError
      );
      expect(db.state.items[0].quantity).toBe(998);
    });

    it('rolls back a quantity change that overflows the total', async () => {
      const truck = await seedProduct(db, 'Whole Truck', 99999999.99);
      const order = await orderFor(crew.alice, [{ product_id: truck.id, quantity: 1 }]);

      await expect(service.updateItemQuantity(crew.alice, order.id, order.items[0].id, 2)).rejects.toThrow(
        ValidationError
      );
      expect(db.state.orders[0].total).toBe(99999999.99);
      expect(db.state.items[0].quantity).toBe(1);
    });

    it('removes a line', async () => {
      const order = await orderFor(crew.alice);
      const updated = await service.removeItem(crew.alice, order.id, order.items[1].id);

      expect(updated.items.map(item => item.product_name)).toEqual(['Burger']);
      expect(updated.total).toBe(10);
    });

    it('refuses to remove the last line', async () => {
      const order = await orderFor(crew.alice, [{ product_id: burger.id, quantity: 1 }]);

      await expect(service.removeItem(crew.alice, order.id, order.items[0].id)).rejects.toThrow(ValidationError);
    });

    it('reports items that belong to another order', async () => {
      const mine = await orderFor(crew.alice);
      const theirs = await orderFor(crew.bob);

      await expect(service.updateItemQuantity(crew.alice, mine.id, theirs.items[0].id, 2))
        .rejects.toThrow(NotFoundError);
    });

    it('refuses changes once the order left created', async () => {
      const order = await advance(await orderFor(crew.alice), 'confirmed');

      await expect(service.addItem(crew.alice, order.id, { product_id: burger.id, quantity: 1 }))
        .rejects.toThrow(InvalidStateError);
      await expect(service.updateItemQuantity(crew.staff, order.id, order.items[0].id, 5))
        .rejects.toThrow(InvalidStateError);
      await expect(service.removeItem(crew.admin, order.id, order.items[0].id))
        .rejects.toThrow(InvalidStateError);
    });

    it('keeps other customers away from an order\'s items', async () => {
      const order = await orderFor(crew.alice);

      await expect(service.addItem(crew.bob, order.id, { product_id: burger.id, quantity: 1 }))
        .rejects.toThrow(AuthorizationError);
    });

    it('lets staff adjust a customer order', async () => {
      const order = await orderFor(crew.alice);
      const updated = await service.updateItemQuantity(crew.staff, order.id, order.items[1].id, 2);

      expect(updated.total).toBe(17);
    });
  });

  describe('price snapshots', () => {
    it('are untouched by later catalog price changes', async () => {
      const order = await orderFor(crew.alice);
      await db.transaction(({ products }) => products.update(burger.id, { price: 9 }));

      const reread = await service.getOrder(crew.alice, order.id);
      expect(reread.items[0].unit_price).toBe(5);
      expect(reread.total).toBe(13.5);

      // Merging into the existing line keeps the original snapshot too
      const merged = await service.addItem(crew.alice, order.id, { product_id: burger.id, quantity: 1 });
      expect(merged.items[0].unit_price).toBe(5);
      expect(merged.total).toBe(18.5);
    });
  });

  describe('read and list', () => {
    it('shows customers only their own orders', async () => {
      const mine = await orderFor(crew.alice);
      await orderFor(crew.bob);

      const { orders, total } = await service.listOrders(crew.alice, { offset: 0, limit: 20 });

      expect(total).toBe(1);
      expect(orders.map(order => order.id)).toEqual([mine.id]);
    });

    it('shows crew every order', async () => {
      await orderFor(crew.alice);
      await orderFor(crew.bob);

      const { total } = await service.listOrders(crew.staff, { offset: 0, limit: 20 });
      expect(total).toBe(2);
    });

    it('filters by status', async () => {
      await advance(await orderFor(crew.alice), 'confirmed');
      await orderFor(crew.bob);

      const { orders } = await service.listOrders(crew.admin, { status: 'confirmed', offset: 0, limit: 20 });
      expect(orders.map(order => order.status)).toEqual(['confirmed']);
    });

    it('returns the lines of an order on their own', async () => {
      const order = await orderFor(crew.alice);

      const items = await service.getOrderItems(crew.alice, order.id);

      expect(items.map(item => [item.product_name, item.quantity])).toEqual([
        ['Burger', 2],
        ['Lemonade', 1],
      ]);
      await expect(service.getOrderItems(crew.bob, order.id)).rejects.toThrow(AuthorizationError);
      await expect(service.getOrderItems(crew.alice, 999)).rejects.toThrow(NotFoundError);
    });

    it('forbids reading another customer\'s order or history', async () => {
      const order = await orderFor(crew.alice);

      await expect(service.getOrder(crew.bob, order.id)).rejects.toThrow(AuthorizationError);
      await expect(service.getStatusHistory(crew.bob, order.id)).rejects.toThrow(AuthorizationError);
    });

    it('lets staff read any order', async () => {
      const order = await orderFor(crew.alice);
      const read = await service.getOrder(crew.staff, order.id);

      expect(read.id).toBe(order.id);
    });
  });

  describe('deleteOrder', () => {
    it('lets admins delete delivered orders', async () => {
      const order = await advance(await orderFor(crew.alice), 'confirmed', 'preparing', 'ready', 'delivered');

      await service.deleteOrder(crew.admin, order.id);

      await expect(service.getOrder(crew.admin, order.id)).rejects.toThrow(NotFoundError);
    });

    it('refuses to delete an order still in progress', async () => {
      const order = await advance(await orderFor(crew.alice), 'confirmed', 'preparing');

      await expect(service.deleteOrder(crew.admin, order.id)).rejects.toThrow(InvalidStateError);
    });

    it('is admin only', async () => {
      const order = await advance(await orderFor(crew.alice), 'cancelled');

      await expect(service.deleteOrder(crew.staff, order.id)).rejects.toThrow(AuthorizationError);
    });
  });

  describe('rateOrder', () => {
    it('stores the owner\'s rating of a delivered order', async () => {
      const order = await advance(await orderFor(crew.alice), 'confirmed', 'preparing', 'ready', 'delivered');
      const rated = await service.rateOrder(crew.alice, order.id, 5);

      expect(rated.rating).toBe(5);
      expect(rated.items).toHaveLength(2);
    });

    it('accepts only one rating', async () => {
      const order = await advance(await orderFor(crew.alice), 'confirmed', 'preparing', 'ready', 'delivered');
      await service.rateOrder(crew.alice, order.id, 4);

      await expect(service.rateOrder(crew.alice, order.id, 2)).rejects.toThrow(InvalidStateError);
    });

    it('waits for delivery', async () => {
      const order = await orderFor(crew.alice);

      await expect(service.rateOrder(crew.alice, order.id, 3)).rejects.toThrow(InvalidStateError);
    });

    it('is reserved for the owner', async () => {
      const order = await advance(await orderFor(crew.alice), 'confirmed', 'preparing', 'ready', 'delivered');

      await expect(service.rateOrder(crew.staff, order.id, 5)).rejects.toThrow(AuthorizationError);
    });

    it('rejects ratings outside one to five', async () => {
      const order = await advance(await orderFor(crew.alice), 'confirmed', 'preparing', 'ready', 'delivered');

      await expect(service.rateOrder(crew.alice, order.id, 6)).rejects.toThrow(ValidationError);
    });
  });

  it('lists orders waiting for pickup on the public board', async () => {
    await advance(await orderFor(crew.alice), 'confirmed');
    await orderFor(crew.bob);
    await advance(await orderFor(crew.bob), 'confirmed', 'preparing', 'ready', 'delivered');

    const board = await service.pickupBoard();

    expect(board.map(({ locator, status }) => ({ locator, status }))).toEqual([
      { locator: 'A001', status: 'confirmed' },
    ]);
  });
});
