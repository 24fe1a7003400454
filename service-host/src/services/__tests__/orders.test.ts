/**
 * Order state machine: numbering, item capture with locked prices, totals,
 * kitchen readiness, ownership and the cancel path.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AccessDenied, ImmutabilityViolation, StateConflict, ValidationError } from '../../utils/errors.js';
import {
  addProduct,
  createReadyOrder,
  createTestEnv,
  TestEnv,
  thrownBy,
} from '../../testing/fixtures.js';

describe('OrderService', () => {
  let env: TestEnv;

  beforeEach(() => {
    env = createTestEnv();
  });

  afterEach(() => {
    env.db.close();
  });

  function openOrder(tableId: string | null = env.table.id) {
    return env.core.orders.createOrder(env.waiter, { tableId }).order;
  }

  function stockOf(productId: string): number | undefined {
    return env.core.catalog.getProduct(productId)?.stockQuantity;
  }

  describe('createOrder', () => {
    it('opens a pending order and occupies the table', () => {
      const { order, created } = env.core.orders.createOrder(env.waiter, { tableId: env.table.id });

      expect(created).toBe(true);
      expect(order).toMatchObject({
        orderNumber: 'ORD-20240315-0001',
        businessDate: '2024-03-15',
        status: 'pending',
        tableNumber: 'T1',
        waiterId: env.waiter.user.id,
        deviceId: 'tablet-1',
        subtotal: 0,
        totalAmount: 0,
        items: [],
      });
      expect(env.core.catalog.getTable(env.table.id)?.isOccupied).toBe(true);
    });

    it('returns the open order instead of creating a second one on the same table', () => {
      const first = openOrder();
      const again = env.core.orders.createOrder(env.otherWaiter, { tableId: env.table.id });

      expect(again.created).toBe(false);
      expect(again.order.id).toBe(first.id);
    });

    it('numbers orders sequentially per business day', () => {
      const numbers = Array.from({ length: 50 }, () => openOrder(null).orderNumber);

      expect(numbers[0]).toBe('ORD-20240315-0001');
      expect(numbers[49]).toBe('ORD-20240315-0050');
      expect(new Set(numbers).size).toBe(50);

      env.clock.set('2024-03-16T09:00:00.000Z');
      expect(openOrder(null).orderNumber).toBe('ORD-20240316-0001');
    });

    it('books orders before the rollover time on the previous business day', () => {
      const late = createTestEnv({ config: { businessDate: { rolloverTime: '04:00' } } });
      late.clock.set('2024-03-16T02:30:00.000Z');

      const { order } = late.core.orders.createOrder(late.waiter, {});

      expect(order).toMatchObject({ orderNumber: 'ORD-20240315-0001', businessDate: '2024-03-15', tableId: null });
      late.db.close();
    });

    it('is not open to kitchen staff', () => {
      expect(thrownBy(() => env.core.orders.createOrder(env.kitchen, {}))).toMatchObject({ code: 'ROLE_DENIED', status: 403 });
    });
  });

  describe('addItem', () => {
    it('locks the current price and deducts stock through the ledger', () => {
      const fish = addProduct(env, { name: 'Grilled Fish', price: 4500 });
      const order = openOrder();

      const item = env.core.orders.addItem(env.waiter, order.id, { productId: fish.id, quantity: 2, specialInstructions: '  no chili ' });
      env.core.catalog.changePrice(env.admin, fish.id, 5000);

      expect(item).toMatchObject({ productName: 'Grilled Fish', quantity: 2, unitPrice: 4500, subtotal: 9000, specialInstructions: 'no chili' });
      expect(env.core.orders.getOrder(order.id)?.totalAmount).toBe(9000);
      expect(stockOf(fish.id)).toBe(98);

      const [sale] = env.core.ledger.getMovements({ productId: fish.id, type: 'sale' });
      expect(sale).toMatchObject({ quantity: -2, reference: 'ORD-20240315-0001', notes: `Order item ${item.id}` });
    });

    it('moves a pending order to preparing and waits for the kitchen', () => {
      const fish = addProduct(env, { name: 'Grilled Fish', price: 4500 });
      const order = openOrder();

      const item = env.core.orders.addItem(env.waiter, order.id, { productId: fish.id, quantity: 1 });

      expect(item.isConfirmed).toBe(false);
      expect(env.core.orders.getOrder(order.id)?.status).toBe('preparing');
    });

    it('auto-confirms items that skip the kitchen without closing the order to food', () => {
      const soda = addProduct(env, { name: 'Soda', price: 600, requiresKitchen: false });
      const fish = addProduct(env, { name: 'Grilled Fish', price: 4500 });
      const order = openOrder();

      const drink = env.core.orders.addItem(env.waiter, order.id, { productId: soda.id, quantity: 1 });

      expect(drink).toMatchObject({ isConfirmed: true, confirmedAt: '2024-03-15T10:00:00.000Z', requiresKitchen: false });
      expect(env.core.orders.getOrder(order.id)?.status).toBe('preparing');

      const { order: same, created } = env.core.orders.createOrder(env.waiter, { tableId: env.table.id });
      expect(created).toBe(false);
      env.core.orders.addItem(env.waiter, same.id, { productId: fish.id, quantity: 1 });
      expect(env.core.orders.getOrder(order.id)).toMatchObject({ status: 'preparing', totalAmount: 5100 });
    });

    it('makes the order ready once a later item leaves nothing for the kitchen', () => {
      const soda = addProduct(env, { name: 'Soda', price: 600, requiresKitchen: false });
      const order = openOrder();

      env.core.orders.addItem(env.waiter, order.id, { productId: soda.id, quantity: 1 });
      env.core.orders.addItem(env.waiter, order.id, { productId: soda.id, quantity: 1 });

      expect(env.core.orders.getOrder(order.id)?.status).toBe('ready');
    });

    it('applies the tax rate to the rounded subtotal', () => {
      const taxed = createTestEnv({ config: { taxRate: 0.1925 } });
      const meal = addProduct(taxed, { name: 'Meal', price: 1000, requiresKitchen: false });
      const juice = addProduct(taxed, { name: 'Juice', price: 350, requiresKitchen: false });
      const { order } = taxed.core.orders.createOrder(taxed.waiter, { tableId: taxed.table.id });

      taxed.core.orders.addItem(taxed.waiter, order.id, { productId: meal.id, quantity: 2 });
      taxed.core.orders.addItem(taxed.waiter, order.id, { productId: juice.id, quantity: 3 });

      expect(taxed.core.orders.getOrder(order.id)).toMatchObject({ subtotal: 3050, taxAmount: 587, totalAmount: 3637 });
      taxed.db.close();
    });

    it('rounds fractional quantities to whole minor units', () => {
      const cheese = addProduct(env, { name: 'Cheese', price: 333, requiresKitchen: false, unitOfMeasure: 'kg' });
      const order = openOrder();

      const item = env.core.orders.addItem(env.waiter, order.id, { productId: cheese.id, quantity: 0.5 });

      expect(item.subtotal).toBe(167);
      expect(env.core.orders.getOrder(order.id)?.subtotal).toBe(167);
      expect(stockOf(cheese.id)).toBe(99.5);
    });

    it('keeps totals equal to the sum of line amounts', () => {
      const order = createReadyOrder(env, [
        { price: 1250, quantity: 3 },
        { price: 990, quantity: 1 },
        { price: 75, quantity: 12 },
      ]);

      const lines = order.items.reduce((sum, item) => sum + item.subtotal, 0);
      expect(order.subtotal).toBe(lines);
      expect(order.totalAmount).toBe(5640);
    });

    it('sums rounded line subtotals when several lines are fractional', () => {
      const cheese = addProduct(env, { name: 'Cheese', price: 333, requiresKitchen: false, unitOfMeasure: 'kg' });
      const order = openOrder();

      env.core.orders.addItem(env.waiter, order.id, { productId: cheese.id, quantity: 0.5 });
      env.core.orders.addItem(env.waiter, order.id, { productId: cheese.id, quantity: 0.5 });

      const updated = env.core.orders.getOrder(order.id);
      expect(updated?.items.map(item => item.subtotal)).toEqual([167, 167]);
      expect(updated).toMatchObject({ subtotal: 334, totalAmount: 334 });
    });

    it('settles on the same totals whatever the order of adds and removes', () => {
      const taxed = createTestEnv({ config: { taxRate: 0.1925 } });
      const cheese = addProduct(taxed, { name: 'Cheese', price: 333, unitOfMeasure: 'kg' });
      const wine = addProduct(taxed, { name: 'Wine', price: 1290 });
      const bread = addProduct(taxed, { name: 'Bread', price: 150 });
      const settle = (steps: ('cheese' | 'wine' | 'bread' | 'drop-bread')[]) => {
        const { order } = taxed.core.orders.createOrder(taxed.waiter, {});
        let breadItem: string | null = null;
        for (const step of steps) {
          if (step === 'drop-bread') {
            if (breadItem) taxed.core.orders.removeItem(taxed.waiter, order.id, breadItem);
            continue;
          }
          const productId = step === 'cheese' ? cheese.id : step === 'wine' ? wine.id : bread.id;
          const quantity = step === 'cheese' ? 0.75 : 1;
          const item = taxed.core.orders.addItem(taxed.waiter, order.id, { productId, quantity });
          if (step === 'bread') breadItem = item.id;
        }
        const settled = taxed.core.orders.getOrder(order.id);
        if (!settled) throw new Error('Order missing');
        return settled;
      };

      const first = settle(['cheese', 'bread', 'wine', 'drop-bread']);
      const second = settle(['wine', 'bread', 'drop-bread', 'cheese']);

      for (const order of [first, second]) {
        const lines = order.items.reduce((sum, item) => sum + item.subtotal, 0);
        expect(order.subtotal).toBe(lines);
        expect(order.totalAmount).toBe(lines + Math.round(lines * 0.1925));
      }
      expect(first).toMatchObject({ subtotal: 1540, taxAmount: 296, totalAmount: 1836 });
      expect(second).toMatchObject({ subtotal: 1540, taxAmount: 296, totalAmount: 1836 });
      taxed.db.close();
    });

    it('rejects non-positive quantities and unavailable products', () => {
      const soup = addProduct(env, { name: 'Soup', price: 1500 });
      const order = openOrder();

      expect(() => env.core.orders.addItem(env.waiter, order.id, { productId: soup.id, quantity: 0 })).toThrow(ValidationError);

      env.core.catalog.setAvailability(env.admin, soup.id, false);
      expect(thrownBy(() => env.core.orders.addItem(env.waiter, order.id, { productId: soup.id, quantity: 1 }))).toMatchObject({
        code: 'PRODUCT_UNAVAILABLE',
        status: 409,
      });
      expect(stockOf(soup.id)).toBe(100);
    });

    it('lets waiters work only on their own orders', () => {
      const soup = addProduct(env, { name: 'Soup', price: 1500 });
      const order = openOrder();

      expect(thrownBy(() => env.core.orders.addItem(env.otherWaiter, order.id, { productId: soup.id, quantity: 1 }))).toMatchObject({
        code: 'NOT_ORDER_OWNER',
      });
      expect(env.core.orders.addItem(env.admin, order.id, { productId: soup.id, quantity: 1 }).quantity).toBe(1);
    });

    it('refuses new items once the order is ready', () => {
      const order = createReadyOrder(env, [{ price: 800, quantity: 1 }]);
      const extra = addProduct(env, { name: 'Extra', price: 100 });

      expect(() => env.core.orders.addItem(env.waiter, order.id, { productId: extra.id, quantity: 1 })).toThrow(
        `Cannot add items to order ${order.orderNumber}: it is ready`
      );
    });
  });

  describe('removeItem', () => {
    it('returns unconfirmed quantity to stock and recomputes totals', () => {
      const fish = addProduct(env, { name: 'Grilled Fish', price: 4500 });
      const order = openOrder();
      const item = env.core.orders.addItem(env.waiter, order.id, { productId: fish.id, quantity: 2 });

      const updated = env.core.orders.removeItem(env.waiter, order.id, item.id);

      expect(updated).toMatchObject({ status: 'preparing', subtotal: 0, totalAmount: 0, items: [] });
      expect(stockOf(fish.id)).toBe(100);
      expect(env.core.ledger.getMovements({ productId: fish.id, type: 'return' })[0]).toMatchObject({ quantity: 2 });
    });

    it('completes readiness when the last waiting item is removed', () => {
      const fish = addProduct(env, { name: 'Grilled Fish', price: 4500 });
      const rice = addProduct(env, { name: 'Rice', price: 800 });
      const order = openOrder();
      const first = env.core.orders.addItem(env.waiter, order.id, { productId: fish.id, quantity: 1 });
      const second = env.core.orders.addItem(env.waiter, order.id, { productId: rice.id, quantity: 1 });
      env.core.orders.confirmItem(env.kitchen, first.id);

      expect(env.core.orders.removeItem(env.waiter, order.id, second.id).status).toBe('ready');
    });

    it('refuses once a payment has been taken, keeping the order payable', () => {
      const fish = addProduct(env, { name: 'Grilled Fish', price: 1000 });
      const soda = addProduct(env, { name: 'Soda', price: 500, requiresKitchen: false });
      const order = openOrder();
      const dish = env.core.orders.addItem(env.waiter, order.id, { productId: fish.id, quantity: 2 });
      env.core.orders.addItem(env.waiter, order.id, { productId: soda.id, quantity: 1 });
      env.core.shifts.startShift(env.cashier, 0);
      env.core.payments.processPayment(env.cashier, order.id, { amount: 2000, method: 'cash' });

      expect(thrownBy(() => env.core.orders.removeItem(env.waiter, order.id, dish.id))).toMatchObject({
        status: 409,
        code: 'ORDER_HAS_PAYMENTS',
        message: `Order ${order.orderNumber} has payments and its items cannot be removed`,
      });
      expect(env.core.orders.getOrder(order.id)).toMatchObject({ totalAmount: 2500, items: [{ id: dish.id }, {}] });
      expect(stockOf(fish.id)).toBe(98);

      const rest = env.core.payments.processPayment(env.cashier, order.id, { amount: 500, method: 'cash' });
      expect(rest.order).toMatchObject({ status: 'completed', remaining: 0 });
      expect(env.core.catalog.getTable(env.table.id)?.isOccupied).toBe(false);
    });

    it('refuses to remove confirmed items', () => {
      const order = createReadyOrder(env, [{ price: 600, quantity: 1 }]);

      const error = thrownBy(() => env.core.orders.removeItem(env.waiter, order.id, order.items[0].id));

      expect(error).toBeInstanceOf(ImmutabilityViolation);
      expect(error).toMatchObject({ message: 'Confirmed order items cannot be removed' });
    });
  });

  describe('confirmItem', () => {
    it('marks the order ready when the last kitchen item is confirmed', () => {
      const fish = addProduct(env, { name: 'Grilled Fish', price: 4500 });
      const soda = addProduct(env, { name: 'Soda', price: 600, requiresKitchen: false });
      const order = openOrder();
      const dish = env.core.orders.addItem(env.waiter, order.id, { productId: fish.id, quantity: 1 });
      env.core.orders.addItem(env.waiter, order.id, { productId: soda.id, quantity: 2 });
      expect(env.core.orders.getOrder(order.id)?.status).toBe('preparing');

      env.clock.advance(5 * 60 * 1000);
      const confirmed = env.core.orders.confirmItem(env.kitchen, dish.id);

      expect(confirmed).toMatchObject({ isConfirmed: true, confirmedAt: '2024-03-15T10:05:00.000Z', confirmedBy: env.kitchen.user.id });
      expect(env.core.orders.getOrder(order.id)?.status).toBe('ready');
    });

    it('is a no-op for an already confirmed item', () => {
      const order = createReadyOrder(env, [{ price: 600, quantity: 1 }]);
      const item = order.items[0];

      expect(env.core.orders.confirmItem(env.kitchen, item.id)).toEqual(item);
    });

    it('belongs to kitchen staff', () => {
      const fish = addProduct(env, { name: 'Grilled Fish', price: 4500 });
      const order = openOrder();
      const dish = env.core.orders.addItem(env.waiter, order.id, { productId: fish.id, quantity: 1 });

      expect(() => env.core.orders.confirmItem(env.waiter, dish.id)).toThrow(AccessDenied);
    });
  });

  describe('locked rows', () => {
    it('rejects price changes on captured items and edits of confirmed ones', () => {
      const order = createReadyOrder(env, [{ price: 600, quantity: 1 }]);
      const itemId = order.items[0].id;

      expect(thrownBy(() => env.db.run('UPDATE order_items SET unit_price = 1 WHERE id = ?', [itemId]))).toMatchObject({
        message: 'order item product and price are locked',
      });
      expect(thrownBy(() => env.db.run('UPDATE order_items SET quantity = 5 WHERE id = ?', [itemId]))).toMatchObject({
        message: 'confirmed order items cannot be changed',
      });
      expect(thrownBy(() => env.db.run('DELETE FROM orders WHERE id = ?', [order.id]))).toMatchObject({
        message: 'orders cannot be deleted',
      });
    });
  });

  describe('markServed', () => {
    it('moves a ready order to served', () => {
      const order = createReadyOrder(env, [{ price: 600, quantity: 1 }]);
      expect(env.core.orders.markServed(env.waiter, order.id).status).toBe('served');
    });

    it('requires the order to be ready', () => {
      const order = openOrder();
      expect(() => env.core.orders.markServed(env.waiter, order.id)).toThrow(StateConflict);
    });
  });

  describe('cancelOrder', () => {
    it('returns unconfirmed items to stock and frees the table', () => {
      const fish = addProduct(env, { name: 'Grilled Fish', price: 4500 });
      const soda = addProduct(env, { name: 'Soda', price: 600, requiresKitchen: false });
      const order = openOrder();
      env.core.orders.addItem(env.waiter, order.id, { productId: fish.id, quantity: 2 });
      env.core.orders.addItem(env.waiter, order.id, { productId: soda.id, quantity: 1 });

      const cancelled = env.core.orders.cancelOrder(env.waiter, order.id, 'guest left');

      expect(cancelled).toMatchObject({ status: 'cancelled', cancelledAt: '2024-03-15T10:00:00.000Z' });
      expect(stockOf(fish.id)).toBe(100);
      expect(stockOf(soda.id)).toBe(99);
      expect(env.core.catalog.getTable(env.table.id)?.isOccupied).toBe(false);

      const [entry] = env.core.audit.list(env.admin, { actionType: 'order_cancel' });
      expect(entry).toMatchObject({
        description: 'Cancelled order ORD-20240315-0001',
        metadata: { reason: 'guest left', previousStatus: 'preparing', returnedItems: 1 },
      });
    });

    it('refuses orders that already have payments', () => {
      const order = createReadyOrder(env, [{ price: 1000, quantity: 2 }]);
      env.core.shifts.startShift(env.cashier, 0);
      env.core.payments.processPayment(env.cashier, order.id, { amount: 500, method: 'cash' });

      expect(thrownBy(() => env.core.orders.cancelOrder(env.waiter, order.id))).toMatchObject({ code: 'ORDER_HAS_PAYMENTS' });
    });

    it('is terminal', () => {
      const order = openOrder();
      env.core.orders.cancelOrder(env.waiter, order.id);

      expect(() => env.core.orders.cancelOrder(env.waiter, order.id)).toThrow(`Order ${order.orderNumber} is already cancelled`);
      expect(env.core.orders.listOpenOrders()).toEqual([]);
    });
  });

  describe('listOpenOrders', () => {
    it('filters by waiter', () => {
      const mine = openOrder();
      env.clock.advance(1000);
      const theirs = env.core.orders.createOrder(env.otherWaiter, {}).order;

      expect(env.core.orders.listOpenOrders().map(o => o.id)).toEqual([mine.id, theirs.id]);
      expect(env.core.orders.listOpenOrders({ waiterId: env.otherWaiter.user.id }).map(o => o.id)).toEqual([theirs.id]);
    });
  });
});
