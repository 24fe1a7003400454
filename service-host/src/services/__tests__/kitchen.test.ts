import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AccessDenied } from '../../utils/errors.js';
import { addProduct, createTestEnv, TestEnv } from '../../testing/fixtures.js';

describe('KitchenBoard', () => {
  let env: TestEnv;

  beforeEach(() => {
    env = createTestEnv();
  });

  afterEach(() => {
    env.db.close();
  });

  it('starts at version zero with no new-order flag', () => {
    expect(env.core.kitchen.getWatermark()).toEqual({ version: 0, updatedAt: null, newOrders: false });
  });

  it('groups unconfirmed kitchen items into tickets in order of arrival', () => {
    const fish = addProduct(env, { name: 'Grilled Fish', price: 4500 });
    const soda = addProduct(env, { name: 'Soda', price: 600, requiresKitchen: false });
    const stew = addProduct(env, { name: 'Stew', price: 3000 });

    const dineIn = env.core.orders.createOrder(env.waiter, { tableId: env.table.id }).order;
    const fishItem = env.core.orders.addItem(env.waiter, dineIn.id, { productId: fish.id, quantity: 2, specialInstructions: 'well done' });
    env.core.orders.addItem(env.waiter, dineIn.id, { productId: soda.id, quantity: 1 });
    env.clock.advance(60 * 1000);
    const takeout = env.core.orders.createOrder(env.otherWaiter, {}).order;
    const stewItem = env.core.orders.addItem(env.otherWaiter, takeout.id, { productId: stew.id, quantity: 1 });

    const queue = env.core.kitchen.getQueue(env.kitchen);

    expect(queue.tickets).toEqual([
      {
        orderId: dineIn.id,
        orderNumber: 'ORD-20240315-0001',
        tableNumber: 'T1',
        waiterName: 'Wanda Waiter',
        createdAt: '2024-03-15T10:00:00.000Z',
        items: [{ id: fishItem.id, productName: 'Grilled Fish', quantity: 2, specialInstructions: 'well done', createdAt: '2024-03-15T10:00:00.000Z' }],
      },
      {
        orderId: takeout.id,
        orderNumber: 'ORD-20240315-0002',
        tableNumber: null,
        waiterName: 'Walt Waiter',
        createdAt: '2024-03-15T10:01:00.000Z',
        items: [{ id: stewItem.id, productName: 'Stew', quantity: 1, specialInstructions: '', createdAt: '2024-03-15T10:01:00.000Z' }],
      },
    ]);
    expect(queue.watermark).toEqual({ version: 2, updatedAt: '2024-03-15T10:01:00.000Z', newOrders: true });
  });

  it('drops confirmed items and cancelled orders from the queue', () => {
    const fish = addProduct(env, { name: 'Grilled Fish', price: 4500 });
    const first = env.core.orders.createOrder(env.waiter, { tableId: env.table.id }).order;
    const item = env.core.orders.addItem(env.waiter, first.id, { productId: fish.id, quantity: 1 });
    const second = env.core.orders.createOrder(env.otherWaiter, {}).order;
    env.core.orders.addItem(env.otherWaiter, second.id, { productId: fish.id, quantity: 1 });

    env.core.orders.confirmItem(env.kitchen, item.id);
    env.core.orders.cancelOrder(env.otherWaiter, second.id);

    const queue = env.core.kitchen.getQueue(env.kitchen);
    expect(queue.tickets).toEqual([]);
    expect(queue.watermark.version).toBe(4);
  });

  it('clears the new-order flag on acknowledgement or after its TTL', () => {
    const fish = addProduct(env, { name: 'Grilled Fish', price: 4500 });
    const order = env.core.orders.createOrder(env.waiter, { tableId: env.table.id }).order;
    env.core.orders.addItem(env.waiter, order.id, { productId: fish.id, quantity: 1 });

    env.core.kitchen.acknowledgeNewOrders(env.kitchen);
    expect(env.core.kitchen.getWatermark().newOrders).toBe(false);

    env.core.orders.addItem(env.waiter, order.id, { productId: fish.id, quantity: 1 });
    expect(env.core.kitchen.getWatermark().newOrders).toBe(true);
    env.clock.advance(60 * 1000);
    expect(env.core.kitchen.getWatermark()).toEqual({ version: 2, updatedAt: '2024-03-15T10:00:00.000Z', newOrders: false });
  });

  it('does not move the watermark for items that skip the kitchen', () => {
    const soda = addProduct(env, { name: 'Soda', price: 600, requiresKitchen: false });
    const order = env.core.orders.createOrder(env.waiter, { tableId: env.table.id }).order;
    env.core.orders.addItem(env.waiter, order.id, { productId: soda.id, quantity: 1 });

    expect(env.core.kitchen.getWatermark().version).toBe(0);
  });

  it('is for kitchen staff', () => {
    expect(() => env.core.kitchen.getQueue(env.cashier)).toThrow(AccessDenied);
    expect(() => env.core.kitchen.acknowledgeNewOrders(env.waiter)).toThrow(AccessDenied);
  });
});
