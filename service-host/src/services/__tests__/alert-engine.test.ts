import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AlertEngine } from '../alert-engine.js';
import { Database } from '../../db/database.js';
import { addProduct, createTestEnv, TestEnv } from '../../testing/fixtures.js';

describe('AlertEngine', () => {
  let env: TestEnv;
  let engine: AlertEngine;

  beforeEach(() => {
    env = createTestEnv();
    engine = new AlertEngine(env.db, env.core.ledger, { checkIntervalMs: 60000 });
  });

  afterEach(() => {
    engine.stop();
    env.db.close();
  });

  it('raises alerts for levels changed outside the ledger', () => {
    const lowStock = vi.fn();
    env.core.notifications.on('low_stock', lowStock);
    const tonic = addProduct(env, { name: 'Tonic', price: 800, initialStock: 10 });
    env.db.run('UPDATE products SET min_stock_level = 20 WHERE id = ?', [tonic.id]);

    expect(engine.runOnce()).toBe(1);
    expect(lowStock).toHaveBeenCalledWith({
      productId: tonic.id,
      productName: 'Tonic',
      stockQuantity: 10,
      minStockLevel: 20,
      unitOfMeasure: 'unit',
    });
  });

  it('repeats an alert only after the de-duplication window', () => {
    addProduct(env, { name: 'Gin', price: 12000, initialStock: 0, minStockLevel: 2 });

    expect(engine.runOnce()).toBe(1);
    expect(engine.runOnce()).toBe(0);

    env.clock.advance(3600 * 1000);
    expect(engine.runOnce()).toBe(1);
  });

  it('does not alert for products above their minimum', () => {
    addProduct(env, { name: 'Lime', price: 50, initialStock: 10, minStockLevel: 5 });
    expect(engine.runOnce()).toBe(0);
  });

  it('sweeps once on start and stops cleanly', () => {
    const outOfStock = vi.fn();
    env.core.notifications.on('out_of_stock', outOfStock);
    const gin = addProduct(env, { name: 'Gin', price: 12000, initialStock: 0 });
    env.db.run('UPDATE products SET min_stock_level = 1 WHERE id = ?', [gin.id]);

    engine.start();
    engine.start();

    expect(engine.running).toBe(true);
    expect(outOfStock).toHaveBeenCalledTimes(1);
    engine.stop();
    expect(engine.running).toBe(false);
  });

  it('keeps running when a sweep fails', () => {
    const closed = new Database(':memory:');
    closed.close();
    const broken = new AlertEngine(closed, env.core.ledger);

    expect(() => broken.start()).not.toThrow();
    expect(broken.running).toBe(true);
    broken.stop();
  });
});
