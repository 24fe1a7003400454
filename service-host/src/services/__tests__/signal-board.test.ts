import { describe, it, expect, vi } from 'vitest';
import { SignalBoard, SignalKey } from '../signal-board.js';
import { NotificationBus, StockAlert } from '../notifications.js';

describe('SignalBoard', () => {
  function boardAt(start: number): { board: SignalBoard; advance: (ms: number) => void } {
    let now = start;
    return { board: new SignalBoard(() => now), advance: (ms) => { now += ms; } };
  }

  it('forgets a value once its TTL has passed', () => {
    const { board, advance } = boardAt(1_000);
    board.set('k', 'v', 10);

    advance(9_999);
    expect(board.get('k')).toBe('v');
    advance(1);
    expect(board.get('k')).toBeUndefined();
    expect(board.has('k')).toBe(false);
  });

  it('claims only absent or expired keys', () => {
    const { board, advance } = boardAt(0);

    expect(board.claim('alert', 1, 60)).toBe(true);
    expect(board.claim('alert', 2, 60)).toBe(false);
    expect(board.get('alert')).toBe(1);

    advance(60_000);
    expect(board.claim('alert', 3, 60)).toBe(true);
    expect(board.get('alert')).toBe(3);
  });

  it('take reads once', () => {
    const { board } = boardAt(0);
    board.set(SignalKey.drawer('till-1'), { amount: 500 }, 60);

    expect(board.take('drawer:till-1')).toEqual({ amount: 500 });
    expect(board.take('drawer:till-1')).toBeUndefined();
  });

  it('sweep removes expired entries only', () => {
    const { board, advance } = boardAt(0);
    board.set('short', 1, 1);
    board.set('long', 2, 100);

    advance(5_000);
    expect(board.sweep()).toBe(1);
    expect(board.get('long')).toBe(2);
  });

  it('builds namespaced keys', () => {
    expect(SignalKey.stockAlert('p-1', 'low_stock')).toBe('stock-alert:p-1:low_stock');
    expect(SignalKey.kitchenNewOrders).toBe('kitchen:new_orders');
  });
});

describe('NotificationBus', () => {
  const alert: StockAlert = {
    productId: 'p-1',
    productName: 'Tonic',
    stockQuantity: 0,
    minStockLevel: 5,
    unitOfMeasure: 'bottle',
  };

  it('delivers typed payloads until unsubscribed', () => {
    const bus = new NotificationBus();
    const listener = vi.fn();
    const off = bus.on('out_of_stock', listener);

    bus.emit('out_of_stock', alert);
    off();
    bus.emit('out_of_stock', alert);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(alert);
  });

  it('keeps a failing listener away from the emitter and other listeners', () => {
    const bus = new NotificationBus();
    const after = vi.fn();
    bus.on('low_stock', () => {
      throw new Error('dashboard offline');
    });
    bus.on('low_stock', after);

    expect(() => bus.emit('low_stock', alert)).not.toThrow();
    expect(after).toHaveBeenCalledWith(alert);
  });
});
