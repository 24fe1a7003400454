/**
 * Shared test fixtures: an in-memory database, a controllable clock, seeded
 * staff for every role and a recording printer.
 */

import { Database } from '../db/database.js';
import { HostConfig, hostConfigSchema } from '../config.js';
import { createPosCore, PosCore } from '../core.js';
import { ActorContext, Role } from '../services/access.js';
import type { CreateProductParams, DiningTable, Product } from '../services/catalog.js';
import type { Order } from '../services/orders.js';
import type { Receipt, ReceiptPrinter } from '../services/receipts.js';

export const START_TIME = '2024-03-15T10:00:00.000Z';
export const TEST_PIN = '1234';

export class TestClock {
  private current: number;

  constructor(iso: string = START_TIME) {
    this.current = Date.parse(iso);
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }

  set(iso: string): void {
    this.current = Date.parse(iso);
  }
}

export class RecordingPrinter implements ReceiptPrinter {
  printed: Receipt[] = [];
  outcome: boolean | Error = true;

  async print(receipt: Receipt): Promise<boolean> {
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    if (this.outcome) {
      this.printed.push(receipt);
    }
    return this.outcome;
  }
}

export function createTestConfig(overrides: Record<string, unknown> = {}): HostConfig {
  return hostConfigSchema.parse({ dataDir: 'unused', taxRate: 0, ...overrides });
}

export interface TestEnv {
  db: Database;
  core: PosCore;
  clock: TestClock;
  printer: RecordingPrinter;
  admin: ActorContext;
  waiter: ActorContext;
  otherWaiter: ActorContext;
  cashier: ActorContext;
  kitchen: ActorContext;
  table: DiningTable;
}

export interface TestEnvOptions {
  config?: Record<string, unknown>;
  db?: Database;
  clock?: TestClock;
}

export function createTestEnv(options: TestEnvOptions = {}): TestEnv {
  const db = options.db ?? new Database(':memory:');
  db.initialize();
  const clock = options.clock ?? new TestClock();
  const printer = new RecordingPrinter();
  const core = createPosCore(db, createTestConfig(options.config), { now: clock.now, printer });

  const adminUser = core.catalog.ensureBootstrapAdmin('admin', TEST_PIN);
  if (!adminUser) {
    throw new Error('Test database already has users');
  }
  const admin: ActorContext = { user: adminUser, deviceId: 'terminal-admin', ip: '10.0.0.1' };

  const staff = (username: string, displayName: string, role: Role, deviceId: string): ActorContext => ({
    user: core.catalog.createUser(admin, { username, displayName, role, pin: TEST_PIN }),
    deviceId,
    ip: '10.0.0.2',
  });

  return {
    db,
    core,
    clock,
    printer,
    admin,
    waiter: staff('waiter1', 'Wanda Waiter', Role.WAITER, 'tablet-1'),
    otherWaiter: staff('waiter2', 'Walt Waiter', Role.WAITER, 'tablet-2'),
    cashier: staff('cashier1', 'Cass Cashier', Role.CASHIER, 'till-1'),
    kitchen: staff('cook1', 'Kit Cook', Role.KITCHEN, 'kds-1'),
    table: core.catalog.createTable(admin, { number: 'T1', capacity: 4 }),
  };
}

/** Product with 100 units of opening stock unless stated otherwise. */
export function addProduct(env: TestEnv, params: Partial<CreateProductParams> & { name: string; price: number }): Product {
  return env.core.catalog.createProduct(env.admin, { initialStock: 100, ...params });
}

/**
 * A ready order on the fixture table: every line is a kitchen dish that the
 * cook confirms, the last confirmation moving the order to ready.
 */
export function createReadyOrder(env: TestEnv, lines: { price: number; quantity: number; name?: string }[]): Order {
  const { order } = env.core.orders.createOrder(env.waiter, { tableId: env.table.id });
  const items = lines.map((line, index) => {
    const product = addProduct(env, { name: line.name ?? `Dish ${index + 1}`, price: line.price });
    return env.core.orders.addItem(env.waiter, order.id, { productId: product.id, quantity: line.quantity });
  });
  items.forEach(item => env.core.orders.confirmItem(env.kitchen, item.id));

  const ready = env.core.orders.getOrder(order.id);
  if (!ready) {
    throw new Error(`Order disappeared: ${order.id}`);
  }
  return ready;
}

/** The value thrown by `fn`, for assertions on error fields. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('Expected the call to throw');
}
