/**
 * Order State Machine
 *
 * pending → preparing → ready → served → completed, with cancelled reachable
 * from any open status. Each operation performs its primary write and every
 * dependent write (ledger movement, totals, auto-confirm, readiness, table
 * occupancy, audit) in one transaction.
 */

import { randomUUID } from 'crypto';
import { Database } from '../db/database.js';
import { getLogger } from '../utils/logger.js';
import { AccessDenied, ImmutabilityViolation, NotFound, StateConflict, ValidationError } from '../utils/errors.js';
import {
  BusinessDateSettings,
  DEFAULT_BUSINESS_DATE_SETTINGS,
  formatDailyNumber,
  resolveBusinessDate,
} from '../utils/business-date.js';
import { lineSubtotal } from '../utils/money.js';
import { ActorContext, Role, requires } from './access.js';
import { AuditAction, AuditTrail } from './audit.js';
import { KitchenBoard } from './kitchen.js';
import { LedgerEngine, MovementType } from './ledger.js';
import {
  EDITABLE_ORDER_STATUSES,
  OPEN_STATUS_SQL,
  OrderStatus,
  isOpenStatus,
  isOrderStatus,
  releaseTable,
} from './order-status.js';

const logger = getLogger('Orders');

export const ORDER_NUMBER_PREFIX = 'ORD';

export interface OrderServiceOptions {
  taxRate: number;
  now?: () => Date;
  businessDate?: BusinessDateSettings;
}

export class OrderService {
  private db: Database;
  private ledger: LedgerEngine;
  private audit: AuditTrail;
  private kitchen: KitchenBoard;
  private taxRate: number;
  private now: () => Date;
  private businessDate: BusinessDateSettings;

  constructor(db: Database, ledger: LedgerEngine, audit: AuditTrail, kitchen: KitchenBoard, options: OrderServiceOptions) {
    if (!Number.isFinite(options.taxRate) || options.taxRate < 0) {
      throw new ValidationError('Tax rate must be a non-negative number', { taxRate: options.taxRate });
    }
    this.db = db;
    this.ledger = ledger;
    this.audit = audit;
    this.kitchen = kitchen;
    this.taxRate = options.taxRate;
    this.now = options.now ?? (() => new Date());
    this.businessDate = options.businessDate ?? DEFAULT_BUSINESS_DATE_SETTINGS;
  }

  /**
   * Opens an order on a table, or a takeout order when no table is given.
   * If the table already has an open order, that order is returned with
   * `created: false` instead of creating a duplicate.
   */
  createOrder(ctx: ActorContext, params: CreateOrderParams = {}): CreateOrderResult {
    requires(ctx.user, 'ORDER_WRITE');
    const tableId = params.tableId ?? null;

    return this.db.transaction(() => {
      if (tableId) {
        const table = this.db.get<{ id: string; number: string; is_active: number }>(
          'SELECT id, number, is_active FROM dining_tables WHERE id = ?',
          [tableId]
        );
        if (!table || table.is_active !== 1) {
          throw new NotFound('Table', tableId);
        }

        const open = this.db.get<{ id: string }>(
          `SELECT id FROM orders WHERE table_id = ? AND status IN (${OPEN_STATUS_SQL})`,
          [tableId]
        );
        if (open) {
          logger.debug('Table already has an open order', { tableId, orderId: open.id });
          return { order: this.requireOrder(open.id), created: false };
        }
      }

      const now = this.now();
      const createdAt = now.toISOString();
      const businessDate = resolveBusinessDate(now, this.businessDate);
      const orderNumber = formatDailyNumber(
        ORDER_NUMBER_PREFIX,
        businessDate,
        this.db.nextSequence('order', businessDate)
      );
      const id = randomUUID();

      this.db.run(
        `INSERT INTO orders (id, order_number, business_date, table_id, waiter_id, status, device_id, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [id, orderNumber, businessDate, tableId, ctx.user.id, OrderStatus.PENDING, ctx.deviceId, createdAt, createdAt]
      );

      if (tableId) {
        this.db.run('UPDATE dining_tables SET is_occupied = 1 WHERE id = ?', [tableId]);
      }

      this.audit.recordFor(ctx, AuditAction.ORDER_CREATE, `Created order ${orderNumber}`, {
        tableName: 'orders',
        recordId: id,
        metadata: { orderNumber, tableId },
      });

      logger.info('Order created', { orderNumber, tableId, waiterId: ctx.user.id });
      return { order: this.requireOrder(id), created: true };
    });
  }

  getOrder(id: string): Order | null {
    const row = this.db.get<OrderRow>(
      `SELECT o.*, t.number AS table_number FROM orders o
       LEFT JOIN dining_tables t ON t.id = o.table_id
       WHERE o.id = ?`,
      [id]
    );
    if (!row) return null;
    return mapOrderRow(row, this.getOrderItems(id));
  }

  listOpenOrders(filters: { waiterId?: string; tableId?: string } = {}): Order[] {
    let sql = `SELECT id FROM orders WHERE status IN (${OPEN_STATUS_SQL})`;
    const params: string[] = [];

    if (filters.waiterId) {
      sql += ' AND waiter_id = ?';
      params.push(filters.waiterId);
    }
    if (filters.tableId) {
      sql += ' AND table_id = ?';
      params.push(filters.tableId);
    }
    sql += ' ORDER BY created_at';

    return this.db.all<{ id: string }>(sql, params).map(r => this.requireOrder(r.id));
  }

  addItem(ctx: ActorContext, orderId: string, params: AddItemParams): OrderItem {
    requires(ctx.user, 'ORDER_WRITE');
    if (!Number.isFinite(params.quantity) || params.quantity <= 0) {
      throw new ValidationError('Quantity must be greater than zero', { quantity: params.quantity });
    }

    return this.db.transaction(() => {
      const order = this.requireOrderRow(orderId);
      this.assertCanModify(ctx, order);
      this.assertEditable(order, 'add items to');

      const product = this.db.get<ProductRow>(
        'SELECT id, name, current_price, requires_kitchen, is_active, is_available FROM products WHERE id = ?',
        [params.productId]
      );
      if (!product) {
        throw new NotFound('Product', params.productId);
      }
      if (product.is_active !== 1 || product.is_available !== 1) {
        throw new StateConflict(`Product ${product.name} is not available`, { productId: product.id }, 'PRODUCT_UNAVAILABLE');
      }

      const id = randomUUID();
      const createdAt = this.now().toISOString();
      const requiresKitchen = product.requires_kitchen === 1;
      const unitPrice = product.current_price;

      this.db.run(
        `INSERT INTO order_items (id, order_id, product_id, product_name, quantity, unit_price, subtotal,
           special_instructions, requires_kitchen, is_confirmed, confirmed_at, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          id,
          order.id,
          product.id,
          product.name,
          params.quantity,
          unitPrice,
          lineSubtotal(params.quantity, unitPrice),
          params.specialInstructions?.trim() ?? '',
          requiresKitchen ? 1 : 0,
          requiresKitchen ? 0 : 1,
          requiresKitchen ? null : createdAt,
          createdAt,
        ]
      );

      this.ledger.recordMovement(ctx, {
        productId: product.id,
        type: MovementType.SALE,
        quantity: -params.quantity,
        reference: order.order_number,
        notes: `Order item ${id}`,
      });

      this.recalculateTotals(order.id);
      // The first item only starts preparation; readiness is judged from the second on.
      if (order.status === OrderStatus.PENDING) {
        this.setStatus(order.id, OrderStatus.PREPARING);
      } else {
        this.evaluateReadiness(order.id);
      }

      this.audit.recordFor(ctx, AuditAction.ORDER_MODIFY, `Added ${params.quantity} x ${product.name} to ${order.order_number}`, {
        tableName: 'order_items',
        recordId: id,
        metadata: { orderId: order.id, productId: product.id, quantity: params.quantity, unitPrice },
      });

      if (requiresKitchen) {
        this.db.afterCommit(() => this.kitchen.markUpdated(true));
      }

      return this.requireItem(id);
    });
  }

  /** Only unconfirmed items can be removed; their quantity returns to stock. */
  removeItem(ctx: ActorContext, orderId: string, itemId: string): Order {
    requires(ctx.user, 'ORDER_WRITE');

    return this.db.transaction(() => {
      const order = this.requireOrderRow(orderId);
      this.assertCanModify(ctx, order);

      const item = this.db.get<OrderItemRow>(
        'SELECT * FROM order_items WHERE id = ? AND order_id = ?',
        [itemId, orderId]
      );
      if (!item) {
        throw new NotFound('Order item', itemId);
      }
      if (item.is_confirmed === 1) {
        throw new ImmutabilityViolation('Confirmed order items cannot be removed', { itemId });
      }
      this.assertEditable(order, 'remove items from');
      this.assertNoPayments(order, 'its items cannot be removed');

      this.ledger.recordMovement(ctx, {
        productId: item.product_id,
        type: MovementType.RETURN,
        quantity: item.quantity,
        reference: order.order_number,
        notes: `Removed order item ${item.id}`,
      });

      this.db.run('DELETE FROM order_items WHERE id = ?', [item.id]);
      this.recalculateTotals(order.id);
      this.evaluateReadiness(order.id);

      this.audit.recordFor(ctx, AuditAction.ORDER_MODIFY, `Removed ${item.quantity} x ${item.product_name} from ${order.order_number}`, {
        tableName: 'order_items',
        recordId: item.id,
        metadata: { orderId: order.id, productId: item.product_id, quantity: item.quantity },
      });

      if (item.requires_kitchen === 1) {
        this.db.afterCommit(() => this.kitchen.markUpdated(false));
      }

      return this.requireOrder(order.id);
    });
  }

  /** Kitchen confirmation. Confirming an already confirmed item is a no-op. */
  confirmItem(ctx: ActorContext, itemId: string): OrderItem {
    requires(ctx.user, 'KITCHEN');

    return this.db.transaction(() => {
      const item = this.db.get<OrderItemRow>('SELECT * FROM order_items WHERE id = ?', [itemId]);
      if (!item) {
        throw new NotFound('Order item', itemId);
      }
      if (item.is_confirmed === 1) {
        return mapItemRow(item);
      }

      const order = this.requireOrderRow(item.order_id);
      const status = parseStatus(order.status);
      if (!isOpenStatus(status)) {
        throw new StateConflict(`Order ${order.order_number} is ${status}`, { orderId: order.id, status });
      }

      this.db.run(
        'UPDATE order_items SET is_confirmed = 1, confirmed_at = ?, confirmed_by = ? WHERE id = ?',
        [this.now().toISOString(), ctx.user.id, item.id]
      );
      const becameReady = this.evaluateReadiness(order.id);

      this.audit.recordFor(ctx, AuditAction.ORDER_MODIFY, `Confirmed ${item.product_name} on ${order.order_number}`, {
        tableName: 'order_items',
        recordId: item.id,
        metadata: { orderId: order.id, orderReady: becameReady },
      });

      this.db.afterCommit(() => this.kitchen.markUpdated(false));
      return this.requireItem(item.id);
    });
  }

  markServed(ctx: ActorContext, orderId: string): Order {
    requires(ctx.user, 'ORDER_WRITE');

    return this.db.transaction(() => {
      const order = this.requireOrderRow(orderId);
      this.assertCanModify(ctx, order);
      if (order.status !== OrderStatus.READY) {
        throw new StateConflict(`Order ${order.order_number} is ${order.status}, not ready`, {
          orderId,
          status: order.status,
        });
      }

      this.setStatus(order.id, OrderStatus.SERVED);
      this.audit.recordFor(ctx, AuditAction.ORDER_MODIFY, `Served order ${order.order_number}`, {
        tableName: 'orders',
        recordId: order.id,
      });
      return this.requireOrder(order.id);
    });
  }

  /**
   * Abort path for an open order with no payments. Unconfirmed items go back
   * to stock; confirmed ones were already prepared and stay consumed.
   */
  cancelOrder(ctx: ActorContext, orderId: string, reason: string = ''): Order {
    requires(ctx.user, 'ORDER_WRITE');

    return this.db.transaction(() => {
      const order = this.requireOrderRow(orderId);
      this.assertCanModify(ctx, order);

      const status = parseStatus(order.status);
      if (!isOpenStatus(status)) {
        throw new StateConflict(`Order ${order.order_number} is already ${status}`, { orderId, status });
      }

      this.assertNoPayments(order, 'cannot be cancelled');

      const unconfirmed = this.db.all<OrderItemRow>(
        'SELECT * FROM order_items WHERE order_id = ? AND is_confirmed = 0',
        [order.id]
      );
      for (const item of unconfirmed) {
        this.ledger.recordMovement(ctx, {
          productId: item.product_id,
          type: MovementType.RETURN,
          quantity: item.quantity,
          reference: order.order_number,
          notes: `Cancelled order item ${item.id}`,
        });
      }

      const now = this.now().toISOString();
      this.db.run(
        'UPDATE orders SET status = ?, cancelled_at = ?, updated_at = ? WHERE id = ?',
        [OrderStatus.CANCELLED, now, now, order.id]
      );
      releaseTable(this.db, order.table_id);

      this.audit.recordFor(ctx, AuditAction.ORDER_CANCEL, `Cancelled order ${order.order_number}`, {
        tableName: 'orders',
        recordId: order.id,
        metadata: { reason, previousStatus: status, returnedItems: unconfirmed.length },
      });

      if (unconfirmed.some(item => item.requires_kitchen === 1)) {
        this.db.afterCommit(() => this.kitchen.markUpdated(false));
      }

      logger.info('Order cancelled', { orderNumber: order.order_number, reason });
      return this.requireOrder(order.id);
    });
  }

  /**
   * Recomputes subtotal, tax and total from the full item set. Idempotent:
   * writes only the three totals.
   */
  recalculateTotals(orderId: string): OrderTotals {
    return this.db.transaction(() => {
      const lines = this.db.get<{ subtotal: number | null }>(
        'SELECT SUM(subtotal) AS subtotal FROM order_items WHERE order_id = ?',
        [orderId]
      );
      const subtotal = lines?.subtotal ?? 0;
      const taxAmount = Math.round(subtotal * this.taxRate);
      const totals: OrderTotals = { subtotal, taxAmount, totalAmount: subtotal + taxAmount };

      this.db.run(
        'UPDATE orders SET subtotal = ?, tax_amount = ?, total_amount = ? WHERE id = ?',
        [totals.subtotal, totals.taxAmount, totals.totalAmount, orderId]
      );
      return totals;
    });
  }

  /**
   * A preparing order with at least one item and no unconfirmed
   * kitchen item moves to ready. Returns whether it did.
   */
  private evaluateReadiness(orderId: string): boolean {
    const order = this.requireOrderRow(orderId);
    if (order.status !== OrderStatus.PREPARING) {
      return false;
    }

    const counts = this.db.get<{ items: number; waiting: number | null }>(
      `SELECT COUNT(*) AS items,
              SUM(CASE WHEN requires_kitchen = 1 AND is_confirmed = 0 THEN 1 ELSE 0 END) AS waiting
       FROM order_items WHERE order_id = ?`,
      [orderId]
    );
    if (!counts || counts.items === 0 || (counts.waiting ?? 0) > 0) {
      return false;
    }

    this.setStatus(orderId, OrderStatus.READY);
    logger.info('Order ready', { orderNumber: order.order_number });
    return true;
  }

  private setStatus(orderId: string, status: OrderStatus): void {
    this.db.run('UPDATE orders SET status = ?, updated_at = ? WHERE id = ?', [status, this.now().toISOString(), orderId]);
  }

  private assertEditable(order: OrderRow, action: string): void {
    const status = parseStatus(order.status);
    if (!EDITABLE_ORDER_STATUSES.includes(status)) {
      throw new StateConflict(`Cannot ${action} order ${order.order_number}: it is ${status}`, {
        orderId: order.id,
        status,
      });
    }
  }

  /** Once money is taken the total may not drop below what was paid. */
  private assertNoPayments(order: OrderRow, consequence: string): void {
    const payments = this.db.get<{ count: number }>(
      'SELECT COUNT(*) AS count FROM payments WHERE order_id = ?',
      [order.id]
    );
    if (payments && payments.count > 0) {
      throw new StateConflict(`Order ${order.order_number} has payments and ${consequence}`, {
        orderId: order.id,
        payments: payments.count,
      }, 'ORDER_HAS_PAYMENTS');
    }
  }

  /** Waiters work only on their own orders. */
  private assertCanModify(ctx: ActorContext, order: OrderRow): void {
    if (ctx.user.role === Role.WAITER && order.waiter_id !== ctx.user.id) {
      throw new AccessDenied(`Order ${order.order_number} belongs to another waiter`, 'NOT_ORDER_OWNER', {
        orderId: order.id,
      });
    }
  }

  private requireOrderRow(id: string): OrderRow {
    const row = this.db.get<OrderRow>(
      `SELECT o.*, t.number AS table_number FROM orders o
       LEFT JOIN dining_tables t ON t.id = o.table_id
       WHERE o.id = ?`,
      [id]
    );
    if (!row) {
      throw new NotFound('Order', id);
    }
    return row;
  }

  private requireOrder(id: string): Order {
    return mapOrderRow(this.requireOrderRow(id), this.getOrderItems(id));
  }

  private requireItem(id: string): OrderItem {
    const row = this.db.get<OrderItemRow>('SELECT * FROM order_items WHERE id = ?', [id]);
    if (!row) {
      throw new NotFound('Order item', id);
    }
    return mapItemRow(row);
  }

  private getOrderItems(orderId: string): OrderItem[] {
    return this.db
      .all<OrderItemRow>('SELECT * FROM order_items WHERE order_id = ? ORDER BY created_at, rowid', [orderId])
      .map(mapItemRow);
  }
}

export function parseStatus(value: string): OrderStatus {
  if (!isOrderStatus(value)) {
    throw new StateConflict(`Unknown order status: ${value}`, { status: value });
  }
  return value;
}

function mapOrderRow(row: OrderRow, items: OrderItem[]): Order {
  return {
    id: row.id,
    orderNumber: row.order_number,
    businessDate: row.business_date,
    tableId: row.table_id,
    tableNumber: row.table_number,
    waiterId: row.waiter_id,
    status: parseStatus(row.status),
    subtotal: row.subtotal,
    taxAmount: row.tax_amount,
    totalAmount: row.total_amount,
    deviceId: row.device_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    completedAt: row.completed_at,
    cancelledAt: row.cancelled_at,
    items,
  };
}

function mapItemRow(row: OrderItemRow): OrderItem {
  return {
    id: row.id,
    orderId: row.order_id,
    productId: row.product_id,
    productName: row.product_name,
    quantity: row.quantity,
    unitPrice: row.unit_price,
    subtotal: row.subtotal,
    specialInstructions: row.special_instructions,
    requiresKitchen: row.requires_kitchen === 1,
    isConfirmed: row.is_confirmed === 1,
    confirmedAt: row.confirmed_at,
    confirmedBy: row.confirmed_by,
    createdAt: row.created_at,
  };
}

interface CreateOrderParams {
  tableId?: string | null;
}

interface CreateOrderResult {
  order: Order;
  created: boolean;
}

interface AddItemParams {
  productId: string;
  quantity: number;
  specialInstructions?: string;
}

interface OrderTotals {
  subtotal: number;
  taxAmount: number;
  totalAmount: number;
}

interface Order extends OrderTotals {
  id: string;
  orderNumber: string;
  businessDate: string;
  tableId: string | null;
  tableNumber: string | null;
  waiterId: string;
  status: OrderStatus;
  deviceId: string;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
  cancelledAt: string | null;
  items: OrderItem[];
}

interface OrderItem {
  id: string;
  orderId: string;
  productId: string;
  productName: string;
  quantity: number;
  unitPrice: number;
  subtotal: number;
  specialInstructions: string;
  requiresKitchen: boolean;
  isConfirmed: boolean;
  confirmedAt: string | null;
  confirmedBy: string | null;
  createdAt: string;
}

interface OrderRow {
  id: string;
  order_number: string;
  business_date: string;
  table_id: string | null;
  table_number: string | null;
  waiter_id: string;
  status: string;
  subtotal: number;
  tax_amount: number;
  total_amount: number;
  device_id: string;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
  cancelled_at: string | null;
}

interface OrderItemRow {
  id: string;
  order_id: string;
  product_id: string;
  product_name: string;
  quantity: number;
  unit_price: number;
  subtotal: number;
  special_instructions: string;
  requires_kitchen: number;
  is_confirmed: number;
  confirmed_at: string | null;
  confirmed_by: string | null;
  created_at: string;
}

interface ProductRow {
  id: string;
  name: string;
  current_price: number;
  requires_kitchen: number;
  is_active: number;
  is_available: number;
}

export type { CreateOrderParams, CreateOrderResult, AddItemParams, OrderTotals, Order, OrderItem, OrderRow };
