/**
 * Payment Processor
 *
 * Payments are immutable once written (triggers in the schema reject any
 * update or delete, apart from the one-way receipt_printed flag). Partial
 * payments accumulate; an amount beyond the remaining balance is capped to
 * it. The order completes and its table frees when the paid total reaches
 * the order total.
 */

import { randomUUID } from 'crypto';
import { Database } from '../db/database.js';
import { getLogger } from '../utils/logger.js';
import { NotFound, StateConflict, ValidationError } from '../utils/errors.js';
import {
  BusinessDateSettings,
  DEFAULT_BUSINESS_DATE_SETTINGS,
  formatDailyNumber,
  resolveBusinessDate,
} from '../utils/business-date.js';
import { ActorContext, Role, requires } from './access.js';
import { AuditAction, AuditTrail } from './audit.js';
import { OrderStatus, releaseTable } from './order-status.js';
import { SignalBoard, SignalKey } from './signal-board.js';

const logger = getLogger('Payments');

export const PAYMENT_NUMBER_PREFIX = 'PAY';

export const PaymentMethod = {
  CASH: 'cash',
  MOBILE_MONEY: 'mobile_money',
  ORANGE_MONEY: 'orange_money',
} as const;

export type PaymentMethod = (typeof PaymentMethod)[keyof typeof PaymentMethod];

export const PAYMENT_METHODS: readonly PaymentMethod[] = Object.values(PaymentMethod);

export function isPaymentMethod(value: string): value is PaymentMethod {
  return PAYMENT_METHODS.some(method => method === value);
}

export function requiresTransactionReference(method: PaymentMethod): boolean {
  return method !== PaymentMethod.CASH;
}

export interface PaymentProcessorOptions {
  now?: () => Date;
  businessDate?: BusinessDateSettings;
  /** Cashiers must have an open shift to take payments. Admins never do. */
  requireShift?: boolean;
  drawerSignalTtlSeconds?: number;
}

export class PaymentProcessor {
  private db: Database;
  private audit: AuditTrail;
  private signals: SignalBoard;
  private now: () => Date;
  private businessDate: BusinessDateSettings;
  private requireShift: boolean;
  private drawerSignalTtlSeconds: number;

  constructor(db: Database, audit: AuditTrail, signals: SignalBoard, options: PaymentProcessorOptions = {}) {
    this.db = db;
    this.audit = audit;
    this.signals = signals;
    this.now = options.now ?? (() => new Date());
    this.businessDate = options.businessDate ?? DEFAULT_BUSINESS_DATE_SETTINGS;
    this.requireShift = options.requireShift ?? true;
    this.drawerSignalTtlSeconds = options.drawerSignalTtlSeconds ?? 60;
  }

  processPayment(ctx: ActorContext, orderId: string, params: ProcessPaymentParams): PaymentResult {
    requires(ctx.user, 'PAYMENT');

    const { amount } = params;
    if (!Number.isInteger(amount) || amount <= 0) {
      throw new ValidationError('Payment amount must be a positive whole number of minor units', { amount });
    }
    if (!isPaymentMethod(params.method)) {
      throw new ValidationError(`Unsupported payment method: ${params.method}`, {
        method: params.method,
        allowed: PAYMENT_METHODS,
      });
    }
    const method = params.method;
    const reference = params.transactionReference?.trim() ?? '';
    if (requiresTransactionReference(method) && reference === '') {
      throw new ValidationError(`A transaction reference is required for ${method} payments`, { method });
    }

    return this.db.transaction(() => {
      const order = this.db.get<PayableOrderRow>(
        'SELECT id, order_number, table_id, status, total_amount FROM orders WHERE id = ?',
        [orderId]
      );
      if (!order) {
        throw new NotFound('Order', orderId);
      }
      if (order.status === OrderStatus.COMPLETED || order.status === OrderStatus.CANCELLED) {
        throw new StateConflict(`Order ${order.order_number} is already ${order.status}`, {
          orderId,
          status: order.status,
        });
      }

      if (this.requireShift && ctx.user.role === Role.CASHIER) {
        const shift = this.db.get<{ id: string }>(
          'SELECT id FROM shifts WHERE user_id = ? AND ended_at IS NULL',
          [ctx.user.id]
        );
        if (!shift) {
          throw new StateConflict('Start a shift before taking payments', { userId: ctx.user.id }, 'NO_OPEN_SHIFT');
        }
      }

      const paidBefore = this.sumPaid(order.id);
      const remaining = order.total_amount - paidBefore;
      if (remaining <= 0) {
        throw new StateConflict(`Order ${order.order_number} has no outstanding balance`, {
          orderId,
          totalAmount: order.total_amount,
          paidAmount: paidBefore,
        }, 'NOTHING_TO_PAY');
      }

      const recorded = Math.min(amount, remaining);
      const now = this.now();
      const processedAt = now.toISOString();
      const businessDate = resolveBusinessDate(now, this.businessDate);
      const paymentNumber = formatDailyNumber(
        PAYMENT_NUMBER_PREFIX,
        businessDate,
        this.db.nextSequence('payment', businessDate)
      );
      const id = randomUUID();

      this.db.run(
        `INSERT INTO payments (id, payment_number, business_date, order_id, amount, method, transaction_reference,
           processed_by, device_id, processed_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [id, paymentNumber, businessDate, order.id, recorded, method, reference, ctx.user.id, ctx.deviceId, processedAt]
      );

      const paidAmount = paidBefore + recorded;
      const completed = paidAmount >= order.total_amount;
      if (completed) {
        this.db.run(
          'UPDATE orders SET status = ?, completed_at = ?, updated_at = ? WHERE id = ?',
          [OrderStatus.COMPLETED, processedAt, processedAt, order.id]
        );
        releaseTable(this.db, order.table_id);
      }

      this.audit.recordFor(ctx, AuditAction.PAYMENT_PROCESS, `Payment ${paymentNumber} of ${recorded} (${method}) on ${order.order_number}`, {
        tableName: 'payments',
        recordId: id,
        metadata: {
          orderId: order.id,
          orderNumber: order.order_number,
          requestedAmount: amount,
          amount: recorded,
          method,
          transactionReference: reference,
          orderCompleted: completed,
        },
      });

      if (method === PaymentMethod.CASH) {
        const signal: DrawerSignal = { paymentNumber, amount: recorded, at: processedAt };
        this.db.afterCommit(() => this.signals.set(SignalKey.drawer(ctx.deviceId), signal, this.drawerSignalTtlSeconds));
      }

      if (recorded < amount) {
        logger.info('Payment capped to remaining balance', { paymentNumber, requested: amount, recorded });
      }
      logger.info('Payment processed', { paymentNumber, orderNumber: order.order_number, amount: recorded, method, completed });

      return {
        payment: this.requirePayment(id),
        requestedAmount: amount,
        capped: recorded < amount,
        order: {
          id: order.id,
          orderNumber: order.order_number,
          status: completed ? OrderStatus.COMPLETED : order.status,
          totalAmount: order.total_amount,
          paidAmount,
          remaining: Math.max(order.total_amount - paidAmount, 0),
        },
      };
    });
  }

  getPayment(id: string): Payment | null {
    const row = this.db.get<PaymentRow>('SELECT * FROM payments WHERE id = ?', [id]);
    return row ? mapPaymentRow(row) : null;
  }

  listPayments(orderId: string): Payment[] {
    return this.db
      .all<PaymentRow>('SELECT * FROM payments WHERE order_id = ? ORDER BY processed_at, rowid', [orderId])
      .map(mapPaymentRow);
  }

  getPaidTotal(orderId: string): number {
    return this.sumPaid(orderId);
  }

  /** Ready and served orders awaiting payment, with what is still owed. */
  listPayableOrders(ctx: ActorContext): PayableOrder[] {
    requires(ctx.user, 'PAYMENT');
    const rows = this.db.all<PayableOrderRow & { table_number: string | null; paid: number }>(
      `SELECT o.id, o.order_number, o.table_id, o.status, o.total_amount, t.number AS table_number,
              COALESCE((SELECT SUM(amount) FROM payments p WHERE p.order_id = o.id), 0) AS paid
       FROM orders o
       LEFT JOIN dining_tables t ON t.id = o.table_id
       WHERE o.status IN (?, ?)
       ORDER BY o.created_at`,
      [OrderStatus.READY, OrderStatus.SERVED]
    );
    return rows.map(row => ({
      orderId: row.id,
      orderNumber: row.order_number,
      tableNumber: row.table_number,
      status: row.status,
      totalAmount: row.total_amount,
      paidAmount: row.paid,
      remaining: Math.max(row.total_amount - row.paid, 0),
    }));
  }

  /** Drawer-open hint for the terminal that took a cash payment; reading clears it. */
  takeDrawerSignal(deviceId: string): DrawerSignal | null {
    const value = this.signals.take(SignalKey.drawer(deviceId));
    return isDrawerSignal(value) ? value : null;
  }

  private sumPaid(orderId: string): number {
    const row = this.db.get<{ paid: number | null }>(
      'SELECT SUM(amount) AS paid FROM payments WHERE order_id = ?',
      [orderId]
    );
    return row?.paid ?? 0;
  }

  private requirePayment(id: string): Payment {
    const payment = this.getPayment(id);
    if (!payment) {
      throw new NotFound('Payment', id);
    }
    return payment;
  }
}

function isDrawerSignal(value: unknown): value is DrawerSignal {
  return typeof value === 'object'
    && value !== null
    && 'paymentNumber' in value
    && typeof value.paymentNumber === 'string'
    && 'amount' in value
    && typeof value.amount === 'number'
    && 'at' in value
    && typeof value.at === 'string';
}

export function mapPaymentRow(row: PaymentRow): Payment {
  return Object.freeze<Payment>({
    id: row.id,
    paymentNumber: row.payment_number,
    businessDate: row.business_date,
    orderId: row.order_id,
    amount: row.amount,
    method: isPaymentMethod(row.method) ? row.method : PaymentMethod.CASH,
    transactionReference: row.transaction_reference,
    processedBy: row.processed_by,
    deviceId: row.device_id,
    processedAt: row.processed_at,
    receiptPrinted: row.receipt_printed === 1,
    receiptPrintedAt: row.receipt_printed_at,
  });
}

interface ProcessPaymentParams {
  amount: number;
  /** Validated at runtime; callers may pass raw input. */
  method: string;
  transactionReference?: string;
}

interface Payment {
  readonly id: string;
  readonly paymentNumber: string;
  readonly businessDate: string;
  readonly orderId: string;
  readonly amount: number;
  readonly method: PaymentMethod;
  readonly transactionReference: string;
  readonly processedBy: string;
  readonly deviceId: string;
  readonly processedAt: string;
  readonly receiptPrinted: boolean;
  readonly receiptPrintedAt: string | null;
}

interface PaymentResult {
  payment: Payment;
  requestedAmount: number;
  capped: boolean;
  order: {
    id: string;
    orderNumber: string;
    status: string;
    totalAmount: number;
    paidAmount: number;
    remaining: number;
  };
}

interface PayableOrder {
  orderId: string;
  orderNumber: string;
  tableNumber: string | null;
  status: string;
  totalAmount: number;
  paidAmount: number;
  remaining: number;
}

interface DrawerSignal {
  paymentNumber: string;
  amount: number;
  at: string;
}

interface PayableOrderRow {
  id: string;
  order_number: string;
  table_id: string | null;
  status: string;
  total_amount: number;
}

interface PaymentRow {
  id: string;
  payment_number: string;
  business_date: string;
  order_id: string;
  amount: number;
  method: string;
  transaction_reference: string;
  processed_by: string;
  device_id: string;
  processed_at: string;
  receipt_printed: number;
  receipt_printed_at: string | null;
}

export type { ProcessPaymentParams, Payment, PaymentResult, PayableOrder, DrawerSignal, PaymentRow };
