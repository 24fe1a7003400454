/**
 * Daily sales and inventory reports for the back office.
 */

import { Database } from '../db/database.js';
import { ValidationError } from '../utils/errors.js';
import {
  BusinessDateSettings,
  DEFAULT_BUSINESS_DATE_SETTINGS,
  isValidBusinessDateFormat,
  resolveBusinessDate,
} from '../utils/business-date.js';
import { ActorContext, requires } from './access.js';
import { OrderStatus } from './order-status.js';
import { PAYMENT_METHODS, PaymentMethod } from './payments.js';

export class ReportService {
  private db: Database;
  private now: () => Date;
  private businessDate: BusinessDateSettings;

  constructor(db: Database, options: { now?: () => Date; businessDate?: BusinessDateSettings } = {}) {
    this.db = db;
    this.now = options.now ?? (() => new Date());
    this.businessDate = options.businessDate ?? DEFAULT_BUSINESS_DATE_SETTINGS;
  }

  /** Sales for one business date (defaults to the current one). */
  dailySales(ctx: ActorContext, businessDate?: string): DailySalesReport {
    requires(ctx.user, 'REPORTS');
    const date = businessDate ?? resolveBusinessDate(this.now(), this.businessDate);
    if (!isValidBusinessDateFormat(date)) {
      throw new ValidationError('Business date must be YYYY-MM-DD', { businessDate: date });
    }

    const rows = this.db.all<{ method: string; count: number; amount: number }>(
      `SELECT method, COUNT(*) AS count, SUM(amount) AS amount
       FROM payments WHERE business_date = ?
       GROUP BY method`,
      [date]
    );

    const byMethod: Record<PaymentMethod, MethodTotal> = {
      cash: { count: 0, amount: 0 },
      mobile_money: { count: 0, amount: 0 },
      orange_money: { count: 0, amount: 0 },
    };
    let revenue = 0;
    let transactionCount = 0;
    for (const row of rows) {
      const bucket = PAYMENT_METHODS.find(method => method === row.method);
      if (bucket) {
        byMethod[bucket] = { count: row.count, amount: row.amount };
      }
      revenue += row.amount;
      transactionCount += row.count;
    }

    const orders = this.db.get<{ completed: number; cancelled: number; open: number }>(
      `SELECT
         SUM(CASE WHEN status = ? THEN 1 ELSE 0 END) AS completed,
         SUM(CASE WHEN status = ? THEN 1 ELSE 0 END) AS cancelled,
         SUM(CASE WHEN status NOT IN (?, ?) THEN 1 ELSE 0 END) AS open
       FROM orders WHERE business_date = ?`,
      [OrderStatus.COMPLETED, OrderStatus.CANCELLED, OrderStatus.COMPLETED, OrderStatus.CANCELLED, date]
    );

    return {
      businessDate: date,
      revenue,
      transactionCount,
      byMethod,
      ordersCompleted: orders?.completed ?? 0,
      ordersCancelled: orders?.cancelled ?? 0,
      ordersOpen: orders?.open ?? 0,
    };
  }

  lowStock(ctx: ActorContext): LowStockLine[] {
    requires(ctx.user, 'REPORTS');
    return this.db.all<LowStockLine>(
      `SELECT id AS productId, name, stock_quantity AS stockQuantity, min_stock_level AS minStockLevel,
              unit_of_measure AS unitOfMeasure
       FROM products
       WHERE is_active = 1 AND stock_quantity <= min_stock_level
       ORDER BY stock_quantity - min_stock_level, name`
    );
  }

  /** Stock on hand valued at current selling price, per product and in total. */
  inventoryValuation(ctx: ActorContext): InventoryValuation {
    requires(ctx.user, 'REPORTS');
    const rows = this.db.all<{ id: string; name: string; stock_quantity: number; current_price: number }>(
      'SELECT id, name, stock_quantity, current_price FROM products WHERE is_active = 1 ORDER BY name'
    );
    const lines = rows.map(row => ({
      productId: row.id,
      name: row.name,
      stockQuantity: row.stock_quantity,
      unitPrice: row.current_price,
      value: Math.round(Math.max(row.stock_quantity, 0) * row.current_price),
    }));
    return {
      lines,
      totalValue: lines.reduce((sum, line) => sum + line.value, 0),
    };
  }
}

interface MethodTotal {
  count: number;
  amount: number;
}

interface DailySalesReport {
  businessDate: string;
  revenue: number;
  transactionCount: number;
  byMethod: Record<PaymentMethod, MethodTotal>;
  ordersCompleted: number;
  ordersCancelled: number;
  ordersOpen: number;
}

interface LowStockLine {
  productId: string;
  name: string;
  stockQuantity: number;
  minStockLevel: number;
  unitOfMeasure: string;
}

interface InventoryValuation {
  lines: { productId: string; name: string; stockQuantity: number; unitPrice: number; value: number }[];
  totalValue: number;
}

export type { DailySalesReport, LowStockLine, InventoryValuation, MethodTotal };
