/**
 * Kitchen read model
 *
 * Kitchen displays poll getWatermark() and refetch the queue only when the
 * version moved. The new-order flag is a short-lived signal: a display that
 * polls within its TTL sees it, later ones only see the version change.
 */

import { Database } from '../db/database.js';
import { ActorContext, requires } from './access.js';
import { OrderStatus } from './order-status.js';
import { SignalBoard, SignalKey } from './signal-board.js';

export class KitchenBoard {
  private db: Database;
  private signals: SignalBoard;
  private now: () => Date;
  private ttlSeconds: number;
  private version = 0;
  private updatedAt: string | null = null;

  constructor(db: Database, signals: SignalBoard, options: { now?: () => Date; ttlSeconds?: number } = {}) {
    this.db = db;
    this.signals = signals;
    this.now = options.now ?? (() => new Date());
    this.ttlSeconds = options.ttlSeconds ?? 60;
  }

  /** Call after a commit that changed what the kitchen should see. */
  markUpdated(newOrder: boolean): void {
    this.version++;
    this.updatedAt = this.now().toISOString();
    if (newOrder) {
      this.signals.set(SignalKey.kitchenNewOrders, this.version, this.ttlSeconds);
    }
  }

  getWatermark(): KitchenWatermark {
    return {
      version: this.version,
      updatedAt: this.updatedAt,
      newOrders: this.signals.has(SignalKey.kitchenNewOrders),
    };
  }

  acknowledgeNewOrders(ctx: ActorContext): void {
    requires(ctx.user, 'KITCHEN');
    this.signals.take(SignalKey.kitchenNewOrders);
  }

  getQueue(ctx: ActorContext): KitchenQueue {
    requires(ctx.user, 'KITCHEN');

    const rows = this.db.all<KitchenItemRow>(
      `SELECT oi.id, oi.order_id, oi.product_name, oi.quantity, oi.special_instructions, oi.created_at,
              o.order_number, o.created_at AS order_created_at, t.number AS table_number, u.display_name AS waiter_name
       FROM order_items oi
       JOIN orders o ON o.id = oi.order_id
       JOIN users u ON u.id = o.waiter_id
       LEFT JOIN dining_tables t ON t.id = o.table_id
       WHERE oi.requires_kitchen = 1 AND oi.is_confirmed = 0 AND o.status = ?
       ORDER BY o.created_at, oi.created_at, oi.rowid`,
      [OrderStatus.PREPARING]
    );

    const tickets = new Map<string, KitchenTicket>();
    for (const row of rows) {
      let ticket = tickets.get(row.order_id);
      if (!ticket) {
        ticket = {
          orderId: row.order_id,
          orderNumber: row.order_number,
          tableNumber: row.table_number,
          waiterName: row.waiter_name,
          createdAt: row.order_created_at,
          items: [],
        };
        tickets.set(row.order_id, ticket);
      }
      ticket.items.push({
        id: row.id,
        productName: row.product_name,
        quantity: row.quantity,
        specialInstructions: row.special_instructions,
        createdAt: row.created_at,
      });
    }

    return {
      watermark: this.getWatermark(),
      tickets: [...tickets.values()],
    };
  }
}

interface KitchenWatermark {
  version: number;
  updatedAt: string | null;
  newOrders: boolean;
}

interface KitchenTicketItem {
  id: string;
  productName: string;
  quantity: number;
  specialInstructions: string;
  createdAt: string;
}

interface KitchenTicket {
  orderId: string;
  orderNumber: string;
  tableNumber: string | null;
  waiterName: string;
  createdAt: string;
  items: KitchenTicketItem[];
}

interface KitchenQueue {
  watermark: KitchenWatermark;
  tickets: KitchenTicket[];
}

interface KitchenItemRow {
  id: string;
  order_id: string;
  product_name: string;
  quantity: number;
  special_instructions: string;
  created_at: string;
  order_number: string;
  order_created_at: string;
  table_number: string | null;
  waiter_name: string;
}

export type { KitchenWatermark, KitchenTicket, KitchenTicketItem, KitchenQueue };
