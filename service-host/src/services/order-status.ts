import { Database } from '../db/database.js';

export const OrderStatus = {
  PENDING: 'pending',
  PREPARING: 'preparing',
  READY: 'ready',
  SERVED: 'served',
  COMPLETED: 'completed',
  CANCELLED: 'cancelled',
} as const;

export type OrderStatus = (typeof OrderStatus)[keyof typeof OrderStatus];

export const ORDER_STATUSES: readonly OrderStatus[] = Object.values(OrderStatus);

export const OPEN_ORDER_STATUSES: readonly OrderStatus[] = [
  OrderStatus.PENDING,
  OrderStatus.PREPARING,
  OrderStatus.READY,
  OrderStatus.SERVED,
];

/** Statuses in which items may still be added or removed. */
export const EDITABLE_ORDER_STATUSES: readonly OrderStatus[] = [OrderStatus.PENDING, OrderStatus.PREPARING];

export function isOrderStatus(value: string): value is OrderStatus {
  return ORDER_STATUSES.some(status => status === value);
}

export function isOpenStatus(status: OrderStatus): boolean {
  return OPEN_ORDER_STATUSES.includes(status);
}

export const OPEN_STATUS_SQL = OPEN_ORDER_STATUSES.map(status => `'${status}'`).join(', ');

/**
 * Frees the table unless another open order still sits on it. Call inside
 * the transaction that closed the order.
 */
export function releaseTable(db: Database, tableId: string | null): void {
  if (!tableId) return;
  db.run(
    `UPDATE dining_tables SET is_occupied = 0
     WHERE id = ? AND NOT EXISTS (
       SELECT 1 FROM orders WHERE table_id = ? AND status IN (${OPEN_STATUS_SQL})
     )`,
    [tableId, tableId]
  );
}
